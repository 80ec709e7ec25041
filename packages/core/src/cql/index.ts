export {
  CONSISTENCY_LEVELS,
  DEFAULT_CONSISTENCY_LEVEL,
  isConsistencyLevel,
  parseConsistencyLevel,
  consistencyCode,
} from './consistency.js';
export type { ConsistencyLevel } from './consistency.js';
export {
  columnTypes,
  elementType,
  mapTypes,
  tupleTypes,
  formatColumnType,
  parseColumnType,
} from './column-type.js';
export type { ColumnType } from './column-type.js';
