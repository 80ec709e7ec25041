export {
  recordSchemaTypeSchema,
  logicalTypeSchema,
  recordSchemaSchema,
} from './schemas.js';
