/**
 * Native column types of the destination store
 *
 * Codes are the driver's `types.dataTypes`; collection types carry their
 * element types in `info`, the same shape the driver reports in table metadata.
 */

import cassandra from 'cassandra-driver';
import { ConnectorError } from '../errors/index.js';

const { dataTypes } = cassandra.types;

export interface ColumnType {
  code: number;
  /** Element types for list/set/map/tuple/frozen, UDT name for udt */
  info?: ColumnType | ColumnType[] | string | null;
}

const SIMPLE_TYPES = new Map<string, number>([
  ['ascii', dataTypes.ascii],
  ['bigint', dataTypes.bigint],
  ['blob', dataTypes.blob],
  ['boolean', dataTypes.boolean],
  ['counter', dataTypes.counter],
  ['decimal', dataTypes.decimal],
  ['double', dataTypes.double],
  ['float', dataTypes.float],
  ['int', dataTypes.int],
  ['text', dataTypes.text],
  ['timestamp', dataTypes.timestamp],
  ['uuid', dataTypes.uuid],
  ['varchar', dataTypes.varchar],
  ['varint', dataTypes.varint],
  ['timeuuid', dataTypes.timeuuid],
  ['inet', dataTypes.inet],
  ['date', dataTypes.date],
  ['time', dataTypes.time],
  ['smallint', dataTypes.smallint],
  ['tinyint', dataTypes.tinyint],
  ['duration', dataTypes.duration],
]);

const SIMPLE_NAMES = new Map<number, string>(
  Array.from(SIMPLE_TYPES, ([name, code]) => [code, name] as const)
);

export const columnTypes = {
  simple(name: string): ColumnType {
    const code = SIMPLE_TYPES.get(name.toLowerCase());
    if (code === undefined) {
      throw unsupported(name);
    }
    return { code };
  },
  list(element: ColumnType): ColumnType {
    return { code: dataTypes.list, info: element };
  },
  set(element: ColumnType): ColumnType {
    return { code: dataTypes.set, info: element };
  },
  map(key: ColumnType, value: ColumnType): ColumnType {
    return { code: dataTypes.map, info: [key, value] };
  },
  tuple(elements: ColumnType[]): ColumnType {
    return { code: dataTypes.tuple, info: elements };
  },
  udt(name: string): ColumnType {
    return { code: dataTypes.udt, info: name };
  },
};

function unsupported(text: string): ConnectorError {
  return new ConnectorError({
    code: 'UNSUPPORTED_TYPE',
    message: `Unsupported column type: ${text}`,
    suggestion: `Use a CQL type such as ${Array.from(SIMPLE_TYPES.keys()).slice(0, 4).join(', ')}, list<...>, set<...> or map<..., ...>.`,
  });
}

function singleInfo(type: ColumnType): ColumnType {
  const info = type.info;
  if (info && typeof info === 'object' && !Array.isArray(info)) {
    return info;
  }
  throw unsupported(`collection of code ${type.code} without element type`);
}

function listInfo(type: ColumnType): ColumnType[] {
  const info = type.info;
  if (Array.isArray(info)) {
    return info;
  }
  throw unsupported(`type of code ${type.code} without element types`);
}

/** Element type of a list or set column */
export function elementType(type: ColumnType): ColumnType {
  return singleInfo(type);
}

/** Key and value types of a map column */
export function mapTypes(type: ColumnType): [ColumnType, ColumnType] {
  const [key, value] = listInfo(type);
  if (!key || !value) {
    throw unsupported(`map of code ${type.code} without key and value types`);
  }
  return [key, value];
}

/** Component types of a tuple column */
export function tupleTypes(type: ColumnType): ColumnType[] {
  return listInfo(type);
}

/**
 * Render a column type the way CQL spells it, e.g. `map<text, list<int>>`.
 */
export function formatColumnType(type: ColumnType): string {
  switch (type.code) {
    case dataTypes.list:
      return `list<${formatColumnType(elementType(type))}>`;
    case dataTypes.set:
      return `set<${formatColumnType(elementType(type))}>`;
    case dataTypes.map: {
      const [key, value] = mapTypes(type);
      return `map<${formatColumnType(key)}, ${formatColumnType(value)}>`;
    }
    case dataTypes.tuple:
      return `tuple<${tupleTypes(type).map(formatColumnType).join(', ')}>`;
    case dataTypes.udt:
      return typeof type.info === 'string' ? type.info : 'udt';
    default:
      return SIMPLE_NAMES.get(type.code) ?? `custom(${type.code})`;
  }
}

/**
 * Parse a CQL type name such as `int`, `frozen<list<text>>` or
 * `map<text, int>`. Names that are not built-in types are taken as
 * user-defined types.
 */
export function parseColumnType(text: string): ColumnType {
  const parser = new TypeNameParser(text);
  const type = parser.parseType();
  parser.expectEnd();
  return type;
}

class TypeNameParser {
  private pos = 0;

  constructor(private readonly text: string) {}

  parseType(): ColumnType {
    const name = this.readName();
    const lower = name.toLowerCase();

    if (!this.consume('<')) {
      if (lower === 'list' || lower === 'set' || lower === 'map' || lower === 'tuple' || lower === 'frozen') {
        throw unsupported(`${this.text} (${lower} needs type parameters)`);
      }
      return SIMPLE_TYPES.has(lower) ? columnTypes.simple(lower) : columnTypes.udt(name);
    }

    const params = [this.parseType()];
    while (this.consume(',')) {
      params.push(this.parseType());
    }
    this.expect('>');

    const [first, second] = params;
    if (lower === 'frozen' && first && params.length === 1) return first;
    if (lower === 'list' && first && params.length === 1) return columnTypes.list(first);
    if (lower === 'set' && first && params.length === 1) return columnTypes.set(first);
    if (lower === 'map' && first && second && params.length === 2) return columnTypes.map(first, second);
    if (lower === 'tuple') return columnTypes.tuple(params);
    throw unsupported(this.text);
  }

  expectEnd(): void {
    this.skipSpace();
    if (this.pos < this.text.length) {
      throw unsupported(this.text);
    }
  }

  private readName(): string {
    this.skipSpace();
    const match = /^[A-Za-z_][A-Za-z0-9_]*/.exec(this.text.slice(this.pos));
    if (!match) {
      throw unsupported(this.text);
    }
    this.pos += match[0].length;
    return match[0];
  }

  private consume(ch: string): boolean {
    this.skipSpace();
    if (this.text.charAt(this.pos) === ch) {
      this.pos++;
      return true;
    }
    return false;
  }

  private expect(ch: string): void {
    if (!this.consume(ch)) {
      throw unsupported(this.text);
    }
  }

  private skipSpace(): void {
    while (/\s/.test(this.text.charAt(this.pos))) {
      this.pos++;
    }
  }
}
