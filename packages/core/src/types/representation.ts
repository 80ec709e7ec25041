/**
 * In-memory representation types
 *
 * What a record field's value looks like once it has been extracted for
 * writing to a column.
 */

export type PrimitiveRepresentation =
  | 'byte'
  | 'short'
  | 'int'
  | 'long'
  | 'varint'
  | 'float'
  | 'double'
  | 'decimal'
  | 'boolean'
  | 'string'
  | 'bytes'
  | 'date'
  | 'time'
  | 'timestamp'
  | 'uuid'
  | 'inet'
  | 'duration';

export type RepresentationType =
  | { kind: 'primitive'; name: PrimitiveRepresentation }
  | { kind: 'list'; element: RepresentationType }
  | { kind: 'set'; element: RepresentationType }
  | { kind: 'map'; key: RepresentationType; value: RepresentationType }
  | { kind: 'tuple'; elements: RepresentationType[] }
  /** A whole structured record (or nested struct / user-defined type) */
  | { kind: 'struct' };

export function primitive(name: PrimitiveRepresentation): RepresentationType {
  return { kind: 'primitive', name };
}

export function formatRepresentation(type: RepresentationType): string {
  switch (type.kind) {
    case 'primitive':
      return type.name;
    case 'list':
    case 'set':
      return `${type.kind}<${formatRepresentation(type.element)}>`;
    case 'map':
      return `map<${formatRepresentation(type.key)}, ${formatRepresentation(type.value)}>`;
    case 'tuple':
      return `tuple<${type.elements.map(formatRepresentation).join(', ')}>`;
    case 'struct':
      return 'struct';
  }
}
