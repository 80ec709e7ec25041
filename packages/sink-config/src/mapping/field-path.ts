/**
 * Source side of a mapping entry: where in a record a column's value comes from
 */

export type RecordPart = 'key' | 'value';

/** Field name that stands for the whole key or value rather than one of its fields */
export const WHOLE_RECORD_FIELD = '__self';

export class FieldPath {
  constructor(
    readonly part: RecordPart,
    readonly segments: readonly string[]
  ) {}

  /** `key.__self` / `value.__self` */
  static wholeRecord(part: RecordPart): FieldPath {
    return new FieldPath(part, [WHOLE_RECORD_FIELD]);
  }

  isWholeRecord(): boolean {
    return this.segments.length === 1 && this.segments[0] === WHOLE_RECORD_FIELD;
  }

  /** Dotted field name within the key or value, e.g. `address.city` */
  get fieldName(): string {
    return this.segments.join('.');
  }

  toString(): string {
    return `${this.part}.${this.fieldName}`;
  }
}
