/**
 * Column-to-field mapping of one table
 */

import type { Identifier } from '@cqlsink/core';
import type { FieldPath } from './field-path.js';

export interface MappingEntry {
  column: Identifier;
  field: FieldPath;
}

/**
 * Immutable, insertion-ordered association of destination columns to
 * record fields. Lookups go by the column's internal name.
 */
export class Mapping implements Iterable<MappingEntry> {
  private readonly entries: ReadonlyMap<string, MappingEntry>;

  constructor(entries: Iterable<MappingEntry> = []) {
    const byColumn = new Map<string, MappingEntry>();
    for (const entry of entries) {
      byColumn.set(entry.column.asInternal(), entry);
    }
    this.entries = byColumn;
  }

  get size(): number {
    return this.entries.size;
  }

  has(column: Identifier): boolean {
    return this.entries.has(column.asInternal());
  }

  get(column: Identifier): FieldPath | undefined {
    return this.entries.get(column.asInternal())?.field;
  }

  columns(): Identifier[] {
    return Array.from(this.entries.values(), (entry) => entry.column);
  }

  [Symbol.iterator](): Iterator<MappingEntry> {
    return this.entries.values();
  }

  /** Entries as `column=field` strings, in insertion order */
  toPathList(): string[] {
    return Array.from(
      this.entries.values(),
      (entry) => `${entry.column.asCql(true)}=${entry.field.toString()}`
    );
  }

  toString(): string {
    return this.toPathList().join(', ');
  }
}
