/**
 * Identity of a table configuration
 */

import type { Identifier } from '@cqlsink/core';

/**
 * (topic, keyspace, table) triple. A triple may be configured only once, so
 * two configurations are the same configuration iff their keys are equal.
 */
export class TableKey {
  constructor(
    readonly topic: string,
    readonly keyspace: Identifier,
    readonly table: Identifier
  ) {}

  equals(other: TableKey): boolean {
    return (
      this.topic === other.topic &&
      this.keyspace.equals(other.keyspace) &&
      this.table.equals(other.table)
    );
  }

  /**
   * String form usable as a Map key; equal keys yield equal ids.
   */
  get id(): string {
    return JSON.stringify([this.topic, this.keyspace.asInternal(), this.table.asInternal()]);
  }

  toString(): string {
    return `${this.topic} -> ${this.keyspace.asCql(true)}.${this.table.asCql(true)}`;
  }
}
