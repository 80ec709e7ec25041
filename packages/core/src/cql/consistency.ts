/**
 * Write consistency levels
 *
 * Names follow the store's own spelling; each maps to the driver's numeric code.
 */

import cassandra from 'cassandra-driver';

const { consistencies } = cassandra.types;

/** All levels, in the order the store declares them */
export const CONSISTENCY_LEVELS = [
  'ANY',
  'ONE',
  'TWO',
  'THREE',
  'QUORUM',
  'ALL',
  'LOCAL_ONE',
  'LOCAL_QUORUM',
  'EACH_QUORUM',
  'SERIAL',
  'LOCAL_SERIAL',
] as const;

export type ConsistencyLevel = (typeof CONSISTENCY_LEVELS)[number];

export const DEFAULT_CONSISTENCY_LEVEL: ConsistencyLevel = 'LOCAL_ONE';

const CONSISTENCY_CODES: Record<ConsistencyLevel, number> = {
  ANY: consistencies.any,
  ONE: consistencies.one,
  TWO: consistencies.two,
  THREE: consistencies.three,
  QUORUM: consistencies.quorum,
  ALL: consistencies.all,
  LOCAL_ONE: consistencies.localOne,
  LOCAL_QUORUM: consistencies.localQuorum,
  EACH_QUORUM: consistencies.eachQuorum,
  SERIAL: consistencies.serial,
  LOCAL_SERIAL: consistencies.localSerial,
};

export function isConsistencyLevel(value: string): value is ConsistencyLevel {
  return (CONSISTENCY_LEVELS as readonly string[]).includes(value);
}

/**
 * Match a configured name against the enumeration, ignoring case.
 * Returns undefined for names that are not levels.
 */
export function parseConsistencyLevel(value: string): ConsistencyLevel | undefined {
  const upper = value.toUpperCase();
  return isConsistencyLevel(upper) ? upper : undefined;
}

/** Driver code to pass as the `consistency` query option */
export function consistencyCode(level: ConsistencyLevel): number {
  return CONSISTENCY_CODES[level];
}
