export { Identifier, isReservedKeyword, parseIdentifier, safeParseIdentifier } from './identifier.js';
export type { IdentifierKind, IdentifierParseResult } from './identifier.js';
