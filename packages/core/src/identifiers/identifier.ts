/**
 * Keyspace, table and column identifiers
 *
 * An identifier is either quoted (spelled exactly as written, case-sensitive)
 * or unquoted (case-folded to lower case). Equality compares the internal
 * form, so `foo`, `FOO` and `"foo"` are all the same identifier while
 * `"Foo"` is a different one.
 */

import { readFileSync } from 'node:fs';
import { z } from 'zod';
import { ConnectorError } from '../errors/index.js';

export type IdentifierKind = 'quoted' | 'unquoted';

export type IdentifierParseResult =
  | { success: true; identifier: Identifier }
  | { success: false; error: string };

/** Names that need no quoting when rendered as CQL, unless reserved */
const PLAIN_CQL_NAME = /^[a-z][a-z0-9_]*$/;

/** Keywords that must be quoted even though they look plain */
const RESERVED_KEYWORDS: ReadonlySet<string> = new Set(
  z
    .array(z.string())
    .parse(JSON.parse(readFileSync(new URL('./reserved-keywords.json', import.meta.url), 'utf-8')) as unknown)
);

export function isReservedKeyword(name: string): boolean {
  return RESERVED_KEYWORDS.has(name.toLowerCase());
}

export class Identifier {
  private constructor(
    readonly kind: IdentifierKind,
    private readonly internal: string
  ) {}

  /** Identifier whose exact spelling is significant */
  static quoted(exact: string): Identifier {
    return new Identifier('quoted', exact);
  }

  /** Identifier compared case-insensitively; stored lower-cased */
  static unquoted(raw: string): Identifier {
    return new Identifier('unquoted', raw.toLowerCase());
  }

  /** The canonical form the store uses internally */
  asInternal(): string {
    return this.internal;
  }

  /**
   * Render as CQL. With `pretty`, names that need no quoting are left bare;
   * reserved keywords are always quoted.
   */
  asCql(pretty = false): string {
    if (pretty && PLAIN_CQL_NAME.test(this.internal) && !isReservedKeyword(this.internal)) {
      return this.internal;
    }
    return `"${this.internal.replace(/"/g, '""')}"`;
  }

  equals(other: Identifier): boolean {
    return this.internal === other.internal;
  }

  toString(): string {
    return this.internal;
  }
}

/**
 * Strip the surrounding double quotes of a quoted identifier and collapse
 * doubled inner quotes. Returns undefined when `raw` is not exactly one
 * quoted segment.
 */
function unquote(raw: string): string | undefined {
  if (raw.length < 3 || !raw.endsWith('"')) {
    return undefined;
  }

  const body = raw.slice(1, -1);
  let out = '';
  for (let i = 0; i < body.length; i++) {
    const ch = body.charAt(i);
    if (ch === '"') {
      if (body.charAt(i + 1) !== '"') {
        return undefined;
      }
      i++;
    }
    out += ch;
  }
  return out;
}

/**
 * Parse a raw name. Only a leading double quote is interpreted: such input
 * must be a single quoted segment. Anything else is taken as an unquoted
 * name without further interpretation.
 */
export function safeParseIdentifier(raw: string): IdentifierParseResult {
  if (raw.length === 0) {
    return { success: false, error: 'identifier must not be empty' };
  }

  if (!raw.startsWith('"')) {
    return { success: true, identifier: Identifier.unquoted(raw) };
  }

  const exact = unquote(raw);
  if (exact === undefined) {
    return {
      success: false,
      error: `malformed quoted identifier ${raw}: expected a single "..." segment with inner quotes doubled`,
    };
  }
  return { success: true, identifier: Identifier.quoted(exact) };
}

export function parseIdentifier(raw: string): Identifier {
  const result = safeParseIdentifier(raw);
  if (!result.success) {
    throw new ConnectorError({
      code: 'INVALID_IDENTIFIER',
      message: `Invalid identifier: ${result.error}`,
      suggestion: 'Write the name bare, or wrap it in double quotes to keep its case.',
      context: { raw },
    });
  }
  return result.identifier;
}
