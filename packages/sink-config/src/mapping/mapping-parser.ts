/**
 * Mapping grammar parser
 *
 * Parses `col1=value.f1, col2=key.f1` into a Mapping. Every malformed entry
 * and every repeated column produces one error; parsing always continues with
 * the next entry, so callers see all problems of a mapping at once.
 */

import { safeParseIdentifier, singleQuote } from '@cqlsink/core';
import { FieldPath } from './field-path.js';
import { Mapping, type MappingEntry } from './mapping.js';

export interface MappingParseResult {
  /** The well-formed entries (possibly fewer than written) */
  mapping: Mapping;
  /** One human-readable message per defect, in input order */
  errors: string[];
}

type Parsed<T> = { ok: true; value: T } | { ok: false; error: string };

/** A field path segment: no whitespace, quotes, dots or equals signs */
const PATH_SEGMENT = /^[^\s".=]+$/;

const ROOT_RULE = "field names in mapping must be 'key', 'value', or start with 'key.' or 'value.'";

/**
 * Index of the first `ch` that is not inside a double-quoted section, or -1
 */
function indexOutsideQuotes(text: string, ch: string, from = 0): number {
  let inQuotes = false;
  for (let i = from; i < text.length; i++) {
    const current = text.charAt(i);
    if (current === '"') {
      inQuotes = !inQuotes;
    } else if (current === ch && !inQuotes) {
      return i;
    }
  }
  return -1;
}

function splitEntries(text: string): string[] {
  const entries: string[] = [];
  let start = 0;
  let comma = indexOutsideQuotes(text, ',', start);
  while (comma !== -1) {
    entries.push(text.slice(start, comma));
    start = comma + 1;
    comma = indexOutsideQuotes(text, ',', start);
  }
  entries.push(text.slice(start));
  return entries;
}

function parseFieldPath(text: string): Parsed<FieldPath> {
  const [root, ...rest] = text.split('.');

  if (root !== 'key' && root !== 'value') {
    return { ok: false, error: `invalid field name ${singleQuote(text)}: ${ROOT_RULE}` };
  }
  if (rest.length === 0) {
    return { ok: true, value: FieldPath.wholeRecord(root) };
  }

  for (const segment of rest) {
    if (segment === '') {
      return { ok: false, error: `invalid field name ${singleQuote(text)}: empty path segment` };
    }
    if (!PATH_SEGMENT.test(segment)) {
      return {
        ok: false,
        error: `invalid field name ${singleQuote(text)}: path segment ${singleQuote(segment)} may not contain whitespace, '"' or '='`,
      };
    }
  }
  return { ok: true, value: new FieldPath(root, rest) };
}

function parseEntry(text: string): Parsed<MappingEntry> {
  const equals = indexOutsideQuotes(text, '=');
  if (equals === -1) {
    return { ok: false, error: "expected 'column=field'" };
  }

  const columnText = text.slice(0, equals).trim();
  const fieldText = text.slice(equals + 1).trim();
  if (columnText === '') {
    return { ok: false, error: 'missing column name' };
  }
  if (fieldText === '') {
    return { ok: false, error: 'missing field name' };
  }

  const column = safeParseIdentifier(columnText);
  if (!column.success) {
    return { ok: false, error: column.error };
  }

  const field = parseFieldPath(fieldText);
  if (!field.ok) {
    return field;
  }

  return { ok: true, value: { column: column.identifier, field: field.value } };
}

/**
 * Parse a mapping string. `settingPath` only appears in diagnostics.
 */
export function parseMapping(mappingText: string, settingPath: string): MappingParseResult {
  if (mappingText.trim() === '') {
    return {
      mapping: new Mapping(),
      errors: [`Mapping ${settingPath} is empty; expected entries like 'col1=value.f1, col2=key.f1'`],
    };
  }

  const errors: string[] = [];
  const entries: MappingEntry[] = [];
  const seen = new Set<string>();

  splitEntries(mappingText).forEach((raw, index) => {
    const position = index + 1;
    const text = raw.trim();

    if (text === '') {
      errors.push(`Empty mapping entry at position ${position}`);
      return;
    }

    const parsed = parseEntry(text);
    if (!parsed.ok) {
      errors.push(`Invalid mapping entry ${singleQuote(text)} at position ${position}: ${parsed.error}`);
      return;
    }

    const column = parsed.value.column.asInternal();
    if (seen.has(column)) {
      errors.push(`Duplicate mapping for column ${singleQuote(column)} at position ${position}`);
      return;
    }
    seen.add(column);
    entries.push(parsed.value);
  });

  return { mapping: new Mapping(entries), errors };
}
