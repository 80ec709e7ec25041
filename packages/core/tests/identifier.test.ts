import { describe, expect, it } from 'vitest';
import { ConnectorError, Identifier, isReservedKeyword, parseIdentifier, safeParseIdentifier } from '../src/index.js';

function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  return undefined;
}

describe('parseIdentifier', () => {
  it('keeps the exact spelling of quoted names', () => {
    const id = parseIdentifier('"Foo"');

    expect(id.kind).toBe('quoted');
    expect(id.asInternal()).toBe('Foo');
  });

  it('case-folds unquoted names', () => {
    const lower = parseIdentifier('foo');
    const upper = parseIdentifier('FOO');

    expect(upper.kind).toBe('unquoted');
    expect(upper.asInternal()).toBe('foo');
    expect(lower.equals(upper)).toBe(true);
  });

  it('distinguishes quoted mixed-case names from unquoted ones', () => {
    expect(parseIdentifier('foo').equals(parseIdentifier('"Foo"'))).toBe(false);
    expect(parseIdentifier('FOO').equals(parseIdentifier('"foo"'))).toBe(true);
  });

  it('collapses doubled quotes inside a quoted name', () => {
    expect(parseIdentifier('"say ""hi"""').asInternal()).toBe('say "hi"');
  });

  it('takes an unquoted name literally, even with a trailing quote', () => {
    expect(parseIdentifier('my"col').asInternal()).toBe('my"col');
  });

  it('reports malformed quoted names', () => {
    expect(safeParseIdentifier('"Foo').success).toBe(false);
    expect(safeParseIdentifier('"a"b"').success).toBe(false);
    expect(safeParseIdentifier('""').success).toBe(false);
  });

  it('rejects the empty string with an INVALID_IDENTIFIER error', () => {
    const error = captureError(() => parseIdentifier(''));

    expect(error).toBeInstanceOf(ConnectorError);
    if (error instanceof ConnectorError) {
      expect(error.code).toBe('INVALID_IDENTIFIER');
      expect(error.message).toBe('Invalid identifier: identifier must not be empty');
    }
  });
});

describe('Identifier.asCql', () => {
  it('leaves plain names bare when pretty', () => {
    expect(Identifier.unquoted('Orders').asCql(true)).toBe('orders');
  });

  it('quotes names that need it', () => {
    expect(Identifier.quoted('Orders').asCql(true)).toBe('"Orders"');
    expect(Identifier.quoted('a"b').asCql()).toBe('"a""b"');
    expect(Identifier.unquoted('orders').asCql()).toBe('"orders"');
  });

  it('quotes reserved keywords even when pretty', () => {
    expect(Identifier.unquoted('SELECT').asCql(true)).toBe('"select"');
    expect(Identifier.quoted('from').asCql(true)).toBe('"from"');
    expect(Identifier.unquoted('token').asCql(true)).toBe('"token"');
    expect(Identifier.unquoted('key').asCql(true)).toBe('key');
  });
});

describe('isReservedKeyword', () => {
  it('matches keywords regardless of case', () => {
    expect(isReservedKeyword('table')).toBe(true);
    expect(isReservedKeyword('Where')).toBe(true);
    expect(isReservedKeyword('orders')).toBe(false);
  });
});
