import { describe, expect, it } from 'vitest';
import { parseIdentifier } from '@cqlsink/core';
import { parseMapping } from '../src/index.js';

const SETTING = 'topic.t.ks.tbl.mapping';

describe('parseMapping', () => {
  it('parses column=field pairs', () => {
    const { mapping, errors } = parseMapping('col1=value.f1, col2=key.f1', SETTING);

    expect(errors).toEqual([]);
    expect(mapping.toPathList()).toEqual(['col1=value.f1', 'col2=key.f1']);
  });

  it('ignores whitespace around commas and equals signs', () => {
    const { mapping, errors } = parseMapping('  col1 = value.f1 ,col2=  key.f1 ', SETTING);

    expect(errors).toEqual([]);
    expect(new Set(mapping.toPathList())).toEqual(new Set(['col1=value.f1', 'col2=key.f1']));
  });

  it('normalizes a bare key or value to the whole-record field', () => {
    const { mapping } = parseMapping('k=key, v=value', SETTING);
    const field = mapping.get(parseIdentifier('v'));

    expect(mapping.toPathList()).toEqual(['k=key.__self', 'v=value.__self']);
    expect(field?.isWholeRecord()).toBe(true);
    expect(field?.part).toBe('value');
  });

  it('keeps quoted columns case-sensitive and accepts nested paths', () => {
    const { mapping, errors } = parseMapping('"MyCol"=value.address.city', SETTING);
    const field = mapping.get(parseIdentifier('"MyCol"'));

    expect(errors).toEqual([]);
    expect(mapping.toPathList()).toEqual(['"MyCol"=value.address.city']);
    expect(field?.segments).toEqual(['address', 'city']);
    expect(field?.fieldName).toBe('address.city');
    expect(mapping.has(parseIdentifier('mycol'))).toBe(false);
  });

  it('looks columns up case-insensitively for unquoted names', () => {
    const { mapping } = parseMapping('col1=value.f1', SETTING);

    expect(mapping.get(parseIdentifier('COL1'))?.toString()).toBe('value.f1');
  });

  it('reports every defect and keeps the valid entries', () => {
    const { mapping, errors } = parseMapping(
      'a=value.x, b, =key.y, c=, d=other, a=value.z, e=value..f, f=value.ok',
      SETTING
    );

    expect(errors).toEqual([
      "Invalid mapping entry 'b' at position 2: expected 'column=field'",
      "Invalid mapping entry '=key.y' at position 3: missing column name",
      "Invalid mapping entry 'c=' at position 4: missing field name",
      "Invalid mapping entry 'd=other' at position 5: invalid field name 'other': field names in mapping must be 'key', 'value', or start with 'key.' or 'value.'",
      "Duplicate mapping for column 'a' at position 6",
      "Invalid mapping entry 'e=value..f' at position 7: invalid field name 'value..f': empty path segment",
    ]);
    expect(mapping.toPathList()).toEqual(['a=value.x', 'f=value.ok']);
  });

  it('treats differently cased unquoted columns as duplicates', () => {
    const { errors } = parseMapping('col=value.a, COL=value.b', SETTING);

    expect(errors).toEqual(["Duplicate mapping for column 'col' at position 2"]);
  });

  it('reports a malformed quoted column', () => {
    const { errors } = parseMapping('"Ab"c=value.x', SETTING);

    expect(errors).toEqual([
      'Invalid mapping entry \'"Ab"c=value.x\' at position 1: malformed quoted identifier "Ab"c: expected a single "..." segment with inner quotes doubled',
    ]);
  });

  it('reports path segments with whitespace', () => {
    const { errors } = parseMapping('a=value.f g', SETTING);

    expect(errors).toEqual([
      "Invalid mapping entry 'a=value.f g' at position 1: invalid field name 'value.f g': path segment 'f g' may not contain whitespace, '\"' or '='",
    ]);
  });

  it('reports empty entries from stray commas', () => {
    const { mapping, errors } = parseMapping('a=key.x,', SETTING);

    expect(errors).toEqual(['Empty mapping entry at position 2']);
    expect(mapping.size).toBe(1);
  });

  it('reports a blank mapping once', () => {
    const { mapping, errors } = parseMapping('   ', SETTING);

    expect(errors).toEqual([
      "Mapping topic.t.ks.tbl.mapping is empty; expected entries like 'col1=value.f1, col2=key.f1'",
    ]);
    expect(mapping.size).toBe(0);
  });

  it('does not split on commas inside quoted columns', () => {
    const { mapping, errors } = parseMapping('"a,b"=value.x, c=value.y', SETTING);

    expect(errors).toEqual([]);
    expect(mapping.columns().map((column) => column.asInternal())).toEqual(['a,b', 'c']);
  });
});
