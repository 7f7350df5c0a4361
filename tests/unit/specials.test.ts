import { describe, it, expect } from 'vitest';
import { extractSpecials, isTypeSelectorTable } from '../../src/definition/specials.js';

describe('extractSpecials()', () => {
  it('moves $-prefixed keys into directives without the prefix', () => {
    const { fields, directives } = extractSpecials({ $limit: 5, child: true });
    expect(fields).toEqual({ child: true });
    expect(directives).toEqual({ limit: 5 });
  });

  it('accepts directives anywhere in the node and keeps field order', () => {
    const { fields, directives } = extractSpecials({
      a: true,
      $limit: 2,
      b: { c: true },
      $orderBy: 'title desc',
    });
    expect(Object.keys(fields as object)).toEqual(['a', 'b']);
    expect(directives).toEqual({ limit: 2, orderBy: 'title desc' });
  });

  it('passes payloads through unchanged', () => {
    const where = { status: 'live' };
    const { directives } = extractSpecials({ $where: where });
    expect(directives['where']).toBe(where);
  });

  it('passes non-mapping nodes through with no directives', () => {
    expect(extractSpecials(true)).toEqual({ fields: true, directives: {} });
    expect(extractSpecials('title')).toEqual({ fields: 'title', directives: {} });
    expect(extractSpecials(null)).toEqual({ fields: null, directives: {} });
  });

  it('honours a custom prefix', () => {
    const { fields, directives } = extractSpecials({ '@limit': 1, $keep: true }, '@');
    expect(fields).toEqual({ $keep: true });
    expect(directives).toEqual({ limit: 1 });
  });

  it('does not mutate the input node', () => {
    const node = { $limit: 5, title: true };
    extractSpecials(node);
    expect(node).toEqual({ $limit: 5, title: true });
  });
});

describe('isTypeSelectorTable()', () => {
  it('is true when every key is underscored', () => {
    expect(isTypeSelectorTable({ _body: { text: true }, _image: true })).toBe(true);
  });

  it('is false when any key is a plain field', () => {
    expect(isTypeSelectorTable({ _body: true, title: true })).toBe(false);
  });

  it('is false for an empty node', () => {
    expect(isTypeSelectorTable({})).toBe(false);
  });

  it('is false for leaves', () => {
    expect(isTypeSelectorTable(true)).toBe(false);
    expect(isTypeSelectorTable('_body')).toBe(false);
  });

  it('honours a custom prefix', () => {
    expect(isTypeSelectorTable({ '#body': true }, '#')).toBe(true);
    expect(isTypeSelectorTable({ _body: true }, '#')).toBe(false);
  });
});
