import { describe, it, expect } from 'vitest';
import { normalizeDefinition } from '../../src/definition/normalize.js';

describe('normalizeDefinition()', () => {
  // ---------------------------------------------------------------------------
  // Shorthand forms
  // ---------------------------------------------------------------------------
  describe('shorthand forms', () => {
    it('rewrites a list of field names to a mapping', () => {
      expect(normalizeDefinition(['title', 'body'])).toEqual({ title: true, body: true });
    });

    it('treats list and mapping shorthand as equivalent', () => {
      expect(normalizeDefinition(['a', 'b'])).toEqual(normalizeDefinition({ a: true, b: true }));
    });

    it('rewrites nested lists at every level', () => {
      expect(normalizeDefinition({ author: ['username', 'email'] })).toEqual({
        author: { username: true, email: true },
      });
      expect(normalizeDefinition({ author: { profile: ['bio'] } })).toEqual({
        author: { profile: { bio: true } },
      });
    });

    it('merges mappings found inside a list', () => {
      expect(normalizeDefinition(['title', { author: ['name'] }])).toEqual({
        title: true,
        author: { name: true },
      });
    });

    it('stringifies non-string list elements', () => {
      expect(normalizeDefinition([1, 'a'])).toEqual({ '1': true, a: true });
    });

    it('keeps key order of the input', () => {
      expect(Object.keys(normalizeDefinition(['b', 'a', 'c']))).toEqual(['b', 'a', 'c']);
    });
  });

  // ---------------------------------------------------------------------------
  // Strings
  // ---------------------------------------------------------------------------
  describe('strings', () => {
    it('parses a JSON object string', () => {
      expect(normalizeDefinition('{"author": ["username"]}')).toEqual({ author: { username: true } });
    });

    it('parses a JSON list string', () => {
      expect(normalizeDefinition('["a", "b"]')).toEqual({ a: true, b: true });
    });

    it('treats an unparseable string as a single field name', () => {
      expect(normalizeDefinition('title')).toEqual({ title: true });
    });

    it('treats malformed JSON as a single field name', () => {
      expect(normalizeDefinition('{bad json')).toEqual({ '{bad json': true });
    });

    it('leaves string values inside a mapping unparsed', () => {
      expect(normalizeDefinition({ author: '["name"]' })).toEqual({ author: '["name"]' });
    });
  });

  // ---------------------------------------------------------------------------
  // Leaves and fallbacks
  // ---------------------------------------------------------------------------
  describe('leaves and fallbacks', () => {
    it('keeps boolean, number, string and null leaves', () => {
      const def = { title: true, body: false, $limit: 5, $orderBy: 'title desc', note: null };
      expect(normalizeDefinition(def)).toEqual(def);
    });

    it('turns functions and undefined leaves into true', () => {
      expect(normalizeDefinition({ fn: () => 1, missing: undefined })).toEqual({ fn: true, missing: true });
    });

    it('wraps a bare number as a single field', () => {
      expect(normalizeDefinition(42)).toEqual({ '42': true });
    });

    it('wraps null as a single field', () => {
      expect(normalizeDefinition(null)).toEqual({ null: true });
    });

    it('keeps empty lists and mappings empty', () => {
      expect(normalizeDefinition([])).toEqual({});
      expect(normalizeDefinition({})).toEqual({});
      expect(normalizeDefinition({ author: [] })).toEqual({ author: {} });
    });

    it('does not mutate the input', () => {
      const def = { author: ['name'] };
      normalizeDefinition(def);
      expect(def).toEqual({ author: ['name'] });
    });
  });

  // ---------------------------------------------------------------------------
  // Idempotence
  // ---------------------------------------------------------------------------
  describe('idempotence', () => {
    const samples: unknown[] = [
      ['title', 'body'],
      { author: ['username', { profile: ['bio'] }], $limit: 3 },
      '{"blocks": {"_text": ["body"], "_image": {"url": true}}}',
      'title',
      7,
      null,
      { nested: { deeper: { deepest: [] } } },
    ];

    for (const sample of samples) {
      it(`normalize(normalize(x)) equals normalize(x) for ${JSON.stringify(sample)}`, () => {
        const once = normalizeDefinition(sample);
        expect(normalizeDefinition(once)).toEqual(once);
      });
    }
  });

  // ---------------------------------------------------------------------------
  // Reserved property names
  // ---------------------------------------------------------------------------
  describe('reserved property names', () => {
    it('keeps __proto__ from a JSON string as a field', () => {
      const node = normalizeDefinition('{"__proto__":{"a":true},"b":true}');
      expect(Object.keys(node)).toEqual(['__proto__', 'b']);
      expect(Object.getPrototypeOf(node)).toBe(Object.prototype);
      expect(Object.getOwnPropertyDescriptor(node, '__proto__')?.value).toEqual({ a: true });
    });

    it('keeps __proto__ from list shorthand as a field', () => {
      const node = normalizeDefinition(['__proto__', 'b']);
      expect(Object.keys(node)).toEqual(['__proto__', 'b']);
      expect(Object.getPrototypeOf(node)).toBe(Object.prototype);
    });
  });
});
