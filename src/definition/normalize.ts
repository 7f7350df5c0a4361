import type { DefinitionNode, DefinitionValue, RawDefinition } from '../types.js';

export function isDefinitionNode(value: unknown): value is DefinitionNode {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Assigns an own, enumerable property. Plain assignment of `__proto__`
 * would replace the prototype instead.
 */
export function setField<T>(target: { [key: string]: T }, key: string, value: T): void {
  Object.defineProperty(target, key, { value, enumerable: true, writable: true, configurable: true });
}

function isMapping(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * JSON first; a string that does not parse names a single field.
 */
function parseDefinitionString(raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch {
    return { [raw]: true };
  }
}

function normalizeValue(value: unknown): DefinitionValue {
  if (
    typeof value === 'boolean' ||
    typeof value === 'number' ||
    typeof value === 'string' ||
    value === null
  ) {
    return value;
  }
  if (Array.isArray(value) || isMapping(value)) {
    return normalizeDefinition(value);
  }
  // Functions, symbols, bigint, undefined
  return true;
}

/**
 * Rewrites list shorthand into mapping shorthand. Mappings inside the list
 * are merged in place, so `['title', { author: ['name'] }]` reads as
 * `{ title: true, author: { name: true } }`.
 */
function listToNode(list: readonly unknown[]): DefinitionNode {
  const node: DefinitionNode = {};
  for (const item of list) {
    if (isMapping(item) || Array.isArray(item)) {
      for (const [key, value] of Object.entries(normalizeDefinition(item))) {
        setField(node, key, value);
      }
    } else {
      setField(node, String(item), true);
    }
  }
  return node;
}

/**
 * Converts any accepted definition shorthand into the canonical mapping form.
 *
 * Total: every input produces a definition, nothing is rejected.
 *
 * @example
 * normalizeDefinition(['title', 'body'])
 * // → { title: true, body: true }
 *
 * normalizeDefinition('{"author": ["username"]}')
 * // → { author: { username: true } }
 *
 * normalizeDefinition('title')
 * // → { title: true }
 */
export function normalizeDefinition(raw: RawDefinition): DefinitionNode {
  const input = typeof raw === 'string' ? parseDefinitionString(raw) : raw;

  if (Array.isArray(input)) {
    return listToNode(input);
  }

  if (!isMapping(input)) {
    return { [String(input)]: true };
  }

  const node: DefinitionNode = {};
  for (const [key, value] of Object.entries(input)) {
    setField(node, key, normalizeValue(value));
  }
  return node;
}
