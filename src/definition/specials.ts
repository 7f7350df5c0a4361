import type { DefinitionNode, DefinitionValue, Directives } from '../types.js';
import { isDefinitionNode } from './normalize.js';

export const DIRECTIVE_PREFIX = '$';
export const TYPE_SELECTOR_PREFIX = '_';

export interface ExtractedSpecials {
  fields: DefinitionValue;
  directives: Directives;
}

/**
 * Splits directive keys (`$limit`, `$orderBy`, ...) out of a definition node.
 * Directive names lose their prefix; payloads are passed through unchanged.
 * Non-mapping nodes come back as-is with no directives.
 */
export function extractSpecials(
  node: DefinitionValue,
  prefix: string = DIRECTIVE_PREFIX,
): ExtractedSpecials {
  if (!isDefinitionNode(node)) {
    return { fields: node, directives: {} };
  }

  const fields: DefinitionNode = {};
  const directives: Directives = {};
  for (const [key, value] of Object.entries(node)) {
    if (key.startsWith(prefix)) {
      directives[key.slice(prefix.length)] = value;
    } else {
      fields[key] = value;
    }
  }
  return { fields, directives };
}

/**
 * True when every key of a non-empty node carries the type-selector prefix,
 * i.e. the node is a dispatch table keyed by record type.
 */
export function isTypeSelectorTable(
  node: DefinitionValue,
  prefix: string = TYPE_SELECTOR_PREFIX,
): node is DefinitionNode {
  if (!isDefinitionNode(node)) return false;
  const keys = Object.keys(node);
  return keys.length > 0 && keys.every((key) => key.startsWith(prefix));
}
