/**
 * Ordered YAML reads
 *
 * Plain objects list integer-like keys first, so reports that follow
 * file order walk the parsed document's mapping nodes for key order.
 */

import YAML, { Document, isMap, isScalar } from "yaml";

export function parseDocument(content: string): Document.Parsed {
  const doc = YAML.parseDocument(content);
  if (doc.errors.length > 0) {
    throw doc.errors[0];
  }
  return doc;
}

/**
 * Keys and value nodes of a mapping, in file order. Keys are stringified
 * the same way `toJS()` stringifies object keys.
 */
export function mappingEntries(node: unknown): Array<[string, unknown]> {
  if (!isMap(node)) {
    return [];
  }
  return node.items.map((pair) => {
    const key = isScalar(pair.key) ? pair.key.value : pair.key;
    return [key === null || key === undefined ? "" : String(key), pair.value];
  });
}

/** Value node stored under `key` in a mapping, if any. */
export function mappingValue(node: unknown, key: string): unknown {
  return mappingEntries(node).find(([name]) => name === key)?.[1];
}
