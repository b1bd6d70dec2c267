import type { JsonObject, JsonValue } from '../types/json.types';
import { isJsonObject } from './normalizers';

/**
 * Parse a JSON block, returning null instead of throwing.
 */
export function tryParseJson(text: string): JsonValue | null {
  const trimmed = text.trim();
  if (!trimmed) return null;
  try {
    const parsed: JsonValue = JSON.parse(trimmed);
    return parsed;
  } catch {
    return null;
  }
}

export function hasKey(node: JsonObject, key: string): boolean {
  return Object.prototype.hasOwnProperty.call(node, key);
}

export function getField(node: JsonObject, key: string): JsonValue | undefined {
  return hasKey(node, key) ? node[key] : undefined;
}

/**
 * Return the first alias whose value the reader accepts.
 */
export function firstMatch<T>(
  node: JsonObject,
  aliases: readonly string[],
  read: (value: JsonValue | undefined) => T | null
): T | null {
  for (const alias of aliases) {
    if (!hasKey(node, alias)) continue;
    const value = read(node[alias]);
    if (value !== null) return value;
  }
  return null;
}

/**
 * Pre-order walk over every object in the tree, in document order.
 * Uses an explicit stack so deeply nested payloads cannot overflow the call stack.
 */
export function walkObjects(root: JsonValue, visit: (node: JsonObject) => void): void {
  const stack: JsonValue[] = [root];

  while (stack.length > 0) {
    const current = stack.pop();
    if (current === undefined) break;

    let children: JsonValue[] = [];
    if (Array.isArray(current)) {
      children = current;
    } else if (isJsonObject(current)) {
      visit(current);
      children = Object.values(current);
    }

    for (let i = children.length - 1; i >= 0; i--) {
      const child = children[i];
      if (child !== null && typeof child === 'object') {
        stack.push(child);
      }
    }
  }
}
