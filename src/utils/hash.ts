import { createHash } from 'crypto';

export function sha1Hex(input: string): string {
  return createHash('sha1').update(input, 'utf8').digest('hex');
}

/**
 * Stable id from the non-empty parts, joined with "|".
 * Empty and missing parts are dropped, so ("redfin", "", "x") === ("redfin", "x").
 */
export function stableId(...parts: Array<string | null | undefined>): string {
  const present = parts.filter((part): part is string => typeof part === 'string' && part.length > 0);
  return sha1Hex(present.join('|'));
}

/**
 * Positional fingerprint: every part keeps its slot, missing parts become "".
 */
export function fingerprint(parts: ReadonlyArray<string | number | null | undefined>): string {
  return sha1Hex(parts.map((part) => (part === null || part === undefined ? '' : String(part))).join('|'));
}
