/**
 * Street-line normalization used when fingerprinting locations.
 */

const ABBREVIATIONS: ReadonlyArray<[RegExp, string]> = [
  [/\bstreet\b/g, 'st'],
  [/\bavenue\b/g, 'ave'],
  [/\bboulevard\b/g, 'blvd'],
  [/\bdrive\b/g, 'dr'],
  [/\broad\b/g, 'rd'],
  [/\bplace\b/g, 'pl'],
  [/\blane\b/g, 'ln'],
  [/\bcourt\b/g, 'ct'],
  [/\beast\b/g, 'e'],
  [/\bwest\b/g, 'w'],
  [/\bnorth\b/g, 'n'],
  [/\bsouth\b/g, 's'],
];

/**
 * Lowercase, abbreviate common street words, collapse whitespace and drop
 * trailing punctuation. The unit is kept in its own field, so a trailing
 * "apt 4b" / "unit 2" / "#3" designation is removed here.
 */
export function normalizeStreet(input: string): string {
  let street = input.toLowerCase().trim();

  street = street.replace(/\s*(\b(apt|apartment|unit|suite|ste)\b\.?|#)\s*[\w-]*$/, '');

  for (const [pattern, replacement] of ABBREVIATIONS) {
    street = street.replace(pattern, replacement);
  }

  street = street.replace(/\s+/g, ' ').trim();
  street = street.replace(/[.,]+$/, '').trim();

  return street;
}

export function normalizeUnit(input: string): string {
  return input
    .toLowerCase()
    .replace(/^(apt|apartment|unit|suite|ste)\b\.?\s*/, '')
    .replace(/^#\s*/, '')
    .replace(/\s+/g, ' ')
    .trim();
}

export function normalizeLocality(input: string): string {
  return input.toLowerCase().replace(/\s+/g, ' ').trim();
}
