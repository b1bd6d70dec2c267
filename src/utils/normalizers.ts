import type { JsonObject, JsonValue } from '../types/json.types';

/**
 * Parse a loosely formatted number ("$450,000", "3.5 baths", "2,400 sq ft").
 * Strings keep only digits and the decimal point; sign is discarded.
 * Returns null for anything that does not parse.
 */
export function parseNumber(raw: unknown): number | null {
  if (typeof raw === 'number') {
    return Number.isFinite(raw) && raw >= 0 ? raw : null;
  }
  if (typeof raw !== 'string') return null;

  const cleaned = raw.replace(/[^\d.]/g, '');
  if (cleaned === '') return null;

  const value = Number(cleaned);
  return Number.isFinite(value) ? value : null;
}

/**
 * parseNumber, truncated toward zero.
 */
export function parseInteger(raw: unknown): number | null {
  const value = parseNumber(raw);
  return value === null ? null : Math.trunc(value);
}

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * `{ value: 1500, unitCode: "FTK" }` -> 1500. Anything else is returned as-is.
 */
export function unwrapQuantity(value: JsonValue | undefined): JsonValue | undefined {
  if (isJsonObject(value) && Object.prototype.hasOwnProperty.call(value, 'value')) {
    return value.value;
  }
  return value;
}

export function readText(value: JsonValue | undefined): string | null {
  if (typeof value !== 'string') return null;
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : null;
}

export function readPostalCode(value: JsonValue | undefined): string | null {
  if (typeof value === 'number' && Number.isInteger(value) && value >= 0) {
    return String(value);
  }
  return readText(value);
}

/**
 * Source-native ids are purely numeric; anything else in an id-like key is ignored.
 */
export function readExternalId(value: JsonValue | undefined): string | null {
  if (typeof value === 'number') {
    return Number.isSafeInteger(value) && value >= 0 ? String(value) : null;
  }
  if (typeof value === 'string' && /^\d+$/.test(value.trim())) {
    return value.trim();
  }
  return null;
}

export function isPlausibleYear(year: number, range: { min: number; max: number }): boolean {
  return Number.isInteger(year) && year >= range.min && year <= range.max;
}

export function readYear(value: JsonValue | undefined, range: { min: number; max: number }): number | null {
  let year: number | null = null;
  if (typeof value === 'number' && Number.isFinite(value)) {
    year = Math.trunc(value);
  } else if (typeof value === 'string' && /^\d{4}$/.test(value.trim())) {
    year = Number(value.trim());
  }
  return year !== null && isPlausibleYear(year, range) ? year : null;
}

/**
 * Coordinates keep their sign, so they bypass parseNumber.
 */
export function readCoordinate(value: JsonValue | undefined, limit: 90 | 180): number | null {
  let coordinate: number | null = null;
  if (typeof value === 'number') {
    coordinate = value;
  } else if (typeof value === 'string' && /^\s*-?\d+(\.\d+)?\s*$/.test(value)) {
    coordinate = Number(value);
  }
  if (coordinate === null || !Number.isFinite(coordinate) || Math.abs(coordinate) > limit) {
    return null;
  }
  return coordinate;
}

export function readPositiveNumber(value: JsonValue | undefined): number | null {
  const parsed = parseNumber(unwrapQuantity(value));
  return parsed !== null && parsed > 0 ? parsed : null;
}

export function readCount(value: JsonValue | undefined): number | null {
  return parseNumber(unwrapQuantity(value));
}

export function readArea(value: JsonValue | undefined): number | null {
  const parsed = parseInteger(unwrapQuantity(value));
  return parsed !== null && parsed > 0 ? parsed : null;
}

export function roundTo(value: number, decimals: number): number {
  const factor = Math.pow(10, decimals);
  return Math.round(value * factor) / factor;
}
