import type { AddressFields, CoreSignalField, NumericField, PartialRecord, SourcePlatform } from '../types';

const NUMERIC_FIELDS: readonly NumericField[] = [
  'listPrice',
  'bedroomCount',
  'bathroomCount',
  'interiorArea',
  'yearBuilt',
];

const ADDRESS_FIELDS: ReadonlyArray<keyof AddressFields> = ['street', 'unit', 'city', 'region', 'postalCode'];

export function createEmptyRecord(platform: SourcePlatform): PartialRecord {
  return {
    sourcePlatform: platform,
    externalId: null,
    address: { street: null, unit: null, city: null, region: null, postalCode: null },
    latitude: null,
    longitude: null,
    listPrice: null,
    bedroomCount: null,
    bathroomCount: null,
    interiorArea: null,
    yearBuilt: null,
    photoUrls: [],
  };
}

/**
 * Number of core fields the record has a value for.
 */
export function countCoreSignals(record: PartialRecord, fields: readonly CoreSignalField[]): number {
  return fields.filter((field) => record[field] !== null).length;
}

export function hasAnyCoreSignal(record: PartialRecord, fields: readonly CoreSignalField[]): boolean {
  return countCoreSignals(record, fields) > 0;
}

export function isMissingCoreSignal(record: PartialRecord, fields: readonly CoreSignalField[]): boolean {
  return countCoreSignals(record, fields) < fields.length;
}

/**
 * Fill the target's null fields from the donor. Populated fields are never
 * touched; photos are adopted only when the target has none. The source
 * platform always stays the target's.
 */
export function backfill(target: PartialRecord, donor: PartialRecord): PartialRecord {
  const merged: PartialRecord = {
    ...target,
    address: { ...target.address },
    photoUrls: [...target.photoUrls],
  };

  merged.externalId = target.externalId ?? donor.externalId;

  for (const field of NUMERIC_FIELDS) {
    merged[field] = target[field] ?? donor[field];
  }

  for (const field of ADDRESS_FIELDS) {
    merged.address[field] = target.address[field] ?? donor.address[field];
  }

  // Coordinates travel as a pair
  if (target.latitude === null && target.longitude === null) {
    merged.latitude = donor.latitude;
    merged.longitude = donor.longitude;
  }

  if (merged.photoUrls.length === 0) {
    merged.photoUrls = [...donor.photoUrls];
  }

  return merged;
}
