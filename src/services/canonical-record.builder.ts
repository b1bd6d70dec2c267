import type { BatchContext, CanonicalRecord, LocationRecord, MediaItem, PartialRecord } from '../types';
import { fingerprint, stableId } from '../utils/hash';
import { normalizeLocality, normalizeStreet, normalizeUnit } from '../utils/address';
import { roundTo } from '../utils/normalizers';

export const MAX_MEDIA_ITEMS = 50;

/**
 * Listing id from the platform and its own id, or the source URL when the
 * page gave no external id. The URL form changes when the listing moves.
 */
export function deriveListingId(platform: string, externalId: string | null, sourceUrl: string): string {
  const externalKey = externalId?.trim() ?? '';
  return stableId(platform.trim().toLowerCase() || 'unknown', externalKey || sourceUrl.trim());
}

/**
 * Positional hash of the normalized address and coordinates.
 */
export function deriveLocationId(record: Pick<PartialRecord, 'address' | 'latitude' | 'longitude'>): string {
  const { street, unit, city, region, postalCode } = record.address;
  return fingerprint([
    street === null ? null : normalizeStreet(street),
    unit === null ? null : normalizeUnit(unit),
    city === null ? null : normalizeLocality(city),
    region === null ? null : normalizeLocality(region),
    postalCode === null ? null : postalCode.trim(),
    record.latitude,
    record.longitude,
  ]);
}

export function derivePricePerArea(listPrice: number | null, interiorArea: number | null): number | null {
  if (listPrice === null || interiorArea === null || listPrice <= 0 || interiorArea <= 0) {
    return null;
  }
  return roundTo(listPrice / interiorArea, 2);
}

export function buildMedia(photoUrls: readonly string[]): MediaItem[] {
  return photoUrls.slice(0, MAX_MEDIA_ITEMS).map((url, index) => ({
    url,
    displayOrder: index,
    isPrimary: index === 0,
    mediaType: 'image' as const,
  }));
}

/**
 * Pure function of its inputs: the same merged record and context always
 * produce the same canonical record.
 */
export function buildCanonicalRecord(
  record: PartialRecord,
  context: BatchContext,
  strategiesUsed: readonly string[]
): CanonicalRecord {
  const listingId = deriveListingId(record.sourcePlatform, record.externalId, context.sourceUrl);
  const photoUrls = record.photoUrls.slice(0, MAX_MEDIA_ITEMS);

  return {
    listingId,
    propertyId: listingId,
    locationId: deriveLocationId(record),

    batchId: context.batchId,
    sourcePlatform: record.sourcePlatform,
    sourceUrl: context.sourceUrl,
    externalId: record.externalId,
    scrapedAt: context.scrapedAt,

    address: { ...record.address },
    latitude: record.latitude,
    longitude: record.longitude,

    listPrice: record.listPrice,
    bedroomCount: record.bedroomCount,
    bathroomCount: record.bathroomCount,
    interiorArea: record.interiorArea,
    yearBuilt: record.yearBuilt,
    pricePerArea: derivePricePerArea(record.listPrice, record.interiorArea),

    photoUrls,
    media: buildMedia(photoUrls),

    strategiesUsed: [...strategiesUsed],
  };
}

export function buildLocationRecord(record: CanonicalRecord): LocationRecord {
  return {
    locationId: record.locationId,
    ...record.address,
    latitude: record.latitude,
    longitude: record.longitude,
  };
}
