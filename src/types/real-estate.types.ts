/**
 * Real Estate Listing Types
 */

export type SourcePlatform = 'redfin' | 'zillow' | 'unknown';

export interface AddressFields {
  street: string | null;
  unit: string | null;
  city: string | null;
  region: string | null; // State / province
  postalCode: string | null;
}

/**
 * Fields recovered from one page by one extraction strategy.
 * Anything the strategy could not read with confidence stays null.
 */
export interface PartialRecord {
  sourcePlatform: SourcePlatform;
  externalId: string | null;

  address: AddressFields;
  latitude: number | null;
  longitude: number | null;

  listPrice: number | null;
  bedroomCount: number | null;
  bathroomCount: number | null; // May be fractional (2.5)
  interiorArea: number | null; // Integer, square feet
  yearBuilt: number | null;

  photoUrls: string[];
}

export type NumericField = 'listPrice' | 'bedroomCount' | 'bathroomCount' | 'interiorArea' | 'yearBuilt';

export type CoreSignalField = 'listPrice' | 'bedroomCount' | 'bathroomCount' | 'interiorArea';

export interface MediaItem {
  url: string;
  displayOrder: number;
  isPrimary: boolean;
  mediaType: 'image';
}

export interface CanonicalRecord {
  // Identifiers
  listingId: string;
  propertyId: string;
  locationId: string;

  // Source information
  batchId: string;
  sourcePlatform: SourcePlatform;
  sourceUrl: string;
  externalId: string | null;
  scrapedAt: string | null;

  // Location
  address: AddressFields;
  latitude: number | null;
  longitude: number | null;

  // Property details
  listPrice: number | null;
  bedroomCount: number | null;
  bathroomCount: number | null;
  interiorArea: number | null;
  yearBuilt: number | null;
  pricePerArea: number | null;

  // Media
  photoUrls: string[];
  media: MediaItem[];

  strategiesUsed: string[];
}

export interface LocationRecord {
  locationId: string;
  street: string | null;
  unit: string | null;
  city: string | null;
  region: string | null;
  postalCode: string | null;
  latitude: number | null;
  longitude: number | null;
}

export interface ExtractionOutcome {
  record: PartialRecord;
  classifiedAs: SourcePlatform;
  strategiesUsed: string[];
}
