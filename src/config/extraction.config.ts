import type { CoreSignalField } from '../types/real-estate.types';

/**
 * Candidate key names per field for one source's embedded JSON.
 * Order matters: the first alias that parses wins.
 */
export interface AliasTable {
  externalId: readonly string[];
  street: readonly string[];
  unit: readonly string[];
  city: readonly string[];
  region: readonly string[];
  postalCode: readonly string[];
  latitude: readonly string[];
  longitude: readonly string[];
  listPrice: readonly string[];
  bedroomCount: readonly string[];
  bathroomCount: readonly string[];
  interiorArea: readonly string[];
  yearBuilt: readonly string[];
  photoCollections: readonly string[];
  photoUrl: readonly string[];
}

export interface PlatformProfile {
  urlPatterns: readonly string[];
  scriptSelectors: readonly string[];
  nestedJsonKeys: readonly string[];
  aliases: AliasTable;
}

export interface SchemaOrgVocabulary {
  scriptSelector: string;
  listingTypes: readonly string[];
  offerPrice: readonly string[];
  bedroomCount: readonly string[];
  bathroomCount: readonly string[];
}

export interface TextPatterns {
  price: RegExp;
  bedroomCount: RegExp;
  bathroomCount: RegExp;
  interiorArea: RegExp;
  yearBuilt: RegExp;
  labelledPrice: RegExp;
}

export interface ExtractionConfig {
  platforms: {
    redfin: PlatformProfile;
    zillow: PlatformProfile;
  };
  schemaOrg: SchemaOrgVocabulary;
  patterns: TextPatterns;
  coreSignalFields: readonly CoreSignalField[];
  maxPhotos: number;
  yearBuiltRange: { min: number; max: number };
}

function deepFreeze<T extends object>(value: T): Readonly<T> {
  for (const key of Object.keys(value)) {
    const nested: unknown = Reflect.get(value, key);
    if (nested !== null && typeof nested === 'object' && !(nested instanceof RegExp) && !Object.isFrozen(nested)) {
      deepFreeze(nested);
    }
  }
  return Object.freeze(value);
}

/**
 * Build the extraction constants once at startup.
 * `now` only fixes the upper bound of the plausible year-built range.
 */
export function createExtractionConfig(now: Date = new Date()): ExtractionConfig {
  return deepFreeze<ExtractionConfig>({
    platforms: {
      redfin: {
        urlPatterns: ['redfin.com'],
        scriptSelectors: ['script#__NEXT_DATA__'],
        nestedJsonKeys: [],
        aliases: {
          externalId: ['propertyId', 'propertyIdStr', 'id'],
          street: ['streetLine', 'streetAddress'],
          unit: ['unitNumber', 'unit'],
          city: ['city'],
          region: ['state', 'stateCode'],
          postalCode: ['zip', 'postalCode'],
          latitude: ['latitude'],
          longitude: ['longitude'],
          listPrice: ['price', 'listPrice'],
          bedroomCount: ['beds'],
          bathroomCount: ['baths', 'bathsTotal'],
          interiorArea: ['squareFeet', 'sqFt', 'livingArea', 'livingAreaSqFt', 'aboveGradeFinishedArea'],
          yearBuilt: ['yearBuilt'],
          photoCollections: ['photos'],
          photoUrl: ['url', 'href', 'src'],
        },
      },
      zillow: {
        urlPatterns: ['zillow.com'],
        scriptSelectors: [
          'script[data-zrr-shared-data-key]',
          'script#hdpApolloPreloadedData',
          'script#__NEXT_DATA__',
        ],
        nestedJsonKeys: ['apiCache', 'gdpClientCache'],
        aliases: {
          externalId: ['zpid', 'zillowId', 'propertyId'],
          street: ['streetAddress'],
          unit: ['unitNumber', 'unit'],
          city: ['city'],
          region: ['state'],
          postalCode: ['zipcode', 'postalCode'],
          latitude: ['latitude'],
          longitude: ['longitude'],
          listPrice: ['price', 'listPrice', 'priceForHDP'],
          bedroomCount: ['bedrooms', 'beds'],
          bathroomCount: ['bathrooms', 'baths'],
          interiorArea: ['livingArea', 'livingAreaValue', 'area', 'finishedSqFt', 'finishedArea'],
          yearBuilt: ['yearBuilt'],
          photoCollections: ['photos', 'media', 'photoGallery', 'hiResImageLink'],
          photoUrl: ['url', 'href', 'rawUrl', 'hiRes'],
        },
      },
    },
    schemaOrg: {
      scriptSelector: 'script[type="application/ld+json"]',
      listingTypes: ['residence', 'singlefamily', 'house', 'apartment', 'offer', 'realestatelisting'],
      offerPrice: ['price', 'lowPrice', 'highPrice'],
      bedroomCount: ['numberOfBedrooms', 'numberOfRooms', 'bedrooms'],
      bathroomCount: ['numberOfBathroomsTotal', 'bathroomCount', 'bathrooms'],
    },
    patterns: {
      price: /\$\s*([\d,]+)/,
      bedroomCount: /(\d+(?:\.\d+)?)\s*beds?/i,
      bathroomCount: /(\d+(?:\.\d+)?)\s*baths?/i,
      interiorArea: /([\d,.]+)\s*(?:sq\s*ft|sqft)/i,
      yearBuilt: /year\s*built[:\s]*([12]\d{3})/i,
      labelledPrice: /Price[:\s]*\$?\s*([\d,.]+)/i,
    },
    coreSignalFields: ['listPrice', 'bedroomCount', 'bathroomCount', 'interiorArea'],
    maxPhotos: 50,
    yearBuiltRange: { min: 1700, max: now.getUTCFullYear() },
  });
}
