import type { AliasTable, PlatformProfile } from '../../config/extraction.config';
import type { JsonObject, JsonValue, PartialRecord, SourcePlatform } from '../../types';
import type { PageDocument } from '../page-document';
import { BaseExtractionStrategy } from './base.strategy';
import { firstMatch, getField, hasKey, walkObjects } from '../../utils/json-tree';
import {
  isJsonObject,
  readArea,
  readCoordinate,
  readCount,
  readExternalId,
  readPositiveNumber,
  readPostalCode,
  readText,
  readYear,
} from '../../utils/normalizers';
import { PhotoCollector } from '../../utils/photo-collector';

function readPhotoUrl(value: JsonValue | undefined): string | null {
  const url = readText(value);
  return url && /^(https?:)?\/\//i.test(url) ? url : null;
}

/**
 * EmbeddedJsonStrategy
 * Walks a platform's embedded JSON payloads and fills each field from the
 * first alias that parses. Fields found earlier in the walk are never replaced.
 */
export abstract class EmbeddedJsonStrategy extends BaseExtractionStrategy {
  protected abstract readonly platform: Exclude<SourcePlatform, 'unknown'>;

  /** Also scan visible text for a labelled price when the walk found none. */
  protected readonly recoversPriceFromText: boolean = false;

  protected get profile(): PlatformProfile {
    return this.config.platforms[this.platform];
  }

  canHandle(url: string): boolean {
    return this.urlMatches(url, this.profile.urlPatterns);
  }

  extract(page: PageDocument): PartialRecord {
    const record = this.createRecord(this.platform);
    const photos = new PhotoCollector(this.config.maxPhotos);

    for (const payload of this.loadPayloads(page)) {
      walkObjects(payload, (node) => {
        this.absorb(node, record, photos);
      });
    }

    record.photoUrls = photos.toArray();
    this.recoverFromText(page, record);

    return record;
  }

  /**
   * Embedded JSON payloads for this platform, in document order.
   */
  protected loadPayloads(page: PageDocument): JsonValue[] {
    return this.profile.scriptSelectors.flatMap((selector) => page.jsonBlocks(selector));
  }

  private absorb(node: JsonObject, record: PartialRecord, photos: PhotoCollector): void {
    const aliases = this.profile.aliases;

    if (record.externalId === null) {
      record.externalId = firstMatch(node, aliases.externalId, readExternalId);
    }

    if (this.isAddressBearing(node, aliases)) {
      const address = record.address;
      address.street = address.street ?? firstMatch(node, aliases.street, readText);
      address.unit = address.unit ?? firstMatch(node, aliases.unit, readPostalCode);
      address.city = address.city ?? firstMatch(node, aliases.city, readText);
      address.region = address.region ?? firstMatch(node, aliases.region, readText);
      address.postalCode = address.postalCode ?? firstMatch(node, aliases.postalCode, readPostalCode);
    }

    if (record.latitude === null && record.longitude === null) {
      const latitude = firstMatch(node, aliases.latitude, (value) => readCoordinate(value, 90));
      const longitude = firstMatch(node, aliases.longitude, (value) => readCoordinate(value, 180));
      if (latitude !== null && longitude !== null) {
        record.latitude = latitude;
        record.longitude = longitude;
      }
    }

    record.listPrice = record.listPrice ?? firstMatch(node, aliases.listPrice, readPositiveNumber);
    record.bedroomCount = record.bedroomCount ?? firstMatch(node, aliases.bedroomCount, readCount);
    record.bathroomCount = record.bathroomCount ?? firstMatch(node, aliases.bathroomCount, readCount);
    record.interiorArea = record.interiorArea ?? firstMatch(node, aliases.interiorArea, readArea);
    record.yearBuilt =
      record.yearBuilt ?? firstMatch(node, aliases.yearBuilt, (value) => readYear(value, this.config.yearBuiltRange));

    if (!photos.isFull()) {
      this.collectPhotos(node, aliases, photos);
    }
  }

  private isAddressBearing(node: JsonObject, aliases: AliasTable): boolean {
    return [...aliases.street, ...aliases.city, ...aliases.postalCode].some((key) => hasKey(node, key));
  }

  private collectPhotos(node: JsonObject, aliases: AliasTable, photos: PhotoCollector): void {
    for (const key of aliases.photoCollections) {
      const value = getField(node, key);

      if (Array.isArray(value)) {
        for (const item of value) {
          const url = isJsonObject(item) ? firstMatch(item, aliases.photoUrl, readPhotoUrl) : readPhotoUrl(item);
          if (url) photos.add(url);
        }
      } else {
        const url = readPhotoUrl(value);
        if (url) photos.add(url);
      }
    }
  }

  private recoverFromText(page: PageDocument, record: PartialRecord): void {
    const { patterns } = this.config;
    if (record.interiorArea !== null && (record.listPrice !== null || !this.recoversPriceFromText)) {
      return;
    }

    const text = page.visibleText;

    if (record.interiorArea === null) {
      const area = this.matchInteger(text, patterns.interiorArea);
      record.interiorArea = area !== null && area > 0 ? area : null;
    }

    if (record.listPrice === null && this.recoversPriceFromText) {
      const price = this.matchNumber(text, patterns.labelledPrice);
      record.listPrice = price !== null && price > 0 ? price : null;
    }
  }
}
