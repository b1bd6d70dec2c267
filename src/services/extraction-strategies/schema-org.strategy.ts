import type { JsonObject, JsonValue, PartialRecord } from '../../types';
import type { PageDocument } from '../page-document';
import { BaseExtractionStrategy } from './base.strategy';
import { firstMatch, getField, walkObjects } from '../../utils/json-tree';
import {
  isJsonObject,
  readArea,
  readCoordinate,
  readCount,
  readPositiveNumber,
  readPostalCode,
  readText,
  readYear,
} from '../../utils/normalizers';
import { PhotoCollector } from '../../utils/photo-collector';

/**
 * SchemaOrgStrategy
 * Generic fallback over schema.org JSON-LD blocks. Works on any site.
 */
export class SchemaOrgStrategy extends BaseExtractionStrategy {
  readonly name = 'SchemaOrg';

  canHandle(_url: string): boolean {
    return true;
  }

  extract(page: PageDocument): PartialRecord {
    const record = this.createRecord('unknown');
    const photos = new PhotoCollector(this.config.maxPhotos);

    for (const block of page.jsonBlocks(this.config.schemaOrg.scriptSelector)) {
      walkObjects(block, (node) => {
        if (this.isListingNode(node)) {
          this.absorb(node, record, photos);
        }
      });
    }

    record.photoUrls = photos.toArray();
    return record;
  }

  private isListingNode(node: JsonObject): boolean {
    const declared = getField(node, '@type') ?? getField(node, 'type');
    const types = Array.isArray(declared) ? declared : [declared];
    return types.some((type) => {
      if (typeof type !== 'string') return false;
      const lowered = type.toLowerCase();
      return this.config.schemaOrg.listingTypes.some((listingType) => lowered.includes(listingType));
    });
  }

  private absorb(node: JsonObject, record: PartialRecord, photos: PhotoCollector): void {
    const vocabulary = this.config.schemaOrg;

    if (record.listPrice === null) {
      record.listPrice = this.readOfferPrice(getField(node, 'offers')) ?? firstMatch(node, vocabulary.offerPrice, readPositiveNumber);
    }

    const address = getField(node, 'address');
    if (isJsonObject(address)) {
      const target = record.address;
      target.street = target.street ?? readText(getField(address, 'streetAddress'));
      target.city = target.city ?? readText(getField(address, 'addressLocality'));
      target.region = target.region ?? readText(getField(address, 'addressRegion'));
      target.postalCode = target.postalCode ?? readPostalCode(getField(address, 'postalCode'));
    }

    record.bedroomCount = record.bedroomCount ?? firstMatch(node, vocabulary.bedroomCount, readCount);
    record.bathroomCount = record.bathroomCount ?? firstMatch(node, vocabulary.bathroomCount, readCount);
    record.interiorArea = record.interiorArea ?? readArea(getField(node, 'floorSize'));
    record.yearBuilt = record.yearBuilt ?? readYear(getField(node, 'yearBuilt'), this.config.yearBuiltRange);

    const geo = getField(node, 'geo');
    if (isJsonObject(geo) && record.latitude === null && record.longitude === null) {
      const latitude = readCoordinate(getField(geo, 'latitude'), 90);
      const longitude = readCoordinate(getField(geo, 'longitude'), 180);
      if (latitude !== null && longitude !== null) {
        record.latitude = latitude;
        record.longitude = longitude;
      }
    }

    this.collectImages(getField(node, 'image'), photos);
  }

  /**
   * `offers` may be a single Offer or a list of them; the first priced one wins.
   */
  private readOfferPrice(offers: JsonValue | undefined): number | null {
    const candidates = Array.isArray(offers) ? offers : [offers];
    for (const offer of candidates) {
      if (!isJsonObject(offer)) continue;
      const price = firstMatch(offer, this.config.schemaOrg.offerPrice, readPositiveNumber);
      if (price !== null) return price;
    }
    return null;
  }

  private collectImages(image: JsonValue | undefined, photos: PhotoCollector): void {
    const items = Array.isArray(image) ? image : [image];
    for (const item of items) {
      const url = isJsonObject(item)
        ? readText(getField(item, 'url')) ?? readText(getField(item, 'contentUrl'))
        : readText(item);
      if (url) photos.add(url);
    }
  }
}
