import type { PartialRecord } from '../../types';
import type { PageDocument } from '../page-document';
import { BaseExtractionStrategy } from './base.strategy';
import { isPlausibleYear } from '../../utils/normalizers';

/**
 * TextPatternStrategy
 * Last resort: independent regex scans over the page's visible text.
 */
export class TextPatternStrategy extends BaseExtractionStrategy {
  readonly name = 'TextPattern';

  canHandle(_url: string): boolean {
    return true;
  }

  extract(page: PageDocument): PartialRecord {
    const record = this.createRecord('unknown');
    const { patterns } = this.config;
    const text = page.visibleText;

    if (!text) return record;

    const price = this.matchNumber(text, patterns.price);
    record.listPrice = price !== null && price > 0 ? price : null;
    record.bedroomCount = this.matchNumber(text, patterns.bedroomCount);
    record.bathroomCount = this.matchNumber(text, patterns.bathroomCount);

    const area = this.matchInteger(text, patterns.interiorArea);
    record.interiorArea = area !== null && area > 0 ? area : null;

    const year = this.matchInteger(text, patterns.yearBuilt);
    record.yearBuilt = year !== null && isPlausibleYear(year, this.config.yearBuiltRange) ? year : null;

    return record;
  }
}
