import type { ExtractionConfig } from '../../config/extraction.config';
import type { PartialRecord, SourcePlatform } from '../../types';
import type { PageDocument } from '../page-document';
import { createEmptyRecord } from '../record-merge';
import { parseInteger, parseNumber } from '../../utils/normalizers';

export interface ExtractionStrategy {
  readonly name: string;
  canHandle(url: string): boolean;
  extract(page: PageDocument): PartialRecord;
}

/**
 * BaseExtractionStrategy
 * Shared helpers for all listing extraction strategies
 */
export abstract class BaseExtractionStrategy implements ExtractionStrategy {
  abstract readonly name: string;

  constructor(protected readonly config: ExtractionConfig) {}

  abstract canHandle(url: string): boolean;

  abstract extract(page: PageDocument): PartialRecord;

  protected createRecord(platform: SourcePlatform): PartialRecord {
    return createEmptyRecord(platform);
  }

  /**
   * First capture group of the pattern, parsed as a number.
   */
  protected matchNumber(text: string, pattern: RegExp): number | null {
    const match = pattern.exec(text);
    return match ? parseNumber(match[1]) : null;
  }

  protected matchInteger(text: string, pattern: RegExp): number | null {
    const match = pattern.exec(text);
    return match ? parseInteger(match[1]) : null;
  }

  /**
   * Case-insensitive substring match of the URL against any of the patterns.
   */
  protected urlMatches(url: string, patterns: readonly string[]): boolean {
    const lowered = url.toLowerCase();
    return patterns.some((pattern) => lowered.includes(pattern.toLowerCase()));
  }
}
