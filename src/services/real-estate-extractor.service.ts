import { createExtractionConfig, type ExtractionConfig } from '../config/extraction.config';
import type { ExtractionOutcome, PartialRecord, SourcePlatform } from '../types';
import type { ExtractionStrategy } from './extraction-strategies/base.strategy';
import { RedfinStrategy } from './extraction-strategies/redfin.strategy';
import { ZillowStrategy } from './extraction-strategies/zillow.strategy';
import { SchemaOrgStrategy } from './extraction-strategies/schema-org.strategy';
import { TextPatternStrategy } from './extraction-strategies/text-pattern.strategy';
import { PageDocument } from './page-document';
import { backfill, countCoreSignals, createEmptyRecord, hasAnyCoreSignal, isMissingCoreSignal } from './record-merge';

interface PlatformStrategy {
  platform: Exclude<SourcePlatform, 'unknown'>;
  strategy: ExtractionStrategy;
}

/**
 * RealEstateExtractorService
 * Stateless service that turns one detail page into a merged PartialRecord:
 * classify the source, run its structured strategy, then back-fill from the
 * schema.org and text fallbacks when the result is thin.
 */
export class RealEstateExtractorService {
  private readonly platformStrategies: PlatformStrategy[] = [];
  private readonly genericFallback: ExtractionStrategy;
  private readonly textFallback: ExtractionStrategy;

  constructor(private readonly config: ExtractionConfig = createExtractionConfig()) {
    // Registration order is the tie-break order for unclassified pages
    this.registerStrategy('redfin', new RedfinStrategy(config));
    this.registerStrategy('zillow', new ZillowStrategy(config));

    this.genericFallback = new SchemaOrgStrategy(config);
    this.textFallback = new TextPatternStrategy(config);
  }

  registerStrategy(platform: PlatformStrategy['platform'], strategy: ExtractionStrategy): void {
    this.platformStrategies.push({ platform, strategy });
  }

  /**
   * Which platform a URL belongs to, by case-insensitive substring match.
   */
  classify(url: string): SourcePlatform {
    const match = this.platformStrategies.find(({ strategy }) => strategy.canHandle(url));
    return match ? match.platform : 'unknown';
  }

  extractListing(html: string, url: string): ExtractionOutcome {
    const page = new PageDocument(html, url);
    const classifiedAs = this.classify(url);
    const strategiesUsed: string[] = [];
    const coreFields = this.config.coreSignalFields;

    let record =
      classifiedAs === 'unknown'
        ? this.extractUnclassified(page, strategiesUsed)
        : this.extractWith(this.strategyFor(classifiedAs), page, strategiesUsed);

    if (!hasAnyCoreSignal(record, coreFields)) {
      record = backfill(record, this.extractWith(this.genericFallback, page, strategiesUsed));
    }

    if (isMissingCoreSignal(record, coreFields)) {
      record = backfill(record, this.extractWith(this.textFallback, page, strategiesUsed));
    }

    return { record, classifiedAs, strategiesUsed };
  }

  getRegisteredStrategies(): string[] {
    return [
      ...this.platformStrategies.map(({ strategy }) => strategy.name),
      this.genericFallback.name,
      this.textFallback.name,
    ];
  }

  /**
   * Run every platform strategy and keep the richest result; earlier
   * registrations win ties, including a tie at zero.
   */
  private extractUnclassified(page: PageDocument, strategiesUsed: string[]): PartialRecord {
    const coreFields = this.config.coreSignalFields;
    let best: PartialRecord | null = null;
    let bestScore = -1;

    for (const { strategy } of this.platformStrategies) {
      const candidate = this.extractWith(strategy, page, strategiesUsed);
      const score = countCoreSignals(candidate, coreFields);
      if (score > bestScore) {
        best = candidate;
        bestScore = score;
      }
    }

    return best ?? createEmptyRecord('unknown');
  }

  private extractWith(strategy: ExtractionStrategy, page: PageDocument, strategiesUsed: string[]): PartialRecord {
    strategiesUsed.push(strategy.name);
    return strategy.extract(page);
  }

  private strategyFor(platform: PlatformStrategy['platform']): ExtractionStrategy {
    const match = this.platformStrategies.find((entry) => entry.platform === platform);
    if (!match) {
      throw new Error(`No extraction strategy registered for platform: ${platform}`);
    }
    return match.strategy;
  }
}
