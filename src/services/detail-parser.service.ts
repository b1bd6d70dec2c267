import type { BatchParseSummary, CanonicalRecord, PageFailure, RawPage } from '../types';
import { sourceUrlOf, type PageStore } from './page-store.service';
import type { RecordSink } from './record-sink';
import { RealEstateExtractorService } from './real-estate-extractor.service';
import { buildCanonicalRecord, buildLocationRecord } from './canonical-record.builder';
import { LocationRegistry } from './location-registry';

export interface ParseBatchOptions {
  limit?: number;
}

/**
 * DetailParserService
 * Page -> canonical record, for one page or a whole batch folder.
 * Locations are collected per batch and written by flushLocations();
 * each flush writes every location the batch has seen so far.
 */
export class DetailParserService {
  private readonly registries = new Map<string, LocationRegistry>();
  private readonly unflushed = new Set<string>();

  constructor(
    private readonly store: PageStore,
    private readonly sink: RecordSink,
    private readonly extractor: RealEstateExtractorService = new RealEstateExtractorService()
  ) {}

  /**
   * Pure transformation of one saved page.
   */
  processPage(page: RawPage, batchId: string): CanonicalRecord {
    const sourceUrl = sourceUrlOf(page.metadata);
    const outcome = this.extractor.extractListing(page.html, sourceUrl);

    return buildCanonicalRecord(
      outcome.record,
      { batchId, sourceUrl, scrapedAt: page.metadata.fetchedAt },
      outcome.strategiesUsed
    );
  }

  async parseOne(batchId: string, pageIndex: number): Promise<CanonicalRecord> {
    const page = await this.store.loadPage(batchId, pageIndex);
    const record = this.processPage(page, batchId);

    await this.sink.saveRecord(record, pageIndex);
    this.registryFor(batchId).register(buildLocationRecord(record));
    this.unflushed.add(batchId);

    return record;
  }

  /**
   * Parse every detail page of the batch in index order. A failing page is
   * logged and recorded in the summary; the rest of the batch still runs.
   */
  async parseBatch(batchId: string, options: ParseBatchOptions = {}): Promise<BatchParseSummary> {
    const indices = await this.store.listPageIndices(batchId);
    const selected = options.limit === undefined ? indices : indices.slice(0, options.limit);

    if (selected.length === 0) {
      console.log(`⚠️  No detail pages found in batch ${batchId}`);
    }

    let parsed = 0;
    const failures: PageFailure[] = [];

    for (const pageIndex of selected) {
      try {
        await this.parseOne(batchId, pageIndex);
        parsed++;
      } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        console.error(`❌ Failed to parse page ${pageIndex} of batch ${batchId}:`, error);
        failures.push({ pageIndex, reason });
      }
    }

    const locations = await this.flushLocations(batchId);

    console.log(`✅ Batch ${batchId}: ${parsed} parsed, ${failures.length} failed, ${locations} locations`);

    return { batchId, parsed, failed: failures.length, failures, locations };
  }

  /**
   * Write the batch's collected locations to the sink. Returns how many were
   * written. Pages registered while the sink is writing stay pending.
   */
  async flushLocations(batchId: string): Promise<number> {
    const registry = this.registries.get(batchId);
    if (!registry) return 0;

    const locations = registry.toArray();
    this.unflushed.delete(batchId);
    try {
      await this.sink.saveLocations(batchId, locations);
    } catch (error) {
      this.unflushed.add(batchId);
      throw error;
    }
    return locations.length;
  }

  /**
   * Batches with locations not yet written to the sink.
   */
  pendingBatches(): string[] {
    return [...this.unflushed];
  }

  private registryFor(batchId: string): LocationRegistry {
    let registry = this.registries.get(batchId);
    if (!registry) {
      registry = new LocationRegistry();
      this.registries.set(batchId, registry);
    }
    return registry;
  }
}
