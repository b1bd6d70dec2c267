export interface PageMetadata {
  requestedUrl: string;
  resolvedUrl: string | null;
  httpStatus: number | null;
  fetchedAt: string | null;
}

export interface RawPage {
  html: string;
  metadata: PageMetadata;
}

export interface BatchContext {
  batchId: string;
  sourceUrl: string;
  scrapedAt: string | null;
}

export interface PageFailure {
  pageIndex: number;
  reason: string;
}

export interface BatchParseSummary {
  batchId: string;
  parsed: number;
  failed: number;
  failures: PageFailure[];
  locations: number;
}

export * from './json.types';
export * from './real-estate.types';
