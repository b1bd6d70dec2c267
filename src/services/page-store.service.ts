import { promises as fs } from 'fs';
import path from 'path';
import type { PageMetadata, RawPage } from '../types';
import { isJsonObject } from '../utils/normalizers';

export const DETAIL_PAGE_PATTERN = /^(1\d{3})_raw\.html$/;

export class PageStoreError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'PageStoreError';
  }
}

export class BatchNotFoundError extends PageStoreError {
  constructor(readonly batchId: string, readonly batchPath: string) {
    super(`Batch not found: ${batchId} (${batchPath})`);
    this.name = 'BatchNotFoundError';
  }
}

export class PageNotFoundError extends PageStoreError {
  constructor(readonly batchId: string, readonly pageIndex: number, readonly filePath: string) {
    super(`Page ${pageIndex} of batch ${batchId} not found: ${filePath}`);
    this.name = 'PageNotFoundError';
  }
}

export class PageMetadataError extends PageStoreError {
  constructor(readonly batchId: string, readonly pageIndex: number, readonly filePath: string, reason: string) {
    super(`Unreadable metadata for page ${pageIndex} of batch ${batchId}: ${reason}`);
    this.name = 'PageMetadataError';
  }
}

export interface PageStore {
  listPageIndices(batchId: string): Promise<number[]>;
  loadPage(batchId: string, pageIndex: number): Promise<RawPage>;
  latestBatchId(): Promise<string>;
}

export function pageFileStem(pageIndex: number): string {
  return String(pageIndex).padStart(4, '0');
}

function isMissingFile(error: unknown): boolean {
  // fs errors are not always instances of this realm's Error
  return typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';
}

function optionalString(value: unknown): string | null {
  return typeof value === 'string' && value.trim() ? value.trim() : null;
}

/**
 * FsBatchPageStore
 * Reads pages saved by the fetcher:
 * <root>/<batchId>/raw/<NNNN>_raw.html + <NNNN>_meta.json
 * Detail pages are numbered from 1001; search pages (0001-0999) are not listed.
 */
export class FsBatchPageStore implements PageStore {
  constructor(private readonly root: string) {}

  batchPath(batchId: string): string {
    return path.join(this.root, batchId);
  }

  rawDir(batchId: string): string {
    return path.join(this.batchPath(batchId), 'raw');
  }

  async listPageIndices(batchId: string): Promise<number[]> {
    let entries: string[];
    try {
      entries = await fs.readdir(this.rawDir(batchId));
    } catch (error) {
      if (isMissingFile(error)) {
        throw new BatchNotFoundError(batchId, this.batchPath(batchId));
      }
      throw error;
    }

    return entries
      .map((entry) => DETAIL_PAGE_PATTERN.exec(entry))
      .filter((match): match is RegExpExecArray => match !== null)
      .map((match) => Number(match[1]))
      .sort((a, b) => a - b);
  }

  async loadPage(batchId: string, pageIndex: number): Promise<RawPage> {
    const stem = pageFileStem(pageIndex);
    const htmlPath = path.join(this.rawDir(batchId), `${stem}_raw.html`);
    const metaPath = path.join(this.rawDir(batchId), `${stem}_meta.json`);

    const [html, metaText] = await Promise.all([
      this.readRequired(batchId, pageIndex, htmlPath),
      this.readRequired(batchId, pageIndex, metaPath),
    ]);

    return { html, metadata: this.parseMetadata(batchId, pageIndex, metaPath, metaText) };
  }

  /**
   * Most recently modified batch folder under the root.
   */
  async latestBatchId(): Promise<string> {
    let entries: string[];
    try {
      entries = await fs.readdir(this.root);
    } catch (error) {
      if (isMissingFile(error)) {
        throw new BatchNotFoundError('(latest)', this.root);
      }
      throw error;
    }

    let latest: { name: string; mtimeMs: number } | null = null;
    for (const name of entries) {
      const stats = await fs.stat(path.join(this.root, name));
      if (!stats.isDirectory()) continue;
      if (latest === null || stats.mtimeMs > latest.mtimeMs) {
        latest = { name, mtimeMs: stats.mtimeMs };
      }
    }

    if (latest === null) {
      throw new BatchNotFoundError('(latest)', this.root);
    }
    return latest.name;
  }

  private async readRequired(batchId: string, pageIndex: number, filePath: string): Promise<string> {
    try {
      return await fs.readFile(filePath, 'utf-8');
    } catch (error) {
      if (isMissingFile(error)) {
        throw new PageNotFoundError(batchId, pageIndex, filePath);
      }
      throw error;
    }
  }

  private parseMetadata(batchId: string, pageIndex: number, filePath: string, text: string): PageMetadata {
    let parsed: unknown;
    try {
      parsed = JSON.parse(text);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new PageMetadataError(batchId, pageIndex, filePath, reason);
    }

    if (!isJsonObject(parsed)) {
      throw new PageMetadataError(batchId, pageIndex, filePath, 'expected a JSON object');
    }

    const requestedUrl = optionalString(parsed.requested_url);
    const resolvedUrl = optionalString(parsed.final_url);
    if (requestedUrl === null && resolvedUrl === null) {
      throw new PageMetadataError(batchId, pageIndex, filePath, 'no requested_url or final_url');
    }

    return {
      requestedUrl: requestedUrl ?? resolvedUrl ?? '',
      resolvedUrl,
      httpStatus: typeof parsed.status === 'number' ? parsed.status : null,
      fetchedAt: optionalString(parsed.fetched_at),
    };
  }
}

export function sourceUrlOf(metadata: PageMetadata): string {
  return metadata.resolvedUrl ?? metadata.requestedUrl;
}
