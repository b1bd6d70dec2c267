import { promises as fs } from 'fs';
import path from 'path';
import {
  BatchNotFoundError,
  FsBatchPageStore,
  PageMetadataError,
  PageNotFoundError,
  PageStoreError,
  sourceUrlOf,
} from '../services/page-store.service';
import { makeBatchesRoot, metaFor, removeDir, savePage } from './batch-fixtures';

describe('FsBatchPageStore', () => {
  let root: string;
  let store: FsBatchPageStore;

  beforeEach(async () => {
    root = await makeBatchesRoot();
    store = new FsBatchPageStore(root);
  });

  afterEach(async () => {
    await removeDir(root);
  });

  it('lists detail pages only, in index order', async () => {
    await savePage(root, 'b1', 1010, { html: '<p>a</p>' });
    await savePage(root, 'b1', 1002, { html: '<p>b</p>' });
    await savePage(root, 'b1', 1, { html: '<p>search</p>' });
    await fs.writeFile(path.join(root, 'b1', 'raw', 'notes.txt'), 'x');

    expect(await store.listPageIndices('b1')).toEqual([1002, 1010]);
  });

  it('loads html and metadata', async () => {
    await savePage(root, 'b1', 1001, {
      html: '<p>home</p>',
      meta: {
        requested_url: 'https://www.redfin.com/home/1',
        final_url: 'https://www.redfin.com/home/1?moved=1',
        status: 200,
        fetched_at: '2026-03-01T12:00:00Z',
      },
    });

    const page = await store.loadPage('b1', 1001);

    expect(page.html).toBe('<p>home</p>');
    expect(page.metadata).toEqual({
      requestedUrl: 'https://www.redfin.com/home/1',
      resolvedUrl: 'https://www.redfin.com/home/1?moved=1',
      httpStatus: 200,
      fetchedAt: '2026-03-01T12:00:00Z',
    });
    expect(sourceUrlOf(page.metadata)).toBe('https://www.redfin.com/home/1?moved=1');
  });

  it('uses the requested URL when there is no final URL', async () => {
    await savePage(root, 'b1', 1001, { html: '', meta: { requested_url: 'https://www.zillow.com/x' } });

    const page = await store.loadPage('b1', 1001);

    expect(page.metadata.resolvedUrl).toBeNull();
    expect(page.metadata.fetchedAt).toBeNull();
    expect(sourceUrlOf(page.metadata)).toBe('https://www.zillow.com/x');
  });

  it('raises typed errors for missing and unreadable files', async () => {
    await savePage(root, 'b1', 1001, { meta: metaFor('https://www.redfin.com/home/1') });
    await savePage(root, 'b1', 1002, { html: '<p></p>', meta: '{not json' });

    await expect(store.loadPage('b1', 1001)).rejects.toBeInstanceOf(PageNotFoundError);
    await expect(store.loadPage('b1', 1002)).rejects.toBeInstanceOf(PageMetadataError);
    await expect(store.listPageIndices('missing')).rejects.toBeInstanceOf(BatchNotFoundError);
    await expect(store.loadPage('b1', 1002)).rejects.toBeInstanceOf(PageStoreError);
  });

  it('picks the most recently modified batch', async () => {
    await fs.mkdir(path.join(root, 'older'));
    await fs.mkdir(path.join(root, 'newer'));
    await fs.utimes(path.join(root, 'older'), new Date('2026-01-01T00:00:00Z'), new Date('2026-01-01T00:00:00Z'));
    await fs.utimes(path.join(root, 'newer'), new Date('2026-02-01T00:00:00Z'), new Date('2026-02-01T00:00:00Z'));

    expect(await store.latestBatchId()).toBe('newer');
  });

  it('fails when there are no batches', async () => {
    await expect(store.latestBatchId()).rejects.toBeInstanceOf(BatchNotFoundError);
  });
});
