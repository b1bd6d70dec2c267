import { Queue, Worker, type ConnectionOptions, type Job } from 'bullmq';
import { CONFIG } from '../config';
import type { DetailParserService } from './detail-parser.service';

export interface ParseJobData {
  batchId: string;
  pageIndex: number;
}

export interface ParseJobResult {
  listingId: string;
  sourcePlatform: string;
  strategiesUsed: string[];
}

export function parseJobId(data: ParseJobData): string {
  return `${data.batchId}-${data.pageIndex}`;
}

/**
 * Job handler, separate from the worker so it can run without Redis.
 */
export function createParseJobProcessor(parser: DetailParserService) {
  return async (job: Pick<Job<ParseJobData>, 'id' | 'data'>): Promise<ParseJobResult> => {
    const { batchId, pageIndex } = job.data;
    const record = await parser.parseOne(batchId, pageIndex);
    return {
      listingId: record.listingId,
      sourcePlatform: record.sourcePlatform,
      strategiesUsed: record.strategiesUsed,
    };
  };
}

export class QueueListenerService {
  private queue: Queue<ParseJobData, ParseJobResult>;
  private worker: Worker<ParseJobData, ParseJobResult> | null = null;
  private readonly connection: ConnectionOptions;

  constructor(private readonly parser: DetailParserService) {
    this.connection = {
      host: CONFIG.redis.host,
      port: CONFIG.redis.port,
    };
    this.queue = new Queue<ParseJobData, ParseJobResult>(CONFIG.queue.name, { connection: this.connection });
  }

  /**
   * Queue one job per page. Job ids are `<batchId>-<pageIndex>`, so a page
   * that is still queued or running is not added twice. Completed jobs are
   * removed, and enqueueing them again parses them again.
   */
  async enqueuePages(batchId: string, pageIndices: number[]): Promise<number> {
    const jobs = pageIndices.map((pageIndex) => {
      const data: ParseJobData = { batchId, pageIndex };
      return {
        name: 'parse-detail',
        data,
        opts: { jobId: parseJobId(data), removeOnComplete: true, removeOnFail: 1000 },
      };
    });

    await this.queue.addBulk(jobs);
    console.log(`✅ Enqueued ${jobs.length} pages of batch ${batchId} on ${CONFIG.queue.name}`);
    return jobs.length;
  }

  async start(): Promise<void> {
    this.worker = new Worker<ParseJobData, ParseJobResult>(CONFIG.queue.name, createParseJobProcessor(this.parser), {
      connection: this.connection,
      concurrency: CONFIG.queue.concurrency,
    });

    this.worker.on('completed', (job, result) => {
      console.log(`Job ${job.id} completed: ${result.listingId} via ${result.strategiesUsed.join(' -> ')}`);
    });

    this.worker.on('failed', (job, error) => {
      console.error(`❌ Job ${job?.id ?? '(unknown)'} failed: ${error.message}`);
    });

    // Locations are written once the queue has nothing left for now
    this.worker.on('drained', () => {
      this.flushPendingLocations().catch((error) => {
        console.error('Failed to flush locations:', error);
      });
    });

    this.worker.on('error', (error) => {
      console.error('Worker error:', error);
    });

    console.log(`Queue listener started for: ${CONFIG.queue.name} (concurrency ${CONFIG.queue.concurrency})`);
  }

  async flushPendingLocations(): Promise<void> {
    for (const batchId of this.parser.pendingBatches()) {
      await this.parser.flushLocations(batchId);
    }
  }

  async getQueueStats(): Promise<void> {
    const [waiting, active, completed, failed] = await Promise.all([
      this.queue.getWaitingCount(),
      this.queue.getActiveCount(),
      this.queue.getCompletedCount(),
      this.queue.getFailedCount(),
    ]);

    console.log('Queue Stats:', { waiting, active, completed, failed });
  }

  async close(): Promise<void> {
    if (this.worker) {
      await this.worker.close();
      await this.flushPendingLocations();
    }
    await this.queue.close();
    console.log('Queue listener closed');
  }
}
