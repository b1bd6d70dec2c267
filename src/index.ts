import { CONFIG } from './config';
import { BatchFolderSink } from './services/batch-folder.sink';
import { DetailParserService } from './services/detail-parser.service';
import { FsBatchPageStore } from './services/page-store.service';
import { QueueListenerService } from './services/queue-listener.service';
import { RealEstateStorageService } from './services/real-estate-storage.service';
import type { RecordSink } from './services/record-sink';
import { parseArgs, type CliArgs } from './utils/cli-args';

interface Runtime {
  store: FsBatchPageStore;
  sink: RecordSink;
  storage: RealEstateStorageService | null;
  parser: DetailParserService;
}

async function createRuntime(): Promise<Runtime> {
  const store = new FsBatchPageStore(CONFIG.batches.root);

  if (CONFIG.output.sink === 'mongodb') {
    const storage = new RealEstateStorageService();
    await storage.connect();
    return { store, sink: storage, storage, parser: new DetailParserService(store, storage) };
  }

  const sink = new BatchFolderSink(CONFIG.batches.root);
  return { store, sink, storage: null, parser: new DetailParserService(store, sink) };
}

async function resolveBatch(store: FsBatchPageStore, args: CliArgs): Promise<string> {
  return args.batch ?? (await store.latestBatchId());
}

async function runParse(runtime: Runtime, args: CliArgs): Promise<void> {
  const batchId = await resolveBatch(runtime.store, args);
  console.log(`Parsing batch ${batchId} -> ${runtime.sink.name}`);

  const summary = await runtime.parser.parseBatch(batchId, { limit: args.limit });
  for (const failure of summary.failures) {
    console.log(`⚠️  ${failure.pageIndex}: ${failure.reason}`);
  }

  if (runtime.storage) {
    const stats = await runtime.storage.getStats();
    if (stats) {
      console.log('Listing stats:', stats);
    }
  }
}

async function runEnqueue(runtime: Runtime, args: CliArgs): Promise<void> {
  const batchId = await resolveBatch(runtime.store, args);
  const indices = await runtime.store.listPageIndices(batchId);
  const selected = args.limit === undefined ? indices : indices.slice(0, args.limit);

  const queueListener = new QueueListenerService(runtime.parser);
  try {
    await queueListener.enqueuePages(batchId, selected);
    await queueListener.getQueueStats();
  } finally {
    await queueListener.close();
  }
}

async function runListen(runtime: Runtime): Promise<void> {
  const queueListener = new QueueListenerService(runtime.parser);
  await queueListener.start();

  const statsTimer = setInterval(() => {
    queueListener.getQueueStats().catch((error) => {
      console.error('Failed to get stats:', error);
    });
  }, 30000);

  const shutdown = (signal: string) => {
    console.log(`${signal} received, shutting down...`);
    clearInterval(statsTimer);
    cleanup(runtime, queueListener)
      .then(() => process.exit(0))
      .catch((error) => {
        console.error('Error during shutdown:', error);
        process.exit(1);
      });
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
}

async function cleanup(runtime: Runtime, queueListener?: QueueListenerService): Promise<void> {
  try {
    if (queueListener) {
      await queueListener.close();
    }
    if (runtime.storage) {
      await runtime.storage.close();
    }
    console.log('Cleanup completed');
  } catch (error) {
    console.error('Error during cleanup:', error);
  }
}

async function main() {
  const args = parseArgs(process.argv.slice(2));

  console.log('Starting listing detail parser...');
  console.log(`Environment: ${CONFIG.nodeEnv}`);
  console.log(`Batches: ${CONFIG.batches.root}`);
  console.log(`Output: ${CONFIG.output.sink}`);

  const runtime = await createRuntime();

  if (args.command === 'listen') {
    console.log(`Redis: ${CONFIG.redis.host}:${CONFIG.redis.port}`);
    await runListen(runtime);
    return;
  }

  try {
    if (args.command === 'enqueue') {
      await runEnqueue(runtime, args);
    } else {
      await runParse(runtime, args);
    }
  } finally {
    await cleanup(runtime);
  }
}

main().catch((error) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
