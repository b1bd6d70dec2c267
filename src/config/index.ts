import { config } from 'dotenv';

config();

export type RecordSinkKind = 'folder' | 'mongodb';

function readSinkKind(value: string | undefined): RecordSinkKind {
  return value === 'mongodb' ? 'mongodb' : 'folder';
}

export const CONFIG = {
  redis: {
    host: process.env.REDIS_HOST || 'localhost',
    port: parseInt(process.env.REDIS_PORT || '6379', 10),
  },
  mongodb: {
    uri: process.env.MONGODB_URI || 'mongodb://localhost:27017',
    database: process.env.MONGODB_DATABASE || 'listings',
  },
  nodeEnv: process.env.NODE_ENV || 'development',
  queue: {
    name: process.env.PARSE_QUEUE_NAME || 'parse-queue',
    concurrency: parseInt(process.env.PARSE_CONCURRENCY || '4', 10),
  },
  batches: {
    root: process.env.BATCHES_ROOT || 'data/batches',
  },
  output: {
    sink: readSinkKind(process.env.RECORD_SINK),
  },
} as const;
