import http, { Server } from 'http';
import fs from 'fs-extra';
import path from 'path';
import { loadConfig, RelayConfig, validateConsumer } from './config';
import { createDuplicateDetector, seedDetector } from './dedup';
import { JobStore } from './jobStore';
import { logger } from './logger';
import { createApp } from './routes';
import { createTranscoder, Transcoder } from './runner';
import { WorkerPool } from './workerPool';

export interface IngestNode {
  server: Server;
  port: number;
  store: JobStore;
  pool: WorkerPool;
  close(): Promise<void>;
}

export interface IngestNodeOverrides {
  transcode?: Transcoder;
}

// Jobs live in memory only, so anything staged by a previous process has no owner
async function clearStaging(stagingDir: string): Promise<void> {
  const leftovers = await fs.readdir(stagingDir);
  if (leftovers.length === 0) return;
  logger.warn(`🧹 Removing ${leftovers.length} orphaned staged files from ${stagingDir}`);
  await fs.emptyDir(stagingDir);
}

function listen(server: Server, port: number): Promise<number> {
  return new Promise((resolve, reject) => {
    server.once('error', reject);
    server.listen(port, () => {
      server.off('error', reject);
      const address = server.address();
      resolve(typeof address === 'object' && address !== null ? address.port : port);
    });
  });
}

function closeServer(server: Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((err) => (err ? reject(err) : resolve()));
  });
}

export async function startIngestNode(config: RelayConfig, overrides: IngestNodeOverrides = {}): Promise<IngestNode> {
  validateConsumer(config);
  const { uploadDir, stagingDir } = config.consumer;

  logger.info(`Media relay ingest node starting (environment: ${config.environment})...`);
  await fs.ensureDir(uploadDir);
  await fs.ensureDir(stagingDir);
  await clearStaging(stagingDir);

  const detector = createDuplicateDetector(config.consumer.dedup);
  await seedDetector(detector, uploadDir);

  const store = new JobStore(config.queue.capacity);
  const pool = new WorkerPool(store, {
    size: config.consumer.workers,
    context: {
      uploadDir: path.resolve(uploadDir),
      stagingDir: path.resolve(stagingDir),
      transcode: overrides.transcode ?? createTranscoder(config.consumer.transcoder)
    }
  });
  pool.start();

  const app = createApp({
    store,
    detector,
    uploadDir: path.resolve(uploadDir),
    stagingDir: path.resolve(stagingDir),
    maxUploadBytes: config.consumer.maxUploadMb * 1024 * 1024,
    publishedExtensions: config.consumer.publishedExtensions
  });
  const server = http.createServer(app);
  const port = await listen(server, config.consumer.port);
  logger.info(`📡 Listening on port ${port} (queue capacity ${store.capacity}, ${pool.size} workers)`);

  return {
    server,
    port,
    store,
    pool,
    async close() {
      await closeServer(server);
      await pool.stop();
      logger.info('Ingest node stopped.');
    }
  };
}

async function main(): Promise<void> {
  const config = await loadConfig();
  const node = await startIngestNode(config);

  const shutdown = (signal: string) => {
    logger.info(`${signal} received, draining workers...`);
    node.close().then(
      () => process.exit(0),
      (err: unknown) => {
        logger.error(`Shutdown failed: ${err instanceof Error ? err.message : String(err)}`);
        process.exit(1);
      }
    );
  };
  process.once('SIGINT', () => shutdown('SIGINT'));
  process.once('SIGTERM', () => shutdown('SIGTERM'));
}

if (require.main === module) {
  main().catch((err: unknown) => {
    logger.error(`❌ Failed to start ingest node: ${err instanceof Error ? err.message : String(err)}`);
    process.exit(1);
  });
}
