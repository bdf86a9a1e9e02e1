import { AxiosInstance } from 'axios';
import fs from 'fs-extra';
import { ingestBaseUrl, loadConfig, RelayConfig, sourceFolders, validateProducer } from './config';
import { logger } from './logger';
import { waitForIngest } from './readiness';
import { UploadClient, UploadSummary } from './uploadClient';

export interface ProducerOverrides {
  http?: AxiosInstance;
  sleep?: (ms: number) => Promise<void>;
  random?: () => number;
}

async function existingFolders(folders: string[]): Promise<string[]> {
  const found: string[] = [];
  for (const folder of folders) {
    if ((await fs.pathExists(folder)) && (await fs.stat(folder)).isDirectory()) {
      found.push(folder);
    } else {
      logger.warn(`⚠️ Skipping missing folder: ${folder}`);
    }
  }
  return found;
}

/**
 * Waits for the ingest service, then runs one upload client per source
 * folder concurrently until every folder is exhausted.
 */
export async function runProducer(config: RelayConfig, overrides: ProducerOverrides = {}): Promise<UploadSummary[]> {
  await validateProducer(config);
  const baseUrl = ingestBaseUrl(config);
  const { backoff, readiness, readTimeoutMs } = config.producer;

  await waitForIngest(baseUrl, { ...readiness, sleep: overrides.sleep });

  logger.info(`🔼 Starting producer with ${config.producer.threads} threads`);
  logger.info(`📁 Base video folder: ${config.producer.rootVideoPath}`);
  const folders = await existingFolders(sourceFolders(config));

  return Promise.all(
    folders.map((folder) =>
      new UploadClient({
        folder,
        baseUrl,
        backoff: { initialMs: backoff.initialMs, maxMs: backoff.maxMs, jitterMs: backoff.jitterMs },
        maxRetries: backoff.maxRetries,
        readTimeoutMs,
        http: overrides.http,
        sleep: overrides.sleep,
        random: overrides.random
      })
        .run()
        .catch((err: unknown): UploadSummary => {
          logger.error(`❌ Folder ${folder} aborted: ${err instanceof Error ? err.message : String(err)}`);
          return { folder, accepted: 0, duplicates: 0, abandoned: 0, failed: 0 };
        })
    )
  );
}

async function main(): Promise<void> {
  const config = await loadConfig();
  const summaries = await runProducer(config);
  const total = summaries.reduce((sum, s) => sum + s.accepted, 0);
  logger.info(`✅ Producer finished: ${total} files queued across ${summaries.length} folders`);
}

if (require.main === module) {
  main().catch((err: unknown) => {
    logger.error(`❌ Failed to start producer: ${err instanceof Error ? err.message : String(err)}`);
    process.exit(1);
  });
}
