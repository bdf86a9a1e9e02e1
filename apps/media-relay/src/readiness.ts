import axios from 'axios';
import { sleep } from './backoff';
import { logger } from './logger';

export interface ReadinessOptions {
  retries: number;
  intervalMs: number;
  timeoutMs: number;
  sleep?: (ms: number) => Promise<void>;
}

export class IngestUnavailableError extends Error {
  constructor(readonly url: string, readonly attempts: number) {
    super(`Ingest service at ${url} not ready after ${attempts} attempts`);
    this.name = 'IngestUnavailableError';
  }
}

async function isReady(url: string, timeoutMs: number): Promise<boolean> {
  try {
    const res = await axios.get(url, { timeout: timeoutMs, validateStatus: () => true });
    return res.status === 200;
  } catch (err) {
    logger.debug(`Readiness probe failed: ${err instanceof Error ? err.message : String(err)}`);
    return false;
  }
}

/** Polls `<baseUrl>/list` until it answers 200 or the retries run out. */
export async function waitForIngest(baseUrl: string, opts: ReadinessOptions): Promise<void> {
  const url = `${baseUrl}/list`;
  const wait = opts.sleep ?? sleep;
  logger.info(`⏳ Waiting for ingest service at ${url}...`);

  for (let attempt = 1; attempt <= opts.retries; attempt++) {
    if (await isReady(url, opts.timeoutMs)) {
      logger.info('✅ Ingest service is ready!');
      return;
    }
    logger.info(`⏳ Waiting for ingest service... (attempt ${attempt}/${opts.retries})`);
    if (attempt < opts.retries) await wait(opts.intervalMs);
  }
  throw new IngestUnavailableError(url, opts.retries);
}
