import axios, { AxiosInstance } from 'axios';
import FormData from 'form-data';
import fs from 'fs-extra';
import path from 'path';
import { BackoffOptions, BackoffSchedule, sleep } from './backoff';
import { logger } from './logger';
import { UploadAccepted, UploadStatus } from './types';

export interface UploadClientOptions {
  folder: string;
  baseUrl: string;
  backoff: BackoffOptions;
  /** Backpressure answers tolerated for one file before it is abandoned */
  maxRetries: number;
  readTimeoutMs: number;
  http?: AxiosInstance;
  sleep?: (ms: number) => Promise<void>;
  random?: () => number;
}

export type FileOutcome = 'accepted' | 'duplicate' | 'abandoned' | 'failed';

export interface UploadSummary {
  folder: string;
  accepted: number;
  duplicates: number;
  abandoned: number;
  failed: number;
}

type Attempt =
  | { kind: 'accepted'; body: UploadAccepted }
  | { kind: 'backpressure' }
  | { kind: 'failed'; reason: string };

const UPLOAD_STATUSES: readonly UploadStatus[] = ['queued', 'duplicate', 'exists'];

function isUploadAccepted(data: unknown): data is UploadAccepted {
  if (typeof data !== 'object' || data === null || !('status' in data) || !('name' in data)) return false;
  const status = data.status;
  return UPLOAD_STATUSES.some((s) => s === status) && typeof data.name === 'string';
}

/**
 * Pushes every file of one folder to the ingest service, one at a time.
 * A 503 keeps the client on the same file with a growing delay; anything
 * else that is not a 200 gives up on that file only.
 */
export class UploadClient {
  private readonly http: AxiosInstance;
  private readonly wait: (ms: number) => Promise<void>;
  private readonly schedule: BackoffSchedule;
  private readonly label: string;

  constructor(private readonly opts: UploadClientOptions) {
    this.http = opts.http ?? axios.create();
    this.wait = opts.sleep ?? sleep;
    this.schedule = new BackoffSchedule(opts.backoff, opts.random);
    this.label = path.basename(opts.folder);
    logger.info(`🚀 Upload client initialized for folder: ${opts.folder}`);
  }

  async run(): Promise<UploadSummary> {
    const summary: UploadSummary = { folder: this.opts.folder, accepted: 0, duplicates: 0, abandoned: 0, failed: 0 };
    const files = await this.listFiles();
    if (files.length === 0) {
      logger.info(`📂 [${this.label}] No files to process.`);
      return summary;
    }

    logger.info(`📂 Found ${files.length} files in folder: ${this.label}`);
    for (const file of files) {
      const outcome = await this.uploadFile(file);
      if (outcome === 'accepted') summary.accepted++;
      else if (outcome === 'duplicate') summary.duplicates++;
      else if (outcome === 'abandoned') summary.abandoned++;
      else summary.failed++;
    }
    logger.info(`🏁 [${this.label}] Done`, summary);
    return summary;
  }

  async uploadFile(filePath: string): Promise<FileOutcome> {
    const fileName = path.basename(filePath);
    this.schedule.reset();
    let rejections = 0;
    logger.info(`📤 [${this.label}] Attempting to upload: ${fileName}`);

    for (;;) {
      const attempt = await this.send(filePath);

      if (attempt.kind === 'accepted') {
        if (attempt.body.status === 'queued') {
          logger.info(`✅ Uploaded: ${fileName} (queued as ${attempt.body.name})`);
          return 'accepted';
        }
        logger.info(`⏭️ ${fileName} skipped by server (${attempt.body.status})`);
        return 'duplicate';
      }

      if (attempt.kind === 'failed') {
        logger.error(`❌ Failed to upload ${fileName}: ${attempt.reason}`);
        return 'failed';
      }

      rejections++;
      if (rejections >= this.opts.maxRetries) {
        logger.warn(`❌ Max retries reached for ${fileName}. Skipping file.`);
        return 'abandoned';
      }
      const delay = this.schedule.nextDelay();
      logger.info(`⏳ Queue full for ${fileName}, waiting ${delay}ms before retry ${rejections}/${this.opts.maxRetries - 1}...`);
      await this.wait(delay);
    }
  }

  private async send(filePath: string): Promise<Attempt> {
    const form = new FormData();
    form.append('file', fs.createReadStream(filePath), {
      filename: path.basename(filePath),
      contentType: 'application/octet-stream'
    });

    try {
      const res = await this.http.post<unknown>(`${this.opts.baseUrl}/upload`, form, {
        headers: form.getHeaders(),
        timeout: this.opts.readTimeoutMs,
        maxBodyLength: Infinity,
        maxContentLength: Infinity,
        validateStatus: () => true
      });
      if (res.status === 503) return { kind: 'backpressure' };
      if (res.status !== 200) return { kind: 'failed', reason: `server responded with ${res.status}` };
      if (!isUploadAccepted(res.data)) return { kind: 'failed', reason: 'malformed response body' };
      return { kind: 'accepted', body: res.data };
    } catch (err) {
      return { kind: 'failed', reason: err instanceof Error ? err.message : String(err) };
    }
  }

  private async listFiles(): Promise<string[]> {
    const names = (await fs.readdir(this.opts.folder)).filter((name) => !name.startsWith('.')).sort();
    const files: string[] = [];
    for (const name of names) {
      const filePath = path.join(this.opts.folder, name);
      if ((await fs.stat(filePath)).isFile()) files.push(filePath);
    }
    return files;
  }
}
