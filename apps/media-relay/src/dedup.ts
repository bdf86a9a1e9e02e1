import crypto from 'crypto';
import fs from 'fs-extra';
import path from 'path';
import { logger } from './logger';
import { transcodedName } from './parser';
import { DedupStrategy, UploadStatus } from './types';

export interface Submission {
  displayName: string;
  content: Buffer;
}

/**
 * Answers "was this already accepted?" for one keying strategy.
 * `keyOf` must be cheap and synchronous: the endpoint re-checks a key
 * right before admission with no await in between.
 */
export interface DuplicateDetector {
  readonly strategy: DedupStrategy;
  /** Status reported to the client for a duplicate */
  readonly duplicateStatus: Extract<UploadStatus, 'duplicate' | 'exists'>;
  keyOf(submission: Submission): string | undefined;
  has(key: string): boolean;
  remember(key: string): void;
  forget(key: string): void;
  /** Rebuilds the records from what is already published */
  seed(uploadDir: string): Promise<number>;
  readonly size: number;
}

abstract class SetBackedDetector {
  protected readonly keys = new Set<string>();

  has(key: string): boolean {
    return this.keys.has(key);
  }

  remember(key: string): void {
    this.keys.add(key);
  }

  forget(key: string): void {
    this.keys.delete(key);
  }

  get size(): number {
    return this.keys.size;
  }

  protected async publishedFiles(uploadDir: string): Promise<string[]> {
    if (!(await fs.pathExists(uploadDir))) return [];
    const names = await fs.readdir(uploadDir);
    const files: string[] = [];
    for (const name of names) {
      if (name.startsWith('.')) continue;
      const stat = await fs.stat(path.join(uploadDir, name));
      if (stat.isFile()) files.push(name);
    }
    return files;
  }
}

export function sha256(content: Buffer): string {
  return crypto.createHash('sha256').update(content).digest('hex');
}

function hashFile(filePath: string): Promise<string> {
  return new Promise((resolve, reject) => {
    const hash = crypto.createHash('sha256');
    fs.createReadStream(filePath)
      .on('error', reject)
      .on('data', (chunk) => hash.update(chunk))
      .on('end', () => resolve(hash.digest('hex')));
  });
}

/**
 * Keys on the SHA-256 of the uploaded bytes. Seeding hashes what is in the
 * final store, which is transcoder output for every job that did not fall
 * back, so after a restart a resubmitted original only matches files that
 * were published untouched.
 */
export class FingerprintDetector extends SetBackedDetector implements DuplicateDetector {
  readonly strategy = 'fingerprint';
  readonly duplicateStatus = 'duplicate';

  keyOf(submission: Submission): string {
    return sha256(submission.content);
  }

  async seed(uploadDir: string): Promise<number> {
    for (const name of await this.publishedFiles(uploadDir)) {
      this.keys.add(await hashFile(path.join(uploadDir, name)));
    }
    return this.keys.size;
  }
}

/** Keys on the stem: clip.mov and clip.mp4 both publish as clip.mp4. */
export class FileNameDetector extends SetBackedDetector implements DuplicateDetector {
  readonly strategy = 'filename';
  readonly duplicateStatus = 'exists';

  keyOf(submission: Submission): string {
    return transcodedName(submission.displayName);
  }

  async seed(uploadDir: string): Promise<number> {
    for (const name of await this.publishedFiles(uploadDir)) this.keys.add(transcodedName(name));
    return this.keys.size;
  }
}

/** Accepts everything; name collisions still get numbered variants. */
export class NoDuplicateDetector implements DuplicateDetector {
  readonly strategy = 'none';
  readonly duplicateStatus = 'duplicate';
  readonly size = 0;

  keyOf(): undefined {
    return undefined;
  }

  has(): boolean {
    return false;
  }

  remember(): void {}

  forget(): void {}

  async seed(): Promise<number> {
    return 0;
  }
}

export function createDuplicateDetector(strategy: DedupStrategy): DuplicateDetector {
  switch (strategy) {
    case 'fingerprint':
      return new FingerprintDetector();
    case 'filename':
      return new FileNameDetector();
    case 'none':
      return new NoDuplicateDetector();
  }
}

export async function seedDetector(detector: DuplicateDetector, uploadDir: string): Promise<void> {
  const count = await detector.seed(uploadDir);
  logger.info(`🗂️ Dedup (${detector.strategy}) seeded with ${count} published files`);
}
