import fs from 'fs-extra';
import path from 'path';
import { logger } from './logger';
import { MAX_NAME_SUFFIX, numberedVariant, sanitizeFileName, transcodedName } from './parser';
import { Transcoder } from './runner';
import { Job, ProcessOutcome } from './types';

export interface ProcessorContext {
  stagingDir: string;
  uploadDir: string;
  transcode: Transcoder;
}

function isDestExistsError(err: unknown): boolean {
  // fs-extra reports a taken destination with this message when overwrite is off
  return err instanceof Error && err.message === 'dest already exists.';
}

/**
 * Moves an artifact into `dir` under `fileName` or its first free numbered
 * variant. fs-extra renames when both paths are on one filesystem and falls
 * back to copy-then-delete on EXDEV; during that copy a reader of `dir` can
 * observe a partially written file.
 */
export async function moveArtifact(src: string, dir: string, fileName: string): Promise<string> {
  for (let n = 0; n <= MAX_NAME_SUFFIX; n++) {
    const target = path.join(dir, numberedVariant(fileName, n));
    if (await fs.pathExists(target)) continue;
    try {
      await fs.move(src, target, { overwrite: false });
      return target;
    } catch (err) {
      // Someone published the same name between the check and the move
      if (isDestExistsError(err)) continue;
      throw err;
    }
  }
  throw new Error(`No free name for ${fileName} in ${dir}`);
}

async function removeQuietly(paths: string[]): Promise<void> {
  for (const p of paths) {
    try {
      await fs.remove(p);
    } catch (err) {
      logger.warn(`Cleanup failed for ${p}: ${err instanceof Error ? err.message : String(err)}`);
    }
  }
}

/**
 * Sanitize → transcode → publish for one staged upload. Temp files created
 * for the job are gone when this returns or throws.
 */
export async function processVideoFile(job: Job, ctx: ProcessorContext): Promise<ProcessOutcome> {
  const stagedName = path.basename(job.stagedPath);
  const sanitizedPath = path.join(path.dirname(job.stagedPath), sanitizeFileName(stagedName));
  const outputPath = path.join(ctx.stagingDir, `compressed_${Date.now()}_${transcodedName(path.basename(sanitizedPath))}`);
  const tempPaths = [job.stagedPath, sanitizedPath, outputPath];

  logger.info(`⚙️ Processing ${job.originalName} as ${job.displayName} (job ${job.id})`);

  try {
    if (sanitizedPath !== job.stagedPath) {
      await fs.rename(job.stagedPath, sanitizedPath);
    }

    const transcode = await ctx.transcode(sanitizedPath, outputPath);

    if (transcode.kind === 'completed') {
      const publishedPath = await moveArtifact(outputPath, ctx.uploadDir, job.displayName);
      await fs.remove(sanitizedPath);
      logger.info(`✅ Published ${path.basename(publishedPath)} (transcoded in ${transcode.durationMs}ms)`);
      return { status: 'transcoded', publishedPath, transcode };
    }

    if (transcode.kind === 'launch-error') {
      logger.error(`❌ Transcoder could not start for job ${job.id}: ${transcode.error.message}`);
    } else {
      logger.warn(`⚠️ Transcode failed for job ${job.id} (${transcode.reason}), publishing original`);
    }
    await fs.remove(outputPath);
    const publishedPath = await moveArtifact(sanitizedPath, ctx.uploadDir, job.fallbackName);
    logger.info(`📦 Published original as ${path.basename(publishedPath)}`);
    return { status: 'fallback', publishedPath, transcode };
  } catch (err) {
    await removeQuietly(tempPaths);
    throw err;
  }
}
