import crypto from 'crypto';
import express, { NextFunction, Request, Response, Router } from 'express';
import fs from 'fs-extra';
import multer from 'multer';
import path from 'path';
import { Errors } from './apiError';
import { DuplicateDetector } from './dedup';
import { JobStore } from './jobStore';
import { logger } from './logger';
import { resolveAvailableName, toDisplayName, transcodedName, withExtension } from './parser';
import { Job, UploadAccepted } from './types';

export interface IngestOptions {
  store: JobStore;
  detector: DuplicateDetector;
  uploadDir: string;
  stagingDir: string;
  maxUploadBytes: number;
  publishedExtensions: string[];
}

function newJobId(): string {
  return `${Date.now()}-${crypto.randomBytes(4).toString('hex')}`;
}

function stagedFileName(jobId: string, declaredName: string): string {
  const base = declaredName.split(/[\\/]/).pop() || 'upload';
  return `${jobId}__${base}`;
}

async function listPublished(uploadDir: string, extensions: string[]): Promise<string[]> {
  if (!(await fs.pathExists(uploadDir))) return [];
  const wanted = extensions.map((ext) => ext.toLowerCase());
  const names = await fs.readdir(uploadDir);
  const published: string[] = [];
  for (const name of names) {
    if (name.startsWith('.')) continue;
    if (!wanted.includes(path.extname(name).toLowerCase())) continue;
    const stat = await fs.stat(path.join(uploadDir, name));
    if (stat.isFile()) published.push(name);
  }
  return published.sort();
}

export function createIngestRouter(opts: IngestOptions): Router {
  const { store, detector, uploadDir, stagingDir } = opts;
  const router = express.Router();

  // Body stays in memory until admission succeeds: a rejected upload never touches the disk
  const upload = multer({
    storage: multer.memoryStorage(),
    limits: { fileSize: opts.maxUploadBytes, files: 1 }
  });

  const isTaken = async (candidate: string): Promise<boolean> =>
    store.isNameReserved(candidate) || (await fs.pathExists(path.join(uploadDir, candidate)));

  // Cheap early answer before the body is read; admission itself happens in handleUpload
  const rejectWhenSaturated = (_req: Request, res: Response, next: NextFunction) => {
    if (store.isSaturated()) {
      logger.info('⏳ Upload refused before body: queue full', store.snapshot());
      Errors.queueFull(res, { ...store.snapshot() });
      return;
    }
    next();
  };

  const handleUpload = async (req: Request, res: Response): Promise<void> => {
    const file = req.file;
    if (!file) {
      Errors.badRequest(res, 'MISSING_FILE', 'Multipart field "file" is required.');
      return;
    }

    const declaredName = file.originalname;
    const displayName = toDisplayName(declaredName);
    const key = detector.keyOf({ displayName, content: file.buffer });

    const duplicate = (): boolean => {
      if (key === undefined || !detector.has(key)) return false;
      logger.info(`⏭️ Skipping ${declaredName}: already accepted (${detector.strategy})`);
      const body: UploadAccepted = { status: detector.duplicateStatus, name: displayName };
      res.status(200).json(body);
      return true;
    };

    if (duplicate()) return;

    // The reservation is the transcoded name; a fallback publish reuses its stem
    const publishName = transcodedName(displayName);
    let name = await resolveAvailableName(publishName, isTaken);
    // The candidate may have been admitted by another request during the last await
    while (store.isNameReserved(name)) {
      name = await resolveAvailableName(publishName, isTaken);
    }

    // No await from here to tryAdmit: check, reserve and record happen as one step
    if (duplicate()) return;
    if (!store.tryAdmit(name)) {
      logger.info(`⏳ Queue full, rejecting ${declaredName}`, store.snapshot());
      Errors.queueFull(res, { ...store.snapshot() });
      return;
    }
    if (key !== undefined) detector.remember(key);

    const jobId = newJobId();
    const stagedPath = path.join(stagingDir, stagedFileName(jobId, declaredName));
    try {
      await fs.writeFile(stagedPath, file.buffer);
    } catch (err) {
      store.release(name);
      if (key !== undefined) detector.forget(key);
      await fs.remove(stagedPath);
      throw err;
    }

    const job: Job = {
      id: jobId,
      stagedPath,
      displayName: name,
      fallbackName: withExtension(name, path.extname(displayName)),
      originalName: declaredName,
      admittedAt: Date.now()
    };
    store.enqueue(job);
    logger.info(`📥 Queued ${declaredName} as ${name} (job ${jobId})`, store.snapshot());

    const body: UploadAccepted = { status: 'queued', name, jobId };
    res.status(200).json(body);
  };

  router.post('/upload', rejectWhenSaturated, upload.single('file'), (req, res, next) => {
    handleUpload(req, res).catch(next);
  });

  router.get('/list', (_req, res, next) => {
    listPublished(uploadDir, opts.publishedExtensions)
      .then((names) => res.json(names))
      .catch(next);
  });

  router.get('/queue-status', (_req, res) => {
    const { occupancy, capacity } = store.snapshot();
    res.type('text/plain').send(`${occupancy}/${capacity}`);
  });

  router.get('/videos/:name', (req, res, next) => {
    const name = req.params.name;
    listPublished(uploadDir, opts.publishedExtensions)
      .then((names) => {
        if (!names.includes(name)) {
          Errors.notFound(res, 'VIDEO_NOT_FOUND', `No published video named ${name}.`);
          return;
        }
        res.sendFile(name, { root: uploadDir, dotfiles: 'deny' }, (err) => {
          if (err) next(err);
        });
      })
      .catch(next);
  });

  router.get('/health', (_req, res) => {
    res.json({ status: 'ok' });
  });

  return router;
}

// Express recognises error handlers by their four parameters
function errorHandler(err: unknown, _req: Request, res: Response, next: NextFunction): void {
  if (res.headersSent) {
    next(err);
    return;
  }
  if (err instanceof multer.MulterError) {
    if (err.code === 'LIMIT_FILE_SIZE') {
      Errors.tooLarge(res);
    } else {
      Errors.badRequest(res, 'INVALID_UPLOAD', err.message);
    }
    return;
  }
  logger.error(`Request failed: ${err instanceof Error ? err.stack ?? err.message : String(err)}`);
  Errors.internal(res);
}

export function createApp(opts: IngestOptions): express.Express {
  const app = express();
  app.disable('x-powered-by');
  app.use(createIngestRouter(opts));
  app.use(errorHandler);
  return app;
}
