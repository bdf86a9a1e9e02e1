import fs from 'fs-extra';
import os from 'os';
import path from 'path';
import { z } from 'zod';
import { logger } from './logger';
import { DEFAULT_TRANSCODER } from './runner';

export const DEFAULT_CONFIG_PATH = path.resolve('config', 'media-relay.json');

export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid configuration:\n  - ${issues.join('\n  - ')}`);
    this.name = 'ConfigError';
  }
}

const positiveInt = (field: string) =>
  z.number({ invalid_type_error: `${field} must be a number` }).int(`${field} must be an integer`).positive(`${field} must be a positive number`);

const transcoderSchema = z.object({
  binary: z.string().min(1),
  videoCodec: z.string().min(1),
  preset: z.string().min(1),
  crf: z.number().int().min(0).max(51),
  videoBitrate: z.string().regex(/^\d+(\.\d+)?[kKmM]?$/, 'videoBitrate must look like 2M or 800k'),
  audioBitrate: z.string().regex(/^\d+(\.\d+)?[kKmM]?$/, 'audioBitrate must look like 128k'),
  maxWidth: positiveInt('transcoder.maxWidth'),
  maxHeight: positiveInt('transcoder.maxHeight'),
  timeoutMs: positiveInt('transcoder.timeoutMs')
});

const configSchema = z.object({
  environment: z.enum(['local', 'docker'], {
    errorMap: () => ({ message: "environment must be either 'local' or 'docker'" })
  }),
  hosts: z.object({
    local: z.string().url(),
    docker: z.string().url()
  }),
  queue: z.object({
    capacity: positiveInt('queue.capacity')
  }),
  consumer: z.object({
    port: z.number().int().min(0).max(65535),
    workers: positiveInt('consumer.workers'),
    uploadDir: z.string().min(1),
    stagingDir: z.string().min(1),
    dedup: z.enum(['fingerprint', 'filename', 'none']),
    maxUploadMb: positiveInt('consumer.maxUploadMb'),
    publishedExtensions: z.array(z.string().regex(/^\.[^.]+$/, 'extensions look like .mp4')).min(1),
    transcoder: transcoderSchema
  }),
  producer: z.object({
    threads: positiveInt('producer.threads'),
    rootVideoPath: z.string().min(1, 'producer.rootVideoPath must be set'),
    folderPrefix: z.string().min(1),
    readTimeoutMs: positiveInt('producer.readTimeoutMs'),
    backoff: z.object({
      initialMs: positiveInt('producer.backoff.initialMs'),
      maxMs: positiveInt('producer.backoff.maxMs'),
      jitterMs: z.number().int().min(0),
      maxRetries: positiveInt('producer.backoff.maxRetries')
    }),
    readiness: z.object({
      retries: positiveInt('producer.readiness.retries'),
      intervalMs: positiveInt('producer.readiness.intervalMs'),
      timeoutMs: positiveInt('producer.readiness.timeoutMs')
    })
  })
});

export type RelayConfig = z.infer<typeof configSchema>;

export const DEFAULT_CONFIG: RelayConfig = {
  environment: 'local',
  hosts: {
    local: 'http://localhost:8080',
    docker: 'http://consumer:8080'
  },
  queue: { capacity: 4 },
  consumer: {
    port: 8080,
    workers: 2,
    uploadDir: '/app/uploads',
    stagingDir: '/app/staging',
    dedup: 'fingerprint',
    maxUploadMb: 1024,
    publishedExtensions: ['.mp4'],
    transcoder: DEFAULT_TRANSCODER
  },
  producer: {
    threads: 2,
    rootVideoPath: '/app/videos',
    folderPrefix: 'folder',
    readTimeoutMs: 60000,
    backoff: { initialMs: 1000, maxMs: 30000, jitterMs: 1000, maxRetries: 10 },
    readiness: { retries: 10, intervalMs: 5000, timeoutMs: 5000 }
  }
};

type Section = Record<string, unknown>;

function isSection(value: unknown): value is Section {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// File values win; nested sections are merged key by key
function mergeDeep(base: Section, override: Section): Section {
  const out: Section = { ...base };
  for (const [key, value] of Object.entries(override)) {
    const current = out[key];
    out[key] = isSection(current) && isSection(value) ? mergeDeep(current, value) : value;
  }
  return out;
}

export function parseConfig(raw: unknown): RelayConfig {
  const merged = mergeDeep(DEFAULT_CONFIG, isSection(raw) ? raw : {});
  const parsed = configSchema.safeParse(merged);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`));
  }
  const config = parsed.data;
  if (config.producer.backoff.maxMs < config.producer.backoff.initialMs) {
    throw new ConfigError(['producer.backoff.maxMs must not be below producer.backoff.initialMs']);
  }
  return config;
}

export async function loadConfig(configPath = process.env.MEDIA_RELAY_CONFIG || DEFAULT_CONFIG_PATH): Promise<RelayConfig> {
  if (await fs.pathExists(configPath)) {
    const content: unknown = await fs.readJson(configPath);
    const config = parseConfig(content);
    logger.info('Config loaded from file.', { path: configPath, environment: config.environment });
    return config;
  }
  logger.warn(`No config found at ${configPath}. Creating default.`);
  await fs.outputJson(configPath, DEFAULT_CONFIG, { spaces: 2 });
  return DEFAULT_CONFIG;
}

export function validateConsumer(config: RelayConfig, cpuCount = os.cpus().length): void {
  const issues: string[] = [];
  const maxWorkers = cpuCount + 2;
  if (config.consumer.workers > maxWorkers) {
    issues.push(`consumer.workers must not exceed ${maxWorkers} (available CPU cores + 2)`);
  }
  if (path.resolve(config.consumer.uploadDir) === path.resolve(config.consumer.stagingDir)) {
    issues.push('consumer.stagingDir must differ from consumer.uploadDir');
  }
  if (issues.length > 0) throw new ConfigError(issues);
}

export async function validateProducer(config: RelayConfig, cpuCount = os.cpus().length): Promise<void> {
  const issues: string[] = [];
  const maxThreads = cpuCount * 3;
  if (config.producer.threads > maxThreads) {
    issues.push(`producer.threads must not exceed ${maxThreads} (available CPU cores * 3)`);
  }

  const basePath = config.producer.rootVideoPath;
  if (!path.isAbsolute(basePath)) {
    issues.push('producer.rootVideoPath must be an absolute path');
  } else if (!(await fs.pathExists(basePath))) {
    issues.push(`Video directory does not exist: ${basePath}`);
  } else if (!(await fs.stat(basePath)).isDirectory()) {
    issues.push(`Specified path is not a directory: ${basePath}`);
  }
  if (issues.length > 0) throw new ConfigError(issues);
}

export function ingestBaseUrl(config: RelayConfig): string {
  return config.hosts[config.environment].replace(/\/$/, '');
}

/** <root>/<prefix>1 … <root>/<prefix>N, one per producer thread */
export function sourceFolders(config: RelayConfig): string[] {
  const { rootVideoPath, folderPrefix, threads } = config.producer;
  return Array.from({ length: threads }, (_, i) => path.join(rootVideoPath, `${folderPrefix}${i + 1}`));
}
