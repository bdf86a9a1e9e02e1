import os from 'os';
import path from 'path';
import fs from 'fs-extra';
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';

vi.mock('../logger', () => ({
  logger: { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() }
}));

import {
  ConfigError,
  DEFAULT_CONFIG,
  ingestBaseUrl,
  loadConfig,
  parseConfig,
  RelayConfig,
  sourceFolders,
  validateConsumer,
  validateProducer
} from '../config';

function withProducer(root: string, overrides: Partial<RelayConfig['producer']> = {}): RelayConfig {
  return { ...DEFAULT_CONFIG, producer: { ...DEFAULT_CONFIG.producer, rootVideoPath: root, ...overrides } };
}

describe('config', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'relay-config-'));
  });

  afterEach(async () => {
    await fs.remove(dir);
  });

  describe('parseConfig', () => {
    it('fills omitted keys from the defaults, section by section', () => {
      const config = parseConfig({ queue: { capacity: 9 }, consumer: { workers: 3 } });
      expect(config.queue.capacity).toBe(9);
      expect(config.consumer.workers).toBe(3);
      expect(config.consumer.port).toBe(8080);
      expect(config.producer.backoff).toEqual({ initialMs: 1000, maxMs: 30000, jitterMs: 1000, maxRetries: 10 });
    });

    it('rejects an unknown environment tag', () => {
      expect(() => parseConfig({ environment: 'staging' })).toThrow("environment must be either 'local' or 'docker'");
    });

    it('lists every invalid count', () => {
      try {
        parseConfig({ queue: { capacity: 0 }, consumer: { workers: -1 }, producer: { threads: 1.5 } });
        expect.fail('parseConfig should have thrown');
      } catch (err) {
        expect(err).toBeInstanceOf(ConfigError);
        if (err instanceof ConfigError) {
          expect(err.issues).toEqual([
            'queue.capacity: queue.capacity must be a positive number',
            'consumer.workers: consumer.workers must be a positive number',
            'producer.threads: producer.threads must be an integer'
          ]);
        }
      }
    });

    it('rejects a backoff ceiling below the initial delay', () => {
      expect(() => parseConfig({ producer: { backoff: { initialMs: 5000, maxMs: 1000 } } })).toThrow(
        'producer.backoff.maxMs must not be below producer.backoff.initialMs'
      );
    });
  });

  describe('loadConfig', () => {
    it('reads and validates the file', async () => {
      const file = path.join(dir, 'relay.json');
      await fs.writeJson(file, { environment: 'docker', queue: { capacity: 2 } });

      const config = await loadConfig(file);

      expect(config.environment).toBe('docker');
      expect(config.queue.capacity).toBe(2);
    });

    it('writes the defaults when no file exists', async () => {
      const file = path.join(dir, 'nested', 'relay.json');

      const config = await loadConfig(file);

      expect(config).toEqual(DEFAULT_CONFIG);
      expect(await fs.readJson(file)).toEqual(DEFAULT_CONFIG);
    });
  });

  describe('validateConsumer', () => {
    it('bounds workers by the CPU count plus two', () => {
      const config = { ...DEFAULT_CONFIG, consumer: { ...DEFAULT_CONFIG.consumer, workers: 7 } };
      expect(() => validateConsumer(config, 4)).toThrow('consumer.workers must not exceed 6 (available CPU cores + 2)');
      expect(() => validateConsumer(config, 5)).not.toThrow();
    });

    it('requires separate staging and upload directories', () => {
      const config = {
        ...DEFAULT_CONFIG,
        consumer: { ...DEFAULT_CONFIG.consumer, uploadDir: '/data/uploads', stagingDir: '/data/uploads/' }
      };
      expect(() => validateConsumer(config, 8)).toThrow('consumer.stagingDir must differ from consumer.uploadDir');
    });
  });

  describe('validateProducer', () => {
    it('accepts an existing absolute directory', async () => {
      await expect(validateProducer(withProducer(dir, { threads: 3 }), 1)).resolves.toBeUndefined();
    });

    it('bounds threads by three times the CPU count', async () => {
      await expect(validateProducer(withProducer(dir, { threads: 7 }), 2)).rejects.toThrow(
        'producer.threads must not exceed 6 (available CPU cores * 3)'
      );
    });

    it('requires an absolute path', async () => {
      await expect(validateProducer(withProducer('videos'), 4)).rejects.toThrow(
        'producer.rootVideoPath must be an absolute path'
      );
    });

    it('requires the directory to exist', async () => {
      const missing = path.join(dir, 'missing');
      await expect(validateProducer(withProducer(missing), 4)).rejects.toThrow(`Video directory does not exist: ${missing}`);
    });

    it('rejects a file in place of the directory', async () => {
      const file = path.join(dir, 'file.txt');
      await fs.writeFile(file, '');
      await expect(validateProducer(withProducer(file), 4)).rejects.toThrow(`Specified path is not a directory: ${file}`);
    });
  });

  it('picks the ingest host for the environment', () => {
    expect(ingestBaseUrl(DEFAULT_CONFIG)).toBe('http://localhost:8080');
    expect(ingestBaseUrl({ ...DEFAULT_CONFIG, environment: 'docker', hosts: { ...DEFAULT_CONFIG.hosts, docker: 'http://consumer:8080/' } })).toBe(
      'http://consumer:8080'
    );
  });

  it('derives one source folder per producer thread', () => {
    expect(sourceFolders(withProducer('/videos', { threads: 3 }))).toEqual([
      '/videos/folder1',
      '/videos/folder2',
      '/videos/folder3'
    ]);
  });
});
