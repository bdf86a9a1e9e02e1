import { spawn } from 'child_process';
import fs from 'fs-extra';
import { logger } from './logger';
import { TranscodeResult, TranscoderSettings } from './types';

// Tail of stderr kept for diagnostics
const OUTPUT_TAIL_BYTES = 4096;

export const DEFAULT_TRANSCODER: TranscoderSettings = {
  binary: 'ffmpeg',
  videoCodec: 'libx264',
  preset: 'fast',
  crf: 28,
  videoBitrate: '2M',
  audioBitrate: '128k',
  maxWidth: 1280,
  maxHeight: 720,
  timeoutMs: 30 * 60 * 1000
};

interface RunOptions {
  timeoutMs: number;
}

function doubleBitrate(bitrate: string): string {
  const match = /^(\d+(?:\.\d+)?)([kKmM]?)$/.exec(bitrate);
  if (!match) return bitrate;
  return `${Number(match[1]) * 2}${match[2]}`;
}

export function buildTranscodeArgs(inputPath: string, outputPath: string, settings: TranscoderSettings): string[] {
  return [
    '-hide_banner',
    '-y',
    '-i', inputPath,
    '-c:v', settings.videoCodec,
    '-preset', settings.preset,
    '-crf', String(settings.crf),
    '-maxrate', settings.videoBitrate,
    '-bufsize', doubleBitrate(settings.videoBitrate),
    // Scale down to fit, keep aspect ratio, even dimensions for yuv420p
    '-vf', `scale=${settings.maxWidth}:${settings.maxHeight}:force_original_aspect_ratio=decrease:force_divisible_by=2`,
    '-pix_fmt', 'yuv420p',
    '-c:a', 'aac',
    '-b:a', settings.audioBitrate,
    '-movflags', '+faststart',
    outputPath
  ];
}

function appendTail(tail: string, chunk: Buffer): string {
  const next = tail + chunk.toString();
  return next.length > OUTPUT_TAIL_BYTES ? next.slice(next.length - OUTPUT_TAIL_BYTES) : next;
}

/**
 * Runs a child process to completion. Never rejects: a non-zero exit is a
 * `failed` result and a spawn error is a `launch-error` result.
 */
export function runProcess(binary: string, args: string[], opts: RunOptions): Promise<TranscodeResult> {
  return new Promise((resolve) => {
    const startedAt = Date.now();
    let stderr = '';
    let timedOut = false;
    let settled = false;

    const finish = (result: TranscodeResult) => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      resolve(result);
    };

    const child = spawn(binary, args, { stdio: ['ignore', 'pipe', 'pipe'] });

    const timer = setTimeout(() => {
      timedOut = true;
      logger.error(`⏱️ TIMEOUT after ${opts.timeoutMs}ms: killing ${binary}`);
      child.kill('SIGKILL');
    }, opts.timeoutMs);

    child.stdout.on('data', (data: Buffer) => logger.debug(`[TRANSCODE] ${data.toString().trim()}`));
    child.stderr.on('data', (data: Buffer) => {
      stderr = appendTail(stderr, data);
    });

    child.on('error', (error) => {
      logger.error(`❌ Could not launch ${binary}: ${error.message}`);
      finish({ kind: 'launch-error', error });
    });

    child.on('close', (code, signal) => {
      const durationMs = Date.now() - startedAt;
      if (code === 0 && !timedOut) {
        finish({ kind: 'completed', durationMs, stderr });
        return;
      }
      logger.warn(`⚠️ ${binary} exited with code ${code}${signal ? ` (${signal})` : ''}`);
      finish({
        kind: 'failed',
        reason: timedOut ? 'timeout' : 'exit-code',
        exitCode: code,
        signal,
        durationMs,
        stderr
      });
    });
  });
}

export type Transcoder = (inputPath: string, outputPath: string) => Promise<TranscodeResult>;

export async function transcodeVideo(
  inputPath: string,
  outputPath: string,
  settings: TranscoderSettings = DEFAULT_TRANSCODER
): Promise<TranscodeResult> {
  if (!(await fs.pathExists(inputPath))) {
    logger.warn(`Transcode input missing: ${inputPath}`);
    return { kind: 'failed', reason: 'missing-input', exitCode: null, signal: null, durationMs: 0, stderr: '' };
  }
  logger.info(`🎬 Transcoding ${inputPath}`);
  return runProcess(settings.binary, buildTranscodeArgs(inputPath, outputPath, settings), {
    timeoutMs: settings.timeoutMs
  });
}

export function createTranscoder(settings: TranscoderSettings): Transcoder {
  return (inputPath, outputPath) => transcodeVideo(inputPath, outputPath, settings);
}
