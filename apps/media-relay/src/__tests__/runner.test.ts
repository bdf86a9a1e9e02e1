import os from 'os';
import path from 'path';
import fs from 'fs-extra';
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';

vi.mock('../logger', () => ({
  logger: { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() }
}));

import { buildTranscodeArgs, DEFAULT_TRANSCODER, runProcess, transcodeVideo } from '../runner';

const NODE = process.execPath;

describe('buildTranscodeArgs', () => {
  it('produces the fixed ffmpeg argument set', () => {
    expect(buildTranscodeArgs('/in/a.mp4', '/out/b.mp4', DEFAULT_TRANSCODER)).toEqual([
      '-hide_banner',
      '-y',
      '-i', '/in/a.mp4',
      '-c:v', 'libx264',
      '-preset', 'fast',
      '-crf', '28',
      '-maxrate', '2M',
      '-bufsize', '4M',
      '-vf', 'scale=1280:720:force_original_aspect_ratio=decrease:force_divisible_by=2',
      '-pix_fmt', 'yuv420p',
      '-c:a', 'aac',
      '-b:a', '128k',
      '-movflags', '+faststart',
      '/out/b.mp4'
    ]);
  });

  it('doubles fractional and kilobit bitrates for the buffer size', () => {
    const args = buildTranscodeArgs('i', 'o', { ...DEFAULT_TRANSCODER, videoBitrate: '1.5M' });
    expect(args[args.indexOf('-bufsize') + 1]).toBe('3M');
    const kbit = buildTranscodeArgs('i', 'o', { ...DEFAULT_TRANSCODER, videoBitrate: '800k' });
    expect(kbit[kbit.indexOf('-bufsize') + 1]).toBe('1600k');
  });
});

describe('runProcess', () => {
  it('reports completion for exit code 0', async () => {
    const result = await runProcess(NODE, ['-e', 'process.exit(0)'], { timeoutMs: 10000 });
    expect(result.kind).toBe('completed');
  });

  it('returns a failed result instead of throwing on a non-zero exit', async () => {
    const result = await runProcess(NODE, ['-e', 'process.stderr.write("bad input"); process.exit(3)'], {
      timeoutMs: 10000
    });
    expect(result).toMatchObject({ kind: 'failed', reason: 'exit-code', exitCode: 3, stderr: 'bad input' });
  });

  it('tells a binary that cannot start apart from a failed run', async () => {
    const result = await runProcess(path.join(os.tmpdir(), 'no-such-transcoder-binary'), [], { timeoutMs: 10000 });
    expect(result.kind).toBe('launch-error');
    if (result.kind === 'launch-error') {
      expect(result.error.message).toContain('ENOENT');
    }
  });

  it('kills a process that runs past the timeout', async () => {
    const result = await runProcess(NODE, ['-e', 'setTimeout(() => {}, 60000)'], { timeoutMs: 200 });
    expect(result).toMatchObject({ kind: 'failed', reason: 'timeout', signal: 'SIGKILL' });
  });
});

describe('transcodeVideo', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'relay-runner-'));
  });

  afterEach(async () => {
    await fs.remove(dir);
  });

  it('reports a missing input without launching anything', async () => {
    const result = await transcodeVideo(path.join(dir, 'gone.mp4'), path.join(dir, 'out.mp4'), {
      ...DEFAULT_TRANSCODER,
      binary: path.join(dir, 'never-called')
    });
    expect(result).toMatchObject({ kind: 'failed', reason: 'missing-input', exitCode: null });
  });

  it('runs the configured binary with the transcode arguments', async () => {
    const input = path.join(dir, 'in.mp4');
    await fs.writeFile(input, 'frames');
    const result = await transcodeVideo(input, path.join(dir, 'out.mp4'), { ...DEFAULT_TRANSCODER, binary: NODE });
    // node rejects ffmpeg's flags, which is an ordinary failed run
    expect(result).toMatchObject({ kind: 'failed', reason: 'exit-code' });
  });
});
