export interface Job {
  id: string;
  stagedPath: string;   // absolute path inside the staging dir
  displayName: string;  // reserved .mp4 name the transcoded result is published under
  fallbackName: string; // same stem with the upload's own extension, used when transcoding fails
  originalName: string; // name the client declared
  admittedAt: number;
}

export interface QueueSnapshot {
  occupancy: number;
  capacity: number;
  queued: number;
  inFlight: number;
}

export interface TranscoderSettings {
  binary: string;
  videoCodec: string;
  preset: string;
  crf: number;
  videoBitrate: string;
  audioBitrate: string;
  maxWidth: number;
  maxHeight: number;
  timeoutMs: number;
}

export type TranscodeResult =
  | { kind: 'completed'; durationMs: number; stderr: string }
  | {
      kind: 'failed';
      reason: 'exit-code' | 'timeout' | 'missing-input';
      exitCode: number | null;
      signal: NodeJS.Signals | null;
      durationMs: number;
      stderr: string;
    }
  | { kind: 'launch-error'; error: Error };

export type ProcessStatus = 'transcoded' | 'fallback';

export interface ProcessOutcome {
  status: ProcessStatus;
  publishedPath: string;
  transcode: TranscodeResult;
}

export type DedupStrategy = 'fingerprint' | 'filename' | 'none';

// Body of a 200 answer to POST /upload
export type UploadStatus = 'queued' | 'duplicate' | 'exists';

export interface UploadAccepted {
  status: UploadStatus;
  name: string;
  jobId?: string;
}
