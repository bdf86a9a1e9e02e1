import path from 'path';

// \ / : * ? " < > | and any whitespace
const UNSAFE_CHARS = /[\\/:*?"<>|\s]/g;
const PLACEHOLDER = '_';

// Upper bound for _1, _2, ... suffixes before giving up on a name
export const MAX_NAME_SUFFIX = 1000;

// Container the transcoder writes, whatever the upload's own extension
export const TRANSCODED_EXTENSION = '.mp4';

export function sanitizeFileName(fileName: string): string {
  return fileName.replace(UNSAFE_CHARS, PLACEHOLDER);
}

/**
 * Turns a client-declared name (which may carry a path from another OS)
 * into the name used for staging and publishing.
 */
export function toDisplayName(declaredName: string): string {
  // path.basename only splits on '/', uploads from Windows use '\'
  const base = declaredName.split(/[\\/]/).pop() ?? '';
  const sanitized = sanitizeFileName(base);
  if (sanitized.length === 0 || /^\.+$/.test(sanitized)) return 'upload';
  return sanitized;
}

/** clip.mov + .mp4 -> clip.mp4; an empty `ext` strips the extension. */
export function withExtension(fileName: string, ext: string): string {
  const current = path.extname(fileName);
  return `${fileName.slice(0, fileName.length - current.length)}${ext}`;
}

/** Name a transcoded upload is published under. */
export function transcodedName(fileName: string): string {
  return withExtension(fileName, TRANSCODED_EXTENSION);
}

/** video.mp4 -> video_1.mp4; the 0th variant is the name itself. */
export function numberedVariant(fileName: string, n: number): string {
  if (n === 0) return fileName;
  const ext = path.extname(fileName);
  const stem = fileName.slice(0, fileName.length - ext.length);
  return `${stem}_${n}${ext}`;
}

/**
 * First variant of `fileName` for which `isTaken` answers false.
 * The check runs per candidate, so the predicate may be async.
 */
export async function resolveAvailableName(
  fileName: string,
  isTaken: (candidate: string) => boolean | Promise<boolean>,
  startAt = 0
): Promise<string> {
  for (let n = startAt; n <= MAX_NAME_SUFFIX; n++) {
    const candidate = numberedVariant(fileName, n);
    if (!(await isTaken(candidate))) return candidate;
  }
  throw new Error(`No free name for ${fileName} after ${MAX_NAME_SUFFIX} attempts`);
}
