import * as path from 'path';

/**
 * Returns a reason string when a project-relative path is unsafe, null otherwise.
 * Shared by the filesystem backends so reads and writes reject the same inputs.
 */
export function unsafePathReason(filePath: string): string | null {
  if (path.isAbsolute(filePath)) {
    return `absolute paths not allowed: ${filePath}`;
  }
  if (filePath.split(/[\\/]/).includes('..')) {
    return `path traversal not allowed: ${filePath}`;
  }
  return null;
}

/**
 * Normalizes a project-relative path to forward slashes without a trailing slash.
 */
export function toPosixPath(filePath: string): string {
  const normalized = path.posix.normalize(filePath.replace(/\\/g, '/'));
  if (normalized === '.' || normalized === './') return '';
  return normalized.replace(/\/+$/, '').replace(/^\.\//, '');
}

/**
 * Joins project-relative path segments with forward slashes.
 */
export function joinPosix(...segments: string[]): string {
  return toPosixPath(path.posix.join(...segments.filter(segment => segment.length > 0)));
}
