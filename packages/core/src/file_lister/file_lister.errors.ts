import { SpecPulseError } from '../errors';
import { errnoCode, errorMessage } from '../utils/errno';

export type FileListerErrorCode =
  | 'FILE_NOT_FOUND'
  | 'READ_ERROR'
  | 'PERMISSION_DENIED'
  | 'INVALID_PATH';

/**
 * Read-side failure of a FileLister. `filePath` is the project-relative path
 * (or glob pattern) the caller passed in.
 */
export class FileListerError extends SpecPulseError {
  declare readonly code: FileListerErrorCode;

  constructor(message: string, code: FileListerErrorCode, public readonly filePath?: string) {
    super(message, code);
  }

  static notFound(filePath: string): FileListerError {
    return new FileListerError(`File not found: ${filePath}`, 'FILE_NOT_FOUND', filePath);
  }

  static unsafePath(filePath: string, reason: string, label: 'path' | 'pattern' = 'path'): FileListerError {
    return new FileListerError(`Invalid ${label}: ${reason}`, 'INVALID_PATH', filePath);
  }

  /**
   * Maps a system error raised while touching `filePath` onto a lister code.
   */
  static fromSystemError(err: unknown, filePath: string, operation: 'Read' | 'Stat'): FileListerError {
    switch (errnoCode(err)) {
      case 'ENOENT':
        return FileListerError.notFound(filePath);
      case 'EACCES':
      case 'EPERM':
        return new FileListerError(`Permission denied: ${filePath}`, 'PERMISSION_DENIED', filePath);
      default: {
        const message = errorMessage(err);
        return new FileListerError(`${operation} error: ${message}`, 'READ_ERROR', filePath);
      }
    }
  }
}
