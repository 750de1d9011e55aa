import { SpecPulseError } from '../errors';
import { errnoCode, errorMessage } from '../utils/errno';

export type FileWriterErrorCode =
  | 'INVALID_PATH'
  | 'WRITE_ERROR'
  | 'PERMISSION_DENIED';

/**
 * Raised when a write fails for a reason other than the target already
 * existing; losing a reservation race is reported as `false`, never thrown.
 */
export class FileWriterError extends SpecPulseError {
  declare readonly code: FileWriterErrorCode;

  constructor(message: string, code: FileWriterErrorCode, public readonly filePath?: string) {
    super(message, code);
  }

  static unsafePath(filePath: string, reason: string): FileWriterError {
    return new FileWriterError(`Invalid path: ${reason}`, 'INVALID_PATH', filePath);
  }

  static fromSystemError(err: unknown, filePath: string): FileWriterError {
    const code = errnoCode(err);
    if (code === 'EACCES' || code === 'EPERM') {
      return new FileWriterError(`Permission denied: ${filePath}`, 'PERMISSION_DENIED', filePath);
    }
    const message = errorMessage(err);
    return new FileWriterError(`Write error: ${message}`, 'WRITE_ERROR', filePath);
  }
}
