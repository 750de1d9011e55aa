import { spawn } from 'child_process';
import type { ExecCommand, ExecOptions, ExecResult } from '../types';

/**
 * Creates an ExecCommand that spawns processes, defaulting to `defaultCwd`.
 * Spawn failures (e.g. git not installed) resolve with exit code 1 and the
 * error message on stderr.
 */
export function createExecCommand(defaultCwd: string): ExecCommand {
  return (command: string, args: string[], options?: ExecOptions) => {
    return new Promise<ExecResult>((resolve) => {
      const proc = spawn(command, args, {
        cwd: options?.cwd ?? defaultCwd,
        env: { ...process.env, ...options?.env },
      });

      let stdout = '';
      let stderr = '';

      proc.stdout.on('data', (data: Buffer) => { stdout += data.toString(); });
      proc.stderr.on('data', (data: Buffer) => { stderr += data.toString(); });

      proc.on('close', (code: number | null) => {
        resolve({ exitCode: code ?? 1, stdout, stderr });
      });

      proc.on('error', (error: Error) => {
        resolve({ exitCode: 1, stdout, stderr: error.message });
      });
    });
  };
}
