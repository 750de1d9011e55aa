/**
 * Project Discovery Utilities
 *
 * Filesystem-based utilities for locating the SpecPulse project root.
 * Used at CLI bootstrap to resolve projectRoot before injecting it via DI.
 *
 * NOTE: These functions should only be called at the CLI/bootstrap level.
 * Core modules receive projectRoot via constructor injection.
 */

import * as path from 'path';
import { existsSync } from 'fs';
import { NotInitializedError } from '../errors';

/** Directory that marks an initialized project. */
export const SPECPULSE_DIR = '.specpulse';

/** Environment variable that pins the project root, bypassing the upward search. */
export const PROJECT_ROOT_ENV = 'SPECPULSE_PROJECT_ROOT';

/**
 * Finds the project root by searching upwards for a .specpulse directory.
 * SPECPULSE_PROJECT_ROOT, when set, wins without touching the filesystem.
 *
 * @param startPath - Starting path (default: process.cwd())
 * @returns Path to project root, or null if not found
 */
export function findProjectRoot(startPath: string = process.cwd()): string | null {
  const pinned = process.env[PROJECT_ROOT_ENV];
  if (pinned) {
    return path.resolve(pinned);
  }

  let currentPath = path.resolve(startPath);
  while (true) {
    if (existsSync(path.join(currentPath, SPECPULSE_DIR))) {
      return currentPath;
    }
    const parent = path.dirname(currentPath);
    if (parent === currentPath) {
      return null;
    }
    currentPath = parent;
  }
}

/**
 * Like findProjectRoot, but throws when no project is found.
 *
 * @throws NotInitializedError
 */
export function requireProjectRoot(startPath: string = process.cwd()): string {
  const root = findProjectRoot(startPath);
  if (!root) {
    throw new NotInitializedError(startPath);
  }
  return root;
}

/**
 * Gets the .specpulse directory path from a project root.
 */
export function getSpecpulsePath(projectRoot: string): string {
  return path.join(projectRoot, SPECPULSE_DIR);
}
