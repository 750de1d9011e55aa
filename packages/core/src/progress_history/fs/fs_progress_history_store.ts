import { randomBytes } from 'crypto';
import { promises as fs } from 'fs';
import * as path from 'path';
import { createLogger } from '../../logger';
import { errnoCode } from '../../utils/errno';
import { isProgressSample } from '../progress_history';
import type { ProgressSample } from '../../progress_calculator';
import type { ProgressHistoryFile, ProgressHistoryStore } from '../progress_history.types';

const logger = createLogger('[ProgressHistory] ');

export const HISTORY_FILE_NAME = 'progress-history.json';

/**
 * Filesystem-based ProgressHistoryStore: one JSON file for every feature.
 *
 * A missing or unreadable file counts as empty history; history only feeds
 * the ETA and must never fail a status query.
 */
export class FsProgressHistoryStore implements ProgressHistoryStore {
  private readonly filePath: string;

  /**
   * @param memoryDir - absolute path of the project's memory directory
   */
  constructor(memoryDir: string) {
    this.filePath = path.join(memoryDir, HISTORY_FILE_NAME);
  }

  async load(featureKey: string): Promise<ProgressSample[]> {
    const file = await this.readFile();
    return file.features[featureKey] ?? [];
  }

  async save(featureKey: string, samples: ProgressSample[]): Promise<void> {
    const file = await this.readFile();
    file.features[featureKey] = samples;
    await fs.mkdir(path.dirname(this.filePath), { recursive: true });

    // Readers see either the previous file or the new one
    const tempPath = `${this.filePath}.${process.pid}.${randomBytes(6).toString('hex')}.tmp`;
    try {
      await fs.writeFile(tempPath, JSON.stringify(file, null, 2), 'utf-8');
      await fs.rename(tempPath, this.filePath);
    } catch (error) {
      await fs.rm(tempPath, { force: true });
      throw error;
    }
  }

  private async readFile(): Promise<ProgressHistoryFile> {
    let content: string;
    try {
      content = await fs.readFile(this.filePath, 'utf-8');
    } catch (error) {
      if (errnoCode(error) !== 'ENOENT') {
        logger.warn(`Could not read ${this.filePath}; starting a new history`);
      }
      return { version: 1, features: {} };
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch {
      logger.warn(`${this.filePath} is not valid JSON; starting a new history`);
      return { version: 1, features: {} };
    }

    const features: Record<string, ProgressSample[]> = {};
    if (typeof parsed === 'object' && parsed !== null && 'features' in parsed) {
      const raw = parsed.features;
      if (typeof raw === 'object' && raw !== null) {
        for (const [key, samples] of Object.entries(raw)) {
          if (Array.isArray(samples)) {
            features[key] = samples.filter(isProgressSample);
          }
        }
      }
    }
    return { version: 1, features };
  }
}
