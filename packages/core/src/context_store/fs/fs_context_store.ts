import { promises as fs } from 'fs';
import * as path from 'path';
import type { ActiveFeature, ContextStore } from '../context_store.types';
import { CONTEXT_FILE_NAME, parseActiveFeature, updateActiveFeature } from '../context_document';
import { errnoCode } from '../../utils/errno';

/**
 * Filesystem-based ContextStore on `{memory}/context.md`.
 *
 * @example
 * ```typescript
 * const store = new FsContextStore('/path/to/project/memory');
 * const active = await store.getActiveFeature();
 * ```
 */
export class FsContextStore implements ContextStore {
  private readonly contextPath: string;

  constructor(memoryDir: string) {
    this.contextPath = path.join(memoryDir, CONTEXT_FILE_NAME);
  }

  async getActiveFeature(): Promise<ActiveFeature | null> {
    const content = await this.readContent();
    return content === null ? null : parseActiveFeature(content);
  }

  async setActiveFeature(feature: ActiveFeature): Promise<void> {
    const content = await this.readContent();
    await fs.mkdir(path.dirname(this.contextPath), { recursive: true });
    await fs.writeFile(this.contextPath, updateActiveFeature(content, feature), 'utf-8');
  }

  private async readContent(): Promise<string | null> {
    try {
      return await fs.readFile(this.contextPath, 'utf-8');
    } catch (error: unknown) {
      if (errnoCode(error) === 'ENOENT') {
        return null;
      }
      throw error;
    }
  }
}
