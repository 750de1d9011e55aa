import type { FileLister } from '../file_lister';
import { joinPosix } from '../utils/path_guard';
import { servicePrefix } from '../utils/id_generator';
import type {
  ArtifactEntry,
  ArtifactKind,
  ArtifactKindDefinition,
  ArtifactRegistryDependencies,
  IArtifactRegistry,
  LatestArtifact,
  RegistryListOptions,
} from './artifact_registry.types';

/**
 * Naming conventions per artifact kind.
 */
export const ARTIFACT_KINDS: Readonly<Record<ArtifactKind, ArtifactKindDefinition>> = {
  'feature': { area: 'specs', prefix: '', entryType: 'directory', extension: '' },
  'specification': { area: 'specs', prefix: 'spec-', entryType: 'file', extension: '.md' },
  'plan': { area: 'plans', prefix: 'plan-', entryType: 'file', extension: '.md' },
  'task-list': { area: 'tasks', prefix: 'task-', entryType: 'file', extension: '.md' },
  'service-task': { area: 'tasks', prefix: '', entryType: 'file', extension: '.md' },
};

/**
 * Resolves the name prefix for a kind; service tasks need the service code.
 */
export function prefixForKind(kind: ArtifactKind, serviceCode?: string): string {
  if (kind === 'service-task') {
    return servicePrefix(serviceCode ?? '');
  }
  return ARTIFACT_KINDS[kind].prefix;
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function compareNames(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

/**
 * Builds the matcher for `{prefix}{digits}` names. The digit run must end the
 * name or be followed by '-' or '.', so 'spec-001.md' and '001-auth' match
 * while 'spec-001a.md' does not.
 */
export function artifactNamePattern(prefix: string): RegExp {
  return new RegExp(`^${escapeRegExp(prefix)}(\\d+)(?=[-.]|$)`);
}

/**
 * ArtifactRegistry - enumerates numbered artifacts under a root directory.
 *
 * Stateless: every call re-reads the directory through the FileLister.
 */
export class ArtifactRegistry implements IArtifactRegistry {
  private readonly lister: FileLister;

  constructor(dependencies: ArtifactRegistryDependencies) {
    this.lister = dependencies.lister;
  }

  async listEntries(
    root: string,
    prefix: string,
    _width: number,
    options?: RegistryListOptions
  ): Promise<ArtifactEntry[]> {
    const entryType = options?.entryType ?? 'file';
    const names = await this.lister.listChildren(root, { entryType });
    const pattern = artifactNamePattern(prefix);

    const entries: ArtifactEntry[] = [];
    for (const name of names) {
      const match = pattern.exec(name);
      if (!match || !match[1]) continue;
      entries.push({
        number: parseInt(match[1], 10),
        name,
        path: joinPosix(root, name),
      });
    }

    return entries.sort((a, b) => a.number - b.number || compareNames(a.name, b.name));
  }

  async listNumbers(
    root: string,
    prefix: string,
    width: number,
    options?: RegistryListOptions
  ): Promise<Set<number>> {
    const entries = await this.listEntries(root, prefix, width, options);
    return new Set(entries.map(entry => entry.number));
  }

  async latest(
    root: string,
    prefix: string,
    width: number,
    options?: RegistryListOptions
  ): Promise<LatestArtifact | null> {
    const entries = await this.listEntries(root, prefix, width, options);
    const last = entries[entries.length - 1];
    if (!last) {
      return null;
    }

    // entries are sorted, so the last one is the lexicographically last name at the top number
    const tied = entries.filter(entry => entry.number === last.number);
    if (tied.length === 1) {
      return { ...last, warnings: [] };
    }

    const candidates = tied.map(entry => entry.name);
    return {
      ...last,
      warnings: [{
        type: 'AmbiguousLatestWarning',
        message: `${candidates.length} artifacts share number ${last.number} under ${root || '.'} (${candidates.join(', ')}); using ${last.name}`,
        path: last.path,
        candidates,
      }],
    };
  }
}
