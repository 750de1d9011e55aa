import type { ArtifactEntry, EntryType, IArtifactRegistry } from '../artifact_registry';
import type { FileWriter } from '../file_writer';
import { createLogger } from '../logger';
import { DEFAULT_NUMBER_WIDTH, renderArtifactName } from '../utils/id_generator';
import { joinPosix } from '../utils/path_guard';
import { CollisionError, ContentionError, InvalidNumberError } from './id_allocator.errors';
import type {
  AllocatedArtifact,
  AllocationRequest,
  ArtifactContent,
  IdAllocatorDependencies,
  IIdAllocator,
} from './id_allocator.types';

const logger = createLogger('[IdAllocator] ');

export const DEFAULT_MAX_ATTEMPTS = 5;

const CLAIM_EXTENSION = '.claim';

type ResolvedRequest = Required<Omit<AllocationRequest, 'explicit' | 'slug' | 'siblingRoots'>> & {
  slug: string | undefined;
  siblingRoots: string[];
};

function renderContent(content: ArtifactContent, name: string, value: number): string {
  return typeof content === 'function' ? content({ name, number: value }) : content;
}

type ReservationOutcome =
  | { status: 'reserved'; path: string; name: string }
  | { status: 'taken'; path: string; heldByClaim?: boolean };

/**
 * IdAllocator - reserves the next free artifact number.
 *
 * Numbers are claimed by creating the target exclusively (FileWriter reserve*),
 * never by check-then-write. When the artifact name carries a slug, two callers
 * could create '001-a' and '001-b' side by side, so the number itself is first
 * claimed through a hidden '.{prefix}{NNN}.claim' file; the claim is released
 * once the real entry exists.
 */
export class IdAllocator implements IIdAllocator {
  private readonly registry: IArtifactRegistry;
  private readonly writer: FileWriter;
  private readonly maxAttempts: number;

  constructor(dependencies: IdAllocatorDependencies) {
    this.registry = dependencies.registry;
    this.writer = dependencies.writer;
    this.maxAttempts = dependencies.maxAttempts ?? DEFAULT_MAX_ATTEMPTS;
  }

  async allocate(request: AllocationRequest): Promise<AllocatedArtifact> {
    const resolved: ResolvedRequest = {
      kind: request.kind,
      root: request.root,
      prefix: request.prefix,
      width: request.width ?? DEFAULT_NUMBER_WIDTH,
      slug: request.slug,
      extension: request.extension ?? '',
      entryType: request.entryType ?? 'file',
      content: request.content ?? '',
      siblingRoots: request.siblingRoots ?? [],
    };

    if (request.explicit !== undefined) {
      return this.allocateExplicit(resolved, request.explicit);
    }
    return this.allocateNext(resolved);
  }

  private async allocateExplicit(request: ResolvedRequest, explicit: number): Promise<AllocatedArtifact> {
    if (!Number.isSafeInteger(explicit) || explicit <= 0) {
      throw new InvalidNumberError(explicit);
    }

    const existing = await this.findTaken(request, explicit);
    if (existing) {
      throw new CollisionError(existing.path, explicit);
    }

    const outcome = await this.reserve(request, explicit);
    if (outcome.status === 'taken') {
      throw new CollisionError(outcome.path, explicit, outcome.heldByClaim === true);
    }
    return this.toResult(request, explicit, outcome, 1);
  }

  private async allocateNext(request: ResolvedRequest): Promise<AllocatedArtifact> {
    for (let attempt = 1; attempt <= this.maxAttempts; attempt++) {
      const taken = await this.takenNumbers(request);
      const next = Math.max(0, ...taken) + 1;

      const outcome = await this.reserve(request, next);
      if (outcome.status === 'reserved') {
        return this.toResult(request, next, outcome, attempt);
      }
      logger.debug(`Lost the race for ${outcome.path} (attempt ${attempt}/${this.maxAttempts}), re-reading ${request.root || '.'}`);
    }

    throw new ContentionError(request.root, this.maxAttempts);
  }

  /**
   * Atomically creates the entry for `value`, or reports which path already holds it.
   */
  private async reserve(request: ResolvedRequest, value: number): Promise<ReservationOutcome> {
    const name = renderArtifactName(request.prefix, value, request.width, {
      slug: request.slug,
      extension: request.extension,
    });
    const target = joinPosix(request.root, name);

    if (!request.slug) {
      const created = await this.create(request.entryType, target, renderContent(request.content, name, value));
      return created ? { status: 'reserved', path: target, name } : { status: 'taken', path: target };
    }

    const claim = joinPosix(request.root, this.claimName(request, value));
    if (!(await this.writer.reserveFile(claim, ''))) {
      return { status: 'taken', path: claim, heldByClaim: true };
    }

    try {
      // Holding the claim: anything already numbered `value` was finished before we got it
      const existing = await this.findTaken(request, value);
      if (existing) {
        return { status: 'taken', path: existing.path };
      }
      const created = await this.create(request.entryType, target, renderContent(request.content, name, value));
      return created ? { status: 'reserved', path: target, name } : { status: 'taken', path: target };
    } finally {
      await this.writer.removeFile(claim);
    }
  }

  private async create(entryType: EntryType, target: string, content: string): Promise<boolean> {
    return entryType === 'directory'
      ? this.writer.reserveDirectory(target)
      : this.writer.reserveFile(target, content);
  }

  private async takenNumbers(request: ResolvedRequest): Promise<number[]> {
    const numbers: number[] = [];
    for (const entry of await this.entriesAcrossRoots(request)) {
      numbers.push(entry.number);
    }
    if (request.slug) {
      const claims = await this.registry.listNumbers(request.root, `.${request.prefix}`, request.width);
      numbers.push(...claims);
    }
    return numbers;
  }

  private async findTaken(request: ResolvedRequest, value: number): Promise<ArtifactEntry | undefined> {
    const entries = await this.entriesAcrossRoots(request);
    return entries.find(entry => entry.number === value);
  }

  private async entriesAcrossRoots(request: ResolvedRequest): Promise<ArtifactEntry[]> {
    const roots = [request.root, ...request.siblingRoots];
    const entries: ArtifactEntry[] = [];
    for (const root of roots) {
      entries.push(...await this.registry.listEntries(root, request.prefix, request.width, {
        entryType: request.entryType,
      }));
    }
    return entries;
  }

  private claimName(request: ResolvedRequest, value: number): string {
    return renderArtifactName(`.${request.prefix}`, value, request.width, { extension: CLAIM_EXTENSION });
  }

  private toResult(
    request: ResolvedRequest,
    value: number,
    outcome: { path: string; name: string },
    attempts: number
  ): AllocatedArtifact {
    logger.debug(`Reserved ${outcome.path}`);
    return {
      id: { kind: request.kind, prefix: request.prefix, number: value, width: request.width },
      name: outcome.name,
      path: outcome.path,
      attempts,
    };
  }
}
