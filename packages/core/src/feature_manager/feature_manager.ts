/**
 * FeatureManager - feature and artifact workflows over the ledger
 *
 * Everything numbered goes through the IdAllocator; this module only decides
 * which root, prefix and content to ask for, and keeps the active feature
 * pointer and git branch in step.
 */

import type { ArtifactEntry, IArtifactRegistry } from '../artifact_registry';
import { ARTIFACT_KINDS, prefixForKind } from '../artifact_registry';
import type { IIdAllocator } from '../id_allocator';
import type { ContextStore } from '../context_store';
import type { FileLister } from '../file_lister';
import type { FileWriter } from '../file_writer';
import type { IGitModule } from '../git';
import { GitError } from '../git';
import type { ITemplateProvider, TemplateKind, TemplateValues } from '../template_provider';
import { fillTemplate } from '../template_provider';
import type { SpecPulseConfig } from '../config_manager';
import { FeatureNotFoundError, TaskNotFoundError } from '../errors';
import type { TaskStatus } from '../progress_calculator';
import { setTaskStatus } from '../progress_calculator';
import { classifyTaskFile } from '../progress_tracker';
import { formatArtifactNumber, parseFeatureDirName, sanitizeName } from '../utils/id_generator';
import { joinPosix } from '../utils/path_guard';
import { createLogger } from '../logger';
import type {
  ArtifactFileKind,
  CreateArtifactOptions,
  CreatedArtifact,
  CurrentArtifact,
  FeatureChange,
  FeatureDirectory,
  FeatureManagerDependencies,
  FeaturePaths,
  FeatureSummary,
  IFeatureManager,
  InitFeatureOptions,
  ResolvedFeature,
  TaskStatusChange,
  UpdateTaskStatusOptions,
} from './feature_manager.types';

const logger = createLogger('[FeatureManager] ');

const TEMPLATE_KINDS: Readonly<Record<ArtifactFileKind, TemplateKind>> = {
  'specification': 'spec',
  'plan': 'plan',
  'task-list': 'task',
  'service-task': 'task',
};

const DEFAULT_TITLES: Readonly<Record<ArtifactFileKind, string>> = {
  'specification': 'Specification',
  'plan': 'Implementation Plan',
  'task-list': 'Task Breakdown',
  'service-task': 'Service Tasks',
};

/**
 * @example
 * ```typescript
 * const manager = new FeatureManager({ config, lister, writer, registry, allocator, context, templates, git });
 * const { feature } = await manager.initFeature('User Auth'); // specs/001-user-auth
 * const { artifact } = await manager.createArtifact('specification'); // specs/001-user-auth/spec-001.md
 * ```
 */
export class FeatureManager implements IFeatureManager {
  private readonly config: SpecPulseConfig;
  private readonly lister: FileLister;
  private readonly writer: FileWriter;
  private readonly registry: IArtifactRegistry;
  private readonly allocator: IIdAllocator;
  private readonly context: ContextStore;
  private readonly templates: ITemplateProvider;
  private readonly git: IGitModule | undefined;
  private readonly now: () => Date;

  constructor(dependencies: FeatureManagerDependencies) {
    this.config = dependencies.config;
    this.lister = dependencies.lister;
    this.writer = dependencies.writer;
    this.registry = dependencies.registry;
    this.allocator = dependencies.allocator;
    this.context = dependencies.context;
    this.templates = dependencies.templates;
    this.git = dependencies.git;
    this.now = dependencies.now ?? (() => new Date());
  }

  private get width(): number {
    return this.config.numbering.width;
  }

  async initFeature(name: string, options: InitFeatureOptions = {}): Promise<FeatureChange> {
    const slug = sanitizeName(name);
    const { specs, plans, tasks } = this.config.paths;

    const allocated = await this.allocator.allocate({
      kind: 'feature',
      root: specs,
      prefix: '',
      width: this.width,
      slug,
      entryType: 'directory',
      siblingRoots: [plans, tasks],
      explicit: options.explicitId,
    });

    const feature: FeatureDirectory = {
      id: allocated.id,
      slug,
      dirName: allocated.name,
      createdAt: this.now().toISOString(),
    };
    const paths = this.pathsFor(feature);
    await this.writer.ensureDirectory(paths.plans);
    await this.writer.ensureDirectory(paths.tasks);
    await this.activate(feature);

    const notices: string[] = [];
    const wantBranch = options.createBranch ?? this.config.git.createBranches;
    if (wantBranch && this.git) {
      if (await this.git.isRepository()) {
        try {
          await this.git.createBranch(feature.dirName);
          feature.branch = feature.dirName;
        } catch (error: unknown) {
          if (!(error instanceof GitError)) throw error;
          notices.push(`Could not create branch ${feature.dirName}: ${error.message}`);
        }
      } else {
        notices.push('Not a git repository; skipped branch creation');
      }
    }

    logger.info(`Initialized feature ${feature.dirName}`);
    return { feature, paths, attempts: allocated.attempts, notices };
  }

  async continueFeature(identifier: string): Promise<FeatureChange> {
    const feature = await this.findFeature(identifier);
    await this.activate(feature);

    const notices: string[] = [];
    if (this.git && await this.git.isRepository()) {
      try {
        if (await this.git.branchExists(feature.dirName)) {
          await this.git.checkoutBranch(feature.dirName);
          feature.branch = feature.dirName;
        } else {
          notices.push(`No branch named ${feature.dirName}; staying on the current branch`);
        }
      } catch (error: unknown) {
        if (!(error instanceof GitError)) throw error;
        notices.push(`Could not switch branch: ${error.message}`);
      }
    }

    return { feature, paths: this.pathsFor(feature), attempts: 0, notices };
  }

  async listFeatures(): Promise<FeatureSummary[]> {
    const summaries: FeatureSummary[] = [];
    for (const entry of await this.featureEntries()) {
      const feature = await this.toFeature(entry);
      const paths = this.pathsFor(feature);
      summaries.push({
        ...feature,
        counts: {
          specs: await this.countMarkdown(paths.specs),
          plans: await this.countMarkdown(paths.plans),
          tasks: await this.countMarkdown(paths.tasks),
        },
      });
    }
    return summaries;
  }

  /**
   * Explicit identifier, else the active feature, else the highest-numbered one.
   * @throws FeatureNotFoundError when nothing matches or no features exist
   */
  async resolveFeature(identifier?: string): Promise<ResolvedFeature> {
    if (identifier !== undefined && identifier.trim() !== '') {
      return { feature: await this.findFeature(identifier), source: 'explicit', warnings: [] };
    }

    const active = await this.context.getActiveFeature();
    if (active) {
      const entry = (await this.featureEntries()).find(candidate => candidate.name === active.directory);
      if (entry) {
        return { feature: await this.toFeature(entry), source: 'context', warnings: [] };
      }
      logger.warn(`Active feature ${active.directory} no longer exists; using the latest feature`);
    }

    const { specs } = this.config.paths;
    const latest = await this.registry.latest(specs, '', this.width, { entryType: 'directory' });
    if (!latest) {
      throw new FeatureNotFoundError('', `No features found under ${specs}/. Run 'specpulse feature init <name>' first.`);
    }
    return { feature: await this.toFeature(latest), source: 'latest', warnings: latest.warnings };
  }

  async createArtifact(kind: ArtifactFileKind, options: CreateArtifactOptions = {}): Promise<CreatedArtifact> {
    const resolved = await this.resolveFeature(options.feature);
    const { feature } = resolved;
    const definition = ARTIFACT_KINDS[kind];
    const prefix = prefixForKind(kind, options.service);
    const template = await this.templates.getTemplate(TEMPLATE_KINDS[kind]);

    const values: TemplateValues = {
      FEATURE_ID: formatArtifactNumber(feature.id.number, this.width),
      FEATURE_NAME: feature.slug,
      TITLE: options.title ?? `${DEFAULT_TITLES[kind]} for ${feature.slug}`,
      DATE: this.now().toISOString().slice(0, 10),
      SERVICE: options.service ?? '',
    };

    const artifact = await this.allocator.allocate({
      kind,
      root: this.pathsFor(feature)[definition.area],
      prefix,
      width: this.width,
      extension: definition.extension,
      entryType: definition.entryType,
      explicit: options.explicit,
      content: ({ name }) => fillTemplate(template.content, {
        ...values,
        ARTIFACT_ID: name.slice(0, name.length - definition.extension.length),
      }),
    });

    logger.info(`Created ${artifact.path}`);
    return { kind, feature, artifact, template: template.source, warnings: resolved.warnings };
  }

  async currentArtifact(
    kind: ArtifactFileKind,
    options: { feature?: string; service?: string } = {}
  ): Promise<CurrentArtifact> {
    const resolved = await this.resolveFeature(options.feature);
    const definition = ARTIFACT_KINDS[kind];
    const latest = await this.registry.latest(
      this.pathsFor(resolved.feature)[definition.area],
      prefixForKind(kind, options.service),
      this.width,
      { entryType: definition.entryType }
    );

    return {
      kind,
      feature: resolved.feature,
      artifact: latest,
      warnings: [...resolved.warnings, ...(latest?.warnings ?? [])],
    };
  }

  /**
   * Rewrites one task's status marker in place. Task lists are searched in
   * name order and the first one holding `taskId` is edited.
   * @throws TaskNotFoundError when no task list of the feature has the id
   */
  async updateTaskStatus(
    taskId: string,
    status: TaskStatus,
    options: UpdateTaskStatusOptions = {}
  ): Promise<TaskStatusChange> {
    const wanted = taskId.trim();
    const resolved = await this.resolveFeature(options.feature);
    const { feature } = resolved;
    const tasksDir = this.pathsFor(feature).tasks;

    const names = await this.lister.listChildren(tasksDir, { entryType: 'file' });
    for (const name of names) {
      const ref = classifyTaskFile(tasksDir, name);
      if (!ref) continue;

      const content = await this.lister.read(ref.path);
      const edit = setTaskStatus(content, wanted, status);
      if (!edit) continue;

      const changed = edit.document !== content;
      if (changed) {
        await this.writer.writeFile(ref.path, edit.document);
        logger.info(`${wanted}: ${edit.previous} -> ${status} in ${ref.path}`);
      }
      return {
        feature,
        taskId: wanted,
        path: ref.path,
        line: edit.line,
        previous: edit.previous,
        status,
        changed,
        warnings: resolved.warnings,
      };
    }

    throw new TaskNotFoundError(wanted, feature.dirName);
  }

  pathsFor(feature: FeatureDirectory): FeaturePaths {
    const { specs, plans, tasks } = this.config.paths;
    return {
      specs: joinPosix(specs, feature.dirName),
      plans: joinPosix(plans, feature.dirName),
      tasks: joinPosix(tasks, feature.dirName),
    };
  }

  private async featureEntries(): Promise<ArtifactEntry[]> {
    return this.registry.listEntries(this.config.paths.specs, '', this.width, { entryType: 'directory' });
  }

  /**
   * Matches a directory name, then a number, then a slug, then a
   * case-insensitive fragment of the directory name.
   */
  private async findFeature(identifier: string): Promise<FeatureDirectory> {
    const wanted = identifier.trim();
    if (!wanted) {
      throw new FeatureNotFoundError(identifier);
    }

    const entries = await this.featureEntries();
    const byNumber = /^\d+$/.test(wanted)
      ? entries.filter(entry => entry.number === parseInt(wanted, 10))
      : [];
    const lowered = wanted.toLowerCase();

    const match = entries.find(entry => entry.name === wanted)
      ?? byNumber[byNumber.length - 1]
      ?? entries.find(entry => parseFeatureDirName(entry.name)?.slug === wanted)
      ?? entries.find(entry => entry.name.toLowerCase().includes(lowered));

    if (!match) {
      throw new FeatureNotFoundError(identifier);
    }
    return this.toFeature(match);
  }

  private async toFeature(entry: ArtifactEntry): Promise<FeatureDirectory> {
    const stats = await this.lister.stat(entry.path);
    return {
      id: { kind: 'feature', prefix: '', number: entry.number, width: this.width },
      slug: parseFeatureDirName(entry.name)?.slug ?? '',
      dirName: entry.name,
      createdAt: new Date(stats.mtime).toISOString(),
    };
  }

  private async activate(feature: FeatureDirectory): Promise<void> {
    await this.context.setActiveFeature({
      featureId: formatArtifactNumber(feature.id.number, this.width),
      featureName: feature.slug,
      directory: feature.dirName,
      updatedAt: this.now().toISOString(),
    });
  }

  private async countMarkdown(dir: string): Promise<number> {
    const names = await this.lister.listChildren(dir, { entryType: 'file' });
    return names.filter(name => name.endsWith('.md') && !name.startsWith('.')).length;
  }
}
