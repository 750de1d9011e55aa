import type { ArtifactWarning } from '../artifact_registry';
import type { FileLister } from '../file_lister';
import { createLogger } from '../logger';
import { errorMessage } from '../utils/errno';
import { aggregate, findDanglingDependencies, parse } from '../progress_calculator';
import { joinPosix } from '../utils/path_guard';
import type {
  FeatureProgress,
  IProgressTracker,
  ProgressTrackerDependencies,
  TaskFileProgress,
} from './progress_tracker.types';

const logger = createLogger('[ProgressTracker] ');

const TASK_LIST_FILE = /^task-(\d+)\.md$/;
const SERVICE_TASK_FILE = /^([A-Z]+)-T(\d+)\.md$/;

export type TaskFileRef = Pick<TaskFileProgress, 'name' | 'path' | 'kind' | 'number' | 'service'>;

/**
 * Recognizes `task-NNN.md` and `{SERVICE}-TNNN.md`; anything else under a
 * feature's task directory is not a task list.
 */
export function classifyTaskFile(root: string, name: string): TaskFileRef | null {
  const taskList = TASK_LIST_FILE.exec(name);
  if (taskList?.[1]) {
    return { name, path: joinPosix(root, name), kind: 'task-list', number: parseInt(taskList[1], 10) };
  }
  const serviceTask = SERVICE_TASK_FILE.exec(name);
  if (serviceTask?.[1] && serviceTask[2]) {
    return {
      name,
      path: joinPosix(root, name),
      kind: 'service-task',
      number: parseInt(serviceTask[2], 10),
      service: serviceTask[1],
    };
  }
  return null;
}

/**
 * ProgressTracker - scans a feature's task directory and reports progress.
 *
 * Never aborts because one file is unreadable or malformed: such files
 * contribute zero records and one warning each.
 */
export class ProgressTracker implements IProgressTracker {
  private readonly lister: FileLister;

  constructor(dependencies: ProgressTrackerDependencies) {
    this.lister = dependencies.lister;
  }

  async track(tasksRoot: string): Promise<FeatureProgress> {
    const names = await this.lister.listChildren(tasksRoot, { entryType: 'file' });
    const refs = names
      .map(name => classifyTaskFile(tasksRoot, name))
      .filter((ref): ref is TaskFileRef => ref !== null);

    const files: TaskFileProgress[] = [];
    // One problem description per file; dangling dependencies are merged in below
    const problems = new Map<string, string>();

    for (const ref of refs) {
      let content: string;
      try {
        content = await this.lister.read(ref.path);
      } catch (error) {
        const reason = errorMessage(error);
        logger.warn(`Skipping ${ref.path}: ${reason}`);
        problems.set(ref.path, `${ref.path} could not be read: ${reason}`);
        files.push({ ...ref, records: [], issues: [], snapshot: aggregate([]) });
        continue;
      }

      const { records, issues } = parse(content);
      files.push({ ...ref, records, issues, snapshot: aggregate(records) });

      if (records.length === 0) {
        problems.set(ref.path, `${ref.path} has no recognizable task entries`);
      } else if (issues.length > 0) {
        const first = issues[0];
        const detail = first ? ` (line ${first.line}: ${first.message})` : '';
        problems.set(ref.path, `${ref.path} parsed with ${issues.length} issue(s)${detail}`);
      }
    }

    const allRecords = files.flatMap(file => file.records);
    const knownIds = allRecords.map(record => record.taskId);
    const warnings: ArtifactWarning[] = [];
    for (const file of files) {
      const problem = problems.get(file.path);
      const dangling = findDanglingDependencies(file.records, knownIds);
      const missing = Array.from(new Set(dangling.flatMap(entry => entry.missing)));

      if (problem === undefined && missing.length > 0) {
        warnings.push({
          type: 'DanglingDependencyWarning',
          message: `${file.path} depends on unknown task(s): ${missing.join(', ')}`,
          path: file.path,
          missing,
        });
      } else if (problem !== undefined && missing.length > 0) {
        warnings.push({
          type: 'MalformedArtifactWarning',
          message: `${problem}; depends on unknown task(s): ${missing.join(', ')}`,
          path: file.path,
          missing,
        });
      } else if (problem !== undefined) {
        warnings.push({ type: 'MalformedArtifactWarning', message: problem, path: file.path });
      }
    }

    return {
      root: tasksRoot,
      files,
      snapshot: aggregate(allRecords),
      warnings,
    };
  }
}
