import * as yaml from 'js-yaml';
import type { ParseIssue, ParseResult, TaskRecord, TaskStatus } from './progress_calculator.types';

/** The four status markers; everything else in brackets is a tag. */
export const STATUS_MARKERS: Readonly<Record<string, TaskStatus>> = {
  ' ': 'pending',
  '>': 'in-progress',
  'x': 'done',
  'X': 'done',
  '!': 'blocked',
};

export const STATUS_SYMBOLS: Readonly<Record<TaskStatus, string>> = {
  'pending': '[ ]',
  'in-progress': '[>]',
  'done': '[x]',
  'blocked': '[!]',
};

const YAML_STATUS: Readonly<Record<string, TaskStatus>> = {
  'todo': 'pending',
  'pending': 'pending',
  'in-progress': 'in-progress',
  'in_progress': 'in-progress',
  'in progress': 'in-progress',
  'blocked': 'blocked',
  'done': 'done',
  'completed': 'done',
  '[ ]': 'pending',
  '[>]': 'in-progress',
  '[!]': 'blocked',
  '[x]': 'done',
};

const TASK_ID_SOURCE = '(?:[A-Z]+-)?T\\d+';
const BULLET = /^\s*(?:[-*+]|\d+[.)])\s+(.*)$/;
const BRACKET_TOKEN = /^\[([^\]]*)\]\s*/;
const TASK_ID_TOKEN = new RegExp(`^\\*{0,2}\\[?(${TASK_ID_SOURCE})\\]?\\*{0,2}(?![\\w-])\\s*:?\\s*`);
const BRACKETED_ID = new RegExp(`^${TASK_ID_SOURCE}$`);
const TASK_ID_GLOBAL = new RegExp(`\\b${TASK_ID_SOURCE}\\b`, 'g');
const DEPENDENCY_CLAUSE = /\(?\b(?:depends on|dependencies|after)\s*:\s*([^)]*)\)?/i;
const YAML_FENCE_OPEN = /^\s*```\s*ya?ml\s*$/i;
const FENCE = /^\s*```/;
const FRONT_MATTER = /^---\s*$/;

function unique(values: string[]): string[] {
  return Array.from(new Set(values));
}

function takeBrackets(text: string): { brackets: string[]; rest: string } {
  const brackets: string[] = [];
  let rest = text;
  let match = BRACKET_TOKEN.exec(rest);
  while (match) {
    brackets.push(match[1] ?? '');
    rest = rest.slice(match[0].length);
    match = BRACKET_TOKEN.exec(rest);
  }
  return { brackets, rest };
}

/**
 * Parses one list line such as `- [x] [P] T001: Create schema (depends on: T000)`.
 * Returns null for lines that are not task entries: a list task needs both an
 * id and a status marker, so detail bullets like `- **T001**: notes` are skipped.
 */
export function parseListLine(text: string, line: number, issues: ParseIssue[]): TaskRecord | null {
  const bullet = BULLET.exec(text);
  if (!bullet) return null;

  const before = takeBrackets(bullet[1] ?? '');
  let rest = before.rest;
  let taskId: string | undefined;

  // A bracketed id such as `[T001]` was consumed as a bracket token
  const idIndex = before.brackets.findIndex(content => BRACKETED_ID.test(content));
  if (idIndex >= 0) {
    taskId = before.brackets[idIndex];
    before.brackets.splice(idIndex, 1);
    rest = rest.replace(/^:\s*/, '');
  } else {
    const idMatch = TASK_ID_TOKEN.exec(rest);
    if (!idMatch) return null;
    taskId = idMatch[1];
    rest = rest.slice(idMatch[0].length);
  }
  if (!taskId) return null;

  const after = takeBrackets(rest);
  rest = after.rest;

  let status: TaskStatus | undefined;
  const tags: string[] = [];
  for (const content of [...before.brackets, ...after.brackets]) {
    const marker = STATUS_MARKERS[content];
    if (marker === undefined) {
      tags.push(content.trim());
    } else if (status === undefined) {
      status = marker;
    } else {
      issues.push({ line, message: `${taskId} has more than one status marker; using the first` });
    }
  }

  if (status === undefined) return null;

  let dependsOn: string[] = [];
  const clause = DEPENDENCY_CLAUSE.exec(rest);
  if (clause) {
    dependsOn = unique((clause[1] ?? '').match(TASK_ID_GLOBAL) ?? []);
    rest = rest.replace(clause[0], '');
  }

  const title = rest.replace(/\s+/g, ' ').replace(/^[-:\s]+/, '').trim();
  const record: TaskRecord = {
    taskId,
    status,
    dependsOn,
    tags,
    format: 'list',
    line,
  };
  if (title) record.title = title;
  return record;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toIdList(value: unknown): string[] {
  if (Array.isArray(value)) {
    return unique(value.filter(item => item !== null && item !== undefined).map(item => String(item).trim()).filter(Boolean));
  }
  if (typeof value === 'string') {
    return unique(value.split(',').map(item => item.trim()).filter(Boolean));
  }
  return [];
}

function toYamlStatus(value: unknown, taskId: string, line: number, issues: ParseIssue[]): TaskStatus {
  if (value === undefined || value === null) {
    return 'pending';
  }
  const normalized = String(value).trim().toLowerCase();
  const status = YAML_STATUS[normalized];
  if (status === undefined) {
    issues.push({ line, message: `${taskId} has unknown status "${String(value)}"; counted as pending` });
    return 'pending';
  }
  return status;
}

function yamlTask(data: Record<string, unknown>, line: number, issues: ParseIssue[]): TaskRecord | null {
  const rawId = data['id'];
  if (rawId === undefined || rawId === null || String(rawId).trim() === '') {
    issues.push({ line, message: 'YAML task block has no id' });
    return null;
  }
  const taskId = String(rawId).trim();
  const record: TaskRecord = {
    taskId,
    status: toYamlStatus(data['status'], taskId, line, issues),
    dependsOn: toIdList(data['dependencies'] ?? data['depends_on']),
    tags: toIdList(data['tags']),
    format: 'yaml',
    line,
  };
  const title = data['title'];
  if (typeof title === 'string' && title.trim()) record.title = title.trim();
  return record;
}

/**
 * Parses a YAML task block. A mapping is one task; a sequence of mappings is one task each.
 */
export function parseYamlBlock(source: string, line: number, issues: ParseIssue[]): TaskRecord[] {
  let data: unknown;
  try {
    data = yaml.load(source);
  } catch (error) {
    const reason = error instanceof Error ? error.message.split('\n')[0] : String(error);
    issues.push({ line, message: `Invalid YAML task block: ${reason}` });
    return [];
  }

  const items = Array.isArray(data) ? data : [data];
  const records: TaskRecord[] = [];
  for (const item of items) {
    if (!isRecord(item)) {
      issues.push({ line, message: 'YAML task block is not a mapping' });
      continue;
    }
    const record = yamlTask(item, line, issues);
    if (record) records.push(record);
  }
  return records;
}

/**
 * Single pass over a task document, yielding records in document order.
 *
 * - Leading `---` front matter and ```yaml fences are YAML task blocks.
 * - Other fenced code is skipped, so example lists inside it are not counted.
 * - Every other bullet line carrying a task id and a status marker is a list task.
 * - A task id seen again is reported and the first record kept.
 */
export function parse(document: string): ParseResult {
  const lines = document.split(/\r?\n/);
  const found: TaskRecord[] = [];
  const issues: ParseIssue[] = [];

  let index = 0;
  if (lines.length > 0 && FRONT_MATTER.test(lines[0] ?? '')) {
    const end = lines.findIndex((text, i) => i > 0 && FRONT_MATTER.test(text));
    if (end > 0) {
      const block = lines.slice(1, end).join('\n');
      // Front matter without an id describes the document, not a task
      if (/^id\s*:/m.test(block)) {
        found.push(...parseYamlBlock(block, 1, issues));
      }
      index = end + 1;
    }
  }

  while (index < lines.length) {
    const text = lines[index] ?? '';
    const lineNumber = index + 1;

    if (FENCE.test(text)) {
      const isYaml = YAML_FENCE_OPEN.test(text);
      let end = index + 1;
      while (end < lines.length && !FENCE.test(lines[end] ?? '')) end++;
      if (isYaml) {
        if (end >= lines.length) {
          issues.push({ line: lineNumber, message: 'Unterminated ```yaml block' });
        }
        found.push(...parseYamlBlock(lines.slice(index + 1, end).join('\n'), lineNumber, issues));
      }
      index = end + 1;
      continue;
    }

    const record = parseListLine(text, lineNumber, issues);
    if (record) found.push(record);
    index++;
  }

  const records: TaskRecord[] = [];
  const seen = new Map<string, number>();
  for (const record of found) {
    const firstLine = seen.get(record.taskId);
    if (firstLine === undefined) {
      seen.set(record.taskId, record.line);
      records.push(record);
    } else {
      issues.push({ line: record.line, message: `Duplicate task id ${record.taskId} (first seen on line ${firstLine}); ignored` });
    }
  }

  return { records, issues };
}
