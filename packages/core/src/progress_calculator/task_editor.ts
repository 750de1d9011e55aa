import type { TaskRecord, TaskStatus, TaskStatusEdit } from './progress_calculator.types';
import { TaskEditError } from './progress_calculator.errors';
import { parse, STATUS_SYMBOLS } from './task_parser';

/** First status bracket on a list line; ids and tags never look like this. */
const STATUS_BRACKET = /\[[ xX>!]\]/;
const BLOCK_END = /^\s*(?:```|---\s*$)/;
const SEQUENCE_ITEM = /^(\s*)-(?:\s|$)/;
const ID_LINE = /^(\s*)(-\s+)?id\s*:\s*(.*?)\s*$/;
const STATUS_LINE = /^(\s*(?:-\s+)?status\s*:)(\s*).*$/;

function unquote(value: string): string {
  const quoted = /^(['"])(.*)\1$/.exec(value);
  return quoted?.[2] ?? value;
}

/**
 * Index range [start, end) of each mapping inside a YAML block body.
 */
function yamlItems(lines: string[], start: number, end: number): Array<[number, number]> {
  const first = lines.slice(start, end).findIndex(text => text.trim() !== '' && !text.trim().startsWith('#'));
  if (first < 0) return [];

  const head = SEQUENCE_ITEM.exec(lines[start + first] ?? '');
  if (!head) return [[start, end]];

  const indent = head[1] ?? '';
  const starts: number[] = [];
  for (let i = start + first; i < end; i++) {
    const item = SEQUENCE_ITEM.exec(lines[i] ?? '');
    if (item && item[1] === indent) starts.push(i);
  }
  return starts.map((itemStart, i): [number, number] => [itemStart, starts[i + 1] ?? end]);
}

function editYamlStatus(lines: string[], record: TaskRecord, status: TaskStatus): number {
  const bodyStart = record.line;
  let bodyEnd = bodyStart;
  while (bodyEnd < lines.length && !BLOCK_END.test(lines[bodyEnd] ?? '')) bodyEnd++;

  for (const [start, end] of yamlItems(lines, bodyStart, bodyEnd)) {
    const idIndex = lines.slice(start, end).findIndex(text => {
      const id = ID_LINE.exec(text);
      return id !== null && unquote(id[3] ?? '') === record.taskId;
    });
    if (idIndex < 0) continue;

    for (let i = start; i < end; i++) {
      const text = lines[i] ?? '';
      const current = STATUS_LINE.exec(text);
      if (current) {
        lines[i] = `${current[1]}${current[2] || ' '}${status}`;
        return i + 1;
      }
    }

    // No status key yet: add one under the id, aligned with it
    const idLine = ID_LINE.exec(lines[start + idIndex] ?? '');
    const indent = `${idLine?.[1] ?? ''}${' '.repeat(idLine?.[2]?.length ?? 0)}`;
    lines.splice(start + idIndex + 1, 0, `${indent}status: ${status}`);
    return start + idIndex + 2;
  }

  throw new TaskEditError(record.taskId, `no "id: ${record.taskId}" line found in the YAML block on line ${record.line}`);
}

/**
 * Rewrites the status of one task, leaving every other byte of the document
 * alone. List tasks get their status bracket swapped; YAML tasks get their
 * `status:` value replaced (or added).
 *
 * @returns null when the document has no task with this id
 * @throws TaskEditError when the task's status cannot be located
 */
export function setTaskStatus(document: string, taskId: string, status: TaskStatus): TaskStatusEdit | null {
  const record = parse(document).records.find(candidate => candidate.taskId === taskId);
  if (!record) return null;

  const newline = document.includes('\r\n') ? '\r\n' : '\n';
  const lines = document.split(/\r?\n/);

  let line: number;
  if (record.format === 'list') {
    const index = record.line - 1;
    const text = lines[index] ?? '';
    if (!STATUS_BRACKET.test(text)) {
      throw new TaskEditError(taskId, `no status marker on line ${record.line}`);
    }
    lines[index] = text.replace(STATUS_BRACKET, STATUS_SYMBOLS[status]);
    line = record.line;
  } else {
    line = editYamlStatus(lines, record, status);
  }

  return { document: lines.join(newline), previous: record.status, line };
}
