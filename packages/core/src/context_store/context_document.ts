/**
 * Reads and rewrites the `## Active Feature` section of a context document.
 * Other sections are preserved line for line.
 */

import type { ActiveFeature } from './context_store.types';

export const CONTEXT_FILE_NAME = 'context.md';
export const ACTIVE_FEATURE_HEADING = '## Active Feature';
export const DEFAULT_CONTEXT_DOCUMENT = '# Project Context\n\n## Current State\n';

const CURRENT_STATE_HEADING = '## Current State';
const FIELD_LINE = /^\s*-\s*\*\*(.+?)\*\*:\s*(.*)$/;

function sectionBounds(lines: string[]): { start: number; end: number } | null {
  const start = lines.findIndex(line => line.trim() === ACTIVE_FEATURE_HEADING);
  if (start < 0) return null;

  let end = start + 1;
  while (end < lines.length && !lines[end]?.startsWith('## ')) {
    end++;
  }
  return { start, end };
}

export function renderActiveFeature(feature: ActiveFeature): string[] {
  return [
    ACTIVE_FEATURE_HEADING,
    `- **Feature ID**: ${feature.featureId}`,
    `- **Feature Name**: ${feature.featureName}`,
    `- **Directory**: ${feature.directory}`,
    `- **Last Updated**: ${feature.updatedAt}`,
  ];
}

/**
 * Extracts the active feature. Returns null when the section is missing or
 * lacks a feature id or directory.
 */
export function parseActiveFeature(content: string): ActiveFeature | null {
  const lines = content.split(/\r?\n/);
  const bounds = sectionBounds(lines);
  if (!bounds) return null;

  const fields = new Map<string, string>();
  for (const line of lines.slice(bounds.start + 1, bounds.end)) {
    const match = FIELD_LINE.exec(line);
    if (match?.[1] !== undefined && match[2] !== undefined) {
      fields.set(match[1].trim(), match[2].trim());
    }
  }

  const featureId = fields.get('Feature ID');
  const directory = fields.get('Directory');
  if (!featureId || !directory) return null;

  return {
    featureId,
    featureName: fields.get('Feature Name') ?? '',
    directory,
    updatedAt: fields.get('Last Updated') ?? '',
  };
}

/**
 * Replaces the active feature section, or adds one below `## Current State`
 * (or at the end) when the document has none.
 */
export function updateActiveFeature(content: string | null, feature: ActiveFeature): string {
  const lines = (content ?? DEFAULT_CONTEXT_DOCUMENT).split('\n');
  const block = renderActiveFeature(feature);
  const bounds = sectionBounds(lines);

  if (bounds) {
    lines.splice(bounds.start, bounds.end - bounds.start, ...block, '');
    return lines.join('\n');
  }

  const anchor = lines.findIndex(line => line.trim() === CURRENT_STATE_HEADING);
  if (anchor >= 0) {
    const next = lines[anchor + 1];
    const spacer = next === undefined || next === '' ? [] : [''];
    lines.splice(anchor + 1, 0, '', ...block, ...spacer);
    return lines.join('\n');
  }

  if (lines[lines.length - 1] !== '') {
    lines.push('');
  }
  lines.push(...block, '');
  return lines.join('\n');
}
