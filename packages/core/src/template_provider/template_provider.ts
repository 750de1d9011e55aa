/**
 * TemplateProvider - Markdown templates for new artifacts
 *
 * A project may override any template by placing `{kind}.md` in its
 * templates directory; otherwise the built-in default is used.
 */

import type {
  ITemplateProvider,
  ResolvedTemplate,
  TemplateKind,
  TemplatePlaceholder,
  TemplateProviderDependencies,
  TemplateValues,
} from './template_provider.types';
import type { FileLister } from '../file_lister';
import { DEFAULT_TEMPLATES } from './default_templates';
import { joinPosix } from '../utils/path_guard';
import { createLogger } from '../logger';

const logger = createLogger('[TemplateProvider] ');

const PLACEHOLDER = /\{\{\s*([A-Z_]+)\s*\}\}/g;

const KNOWN_PLACEHOLDERS: ReadonlySet<string> = new Set<TemplatePlaceholder>([
  'FEATURE_ID',
  'FEATURE_NAME',
  'ARTIFACT_ID',
  'TITLE',
  'DATE',
  'SERVICE',
]);

function isPlaceholder(name: string): name is TemplatePlaceholder {
  return KNOWN_PLACEHOLDERS.has(name);
}

/**
 * Substitutes known placeholders. Unknown `{{TOKENS}}` are left untouched so
 * project templates can carry their own markers.
 */
export function fillTemplate(template: string, values: TemplateValues): string {
  return template.replace(PLACEHOLDER, (token: string, name: string) => {
    if (!isPlaceholder(name)) return token;
    return values[name] ?? '';
  });
}

export class TemplateProvider implements ITemplateProvider {
  private readonly lister: FileLister;
  private readonly templatesDir: string;

  constructor(dependencies: TemplateProviderDependencies) {
    this.lister = dependencies.lister;
    this.templatesDir = dependencies.templatesDir;
  }

  async getTemplate(kind: TemplateKind): Promise<ResolvedTemplate> {
    const overridePath = joinPosix(this.templatesDir, `${kind}.md`);
    if (await this.lister.exists(overridePath)) {
      logger.debug(`Using project template ${overridePath}`);
      return { kind, content: await this.lister.read(overridePath), source: 'project', path: overridePath };
    }
    return { kind, content: DEFAULT_TEMPLATES[kind], source: 'builtin' };
  }

  async render(kind: TemplateKind, values: TemplateValues): Promise<string> {
    const template = await this.getTemplate(kind);
    return fillTemplate(template.content, values);
  }
}
