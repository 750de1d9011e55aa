import type { FileLister } from '../file_lister';

export type TemplateKind = 'spec' | 'plan' | 'task';

export type TemplatePlaceholder =
  | 'FEATURE_ID'
  | 'FEATURE_NAME'
  | 'ARTIFACT_ID'
  | 'TITLE'
  | 'DATE'
  | 'SERVICE';

/**
 * Values substituted into `{{PLACEHOLDER}}` tokens. Missing values render as
 * an empty string.
 */
export type TemplateValues = Partial<Record<TemplatePlaceholder, string>>;

export type ResolvedTemplate = {
  kind: TemplateKind;
  content: string;
  /** 'project' when read from the templates directory */
  source: 'project' | 'builtin';
  /** Project-relative path of the override, when one was used */
  path?: string;
};

export type TemplateProviderDependencies = {
  lister: FileLister;
  /** Project-relative templates directory */
  templatesDir: string;
};

export interface ITemplateProvider {
  getTemplate(kind: TemplateKind): Promise<ResolvedTemplate>;
  render(kind: TemplateKind, values: TemplateValues): Promise<string>;
}
