export type {
  ITemplateProvider,
  ResolvedTemplate,
  TemplateKind,
  TemplatePlaceholder,
  TemplateProviderDependencies,
  TemplateValues,
} from './template_provider.types';
export { TemplateProvider, fillTemplate } from './template_provider';
export { DEFAULT_TEMPLATES } from './default_templates';
