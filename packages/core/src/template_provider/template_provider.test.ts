import { TemplateProvider, fillTemplate } from './template_provider';
import { DEFAULT_TEMPLATES } from './default_templates';
import { MemoryFileLister } from '../file_lister/memory';
import { parse } from '../progress_calculator';

describe('fillTemplate', () => {
  it('should substitute known placeholders', () => {
    expect(fillTemplate('# {{ARTIFACT_ID}}: {{ TITLE }} ({{FEATURE_ID}})', {
      ARTIFACT_ID: 'spec-002',
      TITLE: 'Login',
      FEATURE_ID: '001',
    })).toBe('# spec-002: Login (001)');
  });

  it('should render missing values as empty and keep unknown tokens', () => {
    expect(fillTemplate('[{{SERVICE}}] {{OWNER}}', {})).toBe('[] {{OWNER}}');
  });
});

describe('TemplateProvider', () => {
  it('should fall back to the built-in template', async () => {
    const provider = new TemplateProvider({ lister: new MemoryFileLister(), templatesDir: 'templates' });

    const template = await provider.getTemplate('plan');

    expect(template).toEqual({ kind: 'plan', content: DEFAULT_TEMPLATES.plan, source: 'builtin' });
  });

  it('should prefer the project override', async () => {
    const lister = new MemoryFileLister({ files: { 'templates/spec.md': '# {{TITLE}} for {{FEATURE_NAME}}\n' } });
    const provider = new TemplateProvider({ lister, templatesDir: 'templates' });

    expect(await provider.getTemplate('spec')).toEqual({
      kind: 'spec',
      content: '# {{TITLE}} for {{FEATURE_NAME}}\n',
      source: 'project',
      path: 'templates/spec.md',
    });
    expect(await provider.render('spec', { TITLE: 'Login', FEATURE_NAME: 'user-auth' })).toBe(
      '# Login for user-auth\n'
    );
  });

  it('should render a default task list the parser understands', async () => {
    const provider = new TemplateProvider({ lister: new MemoryFileLister(), templatesDir: 'templates' });

    const content = await provider.render('task', { TITLE: 'Create schema', FEATURE_NAME: 'user-auth' });
    const result = parse(content);

    expect(result.issues).toEqual([]);
    expect(result.records.map(record => [record.taskId, record.status, record.dependsOn])).toEqual([
      ['T001', 'pending', []],
      ['T002', 'pending', ['T001']],
    ]);
    expect(result.records[0]?.title).toBe('Create schema');
  });
});
