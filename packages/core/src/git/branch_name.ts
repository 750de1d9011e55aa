const FORBIDDEN_CHARACTERS = /[\s~^:?*[\\\x00-\x1f\x7f]/;

/**
 * Returns why `name` cannot be used as a branch name, or null when it can.
 * A subset of git-check-ref-format that covers names built from feature slugs.
 */
export function branchNameProblem(name: string): string | null {
  if (name.length === 0) return 'name is empty';
  if (name.startsWith('-')) return 'name starts with "-"';
  if (FORBIDDEN_CHARACTERS.test(name)) return 'name contains whitespace or a reserved character';
  if (name.includes('..')) return 'name contains ".."';
  if (name.includes('@{')) return 'name contains "@{"';
  if (name.includes('//')) return 'name contains "//"';
  if (name.startsWith('/') || name.endsWith('/')) return 'name starts or ends with "/"';
  if (name.endsWith('.') || name.endsWith('.lock')) return 'name ends with "." or ".lock"';
  if (name === '@') return 'name is "@"';
  return null;
}
