import { InvalidNameError } from '../id_allocator/id_allocator.errors';

/**
 * Default zero-padding for artifact numbers (001, 002, ...).
 */
export const DEFAULT_NUMBER_WIDTH = 3;

const SERVICE_CODE_PATTERN = /^[A-Z]+$/;

/**
 * Turns a human feature name into a directory slug (e.g., 'Hello, World!! 2024' -> 'hello-world-2024').
 * @throws InvalidNameError when nothing usable remains
 */
export function sanitizeName(raw: string): string {
  const slug = raw
    .toLowerCase()
    .replace(/[^a-z0-9-]+/g, '-')
    .replace(/-{2,}/g, '-')
    .replace(/^-+|-+$/g, '');

  if (!slug) {
    throw new InvalidNameError(raw, 'no letters or digits left after sanitizing');
  }
  return slug;
}

/**
 * Zero-pads a number to `width` digits; longer numbers are kept whole.
 */
export function formatArtifactNumber(value: number, width: number = DEFAULT_NUMBER_WIDTH): string {
  return String(value).padStart(width, '0');
}

/**
 * Renders an artifact name such as 'spec-003.md', '007-user-auth' or 'AUTH-T012.md'.
 */
export function renderArtifactName(
  prefix: string,
  value: number,
  width: number = DEFAULT_NUMBER_WIDTH,
  parts: { slug?: string; extension?: string } = {}
): string {
  const slug = parts.slug ? `-${parts.slug}` : '';
  return `${prefix}${formatArtifactNumber(value, width)}${slug}${parts.extension ?? ''}`;
}

/**
 * Returns the filename prefix for service-scoped task lists ('AUTH' -> 'AUTH-T').
 * @throws InvalidNameError unless the code is upper-case letters only
 */
export function servicePrefix(serviceCode: string): string {
  if (!SERVICE_CODE_PATTERN.test(serviceCode)) {
    throw new InvalidNameError(serviceCode, 'service codes must be upper-case letters only (e.g., AUTH)');
  }
  return `${serviceCode}-T`;
}

/**
 * Splits a feature directory name ('007-user-auth') into number and slug.
 */
export function parseFeatureDirName(dirName: string): { number: number; slug: string } | null {
  const match = dirName.match(/^(\d+)(?:-(.*))?$/);
  if (!match || !match[1]) {
    return null;
  }
  return {
    number: parseInt(match[1], 10),
    slug: match[2] ?? '',
  };
}
