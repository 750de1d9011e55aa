import {
  sanitizeName,
  formatArtifactNumber,
  renderArtifactName,
  servicePrefix,
  parseFeatureDirName,
} from './id_generator';
import { InvalidNameError } from '../id_allocator/id_allocator.errors';

describe('ID Generators', () => {
  describe('sanitizeName', () => {
    it('should turn punctuation and spaces into single hyphens', () => {
      expect(sanitizeName('Hello, World!! 2024')).toBe('hello-world-2024');
    });

    it('should collapse repeated hyphens and trim them from both ends', () => {
      expect(sanitizeName('--User   Auth--')).toBe('user-auth');
      expect(sanitizeName('a---b')).toBe('a-b');
    });

    it('should keep already clean slugs unchanged', () => {
      expect(sanitizeName('user-auth-2')).toBe('user-auth-2');
    });

    it('should reject names with no usable characters', () => {
      expect(() => sanitizeName('🚀🚀')).toThrow(InvalidNameError);
      expect(() => sanitizeName('!!!')).toThrow(/Invalid name "!!!"/);
      expect(() => sanitizeName('')).toThrow(InvalidNameError);
    });
  });

  describe('formatArtifactNumber', () => {
    it('should pad to the requested width', () => {
      expect(formatArtifactNumber(3)).toBe('003');
      expect(formatArtifactNumber(3, 4)).toBe('0003');
    });

    it('should never truncate numbers wider than the width', () => {
      expect(formatArtifactNumber(1043, 3)).toBe('1043');
    });
  });

  describe('renderArtifactName', () => {
    it('should render files, feature directories and service tasks', () => {
      expect(renderArtifactName('spec-', 3, 3, { extension: '.md' })).toBe('spec-003.md');
      expect(renderArtifactName('', 7, 3, { slug: 'user-auth' })).toBe('007-user-auth');
      expect(renderArtifactName('AUTH-T', 12, 3, { extension: '.md' })).toBe('AUTH-T012.md');
    });
  });

  describe('servicePrefix', () => {
    it('should accept upper-case codes', () => {
      expect(servicePrefix('AUTH')).toBe('AUTH-T');
    });

    it('should reject anything else', () => {
      expect(() => servicePrefix('auth')).toThrow(InvalidNameError);
      expect(() => servicePrefix('AUTH2')).toThrow(InvalidNameError);
      expect(() => servicePrefix('')).toThrow(InvalidNameError);
    });
  });

  describe('parseFeatureDirName', () => {
    it('should split number and slug', () => {
      expect(parseFeatureDirName('007-user-auth')).toEqual({ number: 7, slug: 'user-auth' });
      expect(parseFeatureDirName('1042')).toEqual({ number: 1042, slug: '' });
    });

    it('should return null for non-feature names', () => {
      expect(parseFeatureDirName('README.md')).toBeNull();
      expect(parseFeatureDirName('decomposition')).toBeNull();
    });
  });
});
