import { describe, expect, it } from 'vitest';
import {
  ConfigValidationError,
  assertConfigValid,
  getDefaultConfig,
  mergeConfig,
  validateConfig,
  type Config,
  type PathChecker,
} from './index.js';

function configWith(overrides: Parameters<typeof mergeConfig>[1]): Config {
  return mergeConfig(getDefaultConfig(), {
    ...overrides,
    session: { secret: 'test-secret-0123456789', ...overrides.session },
  });
}

describe('Config Validator', () => {
  describe('validateConfig', () => {
    it('should accept a configuration with a secret', () => {
      expect(validateConfig(configWith({}))).toEqual({ valid: true, errors: [] });
    });

    it('should require a secret by default', () => {
      const result = validateConfig(getDefaultConfig());

      expect(result.valid).toBe(false);
      expect(result.errors).toEqual([
        {
          field: 'session.secret',
          value: '<0 characters>',
          message: "'session.secret' must be at least 16 characters",
        },
      ]);
    });

    it('should skip the secret check when not required', () => {
      expect(validateConfig(getDefaultConfig(), { requireSecret: false }).valid).toBe(true);
    });

    it('should never echo a short secret', () => {
      const result = validateConfig(configWith({ session: { secret: 'short' } }));

      expect(result.errors[0]?.value).toBe('<5 characters>');
    });

    it('should check previous secrets too', () => {
      const result = validateConfig(configWith({ session: { previous_secrets: ['tiny'] } }));

      expect(result.errors.map((e) => e.field)).toEqual(['session.previous_secrets[0]']);
    });

    it('should reject a negative or fractional TTL', () => {
      expect(
        validateConfig(configWith({ session: { token_ttl_seconds: -1 } })).errors[0]?.message
      ).toBe("'session.token_ttl_seconds' must be a non-negative integer, got -1");
      expect(
        validateConfig(configWith({ session: { token_ttl_seconds: 2.5 } })).errors[0]?.field
      ).toBe('session.token_ttl_seconds');
    });

    it('should require at least one definitions path', () => {
      const result = validateConfig(configWith({ definitions: { paths: [] } }));

      expect(result.errors.map((e) => e.field)).toEqual(['definitions.paths']);
    });

    it('should check definition paths with the given checker', () => {
      const checked: string[] = [];
      const pathChecker: PathChecker = (path) => {
        checked.push(path);
        return path === 'interviews' ? { exists: true } : { exists: false };
      };

      const result = validateConfig(
        configWith({ definitions: { paths: ['interviews', 'missing.yaml'] } }),
        { pathChecker }
      );

      expect(checked).toEqual(['interviews', 'missing.yaml']);
      expect(result.errors).toEqual([
        {
          field: 'definitions.paths[1]',
          value: 'missing.yaml',
          message: "Path does not exist: 'missing.yaml'",
        },
      ]);
    });
  });

  describe('assertConfigValid', () => {
    it('should not throw for a valid configuration', () => {
      expect(() => {
        assertConfigValid(configWith({}));
      }).not.toThrow();
    });

    it('should throw ConfigValidationError listing every error', () => {
      const config = configWith({
        definitions: { paths: [] },
        session: { secret: '', token_ttl_seconds: -5 },
      });

      try {
        assertConfigValid(config);
        expect.unreachable();
      } catch (error) {
        expect(error).toBeInstanceOf(ConfigValidationError);
        if (error instanceof ConfigValidationError) {
          expect(error.errors).toHaveLength(3);
          expect(error.message).toMatch(/^Configuration validation failed with 3 error\(s\):\n/);
        }
      }
    });
  });
});
