import { describe, expect, it } from 'vitest';
import fc from 'fast-check';
import {
  DEFAULT_CONFIG,
  EnvCoercionError,
  applyEnvOverrides,
  getDefaultConfig,
  getEnvVarDocumentation,
  mergeConfig,
  parseConfig,
  readEnvOverrides,
} from './index.js';

describe('Environment Variable Overrides', () => {
  describe('readEnvOverrides', () => {
    it('should split comma-separated definition paths', () => {
      const result = readEnvOverrides({
        INTERVIEW_ENGINE_DEFINITIONS_PATHS: 'interviews, extra/upgrade.yaml,,',
      });

      expect(result.overrides.definitions?.paths).toEqual(['interviews', 'extra/upgrade.yaml']);
      expect(result.appliedVars).toEqual(['INTERVIEW_ENGINE_DEFINITIONS_PATHS']);
    });

    it('should read every supported variable', () => {
      const result = readEnvOverrides({
        INTERVIEW_ENGINE_DEFINITIONS_PATHS: 'a.yaml',
        INTERVIEW_ENGINE_DEFINITIONS_STRICT_PATHS: 'on',
        INTERVIEW_ENGINE_SESSION_SECRET: 'test-secret-0123456789',
        INTERVIEW_ENGINE_SESSION_PREVIOUS_SECRETS: 'old-secret-0123456789',
        INTERVIEW_ENGINE_SESSION_TOKEN_TTL_SECONDS: ' 600 ',
        INTERVIEW_ENGINE_DEBUG: 'YES',
      });

      expect(result.overrides).toEqual({
        definitions: { paths: ['a.yaml'], strict_paths: true },
        session: {
          secret: 'test-secret-0123456789',
          previous_secrets: ['old-secret-0123456789'],
          token_ttl_seconds: 600,
        },
        logging: { debug: true },
      });
      expect(result.appliedVars).toHaveLength(6);
    });

    it('should ignore empty and unrelated variables', () => {
      const result = readEnvOverrides({
        INTERVIEW_ENGINE_SESSION_SECRET: '',
        HOME: '/home/test',
      });

      expect(result.overrides).toEqual({});
      expect(result.appliedVars).toEqual([]);
    });

    it.each([
      ['INTERVIEW_ENGINE_DEBUG', 'maybe', 'boolean'],
      ['INTERVIEW_ENGINE_DEFINITIONS_STRICT_PATHS', '2', 'boolean'],
      ['INTERVIEW_ENGINE_SESSION_TOKEN_TTL_SECONDS', '1.5', 'integer'],
      ['INTERVIEW_ENGINE_SESSION_TOKEN_TTL_SECONDS', 'soon', 'integer'],
      ['INTERVIEW_ENGINE_SESSION_TOKEN_TTL_SECONDS', '   ', 'integer'],
    ])('should reject %s=%j as %s', (envVar, value, expectedType) => {
      try {
        readEnvOverrides({ [envVar]: value });
        expect.unreachable();
      } catch (error) {
        expect(error).toBeInstanceOf(EnvCoercionError);
        if (error instanceof EnvCoercionError) {
          expect(error.envVar).toBe(envVar);
          expect(error.rawValue).toBe(value);
          expect(error.expectedType).toBe(expectedType);
        }
      }
    });

    it('should collect coercion errors when asked', () => {
      const result = readEnvOverrides(
        { INTERVIEW_ENGINE_DEBUG: 'maybe', INTERVIEW_ENGINE_SESSION_SECRET: 'test-secret-0123456789' },
        { collectErrors: true }
      );

      expect(result.errors.map((e) => e.envVar)).toEqual(['INTERVIEW_ENGINE_DEBUG']);
      expect(result.overrides.session?.secret).toBe('test-secret-0123456789');
    });

    it('should coerce every accepted boolean spelling', () => {
      fc.assert(
        fc.property(
          fc.constantFrom('true', '1', 'yes', 'on', 'false', '0', 'no', 'off'),
          fc.boolean(),
          (word, upper) => {
            const raw = upper ? word.toUpperCase() : word;
            const result = readEnvOverrides({ INTERVIEW_ENGINE_DEBUG: raw });
            expect(result.overrides.logging?.debug).toBe(['true', '1', 'yes', 'on'].includes(word));
          }
        )
      );
    });
  });

  describe('applyEnvOverrides', () => {
    it('should take precedence over file values', () => {
      const fromFile = parseConfig(`
[session]
secret = "file-secret-0123456789"
token_ttl_seconds = 60
`);

      const config = applyEnvOverrides(fromFile, {
        INTERVIEW_ENGINE_SESSION_SECRET: 'env-secret-0123456789',
      });

      expect(config.session.secret).toBe('env-secret-0123456789');
      expect(config.session.token_ttl_seconds).toBe(60);
    });

    it('should leave the configuration unchanged without variables', () => {
      expect(applyEnvOverrides(getDefaultConfig(), {})).toEqual(DEFAULT_CONFIG);
    });
  });

  describe('mergeConfig', () => {
    it('should merge each section shallowly', () => {
      const merged = mergeConfig(DEFAULT_CONFIG, { logging: { debug: true } });

      expect(merged.logging.debug).toBe(true);
      expect(merged.definitions).toEqual(DEFAULT_CONFIG.definitions);
    });
  });

  describe('getEnvVarDocumentation', () => {
    it('should document every variable', () => {
      expect(Object.keys(getEnvVarDocumentation())).toEqual([
        'INTERVIEW_ENGINE_DEFINITIONS_PATHS',
        'INTERVIEW_ENGINE_DEFINITIONS_STRICT_PATHS',
        'INTERVIEW_ENGINE_SESSION_SECRET',
        'INTERVIEW_ENGINE_SESSION_PREVIOUS_SECRETS',
        'INTERVIEW_ENGINE_SESSION_TOKEN_TTL_SECONDS',
        'INTERVIEW_ENGINE_DEBUG',
      ]);
    });
  });
});
