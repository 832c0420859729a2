import { describe, expect, it } from 'vitest';
import fc from 'fast-check';
import {
  EnvCoercionError,
  applyEnvOverrides,
  getEnvVarDocumentation,
  readEnvOverrides,
} from './env.js';

describe('Environment overrides', () => {
  describe('readEnvOverrides', () => {
    it('should return an empty layer for an empty environment', () => {
      expect(readEnvOverrides({})).toEqual({ overrides: {}, appliedVars: [], errors: [] });
    });

    it('should ignore unrelated and empty variables', () => {
      const result = readEnvOverrides({ PATH: '/usr/bin', CHECKOPTS_QUIET: '' });

      expect(result.overrides).toEqual({});
      expect(result.appliedVars).toEqual([]);
    });

    it('should coerce numeric variables', () => {
      const result = readEnvOverrides({ CHECKOPTS_MAX_WORKERS: '4', CHECKOPTS_MERGE_TIMEOUT: '2.5' });

      expect(result.overrides).toEqual({ maxWorkers: 4, mergeTimeout: 2.5 });
      expect(result.appliedVars).toEqual(['CHECKOPTS_MAX_WORKERS', 'CHECKOPTS_MERGE_TIMEOUT']);
    });

    it('should let the full variable win over its shortcut', () => {
      const result = readEnvOverrides({ CHECKOPTS_WORKERS: '2', CHECKOPTS_MAX_WORKERS: '8' });

      expect(result.overrides.maxWorkers).toBe(8);
      expect(result.appliedVars).toEqual(['CHECKOPTS_WORKERS', 'CHECKOPTS_MAX_WORKERS']);
    });

    it('should accept boolean spellings case-insensitively', () => {
      const result = readEnvOverrides({
        CHECKOPTS_QUIET: 'YES',
        CHECKOPTS_PROFILE: 'off',
        CHECKOPTS_LAZY_MODE: ' 1 ',
      });

      expect(result.overrides).toEqual({ lazyMode: true, quiet: true, profile: false });
    });

    it('should keep string variables verbatim', () => {
      const result = readEnvOverrides({ CHECKOPTS_ROOT: '/work/app', CHECKOPTS_CONFIG_NAME: '.custom' });

      expect(result.overrides).toEqual({ root: '/work/app', configName: '.custom' });
    });

    it('should accept declared enum variants', () => {
      const result = readEnvOverrides({
        CHECKOPTS_SAVED_STATE_FETCHER: 'remote',
        CHECKOPTS_COMPONENT_SYNTAX: 'full',
      });

      expect(result.overrides).toEqual({ savedStateFetcher: 'remote', componentSyntax: 'full' });
    });

    it('should throw on an invalid boolean', () => {
      expect(() => readEnvOverrides({ CHECKOPTS_QUIET: 'maybe' })).toThrow(
        "Cannot coerce 'CHECKOPTS_QUIET' value 'maybe' to boolean. Expected one of: true, 1, yes, on, false, 0, no, off"
      );
    });

    it('should throw on a non-numeric number', () => {
      expect(() => readEnvOverrides({ CHECKOPTS_TRACES: 'abc' })).toThrow(
        "Cannot coerce environment variable 'CHECKOPTS_TRACES' value 'abc' to number"
      );
    });

    it('should throw on a blank number', () => {
      expect(() => readEnvOverrides({ CHECKOPTS_TRACES: '  ' })).toThrow("Empty value for 'CHECKOPTS_TRACES'");
    });

    it('should describe the accepted variants of an enum', () => {
      const { errors } = readEnvOverrides({ CHECKOPTS_SAVED_STATE_FETCHER: 'ftp' }, { collectErrors: true });

      expect(errors).toHaveLength(1);
      expect(errors[0]).toBeInstanceOf(EnvCoercionError);
      expect(errors[0]?.envVar).toBe('CHECKOPTS_SAVED_STATE_FETCHER');
      expect(errors[0]?.rawValue).toBe('ftp');
      expect(errors[0]?.expectedType).toBe('one of dummy, local, scm, remote');
    });

    it('should collect errors and keep applying valid variables', () => {
      const result = readEnvOverrides(
        { CHECKOPTS_QUIET: 'maybe', CHECKOPTS_TRACES: 'x', CHECKOPTS_DEBUG: 'true' },
        { collectErrors: true }
      );

      expect(result.errors.map((e) => e.envVar)).toEqual(['CHECKOPTS_TRACES', 'CHECKOPTS_QUIET']);
      expect(result.overrides).toEqual({ debug: true });
      expect(result.appliedVars).toEqual(['CHECKOPTS_DEBUG']);
    });

    it('should round-trip any integer worker count', () => {
      fc.assert(
        fc.property(fc.integer({ min: 1, max: 100000 }), (count) => {
          return readEnvOverrides({ CHECKOPTS_MAX_WORKERS: String(count) }).overrides.maxWorkers === count;
        })
      );
    });
  });

  describe('applyEnvOverrides', () => {
    it('should layer environment values over the input', () => {
      const result = applyEnvOverrides({ maxWorkers: 2, quiet: false }, { CHECKOPTS_QUIET: '1' });

      expect(result.maxWorkers).toBe(2);
      expect(result.quiet).toBe(true);
    });

    it('should leave the input unchanged without overrides', () => {
      expect(applyEnvOverrides({ maxWorkers: 2 }, {}).maxWorkers).toBe(2);
    });
  });

  describe('getEnvVarDocumentation', () => {
    it('should document every variable with its type', () => {
      const docs = getEnvVarDocumentation();

      expect(docs.CHECKOPTS_MAX_WORKERS?.type).toBe('number');
      expect(docs.CHECKOPTS_QUIET?.type).toBe('boolean');
      expect(docs.CHECKOPTS_ROOT?.type).toBe('string');
      expect(docs.CHECKOPTS_SAVED_STATE_FETCHER?.type).toBe('enum');
      expect(docs.CHECKOPTS_SAVED_STATE_FETCHER?.description).toBe(
        'Saved state source (dummy, local, scm, remote)'
      );
    });

    it('should only list prefixed variables', () => {
      expect(Object.keys(getEnvVarDocumentation()).every((name) => name.startsWith('CHECKOPTS_'))).toBe(true);
    });
  });
});
