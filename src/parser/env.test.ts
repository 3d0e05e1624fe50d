import { describe, expect, it } from 'vitest';
import fc from 'fast-check';
import * as path from 'node:path';
import {
  EnvCoercionError,
  envLookupFrom,
  getEnvVarDocumentation,
  mergeParserOptions,
  readEnvOverrides,
  resolveParserOptions,
} from './env.js';
import { DEFAULT_PARSER_OPTIONS, getDefaultParserOptions } from './defaults.js';

describe('Environment Variable Overrides', () => {
  describe('readEnvOverrides', () => {
    describe('boolean switches', () => {
      it('should read CFGPP_EXPAND_ENV_VARS', () => {
        const result = readEnvOverrides({ CFGPP_EXPAND_ENV_VARS: 'false' });

        expect(result.overrides.expandEnvVars).toBe(false);
        expect(result.appliedVars).toEqual(['CFGPP_EXPAND_ENV_VARS']);
        expect(result.errors).toEqual([]);
      });

      it('should accept boolean words case-insensitively', () => {
        expect(readEnvOverrides({ CFGPP_PROCESS_INCLUDES: 'YES' }).overrides.processIncludes).toBe(true);
        expect(readEnvOverrides({ CFGPP_PROCESS_INCLUDES: ' Off ' }).overrides.processIncludes).toBe(false);
        expect(readEnvOverrides({ CFGPP_PROCESS_INCLUDES: '1' }).overrides.processIncludes).toBe(true);
      });

      it('should reject other words', () => {
        expect(() => readEnvOverrides({ CFGPP_EXPAND_ENV_VARS: 'maybe' })).toThrow(
          "Cannot coerce 'CFGPP_EXPAND_ENV_VARS' value 'maybe' to boolean. Expected one of: true, 1, yes, on, false, 0, no, off"
        );
      });
    });

    describe('CFGPP_MAX_INCLUDE_DEPTH', () => {
      it('should coerce non-negative integers', () => {
        expect(readEnvOverrides({ CFGPP_MAX_INCLUDE_DEPTH: '3' }).overrides.maxIncludeDepth).toBe(3);
        expect(readEnvOverrides({ CFGPP_MAX_INCLUDE_DEPTH: '0' }).overrides.maxIncludeDepth).toBe(0);
      });

      it('should reject fractional, negative and non-numeric values', () => {
        for (const raw of ['2.5', '-1', 'deep']) {
          expect(() => readEnvOverrides({ CFGPP_MAX_INCLUDE_DEPTH: raw })).toThrow(
            `Cannot coerce environment variable 'CFGPP_MAX_INCLUDE_DEPTH' value '${raw}' to non-negative integer`
          );
        }
      });

      it('should reject whitespace-only values', () => {
        expect(() => readEnvOverrides({ CFGPP_MAX_INCLUDE_DEPTH: '   ' })).toThrow(
          "Empty value for 'CFGPP_MAX_INCLUDE_DEPTH'"
        );
      });

      it('should coerce every natural number to itself', () => {
        fc.assert(
          fc.property(fc.nat(), (n) => {
            expect(readEnvOverrides({ CFGPP_MAX_INCLUDE_DEPTH: String(n) }).overrides.maxIncludeDepth).toBe(n);
          })
        );
      });
    });

    describe('CFGPP_INCLUDE_PATH', () => {
      it('should split on the platform delimiter and drop empty entries', () => {
        const raw = ['conf', '', ' shared ', '/etc/app'].join(path.delimiter);
        expect(readEnvOverrides({ CFGPP_INCLUDE_PATH: raw }).overrides.includePaths).toEqual([
          'conf',
          'shared',
          '/etc/app',
        ]);
      });
    });

    it('should ignore unset and empty variables', () => {
      const result = readEnvOverrides({ CFGPP_EXPAND_ENV_VARS: '', OTHER: 'x' });
      expect(result.overrides).toEqual({});
      expect(result.appliedVars).toEqual([]);
    });

    it('should collect coercion errors when asked to', () => {
      const result = readEnvOverrides(
        {
          CFGPP_EXPAND_ENV_VARS: 'maybe',
          CFGPP_PROCESS_INCLUDES: 'off',
          CFGPP_MAX_INCLUDE_DEPTH: 'x',
        },
        { collectErrors: true }
      );

      expect(result.overrides).toEqual({ processIncludes: false });
      expect(result.appliedVars).toEqual(['CFGPP_PROCESS_INCLUDES']);
      expect(result.errors.map((error) => error.envVar)).toEqual([
        'CFGPP_EXPAND_ENV_VARS',
        'CFGPP_MAX_INCLUDE_DEPTH',
      ]);
      expect(result.errors[0]).toBeInstanceOf(EnvCoercionError);
      expect(result.errors[1]?.rawValue).toBe('x');
      expect(result.errors[1]?.expectedType).toBe('non-negative integer');
    });
  });

  describe('resolveParserOptions', () => {
    it('should return the defaults for an empty environment', () => {
      expect(resolveParserOptions({}, {})).toEqual(DEFAULT_PARSER_OPTIONS);
    });

    it('should apply explicit options over env over defaults', () => {
      const options = resolveParserOptions(
        { maxIncludeDepth: 2 },
        { CFGPP_MAX_INCLUDE_DEPTH: '5', CFGPP_PROCESS_INCLUDES: '0' }
      );

      expect(options).toEqual({
        expandEnvVars: true,
        processIncludes: false,
        maxIncludeDepth: 2,
        includePaths: ['.'],
        syntaxOnly: false,
      });
    });

    it('should throw on bad environment values', () => {
      expect(() => resolveParserOptions({}, { CFGPP_PROCESS_INCLUDES: 'sometimes' })).toThrow(
        EnvCoercionError
      );
    });
  });

  describe('mergeParserOptions', () => {
    it('should copy the include path list', () => {
      const merged = mergeParserOptions(DEFAULT_PARSER_OPTIONS, { syntaxOnly: true });
      expect(merged.syntaxOnly).toBe(true);
      expect(merged.includePaths).toEqual(DEFAULT_PARSER_OPTIONS.includePaths);
      expect(merged.includePaths).not.toBe(DEFAULT_PARSER_OPTIONS.includePaths);
    });
  });

  describe('getDefaultParserOptions', () => {
    it('should return a fresh copy of the defaults', () => {
      const options = getDefaultParserOptions();
      expect(options).toEqual(DEFAULT_PARSER_OPTIONS);
      expect(options.includePaths).not.toBe(DEFAULT_PARSER_OPTIONS.includePaths);
    });
  });

  describe('envLookupFrom', () => {
    it('should read from the given record', () => {
      const lookup = envLookupFrom({ TEST_VAR: 'x' });
      expect(lookup('TEST_VAR')).toBe('x');
      expect(lookup('MISSING')).toBeUndefined();
    });
  });

  describe('getEnvVarDocumentation', () => {
    it('should document every supported variable', () => {
      const docs = getEnvVarDocumentation();
      expect(Object.keys(docs)).toEqual([
        'CFGPP_EXPAND_ENV_VARS',
        'CFGPP_PROCESS_INCLUDES',
        'CFGPP_MAX_INCLUDE_DEPTH',
        'CFGPP_INCLUDE_PATH',
      ]);
      expect(docs.CFGPP_MAX_INCLUDE_DEPTH?.type).toBe('integer');
      expect(docs.CFGPP_INCLUDE_PATH?.type).toBe('path list');
    });
  });
});
