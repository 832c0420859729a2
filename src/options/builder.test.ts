import { describe, expect, it } from 'vitest';
import fc from 'fast-check';
import { Logger } from '../utils/logger.js';
import {
  COMPONENT_SYNTAX_LEVELS,
  OptionsBuildError,
  buildOptions,
  createDefaultOptions,
  optionsFingerprint,
  type BuildOptionsSettings,
  type OptionsInput,
} from './index.js';

const HOST = { root: '/project', maxWorkers: 4, tempDir: '/tmp/checkopts-test' };
const SETTINGS: BuildOptionsSettings = { host: HOST, pathChecker: () => true };

/**
 * Parses JSON into an input so tests can hand the builder values its static
 * type would reject, as a config loader might.
 */
function untypedInput(json: string): OptionsInput {
  const input: OptionsInput = JSON.parse(json);
  return input;
}

function captureBuildError(input: OptionsInput, settings: BuildOptionsSettings = SETTINGS): OptionsBuildError {
  try {
    buildOptions(input, settings);
  } catch (error) {
    if (error instanceof OptionsBuildError) {
      return error;
    }
    throw error;
  }
  throw new Error('expected buildOptions to throw');
}

function captureLines(debugMode: boolean): { logger: Logger; lines: string[] } {
  const lines: string[] = [];
  const logger = new Logger({ component: 'test', debugMode, sink: (line) => lines.push(line) });
  return { logger, lines };
}

describe('buildOptions', () => {
  describe('defaults', () => {
    it('should equal the default record when the input is empty', () => {
      const options = buildOptions({}, SETTINGS);

      expect(options).toEqual(createDefaultOptions(HOST));
    });

    it('should derive host fields from the host defaults', () => {
      const options = buildOptions({}, SETTINGS);

      expect(options.root).toBe('/project');
      expect(options.maxWorkers).toBe(4);
      expect(options.tempDir).toBe('/tmp/checkopts-test');
      expect(options.logFile).toBe('/tmp/checkopts-test/project.log');
    });

    it('should derive the log file from an explicit root and temp dir', () => {
      const options = buildOptions({ root: '/work/app', tempDir: '/var/tmp/co' }, SETTINGS);

      expect(options.logFile).toBe('/var/tmp/co/work-app.log');
    });

    it('should keep an explicit log file', () => {
      const options = buildOptions({ logFile: '/var/log/checker.log' }, SETTINGS);

      expect(options.logFile).toBe('/var/log/checker.log');
    });

    it('should use documented constants for the numeric limits', () => {
      const options = buildOptions({}, SETTINGS);

      expect(options.maxFilesCheckedPerWorker).toBe(100);
      expect(options.maxSecondsForCheckPerWorker).toBe(5);
      expect(options.mergeTimeout).toBe(100);
      expect(options.recursionLimit).toBe(10000);
      expect(options.maxLiteralLength).toBe(100);
      expect(options.maxHeaderTokens).toBe(10);
      expect(options.traces).toBe(0);
    });
  });

  describe('immutability', () => {
    it('should freeze the record and its nested values', () => {
      const options = buildOptions(
        {
          componentSyntaxIncludes: ['src/'],
          moduleNameMappers: [['^a$', 'b']],
          format: { singleQuotes: true },
          jsx: { pragma: 'preact.h' },
        },
        SETTINGS
      );

      expect(Object.isFrozen(options)).toBe(true);
      expect(Object.isFrozen(options.componentSyntaxIncludes)).toBe(true);
      expect(Object.isFrozen(options.moduleNameMappers)).toBe(true);
      expect(Object.isFrozen(options.moduleNameMappers[0])).toBe(true);
      expect(Object.isFrozen(options.format)).toBe(true);
      expect(Object.isFrozen(options.jsx)).toBe(true);
      expect(Object.isFrozen(options.fileOptions.moduleFileExts)).toBe(true);
    });

    it('should reject writes to the record', () => {
      const options = buildOptions({}, SETTINGS);

      expect(Reflect.set(options, 'quiet', true)).toBe(false);
      expect(options.quiet).toBe(false);
      expect(Reflect.set(options.componentSyntaxIncludes, 0, 'x')).toBe(false);
    });

    it('should not be affected by later changes to the input arrays', () => {
      const includes = ['src/'];
      const options = buildOptions({ componentSyntaxIncludes: includes }, SETTINGS);

      includes.push('lib/');

      expect(options.componentSyntaxIncludes).toEqual(['src/']);
    });
  });

  describe('enums', () => {
    it('should accept every declared component syntax level', () => {
      fc.assert(
        fc.property(fc.constantFrom(...COMPONENT_SYNTAX_LEVELS), (componentSyntax) => {
          return buildOptions({ componentSyntax }, SETTINGS).componentSyntax === componentSyntax;
        })
      );
    });

    it('should reject an unknown variant with the accepted list', () => {
      const error = captureBuildError(untypedInput('{"componentSyntax":"partial"}'));

      expect(error.field).toBe('componentSyntax');
      expect(error.message).toBe(
        "Invalid value for 'componentSyntax': expected one of 'off', 'parsing', 'full', got 'partial'"
      );
    });

    it('should reject an unknown saved state fetcher', () => {
      const error = captureBuildError(untypedInput('{"savedStateFetcher":"ftp"}'));

      expect(error.message).toBe(
        "Invalid value for 'savedStateFetcher': expected one of 'dummy', 'local', 'scm', 'remote', got 'ftp'"
      );
    });

    it('should reject unknown lint rule names', () => {
      const error = captureBuildError(untypedInput('{"strictMode":["no-such-rule"]}'));

      expect(error.field).toBe('strictMode[0]');
    });
  });

  describe('field types and ranges', () => {
    it('should reject a non-boolean flag', () => {
      const error = captureBuildError(untypedInput('{"quiet":"yes"}'));

      expect(error.field).toBe('quiet');
      expect(error.message).toBe("Invalid type for 'quiet': expected boolean, got string");
    });

    it('should reject a worker count below one', () => {
      const error = captureBuildError({ maxWorkers: 0 });

      expect(error.message).toBe("Invalid value for 'maxWorkers': must be at least 1, got 0");
    });

    it('should reject a fractional worker count', () => {
      const error = captureBuildError({ maxWorkers: 2.5 });

      expect(error.message).toBe("Invalid type for 'maxWorkers': expected integer, got 2.5");
    });

    it('should reject a non-positive per-worker time budget', () => {
      const error = captureBuildError({ maxSecondsForCheckPerWorker: 0 });

      expect(error.message).toBe(
        "Invalid value for 'maxSecondsForCheckPerWorker': must be greater than 0, got 0"
      );
    });

    it('should reject a sampling rate above 100', () => {
      const error = captureBuildError({ logSaving: { slow_merge: { thresholdTimeMs: 10, rate: 150 } } });

      expect(error.field).toBe('logSaving.slow_merge.rate');
      expect(error.message).toBe("Invalid value for 'logSaving.slow_merge.rate': must be between 0 and 100, got 150");
    });

    it('should reject a zero GC window size', () => {
      const error = captureBuildError({ gcWorker: { windowSize: 0 } });

      expect(error.field).toBe('gcWorker.windowSize');
    });

    it('should reject an empty config name', () => {
      const error = captureBuildError({ configName: '' });

      expect(error.message).toBe("Invalid value for 'configName': must not be empty");
    });

    it('should accept any worker count of at least one', () => {
      fc.assert(
        fc.property(fc.integer({ min: 1, max: 4096 }), (maxWorkers) => {
          return buildOptions({ maxWorkers }, SETTINGS).maxWorkers === maxWorkers;
        })
      );
    });
  });

  describe('merge timeout', () => {
    it('should disable the timeout for null', () => {
      expect(buildOptions({ mergeTimeout: null }, SETTINGS).mergeTimeout).toBeUndefined();
    });

    it('should keep an explicit timeout, including zero', () => {
      expect(buildOptions({ mergeTimeout: 30 }, SETTINGS).mergeTimeout).toBe(30);
      expect(buildOptions({ mergeTimeout: 0 }, SETTINGS).mergeTimeout).toBe(0);
    });

    it('should reject a negative timeout', () => {
      expect(captureBuildError({ mergeTimeout: -1 }).field).toBe('mergeTimeout');
    });
  });

  describe('root', () => {
    it('should reject a root that is not an existing directory', () => {
      const error = captureBuildError({ root: '/missing' }, { host: HOST, pathChecker: () => false });

      expect(error.field).toBe('root');
      expect(error.message).toBe("Invalid value for 'root': '/missing' is not an existing directory");
    });

    it('should check the root it will store', () => {
      const checked: string[] = [];
      buildOptions({ root: '/work/app' }, { host: HOST, pathChecker: (p) => checked.push(p) > 0 });

      expect(checked).toEqual(['/work/app']);
    });
  });

  describe('patterns', () => {
    it('should compile string sources in order', () => {
      const options = buildOptions(
        {
          moduleNameMappers: [
            ['^a', 'first'],
            ['^b', 'second'],
          ],
        },
        SETTINGS
      );

      expect(options.moduleNameMappers.map((entry) => [entry.source, entry.value])).toEqual([
        ['^a', 'first'],
        ['^b', 'second'],
      ]);
    });

    it('should report an invalid regular expression with its location', () => {
      const error = captureBuildError({ moduleNameMappers: [['(', 'x']] });

      expect(error.field).toBe('moduleNameMappers[0][0]');
      expect(error.message.startsWith("Invalid regular expression for 'moduleNameMappers[0][0]': ")).toBe(true);
      expect(error.cause).toBeInstanceOf(SyntaxError);
    });

    it('should report a malformed pattern entry', () => {
      const error = captureBuildError(untypedInput('{"hasteNameReducers":[["^a"]]}'));

      expect(error.message).toBe(
        "Invalid value for 'hasteNameReducers[0]': expected [pattern, value], got 1 elements"
      );
    });

    it('should strip stateful flags and keep the others', () => {
      const options = buildOptions({ relayIntegrationExcludes: [/generated/giy] }, SETTINGS);

      expect(options.relayIntegrationExcludes[0]?.pattern.flags).toBe('i');
      expect(options.relayIntegrationExcludes[0]?.source).toBe('generated');
    });

    it('should warn when stripping flags', () => {
      const { logger, lines } = captureLines(false);

      buildOptions({ moduleNameMappers: [[/^foo/g, 'bar']] }, { ...SETTINGS, logger });

      expect(lines).toHaveLength(1);
      const entry: unknown = JSON.parse(lines[0] ?? '');
      expect(entry).toMatchObject({
        level: 'warn',
        component: 'OptionsBuilder',
        event: 'pattern_flags_stripped',
        data: { field: 'moduleNameMappers[0][0]', pattern: '^foo', flags: 'g' },
      });
    });

    it('should compile file option patterns', () => {
      const options = buildOptions({ fileOptions: { ignores: ['\\.test\\.js$'] } }, SETTINGS);

      expect(options.fileOptions.ignores.map((p) => p.source)).toEqual(['\\.test\\.js$']);
      expect(options.fileOptions.moduleFileExts).toEqual(['.js', '.jsx', '.mjs', '.cjs', '.json']);
    });
  });

  describe('jsx', () => {
    it('should split a pragma into its member path', () => {
      expect(buildOptions({ jsx: { pragma: 'preact.h' } }, SETTINGS).jsx).toEqual({
        kind: 'pragma',
        pragma: 'preact.h',
        reference: ['preact', 'h'],
      });
    });

    it('should accept react mode', () => {
      expect(buildOptions({ jsx: 'react' }, SETTINGS).jsx).toEqual({ kind: 'react' });
    });

    it('should reject a bare pragma string outside the pragma record', () => {
      const error = captureBuildError(untypedInput('{"jsx": "preact.h"}'));

      expect(error.field).toBe('jsx');
      expect(error.message).toBe("Invalid type for 'jsx': expected object, got string");
    });

    it('should reject a pragma that is not a member expression', () => {
      expect(captureBuildError({ jsx: { pragma: '1bad' } }).field).toBe('jsx.pragma');
    });
  });

  describe('nested settings', () => {
    it('should fill omitted nested fields from the defaults', () => {
      const options = buildOptions(
        { format: { singleQuotes: true }, verbose: { depth: 3 }, lintSeverities: { defaultSeverity: 'warn' } },
        SETTINGS
      );

      expect(options.format).toEqual({ bracketSpacing: true, singleQuotes: true });
      expect(options.verbose).toEqual({ indent: 0, depth: 3, enabledDuringLib: false, focusedFiles: undefined });
      expect(options.lintSeverities.defaultSeverity).toBe('warn');
      expect(options.lintSeverities.severities.size).toBe(0);
    });

    it('should leave absent log saving limits undefined', () => {
      const options = buildOptions({ logSaving: { init: { thresholdTimeMs: 0, rate: 100 } } }, SETTINGS);

      expect(options.logSaving.get('init')).toEqual({ thresholdTimeMs: 0, limit: undefined, rate: 100 });
    });
  });

  describe('logging', () => {
    it('should log the fingerprint in debug mode', () => {
      const { logger, lines } = captureLines(true);

      const options = buildOptions({ maxWorkers: 2 }, { ...SETTINGS, logger });

      expect(lines).toHaveLength(1);
      const entry: unknown = JSON.parse(lines[0] ?? '');
      expect(entry).toMatchObject({
        level: 'debug',
        component: 'OptionsBuilder',
        event: 'options_built',
        data: { root: '/project', maxWorkers: 2, fingerprint: optionsFingerprint(options) },
      });
    });

    it('should write nothing outside debug mode', () => {
      const { logger, lines } = captureLines(false);

      buildOptions({ maxWorkers: 2 }, { ...SETTINGS, logger });

      expect(lines).toEqual([]);
    });
  });
});
