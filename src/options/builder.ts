/**
 * Construction of the immutable options record.
 *
 * Every field of the input is type-checked, enum fields are checked against
 * their closed variant lists, patterns are compiled, and omitted fields take
 * their defaults. The result is frozen before it is returned, so no consumer
 * can observe a partially built record.
 *
 * Only individual fields are validated here; combinations of flags are not.
 *
 * @packageDocumentation
 */

import * as fs from 'node:fs';
import { FrozenMap, FrozenSet } from '../utils/frozen-collections.js';
import { silentLogger, type Logger } from '../utils/logger.js';
import {
  DEFAULT_VERBOSE,
  createDefaultOptions,
  detectHostDefaults,
  type HostDefaults,
} from './defaults.js';
import { optionsFingerprint } from './fingerprint.js';
import {
  CASTING_SYNTAXES,
  CHANNEL_MODES,
  COMPONENT_SYNTAX_LEVELS,
  LINT_KINDS,
  MODULE_SYSTEMS,
  REACT_RUNTIMES,
  SAVED_STATE_FETCHERS,
  SEVERITIES,
  type BooleanOptionKey,
  type CompiledPattern,
  type FileOptions,
  type FormatOptions,
  type GcControl,
  type JsxMode,
  type LintKind,
  type LintSeverities,
  type LogSaving,
  type Options,
  type OptionsInput,
  type PatternList,
  type Severity,
  type SlowToCheckLogging,
  type VerboseOptions,
} from './types.js';

/**
 * Error raised when an input field cannot be turned into an option value.
 */
export class OptionsBuildError extends Error {
  /** Dotted path of the offending field, e.g. `gcWorker.minorHeapSize`. */
  public readonly field: string;

  /**
   * @param field - Path of the field that failed.
   * @param message - Descriptive error message.
   * @param cause - The underlying error, if any.
   */
  constructor(field: string, message: string, cause?: Error) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = 'OptionsBuildError';
    this.field = field;
  }
}

/**
 * Checks whether a path is an existing directory.
 */
export type PathChecker = (path: string) => boolean;

/**
 * Settings for {@link buildOptions}.
 */
export interface BuildOptionsSettings {
  /** Host-derived defaults; detected from the process when omitted. */
  host?: HostDefaults;
  /** Root existence check. Defaults to a filesystem stat. */
  pathChecker?: PathChecker;
  /** Receives construction events. */
  logger?: Logger;
}

function isExistingDirectory(candidate: string): boolean {
  return fs.statSync(candidate, { throwIfNoEntry: false })?.isDirectory() ?? false;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && !(value instanceof RegExp);
}

function typeName(value: unknown): string {
  if (value === null) {
    return 'null';
  }
  if (Array.isArray(value)) {
    return 'array';
  }
  return typeof value;
}

function expectBoolean(value: unknown, field: string): boolean {
  if (typeof value !== 'boolean') {
    throw new OptionsBuildError(
      field,
      `Invalid type for '${field}': expected boolean, got ${typeName(value)}`
    );
  }
  return value;
}

function expectString(value: unknown, field: string): string {
  if (typeof value !== 'string') {
    throw new OptionsBuildError(
      field,
      `Invalid type for '${field}': expected string, got ${typeName(value)}`
    );
  }
  return value;
}

function expectNonEmptyString(value: unknown, field: string): string {
  const str = expectString(value, field);
  if (str === '') {
    throw new OptionsBuildError(field, `Invalid value for '${field}': must not be empty`);
  }
  return str;
}

function expectInteger(value: unknown, field: string, min: number): number {
  if (typeof value !== 'number' || !Number.isInteger(value)) {
    throw new OptionsBuildError(
      field,
      `Invalid type for '${field}': expected integer, got ${typeof value === 'number' ? String(value) : typeName(value)}`
    );
  }
  if (value < min) {
    throw new OptionsBuildError(
      field,
      `Invalid value for '${field}': must be at least ${String(min)}, got ${String(value)}`
    );
  }
  return value;
}

interface NumberBounds {
  min: number;
  max?: number;
  /** Whether `min` itself is rejected. */
  exclusiveMin?: boolean;
}

function expectNumber(value: unknown, field: string, bounds: NumberBounds): number {
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new OptionsBuildError(
      field,
      `Invalid type for '${field}': expected finite number, got ${typeof value === 'number' ? String(value) : typeName(value)}`
    );
  }
  const belowMin = bounds.exclusiveMin === true ? value <= bounds.min : value < bounds.min;
  if (belowMin || (bounds.max !== undefined && value > bounds.max)) {
    const range =
      bounds.max === undefined
        ? `${bounds.exclusiveMin === true ? 'greater than' : 'at least'} ${String(bounds.min)}`
        : `between ${String(bounds.min)} and ${String(bounds.max)}`;
    throw new OptionsBuildError(
      field,
      `Invalid value for '${field}': must be ${range}, got ${String(value)}`
    );
  }
  return value;
}

function expectOneOf<T extends string>(value: unknown, field: string, variants: readonly T[]): T {
  const match = variants.find((variant) => variant === value);
  if (match === undefined) {
    throw new OptionsBuildError(
      field,
      `Invalid value for '${field}': expected one of ${variants.map((v) => `'${v}'`).join(', ')}, got ${typeof value === 'string' ? `'${value}'` : typeName(value)}`
    );
  }
  return match;
}

function expectArray(value: unknown, field: string): readonly unknown[] {
  if (!Array.isArray(value)) {
    throw new OptionsBuildError(
      field,
      `Invalid type for '${field}': expected array, got ${typeName(value)}`
    );
  }
  return value;
}

function expectRecord(value: unknown, field: string): Record<string, unknown> {
  if (!isRecord(value)) {
    throw new OptionsBuildError(
      field,
      `Invalid type for '${field}': expected object, got ${typeName(value)}`
    );
  }
  return value;
}

function expectStringList(value: unknown, field: string): readonly string[] {
  return Object.freeze(
    expectArray(value, field).map((item, index) => expectString(item, `${field}[${String(index)}]`))
  );
}

/**
 * Compiles one pattern. Stateful flags are dropped so that repeated `test()`
 * calls on a shared record always start at index 0.
 */
function compilePattern(value: unknown, field: string, logger: Logger): CompiledPattern {
  if (value instanceof RegExp) {
    const flags = value.flags.replace(/[gy]/g, '');
    if (flags !== value.flags) {
      logger.warn('pattern_flags_stripped', { field, pattern: value.source, flags: value.flags });
    }
    return Object.freeze({ source: value.source, pattern: new RegExp(value.source, flags) });
  }
  const source = expectString(value, field);
  try {
    return Object.freeze({ source, pattern: new RegExp(source) });
  } catch (error) {
    const cause = error instanceof Error ? error : new Error(String(error));
    throw new OptionsBuildError(
      field,
      `Invalid regular expression for '${field}': ${cause.message}`,
      cause
    );
  }
}

function compilePatternSources(value: unknown, field: string, logger: Logger): readonly CompiledPattern[] {
  return Object.freeze(
    expectArray(value, field).map((item, index) =>
      compilePattern(item, `${field}[${String(index)}]`, logger)
    )
  );
}

function compilePatternList(value: unknown, field: string, logger: Logger): PatternList<string> {
  return Object.freeze(
    expectArray(value, field).map((item, index) => {
      const entryField = `${field}[${String(index)}]`;
      const entry = expectArray(item, entryField);
      if (entry.length !== 2) {
        throw new OptionsBuildError(
          entryField,
          `Invalid value for '${entryField}': expected [pattern, value], got ${String(entry.length)} elements`
        );
      }
      const { source, pattern } = compilePattern(entry[0], `${entryField}[0]`, logger);
      return Object.freeze({ source, pattern, value: expectString(entry[1], `${entryField}[1]`) });
    })
  );
}

const PRAGMA_REFERENCE = /^[A-Za-z_$][\w$]*(?:\.[A-Za-z_$][\w$]*)*$/;

function buildJsx(value: unknown): JsxMode {
  if (value === 'react') {
    return Object.freeze({ kind: 'react' });
  }
  const raw = expectRecord(value, 'jsx');
  const pragma = expectString(raw.pragma, 'jsx.pragma');
  if (!PRAGMA_REFERENCE.test(pragma)) {
    throw new OptionsBuildError(
      'jsx.pragma',
      `Invalid value for 'jsx.pragma': expected an identifier or member expression, got '${pragma}'`
    );
  }
  return Object.freeze({
    kind: 'pragma',
    pragma,
    reference: Object.freeze(pragma.split('.')),
  });
}

function buildFormat(value: unknown, defaults: FormatOptions): FormatOptions {
  const raw = expectRecord(value, 'format');
  return Object.freeze({
    bracketSpacing:
      raw.bracketSpacing === undefined
        ? defaults.bracketSpacing
        : expectBoolean(raw.bracketSpacing, 'format.bracketSpacing'),
    singleQuotes:
      raw.singleQuotes === undefined
        ? defaults.singleQuotes
        : expectBoolean(raw.singleQuotes, 'format.singleQuotes'),
  });
}

function optionalInteger(value: unknown, field: string, min: number): number | undefined {
  return value === undefined ? undefined : expectInteger(value, field, min);
}

function buildGcControl(value: unknown): GcControl {
  const raw = expectRecord(value, 'gcWorker');
  return Object.freeze({
    minorHeapSize: optionalInteger(raw.minorHeapSize, 'gcWorker.minorHeapSize', 0),
    majorHeapIncrement: optionalInteger(raw.majorHeapIncrement, 'gcWorker.majorHeapIncrement', 0),
    spaceOverhead: optionalInteger(raw.spaceOverhead, 'gcWorker.spaceOverhead', 0),
    windowSize: optionalInteger(raw.windowSize, 'gcWorker.windowSize', 1),
    customMajorRatio: optionalInteger(raw.customMajorRatio, 'gcWorker.customMajorRatio', 0),
    customMinorRatio: optionalInteger(raw.customMinorRatio, 'gcWorker.customMinorRatio', 0),
    customMinorMaxSize: optionalInteger(raw.customMinorMaxSize, 'gcWorker.customMinorMaxSize', 0),
  });
}

function buildSlowToCheckLogging(value: unknown, defaults: SlowToCheckLogging): SlowToCheckLogging {
  const raw = expectRecord(value, 'slowToCheckLogging');
  return Object.freeze({
    slowFilesLoggingInternal:
      raw.slowFilesLoggingInternal === undefined
        ? defaults.slowFilesLoggingInternal
        : expectBoolean(raw.slowFilesLoggingInternal, 'slowToCheckLogging.slowFilesLoggingInternal'),
    slowExpressionsLoggingThreshold: optionalInteger(
      raw.slowExpressionsLoggingThreshold,
      'slowToCheckLogging.slowExpressionsLoggingThreshold',
      0
    ),
    slowComponentsLoggingThreshold: optionalInteger(
      raw.slowComponentsLoggingThreshold,
      'slowToCheckLogging.slowComponentsLoggingThreshold',
      0
    ),
  });
}

function buildVerbose(value: unknown): VerboseOptions {
  const raw = expectRecord(value, 'verbose');
  return Object.freeze({
    indent:
      raw.indent === undefined ? DEFAULT_VERBOSE.indent : expectInteger(raw.indent, 'verbose.indent', 0),
    depth:
      raw.depth === undefined ? DEFAULT_VERBOSE.depth : expectInteger(raw.depth, 'verbose.depth', 0),
    enabledDuringLib:
      raw.enabledDuringLib === undefined
        ? DEFAULT_VERBOSE.enabledDuringLib
        : expectBoolean(raw.enabledDuringLib, 'verbose.enabledDuringLib'),
    focusedFiles:
      raw.focusedFiles === undefined
        ? DEFAULT_VERBOSE.focusedFiles
        : expectStringList(raw.focusedFiles, 'verbose.focusedFiles'),
  });
}

function buildLintSeverities(value: unknown, defaults: LintSeverities): LintSeverities {
  const raw = expectRecord(value, 'lintSeverities');
  const severities = new Map<LintKind, Severity>();
  if (raw.severities !== undefined) {
    for (const [name, severity] of Object.entries(expectRecord(raw.severities, 'lintSeverities.severities'))) {
      const field = `lintSeverities.severities.${name}`;
      severities.set(expectOneOf(name, field, LINT_KINDS), expectOneOf(severity, field, SEVERITIES));
    }
  }
  return Object.freeze({
    defaultSeverity:
      raw.defaultSeverity === undefined
        ? defaults.defaultSeverity
        : expectOneOf(raw.defaultSeverity, 'lintSeverities.defaultSeverity', SEVERITIES),
    severities: raw.severities === undefined ? defaults.severities : FrozenMap.fromEntries(severities),
  });
}

function buildLogSaving(value: unknown): FrozenMap<string, LogSaving> {
  const raw = expectRecord(value, 'logSaving');
  const entries = Object.entries(raw).map(([event, settings]): [string, LogSaving] => {
    const field = `logSaving.${event}`;
    const rule = expectRecord(settings, field);
    return [
      event,
      Object.freeze({
        thresholdTimeMs: expectInteger(rule.thresholdTimeMs, `${field}.thresholdTimeMs`, 0),
        limit: optionalInteger(rule.limit, `${field}.limit`, 0),
        rate: expectNumber(rule.rate, `${field}.rate`, { min: 0, max: 100 }),
      }),
    ];
  });
  return FrozenMap.fromEntries(entries);
}

function buildStringMap(value: unknown, field: string): FrozenMap<string, string> {
  const raw = expectRecord(value, field);
  return FrozenMap.fromEntries(
    Object.entries(raw).map(([key, item]): [string, string] => [key, expectString(item, `${field}.${key}`)])
  );
}

function buildFileOptions(value: unknown, defaults: FileOptions, logger: Logger): FileOptions {
  const raw = expectRecord(value, 'fileOptions');
  const list = (key: 'includes' | 'libPaths' | 'moduleFileExts' | 'moduleResourceExts' | 'nodeResolverDirnames'): readonly string[] =>
    raw[key] === undefined ? defaults[key] : expectStringList(raw[key], `fileOptions.${key}`);
  const patterns = (key: 'ignores' | 'untyped' | 'declarations'): readonly CompiledPattern[] =>
    raw[key] === undefined ? defaults[key] : compilePatternSources(raw[key], `fileOptions.${key}`, logger);

  return Object.freeze({
    includes: list('includes'),
    ignores: patterns('ignores'),
    untyped: patterns('untyped'),
    declarations: patterns('declarations'),
    libPaths: list('libPaths'),
    moduleFileExts: list('moduleFileExts'),
    moduleResourceExts: list('moduleResourceExts'),
    nodeResolverDirnames: list('nodeResolverDirnames'),
  });
}

type OptionalStringKey =
  | 'fbsModule'
  | 'fbtModule'
  | 'hasteModuleRefPrefix'
  | 'hasteModuleRefPrefixLegacyInterop'
  | 'relayIntegrationModulePrefix'
  | 'rootName';

type StringListKey =
  | 'componentSyntaxIncludes'
  | 'hastePathsExcludes'
  | 'hastePathsIncludes'
  | 'nodeMainFields'
  | 'nodeResolverRootRelativeDirnames'
  | 'rendersTypeValidationIncludes'
  | 'strictEs6ImportExportExcludes';

/**
 * Builds a complete, frozen options record from a partial input.
 *
 * @param input - Explicit settings; omitted fields take their defaults.
 * @param settings - Host defaults, root check and logger.
 * @returns The immutable options record.
 * @throws OptionsBuildError if any field has the wrong type, an unknown enum
 *   variant, an out-of-range value or an invalid pattern, or if the root is
 *   not an existing directory.
 *
 * @example
 * ```typescript
 * const options = buildOptions({
 *   componentSyntax: 'parsing',
 *   componentSyntaxIncludes: ['src/components'],
 *   moduleNameMappers: [['^@app/(.*)$', 'src/$1']],
 * });
 * options.componentSyntax; // 'parsing'
 * ```
 */
export function buildOptions(input: OptionsInput = {}, settings: BuildOptionsSettings = {}): Options {
  const logger = (settings.logger ?? silentLogger).child('OptionsBuilder');
  const pathChecker = settings.pathChecker ?? isExistingDirectory;
  const host = settings.host ?? detectHostDefaults();

  const root = input.root === undefined ? host.root : expectNonEmptyString(input.root, 'root');
  if (!pathChecker(root)) {
    throw new OptionsBuildError('root', `Invalid value for 'root': '${root}' is not an existing directory`);
  }
  const tempDir =
    input.tempDir === undefined ? host.tempDir : expectNonEmptyString(input.tempDir, 'tempDir');
  const defaults = createDefaultOptions({ root, maxWorkers: host.maxWorkers, tempDir });

  const bool = (key: BooleanOptionKey): boolean => {
    const value: unknown = input[key];
    return value === undefined ? defaults[key] : expectBoolean(value, key);
  };
  const optString = (key: OptionalStringKey): string | undefined => {
    const value: unknown = input[key];
    return value === undefined ? defaults[key] : expectString(value, key);
  };
  const stringList = (key: StringListKey): readonly string[] => {
    const value: unknown = input[key];
    return value === undefined ? defaults[key] : expectStringList(value, key);
  };
  const integer = (
    key: 'maxFilesCheckedPerWorker' | 'maxHeaderTokens' | 'maxLiteralLength' | 'maxWorkers' | 'recursionLimit' | 'traces',
    min: number
  ): number => {
    const value: unknown = input[key];
    return value === undefined ? defaults[key] : expectInteger(value, key, min);
  };
  const patternList = (key: 'hasteNameReducers' | 'missingModuleGenerators' | 'moduleNameMappers'): PatternList<string> => {
    const value: unknown = input[key];
    return value === undefined ? defaults[key] : compilePatternList(value, key, logger);
  };
  const patternSources = (key: 'relayIntegrationExcludes' | 'relayIntegrationModulePrefixIncludes'): readonly CompiledPattern[] => {
    const value: unknown = input[key];
    return value === undefined ? defaults[key] : compilePatternSources(value, key, logger);
  };

  const mergeTimeout: unknown = input.mergeTimeout;

  const options: Options = {
    all: bool('all'),
    anyPropagation: bool('anyPropagation'),
    autoimports: bool('autoimports'),
    autoimportsRankedByUsage: bool('autoimportsRankedByUsage'),
    automaticRequireDefault: bool('automaticRequireDefault'),
    babelLooseArraySpread: bool('babelLooseArraySpread'),
    castingSyntax:
      input.castingSyntax === undefined
        ? defaults.castingSyntax
        : expectOneOf(input.castingSyntax, 'castingSyntax', CASTING_SYNTAXES),
    channelMode:
      input.channelMode === undefined
        ? defaults.channelMode
        : expectOneOf(input.channelMode, 'channelMode', CHANNEL_MODES),
    componentSyntax:
      input.componentSyntax === undefined
        ? defaults.componentSyntax
        : expectOneOf(input.componentSyntax, 'componentSyntax', COMPONENT_SYNTAX_LEVELS),
    componentSyntaxIncludes: stringList('componentSyntaxIncludes'),
    componentSyntaxDeepReadOnly: bool('componentSyntaxDeepReadOnly'),
    configHash: input.configHash === undefined ? defaults.configHash : expectString(input.configHash, 'configHash'),
    configName:
      input.configName === undefined ? defaults.configName : expectNonEmptyString(input.configName, 'configName'),
    debug: bool('debug'),
    directDependentFilesFix: bool('directDependentFilesFix'),
    distributed: bool('distributed'),
    enableConstParams: bool('enableConstParams'),
    enableRelayIntegration: bool('enableRelayIntegration'),
    enabledRollouts:
      input.enabledRollouts === undefined
        ? defaults.enabledRollouts
        : buildStringMap(input.enabledRollouts, 'enabledRollouts'),
    enforceStrictCallArity: bool('enforceStrictCallArity'),
    enums: bool('enums'),
    estimateRecheckTime: bool('estimateRecheckTime'),
    exactByDefault: bool('exactByDefault'),
    fbsModule: optString('fbsModule'),
    fbtModule: optString('fbtModule'),
    fileOptions:
      input.fileOptions === undefined
        ? defaults.fileOptions
        : buildFileOptions(input.fileOptions, defaults.fileOptions, logger),
    format: input.format === undefined ? defaults.format : buildFormat(input.format, defaults.format),
    gcWorker: input.gcWorker === undefined ? defaults.gcWorker : buildGcControl(input.gcWorker),
    globalFindRef: bool('globalFindRef'),
    globalRename: bool('globalRename'),
    hasteModuleRefPrefix: optString('hasteModuleRefPrefix'),
    hasteModuleRefPrefixLegacyInterop: optString('hasteModuleRefPrefixLegacyInterop'),
    hasteNameReducers: patternList('hasteNameReducers'),
    hastePathsExcludes: stringList('hastePathsExcludes'),
    hastePathsIncludes: stringList('hastePathsIncludes'),
    ignoreNonLiteralRequires: bool('ignoreNonLiteralRequires'),
    includeSuppressions: bool('includeSuppressions'),
    includeWarnings: bool('includeWarnings'),
    incrementalErrorCollation: bool('incrementalErrorCollation'),
    jsx: input.jsx === undefined ? defaults.jsx : buildJsx(input.jsx),
    lazyMode: bool('lazyMode'),
    legacyModuleInterop: bool('legacyModuleInterop'),
    lintSeverities:
      input.lintSeverities === undefined
        ? defaults.lintSeverities
        : buildLintSeverities(input.lintSeverities, defaults.lintSeverities),
    logFile: input.logFile === undefined ? defaults.logFile : expectNonEmptyString(input.logFile, 'logFile'),
    logSaving: input.logSaving === undefined ? defaults.logSaving : buildLogSaving(input.logSaving),
    longLivedWorkers: bool('longLivedWorkers'),
    maxFilesCheckedPerWorker: integer('maxFilesCheckedPerWorker', 1),
    maxHeaderTokens: integer('maxHeaderTokens', 0),
    maxLiteralLength: integer('maxLiteralLength', 0),
    maxSecondsForCheckPerWorker:
      input.maxSecondsForCheckPerWorker === undefined
        ? defaults.maxSecondsForCheckPerWorker
        : expectNumber(input.maxSecondsForCheckPerWorker, 'maxSecondsForCheckPerWorker', {
            min: 0,
            exclusiveMin: true,
          }),
    maxWorkers: integer('maxWorkers', 1),
    mergeTimeout:
      mergeTimeout === undefined
        ? defaults.mergeTimeout
        : mergeTimeout === null
          ? undefined
          : expectNumber(mergeTimeout, 'mergeTimeout', { min: 0 }),
    missingModuleGenerators: patternList('missingModuleGenerators'),
    moduleNameMappers: patternList('moduleNameMappers'),
    moduleSystem:
      input.moduleSystem === undefined
        ? defaults.moduleSystem
        : expectOneOf(input.moduleSystem, 'moduleSystem', MODULE_SYSTEMS),
    modulesAreUseStrict: bool('modulesAreUseStrict'),
    mungeUnderscores: bool('mungeUnderscores'),
    nodeMainFields: stringList('nodeMainFields'),
    nodeResolverAllowRootRelative: bool('nodeResolverAllowRootRelative'),
    nodeResolverRootRelativeDirnames: stringList('nodeResolverRootRelativeDirnames'),
    profile: bool('profile'),
    quiet: bool('quiet'),
    reactRuntime:
      input.reactRuntime === undefined
        ? defaults.reactRuntime
        : expectOneOf(input.reactRuntime, 'reactRuntime', REACT_RUNTIMES),
    recursionLimit: integer('recursionLimit', 1),
    relayIntegrationExcludes: patternSources('relayIntegrationExcludes'),
    relayIntegrationModulePrefix: optString('relayIntegrationModulePrefix'),
    relayIntegrationModulePrefixIncludes: patternSources('relayIntegrationModulePrefixIncludes'),
    rendersTypeValidation: bool('rendersTypeValidation'),
    rendersTypeValidationIncludes: stringList('rendersTypeValidationIncludes'),
    root,
    rootName: optString('rootName'),
    savedStateAllowReinit: bool('savedStateAllowReinit'),
    savedStateFetcher:
      input.savedStateFetcher === undefined
        ? defaults.savedStateFetcher
        : expectOneOf(input.savedStateFetcher, 'savedStateFetcher', SAVED_STATE_FETCHERS),
    savedStateForceRecheck: bool('savedStateForceRecheck'),
    savedStateNoFallback: bool('savedStateNoFallback'),
    savedStateSkipVersionCheck: bool('savedStateSkipVersionCheck'),
    savedStateVerify: bool('savedStateVerify'),
    slowToCheckLogging:
      input.slowToCheckLogging === undefined
        ? defaults.slowToCheckLogging
        : buildSlowToCheckLogging(input.slowToCheckLogging, defaults.slowToCheckLogging),
    strictEs6ImportExport: bool('strictEs6ImportExport'),
    strictEs6ImportExportExcludes: stringList('strictEs6ImportExportExcludes'),
    strictMode:
      input.strictMode === undefined
        ? defaults.strictMode
        : FrozenSet.from(
            expectArray(input.strictMode, 'strictMode').map((kind, index) =>
              expectOneOf(kind, `strictMode[${String(index)}]`, LINT_KINDS)
            )
          ),
    stripRoot: bool('stripRoot'),
    suppressTypes:
      input.suppressTypes === undefined
        ? defaults.suppressTypes
        : FrozenSet.from(expectStringList(input.suppressTypes, 'suppressTypes')),
    tempDir,
    traces: integer('traces', 0),
    useMixedInCatchVariables: bool('useMixedInCatchVariables'),
    verbose: input.verbose === undefined ? defaults.verbose : buildVerbose(input.verbose),
    waitForRecheck: bool('waitForRecheck'),
  };
  Object.freeze(options);

  if (logger.isDebugEnabled()) {
    logger.debug('options_built', {
      root: options.root,
      maxWorkers: options.maxWorkers,
      fingerprint: optionsFingerprint(options),
    });
  }

  return options;
}
