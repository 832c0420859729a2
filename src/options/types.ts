/**
 * Types for the checker options record.
 *
 * The record is built once per process by {@link buildOptions} and shared by
 * reference with every consumer. Every field is always populated; optional
 * settings use `undefined` for "use the system default".
 *
 * @packageDocumentation
 */

import type { FrozenMap, FrozenSet } from '../utils/frozen-collections.js';

/**
 * Module resolution strategy.
 * - `node`: node_modules lookup relative to the importing file
 * - `haste`: global module names derived from file names
 */
export type ModuleSystem = 'node' | 'haste';

export const MODULE_SYSTEMS: readonly ModuleSystem[] = ['node', 'haste'];

/**
 * How JSX elements are interpreted.
 *
 * `react` desugars to `React.createElement(name, props, ...children)`.
 * `pragma` calls a user-specified function instead, with the same argument
 * layout; `reference` holds the dotted member path, e.g. `['preact', 'h']`.
 */
export type JsxMode =
  | { readonly kind: 'react' }
  | { readonly kind: 'pragma'; readonly pragma: string; readonly reference: readonly string[] };

/**
 * Where saved state is fetched from.
 */
export type SavedStateFetcher = 'dummy' | 'local' | 'scm' | 'remote';

export const SAVED_STATE_FETCHERS: readonly SavedStateFetcher[] = ['dummy', 'local', 'scm', 'remote'];

export type ReactRuntime = 'automatic' | 'classic';

export const REACT_RUNTIMES: readonly ReactRuntime[] = ['automatic', 'classic'];

/**
 * Level of support for component syntax.
 */
export type ComponentSyntax = 'off' | 'parsing' | 'full';

export const COMPONENT_SYNTAX_LEVELS: readonly ComponentSyntax[] = ['off', 'parsing', 'full'];

/**
 * Accepted type-cast syntax: `(x: T)`, `x as T`, or both.
 */
export type CastingSyntax = 'colon' | 'as' | 'both';

export const CASTING_SYNTAXES: readonly CastingSyntax[] = ['colon', 'as', 'both'];

/**
 * Transport between the server and its clients.
 */
export type ChannelMode = 'pipe' | 'socket';

export const CHANNEL_MODES: readonly ChannelMode[] = ['pipe', 'socket'];

export type Severity = 'off' | 'warn' | 'error';

export const SEVERITIES: readonly Severity[] = ['off', 'warn', 'error'];

/**
 * Known lint rules.
 */
export const LINT_KINDS = [
  'sketchy-null',
  'sketchy-number',
  'untyped-type-import',
  'untyped-import',
  'nonstrict-import',
  'internal-type',
  'unclear-type',
  'deprecated-type',
  'unsafe-getters-setters',
  'unnecessary-optional-chain',
  'unnecessary-invariant',
  'implicit-inexact-object',
  'ambiguous-object-type',
  'uninitialized-instance-property',
  'default-import-access',
  'invalid-import-star-use',
  'non-const-var-export',
  'this-in-exported-function',
  'mixed-import-and-require',
  'export-renamed-default',
  'unused-promise',
  'unsafe-object-assign',
] as const;

export type LintKind = (typeof LINT_KINDS)[number];

/**
 * Per-rule lint severities with a fallback for rules not listed.
 */
export interface LintSeverities {
  readonly defaultSeverity: Severity;
  readonly severities: FrozenMap<LintKind, Severity>;
}

/**
 * Lint rules that become errors in files marked strict.
 */
export type StrictModeSettings = FrozenSet<LintKind>;

/**
 * A compiled pattern together with the source it was configured with.
 *
 * `RegExp.prototype.source` escapes some characters (`'^src/'` reads back as
 * `'^src\\/'`), so the configured text is kept separately and returned as
 * written.
 */
export interface CompiledPattern {
  /** The configured source; for a `RegExp` input, its `source`. */
  readonly source: string;
  /** Compiled pattern, never carrying the stateful `g` or `y` flags. */
  readonly pattern: RegExp;
}

/**
 * One entry of an ordered pattern list.
 */
export interface PatternEntry<V> extends CompiledPattern {
  readonly value: V;
}

/**
 * Ordered (pattern, value) pairs. Lookups scan in order; the first match wins.
 */
export type PatternList<V> = readonly PatternEntry<V>[];

/**
 * Output formatting preferences used by code generation.
 */
export interface FormatOptions {
  readonly bracketSpacing: boolean;
  readonly singleQuotes: boolean;
}

/**
 * Worker garbage collector tuning. Absent knobs keep the runtime default.
 */
export interface GcControl {
  readonly minorHeapSize: number | undefined;
  readonly majorHeapIncrement: number | undefined;
  readonly spaceOverhead: number | undefined;
  readonly windowSize: number | undefined;
  readonly customMajorRatio: number | undefined;
  readonly customMinorRatio: number | undefined;
  readonly customMinorMaxSize: number | undefined;
}

/**
 * Sampling rule for saving a slow operation's log.
 */
export interface LogSaving {
  /** Minimum duration in milliseconds before a log is considered. */
  readonly thresholdTimeMs: number;
  /** Maximum number of logs saved; unlimited when absent. */
  readonly limit: number | undefined;
  /** Sampling rate as a percentage, 0 to 100. */
  readonly rate: number;
}

export interface SlowToCheckLogging {
  readonly slowFilesLoggingInternal: boolean;
  readonly slowExpressionsLoggingThreshold: number | undefined;
  readonly slowComponentsLoggingThreshold: number | undefined;
}

export interface VerboseOptions {
  readonly indent: number;
  readonly depth: number;
  readonly enabledDuringLib: boolean;
  /** Restrict verbose output to these files; all files when absent. */
  readonly focusedFiles: readonly string[] | undefined;
}

/**
 * Which files are part of the project and how imports map to files.
 */
export interface FileOptions {
  readonly includes: readonly string[];
  readonly ignores: readonly CompiledPattern[];
  readonly untyped: readonly CompiledPattern[];
  readonly declarations: readonly CompiledPattern[];
  readonly libPaths: readonly string[];
  readonly moduleFileExts: readonly string[];
  readonly moduleResourceExts: readonly string[];
  readonly nodeResolverDirnames: readonly string[];
}

/**
 * The complete options record.
 */
export interface Options {
  readonly all: boolean;
  readonly anyPropagation: boolean;
  readonly autoimports: boolean;
  readonly autoimportsRankedByUsage: boolean;
  readonly automaticRequireDefault: boolean;
  readonly babelLooseArraySpread: boolean;
  readonly castingSyntax: CastingSyntax;
  readonly channelMode: ChannelMode;
  readonly componentSyntax: ComponentSyntax;
  /** Path prefixes where component syntax is type-checked regardless of level. */
  readonly componentSyntaxIncludes: readonly string[];
  readonly componentSyntaxDeepReadOnly: boolean;
  readonly configHash: string;
  readonly configName: string;
  readonly debug: boolean;
  readonly directDependentFilesFix: boolean;
  readonly distributed: boolean;
  readonly enableConstParams: boolean;
  readonly enableRelayIntegration: boolean;
  /** Rollout name to selected variant. */
  readonly enabledRollouts: FrozenMap<string, string>;
  readonly enforceStrictCallArity: boolean;
  readonly enums: boolean;
  readonly estimateRecheckTime: boolean;
  readonly exactByDefault: boolean;
  readonly fbsModule: string | undefined;
  readonly fbtModule: string | undefined;
  readonly fileOptions: FileOptions;
  readonly format: FormatOptions;
  readonly gcWorker: GcControl;
  readonly globalFindRef: boolean;
  readonly globalRename: boolean;
  readonly hasteModuleRefPrefix: string | undefined;
  readonly hasteModuleRefPrefixLegacyInterop: string | undefined;
  readonly hasteNameReducers: PatternList<string>;
  readonly hastePathsExcludes: readonly string[];
  readonly hastePathsIncludes: readonly string[];
  readonly ignoreNonLiteralRequires: boolean;
  readonly includeSuppressions: boolean;
  readonly includeWarnings: boolean;
  readonly incrementalErrorCollation: boolean;
  readonly jsx: JsxMode;
  readonly lazyMode: boolean;
  readonly legacyModuleInterop: boolean;
  readonly lintSeverities: LintSeverities;
  readonly logFile: string;
  /** Event name to sampling rule. */
  readonly logSaving: FrozenMap<string, LogSaving>;
  readonly longLivedWorkers: boolean;
  readonly maxFilesCheckedPerWorker: number;
  readonly maxHeaderTokens: number;
  readonly maxLiteralLength: number;
  readonly maxSecondsForCheckPerWorker: number;
  readonly maxWorkers: number;
  /** Seconds; no timeout when absent. */
  readonly mergeTimeout: number | undefined;
  readonly missingModuleGenerators: PatternList<string>;
  readonly moduleNameMappers: PatternList<string>;
  readonly moduleSystem: ModuleSystem;
  readonly modulesAreUseStrict: boolean;
  readonly mungeUnderscores: boolean;
  readonly nodeMainFields: readonly string[];
  readonly nodeResolverAllowRootRelative: boolean;
  readonly nodeResolverRootRelativeDirnames: readonly string[];
  readonly profile: boolean;
  readonly quiet: boolean;
  readonly reactRuntime: ReactRuntime;
  readonly recursionLimit: number;
  readonly relayIntegrationExcludes: readonly CompiledPattern[];
  readonly relayIntegrationModulePrefix: string | undefined;
  readonly relayIntegrationModulePrefixIncludes: readonly CompiledPattern[];
  readonly rendersTypeValidation: boolean;
  readonly rendersTypeValidationIncludes: readonly string[];
  readonly root: string;
  readonly rootName: string | undefined;
  readonly savedStateAllowReinit: boolean;
  readonly savedStateFetcher: SavedStateFetcher;
  readonly savedStateForceRecheck: boolean;
  readonly savedStateNoFallback: boolean;
  readonly savedStateSkipVersionCheck: boolean;
  readonly savedStateVerify: boolean;
  readonly slowToCheckLogging: SlowToCheckLogging;
  readonly strictEs6ImportExport: boolean;
  readonly strictEs6ImportExportExcludes: readonly string[];
  readonly strictMode: StrictModeSettings;
  readonly stripRoot: boolean;
  /** Type names treated as error suppressions. */
  readonly suppressTypes: FrozenSet<string>;
  readonly tempDir: string;
  /** Maximum depth of error traces. */
  readonly traces: number;
  readonly useMixedInCatchVariables: boolean;
  readonly verbose: VerboseOptions | undefined;
  readonly waitForRecheck: boolean;
}

/**
 * Keys of {@link Options} holding a plain boolean.
 */
export type BooleanOptionKey = {
  [K in keyof Options]: Options[K] extends boolean ? K : never;
}[keyof Options];

/**
 * A pattern given either as regex source or an already compiled RegExp.
 */
export type PatternSource = string | RegExp;

/**
 * Input form of a pattern list entry.
 */
export type PatternInput<V> = readonly [pattern: PatternSource, value: V];

/**
 * Input accepted by {@link buildOptions}. Every field is optional; omitted
 * fields take their documented default. Collections are given as plain
 * arrays and objects and frozen during construction.
 */
export interface OptionsInput
  extends Partial<
    Omit<
      Options,
      | 'enabledRollouts'
      | 'fileOptions'
      | 'format'
      | 'gcWorker'
      | 'hasteNameReducers'
      | 'jsx'
      | 'lintSeverities'
      | 'logSaving'
      | 'mergeTimeout'
      | 'missingModuleGenerators'
      | 'moduleNameMappers'
      | 'relayIntegrationExcludes'
      | 'relayIntegrationModulePrefixIncludes'
      | 'slowToCheckLogging'
      | 'strictMode'
      | 'suppressTypes'
      | 'verbose'
    >
  > {
  readonly enabledRollouts?: Readonly<Record<string, string>>;
  readonly fileOptions?: FileOptionsInput;
  readonly format?: Partial<FormatOptions>;
  readonly gcWorker?: Partial<GcControl>;
  readonly hasteNameReducers?: readonly PatternInput<string>[];
  /** `'react'`, or a pragma function reference such as `{ pragma: 'preact.h' }`. */
  readonly jsx?: 'react' | { readonly pragma: string };
  readonly lintSeverities?: {
    readonly defaultSeverity?: Severity;
    readonly severities?: Readonly<Partial<Record<LintKind, Severity>>>;
  };
  readonly logSaving?: Readonly<
    Record<string, { readonly thresholdTimeMs: number; readonly limit?: number; readonly rate: number }>
  >;
  /** Seconds; `null` disables the timeout. */
  readonly mergeTimeout?: number | null;
  readonly missingModuleGenerators?: readonly PatternInput<string>[];
  readonly moduleNameMappers?: readonly PatternInput<string>[];
  readonly relayIntegrationExcludes?: readonly PatternSource[];
  readonly relayIntegrationModulePrefixIncludes?: readonly PatternSource[];
  readonly slowToCheckLogging?: Partial<SlowToCheckLogging>;
  readonly strictMode?: readonly LintKind[];
  readonly suppressTypes?: readonly string[];
  readonly verbose?: Partial<VerboseOptions>;
}

export interface FileOptionsInput
  extends Partial<Omit<FileOptions, 'ignores' | 'untyped' | 'declarations'>> {
  readonly ignores?: readonly PatternSource[];
  readonly untyped?: readonly PatternSource[];
  readonly declarations?: readonly PatternSource[];
}
