/**
 * Default option values.
 *
 * Host-dependent defaults (root, worker count, temp directory, log file) are
 * derived in {@link createDefaultOptions}; everything else is constant.
 *
 * @packageDocumentation
 */

import * as os from 'node:os';
import * as path from 'node:path';
import { FrozenMap, FrozenSet } from '../utils/frozen-collections.js';
import type {
  FileOptions,
  FormatOptions,
  GcControl,
  LintKind,
  LintSeverities,
  LogSaving,
  Options,
  Severity,
  SlowToCheckLogging,
  VerboseOptions,
} from './types.js';

export const DEFAULT_FORMAT: FormatOptions = Object.freeze({
  bracketSpacing: true,
  singleQuotes: false,
});

/**
 * All knobs absent: the runtime keeps its own GC settings.
 */
export const DEFAULT_GC_CONTROL: GcControl = Object.freeze({
  minorHeapSize: undefined,
  majorHeapIncrement: undefined,
  spaceOverhead: undefined,
  windowSize: undefined,
  customMajorRatio: undefined,
  customMinorRatio: undefined,
  customMinorMaxSize: undefined,
});

export const DEFAULT_SLOW_TO_CHECK_LOGGING: SlowToCheckLogging = Object.freeze({
  slowFilesLoggingInternal: false,
  slowExpressionsLoggingThreshold: undefined,
  slowComponentsLoggingThreshold: undefined,
});

/**
 * Values used for fields omitted from a `verbose` input.
 */
export const DEFAULT_VERBOSE: VerboseOptions = Object.freeze({
  indent: 0,
  depth: 1,
  enabledDuringLib: false,
  focusedFiles: undefined,
});

export const DEFAULT_LINT_SEVERITIES: LintSeverities = Object.freeze<LintSeverities>({
  defaultSeverity: 'off',
  severities: FrozenMap.empty<LintKind, Severity>(),
});

export const DEFAULT_FILE_OPTIONS: FileOptions = Object.freeze({
  includes: Object.freeze([]),
  ignores: Object.freeze([]),
  untyped: Object.freeze([]),
  declarations: Object.freeze([]),
  libPaths: Object.freeze([]),
  moduleFileExts: Object.freeze(['.js', '.jsx', '.mjs', '.cjs', '.json']),
  moduleResourceExts: Object.freeze([
    '.css',
    '.jpg',
    '.png',
    '.gif',
    '.eot',
    '.svg',
    '.ttf',
    '.woff',
    '.woff2',
    '.mp3',
    '.mp4',
    '.webm',
    '.webp',
  ]),
  nodeResolverDirnames: Object.freeze(['node_modules']),
});

export const DEFAULT_MAX_FILES_CHECKED_PER_WORKER = 100;
export const DEFAULT_MAX_SECONDS_FOR_CHECK_PER_WORKER = 5.0;
export const DEFAULT_MERGE_TIMEOUT_SECONDS = 100;
export const DEFAULT_RECURSION_LIMIT = 10000;
export const DEFAULT_MAX_LITERAL_LENGTH = 100;
export const DEFAULT_MAX_HEADER_TOKENS = 10;

/**
 * Defaults that depend on the host.
 */
export interface HostDefaults {
  /** Project root. */
  readonly root: string;
  /** Worker count. */
  readonly maxWorkers: number;
  /** Base directory for sockets, logs and saved state. */
  readonly tempDir: string;
}

/**
 * Reads host defaults from the running process.
 */
export function detectHostDefaults(): HostDefaults {
  return {
    root: process.cwd(),
    maxWorkers: Math.max(1, os.availableParallelism()),
    tempDir: path.join(os.tmpdir(), 'checkopts'),
  };
}

/**
 * Derives the server log file for a root.
 *
 * @example
 * ```typescript
 * logFileForRoot('/tmp/checkopts', '/home/me/project');
 * // "/tmp/checkopts/home-me-project.log"
 * ```
 */
export function logFileForRoot(tempDir: string, root: string): string {
  const slug = root.replace(/[^A-Za-z0-9._]+/g, '-').replace(/^-+|-+$/g, '');
  return path.join(tempDir, `${slug === '' ? 'root' : slug}.log`);
}

/**
 * Complete default options for the given host. The record and everything
 * reachable from it are frozen, as for {@link buildOptions}.
 *
 * @param host - Host-dependent defaults; detected from the process when omitted.
 */
export function createDefaultOptions(host: HostDefaults = detectHostDefaults()): Options {
  const options: Options = {
    all: false,
    anyPropagation: true,
    autoimports: true,
    autoimportsRankedByUsage: false,
    automaticRequireDefault: false,
    babelLooseArraySpread: false,
    castingSyntax: 'colon',
    channelMode: 'pipe',
    componentSyntax: 'off',
    componentSyntaxIncludes: Object.freeze([]),
    componentSyntaxDeepReadOnly: false,
    configHash: '',
    configName: '.checkconfig',
    debug: false,
    directDependentFilesFix: false,
    distributed: false,
    enableConstParams: false,
    enableRelayIntegration: false,
    enabledRollouts: FrozenMap.empty<string, string>(),
    enforceStrictCallArity: true,
    enums: false,
    estimateRecheckTime: true,
    exactByDefault: true,
    fbsModule: undefined,
    fbtModule: undefined,
    fileOptions: DEFAULT_FILE_OPTIONS,
    format: DEFAULT_FORMAT,
    gcWorker: DEFAULT_GC_CONTROL,
    globalFindRef: false,
    globalRename: false,
    hasteModuleRefPrefix: undefined,
    hasteModuleRefPrefixLegacyInterop: undefined,
    hasteNameReducers: Object.freeze([]),
    hastePathsExcludes: Object.freeze([]),
    hastePathsIncludes: Object.freeze([]),
    ignoreNonLiteralRequires: false,
    includeSuppressions: false,
    includeWarnings: false,
    incrementalErrorCollation: false,
    jsx: Object.freeze({ kind: 'react' }),
    lazyMode: false,
    legacyModuleInterop: false,
    lintSeverities: DEFAULT_LINT_SEVERITIES,
    logFile: logFileForRoot(host.tempDir, host.root),
    logSaving: FrozenMap.empty<string, LogSaving>(),
    longLivedWorkers: false,
    maxFilesCheckedPerWorker: DEFAULT_MAX_FILES_CHECKED_PER_WORKER,
    maxHeaderTokens: DEFAULT_MAX_HEADER_TOKENS,
    maxLiteralLength: DEFAULT_MAX_LITERAL_LENGTH,
    maxSecondsForCheckPerWorker: DEFAULT_MAX_SECONDS_FOR_CHECK_PER_WORKER,
    maxWorkers: host.maxWorkers,
    mergeTimeout: DEFAULT_MERGE_TIMEOUT_SECONDS,
    missingModuleGenerators: Object.freeze([]),
    moduleNameMappers: Object.freeze([]),
    moduleSystem: 'node',
    modulesAreUseStrict: false,
    mungeUnderscores: false,
    nodeMainFields: Object.freeze(['main']),
    nodeResolverAllowRootRelative: false,
    nodeResolverRootRelativeDirnames: Object.freeze(['']),
    profile: false,
    quiet: false,
    reactRuntime: 'classic',
    recursionLimit: DEFAULT_RECURSION_LIMIT,
    relayIntegrationExcludes: Object.freeze([]),
    relayIntegrationModulePrefix: undefined,
    relayIntegrationModulePrefixIncludes: Object.freeze([]),
    rendersTypeValidation: false,
    rendersTypeValidationIncludes: Object.freeze([]),
    root: host.root,
    rootName: undefined,
    savedStateAllowReinit: true,
    savedStateFetcher: 'dummy',
    savedStateForceRecheck: false,
    savedStateNoFallback: false,
    savedStateSkipVersionCheck: false,
    savedStateVerify: false,
    slowToCheckLogging: DEFAULT_SLOW_TO_CHECK_LOGGING,
    strictEs6ImportExport: false,
    strictEs6ImportExportExcludes: Object.freeze([]),
    strictMode: FrozenSet.empty<LintKind>(),
    stripRoot: false,
    suppressTypes: FrozenSet.from(['$FixMe']),
    tempDir: host.tempDir,
    traces: 0,
    useMixedInCatchVariables: false,
    verbose: undefined,
    waitForRecheck: false,
  };
  return Object.freeze(options);
}
