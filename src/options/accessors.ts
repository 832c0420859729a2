/**
 * Read accessors for the options record.
 *
 * One accessor per field, named for how callers use the value. Nested
 * formatting leaves have their own accessors so callers need not know the
 * record's layout. Derived decisions live in `decisions.ts`.
 *
 * @packageDocumentation
 */

import type { FrozenMap, FrozenSet } from '../utils/frozen-collections.js';
import type {
  CastingSyntax,
  CompiledPattern,
  ChannelMode,
  ComponentSyntax,
  FileOptions,
  GcControl,
  JsxMode,
  LintSeverities,
  LogSaving,
  ModuleSystem,
  Options,
  PatternList,
  ReactRuntime,
  SavedStateFetcher,
  SlowToCheckLogging,
  StrictModeSettings,
  VerboseOptions,
} from './types.js';

export function all(options: Options): boolean {
  return options.all;
}

export function anyPropagation(options: Options): boolean {
  return options.anyPropagation;
}

export function autoimports(options: Options): boolean {
  return options.autoimports;
}

export function autoimportsRankedByUsage(options: Options): boolean {
  return options.autoimportsRankedByUsage;
}

export function automaticRequireDefault(options: Options): boolean {
  return options.automaticRequireDefault;
}

export function babelLooseArraySpread(options: Options): boolean {
  return options.babelLooseArraySpread;
}

export function castingSyntax(options: Options): CastingSyntax {
  return options.castingSyntax;
}

export function channelMode(options: Options): ChannelMode {
  return options.channelMode;
}

export function componentSyntax(options: Options): ComponentSyntax {
  return options.componentSyntax;
}

/**
 * Path prefixes under which component syntax is type-checked regardless of the
 * global level. See {@link typecheckComponentSyntaxInFile}.
 */
export function componentSyntaxIncludes(options: Options): readonly string[] {
  return options.componentSyntaxIncludes;
}

export function componentSyntaxDeepReadOnly(options: Options): boolean {
  return options.componentSyntaxDeepReadOnly;
}

export function configHash(options: Options): string {
  return options.configHash;
}

export function configName(options: Options): string {
  return options.configName;
}

/** Whether debug output was requested. */
export function isDebugMode(options: Options): boolean {
  return options.debug;
}

export function directDependentFilesFix(options: Options): boolean {
  return options.directDependentFilesFix;
}

export function distributed(options: Options): boolean {
  return options.distributed;
}

export function enableConstParams(options: Options): boolean {
  return options.enableConstParams;
}

export function enableRelayIntegration(options: Options): boolean {
  return options.enableRelayIntegration;
}

/** Rollout name to selected variant. See {@link rolloutValue}. */
export function enabledRollouts(options: Options): FrozenMap<string, string> {
  return options.enabledRollouts;
}

export function enforceStrictCallArity(options: Options): boolean {
  return options.enforceStrictCallArity;
}

export function enums(options: Options): boolean {
  return options.enums;
}

export function estimateRecheckTime(options: Options): boolean {
  return options.estimateRecheckTime;
}

export function exactByDefault(options: Options): boolean {
  return options.exactByDefault;
}

export function fbsModule(options: Options): string | undefined {
  return options.fbsModule;
}

export function fbtModule(options: Options): string | undefined {
  return options.fbtModule;
}

export function fileOptions(options: Options): FileOptions {
  return options.fileOptions;
}

/** Whether generated object literals get spaces inside braces. */
export function formatBracketSpacing(options: Options): boolean {
  return options.format.bracketSpacing;
}

/** Whether generated string literals use single quotes. */
export function formatSingleQuotes(options: Options): boolean {
  return options.format.singleQuotes;
}

/** GC tuning for workers; absent knobs keep the runtime default. */
export function gcWorker(options: Options): GcControl {
  return options.gcWorker;
}

export function globalFindRef(options: Options): boolean {
  return options.globalFindRef;
}

export function globalRename(options: Options): boolean {
  return options.globalRename;
}

export function hasteModuleRefPrefix(options: Options): string | undefined {
  return options.hasteModuleRefPrefix;
}

export function hasteModuleRefPrefixLegacyInterop(options: Options): string | undefined {
  return options.hasteModuleRefPrefixLegacyInterop;
}

/** Ordered rewrites applied to a path to derive its haste module name. */
export function hasteNameReducers(options: Options): PatternList<string> {
  return options.hasteNameReducers;
}

export function hastePathsExcludes(options: Options): readonly string[] {
  return options.hastePathsExcludes;
}

export function hastePathsIncludes(options: Options): readonly string[] {
  return options.hastePathsIncludes;
}

export function includeSuppressions(options: Options): boolean {
  return options.includeSuppressions;
}

export function incrementalErrorCollation(options: Options): boolean {
  return options.incrementalErrorCollation;
}

export function jsxMode(options: Options): JsxMode {
  return options.jsx;
}

export function lazyMode(options: Options): boolean {
  return options.lazyMode;
}

export function legacyModuleInterop(options: Options): boolean {
  return options.legacyModuleInterop;
}

export function lintSeverities(options: Options): LintSeverities {
  return options.lintSeverities;
}

export function logFile(options: Options): string {
  return options.logFile;
}

/** Per-event log sampling rules. */
export function logSaving(options: Options): FrozenMap<string, LogSaving> {
  return options.logSaving;
}

export function longLivedWorkers(options: Options): boolean {
  return options.longLivedWorkers;
}

export function maxFilesCheckedPerWorker(options: Options): number {
  return options.maxFilesCheckedPerWorker;
}

export function maxHeaderTokens(options: Options): number {
  return options.maxHeaderTokens;
}

export function maxLiteralLength(options: Options): number {
  return options.maxLiteralLength;
}

export function maxSecondsForCheckPerWorker(options: Options): number {
  return options.maxSecondsForCheckPerWorker;
}

/** Maximum depth of error traces; 0 disables traces. */
export function maxTraceDepth(options: Options): number {
  return options.traces;
}

export function maxWorkers(options: Options): number {
  return options.maxWorkers;
}

/** Merge timeout in seconds, or `undefined` for none. */
export function mergeTimeout(options: Options): number | undefined {
  return options.mergeTimeout;
}

export function missingModuleGenerators(options: Options): PatternList<string> {
  return options.missingModuleGenerators;
}

/** Ordered module name rewrites. See {@link mapModuleName}. */
export function moduleNameMappers(options: Options): PatternList<string> {
  return options.moduleNameMappers;
}

export function moduleSystem(options: Options): ModuleSystem {
  return options.moduleSystem;
}

export function modulesAreUseStrict(options: Options): boolean {
  return options.modulesAreUseStrict;
}

export function nodeMainFields(options: Options): readonly string[] {
  return options.nodeMainFields;
}

export function nodeResolverAllowRootRelative(options: Options): boolean {
  return options.nodeResolverAllowRootRelative;
}

export function nodeResolverRootRelativeDirnames(options: Options): readonly string[] {
  return options.nodeResolverRootRelativeDirnames;
}

/**
 * The raw profile flag. Use {@link shouldProfile} to decide whether to emit
 * profiling output.
 */
export function isProfileRequested(options: Options): boolean {
  return options.profile;
}

export function isQuiet(options: Options): boolean {
  return options.quiet;
}

export function reactRuntime(options: Options): ReactRuntime {
  return options.reactRuntime;
}

export function recursionLimit(options: Options): number {
  return options.recursionLimit;
}

export function relayIntegrationExcludes(options: Options): readonly CompiledPattern[] {
  return options.relayIntegrationExcludes;
}

export function relayIntegrationModulePrefix(options: Options): string | undefined {
  return options.relayIntegrationModulePrefix;
}

export function relayIntegrationModulePrefixIncludes(options: Options): readonly CompiledPattern[] {
  return options.relayIntegrationModulePrefixIncludes;
}

export function rendersTypeValidation(options: Options): boolean {
  return options.rendersTypeValidation;
}

export function rendersTypeValidationIncludes(options: Options): readonly string[] {
  return options.rendersTypeValidationIncludes;
}

export function root(options: Options): string {
  return options.root;
}

export function rootName(options: Options): string | undefined {
  return options.rootName;
}

export function savedStateAllowReinit(options: Options): boolean {
  return options.savedStateAllowReinit;
}

/** Where saved state is loaded from. */
export function savedStateFetcher(options: Options): SavedStateFetcher {
  return options.savedStateFetcher;
}

export function savedStateForceRecheck(options: Options): boolean {
  return options.savedStateForceRecheck;
}

export function savedStateNoFallback(options: Options): boolean {
  return options.savedStateNoFallback;
}

export function savedStateSkipVersionCheck(options: Options): boolean {
  return options.savedStateSkipVersionCheck;
}

export function savedStateVerify(options: Options): boolean {
  return options.savedStateVerify;
}

export function shouldIgnoreNonLiteralRequires(options: Options): boolean {
  return options.ignoreNonLiteralRequires;
}

export function shouldIncludeWarnings(options: Options): boolean {
  return options.includeWarnings;
}

export function shouldMungeUnderscores(options: Options): boolean {
  return options.mungeUnderscores;
}

export function shouldStripRoot(options: Options): boolean {
  return options.stripRoot;
}

export function slowToCheckLogging(options: Options): SlowToCheckLogging {
  return options.slowToCheckLogging;
}

export function strictEs6ImportExport(options: Options): boolean {
  return options.strictEs6ImportExport;
}

export function strictEs6ImportExportExcludes(options: Options): readonly string[] {
  return options.strictEs6ImportExportExcludes;
}

export function strictMode(options: Options): StrictModeSettings {
  return options.strictMode;
}

/** Type names treated as error suppressions. */
export function suppressTypes(options: Options): FrozenSet<string> {
  return options.suppressTypes;
}

export function tempDir(options: Options): string {
  return options.tempDir;
}

export function useMixedInCatchVariables(options: Options): boolean {
  return options.useMixedInCatchVariables;
}

export function verbose(options: Options): VerboseOptions | undefined {
  return options.verbose;
}

export function waitForRecheck(options: Options): boolean {
  return options.waitForRecheck;
}
