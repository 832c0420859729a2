import { describe, expect, it } from 'vitest';
import { buildOptions } from './builder.js';
import { mergeOptionsInputs } from './merge.js';

const HOST = { root: '/project', maxWorkers: 4, tempDir: '/tmp/checkopts-test' };

describe('mergeOptionsInputs', () => {
  it('should return an empty input for no layers', () => {
    expect(mergeOptionsInputs()).toEqual({});
  });

  it('should let later layers win for scalar fields', () => {
    const merged = mergeOptionsInputs({ maxWorkers: 2, quiet: true }, { maxWorkers: 8 });

    expect(merged.maxWorkers).toBe(8);
    expect(merged.quiet).toBe(true);
  });

  it('should treat undefined fields of a later layer as omitted', () => {
    const fileLayer = { maxWorkers: 8, profile: true };
    const cliLayer = { maxWorkers: undefined, profile: undefined, quiet: true };

    const merged = mergeOptionsInputs(fileLayer, cliLayer);

    expect(merged.maxWorkers).toBe(8);
    expect(merged.profile).toBe(true);
    expect(merged.quiet).toBe(true);

    const options = buildOptions(merged, { host: HOST, pathChecker: () => true });
    expect(options.maxWorkers).toBe(8);
    expect(options.profile).toBe(true);
  });

  it('should treat undefined nested fields of a later layer as omitted', () => {
    const merged = mergeOptionsInputs(
      { format: { singleQuotes: true }, lintSeverities: { defaultSeverity: 'warn' } },
      { format: { singleQuotes: undefined }, lintSeverities: { defaultSeverity: undefined } }
    );

    expect(merged.format?.singleQuotes).toBe(true);
    expect(merged.lintSeverities?.defaultSeverity).toBe('warn');
  });

  it('should merge nested settings key by key', () => {
    const merged = mergeOptionsInputs(
      { format: { singleQuotes: true }, verbose: { depth: 2 } },
      { format: { bracketSpacing: false }, verbose: { indent: 4 } }
    );

    expect(merged.format).toEqual({ singleQuotes: true, bracketSpacing: false });
    expect(merged.verbose).toEqual({ depth: 2, indent: 4 });
  });

  it('should merge the lint severity table', () => {
    const merged = mergeOptionsInputs(
      { lintSeverities: { defaultSeverity: 'warn', severities: { 'sketchy-null': 'error' } } },
      { lintSeverities: { severities: { 'unclear-type': 'off' } } }
    );

    expect(merged.lintSeverities).toEqual({
      defaultSeverity: 'warn',
      severities: { 'sketchy-null': 'error', 'unclear-type': 'off' },
    });
  });

  it('should replace lists and pattern lists as a whole', () => {
    const merged = mergeOptionsInputs(
      { componentSyntaxIncludes: ['a/'], moduleNameMappers: [['^a', 'x']] },
      { componentSyntaxIncludes: ['b/'], moduleNameMappers: [['^b', 'y']] }
    );

    expect(merged.componentSyntaxIncludes).toEqual(['b/']);
    expect(merged.moduleNameMappers).toEqual([['^b', 'y']]);
  });

  it('should replace keyed maps as a whole', () => {
    const merged = mergeOptionsInputs(
      { enabledRollouts: { a: 'on' } },
      { enabledRollouts: { b: 'off' } }
    );

    expect(merged.enabledRollouts).toEqual({ b: 'off' });
  });

  it('should keep an explicit null merge timeout from a later layer', () => {
    expect(mergeOptionsInputs({ mergeTimeout: 10 }, { mergeTimeout: null }).mergeTimeout).toBeNull();
  });

  it('should not modify its inputs', () => {
    const base = { format: { singleQuotes: true } };

    mergeOptionsInputs(base, { format: { bracketSpacing: false } });

    expect(base).toEqual({ format: { singleQuotes: true } });
  });
});
