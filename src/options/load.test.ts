import { describe, expect, it } from 'vitest';
import { Logger } from '../utils/logger.js';
import { EnvCoercionError } from './env.js';
import { loadOptions } from './load.js';

const HOST = { root: '/project', maxWorkers: 4, tempDir: '/tmp/checkopts-test' };

describe('loadOptions', () => {
  it('should apply layers in order and the environment last', () => {
    const options = loadOptions([{ maxWorkers: 2, quiet: true }, { maxWorkers: 3 }], {
      host: HOST,
      pathChecker: () => true,
      env: { CHECKOPTS_MAX_WORKERS: '5' },
    });

    expect(options.maxWorkers).toBe(5);
    expect(options.quiet).toBe(true);
  });

  it('should use defaults when there are no layers', () => {
    const options = loadOptions([], { host: HOST, pathChecker: () => true, env: {} });

    expect(options.maxWorkers).toBe(4);
    expect(options.componentSyntax).toBe('off');
  });

  it('should propagate coercion errors', () => {
    expect(() =>
      loadOptions([], { host: HOST, pathChecker: () => true, env: { CHECKOPTS_DEBUG: 'perhaps' } })
    ).toThrow(EnvCoercionError);
  });

  it('should log each applied variable in debug mode', () => {
    const lines: string[] = [];
    const logger = new Logger({ component: 'test', debugMode: true, sink: (line) => lines.push(line) });

    loadOptions([], {
      host: HOST,
      pathChecker: () => true,
      env: { CHECKOPTS_QUIET: 'true' },
      logger,
    });

    const events: unknown[] = lines.map((line) => JSON.parse(line));
    expect(events[0]).toMatchObject({
      level: 'debug',
      component: 'OptionsLoader',
      event: 'env_override_applied',
      data: { envVar: 'CHECKOPTS_QUIET' },
    });
    expect(events[1]).toMatchObject({ component: 'OptionsBuilder', event: 'options_built' });
  });
});
