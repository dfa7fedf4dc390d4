import { describe, expect, it, vi } from 'vitest';
import { TraversalLimitError } from '../src/errors/cursor.js';
import { cfg } from '../src/utils/config.js';
import {
  createLoggerFactory,
  createModuleLogger,
  logError,
  logger,
  startTimer,
} from '../src/utils/logger.js';

describe('Logger', () => {
  it('stays quiet below warn under test', () => {
    expect(logger.level).toBe('warn');
  });

  it('uses the configured level outside of test', () => {
    const factory = createLoggerFactory({ ...cfg, NODE_ENV: 'production', LOG_LEVEL: 'debug' });
    expect(factory.getLogger().level).toBe('debug');
  });

  it('creates module loggers bound to the module name', () => {
    const moduleLogger = createModuleLogger('cursor.test');

    expect(moduleLogger.bindings()).toEqual({ module: 'cursor.test' });
    expect(moduleLogger.level).toBe('warn');
  });

  it('returns a completion callback from startTimer', () => {
    const done = startTimer(logger, 'unit');
    expect(() => done({ steps: 1 })).not.toThrow();
  });

  it('logs the structured fields of library errors', () => {
    const moduleLogger = createModuleLogger('cursor.test');
    const spy = vi.spyOn(moduleLogger, 'error').mockReturnValue(undefined);

    logError(moduleLogger, new TraversalLimitError('fold', 3), { driver: 'fold' });

    expect(spy).toHaveBeenCalledWith(
      {
        driver: 'fold',
        error: expect.objectContaining({
          name: 'TraversalLimitError',
          module: 'cursor.traversal',
          operation: 'fold',
          context: { maxSteps: 3 },
        }),
      },
      'Traversal exceeded the limit of 3 steps in fold'
    );
  });
});
