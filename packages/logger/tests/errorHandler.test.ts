/**
 * @fileoverview Tests for global error handler registration
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import { createSilentLogger } from '../src/createLogger.js';
import { attachGlobalHandlers } from '../src/errorHandler.js';

describe('attachGlobalHandlers', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should register process listeners once', () => {
    const on = vi.spyOn(process, 'on').mockImplementation(() => process);
    const logger = createSilentLogger();
    const warn = vi.spyOn(logger, 'warn');

    expect(attachGlobalHandlers(logger)).toBe(true);
    expect(on.mock.calls.map(([event]) => event)).toEqual([
      'uncaughtException',
      'unhandledRejection',
      'warning',
    ]);

    expect(attachGlobalHandlers(logger)).toBe(false);
    expect(on).toHaveBeenCalledTimes(3);
    expect(warn).toHaveBeenCalledWith('Global error handlers already attached, skipping');
  });
});
