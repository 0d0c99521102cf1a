import { describe, it, expect, vi } from 'vitest';
import { createShutdownHandler } from '../../src/utils/shutdown.js';
import { captureLogs } from '../helpers/logCapture.js';

describe('createShutdownHandler()', () => {
  it('asks for a graceful stop on the first signal', () => {
    const { logger, messages } = captureLogs();
    const stop = vi.fn();
    const exit = vi.fn();

    createShutdownHandler(stop, { logger, exit })('SIGTERM');

    expect(stop).toHaveBeenCalledTimes(1);
    expect(exit).not.toHaveBeenCalled();
    expect(messages('info')).toEqual(['Received SIGTERM. Shutting down gracefully...']);
  });

  it('exits with code 1 on a second signal', () => {
    const { logger, messages } = captureLogs();
    const stop = vi.fn();
    const exit = vi.fn();
    const shutdown = createShutdownHandler(stop, { logger, exit });

    shutdown('SIGTERM');
    shutdown('SIGINT');

    expect(stop).toHaveBeenCalledTimes(1);
    expect(exit).toHaveBeenCalledWith(1);
    expect(messages('warn')).toEqual(['Received second signal, exiting immediately']);
  });
});
