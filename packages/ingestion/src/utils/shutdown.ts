import { logger as rootLogger, type Logger } from './logger.js';

export interface ShutdownOptions {
  logger?: Logger;
  exit?: (code: number) => void;
}

/** Signal handler: the first signal asks for a graceful stop, a second one exits with code 1. */
export function createShutdownHandler(stop: () => void, options: ShutdownOptions = {}): (signal: string) => void {
  const log = options.logger ?? rootLogger.child({ module: 'shutdown' });
  const exit = options.exit ?? ((code: number) => process.exit(code));
  let requested = false;

  return (signal: string) => {
    if (requested) {
      log.warn({ signal }, 'Received second signal, exiting immediately');
      exit(1);
      return;
    }
    requested = true;
    log.info(`Received ${signal}. Shutting down gracefully...`);
    stop();
  };
}
