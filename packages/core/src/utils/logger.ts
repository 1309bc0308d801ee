import { logError, logInfo, logSuccess, logWarning } from './console';

/**
 * Thin logger over the console helpers. Debug output is gated on `verbose`.
 */
export class Logger {
  constructor(private verbose: boolean = false) {}

  info(message: string): void {
    logInfo(message);
  }

  success(message: string): void {
    logSuccess(message);
  }

  warn(message: string): void {
    logWarning(message);
  }

  error(message: string): void {
    logError(message);
  }

  debug(message: string): void {
    if (this.verbose) {
      logInfo(message);
    }
  }

  memberAction(alias: string, action: string): void {
    this.debug(`[${alias}] ${action}`);
  }

  isVerbose(): boolean {
    return this.verbose;
  }
}

/**
 * Logger used when a caller supplies none: warnings and errors still reach
 * stderr, debug output is dropped.
 */
export const defaultLogger = new Logger(false);
