/**
 * Console logger shared by every export component
 */

export interface Logger {
  info(message: string): void;
  verbose(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

/**
 * Create a logger; verbose lines are printed only when enabled
 */
export function createLogger(verbose: boolean): Logger {
  return {
    info: (message) => console.log(message),
    verbose: (message) => {
      if (verbose) console.log(message);
    },
    warn: (message) => console.warn(`Warning: ${message}`),
    error: (message) => console.error(`Error: ${message}`),
  };
}

/**
 * Logger that can hold its lines back while a progress bar owns the terminal
 */
export interface DeferredLogger extends Logger {
  hold(): void;
  release(): void;
}

/**
 * Wrap a logger; between hold() and release() lines are queued, then
 * printed in order on release()
 */
export function createDeferredLogger(inner: Logger): DeferredLogger {
  let queue: Array<() => void> | null = null;

  const emit = (line: () => void): void => {
    if (queue) {
      queue.push(line);
    } else {
      line();
    }
  };

  return {
    info: (message) => emit(() => inner.info(message)),
    verbose: (message) => emit(() => inner.verbose(message)),
    warn: (message) => emit(() => inner.warn(message)),
    error: (message) => emit(() => inner.error(message)),
    hold: () => {
      if (!queue) {
        queue = [];
      }
    },
    release: () => {
      const pending = queue ?? [];
      queue = null;
      for (const line of pending) {
        line();
      }
    },
  };
}

/**
 * Logger that drops everything (tests, dry pipelines)
 */
export const silentLogger: Logger = {
  info: () => undefined,
  verbose: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};

/**
 * Format an unknown thrown value for a log line
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}
