/**
 * Simple logger for debug output.
 */
export const logger = {
  debug: (message: string, ...args: unknown[]) => {
    if (process.env.CALLTRACE_DEBUG) {
      console.debug(`[calltrace] ${message}`, ...args);
    }
  },
  warn: (message: string, ...args: unknown[]) => {
    console.warn(`[calltrace] ${message}`, ...args);
  },
};
