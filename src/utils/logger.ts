/**
 * Logger Interface for Library Code
 *
 * Library code (pipeline, crawler, embedding client, tool layer) accepts a
 * Logger via dependency injection. The CLI passes its CommandContext, the
 * stdio server passes `stderrLogger`, tests pass `silentLogger` or a mock.
 */

/**
 * Generic logger interface for library code
 *
 * Compatible with CommandContext so commands can pass ctx directly.
 */
export interface Logger {
  /** Progress message (optional) */
  info?: (message: string) => void;
  /** Log a warning message */
  warn: (message: string) => void;
  /** Log a debug message (optional - not all contexts need debug) */
  debug?: (message: string) => void;
}

/**
 * Default console logger for use when no logger is injected.
 */
export const consoleLogger: Logger = {
  info: (message: string) => console.log(message),
  warn: (message: string) => console.warn(message),
  debug: (message: string) => console.log(message),
};

/**
 * Silent logger for tests or when logging should be suppressed.
 */
export const silentLogger: Logger = {
  info: () => {},
  warn: () => {},
  debug: () => {},
};

/**
 * Logger for the stdio server. Stdout carries protocol frames, so every
 * line goes to stderr.
 */
export function createStderrLogger(verbose = false): Logger {
  const write = (level: string, message: string) => {
    process.stderr.write(`[${level}] ${message}\n`);
  };
  return {
    info: (message) => write('info', message),
    warn: (message) => write('warn', message),
    debug: verbose ? (message) => write('debug', message) : undefined,
  };
}
