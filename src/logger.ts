/**
 * Diagnostic logger.
 *
 * Everything written here goes to stderr so that stdout carries only payload
 * (command output, Markdown, JSON). Messages carry their own severity glyph.
 */

export type Logger = {
  info: (message: string) => void;
  warn: (message: string) => void;
  error: (message: string) => void;
  debug: (message: string) => void;
};

export type LogStream = {
  write: (chunk: string) => unknown;
  isTTY?: boolean;
};

export type LoggerOptions = {
  /** Destination stream (default: process.stderr). */
  stream?: LogStream;
  /** Print debug lines. */
  verbose?: boolean;
  /** Force ANSI colors on or off (default: stream is a TTY). */
  color?: boolean;
};

// Theme helper for terminal output
export const theme = {
  error: (s: string) => `\x1b[31m${s}\x1b[0m`,
  success: (s: string) => `\x1b[32m${s}\x1b[0m`,
  warn: (s: string) => `\x1b[33m${s}\x1b[0m`,
  info: (s: string) => `\x1b[34m${s}\x1b[0m`,
  muted: (s: string) => `\x1b[90m${s}\x1b[0m`,
} as const;

export function createLogger(options?: LoggerOptions): Logger {
  const stream = options?.stream ?? process.stderr;
  const color = options?.color ?? stream.isTTY === true;
  const verbose = options?.verbose ?? false;

  const write = (message: string, paint: (s: string) => string) => {
    stream.write(`${color ? paint(message) : message}\n`);
  };

  return {
    info: (message) => write(message, (s) => s),
    warn: (message) => write(message, theme.warn),
    error: (message) => write(message, theme.error),
    debug: (message) => {
      if (verbose) write(message, theme.muted);
    },
  };
}

/** A logger that discards everything. */
export const silentLogger: Logger = {
  info: () => {},
  warn: () => {},
  error: () => {},
  debug: () => {},
};
