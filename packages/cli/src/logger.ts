/** Line-oriented logger. Everything goes to stderr: stdout may carry an archive. */
export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export interface LoggerOptions {
  /** Print `debug` messages */
  readonly verbose: boolean;
  /** Tag prepended to every line (default: the program name) */
  readonly prefix?: string;
  /** Where lines go (default: console.error) */
  readonly sink?: (line: string) => void;
}

export const PROGRAM_NAME = "lattice-remove-ctc-blank";

export function createLogger(options: LoggerOptions): Logger {
  const tag = `[${options.prefix ?? PROGRAM_NAME}]`;
  const sink = options.sink ?? ((line: string) => console.error(line));
  return {
    debug(message) {
      if (options.verbose) sink(`${tag} ${message}`);
    },
    info(message) {
      sink(`${tag} ${message}`);
    },
    warn(message) {
      sink(`${tag} warning: ${message}`);
    },
    error(message) {
      sink(`${tag} error: ${message}`);
    },
  };
}
