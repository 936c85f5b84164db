interface LoggerOptions {
  quiet?: boolean;
  json?: boolean;
  verbose?: boolean;
  /** Send info and debug output to stderr so stdout carries only records. */
  stderr?: boolean;
}

class Logger {
  private options: LoggerOptions;

  constructor(options: LoggerOptions = {}) {
    this.options = options;
  }

  private out(line: string): void {
    if (this.options.stderr) {
      console.error(line);
    } else {
      console.log(line);
    }
  }

  info(message: string, data?: Record<string, unknown>): void {
    if (this.options.quiet) return;

    if (this.options.json) {
      this.out(JSON.stringify({ level: "info", message, ...data }));
    } else {
      this.out(message);
      if (data) {
        console.dir(data, { depth: null, colors: true });
      }
    }
  }

  /** Only printed with --verbose. */
  debug(message: string, data?: Record<string, unknown>): void {
    if (this.options.quiet || !this.options.verbose) return;

    if (this.options.json) {
      this.out(JSON.stringify({ level: "debug", message, ...data }));
    } else {
      this.out(message);
      if (data) {
        console.dir(data, { depth: null, colors: true });
      }
    }
  }

  warn(message: string, data?: Record<string, unknown>): void {
    if (this.options.quiet) return;

    if (this.options.json) {
      console.warn(JSON.stringify({ level: "warn", message, ...data }));
    } else {
      console.warn(message);
      if (data) {
        console.dir(data, { depth: null, colors: true });
      }
    }
  }

  /** Errors are printed even in quiet mode. */
  error(message: string, error?: unknown): void {
    if (this.options.json) {
      const errorData = error instanceof Error ? { error: error.message, stack: error.stack } : { error };
      console.error(JSON.stringify({ level: "error", message, ...errorData }));
    } else {
      console.error(message);
      if (error) {
        if (error instanceof Error) {
          console.error(error);
        } else {
          console.dir(error, { depth: null, colors: true });
        }
      }
    }
  }

  setOptions(options: LoggerOptions): void {
    this.options = { ...this.options, ...options };
  }

  reset(): void {
    this.options = {};
  }
}

export type { LoggerOptions };
export const logger = new Logger();
