export interface Logger {
  debug(message: string, ...rest: unknown[]): void;
  warn(message: string, ...rest: unknown[]): void;
  error(message: string, ...rest: unknown[]): void;
}

export function isDebugEnabled(): boolean {
  return process.env.SEARCHSHELL_DEBUG === "1";
}

// Everything goes to stderr so piped stdout carries only the assistant text.
export function createLogger(tag: string): Logger {
  const prefix = `[${tag}]`;
  return {
    debug(message, ...rest) {
      if (!isDebugEnabled()) return;
      console.error(`${prefix} ${message}`, ...rest);
    },
    warn(message, ...rest) {
      console.error(`${prefix} ${message}`, ...rest);
    },
    error(message, ...rest) {
      console.error(`${prefix} ${message}`, ...rest);
    },
  };
}
