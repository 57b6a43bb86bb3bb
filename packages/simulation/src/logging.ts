export type LogContext = Record<string, unknown>;

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
}

export function createConsoleLogger(scope: string, options: { debug?: boolean } = {}): Logger {
  const prefix = `[${scope}]`;
  const format = (message: string, context?: LogContext): string =>
    context && Object.keys(context).length > 0 ? `${prefix} ${message} ${JSON.stringify(context)}` : `${prefix} ${message}`;

  return {
    debug: (message, context) => {
      if (options.debug) console.log(format(message, context));
    },
    info: (message, context) => console.log(format(message, context)),
    warn: (message, context) => console.warn(format(message, context)),
    error: (message, context) => console.error(format(message, context)),
  };
}

export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};
