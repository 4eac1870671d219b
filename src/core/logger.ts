import pino from "pino";

export interface LoggerOptions {
  level: string;
  pretty: boolean;
}

export function createLogger(options: LoggerOptions) {
  return pino({
    level: options.level,
    transport: options.pretty
      ? {
          target: "pino-pretty",
          options: {
            colorize: true,
            translateTime: "SYS:standard",
            ignore: "pid,hostname",
          },
        }
      : undefined,
  });
}

export type Logger = ReturnType<typeof createLogger>;

export let logger: Logger = createLogger({ level: "info", pretty: false });

export function configureLogger(options: LoggerOptions): Logger {
  logger = createLogger(options);
  return logger;
}
