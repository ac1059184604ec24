import { Config, Effect, HashMap, Layer, Logger, LogLevel } from "effect";

export type LogFormat = "pretty" | "json";

export interface LogEntry {
  readonly timestamp: string;
  readonly level: string;
  readonly message: string;
  readonly data?: Record<string, unknown>;
}

const renderMessage = (message: unknown): string => {
  if (Array.isArray(message)) {
    return message.map(renderMessage).join(" ");
  }
  return typeof message === "string" ? message : JSON.stringify(message);
};

/**
 * Render one log line. Pretty lines look like `[2025-05-20T12:00:00.000Z] [INFO] message {"k":"v"}`.
 */
export const formatLogLine = (entry: LogEntry, format: LogFormat): string => {
  if (format === "json") {
    return JSON.stringify(entry);
  }
  const prefix = `[${entry.timestamp}] [${entry.level}]`;
  return entry.data ? `${prefix} ${entry.message} ${JSON.stringify(entry.data)}` : `${prefix} ${entry.message}`;
};

export const makeLogger = (format: LogFormat) =>
  Logger.make(({ logLevel, message, annotations, date }) => {
    const data = Object.fromEntries(HashMap.toEntries(annotations));
    const line = formatLogLine(
      {
        timestamp: date.toISOString(),
        level: logLevel.label,
        message: renderMessage(message),
        ...(Object.keys(data).length > 0 ? { data } : {}),
      },
      format
    );

    if (LogLevel.greaterThanEqual(logLevel, LogLevel.Error)) {
      globalThis.console.error(line);
    } else {
      globalThis.console.log(line);
    }
  });

export const LogConfig = Config.all({
  level: Config.literal("debug", "info", "warn", "error")("LOG_LEVEL").pipe(
    Config.withDefault("info" as const)
  ),
  format: Config.literal("pretty", "json")("LOG_FORMAT").pipe(Config.withDefault("pretty" as const)),
});

const minimumLevel = {
  debug: LogLevel.Debug,
  info: LogLevel.Info,
  warn: LogLevel.Warning,
  error: LogLevel.Error,
} as const;

/**
 * Replaces the default Effect logger and applies LOG_LEVEL. `--debug` maps to LOG_LEVEL=debug.
 */
export const LoggerLive = Layer.unwrapEffect(
  Effect.map(LogConfig, ({ level, format }) =>
    Layer.merge(
      Logger.replace(Logger.defaultLogger, makeLogger(format)),
      Logger.minimumLogLevel(minimumLevel[level])
    )
  )
);
