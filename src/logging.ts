/**
 * Logger configuration for actor diagnostics.
 *
 * Reads:
 * - `ACTOR_LOG_LEVEL` (default `INFO`)
 * - `ACTOR_LOG_FORMAT`: `pretty` | `json` | `logfmt` (default `logfmt`)
 *
 * @module
 */
import { Config, Effect, Layer, LogLevel, Logger } from "effect";

export type LogFormat = "pretty" | "json" | "logfmt";

export const LoggingConfig = Config.all({
  level: Config.logLevel("ACTOR_LOG_LEVEL").pipe(Config.withDefault(LogLevel.Info)),
  format: Config.literal("pretty", "json", "logfmt")("ACTOR_LOG_FORMAT").pipe(
    Config.withDefault("logfmt"),
  ),
});

const formatLayer = (format: LogFormat): Layer.Layer<never> => {
  switch (format) {
    case "pretty":
      return Logger.pretty;
    case "json":
      return Logger.json;
    case "logfmt":
      return Logger.logFmt;
  }
};

/**
 * Installs the configured logger and minimum log level.
 */
export const ActorLogging = Layer.unwrapEffect(
  Effect.map(LoggingConfig, ({ level, format }) =>
    Layer.merge(formatLayer(format), Logger.minimumLogLevel(level)),
  ),
);
