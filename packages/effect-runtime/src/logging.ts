/**
 * Structured logging and tracing integration.
 *
 * Provides a console logger for the CLI, a layer that installs it with a
 * minimum level, and span helpers for the long-running commands.
 */
import { Effect, Layer, Logger, LogLevel } from "effect";

// ── Pretty logger ──────────────────────────────────────────────────────────

/** Flatten a log message; Effect passes multiple arguments as an array. */
export function formatMessage(message: unknown): string {
  const parts = Array.isArray(message) ? message : [message];
  return parts
    .map((m) => (typeof m === "string" ? m : JSON.stringify(m)))
    .join(" ");
}

export const prettyLogger = Logger.make(({ logLevel, message, date }) => {
  const ts = date.toISOString().slice(11, 23);
  const lvl = logLevel.label.toUpperCase().padEnd(5);
  console.log(`[${ts}] ${lvl} ${formatMessage(message)}`);
});

/** Replace the default logger with `prettyLogger` and set the floor. */
export function prettyLoggerLayer(level: LogLevel.LogLevel): Layer.Layer<never> {
  return Layer.merge(
    Logger.replace(Logger.defaultLogger, prettyLogger),
    Logger.minimumLogLevel(level),
  );
}

// ── Span helpers ───────────────────────────────────────────────────────────

export function withSpan<A, E, R>(name: string, effect: Effect.Effect<A, E, R>): Effect.Effect<A, E, R> {
  return Effect.withSpan(name)(effect);
}

// ── Log level from string ──────────────────────────────────────────────────

export function parseLogLevel(level: string): LogLevel.LogLevel {
  switch (level.toLowerCase()) {
    case "debug": return LogLevel.Debug;
    case "info": return LogLevel.Info;
    case "warn":
    case "warning": return LogLevel.Warning;
    case "error": return LogLevel.Error;
    default: return LogLevel.Info;
  }
}
