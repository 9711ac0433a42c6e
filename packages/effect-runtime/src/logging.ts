/**
 * Structured logging and tracing integration.
 *
 * Provides a console logger with a compact line format, a layer that
 * installs it at a chosen level, and span helpers for tracing I/O paths.
 */
import { Effect, Layer, Logger, LogLevel } from "effect";

// ── Message formatting ─────────────────────────────────────────────────────

/** Render a log message; `Effect.log("a", "b")` arrives as an array. */
export function formatMessage(message: unknown): string {
  if (Array.isArray(message)) return message.map(formatMessage).join(" ");
  if (typeof message === "string") return message;
  if (message instanceof Error) return message.message;
  return JSON.stringify(message) ?? String(message);
}

// ── Pretty logger ──────────────────────────────────────────────────────────

export const prettyLogger = Logger.make(({ logLevel, message, date }) => {
  const ts = date.toISOString().slice(11, 23);
  const lvl = logLevel.label.toUpperCase().padEnd(5);
  console.log(`[${ts}] ${lvl} ${formatMessage(message)}`);
});

/** Replace the default logger with `prettyLogger` and set the minimum level. */
export function loggerLayer(level: LogLevel.LogLevel = LogLevel.Info): Layer.Layer<never> {
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
