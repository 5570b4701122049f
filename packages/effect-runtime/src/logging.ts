/**
 * Structured logging and tracing integration.
 *
 * The logger writes to stderr so command output on stdout stays
 * machine-readable.
 */
import { Effect, Layer, Logger, LogLevel } from "effect";

// ── Pretty logger ──────────────────────────────────────────────────────────

export function formatLogLine(label: string, message: unknown, date: Date): string {
  const ts = date.toISOString().slice(11, 23);
  const lvl = label.toUpperCase().padEnd(5);
  const parts = Array.isArray(message) ? message : [message];
  const msg = parts.map((m) => (typeof m === "string" ? m : JSON.stringify(m))).join(" ");
  return `[${ts}] ${lvl} ${msg}`;
}

export const prettyLogger = Logger.make(({ logLevel, message, date }) => {
  process.stderr.write(formatLogLine(logLevel.label, message, date) + "\n");
});

/** Replace the default logger with `prettyLogger` and drop lines below `level`. */
export function loggerLayer(level: LogLevel.LogLevel): Layer.Layer<never> {
  return Layer.merge(Logger.replace(Logger.defaultLogger, prettyLogger), Logger.minimumLogLevel(level));
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
    case "none": return LogLevel.None;
    default: return LogLevel.Info;
  }
}
