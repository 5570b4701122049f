import { afterEach, describe, it, expect, vi } from "vitest";
import { Effect, LogLevel } from "effect";
import { formatLogLine, loggerLayer, parseLogLevel } from "@ranktok/effect-runtime";

describe("formatLogLine", () => {
  const date = new Date("2024-01-02T03:04:05.678Z");

  it("prints the UTC time and a padded level", () => {
    expect(formatLogLine("info", "hello", date)).toBe("[03:04:05.678] INFO  hello");
    expect(formatLogLine("ERROR", "bad", date)).toBe("[03:04:05.678] ERROR bad");
  });

  it("joins message parts and encodes non-strings", () => {
    expect(formatLogLine("DEBUG", ["loaded", 3, { name: "toy" }], date)).toBe(
      '[03:04:05.678] DEBUG loaded 3 {"name":"toy"}',
    );
  });
});

describe("parseLogLevel", () => {
  it("understands the usual names", () => {
    expect(parseLogLevel("debug")).toBe(LogLevel.Debug);
    expect(parseLogLevel("INFO")).toBe(LogLevel.Info);
    expect(parseLogLevel("warn")).toBe(LogLevel.Warning);
    expect(parseLogLevel("warning")).toBe(LogLevel.Warning);
    expect(parseLogLevel("error")).toBe(LogLevel.Error);
    expect(parseLogLevel("none")).toBe(LogLevel.None);
  });

  it("falls back to info", () => {
    expect(parseLogLevel("chatty")).toBe(LogLevel.Info);
  });
});

describe("loggerLayer", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("writes lines at or above the minimum level to stderr", () => {
    const lines: string[] = [];
    vi.spyOn(process.stderr, "write").mockImplementation((chunk: string | Uint8Array) => {
      lines.push(String(chunk));
      return true;
    });

    Effect.runSync(
      Effect.logDebug("hidden").pipe(
        Effect.zipRight(Effect.logWarning("shown")),
        Effect.provide(loggerLayer(LogLevel.Info)),
      ),
    );

    expect(lines).toHaveLength(1);
    expect(lines[0]).toMatch(/^\[\d\d:\d\d:\d\d\.\d{3}\] WARN  shown\n$/);
  });

  it("drops everything at level none", () => {
    const write = vi.spyOn(process.stderr, "write").mockImplementation(() => true);
    Effect.runSync(Effect.logError("quiet").pipe(Effect.provide(loggerLayer(LogLevel.None))));
    expect(write).not.toHaveBeenCalled();
  });
});
