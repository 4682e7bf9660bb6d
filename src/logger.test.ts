import { afterEach, describe, expect, it, vi } from "vitest";
import { log, setLogLevel } from "./logger.js";

describe("log", () => {
  afterEach(() => {
    setLogLevel("info");
    vi.restoreAllMocks();
    vi.useRealTimers();
  });

  it("writes one JSON line with metadata", () => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date("2025-03-01T12:00:00.000Z"));
    const spy = vi.spyOn(console, "log").mockImplementation(() => undefined);

    log("warn", "Trends request failed", { status: 429 });

    expect(spy).toHaveBeenCalledWith(
      '{"level":"warn","message":"Trends request failed","time":"2025-03-01T12:00:00.000Z","status":429}'
    );
  });

  it("drops records below the configured level", () => {
    const spy = vi.spyOn(console, "log").mockImplementation(() => undefined);

    log("debug", "hidden");
    setLogLevel("debug");
    log("debug", "shown");
    setLogLevel("error");
    log("warn", "hidden too");

    expect(spy).toHaveBeenCalledTimes(1);
    expect(spy.mock.calls[0][0]).toContain('"message":"shown"');
  });
});
