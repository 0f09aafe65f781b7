import { describe, it, expect, vi, afterEach } from "vitest";
import { createLogger } from "../logger";

describe("createLogger", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("prints debug lines only in debug mode", () => {
    const debug = vi.spyOn(console, "debug").mockImplementation(() => {});

    createLogger().debug("hidden");
    createLogger({ debug: true }).debug("shown");

    expect(debug).toHaveBeenCalledTimes(1);
    expect(String(debug.mock.calls[0][0])).toContain("shown");
  });

  it("routes warnings to console.warn", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});

    createLogger().warn("careful");

    expect(warn).toHaveBeenCalledTimes(1);
    expect(String(warn.mock.calls[0][0])).toContain("careful");
  });
});
