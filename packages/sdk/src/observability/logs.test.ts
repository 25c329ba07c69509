import { describe, it, expect, vi, afterEach } from "vitest";
import { Logger } from "./logs.js";

describe("Logger", () => {
  const originalDebug = process.env.SLOTBANK_DEBUG;

  afterEach(() => {
    vi.restoreAllMocks();
    if (originalDebug !== undefined) {
      process.env.SLOTBANK_DEBUG = originalDebug;
    } else {
      delete process.env.SLOTBANK_DEBUG;
    }
  });

  it("should write warnings to stderr with account and file", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const log = new Logger();

    log.warn("name.truncated", { account: 12, message: "shortened", file: "/a.dat" });

    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn.mock.calls[0]?.[0]).toMatch(
      /^\[.+\] \[WARN\] \[name\.truncated\] #12 shortened \(\/a\.dat\)$/
    );
  });

  it("should label slot positions and append details", () => {
    const error = vi.spyOn(console, "error").mockImplementation(() => {});
    const log = new Logger();

    log.error("store.short_read", { position: 98, details: { bytesRead: 20 } });

    expect(error.mock.calls[0]?.[0]).toMatch(/\[ERROR\] \[store\.short_read\] slot 98 \{"bytesRead":20\}$/);
  });

  it("should print debug lines only when SLOTBANK_DEBUG is set", () => {
    const debug = vi.spyOn(console, "debug").mockImplementation(() => {});
    const log = new Logger();

    delete process.env.SLOTBANK_DEBUG;
    log.debug("store.open");
    expect(debug).not.toHaveBeenCalled();

    process.env.SLOTBANK_DEBUG = "1";
    log.debug("store.open");
    expect(debug).toHaveBeenCalledTimes(1);
  });

  it("should drop everything when disabled", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const log = new Logger();

    log.setEnabled(false);
    log.info("store.initialize");
    log.warn("store.audit_failed");

    expect(warn).not.toHaveBeenCalled();
  });
});
