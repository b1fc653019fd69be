import { afterEach, describe, it, expect, vi } from "vitest";
import { ScopedLogger } from "@/lib/logger";

afterEach(() => {
  vi.restoreAllMocks();
});

describe("ScopedLogger", () => {
  it("prefixes messages with level and scope", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    new ScopedLogger("pipeline", "debug").warn("skipped entry", { path: "drugs.d1" });
    expect(warn).toHaveBeenCalledWith("[WARN] [pipeline] skipped entry", { path: "drugs.d1" });
  });

  it("drops messages below the minimum level", () => {
    const info = vi.spyOn(console, "info").mockImplementation(() => {});
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const log = new ScopedLogger("pipeline", "warn");
    log.info("hidden");
    log.warn("shown");
    expect(info).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledTimes(1);
  });

  it("is quiet when silent", () => {
    const error = vi.spyOn(console, "error").mockImplementation(() => {});
    new ScopedLogger("pipeline", "silent").error("boom", new Error("x"));
    expect(error).not.toHaveBeenCalled();
  });

  it("attaches the error message to the context", () => {
    const error = vi.spyOn(console, "error").mockImplementation(() => {});
    new ScopedLogger("store", "info").error("read failed", new Error("connection reset"), { gene: "TP53" });
    expect(error).toHaveBeenCalledWith(
      "[ERROR] [store] read failed",
      expect.objectContaining({ gene: "TP53", error: expect.objectContaining({ message: "connection reset" }) }),
    );
  });

  it("defaults to info for an unknown level", () => {
    const debug = vi.spyOn(console, "debug").mockImplementation(() => {});
    const info = vi.spyOn(console, "info").mockImplementation(() => {});
    const log = new ScopedLogger("x", "verbose");
    log.debug("hidden");
    log.info("shown");
    expect(debug).not.toHaveBeenCalled();
    expect(info).toHaveBeenCalledWith("[INFO] [x] shown", "");
  });
});
