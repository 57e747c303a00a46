import { describe, it, expect, vi, afterEach } from "vitest";
import * as core from "@actions/core";
import { actionsLogger, consoleLogger, silentLogger } from "../src/logging.js";

vi.mock("@actions/core", () => ({
  debug: vi.fn(),
  info: vi.fn(),
  warning: vi.fn(),
  error: vi.fn(),
}));

describe("actionsLogger", () => {
  afterEach(() => {
    vi.clearAllMocks();
  });

  it("should route each level to the matching workflow command", () => {
    actionsLogger.debug("d");
    actionsLogger.info("i");
    actionsLogger.warning("w");
    actionsLogger.error("e");

    expect(core.debug).toHaveBeenCalledWith("d");
    expect(core.info).toHaveBeenCalledWith("i");
    expect(core.warning).toHaveBeenCalledWith("w");
    expect(core.error).toHaveBeenCalledWith("e");
  });
});

describe("consoleLogger", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("should write warnings through console.warn", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});

    consoleLogger.warning("careful");

    expect(warn).toHaveBeenCalledWith("careful");
  });
});

describe("silentLogger", () => {
  it("should write nothing", () => {
    const log = vi.spyOn(console, "info").mockImplementation(() => {});

    silentLogger.info("quiet");

    expect(log).not.toHaveBeenCalled();
    log.mockRestore();
  });
});
