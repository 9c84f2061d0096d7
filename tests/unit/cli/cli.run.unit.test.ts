import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import type { LoadedCapture } from "../../../src/capture/types";
import type { ReplayAdapter } from "../../../src/replay/adapter";
import { capture, harEntry } from "../../helpers/capture";

const originalArgv = process.argv;

const loaded: LoadedCapture = {
  ...capture([harEntry()]),
  sourcePath: "/captures/session.har",
};

vi.mock("../../../src/capture/loader", () => ({
  loadCapture: vi.fn(),
}));

vi.mock("../../../src/server/server", () => ({
  startServer: vi.fn(),
}));

vi.mock("../../../src/logging/event-logger", () => {
  const eventLogger = { emitEvent: vi.fn(), onEvent: vi.fn() };
  return {
    createEventLogger: vi.fn(() => eventLogger),
    createNullEventLogger: vi.fn(() => eventLogger),
  };
});

const runCli = async (...args: string[]): Promise<void> => {
  process.argv = ["node", "har-replay", ...args];
  await import("../../../src/cli/index");
  await new Promise((resolve) => setTimeout(resolve, 0));
};

describe("cli", () => {
  beforeEach(() => {
    vi.resetModules();
  });

  afterEach(() => {
    process.argv = originalArgv;
    process.exitCode = undefined;
    vi.clearAllMocks();
  });

  it("should load the capture and start the server with the requested policy", async () => {
    const loader = await import("../../../src/capture/loader");
    const server = await import("../../../src/server/server");
    vi.mocked(loader.loadCapture).mockResolvedValue(loaded);

    await runCli(
      "serve",
      "--capture",
      "/captures/session.har",
      "--origin",
      "https://shop.test",
      "--port",
      "5000",
      "--loose",
      "--keep-entries"
    );

    expect(loader.loadCapture).toHaveBeenCalledWith("/captures/session.har", expect.anything());

    const callArgs = vi.mocked(server.startServer).mock.calls[0]?.[0];
    const adapter: ReplayAdapter | undefined = callArgs?.adapter;
    expect(callArgs?.port).toBe(5000);
    expect(callArgs?.origin).toBe("https://shop.test");
    expect(adapter?.strictMatching).toBe(false);
    expect(adapter?.deleteAfterMatch).toBe(false);
    expect(adapter?.remaining()).toBe(1);
  });

  it("should default to strict, one-shot replay on port 4010", async () => {
    const loader = await import("../../../src/capture/loader");
    const server = await import("../../../src/server/server");
    vi.mocked(loader.loadCapture).mockResolvedValue(loaded);

    await runCli("serve", "--capture", "/captures/session.har");

    const callArgs = vi.mocked(server.startServer).mock.calls[0]?.[0];
    expect(callArgs?.port).toBe(4010);
    expect(callArgs?.origin).toBeUndefined();
    expect(callArgs?.adapter.strictMatching).toBe(true);
    expect(callArgs?.adapter.deleteAfterMatch).toBe(true);
  });

  it("should fail fast when --capture is missing", async () => {
    const server = await import("../../../src/server/server");
    const logger = await import("../../../src/logging/event-logger");

    await runCli("serve");

    expect(vi.mocked(server.startServer)).not.toHaveBeenCalled();
    expect(vi.mocked(logger.createNullEventLogger)().emitEvent).toHaveBeenCalledWith({
      event: "startup-failed",
      message: "A capture file is required (--capture <path>)",
    });
    expect(process.exitCode).toBe(1);
  });

  it("should report a capture that fails to load", async () => {
    const loader = await import("../../../src/capture/loader");
    const server = await import("../../../src/server/server");
    const logger = await import("../../../src/logging/event-logger");
    vi.mocked(loader.loadCapture).mockRejectedValue(new Error("ERROR /captures/bad.har"));

    await runCli("serve", "--capture", "/captures/bad.har");

    expect(vi.mocked(server.startServer)).not.toHaveBeenCalled();
    expect(vi.mocked(logger.createNullEventLogger)().emitEvent).toHaveBeenCalledWith({
      event: "startup-failed",
      message: "ERROR /captures/bad.har",
    });
  });
});
