import { describe, it, expect, beforeEach } from "vitest";
import { loadFs, resetFs, writeCapture } from "../../helpers/memfs";
import { loadCapture } from "../../../src/capture/loader";
import { MalformedCaptureError } from "../../../src/replay/errors";
import type { EventLogger, LogEvent } from "../../../src/logging/event-logger";
import { capture, harEntry } from "../../helpers/capture";

describe("capture", () => {
  describe("loader", () => {
    let events: LogEvent[];
    let eventLogger: EventLogger;

    beforeEach(() => {
      resetFs();
      events = [];
      eventLogger = {
        emitEvent: (event) => {
          events.push(event);
        },
        onEvent: () => undefined,
      };
    });

    it("should load a capture and announce it", async () => {
      writeCapture("/captures/session.har", capture([harEntry()]));

      const loaded = await loadCapture("/captures/session.har", eventLogger);

      expect(loaded.sourcePath).toBe("/captures/session.har");
      expect(loaded.log.entries).toHaveLength(1);
      expect(events).toEqual([
        { event: "capture-validated", file: "/captures/session.har", result: "ok", errors: undefined },
        {
          event: "capture-loaded",
          file: "/captures/session.har",
          summary: "Firefox 128.0, 1 Requests",
          entries: 1,
        },
      ]);
    });

    it("should reject a malformed capture with every error", async () => {
      loadFs({ "/captures/bad.har": '{"log": {"entries": {}}}' });

      const attempt = loadCapture("/captures/bad.har", eventLogger);

      await expect(attempt).rejects.toBeInstanceOf(MalformedCaptureError);
      await expect(attempt).rejects.toMatchObject({
        file: "/captures/bad.har",
        message: "ERROR /captures/bad.har\n ○ log.entries\n   → entries must be an array",
      });
      expect(events).toHaveLength(1);
      expect(events[0]).toMatchObject({ event: "capture-validated", result: "failed" });
    });
  });
});
