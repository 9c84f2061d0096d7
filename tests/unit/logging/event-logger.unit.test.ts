import { describe, it, expect, vi } from "vitest";
import { PassThrough } from "node:stream";
import { createEventLogger } from "../../../src/logging/event-logger";

const capture = (stream: PassThrough): (() => string) => {
  let output = "";
  stream.on("data", (chunk: Buffer) => {
    output += chunk.toString("utf-8");
  });
  return () => output;
};

describe("logging", () => {
  describe("event-logger", () => {
    it("should emit stable JSONL with sorted keys", () => {
      const stream = new PassThrough();
      const output = capture(stream);

      const logger = createEventLogger({ mode: "ci", stream, format: "jsonl" });

      logger.emitEvent({
        event: "no-match",
        method: "GET",
        url: "https://x/y",
        remaining: 0,
      });

      expect(output()).toBe('{"event":"no-match","method":"GET","remaining":0,"url":"https://x/y"}\n');
    });

    it("should drop undefined fields from JSONL", () => {
      const stream = new PassThrough();
      const output = capture(stream);

      const logger = createEventLogger({ mode: "ci", stream });

      logger.emitEvent({
        event: "candidate-evaluated",
        entryIndex: 2,
        method: "GET",
        url: "https://shop.test/",
        strict: false,
        result: "matched",
        failures: undefined,
      });

      expect(output()).toBe(
        '{"entryIndex":2,"event":"candidate-evaluated","method":"GET","result":"matched","strict":false,"url":"https://shop.test/"}\n'
      );
    });

    it("should render pretty output with a coloured status line", () => {
      const stream = new PassThrough();
      const output = capture(stream);

      const logger = createEventLogger({ mode: "cli", stream, format: "pretty" });

      logger.emitEvent({
        event: "candidate-evaluated",
        entryIndex: 0,
        method: "GET",
        url: "https://shop.test/cart",
        strict: true,
        result: "not-matched",
        failures: ["header-order", "body"],
      });

      expect(output()).toBe(
        [
          "\u001b[31m✖ Candidate evaluated\u001b[0m",
          " ○ entryIndex=0",
          " ○ method=GET",
          " ○ url=https://shop.test/cart",
          " ○ strict=true",
          " ○ failures=header-order,body",
        ].join("\n") + "\n"
      );
    });

    it("should pass every event to subscribers", () => {
      const logger = createEventLogger({ mode: "ci", stream: new PassThrough() });
      const handler = vi.fn();
      logger.onEvent(handler);

      logger.emitEvent({ event: "server-ready", port: 4010 });

      expect(handler).toHaveBeenCalledWith({ event: "server-ready", port: 4010 });
    });
  });
});
