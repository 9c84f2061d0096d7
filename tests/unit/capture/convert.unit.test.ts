import { describe, it, expect } from "vitest";
import { describeCapture, toEntry } from "../../../src/capture/convert";
import { capture, harEntry } from "../../helpers/capture";

const text = (body: Uint8Array): string => new TextDecoder().decode(body);

describe("capture", () => {
  describe("convert", () => {
    it("should keep request headers in capture order without pseudo-headers", () => {
      const converted = toEntry(
        harEntry({
          request: {
            method: "POST",
            url: "https://shop.test/cart",
            headers: [
              { name: ":authority", value: "shop.test" },
              { name: "User-Agent", value: "agent" },
              { name: "Accept", value: "*/*" },
            ],
            postData: { mimeType: "application/x-www-form-urlencoded", text: "x=1" },
          },
        })
      );

      expect(converted.request.headers).toEqual([
        ["User-Agent", "agent"],
        ["Accept", "*/*"],
      ]);
      expect(text(converted.request.body)).toBe("x=1");
      expect(converted.redirectTarget).toBe("");
    });

    it("should leave the request body empty without post data", () => {
      expect(toEntry(harEntry()).request.body.byteLength).toBe(0);
    });

    it("should decode base64 response content", () => {
      const converted = toEntry(
        harEntry({
          response: {
            status: 302,
            headers: [{ name: "Location", value: "/next" }],
            content: { text: Buffer.from("moved").toString("base64"), encoding: "base64" },
            redirectURL: "/next",
          },
        })
      );

      expect(text(converted.response.body)).toBe("moved");
      expect(converted.response.headers).toEqual([["Location", "/next"]]);
      expect(converted.redirectTarget).toBe("/next");
    });

    it("should summarize the capture creator and size", () => {
      expect(describeCapture(capture([harEntry(), harEntry()]))).toBe("Firefox 128.0, 2 Requests");
      expect(describeCapture(capture([], { name: "Charles" }))).toBe("Charles, 0 Requests");
      expect(describeCapture({ log: { entries: [] } })).toBe("unknown, 0 Requests");
    });
  });
});
