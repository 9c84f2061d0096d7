import { describe, it, expect } from "vitest";
import { EntryStore } from "../../../src/store/entry-store";
import { IndexOutOfRangeError } from "../../../src/replay/errors";
import { entry } from "../../helpers/capture";

describe("store", () => {
  describe("entry-store", () => {
    const urls = (store: EntryStore) => store.entries().map((item) => item.request.url);

    it("should keep capture order", () => {
      const store = new EntryStore([
        entry({ url: "https://shop.test/1" }),
        entry({ url: "https://shop.test/2" }),
      ]);

      expect(store.count()).toBe(2);
      expect(urls(store)).toEqual(["https://shop.test/1", "https://shop.test/2"]);
    });

    it("should remove exactly one entry and preserve the order of the rest", () => {
      const store = new EntryStore([
        entry({ url: "https://shop.test/1" }),
        entry({ url: "https://shop.test/2" }),
        entry({ url: "https://shop.test/3" }),
      ]);

      const removed = store.removeAt(1);

      expect(removed.request.url).toBe("https://shop.test/2");
      expect(store.count()).toBe(2);
      expect(urls(store)).toEqual(["https://shop.test/1", "https://shop.test/3"]);
    });

    it("should reject an index outside the store", () => {
      const store = new EntryStore([entry()]);

      expect(() => store.removeAt(1)).toThrow(IndexOutOfRangeError);
      expect(() => store.removeAt(-1)).toThrow(IndexOutOfRangeError);
      expect(() => store.removeAt(0.5)).toThrow("Entry index 0.5 is out of range (store holds 1 entries)");
      expect(store.count()).toBe(1);
    });

    it("should expose a live view that reflects later removals", () => {
      const store = new EntryStore([entry({ url: "https://shop.test/1" }), entry({ url: "https://shop.test/2" })]);
      const view = store.entries();

      store.removeAt(0);

      expect(view.map((item) => item.request.url)).toEqual(["https://shop.test/2"]);
    });

    it("should not be affected by mutation of the source array", () => {
      const source = [entry()];
      const store = new EntryStore(source);
      source.push(entry());

      expect(store.count()).toBe(1);
    });
  });
});
