import { IndexOutOfRangeError } from '../replay/errors';
import type { Entry } from '../replay/types';

export class EntryStore {
  private readonly items: Entry[];

  constructor(entries: Iterable<Entry> = []) {
    this.items = Array.from(entries);
  }

  /** Live view of the store: it reflects later removals. */
  public entries(): readonly Entry[] {
    return this.items;
  }

  public count(): number {
    return this.items.length;
  }

  public removeAt(index: number): Entry {
    if (!Number.isInteger(index) || index < 0 || index >= this.items.length) {
      throw new IndexOutOfRangeError(index, this.items.length);
    }
    const [removed] = this.items.splice(index, 1);
    return removed;
  }
}
