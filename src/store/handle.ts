/**
 * Swappable pointer to the Metadata Store the Serving Layer reads.
 */
import type { MetadataStore } from "./metadata.js";

export class StoreHandle {
  private store: MetadataStore;

  constructor(store: MetadataStore) {
    store.markLive();
    this.store = store;
  }

  get current(): MetadataStore {
    return this.store;
  }

  /**
   * Point readers at `next` and return the previous store. Requests already
   * running finish against the store they started with; the caller decides
   * when to close the returned one.
   */
  swap(next: MetadataStore): MetadataStore {
    next.markLive();
    const previous = this.store;
    this.store = next;
    return previous;
  }
}
