import type {
  RecordCollection,
  RecordWriteEvent,
  RecordWriteFeedPort,
  RecordWriteHandler,
} from '@field-visit/domain';

/**
 * In-process write feed. Deliveries are scheduled on a later macrotask, so a writer's call resolves
 * before any subscriber runs, like a database trigger firing after commit.
 */
export class InMemoryWriteFeed implements RecordWriteFeedPort {
  private readonly handlers = new Map<RecordCollection, Set<RecordWriteHandler>>();
  private readonly pending = new Set<Promise<void>>();
  private closed = false;

  subscribe(collection: RecordCollection, handler: RecordWriteHandler): () => void {
    let set = this.handlers.get(collection);
    if (!set) {
      set = new Set();
      this.handlers.set(collection, set);
    }
    set.add(handler);
    return () => {
      this.handlers.get(collection)?.delete(handler);
    };
  }

  async start(): Promise<void> {
    this.closed = false;
  }

  async close(): Promise<void> {
    this.closed = true;
    this.handlers.clear();
    await this.drain();
  }

  emit(event: RecordWriteEvent): void {
    if (this.closed) return;
    for (const handler of this.handlers.get(event.collection) ?? []) {
      const delivery: Promise<void> = new Promise<void>((resolve) => setImmediate(resolve))
        .then(() => handler(event))
        .catch((err: unknown) => {
          console.error(`[memory-feed] ${event.collection} handler failed for ${event.id}`, err);
        })
        .finally(() => {
          this.pending.delete(delivery);
        });
      this.pending.add(delivery);
    }
  }

  /** Resolves once every delivery, including those scheduled by handlers themselves, has settled. */
  async drain(): Promise<void> {
    while (this.pending.size > 0) {
      await Promise.all([...this.pending]);
    }
  }
}
