export type RecordCollection = 'visits' | 'bookings';

export type RecordWriteKind = 'create' | 'update';

/** Notification that a document changed. Carries identity only; readers re-fetch current state. */
export interface RecordWriteEvent {
  collection: RecordCollection;
  id: string;
  kind: RecordWriteKind;
}

export type RecordWriteHandler = (event: RecordWriteEvent) => void | Promise<void>;

export interface RecordWriteFeedPort {
  /** Returns an unsubscribe function. */
  subscribe(collection: RecordCollection, handler: RecordWriteHandler): () => void;
  start(): Promise<void>;
  close(): Promise<void>;
}
