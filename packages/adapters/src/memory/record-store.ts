import { InMemoryWriteFeed } from './write-feed.js';
import { InMemoryVisitRepository } from './visit.repository.js';
import { InMemoryBookingRepository } from './booking.repository.js';

export interface InMemoryRecordStore {
  feed: InMemoryWriteFeed;
  visits: InMemoryVisitRepository;
  bookings: InMemoryBookingRepository;
}

/** Visits and bookings as two independent collections sharing one write feed. */
export function createInMemoryRecordStore(now?: () => Date): InMemoryRecordStore {
  const feed = new InMemoryWriteFeed();
  return {
    feed,
    visits: new InMemoryVisitRepository(feed, now),
    bookings: new InMemoryBookingRepository(feed, now),
  };
}
