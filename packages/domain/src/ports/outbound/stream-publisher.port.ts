import type { VisitRecord } from '../../entities/visit.js';
import type { BookingRecord } from '../../entities/booking.js';
import type { EtaEstimate } from '../../entities/eta-estimate.js';
import type { SamplingProfile } from '../../entities/location-point.js';

export interface StreamPublisherPort {
  publishVisit(visit: VisitRecord): Promise<void>;
  publishBooking(booking: BookingRecord): Promise<void>;
  publishEta(estimate: EtaEstimate): Promise<void>;
  /** Tells the device which accuracy profile to run. */
  publishSamplingMode(visitId: string, profile: SamplingProfile): Promise<void>;
}
