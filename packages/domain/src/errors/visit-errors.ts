import type { VisitStatus } from '../entities/visit.js';

export const VisitErrorCodes = {
  INVALID_TRANSITION: 'INVALID_TRANSITION',
  VISIT_NOT_FOUND: 'VISIT_NOT_FOUND',
  BOOKING_NOT_FOUND: 'BOOKING_NOT_FOUND',
  GEOCODING_FAILURE: 'GEOCODING_FAILURE',
  REGION_MONITORING_FAILURE: 'REGION_MONITORING_FAILURE',
  SYNC_WRITE_FAILURE: 'SYNC_WRITE_FAILURE',
  TRACKING_NOT_STARTED: 'TRACKING_NOT_STARTED',
} as const;

export type VisitErrorCode = (typeof VisitErrorCodes)[keyof typeof VisitErrorCodes];

export interface VisitErrorResponse {
  error: string;
  code: VisitErrorCode;
  details?: Record<string, unknown>;
}

export class VisitError extends Error {
  constructor(
    readonly code: VisitErrorCode,
    message: string,
    readonly status: number = 400,
    readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'VisitError';
  }

  toJSON(): VisitErrorResponse {
    return { error: this.message, code: this.code, details: this.details };
  }
}

export class InvalidTransitionError extends VisitError {
  constructor(
    readonly visitId: string,
    readonly from: VisitStatus,
    readonly to: VisitStatus,
  ) {
    super(VisitErrorCodes.INVALID_TRANSITION, `invalid transition from ${from} to ${to}`, 409, {
      visitId,
      from,
      to,
    });
    this.name = 'InvalidTransitionError';
  }
}

export class VisitNotFoundError extends VisitError {
  constructor(readonly visitId: string) {
    super(VisitErrorCodes.VISIT_NOT_FOUND, `visit ${visitId} not found`, 404, { visitId });
    this.name = 'VisitNotFoundError';
  }
}

export class BookingNotFoundError extends VisitError {
  constructor(readonly bookingId: string) {
    super(VisitErrorCodes.BOOKING_NOT_FOUND, `booking ${bookingId} not found`, 404, { bookingId });
    this.name = 'BookingNotFoundError';
  }
}

/** The visit address could not be turned into a coordinate; tracking cannot begin. */
export class GeocodingFailureError extends VisitError {
  constructor(
    readonly visitId: string,
    readonly address: string,
    cause?: unknown,
  ) {
    super(VisitErrorCodes.GEOCODING_FAILURE, `could not resolve address for visit ${visitId}`, 422, {
      visitId,
      address,
      ...(cause instanceof Error ? { cause: cause.message } : {}),
    });
    this.name = 'GeocodingFailureError';
  }
}

export class RegionMonitoringFailureError extends VisitError {
  constructor(
    readonly regionId: string,
    reason: string,
  ) {
    super(VisitErrorCodes.REGION_MONITORING_FAILURE, `cannot monitor region ${regionId}: ${reason}`, 503, {
      regionId,
    });
    this.name = 'RegionMonitoringFailureError';
  }
}

export class SyncWriteFailureError extends VisitError {
  constructor(
    readonly visitId: string,
    readonly bookingId: string,
    cause: unknown,
  ) {
    super(
      VisitErrorCodes.SYNC_WRITE_FAILURE,
      `failed to project visit ${visitId} onto booking ${bookingId}`,
      500,
      { visitId, bookingId, cause: cause instanceof Error ? cause.message : String(cause) },
    );
    this.name = 'SyncWriteFailureError';
  }
}

export class TrackingNotStartedError extends VisitError {
  constructor(readonly visitId: string) {
    super(VisitErrorCodes.TRACKING_NOT_STARTED, `no tracking session for visit ${visitId}`, 409, { visitId });
    this.name = 'TrackingNotStartedError';
  }
}
