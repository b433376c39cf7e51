import type { BookingFailureReason } from './types.js';

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export class TransientSourceError extends Error {
  public readonly status?: number;

  constructor(message: string, options: { status?: number; cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = 'TransientSourceError';
    this.status = options.status;
  }
}

export class InvalidTimeFormat extends Error {
  public readonly value: string;

  constructor(value: string, message = `Unrecognized time value "${value}"`) {
    super(message);
    this.name = 'InvalidTimeFormat';
    this.value = value;
  }
}

export type InvalidBookingKind = 'malformed' | 'invalid-window';

export class InvalidBooking extends Error {
  public readonly bookingId: string | null;
  public readonly kind: InvalidBookingKind;

  constructor(message: string, bookingId: string | null = null, kind: InvalidBookingKind = 'malformed') {
    super(message);
    this.name = 'InvalidBooking';
    this.bookingId = bookingId;
    this.kind = kind;
  }
}

export type CameraFailureReason =
  | 'not-found'
  | 'permission-denied'
  | 'busy'
  | 'configuration-rejected'
  | 'no-frame'
  | 'process-error'
  | 'timeout'
  | 'unknown';

export class CameraDriverError extends Error {
  public readonly reason: CameraFailureReason;

  constructor(reason: CameraFailureReason, message: string, options: { cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = 'CameraDriverError';
    this.reason = reason;
  }
}

export class CameraInitError extends Error {
  public readonly cameraId: string;
  public readonly reason: CameraFailureReason;
  public readonly step: string;

  constructor(cameraId: string, step: string, reason: CameraFailureReason, message: string) {
    super(`Camera ${cameraId} failed to initialize during ${step}: ${message}`);
    this.name = 'CameraInitError';
    this.cameraId = cameraId;
    this.reason = reason;
    this.step = step;
  }
}

export class ResourceConflictError extends Error {
  public readonly cameraId: string;
  public readonly bookingId: string;
  public readonly heldBy: string;
  public readonly reason: BookingFailureReason = 'conflict';

  constructor(cameraId: string, bookingId: string, heldBy: string) {
    super(`Booking ${bookingId} overlaps booking ${heldBy} on camera ${cameraId}`);
    this.name = 'ResourceConflictError';
    this.cameraId = cameraId;
    this.bookingId = bookingId;
    this.heldBy = heldBy;
  }
}

export class UploadError extends Error {
  public readonly code: string;

  constructor(message: string, code = 'upload-failed', options: { cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = 'UploadError';
    this.code = code;
  }
}

export class PermanentUploadFailure extends Error {
  public readonly bookingId: string;
  public readonly attempts: number;

  constructor(bookingId: string, attempts: number, lastError: string | null) {
    super(
      `Upload for booking ${bookingId} failed after ${attempts} attempts${lastError ? `: ${lastError}` : ''}`
    );
    this.name = 'PermanentUploadFailure';
    this.bookingId = bookingId;
    this.attempts = attempts;
  }
}

export class OperationTimeoutError extends Error {
  public readonly operation: string;
  public readonly timeoutMs: number;

  constructor(operation: string, timeoutMs: number) {
    super(`${operation} timed out after ${timeoutMs}ms`);
    this.name = 'OperationTimeoutError';
    this.operation = operation;
    this.timeoutMs = timeoutMs;
  }
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
