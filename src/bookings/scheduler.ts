import logger, { type ComponentLogger } from '../logger.js';
import defaultMetrics, { type MetricsRegistry } from '../metrics/index.js';
import { errorMessage } from '../errors.js';
import type { Booking, BookingFailureReason, BookingStatus } from '../types.js';
import type { BookingSource } from './source.js';

export interface BookingStatusWriter {
  markStatus(bookingId: string, status: BookingStatus, reason?: BookingFailureReason): Promise<void>;
}

const TRANSITIONS: Record<BookingStatus, readonly BookingStatus[]> = {
  scheduled: ['recording', 'failed', 'canceled'],
  recording: ['completed', 'failed', 'canceled'],
  completed: [],
  failed: [],
  canceled: []
};

export function isTerminalStatus(status: BookingStatus): boolean {
  return TRANSITIONS[status].length === 0;
}

export function canTransition(from: BookingStatus, to: BookingStatus): boolean {
  return TRANSITIONS[from].includes(to);
}

export type ActiveBooking = {
  cameraId: string;
  bookingId: string;
  endsAt: number;
};

export type BookingConflict = {
  booking: Booking;
  heldBy: string;
};

export type CameraPlan = {
  cameraId: string;
  candidate: Booking | null;
  conflicts: BookingConflict[];
  expired: Booking[];
};

function isPlannable(booking: Booking): boolean {
  return booking.status === 'scheduled' || booking.status === 'recording';
}

function compareBookings(a: Booking, b: Booking): number {
  const byStart = a.startsAt.getTime() - b.startsAt.getTime();
  if (byStart !== 0) {
    return byStart;
  }
  return a.id < b.id ? -1 : a.id > b.id ? 1 : 0;
}

/**
 * Groups bookings by camera and resolves overlaps: the earliest start holds the camera
 * (ties by id), every later booking overlapping the holder is a conflict, and at most one
 * booking per camera is returned as the candidate to offer.
 */
export function planBookings(
  bookings: readonly Booking[],
  active: readonly ActiveBooking[],
  now: number
): Map<string, CameraPlan> {
  const plans = new Map<string, CameraPlan>();
  const activeByCamera = new Map(active.map(entry => [entry.cameraId, entry]));

  const planFor = (cameraId: string): CameraPlan => {
    let plan = plans.get(cameraId);
    if (!plan) {
      plan = { cameraId, candidate: null, conflicts: [], expired: [] };
      plans.set(cameraId, plan);
    }
    return plan;
  };

  const byCamera = new Map<string, Booking[]>();
  for (const booking of bookings) {
    if (!isPlannable(booking)) {
      continue;
    }
    const list = byCamera.get(booking.cameraId) ?? [];
    list.push(booking);
    byCamera.set(booking.cameraId, list);
  }

  for (const [cameraId, list] of byCamera) {
    const plan = planFor(cameraId);
    const current = activeByCamera.get(cameraId);
    let heldBy = current?.bookingId ?? null;
    let heldUntil = current?.endsAt ?? Number.NEGATIVE_INFINITY;

    for (const booking of [...list].sort(compareBookings)) {
      if (booking.id === current?.bookingId) {
        continue;
      }
      if (booking.endsAt.getTime() <= now) {
        plan.expired.push(booking);
        continue;
      }
      if (heldBy !== null && booking.startsAt.getTime() < heldUntil) {
        plan.conflicts.push({ booking, heldBy });
        continue;
      }
      if (!plan.candidate) {
        plan.candidate = booking;
      }
      heldBy = booking.id;
      heldUntil = booking.endsAt.getTime();
    }
  }

  return plans;
}

export type BookingLedgerOptions = {
  source: Pick<BookingSource, 'updateStatus'>;
  logger?: ComponentLogger;
  metrics?: MetricsRegistry;
};

type PendingWrite = {
  status: BookingStatus;
  reason?: BookingFailureReason;
};

/**
 * Last known status per booking. Writes are monotonic, serialized per booking, and kept
 * for retry when the source rejects them.
 */
export class BookingLedger implements BookingStatusWriter {
  private readonly source: Pick<BookingSource, 'updateStatus'>;
  private readonly log: ComponentLogger;
  private readonly metrics: MetricsRegistry;
  private readonly confirmed = new Map<string, BookingStatus>();
  private readonly pending = new Map<string, PendingWrite>();
  private readonly writing = new Map<string, Promise<void>>();

  constructor(options: BookingLedgerOptions) {
    this.source = options.source;
    this.log = options.logger ?? logger;
    this.metrics = options.metrics ?? defaultMetrics;
  }

  statusOf(bookingId: string): BookingStatus | null {
    return this.pending.get(bookingId)?.status ?? this.confirmed.get(bookingId) ?? null;
  }

  get pendingWrites(): number {
    return this.pending.size;
  }

  /** Records the status the source reports for a booking. */
  observe(bookingId: string, status: BookingStatus) {
    const pending = this.pending.get(bookingId);
    if (pending) {
      if (isTerminalStatus(status)) {
        this.pending.delete(bookingId);
        this.confirmed.set(bookingId, status);
      }
      return;
    }

    const known = this.confirmed.get(bookingId);
    if (known === undefined || (known !== status && canTransition(known, status))) {
      this.confirmed.set(bookingId, status);
    }
  }

  async markStatus(bookingId: string, status: BookingStatus, reason?: BookingFailureReason): Promise<void> {
    const current = this.statusOf(bookingId) ?? 'scheduled';
    if (current === status) {
      return;
    }
    if (!canTransition(current, status)) {
      this.log.warn({ bookingId, from: current, to: status }, 'Ignoring non-monotonic booking status change');
      return;
    }

    this.pending.set(bookingId, { status, reason });
    this.log.info({ bookingId, from: current, to: status, reason }, 'Booking status changed');
    await this.write(bookingId);
  }

  /** Retries every write the source has not yet accepted. */
  async flush(): Promise<void> {
    await Promise.all(Array.from(this.pending.keys()).map(bookingId => this.write(bookingId)));
  }

  /** Number of bookings with a confirmed status. */
  get tracked(): number {
    return this.confirmed.size;
  }

  forget(bookingId: string) {
    if (!this.pending.has(bookingId) && !this.writing.has(bookingId)) {
      this.confirmed.delete(bookingId);
    }
  }

  /**
   * Forgets every settled booking outside `retain`. The source re-reports anything still
   * scheduled or recording, so only ids it no longer returns are dropped.
   */
  prune(retain: ReadonlySet<string>): number {
    let forgotten = 0;
    for (const bookingId of Array.from(this.confirmed.keys())) {
      if (!retain.has(bookingId) && !this.pending.has(bookingId) && !this.writing.has(bookingId)) {
        this.confirmed.delete(bookingId);
        forgotten += 1;
      }
    }
    return forgotten;
  }

  private async write(bookingId: string): Promise<void> {
    const previous = this.writing.get(bookingId) ?? Promise.resolve();
    const next = previous.then(() => this.writeLatest(bookingId));
    this.writing.set(bookingId, next);
    try {
      await next;
    } finally {
      if (this.writing.get(bookingId) === next) {
        this.writing.delete(bookingId);
      }
    }
  }

  private async writeLatest(bookingId: string): Promise<void> {
    const write = this.pending.get(bookingId);
    if (!write) {
      return;
    }
    try {
      await this.source.updateStatus(bookingId, write.status, write.reason);
      if (this.pending.get(bookingId) === write) {
        this.pending.delete(bookingId);
      }
      this.confirmed.set(bookingId, write.status);
    } catch (error) {
      this.metrics.recordStatusWriteFailure();
      this.log.warn(
        { err: error, bookingId, status: write.status },
        `Booking status write failed, will retry: ${errorMessage(error)}`
      );
    }
  }
}
