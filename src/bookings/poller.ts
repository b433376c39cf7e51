import type { CameraLifecycle, OfferOutcome } from '../camera/lifecycle.js';
import { InvalidBooking, InvalidTimeFormat, ResourceConflictError, errorMessage } from '../errors.js';
import logger, { type ComponentLogger } from '../logger.js';
import defaultMetrics, { type MetricsRegistry } from '../metrics/index.js';
import type { Booking, Clock } from '../types.js';
import { normalizeBooking, type TimeZone } from './normalizer.js';
import { isTerminalStatus, planBookings, type ActiveBooking, type BookingLedger } from './scheduler.js';
import type { BookingSource } from './source.js';

export type BookingPollerOptions = {
  source: BookingSource;
  ledger: BookingLedger;
  lifecycles: ReadonlyMap<string, CameraLifecycle>;
  zone: TimeZone;
  intervalMs: number;
  lookAheadMs: number;
  lookBehindMs: number;
  clock?: Clock;
  logger?: ComponentLogger;
  metrics?: MetricsRegistry;
};

export type PollSummary = {
  skipped: boolean;
  error: string | null;
  fetched: number;
  invalid: number;
  offered: Record<string, OfferOutcome>;
  conflicts: string[];
  expired: string[];
  canceled: string[];
  forgotten: number;
};

function rawBookingId(row: unknown): string | null {
  if (row && typeof row === 'object' && 'id' in row) {
    const id = row.id;
    return typeof id === 'string' || typeof id === 'number' ? String(id) : null;
  }
  return null;
}

function emptySummary(): PollSummary {
  return {
    skipped: false,
    error: null,
    fetched: 0,
    invalid: 0,
    offered: {},
    conflicts: [],
    expired: [],
    canceled: [],
    forgotten: 0
  };
}

/**
 * Fixed-cadence booking loop. Each cycle reads the source, resolves conflicts and offers at
 * most one booking to each camera; cycles never overlap.
 */
export class BookingPoller {
  private readonly options: BookingPollerOptions;
  private readonly clock: Clock;
  private readonly log: ComponentLogger;
  private readonly metrics: MetricsRegistry;
  private timer: NodeJS.Timeout | null = null;
  private running: Promise<PollSummary> | null = null;
  private stopped = true;

  constructor(options: BookingPollerOptions) {
    this.options = options;
    this.clock = options.clock ?? Date.now;
    this.log = options.logger ?? logger;
    this.metrics = options.metrics ?? defaultMetrics;
  }

  start() {
    if (!this.stopped) {
      return;
    }
    this.stopped = false;
    this.scheduleNext(0);
  }

  async stop(): Promise<void> {
    this.stopped = true;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    if (this.running) {
      await this.running;
    }
  }

  /** Runs one cycle, or joins the cycle already in progress. */
  runOnce(): Promise<PollSummary> {
    if (!this.running) {
      this.running = this.cycle().finally(() => {
        this.running = null;
      });
    }
    return this.running;
  }

  private scheduleNext(delayMs: number) {
    if (this.stopped) {
      return;
    }
    this.timer = setTimeout(() => {
      this.timer = null;
      void this.runOnce().finally(() => {
        this.scheduleNext(this.options.intervalMs);
      });
    }, delayMs);
  }

  private async cycle(): Promise<PollSummary> {
    const summary = emptySummary();
    let now = this.clock();
    const { lifecycles } = this.options;

    try {
      await this.options.ledger.flush();

      const active: ActiveBooking[] = [];
      for (const [cameraId, lifecycle] of lifecycles) {
        const window = lifecycle.activeWindow();
        if (window) {
          active.push({ cameraId, bookingId: window.bookingId, endsAt: window.endsAt });
        }
      }

      let rows: unknown[];
      try {
        rows = await this.options.source.fetchBookings({
          cameraIds: Array.from(lifecycles.keys()),
          from: now - this.options.lookBehindMs,
          to: now + this.options.lookAheadMs,
          statuses: ['scheduled', 'recording'],
          includeIds: active.map(entry => entry.bookingId)
        });
      } catch (error) {
        summary.skipped = true;
        summary.error = errorMessage(error);
        this.metrics.recordPoll({ error: summary.error });
        this.log.warn({ err: error }, 'Booking source unavailable, skipping cycle');
        return summary;
      }

      summary.fetched = rows.length;
      this.metrics.recordPoll({ fetched: rows.length });
      // flush and fetch may have taken a while
      now = this.clock();

      const invalidWindows: string[] = [];
      const bookings = this.normalizeRows(rows, summary, invalidWindows);
      const returnedIds = new Set(rows.map(rawBookingId).filter((id): id is string => id !== null));
      this.observeCancellations(bookings, returnedIds, active, summary);

      const horizon = now + this.options.lookAheadMs;
      const eligible = bookings.filter(booking => {
        if (!lifecycles.has(booking.cameraId) || booking.startsAt.getTime() > horizon) {
          return false;
        }
        const known = this.options.ledger.statusOf(booking.id);
        return !(known && isTerminalStatus(known));
      });

      for (const bookingId of invalidWindows) {
        await this.options.ledger.markStatus(bookingId, 'failed', 'invalid-window');
      }

      const plans = planBookings(eligible, active, now);
      const offers: Promise<void>[] = [];
      for (const [cameraId, plan] of plans) {
        for (const booking of plan.expired) {
          summary.expired.push(booking.id);
          this.metrics.recordBookingOutcome('expired');
          await this.options.ledger.markStatus(booking.id, 'failed', 'window-elapsed');
        }
        for (const { booking, heldBy } of plan.conflicts) {
          const conflict = new ResourceConflictError(cameraId, booking.id, heldBy);
          summary.conflicts.push(booking.id);
          this.metrics.recordBookingConflict();
          this.log.warn({ cameraId, bookingId: booking.id, heldBy }, conflict.message);
          await this.options.ledger.markStatus(booking.id, 'failed', conflict.reason);
        }

        const lifecycle = lifecycles.get(cameraId);
        const candidate = plan.candidate;
        if (lifecycle && candidate) {
          offers.push(
            lifecycle.offer(candidate, now).then(outcome => {
              summary.offered[candidate.id] = outcome;
            })
          );
        }
      }
      await Promise.all(offers);

      const retain = new Set(returnedIds);
      for (const lifecycle of lifecycles.values()) {
        const window = lifecycle.activeWindow();
        if (window) {
          retain.add(window.bookingId);
        }
      }
      summary.forgotten = this.options.ledger.prune(retain);
    } catch (error) {
      summary.error = errorMessage(error);
      this.log.error({ err: error }, 'Booking poll cycle failed');
    }

    return summary;
  }

  private normalizeRows(rows: unknown[], summary: PollSummary, invalidWindows: string[]): Booking[] {
    const bookings: Booking[] = [];
    for (const row of rows) {
      try {
        bookings.push(normalizeBooking(row, this.options.zone));
      } catch (error) {
        if (!(error instanceof InvalidBooking) && !(error instanceof InvalidTimeFormat)) {
          throw error;
        }
        summary.invalid += 1;
        if (error instanceof InvalidBooking && error.kind === 'invalid-window' && error.bookingId) {
          invalidWindows.push(error.bookingId);
        }
        this.metrics.recordInvalidBooking(error instanceof InvalidBooking ? error.kind : 'time-format');
        this.log.warn(
          { err: error, bookingId: error instanceof InvalidBooking ? error.bookingId : null },
          'Skipping invalid booking'
        );
      }
    }
    for (const booking of bookings) {
      this.options.ledger.observe(booking.id, booking.status);
    }
    return bookings;
  }

  private observeCancellations(
    bookings: Booking[],
    returnedIds: ReadonlySet<string>,
    active: ActiveBooking[],
    summary: PollSummary
  ) {
    for (const entry of active) {
      const booking = bookings.find(candidate => candidate.id === entry.bookingId);
      if (booking ? booking.status !== 'canceled' : returnedIds.has(entry.bookingId)) {
        continue;
      }
      const lifecycle = this.options.lifecycles.get(entry.cameraId);
      if (lifecycle?.requestStop(entry.bookingId, 'canceled')) {
        summary.canceled.push(entry.bookingId);
        this.metrics.recordBookingCancellation();
        this.log.info(
          { cameraId: entry.cameraId, bookingId: entry.bookingId, reason: booking ? 'canceled' : 'removed' },
          'Active booking canceled at source'
        );
      }
    }
  }
}
