import { beforeEach, describe, expect, it, vi } from 'vitest';
import { BookingLedger, canTransition, isTerminalStatus, planBookings } from '../src/bookings/scheduler.js';
import type { BookingSource } from '../src/bookings/source.js';
import { MetricsRegistry } from '../src/metrics/index.js';
import type { Booking, BookingStatus } from '../src/types.js';

const base = Date.parse('2025-06-25T14:00:00Z');
const MINUTE = 60_000;

function booking(
  id: string,
  startMinutes: number,
  endMinutes: number,
  overrides: Partial<Booking> = {}
): Booking {
  return {
    id,
    cameraId: 'cam-1',
    userId: 'u1',
    date: '2025-06-25',
    startsAt: new Date(base + startMinutes * MINUTE),
    endsAt: new Date(base + endMinutes * MINUTE),
    status: 'scheduled',
    ...overrides
  };
}

describe('booking status transitions', () => {
  it('only moves forward', () => {
    expect(canTransition('scheduled', 'recording')).toBe(true);
    expect(canTransition('recording', 'completed')).toBe(true);
    expect(canTransition('scheduled', 'canceled')).toBe(true);
    expect(canTransition('recording', 'scheduled')).toBe(false);
    expect(canTransition('completed', 'failed')).toBe(false);
    expect(canTransition('scheduled', 'completed')).toBe(false);
  });

  it('treats completed, failed and canceled as terminal', () => {
    const statuses: BookingStatus[] = ['scheduled', 'recording', 'completed', 'failed', 'canceled'];
    expect(statuses.filter(isTerminalStatus)).toEqual(['completed', 'failed', 'canceled']);
  });
});

describe('planBookings', () => {
  it('picks the earliest booking per camera and flags overlaps as conflicts', () => {
    const plans = planBookings(
      [
        booking('b2', 30, 60),
        booking('b1', 0, 45),
        booking('b3', 60, 90),
        booking('c1', 0, 30, { cameraId: 'cam-2' })
      ],
      [],
      base
    );

    const cam1 = plans.get('cam-1');
    expect(cam1?.candidate?.id).toBe('b1');
    expect(cam1?.conflicts.map(conflict => [conflict.booking.id, conflict.heldBy])).toEqual([['b2', 'b1']]);
    expect(cam1?.expired).toEqual([]);
    expect(plans.get('cam-2')?.candidate?.id).toBe('c1');
  });

  it('breaks start-time ties by booking id', () => {
    const plans = planBookings([booking('b9', 0, 30), booking('b10', 0, 20)], [], base);

    expect(plans.get('cam-1')?.candidate?.id).toBe('b10');
    expect(plans.get('cam-1')?.conflicts.map(conflict => conflict.booking.id)).toEqual(['b9']);
  });

  it('treats back-to-back bookings as compatible', () => {
    const plans = planBookings([booking('b1', 0, 30), booking('b2', 30, 60)], [], base);

    expect(plans.get('cam-1')?.candidate?.id).toBe('b1');
    expect(plans.get('cam-1')?.conflicts).toEqual([]);
  });

  it('keeps the active booking on the camera and conflicts anything overlapping it', () => {
    const plans = planBookings(
      [booking('b0', -10, 20, { status: 'recording' }), booking('b1', 0, 30), booking('b2', 20, 50)],
      [{ cameraId: 'cam-1', bookingId: 'b0', endsAt: base + 20 * MINUTE }],
      base
    );

    const plan = plans.get('cam-1');
    expect(plan?.candidate?.id).toBe('b2');
    expect(plan?.conflicts.map(conflict => [conflict.booking.id, conflict.heldBy])).toEqual([['b1', 'b0']]);
  });

  it('separates bookings whose window already ended and ignores terminal ones', () => {
    const plans = planBookings(
      [
        booking('old', -60, -30),
        booking('edge', -30, 0),
        booking('done', 0, 30, { status: 'completed' }),
        booking('next', 5, 30)
      ],
      [],
      base
    );

    const plan = plans.get('cam-1');
    expect(plan?.expired.map(entry => entry.id)).toEqual(['old', 'edge']);
    expect(plan?.candidate?.id).toBe('next');
  });
});

describe('BookingLedger', () => {
  let metrics: MetricsRegistry;
  const updateStatus = vi.fn<BookingSource['updateStatus']>();

  beforeEach(() => {
    metrics = new MetricsRegistry();
    updateStatus.mockReset();
    updateStatus.mockResolvedValue(undefined);
  });

  it('writes forward transitions and skips repeats', async () => {
    const ledger = new BookingLedger({ source: { updateStatus }, metrics });

    await ledger.markStatus('b1', 'recording');
    await ledger.markStatus('b1', 'recording');
    await ledger.markStatus('b1', 'completed');

    expect(updateStatus.mock.calls).toEqual([
      ['b1', 'recording', undefined],
      ['b1', 'completed', undefined]
    ]);
    expect(ledger.statusOf('b1')).toBe('completed');
  });

  it('ignores transitions that move backwards', async () => {
    const ledger = new BookingLedger({ source: { updateStatus }, metrics });
    ledger.observe('b1', 'completed');

    await ledger.markStatus('b1', 'failed', 'finalize-failed');
    await ledger.markStatus('b1', 'recording');

    expect(updateStatus).not.toHaveBeenCalled();
    expect(ledger.statusOf('b1')).toBe('completed');
  });

  it('keeps failed writes pending and retries them on flush', async () => {
    const ledger = new BookingLedger({ source: { updateStatus }, metrics });
    updateStatus.mockRejectedValueOnce(new Error('HTTP 503'));

    await ledger.markStatus('b1', 'failed', 'conflict');

    expect(ledger.pendingWrites).toBe(1);
    expect(ledger.statusOf('b1')).toBe('failed');
    expect(metrics.snapshot().bookings.statusWriteFailures).toBe(1);

    await ledger.flush();

    expect(ledger.pendingWrites).toBe(0);
    expect(updateStatus.mock.calls).toEqual([
      ['b1', 'failed', 'conflict'],
      ['b1', 'failed', 'conflict']
    ]);
  });

  it('does not let a stale source status overwrite a pending write', async () => {
    const ledger = new BookingLedger({ source: { updateStatus }, metrics });
    updateStatus.mockRejectedValueOnce(new Error('HTTP 503'));
    await ledger.markStatus('b1', 'recording');

    ledger.observe('b1', 'scheduled');
    expect(ledger.statusOf('b1')).toBe('recording');

    ledger.observe('b1', 'canceled');
    expect(ledger.statusOf('b1')).toBe('canceled');
    expect(ledger.pendingWrites).toBe(0);
  });

  it('follows forward changes reported by the source', () => {
    const ledger = new BookingLedger({ source: { updateStatus }, metrics });

    ledger.observe('b1', 'recording');
    ledger.observe('b1', 'scheduled');
    expect(ledger.statusOf('b1')).toBe('recording');

    ledger.observe('b1', 'canceled');
    expect(ledger.statusOf('b1')).toBe('canceled');

    ledger.forget('b1');
    expect(ledger.statusOf('b1')).toBeNull();
  });

  it('coalesces writes queued behind one another into the latest status', async () => {
    const ledger = new BookingLedger({ source: { updateStatus }, metrics });
    const order: string[] = [];
    updateStatus.mockImplementation(async (_bookingId, status) => {
      order.push(`start ${status}`);
      await new Promise(resolve => setImmediate(resolve));
      order.push(`end ${status}`);
    });

    await Promise.all([ledger.markStatus('b1', 'recording'), ledger.markStatus('b1', 'completed')]);

    expect(order).toEqual(['start completed', 'end completed']);
    expect(ledger.statusOf('b1')).toBe('completed');
    expect(ledger.pendingWrites).toBe(0);
  });
});
