import { describe, expect, it } from 'vitest';
import { MetricsRegistry } from '../src/metrics/index.js';

describe('MetricsRegistry', () => {
  it('counts booking polls, invalid rows and outcomes', () => {
    const registry = new MetricsRegistry();

    registry.recordPoll({ fetched: 3 });
    registry.recordPoll({ error: 'Booking source query failed: HTTP 503' });
    registry.recordInvalidBooking('time-format');
    registry.recordInvalidBooking('time-format');
    registry.recordInvalidBooking('invalid-window');
    registry.recordBookingConflict();
    registry.recordBookingCancellation();
    registry.recordBookingOutcome('expired');
    registry.recordStatusWriteFailure();

    const { bookings } = registry.snapshot();
    expect(bookings).toMatchObject({
      polls: 2,
      pollFailures: 1,
      lastPollError: 'Booking source query failed: HTTP 503',
      fetched: 3,
      invalid: 3,
      invalidByReason: { 'time-format': 2, 'invalid-window': 1 },
      conflicts: 1,
      cancellations: 1,
      byOutcome: { expired: 1 },
      statusWriteFailures: 1
    });
    expect(bookings.lastPollAt).not.toBeNull();

    registry.recordPoll({ fetched: 1 });
    expect(registry.snapshot().bookings.lastPollError).toBeNull();
  });

  it('keeps camera counters per camera', () => {
    const registry = new MetricsRegistry();

    registry.recordCameraInitAttempt('cam-1');
    registry.recordCameraInitAttempt('cam-1');
    registry.recordCameraInitFailure('cam-1', 'busy');
    registry.recordRecordingStarted('cam-1');
    registry.recordRecordingFinished('cam-1', 'completed');
    registry.recordRecordingStarted('cam-2');
    registry.recordRecordingFinished('cam-2', 'canceled');
    registry.recordFinalizeFailure('cam-2', 'artifact-missing');

    const { cameras } = registry.snapshot();
    expect(cameras['cam-1']).toMatchObject({
      initAttempts: 2,
      initFailures: 1,
      initFailuresByReason: { busy: 1 },
      recordingsStarted: 1,
      recordingsCompleted: 1,
      recordingsCanceled: 0,
      lastFailureReason: 'busy'
    });
    expect(cameras['cam-2']).toMatchObject({
      initAttempts: 0,
      recordingsCanceled: 1,
      finalizeFailures: 1,
      lastFailureReason: 'artifact-missing'
    });
  });

  it('tracks upload outcomes and bytes', () => {
    const registry = new MetricsRegistry();

    registry.recordUploadEnqueued('enqueued');
    registry.recordUploadEnqueued('duplicate');
    registry.recordUploadEnqueued('rejected');
    registry.recordUploadAttempt();
    registry.recordUploadAttempt();
    registry.recordUploadFailure('network down', false);
    registry.recordUploadSuccess(2048);
    registry.recordUploadSuccess(null);
    registry.recordUploadFailure('artifact missing', true);

    expect(registry.snapshot().uploads).toEqual({
      enqueued: 1,
      duplicates: 1,
      rejected: 1,
      attempts: 2,
      succeeded: 2,
      retried: 1,
      permanentlyFailed: 1,
      bytesUploaded: 2048,
      lastError: 'artifact missing'
    });
  });

  it('records status writes and latency observations', () => {
    const registry = new MetricsRegistry();

    registry.recordStatusWrite();
    registry.recordStatusWrite('HTTP 500');
    registry.observeLatency('upload.duration', 40);
    registry.observeLatency('upload.duration', 20);
    registry.observeLatency('upload.duration', Number.NaN);

    const snapshot = registry.snapshot();
    expect(snapshot.status).toMatchObject({ writes: 2, writeFailures: 1, lastWriteError: 'HTTP 500' });
    expect(snapshot.latencies['upload.duration']).toEqual({
      count: 2,
      totalMs: 60,
      minMs: 20,
      maxMs: 40,
      averageMs: 30
    });
  });

  it('counts log levels and remembers the last error message', () => {
    const registry = new MetricsRegistry();

    registry.incrementLogLevel('INFO');
    registry.incrementLogLevel('warn');
    registry.incrementLogLevel('error', { message: 'Upload failed' });

    const { logs } = registry.snapshot();
    expect(logs.byLevel).toEqual({ info: 1, warn: 1, error: 1 });
    expect(logs.lastErrorMessage).toBe('Upload failed');
    expect(logs.lastErrorAt).not.toBeNull();
  });

  it('clears every counter on reset and notifies listeners', () => {
    const registry = new MetricsRegistry();
    const resets: string[] = [];
    const unsubscribe = registry.onReset(() => resets.push('reset'));

    registry.recordLogLevelChange('debug');
    registry.recordPoll({ fetched: 2 });
    registry.recordCameraInitAttempt('cam-1');
    registry.recordUploadAttempt();
    registry.reset();

    const snapshot = registry.snapshot();
    expect(snapshot.bookings.polls).toBe(0);
    expect(snapshot.cameras).toEqual({});
    expect(snapshot.uploads.attempts).toBe(0);
    expect(snapshot.logs.currentLevel).toBe('info');
    expect(resets).toEqual(['reset']);

    unsubscribe();
    registry.reset();
    expect(resets).toEqual(['reset']);
  });
});
