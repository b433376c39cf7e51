import pino from 'pino';

type CounterMap = Record<string, number>;

type LatencyStats = {
  count: number;
  totalMs: number;
  minMs: number;
  maxMs: number;
  averageMs: number;
};

export type CameraMetricsSnapshot = {
  initAttempts: number;
  initFailures: number;
  initFailuresByReason: CounterMap;
  recordingsStarted: number;
  recordingsCompleted: number;
  recordingsCanceled: number;
  finalizeFailures: number;
  lastFailureAt: string | null;
  lastFailureReason: string | null;
};

export type MetricsSnapshot = {
  createdAt: string;
  logs: {
    byLevel: CounterMap;
    currentLevel: string;
    lastErrorAt: string | null;
    lastErrorMessage: string | null;
  };
  bookings: {
    polls: number;
    pollFailures: number;
    lastPollAt: string | null;
    lastPollError: string | null;
    fetched: number;
    invalid: number;
    invalidByReason: CounterMap;
    conflicts: number;
    cancellations: number;
    byOutcome: CounterMap;
    statusWriteFailures: number;
  };
  cameras: Record<string, CameraMetricsSnapshot>;
  uploads: {
    enqueued: number;
    duplicates: number;
    rejected: number;
    attempts: number;
    succeeded: number;
    retried: number;
    permanentlyFailed: number;
    bytesUploaded: number;
    lastError: string | null;
  };
  status: {
    writes: number;
    writeFailures: number;
    lastWriteAt: string | null;
    lastWriteError: string | null;
  };
  latencies: Record<string, LatencyStats>;
};

type CameraCounters = {
  initAttempts: number;
  initFailures: number;
  initFailuresByReason: Map<string, number>;
  recordingsStarted: number;
  recordingsCompleted: number;
  recordingsCanceled: number;
  finalizeFailures: number;
  lastFailureAt: number | null;
  lastFailureReason: string | null;
};

function toIso(value: number | null): string | null {
  return typeof value === 'number' ? new Date(value).toISOString() : null;
}

function mapFromCounters(map: Map<string, number>): CounterMap {
  return Object.fromEntries(map.entries());
}

function increment(map: Map<string, number>, key: string, amount = 1) {
  map.set(key, (map.get(key) ?? 0) + amount);
}

class MetricsRegistry {
  private readonly logLevelCounters = new Map<string, number>();
  private currentLogLevel = 'info';
  private lastErrorAt: number | null = null;
  private lastErrorMessage: string | null = null;
  private readonly resetListeners = new Set<() => void>();

  private polls = 0;
  private pollFailures = 0;
  private lastPollAt: number | null = null;
  private lastPollError: string | null = null;
  private bookingsFetched = 0;
  private invalidBookings = 0;
  private readonly invalidByReason = new Map<string, number>();
  private conflicts = 0;
  private cancellations = 0;
  private readonly bookingOutcomes = new Map<string, number>();
  private statusWriteFailures = 0;

  private readonly cameras = new Map<string, CameraCounters>();

  private uploadsEnqueued = 0;
  private uploadDuplicates = 0;
  private uploadsRejected = 0;
  private uploadAttempts = 0;
  private uploadsSucceeded = 0;
  private uploadsRetried = 0;
  private uploadsPermanentlyFailed = 0;
  private bytesUploaded = 0;
  private lastUploadError: string | null = null;

  private statusWrites = 0;
  private statusWriteErrors = 0;
  private lastStatusWriteAt: number | null = null;
  private lastStatusWriteError: string | null = null;

  private readonly latencyStats = new Map<string, LatencyStats>();

  reset() {
    this.logLevelCounters.clear();
    this.currentLogLevel = 'info';
    this.lastErrorAt = null;
    this.lastErrorMessage = null;
    this.polls = 0;
    this.pollFailures = 0;
    this.lastPollAt = null;
    this.lastPollError = null;
    this.bookingsFetched = 0;
    this.invalidBookings = 0;
    this.invalidByReason.clear();
    this.conflicts = 0;
    this.cancellations = 0;
    this.bookingOutcomes.clear();
    this.statusWriteFailures = 0;
    this.cameras.clear();
    this.uploadsEnqueued = 0;
    this.uploadDuplicates = 0;
    this.uploadsRejected = 0;
    this.uploadAttempts = 0;
    this.uploadsSucceeded = 0;
    this.uploadsRetried = 0;
    this.uploadsPermanentlyFailed = 0;
    this.bytesUploaded = 0;
    this.lastUploadError = null;
    this.statusWrites = 0;
    this.statusWriteErrors = 0;
    this.lastStatusWriteAt = null;
    this.lastStatusWriteError = null;
    this.latencyStats.clear();
    for (const listener of this.resetListeners) {
      listener();
    }
  }

  onReset(listener: () => void) {
    this.resetListeners.add(listener);
    return () => {
      this.resetListeners.delete(listener);
    };
  }

  incrementLogLevel(level: string, context?: { message?: string }) {
    const normalized = level.toLowerCase();
    increment(this.logLevelCounters, normalized);
    const levelValue = pino.levels.values[normalized];
    if (typeof levelValue === 'number' && levelValue >= pino.levels.values.error) {
      this.lastErrorAt = Date.now();
      if (context?.message) {
        this.lastErrorMessage = context.message;
      }
    }
  }

  recordLogLevelChange(level: string) {
    this.currentLogLevel = level.toLowerCase();
  }

  recordPoll(outcome: { fetched: number } | { error: string }) {
    this.polls += 1;
    this.lastPollAt = Date.now();
    if ('error' in outcome) {
      this.pollFailures += 1;
      this.lastPollError = outcome.error;
      return;
    }
    this.lastPollError = null;
    this.bookingsFetched += outcome.fetched;
  }

  recordInvalidBooking(reason: string) {
    this.invalidBookings += 1;
    increment(this.invalidByReason, reason);
  }

  recordBookingConflict() {
    this.conflicts += 1;
  }

  recordBookingCancellation() {
    this.cancellations += 1;
  }

  recordBookingOutcome(outcome: string) {
    increment(this.bookingOutcomes, outcome);
  }

  recordStatusWriteFailure() {
    this.statusWriteFailures += 1;
  }

  private camera(cameraId: string): CameraCounters {
    let counters = this.cameras.get(cameraId);
    if (!counters) {
      counters = {
        initAttempts: 0,
        initFailures: 0,
        initFailuresByReason: new Map(),
        recordingsStarted: 0,
        recordingsCompleted: 0,
        recordingsCanceled: 0,
        finalizeFailures: 0,
        lastFailureAt: null,
        lastFailureReason: null
      };
      this.cameras.set(cameraId, counters);
    }
    return counters;
  }

  recordCameraInitAttempt(cameraId: string) {
    this.camera(cameraId).initAttempts += 1;
  }

  recordCameraInitFailure(cameraId: string, reason: string) {
    const counters = this.camera(cameraId);
    counters.initFailures += 1;
    increment(counters.initFailuresByReason, reason);
    counters.lastFailureAt = Date.now();
    counters.lastFailureReason = reason;
  }

  recordRecordingStarted(cameraId: string) {
    this.camera(cameraId).recordingsStarted += 1;
  }

  recordRecordingFinished(cameraId: string, outcome: 'completed' | 'canceled') {
    const counters = this.camera(cameraId);
    if (outcome === 'completed') {
      counters.recordingsCompleted += 1;
    } else {
      counters.recordingsCanceled += 1;
    }
  }

  recordFinalizeFailure(cameraId: string, reason: string) {
    const counters = this.camera(cameraId);
    counters.finalizeFailures += 1;
    counters.lastFailureAt = Date.now();
    counters.lastFailureReason = reason;
  }

  recordUploadEnqueued(outcome: 'enqueued' | 'duplicate' | 'rejected') {
    if (outcome === 'enqueued') {
      this.uploadsEnqueued += 1;
    } else if (outcome === 'duplicate') {
      this.uploadDuplicates += 1;
    } else {
      this.uploadsRejected += 1;
    }
  }

  recordUploadAttempt() {
    this.uploadAttempts += 1;
  }

  recordUploadSuccess(bytes: number | null) {
    this.uploadsSucceeded += 1;
    if (typeof bytes === 'number' && bytes > 0) {
      this.bytesUploaded += bytes;
    }
  }

  recordUploadFailure(error: string, permanent: boolean) {
    this.lastUploadError = error;
    if (permanent) {
      this.uploadsPermanentlyFailed += 1;
    } else {
      this.uploadsRetried += 1;
    }
  }

  recordStatusWrite(error?: string) {
    this.statusWrites += 1;
    this.lastStatusWriteAt = Date.now();
    if (error) {
      this.statusWriteErrors += 1;
      this.lastStatusWriteError = error;
    }
  }

  observeLatency(metric: string, durationMs: number) {
    if (!Number.isFinite(durationMs) || durationMs < 0) {
      return;
    }
    const stats = this.latencyStats.get(metric) ?? {
      count: 0,
      totalMs: 0,
      minMs: Number.POSITIVE_INFINITY,
      maxMs: 0,
      averageMs: 0
    };
    stats.count += 1;
    stats.totalMs += durationMs;
    stats.minMs = Math.min(stats.minMs, durationMs);
    stats.maxMs = Math.max(stats.maxMs, durationMs);
    stats.averageMs = stats.totalMs / stats.count;
    this.latencyStats.set(metric, stats);
  }

  snapshot(): MetricsSnapshot {
    const cameras: Record<string, CameraMetricsSnapshot> = {};
    for (const [cameraId, counters] of this.cameras) {
      cameras[cameraId] = {
        initAttempts: counters.initAttempts,
        initFailures: counters.initFailures,
        initFailuresByReason: mapFromCounters(counters.initFailuresByReason),
        recordingsStarted: counters.recordingsStarted,
        recordingsCompleted: counters.recordingsCompleted,
        recordingsCanceled: counters.recordingsCanceled,
        finalizeFailures: counters.finalizeFailures,
        lastFailureAt: toIso(counters.lastFailureAt),
        lastFailureReason: counters.lastFailureReason
      };
    }

    return {
      createdAt: new Date().toISOString(),
      logs: {
        byLevel: mapFromCounters(this.logLevelCounters),
        currentLevel: this.currentLogLevel,
        lastErrorAt: toIso(this.lastErrorAt),
        lastErrorMessage: this.lastErrorMessage
      },
      bookings: {
        polls: this.polls,
        pollFailures: this.pollFailures,
        lastPollAt: toIso(this.lastPollAt),
        lastPollError: this.lastPollError,
        fetched: this.bookingsFetched,
        invalid: this.invalidBookings,
        invalidByReason: mapFromCounters(this.invalidByReason),
        conflicts: this.conflicts,
        cancellations: this.cancellations,
        byOutcome: mapFromCounters(this.bookingOutcomes),
        statusWriteFailures: this.statusWriteFailures
      },
      cameras,
      uploads: {
        enqueued: this.uploadsEnqueued,
        duplicates: this.uploadDuplicates,
        rejected: this.uploadsRejected,
        attempts: this.uploadAttempts,
        succeeded: this.uploadsSucceeded,
        retried: this.uploadsRetried,
        permanentlyFailed: this.uploadsPermanentlyFailed,
        bytesUploaded: this.bytesUploaded,
        lastError: this.lastUploadError
      },
      status: {
        writes: this.statusWrites,
        writeFailures: this.statusWriteErrors,
        lastWriteAt: toIso(this.lastStatusWriteAt),
        lastWriteError: this.lastStatusWriteError
      },
      latencies: Object.fromEntries(
        Array.from(this.latencyStats.entries()).map(([metric, stats]) => [metric, { ...stats }])
      )
    };
  }
}

const defaultRegistry = new MetricsRegistry();

export { MetricsRegistry };
export default defaultRegistry;
