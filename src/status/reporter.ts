import fs from 'node:fs';
import path from 'node:path';
import type { CameraLifecycle } from '../camera/lifecycle.js';
import { errorMessage } from '../errors.js';
import logger, { type ComponentLogger } from '../logger.js';
import defaultMetrics, { type MetricsRegistry } from '../metrics/index.js';
import type { UploadPipeline } from '../upload/pipeline.js';
import { withTimeout } from '../utils/timeout.js';
import type { CameraStatusSnapshot } from '../types.js';
import type { StatusSink } from './sink.js';

export type StatusReporterOptions = {
  nodeId: string;
  lifecycles: ReadonlyMap<string, Pick<CameraLifecycle, 'snapshot'>>;
  uploads: Pick<UploadPipeline, 'counts' | 'failedTasks'>;
  sink: StatusSink;
  intervalMs: number;
  timeoutMs?: number;
  outputDirs?: ReadonlyMap<string, string>;
  logger?: ComponentLogger;
  metrics?: MetricsRegistry;
};

export type StatusReport = {
  written: number;
  failed: number;
};

function toIso(value: number | null): string | null {
  return value === null ? null : new Date(value).toISOString();
}

/** Total size of the regular files directly inside `dir`; a missing directory counts as empty. */
export async function measureStorage(dir: string): Promise<number> {
  let entries: fs.Dirent[];
  try {
    entries = await fs.promises.readdir(dir, { withFileTypes: true });
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
      return 0;
    }
    throw error;
  }

  let total = 0;
  for (const entry of entries) {
    if (!entry.isFile()) {
      continue;
    }
    try {
      total += (await fs.promises.stat(path.join(dir, entry.name))).size;
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code !== 'ENOENT') {
        throw error;
      }
    }
  }
  return total;
}

export class StatusReporter {
  private readonly options: StatusReporterOptions;
  private readonly log: ComponentLogger;
  private readonly metrics: MetricsRegistry;
  private timer: NodeJS.Timeout | null = null;
  private running: Promise<StatusReport> | null = null;
  private stopped = true;

  constructor(options: StatusReporterOptions) {
    this.options = options;
    this.log = options.logger ?? logger;
    this.metrics = options.metrics ?? defaultMetrics;
  }

  collect(storage: ReadonlyMap<string, number> = new Map()): CameraStatusSnapshot[] {
    const snapshots: CameraStatusSnapshot[] = [];
    const counters = this.metrics.snapshot();
    for (const [cameraId, lifecycle] of this.options.lifecycles) {
      const view = lifecycle.snapshot();
      const camera = counters.cameras[cameraId];
      const uploads = this.options.uploads.counts(cameraId);
      const failed = this.options.uploads.failedTasks(cameraId);
      const session = view.session;
      snapshots.push({
        cameraId,
        nodeId: this.options.nodeId,
        state: view.state,
        isRecording: view.state === 'recording',
        currentBookingId: session?.bookingId ?? view.pendingBookingId,
        recordingStartedAt: session ? toIso(session.startedAt) : null,
        consecutiveFailures: view.counter.consecutiveFailures,
        nextRetryAt: toIso(view.counter.nextRetryAt),
        lastError: view.lastError,
        lastHeartbeat: new Date(view.lastHeartbeat).toISOString(),
        pendingUploads: uploads.pending + uploads.uploading,
        failedUploads: uploads.permanentlyFailed,
        uploadedTotal: uploads.uploaded,
        failedUploadBookings: failed.map(task => task.bookingId),
        storageUsedBytes: storage.get(cameraId) ?? 0,
        initFailures: camera?.initFailures ?? 0,
        recordingsCompleted: camera?.recordingsCompleted ?? 0,
        finalizeFailures: camera?.finalizeFailures ?? 0,
        lastPollAt: counters.bookings.lastPollAt,
        pollFailures: counters.bookings.pollFailures
      });
    }
    return snapshots;
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

  runOnce(): Promise<StatusReport> {
    if (!this.running) {
      this.running = this.report().finally(() => {
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

  private async measure(): Promise<Map<string, number>> {
    const storage = new Map<string, number>();
    for (const [cameraId, dir] of this.options.outputDirs ?? []) {
      try {
        storage.set(cameraId, await measureStorage(dir));
      } catch (error) {
        this.log.warn({ err: error, cameraId, dir }, 'Failed to measure recording storage');
      }
    }
    return storage;
  }

  private async report(): Promise<StatusReport> {
    const result: StatusReport = { written: 0, failed: 0 };
    let snapshots: CameraStatusSnapshot[];
    try {
      snapshots = this.collect(await this.measure());
    } catch (error) {
      this.log.error({ err: error }, 'Failed to collect status snapshot');
      return result;
    }
    const timeoutMs = this.options.timeoutMs ?? 0;

    for (const snapshot of snapshots) {
      try {
        await withTimeout(`status write ${snapshot.cameraId}`, timeoutMs, () =>
          this.options.sink.write(snapshot.cameraId, snapshot)
        );
        result.written += 1;
        this.metrics.recordStatusWrite();
      } catch (error) {
        result.failed += 1;
        const message = errorMessage(error);
        this.metrics.recordStatusWrite(message);
        this.log.warn({ err: error, cameraId: snapshot.cameraId }, 'Status write failed');
      }
    }
    return result;
  }
}
