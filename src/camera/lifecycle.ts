import { createHash } from 'node:crypto';
import fs from 'node:fs';
import path from 'node:path';
import { pipeline } from 'node:stream/promises';
import type { BookingStatusWriter } from '../bookings/scheduler.js';
import {
  CameraDriverError,
  CameraInitError,
  OperationTimeoutError,
  ResourceConflictError,
  errorMessage,
  type CameraFailureReason
} from '../errors.js';
import eventBus, { type EventBus } from '../eventBus.js';
import logger, { type ComponentLogger } from '../logger.js';
import defaultMetrics, { type MetricsRegistry } from '../metrics/index.js';
import type { UploadPipeline } from '../upload/pipeline.js';
import { withTimeout } from '../utils/timeout.js';
import type { Booking, CameraState, Clock, FailureCounter, RecordingSession } from '../types.js';
import type { BackoffController } from './backoff.js';
import type { CameraDriver, CameraSettings } from './driver.js';

const DEFAULT_OPERATION_TIMEOUT_MS = 15_000;
const DEFAULT_MAX_RECORDING_MS = 2 * 60 * 60 * 1000;
const STOP_GRACE_MS = 5000;

export type OfferOutcome = 'started' | 'deferred' | 'expired' | 'active' | 'conflict' | 'init-failed';

export type StopReason = 'ended' | 'canceled' | 'max-duration' | 'shutdown';

export type CameraLifecycleOptions = {
  cameraId: string;
  driver: CameraDriver;
  settings: CameraSettings;
  outputDir: string;
  backoff: BackoffController;
  uploads: Pick<UploadPipeline, 'enqueue'>;
  bookings: BookingStatusWriter;
  clock?: Clock;
  operationTimeoutMs?: number;
  /** Budget for the driver's stop; must outlast the driver's own SIGINT to SIGKILL escalation. */
  stopTimeoutMs?: number;
  maxRecordingMs?: number;
  logger?: ComponentLogger;
  metrics?: MetricsRegistry;
  bus?: EventBus;
};

export type CameraLifecycleSnapshot = {
  cameraId: string;
  state: CameraState;
  session: RecordingSession | null;
  pendingBookingId: string | null;
  counter: FailureCounter;
  lastError: string | null;
  lastHeartbeat: number;
};

type ArtifactInfo = {
  sizeBytes: number;
  checksum: string;
};

function artifactFileName(bookingId: string, now: number): string {
  const stamp = new Date(now).toISOString().replace(/[-:]/g, '').replace(/\.\d{3}Z$/, 'Z');
  return `booking_${bookingId.replace(/[^A-Za-z0-9_-]/g, '_')}_${stamp}.mp4`;
}

function isMissing(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Resolves the finished recording. A stop that outlived its budget may leave the file
 * under its `.part` name, or rename it while we look.
 */
async function locateArtifact(artifactPath: string): Promise<ArtifactInfo> {
  try {
    return await inspectArtifact(artifactPath);
  } catch (error) {
    if (!isMissing(error)) {
      throw error;
    }
  }
  try {
    await fs.promises.rename(`${artifactPath}.part`, artifactPath);
  } catch (error) {
    if (!isMissing(error)) {
      throw error;
    }
  }
  return inspectArtifact(artifactPath);
}

async function inspectArtifact(filePath: string): Promise<ArtifactInfo> {
  const stats = await fs.promises.stat(filePath);
  const hash = createHash('md5');
  await pipeline(fs.createReadStream(filePath), hash);
  return { sizeBytes: stats.size, checksum: hash.digest('hex') };
}

function failureReason(error: unknown): CameraFailureReason {
  if (error instanceof CameraDriverError) {
    return error.reason;
  }
  if (error instanceof OperationTimeoutError) {
    return 'timeout';
  }
  return 'unknown';
}

/**
 * Drives one camera through idle → initializing → recording → finalizing. The instance is
 * the only caller of its driver and never runs two transitions at once.
 */
export class CameraLifecycle {
  readonly cameraId: string;
  private readonly driver: CameraDriver;
  private readonly settings: CameraSettings;
  private readonly outputDir: string;
  private readonly backoff: BackoffController;
  private readonly uploads: Pick<UploadPipeline, 'enqueue'>;
  private readonly bookings: BookingStatusWriter;
  private readonly clock: Clock;
  private readonly operationTimeoutMs: number;
  private readonly stopTimeoutMs: number;
  private readonly maxRecordingMs: number;
  private readonly log: ComponentLogger;
  private readonly metrics: MetricsRegistry;
  private readonly bus: EventBus;

  private state: CameraState = 'idle';
  private session: RecordingSession | null = null;
  private pending: Booking | null = null;
  private stopRequest: { bookingId: string; reason: StopReason } | null = null;
  private transition: Promise<void> | null = null;
  private lastError: string | null = null;
  private lastHeartbeat: number;
  private closed = false;

  constructor(options: CameraLifecycleOptions) {
    this.cameraId = options.cameraId;
    this.driver = options.driver;
    this.settings = { ...options.settings };
    this.outputDir = options.outputDir;
    this.backoff = options.backoff;
    this.uploads = options.uploads;
    this.bookings = options.bookings;
    this.clock = options.clock ?? Date.now;
    this.operationTimeoutMs = options.operationTimeoutMs ?? DEFAULT_OPERATION_TIMEOUT_MS;
    this.stopTimeoutMs = options.stopTimeoutMs ?? this.operationTimeoutMs + STOP_GRACE_MS;
    this.maxRecordingMs = options.maxRecordingMs ?? DEFAULT_MAX_RECORDING_MS;
    this.log = options.logger ?? logger;
    this.metrics = options.metrics ?? defaultMetrics;
    this.bus = options.bus ?? eventBus;
    this.lastHeartbeat = this.clock();
  }

  get currentState(): CameraState {
    return this.state;
  }

  get activeBookingId(): string | null {
    return this.session?.bookingId ?? this.pending?.id ?? null;
  }

  /** The booking currently holding the camera, with the end of its window. */
  activeWindow(): { bookingId: string; endsAt: number } | null {
    if (this.session) {
      return { bookingId: this.session.bookingId, endsAt: this.session.endsAt };
    }
    if (this.pending) {
      return { bookingId: this.pending.id, endsAt: this.pending.endsAt.getTime() };
    }
    return null;
  }

  async offer(booking: Booking, now = this.clock()): Promise<OfferOutcome> {
    this.lastHeartbeat = now;

    if (this.activeBookingId === booking.id) {
      return 'active';
    }

    if (now >= booking.endsAt.getTime()) {
      await this.bookings.markStatus(booking.id, 'failed', 'window-elapsed');
      this.metrics.recordBookingOutcome('expired');
      return 'expired';
    }

    if (this.closed) {
      return 'deferred';
    }

    if (this.state !== 'idle') {
      const heldBy = this.session?.bookingId ?? this.pending?.id;
      const heldUntil = this.session?.endsAt ?? this.pending?.endsAt.getTime();
      if (heldBy !== undefined && heldUntil !== undefined && booking.startsAt.getTime() < heldUntil) {
        const conflict = new ResourceConflictError(this.cameraId, booking.id, heldBy);
        this.log.warn({ cameraId: this.cameraId, bookingId: booking.id, heldBy }, conflict.message);
        this.metrics.recordBookingConflict();
        await this.bookings.markStatus(booking.id, 'failed', conflict.reason);
        return 'conflict';
      }
      return 'deferred';
    }

    if (now < booking.startsAt.getTime()) {
      return 'deferred';
    }

    if (!this.backoff.mayAttempt(this.cameraId, now)) {
      return 'deferred';
    }

    return this.runTransition(() => this.initialize(booking));
  }

  async tick(now = this.clock()): Promise<void> {
    this.lastHeartbeat = now;
    const session = this.session;
    if (this.state !== 'recording' || !session || this.transition) {
      return;
    }

    let reason: StopReason | null = null;
    if (this.stopRequest && this.stopRequest.bookingId === session.bookingId) {
      reason = this.stopRequest.reason;
    } else if (now >= session.endsAt) {
      reason = 'ended';
    } else if (now - session.startedAt >= this.maxRecordingMs) {
      reason = 'max-duration';
    }

    if (!reason) {
      return;
    }

    const stopReason = reason;
    await this.runTransition(() => this.finalize(session, stopReason));
  }

  requestStop(bookingId: string, reason: StopReason = 'canceled'): boolean {
    if (this.activeBookingId !== bookingId || this.stopRequest?.bookingId === bookingId) {
      return false;
    }
    this.stopRequest = { bookingId, reason };
    this.log.info({ cameraId: this.cameraId, bookingId, reason }, 'Stop requested');
    return true;
  }

  snapshot(): CameraLifecycleSnapshot {
    return {
      cameraId: this.cameraId,
      state: this.state,
      session: this.session ? { ...this.session } : null,
      pendingBookingId: this.pending?.id ?? null,
      counter: this.backoff.getCounter(this.cameraId),
      lastError: this.lastError,
      lastHeartbeat: this.lastHeartbeat
    };
  }

  async shutdown(): Promise<void> {
    this.closed = true;
    if (this.transition) {
      await this.transition;
    }
    const session = this.session;
    if (session && this.state === 'recording') {
      await this.runTransition(() => this.finalize(session, 'shutdown'));
    }
  }

  private async runTransition<T>(work: () => Promise<T>): Promise<T> {
    const running = work();
    const settled = running.then(
      () => undefined,
      () => undefined
    );
    this.transition = settled;
    try {
      return await running;
    } finally {
      if (this.transition === settled) {
        this.transition = null;
      }
    }
  }

  private call<T>(step: string, task: () => Promise<T>, timeoutMs = this.operationTimeoutMs): Promise<T> {
    return withTimeout(`${this.cameraId} ${step}`, timeoutMs, task);
  }

  private async initialize(booking: Booking): Promise<OfferOutcome> {
    this.state = 'initializing';
    this.pending = booking;
    this.metrics.recordCameraInitAttempt(this.cameraId);
    const startedAt = Date.now();

    let step = 'open';
    let artifactPath: string;
    try {
      await this.call(step, () => this.driver.open());
      step = 'configure';
      await this.call(step, () => this.driver.configure(this.settings));
      step = 'captureTestFrame';
      await this.call(step, () => this.driver.captureTestFrame());

      if (this.clock() >= booking.endsAt.getTime()) {
        await this.release();
        this.pending = null;
        this.state = 'idle';
        await this.bookings.markStatus(booking.id, 'failed', 'window-elapsed');
        this.metrics.recordBookingOutcome('expired');
        return 'expired';
      }

      step = 'start';
      artifactPath = path.join(this.outputDir, artifactFileName(booking.id, this.clock()));
      const target = artifactPath;
      await this.call(step, () => this.driver.start(target));
    } catch (error) {
      return this.handleInitFailure(booking, step, error);
    } finally {
      this.metrics.observeLatency('camera.init', Date.now() - startedAt);
    }

    const now = this.clock();
    this.backoff.recordSuccess(this.cameraId);
    this.session = {
      bookingId: booking.id,
      cameraId: this.cameraId,
      userId: booking.userId,
      state: 'recording',
      bookingDate: booking.date,
      scheduledStartsAt: booking.startsAt.getTime(),
      startedAt: now,
      endsAt: booking.endsAt.getTime(),
      artifactPath
    };
    this.pending = null;
    this.lastError = null;
    this.state = 'recording';

    await this.bookings.markStatus(booking.id, 'recording');
    this.metrics.recordRecordingStarted(this.cameraId);
    this.bus.emitEvent({
      ts: now,
      source: this.cameraId,
      kind: 'recording.started',
      severity: 'info',
      message: `Recording booking ${booking.id}`,
      meta: { bookingId: booking.id, artifactPath, endsAt: booking.endsAt.toISOString() }
    });
    return 'started';
  }

  private async handleInitFailure(booking: Booking, step: string, error: unknown): Promise<OfferOutcome> {
    const reason = failureReason(error);
    const initError = new CameraInitError(this.cameraId, step, reason, errorMessage(error));
    this.state = 'failed';
    await this.release();

    const now = this.clock();
    const counter = this.backoff.recordFailure(this.cameraId, now);
    this.lastError = initError.message;
    this.metrics.recordCameraInitFailure(this.cameraId, reason);
    this.bus.emitEvent({
      ts: now,
      source: this.cameraId,
      kind: 'camera.init_failed',
      severity: 'warning',
      message: initError.message,
      meta: {
        bookingId: booking.id,
        step,
        reason,
        consecutiveFailures: counter.consecutiveFailures,
        nextRetryAt: counter.nextRetryAt
      }
    });

    this.pending = null;
    this.stopRequest = null;
    this.state = 'idle';

    if (now >= booking.endsAt.getTime()) {
      await this.bookings.markStatus(booking.id, 'failed', 'camera-init-failed');
      this.metrics.recordBookingOutcome('init-failed');
    }
    return 'init-failed';
  }

  private async finalize(session: RecordingSession, reason: StopReason): Promise<void> {
    this.state = 'finalizing';
    this.session = { ...session, state: 'finalizing' };
    this.log.info({ cameraId: this.cameraId, bookingId: session.bookingId, reason }, 'Finalizing recording');

    let stopError: unknown = null;
    try {
      await this.call('stop', () => this.driver.stop(), this.stopTimeoutMs);
    } catch (error) {
      stopError = error;
      this.log.error({ err: error, cameraId: this.cameraId, bookingId: session.bookingId }, 'Camera stop failed');
    }
    await this.release();

    let artifact: ArtifactInfo | null = null;
    try {
      artifact = await locateArtifact(session.artifactPath);
    } catch (error) {
      this.log.error(
        { err: error, cameraId: this.cameraId, artifactPath: session.artifactPath },
        'Recording artifact is missing'
      );
    }

    const now = this.clock();
    if (!artifact) {
      const detail = stopError ? errorMessage(stopError) : 'artifact missing';
      this.lastError = `Finalize failed for booking ${session.bookingId}: ${detail}`;
      this.metrics.recordFinalizeFailure(this.cameraId, failureReason(stopError));
      this.bus.emitEvent({
        ts: now,
        source: this.cameraId,
        kind: 'recording.finalize_failed',
        severity: 'critical',
        message: this.lastError,
        meta: { bookingId: session.bookingId, reason }
      });
      if (reason !== 'canceled') {
        await this.bookings.markStatus(session.bookingId, 'failed', 'finalize-failed');
        this.metrics.recordBookingOutcome('finalize-failed');
      }
    } else {
      try {
        this.uploads.enqueue({
          bookingId: session.bookingId,
          cameraId: this.cameraId,
          userId: session.userId,
          artifactPath: session.artifactPath,
          sizeBytes: artifact.sizeBytes,
          checksum: artifact.checksum,
          bookingDate: session.bookingDate,
          startsAt: session.scheduledStartsAt,
          endsAt: session.endsAt
        });
      } catch (error) {
        this.lastError = `Upload not queued for booking ${session.bookingId}: ${errorMessage(error)}`;
        this.log.error(
          { err: error, cameraId: this.cameraId, artifactPath: session.artifactPath },
          'Artifact retained locally, upload not queued'
        );
      }

      if (reason === 'canceled') {
        this.metrics.recordRecordingFinished(this.cameraId, 'canceled');
      } else {
        await this.bookings.markStatus(session.bookingId, 'completed');
        this.metrics.recordRecordingFinished(this.cameraId, 'completed');
        this.metrics.recordBookingOutcome('completed');
      }

      this.bus.emitEvent({
        ts: now,
        source: this.cameraId,
        kind: 'recording.completed',
        severity: 'info',
        message: `Recording for booking ${session.bookingId} finished (${reason})`,
        meta: {
          bookingId: session.bookingId,
          reason,
          artifactPath: session.artifactPath,
          sizeBytes: artifact.sizeBytes,
          durationMs: now - session.startedAt
        }
      });
    }

    this.session = null;
    if (this.stopRequest?.bookingId === session.bookingId) {
      this.stopRequest = null;
    }
    this.state = 'idle';
  }

  private async release() {
    try {
      await this.call('close', () => this.driver.close());
    } catch (error) {
      this.log.warn({ err: error, cameraId: this.cameraId }, 'Camera release failed');
    }
  }
}
