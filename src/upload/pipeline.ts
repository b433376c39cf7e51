import fs from 'node:fs';
import { computeBackoffDelay, DEFAULT_BACKOFF_BASE_MS, DEFAULT_BACKOFF_MAX_MS } from '../camera/backoff.js';
import { PermanentUploadFailure, UploadError, errorMessage } from '../errors.js';
import eventBus, { type EventBus } from '../eventBus.js';
import logger, { type ComponentLogger } from '../logger.js';
import defaultMetrics, { type MetricsRegistry } from '../metrics/index.js';
import type { Clock, UploadCounts, UploadTask, UploadTaskInput } from '../types.js';
import { withTimeout } from '../utils/timeout.js';
import type { VideoCatalog } from './catalog.js';
import { MemoryUploadTaskRepository, type UploadTaskRepository } from './repository.js';
import type { ArtifactStore, StoredArtifact } from './store.js';

export type EnqueueOutcome = 'enqueued' | 'duplicate';

export interface UploadPipelineOptions {
  store: ArtifactStore;
  catalog?: VideoCatalog;
  repository?: UploadTaskRepository;
  /** Runs once a task is uploaded and cataloged; failures are logged, not retried. */
  onUploaded?: (task: UploadTask) => Promise<void>;
  concurrency?: number;
  maxAttempts?: number;
  queueCapacity?: number;
  timeoutMs?: number;
  pollIntervalMs?: number;
  deleteAfterUpload?: boolean;
  backoff?: { baseDelayMs: number; maxDelayMs: number };
  clock?: Clock;
  logger?: ComponentLogger;
  metrics?: MetricsRegistry;
  bus?: EventBus;
}

const EMPTY_COUNTS: UploadCounts = { pending: 0, uploading: 0, uploaded: 0, permanentlyFailed: 0 };

function addToCounts(counts: UploadCounts, task: UploadTask) {
  switch (task.status) {
    case 'pending':
      counts.pending += 1;
      break;
    case 'uploading':
      counts.uploading += 1;
      break;
    case 'uploaded':
      counts.uploaded += 1;
      break;
    case 'permanently_failed':
      counts.permanentlyFailed += 1;
      break;
  }
}

/**
 * Bounded, persisted upload queue drained by a small worker pool. Tasks are keyed by
 * booking id, so a booking yields at most one remote artifact. Finished tasks leave
 * memory; the repository answers for them afterwards.
 */
export class UploadPipeline {
  private readonly store: ArtifactStore;
  private readonly catalog: VideoCatalog | null;
  private readonly repository: UploadTaskRepository;
  private readonly onUploaded: ((task: UploadTask) => Promise<void>) | null;
  private readonly concurrency: number;
  private readonly maxAttempts: number;
  private readonly queueCapacity: number;
  private readonly timeoutMs: number;
  private readonly pollIntervalMs: number;
  private readonly deleteAfterUpload: boolean;
  private readonly backoff: { baseDelayMs: number; maxDelayMs: number };
  private readonly clock: Clock;
  private readonly log: ComponentLogger;
  private readonly metrics: MetricsRegistry;
  private readonly bus: EventBus;

  private readonly tasks = new Map<string, UploadTask>();
  private readonly uploadedByCamera = new Map<string, number>();
  private readonly inFlight = new Map<string, Promise<void>>();
  private timer: NodeJS.Timeout | null = null;
  private stopped = true;

  constructor(options: UploadPipelineOptions) {
    this.store = options.store;
    this.catalog = options.catalog ?? null;
    this.repository = options.repository ?? new MemoryUploadTaskRepository();
    this.onUploaded = options.onUploaded ?? null;
    this.concurrency = Math.max(1, options.concurrency ?? 1);
    this.maxAttempts = Math.max(1, options.maxAttempts ?? 3);
    this.queueCapacity = Math.max(1, options.queueCapacity ?? 100);
    this.timeoutMs = options.timeoutMs ?? 10 * 60 * 1000;
    this.pollIntervalMs = options.pollIntervalMs ?? 1000;
    this.deleteAfterUpload = options.deleteAfterUpload ?? true;
    this.backoff = options.backoff ?? {
      baseDelayMs: DEFAULT_BACKOFF_BASE_MS,
      maxDelayMs: DEFAULT_BACKOFF_MAX_MS
    };
    this.clock = options.clock ?? Date.now;
    this.log = options.logger ?? logger;
    this.metrics = options.metrics ?? defaultMetrics;
    this.bus = options.bus ?? eventBus;
  }

  /** Loads persisted tasks; anything interrupted mid-upload goes back to pending. */
  resume(): number {
    let resumed = 0;
    for (const task of this.repository.load()) {
      if (task.status === 'uploading') {
        task.status = 'pending';
        task.updatedAt = this.clock();
        this.repository.save(task);
      }
      if (task.status === 'uploaded') {
        this.countUploaded(task.cameraId);
        continue;
      }
      if (task.status === 'pending') {
        resumed += 1;
      }
      this.tasks.set(task.bookingId, task);
    }
    if (resumed > 0) {
      this.log.info({ resumed }, 'Resumed persisted uploads');
    }
    return resumed;
  }

  enqueue(input: UploadTaskInput): EnqueueOutcome {
    const existing = this.tasks.get(input.bookingId) ?? this.repository.get(input.bookingId);
    if (existing && existing.status !== 'permanently_failed') {
      this.metrics.recordUploadEnqueued('duplicate');
      this.log.debug({ bookingId: input.bookingId, status: existing.status }, 'Upload already tracked');
      return 'duplicate';
    }

    const open = this.countOpen();
    if (open >= this.queueCapacity) {
      this.metrics.recordUploadEnqueued('rejected');
      throw new UploadError(
        `Upload queue is full (${open}/${this.queueCapacity}), keeping ${input.artifactPath}`,
        'queue-full'
      );
    }

    const now = this.clock();
    const task: UploadTask = {
      bookingId: input.bookingId,
      cameraId: input.cameraId,
      userId: input.userId,
      artifactPath: input.artifactPath,
      attemptCount: 0,
      status: 'pending',
      nextAttemptAt: now,
      lastError: null,
      remoteUrl: null,
      storageKey: null,
      sizeBytes: input.sizeBytes ?? existing?.sizeBytes ?? null,
      checksum: input.checksum ?? existing?.checksum ?? null,
      bookingDate: input.bookingDate ?? existing?.bookingDate ?? null,
      startsAt: input.startsAt ?? existing?.startsAt ?? null,
      endsAt: input.endsAt ?? existing?.endsAt ?? null,
      createdAt: existing?.createdAt ?? now,
      updatedAt: now
    };
    this.persist(task);
    this.metrics.recordUploadEnqueued('enqueued');
    this.log.info({ bookingId: task.bookingId, artifactPath: task.artifactPath }, 'Upload queued');
    this.pump();
    return 'enqueued';
  }

  retryFailed(bookingId: string): boolean {
    const task = this.tasks.get(bookingId);
    if (!task || task.status !== 'permanently_failed') {
      return false;
    }
    task.status = 'pending';
    task.attemptCount = 0;
    task.nextAttemptAt = this.clock();
    task.updatedAt = task.nextAttemptAt;
    this.persist(task);
    this.log.info({ bookingId }, 'Permanently failed upload reset to pending');
    this.pump();
    return true;
  }

  getTask(bookingId: string): UploadTask | null {
    const task = this.tasks.get(bookingId);
    return task ? { ...task } : this.repository.get(bookingId);
  }

  /** Number of tasks held in memory; uploaded tasks are not among them. */
  get tracked(): number {
    return this.tasks.size;
  }

  counts(cameraId?: string): UploadCounts {
    const counts = { ...EMPTY_COUNTS };
    for (const task of this.tasks.values()) {
      if (!cameraId || task.cameraId === cameraId) {
        addToCounts(counts, task);
      }
    }
    for (const [camera, uploaded] of this.uploadedByCamera) {
      if (!cameraId || camera === cameraId) {
        counts.uploaded += uploaded;
      }
    }
    return counts;
  }

  countsByCamera(): Map<string, UploadCounts> {
    const result = new Map<string, UploadCounts>();
    const entry = (cameraId: string) => {
      let counts = result.get(cameraId);
      if (!counts) {
        counts = { ...EMPTY_COUNTS };
        result.set(cameraId, counts);
      }
      return counts;
    };
    for (const task of this.tasks.values()) {
      addToCounts(entry(task.cameraId), task);
    }
    for (const [cameraId, uploaded] of this.uploadedByCamera) {
      entry(cameraId).uploaded += uploaded;
    }
    return result;
  }

  failedTasks(cameraId?: string): UploadTask[] {
    return Array.from(this.tasks.values())
      .filter(task => task.status === 'permanently_failed' && (!cameraId || task.cameraId === cameraId))
      .map(task => ({ ...task }));
  }

  start() {
    if (!this.stopped) {
      return;
    }
    this.stopped = false;
    this.scheduleNext(0);
  }

  /** Starts every due task the pool has room for and waits for the whole batch to settle. */
  async runDue(): Promise<void> {
    this.pump(true);
    await this.drain();
  }

  async drain(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.all(Array.from(this.inFlight.values()));
    }
  }

  async stop(): Promise<void> {
    this.stopped = true;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    await this.drain();
  }

  private scheduleNext(delayMs: number) {
    if (this.stopped) {
      return;
    }
    this.timer = setTimeout(() => {
      this.timer = null;
      this.pump();
      this.scheduleNext(this.pollIntervalMs);
    }, delayMs);
  }

  private countOpen(): number {
    let open = 0;
    for (const task of this.tasks.values()) {
      if (task.status === 'pending' || task.status === 'uploading') {
        open += 1;
      }
    }
    return open;
  }

  private nextDue(now: number): UploadTask | null {
    let candidate: UploadTask | null = null;
    for (const task of this.tasks.values()) {
      if (task.status !== 'pending' || task.nextAttemptAt > now || this.inFlight.has(task.bookingId)) {
        continue;
      }
      if (
        !candidate ||
        task.nextAttemptAt < candidate.nextAttemptAt ||
        (task.nextAttemptAt === candidate.nextAttemptAt && task.createdAt < candidate.createdAt)
      ) {
        candidate = task;
      }
    }
    return candidate;
  }

  private pump(force = false) {
    if (this.stopped && !force) {
      return;
    }
    const now = this.clock();
    while (this.inFlight.size < this.concurrency) {
      const task = this.nextDue(now);
      if (!task) {
        return;
      }
      task.status = 'uploading';
      task.updatedAt = now;
      this.persist(task);
      const work = this.process(task).finally(() => {
        this.inFlight.delete(task.bookingId);
        if (!this.stopped) {
          this.pump();
        }
      });
      this.inFlight.set(task.bookingId, work);
    }
  }

  private async process(task: UploadTask): Promise<void> {
    this.metrics.recordUploadAttempt();
    const startedAt = Date.now();
    try {
      const stored = await withTimeout(`upload ${task.bookingId}`, this.timeoutMs, () =>
        this.store.upload(task.artifactPath, task.bookingId, {
          userId: task.userId,
          cameraId: task.cameraId,
          checksum: task.checksum
        })
      );
      task.remoteUrl = stored.url;
      task.storageKey = stored.key;
      this.persist(task);
      await this.recordVideo(task, stored);
      await this.completeTask(task, stored.url);
    } catch (error) {
      this.failTask(task, error);
    } finally {
      this.metrics.observeLatency('upload', Date.now() - startedAt);
    }
  }

  private async recordVideo(task: UploadTask, stored: StoredArtifact) {
    const catalog = this.catalog;
    if (!catalog) {
      return;
    }
    await withTimeout(`video record ${task.bookingId}`, this.timeoutMs, () =>
      catalog.recordVideo({
        bookingId: task.bookingId,
        userId: task.userId,
        cameraId: task.cameraId,
        artifactPath: task.artifactPath,
        url: stored.url,
        storageKey: stored.key,
        sizeBytes: task.sizeBytes,
        checksum: task.checksum,
        bookingDate: task.bookingDate,
        startsAt: task.startsAt,
        endsAt: task.endsAt,
        uploadedAt: this.clock()
      })
    );
  }

  private async completeTask(task: UploadTask, remoteUrl: string) {
    const now = this.clock();
    task.attemptCount += 1;
    task.status = 'uploaded';
    task.remoteUrl = remoteUrl;
    task.lastError = null;
    task.updatedAt = now;
    this.persist(task);
    this.tasks.delete(task.bookingId);
    this.countUploaded(task.cameraId);
    this.metrics.recordUploadSuccess(task.sizeBytes);
    this.bus.emitEvent({
      ts: now,
      source: task.cameraId,
      kind: 'upload.completed',
      severity: 'info',
      message: `Uploaded booking ${task.bookingId}`,
      meta: { bookingId: task.bookingId, remoteUrl, attempts: task.attemptCount }
    });

    if (this.deleteAfterUpload) {
      try {
        await fs.promises.rm(task.artifactPath, { force: true });
      } catch (error) {
        this.log.warn({ err: error, artifactPath: task.artifactPath }, 'Failed to delete uploaded artifact');
      }
    }

    if (this.onUploaded) {
      try {
        await this.onUploaded({ ...task });
      } catch (error) {
        this.log.warn({ err: error, bookingId: task.bookingId }, 'Post-upload step failed');
      }
    }
  }

  private countUploaded(cameraId: string) {
    this.uploadedByCamera.set(cameraId, (this.uploadedByCamera.get(cameraId) ?? 0) + 1);
  }

  private failTask(task: UploadTask, error: unknown) {
    const now = this.clock();
    const message = errorMessage(error);
    task.attemptCount += 1;
    task.lastError = message;
    task.updatedAt = now;

    if (task.attemptCount >= this.maxAttempts) {
      task.status = 'permanently_failed';
      this.persist(task);
      const failure = new PermanentUploadFailure(task.bookingId, task.attemptCount, message);
      this.metrics.recordUploadFailure(message, true);
      this.bus.emitEvent({
        ts: now,
        source: task.cameraId,
        kind: 'upload.failed',
        severity: 'critical',
        message: failure.message,
        meta: { bookingId: task.bookingId, attempts: task.attemptCount, artifactPath: task.artifactPath }
      });
      return;
    }

    const delayMs = computeBackoffDelay(task.attemptCount, this.backoff.baseDelayMs, this.backoff.maxDelayMs);
    task.status = 'pending';
    task.nextAttemptAt = now + delayMs;
    this.persist(task);
    this.metrics.recordUploadFailure(message, false);
    this.log.warn(
      { err: error, bookingId: task.bookingId, attempt: task.attemptCount, retryInMs: delayMs },
      'Upload attempt failed'
    );
  }

  private persist(task: UploadTask) {
    this.tasks.set(task.bookingId, task);
    try {
      this.repository.save(task);
    } catch (error) {
      this.log.error({ err: error, bookingId: task.bookingId }, 'Failed to persist upload task');
    }
  }
}
