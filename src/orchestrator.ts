import { parseTimeZone } from './bookings/normalizer.js';
import { BookingPoller } from './bookings/poller.js';
import { BookingLedger } from './bookings/scheduler.js';
import type { BookingSource } from './bookings/source.js';
import { BackoffController } from './camera/backoff.js';
import type { CameraDriver } from './camera/driver.js';
import { CameraLifecycle } from './camera/lifecycle.js';
import type { FrozenCameraConfig, FrozenRecorderConfig } from './config/index.js';
import eventBus, { type EventBus } from './eventBus.js';
import logger, { type ComponentLogger } from './logger.js';
import defaultMetrics, { type MetricsRegistry } from './metrics/index.js';
import { StatusReporter } from './status/reporter.js';
import type { StatusSink } from './status/sink.js';
import type { Clock } from './types.js';
import { UploadPipeline } from './upload/pipeline.js';
import type { VideoCatalog } from './upload/catalog.js';
import type { UploadTaskRepository } from './upload/repository.js';
import type { ArtifactStore } from './upload/store.js';

export type RecorderOptions = {
  config: FrozenRecorderConfig;
  source: BookingSource;
  store: ArtifactStore;
  catalog?: VideoCatalog;
  sink: StatusSink;
  createDriver: (camera: FrozenCameraConfig) => CameraDriver;
  repository?: UploadTaskRepository;
  clock?: Clock;
  logger?: ComponentLogger;
  metrics?: MetricsRegistry;
  bus?: EventBus;
};

export type RecorderRuntime = {
  lifecycles: ReadonlyMap<string, CameraLifecycle>;
  ledger: BookingLedger;
  backoff: BackoffController;
  uploads: UploadPipeline;
  poller: BookingPoller;
  reporter: StatusReporter;
  stop(): Promise<void>;
};

// Headroom over the driver's SIGINT to SIGKILL escalation before finalize gives up on stop.
const STOP_GRACE_MS = 5000;

type Ticker = {
  stop(): Promise<void>;
};

function startTicker(lifecycle: CameraLifecycle, intervalMs: number, log: ComponentLogger): Ticker {
  let stopped = false;
  let timer: NodeJS.Timeout | null = null;
  let running: Promise<void> | null = null;

  const scheduleNext = () => {
    if (stopped) {
      return;
    }
    timer = setTimeout(() => {
      timer = null;
      running = lifecycle
        .tick()
        .catch(error => {
          log.error({ err: error, cameraId: lifecycle.cameraId }, 'Camera tick failed');
        })
        .finally(() => {
          running = null;
          scheduleNext();
        });
    }, intervalMs);
  };

  scheduleNext();

  return {
    async stop() {
      stopped = true;
      if (timer) {
        clearTimeout(timer);
        timer = null;
      }
      if (running) {
        await running;
      }
    }
  };
}

/**
 * Wires one lifecycle per configured camera to the shared upload pipeline, booking poller
 * and status reporter, and starts every loop.
 */
export function startRecorder(options: RecorderOptions): RecorderRuntime {
  const { config } = options;
  const log = options.logger ?? logger;
  const metrics = options.metrics ?? defaultMetrics;
  const bus = options.bus ?? eventBus;
  const clock = options.clock ?? Date.now;
  const zone = parseTimeZone(config.timezone);

  const backoff = new BackoffController({ ...config.camera.backoff, clock });
  const ledger = new BookingLedger({ source: options.source, logger: log, metrics });

  const removeAfterUpload = config.bookings.completedPolicy === 'delete';
  const uploads = new UploadPipeline({
    store: options.store,
    catalog: options.catalog,
    repository: options.repository,
    onUploaded: removeAfterUpload
      ? async task => {
          await options.source.removeBooking(task.bookingId);
          ledger.forget(task.bookingId);
          log.info({ bookingId: task.bookingId }, 'Booking removed after upload');
        }
      : undefined,
    concurrency: config.upload.concurrency,
    maxAttempts: config.upload.maxAttempts,
    queueCapacity: config.upload.queueCapacity,
    timeoutMs: config.upload.timeoutMs,
    pollIntervalMs: config.upload.pollIntervalMs,
    deleteAfterUpload: config.upload.deleteAfterUpload,
    backoff: config.upload.backoff,
    clock,
    logger: log,
    metrics,
    bus
  });

  const lifecycles = new Map<string, CameraLifecycle>();
  const outputDirs = new Map<string, string>();
  for (const camera of config.cameras) {
    lifecycles.set(
      camera.id,
      new CameraLifecycle({
        cameraId: camera.id,
        driver: options.createDriver(camera),
        settings: { width: camera.width, height: camera.height, framesPerSecond: camera.framesPerSecond },
        outputDir: camera.outputDir,
        backoff,
        uploads,
        bookings: ledger,
        clock,
        operationTimeoutMs: config.camera.operationTimeoutMs,
        stopTimeoutMs: config.camera.stopTimeoutMs + STOP_GRACE_MS,
        maxRecordingMs: config.camera.maxRecordingMs,
        logger: log,
        metrics,
        bus
      })
    );
    outputDirs.set(camera.id, camera.outputDir);
  }

  const poller = new BookingPoller({
    source: options.source,
    ledger,
    lifecycles,
    zone,
    intervalMs: config.bookings.pollIntervalMs,
    lookAheadMs: config.bookings.lookAheadMs,
    lookBehindMs: config.bookings.lookBehindMs,
    clock,
    logger: log,
    metrics
  });

  const reporter = new StatusReporter({
    nodeId: config.app.nodeId,
    lifecycles,
    uploads,
    sink: options.sink,
    intervalMs: config.status.intervalMs,
    timeoutMs: config.status.timeoutMs,
    outputDirs,
    logger: log,
    metrics
  });

  uploads.resume();
  uploads.start();
  const tickers = Array.from(lifecycles.values()).map(lifecycle =>
    startTicker(lifecycle, config.camera.tickIntervalMs, log)
  );
  poller.start();
  reporter.start();

  log.info({ cameras: Array.from(lifecycles.keys()), nodeId: config.app.nodeId }, 'Recorder started');

  let stopping: Promise<void> | null = null;
  const stop = () => {
    if (!stopping) {
      stopping = (async () => {
        log.info('Recorder stopping');
        await poller.stop();
        await Promise.all(tickers.map(ticker => ticker.stop()));
        await Promise.all(Array.from(lifecycles.values()).map(lifecycle => lifecycle.shutdown()));
        await uploads.stop();
        await ledger.flush();
        await reporter.stop();
        await reporter.runOnce();
        log.info('Recorder stopped');
      })();
    }
    return stopping;
  };

  return { lifecycles, ledger, backoff, uploads, poller, reporter, stop };
}
