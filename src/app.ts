import { fileURLToPath } from 'node:url';
import { parseTimeZone } from './bookings/normalizer.js';
import { RestBookingSource, type BookingSource } from './bookings/source.js';
import type { CameraDriver } from './camera/driver.js';
import { FfmpegCameraDriver } from './camera/ffmpegDriver.js';
import { loadRecorderConfig, type FrozenCameraConfig, type FrozenRecorderConfig } from './config/index.js';
import { EventStore, openDatabase } from './db.js';
import eventBus from './eventBus.js';
import logger from './logger.js';
import { startRecorder, type RecorderRuntime } from './orchestrator.js';
import { RestStatusSink, type StatusSink } from './status/sink.js';
import { RestVideoCatalog, type VideoCatalog } from './upload/catalog.js';
import { SqliteUploadTaskRepository } from './upload/repository.js';
import { S3ArtifactStore, type ArtifactStore } from './upload/store.js';

export type ShutdownHookContext = {
  reason: string;
  signal?: NodeJS.Signals;
};

export type ShutdownHook = (context: ShutdownHookContext) => void | Promise<void>;

type RegisteredHook = {
  name: string;
  hook: ShutdownHook;
};

const shutdownHooks: RegisteredHook[] = [];

export function registerShutdownHook(name: string, hook: ShutdownHook) {
  const existingIndex = shutdownHooks.findIndex(entry => entry.name === name);
  const entry: RegisteredHook = { name, hook };
  if (existingIndex >= 0) {
    shutdownHooks[existingIndex] = entry;
  } else {
    shutdownHooks.push(entry);
  }

  return () => {
    const index = shutdownHooks.findIndex(item => item.name === name);
    if (index >= 0) {
      shutdownHooks.splice(index, 1);
    }
  };
}

/** Runs hooks in reverse registration order; a failing hook does not stop the rest. */
export async function runShutdownHooks(context: ShutdownHookContext) {
  const results: Array<{ name: string; status: 'ok' | 'error'; error?: Error }> = [];
  const hooks = [...shutdownHooks].reverse();
  for (const entry of hooks) {
    try {
      await entry.hook(context);
      results.push({ name: entry.name, status: 'ok' });
    } catch (error) {
      logger.error({ err: error, hook: entry.name }, 'Shutdown hook failed');
      results.push({ name: entry.name, status: 'error', error: error instanceof Error ? error : new Error(String(error)) });
    }
  }
  return results;
}

export function resetAppLifecycle() {
  shutdownHooks.splice(0, shutdownHooks.length);
}

export type BootstrapOverrides = {
  source?: BookingSource;
  store?: ArtifactStore;
  catalog?: VideoCatalog;
  sink?: StatusSink;
  createDriver?: (camera: FrozenCameraConfig) => CameraDriver;
};

function createCollaborators(config: FrozenRecorderConfig, overrides: BootstrapOverrides) {
  const zone = parseTimeZone(config.timezone);
  const source =
    overrides.source ??
    new RestBookingSource({
      baseUrl: config.bookings.baseUrl,
      apiKey: config.bookings.apiKey,
      table: config.bookings.table,
      userId: config.bookings.userId,
      zone,
      timeoutMs: config.bookings.requestTimeoutMs
    });

  const store = overrides.store ?? new S3ArtifactStore({ ...config.upload.s3 });

  const catalog =
    overrides.catalog ??
    new RestVideoCatalog({
      baseUrl: config.bookings.baseUrl,
      apiKey: config.bookings.apiKey,
      table: config.upload.videoTable,
      zone,
      timeoutMs: config.bookings.requestTimeoutMs
    });

  const sink =
    overrides.sink ??
    new RestStatusSink({
      baseUrl: config.status.baseUrl,
      apiKey: config.status.apiKey,
      table: config.status.table,
      timeoutMs: config.status.timeoutMs
    });

  const createDriver =
    overrides.createDriver ??
    ((camera: FrozenCameraConfig) =>
      new FfmpegCameraDriver({
        device: camera.device,
        inputFormat: camera.inputFormat,
        codec: camera.codec,
        ffmpegPath: config.camera.ffmpegPath,
        stopTimeoutMs: config.camera.stopTimeoutMs
      }));

  return { source, store, catalog, sink, createDriver };
}

/**
 * Loads configuration, opens the database and starts the recorder. A configuration error
 * rejects; nothing after startup is fatal.
 */
export async function bootstrap(overrides: BootstrapOverrides = {}): Promise<RecorderRuntime> {
  logger.info('Recorder bootstrap starting');

  const config = loadRecorderConfig();
  const db = openDatabase(config.database.path);
  const events = new EventStore(db, config.events.maxStored);
  eventBus.attachStore(event => {
    events.store(event);
  });

  registerShutdownHook('database', () => {
    eventBus.attachStore(null);
    db.close();
  });

  const runtime = startRecorder({
    config,
    ...createCollaborators(config, overrides),
    repository: new SqliteUploadTaskRepository(db)
  });

  registerShutdownHook('recorder', () => runtime.stop());

  eventBus.emitEvent({
    source: 'system',
    kind: 'system.up',
    severity: 'info',
    message: 'system up',
    meta: { nodeId: config.app.nodeId, cameras: config.cameras.map(camera => camera.id) }
  });

  logger.info('Bootstrap completed');
  return runtime;
}

export function installSignalHandlers() {
  let shuttingDown = false;
  const handle = (signal: NodeJS.Signals) => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;
    logger.info({ signal }, 'Shutdown signal received');
    runShutdownHooks({ reason: 'signal', signal })
      .then(results => {
        process.exitCode = results.some(result => result.status === 'error') ? 1 : 0;
      })
      .catch(error => {
        logger.error({ err: error }, 'Shutdown failed');
        process.exitCode = 1;
      });
  };

  process.once('SIGINT', handle);
  process.once('SIGTERM', handle);
}

if (process.argv[1] && fileURLToPath(import.meta.url) === process.argv[1]) {
  installSignalHandlers();
  bootstrap().catch(error => {
    logger.error({ err: error }, 'Bootstrap failed');
    process.exitCode = 1;
  });
}
