import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import type { BookingSource } from '../src/bookings/source.js';
import type { CameraDriver } from '../src/camera/driver.js';
import { buildRecorderConfig } from '../src/config/index.js';
import { MetricsRegistry } from '../src/metrics/index.js';
import { startRecorder, type RecorderRuntime } from '../src/orchestrator.js';
import type { VideoCatalog } from '../src/upload/catalog.js';
import { MemoryUploadTaskRepository } from '../src/upload/repository.js';
import type { ArtifactStore } from '../src/upload/store.js';

const idleDriver: CameraDriver = {
  open: async () => undefined,
  configure: async () => undefined,
  captureTestFrame: async () => Buffer.from('frame'),
  start: async () => undefined,
  stop: async () => undefined,
  close: async () => undefined
};

describe('startRecorder', () => {
  let tmpDir: string;
  let runtime: RecorderRuntime | null;
  const removeBooking = vi.fn<BookingSource['removeBooking']>();
  const recordVideo = vi.fn<VideoCatalog['recordVideo']>(async () => undefined);

  function start(completedPolicy: 'mark' | 'delete') {
    const config = buildRecorderConfig({
      app: { name: 'recorder', nodeId: 'node-1' },
      logging: { level: 'silent' },
      database: { path: ':memory:' },
      timezone: 'UTC',
      bookings: {
        baseUrl: 'http://rest.test/v1',
        pollIntervalMs: 60_000,
        lookAheadMs: 60_000,
        requestTimeoutMs: 1000,
        completedPolicy
      },
      cameras: [
        { id: 'cam-1', device: '/dev/video0', width: 640, height: 480, framesPerSecond: 15, outputDir: tmpDir }
      ],
      camera: {
        tickIntervalMs: 60_000,
        operationTimeoutMs: 1000,
        maxRecordingMs: 3_600_000,
        backoff: { baseDelayMs: 2000, maxDelayMs: 30000 }
      },
      upload: {
        concurrency: 1,
        maxAttempts: 3,
        timeoutMs: 1000,
        deleteAfterUpload: true,
        backoff: { baseDelayMs: 2000, maxDelayMs: 30000 },
        s3: { bucket: 'videos', region: 'us-east-1' }
      },
      status: { intervalMs: 60_000, baseUrl: 'http://rest.test/v1', timeoutMs: 1000 }
    });
    const store: ArtifactStore = {
      upload: async (_path, key) => ({ url: `memory://${key}`, key })
    };
    runtime = startRecorder({
      config,
      source: { fetchBookings: async () => [], updateStatus: async () => undefined, removeBooking },
      store,
      catalog: { recordVideo },
      sink: { write: async () => undefined },
      createDriver: () => idleDriver,
      repository: new MemoryUploadTaskRepository(),
      metrics: new MetricsRegistry()
    });
    return runtime;
  }

  async function uploadCompleted(recorder: RecorderRuntime) {
    await recorder.poller.stop();
    const artifactPath = path.join(tmpDir, 'booking_b1.mp4');
    fs.writeFileSync(artifactPath, 'video');
    recorder.ledger.observe('b1', 'completed');
    recorder.uploads.enqueue({ bookingId: 'b1', cameraId: 'cam-1', userId: 'u1', artifactPath });
    await recorder.uploads.drain();
  }

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'recorder-'));
    runtime = null;
    removeBooking.mockReset();
    removeBooking.mockResolvedValue(undefined);
    recordVideo.mockClear();
  });

  afterEach(async () => {
    await runtime?.stop();
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it('removes the booking row once its upload is cataloged under the delete policy', async () => {
    const recorder = start('delete');

    await uploadCompleted(recorder);

    expect(recordVideo).toHaveBeenCalledTimes(1);
    expect(removeBooking).toHaveBeenCalledWith('b1');
    expect(recorder.ledger.tracked).toBe(0);
    expect(recorder.uploads.getTask('b1')?.status).toBe('uploaded');
  });

  it('keeps the booking row under the mark policy', async () => {
    const recorder = start('mark');

    await uploadCompleted(recorder);

    expect(recordVideo).toHaveBeenCalledTimes(1);
    expect(removeBooking).not.toHaveBeenCalled();
    expect(recorder.ledger.statusOf('b1')).toBe('completed');
  });

  it('keeps the upload when the booking row cannot be removed', async () => {
    removeBooking.mockRejectedValue(new Error('Booking source removal of b1 failed: HTTP 503'));
    const recorder = start('delete');

    await uploadCompleted(recorder);

    expect(recorder.uploads.getTask('b1')?.status).toBe('uploaded');
    expect(recorder.ledger.statusOf('b1')).toBe('completed');
  });
});
