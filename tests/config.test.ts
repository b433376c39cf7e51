import { describe, expect, it } from 'vitest';
import { buildRecorderConfig, loadRecorderConfig, validateConfig } from '../src/config/index.js';

function camera(id: string, device: string) {
  return { id, device, width: 1280, height: 720, framesPerSecond: 30, outputDir: `recordings/${id}` };
}

function rawConfig(overrides: Record<string, unknown> = {}) {
  return {
    app: { name: 'recorder', nodeId: 'node-1' },
    logging: { level: 'info' },
    database: { path: ':memory:' },
    timezone: 'UTC-4',
    bookings: {
      baseUrl: 'http://rest.test/v1',
      pollIntervalMs: 5000,
      lookAheadMs: 60000,
      requestTimeoutMs: 30000
    },
    cameras: [camera('cam-1', '/dev/video0')],
    camera: {
      tickIntervalMs: 1000,
      operationTimeoutMs: 15000,
      maxRecordingMs: 7200000,
      backoff: { baseDelayMs: 2000, maxDelayMs: 30000 }
    },
    upload: {
      concurrency: 1,
      maxAttempts: 3,
      timeoutMs: 600000,
      deleteAfterUpload: true,
      backoff: { baseDelayMs: 2000, maxDelayMs: 30000 },
      s3: { bucket: 'videos', region: 'us-east-1' }
    },
    status: { intervalMs: 3000, baseUrl: 'http://rest.test/v1', timeoutMs: 10000 },
    ...overrides
  };
}

describe('recorder configuration', () => {
  it('fills defaults and freezes the result', () => {
    const config = buildRecorderConfig(rawConfig());

    expect(config.bookings).toMatchObject({
      apiKey: '',
      table: 'bookings',
      lookBehindMs: 86_400_000,
      completedPolicy: 'mark'
    });
    expect(config.camera.stopTimeoutMs).toBe(5000);
    expect(config.upload).toMatchObject({ queueCapacity: 100, pollIntervalMs: 1000, videoTable: 'videos' });
    expect(config.upload.s3).toEqual({ bucket: 'videos', region: 'us-east-1', prefix: '', forcePathStyle: false });
    expect(config.status.table).toBe('system_status');
    expect(config.events.maxStored).toBe(5000);
    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.cameras[0])).toBe(true);
  });

  it('does not mutate the raw object', () => {
    const raw = rawConfig();
    buildRecorderConfig(raw);

    expect(Object.isFrozen(raw)).toBe(false);
    expect(raw.bookings).not.toHaveProperty('table');
  });

  it('reports schema violations with their paths', () => {
    const raw = rawConfig({
      app: { name: 'recorder', nodeId: 'node-1', extra: true },
      cameras: [{ ...camera('cam-1', '/dev/video0'), width: 0 }]
    });

    expect(() => validateConfig(raw)).toThrow(
      'config.app.extra is not allowed; config.cameras[0].width must be >= 1'
    );
  });

  it('reports missing sections', () => {
    const raw: Record<string, unknown> = rawConfig();
    delete raw.status;

    expect(() => validateConfig(raw)).toThrow('config.status is required');
  });

  it('requires at least one camera', () => {
    expect(() => validateConfig(rawConfig({ cameras: [] }))).toThrow(
      'config.cameras must define at least one camera'
    );
  });

  it('rejects duplicate camera ids and shared devices', () => {
    const raw = rawConfig({ cameras: [camera('cam-1', '/dev/video0'), camera('cam-1', '/dev/video0')] });

    expect(() => validateConfig(raw)).toThrow(
      'config.cameras[cam-1] duplicates camera id "cam-1" already used by config.cameras[0]; ' +
        'config.cameras[cam-1] reuses device "/dev/video0" already assigned to camera "cam-1"'
    );
  });

  it('rejects unknown time zones and inverted backoff bounds', () => {
    const raw = rawConfig({
      timezone: 'Mars/Olympus_Mons',
      camera: {
        tickIntervalMs: 1000,
        operationTimeoutMs: 15000,
        maxRecordingMs: 7200000,
        backoff: { baseDelayMs: 5000, maxDelayMs: 1000 }
      }
    });

    expect(() => validateConfig(raw)).toThrow(
      'config.timezone Unknown time zone "Mars/Olympus_Mons"; ' +
        'config.camera.backoff.maxDelayMs must be greater than or equal to baseDelayMs'
    );
  });

  it('layers the test overlay over the defaults', () => {
    const config = loadRecorderConfig();

    expect(config.database.path).toBe(':memory:');
    expect(config.logging.level).toBe('silent');
    expect(config.bookings.table).toBe('bookings');
  });
});
