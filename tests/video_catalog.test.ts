import { describe, expect, it } from 'vitest';
import { parseTimeZone } from '../src/bookings/normalizer.js';
import { RestVideoCatalog, toVideoRow, type UploadedVideo } from '../src/upload/catalog.js';
import { createStubHttp } from './helpers/http.js';

const zone = parseTimeZone('UTC-4');

const video: UploadedVideo = {
  bookingId: 'b1',
  userId: 'u1',
  cameraId: 'cam-1',
  artifactPath: '/recordings/cam-1/booking_b1_20250625T140000Z.mp4',
  url: 'https://store.test/recordings/u1/b1.mp4',
  storageKey: 'recordings/u1/b1.mp4',
  sizeBytes: 2048,
  checksum: 'abc123',
  bookingDate: '2025-06-25',
  startsAt: Date.parse('2025-06-25T14:00:00Z'),
  endsAt: Date.parse('2025-06-25T15:00:00Z'),
  uploadedAt: Date.parse('2025-06-25T15:02:00Z')
};

describe('RestVideoCatalog', () => {
  it('maps an uploaded video to a videos table row in local time', () => {
    expect(toVideoRow(video, zone)).toEqual({
      booking_id: 'b1',
      user_id: 'u1',
      camera_id: 'cam-1',
      filename: 'booking_b1_20250625T140000Z.mp4',
      file_url: 'https://store.test/recordings/u1/b1.mp4',
      storage_path: 'recordings/u1/b1.mp4',
      file_size: 2048,
      checksum: 'abc123',
      recording_date: '2025-06-25',
      recording_start_time: '2025-06-25T10:00:00-04:00',
      recording_end_time: '2025-06-25T11:00:00-04:00',
      upload_timestamp: '2025-06-25T15:02:00.000Z'
    });
  });

  it('leaves unknown booking times empty', () => {
    const row = toVideoRow({ ...video, bookingDate: null, startsAt: null, endsAt: null }, zone);

    expect(row).toMatchObject({ recording_date: null, recording_start_time: null, recording_end_time: null });
  });

  it('upserts the row keyed by booking', async () => {
    const { http, requests } = createStubHttp();
    const catalog = new RestVideoCatalog({
      baseUrl: 'http://rest.test/v1',
      apiKey: 'test-key',
      table: 'videos',
      zone,
      timeoutMs: 1000,
      http
    });

    await catalog.recordVideo(video);

    expect(requests).toHaveLength(1);
    expect(requests[0]).toMatchObject({
      method: 'post',
      url: '/videos',
      params: { on_conflict: 'booking_id' },
      data: toVideoRow(video, zone)
    });
    expect(requests[0].headers.Prefer).toBe('resolution=merge-duplicates,return=minimal');
  });

  it('reports a rejected record as an upload error', async () => {
    const { http, respond } = createStubHttp();
    const catalog = new RestVideoCatalog({
      baseUrl: 'http://rest.test/v1',
      apiKey: 'test-key',
      table: 'videos',
      zone,
      timeoutMs: 1000,
      http
    });
    respond({ status: 409 });

    await expect(catalog.recordVideo(video)).rejects.toMatchObject({
      name: 'UploadError',
      code: 'catalog-failed',
      message: 'Video record for booking b1 failed: HTTP 409'
    });
  });
});
