import axios, { AxiosError, type AxiosInstance } from 'axios';
import path from 'node:path';
import { formatInstant, type TimeZone } from '../bookings/normalizer.js';
import { UploadError, errorMessage } from '../errors.js';

export type UploadedVideo = {
  bookingId: string;
  userId: string;
  cameraId: string;
  artifactPath: string;
  url: string;
  storageKey: string;
  sizeBytes: number | null;
  checksum: string | null;
  bookingDate: string | null;
  startsAt: number | null;
  endsAt: number | null;
  uploadedAt: number;
};

export interface VideoCatalog {
  /** Records a stored video; repeating it for the same booking updates the same row. */
  recordVideo(video: UploadedVideo): Promise<void>;
}

export type RestVideoCatalogOptions = {
  baseUrl: string;
  apiKey: string;
  table: string;
  zone: TimeZone;
  timeoutMs: number;
  http?: AxiosInstance;
};

function describeFailure(error: unknown): string {
  if (error instanceof AxiosError) {
    return error.response ? `HTTP ${error.response.status}` : error.code ?? error.message;
  }
  return errorMessage(error);
}

export function toVideoRow(video: UploadedVideo, zone: TimeZone): Record<string, unknown> {
  return {
    booking_id: video.bookingId,
    user_id: video.userId,
    camera_id: video.cameraId,
    filename: path.basename(video.artifactPath),
    file_url: video.url,
    storage_path: video.storageKey,
    file_size: video.sizeBytes,
    checksum: video.checksum,
    recording_date: video.bookingDate,
    recording_start_time: video.startsAt === null ? null : formatInstant(video.startsAt, zone),
    recording_end_time: video.endsAt === null ? null : formatInstant(video.endsAt, zone),
    upload_timestamp: new Date(video.uploadedAt).toISOString()
  };
}

/** PostgREST `videos` table keyed by booking id. */
export class RestVideoCatalog implements VideoCatalog {
  private readonly http: AxiosInstance;
  private readonly table: string;
  private readonly zone: TimeZone;

  constructor(options: RestVideoCatalogOptions) {
    this.table = options.table;
    this.zone = options.zone;
    this.http =
      options.http ??
      axios.create({
        baseURL: options.baseUrl.replace(/\/+$/, ''),
        timeout: options.timeoutMs,
        headers: {
          apikey: options.apiKey,
          Authorization: `Bearer ${options.apiKey}`,
          'Content-Type': 'application/json'
        }
      });
  }

  async recordVideo(video: UploadedVideo): Promise<void> {
    try {
      await this.http.post(`/${this.table}`, toVideoRow(video, this.zone), {
        params: { on_conflict: 'booking_id' },
        headers: { Prefer: 'resolution=merge-duplicates,return=minimal' }
      });
    } catch (error) {
      throw new UploadError(
        `Video record for booking ${video.bookingId} failed: ${describeFailure(error)}`,
        'catalog-failed',
        { cause: error }
      );
    }
  }
}
