import axios, { AxiosError, type AxiosInstance } from 'axios';
import type { CameraStatusSnapshot } from '../types.js';

export interface StatusSink {
  write(cameraId: string, snapshot: CameraStatusSnapshot): Promise<void>;
}

export type RestStatusSinkOptions = {
  baseUrl: string;
  apiKey: string;
  table: string;
  timeoutMs: number;
  http?: AxiosInstance;
};

export function toStatusRow(snapshot: CameraStatusSnapshot): Record<string, unknown> {
  return {
    camera_id: snapshot.cameraId,
    node_id: snapshot.nodeId,
    state: snapshot.state,
    is_recording: snapshot.isRecording,
    current_booking_id: snapshot.currentBookingId,
    recording_started_at: snapshot.recordingStartedAt,
    consecutive_failures: snapshot.consecutiveFailures,
    next_retry_at: snapshot.nextRetryAt,
    last_error: snapshot.lastError,
    last_heartbeat: snapshot.lastHeartbeat,
    pending_uploads: snapshot.pendingUploads,
    failed_uploads: snapshot.failedUploads,
    uploaded_total: snapshot.uploadedTotal,
    failed_upload_bookings: snapshot.failedUploadBookings,
    storage_used: snapshot.storageUsedBytes,
    init_failures: snapshot.initFailures,
    recordings_completed: snapshot.recordingsCompleted,
    finalize_failures: snapshot.finalizeFailures,
    last_poll_at: snapshot.lastPollAt,
    poll_failures: snapshot.pollFailures
  };
}

/** Upserts one row per camera into a PostgREST `system_status` table. */
export class RestStatusSink implements StatusSink {
  private readonly http: AxiosInstance;
  private readonly table: string;

  constructor(options: RestStatusSinkOptions) {
    this.table = options.table;
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

  async write(cameraId: string, snapshot: CameraStatusSnapshot): Promise<void> {
    try {
      await this.http.post(`/${this.table}`, toStatusRow({ ...snapshot, cameraId }), {
        params: { on_conflict: 'camera_id' },
        headers: { Prefer: 'resolution=merge-duplicates,return=minimal' }
      });
    } catch (error) {
      if (error instanceof AxiosError && error.response) {
        throw new Error(`Status write for ${cameraId} failed: HTTP ${error.response.status}`, { cause: error });
      }
      throw error;
    }
  }
}
