export type Clock = () => number;

export type BookingStatus = 'scheduled' | 'recording' | 'completed' | 'failed' | 'canceled';

export const BOOKING_STATUSES: readonly BookingStatus[] = [
  'scheduled',
  'recording',
  'completed',
  'failed',
  'canceled'
];

export interface Booking {
  id: string;
  cameraId: string;
  userId: string;
  date: string;
  startsAt: Date;
  endsAt: Date;
  status: BookingStatus;
}

export type BookingFailureReason =
  | 'conflict'
  | 'window-elapsed'
  | 'camera-init-failed'
  | 'finalize-failed'
  | 'invalid-window';

export type CameraState = 'idle' | 'initializing' | 'recording' | 'finalizing' | 'failed';

export interface RecordingSession {
  bookingId: string;
  cameraId: string;
  userId: string;
  state: 'recording' | 'finalizing';
  bookingDate: string;
  scheduledStartsAt: number;
  startedAt: number;
  endsAt: number;
  artifactPath: string;
}

export interface FailureCounter {
  cameraId: string;
  consecutiveFailures: number;
  nextRetryAt: number | null;
}

export type UploadStatus = 'pending' | 'uploading' | 'uploaded' | 'permanently_failed';

export interface UploadTask {
  bookingId: string;
  cameraId: string;
  userId: string;
  artifactPath: string;
  attemptCount: number;
  status: UploadStatus;
  nextAttemptAt: number;
  lastError: string | null;
  remoteUrl: string | null;
  storageKey: string | null;
  sizeBytes: number | null;
  checksum: string | null;
  bookingDate: string | null;
  startsAt: number | null;
  endsAt: number | null;
  createdAt: number;
  updatedAt: number;
}

export type UploadTaskInput = Pick<UploadTask, 'bookingId' | 'cameraId' | 'userId' | 'artifactPath'> &
  Partial<Pick<UploadTask, 'sizeBytes' | 'checksum' | 'bookingDate' | 'startsAt' | 'endsAt'>>;

export interface UploadCounts {
  pending: number;
  uploading: number;
  uploaded: number;
  permanentlyFailed: number;
}

export interface CameraStatusSnapshot {
  cameraId: string;
  nodeId: string;
  state: CameraState;
  isRecording: boolean;
  currentBookingId: string | null;
  recordingStartedAt: string | null;
  consecutiveFailures: number;
  nextRetryAt: string | null;
  lastError: string | null;
  lastHeartbeat: string;
  pendingUploads: number;
  failedUploads: number;
  uploadedTotal: number;
  failedUploadBookings: string[];
  storageUsedBytes: number;
  initFailures: number;
  recordingsCompleted: number;
  finalizeFailures: number;
  lastPollAt: string | null;
  pollFailures: number;
}

export type EventSeverity = 'info' | 'warning' | 'critical';

export interface EventPayload {
  ts?: number | Date;
  source: string;
  kind: string;
  severity: EventSeverity;
  message: string;
  meta?: Record<string, unknown>;
}

export interface EventRecord {
  ts: number;
  source: string;
  kind: string;
  severity: EventSeverity;
  message: string;
  meta: Record<string, unknown> | undefined;
}
