import type Database from 'better-sqlite3';
import type { RecorderDatabase } from '../db.js';
import type { UploadStatus, UploadTask } from '../types.js';

export interface UploadTaskRepository {
  save(task: UploadTask): void;
  load(): UploadTask[];
  get(bookingId: string): UploadTask | null;
}

type UploadTaskRow = {
  booking_id: string;
  camera_id: string;
  user_id: string;
  artifact_path: string;
  attempt_count: number;
  status: string;
  next_attempt_at: number;
  last_error: string | null;
  remote_url: string | null;
  storage_key: string | null;
  size_bytes: number | null;
  checksum: string | null;
  booking_date: string | null;
  starts_at: number | null;
  ends_at: number | null;
  created_at: number;
  updated_at: number;
};

const UPLOAD_STATUSES: readonly UploadStatus[] = ['pending', 'uploading', 'uploaded', 'permanently_failed'];

function toStatus(value: string): UploadStatus {
  const match = UPLOAD_STATUSES.find(status => status === value);
  return match ?? 'pending';
}

function fromRow(row: UploadTaskRow): UploadTask {
  return {
    bookingId: row.booking_id,
    cameraId: row.camera_id,
    userId: row.user_id,
    artifactPath: row.artifact_path,
    attemptCount: row.attempt_count,
    status: toStatus(row.status),
    nextAttemptAt: row.next_attempt_at,
    lastError: row.last_error,
    remoteUrl: row.remote_url,
    storageKey: row.storage_key,
    sizeBytes: row.size_bytes,
    checksum: row.checksum,
    bookingDate: row.booking_date,
    startsAt: row.starts_at,
    endsAt: row.ends_at,
    createdAt: row.created_at,
    updatedAt: row.updated_at
  };
}

export class SqliteUploadTaskRepository implements UploadTaskRepository {
  private readonly upsertStatement: Database.Statement;
  private readonly selectStatement: Database.Statement;
  private readonly getStatement: Database.Statement;

  constructor(db: RecorderDatabase) {
    this.upsertStatement = db.prepare(`
      INSERT INTO upload_tasks (
        booking_id, camera_id, user_id, artifact_path, attempt_count, status, next_attempt_at,
        last_error, remote_url, storage_key, size_bytes, checksum, booking_date, starts_at, ends_at,
        created_at, updated_at
      ) VALUES (
        @bookingId, @cameraId, @userId, @artifactPath, @attemptCount, @status, @nextAttemptAt,
        @lastError, @remoteUrl, @storageKey, @sizeBytes, @checksum, @bookingDate, @startsAt, @endsAt,
        @createdAt, @updatedAt
      )
      ON CONFLICT (booking_id) DO UPDATE SET
        camera_id = excluded.camera_id,
        user_id = excluded.user_id,
        artifact_path = excluded.artifact_path,
        attempt_count = excluded.attempt_count,
        status = excluded.status,
        next_attempt_at = excluded.next_attempt_at,
        last_error = excluded.last_error,
        remote_url = excluded.remote_url,
        storage_key = excluded.storage_key,
        size_bytes = excluded.size_bytes,
        checksum = excluded.checksum,
        booking_date = excluded.booking_date,
        starts_at = excluded.starts_at,
        ends_at = excluded.ends_at,
        updated_at = excluded.updated_at
    `);
    this.selectStatement = db.prepare('SELECT * FROM upload_tasks ORDER BY created_at ASC');
    this.getStatement = db.prepare('SELECT * FROM upload_tasks WHERE booking_id = ?');
  }

  save(task: UploadTask) {
    this.upsertStatement.run({ ...task });
  }

  load(): UploadTask[] {
    return (this.selectStatement.all() as UploadTaskRow[]).map(fromRow);
  }

  get(bookingId: string): UploadTask | null {
    const row = this.getStatement.get(bookingId) as UploadTaskRow | undefined;
    return row ? fromRow(row) : null;
  }
}

export class MemoryUploadTaskRepository implements UploadTaskRepository {
  private readonly rows = new Map<string, UploadTask>();

  save(task: UploadTask) {
    this.rows.set(task.bookingId, { ...task });
  }

  load(): UploadTask[] {
    return Array.from(this.rows.values()).map(task => ({ ...task }));
  }

  get(bookingId: string): UploadTask | null {
    const task = this.rows.get(bookingId);
    return task ? { ...task } : null;
  }
}
