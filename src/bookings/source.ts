import axios, { AxiosError, type AxiosInstance } from 'axios';
import { TransientSourceError } from '../errors.js';
import type { BookingFailureReason, BookingStatus } from '../types.js';
import { formatInstant, type TimeZone } from './normalizer.js';

export type BookingQuery = {
  cameraIds: readonly string[];
  from: number;
  to: number;
  statuses: readonly BookingStatus[];
  /** Bookings to return regardless of status, used to observe cancellations. */
  includeIds?: readonly string[];
};

export interface BookingSource {
  /** Raw rows; callers normalize them. */
  fetchBookings(query: BookingQuery): Promise<unknown[]>;
  updateStatus(bookingId: string, status: BookingStatus, reason?: BookingFailureReason): Promise<void>;
  /** Deletes the booking row once its recording is stored and cataloged. */
  removeBooking(bookingId: string): Promise<void>;
}

export type RestBookingSourceOptions = {
  baseUrl: string;
  apiKey: string;
  table: string;
  zone: TimeZone;
  userId?: string;
  timeoutMs: number;
  http?: AxiosInstance;
};

function inList(values: readonly string[]): string {
  return `in.(${values.map(value => `"${value.replace(/"/g, '\\"')}"`).join(',')})`;
}

function rowId(row: unknown): string | null {
  if (row && typeof row === 'object' && 'id' in row) {
    const id = row.id;
    return typeof id === 'string' || typeof id === 'number' ? String(id) : null;
  }
  return null;
}

function toSourceError(action: string, error: unknown): TransientSourceError {
  if (error instanceof AxiosError) {
    const status = error.response?.status;
    const detail = status ? `HTTP ${status}` : error.code ?? error.message;
    return new TransientSourceError(`Booking source ${action} failed: ${detail}`, { status, cause: error });
  }
  const message = error instanceof Error ? error.message : String(error);
  return new TransientSourceError(`Booking source ${action} failed: ${message}`, { cause: error });
}

/** PostgREST-style `bookings` table. */
export class RestBookingSource implements BookingSource {
  private readonly http: AxiosInstance;
  private readonly table: string;
  private readonly zone: TimeZone;
  private readonly userId?: string;

  constructor(options: RestBookingSourceOptions) {
    this.table = options.table;
    this.zone = options.zone;
    this.userId = options.userId || undefined;
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

  async fetchBookings(query: BookingQuery): Promise<unknown[]> {
    if (query.cameraIds.length === 0) {
      return [];
    }

    const fromDate = formatInstant(query.from, this.zone).slice(0, 10);
    const toDate = formatInstant(query.to, this.zone).slice(0, 10);
    const params: Record<string, string> = {
      select: '*',
      camera_id: inList(query.cameraIds),
      status: inList(query.statuses),
      and: `(date.gte.${fromDate},date.lte.${toDate})`,
      order: 'date.asc,start_time.asc'
    };
    if (this.userId) {
      params.user_id = `eq.${this.userId}`;
    }

    const rows = await this.get(params);
    const includeIds = (query.includeIds ?? []).filter(id => !rows.some(row => rowId(row) === id));
    if (includeIds.length === 0) {
      return rows;
    }
    const extra = await this.get({ select: '*', id: inList(includeIds) });
    return rows.concat(extra);
  }

  async updateStatus(bookingId: string, status: BookingStatus, _reason?: BookingFailureReason): Promise<void> {
    const params = { id: `eq.${bookingId}` };
    try {
      await this.http.patch(`/${this.table}`, { status }, { params, headers: { Prefer: 'return=minimal' } });
    } catch (error) {
      throw toSourceError(`update of ${bookingId}`, error);
    }
  }

  async removeBooking(bookingId: string): Promise<void> {
    try {
      await this.http.delete(`/${this.table}`, { params: { id: `eq.${bookingId}` } });
    } catch (error) {
      throw toSourceError(`removal of ${bookingId}`, error);
    }
  }

  private async get(params: Record<string, string>): Promise<unknown[]> {
    let data: unknown;
    try {
      const response = await this.http.get<unknown>(`/${this.table}`, { params });
      data = response.data;
    } catch (error) {
      throw toSourceError('query', error);
    }
    if (!Array.isArray(data)) {
      throw new TransientSourceError('Booking source returned an unexpected payload');
    }
    return data;
  }
}
