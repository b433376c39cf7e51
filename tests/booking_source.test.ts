import { describe, expect, it } from 'vitest';
import { parseTimeZone } from '../src/bookings/normalizer.js';
import { RestBookingSource } from '../src/bookings/source.js';
import { TransientSourceError } from '../src/errors.js';
import { createStubHttp } from './helpers/http.js';

function createSource(options: { userId?: string } = {}) {
  const stub = createStubHttp();
  const source = new RestBookingSource({
    baseUrl: 'http://rest.test/v1',
    apiKey: 'test-key',
    table: 'bookings',
    zone: parseTimeZone('UTC-4'),
    userId: options.userId,
    timeoutMs: 1000,
    http: stub.http
  });
  return { source, ...stub };
}

const query = {
  cameraIds: ['cam-1', 'cam-2'],
  from: Date.parse('2025-06-24T14:00:00Z'),
  to: Date.parse('2025-06-25T14:01:00Z'),
  statuses: ['scheduled', 'recording'] as const
};

describe('RestBookingSource', () => {
  it('queries bookings for the managed cameras within the local date range', async () => {
    const { source, requests, respond } = createSource({ userId: 'user-7' });
    const rows = [{ id: 1, camera_id: 'cam-1', status: 'scheduled' }];
    respond({ status: 200, data: rows });

    await expect(source.fetchBookings(query)).resolves.toEqual(rows);

    expect(requests).toHaveLength(1);
    expect(requests[0]).toMatchObject({
      method: 'get',
      url: '/bookings',
      params: {
        select: '*',
        camera_id: 'in.("cam-1","cam-2")',
        status: 'in.("scheduled","recording")',
        and: '(date.gte.2025-06-24,date.lte.2025-06-25)',
        order: 'date.asc,start_time.asc',
        user_id: 'eq.user-7'
      }
    });
  });

  it('fetches tracked bookings the status filter left out', async () => {
    const { source, requests, respond } = createSource();
    respond(
      { status: 200, data: [{ id: 1, status: 'recording' }] },
      { status: 200, data: [{ id: 9, status: 'canceled' }] }
    );

    const rows = await source.fetchBookings({ ...query, includeIds: ['1', '9'] });

    expect(rows).toEqual([
      { id: 1, status: 'recording' },
      { id: 9, status: 'canceled' }
    ]);
    expect(requests[0].params).not.toHaveProperty('user_id');
    expect(requests[1].params).toEqual({ select: '*', id: 'in.("9")' });
  });

  it('does not query without cameras', async () => {
    const { source, requests } = createSource();

    await expect(source.fetchBookings({ ...query, cameraIds: [] })).resolves.toEqual([]);
    expect(requests).toEqual([]);
  });

  it('reports unavailable or malformed responses as transient errors', async () => {
    const { source, respond } = createSource();
    respond({ status: 503 }, { status: 200, data: { message: 'not a list' } });

    const unavailable = await source.fetchBookings(query).catch((error: unknown) => error);
    expect(unavailable).toBeInstanceOf(TransientSourceError);
    expect(unavailable).toMatchObject({ status: 503, message: 'Booking source query failed: HTTP 503' });

    await expect(source.fetchBookings(query)).rejects.toThrow('Booking source returned an unexpected payload');
  });

  it('patches booking statuses', async () => {
    const { source, requests } = createSource();

    await source.updateStatus('b1', 'failed', 'conflict');
    await source.updateStatus('b2', 'completed');

    expect(requests.map(request => [request.method, request.params, request.data])).toEqual([
      ['patch', { id: 'eq.b1' }, { status: 'failed' }],
      ['patch', { id: 'eq.b2' }, { status: 'completed' }]
    ]);
    expect(requests[0].headers.Prefer).toBe('return=minimal');
  });

  it('removes a booking row', async () => {
    const { source, requests, respond } = createSource();

    await source.removeBooking('b1');
    respond({ status: 503 });
    await expect(source.removeBooking('b2')).rejects.toThrow('Booking source removal of b2 failed: HTTP 503');

    expect(requests.map(request => [request.method, request.url, request.params])).toEqual([
      ['delete', '/bookings', { id: 'eq.b1' }],
      ['delete', '/bookings', { id: 'eq.b2' }]
    ]);
  });

  it('wraps rejected status writes', async () => {
    const { source, respond } = createSource();
    respond({ status: 409 });

    await expect(source.updateStatus('b1', 'recording')).rejects.toMatchObject({
      name: 'TransientSourceError',
      status: 409,
      message: 'Booking source update of b1 failed: HTTP 409'
    });
  });
});
