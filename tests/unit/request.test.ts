import { describe, it, expect, beforeEach } from 'vitest';
import { http, HttpResponse } from 'msw';
import { server } from '../setup';
import { TransientNetworkError } from '../../src/lib/errors';
import { RateGovernor, stravaWindows } from '../../src/lib/rateLimiter';
import { safeRequest } from '../../src/lib/request';
import { createFakeClock, type FakeClock } from '../helpers/fakeClock';
import { TEST_POLICY } from '../helpers/stravaFake';

const URL_UNDER_TEST = 'https://www.strava.com/api/v3/ping';

describe('safeRequest', () => {
  let clock: FakeClock;
  let calls: number;

  beforeEach(() => {
    clock = createFakeClock();
    calls = 0;
  });

  const governorFor = (c: FakeClock) =>
    new RateGovernor(stravaWindows({ per15Min: 100, perHour: 300, perDay: 1000, safetyBufferMs: 0 }), {
      clock: c,
      rateLimitBufferMs: 2_000,
    });

  it('should retry server errors with doubling delays', async () => {
    server.use(
      http.get(URL_UNDER_TEST, () => {
        calls++;
        return calls < 3 ? new HttpResponse(null, { status: 500 }) : HttpResponse.json({ ok: true });
      }),
    );

    const res = await safeRequest(URL_UNDER_TEST, {}, { policy: TEST_POLICY, clock, label: 'ping' });

    expect(res.status).toBe(200);
    expect(calls).toBe(3);
    expect(clock.sleeps).toEqual([100, 200]);
  });

  it('should give up after the last attempt without a final sleep', async () => {
    server.use(
      http.get(URL_UNDER_TEST, () => {
        calls++;
        return new HttpResponse(null, { status: 503 });
      }),
    );

    const attempt = safeRequest(URL_UNDER_TEST, {}, { policy: TEST_POLICY, clock, label: 'ping' });

    await expect(attempt).rejects.toBeInstanceOf(TransientNetworkError);
    await expect(attempt).rejects.toMatchObject({
      status: 503,
      message: 'ping: failed after 3 attempts (ping: server error 503)',
    });
    expect(calls).toBe(3);
    expect(clock.sleeps).toEqual([100, 200]);
  });

  it('should honour Retry-After through the governor on 429', async () => {
    const governor = governorFor(clock);
    server.use(
      http.get(URL_UNDER_TEST, () => {
        calls++;
        return calls === 1
          ? new HttpResponse(null, { status: 429, headers: { 'Retry-After': '3' } })
          : HttpResponse.json({ ok: true });
      }),
    );

    const res = await safeRequest(URL_UNDER_TEST, {}, { policy: TEST_POLICY, clock, governor, label: 'ping' });

    expect(res.status).toBe(200);
    expect(clock.sleeps).toEqual([5_000]);
    expect(governor.usage()[0]).toEqual({ name: '15min', count: 2, ceiling: 100 });
  });

  it('should back off with the retry delay on 429 when there is no governor', async () => {
    server.use(
      http.get(URL_UNDER_TEST, () => {
        calls++;
        return calls === 1 ? new HttpResponse(null, { status: 429 }) : HttpResponse.json({ ok: true });
      }),
    );

    await safeRequest(URL_UNDER_TEST, {}, { policy: TEST_POLICY, clock, label: 'ping' });

    expect(clock.sleeps).toEqual([100]);
  });

  it('should return other client errors without retrying', async () => {
    server.use(
      http.get(URL_UNDER_TEST, () => {
        calls++;
        return HttpResponse.json({ message: 'Record Not Found' }, { status: 404 });
      }),
    );

    const res = await safeRequest(URL_UNDER_TEST, {}, { policy: TEST_POLICY, clock, label: 'ping' });

    expect(res.status).toBe(404);
    expect(calls).toBe(1);
    expect(clock.sleeps).toEqual([]);
  });

  it('should retry network errors without counting them against the windows', async () => {
    const governor = governorFor(clock);
    server.use(
      http.get(URL_UNDER_TEST, () => {
        calls++;
        return calls === 1 ? HttpResponse.error() : HttpResponse.json({ ok: true });
      }),
    );

    const res = await safeRequest(URL_UNDER_TEST, {}, { policy: TEST_POLICY, clock, governor, label: 'ping' });

    expect(res.status).toBe(200);
    expect(clock.sleeps).toEqual([100]);
    expect(governor.usage()[0]?.count).toBe(1);
  });
});
