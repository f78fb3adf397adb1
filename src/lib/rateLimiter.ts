import { systemClock, type Clock } from "./clock";

/**
 * Client-side Strava rate governor.
 *
 * Strava enforces a short (15 minute) and a long (daily) ceiling at the same
 * time, per application. The governor keeps one sliding window of request
 * timestamps per ceiling and holds the caller until every window has room.
 * It also reacts to explicit 429s and to the usage headers Strava returns.
 */

export interface RateWindowConfig {
  name: string;
  ceiling: number;
  windowMs: number;
  safetyBufferMs: number;
}

export interface RateGovernorOptions {
  clock?: Clock;
  /** Sleep on 429 when no Retry-After is given; the buffer is added on top. */
  rateLimitFallbackMs?: number;
  /** Added to every 429 wait. */
  rateLimitBufferMs?: number;
  /** Remaining remote capacity at or below which admission pauses. */
  usageSafetyMargin?: number;
}

export interface WindowUsage {
  name: string;
  count: number;
  ceiling: number;
}

export interface RemoteUsage {
  limits: number[];
  usage: number[];
}

const FIFTEEN_MINUTES_MS = 15 * 60 * 1000;
const HOUR_MS = 60 * 60 * 1000;
const DAY_MS = 24 * HOUR_MS;

export function stravaWindows(limits: {
  per15Min: number;
  perHour: number;
  perDay: number;
  safetyBufferMs: number;
}): RateWindowConfig[] {
  return [
    { name: "15min", ceiling: limits.per15Min, windowMs: FIFTEEN_MINUTES_MS, safetyBufferMs: limits.safetyBufferMs },
    { name: "hour", ceiling: limits.perHour, windowMs: HOUR_MS, safetyBufferMs: limits.safetyBufferMs },
    { name: "day", ceiling: limits.perDay, windowMs: DAY_MS, safetyBufferMs: limits.safetyBufferMs },
  ];
}

/**
 * Retry-After is either delta-seconds or an HTTP date. Returns milliseconds,
 * or null when the header is absent or unusable.
 */
export function parseRetryAfter(value: string | null, nowMs: number): number | null {
  if (!value) return null;
  const trimmed = value.trim();
  if (/^\d+(\.\d+)?$/.test(trimmed)) return Math.round(Number(trimmed) * 1000);
  const at = Date.parse(trimmed);
  if (Number.isNaN(at)) return null;
  return Math.max(0, at - nowMs);
}

/** Parse "200,2000" style header pairs. Null if either header is missing or garbled. */
export function parseUsageHeaders(limitHeader: string | null, usageHeader: string | null): RemoteUsage | null {
  if (!limitHeader || !usageHeader) return null;
  const limits = limitHeader.split(",").map((s) => Number(s.trim()));
  const usage = usageHeader.split(",").map((s) => Number(s.trim()));
  if (limits.length === 0 || limits.length !== usage.length) return null;
  if ([...limits, ...usage].some((n) => !Number.isFinite(n))) return null;
  return { limits, usage };
}

export class RateGovernor {
  private readonly clock: Clock;
  private readonly windows: { config: RateWindowConfig; timestamps: number[] }[];
  private readonly fallbackMs: number;
  private readonly bufferMs: number;
  private readonly safetyMargin: number;
  private blockedUntil = 0;

  constructor(configs: RateWindowConfig[], options: RateGovernorOptions = {}) {
    this.clock = options.clock ?? systemClock;
    this.windows = configs.map((config) => ({ config, timestamps: [] }));
    this.fallbackMs = options.rateLimitFallbackMs ?? 60_000;
    this.bufferMs = options.rateLimitBufferMs ?? 2_000;
    this.safetyMargin = options.usageSafetyMargin ?? 5;
  }

  private prune(now: number): void {
    for (const w of this.windows) {
      const cutoff = now - w.config.windowMs;
      let drop = 0;
      while (drop < w.timestamps.length && w.timestamps[drop] <= cutoff) drop++;
      if (drop > 0) w.timestamps.splice(0, drop);
    }
  }

  /**
   * Earliest instant at which a request may leave, or null if it may leave now.
   * Prunes first; the latest deadline across all saturated windows wins.
   */
  nextAdmissionAt(): number | null {
    const now = this.clock.now();
    this.prune(now);

    let until = this.blockedUntil > now ? this.blockedUntil : null;
    for (const w of this.windows) {
      if (w.timestamps.length < w.config.ceiling) continue;
      const deadline = w.timestamps[0] + w.config.windowMs + w.config.safetyBufferMs;
      if (deadline > now && (until === null || deadline > until)) until = deadline;
    }
    return until;
  }

  /** Block until admission is safe. Resolves with the total time waited. */
  async admit(): Promise<number> {
    let waited = 0;
    for (let until = this.nextAdmissionAt(); until !== null; until = this.nextAdmissionAt()) {
      const ms = until - this.clock.now();
      const blocking = this.windows
        .filter((w) => w.timestamps.length >= w.config.ceiling)
        .map((w) => w.config.name);
      console.log(
        `[RateGovernor] Sleeping ${(ms / 1000).toFixed(1)}s (~${(ms / 60000).toFixed(2)} min) to respect limits` +
          (blocking.length > 0 ? ` (${blocking.join(", ")})` : " (remote usage)"),
      );
      await this.clock.sleep(ms);
      waited += ms;
    }
    return waited;
  }

  /** Call once a request has actually reached the network. */
  recordRequest(): void {
    const now = this.clock.now();
    for (const w of this.windows) w.timestamps.push(now);
    this.prune(now);
  }

  /**
   * Reactive rule for an explicit 429: honour Retry-After (or the fallback),
   * plus the buffer, regardless of local window state.
   */
  async backOff(retryAfter: string | null): Promise<number> {
    const directive = parseRetryAfter(retryAfter, this.clock.now());
    const ms = (directive ?? this.fallbackMs) + this.bufferMs;
    if (directive !== null) {
      console.warn(`[RateGovernor] 429 received. Respecting Retry-After: ${(ms / 1000).toFixed(1)}s`);
    } else {
      console.warn(`[RateGovernor] 429 received without Retry-After. Sleeping ${(ms / 1000).toFixed(1)}s`);
    }
    await this.clock.sleep(ms);
    return ms;
  }

  /**
   * Feed Strava's usage headers. The read pair takes precedence over the
   * overall pair when both are present.
   */
  observeUsage(headers: Headers): void {
    const remote =
      parseUsageHeaders(headers.get("x-readratelimit-limit"), headers.get("x-readratelimit-usage")) ??
      parseUsageHeaders(headers.get("x-ratelimit-limit"), headers.get("x-ratelimit-usage"));
    if (!remote) return;

    const now = this.clock.now();
    const [shortLimit, dailyLimit] = remote.limits;
    const [shortUsage, dailyUsage] = remote.usage;

    if (dailyLimit !== undefined && dailyUsage !== undefined && dailyUsage >= dailyLimit) {
      const midnight = new Date(now);
      midnight.setUTCHours(24, 0, 0, 0);
      this.blockUntil(midnight.getTime() + this.bufferMs, `daily usage ${dailyUsage}/${dailyLimit}`);
    } else if (shortLimit - shortUsage <= this.safetyMargin) {
      const nextQuarter = Math.floor(now / FIFTEEN_MINUTES_MS) * FIFTEEN_MINUTES_MS + FIFTEEN_MINUTES_MS;
      this.blockUntil(nextQuarter + this.bufferMs, `15min usage ${shortUsage}/${shortLimit}`);
    }
  }

  private blockUntil(until: number, reason: string): void {
    if (until <= this.blockedUntil) return;
    this.blockedUntil = until;
    console.warn(`[RateGovernor] Approaching remote limit (${reason}); pausing until ${new Date(until).toISOString()}`);
  }

  usage(): WindowUsage[] {
    this.prune(this.clock.now());
    return this.windows.map((w) => ({ name: w.config.name, count: w.timestamps.length, ceiling: w.config.ceiling }));
  }
}
