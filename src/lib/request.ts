import { systemClock, type Clock } from "./clock";
import { describeError, TransientNetworkError } from "./errors";
import type { RateGovernor } from "./rateLimiter";

export interface RetryPolicy {
  maxAttempts: number;
  initialDelayMs: number;
  backoffMultiplier: number;
  timeoutMs: number;
  isRetryableStatus: (status: number) => boolean;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 5,
  initialDelayMs: 5_000,
  backoffMultiplier: 2,
  timeoutMs: 30_000,
  isRetryableStatus: (status) => status >= 500 && status < 600,
};

export interface RequestContext {
  policy: RetryPolicy;
  clock?: Clock;
  /** When present, every attempt is admitted and recorded against it. */
  governor?: RateGovernor;
  fetchImpl?: typeof fetch;
  /** Log label, e.g. "activities:list". Never the URL, which may carry secrets. */
  label: string;
}

/**
 * The one retrying request primitive.
 *
 * - network errors, timeouts and retryable statuses back off from
 *   `initialDelayMs`, multiplying each time
 * - 429 goes through the governor's reactive rule (Retry-After or fallback)
 * - any other response is returned for the caller to interpret
 *
 * Throws TransientNetworkError once `maxAttempts` are used up.
 */
export async function safeRequest(url: string, init: RequestInit, ctx: RequestContext): Promise<Response> {
  const { policy, governor, label } = ctx;
  const clock = ctx.clock ?? systemClock;
  const fetchImpl = ctx.fetchImpl ?? fetch;

  let delay = policy.initialDelayMs;
  let lastError: TransientNetworkError | null = null;

  for (let attempt = 1; attempt <= policy.maxAttempts; attempt++) {
    if (governor) await governor.admit();

    let res: Response;
    try {
      res = await fetchImpl(url, { ...init, signal: AbortSignal.timeout(policy.timeoutMs) });
    } catch (error) {
      // Never reached the server: not recorded against the windows.
      lastError = new TransientNetworkError(`${label}: ${describeError(error)}`, null, { cause: error });
      if (attempt < policy.maxAttempts) {
        console.warn(
          `[Request] ${label} failed (attempt ${attempt}/${policy.maxAttempts}): ${describeError(error)} -- sleeping ${delay / 1000}s`,
        );
        await clock.sleep(delay);
        delay *= policy.backoffMultiplier;
      }
      continue;
    }

    if (governor) {
      governor.recordRequest();
      governor.observeUsage(res.headers);
    }

    if (res.status === 429) {
      lastError = new TransientNetworkError(`${label}: rate limited`, 429);
      await res.body?.cancel();
      if (attempt < policy.maxAttempts) {
        const retryAfter = res.headers.get("retry-after");
        if (governor) {
          await governor.backOff(retryAfter);
        } else {
          console.warn(`[Request] ${label} rate limited -- sleeping ${delay / 1000}s`);
          await clock.sleep(delay);
          delay *= policy.backoffMultiplier;
        }
      }
      continue;
    }

    if (policy.isRetryableStatus(res.status)) {
      lastError = new TransientNetworkError(`${label}: server error ${res.status}`, res.status);
      await res.body?.cancel();
      if (attempt < policy.maxAttempts) {
        console.warn(`[Request] ${label} server error ${res.status}. Sleeping ${delay / 1000}s and retrying.`);
        await clock.sleep(delay);
        delay *= policy.backoffMultiplier;
      }
      continue;
    }

    return res;
  }

  throw new TransientNetworkError(
    `${label}: failed after ${policy.maxAttempts} attempts (${lastError?.message ?? "no response"})`,
    lastError?.status ?? null,
    { cause: lastError },
  );
}
