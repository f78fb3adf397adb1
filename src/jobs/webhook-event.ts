import { z } from "zod";
import { findByAthleteId, type CheckpointStore } from "../lib/checkpoint";
import { systemClock, type Clock } from "../lib/clock";
import type { RecordSink } from "../lib/db";
import { describeError } from "../lib/errors";
import { normalizeActivity } from "../lib/normalize";
import type { ActivityStore } from "../lib/store";
import type { StravaClient } from "../lib/strava";

// Example payload shape: { owner_id, object_id, object_type, aspect_type, updates, event_time, subscription_id }
const WebhookEventSchema = z
  .object({
    object_type: z.string(),
    aspect_type: z.string(),
    object_id: z.coerce.number().int().positive(),
    owner_id: z.coerce.number().int().positive(),
    event_time: z.number().optional(),
    subscription_id: z.number().optional(),
    updates: z.record(z.unknown()).optional(),
  })
  .passthrough();

export type WebhookEvent = z.infer<typeof WebhookEventSchema>;

export type WebhookOutcome =
  | { status: "stored"; recordId: number }
  | { status: "ignored"; reason: string }
  | { status: "failed"; reason: string };

export interface WebhookDeps {
  client: StravaClient;
  checkpoints: CheckpointStore;
  store: ActivityStore;
  sinks?: RecordSink[];
  clock?: Clock;
}

export type SubscriptionParams = URLSearchParams | Record<string, string | undefined>;

export type SubscriptionResponse =
  | { status: 200; body: { "hub.challenge": string } }
  | { status: 403; body: { error: string } };

/** Subscription handshake: echo hub.challenge when hub.verify_token matches. */
export function verifySubscription(params: SubscriptionParams, verifyToken: string | undefined): SubscriptionResponse {
  const get = (name: string) => (params instanceof URLSearchParams ? params.get(name) : params[name]) ?? null;
  const mode = get("hub.mode");
  const token = get("hub.verify_token");
  const challenge = get("hub.challenge");

  if (!verifyToken) {
    console.error("[Webhook] WEBHOOK_VERIFY_TOKEN is not set; rejecting subscription");
    return { status: 403, body: { error: "verification not configured" } };
  }
  if ((mode !== null && mode !== "subscribe") || token !== verifyToken || !challenge) {
    console.warn("[Webhook] Subscription verification failed");
    return { status: 403, body: { error: "verification failed" } };
  }
  console.log("[Webhook] Subscription verified");
  return { status: 200, body: { "hub.challenge": challenge } };
}

/** A saved payload may be one event, an array of them, or { events: [...] }. */
export function extractEvents(payload: unknown): unknown[] {
  if (Array.isArray(payload)) return payload;
  if (typeof payload === "object" && payload !== null && "events" in payload && Array.isArray(payload.events)) {
    return payload.events;
  }
  return [payload];
}

/**
 * Apply one activity event: exchange the owner's refresh token, fetch the
 * activity and upsert it through the same store the batch sync uses. The
 * subject's since-cursor is left alone. Never throws for a bad event.
 */
export async function handleWebhookEvent(payload: unknown, deps: WebhookDeps): Promise<WebhookOutcome> {
  const parsed = WebhookEventSchema.safeParse(payload);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const reason = `invalid event: ${issue ? `${issue.path.join(".") || "(root)"} ${issue.message}` : "unknown"}`;
    console.warn(`[Webhook] ${reason}`);
    return { status: "failed", reason };
  }

  const event = parsed.data;
  const label = `${event.object_type}:${event.aspect_type}:${event.object_id}`;
  if (event.object_type !== "activity" || (event.aspect_type !== "create" && event.aspect_type !== "update")) {
    console.log(`[Webhook] Ignoring ${label}`);
    return { status: "ignored", reason: `${event.object_type}:${event.aspect_type}` };
  }

  const { client, checkpoints, store } = deps;
  const clock = deps.clock ?? systemClock;
  const athleteId = String(event.owner_id);
  const checkpoint = await checkpoints.load();
  const found = findByAthleteId(checkpoint, athleteId);
  const refreshToken = found?.entry.refresh_token;
  if (!found || !refreshToken) {
    console.warn(`[Webhook] No refresh token for athlete ${athleteId}; ${label} dropped`);
    return { status: "failed", reason: `no refresh token for athlete ${athleteId}` };
  }
  const { entry } = found;

  try {
    const grant = await client.exchangeRefreshToken(refreshToken);
    if (grant.rotated) {
      entry.refresh_token = grant.refreshToken;
      entry.refreshed_at = new Date(clock.now()).toISOString();
      console.log(`[Webhook] Refresh token rotated for athlete ${athleteId}`);
      await checkpoints.persist(checkpoint);
    }

    const activity = await client.getActivity(grant.accessToken, event.object_id);
    const record = normalizeActivity(
      activity,
      { subjectId: athleteId, displayName: entry.name ?? athleteId },
      new Date(clock.now()).toISOString(),
    );
    const result = await store.upsert([record]);
    for (const sink of deps.sinks ?? []) {
      try {
        await sink.write([record]);
      } catch (error) {
        console.error(`[Webhook] ${sink.name} sink failed for ${label}:`, describeError(error));
      }
    }

    entry.last_seen = new Date(clock.now()).toISOString();
    await checkpoints.persist(checkpoint);
    console.log(`[Webhook] ${result.inserted > 0 ? "Stored" : "Updated"} activity ${record.recordId} for athlete ${athleteId}`);
    return { status: "stored", recordId: record.recordId };
  } catch (error) {
    console.error(`[Webhook] Failed to apply ${label}:`, describeError(error));
    return { status: "failed", reason: describeError(error) };
  }
}
