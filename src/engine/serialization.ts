import { z } from "zod";

import { MATCH_DURATION_SECONDS } from "@/config";
import type { FollowList, Match } from "@/models";

const IsoTimestamp = z.string().refine((value) => Number.isFinite(Date.parse(value)), {
  message: "Expected an ISO-8601 timestamp",
});

const StoredTimerSchema = z.object({
  seconds_remaining: z.number().int().min(0).max(MATCH_DURATION_SECONDS),
  is_running: z.boolean(),
  last_update: IsoTimestamp,
  total_paused_time: z.number().int().min(0),
});

const StoredMatchSchema = z.object({
  match_uuid: z.string().min(1),
  description: z.string(),
  admin_id: z.string(),
  timer_state: StoredTimerSchema,
  created_at: IsoTimestamp,
  is_active: z.boolean(),
});

const StoredUserSchema = z.object({
  user_id: z.string(),
  match_list: z.array(z.string()).refine((ids) => new Set(ids).size === ids.length, {
    message: "Match list contains duplicate ids",
  }),
});

export const StoreDocumentSchema = z.object({
  matches: z.record(StoredMatchSchema),
  users: z.record(StoredUserSchema),
});

export type StoredMatch = z.infer<typeof StoredMatchSchema>;
export type StoredUser = z.infer<typeof StoredUserSchema>;
export type StoreDocument = z.infer<typeof StoreDocumentSchema>;

export function emptyDocument(): StoreDocument {
  return { matches: {}, users: {} };
}

export function encodeMatch(match: Match): StoredMatch {
  return {
    match_uuid: match.matchId,
    description: match.description,
    admin_id: match.adminId,
    timer_state: {
      seconds_remaining: match.timerState.secondsRemaining,
      is_running: match.timerState.isRunning,
      last_update: match.timerState.lastUpdate,
      total_paused_time: match.timerState.totalPausedTime,
    },
    created_at: match.createdAt,
    is_active: match.isActive,
  };
}

export function decodeMatch(stored: StoredMatch): Match {
  return {
    matchId: stored.match_uuid,
    description: stored.description,
    adminId: stored.admin_id,
    timerState: {
      secondsRemaining: stored.timer_state.seconds_remaining,
      isRunning: stored.timer_state.is_running,
      lastUpdate: stored.timer_state.last_update,
      totalPausedTime: stored.timer_state.total_paused_time,
    },
    createdAt: stored.created_at,
    isActive: stored.is_active,
  };
}

/** Repeated ids collapse onto their first position. */
export function encodeFollowList(list: FollowList): StoredUser {
  return { user_id: list.userId, match_list: Array.from(new Set(list.matchList)) };
}

export function decodeFollowList(stored: StoredUser): FollowList {
  return { userId: stored.user_id, matchList: [...stored.match_list] };
}

export function toJSON(document: StoreDocument): string {
  return JSON.stringify(document, null, 2);
}

export type ParseDocumentResult = { ok: true; document: StoreDocument } | { ok: false; reason: string };

export function fromJSON(json: string): ParseDocumentResult {
  let raw: unknown;
  try {
    raw = JSON.parse(json);
  } catch (err) {
    return { ok: false, reason: err instanceof Error ? err.message : "invalid JSON" };
  }

  const parsed = StoreDocumentSchema.safeParse(raw);
  if (!parsed.success) {
    const reason = parsed.error.issues.map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`).join("; ");
    return { ok: false, reason };
  }
  return { ok: true, document: parsed.data };
}
