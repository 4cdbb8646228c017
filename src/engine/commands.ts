import { canControlTimer } from "@/admin/accessControl";
import { pauseTimer, reconcileTimer, resetTimer, resumeTimer } from "@/engine/timer";
import { failure, VALID, type ValidationResult } from "@/engine/validation";
import type { DomainEvent, ID, Match } from "@/models";

export type TimerOperation = "pause" | "resume" | "reset" | "stop";

export const timerOperations: ReadonlySet<TimerOperation> = new Set<TimerOperation>(["pause", "resume", "reset", "stop"]);

export interface Actor {
  id: ID;
}

export interface ApplyResult {
  match: Match;
  events: DomainEvent[];
  validation: ValidationResult;
}

export function parseTimerOperation(name: string): TimerOperation | undefined {
  const normalized = name.trim().toLowerCase();
  for (const operation of timerOperations) {
    if (operation === normalized) {
      return operation;
    }
  }
  return undefined;
}

function rejected(match: Match, validation: ValidationResult): ApplyResult {
  return { match, events: [], validation };
}

function expiryEvents(before: Match, after: Match, at: string): DomainEvent[] {
  if (before.timerState.isRunning && after.timerState.secondsRemaining === 0 && !after.timerState.isRunning) {
    return [{ type: "TIMER_EXPIRED", matchId: after.matchId, at }];
  }
  return [];
}

/**
 * Apply one control operation. The timer is first caught up to `now`; a rejected
 * command returns the input match untouched.
 */
export function applyTimerCommand(match: Match, operation: string, actor: Actor, now: Date): ApplyResult {
  const parsed = parseTimerOperation(operation);
  if (!parsed) {
    return rejected(match, failure("UNKNOWN_OPERATION", `Unknown timer operation '${operation}'`, { kind: "match", id: match.matchId }));
  }
  if (!match.isActive) {
    return rejected(match, failure("MATCH_INACTIVE", `Match '${match.matchId}' is no longer active`, { kind: "match", id: match.matchId }));
  }
  if (!canControlTimer(actor.id, match)) {
    return rejected(match, failure("NOT_MATCH_ADMIN", `User '${actor.id}' is not the admin of match '${match.matchId}'`, { kind: "user", id: actor.id }));
  }

  const at = now.toISOString();
  const current: Match = { ...match, timerState: reconcileTimer(match.timerState, now) };
  const events = expiryEvents(match, current, at);

  switch (parsed) {
    case "pause": {
      const timerState = pauseTimer(current.timerState, now);
      if (timerState !== current.timerState) {
        events.push({ type: "TIMER_PAUSED", matchId: match.matchId, secondsRemaining: timerState.secondsRemaining, at });
      }
      return { match: { ...current, timerState }, events, validation: VALID };
    }

    case "resume": {
      const timerState = resumeTimer(current.timerState, now);
      if (timerState !== current.timerState) {
        events.push({ type: "TIMER_RESUMED", matchId: match.matchId, secondsRemaining: timerState.secondsRemaining, at });
      }
      return { match: { ...current, timerState }, events, validation: VALID };
    }

    case "reset": {
      events.push({ type: "TIMER_RESET", matchId: match.matchId, at });
      return { match: { ...current, timerState: resetTimer(now) }, events, validation: VALID };
    }

    case "stop": {
      events.push({ type: "MATCH_STOPPED", matchId: match.matchId, at });
      return {
        match: { ...current, isActive: false, timerState: pauseTimer(current.timerState, now) },
        events,
        validation: VALID,
      };
    }
  }
}
