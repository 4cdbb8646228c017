import { isAdmin } from "@/admin/accessControl";
import { formatClock, getTimerPhase } from "@/engine/timer";
import type { ID, Match, MatchRole, TimerPhase } from "@/models";

export interface MatchView {
  match: Match;
  role: MatchRole;
  clock: string;
  phase: TimerPhase;
  statusLabel: "Running" | "Paused" | "Finished" | "Stopped";
}

export function getRole(userId: ID, match: Match): MatchRole {
  return isAdmin(userId, match) ? "admin" : "spectator";
}

export function getStatusLabel(match: Match): MatchView["statusLabel"] {
  if (!match.isActive) {
    return "Stopped";
  }
  switch (getTimerPhase(match.timerState)) {
    case "running":
      return "Running";
    case "expired":
      return "Finished";
    case "idle":
      return "Paused";
  }
}

export function toMatchView(userId: ID, match: Match): MatchView {
  return {
    match,
    role: getRole(userId, match),
    clock: formatClock(match.timerState.secondsRemaining),
    phase: getTimerPhase(match.timerState),
    statusLabel: getStatusLabel(match),
  };
}
