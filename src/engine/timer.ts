import { MATCH_DURATION_SECONDS } from "@/config";
import type { TimerPhase, TimerState } from "@/models";

export function initializeTimer(now: Date): TimerState {
  return {
    secondsRemaining: MATCH_DURATION_SECONDS,
    isRunning: false,
    lastUpdate: now.toISOString(),
    totalPausedTime: 0,
  };
}

/**
 * Catch a running timer up to `now`. Only whole elapsed seconds are consumed, and
 * a clock that reads earlier than `lastUpdate` consumes nothing.
 */
export function reconcileTimer(state: TimerState, now: Date): TimerState {
  if (!state.isRunning) {
    return state;
  }

  const elapsed = Math.max(0, Math.trunc(diffMillis(state.lastUpdate, now) / 1000));
  const secondsRemaining = Math.max(0, state.secondsRemaining - elapsed);

  return {
    ...state,
    secondsRemaining,
    isRunning: secondsRemaining > 0,
    lastUpdate: latestISO(state.lastUpdate, now),
  };
}

/** Pause a running timer, keeping the seconds it consumed up to `now`. */
export function pauseTimer(state: TimerState, now: Date): TimerState {
  if (!state.isRunning) {
    return state;
  }
  const caughtUp = reconcileTimer(state, now);
  return {
    ...caughtUp,
    isRunning: false,
    lastUpdate: latestISO(state.lastUpdate, now),
  };
}

/** Start counting down again. An expired timer may be resumed; the next reconcile expires it again. */
export function resumeTimer(state: TimerState, now: Date): TimerState {
  if (state.isRunning) {
    return state;
  }
  return {
    ...state,
    isRunning: true,
    lastUpdate: latestISO(state.lastUpdate, now),
  };
}

export function resetTimer(now: Date): TimerState {
  return initializeTimer(now);
}

/** Fixed one-second step, for callers that simulate the clock instead of reading wall time. */
export function tickTimer(state: TimerState, now: Date): TimerState {
  if (!state.isRunning || state.secondsRemaining <= 0) {
    return state;
  }
  const secondsRemaining = state.secondsRemaining - 1;
  return {
    ...state,
    secondsRemaining,
    isRunning: secondsRemaining > 0,
    lastUpdate: latestISO(state.lastUpdate, now),
  };
}

export function getTimerPhase(state: TimerState): TimerPhase {
  if (state.secondsRemaining === 0 && !state.isRunning) {
    return "expired";
  }
  return state.isRunning ? "running" : "idle";
}

/** Seconds of play already consumed. */
export function getElapsedSeconds(state: TimerState): number {
  return MATCH_DURATION_SECONDS - state.secondsRemaining;
}

export function formatClock(seconds: number): string {
  const whole = Math.max(0, Math.trunc(seconds));
  const hours = Math.floor(whole / 3600);
  const minutes = Math.floor((whole % 3600) / 60);
  const secs = whole % 60;
  return [hours, minutes, secs].map((part) => String(part).padStart(2, "0")).join(":");
}

const CLOCK_PATTERN = /^(\d{2}):([0-5]\d):([0-5]\d)$/;

export function parseClock(text: string): number | undefined {
  const match = CLOCK_PATTERN.exec(text);
  if (!match) {
    return undefined;
  }
  const [, hours, minutes, secs] = match;
  return Number(hours) * 3600 + Number(minutes) * 60 + Number(secs);
}

function diffMillis(isoString: string, now: Date): number {
  return now.getTime() - Date.parse(isoString);
}

function latestISO(previous: string, now: Date): string {
  return diffMillis(previous, now) < 0 ? previous : now.toISOString();
}
