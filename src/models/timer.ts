import type { ISODateTime } from "@/models/base";

export type TimerPhase = "idle" | "running" | "expired";

export interface TimerState {
  secondsRemaining: number;
  isRunning: boolean;
  lastUpdate: ISODateTime;
  /** Reserved accumulator; zeroed on reset and otherwise left alone. */
  totalPausedTime: number;
}
