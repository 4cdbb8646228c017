import type { ID, ISODateTime } from "@/models/base";
import type { TimerState } from "@/models/timer";

export interface Match {
  matchId: ID;
  description: string;
  adminId: ID;
  timerState: TimerState;
  createdAt: ISODateTime;
  isActive: boolean;
}

export type MatchRole = "admin" | "spectator";
