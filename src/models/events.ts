import type { ID, ISODateTime } from "@/models/base";

export type DomainEvent =
  | { type: "MATCH_CREATED"; matchId: ID; adminId: ID; at: ISODateTime }
  | { type: "TIMER_PAUSED"; matchId: ID; secondsRemaining: number; at: ISODateTime }
  | { type: "TIMER_RESUMED"; matchId: ID; secondsRemaining: number; at: ISODateTime }
  | { type: "TIMER_RESET"; matchId: ID; at: ISODateTime }
  | { type: "TIMER_EXPIRED"; matchId: ID; at: ISODateTime }
  | { type: "MATCH_STOPPED"; matchId: ID; at: ISODateTime };
