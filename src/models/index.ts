export type { ID, ISODateTime } from "@/models/base";
export type { TimerPhase, TimerState } from "@/models/timer";
export type { Match, MatchRole } from "@/models/match";
export type { FollowList } from "@/models/follow";
export type { DomainEvent } from "@/models/events";
