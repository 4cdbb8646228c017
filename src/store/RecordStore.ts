import type { FollowList, ID, Match } from "@/models";

/**
 * Durable match and follow-list records. Every call is one locked operation;
 * implementations never hold a lock across calls. Medium failures surface as
 * `StoreUnavailableError` or `StoreCorruptedError`.
 */
export interface RecordStore {
  saveMatch(match: Match): Promise<void>;
  loadMatch(matchId: ID): Promise<Match | undefined>;
  listAllMatches(): Promise<Match[]>;
  saveFollowList(list: FollowList): Promise<void>;
  loadFollowList(userId: ID): Promise<FollowList | undefined>;
}
