import { decodeFollowList, decodeMatch, encodeFollowList, encodeMatch, type StoredMatch, type StoredUser } from "@/engine/serialization";
import type { FollowList, ID, Match } from "@/models";
import type { RecordStore } from "@/store/RecordStore";

/** Process-local store; records are copied in and out so callers never share references. */
export class MemoryRecordStore implements RecordStore {
  private readonly matches = new Map<ID, StoredMatch>();
  private readonly users = new Map<ID, StoredUser>();

  async saveMatch(match: Match): Promise<void> {
    this.matches.set(match.matchId, encodeMatch(match));
  }

  async loadMatch(matchId: ID): Promise<Match | undefined> {
    const found = this.matches.get(matchId);
    return found ? decodeMatch(found) : undefined;
  }

  async listAllMatches(): Promise<Match[]> {
    return Array.from(this.matches.values(), decodeMatch);
  }

  async saveFollowList(list: FollowList): Promise<void> {
    this.users.set(list.userId, encodeFollowList(list));
  }

  async loadFollowList(userId: ID): Promise<FollowList | undefined> {
    const found = this.users.get(userId);
    return found ? decodeFollowList(found) : undefined;
  }
}
