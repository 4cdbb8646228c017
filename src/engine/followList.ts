import type { ID } from "@/models";
import type { RecordStore } from "@/store/RecordStore";

export async function getFollowedMatches(store: RecordStore, userId: ID): Promise<ID[]> {
  const list = await store.loadFollowList(userId);
  return list ? list.matchList : [];
}

/** Append `matchId` to the user's list unless it is already there. Returns whether the list changed. */
export async function followMatch(store: RecordStore, userId: ID, matchId: ID): Promise<boolean> {
  const matchList = await getFollowedMatches(store, userId);
  if (matchList.includes(matchId)) {
    return false;
  }
  await store.saveFollowList({ userId, matchList: [...matchList, matchId] });
  return true;
}

export async function unfollowMatch(store: RecordStore, userId: ID, matchId: ID): Promise<boolean> {
  const matchList = await getFollowedMatches(store, userId);
  if (!matchList.includes(matchId)) {
    return false;
  }
  await store.saveFollowList({ userId, matchList: matchList.filter((id) => id !== matchId) });
  return true;
}
