import type { ID, Match } from "@/models";

export function isAdmin(userId: ID, match: Match): boolean {
  return userId === match.adminId;
}

/** Timer control is admin-only; there is no delegation. */
export function canControlTimer(userId: ID, match: Match): boolean {
  return isAdmin(userId, match);
}

export function canViewMatch(_userId: ID, _match: Match): boolean {
  return true;
}
