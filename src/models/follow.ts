import type { ID } from "@/models/base";

export interface FollowList {
  userId: ID;
  matchList: ID[];
}
