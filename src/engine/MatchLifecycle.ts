import { generateMatchId } from "@/engine/identifier";
import { initializeTimer, reconcileTimer } from "@/engine/timer";
import { createLogger, type Logger } from "@/logging/logger";
import type { ID, Match } from "@/models";
import type { RecordStore } from "@/store/RecordStore";

export interface MatchLifecycleOptions {
  now?: () => Date;
  logger?: Logger;
}

/**
 * Creation, lookup and soft deletion of matches over a `RecordStore`. Nothing here
 * validates caller input or swallows store failures.
 */
export class MatchLifecycleManager {
  private readonly now: () => Date;
  private readonly logger: Logger;

  constructor(private readonly store: RecordStore, options: MatchLifecycleOptions = {}) {
    this.now = options.now ?? (() => new Date());
    this.logger = options.logger ?? createLogger("match-lifecycle");
  }

  clock(): Date {
    return this.now();
  }

  async createMatch(description: string, adminId: ID): Promise<Match> {
    const now = this.now();
    const match: Match = {
      matchId: generateMatchId(),
      description,
      adminId,
      timerState: initializeTimer(now),
      createdAt: now.toISOString(),
      isActive: true,
    };
    await this.store.saveMatch(match);
    this.logger.info({ matchId: match.matchId, adminId }, "match created");
    return match;
  }

  getMatch(matchId: ID): Promise<Match | undefined> {
    return this.store.loadMatch(matchId);
  }

  /** Last write wins; there is no version check. */
  async updateMatch(match: Match): Promise<void> {
    await this.store.saveMatch(match);
  }

  async deleteMatch(matchId: ID): Promise<void> {
    const match = await this.store.loadMatch(matchId);
    if (!match) {
      return;
    }
    await this.store.saveMatch({ ...match, isActive: false });
    this.logger.info({ matchId }, "match soft-deleted");
  }

  async listActiveMatches(matchIds: readonly ID[]): Promise<Match[]> {
    const active: Match[] = [];
    for (const matchId of matchIds) {
      const match = await this.store.loadMatch(matchId);
      if (match?.isActive) {
        active.push(match);
      }
    }
    return active;
  }

  listAllMatches(): Promise<Match[]> {
    return this.store.listAllMatches();
  }

  /** Catch the timer up to the current time. Pure: persisting the result is the caller's call. */
  refresh(match: Match): Match {
    const timerState = reconcileTimer(match.timerState, this.now());
    return timerState === match.timerState ? match : { ...match, timerState };
  }

  /** Load, catch up, and save back when the clock moved. */
  async refreshAndPersist(matchId: ID): Promise<Match | undefined> {
    const match = await this.store.loadMatch(matchId);
    if (!match) {
      return undefined;
    }
    const refreshed = this.refresh(match);
    if (refreshed !== match) {
      await this.store.saveMatch(refreshed);
    }
    return refreshed;
  }
}

export function createMatchLifecycle(store: RecordStore, options?: MatchLifecycleOptions): MatchLifecycleManager {
  return new MatchLifecycleManager(store, options);
}
