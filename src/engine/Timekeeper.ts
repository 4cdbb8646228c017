import { applyTimerCommand } from "@/engine/commands";
import {
  fail,
  failFromIssue,
  failFromStore,
  isStoreError,
  succeed,
  type Outcome,
} from "@/engine/errors";
import { followMatch, getFollowedMatches, unfollowMatch } from "@/engine/followList";
import { extractMatchIdFromScan } from "@/engine/identifier";
import { MatchLifecycleManager } from "@/engine/MatchLifecycle";
import { toMatchView, type MatchView } from "@/engine/selectors";
import { firstIssue, validateDescription, validateMatchId, type ValidationIssue } from "@/engine/validation";
import { createLogger, type Logger } from "@/logging/logger";
import type { DomainEvent, ID } from "@/models";
import type { RecordStore } from "@/store/RecordStore";

export interface TimekeeperOptions {
  now?: () => Date;
  logger?: Logger;
}

export interface ControlResult {
  view: MatchView;
  events: DomainEvent[];
}

/**
 * Caller-facing entry point. Every method takes the caller's user id explicitly and
 * answers with an `Outcome`; store failures come back tagged, never retried.
 */
export class Timekeeper {
  readonly lifecycle: MatchLifecycleManager;
  private readonly logger: Logger;

  constructor(private readonly store: RecordStore, options: TimekeeperOptions = {}) {
    this.logger = options.logger ?? createLogger("timekeeper");
    this.lifecycle = new MatchLifecycleManager(store, { now: options.now, logger: this.logger });
  }

  async createMatch(userId: ID, description: string): Promise<Outcome<MatchView>> {
    const issue = firstIssue(validateDescription(description));
    if (issue) {
      this.logger.warn({ userId, code: issue.code }, "match description rejected");
      return failFromIssue(issue);
    }

    return this.guard<MatchView>("createMatch", async () => {
      const match = await this.lifecycle.createMatch(description.trim(), userId);
      return succeed(toMatchView(userId, match));
    });
  }

  /** Look a match up by raw id, catch its clock up and persist it. */
  async openMatch(userId: ID, rawMatchId: string): Promise<Outcome<MatchView>> {
    const issue = this.checkMatchId(userId, rawMatchId);
    if (issue) {
      return failFromIssue(issue);
    }
    const matchId = rawMatchId.trim();

    return this.guard<MatchView>("openMatch", async () => {
      const match = await this.lifecycle.refreshAndPersist(matchId);
      if (!match) {
        this.logger.warn({ userId, matchId }, "match not found");
        return fail("MATCH_NOT_FOUND", `Match ${matchId} not found.`);
      }
      return succeed(toMatchView(userId, match));
    });
  }

  async joinMatch(userId: ID, rawMatchId: string): Promise<Outcome<MatchView>> {
    const opened = await this.openMatch(userId, rawMatchId);
    if (!opened.ok) {
      return opened;
    }

    return this.guard<MatchView>("joinMatch", async () => {
      await followMatch(this.store, userId, opened.value.match.matchId);
      return opened;
    });
  }

  /** `scanText` is whatever the QR reader produced, or null when no reader is available. */
  async joinFromScan(userId: ID, scanText: string | null): Promise<Outcome<MatchView>> {
    if (scanText === null) {
      this.logger.warn({ userId }, "qr scanner unavailable");
      return fail("SCANNER_UNAVAILABLE", "QR scanner unavailable.");
    }
    const matchId = extractMatchIdFromScan(scanText);
    if (!matchId) {
      this.logger.warn({ userId }, "qr scan did not contain a match id");
      return fail("SCAN_INVALID", "Scanned code does not contain a match id.");
    }
    return this.joinMatch(userId, matchId);
  }

  async leaveMatch(userId: ID, rawMatchId: string): Promise<Outcome<boolean>> {
    const issue = this.checkMatchId(userId, rawMatchId);
    if (issue) {
      return failFromIssue(issue);
    }
    const matchId = rawMatchId.trim();
    return this.guard<boolean>("leaveMatch", async () => succeed(await unfollowMatch(this.store, userId, matchId)));
  }

  /** The caller's followed matches that are still active, each caught up and persisted, in follow order. */
  async listActiveMatches(userId: ID): Promise<Outcome<MatchView[]>> {
    return this.guard<MatchView[]>("listActiveMatches", async () => {
      const followed = await getFollowedMatches(this.store, userId);
      const active = await this.lifecycle.listActiveMatches(followed);
      const views: MatchView[] = [];
      for (const match of active) {
        const refreshed = this.lifecycle.refresh(match);
        if (refreshed !== match) {
          await this.lifecycle.updateMatch(refreshed);
        }
        views.push(toMatchView(userId, refreshed));
      }
      return succeed(views);
    });
  }

  async controlTimer(userId: ID, rawMatchId: string, operation: string): Promise<Outcome<ControlResult>> {
    const idIssue = this.checkMatchId(userId, rawMatchId);
    if (idIssue) {
      return failFromIssue(idIssue);
    }
    const matchId = rawMatchId.trim();

    return this.guard<ControlResult>("controlTimer", async () => {
      const match = await this.lifecycle.getMatch(matchId);
      if (!match) {
        this.logger.warn({ userId, matchId, operation }, "control on unknown match");
        return fail("MATCH_NOT_FOUND", `Match ${matchId} not found.`);
      }

      const result = applyTimerCommand(match, operation, { id: userId }, this.lifecycle.clock());
      const issue = firstIssue(result.validation);
      if (issue) {
        this.logger.warn({ userId, matchId, operation, code: issue.code }, issue.message);
        return failFromIssue(issue);
      }

      await this.lifecycle.updateMatch(result.match);
      this.logger.info({ userId, matchId, operation, events: result.events.map((e) => e.type) }, "timer operation applied");
      return succeed({ view: toMatchView(userId, result.match), events: result.events });
    });
  }

  private checkMatchId(userId: ID, rawMatchId: string): ValidationIssue | undefined {
    const issue = firstIssue(validateMatchId(rawMatchId));
    if (issue) {
      this.logger.warn({ userId, code: issue.code }, "match id rejected");
    }
    return issue;
  }

  private async guard<T>(operation: string, run: () => Promise<Outcome<T>>): Promise<Outcome<T>> {
    try {
      return await run();
    } catch (err) {
      if (isStoreError(err)) {
        this.logger.error({ err, operation }, "store failure");
        return failFromStore(err);
      }
      throw err;
    }
  }
}

export function createTimekeeper(store: RecordStore, options?: TimekeeperOptions): Timekeeper {
  return new Timekeeper(store, options);
}
