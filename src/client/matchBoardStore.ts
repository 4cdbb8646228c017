import { createStore, type StoreApi } from "zustand/vanilla";

import { loadConfig } from "@/config";
import { describeError, type Outcome, type TimekeeperError } from "@/engine/errors";
import type { MatchView } from "@/engine/selectors";
import type { Timekeeper } from "@/engine/Timekeeper";
import { createLogger } from "@/logging/logger";
import type { ID } from "@/models";

export interface BoardError {
  code: TimekeeperError["code"];
  message: string;
}

export interface MatchBoardState {
  userId: ID;
  boards: MatchView[];
  selected?: MatchView;
  lastError?: BoardError;

  refresh(): Promise<void>;
  select(matchId?: ID): Promise<void>;
  create(description: string): Promise<MatchView | undefined>;
  join(rawMatchId: string): Promise<boolean>;
  joinFromScan(scanText: string | null): Promise<boolean>;
  leave(matchId: ID): Promise<void>;
  control(matchId: ID, operation: string): Promise<boolean>;
  clearError(): void;
  startPolling(intervalMs?: number): () => void;
}

export type MatchBoardStore = StoreApi<MatchBoardState>;

const logger = createLogger("match-board");

function toBoardError(error: TimekeeperError): BoardError {
  return { code: error.code, message: describeError(error) };
}

/**
 * View state for one user's screen. The presentation layer renders `boards` and
 * `selected`, calls the actions, and drives `startPolling` while a clock is visible.
 */
export function createMatchBoardStore(timekeeper: Timekeeper, userId: ID): MatchBoardStore {
  return createStore<MatchBoardState>()((set, get) => {
    function settle<T>(outcome: Outcome<T>): T | undefined {
      if (!outcome.ok) {
        set({ lastError: toBoardError(outcome.error) });
        return undefined;
      }
      return outcome.value;
    }

    return {
      userId,
      boards: [],
      selected: undefined,
      lastError: undefined,

      async refresh() {
        const boards = settle(await timekeeper.listActiveMatches(userId));
        if (boards) {
          set({ boards });
        }
        const selectedId = get().selected?.match.matchId;
        if (selectedId) {
          await get().select(selectedId);
        }
      },

      async select(matchId) {
        if (!matchId) {
          set({ selected: undefined });
          return;
        }
        const view = settle(await timekeeper.openMatch(userId, matchId));
        set({ selected: view });
      },

      async create(description) {
        const view = settle(await timekeeper.createMatch(userId, description));
        if (view) {
          set({ selected: view, lastError: undefined });
        }
        return view;
      },

      async join(rawMatchId) {
        const view = settle(await timekeeper.joinMatch(userId, rawMatchId));
        if (!view) {
          return false;
        }
        set({ lastError: undefined });
        await get().refresh();
        return true;
      },

      async joinFromScan(scanText) {
        const view = settle(await timekeeper.joinFromScan(userId, scanText));
        if (!view) {
          return false;
        }
        set({ lastError: undefined });
        await get().refresh();
        return true;
      },

      async leave(matchId) {
        const removed = settle(await timekeeper.leaveMatch(userId, matchId));
        if (removed !== undefined) {
          set((state) => ({ boards: state.boards.filter((view) => view.match.matchId !== matchId) }));
        }
      },

      async control(matchId, operation) {
        const result = settle(await timekeeper.controlTimer(userId, matchId, operation));
        if (!result) {
          return false;
        }
        set((state) => ({
          lastError: undefined,
          selected: state.selected?.match.matchId === matchId ? result.view : state.selected,
          boards: state.boards
            .map((view) => (view.match.matchId === matchId ? result.view : view))
            .filter((view) => view.match.isActive),
        }));
        return true;
      },

      clearError() {
        set({ lastError: undefined });
      },

      startPolling(intervalMs = loadConfig().timerUpdateIntervalMs) {
        const handle = setInterval(() => {
          get()
            .refresh()
            .catch((err: unknown) => logger.error({ err, userId }, "board refresh failed"));
        }, intervalMs);
        return () => clearInterval(handle);
      },
    };
  });
}
