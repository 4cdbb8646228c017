import { loadConfig, type AppConfig } from "@/config";
import { Timekeeper } from "@/engine/Timekeeper";
import { JsonFileRecordStore } from "@/store/JsonFileRecordStore";

export * from "@/models";
export { MATCH_DURATION_SECONDS, MAX_DESCRIPTION_LENGTH, loadConfig, type AppConfig, type LogLevel } from "@/config";
export { canControlTimer, canViewMatch, isAdmin } from "@/admin/accessControl";
export {
  formatClock,
  getElapsedSeconds,
  getTimerPhase,
  initializeTimer,
  parseClock,
  pauseTimer,
  reconcileTimer,
  resetTimer,
  resumeTimer,
  tickTimer,
} from "@/engine/timer";
export { applyTimerCommand, parseTimerOperation, timerOperations, type Actor, type ApplyResult, type TimerOperation } from "@/engine/commands";
export { extractMatchIdFromScan, generateMatchId, isMatchId } from "@/engine/identifier";
export { validateDescription, validateMatchId, type ValidationIssue, type ValidationResult } from "@/engine/validation";
export {
  describeError,
  StoreCorruptedError,
  StoreUnavailableError,
  type Outcome,
  type TimekeeperError,
  type TimekeeperErrorCode,
} from "@/engine/errors";
export { followMatch, getFollowedMatches, unfollowMatch } from "@/engine/followList";
export { MatchLifecycleManager, createMatchLifecycle, type MatchLifecycleOptions } from "@/engine/MatchLifecycle";
export { Timekeeper, createTimekeeper, type ControlResult, type TimekeeperOptions } from "@/engine/Timekeeper";
export { getRole, getStatusLabel, toMatchView, type MatchView } from "@/engine/selectors";
export type { RecordStore } from "@/store/RecordStore";
export { JsonFileRecordStore, type JsonFileRecordStoreOptions } from "@/store/JsonFileRecordStore";
export { MemoryRecordStore } from "@/store/MemoryRecordStore";
export { createMatchBoardStore, type MatchBoardState, type MatchBoardStore } from "@/client/matchBoardStore";

/** Open the configured file store and wrap it in a `Timekeeper`. */
export async function openTimekeeper(config: AppConfig = loadConfig()): Promise<Timekeeper> {
  const store = await JsonFileRecordStore.open(config.storagePath);
  return new Timekeeper(store);
}
