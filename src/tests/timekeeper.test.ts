import { describe, expect, it } from "vitest";

import { loadConfig } from "@/config";
import { describeError, StoreCorruptedError, StoreUnavailableError } from "@/engine/errors";
import { Timekeeper } from "@/engine/Timekeeper";
import type { FollowList, ID, Match } from "@/models";
import { MemoryRecordStore } from "@/store/MemoryRecordStore";
import type { RecordStore } from "@/store/RecordStore";

const UNKNOWN_ID = "7d8e9fa0-b1c2-4d3e-9f4a-5b6c7d8e9fa0";

function manualClock(startISO = "2026-07-04T20:00:00.000Z") {
  let current = Date.parse(startISO);
  return {
    now: () => new Date(current),
    advance(ms: number) {
      current += ms;
    },
  };
}

function setup() {
  const store = new MemoryRecordStore();
  const clock = manualClock();
  const timekeeper = new Timekeeper(store, { now: clock.now });
  return { store, clock, timekeeper };
}

async function createOrFail(timekeeper: Timekeeper, userId: ID, description: string): Promise<Match> {
  const created = await timekeeper.createMatch(userId, description);
  if (!created.ok) {
    throw new Error(`create failed: ${created.error.code}`);
  }
  return created.value.match;
}

class FailingStore implements RecordStore {
  constructor(private readonly error: Error) {}

  async saveMatch(_match: Match): Promise<void> {
    throw this.error;
  }

  async loadMatch(_matchId: ID): Promise<Match | undefined> {
    throw this.error;
  }

  async listAllMatches(): Promise<Match[]> {
    throw this.error;
  }

  async saveFollowList(_list: FollowList): Promise<void> {
    throw this.error;
  }

  async loadFollowList(_userId: ID): Promise<FollowList | undefined> {
    throw this.error;
  }
}

describe("creating matches", () => {
  it("rejects empty descriptions before touching the store", async () => {
    const { store, timekeeper } = setup();
    const result = await timekeeper.createMatch("A1", "   ");
    expect(result.ok).toBe(false);
    if (result.ok) {
      return;
    }
    expect(result.error.code).toBe("DESCRIPTION_EMPTY");
    expect(await store.listAllMatches()).toEqual([]);
  });

  it("rejects descriptions over 200 characters", async () => {
    const { timekeeper } = setup();
    const result = await timekeeper.createMatch("A1", "y".repeat(201));
    expect(result.ok ? undefined : result.error.code).toBe("DESCRIPTION_TOO_LONG");
  });

  it("trims the description and returns an admin view", async () => {
    const { timekeeper } = setup();
    const result = await timekeeper.createMatch("A1", "  Final  ");
    expect(result.ok).toBe(true);
    if (!result.ok) {
      return;
    }
    expect(result.value.match.description).toBe("Final");
    expect(result.value.role).toBe("admin");
    expect(result.value.clock).toBe("01:30:00");
    expect(result.value.phase).toBe("idle");
    expect(result.value.statusLabel).toBe("Paused");
  });
});

describe("opening and joining", () => {
  it("validates the raw id first", async () => {
    const { timekeeper } = setup();
    const empty = await timekeeper.openMatch("V1", "  ");
    const malformed = await timekeeper.openMatch("V1", "abc");
    expect(empty.ok ? undefined : empty.error.code).toBe("MATCH_ID_EMPTY");
    expect(malformed.ok ? undefined : malformed.error.code).toBe("MATCH_ID_INVALID");
  });

  it("reports unknown matches", async () => {
    const { timekeeper } = setup();
    const result = await timekeeper.openMatch("V1", UNKNOWN_ID);
    expect(result.ok ? undefined : result.error.code).toBe("MATCH_NOT_FOUND");
  });

  it("shows other users a spectator view", async () => {
    const { timekeeper } = setup();
    const match = await createOrFail(timekeeper, "A1", "Final");
    const result = await timekeeper.openMatch("V1", ` ${match.matchId} `);
    expect(result.ok ? result.value.role : undefined).toBe("spectator");
  });

  it("follows a joined match once", async () => {
    const { store, timekeeper } = setup();
    const match = await createOrFail(timekeeper, "A1", "Final");
    await timekeeper.joinMatch("V1", match.matchId);
    await timekeeper.joinMatch("V1", match.matchId);
    expect(await store.loadFollowList("V1")).toEqual({ userId: "V1", matchList: [match.matchId] });
  });

  it("does not make the admin a follower", async () => {
    const { store, timekeeper } = setup();
    await createOrFail(timekeeper, "A1", "Final");
    expect(await store.loadFollowList("A1")).toBeUndefined();
  });

  it("joins from scanner text", async () => {
    const { store, timekeeper } = setup();
    const match = await createOrFail(timekeeper, "A1", "Final");

    const unavailable = await timekeeper.joinFromScan("V1", null);
    const garbage = await timekeeper.joinFromScan("V1", "hello");
    const scanned = await timekeeper.joinFromScan("V1", `\n${match.matchId}\n`);

    expect(unavailable.ok ? undefined : unavailable.error.code).toBe("SCANNER_UNAVAILABLE");
    expect(garbage.ok ? undefined : garbage.error.code).toBe("SCAN_INVALID");
    expect(scanned.ok).toBe(true);
    expect((await store.loadFollowList("V1"))?.matchList).toEqual([match.matchId]);
  });

  it("rejects a malformed id on leave", async () => {
    const { timekeeper } = setup();
    const result = await timekeeper.leaveMatch("V1", "not-a-uuid");
    expect(result.ok ? undefined : result.error.code).toBe("MATCH_ID_INVALID");
  });

  it("leaves a followed match", async () => {
    const { store, timekeeper } = setup();
    const match = await createOrFail(timekeeper, "A1", "Final");
    await timekeeper.joinMatch("V1", match.matchId);

    expect(await timekeeper.leaveMatch("V1", match.matchId)).toEqual({ ok: true, value: true });
    expect(await timekeeper.leaveMatch("V1", match.matchId)).toEqual({ ok: true, value: false });
    expect((await store.loadFollowList("V1"))?.matchList).toEqual([]);
  });
});

describe("controlling the timer", () => {
  it("refuses spectators and leaves the stored match alone", async () => {
    const { store, timekeeper } = setup();
    const match = await createOrFail(timekeeper, "A1", "Final");
    const result = await timekeeper.controlTimer("V1", match.matchId, "resume");

    expect(result.ok ? undefined : result.error.code).toBe("NOT_MATCH_ADMIN");
    expect(await store.loadMatch(match.matchId)).toEqual(match);
  });

  it("refuses unknown operations and unknown matches", async () => {
    const { timekeeper } = setup();
    const match = await createOrFail(timekeeper, "A1", "Final");
    const unknownOperation = await timekeeper.controlTimer("A1", match.matchId, "explode");
    const unknownMatch = await timekeeper.controlTimer("A1", UNKNOWN_ID, "pause");

    expect(unknownOperation.ok ? undefined : unknownOperation.error.code).toBe("UNKNOWN_OPERATION");
    expect(unknownMatch.ok ? undefined : unknownMatch.error.code).toBe("MATCH_NOT_FOUND");
  });

  it("validates the match id before looking it up", async () => {
    const { store, timekeeper } = setup();
    const match = await createOrFail(timekeeper, "A1", "Final");

    const malformed = await timekeeper.controlTimer("A1", "not-a-uuid", "pause");
    const empty = await timekeeper.controlTimer("A1", "  ", "pause");
    const padded = await timekeeper.controlTimer("A1", ` ${match.matchId} `, "resume");

    expect(malformed.ok ? undefined : malformed.error.code).toBe("MATCH_ID_INVALID");
    expect(empty.ok ? undefined : empty.error.code).toBe("MATCH_ID_EMPTY");
    expect(padded.ok ? padded.value.view.statusLabel : undefined).toBe("Running");
    expect((await store.loadMatch(match.matchId))?.timerState.isRunning).toBe(true);
  });

  it("refuses everything once a match is stopped", async () => {
    const { store, timekeeper } = setup();
    const match = await createOrFail(timekeeper, "A1", "Final");
    const stopped = await timekeeper.controlTimer("A1", match.matchId, "stop");
    expect(stopped.ok ? stopped.value.view.statusLabel : undefined).toBe("Stopped");

    const resumed = await timekeeper.controlTimer("A1", match.matchId, "resume");
    expect(resumed.ok ? undefined : resumed.error.code).toBe("MATCH_INACTIVE");
    expect((await store.loadMatch(match.matchId))?.isActive).toBe(false);
  });

  it("runs the create, resume, pause, reset scenario", async () => {
    const { clock, timekeeper } = setup();
    const match = await createOrFail(timekeeper, "A1", "Final");
    expect(match.timerState.secondsRemaining).toBe(5400);
    expect(match.timerState.isRunning).toBe(false);

    const resumed = await timekeeper.controlTimer("A1", match.matchId, "resume");
    expect(resumed.ok ? resumed.value.view.match.timerState.isRunning : undefined).toBe(true);

    clock.advance(1_200);
    const afterOne = await timekeeper.openMatch("A1", match.matchId);
    const seconds = afterOne.ok ? afterOne.value.match.timerState.secondsRemaining : -1;
    expect(seconds).toBeLessThanOrEqual(5399);
    expect(seconds).toBeGreaterThanOrEqual(5398);

    const paused = await timekeeper.controlTimer("A1", match.matchId, "pause");
    const frozen = paused.ok ? paused.value.view.match.timerState.secondsRemaining : -1;
    expect(frozen).toBe(seconds);

    clock.advance(1_000);
    const later = await timekeeper.openMatch("V1", match.matchId);
    expect(later.ok ? later.value.match.timerState.secondsRemaining : -1).toBe(frozen);

    const reset = await timekeeper.controlTimer("A1", match.matchId, "reset");
    expect(reset.ok ? reset.value.view.match.timerState : undefined).toEqual({
      secondsRemaining: 5400,
      isRunning: false,
      lastUpdate: "2026-07-04T20:00:02.200Z",
      totalPausedTime: 0,
    });
  });

  it("keeps independent readers within the accuracy threshold", async () => {
    const store = new MemoryRecordStore();
    const clock = manualClock();
    const admin = new Timekeeper(store, { now: clock.now });
    const match = await createOrFail(admin, "A1", "Final");
    await admin.controlTimer("A1", match.matchId, "resume");

    clock.advance(10_000);
    const first = await admin.openMatch("V1", match.matchId);
    const laggingReader = new Timekeeper(store, { now: () => new Date(clock.now().getTime() + 900) });
    const second = await laggingReader.openMatch("V2", match.matchId);

    const a = first.ok ? first.value.match.timerState.secondsRemaining : 0;
    const b = second.ok ? second.value.match.timerState.secondsRemaining : 0;
    expect(a).toBe(5390);
    expect(Math.abs(a - b)).toBeLessThanOrEqual(loadConfig().timerAccuracyThreshold);
  });
});

describe("listing active matches", () => {
  it("returns the followed active matches, caught up, in follow order", async () => {
    const { store, clock, timekeeper } = setup();
    const first = await createOrFail(timekeeper, "A1", "First");
    const second = await createOrFail(timekeeper, "A2", "Second");
    const third = await createOrFail(timekeeper, "A1", "Third");
    await timekeeper.controlTimer("A2", second.matchId, "resume");
    await timekeeper.controlTimer("A1", third.matchId, "stop");

    for (const match of [second, third, first]) {
      await timekeeper.joinMatch("V1", match.matchId);
    }

    clock.advance(30_000);
    const listed = await timekeeper.listActiveMatches("V1");
    expect(listed.ok).toBe(true);
    if (!listed.ok) {
      return;
    }
    expect(listed.value.map((view) => view.match.description)).toEqual(["Second", "First"]);
    expect(listed.value[0]?.clock).toBe("01:29:30");
    expect((await store.loadMatch(second.matchId))?.timerState.secondsRemaining).toBe(5370);
  });
});

describe("store failures", () => {
  it("tags a corrupted store and keeps the support message", async () => {
    const timekeeper = new Timekeeper(new FailingStore(new StoreCorruptedError("/tmp/x.json", "bad")));
    const result = await timekeeper.openMatch("V1", UNKNOWN_ID);
    expect(result.ok).toBe(false);
    if (result.ok) {
      return;
    }
    expect(result.error.code).toBe("STORE_CORRUPTED");
    expect(result.error.cause).toBeInstanceOf(StoreCorruptedError);
    expect(describeError(result.error)).toBe("Match storage data is corrupted. Please contact support.");
  });

  it("tags an unavailable store on writes", async () => {
    const timekeeper = new Timekeeper(new FailingStore(new StoreUnavailableError("/tmp/x.json")));
    const result = await timekeeper.createMatch("A1", "Final");
    expect(result.ok ? undefined : result.error.code).toBe("STORE_UNAVAILABLE");
  });

  it("lets programming errors through", async () => {
    const timekeeper = new Timekeeper(new FailingStore(new TypeError("broken")));
    await expect(timekeeper.listActiveMatches("V1")).rejects.toThrow("broken");
  });
});
