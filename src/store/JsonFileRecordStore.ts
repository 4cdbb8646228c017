import { randomUUID } from "node:crypto";
import { link, mkdir, readFile, rename, rm, writeFile } from "node:fs/promises";
import path from "node:path";
import lockfile from "proper-lockfile";

import { StoreCorruptedError, StoreUnavailableError } from "@/engine/errors";
import {
  decodeFollowList,
  decodeMatch,
  emptyDocument,
  encodeFollowList,
  encodeMatch,
  fromJSON,
  toJSON,
  type StoreDocument,
} from "@/engine/serialization";
import { createLogger, type Logger } from "@/logging/logger";
import type { FollowList, ID, Match } from "@/models";
import type { RecordStore } from "@/store/RecordStore";
import { ReadWriteLock } from "@/store/ReadWriteLock";

export interface JsonFileRecordStoreOptions {
  logger?: Logger;
  /** Attempts a writer makes on the lock file before giving up. */
  lockRetries?: number;
}

function hasCode(err: unknown, code: string): boolean {
  return err instanceof Error && "code" in err && err.code === code;
}

/**
 * Single JSON document holding every match and follow list.
 *
 * Reads share an in-process lock. Writes hold the exclusive in-process lock and a
 * lock file beside the document for the whole read-modify-write, then swap the new
 * document in with a rename, so a reader in any process sees either the old or the
 * new content.
 */
export class JsonFileRecordStore implements RecordStore {
  private readonly lock = new ReadWriteLock();

  private constructor(
    readonly location: string,
    private readonly logger: Logger,
    private readonly lockRetries: number,
  ) {}

  /** Open the store, creating an empty document when nothing exists at `location` yet. */
  static async open(location: string, options: JsonFileRecordStoreOptions = {}): Promise<JsonFileRecordStore> {
    const store = new JsonFileRecordStore(
      path.resolve(location),
      options.logger ?? createLogger("json-file-store"),
      options.lockRetries ?? 20,
    );
    await store.initialize();
    return store;
  }

  async saveMatch(match: Match): Promise<void> {
    await this.mutate((document) => {
      document.matches[match.matchId] = encodeMatch(match);
    });
  }

  async loadMatch(matchId: ID): Promise<Match | undefined> {
    const document = await this.lock.read(() => this.readDocument());
    const stored = document.matches[matchId];
    return stored ? decodeMatch(stored) : undefined;
  }

  async listAllMatches(): Promise<Match[]> {
    const document = await this.lock.read(() => this.readDocument());
    return Object.values(document.matches).map(decodeMatch);
  }

  async saveFollowList(list: FollowList): Promise<void> {
    await this.mutate((document) => {
      document.users[list.userId] = encodeFollowList(list);
    });
  }

  async loadFollowList(userId: ID): Promise<FollowList | undefined> {
    const document = await this.lock.read(() => this.readDocument());
    const stored = document.users[userId];
    return stored ? decodeFollowList(stored) : undefined;
  }

  /**
   * Publish an empty document with `link`, which fails with EEXIST instead of replacing a
   * document another process created in the meantime.
   */
  private async initialize(): Promise<void> {
    await this.lock.write(async () => {
      const temp = this.tempPath();
      try {
        await mkdir(path.dirname(this.location), { recursive: true });
        await writeFile(temp, toJSON(emptyDocument()), "utf8");
        await link(temp, this.location);
        this.logger.info({ location: this.location }, "created empty match store");
      } catch (err) {
        if (!hasCode(err, "EEXIST")) {
          this.logger.error({ err, location: this.location }, "match store could not be created");
          throw new StoreUnavailableError(this.location, { cause: err });
        }
      } finally {
        await rm(temp, { force: true });
      }
    });
  }

  private async readDocument(): Promise<StoreDocument> {
    let json: string;
    try {
      json = await readFile(this.location, "utf8");
    } catch (err) {
      this.logger.error({ err, location: this.location }, "match store unreadable");
      throw new StoreUnavailableError(this.location, { cause: err });
    }

    const parsed = fromJSON(json);
    if (!parsed.ok) {
      this.logger.error({ location: this.location, reason: parsed.reason }, "match store corrupted");
      throw new StoreCorruptedError(this.location, parsed.reason);
    }
    return parsed.document;
  }

  private async mutate(change: (document: StoreDocument) => void): Promise<void> {
    await this.lock.write(async () => {
      const release = await this.acquireFileLock();
      try {
        const document = await this.readDocument();
        change(document);
        await this.writeDocument(document);
      } finally {
        await release();
      }
    });
  }

  private async acquireFileLock(): Promise<() => Promise<void>> {
    try {
      return await lockfile.lock(this.location, {
        retries: { retries: this.lockRetries, minTimeout: 10, maxTimeout: 200 },
        stale: 10_000,
      });
    } catch (err) {
      this.logger.error({ err, location: this.location }, "could not lock match store");
      throw new StoreUnavailableError(this.location, { cause: err });
    }
  }

  private tempPath(): string {
    return `${this.location}.${process.pid}.${randomUUID()}.tmp`;
  }

  private async writeDocument(document: StoreDocument): Promise<void> {
    const temp = this.tempPath();
    try {
      await writeFile(temp, toJSON(document), "utf8");
      await rename(temp, this.location);
    } catch (err) {
      await rm(temp, { force: true });
      this.logger.error({ err, location: this.location }, "match store write failed");
      throw new StoreUnavailableError(this.location, { cause: err });
    }
  }
}
