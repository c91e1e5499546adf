import { describe, it, expect, beforeEach, afterEach } from "vitest";
import type Database from "better-sqlite3";
import { openMemoryDatabase } from "./connection.js";
import { getDefaultMigrationsDir, runMigrations } from "./migrations.js";
import {
  finishRecording,
  getRecordingById,
  insertRecording,
  listRecordingHistory,
  markInterruptedRecordings,
} from "./recordings.js";
import {
  RECOVERY_INTENTS_KEY,
  createSqliteRecoveryIntentStore,
} from "./recovery-intents.js";
import { getKvValue } from "./kv-store.js";

function input(login: string, startedAt: string) {
  return {
    channelLogin: login,
    channelName: login,
    target: `https://twitch.tv/${login}`,
    quality: "best",
    outputPath: `/recordings/${login}.mp4`,
    startedAt,
  };
}

describe("recording history", () => {
  let db: Database.Database;

  beforeEach(() => {
    db = openMemoryDatabase();
    runMigrations(db, getDefaultMigrationsDir());
  });

  afterEach(() => {
    db.close();
  });

  it("inserts rows in the recording state", () => {
    const row = insertRecording(db, input("alpha", "2025-01-01T10:00:00.000Z"));
    expect(getRecordingById(db, row.id)).toEqual({
      ...input("alpha", "2025-01-01T10:00:00.000Z"),
      id: row.id,
      endedAt: null,
      exitCode: null,
      status: "recording",
    });
  });

  it("finishes a row", () => {
    const row = insertRecording(db, input("alpha", "2025-01-01T10:00:00.000Z"));
    const done = finishRecording(db, row.id, "failed", 1, "2025-01-01T10:05:00.000Z");
    expect(done?.status).toBe("failed");
    expect(done?.exitCode).toBe(1);
    expect(done?.endedAt).toBe("2025-01-01T10:05:00.000Z");
    expect(finishRecording(db, "missing", "completed", 0)).toBeNull();
  });

  it("lists newest first with filters", () => {
    insertRecording(db, input("alpha", "2025-01-01T10:00:00.000Z"));
    const beta = insertRecording(db, input("beta", "2025-01-02T10:00:00.000Z"));
    finishRecording(db, beta.id, "completed", 0);

    expect(listRecordingHistory(db).map((r) => r.channelLogin)).toEqual(["beta", "alpha"]);
    expect(
      listRecordingHistory(db, { status: "recording" }).map((r) => r.channelLogin)
    ).toEqual(["alpha"]);
    expect(listRecordingHistory(db, { channelLogin: "beta", limit: 1 })).toHaveLength(1);
  });

  it("marks leftover recording rows as interrupted", () => {
    insertRecording(db, input("alpha", "2025-01-01T10:00:00.000Z"));
    const beta = insertRecording(db, input("beta", "2025-01-02T10:00:00.000Z"));
    finishRecording(db, beta.id, "completed", 0);

    expect(markInterruptedRecordings(db)).toBe(1);
    expect(listRecordingHistory(db, { status: "interrupted" })).toHaveLength(1);
  });
});

describe("recovery intent store", () => {
  let db: Database.Database;

  beforeEach(() => {
    db = openMemoryDatabase();
    runMigrations(db, getDefaultMigrationsDir());
  });

  afterEach(() => {
    db.close();
  });

  it("round-trips intents and deletes the key when emptied", () => {
    const store = createSqliteRecoveryIntentStore(db);
    const intent = {
      target: "https://twitch.tv/alpha",
      channelLogin: "alpha",
      channelName: "Alpha",
      quality: "best",
      capturedAt: "2025-01-01T10:00:00.000Z",
    };

    store.save([intent]);
    expect(store.load()).toEqual([intent]);

    store.save([]);
    expect(store.load()).toEqual([]);
    expect(getKvValue(db, RECOVERY_INTENTS_KEY)).toBeNull();
  });
});
