/**
 * Persistence for recovery intents: the list of sessions that were
 * running, kept under one fixed key so a restarted daemon can report
 * (and optionally resume) what it was recording.
 */

import type Database from "better-sqlite3";
import type { RecoveryIntent } from "../types/index.js";
import { deleteKvValue, getKvValue, setKvValue } from "./kv-store.js";

export const RECOVERY_INTENTS_KEY = "recordingRecoveryIntents.v1";

export interface RecoveryIntentStore {
  load(): RecoveryIntent[];

  /** Replace the stored list; an empty list removes the key */
  save(intents: readonly RecoveryIntent[]): void;
}

function isRecoveryIntent(value: unknown): value is RecoveryIntent {
  return (
    typeof value === "object" &&
    value !== null &&
    "target" in value &&
    typeof value.target === "string" &&
    "channelLogin" in value &&
    typeof value.channelLogin === "string" &&
    "channelName" in value &&
    typeof value.channelName === "string" &&
    "quality" in value &&
    typeof value.quality === "string" &&
    "capturedAt" in value &&
    typeof value.capturedAt === "string"
  );
}

export function createSqliteRecoveryIntentStore(
  db: Database.Database
): RecoveryIntentStore {
  return {
    load() {
      const value = getKvValue(db, RECOVERY_INTENTS_KEY);
      return Array.isArray(value) ? value.filter(isRecoveryIntent) : [];
    },
    save(intents) {
      if (intents.length === 0) {
        deleteKvValue(db, RECOVERY_INTENTS_KEY);
      } else {
        setKvValue(db, RECOVERY_INTENTS_KEY, intents);
      }
    },
  };
}

/** Volatile store for tests and for running without a database */
export function createMemoryRecoveryIntentStore(
  initial: readonly RecoveryIntent[] = []
): RecoveryIntentStore {
  let intents = [...initial];
  return {
    load: () => [...intents],
    save(next) {
      intents = [...next];
    },
  };
}
