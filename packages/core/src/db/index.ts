/**
 * Database module exports.
 */

export { openDatabase, openMemoryDatabase } from "./connection.js";
export { runMigrations, getDefaultMigrationsDir } from "./migrations.js";
export { getKvValue, setKvValue, deleteKvValue } from "./kv-store.js";
export {
  RECOVERY_INTENTS_KEY,
  createSqliteRecoveryIntentStore,
  createMemoryRecoveryIntentStore,
  type RecoveryIntentStore,
} from "./recovery-intents.js";
export {
  insertRecording,
  finishRecording,
  getRecordingById,
  listRecordingHistory,
  markInterruptedRecordings,
  type InsertRecordingInput,
  type ListRecordingsOptions,
} from "./recordings.js";
