/**
 * @channel-recorder/core
 *
 * Types, state files, storage and the recording building blocks shared
 * by the daemon, the background agent and the CLI.
 */

export * from "./types/index.js";
export * from "./db/index.js";
export * from "./errors.js";
export * from "./logger.js";
export {
  loadConfig,
  getDefaultDbPath,
  getDefaultRecordingsDir,
  type Config,
} from "./config.js";
export * from "./daemon-paths.js";
export * from "./lockfile.js";
export * from "./fs-utils.js";
export * from "./channels.js";
export * from "./capture.js";
export * from "./desired-state.js";
export * from "./process/index.js";
export * from "./vault/index.js";
export * from "./finalize/index.js";
export * from "./policy/index.js";
