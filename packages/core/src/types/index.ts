export type {
  RecordingStatus,
  RecoveryIntent,
  RecordingManifestEntry,
  RecordingManifest,
  RecordingListing,
  RecordingHistoryEntry,
} from "./recording.js";

export type {
  AgentChannel,
  DesiredState,
  ActiveSessionLock,
  RetryState,
} from "./agent.js";
