export { isTransportStreamFile } from "./transport-stream.js";
export {
  REMUX_TOOL_NAME,
  prepareRecordingForPlayback,
  remuxArguments,
  remuxTempPath,
  resolveRemuxTool,
  type PreparedRecording,
  type PrepareRecordingOptions,
} from "./remux.js";
export { listRecordings } from "./library.js";
export {
  planRetention,
  enforceRetention,
  isRetentionEnabled,
  type RetentionPolicy,
  type RetentionCandidate,
  type RetentionResult,
  type EnforceRetentionOptions,
} from "./retention.js";
