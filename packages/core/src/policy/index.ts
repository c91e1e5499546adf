export {
  AutoRecordPolicyEngine,
  AUTO_RECORD_MODES,
  DEFAULT_AUTO_RECORD_POLICY,
  isAutoRecordMode,
  type AutoRecordMode,
  type AutoRecordPolicy,
  type ChannelEvent,
} from "./auto-record.js";
