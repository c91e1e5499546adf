/**
 * Types for the file contract between the app and the background
 * recorder agent.
 */

/** A channel the agent should keep recording */
export interface AgentChannel {
  login: string;
  displayName?: string;
}

/**
 * Desired-state file written by the app and polled by the agent.
 * The agent reloads it whenever its modification time advances.
 */
export interface DesiredState {
  version: number;
  enabled: boolean;

  /** Capture executable override (null = well-known locations) */
  captureToolPath: string | null;

  recordingsDirectory: string;
  quality: string;
  pollIntervalSeconds: number;
  channels: AgentChannel[];
}

/** Lock file written for each session the agent is running */
export interface ActiveSessionLock {
  login: string;
  pid: number;
  outputPath: string;

  /** ISO 8601 */
  startedAt: string;
}

/** Per-channel retry bookkeeping */
export interface RetryState {
  attempts: number;
  nextAttemptAt: Date;
}
