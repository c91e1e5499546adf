/**
 * @channel-recorder/agent
 *
 * Background reconciler that keeps capture processes running for the
 * channels named in the desired-state file, independent of the daemon.
 */

import { fileURLToPath } from "node:url";

export {
  RecorderAgent,
  TICK_INTERVAL_MS,
  type RecorderAgentOptions,
} from "./reconciler.js";
export {
  retryDelaySeconds,
  nextRetryState,
  cooldownState,
  isRetryDue,
  MAX_RETRY_ATTEMPTS,
  CLEAN_EXIT_COOLDOWN_SECONDS,
} from "./retry.js";
export { parseAgentArgs, runAgentCli, AGENT_USAGE } from "./cli.js";

/** Entry script for spawning the agent as its own process */
export function agentEntryPath(): string {
  const ext = import.meta.url.endsWith(".ts") ? ".ts" : ".js";
  return fileURLToPath(new URL(`./bin${ext}`, import.meta.url));
}
