/**
 * Agent commands - control the background recorder agent and the
 * desired-state file it follows.
 */

import { existsSync, mkdirSync, readFileSync } from "node:fs";
import {
  AutoRecordPolicyEngine,
  DesiredStateError,
  buildDesiredState,
  checkProcessStatus,
  errorMessage,
  getDaemonPaths,
  isAutoRecordMode,
  loadConfig,
  readDesiredState,
  readSessionLocks,
  writeDesiredState,
  type AgentChannel,
  type ChannelEvent,
  type Config,
  type DesiredState,
} from "@channel-recorder/core";
import { agentEntryPath } from "@channel-recorder/agent";
import { spawnDetached, waitForPidFile } from "./process-control.js";
import { stopManagedProcess, type StopCommandOptions } from "./stop.js";

export interface AgentSyncOptions {
  channel?: string[];

  /** JSON file holding an array of channel events */
  events?: string;
  mode?: string;
  allow?: string[];
  block?: string[];
  disable?: boolean;
  quality?: string;
  poll?: string;
}

function optionalBoolean(record: object, key: string, index: number): boolean {
  const value: unknown = key in record ? Reflect.get(record, key) : undefined;
  if (value === undefined) return false;
  if (typeof value !== "boolean") {
    throw new DesiredStateError(`events[${index}].${key} must be a boolean`);
  }
  return value;
}

/** Validate the content of an events file */
export function parseChannelEvents(value: unknown): ChannelEvent[] {
  if (!Array.isArray(value)) {
    throw new DesiredStateError("events must be an array");
  }
  return value.map((item: unknown, index) => {
    if (typeof item !== "object" || item === null) {
      throw new DesiredStateError(`events[${index}] must be an object`);
    }
    const login = "login" in item ? item.login : undefined;
    if (typeof login !== "string") {
      throw new DesiredStateError(`events[${index}].login must be a string`);
    }
    const displayName = "displayName" in item ? item.displayName : undefined;
    if (displayName !== undefined && typeof displayName !== "string") {
      throw new DesiredStateError(`events[${index}].displayName must be a string`);
    }
    const event: ChannelEvent = {
      login,
      isLive: optionalBoolean(item, "isLive", index),
      pinned: optionalBoolean(item, "pinned", index),
      followed: optionalBoolean(item, "followed", index),
    };
    if (displayName !== undefined) event.displayName = displayName;
    return event;
  });
}

/**
 * Desired state from the sync options: explicit channels plus the
 * channels the auto-record policy picks from the events file. The
 * events are one snapshot, so debounce and cooldown don't apply.
 */
export function buildSyncState(options: AgentSyncOptions, config: Config): DesiredState {
  const channels: AgentChannel[] = (options.channel ?? []).map((login) => ({ login }));

  if (options.events) {
    const mode = options.mode ?? "pinnedAndFollowed";
    if (!isAutoRecordMode(mode)) {
      throw new DesiredStateError(`Unknown auto-record mode: ${mode}`);
    }
    let decoded: unknown;
    try {
      decoded = JSON.parse(readFileSync(options.events, "utf-8"));
    } catch (error) {
      throw new DesiredStateError(`Cannot read events file: ${errorMessage(error)}`);
    }

    const engine = new AutoRecordPolicyEngine({
      mode,
      allowlist: options.allow ?? [],
      blocklist: options.block ?? [],
      debounceSeconds: 0,
      cooldownSeconds: 0,
    });
    const now = new Date();
    for (const event of parseChannelEvents(decoded)) {
      engine.handleEvent(event, now);
    }
    channels.push(...engine.desiredChannels(now));
  }

  let pollIntervalSeconds: number | undefined;
  if (options.poll !== undefined) {
    pollIntervalSeconds = parseInt(options.poll, 10);
    if (isNaN(pollIntervalSeconds) || pollIntervalSeconds < 1) {
      throw new DesiredStateError("poll interval must be a positive number of seconds");
    }
  }

  return buildDesiredState({
    enabled: !options.disable,
    channels,
    captureToolPath: config.captureToolPath,
    recordingsDirectory: config.recordingsDir,
    quality: options.quality ?? config.quality,
    pollIntervalSeconds,
  });
}

export async function agentSyncCommand(options: AgentSyncOptions = {}): Promise<void> {
  const paths = getDaemonPaths();
  let state: DesiredState;
  try {
    state = buildSyncState(options, loadConfig());
  } catch (error) {
    console.error(`Invalid agent settings: ${errorMessage(error)}`);
    process.exit(1);
  }

  const changed = writeDesiredState(paths.agent.desiredStateFile, state);
  console.log(
    changed
      ? `Desired state written to ${paths.agent.desiredStateFile}`
      : "Desired state unchanged."
  );
  console.log(
    `Enabled: ${state.enabled}, channels: ${
      state.channels.map((c) => c.login).join(", ") || "none"
    }`
  );
}

export async function agentStartCommand(): Promise<void> {
  const config = loadConfig();
  const { agent } = getDaemonPaths();

  const status = checkProcessStatus(agent.pidFile);
  if (status.running) {
    console.error(`Agent is already running (PID ${status.pid}).`);
    process.exit(1);
  }

  mkdirSync(agent.dir, { recursive: true });
  if (!existsSync(agent.desiredStateFile)) {
    writeDesiredState(
      agent.desiredStateFile,
      buildDesiredState({
        enabled: false,
        channels: [],
        captureToolPath: config.captureToolPath,
        recordingsDirectory: config.recordingsDir,
        quality: config.quality,
      })
    );
  }

  console.log("Starting background agent...");
  spawnDetached(agentEntryPath(), ["--config", agent.desiredStateFile], agent.logFile);

  const pid = await waitForPidFile(agent.pidFile);
  if (pid === null) {
    console.error("Failed to start agent. Check log file for details:");
    console.error(`  ${agent.logFile}`);
    process.exit(1);
  }
  console.log(`Agent started (PID ${pid})`);
  console.log(`Desired state: ${agent.desiredStateFile}`);
}

export async function agentStopCommand(options: StopCommandOptions = {}): Promise<void> {
  const { agent } = getDaemonPaths();
  await stopManagedProcess(
    { label: "Agent", pidFile: agent.pidFile, lockFile: agent.lockFile },
    options
  );
}

export async function agentStatusCommand(): Promise<void> {
  const { agent } = getDaemonPaths();
  const status = checkProcessStatus(agent.pidFile);

  console.log("Background Agent");
  console.log("================");
  console.log(`State:        ${status.running ? `running (PID ${status.pid})` : "stopped"}`);

  if (existsSync(agent.desiredStateFile)) {
    try {
      const state = readDesiredState(agent.desiredStateFile);
      console.log(`Enabled:      ${state.enabled}`);
      console.log(`Poll:         ${state.pollIntervalSeconds}s`);
      console.log(
        `Channels:     ${state.channels.map((c) => c.login).join(", ") || "none"}`
      );
    } catch (error) {
      console.log(`Desired state unreadable: ${errorMessage(error)}`);
    }
  } else {
    console.log("Desired state: not written yet (run 'channel-recorder agent sync')");
  }

  const locks = readSessionLocks(agent.activeSessionsDir);
  console.log(`Recording:    ${locks.length} active`);
  for (const lock of locks) {
    console.log(`  ${lock.login.padEnd(24)} since ${lock.startedAt}  ${lock.outputPath}`);
  }
}
