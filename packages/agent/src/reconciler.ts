/**
 * Background reconciler.
 *
 * A fixed-interval control loop that keeps one capture process running
 * per desired channel. Every tick reloads the desired-state file when
 * its mtime advances, reaps exited processes, then reconciles running
 * sessions against the desired set. A tick is synchronous: processes
 * are only observed through their exit status, never awaited.
 */

import * as fs from "node:fs";
import * as path from "node:path";
import {
  captureArguments,
  channelUrl,
  clearSessionLocks,
  createLogger,
  describeExit,
  errorMessage,
  normalizeChannels,
  readDesiredState,
  recordingFilename,
  removeSessionLock,
  resolveCaptureTool,
  spawnProcess,
  writeSessionLock,
  DEFAULT_POLL_INTERVAL_SECONDS,
  DESIRED_STATE_VERSION,
  type AgentChannel,
  type DesiredState,
  type Logger,
  type ProcessHandle,
  type ProcessLauncher,
  type RetryState,
} from "@channel-recorder/core";
import {
  CLEAN_EXIT_COOLDOWN_SECONDS,
  MIN_LAUNCH_COOLDOWN_SECONDS,
  cooldownState,
  isRetryDue,
  nextRetryState,
} from "./retry.js";

export const TICK_INTERVAL_MS = 2000;

export interface RecorderAgentOptions {
  desiredStateFile: string;

  /** Lock directory; defaults to ActiveSessions beside the desired-state file */
  activeSessionsDir?: string;

  clock?: () => Date;
  launcher?: ProcessLauncher;

  /** Capture tool lookup; defaults to the override, then well-known dirs */
  resolveCaptureTool?: (override: string | null) => string | null;

  logger?: Logger;
  tickIntervalMs?: number;
}

interface AgentSession {
  login: string;
  handle: ProcessHandle;
  startedAt: Date;
  outputPath: string;
}

const INITIAL_STATE: DesiredState = {
  version: DESIRED_STATE_VERSION,
  enabled: false,
  captureToolPath: null,
  recordingsDirectory: "",
  quality: "best",
  pollIntervalSeconds: DEFAULT_POLL_INTERVAL_SECONDS,
  channels: [],
};

function defaultCaptureTool(override: string | null): string | null {
  return resolveCaptureTool(override, { searchPath: false });
}

export class RecorderAgent {
  private readonly desiredStateFile: string;
  private readonly activeSessionsDir: string;
  private readonly clock: () => Date;
  private readonly launcher: ProcessLauncher;
  private readonly resolveTool: (override: string | null) => string | null;
  private readonly logger: Logger;
  private readonly tickIntervalMs: number;

  private state: DesiredState = INITIAL_STATE;
  private stateMtimeMs: number | null = null;
  private readonly sessions = new Map<string, AgentSession>();
  private readonly retries = new Map<string, RetryState>();
  private timer: NodeJS.Timeout | null = null;

  constructor(options: RecorderAgentOptions) {
    this.desiredStateFile = options.desiredStateFile;
    this.activeSessionsDir =
      options.activeSessionsDir ??
      path.join(path.dirname(options.desiredStateFile), "ActiveSessions");
    this.clock = options.clock ?? (() => new Date());
    this.launcher = options.launcher ?? spawnProcess;
    this.resolveTool = options.resolveCaptureTool ?? defaultCaptureTool;
    this.logger = options.logger ?? createLogger("RecorderAgent");
    this.tickIntervalMs = options.tickIntervalMs ?? TICK_INTERVAL_MS;
  }

  get desiredState(): DesiredState {
    return this.state;
  }

  /** Logins with a tracked capture process, sorted */
  activeLogins(): string[] {
    return [...this.sessions.keys()].sort();
  }

  retryState(login: string): RetryState | undefined {
    return this.retries.get(login);
  }

  /**
   * Wipe lock files left by a previous run; no capture process outlives
   * the agent that started it.
   */
  prepare(): void {
    const removed = clearSessionLocks(this.activeSessionsDir);
    if (removed > 0) {
      this.logger.info(`Removed ${removed} stale session lock(s)`);
    }
  }

  start(): void {
    if (this.timer) return;
    this.logger.info(`Starting. Config: ${this.desiredStateFile}`);
    this.prepare();
    this.safeTick();
    this.timer = setInterval(() => this.safeTick(), this.tickIntervalMs);
  }

  /** Stop the loop, terminate every session and remove their locks */
  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    for (const session of this.sessions.values()) {
      session.handle.terminate();
      removeSessionLock(this.activeSessionsDir, session.login);
    }
    this.sessions.clear();
  }

  tick(): void {
    this.reload();
    this.reap();
    this.reconcile();
  }

  private safeTick(): void {
    try {
      this.tick();
    } catch (error) {
      this.logger.error(`Tick failed: ${errorMessage(error)}`);
    }
  }

  private reload(): void {
    let mtimeMs: number;
    try {
      mtimeMs = fs.statSync(this.desiredStateFile).mtimeMs;
    } catch {
      return;
    }
    if (this.stateMtimeMs !== null && mtimeMs <= this.stateMtimeMs) {
      return;
    }

    try {
      const next = readDesiredState(this.desiredStateFile);
      this.state = next;
      this.stateMtimeMs = mtimeMs;
      this.logger.info(
        `Config updated. Enabled: ${next.enabled}, channels: ${next.channels.length}`
      );
    } catch (error) {
      this.logger.error(`Failed to load config: ${errorMessage(error)}`);
    }
  }

  private reap(): void {
    for (const [login, session] of [...this.sessions]) {
      const exit = session.handle.exitInfo();
      if (exit === null) continue;

      const stderr = session.handle.stderrText();
      this.sessions.delete(login);
      removeSessionLock(this.activeSessionsDir, login);

      const now = this.clock();
      if (exit.code === 0) {
        this.retries.set(login, cooldownState(CLEAN_EXIT_COOLDOWN_SECONDS, now));
        this.logger.info(`Recording finished for ${login}`);
        continue;
      }

      const retry = nextRetryState(this.retries.get(login), now);
      this.retries.set(login, retry);
      this.logger.warn(
        stderr
          ? `Recording failed for ${login} (${describeExit(exit)}): ${stderr}`
          : `Recording failed for ${login} (${describeExit(exit)}); retry at ${retry.nextAttemptAt.toISOString()}`
      );
    }
  }

  private reconcile(): void {
    const desired = normalizeChannels(this.state.channels);
    const desiredLogins = new Set(desired.map((c) => c.login));

    for (const [login, session] of this.sessions) {
      if (!this.state.enabled || !desiredLogins.has(login)) {
        session.handle.terminate();
      }
    }
    if (!this.state.enabled) return;

    const tool = this.resolveTool(this.state.captureToolPath);
    if (tool === null) {
      this.logger.error("Capture tool not found");
      return;
    }

    try {
      fs.mkdirSync(this.state.recordingsDirectory, { recursive: true });
    } catch (error) {
      this.logger.error(
        `Unable to create recordings directory: ${errorMessage(error)}`
      );
      return;
    }

    const now = this.clock();
    for (const channel of desired) {
      if (this.sessions.has(channel.login)) continue;
      if (!isRetryDue(this.retries.get(channel.login), now)) continue;

      try {
        this.launch(channel, tool, now);
        this.retries.set(
          channel.login,
          cooldownState(
            Math.max(MIN_LAUNCH_COOLDOWN_SECONDS, this.state.pollIntervalSeconds),
            now
          )
        );
      } catch (error) {
        this.retries.set(channel.login, nextRetryState(this.retries.get(channel.login), now));
        this.logger.error(
          `Failed to start recording for ${channel.login}: ${errorMessage(error)}`
        );
      }
    }
  }

  private launch(channel: AgentChannel, tool: string, now: Date): void {
    const outputPath = path.join(
      this.state.recordingsDirectory,
      recordingFilename(channel.displayName ?? channel.login, now)
    );
    const handle = this.launcher(
      tool,
      captureArguments(channelUrl(channel.login), this.state.quality, outputPath)
    );

    this.sessions.set(channel.login, {
      login: channel.login,
      handle,
      startedAt: now,
      outputPath,
    });

    try {
      writeSessionLock(this.activeSessionsDir, {
        login: channel.login,
        pid: handle.pid,
        outputPath,
        startedAt: now.toISOString(),
      });
    } catch (error) {
      this.logger.error(
        `Failed to write active lock for ${channel.login}: ${errorMessage(error)}`
      );
    }
    this.logger.info(`Started recording ${channel.login}`);
  }
}
