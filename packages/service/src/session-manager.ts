/**
 * Recording session lifecycle for the daemon.
 *
 * Each session is one capture process keyed by its normalized channel
 * login. Starting writes the recovery intents and a history row; every
 * exit (requested or not) goes through the same cleanup path, which
 * closes the history row, rewrites the intents and hands the session to
 * the onSessionEnded hook.
 */

import type Database from "better-sqlite3";
import * as fs from "node:fs";
import * as path from "node:path";
import {
  RecordingError,
  captureArguments,
  createLogger,
  createMemoryRecoveryIntentStore,
  describeExit,
  errorMessage,
  finishRecording,
  insertRecording,
  isSamePath,
  moveToTrash,
  normalizeLogin,
  normalizeTarget,
  recordingFilename,
  resolveCaptureTool,
  resolveChannelLogin,
  spawnProcess,
  type ExitInfo,
  type Logger,
  type ProcessHandle,
  type ProcessLauncher,
  type RecordingStatus,
  type RecoveryIntent,
  type RecoveryIntentStore,
} from "@channel-recorder/core";

/** Characters of stderr quoted in an unexpected-exit message */
const STDERR_TAIL_LENGTH = 500;

/** Public view of a running session */
export interface RecordingSessionInfo {
  channelLogin: string;
  channelName: string;
  target: string;
  quality: string;
  outputPath: string;

  /** ISO 8601 */
  startedAt: string;

  pid: number;

  /** History row id, null without a database */
  historyId: string | null;
}

export type SessionEndedHook = (
  session: RecordingSessionInfo,
  exit: ExitInfo,
  status: Exclude<RecordingStatus, "recording">
) => void | Promise<void>;

export interface RecordingSessionManagerOptions {
  recordingsDir: string;
  defaultQuality?: string;
  maxConcurrentRecordings?: number;

  /** Capture executable override */
  captureToolPath?: string | null;

  /** History rows are written when a database is given */
  db?: Database.Database;

  intents?: RecoveryIntentStore;
  launcher?: ProcessLauncher;
  resolveCaptureTool?: (override: string | null) => string | null;

  /** Outputs owned by other schedulers (the background agent) */
  externalOutputPaths?: () => string[];

  onSessionEnded?: SessionEndedHook;
  clock?: () => Date;
  logger?: Logger;
}

interface ManagedSession {
  info: RecordingSessionInfo;
  handle: ProcessHandle;
  stopRequested: boolean;

  /** Settles once the exit has been fully processed */
  done: Promise<void>;
}

export class RecordingSessionManager {
  private readonly sessions = new Map<string, ManagedSession>();
  private readonly recordingsDir: string;
  private readonly defaultQuality: string;
  private readonly maxConcurrent: number;
  private readonly captureToolPath: string | null;
  private readonly db: Database.Database | undefined;
  private readonly intents: RecoveryIntentStore;
  private readonly launcher: ProcessLauncher;
  private readonly resolveTool: (override: string | null) => string | null;
  private readonly externalOutputPaths: () => string[];
  private readonly clock: () => Date;
  private readonly logger: Logger;

  onSessionEnded: SessionEndedHook | undefined;

  /** Reason the last start failed, or the last unexpected exit */
  errorMessage: string | null = null;

  /** Output of the most recently started session */
  lastOutputPath: string | null = null;

  constructor(options: RecordingSessionManagerOptions) {
    this.recordingsDir = options.recordingsDir;
    this.defaultQuality = options.defaultQuality ?? "best";
    this.maxConcurrent = Math.max(1, options.maxConcurrentRecordings ?? 2);
    this.captureToolPath = options.captureToolPath ?? null;
    this.db = options.db;
    this.intents = options.intents ?? createMemoryRecoveryIntentStore();
    this.launcher = options.launcher ?? spawnProcess;
    this.resolveTool = options.resolveCaptureTool ?? ((override) => resolveCaptureTool(override));
    this.externalOutputPaths = options.externalOutputPaths ?? (() => []);
    this.onSessionEnded = options.onSessionEnded;
    this.clock = options.clock ?? (() => new Date());
    this.logger = options.logger ?? createLogger("SessionManager");
  }

  get activeRecordingCount(): number {
    return this.sessions.size;
  }

  isRecording(channelLogin: string): boolean {
    const login = normalizeLogin(channelLogin);
    return login !== null && this.sessions.has(login);
  }

  /** Running sessions ordered by login */
  activeSessions(): RecordingSessionInfo[] {
    return [...this.sessions.values()]
      .map((session) => ({ ...session.info }))
      .sort((a, b) => a.channelLogin.localeCompare(b.channelLogin));
  }

  activeOutputPaths(): string[] {
    return [...this.sessions.values()].map((session) => session.info.outputPath);
  }

  /**
   * Start capturing a channel. Returns false (with errorMessage set) when
   * the session can't be started; nothing is left behind in that case.
   */
  startRecording(target: string, channelName?: string | null, quality?: string): boolean {
    try {
      this.launch(target, channelName ?? null, quality ?? this.defaultQuality);
      this.errorMessage = null;
      return true;
    } catch (error) {
      if (!(error instanceof RecordingError)) throw error;
      this.errorMessage = error.message;
      this.logger.warn(error.message);
      return false;
    }
  }

  /**
   * Signal one session, or every session when no login is given.
   * Cleanup happens once the process has exited.
   */
  stopRecording(channelLogin?: string | null): void {
    const login = normalizeLogin(channelLogin);
    const targets =
      login === null
        ? [...this.sessions.values()]
        : [this.sessions.get(login)].filter((s): s is ManagedSession => s !== undefined);

    for (const session of targets) {
      session.stopRequested = true;
      session.handle.terminate();
      this.logger.info(`Stopping recording ${session.info.channelLogin}`);
    }
  }

  /**
   * Stop the channel's session if one is running, else start one.
   * Returns whether the channel is recording afterwards.
   */
  toggleRecording(target: string, channelName?: string | null): boolean {
    const login = resolveChannelLogin(target, channelName);
    if (login !== null && this.sessions.has(login)) {
      this.stopRecording(login);
      return false;
    }
    return this.startRecording(target, channelName);
  }

  /**
   * Read the intents persisted by a previous process and clear them.
   * Intents of sessions running in this process are written back.
   */
  consumeRecoveryIntents(): RecoveryIntent[] {
    const recovered = this.intents.load();
    this.persistIntents();
    return recovered;
  }

  /**
   * Move a recording into the .trash directory beside it, or delete it
   * when the move fails. Returns the trash path, or null after a hard
   * delete.
   */
  deleteRecording(filePath: string): string | null {
    const busy = [...this.activeOutputPaths(), ...this.externalOutputPaths()];
    if (busy.some((output) => isSamePath(output, filePath))) {
      throw new RecordingError(
        `Cannot delete ${path.basename(filePath)}: recording still in progress.`,
        "in_progress"
      );
    }
    if (!fs.existsSync(filePath)) {
      throw new RecordingError(
        `Recording file not found: ${path.basename(filePath)}`,
        "not_found"
      );
    }

    try {
      const destination = moveToTrash(filePath);
      this.logger.info(`Moved ${path.basename(filePath)} to trash`);
      return destination;
    } catch (error) {
      this.logger.warn(
        `Could not move ${path.basename(filePath)} to trash, deleting: ${errorMessage(error)}`
      );
      fs.rmSync(filePath, { force: true });
      return null;
    }
  }

  /** Resolves once every session that is running now has been cleaned up */
  async waitForIdle(): Promise<void> {
    await Promise.all([...this.sessions.values()].map((session) => session.done));
  }

  /** Stop everything and wait for cleanup */
  async shutdown(): Promise<void> {
    this.stopRecording();
    await this.waitForIdle();
  }

  private launch(target: string, channelName: string | null, quality: string): void {
    const login = resolveChannelLogin(target, channelName);
    if (login === null) {
      throw new RecordingError(
        `Cannot determine the channel for "${target}".`,
        "invalid_target"
      );
    }
    if (this.sessions.has(login)) {
      throw new RecordingError(`Already recording ${login}.`, "already_recording");
    }
    if (this.sessions.size >= this.maxConcurrent) {
      throw new RecordingError(
        `Concurrent recording limit reached (${this.maxConcurrent}).`,
        "concurrency_limit"
      );
    }

    const tool = this.resolveTool(this.captureToolPath);
    if (tool === null) {
      throw new RecordingError("Capture tool (streamlink) not found.", "capture_tool_missing");
    }

    try {
      fs.mkdirSync(this.recordingsDir, { recursive: true });
    } catch (error) {
      throw new RecordingError(
        `Cannot create recordings directory ${this.recordingsDir}: ${errorMessage(error)}`,
        "recordings_directory"
      );
    }

    const now = this.clock();
    const name = channelName?.trim() || login;
    const normalizedTarget = normalizeTarget(target);
    const outputPath = path.join(this.recordingsDir, recordingFilename(name, now));

    const startedAt = now.toISOString();
    let historyId: string | null = null;
    if (this.db) {
      try {
        historyId = insertRecording(this.db, {
          channelLogin: login,
          channelName: name,
          target: normalizedTarget,
          quality,
          outputPath,
          startedAt,
        }).id;
      } catch (error) {
        throw new RecordingError(
          `Cannot record history for ${login}: ${errorMessage(error)}`,
          "history_unavailable"
        );
      }
    }

    let handle: ProcessHandle;
    try {
      handle = this.launcher(tool, captureArguments(normalizedTarget, quality, outputPath));
    } catch (error) {
      this.closeHistory(historyId, "failed", null);
      throw new RecordingError(
        `Failed to start recording for ${login}: ${errorMessage(error)}`,
        "spawn_failed"
      );
    }

    const info: RecordingSessionInfo = {
      channelLogin: login,
      channelName: name,
      target: normalizedTarget,
      quality,
      outputPath,
      startedAt,
      pid: handle.pid,
      historyId,
    };

    const session: ManagedSession = {
      info,
      handle,
      stopRequested: false,
      done: Promise.resolve(),
    };
    session.done = handle.exited.then((exit) => this.handleExit(session, exit));

    this.sessions.set(login, session);
    this.lastOutputPath = outputPath;
    this.persistIntents();
    this.logger.info(`Started recording ${login} -> ${outputPath}`);
  }

  private async handleExit(session: ManagedSession, exit: ExitInfo): Promise<void> {
    const { info } = session;
    if (this.sessions.get(info.channelLogin) === session) {
      this.sessions.delete(info.channelLogin);
    }
    this.persistIntents();

    let status: Exclude<RecordingStatus, "recording">;
    if (session.stopRequested) {
      status = "stopped";
    } else if (exit.code === 0) {
      status = "completed";
    } else {
      status = "failed";
      const stderr = session.handle.stderrText().slice(-STDERR_TAIL_LENGTH);
      this.errorMessage = stderr
        ? `Recording for ${info.channelLogin} ended unexpectedly (${describeExit(exit)}): ${stderr}`
        : `Recording for ${info.channelLogin} ended unexpectedly (${describeExit(exit)}).`;
      this.logger.warn(this.errorMessage);
    }

    this.closeHistory(info.historyId, status, exit.code);
    this.logger.info(`Recording ${info.channelLogin} ended (${status})`);

    if (this.onSessionEnded) {
      try {
        await this.onSessionEnded({ ...info }, exit, status);
      } catch (error) {
        this.logger.error(`Post-processing failed for ${info.channelLogin}:`, error);
      }
    }
  }

  private closeHistory(
    historyId: string | null,
    status: Exclude<RecordingStatus, "recording">,
    exitCode: number | null
  ): void {
    if (!this.db || historyId === null) return;
    try {
      finishRecording(this.db, historyId, status, exitCode, this.clock().toISOString());
    } catch (error) {
      this.logger.error(`Failed to update history row ${historyId}:`, error);
    }
  }

  private persistIntents(): void {
    const intents: RecoveryIntent[] = [...this.sessions.values()].map(({ info }) => ({
      target: info.target,
      channelLogin: info.channelLogin,
      channelName: info.channelName,
      quality: info.quality,
      capturedAt: info.startedAt,
    }));
    try {
      this.intents.save(intents);
    } catch (error) {
      this.logger.error("Failed to persist recovery intents:", error);
    }
  }
}
