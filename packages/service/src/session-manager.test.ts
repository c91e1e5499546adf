import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import type Database from "better-sqlite3";
import {
  RecordingError,
  createMemoryRecoveryIntentStore,
  getDefaultMigrationsDir,
  getRecordingById,
  listRecordingHistory,
  openMemoryDatabase,
  runMigrations,
  silentLogger,
  type ExitInfo,
  type ProcessHandle,
  type RecoveryIntentStore,
} from "@channel-recorder/core";
import { RecordingSessionManager } from "./session-manager.js";

class FakeHandle implements ProcessHandle {
  readonly exited: Promise<ExitInfo>;
  stderr = "";
  terminateCalls = 0;
  private exit: ExitInfo | null = null;
  private resolveExit: (info: ExitInfo) => void = () => {};

  constructor(readonly pid: number) {
    this.exited = new Promise((resolve) => {
      this.resolveExit = resolve;
    });
  }

  exitInfo(): ExitInfo | null {
    return this.exit;
  }

  stderrText(): string {
    return this.stderr;
  }

  terminate(): void {
    this.terminateCalls++;
    this.finish({ code: null, signal: "SIGTERM" });
  }

  finish(info: ExitInfo): void {
    if (this.exit) return;
    this.exit = info;
    this.resolveExit(info);
  }
}

interface LaunchCall {
  executable: string;
  args: readonly string[];
  handle: FakeHandle;
}

const STARTED_AT = new Date(2024, 0, 15, 10, 30, 0);

describe("RecordingSessionManager", () => {
  let dir: string;
  let recordingsDir: string;
  let db: Database.Database;
  let intents: RecoveryIntentStore;
  let launches: LaunchCall[];
  let tool: string | null;

  function createManager(
    overrides: Partial<ConstructorParameters<typeof RecordingSessionManager>[0]> = {}
  ): RecordingSessionManager {
    return new RecordingSessionManager({
      recordingsDir,
      maxConcurrentRecordings: 2,
      db,
      intents,
      launcher: (executable, args) => {
        const handle = new FakeHandle(1000 + launches.length);
        launches.push({ executable, args, handle });
        return handle;
      },
      resolveCaptureTool: () => tool,
      clock: () => STARTED_AT,
      logger: silentLogger,
      ...overrides,
    });
  }

  function launch(index: number): LaunchCall {
    const call = launches[index];
    if (!call) throw new Error(`no launch #${index}`);
    return call;
  }

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "session-manager-"));
    recordingsDir = path.join(dir, "recordings");
    db = openMemoryDatabase();
    runMigrations(db, getDefaultMigrationsDir());
    intents = createMemoryRecoveryIntentStore();
    launches = [];
    tool = "/usr/local/bin/streamlink";
  });

  afterEach(() => {
    db.close();
    fs.rmSync(dir, { recursive: true, force: true });
  });

  describe("startRecording", () => {
    it("spawns the capture tool and records the session", () => {
      const manager = createManager();

      expect(manager.startRecording("twitch.tv/Alpha")).toBe(true);

      const outputPath = path.join(recordingsDir, "alpha_2024-01-15_10-30-00.mp4");
      expect(launch(0).executable).toBe("/usr/local/bin/streamlink");
      expect(launch(0).args).toEqual([
        "https://twitch.tv/Alpha",
        "best",
        "--twitch-disable-ads",
        "--twitch-low-latency",
        "--output",
        outputPath,
      ]);
      expect(manager.isRecording("ALPHA")).toBe(true);
      expect(manager.activeRecordingCount).toBe(1);
      expect(manager.activeOutputPaths()).toEqual([outputPath]);
      expect(manager.lastOutputPath).toBe(outputPath);
      expect(manager.errorMessage).toBeNull();
      expect(fs.existsSync(recordingsDir)).toBe(true);
    });

    it("persists a recovery intent and a history row", () => {
      const manager = createManager();
      manager.startRecording("https://twitch.tv/alpha", "Alpha Stream", "720p");

      expect(intents.load()).toEqual([
        {
          target: "https://twitch.tv/alpha",
          channelLogin: "alpha",
          channelName: "Alpha Stream",
          quality: "720p",
          capturedAt: STARTED_AT.toISOString(),
        },
      ]);

      const [session] = manager.activeSessions();
      expect(session?.outputPath).toBe(
        path.join(recordingsDir, "Alpha_Stream_2024-01-15_10-30-00.mp4")
      );
      const historyId = session?.historyId;
      expect(typeof historyId).toBe("string");
      expect(getRecordingById(db, historyId ?? "")?.status).toBe("recording");
    });

    it("uses the channel name when the target has no path", () => {
      const manager = createManager();
      expect(manager.startRecording("twitch.tv", "Beta")).toBe(true);
      expect(manager.isRecording("beta")).toBe(true);
    });

    it("rejects a second session for the same channel", () => {
      const manager = createManager();
      manager.startRecording("twitch.tv/alpha");

      expect(manager.startRecording("https://twitch.tv/ALPHA")).toBe(false);
      expect(manager.errorMessage).toBe("Already recording alpha.");
      expect(launches).toHaveLength(1);
    });

    it("enforces the concurrency cap", () => {
      const manager = createManager({ maxConcurrentRecordings: 1 });
      manager.startRecording("twitch.tv/alpha");

      expect(manager.startRecording("twitch.tv/beta")).toBe(false);
      expect(manager.errorMessage).toBe("Concurrent recording limit reached (1).");
      expect(manager.activeRecordingCount).toBe(1);
    });

    it("fails without side effects when the capture tool is missing", () => {
      tool = null;
      const manager = createManager();

      expect(manager.startRecording("twitch.tv/alpha")).toBe(false);
      expect(manager.errorMessage).toBe("Capture tool (streamlink) not found.");
      expect(launches).toHaveLength(0);
      expect(intents.load()).toEqual([]);
      expect(manager.activeRecordingCount).toBe(0);
    });

    it("fails when the recordings directory cannot be created", () => {
      const blocker = path.join(dir, "not-a-dir");
      fs.writeFileSync(blocker, "x");
      const manager = createManager({ recordingsDir: path.join(blocker, "recordings") });

      expect(manager.startRecording("twitch.tv/alpha")).toBe(false);
      expect(manager.errorMessage).toContain("Cannot create recordings directory");
      expect(launches).toHaveLength(0);
    });

    it("fails when the channel cannot be determined", () => {
      const manager = createManager();
      expect(manager.startRecording("   ")).toBe(false);
      expect(manager.errorMessage).toBe('Cannot determine the channel for "   ".');
    });

    it("reports a launcher failure", () => {
      const manager = createManager({
        launcher: () => {
          throw new Error("spawn EACCES");
        },
      });

      expect(manager.startRecording("twitch.tv/alpha")).toBe(false);
      expect(manager.errorMessage).toBe("Failed to start recording for alpha: spawn EACCES");
      expect(intents.load()).toEqual([]);
      expect(listRecordingHistory(db).map((row) => row.status)).toEqual(["failed"]);
    });

    it("does not spawn when the history row can't be written", () => {
      const closed = openMemoryDatabase();
      closed.close();
      const manager = createManager({ db: closed });

      expect(manager.startRecording("twitch.tv/alpha")).toBe(false);
      expect(manager.errorMessage).toMatch(/^Cannot record history for alpha: /);
      expect(launches).toHaveLength(0);
      expect(manager.activeRecordingCount).toBe(0);
      expect(intents.load()).toEqual([]);
    });
  });

  describe("session end", () => {
    it("cleans up a stopped session and hands it to the hook", async () => {
      const onSessionEnded = vi.fn();
      const manager = createManager({ onSessionEnded });
      manager.startRecording("twitch.tv/alpha");
      const historyId = manager.activeSessions()[0]?.historyId ?? "";

      manager.stopRecording("Alpha");
      await manager.waitForIdle();

      expect(launch(0).handle.terminateCalls).toBe(1);
      expect(manager.activeRecordingCount).toBe(0);
      expect(intents.load()).toEqual([]);
      expect(getRecordingById(db, historyId)?.status).toBe("stopped");
      expect(onSessionEnded).toHaveBeenCalledTimes(1);
      expect(onSessionEnded.mock.calls[0]?.[0]).toMatchObject({ channelLogin: "alpha" });
      expect(onSessionEnded.mock.calls[0]?.[2]).toBe("stopped");
      expect(manager.errorMessage).toBeNull();
    });

    it("stops every session when no login is given", async () => {
      const manager = createManager();
      manager.startRecording("twitch.tv/alpha");
      manager.startRecording("twitch.tv/beta");

      manager.stopRecording();
      await manager.waitForIdle();

      expect(launch(0).handle.terminateCalls).toBe(1);
      expect(launch(1).handle.terminateCalls).toBe(1);
      expect(manager.activeRecordingCount).toBe(0);
    });

    it("reports an unexpected exit with the stderr tail", async () => {
      const manager = createManager();
      manager.startRecording("twitch.tv/alpha");
      const historyId = manager.activeSessions()[0]?.historyId ?? "";

      launch(0).handle.stderr = "error: No playable streams found";
      launch(0).handle.finish({ code: 1, signal: null });
      await manager.waitForIdle();

      expect(manager.errorMessage).toBe(
        "Recording for alpha ended unexpectedly (status 1): error: No playable streams found"
      );
      const row = getRecordingById(db, historyId);
      expect(row?.status).toBe("failed");
      expect(row?.exitCode).toBe(1);
      expect(manager.isRecording("alpha")).toBe(false);
    });

    it("marks a clean exit as completed", async () => {
      const manager = createManager();
      manager.startRecording("twitch.tv/alpha");
      const historyId = manager.activeSessions()[0]?.historyId ?? "";

      launch(0).handle.finish({ code: 0, signal: null });
      await manager.waitForIdle();

      expect(getRecordingById(db, historyId)?.status).toBe("completed");
      expect(manager.errorMessage).toBeNull();
    });

    it("keeps the remaining sessions in the recovery intents", async () => {
      const manager = createManager();
      manager.startRecording("twitch.tv/alpha");
      manager.startRecording("twitch.tv/beta");

      launch(0).handle.finish({ code: 0, signal: null });
      await manager.waitForIdle();

      expect(intents.load().map((intent) => intent.channelLogin)).toEqual(["beta"]);
    });

    it("logs a failing hook without rethrowing", async () => {
      const logger = { ...silentLogger, error: vi.fn() };
      const manager = createManager({
        logger,
        onSessionEnded: () => Promise.reject(new Error("disk full")),
      });
      manager.startRecording("twitch.tv/alpha");

      manager.stopRecording();
      await manager.waitForIdle();

      expect(logger.error).toHaveBeenCalledWith(
        "Post-processing failed for alpha:",
        expect.any(Error)
      );
    });
  });

  it("toggles a channel", async () => {
    const manager = createManager();

    expect(manager.toggleRecording("twitch.tv/alpha")).toBe(true);
    expect(manager.isRecording("alpha")).toBe(true);

    expect(manager.toggleRecording("twitch.tv/Alpha")).toBe(false);
    await manager.waitForIdle();
    expect(manager.isRecording("alpha")).toBe(false);
  });

  describe("consumeRecoveryIntents", () => {
    it("returns the stored intents once", () => {
      const stored = {
        target: "https://twitch.tv/alpha",
        channelLogin: "alpha",
        channelName: "alpha",
        quality: "best",
        capturedAt: "2024-01-15T09:00:00.000Z",
      };
      intents = createMemoryRecoveryIntentStore([stored]);
      const manager = createManager();

      expect(manager.consumeRecoveryIntents()).toEqual([stored]);
      expect(manager.consumeRecoveryIntents()).toEqual([]);
    });
  });

  describe("deleteRecording", () => {
    it("refuses to delete an active output", () => {
      const manager = createManager();
      manager.startRecording("twitch.tv/alpha");
      const outputPath = manager.activeOutputPaths()[0] ?? "";
      fs.writeFileSync(outputPath, "partial");

      let thrown: unknown;
      try {
        manager.deleteRecording(outputPath);
      } catch (error) {
        thrown = error;
      }

      expect(thrown).toBeInstanceOf(RecordingError);
      expect(thrown instanceof RecordingError && thrown.code).toBe("in_progress");
      expect(thrown instanceof Error && thrown.message).toContain("still in progress");
      expect(fs.existsSync(outputPath)).toBe(true);
    });

    it("refuses to delete an output owned by the background agent", () => {
      fs.mkdirSync(recordingsDir, { recursive: true });
      const file = path.join(recordingsDir, "beta_2024-01-15_10-00-00.mp4");
      fs.writeFileSync(file, "partial");
      const manager = createManager({ externalOutputPaths: () => [file] });

      expect(() => manager.deleteRecording(file)).toThrow("still in progress");
    });

    it("moves the file into .trash", () => {
      fs.mkdirSync(recordingsDir, { recursive: true });
      const file = path.join(recordingsDir, "alpha_2024-01-14_10-00-00.mp4");
      fs.writeFileSync(file, "video");
      const manager = createManager();

      const trashed = manager.deleteRecording(file);

      expect(trashed).toBe(path.join(recordingsDir, ".trash", "alpha_2024-01-14_10-00-00.mp4"));
      expect(fs.existsSync(file)).toBe(false);
      expect(fs.readFileSync(path.join(recordingsDir, ".trash", "alpha_2024-01-14_10-00-00.mp4"), "utf-8")).toBe("video");
    });

    it("keeps both files when the trash already holds that name", () => {
      fs.mkdirSync(path.join(recordingsDir, ".trash"), { recursive: true });
      const name = "alpha_2024-01-14_10-00-00.mp4";
      fs.writeFileSync(path.join(recordingsDir, ".trash", name), "old");
      fs.writeFileSync(path.join(recordingsDir, name), "new");
      const manager = createManager();

      const trashed = manager.deleteRecording(path.join(recordingsDir, name));

      expect(trashed).not.toBe(path.join(recordingsDir, ".trash", name));
      expect(fs.readdirSync(path.join(recordingsDir, ".trash"))).toHaveLength(2);
    });

    it("throws not_found for a missing file", () => {
      const manager = createManager();
      expect(() => manager.deleteRecording(path.join(recordingsDir, "missing.mp4"))).toThrow(
        "Recording file not found: missing.mp4"
      );
    });
  });
});
