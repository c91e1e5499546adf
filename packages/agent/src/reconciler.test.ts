import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import {
  readSessionLocks,
  recordingFilename,
  writeDesiredState,
  writeSessionLock,
  type DesiredState,
  type ExitInfo,
  type Logger,
  type ProcessHandle,
} from "@channel-recorder/core";
import { RecorderAgent } from "./reconciler.js";

class FakeHandle implements ProcessHandle {
  readonly exited: Promise<ExitInfo>;
  terminateCalls = 0;
  stderr = "";
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

describe("RecorderAgent", () => {
  let dir: string;
  let stateFile: string;
  let recordingsDir: string;
  let locksDir: string;
  let now: Date;
  let launches: LaunchCall[];
  let failLaunch: boolean;
  let tool: string | null;
  let logger: {
    info: ReturnType<typeof vi.fn>;
    warn: ReturnType<typeof vi.fn>;
    error: ReturnType<typeof vi.fn>;
  };
  let mtime: number;

  function writeState(changes: Partial<DesiredState> = {}): void {
    writeDesiredState(stateFile, {
      version: 1,
      enabled: true,
      captureToolPath: null,
      recordingsDirectory: recordingsDir,
      quality: "best",
      pollIntervalSeconds: 25,
      channels: [{ login: "alpha" }],
      ...changes,
    });
    // Explicit, increasing mtimes so reloads don't depend on timestamp granularity
    mtime += 10;
    fs.utimesSync(stateFile, mtime, mtime);
  }

  function advance(seconds: number): void {
    now = new Date(now.getTime() + seconds * 1000);
  }

  function makeAgent(): RecorderAgent {
    const agentLogger: Logger = logger;
    return new RecorderAgent({
      desiredStateFile: stateFile,
      clock: () => now,
      launcher: (executable, args) => {
        if (failLaunch) throw new Error("spawn EACCES");
        const handle = new FakeHandle(1000 + launches.length);
        launches.push({ executable, args, handle });
        return handle;
      },
      resolveCaptureTool: () => tool,
      logger: agentLogger,
    });
  }

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "cr-agent-test-"));
    stateFile = path.join(dir, "background", "config.json");
    recordingsDir = path.join(dir, "recordings");
    locksDir = path.join(dir, "background", "ActiveSessions");
    now = new Date(2025, 4, 1, 20, 0, 0);
    launches = [];
    failLaunch = false;
    tool = "/usr/local/bin/streamlink";
    logger = { info: vi.fn(), warn: vi.fn(), error: vi.fn() };
    mtime = 1_700_000_000;
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("launches desired channels with the capture arguments and writes a lock", () => {
    writeState({ channels: [{ login: " Alpha ", displayName: "Alpha Streams" }] });
    const agent = makeAgent();

    agent.tick();

    const outputPath = path.join(recordingsDir, recordingFilename("Alpha Streams", now));
    expect(launches).toHaveLength(1);
    expect(launches[0]?.executable).toBe("/usr/local/bin/streamlink");
    expect(launches[0]?.args).toEqual([
      "https://twitch.tv/alpha",
      "best",
      "--twitch-disable-ads",
      "--twitch-low-latency",
      "--output",
      outputPath,
    ]);
    expect(readSessionLocks(locksDir)).toEqual([
      { login: "alpha", pid: 1000, outputPath, startedAt: now.toISOString() },
    ]);
    expect(fs.existsSync(recordingsDir)).toBe(true);
    expect(agent.retryState("alpha")).toEqual({
      attempts: 0,
      nextAttemptAt: new Date(now.getTime() + 25_000),
    });
  });

  it("keeps at most one session per login", () => {
    writeState({ channels: [{ login: "alpha" }, { login: "ALPHA" }] });
    const agent = makeAgent();

    agent.tick();
    advance(60);
    agent.tick();

    expect(launches).toHaveLength(1);
    expect(agent.activeLogins()).toEqual(["alpha"]);
  });

  it("clears stale locks on prepare", () => {
    writeSessionLock(locksDir, {
      login: "ghost",
      pid: 1,
      outputPath: "/nowhere.mp4",
      startedAt: "2024-01-01T00:00:00.000Z",
    });
    makeAgent().prepare();
    expect(fs.readdirSync(locksDir)).toEqual([]);
  });

  it("cools down for 15s after a clean exit", () => {
    writeState();
    const agent = makeAgent();
    agent.tick();
    launches[0]?.handle.finish({ code: 0, signal: null });

    advance(1);
    agent.tick();
    expect(agent.activeLogins()).toEqual([]);
    expect(readSessionLocks(locksDir)).toEqual([]);
    expect(agent.retryState("alpha")).toEqual({
      attempts: 0,
      nextAttemptAt: new Date(now.getTime() + 15_000),
    });

    advance(14);
    agent.tick();
    expect(launches).toHaveLength(1);

    advance(1);
    agent.tick();
    expect(launches).toHaveLength(2);
  });

  it("backs off after a failed exit and logs the stderr", () => {
    writeState();
    const agent = makeAgent();
    agent.tick();
    const first = launches[0]?.handle;
    if (first) first.stderr = "error: No playable streams found";
    first?.finish({ code: 1, signal: null });

    agent.tick();

    expect(agent.retryState("alpha")).toEqual({
      attempts: 1,
      nextAttemptAt: new Date(now.getTime() + 10_000),
    });
    expect(logger.warn).toHaveBeenCalledWith(
      "Recording failed for alpha (status 1): error: No playable streams found"
    );

    advance(10);
    agent.tick();
    expect(launches).toHaveLength(2);
    // A successful launch resets the attempt count
    launches[1]?.handle.finish({ code: 1, signal: null });
    agent.tick();
    expect(agent.retryState("alpha")).toEqual({
      attempts: 1,
      nextAttemptAt: new Date(now.getTime() + 10_000),
    });
  });

  it("backs off when the launch itself fails", () => {
    writeState();
    failLaunch = true;
    const agent = makeAgent();

    agent.tick();

    expect(agent.activeLogins()).toEqual([]);
    expect(agent.retryState("alpha")?.attempts).toBe(1);
    expect(logger.error).toHaveBeenCalledWith(
      "Failed to start recording for alpha: spawn EACCES"
    );
  });

  it("terminates sessions that are no longer desired and reaps them next tick", () => {
    writeState({ channels: [{ login: "alpha" }, { login: "beta" }] });
    const agent = makeAgent();
    agent.tick();
    expect(agent.activeLogins()).toEqual(["alpha", "beta"]);

    writeState({ channels: [{ login: "alpha" }] });
    agent.tick();
    const beta = launches.find((l) => l.args[0] === "https://twitch.tv/beta");
    expect(beta?.handle.terminateCalls).toBe(1);
    expect(agent.activeLogins()).toEqual(["alpha", "beta"]);

    agent.tick();
    expect(agent.activeLogins()).toEqual(["alpha"]);
    expect(readSessionLocks(locksDir).map((l) => l.login)).toEqual(["alpha"]);
  });

  it("stops everything and launches nothing when disabled", () => {
    writeState();
    const agent = makeAgent();
    agent.tick();

    writeState({ enabled: false });
    agent.tick();

    expect(launches[0]?.handle.terminateCalls).toBe(1);
    advance(600);
    agent.tick();
    expect(launches).toHaveLength(1);
    expect(agent.activeLogins()).toEqual([]);
  });

  it("keeps the previous state when the file fails to decode", () => {
    writeState();
    const agent = makeAgent();
    agent.tick();

    fs.writeFileSync(stateFile, "{ not json");
    mtime += 10;
    fs.utimesSync(stateFile, mtime, mtime);
    agent.tick();

    expect(agent.desiredState.enabled).toBe(true);
    expect(agent.desiredState.channels).toEqual([{ login: "alpha" }]);
    expect(logger.error).toHaveBeenCalledWith(
      expect.stringMatching(/^Failed to load config: invalid JSON/)
    );
  });

  it("does not launch without a capture tool", () => {
    writeState();
    tool = null;
    const agent = makeAgent();

    agent.tick();

    expect(launches).toEqual([]);
    expect(logger.error).toHaveBeenCalledWith("Capture tool not found");
  });

  it("does nothing until a desired-state file exists", () => {
    const agent = makeAgent();
    agent.tick();
    expect(launches).toEqual([]);
    expect(agent.desiredState.enabled).toBe(false);
  });

  it("terminates sessions and removes locks on stop", () => {
    writeState({ channels: [{ login: "alpha" }, { login: "beta" }] });
    const agent = makeAgent();
    agent.tick();

    agent.stop();

    expect(launches.map((l) => l.handle.terminateCalls)).toEqual([1, 1]);
    expect(readSessionLocks(locksDir)).toEqual([]);
    expect(agent.activeLogins()).toEqual([]);
  });
});
