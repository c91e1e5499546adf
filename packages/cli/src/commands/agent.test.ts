import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { getDaemonPaths, readDesiredState, type Config } from "@channel-recorder/core";
import { agentSyncCommand, buildSyncState, parseChannelEvents } from "./agent.js";

describe("parseChannelEvents", () => {
  it("fills in missing flags as false", () => {
    expect(parseChannelEvents([{ login: "alpha", isLive: true }])).toEqual([
      { login: "alpha", isLive: true, pinned: false, followed: false },
    ]);
  });

  it("keeps display names", () => {
    expect(
      parseChannelEvents([{ login: "alpha", displayName: "Alpha", isLive: true, pinned: true }])
    ).toEqual([
      { login: "alpha", displayName: "Alpha", isLive: true, pinned: true, followed: false },
    ]);
  });

  it("names the bad field", () => {
    expect(() => parseChannelEvents({})).toThrow("events must be an array");
    expect(() => parseChannelEvents([{ isLive: true }])).toThrow("events[0].login must be a string");
    expect(() => parseChannelEvents([{ login: "a" }, { login: "b", pinned: "yes" }])).toThrow(
      "events[1].pinned must be a boolean"
    );
  });
});

describe("buildSyncState", () => {
  let dir: string;
  let config: Config;

  function writeEvents(events: unknown): string {
    const file = path.join(dir, "events.json");
    fs.writeFileSync(file, JSON.stringify(events));
    return file;
  }

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "cli-agent-"));
    config = {
      listenPort: 8790,
      dbPath: path.join(dir, "db.sqlite"),
      recordingsDir: path.join(dir, "recordings"),
      captureToolPath: "/opt/tools/streamlink",
      remuxToolPath: null,
      quality: "720p",
      maxConcurrentRecordings: 2,
      encryptRecordings: false,
      retention: { maxAgeDays: 0, keepLastGlobal: 0, keepLastPerChannel: 0 },
      apiToken: null,
      resumeRecordings: false,
    };
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("normalizes explicit channels", () => {
    const state = buildSyncState({ channel: ["Beta", "alpha", " beta "] }, config);

    expect(state).toEqual({
      version: 1,
      enabled: true,
      captureToolPath: "/opt/tools/streamlink",
      recordingsDirectory: path.join(dir, "recordings"),
      quality: "720p",
      pollIntervalSeconds: 25,
      channels: [{ login: "alpha" }, { login: "beta" }],
    });
  });

  it("is disabled without channels", () => {
    expect(buildSyncState({}, config).enabled).toBe(false);
  });

  it("honours --disable", () => {
    expect(buildSyncState({ channel: ["alpha"], disable: true }, config).enabled).toBe(false);
  });

  it("picks live channels through the auto-record policy", () => {
    const events = writeEvents([
      { login: "alpha", isLive: true, pinned: true },
      { login: "beta", isLive: true, followed: true },
      { login: "gamma", isLive: false, pinned: true },
      { login: "delta", isLive: true, pinned: true },
    ]);

    const state = buildSyncState({ events, mode: "onlyPinned", block: ["DELTA"] }, config);

    expect(state.channels).toEqual([{ login: "alpha" }]);
  });

  it("uses the allowlist in customAllowlist mode", () => {
    const events = writeEvents([
      { login: "alpha", isLive: true },
      { login: "beta", isLive: true },
    ]);

    const state = buildSyncState(
      { events, mode: "customAllowlist", allow: ["beta"], channel: ["omega"] },
      config
    );

    expect(state.channels.map((c) => c.login)).toEqual(["beta", "omega"]);
  });

  it("rejects an unknown mode", () => {
    const events = writeEvents([]);
    expect(() => buildSyncState({ events, mode: "everything" }, config)).toThrow(
      "Unknown auto-record mode: everything"
    );
  });

  it("rejects a bad poll interval", () => {
    expect(() => buildSyncState({ poll: "0" }, config)).toThrow(
      "poll interval must be a positive number of seconds"
    );
    expect(buildSyncState({ poll: "60" }, config).pollIntervalSeconds).toBe(60);
  });
});

describe("agentSyncCommand", () => {
  let home: string;
  let originalHome: string | undefined;

  beforeEach(() => {
    home = fs.mkdtempSync(path.join(os.tmpdir(), "cli-agent-home-"));
    originalHome = process.env["CR_HOME"];
    process.env["CR_HOME"] = home;
    vi.spyOn(console, "log").mockImplementation(() => {});
  });

  afterEach(() => {
    if (originalHome === undefined) {
      delete process.env["CR_HOME"];
    } else {
      process.env["CR_HOME"] = originalHome;
    }
    vi.restoreAllMocks();
    fs.rmSync(home, { recursive: true, force: true });
  });

  it("writes the desired-state file and reports an unchanged rewrite", async () => {
    await agentSyncCommand({ channel: ["alpha"] });

    const file = getDaemonPaths().agent.desiredStateFile;
    expect(file).toBe(path.join(home, "background", "config.json"));
    const state = readDesiredState(file);
    expect(state.enabled).toBe(true);
    expect(state.channels).toEqual([{ login: "alpha" }]);

    await agentSyncCommand({ channel: ["alpha"] });
    expect(console.log).toHaveBeenCalledWith("Desired state unchanged.");
  });
});
