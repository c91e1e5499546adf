/**
 * Tests for daemon paths and PID file utilities.
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "node:fs";
import * as path from "node:path";
import * as os from "node:os";
import {
  getDaemonPaths,
  getAgentPaths,
  readPidFile,
  writePidFile,
  removePidFile,
  isProcessRunning,
  checkProcessStatus,
} from "./daemon-paths.js";

describe("getDaemonPaths", () => {
  const originalHome = process.env["CR_HOME"];

  afterEach(() => {
    if (originalHome === undefined) {
      delete process.env["CR_HOME"];
    } else {
      process.env["CR_HOME"] = originalHome;
    }
  });

  it("returns paths in home directory", () => {
    delete process.env["CR_HOME"];
    const paths = getDaemonPaths();
    const base = path.join(os.homedir(), ".channel-recorder");

    expect(paths.baseDir).toBe(base);
    expect(paths.pidFile).toBe(path.join(base, "channel-recorder.pid"));
    expect(paths.lockFile).toBe(path.join(base, "channel-recorder.lock"));
    expect(paths.logFile).toBe(path.join(base, "channel-recorder.log"));
    expect(paths.dbFile).toBe(path.join(base, "channel-recorder.sqlite"));
    expect(paths.keyFile).toBe(path.join(base, "recording.key"));
    expect(paths.agent.desiredStateFile).toBe(
      path.join(base, "background", "config.json")
    );
  });

  it("honours CR_HOME", () => {
    process.env["CR_HOME"] = "/srv/recorder";
    expect(getDaemonPaths().pidFile).toBe("/srv/recorder/channel-recorder.pid");
  });
});

describe("getAgentPaths", () => {
  it("places the lock directory beside the desired-state file", () => {
    const paths = getAgentPaths("/data/agent/config.json");
    expect(paths).toEqual({
      dir: "/data/agent",
      desiredStateFile: "/data/agent/config.json",
      activeSessionsDir: "/data/agent/ActiveSessions",
      pidFile: "/data/agent/agent.pid",
      lockFile: "/data/agent/agent.lock",
      logFile: "/data/agent/agent.log",
    });
  });
});

describe("PID file operations", () => {
  let tempDir: string;
  let pidFilePath: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), "cr-test-"));
    pidFilePath = path.join(tempDir, "test.pid");
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  describe("readPidFile", () => {
    it("returns null when file does not exist", () => {
      expect(readPidFile(pidFilePath)).toBeNull();
    });

    it("returns null for non-numeric content", () => {
      fs.writeFileSync(pidFilePath, "not-a-number");
      expect(readPidFile(pidFilePath)).toBeNull();
    });

    it("returns null for negative numbers", () => {
      fs.writeFileSync(pidFilePath, "-123");
      expect(readPidFile(pidFilePath)).toBeNull();
    });

    it("trims whitespace", () => {
      fs.writeFileSync(pidFilePath, "  12345  \n");
      expect(readPidFile(pidFilePath)).toBe(12345);
    });
  });

  describe("writePidFile", () => {
    it("creates parent directory if needed", () => {
      const nestedPath = path.join(tempDir, "nested", "dir", "test.pid");
      writePidFile(12345, nestedPath);
      expect(fs.readFileSync(nestedPath, "utf-8")).toBe("12345");
    });

    it("overwrites existing file", () => {
      writePidFile(11111, pidFilePath);
      writePidFile(22222, pidFilePath);
      expect(fs.readFileSync(pidFilePath, "utf-8")).toBe("22222");
    });
  });

  describe("removePidFile", () => {
    it("removes existing file", () => {
      fs.writeFileSync(pidFilePath, "12345");
      removePidFile(pidFilePath);
      expect(fs.existsSync(pidFilePath)).toBe(false);
    });

    it("does not throw when file does not exist", () => {
      expect(() => removePidFile(pidFilePath)).not.toThrow();
    });
  });

  describe("checkProcessStatus", () => {
    it("returns not running when no PID file", () => {
      expect(checkProcessStatus(pidFilePath)).toEqual({
        running: false,
        pid: null,
      });
    });

    it("returns running for current process PID", () => {
      fs.writeFileSync(pidFilePath, String(process.pid));
      expect(checkProcessStatus(pidFilePath)).toEqual({
        running: true,
        pid: process.pid,
      });
    });

    it("returns not running for stale PID", () => {
      fs.writeFileSync(pidFilePath, "999999999");
      expect(checkProcessStatus(pidFilePath)).toEqual({
        running: false,
        pid: null,
      });
    });
  });
});

describe("isProcessRunning", () => {
  it("returns true for current process", () => {
    expect(isProcessRunning(process.pid)).toBe(true);
  });

  it("returns false for non-existent PID", () => {
    expect(isProcessRunning(999999999)).toBe(false);
  });
});
