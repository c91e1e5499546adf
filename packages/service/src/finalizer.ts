/**
 * Post-processing for ended sessions: remux transport streams, encrypt
 * when a vault is configured, then apply the retention policy.
 * Every step logs its own failure and the next step still runs.
 *
 * Recordings the daemon did not start (the background agent's) are
 * picked up by sweep(), which runs at startup and on an interval.
 */

import * as fs from "node:fs";
import * as path from "node:path";
import {
  IntegrityError,
  RemuxToolNotFoundError,
  createLogger,
  enforceRetention,
  errorMessage,
  isPlaintextRecording,
  isSamePath,
  prepareRecordingForPlayback,
  type Logger,
  type MigrationResult,
  type PrepareRecordingOptions,
  type RecordingVault,
  type RetentionPolicy,
  type RetentionResult,
} from "@channel-recorder/core";
import type { RecordingSessionInfo } from "./session-manager.js";

export interface RecordingFinalizerOptions {
  recordingsDir: string;
  retention: RetentionPolicy;

  /** Encryption at rest is on when a vault is given */
  vault?: RecordingVault | null;

  remuxToolPath?: string | null;

  /** Outputs still being written, excluded from retention */
  activeOutputPaths?: () => string[];

  /** Overrides for the remux step */
  remux?: Pick<PrepareRecordingOptions, "runner" | "resolveTool">;

  logger?: Logger;
}

export interface FinalizeResult {
  remuxed: boolean;

  /** Artifact filename when the recording was encrypted */
  encryptedAs: string | null;

  retention: RetentionResult | null;
}

export interface SweepResult {
  /** Files remuxed during the sweep */
  remuxed: number;

  /** Null when encryption is off */
  migration: MigrationResult | null;

  retention: RetentionResult | null;
}

export const SWEEP_INTERVAL_MS = 60_000;

export class RecordingFinalizer {
  private readonly options: RecordingFinalizerOptions;
  private readonly logger: Logger;

  /** Outputs of sessions being finalized right now */
  private readonly finalizing = new Set<string>();

  private sweeping: Promise<SweepResult> | null = null;
  private timer: NodeJS.Timeout | null = null;

  constructor(options: RecordingFinalizerOptions) {
    this.options = options;
    this.logger = options.logger ?? createLogger("Finalizer");
  }

  async finalize(session: RecordingSessionInfo): Promise<FinalizeResult> {
    const result: FinalizeResult = { remuxed: false, encryptedAs: null, retention: null };

    this.finalizing.add(session.outputPath);
    try {
      if (fs.existsSync(session.outputPath)) {
        result.remuxed = await this.remux(session.outputPath);
        result.encryptedAs = await this.encrypt(session);
      } else {
        this.logger.warn(`No output written for ${session.channelLogin}`);
      }
    } finally {
      this.finalizing.delete(session.outputPath);
    }

    result.retention = this.applyRetention();
    return result;
  }

  /**
   * Remux and encrypt every finished plaintext recording in the
   * recordings directory. Returns null when encryption is off.
   */
  async migrate(): Promise<MigrationResult | null> {
    return this.migrateWith(async (filePath) => {
      await this.remux(filePath);
    });
  }

  /**
   * Finalize recordings nobody has finalized yet, then apply retention.
   * A sweep already running is joined, not repeated.
   */
  sweep(): Promise<SweepResult> {
    if (this.sweeping === null) {
      this.sweeping = this.runSweep().finally(() => {
        this.sweeping = null;
      });
    }
    return this.sweeping;
  }

  /** Sweep now and then every intervalMs until stopSweeping() */
  startSweeping(intervalMs: number = SWEEP_INTERVAL_MS): void {
    if (this.timer) return;
    const run = () => {
      this.sweep().catch((error: unknown) => this.logFailure("Sweep failed", error));
    };
    run();
    this.timer = setInterval(run, intervalMs);
  }

  /** Stop the interval and wait for a sweep in progress */
  async stopSweeping(): Promise<void> {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    await this.sweeping;
  }

  /** Retention pass on its own (manual prune) */
  applyRetention(): RetentionResult | null {
    try {
      return enforceRetention({
        directory: this.options.recordingsDir,
        policy: this.options.retention,
        vault: this.options.vault ?? undefined,
        activeOutputPaths: this.busyPaths(),
        logger: this.logger,
      });
    } catch (error) {
      this.logFailure("Retention failed", error);
      return null;
    }
  }

  private async runSweep(): Promise<SweepResult> {
    const result: SweepResult = { remuxed: 0, migration: null, retention: null };
    const prepare = async (filePath: string) => {
      if (await this.remux(filePath)) result.remuxed++;
    };

    try {
      if (this.options.vault) {
        result.migration = await this.migrateWith(prepare);
      } else {
        for (const filePath of this.pendingRecordings()) {
          await prepare(filePath);
        }
      }
    } catch (error) {
      this.logFailure("Sweep failed", error);
    }

    result.retention = this.applyRetention();
    return result;
  }

  private async migrateWith(
    prepare: (filePath: string) => Promise<void>
  ): Promise<MigrationResult | null> {
    const vault = this.options.vault;
    if (!vault) return null;
    return vault.migrateUnencryptedRecordings(
      this.options.recordingsDir,
      this.busyPaths(),
      { prepare }
    );
  }

  /** Outputs still being written or finalized */
  private busyPaths(): string[] {
    return [...(this.options.activeOutputPaths?.() ?? []), ...this.finalizing];
  }

  /** Top-level plaintext recordings that are not busy */
  private pendingRecordings(): string[] {
    const dir = this.options.recordingsDir;
    if (!fs.existsSync(dir)) return [];
    const busy = this.busyPaths();
    return fs
      .readdirSync(dir, { withFileTypes: true })
      .filter((entry) => entry.isFile() && isPlaintextRecording(entry.name))
      .map((entry) => path.join(dir, entry.name))
      .filter((filePath) => !busy.some((p) => isSamePath(p, filePath)));
  }

  private async remux(outputPath: string): Promise<boolean> {
    try {
      const prepared = await prepareRecordingForPlayback(outputPath, {
        remuxToolPath: this.options.remuxToolPath ?? null,
        ...this.options.remux,
      });
      if (prepared.didRemux) {
        this.logger.info(`Remuxed ${path.basename(outputPath)}`);
      }
      return prepared.didRemux;
    } catch (error) {
      if (error instanceof RemuxToolNotFoundError) {
        this.logger.warn(`${error.message}; keeping ${path.basename(outputPath)} as is`);
      } else {
        this.logFailure(`Remux failed for ${path.basename(outputPath)}`, error);
      }
      return false;
    }
  }

  private async encrypt(session: RecordingSessionInfo): Promise<string | null> {
    const vault = this.options.vault;
    if (!vault) return null;

    try {
      const { hashFilename } = await vault.archiveRecording(
        session.outputPath,
        path.dirname(session.outputPath),
        {
          channelName: session.channelName,
          date: session.startedAt,
          quality: session.quality,
        }
      );
      this.logger.info(`Encrypted ${path.basename(session.outputPath)} as ${hashFilename}`);
      return hashFilename;
    } catch (error) {
      this.logFailure(`Encryption failed for ${path.basename(session.outputPath)}`, error);
      return null;
    }
  }

  private logFailure(context: string, error: unknown): void {
    if (error instanceof IntegrityError) {
      this.logger.error(`${context}: integrity failure: ${error.message}`);
    } else {
      this.logger.error(`${context}: ${errorMessage(error)}`);
    }
  }
}
