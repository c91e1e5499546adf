/**
 * Encrypted recordings library.
 *
 * Finished recordings are encrypted into <hash>.crvault artifacts whose
 * metadata lives in an encrypted manifest (.recordings-manifest) in the
 * same directory. Playback goes through temporary decrypted copies in
 * the system temp directory, removed on the next startup.
 */

import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import {
  createCipheriv,
  createDecipheriv,
  randomBytes,
  randomUUID,
} from "node:crypto";
import { Readable } from "node:stream";
import { pipeline } from "node:stream/promises";
import { parseRecordingFilename } from "../channels.js";
import {
  DecryptionError,
  errorCode,
  errorMessage,
  ManifestCorruptedError,
  RecordingError,
} from "../errors.js";
import { isSamePath, moveToTrash, writeFileAtomic } from "../fs-utils.js";
import { createLogger, type Logger } from "../logger.js";
import type { RecordingManifest, RecordingManifestEntry } from "../types/index.js";
import {
  ALGORITHM,
  AUTH_TAG_LENGTH,
  decryptBuffer,
  ENCRYPTED_EXTENSION,
  encryptBuffer,
  generateHashFilename,
  NONCE_LENGTH,
} from "./crypto.js";
import { loadOrCreateKey } from "./key-store.js";

export const MANIFEST_FILENAME = ".recordings-manifest";
export const PLAYBACK_PREFIX = "crvault-playback-";

/** Extensions of plaintext recordings eligible for encryption */
export const PLAINTEXT_EXTENSIONS = [".mp4", ".ts"] as const;

export interface EncryptFileResult {
  hashFilename: string;
  entry: RecordingManifestEntry;
}

export interface MigrationResult {
  migrated: number;
  skipped: number;
  failed: number;
}

export interface MigrationOptions {
  /** Runs on each plaintext file before it is encrypted (remux) */
  prepare?: (filePath: string) => Promise<unknown>;
}

export interface RecordingVaultOptions {
  /** Key file, created on first use when missing */
  keyFile?: string;

  /** Fixed key; takes precedence over keyFile */
  key?: Buffer;

  logger?: Logger;
}

export function isPlaintextRecording(filename: string): boolean {
  if (filename.startsWith(".")) return false;
  const ext = path.extname(filename).toLowerCase();
  return PLAINTEXT_EXTENSIONS.some((e) => e === ext);
}

export function isEncryptedArtifact(filename: string): boolean {
  return !filename.startsWith(".") && filename.endsWith(ENCRYPTED_EXTENSION);
}

/** A bare artifact filename, as used for manifest keys */
function isArtifactName(name: string): boolean {
  return path.basename(name) === name && isEncryptedArtifact(name);
}

function isManifestEntry(value: unknown): value is RecordingManifestEntry {
  return (
    typeof value === "object" &&
    value !== null &&
    "channelName" in value &&
    typeof value.channelName === "string" &&
    "date" in value &&
    typeof value.date === "string" &&
    "quality" in value &&
    typeof value.quality === "string" &&
    "originalFilename" in value &&
    typeof value.originalFilename === "string"
  );
}

/** Remove temporary playback copies left by any process */
export function cleanupTempPlaybackFiles(tempDir: string = os.tmpdir()): number {
  let entries: string[];
  try {
    entries = fs.readdirSync(tempDir);
  } catch {
    return 0;
  }
  let removed = 0;
  for (const entry of entries) {
    if (!entry.startsWith(PLAYBACK_PREFIX)) continue;
    try {
      fs.rmSync(path.join(tempDir, entry), { force: true });
      removed++;
    } catch {
      // Held open elsewhere; the next cleanup gets it
    }
  }
  return removed;
}

export class RecordingVault {
  private readonly keyFile: string | undefined;
  private readonly logger: Logger;
  private key: Buffer | null;

  constructor(options: RecordingVaultOptions = {}) {
    if (!options.key && !options.keyFile) {
      throw new Error("RecordingVault needs a key or a key file");
    }
    this.keyFile = options.keyFile;
    this.key = options.key ?? null;
    this.logger = options.logger ?? createLogger("Vault");
  }

  /** 256-bit key, loaded or created once per vault */
  encryptionKey(): Buffer {
    if (this.key === null) {
      if (this.keyFile === undefined) {
        throw new Error("RecordingVault has no key file");
      }
      this.key = loadOrCreateKey(this.keyFile);
    }
    return this.key;
  }

  encrypt(data: Uint8Array): Buffer {
    return encryptBuffer(data, this.encryptionKey());
  }

  decrypt(data: Uint8Array, what = "data"): Buffer {
    return decryptBuffer(data, this.encryptionKey(), what);
  }

  generateHashFilename(originalFilename: string): string {
    return generateHashFilename(originalFilename);
  }

  manifestPath(directory: string): string {
    return path.join(directory, MANIFEST_FILENAME);
  }

  /**
   * Load the manifest of a directory; {} when there is none.
   * Throws ManifestCorruptedError when it can't be decrypted or decoded.
   */
  loadManifest(directory: string): RecordingManifest {
    let payload: Buffer;
    try {
      payload = fs.readFileSync(this.manifestPath(directory));
    } catch (error) {
      if (errorCode(error) === "ENOENT") return {};
      throw error;
    }

    let decoded: unknown;
    try {
      decoded = JSON.parse(this.decrypt(payload, "manifest").toString("utf-8"));
    } catch (error) {
      throw new ManifestCorruptedError({ cause: error });
    }
    if (typeof decoded !== "object" || decoded === null || Array.isArray(decoded)) {
      throw new ManifestCorruptedError();
    }

    const manifest: RecordingManifest = {};
    for (const [name, entry] of Object.entries(decoded)) {
      if (!isManifestEntry(entry)) {
        throw new ManifestCorruptedError();
      }
      if (!isArtifactName(name)) {
        this.logger.warn(`Ignoring manifest entry with invalid name: ${JSON.stringify(name)}`);
        continue;
      }
      manifest[name] = entry;
    }
    return manifest;
  }

  saveManifest(manifest: RecordingManifest, directory: string): void {
    const payload = this.encrypt(Buffer.from(JSON.stringify(manifest), "utf-8"));
    writeFileAtomic(this.manifestPath(directory), payload, 0o600);
  }

  /**
   * Encrypt a plaintext recording into <directory>/<hash>.crvault and
   * delete the plaintext. Does not touch the manifest.
   */
  async encryptFile(
    filePath: string,
    directory: string,
    metadata: Partial<RecordingManifestEntry> = {}
  ): Promise<EncryptFileResult> {
    const originalFilename = path.basename(filePath);
    const entry = this.describe(filePath, metadata);
    const hashFilename = this.generateHashFilename(originalFilename);
    const destination = path.join(directory, hashFilename);
    const tempPath = `${destination}.tmp-${randomUUID()}`;

    const nonce = randomBytes(NONCE_LENGTH);
    const cipher = createCipheriv(ALGORITHM, this.encryptionKey(), nonce, {
      authTagLength: AUTH_TAG_LENGTH,
    });

    fs.mkdirSync(directory, { recursive: true });
    try {
      await pipeline(
        fs.createReadStream(filePath),
        async function* (source: AsyncIterable<Buffer>) {
          yield nonce;
          for await (const chunk of source) {
            const encrypted = cipher.update(chunk);
            if (encrypted.length > 0) yield encrypted;
          }
          const tail = cipher.final();
          if (tail.length > 0) yield tail;
          yield cipher.getAuthTag();
        },
        fs.createWriteStream(tempPath, { mode: 0o600 })
      );
      fs.renameSync(tempPath, destination);
    } catch (error) {
      fs.rmSync(tempPath, { force: true });
      throw error;
    }

    fs.rmSync(filePath, { force: true });
    return { hashFilename, entry };
  }

  /**
   * Decrypt an artifact into destination. A failed decryption removes
   * the partial output and throws DecryptionError.
   */
  async decryptFile(
    name: string,
    directory: string,
    destination: string
  ): Promise<void> {
    const source = this.artifactPath(name, directory);
    const size = fs.statSync(source).size;
    if (size < NONCE_LENGTH + AUTH_TAG_LENGTH) {
      throw new DecryptionError(name);
    }

    const header = Buffer.alloc(NONCE_LENGTH);
    const tag = Buffer.alloc(AUTH_TAG_LENGTH);
    const fd = fs.openSync(source, "r");
    try {
      fs.readSync(fd, header, 0, NONCE_LENGTH, 0);
      fs.readSync(fd, tag, 0, AUTH_TAG_LENGTH, size - AUTH_TAG_LENGTH);
    } finally {
      fs.closeSync(fd);
    }

    const decipher = createDecipheriv(ALGORITHM, this.encryptionKey(), header, {
      authTagLength: AUTH_TAG_LENGTH,
    });
    decipher.setAuthTag(tag);

    const ciphertextEnd = size - AUTH_TAG_LENGTH - 1;
    const input =
      ciphertextEnd >= NONCE_LENGTH
        ? fs.createReadStream(source, { start: NONCE_LENGTH, end: ciphertextEnd })
        : Readable.from([]);

    fs.mkdirSync(path.dirname(destination), { recursive: true });
    try {
      await pipeline(input, decipher, fs.createWriteStream(destination, { mode: 0o600 }));
    } catch (error) {
      fs.rmSync(destination, { force: true });
      throw new DecryptionError(name, { cause: error });
    }
  }

  /** Encrypt a finished recording and record it in the manifest */
  async archiveRecording(
    filePath: string,
    directory: string,
    metadata: Partial<RecordingManifestEntry> = {}
  ): Promise<EncryptFileResult> {
    // Load first: a corrupted manifest must stop us before the plaintext goes
    this.loadManifest(directory);
    const result = await this.encryptFile(filePath, directory, metadata);
    this.updateManifest(directory, (manifest) => {
      manifest[result.hashFilename] = result.entry;
    });
    return result;
  }

  /**
   * Encrypt every top-level plaintext recording in directory except the
   * outputs of running sessions. The manifest is saved after each file;
   * a failing file is logged and counted, the rest continue.
   */
  async migrateUnencryptedRecordings(
    directory: string,
    activeOutputPaths: readonly string[] = [],
    options: MigrationOptions = {}
  ): Promise<MigrationResult> {
    const result: MigrationResult = { migrated: 0, skipped: 0, failed: 0 };

    let entries: fs.Dirent[];
    try {
      entries = fs.readdirSync(directory, { withFileTypes: true });
    } catch (error) {
      if (errorCode(error) === "ENOENT") return result;
      throw error;
    }

    this.loadManifest(directory);

    for (const entry of entries) {
      if (!entry.isFile() || !isPlaintextRecording(entry.name)) continue;

      const filePath = path.join(directory, entry.name);
      if (activeOutputPaths.some((active) => isSamePath(active, filePath))) {
        result.skipped++;
        continue;
      }

      try {
        await options.prepare?.(filePath);
        const encrypted = await this.encryptFile(filePath, directory);
        this.updateManifest(directory, (manifest) => {
          manifest[encrypted.hashFilename] = encrypted.entry;
        });
        result.migrated++;
      } catch (error) {
        result.failed++;
        this.logger.error(`Failed to encrypt ${entry.name}: ${errorMessage(error)}`);
      }
    }

    if (result.migrated > 0 || result.failed > 0) {
      this.logger.info(
        `Migration finished: ${result.migrated} migrated, ${result.skipped} skipped, ${result.failed} failed`
      );
    }
    return result;
  }

  /** Delete an artifact and its manifest entry */
  removeEncryptedRecording(name: string, directory: string): void {
    const artifact = this.artifactPath(name, directory);
    this.loadManifest(directory);
    fs.rmSync(artifact, { force: true });
    this.updateManifest(directory, (manifest) => {
      delete manifest[name];
    });
  }

  /**
   * Move an artifact into the .trash directory beside it. Its manifest
   * entry moves to the manifest of the trash directory. Returns the
   * artifact's new path.
   */
  trashEncryptedRecording(name: string, directory: string): string {
    const artifact = this.artifactPath(name, directory);
    const entry = this.loadManifest(directory)[name];
    const destination = moveToTrash(artifact);

    if (entry) {
      this.updateManifest(path.dirname(destination), (trash) => {
        trash[path.basename(destination)] = entry;
      });
      this.updateManifest(directory, (manifest) => {
        delete manifest[name];
      });
    }
    return destination;
  }

  /** Decrypt an artifact into a fresh temp file for playback */
  async createPlaybackCopy(
    name: string,
    directory: string,
    tempDir: string = os.tmpdir()
  ): Promise<string> {
    const entry = this.loadManifest(directory)[name];
    const ext = entry ? path.extname(entry.originalFilename) || ".mp4" : ".mp4";
    const destination = path.join(tempDir, `${PLAYBACK_PREFIX}${randomUUID()}${ext}`);
    await this.decryptFile(name, directory, destination);
    return destination;
  }

  /**
   * Reload, change and save a manifest. Synchronous, so concurrent
   * archive and migration calls never save from a stale copy.
   */
  private updateManifest(
    directory: string,
    change: (manifest: RecordingManifest) => void
  ): void {
    const manifest = this.loadManifest(directory);
    change(manifest);
    this.saveManifest(manifest, directory);
  }

  private artifactPath(name: string, directory: string): string {
    if (!isArtifactName(name)) {
      throw new RecordingError(`Recording file not found: ${name}`, "not_found");
    }
    const artifact = path.join(directory, name);
    if (!fs.existsSync(artifact)) {
      throw new RecordingError(`Recording file not found: ${name}`, "not_found");
    }
    return artifact;
  }

  private describe(
    filePath: string,
    metadata: Partial<RecordingManifestEntry>
  ): RecordingManifestEntry {
    const originalFilename = path.basename(filePath);
    const parsed = parseRecordingFilename(originalFilename);
    const date =
      metadata.date ??
      parsed?.recordedAt.toISOString() ??
      fs.statSync(filePath).mtime.toISOString();
    return {
      channelName:
        metadata.channelName ??
        parsed?.channelName ??
        path.basename(originalFilename, path.extname(originalFilename)),
      date,
      quality: metadata.quality ?? "unknown",
      originalFilename: metadata.originalFilename ?? originalFilename,
    };
  }
}
