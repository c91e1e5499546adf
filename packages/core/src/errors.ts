/**
 * Error classes for recording orchestration.
 *
 * RecordingError covers recoverable conditions that are reported to the
 * caller and leave no state behind. IntegrityError and its subclasses
 * mean an encrypted artifact or the manifest could not be read back;
 * callers must surface them, never drop them.
 */

export type RecordingErrorCode =
  | "invalid_target"
  | "already_recording"
  | "concurrency_limit"
  | "capture_tool_missing"
  | "recordings_directory"
  | "in_progress"
  | "spawn_failed"
  | "history_unavailable"
  | "not_found";

export class RecordingError extends Error {
  readonly code: RecordingErrorCode;

  constructor(message: string, code: RecordingErrorCode) {
    super(message);
    this.name = "RecordingError";
    this.code = code;
  }
}

export class RemuxToolNotFoundError extends Error {
  constructor(detail = "FFmpeg was not found in PATH or well-known locations") {
    super(`Remux tool not found: ${detail}`);
    this.name = "RemuxToolNotFoundError";
  }
}

/** Nonzero exit from an external tool, with its captured output */
export class ProcessExecutionError extends Error {
  readonly exitCode: number;
  readonly stdout: string;
  readonly stderr: string;

  constructor(
    executable: string,
    exitCode: number,
    stdout: string,
    stderr: string
  ) {
    const detail = stderr.trim() || stdout.trim();
    super(
      detail
        ? `${executable} exited with status ${exitCode}: ${detail}`
        : `${executable} exited with status ${exitCode}`
    );
    this.name = "ProcessExecutionError";
    this.exitCode = exitCode;
    this.stdout = stdout;
    this.stderr = stderr;
  }
}

export class IntegrityError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "IntegrityError";
  }
}

export class DecryptionError extends IntegrityError {
  constructor(what: string, options?: { cause?: unknown }) {
    super(`Failed to decrypt ${what}. The data may be corrupted or the key is wrong.`, options);
    this.name = "DecryptionError";
  }
}

export class ManifestCorruptedError extends IntegrityError {
  constructor(options?: { cause?: unknown }) {
    super(
      "The recordings manifest could not be read. Recordings metadata may be lost.",
      options
    );
    this.name = "ManifestCorruptedError";
  }
}

/** Extract a printable message from an unknown thrown value */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/** Node system error code (ENOENT, EEXIST, ...) of a thrown value */
export function errorCode(error: unknown): string | undefined {
  if (typeof error === "object" && error !== null && "code" in error) {
    const { code } = error;
    return typeof code === "string" ? code : undefined;
  }
  return undefined;
}
