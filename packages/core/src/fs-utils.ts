/**
 * File helpers shared by the state files both schedulers write.
 */

import * as fs from "node:fs";
import * as path from "node:path";
import { randomUUID } from "node:crypto";

/**
 * Write a file atomically: write a sibling temp file, then rename over
 * the target. Creates parent directories if needed.
 */
export function writeFileAtomic(
  filePath: string,
  data: string | Uint8Array,
  mode?: number
): void {
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  const tempPath = `${filePath}.tmp-${process.pid}-${randomUUID()}`;
  try {
    fs.writeFileSync(tempPath, data, mode === undefined ? undefined : { mode });
    fs.renameSync(tempPath, filePath);
  } catch (error) {
    fs.rmSync(tempPath, { force: true });
    throw error;
  }
}

/** Write pretty-printed JSON atomically */
export function writeJsonFileAtomic(filePath: string, data: unknown): void {
  writeFileAtomic(filePath, JSON.stringify(data, null, 2) + "\n");
}

/** Compare two paths after resolving them */
export function isSamePath(a: string, b: string): boolean {
  return path.resolve(a) === path.resolve(b);
}

/** Directory beside a recording that holds deleted files */
export const TRASH_DIRNAME = ".trash";

/**
 * Move a file into the .trash directory beside it and return its new
 * path. A name already taken in the trash gets a short random suffix.
 */
export function moveToTrash(filePath: string): string {
  const trashDir = path.join(path.dirname(filePath), TRASH_DIRNAME);
  fs.mkdirSync(trashDir, { recursive: true });

  let destination = path.join(trashDir, path.basename(filePath));
  if (fs.existsSync(destination)) {
    const ext = path.extname(filePath);
    const stem = path.basename(filePath, ext);
    destination = path.join(trashDir, `${stem}-${randomUUID().slice(0, 8)}${ext}`);
  }
  fs.renameSync(filePath, destination);
  return destination;
}
