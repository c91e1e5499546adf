/**
 * Master key file: 32 random bytes, base64, mode 0600.
 */

import * as fs from "node:fs";
import { errorCode, IntegrityError } from "../errors.js";
import { writeFileAtomic } from "../fs-utils.js";
import { generateKey, KEY_LENGTH } from "./crypto.js";

/**
 * Load the key from keyFile, creating it when missing.
 * A key file of the wrong length is an integrity failure; it is never
 * replaced, since every artifact depends on it.
 */
export function loadOrCreateKey(keyFile: string): Buffer {
  let raw: string;
  try {
    raw = fs.readFileSync(keyFile, "utf-8");
  } catch (error) {
    if (errorCode(error) !== "ENOENT") throw error;
    const key = generateKey();
    writeFileAtomic(keyFile, key.toString("base64") + "\n", 0o600);
    return key;
  }

  const key = Buffer.from(raw.trim(), "base64");
  if (key.length !== KEY_LENGTH) {
    throw new IntegrityError(`Encryption key file ${keyFile} is invalid`);
  }
  return key;
}
