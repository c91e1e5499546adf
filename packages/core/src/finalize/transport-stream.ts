import * as fs from "node:fs";

const SYNC_BYTE = 0x47;
const PACKET_SIZE = 188;

/**
 * MPEG transport streams are a run of 188-byte packets that each start
 * with the sync byte 0x47. A file counts as one only when the first
 * three packet boundaries (0, 188, 376) all carry it.
 */
export function isTransportStreamFile(filePath: string): boolean {
  const header = Buffer.alloc(PACKET_SIZE * 2 + 1);
  let bytesRead: number;
  try {
    const fd = fs.openSync(filePath, "r");
    try {
      bytesRead = fs.readSync(fd, header, 0, header.length, 0);
    } finally {
      fs.closeSync(fd);
    }
  } catch {
    return false;
  }

  if (bytesRead < header.length) return false;
  return [0, PACKET_SIZE, PACKET_SIZE * 2].every(
    (offset) => header[offset] === SYNC_BYTE
  );
}
