export {
  ENCRYPTED_EXTENSION,
  encryptBuffer,
  decryptBuffer,
  generateHashFilename,
  generateKey,
} from "./crypto.js";
export { loadOrCreateKey } from "./key-store.js";
export {
  RecordingVault,
  MANIFEST_FILENAME,
  PLAYBACK_PREFIX,
  PLAINTEXT_EXTENSIONS,
  cleanupTempPlaybackFiles,
  isPlaintextRecording,
  isEncryptedArtifact,
  type EncryptFileResult,
  type MigrationOptions,
  type MigrationResult,
  type RecordingVaultOptions,
} from "./vault.js";
