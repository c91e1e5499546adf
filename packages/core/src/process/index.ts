export {
  WELL_KNOWN_BIN_DIRS,
  isExecutableFile,
  resolveExecutable,
  type ResolveExecutableOptions,
} from "./executable.js";
export {
  spawnProcess,
  describeExit,
  type ExitInfo,
  type ProcessHandle,
  type ProcessLauncher,
} from "./launcher.js";
export { runProcess, type ProcessOutput, type ProcessRunner } from "./run.js";
