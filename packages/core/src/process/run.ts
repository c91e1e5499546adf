/**
 * Run a short-lived tool to completion.
 */

import { spawn } from "node:child_process";
import { ProcessExecutionError } from "../errors.js";

export interface ProcessOutput {
  exitCode: number;
  stdout: string;
  stderr: string;
}

export type ProcessRunner = (
  executable: string,
  args: readonly string[]
) => Promise<ProcessOutput>;

/**
 * Run a process, draining stdout and stderr fully.
 * Rejects with ProcessExecutionError on nonzero exit (or death by signal)
 * and with the spawn error when the executable can't be started.
 */
export const runProcess: ProcessRunner = (executable, args) =>
  new Promise((resolve, reject) => {
    const child = spawn(executable, [...args], {
      stdio: ["ignore", "pipe", "pipe"],
      shell: false,
    });

    const stdout: Buffer[] = [];
    const stderr: Buffer[] = [];
    child.stdout.on("data", (chunk: Buffer) => stdout.push(chunk));
    child.stderr.on("data", (chunk: Buffer) => stderr.push(chunk));

    child.once("error", reject);
    child.once("close", (code) => {
      const output: ProcessOutput = {
        exitCode: code ?? -1,
        stdout: Buffer.concat(stdout).toString("utf-8"),
        stderr: Buffer.concat(stderr).toString("utf-8"),
      };
      if (output.exitCode === 0) {
        resolve(output);
      } else {
        reject(
          new ProcessExecutionError(
            executable,
            output.exitCode,
            output.stdout,
            output.stderr
          )
        );
      }
    });
  });
