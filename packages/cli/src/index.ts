#!/usr/bin/env -S node --import tsx
/**
 * @channel-recorder/cli
 *
 * CLI for Channel Recorder.
 * Commands: start, stop, status, logs, record, recordings, agent
 */

import { createProgram } from "./program.js";

await createProgram().parseAsync();
