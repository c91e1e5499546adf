/**
 * Record commands - start, stop and toggle recordings in the daemon.
 */

import { createApiClient, describeApiFailure } from "../api.js";

export interface RecordStartOptions {
  name?: string;
  quality?: string;
}

interface StartResponse {
  started: boolean;
  outputPath: string | null;
}

interface ToggleResponse {
  recording: boolean;
}

export async function recordStartCommand(
  target: string,
  options: RecordStartOptions = {}
): Promise<void> {
  try {
    const result = await createApiClient().post<StartResponse>("/api/recording/start", {
      target,
      channelName: options.name,
      quality: options.quality,
    });
    console.log(`Recording started: ${result.outputPath ?? target}`);
  } catch (error) {
    console.error(`Failed to start recording: ${describeApiFailure(error)}`);
    process.exit(1);
  }
}

export async function recordStopCommand(channelLogin?: string): Promise<void> {
  try {
    await createApiClient().post(
      "/api/recording/stop",
      channelLogin ? { channelLogin } : {}
    );
    console.log(channelLogin ? `Stopping ${channelLogin}.` : "Stopping all recordings.");
  } catch (error) {
    console.error(`Failed to stop recording: ${describeApiFailure(error)}`);
    process.exit(1);
  }
}

export async function recordToggleCommand(
  target: string,
  options: Pick<RecordStartOptions, "name"> = {}
): Promise<void> {
  try {
    const result = await createApiClient().post<ToggleResponse>("/api/recording/toggle", {
      target,
      channelName: options.name,
    });
    console.log(result.recording ? "Recording started." : "Recording stopping.");
  } catch (error) {
    console.error(`Failed to toggle recording: ${describeApiFailure(error)}`);
    process.exit(1);
  }
}
