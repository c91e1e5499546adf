/**
 * Command tree of the channel-recorder CLI.
 */

import { Command } from "commander";
import { startCommand } from "./commands/start.js";
import { stopCommand } from "./commands/stop.js";
import { statusCommand } from "./commands/status.js";
import { logsCommand } from "./commands/logs.js";
import {
  recordStartCommand,
  recordStopCommand,
  recordToggleCommand,
} from "./commands/record.js";
import {
  recordingsDeleteCommand,
  recordingsHistoryCommand,
  recordingsListCommand,
  recordingsMigrateCommand,
  recordingsPlayCommand,
  recordingsPruneCommand,
} from "./commands/recordings.js";
import {
  agentStartCommand,
  agentStatusCommand,
  agentStopCommand,
  agentSyncCommand,
} from "./commands/agent.js";

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

export function createProgram(): Command {
  const program = new Command();

  program
    .name("channel-recorder")
    .description("Crash-safe channel recording with encrypted storage")
    .version("0.1.0");

  program
    .command("start")
    .description("Start the daemon")
    .option("-e, --env-file <path>", "Load environment variables from file")
    .option("-d, --daemon", "Run in background (daemon mode)")
    .option("-f, --force", "Force restart if already running")
    .action(async (options) => {
      await startCommand(options);
    });

  program
    .command("stop")
    .description("Stop the daemon")
    .option("-f, --force", "Force kill if not responding")
    .action(async (options) => {
      await stopCommand(options);
    });

  program
    .command("status")
    .description("Show daemon status and active recordings")
    .action(async () => {
      await statusCommand();
    });

  program
    .command("logs")
    .description("Show daemon logs")
    .option("-t, --tail <n>", "Show last N lines (default 50)")
    .option("-a, --agent", "Show the background agent's log instead")
    .action(async (options) => {
      await logsCommand(options);
    });

  // Record subcommand group
  const record = program.command("record").description("Control recordings");

  record
    .command("start <target>")
    .description("Start recording a channel (URL or login)")
    .option("-n, --name <name>", "Channel display name used in the filename")
    .option("-q, --quality <quality>", "Stream quality (default from config)")
    .action(async (target, options) => {
      await recordStartCommand(target, options);
    });

  record
    .command("stop [login]")
    .description("Stop one channel, or every recording")
    .action(async (login) => {
      await recordStopCommand(login);
    });

  record
    .command("toggle <target>")
    .description("Stop the channel if it is recording, else start it")
    .option("-n, --name <name>", "Channel display name used in the filename")
    .action(async (target, options) => {
      await recordToggleCommand(target, options);
    });

  // Recordings subcommand group
  const recordings = program.command("recordings").description("Manage the recordings library");

  recordings
    .command("list")
    .description("List recordings, newest first")
    .option("--json", "Print JSON")
    .action(async (options) => {
      await recordingsListCommand(options);
    });

  recordings
    .command("delete <path>")
    .description("Move a recording to the trash")
    .action(async (file) => {
      await recordingsDeleteCommand(file);
    });

  recordings
    .command("migrate")
    .description("Encrypt plaintext recordings")
    .action(async () => {
      await recordingsMigrateCommand();
    });

  recordings
    .command("prune")
    .description("Apply the retention policy now")
    .action(async () => {
      await recordingsPruneCommand();
    });

  recordings
    .command("play <name>")
    .description("Prepare a recording for playback and print its path")
    .action(async (name) => {
      await recordingsPlayCommand(name);
    });

  recordings
    .command("history")
    .description("Show recording history")
    .option("-c, --channel <login>", "Filter by channel")
    .option(
      "-s, --status <status>",
      "Filter by status (recording|completed|failed|stopped|interrupted)"
    )
    .option("-l, --limit <n>", "Maximum rows (default 100)")
    .action(async (options) => {
      await recordingsHistoryCommand(options);
    });

  // Agent subcommand group
  const agent = program.command("agent").description("Control the background recorder agent");

  agent
    .command("start")
    .description("Start the background agent")
    .action(async () => {
      await agentStartCommand();
    });

  agent
    .command("stop")
    .description("Stop the background agent")
    .option("-f, --force", "Force kill if not responding")
    .action(async (options) => {
      await agentStopCommand(options);
    });

  agent
    .command("status")
    .description("Show agent state and its recordings")
    .action(async () => {
      await agentStatusCommand();
    });

  agent
    .command("sync")
    .description("Write the desired state the agent follows")
    .option("-c, --channel <login>", "Channel to keep recording (repeatable)", collect, [])
    .option("--events <file>", "JSON array of channel events for the auto-record policy")
    .option(
      "-m, --mode <mode>",
      "Auto-record mode (onlyPinned|onlyFollowed|pinnedAndFollowed|customAllowlist)"
    )
    .option("--allow <login>", "Allowlisted channel (repeatable)", collect, [])
    .option("--block <login>", "Blocklisted channel (repeatable)", collect, [])
    .option("--disable", "Disable the agent")
    .option("-q, --quality <quality>", "Stream quality")
    .option("-p, --poll <seconds>", "Desired-state poll interval")
    .action(async (options) => {
      await agentSyncCommand(options);
    });

  return program;
}
