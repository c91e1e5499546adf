#!/usr/bin/env -S node --import tsx
import { runAgentCli } from "./cli.js";

runAgentCli(process.argv.slice(2));
