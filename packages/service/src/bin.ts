#!/usr/bin/env -S node --import tsx
import { startDaemon } from "./index.js";

startDaemon({ daemon: true }).catch((error) => {
  console.error("Failed to start daemon:", error);
  process.exit(1);
});
