#!/usr/bin/env node
import "dotenv/config";
import { startCLI } from "./cli/index.js";

startCLI().catch((error: unknown) => {
  console.error(error);
  process.exit(1);
});
