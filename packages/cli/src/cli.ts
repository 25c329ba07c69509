#!/usr/bin/env node

/**
 * slotbank CLI entry point
 */

import { processIO } from "./lib/io.js";
import { runCli } from "./program.js";

process.exitCode = await runCli(process.argv.slice(2), processIO);
