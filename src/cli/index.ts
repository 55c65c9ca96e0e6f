#!/usr/bin/env node
/**
 * deckhand CLI entry point.
 */

import { fileURLToPath } from "node:url";
import { createCli } from "./program.js";
import { relaunch } from "./relaunch.js";

const cli = createCli();
await cli.program.parseAsync(process.argv);

if (cli.relaunchRequested) {
  process.exitCode = await relaunch(fileURLToPath(import.meta.url), process.argv.slice(2));
}
