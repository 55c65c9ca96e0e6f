/**
 * Configuration commands.
 */

import { join } from "node:path";
import type { Command } from "commander";
import type { CliHost } from "../program.js";
import { CONFIG_FILE_NAME, getConfigValue, resolveRoot, setConfigValue } from "../../config/manager.js";
import { describeError } from "../../errors.js";

/**
 * Register configuration management commands. These read deckhand.yaml
 * directly, so they still work when the file does not validate.
 */
export function registerConfigCommands(program: Command, host: CliHost): void {
  const config = program
    .command("config")
    .description("Configuration management (deckhand.yaml)");

  const configPath = (): string => join(resolveRoot(host.globalOptions().root), CONFIG_FILE_NAME);

  config
    .command("get <key>")
    .description("Get config value (dot-notation, defaults included)")
    .action(async (key: string) => {
      try {
        const value = await getConfigValue(configPath(), key);
        if (value === undefined) {
          console.log(`Key '${key}' not found`);
          process.exitCode = 1;
        } else {
          console.log(typeof value === "object" ? JSON.stringify(value, null, 2) : String(value));
        }
      } catch (err) {
        console.error(`❌ ${describeError(err)}`);
        process.exitCode = 1;
      }
    });

  config
    .command("set <key> <value>")
    .description("Set config value (validates + atomic write)")
    .option("--dry-run", "Preview change without applying", false)
    .action(async (key: string, value: string, opts: { dryRun: boolean }) => {
      try {
        const result = await setConfigValue(configPath(), key, value, opts.dryRun);

        if (opts.dryRun) {
          console.log(`[DRY RUN] Would update ${key}:`);
        } else if (result.issues.length > 0) {
          console.log("❌ Config change rejected:");
        } else {
          console.log(`✅ Config updated: ${key}`);
        }

        const fmt = (v: unknown) => v === undefined ? "undefined" : typeof v === "object" ? JSON.stringify(v) : String(v);
        console.log(`  ${key}: ${fmt(result.change.oldValue)} → ${fmt(result.change.newValue)}`);

        if (result.issues.length > 0) {
          console.log("\nIssues:");
          for (const issue of result.issues) console.log(`  ✗ ${issue}`);
          process.exitCode = 1;
        }
      } catch (err) {
        console.error(`❌ ${describeError(err)}`);
        process.exitCode = 1;
      }
    });
}
