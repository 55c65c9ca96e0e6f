/**
 * The `deckhand` commander program: global options plus every command group.
 */

import { Command, Option } from "commander";
import { ConsoleReporter } from "../events/reporter.js";
import { describeError } from "../errors.js";
import { createRuntime, type GlobalOptions, type Runtime, type RuntimeOverrides } from "./runtime.js";
import { registerProjectCommands } from "./commands/project.js";
import { registerLifecycleCommands } from "./commands/lifecycle.js";
import { registerUpdateCommands } from "./commands/update.js";
import { registerConfigCommands } from "./commands/config-commands.js";

export interface Cli {
  program: Command;
  /** Set when a self-update finished and the command line should run again. */
  relaunchRequested: boolean;
}

/** What command actions get from the program. */
export interface CliHost {
  globalOptions(): GlobalOptions;
  /**
   * Assemble a runtime and run `action`. Thrown errors are reported; a thrown
   * error or a false result sets a non-zero exit code.
   */
  run(action: (rt: Runtime) => Promise<boolean>): Promise<void>;
  requestRelaunch(): void;
}

export function createCli(overrides: RuntimeOverrides = {}): Cli {
  const program = new Command();
  const cli: Cli = { program, relaunchRequested: false };

  program
    .name("deckhand")
    .description("Enable, run and update container stacks, systemd services and script bundles")
    .option("--root <dir>", "Root directory (default: $DECKHAND_ROOT or the install directory)")
    .option("-q, --quiet", "Never prompt; skip what would need an answer", false)
    .option("-f, --force", "Skip confirmations", false)
    .option("-s, --no-status-check", "Confirm start/stop/restart with a single status check")
    .option("-n, --number-of-lines <lines>", "Log lines to show, or f/follow (default: follow, or logLines for several projects)")
    .addOption(new Option("--internal-recursive").hideHelp().default(false));

  const globalOptions = (): GlobalOptions => {
    const opts = program.opts();
    return {
      root: typeof opts["root"] === "string" ? opts["root"] : undefined,
      quiet: opts["quiet"] === true,
      force: opts["force"] === true,
      statusCheck: opts["statusCheck"] !== false,
      numberOfLines: typeof opts["numberOfLines"] === "string" ? opts["numberOfLines"] : undefined,
      internalRecursive: opts["internalRecursive"] === true,
    };
  };

  const host: CliHost = {
    globalOptions,
    async run(action) {
      const reporter = overrides.reporter ?? new ConsoleReporter();
      try {
        const rt = await createRuntime(globalOptions(), overrides);
        if (!(await action(rt))) process.exitCode = 1;
      } catch (err) {
        reporter.error(describeError(err));
        process.exitCode = 1;
      }
    },
    requestRelaunch() {
      cli.relaunchRequested = true;
    },
  };

  registerProjectCommands(program, host);
  registerLifecycleCommands(program, host);
  registerUpdateCommands(program, host);
  registerConfigCommands(program, host);
  return cli;
}
