/**
 * Self-update of deckhand's own git checkout.
 *
 * A successful pull never restarts anything here: the outcome asks the CLI
 * boundary to relaunch once all other work is done.
 */

import { stat } from "node:fs/promises";
import { join } from "node:path";
import type { GitEngine } from "../git/engine.js";
import type { CommandRunner } from "../exec/runner.js";
import type { Reporter } from "../events/reporter.js";
import type { EventLogger } from "../events/logger.js";
import type { SelfUpdateConfig } from "../schemas/config.js";
import type { RunOptions } from "./context.js";
import { formatCommand } from "../exec/runner.js";

export type SelfUpdateOutcome =
  | { kind: "skipped" }
  | { kind: "up-to-date" }
  | { kind: "restart-requested"; from: string; to: string }
  | { kind: "failed"; message: string };

export interface SelfUpdateDeps {
  git: GitEngine;
  runner: CommandRunner;
  reporter: Reporter;
  events: EventLogger;
  installDir: string;
  config: SelfUpdateConfig;
  version: string;
}

export async function selfUpdate(deps: SelfUpdateDeps, options: Pick<RunOptions, "internalRecursive">): Promise<SelfUpdateOutcome> {
  const { git, reporter, installDir, version } = deps;

  if (options.internalRecursive) {
    reporter.success(`Successfully updated deckhand to ${version}.`);
    return { kind: "skipped" };
  }

  if (!(await git.isWorkingCopy(installDir))) {
    return fail(reporter, `${installDir} is not a git checkout, cannot self-update.`);
  }

  reporter.info("Fetching updates ...");
  const outcome = await git.pull(installDir, deps.config.repoUrl);
  switch (outcome.kind) {
    case "failed":
      return fail(reporter, outcome.message);
    case "up-to-date":
      reporter.success(`deckhand is already up to date (${version})!`);
      return { kind: "up-to-date" };
    case "updated":
      break;
  }

  reporter.success(`Self-update complete from ${outcome.from} to ${outcome.to}`);

  if (await hasPackageJson(installDir)) {
    for (const [command, ...args] of deps.config.postUpdateCommands) {
      if (command === undefined) continue;
      reporter.info(`Running \`${formatCommand(command, args)}\` ...`);
      const result = await deps.runner.run(command, args, { cwd: installDir, stdio: "inherit" });
      if (result.exitCode !== 0) {
        return fail(reporter, `\`${formatCommand(command, args)}\` failed with exit code ${result.exitCode}`);
      }
    }
  }

  await deps.events.log("manager.self_updated", undefined, { from: outcome.from, to: outcome.to });
  reporter.info("Restarting deckhand ...");
  return { kind: "restart-requested", from: outcome.from, to: outcome.to };
}

function fail(reporter: Reporter, message: string): SelfUpdateOutcome {
  reporter.error(message);
  reporter.error("Failed to update deckhand.");
  return { kind: "failed", message };
}

async function hasPackageJson(dir: string): Promise<boolean> {
  return stat(join(dir, "package.json")).then(s => s.isFile(), () => false);
}
