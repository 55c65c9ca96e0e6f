/**
 * Wiring for one CLI invocation: global options in, a fully assembled set of
 * collaborators out.
 */

import { readFile } from "node:fs/promises";
import { join } from "node:path";
import Docker from "dockerode";
import { z } from "zod";
import type { CommandRunner } from "../exec/runner.js";
import type { Prompter } from "../prompts/prompter.js";
import type { Reporter } from "../events/reporter.js";
import type { Sleep } from "../lifecycle/poller.js";
import type { LogLines, RunOptions } from "../lifecycle/context.js";
import { ProcessRunner } from "../exec/runner.js";
import { InquirerPrompter, NonInteractivePrompter } from "../prompts/prompter.js";
import { ConsoleReporter } from "../events/reporter.js";
import { EventLogger } from "../events/logger.js";
import { installDir, loadConfig, resolveRoot, type ResolvedConfig } from "../config/manager.js";
import { ProjectStore } from "../store/project-store.js";
import { GlobalCredentialStore } from "../store/credential.js";
import { GitEngine } from "../git/engine.js";
import { createBackends, type Backends } from "../backends/index.js";
import { LifecycleOrchestrator } from "../lifecycle/orchestrator.js";
import { ValidationError } from "../errors.js";

/** Options commander collects on the root program. */
export interface GlobalOptions {
  root?: string;
  quiet?: boolean;
  force?: boolean;
  statusCheck?: boolean;
  numberOfLines?: string;
  internalRecursive?: boolean;
}

/** Collaborators tests replace with in-process stand-ins. */
export interface RuntimeOverrides {
  runner?: CommandRunner;
  docker?: Docker;
  prompter?: Prompter;
  reporter?: Reporter;
  sleep?: Sleep;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  installDir?: string;
  /** `User=` for generated service units. */
  serviceUser?: string;
}

export interface Runtime {
  config: ResolvedConfig;
  options: RunOptions;
  installDir: string;
  runner: CommandRunner;
  prompter: Prompter;
  reporter: Reporter;
  events: EventLogger;
  store: ProjectStore;
  credentials: GlobalCredentialStore;
  git: GitEngine;
  backends: Backends;
  orchestrator: LifecycleOrchestrator;
}

export async function createRuntime(global: GlobalOptions, overrides: RuntimeOverrides = {}): Promise<Runtime> {
  const env = overrides.env ?? process.env;
  const config = await loadConfig(resolveRoot(global.root, env));
  const options: RunOptions = {
    quiet: global.quiet ?? false,
    force: global.force ?? false,
    statusCheck: global.statusCheck ?? true,
    logLines: parseLogLines(global.numberOfLines),
    internalRecursive: global.internalRecursive ?? false,
  };

  const runner = overrides.runner ?? new ProcessRunner();
  const reporter = overrides.reporter ?? new ConsoleReporter();
  const prompter = overrides.prompter ?? (options.quiet ? new NonInteractivePrompter() : new InquirerPrompter());
  const onWarning = (warning: { message: string }): void => reporter.warn(warning.message);
  const serviceUser = overrides.serviceUser ?? env["USER"];

  const events = new EventLogger(config.eventsDir);
  const store = new ProjectStore({ projectsDir: config.projectsDir, wildcardMarker: config.wildcardMarker, onWarning });
  const credentials = new GlobalCredentialStore({ filePath: config.globalCredentialFile, prompter, onWarning });
  const git = new GitEngine(runner, { trustedHosts: config.trustedHosts });
  const backends = createBackends({
    runner,
    docker: overrides.docker ?? new Docker(),
    reporter,
    prompter,
    defaultDockerImage: config.defaultDockerImage,
    systemdDir: config.systemdDir,
    ...(serviceUser && { user: serviceUser }),
  });
  const orchestrator = new LifecycleOrchestrator({
    store,
    backends,
    git,
    credentials,
    reporter,
    prompter,
    events,
    statusCheck: config.statusCheck,
    ...(overrides.cwd && { cwd: overrides.cwd }),
    ...(overrides.sleep && { sleep: overrides.sleep }),
  });

  return {
    config,
    options,
    installDir: overrides.installDir ?? installDir(),
    runner,
    prompter,
    reporter,
    events,
    store,
    credentials,
    git,
    backends,
    orchestrator,
  };
}

/**
 * `-n` value: a positive count, or `f` / `follow`. Unset means follow.
 *
 * @throws ValidationError for anything else
 */
export function parseLogLines(value: string | undefined): LogLines {
  if (value === undefined || value === "f" || value === "follow") return "follow";
  if (/^\d+$/.test(value) && parseInt(value, 10) > 0) return parseInt(value, 10);
  throw new ValidationError(`Invalid number of lines '${value}' (expected a positive number, f or follow)`);
}

const PackageManifest = z.object({ version: z.string() });

/** Version from the install directory's package.json ("unknown" when unreadable). */
export async function readVersion(dir: string): Promise<string> {
  try {
    const parsed = PackageManifest.safeParse(JSON.parse(await readFile(join(dir, "package.json"), "utf-8")));
    return parsed.success ? parsed.data.version : "unknown";
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code === "ENOENT") return "unknown";
    throw err;
  }
}
