/**
 * Lifecycle orchestrator: the uniform enable / disable / start / stop /
 * restart / update life-cycle over every backend.
 *
 * The only persisted state is the record's `enabled` flag. Running state is
 * always observed from the backend, never stored.
 */

import { basename, join, resolve } from "node:path";
import { lstat, mkdir, rm, stat, unlink } from "node:fs/promises";
import type { ProjectStore } from "../store/project-store.js";
import type { CredentialSource, GitEngine } from "../git/engine.js";
import type { Reporter } from "../events/reporter.js";
import type { Prompter } from "../prompts/prompter.js";
import type { EventLogger } from "../events/logger.js";
import type { StatusCheckConfig } from "../schemas/config.js";
import type { AuthMode, ProjectRecord } from "../schemas/project.js";
import type { Backend, RunningState, StepResult } from "../backends/types.js";
import type { DanglingImageCollector } from "../backends/container.js";
import { selectBackend, type BackendSelection, type Backends } from "../backends/index.js";
import { COMPOSE_FILE_SUFFIX } from "../backends/container.js";
import { SERVICE_FILE_EXTENSION } from "../backends/service-unit.js";
import { backupPaths } from "../backends/artifact.js";
import { fatal, ok } from "../backends/types.js";
import { isProjectType } from "../schemas/project.js";
import { githubRepoUrl } from "../git/remote-url.js";
import { AlreadyExistsError, DeckhandError, ValidationError } from "../errors.js";
import { validateProjectId } from "../store/project-store.js";
import { confirmState, type Sleep } from "./poller.js";
import { prepareWorkspace } from "./workspace.js";
import { createProjectContext, type LogLines, type ProjectContext, type RunOptions } from "./context.js";

export interface OrchestratorDeps {
  store: ProjectStore;
  backends: Backends;
  git: GitEngine;
  credentials: CredentialSource;
  reporter: Reporter;
  prompter: Prompter;
  events: EventLogger;
  statusCheck: StatusCheckConfig;
  /** Name shown in hints such as "run `deckhand start x`". */
  commandName?: string;
  /** Base for relative paths given to `add`. */
  cwd?: string;
  sleep?: Sleep;
}

export interface AddProjectInput {
  id?: string;
  /** `owner/repo` on GitHub or a full clone URL. */
  repo?: string;
  subPath?: string;
  auth?: AuthMode["mode"];
  token?: string;
  path?: string;
  type?: string;
}

export interface StatusViewOptions {
  /** Include the backend's native status output. */
  detailed: boolean;
}

type Target = { ctx: ProjectContext; selection: BackendSelection };
type Supported = Exclude<BackendSelection, { kind: "unsupported" }>;

export class LifecycleOrchestrator {
  private readonly store: ProjectStore;
  private readonly backends: Backends;
  private readonly git: GitEngine;
  private readonly credentials: CredentialSource;
  private readonly reporter: Reporter;
  private readonly prompter: Prompter;
  private readonly events: EventLogger;
  private readonly statusCheck: StatusCheckConfig;
  private readonly commandName: string;
  private readonly cwd: string;
  private readonly sleep?: Sleep;

  constructor(deps: OrchestratorDeps) {
    this.store = deps.store;
    this.backends = deps.backends;
    this.git = deps.git;
    this.credentials = deps.credentials;
    this.reporter = deps.reporter;
    this.prompter = deps.prompter;
    this.events = deps.events;
    this.statusCheck = deps.statusCheck;
    this.commandName = deps.commandName ?? "deckhand";
    this.cwd = deps.cwd ?? process.cwd();
    this.sleep = deps.sleep;
  }

  // ---------------------------------------------------------------------------
  // enable / disable
  // ---------------------------------------------------------------------------

  /**
   * Prepare the working copy and install the backend. Failure leaves the
   * project disabled; re-enabling a running project restarts it.
   */
  async enable(id: string, options: RunOptions): Promise<boolean> {
    const { ctx, selection } = await this.target(id, options);
    const wasEnabled = ctx.record.enabled;

    const installed = await this.settle(() => this.install(ctx, selection));
    if (installed.kind !== "success") {
      this.reporter.error(installed.message);
      this.reporter.error(
        `Install failed with project ${id}, ${wasEnabled ? "disabling project" : "project remains disabled"}`,
      );
      await this.store.save({ ...ctx.record, enabled: false });
      await this.events.log("project.enable_failed", id, { reason: installed.message });
      return false;
    }
    // install only succeeds for supported types
    if (selection.kind === "unsupported") return false;

    if (wasEnabled) {
      this.reporter.success(`Successfully re-installed project ${id}, it was already enabled.`);
    } else {
      await this.store.save({ ...ctx.record, enabled: true });
      this.reporter.success(`Successfully installed and enabled project ${id}.`);
    }
    await this.events.log("project.enabled", id, { reinstalled: wasEnabled });

    if (wasEnabled && (await selection.backend.status(ctx)) === "running") {
      this.reporter.info(`Restarting project ${id} now.`);
      return this.restartTarget(ctx, selection);
    }
    this.reporter.info(`You can now start it with \`${this.commandName} start ${id}\`.`);
    return true;
  }

  /**
   * Uninstall and mark disabled. The flag is cleared even when uninstall
   * reports a problem; that problem surfaces as a warning.
   */
  async disable(id: string, options: RunOptions): Promise<boolean> {
    const { ctx, selection } = await this.target(id, options);
    if (!ctx.record.enabled) {
      this.reporter.warn("Already disabled, skipping.");
      return true;
    }

    let uninstallProblem: string | undefined;
    if (selection.kind === "unsupported") {
      this.reporter.warn(`Unknown or unsupported type '${selection.type}', skipping uninstall.`);
    } else {
      const result = await this.settle(() => selection.backend.uninstall(ctx));
      if (result.kind !== "success") {
        uninstallProblem = result.message;
        this.reporter.warn(`Uninstall did not complete cleanly: ${result.message}`);
      }
    }

    await this.store.save({ ...ctx.record, enabled: false });
    const verb = selection.kind === "unsupported" ? "disabled" : "uninstalled and disabled";
    this.reporter.success(`Successfully ${verb} project ${id}.`);
    await this.events.log("project.disabled", id, uninstallProblem ? { uninstallProblem } : {});
    return true;
  }

  // ---------------------------------------------------------------------------
  // start / stop / restart
  // ---------------------------------------------------------------------------

  async start(id: string, options: RunOptions): Promise<boolean> {
    const { ctx, selection } = await this.target(id, options);
    if (!ctx.record.enabled) {
      this.reporter.warn("Not enabled, skipping start.");
      return true;
    }
    const supported = this.supported(selection, "start");
    if (!supported) return false;

    if (await this.skipRedundant(ctx, supported.backend, "running")) return true;
    return this.trigger(ctx, supported.backend, "start");
  }

  /** Allowed while disabled, so a leftover running instance can be stopped. */
  async stop(id: string, options: RunOptions): Promise<boolean> {
    const { ctx, selection } = await this.target(id, options);
    const supported = this.supported(selection, "stop");
    if (!supported) return false;

    if (await this.skipRedundant(ctx, supported.backend, "stopped")) return true;
    return this.trigger(ctx, supported.backend, "stop");
  }

  async restart(id: string, options: RunOptions): Promise<boolean> {
    const { ctx, selection } = await this.target(id, options);
    if (!ctx.record.enabled) {
      this.reporter.warn("Not enabled, skipping restart.");
      return true;
    }
    if (!this.supported(selection, "restart")) return false;
    return this.restartTarget(ctx, selection);
  }

  // ---------------------------------------------------------------------------
  // update
  // ---------------------------------------------------------------------------

  /**
   * Pull new code (or run update.sh), refresh container images, install again
   * and restart when the project was running beforehand. A disabled project
   * is neither installed nor restarted, the same rule `restart` applies.
   */
  async update(id: string, options: RunOptions, dangling: DanglingImageCollector): Promise<boolean> {
    const { ctx, selection } = await this.target(id, options);
    const supported = this.supported(selection, "update");
    if (!supported) return false;

    const backend = supported.backend;
    const wasRunning = backend.observable && (await backend.status(ctx)) === "running";
    let failed = false;

    if (await this.backends.projectScripts.exists(ctx.record.path, "update.sh")) {
      const script = await this.backends.projectScripts.run(ctx.record.path, "update.sh");
      if (script.kind !== "success") {
        this.reporter.error(script.message);
        return false;
      }
    } else {
      const pulled = await this.pullRepository(ctx);
      if (pulled.kind !== "success") {
        this.reporter.error(pulled.message);
        return false;
      }
      if (supported.kind === "container") {
        const images = await this.guard(() => supported.backend.pullImages(ctx, dangling));
        if (images.kind === "fatal") {
          this.reporter.error(images.message);
          return false;
        }
        if (images.kind === "recoverable") {
          this.reporter.error(images.message);
          failed = true;
        }
        if (!dangling.isEmpty) {
          this.reporter.info("Obsolete (dangling) images will be listed at the end of the update(s).");
        }
      }
    }

    if (!ctx.record.enabled) {
      this.reporter.info("Project is disabled, skipping install.");
    } else {
      const installed = await this.install(ctx, supported);
      if (installed.kind !== "success") {
        this.reporter.error(installed.message);
        this.reporter.error("Post-update install failed. Skipping restart.");
        return false;
      }
    }

    this.reporter.success("Update complete.");
    let restarted = false;
    if (!wasRunning) {
      this.reporter.info("Project was not running, skipping restart.");
    } else if (!ctx.record.enabled) {
      this.reporter.warn("Not enabled, skipping restart.");
    } else {
      this.reporter.info("Restarting project after update ...");
      restarted = await this.restartTarget(ctx, supported);
      failed ||= !restarted;
    }

    await this.events.log("project.updated", id, { restarted, failed });
    return !failed;
  }

  // ---------------------------------------------------------------------------
  // status / list / logs / shell
  // ---------------------------------------------------------------------------

  async status(id: string, options: RunOptions, view: StatusViewOptions): Promise<boolean> {
    const { ctx, selection } = await this.target(id, options);
    const { record } = ctx;

    this.reporter.info(`Enabled: ${record.enabled ? "✓" : "✗"}`);
    const supported = this.supported(selection, "status");
    if (!supported) return false;

    const backend = supported.backend;
    if (backend.observable) {
      this.reporter.info(`Running: ${formatRunningState(await backend.status(ctx))}`);
    }
    for (const line of await backend.describe(ctx)) this.reporter.info(line);

    this.reporter.info(`Project path: ${record.path}`);
    this.reporter.info(`Repository: ${record.repoUrl}`);
    if (record.subPath) this.reporter.info(`Subdirectory: ${record.subPath}`);
    this.reporter.info(`Authentication: ${describeAuth(record.auth)}`);
    await this.reportGitStatus(ctx, supported.kind === "container");

    if (view.detailed && supported.kind !== "scripts") {
      this.reporter.info("");
      await backend.showNativeStatus(ctx);
    }
    return true;
  }

  /** One line per project: state icon, id, path. */
  async list(id: string, options: RunOptions): Promise<boolean> {
    const { ctx, selection } = await this.target(id, options);
    let icon = "✗";
    if (ctx.record.enabled) {
      const state: RunningState = selection.kind === "unsupported" ? "unknown" : await selection.backend.status(ctx);
      icon = state === "running" ? "✓" : state === "stopped" ? "⏹" : "?";
    }
    this.reporter.info(`${icon} ${id}: ${ctx.record.path}`);
    return true;
  }

  async logs(id: string, options: RunOptions, lines: LogLines): Promise<boolean> {
    const { ctx, selection } = await this.target(id, options);
    const supported = this.supported(selection, "logs");
    if (!supported) return false;
    return this.succeeded(await supported.backend.logs(ctx, lines));
  }

  async shell(id: string, options: RunOptions): Promise<boolean> {
    const { ctx, selection } = await this.target(id, options);
    if (selection.kind !== "container") {
      this.reporter.error("Shell command is only available for container projects.");
      return false;
    }
    if (!ctx.record.enabled) {
      this.reporter.error("Project is not enabled, cannot open shell.");
      return false;
    }
    return this.succeeded(await selection.backend.shell(ctx));
  }

  // ---------------------------------------------------------------------------
  // add / remove
  // ---------------------------------------------------------------------------

  /** Create a record, asking for everything not given up front. */
  async add(input: AddProjectInput): Promise<ProjectRecord> {
    const id = input.id ?? (await this.prompter.input("Project name"));
    validateProjectId(id);
    if (await this.store.exists(id)) {
      throw new AlreadyExistsError(`Project ${id} already exists.`);
    }

    const repoUrl = input.repo ? toRepoUrl(input.repo) : await this.askRepoUrl(id);
    const subPath = input.subPath ?? ((await this.askOptional("Subdirectory inside git repo (default: none)", "")) || undefined);
    const auth = await this.askAuth(input);

    const defaultPath = basename(this.cwd) === id ? this.cwd : join(this.cwd, id);
    const path = resolve(this.cwd, input.path ?? (await this.askOptional(`Project path (default: ${defaultPath})`, defaultPath)));
    const type = input.type ?? (await this.askType());

    const record = await this.store.create({ id, repoUrl, ...(subPath && { subPath }), auth, path, type });
    await this.events.log("project.added", id, { type, repoUrl });
    this.reporter.success(`Successfully added project ${id}.`);
    this.reporter.info(`You can now enable and install it with \`${this.commandName} enable ${id}\`.`);
    return record;
  }

  /**
   * Delete a disabled project's record and artifacts. In subPath mode the
   * private clone is only deleted on request.
   */
  async remove(id: string, options: RunOptions): Promise<boolean> {
    const { ctx } = await this.target(id, options);
    const { record, projectsDir, gitPath } = ctx;
    if (record.enabled) {
      this.reporter.error(`Project ${id} is enabled, please disable it first.`);
      return false;
    }
    if (!options.force && !(await this.prompter.confirm(`Are you sure you want to remove project ${id}?`, false))) {
      this.reporter.info("Cancelled.");
      return true;
    }

    await this.store.delete(id);
    const composePath = join(projectsDir, `${id}${COMPOSE_FILE_SUFFIX}`);
    for (const artifact of [composePath, ...backupPaths(composePath), join(projectsDir, `${id}${SERVICE_FILE_EXTENSION}`)]) {
      await rm(artifact, { force: true });
    }

    if (record.subPath && (await isDirectory(gitPath))) {
      if (this.prompter.interactive && (await this.prompter.confirm(`Do you want to remove the full git repository at ${gitPath}?`, false))) {
        await rm(gitPath, { recursive: true, force: true });
        if (await isSymlink(record.path)) {
          await unlink(record.path);
          await mkdir(record.path, { recursive: true });
          this.reporter.info(`Removed symlink at ${record.path} and created empty directory`);
        }
        this.reporter.info(`Removed git repository at ${gitPath}`);
      } else {
        this.reporter.info(`Git repository at ${gitPath} kept for potential reuse.`);
      }
    }

    await this.events.log("project.removed", id);
    this.reporter.success(`Successfully removed project ${id}.`);
    return true;
  }

  // ---------------------------------------------------------------------------
  // Helpers
  // ---------------------------------------------------------------------------

  private async target(id: string, options: RunOptions): Promise<Target> {
    const record = await this.store.load(id);
    return {
      ctx: createProjectContext(record, this.store.projectsDir, options),
      selection: selectBackend(this.backends, record.type),
    };
  }

  private supported(selection: BackendSelection, verb: string): Supported | undefined {
    if (selection.kind === "unsupported") {
      this.reporter.warn(`Unknown or unsupported type '${selection.type}', skipping ${verb}.`);
      return undefined;
    }
    return selection;
  }

  /** Workspace, then the backend's own install. */
  private async install(ctx: ProjectContext, selection: BackendSelection): Promise<StepResult> {
    if (selection.kind === "unsupported") {
      return fatal(`Unknown or unsupported type '${selection.type}', skipping install.`);
    }
    const workspace = await prepareWorkspace(ctx, {
      git: this.git,
      credentials: this.credentials,
      scripts: this.backends.projectScripts,
      reporter: this.reporter,
    });
    if (workspace.kind !== "success") return workspace;
    return this.guard(() => selection.backend.install(ctx));
  }

  private async pullRepository(ctx: ProjectContext): Promise<StepResult> {
    const { record, gitPath } = ctx;
    if (!(await this.git.isWorkingCopy(gitPath))) {
      this.reporter.warn("Path is not a git repository, skipping git repository update.");
      return ok();
    }

    let url: string;
    try {
      url = await this.git.credentialedUrl(record, this.credentials);
    } catch (err) {
      if (err instanceof DeckhandError) return fatal(err.message);
      throw err;
    }

    this.reporter.info("Fetching updates ...");
    const outcome = await this.git.pull(gitPath, record.auth.mode === "none" ? undefined : url);
    switch (outcome.kind) {
      case "up-to-date":
        this.reporter.success("Git repository is already up to date!");
        return ok();
      case "updated":
        this.reporter.success(
          `Successfully updated git repository from ${outcome.from} to ${outcome.to} (${outcome.commits} commit${outcome.commits === 1 ? "" : "s"})`,
        );
        return ok();
      case "failed":
        return fatal(outcome.message);
    }
  }

  private async reportGitStatus(ctx: ProjectContext, isContainer: boolean): Promise<void> {
    const { record, gitPath } = ctx;
    if (!(await this.git.isWorkingCopy(gitPath))) {
      this.reporter.warn("Git status: Git repository not set up!");
      return;
    }

    let url: string | undefined;
    if (record.auth.mode !== "none") {
      try {
        url = await this.git.credentialedUrl(record, this.credentials);
      } catch (err) {
        if (!(err instanceof DeckhandError)) throw err;
        this.reporter.warn(`Git status: ${err.message}`);
        return;
      }
    }

    const comparison = await this.git.compareUpstream(gitPath, url);
    switch (comparison.kind) {
      case "up-to-date":
        this.reporter.success(`Git status: Up to date!${isContainer ? " (There might be new docker images available though)" : ""}`);
        break;
      case "behind":
        this.reporter.warn(
          `Git status: Update available${comparison.commits !== undefined ? ` (${comparison.commits} commits behind)` : ""}`,
        );
        break;
      case "no-upstream":
        this.reporter.warn("Git status: No upstream configured");
        break;
      case "error":
        this.reporter.warn(`Git status: ${comparison.message}`);
        break;
    }
  }

  /**
   * Ask before triggering a start/stop whose target state is already observed.
   * Resolves true when the trigger should be skipped.
   */
  private async skipRedundant(ctx: ProjectContext, backend: Backend, state: "running" | "stopped"): Promise<boolean> {
    if (!backend.observable || ctx.options.force) return false;
    if ((await backend.status(ctx)) !== state) return false;

    const verb = state === "running" ? "start" : "stop";
    const proceed = !ctx.options.quiet && this.prompter.interactive
      && (await this.prompter.confirm(`Project seems to be ${state}. Trigger ${verb} anyway?`, false));
    if (proceed) return false;
    this.reporter.info(`Already ${state}, skipping ${verb}.`);
    return true;
  }

  private async trigger(ctx: ProjectContext, backend: Backend, verb: "start" | "stop"): Promise<boolean> {
    const result = await this.guard(() => (verb === "start" ? backend.start(ctx) : backend.stop(ctx)));
    if (!this.succeeded(result)) return false;
    return this.confirm(ctx, backend, verb === "start" ? "running" : "stopped", verb);
  }

  private async restartTarget(ctx: ProjectContext, selection: BackendSelection): Promise<boolean> {
    if (selection.kind === "unsupported") return false;
    const result = await this.guard(() => selection.backend.restart(ctx));
    if (!this.succeeded(result)) return false;
    return this.confirm(ctx, selection.backend, "running", "restart");
  }

  /** Poll the backend until the expected state shows up (or the bound runs out). */
  private async confirm(
    ctx: ProjectContext,
    backend: Backend,
    expected: "running" | "stopped",
    verb: "start" | "stop" | "restart",
  ): Promise<boolean> {
    const id = ctx.record.id;
    const past = verb === "stop" ? "stopped" : `${verb}ed`;
    const eventType = verb === "start" ? "project.started" : verb === "stop" ? "project.stopped" : "project.restarted";

    if (!backend.observable) {
      this.reporter.success(`Project ${id} ${past}.`);
      await this.events.log(eventType, id, { confirmed: false });
      return true;
    }

    const confirmation = await confirmState(expected, () => backend.status(ctx), {
      maxAttempts: ctx.options.statusCheck ? this.statusCheck.retries : 0,
      intervalMs: this.statusCheck.intervalMs,
      ...(this.sleep && { sleep: this.sleep }),
    });

    switch (confirmation.outcome) {
      case "confirmed":
        this.reporter.success(`Successfully ${past} project ${id}.`);
        await this.events.log(eventType, id, { confirmed: true, attempts: confirmation.attempts });
        return true;
      case "unknown":
        this.reporter.warn(`Running status unknown for project ${id}.`);
        await this.events.log(eventType, id, { confirmed: false, attempts: confirmation.attempts });
        return true;
      case "timed-out":
        this.reporter.error(
          `Failed to ${verb} project ${id}, still ${expected === "running" ? "not running" : "running"} after ${confirmation.waitedMs}ms timeout.`,
        );
        return false;
    }
  }

  private succeeded(result: StepResult): boolean {
    if (result.kind === "success") return true;
    this.reporter.error(result.message);
    return false;
  }

  /** Turn a deckhand error thrown inside a driver step into a recoverable result. */
  private async guard(step: () => Promise<StepResult>): Promise<StepResult> {
    try {
      return await step();
    } catch (err) {
      if (err instanceof DeckhandError) return { kind: "recoverable", message: err.message };
      throw err;
    }
  }

  /**
   * Like `guard`, but any thrown error becomes a recoverable result. Used where
   * the enabled flag must be written whatever the step did.
   */
  private async settle(step: () => Promise<StepResult>): Promise<StepResult> {
    try {
      return await step();
    } catch (err) {
      return { kind: "recoverable", message: err instanceof Error ? err.message : String(err) };
    }
  }

  private async askRepoUrl(id: string): Promise<string> {
    const owner = await this.prompter.input("GitHub owner");
    const repo = await this.prompter.input(`GitHub repository name (default: ${id})`, id);
    return githubRepoUrl(`${owner}/${repo || id}`);
  }

  private async askAuth(input: AddProjectInput): Promise<AuthMode> {
    let mode = input.auth;
    let token = input.token;
    if (!mode && !this.prompter.interactive) {
      mode = token ? "local" : "none";
    } else if (!mode) {
      if (await this.prompter.confirm("Use the global access token?", false)) {
        mode = "global";
      } else {
        token ??= await this.prompter.secret("Project-specific access token (leave blank to use none)");
        mode = token ? "local" : "none";
      }
    }

    switch (mode) {
      case "none":
        return { mode: "none" };
      case "global":
        return { mode: "global" };
      case "local": {
        const localToken = token || (await this.prompter.secret("Project-specific access token"));
        if (!localToken) throw new ValidationError("A project-specific token is required for local authentication.");
        return { mode: "local", token: localToken };
      }
    }
  }

  /** Questions with a usable default are not asked under --quiet. */
  private async askOptional(message: string, defaultValue: string): Promise<string> {
    return this.prompter.interactive ? this.prompter.input(message, defaultValue) : defaultValue;
  }

  private async askType(): Promise<string> {
    let question = "Project type (container/service/scripts)";
    for (;;) {
      const answer = await this.prompter.input(question);
      if (isProjectType(answer)) return answer;
      question = `Invalid type '${answer}', try again (container/service/scripts)`;
    }
  }
}

export function formatRunningState(state: RunningState): string {
  switch (state) {
    case "running":
      return "Yes";
    case "stopped":
      return "No";
    case "unknown":
      return "Unknown";
  }
}

function describeAuth(auth: AuthMode): string {
  switch (auth.mode) {
    case "global":
      return "Using global access token";
    case "local":
      return "Using project-specific access token";
    case "none":
      return "Public repository or globally configured";
  }
}

/** `owner/repo` shorthand or a full URL. */
function toRepoUrl(repo: string): string {
  return /^[A-Za-z0-9_.-]+\/[A-Za-z0-9_.-]+$/.test(repo) ? githubRepoUrl(repo) : repo;
}

async function isDirectory(path: string): Promise<boolean> {
  return stat(path).then(s => s.isDirectory(), () => false);
}

async function isSymlink(path: string): Promise<boolean> {
  return lstat(path).then(s => s.isSymbolicLink(), () => false);
}
