/**
 * Service backend: a systemd unit per project, unit name = project id.
 *
 * The unit is enabled by linking `<systemdDir>/<id>.service` to the managed
 * artifact. Stop leaves the link in place, so a stopped unit can come back
 * after a reboot; only uninstall removes it.
 */

import { lstat, readlink, realpath, symlink, unlink } from "node:fs/promises";
import { join } from "node:path";
import type { CommandResult, CommandRunner } from "../exec/runner.js";
import { askEnvironment, type Prompter } from "../prompts/prompter.js";
import type { Reporter } from "../events/reporter.js";
import type { LogLines, ProjectContext } from "../lifecycle/context.js";
import { openInEditor } from "../prompts/editor.js";
import { NotFoundError } from "../errors.js";
import { locateArtifact, previewGenerated, selectArtifact, writeArtifact } from "./artifact.js";
import { DEFAULT_SERVICE_FILE, SERVICE_FILE_EXTENSION, generateServiceUnit } from "./service-unit.js";
import { ok, recoverable, type Backend, type RunningState, type StepResult } from "./types.js";

export interface ServiceBackendDeps {
  runner: CommandRunner;
  reporter: Reporter;
  prompter: Prompter;
  /** Directory systemd loads units from. */
  systemdDir: string;
  /** `User=` for generated units. */
  user?: string;
}

type LinkState = "linked" | "missing" | "dangling" | "conflict";

export class ServiceBackend implements Backend {
  readonly kind = "service" as const;
  readonly observable = true;

  private readonly runner: CommandRunner;
  private readonly reporter: Reporter;
  private readonly prompter: Prompter;
  private readonly systemdDir: string;
  private readonly user?: string;

  constructor(deps: ServiceBackendDeps) {
    this.runner = deps.runner;
    this.reporter = deps.reporter;
    this.prompter = deps.prompter;
    this.systemdDir = deps.systemdDir;
    this.user = deps.user;
  }

  unitPath(ctx: ProjectContext): string {
    return join(ctx.projectsDir, `${ctx.record.id}${SERVICE_FILE_EXTENSION}`);
  }

  linkPath(ctx: ProjectContext): string {
    return join(this.systemdDir, `${ctx.record.id}${SERVICE_FILE_EXTENSION}`);
  }

  async install(ctx: ProjectContext): Promise<StepResult> {
    const { id, path } = ctx.record;
    const unitPath = this.unitPath(ctx);

    try {
      await selectArtifact(
        {
          label: "service file",
          managedPath: unitPath,
          candidates: [join(path, `${id}${SERVICE_FILE_EXTENSION}`), join(path, DEFAULT_SERVICE_FILE)],
          generate: () => this.generate(ctx, unitPath),
          missingHint: this.prompter.interactive ? undefined : "To generate a service file, run this command without -q.",
        },
        this.reporter,
      );
    } catch (err) {
      if (err instanceof NotFoundError) return recoverable(err.message);
      throw err;
    }

    const link = this.linkPath(ctx);
    const state = await this.linkState(ctx);
    switch (state) {
      case "conflict":
        return recoverable(`A service file already exists at ${link}, cannot install ${id}.`);
      case "linked":
        this.reporter.info(`Service file ${link} already linked to ${unitPath}`);
        break;
      case "dangling":
      case "missing":
        if (state === "dangling") await unlink(link);
        await symlink(unitPath, link);
        this.reporter.info(`Linked service file ${link} to ${unitPath}`);
        break;
    }

    return this.daemonReload();
  }

  async start(ctx: ProjectContext): Promise<StepResult> {
    return this.trigger(ctx, "start");
  }

  async stop(ctx: ProjectContext): Promise<StepResult> {
    return this.trigger(ctx, "stop");
  }

  async restart(ctx: ProjectContext): Promise<StepResult> {
    return this.trigger(ctx, "restart");
  }

  async status(ctx: ProjectContext): Promise<RunningState> {
    if (!(await this.isInstalled(ctx))) return "unknown";
    const result = await this.systemctl(["is-active", ctx.record.id]);
    return result.stdout.trim() === "active" ? "running" : "stopped";
  }

  async uninstall(ctx: ProjectContext): Promise<StepResult> {
    const id = ctx.record.id;

    if (!(await this.isInstalled(ctx))) {
      const known = await this.systemctl(["status", id]);
      if (known.exitCode === 0) {
        this.reporter.warn(
          `No valid project service file found, but found systemd service ${id}! There might be another service with the same name!`,
        );
      } else {
        this.reporter.warn("No valid service file and no systemd service found, possibly already uninstalled.");
      }
    } else {
      this.reporter.info(`Stopping systemd service ${id} ...`);
      const stopped = await this.systemctl(["stop", id]);
      if (stopped.exitCode !== 0) {
        this.reporter.warn(`systemctl stop ${id} failed with exit code ${stopped.exitCode}`);
      }
      await unlink(this.linkPath(ctx));
      this.reporter.info(`Removed service file link ${this.linkPath(ctx)}.`);
    }

    return this.daemonReload();
  }

  async logs(ctx: ProjectContext, lines: LogLines): Promise<StepResult> {
    if (!(await this.isInstalled(ctx))) return recoverable("No valid service file found, cannot show logs.");
    const args = ["-u", ctx.record.id, ...(lines === "follow" ? ["-f"] : ["-n", String(lines)])];
    const result = await this.runner.run("journalctl", args, { stdio: "inherit" });
    return result.exitCode === 0 ? ok() : recoverable(`journalctl failed with exit code ${result.exitCode}`);
  }

  async describe(ctx: ProjectContext): Promise<string[]> {
    if (!(await this.isInstalled(ctx))) return ["Service file: Not found"];
    const unitPath = this.unitPath(ctx);
    const target = (await lstat(unitPath)).isSymbolicLink() ? ` (→ ${await readlink(unitPath)})` : "";
    return [`Service file: ${unitPath}${target}`];
  }

  async showNativeStatus(ctx: ProjectContext): Promise<void> {
    await this.runner.run("systemctl", ["status", ctx.record.id, "--no-pager", "-n", "0"], { stdio: "inherit" });
  }

  /** The managed unit exists and the systemd link resolves to it. */
  async isInstalled(ctx: ProjectContext): Promise<boolean> {
    if (!(await locateArtifact(this.unitPath(ctx)))) return false;
    return (await this.linkState(ctx)) === "linked";
  }

  private async linkState(ctx: ProjectContext): Promise<LinkState> {
    const link = this.linkPath(ctx);
    let isLink: boolean;
    try {
      isLink = (await lstat(link)).isSymbolicLink();
    } catch (err) {
      if ((err as NodeJS.ErrnoException).code === "ENOENT") return "missing";
      throw err;
    }

    const resolved = await realpathOrUndefined(link);
    if (resolved === undefined) return isLink ? "dangling" : "conflict";
    const expected = await realpathOrUndefined(this.unitPath(ctx));
    return resolved === expected ? "linked" : "conflict";
  }

  private async trigger(ctx: ProjectContext, verb: "start" | "stop" | "restart"): Promise<StepResult> {
    if (!(await this.isInstalled(ctx))) {
      return recoverable(`No valid service file found, cannot ${verb}.`);
    }
    const result = await this.systemctl([verb, ctx.record.id]);
    if (result.exitCode !== 0) {
      const detail = result.stderr.trim();
      return recoverable(`systemctl ${verb} ${ctx.record.id} failed with exit code ${result.exitCode}${detail ? `: ${detail}` : ""}`);
    }
    return ok();
  }

  private async daemonReload(): Promise<StepResult> {
    this.reporter.info("Reloading systemd daemon ...");
    const result = await this.systemctl(["daemon-reload"]);
    return result.exitCode === 0 ? ok() : recoverable(`systemctl daemon-reload failed with exit code ${result.exitCode}`);
  }

  private systemctl(args: readonly string[]): Promise<CommandResult> {
    return this.runner.run("systemctl", args);
  }

  private async generate(ctx: ProjectContext, unitPath: string): Promise<boolean> {
    if (!this.prompter.interactive) return false;
    if (!(await this.prompter.confirm("No service file found. Generate one?", true))) return false;

    const path = ctx.record.path;
    const execStart = await this.prompter.input(`Start command (absolute or relative to ${path})`);
    const environment = await askEnvironment(this.prompter);

    const content = generateServiceUnit({
      id: ctx.record.id,
      workingDirectory: path,
      execStart,
      ...(this.user && { user: this.user }),
      environment,
    });
    await writeArtifact(unitPath, content);
    this.reporter.info(previewGenerated(unitPath, content));
    if (await this.prompter.confirm("Do you want to edit the service file?", false)) {
      await openInEditor(this.runner, unitPath);
    }
    return true;
  }
}

async function realpathOrUndefined(path: string): Promise<string | undefined> {
  try {
    return await realpath(path);
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code === "ENOENT") return undefined;
    throw err;
  }
}
