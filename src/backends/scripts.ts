/**
 * Scripts backend: the project drives itself through shell scripts in its
 * root. Running state is never observable.
 */

import type { Reporter } from "../events/reporter.js";
import type { ProjectContext } from "../lifecycle/context.js";
import type { ProjectScripts, ScriptName } from "./project-script.js";
import { ok, recoverable, type Backend, type RunningState, type StepResult } from "./types.js";

export interface ScriptBackendDeps {
  scripts: ProjectScripts;
  reporter: Reporter;
}

export class ScriptBackend implements Backend {
  readonly kind = "scripts" as const;
  readonly observable = false;

  private readonly scripts: ProjectScripts;
  private readonly reporter: Reporter;

  constructor(deps: ScriptBackendDeps) {
    this.scripts = deps.scripts;
    this.reporter = deps.reporter;
  }

  /** setup.sh already ran while preparing the workspace. */
  async install(ctx: ProjectContext): Promise<StepResult> {
    if (!(await this.scripts.exists(ctx.record.path, "setup.sh"))) {
      this.reporter.warn(`No setup.sh script found in ${ctx.record.path}, only marking the project enabled.`);
    }
    return ok();
  }

  async start(ctx: ProjectContext): Promise<StepResult> {
    return this.required(ctx, "start.sh");
  }

  async stop(ctx: ProjectContext): Promise<StepResult> {
    return this.required(ctx, "stop.sh");
  }

  async restart(ctx: ProjectContext): Promise<StepResult> {
    const path = ctx.record.path;
    if (await this.scripts.exists(path, "restart.sh")) {
      return this.scripts.run(path, "restart.sh");
    }
    if ((await this.scripts.exists(path, "stop.sh")) && (await this.scripts.exists(path, "start.sh"))) {
      const stopped = await this.scripts.run(path, "stop.sh");
      if (stopped.kind !== "success") return stopped;
      return this.scripts.run(path, "start.sh");
    }
    return recoverable(`No restart.sh or start.sh + stop.sh scripts found in ${path}.`);
  }

  async status(): Promise<RunningState> {
    return "unknown";
  }

  async uninstall(ctx: ProjectContext): Promise<StepResult> {
    if (await this.scripts.exists(ctx.record.path, "uninstall.sh")) {
      return this.scripts.run(ctx.record.path, "uninstall.sh");
    }
    this.reporter.warn(`No uninstall.sh script found in ${ctx.record.path}, only marking the project disabled.`);
    return ok();
  }

  /** logs.sh decides for itself how much to show. */
  async logs(ctx: ProjectContext): Promise<StepResult> {
    return this.required(ctx, "logs.sh");
  }

  async describe(ctx: ProjectContext): Promise<string[]> {
    const path = ctx.record.path;
    if (!(await this.scripts.exists(path, "status.sh"))) {
      return [`No status.sh script found in ${path}.`];
    }
    const result = await this.scripts.run(path, "status.sh", { stdio: "pipe" });
    const lines = (result.output ?? "").split("\n").filter(l => l.trim());
    return result.kind === "success" ? lines : [...lines, result.message];
  }

  async showNativeStatus(): Promise<void> {
    // status.sh output is already part of describe()
  }

  private async required(ctx: ProjectContext, name: ScriptName): Promise<StepResult> {
    if (!(await this.scripts.exists(ctx.record.path, name))) {
      return recoverable(`No ${name} script found in ${ctx.record.path}.`);
    }
    return this.scripts.run(ctx.record.path, name);
  }
}
