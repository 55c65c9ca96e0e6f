/**
 * Lifecycle scripts shipped inside a project (`setup.sh`, `start.sh`, …).
 * They run without arguments in the project path and are judged by exit code.
 */

import { access, chmod, stat } from "node:fs/promises";
import { constants } from "node:fs";
import { join } from "node:path";
import type { CommandRunner } from "../exec/runner.js";
import type { Prompter } from "../prompts/prompter.js";
import type { Reporter } from "../events/reporter.js";
import { ok, recoverable, type StepResult } from "./types.js";

export type ScriptName =
  | "setup.sh"
  | "start.sh"
  | "stop.sh"
  | "restart.sh"
  | "status.sh"
  | "logs.sh"
  | "uninstall.sh"
  | "update.sh";

export interface ScriptRunOptions {
  /** "pipe" collects output into the returned lines instead of streaming it. */
  stdio?: "pipe" | "inherit";
}

export interface ProjectScriptsDeps {
  runner: CommandRunner;
  prompter: Prompter;
  reporter: Reporter;
}

export class ProjectScripts {
  private readonly runner: CommandRunner;
  private readonly prompter: Prompter;
  private readonly reporter: Reporter;

  constructor(deps: ProjectScriptsDeps) {
    this.runner = deps.runner;
    this.prompter = deps.prompter;
    this.reporter = deps.reporter;
  }

  async exists(projectPath: string, name: ScriptName): Promise<boolean> {
    try {
      return (await stat(join(projectPath, name))).isFile();
    } catch (err) {
      if ((err as NodeJS.ErrnoException).code === "ENOENT") return false;
      throw err;
    }
  }

  /**
   * Run a script. A non-executable script is made executable when the operator
   * agrees; otherwise the step fails.
   */
  async run(projectPath: string, name: ScriptName, options: ScriptRunOptions = {}): Promise<StepResult & { output?: string }> {
    const file = join(projectPath, name);
    if (!(await this.ensureExecutable(file))) {
      return recoverable(`Script '${file}' is not executable, skipping.`);
    }

    const stdio = options.stdio ?? "inherit";
    if (stdio === "inherit") this.reporter.info(`Running ${file}`);
    const result = await this.runner.run(file, [], { cwd: projectPath, stdio });
    if (result.exitCode !== 0) {
      return recoverable(`Script ${name} failed with exit code ${result.exitCode}`);
    }
    return { ...ok(), output: result.stdout };
  }

  private async ensureExecutable(file: string): Promise<boolean> {
    const executable = await access(file, constants.X_OK).then(() => true, () => false);
    if (executable) return true;

    if (!this.prompter.interactive) return false;
    if (!(await this.prompter.confirm(`File '${file}' is not executable. Make it executable?`, true))) {
      return false;
    }
    const { mode } = await stat(file);
    await chmod(file, mode | 0o111);
    return true;
  }
}
