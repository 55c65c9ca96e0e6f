/**
 * Backend selection. A project's type maps to exactly one driver; an
 * unrecognised type is carried as `unsupported` so callers must handle it.
 */

import type Docker from "dockerode";
import type { CommandRunner } from "../exec/runner.js";
import type { Prompter } from "../prompts/prompter.js";
import type { Reporter } from "../events/reporter.js";
import { isProjectType } from "../schemas/project.js";
import { ContainerBackend } from "./container.js";
import { ProjectScripts } from "./project-script.js";
import { ScriptBackend } from "./scripts.js";
import { ServiceBackend } from "./service.js";

export interface Backends {
  container: ContainerBackend;
  service: ServiceBackend;
  scripts: ScriptBackend;
  /** Project scripts shared by every type (setup.sh, update.sh). */
  projectScripts: ProjectScripts;
}

export type BackendSelection =
  | { kind: "container"; backend: ContainerBackend }
  | { kind: "service"; backend: ServiceBackend }
  | { kind: "scripts"; backend: ScriptBackend }
  | { kind: "unsupported"; type: string };

export interface BackendDeps {
  runner: CommandRunner;
  docker: Docker;
  reporter: Reporter;
  prompter: Prompter;
  defaultDockerImage: string;
  systemdDir: string;
  user?: string;
}

export function createBackends(deps: BackendDeps): Backends {
  const projectScripts = new ProjectScripts(deps);
  return {
    container: new ContainerBackend(deps),
    service: new ServiceBackend(deps),
    scripts: new ScriptBackend({ scripts: projectScripts, reporter: deps.reporter }),
    projectScripts,
  };
}

export function selectBackend(backends: Backends, type: string): BackendSelection {
  if (!isProjectType(type)) return { kind: "unsupported", type };
  switch (type) {
    case "container":
      return { kind: "container", backend: backends.container };
    case "service":
      return { kind: "service", backend: backends.service };
    case "scripts":
      return { kind: "scripts", backend: backends.scripts };
  }
}

export { ContainerBackend, DanglingImageCollector } from "./container.js";
export { ServiceBackend } from "./service.js";
export { ScriptBackend } from "./scripts.js";
export { ProjectScripts } from "./project-script.js";
export type { Backend, RunningState, StepResult } from "./types.js";
