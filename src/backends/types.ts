/**
 * Driver contract shared by the container, service and scripts backends.
 */

import type { ProjectType } from "../schemas/project.js";
import type { LogLines, ProjectContext } from "../lifecycle/context.js";

export type RunningState = "running" | "stopped" | "unknown";

/**
 * Outcome of one driver step.
 * - recoverable: the target fails, a batch moves on to the next target
 * - fatal: nothing further is attempted for this target
 */
export type StepResult =
  | { kind: "success" }
  | { kind: "recoverable"; message: string }
  | { kind: "fatal"; message: string };

export const ok = (): StepResult => ({ kind: "success" });
export const recoverable = (message: string): StepResult => ({ kind: "recoverable", message });
export const fatal = (message: string): StepResult => ({ kind: "fatal", message });

export interface Backend {
  readonly kind: ProjectType;
  /** Whether `status` can observe the effect of start/stop. */
  readonly observable: boolean;

  /** Idempotent: locate or generate the artifact and link it. */
  install(ctx: ProjectContext): Promise<StepResult>;
  start(ctx: ProjectContext): Promise<StepResult>;
  stop(ctx: ProjectContext): Promise<StepResult>;
  restart(ctx: ProjectContext): Promise<StepResult>;
  status(ctx: ProjectContext): Promise<RunningState>;
  uninstall(ctx: ProjectContext): Promise<StepResult>;
  logs(ctx: ProjectContext, lines: LogLines): Promise<StepResult>;
  /** Artifact details for the status view. */
  describe(ctx: ProjectContext): Promise<string[]>;
  /** Native status output (compose ps, systemctl status) streamed to the terminal. */
  showNativeStatus(ctx: ProjectContext): Promise<void>;
}
