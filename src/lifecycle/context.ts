/**
 * Per-invocation context handed to every driver call.
 */

import { join } from "node:path";
import type { ProjectRecord } from "../schemas/project.js";

export type LogLines = number | "follow";

export interface RunOptions {
  /** Never prompt; skip redundant triggers instead of asking. */
  quiet: boolean;
  /** Skip confirmations. */
  force: boolean;
  /** false: confirm start/stop/restart with a single check. */
  statusCheck: boolean;
  logLines: LogLines;
  /** Running inside a relaunched process after self-update. */
  internalRecursive: boolean;
}

export interface ProjectContext {
  readonly record: ProjectRecord;
  readonly projectsDir: string;
  /** Where the git working copy lives (differs from record.path in subPath mode). */
  readonly gitPath: string;
  readonly options: RunOptions;
}

export const DEFAULT_RUN_OPTIONS: RunOptions = {
  quiet: false,
  force: false,
  statusCheck: true,
  logLines: "follow",
  internalRecursive: false,
};

export function gitPathFor(record: Pick<ProjectRecord, "id" | "path" | "subPath">, projectsDir: string): string {
  return record.subPath ? join(projectsDir, `${record.id}-fullgitrepo`) : record.path;
}

export function createProjectContext(record: ProjectRecord, projectsDir: string, options: RunOptions): ProjectContext {
  return { record, projectsDir, gitPath: gitPathFor(record, projectsDir), options };
}
