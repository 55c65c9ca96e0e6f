/**
 * Working-copy preparation that precedes every install.
 *
 * In subPath mode the full clone lives at `<projectsDir>/<id>-fullgitrepo`
 * and the project path is a symlink to the selected sub-directory.
 */

import { lstat, mkdir, readdir, realpath, rename, rmdir, stat, symlink, unlink } from "node:fs/promises";
import { dirname, join } from "node:path";
import type { Stats } from "node:fs";
import type { CredentialSource, GitEngine } from "../git/engine.js";
import type { ProjectScripts } from "../backends/project-script.js";
import type { Reporter } from "../events/reporter.js";
import type { ProjectContext } from "./context.js";
import { DeckhandError, describeError } from "../errors.js";
import { ok, recoverable, type StepResult } from "../backends/types.js";

export interface WorkspaceDeps {
  git: GitEngine;
  credentials: CredentialSource;
  scripts: ProjectScripts;
  reporter: Reporter;
}

export async function prepareWorkspace(ctx: ProjectContext, deps: WorkspaceDeps): Promise<StepResult> {
  const { record, gitPath } = ctx;

  if (record.subPath) {
    const moved = await adoptExistingRepository(ctx, deps);
    if (moved.kind !== "success") return moved;
  }

  try {
    const outcome = await deps.git.cloneOrVerify(gitPath, record.repoUrl, async () => {
      const url = await deps.git.credentialedUrl(record, deps.credentials);
      deps.reporter.info(`Cloning ${record.repoUrl}${url !== record.repoUrl ? " using token" : ""} into ${gitPath} ...`);
      return url;
    });
    if (outcome === "cloned") deps.reporter.success(`Cloned ${record.repoUrl}.`);
  } catch (err) {
    if (err instanceof DeckhandError) return recoverable(describeError(err));
    throw err;
  }

  if (record.subPath) {
    const linked = await linkSubPath(ctx, record.subPath, deps.reporter);
    if (linked.kind !== "success") return linked;
  }

  if (await deps.scripts.exists(record.path, "setup.sh")) {
    return deps.scripts.run(record.path, "setup.sh");
  }
  return ok();
}

/** Move a plain checkout at the project path to the private clone location. */
async function adoptExistingRepository(ctx: ProjectContext, deps: WorkspaceDeps): Promise<StepResult> {
  const { record, gitPath } = ctx;
  if (await lstatOrUndefined(gitPath)) return ok();

  const atPath = await lstatOrUndefined(record.path);
  if (!atPath?.isDirectory() || !(await deps.git.isWorkingCopy(record.path))) return ok();

  if (record.enabled) {
    return recoverable(
      `Found existing git repository at ${record.path}, cannot move to ${gitPath} while project is enabled, please disable it first.`,
    );
  }
  deps.reporter.info(`Found existing git repository at ${record.path}, moving to ${gitPath} ...`);
  await mkdir(dirname(gitPath), { recursive: true });
  await rename(record.path, gitPath);
  return ok();
}

/** Create or repair the `path → gitPath/subPath` alias. */
async function linkSubPath(ctx: ProjectContext, subPath: string, reporter: Reporter): Promise<StepResult> {
  const { record, gitPath } = ctx;
  const target = join(gitPath, subPath);

  const targetStats = await stat(target).catch(() => undefined);
  if (!targetStats?.isDirectory()) {
    return recoverable(`Specified subdirectory ${subPath} not found in repository at ${gitPath}.`);
  }

  const existing = await lstatOrUndefined(record.path);
  if (existing?.isSymbolicLink()) {
    const current = await realpath(record.path).catch(() => undefined);
    if (current === (await realpath(target))) return ok();
    reporter.info(`Fixing symlink ${record.path} to point to ${target}`);
    await unlink(record.path);
  } else if (existing?.isDirectory() && (await readdir(record.path)).length === 0) {
    await rmdir(record.path);
    reporter.info(`Creating symlink from ${record.path} to ${target}`);
  } else if (existing) {
    return recoverable(`Path ${record.path} exists but is not a symlink, cannot link to specified repo subdir.`);
  } else {
    reporter.info(`Creating symlink from ${record.path} to ${target}`);
    await mkdir(dirname(record.path), { recursive: true });
  }

  await symlink(target, record.path);
  return ok();
}

async function lstatOrUndefined(path: string): Promise<Stats | undefined> {
  try {
    return await lstat(path);
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code === "ENOENT") return undefined;
    throw err;
  }
}
