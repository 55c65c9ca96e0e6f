/**
 * Backend artifacts: the compose file or unit file deckhand drives a project
 * with, kept at a fixed place in the projects directory.
 *
 * The managed path is either an authoritative regular file (hand-written or
 * generated) or a symlink into the project's source tree.
 */

import type { Stats } from "node:fs";
import { lstat, readFile, readlink, rename, stat, symlink, unlink } from "node:fs/promises";
import { dirname, resolve } from "node:path";
import writeFileAtomic from "write-file-atomic";
import type { Reporter } from "../events/reporter.js";
import { NotFoundError } from "../errors.js";

export type ArtifactSource = "managed" | "linked" | "kept-link" | "synthesized" | "generated";

export interface ArtifactSelection {
  path: string;
  source: ArtifactSource;
}

export interface ArtifactSpec {
  /** e.g. "compose file", "service file" */
  label: string;
  /** `<projectsDir>/<id>.docker-compose.yml` or `<projectsDir>/<id>.service` */
  managedPath: string;
  /** Files in the project tree to link to, best first. */
  candidates: string[];
  /** Content derived from the project tree without asking anything. */
  synthesize?: () => Promise<string | undefined>;
  /**
   * Last resort: ask the operator and write `managedPath`. Resolves false when
   * declined or when input is unavailable.
   */
  generate?: () => Promise<boolean>;
  /** Hint appended to the failure when nothing could be determined. */
  missingHint?: string;
}

/**
 * Determine the artifact, creating or repairing the managed link when needed.
 * Correct links are left alone.
 *
 * @throws NotFoundError when no artifact can be determined
 */
export async function selectArtifact(spec: ArtifactSpec, reporter: Reporter): Promise<ArtifactSelection> {
  const managed = await lstatOrUndefined(spec.managedPath);

  if (managed?.isFile()) {
    reporter.info(`Using ${spec.label}: ${spec.managedPath}`);
    return { path: spec.managedPath, source: "managed" };
  }

  for (const candidate of spec.candidates) {
    if (await isFile(candidate)) {
      const changed = await ensureSymlink(spec.managedPath, candidate);
      reporter.info(`${changed ? "Linking" : "Linked"} ${spec.label}: ${candidate}`);
      return { path: spec.managedPath, source: "linked" };
    }
  }

  if (managed?.isSymbolicLink() && (await isFile(spec.managedPath))) {
    reporter.info(`Keeping linked ${spec.label}: ${await readlink(spec.managedPath)}`);
    return { path: spec.managedPath, source: "kept-link" };
  }

  const synthesized = await spec.synthesize?.();
  if (synthesized !== undefined) {
    await writeArtifact(spec.managedPath, synthesized);
    reporter.info(`Using generated ${spec.label}: ${spec.managedPath}`);
    return { path: spec.managedPath, source: "synthesized" };
  }

  if (spec.generate && (await spec.generate())) {
    reporter.info(`Using generated ${spec.label}: ${spec.managedPath}`);
    return { path: spec.managedPath, source: "generated" };
  }

  const hint = spec.missingHint ? ` ${spec.missingHint}` : "";
  throw new NotFoundError(`No ${spec.label} could be determined.${hint}`);
}

/** The managed artifact, when it exists and (for a link) still resolves. */
export async function locateArtifact(managedPath: string): Promise<string | undefined> {
  return (await isFile(managedPath)) ? managedPath : undefined;
}

/** Replace whatever is at `path` (including a dangling link) with `content`. */
export async function writeArtifact(path: string, content: string): Promise<void> {
  const existing = await lstatOrUndefined(path);
  if (existing?.isSymbolicLink()) await unlink(path);
  await writeFileAtomic(path, content, "utf-8");
}

/**
 * Point `linkPath` at `target`. Returns false when it already does.
 */
export async function ensureSymlink(linkPath: string, target: string): Promise<boolean> {
  const existing = await lstatOrUndefined(linkPath);
  if (existing?.isSymbolicLink()) {
    const current = resolve(dirname(linkPath), await readlink(linkPath));
    if (current === resolve(target)) return false;
  }
  if (existing) await unlink(linkPath);
  await symlink(resolve(target), linkPath);
  return true;
}

export async function hasMarker(path: string, marker: string): Promise<boolean> {
  try {
    return (await readFile(path, "utf-8")).includes(marker);
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code === "ENOENT") return false;
    throw err;
  }
}

export type Retirement = "deleted" | "rotated";

/**
 * Retire a generated artifact after uninstall. Content identical to what
 * would be generated today is deleted; anything else is kept as
 * `<path>.bak`, pushing an older `.bak` to `.bak2` (dropping the previous
 * `.bak2`).
 */
export async function retireArtifact(path: string, regenerated: string | undefined): Promise<Retirement> {
  const current = await readFile(path, "utf-8");
  if (regenerated !== undefined && current === regenerated) {
    await unlink(path);
    return "deleted";
  }

  const bak = `${path}.bak`;
  if (await lstatOrUndefined(bak)) {
    await rename(bak, `${path}.bak2`);
  }
  await rename(path, bak);
  return "rotated";
}

/** Framed listing of a freshly generated file. */
export function previewGenerated(path: string, content: string): string {
  const body = content.replace(/\n$/, "").split("\n").map(line => `│ ${line}`);
  return [`┌── GENERATED FILE: ${path} ───`, ...body, `└${"─".repeat(path.length + 24)}`].join("\n");
}

export function backupPaths(path: string): [string, string] {
  return [`${path}.bak`, `${path}.bak2`];
}

async function isFile(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isFile();
  } catch {
    return false;
  }
}

async function lstatOrUndefined(path: string): Promise<Stats | undefined> {
  try {
    return await lstat(path);
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code === "ENOENT") return undefined;
    throw err;
  }
}
