/**
 * Resolve a project name argument into the projects a command acts on.
 *
 * - no argument      → every project (batch)
 * - contains marker  → pattern; one match narrows to a single target
 * - anything else    → that exact project
 */

import type { ProjectStore } from "./project-store.js";
import type { Prompter } from "../prompts/prompter.js";
import { AmbiguousSelectionError, NotFoundError, ValidationError } from "../errors.js";

export type Selection =
  | { kind: "single"; id: string }
  | { kind: "batch"; ids: string[]; all: boolean }
  | { kind: "cancelled" };

export interface SelectOptions {
  /** Commands like `shell` only ever act on one project. */
  allowMultiple: boolean;
  /** Verb for the batch confirmation ("enable", "update", …). No verb, no question. */
  verb?: string;
  /** --force or --quiet: never ask. */
  skipConfirmation: boolean;
  prompter: Prompter;
}

export async function resolveSelection(
  store: ProjectStore,
  nameArg: string | undefined,
  opts: SelectOptions,
): Promise<Selection> {
  if (!nameArg) {
    const ids = await store.list({ kind: "all" });
    if (ids.length === 0) {
      throw new NotFoundError(`No projects found in ${store.projectsDir}.`);
    }
    if (!opts.allowMultiple) {
      throw new ValidationError("Please specify a project name!");
    }
    const confirmed = await confirmBatch(opts, `Found ${ids.length} projects: ${ids.join(", ")}. Are you sure you want to ${opts.verb} ALL ${ids.length} projects?`);
    return confirmed ? { kind: "batch", ids, all: true } : { kind: "cancelled" };
  }

  if (nameArg.includes(store.wildcardMarker)) {
    const ids = await store.list({ kind: "pattern", pattern: nameArg });
    if (ids.length === 0) {
      throw new NotFoundError(`No projects match pattern '${nameArg}'!`);
    }
    if (ids.length === 1 && ids[0] !== undefined) {
      return { kind: "single", id: ids[0] };
    }
    if (!opts.allowMultiple) {
      throw new AmbiguousSelectionError(nameArg, ids);
    }
    const total = (await store.list({ kind: "all" })).length;
    const confirmed = await confirmBatch(
      opts,
      `Found ${ids.length} matching projects (of ${total} total): ${ids.join(", ")}. Are you sure you want to ${opts.verb} these ${ids.length} projects?`,
    );
    return confirmed ? { kind: "batch", ids, all: false } : { kind: "cancelled" };
  }

  if (!(await store.exists(nameArg))) {
    throw new NotFoundError(`Project ${nameArg} not found.`);
  }
  return { kind: "single", id: nameArg };
}

/** Ids of a resolved selection, in execution order. */
export function selectedIds(selection: Selection): string[] {
  switch (selection.kind) {
    case "single":
      return [selection.id];
    case "batch":
      return selection.ids;
    case "cancelled":
      return [];
  }
}

async function confirmBatch(opts: SelectOptions, message: string): Promise<boolean> {
  if (opts.skipConfirmation || !opts.verb) return true;
  return opts.prompter.confirm(message, false);
}
