/**
 * Run one orchestrator operation over the projects a name argument selects.
 */

import type { Runtime } from "./runtime.js";
import { resolveSelection, selectedIds, type Selection } from "../store/selector.js";
import { runBatch } from "../lifecycle/batch.js";

export interface TargetSpec {
  allowMultiple: boolean;
  /** Asked about before acting on several projects; omit for read-only commands. */
  verb?: string;
  /** Banner prefix per project, e.g. "Enabling project". */
  title: string;
  /** Print a banner before each project of a batch (default true). */
  banners?: boolean;
  skipConfirmation?: boolean;
}

export type TargetOperation = (id: string, batch: boolean) => Promise<boolean>;

export function selectTargets(rt: Runtime, nameArg: string | undefined, spec: TargetSpec): Promise<Selection> {
  return resolveSelection(rt.store, nameArg, {
    allowMultiple: spec.allowMultiple,
    ...(spec.verb && { verb: spec.verb }),
    skipConfirmation: spec.skipConfirmation ?? (rt.options.force || rt.options.quiet),
    prompter: rt.prompter,
  });
}

/** Resolves false when any target failed. */
export async function runTargets(
  rt: Runtime,
  selection: Selection,
  spec: TargetSpec,
  operation: TargetOperation,
): Promise<boolean> {
  if (selection.kind === "cancelled") {
    rt.reporter.info("Cancelled.");
    return true;
  }
  const batch = selection.kind === "batch";
  const outcome = await runBatch(selectedIds(selection), id => operation(id, batch), {
    reporter: rt.reporter,
    title: spec.title,
    banners: batch && (spec.banners ?? true),
  });
  return outcome.ok;
}

export async function forEachProject(
  rt: Runtime,
  nameArg: string | undefined,
  spec: TargetSpec,
  operation: TargetOperation,
): Promise<boolean> {
  return runTargets(rt, await selectTargets(rt, nameArg, spec), spec, operation);
}
