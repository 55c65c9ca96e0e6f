/**
 * Sequential fan-out of one operation over several projects.
 *
 * Targets run strictly one after another in the given order. A failing
 * target, returned or thrown, never stops the ones after it.
 */

import type { Reporter } from "../events/reporter.js";
import { describeError } from "../errors.js";

export interface BatchFailure {
  id: string;
  /** Set when the operation threw instead of returning false. */
  error?: string;
}

export interface BatchOutcome {
  succeeded: string[];
  failed: BatchFailure[];
  /** true only when no target failed. */
  ok: boolean;
}

export interface BatchOptions {
  reporter: Reporter;
  /** Banner before each target, e.g. "Updating project". */
  title: string;
  /** A single target gets no banner or summary. */
  banners?: boolean;
}

export async function runBatch(
  ids: readonly string[],
  operation: (id: string) => Promise<boolean>,
  options: BatchOptions,
): Promise<BatchOutcome> {
  const { reporter, title } = options;
  const banners = options.banners ?? ids.length > 1;
  const outcome: BatchOutcome = { succeeded: [], failed: [], ok: true };

  for (const id of ids) {
    if (banners) reporter.header(`${title} ${id}`);
    try {
      if (await operation(id)) {
        outcome.succeeded.push(id);
      } else {
        outcome.failed.push({ id });
      }
    } catch (err) {
      const error = describeError(err);
      reporter.error(error);
      outcome.failed.push({ id, error });
    }
  }

  outcome.ok = outcome.failed.length === 0;
  if (banners && !outcome.ok) {
    reporter.error(
      `${outcome.failed.length} of ${ids.length} projects failed: ${outcome.failed.map(f => f.id).join(", ")}`,
    );
  }
  return outcome;
}
