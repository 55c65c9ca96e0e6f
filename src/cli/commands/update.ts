/**
 * update and self-update commands.
 */

import type { Command } from "commander";
import type { CliHost } from "../program.js";
import { DanglingImageCollector } from "../../backends/container.js";
import { selfUpdate, type SelfUpdateOutcome } from "../../lifecycle/self-update.js";
import type { Selection } from "../../store/selector.js";
import { runTargets, selectTargets } from "../targets.js";
import { readVersion, type Runtime } from "../runtime.js";

async function runSelfUpdate(rt: Runtime): Promise<SelfUpdateOutcome> {
  return selfUpdate(
    {
      git: rt.git,
      runner: rt.runner,
      reporter: rt.reporter,
      events: rt.events,
      installDir: rt.installDir,
      config: rt.config.selfUpdate,
      version: await readVersion(rt.installDir),
    },
    rt.options,
  );
}

/** Offer to remove images left dangling by the pulls of this run. */
async function offerImageRemoval(rt: Runtime, collector: DanglingImageCollector): Promise<boolean> {
  if (collector.isEmpty) return true;

  const ids = collector.imageIds();
  rt.reporter.header("OBSOLETE DOCKER IMAGES");
  rt.reporter.info("The following dangling docker images were found:");
  for (const image of collector.images) {
    rt.reporter.info(`  ${image.reference} ${image.imageId} (${image.projectId})`);
  }

  if (!rt.options.quiet && rt.prompter.interactive && (await rt.prompter.confirm("Do you want to remove them now?", false))) {
    const removed = await rt.backends.container.removeImages(ids);
    if (removed.kind === "success") return true;
    rt.reporter.error(removed.message);
    return false;
  }
  rt.reporter.info(`You can remove them later using \`docker rmi -f ${ids.join(" ")}\``);
  return true;
}

export function registerUpdateCommands(program: Command, host: CliHost): void {
  // --- update ---
  program
    .command("update [project]")
    .description("Update project(s) from git; with no project, deckhand updates itself first")
    .action(async (project: string | undefined) => {
      await host.run(async rt => {
        const collector = new DanglingImageCollector();
        let ok = true;

        // Confirmed once, before the self-update; a relaunched process does not ask again.
        const spec = {
          allowMultiple: true,
          verb: "update",
          title: "Updating project",
          skipConfirmation: rt.options.force || rt.options.quiet || rt.options.internalRecursive,
        };
        // A fresh install with no projects still updates itself.
        const noProjects = project === undefined && (await rt.store.list()).length === 0;
        const selection: Selection = noProjects
          ? { kind: "batch", ids: [], all: true }
          : await selectTargets(rt, project, spec);
        if (selection.kind === "cancelled") {
          rt.reporter.info("Cancelled.");
          return true;
        }

        if (project === undefined) {
          if (!rt.options.internalRecursive) rt.reporter.header("SELF-UPDATE");
          const outcome = await runSelfUpdate(rt);
          if (outcome.kind === "restart-requested") {
            host.requestRelaunch();
            return true;
          }
          ok = outcome.kind !== "failed";
        }

        const updated = await runTargets(rt, selection, spec, id => rt.orchestrator.update(id, rt.options, collector));
        const cleaned = await offerImageRemoval(rt, collector);
        return ok && updated && cleaned;
      });
    });

  // --- self-update ---
  program
    .command("self-update")
    .description("Update deckhand from its git repository")
    .action(async () => {
      await host.run(async rt => {
        const outcome = await runSelfUpdate(rt);
        if (outcome.kind === "restart-requested") host.requestRelaunch();
        return outcome.kind !== "failed";
      });
    });
}
