/**
 * Lifecycle commands: enable, disable, start, stop, restart, logs, shell.
 */

import type { Command } from "commander";
import type { CliHost } from "../program.js";
import type { LifecycleOrchestrator } from "../../lifecycle/orchestrator.js";
import type { RunOptions } from "../../lifecycle/context.js";
import { forEachProject } from "../targets.js";

type Transition = "enable" | "disable" | "start" | "stop" | "restart";

const TRANSITIONS: ReadonlyArray<{ verb: Transition; title: string; description: string }> = [
  { verb: "enable", title: "Enabling project", description: "Prepare the repository, install and enable project(s)" },
  { verb: "disable", title: "Disabling project", description: "Uninstall and disable project(s)" },
  { verb: "start", title: "Starting project", description: "Start project(s)" },
  { verb: "stop", title: "Stopping project", description: "Stop project(s)" },
  { verb: "restart", title: "Restarting project", description: "Restart project(s)" },
];

function transition(orchestrator: LifecycleOrchestrator, verb: Transition, id: string, options: RunOptions): Promise<boolean> {
  switch (verb) {
    case "enable":
      return orchestrator.enable(id, options);
    case "disable":
      return orchestrator.disable(id, options);
    case "start":
      return orchestrator.start(id, options);
    case "stop":
      return orchestrator.stop(id, options);
    case "restart":
      return orchestrator.restart(id, options);
  }
}

export function registerLifecycleCommands(program: Command, host: CliHost): void {
  for (const { verb, title, description } of TRANSITIONS) {
    program
      .command(`${verb} [project]`)
      .description(`${description} (no project: all, "+" matches any sequence)`)
      .action(async (project: string | undefined) => {
        await host.run(rt =>
          forEachProject(rt, project, { allowMultiple: true, verb, title }, id =>
            transition(rt.orchestrator, verb, id, rt.options),
          ),
        );
      });
  }

  // --- logs ---
  program
    .command("logs [project]")
    .description("Show logs (follows a single project unless -n is given)")
    .action(async (project: string | undefined) => {
      await host.run(rt =>
        forEachProject(rt, project, { allowMultiple: true, title: "Logs of project" }, (id, batch) => {
          const lines = batch && rt.options.logLines === "follow" ? rt.config.logLines : rt.options.logLines;
          return rt.orchestrator.logs(id, rt.options, lines);
        }),
      );
    });

  // --- shell ---
  program
    .command("shell <project>")
    .description("Open a shell in a running container project")
    .action(async (project: string) => {
      await host.run(rt =>
        forEachProject(rt, project, { allowMultiple: false, title: "Shell of project" }, id =>
          rt.orchestrator.shell(id, rt.options),
        ),
      );
    });
}
