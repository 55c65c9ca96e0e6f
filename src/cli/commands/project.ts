/**
 * Project record commands: add, remove, list, status.
 */

import { Option, type Command } from "commander";
import type { CliHost } from "../program.js";
import { forEachProject } from "../targets.js";

interface AddOptions {
  repo?: string;
  subPath?: string;
  auth?: "none" | "global" | "local";
  token?: string;
  path?: string;
  type?: string;
}

export function registerProjectCommands(program: Command, host: CliHost): void {
  // --- add ---
  program
    .command("add [project]")
    .description("Add a new project (asks for everything not given as an option)")
    .option("--repo <repo>", "GitHub owner/repo or a full clone URL")
    .option("--sub-path <dir>", "Subdirectory of the repository to use as the project path")
    .addOption(new Option("--auth <mode>", "Repository authentication").choices(["none", "global", "local"]))
    .option("--token <token>", "Project-specific access token (with --auth local)")
    .option("--path <path>", "Project path (default: ./<project>)")
    .option("--type <type>", "Project type (container, service or scripts)")
    .action(async (project: string | undefined, opts: AddOptions) => {
      await host.run(async rt => {
        await rt.orchestrator.add({ ...opts, ...(project && { id: project }) });
        return true;
      });
    });

  // --- remove ---
  program
    .command("remove <project>")
    .description("Remove a disabled project's record and generated files")
    .action(async (project: string) => {
      await host.run(rt =>
        forEachProject(rt, project, { allowMultiple: false, title: "Removing project" }, id =>
          rt.orchestrator.remove(id, rt.options),
        ),
      );
    });

  // --- list ---
  program
    .command("list [project]")
    .description("List projects with their state (✓ running, ⏹ stopped, ? unknown, ✗ disabled)")
    .action(async (project: string | undefined) => {
      await host.run(rt =>
        forEachProject(rt, project, { allowMultiple: true, title: "Project", banners: false }, id =>
          rt.orchestrator.list(id, rt.options),
        ),
      );
    });

  // --- status ---
  program
    .command("status [project]")
    .description("Show configuration, running state and git status")
    .action(async (project: string | undefined) => {
      await host.run(rt =>
        forEachProject(rt, project, { allowMultiple: true, title: "Status of project" }, (id, batch) =>
          rt.orchestrator.status(id, rt.options, { detailed: !batch }),
        ),
      );
    });
}
