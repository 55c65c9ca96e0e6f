import type { CommandRunner } from "../exec/runner.js";
import { runChecked } from "../exec/runner.js";

/**
 * Open `file` in $EDITOR (falling back to vi) with the terminal attached.
 */
export async function openInEditor(
  runner: CommandRunner,
  file: string,
  env: NodeJS.ProcessEnv = process.env,
): Promise<void> {
  const [command = "vi", ...args] = (env["EDITOR"] ?? "").split(/\s+/).filter(Boolean);
  await runChecked(runner, command, [...args, file], { stdio: "inherit" });
}
