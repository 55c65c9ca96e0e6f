/**
 * External command execution.
 *
 * Every docker / systemctl / journalctl / git / project-script invocation goes
 * through a CommandRunner so drivers stay testable with an in-process fake.
 * Commands are blocking from the caller's point of view: each call resolves
 * only when the child has exited.
 */

import { spawn } from "node:child_process";
import { ExternalToolError } from "../errors.js";

export interface CommandResult {
  exitCode: number;
  stdout: string;
  stderr: string;
}

export interface CommandOptions {
  cwd?: string;
  /**
   * "pipe" captures output (default). "inherit" hands the terminal to the
   * child (log following, shells, editors); captured output is then empty.
   */
  stdio?: "pipe" | "inherit";
  env?: NodeJS.ProcessEnv;
}

export interface CommandRunner {
  /** Resolves with the exit code; never rejects on a non-zero exit. */
  run(command: string, args: readonly string[], options?: CommandOptions): Promise<CommandResult>;
}

export class ProcessRunner implements CommandRunner {
  run(command: string, args: readonly string[], options: CommandOptions = {}): Promise<CommandResult> {
    const stdio = options.stdio ?? "pipe";

    return new Promise((resolve) => {
      const child = spawn(command, [...args], {
        cwd: options.cwd,
        env: options.env ?? process.env,
        stdio: stdio === "inherit" ? "inherit" : ["ignore", "pipe", "pipe"],
      });

      let stdout = "";
      let stderr = "";
      child.stdout?.setEncoding("utf-8").on("data", (chunk: string) => {
        stdout += chunk;
      });
      child.stderr?.setEncoding("utf-8").on("data", (chunk: string) => {
        stderr += chunk;
      });

      // ENOENT / EACCES on the binary itself: report as a failed command.
      child.on("error", (err) => {
        resolve({ exitCode: 127, stdout, stderr: stderr + err.message });
      });
      child.on("close", (code, signal) => {
        resolve({ exitCode: code ?? (signal ? 128 : 1), stdout, stderr });
      });
    });
  }
}

export function formatCommand(command: string, args: readonly string[]): string {
  return [command, ...args].join(" ");
}

/**
 * Run a command and throw ExternalToolError (with captured output) on a
 * non-zero exit.
 */
export async function runChecked(
  runner: CommandRunner,
  command: string,
  args: readonly string[],
  options?: CommandOptions,
): Promise<CommandResult> {
  const result = await runner.run(command, args, options);
  if (result.exitCode !== 0) {
    throw new ExternalToolError(
      formatCommand(command, args),
      result.exitCode,
      [result.stdout, result.stderr].filter(s => s.trim()).join("\n"),
    );
  }
  return result;
}

/** Non-empty trimmed lines of a command's stdout. */
export function outputLines(result: CommandResult): string[] {
  return result.stdout
    .split("\n")
    .map(l => l.trim())
    .filter(Boolean);
}
