/**
 * Re-run the current command line in a fresh process after a self-update.
 */

import { spawn } from "node:child_process";

export const INTERNAL_RECURSIVE_FLAG = "--internal-recursive";

/**
 * Spawn `node <entry> <args> --internal-recursive` with the terminal handed
 * over, and resolve with the child's exit code.
 */
export function relaunch(entry: string, args: readonly string[]): Promise<number> {
  return new Promise((resolve, reject) => {
    const child = spawn(process.execPath, [...process.execArgv, entry, ...args, INTERNAL_RECURSIVE_FLAG], {
      stdio: "inherit",
    });
    child.on("error", reject);
    child.on("close", (code, signal) => resolve(code ?? (signal ? 128 : 1)));
  });
}
