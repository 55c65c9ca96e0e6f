/**
 * Dockerfile generation for container projects that ship neither a compose
 * file nor a Dockerfile.
 */

import { readFile, stat } from "node:fs/promises";
import { join } from "node:path";

export type PackageManager = "yarn" | "npm" | "none";

export interface DockerfileOptions {
  baseImage: string;
  packageManager: PackageManager;
  /** Command line, split on whitespace into the exec form. */
  entrypoint: string;
  /** "8700" or "8700:8700"; omitted when blank. */
  port?: string;
  /** `KEY=value` pairs. */
  environment: string[];
}

export async function detectPackageManager(projectPath: string): Promise<PackageManager> {
  if (await exists(join(projectPath, "yarn.lock"))) return "yarn";

  let manifest: string;
  try {
    manifest = await readFile(join(projectPath, "package.json"), "utf-8");
  } catch {
    return "none";
  }
  return /"packageManager"\s*:\s*"yarn@/.test(manifest) ? "yarn" : "npm";
}

export function suggestedEntrypoint(packageManager: PackageManager): string {
  switch (packageManager) {
    case "yarn":
      return "yarn start";
    case "npm":
      return "npm start";
    case "none":
      return "node index.js";
  }
}

export function buildDockerfile(options: DockerfileOptions): string {
  const lines = [
    `FROM ${options.baseImage}`,
    "WORKDIR /usr/src/app",
    "RUN corepack enable",
    "COPY . .",
  ];

  if (options.packageManager === "yarn") {
    lines.push("RUN yarn set version stable", "RUN yarn install");
  } else if (options.packageManager === "npm") {
    lines.push("RUN npm install");
  }

  lines.push(`ENTRYPOINT ${JSON.stringify(options.entrypoint.trim().split(/\s+/))}`);
  if (options.port) lines.push(`EXPOSE ${options.port}`);
  for (const kv of options.environment) lines.push(`ENV ${kv}`);

  return lines.join("\n") + "\n";
}

async function exists(path: string): Promise<boolean> {
  try {
    await stat(path);
    return true;
  } catch {
    return false;
  }
}
