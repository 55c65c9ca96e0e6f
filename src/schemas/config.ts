/**
 * deckhand configuration schema.
 *
 * Stored as an optional `deckhand.yaml` in the root directory. Every key has a
 * default, so a missing file is a valid configuration. Relative paths are
 * resolved against the root directory by the config manager.
 */

import { z } from "zod";

/** Status confirmation after start/stop/restart. */
export const StatusCheckConfig = z.object({
  /** Polls after the first immediate check. */
  retries: z.number().int().nonnegative().default(10),
  /** Delay between polls (ms). */
  intervalMs: z.number().int().positive().default(100),
});
export type StatusCheckConfig = z.infer<typeof StatusCheckConfig>;

export const SelfUpdateConfig = z.object({
  /** Remote to pull from. Unset: the install checkout's own upstream. */
  repoUrl: z.string().min(1).optional(),
  /** Commands run in the install directory after a successful pull, in order. */
  postUpdateCommands: z
    .array(z.array(z.string().min(1)).min(1))
    .default([["npm", "ci"], ["npm", "run", "build"]]),
});
export type SelfUpdateConfig = z.infer<typeof SelfUpdateConfig>;

export const DeckhandConfig = z.object({
  /** Directory holding project records and artifacts. */
  projectsDir: z.string().default("projects"),
  /** File holding the global source-control token. */
  globalCredentialFile: z.string().default("global-credential.txt"),
  /** Lifecycle event log directory (JSONL, one file per day). */
  eventsDir: z.string().default("events"),
  /** Log lines shown per project when not following. */
  logLines: z.number().int().positive().default(10),
  /** Base image for generated Dockerfiles. */
  defaultDockerImage: z.string().default("node:22-alpine"),
  statusCheck: StatusCheckConfig.default({}),
  /** Hosts a credential may be sent to. */
  trustedHosts: z.array(z.string().min(1)).default(["github.com"]),
  /** Single character standing for "any sequence" in project name arguments. */
  wildcardMarker: z
    .string()
    .regex(/^[^a-z0-9_]$/, "wildcardMarker must be a single character that cannot appear in a project name")
    .default("+"),
  /** Where service units are linked for systemd. */
  systemdDir: z.string().default("/etc/systemd/system"),
  selfUpdate: SelfUpdateConfig.default({}),
});
export type DeckhandConfig = z.infer<typeof DeckhandConfig>;
