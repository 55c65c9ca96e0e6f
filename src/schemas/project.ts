/**
 * Project record schema: one YAML file per project in the projects directory.
 *
 * The record id is not stored in the file; it is the file's basename.
 */

import { z } from "zod";

/** Lowercase letter or underscore first, then lowercase letters, digits, underscores. */
export const PROJECT_ID_REGEX = /^[a-z_][a-z0-9_]*$/;

export const ProjectId = z
  .string()
  .regex(
    PROJECT_ID_REGEX,
    "Project name must start with a lowercase letter or underscore and contain only lowercase letters, numbers, and underscores",
  );

export const PROJECT_TYPES = ["container", "service", "scripts"] as const;
export const ProjectType = z.enum(PROJECT_TYPES);
export type ProjectType = z.infer<typeof ProjectType>;

export const AuthMode = z.discriminatedUnion("mode", [
  z.object({ mode: z.literal("none") }),
  /** Use the process-wide credential file. */
  z.object({ mode: z.literal("global") }),
  /** Project-specific token, stored in the record (file is kept at 0600). */
  z.object({ mode: z.literal("local"), token: z.string().min(1) }),
]);
export type AuthMode = z.infer<typeof AuthMode>;

/**
 * On-disk shape. `type` stays a free string so a record with an unknown type
 * still loads (and can still be removed); it is narrowed when a backend is
 * selected.
 */
export const ProjectFile = z
  .object({
    enabled: z.boolean().default(false),
    type: z.string().min(1),
    repoUrl: z.string().min(1),
    subPath: z.string().min(1).optional(),
    auth: AuthMode.default({ mode: "none" }),
    path: z.string().min(1),
  })
  .passthrough();
export type ProjectFile = z.infer<typeof ProjectFile>;

export interface ProjectRecord {
  id: string;
  enabled: boolean;
  type: string;
  repoUrl: string;
  subPath?: string;
  auth: AuthMode;
  path: string;
}

export function isProjectType(value: string): value is ProjectType {
  return ProjectType.safeParse(value).success;
}
