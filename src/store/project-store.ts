/**
 * Project store: one YAML record per project in the projects directory.
 *
 * `<projectsDir>/<id>.yaml` holds everything deckhand knows about a project.
 * Records may carry a source-control token, so every write leaves the file
 * at mode 0600. Keys this version does not know about are preserved.
 */

import { mkdir, readdir, readFile, stat, unlink } from "node:fs/promises";
import { join } from "node:path";
import writeFileAtomic from "write-file-atomic";
import { parse as parseYaml, stringify as stringifyYaml } from "yaml";
import type { ZodError } from "zod";
import {
  PROJECT_ID_REGEX,
  ProjectId,
  ProjectFile,
  isProjectType,
  type ProjectRecord,
} from "../schemas/project.js";
import {
  AlreadyExistsError,
  NotFoundError,
  PermissionDriftWarning,
  ValidationError,
} from "../errors.js";

export const RECORD_EXTENSION = ".yaml";
export const SECRET_FILE_MODE = 0o600;

/** Which records `list` returns. */
export type ProjectFilter =
  | { kind: "all" }
  | { kind: "exact"; id: string }
  | { kind: "pattern"; pattern: string };

export interface ProjectStoreOptions {
  projectsDir: string;
  /** Character standing for "any sequence" in patterns (default "+"). */
  wildcardMarker?: string;
  /** Receives permission drift on token-bearing records. */
  onWarning?: (warning: PermissionDriftWarning) => void;
}

export type NewProject = Omit<ProjectRecord, "enabled">;

export class ProjectStore {
  readonly projectsDir: string;
  readonly wildcardMarker: string;
  private readonly onWarning?: (warning: PermissionDriftWarning) => void;

  constructor(options: ProjectStoreOptions) {
    this.projectsDir = options.projectsDir;
    this.wildcardMarker = options.wildcardMarker ?? "+";
    this.onWarning = options.onWarning;
  }

  recordPath(id: string): string {
    return join(this.projectsDir, `${id}${RECORD_EXTENSION}`);
  }

  async exists(id: string): Promise<boolean> {
    if (!PROJECT_ID_REGEX.test(id)) return false;
    try {
      await stat(this.recordPath(id));
      return true;
    } catch (err) {
      if ((err as NodeJS.ErrnoException).code === "ENOENT") return false;
      throw err;
    }
  }

  /**
   * Load and validate a record.
   *
   * @throws NotFoundError when no record file exists
   * @throws ValidationError for a malformed id or record
   */
  async load(id: string): Promise<ProjectRecord> {
    validateProjectId(id);
    const filePath = this.recordPath(id);

    let content: string;
    try {
      content = await readFile(filePath, "utf-8");
    } catch (err) {
      if ((err as NodeJS.ErrnoException).code === "ENOENT") {
        throw new NotFoundError(`Project ${id} not found.`);
      }
      throw err;
    }

    const result = ProjectFile.safeParse(parseYaml(content));
    if (!result.success) {
      throw new ValidationError(`Invalid record ${filePath}: ${formatZodError(result.error)}`);
    }

    const file = result.data;
    if (file.auth.mode === "local") {
      await this.checkPermissions(filePath);
    }

    return {
      id,
      enabled: file.enabled,
      type: file.type,
      repoUrl: file.repoUrl,
      ...(file.subPath !== undefined && { subPath: file.subPath }),
      auth: file.auth,
      path: file.path,
    };
  }

  /**
   * Persist a record. Known fields overwrite, unknown fields already in the
   * file are kept. The file is written atomically at mode 0600.
   */
  async save(record: ProjectRecord): Promise<void> {
    validateProjectId(record.id);
    const filePath = this.recordPath(record.id);
    const existing = await readRawRecord(filePath);

    const next: Record<string, unknown> = {
      ...existing,
      enabled: record.enabled,
      type: record.type,
      repoUrl: record.repoUrl,
      subPath: record.subPath,
      auth: record.auth,
      path: record.path,
    };
    if (record.subPath === undefined) delete next["subPath"];

    await mkdir(this.projectsDir, { recursive: true });
    await writeFileAtomic(filePath, stringifyYaml(next), { encoding: "utf-8", mode: SECRET_FILE_MODE });
  }

  /** Project ids in lexical order, narrowed by `filter`. */
  async list(filter: ProjectFilter = { kind: "all" }): Promise<string[]> {
    const ids = await this.scanIds();

    switch (filter.kind) {
      case "all":
        return ids;
      case "exact":
        return ids.filter(id => id === filter.id);
      case "pattern": {
        const regex = compileWildcard(filter.pattern, this.wildcardMarker);
        return ids.filter(id => regex.test(id));
      }
    }
  }

  /**
   * Create a new, disabled project.
   *
   * @throws ValidationError for a bad id or type
   * @throws AlreadyExistsError when a record with this id exists
   */
  async create(project: NewProject): Promise<ProjectRecord> {
    validateProjectId(project.id);
    if (!isProjectType(project.type)) {
      throw new ValidationError(`Invalid project type '${project.type}' (expected container, service or scripts)`);
    }
    if (await this.exists(project.id)) {
      throw new AlreadyExistsError(`Project ${project.id} already exists.`);
    }

    const record: ProjectRecord = { ...project, enabled: false };
    await this.save(record);
    return record;
  }

  /**
   * Delete a record file. Enabled projects must be disabled first.
   */
  async delete(id: string): Promise<void> {
    const record = await this.load(id);
    if (record.enabled) {
      throw new ValidationError(`Project ${id} is enabled, please disable it first.`);
    }
    await unlink(this.recordPath(id));
  }

  private async scanIds(): Promise<string[]> {
    let entries: string[];
    try {
      entries = await readdir(this.projectsDir);
    } catch (err) {
      if ((err as NodeJS.ErrnoException).code === "ENOENT") return [];
      throw err;
    }

    return entries
      .filter(name => name.endsWith(RECORD_EXTENSION))
      .map(name => name.slice(0, -RECORD_EXTENSION.length))
      .filter(id => PROJECT_ID_REGEX.test(id))
      .sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));
  }

  private async checkPermissions(filePath: string): Promise<void> {
    const { mode } = await stat(filePath);
    if ((mode & 0o777) !== SECRET_FILE_MODE) {
      this.onWarning?.(new PermissionDriftWarning(filePath, mode));
    }
  }
}

/**
 * @throws ValidationError unless `id` matches the project id grammar
 */
export function validateProjectId(id: string): void {
  if (!ProjectId.safeParse(id).success) {
    throw new ValidationError(
      `Project name '${id}' is invalid. It must start with a lowercase letter or underscore and contain only lowercase letters, numbers, and underscores.`,
    );
  }
}

/**
 * Compile a name pattern: the marker matches any sequence (including an empty
 * one), every other character matches itself. The whole name must match.
 */
export function compileWildcard(pattern: string, marker: string): RegExp {
  const body = pattern
    .split(marker)
    .map(part => part.replace(/[.*+?^${}()|[\]\\]/g, "\\$&"))
    .join(".*");
  return new RegExp(`^${body}$`);
}

async function readRawRecord(filePath: string): Promise<Record<string, unknown>> {
  try {
    const parsed: unknown = parseYaml(await readFile(filePath, "utf-8"));
    return isPlainObject(parsed) ? { ...parsed } : {};
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code === "ENOENT") return {};
    throw err;
  }
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function formatZodError(err: ZodError): string {
  return err.errors.map(e => `${e.path.join(".")}: ${e.message}`).join("; ");
}
