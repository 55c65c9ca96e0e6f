/**
 * The global source-control credential shared by projects in `global` auth
 * mode. One token, one file, read fresh for every operation.
 */

import { chmod, mkdir, readFile, stat } from "node:fs/promises";
import { dirname } from "node:path";
import writeFileAtomic from "write-file-atomic";
import type { Prompter } from "../prompts/prompter.js";
import { PermissionDriftWarning, ValidationError } from "../errors.js";
import { SECRET_FILE_MODE } from "./project-store.js";

export interface CredentialStoreOptions {
  filePath: string;
  prompter: Prompter;
  onWarning?: (warning: PermissionDriftWarning) => void;
}

export class GlobalCredentialStore {
  readonly filePath: string;
  private readonly prompter: Prompter;
  private readonly onWarning?: (warning: PermissionDriftWarning) => void;

  constructor(options: CredentialStoreOptions) {
    this.filePath = options.filePath;
    this.prompter = options.prompter;
    this.onWarning = options.onWarning;
  }

  /**
   * Current token. Prompts for one (and stores it) when the file is missing
   * or empty.
   *
   * @throws ValidationError when a prompt is needed but input is disabled
   */
  async read(): Promise<string> {
    const existing = await this.readFileToken();
    if (existing) {
      await this.checkPermissions();
      return existing;
    }

    if (!this.prompter.interactive) {
      throw new ValidationError(
        `Global credential ${this.filePath} is missing. Run once without -q to enter it.`,
      );
    }

    const token = await this.prompter.secret("Enter the global access token");
    if (!token) {
      throw new ValidationError("An empty access token is not allowed.");
    }
    await this.write(token);
    return token;
  }

  async write(token: string): Promise<void> {
    await mkdir(dirname(this.filePath), { recursive: true });
    await writeFileAtomic(this.filePath, `${token}\n`, { encoding: "utf-8", mode: SECRET_FILE_MODE });
  }

  private async readFileToken(): Promise<string> {
    try {
      return (await readFile(this.filePath, "utf-8")).trim();
    } catch (err) {
      if ((err as NodeJS.ErrnoException).code === "ENOENT") return "";
      throw err;
    }
  }

  private async checkPermissions(): Promise<void> {
    const { mode } = await stat(this.filePath);
    if ((mode & 0o777) === SECRET_FILE_MODE) return;

    this.onWarning?.(new PermissionDriftWarning(this.filePath, mode));
    if (this.prompter.interactive && (await this.prompter.confirm(`Fix permissions of ${this.filePath} (chmod 600)?`, true))) {
      await chmod(this.filePath, SECRET_FILE_MODE);
    }
  }
}
