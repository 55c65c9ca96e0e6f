/**
 * Git update channel for project working copies and the manager's own
 * checkout.
 *
 * Credentialed URLs are passed to git on the command line for a single
 * fetch/clone/pull and never written into the repository config; every
 * message derived from git output is redacted before it leaves this module.
 */

import { mkdir, readdir } from "node:fs/promises";
import { dirname } from "node:path";
import type { AuthMode } from "../schemas/project.js";
import type { CommandResult, CommandRunner } from "../exec/runner.js";
import { formatCommand } from "../exec/runner.js";
import { ExternalToolError, ValidationError } from "../errors.js";
import { embedCredential, parseRepoUrl, redactCredentials, trustRepoUrl } from "./remote-url.js";

export type UpstreamComparison =
  | { kind: "up-to-date" }
  /** `commits` is unknown when the upstream commit has not been fetched yet. */
  | { kind: "behind"; commits?: number }
  | { kind: "no-upstream" }
  | { kind: "error"; message: string };

export type PullOutcome =
  | { kind: "up-to-date"; head: string }
  | { kind: "updated"; from: string; to: string; commits: number }
  | { kind: "failed"; message: string };

/** Anything that can hand out the global token (read fresh on every call). */
export interface CredentialSource {
  read(): Promise<string>;
}

export interface GitEngineOptions {
  trustedHosts: readonly string[];
}

interface UpstreamRef {
  ref: string;
  remote: string;
  branch: string;
}

export class GitEngine {
  private readonly runner: CommandRunner;
  private readonly trustedHosts: readonly string[];

  constructor(runner: CommandRunner, options: GitEngineOptions) {
    this.runner = runner;
    this.trustedHosts = options.trustedHosts;
  }

  /**
   * URL to use for network operations on a project's remote.
   *
   * @throws ValidationError when a credential is configured for a host that is
   *   not trusted (fails closed, the token is never sent)
   */
  async credentialedUrl(
    source: { repoUrl: string; auth: AuthMode },
    credentials: CredentialSource,
  ): Promise<string> {
    if (source.auth.mode === "none") return source.repoUrl;

    const url = parseRepoUrl(source.repoUrl);
    const trusted = trustRepoUrl(url, this.trustedHosts);
    if (!trusted) {
      throw new ValidationError(
        `Token authentication is configured, but ${url.raw} is not an https URL on a trusted host (${this.trustedHosts.join(", ")}).`,
      );
    }

    const token = source.auth.mode === "local" ? source.auth.token : await credentials.read();
    if (!token) {
      throw new ValidationError("Please provide an access token or reconfigure the project to use a different authentication method!");
    }
    return embedCredential(trusted, token);
  }

  async isWorkingCopy(dir: string): Promise<boolean> {
    const result = await this.git(dir, ["rev-parse", "--is-inside-work-tree"]);
    return result.exitCode === 0 && result.stdout.trim() === "true";
  }

  /**
   * Clone into `gitPath` when it is missing or empty, otherwise require it to
   * be a working copy. The fetch URL (which may carry a token) is only
   * resolved when a clone is needed; afterwards `origin` points at the plain
   * URL.
   *
   * @throws ExternalToolError when the clone fails
   * @throws ValidationError when `gitPath` holds something other than a repository
   */
  async cloneOrVerify(
    gitPath: string,
    plainUrl: string,
    resolveFetchUrl: () => Promise<string> = async () => plainUrl,
  ): Promise<"cloned" | "existing"> {
    if (!(await isMissingOrEmpty(gitPath))) {
      if (await this.isWorkingCopy(gitPath)) return "existing";
      throw new ValidationError(`Directory ${gitPath} exists but is not a git repository.`);
    }

    const fetchUrl = await resolveFetchUrl();
    await mkdir(dirname(gitPath), { recursive: true });
    const clone = await this.runner.run("git", ["clone", "--quiet", fetchUrl, gitPath]);
    if (clone.exitCode !== 0) {
      throw redactedFailure(["clone", "--quiet", fetchUrl, gitPath], clone, "Clone failed. Check credentials and repository access.");
    }
    if (fetchUrl !== plainUrl) {
      await this.checked(gitPath, ["remote", "set-url", "origin", plainUrl]);
    }
    return "cloned";
  }

  /**
   * Compare HEAD with the upstream branch tip without fetching or merging.
   */
  async compareUpstream(gitPath: string, url?: string): Promise<UpstreamComparison> {
    const upstream = await this.upstream(gitPath);
    if (!upstream) return { kind: "no-upstream" };

    const remote = await this.git(gitPath, ["ls-remote", "--refs", "-q", url ?? upstream.remote, `refs/heads/${upstream.branch}`]);
    if (remote.exitCode !== 0) {
      return { kind: "error", message: "Failed to get upstream commit" };
    }
    const upstreamCommit = remote.stdout.trim().split(/\s+/)[0] ?? "";
    if (!upstreamCommit) {
      return { kind: "error", message: "No upstream commit found" };
    }

    const head = await this.git(gitPath, ["rev-parse", "HEAD"]);
    if (head.exitCode === 0 && head.stdout.trim() === upstreamCommit) {
      return { kind: "up-to-date" };
    }

    const count = await this.git(gitPath, ["rev-list", "--count", `HEAD..${upstreamCommit}`]);
    if (count.exitCode !== 0) return { kind: "behind" };
    const commits = parseCount(count.stdout);
    if (commits === 0) return { kind: "up-to-date" };
    return commits === undefined ? { kind: "behind" } : { kind: "behind", commits };
  }

  /**
   * Fetch, then fast-forward to the upstream branch when behind.
   * Zero commits behind leaves the working tree untouched.
   */
  async pull(gitPath: string, url?: string): Promise<PullOutcome> {
    const upstream = await this.upstream(gitPath);
    if (!upstream) return { kind: "failed", message: "No upstream configured" };

    const fetchArgs = url
      ? ["fetch", "--quiet", url, `+refs/heads/*:refs/remotes/${upstream.remote}/*`]
      : ["fetch", "--quiet"];
    const fetched = await this.git(gitPath, fetchArgs);
    if (fetched.exitCode !== 0) {
      return { kind: "failed", message: failureText("Failed to fetch upstream", fetched) };
    }

    const from = await this.shortHead(gitPath);
    const count = await this.git(gitPath, ["rev-list", "--count", `HEAD..${upstream.ref}`]);
    const behind = count.exitCode === 0 ? parseCount(count.stdout) : undefined;
    if (behind === undefined) {
      return { kind: "failed", message: failureText("Failed to get commit count", count) };
    }
    if (behind === 0) return { kind: "up-to-date", head: from };

    const pulled = await this.git(gitPath, ["pull", "--quiet", url ?? upstream.remote, upstream.branch]);
    if (pulled.exitCode !== 0) {
      return { kind: "failed", message: failureText(`Update failed with exit code ${pulled.exitCode}`, pulled) };
    }
    return { kind: "updated", from, to: await this.shortHead(gitPath), commits: behind };
  }

  async shortHead(gitPath: string): Promise<string> {
    const result = await this.git(gitPath, ["rev-parse", "--short", "HEAD"]);
    return result.exitCode === 0 ? result.stdout.trim() : "";
  }

  private async upstream(gitPath: string): Promise<UpstreamRef | undefined> {
    const result = await this.git(gitPath, ["rev-parse", "--abbrev-ref", "--symbolic-full-name", "@{u}"]);
    const ref = result.stdout.trim();
    const slash = ref.indexOf("/");
    if (result.exitCode !== 0 || slash <= 0) return undefined;
    return { ref, remote: ref.slice(0, slash), branch: ref.slice(slash + 1) };
  }

  private git(gitPath: string, args: readonly string[]): Promise<CommandResult> {
    return this.runner.run("git", ["-C", gitPath, ...args]);
  }

  private async checked(gitPath: string, args: readonly string[]): Promise<void> {
    const result = await this.git(gitPath, args);
    if (result.exitCode !== 0) {
      throw redactedFailure(["-C", gitPath, ...args], result);
    }
  }
}

async function isMissingOrEmpty(dir: string): Promise<boolean> {
  try {
    return (await readdir(dir)).length === 0;
  } catch (err) {
    const code = (err as NodeJS.ErrnoException).code;
    if (code === "ENOENT") return true;
    if (code === "ENOTDIR") return false;
    throw err;
  }
}

function parseCount(stdout: string): number | undefined {
  const text = stdout.trim();
  return /^\d+$/.test(text) ? parseInt(text, 10) : undefined;
}

function failureText(summary: string, result: CommandResult): string {
  const detail = redactCredentials(result.stderr.trim() || result.stdout.trim());
  return detail ? `${summary}: ${detail}` : summary;
}

function redactedFailure(args: readonly string[], result: CommandResult, message?: string): ExternalToolError {
  return new ExternalToolError(
    redactCredentials(formatCommand("git", args)),
    result.exitCode,
    redactCredentials([result.stdout, result.stderr].filter(s => s.trim()).join("\n")),
    message,
  );
}
