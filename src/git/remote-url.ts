/**
 * Repository URLs and credential embedding.
 *
 * A token is only ever spliced into an https URL whose host is on the
 * trusted list; `embedCredential` accepts nothing but a TrustedRepoUrl.
 */

import { ValidationError } from "../errors.js";

export interface RepoUrl {
  readonly raw: string;
  /** "https", "http", "ssh", "git", "file" … */
  readonly scheme: string;
  /** Lowercased host, empty for local paths. */
  readonly host: string;
  readonly pathname: string;
}

const SCP_LIKE = /^(?:[^@/]+@)?([^:/]+):(?!\/)(.+)$/;

/**
 * Parse a remote URL. Accepts URLs with a scheme, scp-like
 * `git@host:owner/repo.git`, and plain local paths.
 *
 * @throws ValidationError for an empty string
 */
export function parseRepoUrl(raw: string): RepoUrl {
  const trimmed = raw.trim();
  if (!trimmed) {
    throw new ValidationError("Repository URL cannot be empty");
  }

  if (/^[a-z][a-z0-9+.-]*:\/\//i.test(trimmed)) {
    let parsed: URL;
    try {
      parsed = new URL(trimmed);
    } catch {
      throw new ValidationError(`Invalid repository URL '${trimmed}'`);
    }
    return {
      raw: trimmed,
      scheme: parsed.protocol.replace(/:$/, ""),
      host: parsed.hostname.toLowerCase(),
      pathname: parsed.pathname,
    };
  }

  const scp = SCP_LIKE.exec(trimmed);
  if (scp?.[1] && scp[2]) {
    return { raw: trimmed, scheme: "ssh", host: scp[1].toLowerCase(), pathname: `/${scp[2]}` };
  }

  return { raw: trimmed, scheme: "file", host: "", pathname: trimmed };
}

/** A RepoUrl that passed the trusted-host check. Only `trust` creates one. */
export class TrustedRepoUrl {
  readonly url: RepoUrl;

  private constructor(url: RepoUrl) {
    this.url = url;
  }

  /** Returns undefined unless the URL is https on an allow-listed host. */
  static trust(url: RepoUrl, trustedHosts: readonly string[]): TrustedRepoUrl | undefined {
    if (url.scheme !== "https") return undefined;
    const allowed = trustedHosts.some(h => h.toLowerCase() === url.host);
    return allowed ? new TrustedRepoUrl(url) : undefined;
  }
}

export function trustRepoUrl(url: RepoUrl, trustedHosts: readonly string[]): TrustedRepoUrl | undefined {
  return TrustedRepoUrl.trust(url, trustedHosts);
}

/** `https://host/…` → `https://<token>@host/…` */
export function embedCredential(trusted: TrustedRepoUrl, token: string): string {
  const url = new URL(trusted.url.raw);
  url.username = token;
  url.password = "";
  return url.toString();
}

/** Build the canonical clone URL for `owner/repo` on GitHub. */
export function githubRepoUrl(ownerRepo: string): string {
  const match = /^([A-Za-z0-9_.-]+)\/([A-Za-z0-9_.-]+?)(?:\.git)?$/.exec(ownerRepo.trim());
  if (!match) {
    throw new ValidationError(`Expected owner/repo, got '${ownerRepo}'`);
  }
  return `https://github.com/${match[1]}/${match[2]}.git`;
}

/** Replace any userinfo in URLs inside `text` with `***`. */
export function redactCredentials(text: string): string {
  return text.replace(/(https?:\/\/)[^/@\s]+@/g, "$1***@");
}
