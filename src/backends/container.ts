/**
 * Container backend: a docker compose stack per project.
 *
 * Every compose call is `docker compose -f <artifact> --project-directory
 * <path> …`. Stop is a full `down`, so a stopped stack stays stopped across
 * reboots; restart is down + up. Image pulls and cleanup go through the
 * Docker engine API (dockerode); compose has no API, so it stays on the CLI.
 */

import { lstat, readFile, readlink } from "node:fs/promises";
import { join } from "node:path";
import type Docker from "dockerode";
import writeFileAtomic from "write-file-atomic";
import { parse as parseYaml } from "yaml";
import type { CommandResult, CommandRunner } from "../exec/runner.js";
import { askEnvironment, type Prompter } from "../prompts/prompter.js";
import type { Reporter } from "../events/reporter.js";
import type { LogLines, ProjectContext } from "../lifecycle/context.js";
import { outputLines } from "../exec/runner.js";
import { openInEditor } from "../prompts/editor.js";
import { NotFoundError } from "../errors.js";
import {
  hasMarker,
  locateArtifact,
  previewGenerated,
  retireArtifact,
  selectArtifact,
  writeArtifact,
} from "./artifact.js";
import { COMPOSE_GENERATED_MARKER, generateComposeContent } from "./compose-generator.js";
import { buildDockerfile, detectPackageManager, suggestedEntrypoint } from "./dockerfile.js";
import { ok, recoverable, type Backend, type RunningState, type StepResult } from "./types.js";

export const COMPOSE_FILE_SUFFIX = ".docker-compose.yml";

export interface ContainerBackendDeps {
  runner: CommandRunner;
  docker: Docker;
  reporter: Reporter;
  prompter: Prompter;
  /** Base image offered when generating a Dockerfile. */
  defaultDockerImage: string;
}

export interface DanglingImage {
  projectId: string;
  reference: string;
  imageId: string;
}

/** Untagged images left behind by pulls, offered for removal at the end of an update. */
export class DanglingImageCollector {
  readonly images: DanglingImage[] = [];

  add(image: DanglingImage): void {
    this.images.push(image);
  }

  get isEmpty(): boolean {
    return this.images.length === 0;
  }

  /** Unique image ids, in discovery order. */
  imageIds(): string[] {
    return [...new Set(this.images.map(i => i.imageId))];
  }
}

export type ServiceChoice =
  | { kind: "match"; name: string }
  | { kind: "none" }
  | { kind: "ambiguous"; candidates: string[] };

/** Exact name first, otherwise a unique prefix. */
export function chooseService(services: readonly string[], answer: string): ServiceChoice {
  if (services.includes(answer)) return { kind: "match", name: answer };
  const candidates = services.filter(s => s.startsWith(answer));
  if (candidates.length === 1 && candidates[0] !== undefined) return { kind: "match", name: candidates[0] };
  return candidates.length === 0 ? { kind: "none" } : { kind: "ambiguous", candidates };
}

/** `nginx:1.27` → `nginx`, `ghcr.io/acme/app@sha256:…` → `ghcr.io/acme/app` */
export function imageRepository(image: string): string {
  const withoutDigest = image.split("@")[0] ?? image;
  const colon = withoutDigest.lastIndexOf(":");
  return colon > withoutDigest.lastIndexOf("/") ? withoutDigest.slice(0, colon) : withoutDigest;
}

/** Images a resolved compose config pulls from a registry (services that build locally are skipped). */
export function registryImages(config: unknown): string[] {
  if (!isRecord(config) || !isRecord(config["services"])) return [];
  const images: string[] = [];
  for (const service of Object.values(config["services"])) {
    if (!isRecord(service) || service["build"] !== undefined) continue;
    const image = service["image"];
    if (typeof image === "string" && image && !images.includes(image)) images.push(image);
  }
  return images;
}

export class ContainerBackend implements Backend {
  readonly kind = "container" as const;
  readonly observable = true;

  private readonly runner: CommandRunner;
  private readonly docker: Docker;
  private readonly reporter: Reporter;
  private readonly prompter: Prompter;
  private readonly defaultDockerImage: string;

  constructor(deps: ContainerBackendDeps) {
    this.runner = deps.runner;
    this.docker = deps.docker;
    this.reporter = deps.reporter;
    this.prompter = deps.prompter;
    this.defaultDockerImage = deps.defaultDockerImage;
  }

  composePath(ctx: ProjectContext): string {
    return join(ctx.projectsDir, `${ctx.record.id}${COMPOSE_FILE_SUFFIX}`);
  }

  async install(ctx: ProjectContext): Promise<StepResult> {
    const path = ctx.record.path;
    const managedPath = this.composePath(ctx);

    try {
      await selectArtifact(
        {
          label: "compose file",
          managedPath,
          candidates: [join(path, "docker-compose.yml"), join(path, "docker-compose-default.yml")],
          synthesize: () => this.synthesize(ctx),
          generate: () => this.generate(ctx, managedPath),
          missingHint: this.prompter.interactive ? undefined : "To generate a Dockerfile, run this command without -q.",
        },
        this.reporter,
      );
    } catch (err) {
      if (err instanceof NotFoundError) return recoverable(err.message);
      throw err;
    }

    this.reporter.info("Building possible docker images ...");
    const build = await this.compose(ctx, managedPath, ["build"], "inherit");
    return build.exitCode === 0 ? ok() : recoverable(`docker compose build failed with exit code ${build.exitCode}`);
  }

  async start(ctx: ProjectContext): Promise<StepResult> {
    return this.trigger(ctx, "start", [["up", "-d"]]);
  }

  async stop(ctx: ProjectContext): Promise<StepResult> {
    return this.trigger(ctx, "stop", [["down"]]);
  }

  async restart(ctx: ProjectContext): Promise<StepResult> {
    return this.trigger(ctx, "restart", [["down"], ["up", "-d"]]);
  }

  async status(ctx: ProjectContext): Promise<RunningState> {
    const file = await locateArtifact(this.composePath(ctx));
    if (!file) return "unknown";
    const result = await this.compose(ctx, file, ["ps", "--services", "--filter", "status=running"]);
    return result.exitCode === 0 && outputLines(result).length > 0 ? "running" : "stopped";
  }

  async uninstall(ctx: ProjectContext): Promise<StepResult> {
    const file = await locateArtifact(this.composePath(ctx));
    if (!file) {
      this.reporter.warn("No valid docker compose file found, possibly already uninstalled.");
      return ok();
    }

    if (!(await hasMarker(file, COMPOSE_GENERATED_MARKER))) {
      this.reporter.info("Stopping possibly running docker containers ...");
      const down = await this.compose(ctx, file, ["down"], "inherit");
      return down.exitCode === 0 ? ok() : recoverable(`docker compose down failed with exit code ${down.exitCode}`);
    }

    this.reporter.info("Stopping possibly running docker containers and removing images ...");
    const down = await this.compose(ctx, file, ["down", "--rmi", "all"], "inherit");
    if (down.exitCode !== 0) {
      return recoverable(`docker compose down failed with exit code ${down.exitCode}`);
    }

    if ((await lstat(file)).isFile()) {
      const retired = await retireArtifact(file, await this.synthesize(ctx, false));
      if (retired === "rotated") {
        this.reporter.info(`Created backup of compose file to ${file}.bak.`);
      }
    }
    return ok();
  }

  async logs(ctx: ProjectContext, lines: LogLines): Promise<StepResult> {
    const file = await locateArtifact(this.composePath(ctx));
    if (!file) return recoverable("No valid docker compose file found, cannot show logs.");
    const args = lines === "follow" ? ["logs", "-f"] : ["logs", "-n", String(lines)];
    const result = await this.compose(ctx, file, args, "inherit");
    return result.exitCode === 0 ? ok() : recoverable(`docker compose logs failed with exit code ${result.exitCode}`);
  }

  async describe(ctx: ProjectContext): Promise<string[]> {
    const managedPath = this.composePath(ctx);
    const file = await locateArtifact(managedPath);
    if (!file) return ["Docker compose file: Not found"];
    const stats = await lstat(file);
    const target = stats.isSymbolicLink() ? ` (→ ${await readlink(file)})` : "";
    return [`Docker compose file: ${file}${target}`];
  }

  async showNativeStatus(ctx: ProjectContext): Promise<void> {
    const file = await locateArtifact(this.composePath(ctx));
    if (file) await this.compose(ctx, file, ["ps", "-a"], "inherit");
  }

  /**
   * Pull every registry image of the resolved compose file one by one,
   * recording images the pull left dangling.
   */
  async pullImages(ctx: ProjectContext, collector: DanglingImageCollector): Promise<StepResult> {
    const file = await locateArtifact(this.composePath(ctx));
    if (!file) return ok();

    const config = await this.compose(ctx, file, ["config"]);
    if (config.exitCode !== 0) return recoverable("Failed to get docker compose config");

    const images = registryImages(parseYaml(config.stdout));
    if (images.length === 0) {
      this.reporter.warn("No images to possibly update found in docker compose file.");
      return ok();
    }

    this.reporter.info("Checking for new docker images:");
    let updated = 0;
    const failed: string[] = [];
    for (const image of images) {
      let outcome: PullOutcome;
      try {
        outcome = await this.pullImage(image);
      } catch (err) {
        this.reporter.error(`  - ${image}: update failed: ${errorMessage(err)}`);
        failed.push(image);
        continue;
      }
      if (outcome === "up-to-date") {
        this.reporter.success(`  - ${image}: already up to date`);
      } else {
        this.reporter.success(`  - ${image}: updated successfully`);
        updated++;
      }
      await this.collectDangling(ctx, image, collector);
    }

    if (updated > 0) {
      this.reporter.success(`Successfully updated ${updated} docker image(s).`);
    } else if (failed.length === 0) {
      this.reporter.success("All docker images already up to date.");
    }
    if (failed.length > 0) {
      return recoverable(`Failed to update ${failed.length} of ${images.length} docker image(s): ${failed.join(", ")}`);
    }
    return ok();
  }

  /** Force-remove images by id; every id is attempted. */
  async removeImages(imageIds: readonly string[]): Promise<StepResult> {
    const failed: string[] = [];
    for (const id of imageIds) {
      try {
        await this.docker.getImage(id).remove({ force: true });
        this.reporter.info(`Removed image ${id}`);
      } catch (err) {
        this.reporter.error(`Could not remove image ${id}: ${errorMessage(err)}`);
        failed.push(id);
      }
    }
    return failed.length === 0 ? ok() : recoverable(`Failed to remove ${failed.length} docker image(s): ${failed.join(" ")}`);
  }

  /** Interactive shell in one of the running services. */
  async shell(ctx: ProjectContext): Promise<StepResult> {
    const file = await locateArtifact(this.composePath(ctx));
    if (!file) return recoverable("No valid docker compose file found, cannot open shell.");
    if ((await this.status(ctx)) !== "running") {
      return recoverable("Container is not running, cannot open shell.");
    }

    const services = outputLines(await this.compose(ctx, file, ["ps", "--services"]));
    const first = services[0];
    if (first === undefined) return recoverable("Could not determine service names from docker compose file.");

    let service = first;
    if (services.length > 1) {
      this.reporter.info(`Multiple services found:\n${services.join("\n")}`);
      if (!this.prompter.interactive) {
        this.reporter.info("Using the first one (run without -q next time to choose).");
      } else {
        const choice = chooseService(services, await this.prompter.input("Enter (start of) service name"));
        if (choice.kind === "none") return recoverable("No services match the given name!");
        if (choice.kind === "ambiguous") return recoverable("Provided service name is ambiguous!");
        service = choice.name;
      }
    }

    this.reporter.header(`Opening container-shell for project ${ctx.record.id} service ${service}:`);
    const result = await this.compose(ctx, file, ["exec", service, "sh", "-l"], "inherit");
    return result.exitCode === 0 ? ok() : recoverable(`Shell exited with code ${result.exitCode}`);
  }

  private async pullImage(image: string): Promise<PullOutcome> {
    const stream = await this.docker.pull(image);
    const events = await new Promise<unknown[]>((resolve, reject) => {
      this.docker.modem.followProgress(stream, (err: Error | null, output: unknown[]) => {
        if (err) reject(err);
        else resolve(output);
      });
    });
    return events.some(isUpToDateEvent) ? "up-to-date" : "updated";
  }

  private async collectDangling(ctx: ProjectContext, image: string, collector: DanglingImageCollector): Promise<void> {
    const repository = imageRepository(image);
    let found: Docker.ImageInfo[];
    try {
      found = await this.docker.listImages({ filters: { dangling: ["true"], reference: [repository] } });
    } catch (err) {
      this.reporter.warn(`Could not list dangling images for ${image}: ${errorMessage(err)}`);
      return;
    }
    for (const info of found) {
      collector.add({ projectId: ctx.record.id, reference: `${repository}:<none>`, imageId: shortImageId(info.Id) });
    }
  }

  private async trigger(ctx: ProjectContext, verb: string, steps: string[][]): Promise<StepResult> {
    const file = await locateArtifact(this.composePath(ctx));
    if (!file) return recoverable(`No valid docker compose file found, cannot ${verb}.`);

    for (const args of steps) {
      const result = await this.compose(ctx, file, args, "inherit");
      if (result.exitCode !== 0) {
        return recoverable(`docker compose ${args.join(" ")} failed with exit code ${result.exitCode}`);
      }
    }
    return ok();
  }

  private compose(
    ctx: ProjectContext,
    file: string,
    args: readonly string[],
    stdio: "pipe" | "inherit" = "pipe",
  ): Promise<CommandResult> {
    return this.runner.run(
      "docker",
      ["compose", "-f", file, "--project-directory", ctx.record.path, ...args],
      { stdio },
    );
  }

  private async synthesize(ctx: ProjectContext, announce = true): Promise<string | undefined> {
    const dockerfilePath = join(ctx.record.path, "Dockerfile");
    let dockerfile: string;
    try {
      dockerfile = await readFile(dockerfilePath, "utf-8");
    } catch (err) {
      if ((err as NodeJS.ErrnoException).code === "ENOENT") return undefined;
      throw err;
    }
    const content = generateComposeContent(ctx.record.id, ctx.record.path, dockerfile);
    if (announce) this.reporter.info(previewGenerated(this.composePath(ctx), content));
    return content;
  }

  private async generate(ctx: ProjectContext, managedPath: string): Promise<boolean> {
    const path = ctx.record.path;
    if (!this.prompter.interactive) return false;
    if (!(await this.prompter.confirm(`No compose file or Dockerfile found. Generate a Dockerfile in ${path}?`, true))) {
      return false;
    }

    const packageManager = await detectPackageManager(path);
    const suggested = suggestedEntrypoint(packageManager);
    const entrypoint = await this.prompter.input(`Entrypoint (e.g. ${suggested})`, suggested);
    const port = await this.prompter.input("Port (e.g. 8700 or 8700:8700, leave blank for none)", "");
    const environment = await askEnvironment(this.prompter);

    const dockerfilePath = join(path, "Dockerfile");
    const dockerfile = buildDockerfile({
      baseImage: this.defaultDockerImage,
      packageManager,
      entrypoint,
      ...(port && { port }),
      environment,
    });
    await writeFileAtomic(dockerfilePath, dockerfile, "utf-8");
    this.reporter.info(previewGenerated(dockerfilePath, dockerfile));
    if (await this.prompter.confirm("Do you want to edit the Dockerfile?", false)) {
      await openInEditor(this.runner, dockerfilePath);
    }

    const compose = generateComposeContent(ctx.record.id, path, await readFile(dockerfilePath, "utf-8"));
    await writeArtifact(managedPath, compose);
    this.reporter.info(previewGenerated(managedPath, compose));
    if (await this.prompter.confirm("Do you want to edit the docker compose file?", false)) {
      await openInEditor(this.runner, managedPath);
    }
    return true;
  }
}

type PullOutcome = "updated" | "up-to-date";

function isUpToDateEvent(event: unknown): boolean {
  return isRecord(event) && typeof event["status"] === "string" && event["status"].startsWith("Status: Image is up to date");
}

/** `sha256:0123…` → the 12-character id the docker CLI prints. */
export function shortImageId(id: string): string {
  return id.replace(/^sha256:/, "").slice(0, 12);
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
