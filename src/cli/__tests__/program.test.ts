import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { mkdir, mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { createCli, type Cli } from "../program.js";
import { ProjectStore } from "../../store/project-store.js";
import { NonInteractivePrompter, type Prompter } from "../../prompts/prompter.js";
import { FakeRunner } from "../../testing/fake-runner.js";
import { MemoryReporter } from "../../testing/memory-reporter.js";
import { ScriptedPrompter } from "../../testing/scripted-prompter.js";

const REPO = "https://github.com/acme/web.git";

describe("deckhand CLI", () => {
  let root: string;
  let installDir: string;
  let jobsPath: string;
  let runner: FakeRunner;
  let reporter: MemoryReporter;
  let store: ProjectStore;

  const run = async (args: string[], prompter: Prompter = new NonInteractivePrompter()): Promise<Cli> => {
    const cli = createCli({ runner, reporter, prompter, sleep: async () => {}, cwd: root, env: {}, installDir, serviceUser: "deploy" });
    await cli.program.parseAsync(["--root", root, ...args], { from: "user" });
    return cli;
  };

  const saveProjects = async (): Promise<void> => {
    await store.save({ id: "web", enabled: false, type: "container", repoUrl: REPO, auth: { mode: "none" }, path: "/srv/web" });
    await store.save({ id: "jobs", enabled: true, type: "scripts", repoUrl: REPO, auth: { mode: "none" }, path: jobsPath });
  };

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), "deckhand-cli-"));
    installDir = join(root, "install");
    jobsPath = join(root, "jobs");
    await mkdir(jobsPath);
    runner = new FakeRunner();
    reporter = new MemoryReporter();
    store = new ProjectStore({ projectsDir: join(root, "projects") });
  });

  afterEach(async () => {
    process.exitCode = undefined;
    vi.restoreAllMocks();
    await rm(root, { recursive: true, force: true });
  });

  it("lists every project without banners", async () => {
    await saveProjects();

    await run(["list"]);
    expect(reporter.messages("info")).toEqual([`? jobs: ${jobsPath}`, "✗ web: /srv/web"]);
    expect(reporter.messages("header")).toEqual([]);
    expect(process.exitCode).toBeUndefined();
  });

  it("asks before acting on all projects", async () => {
    await saveProjects();
    const prompter = new ScriptedPrompter({ confirm: [false] });

    await run(["start"], prompter);
    expect(prompter.asked).toEqual(["Found 2 projects: jobs, web. Are you sure you want to start ALL 2 projects?"]);
    expect(reporter.messages("info")).toEqual(["Cancelled."]);
    expect(runner.calls).toEqual([]);
  });

  it("runs a batch without asking under --quiet", async () => {
    await saveProjects();
    await writeFile(join(jobsPath, "start.sh"), "#!/bin/sh\n", { mode: 0o755 });

    await run(["-q", "start"]);
    expect(reporter.messages("header")).toEqual(["Starting project jobs", "Starting project web"]);
    expect(reporter.messages("success")).toEqual(["Project jobs started."]);
    expect(reporter.messages("warn")).toEqual(["Not enabled, skipping start."]);
    expect(runner.lines()).toEqual([join(jobsPath, "start.sh")]);
    expect(process.exitCode).toBeUndefined();
  });

  it("selects projects by pattern", async () => {
    await saveProjects();
    await store.save({ id: "web_admin", enabled: false, type: "container", repoUrl: REPO, auth: { mode: "none" }, path: "/srv/admin" });

    await run(["list", "web+"]);
    expect(reporter.messages("info")).toEqual(["✗ web: /srv/web", "✗ web_admin: /srv/admin"]);
  });

  it("fails for an unknown project", async () => {
    await saveProjects();

    await run(["stop", "nope"]);
    expect(reporter.messages("error")).toEqual(["Project nope not found."]);
    expect(process.exitCode).toBe(1);
  });

  it("rejects a bad line count before doing anything", async () => {
    await saveProjects();

    await run(["-n", "0", "logs", "web"]);
    expect(reporter.messages("error")).toEqual(["Invalid number of lines '0' (expected a positive number, f or follow)"]);
    expect(runner.calls).toEqual([]);
    expect(process.exitCode).toBe(1);
  });

  it("shows the configured number of log lines for several projects", async () => {
    await saveProjects();
    await writeFile(join(root, "deckhand.yaml"), "logLines: 25\n");
    const managed = join(root, "projects", "web.docker-compose.yml");
    await writeFile(managed, "services: {}\n");
    await writeFile(join(jobsPath, "logs.sh"), "#!/bin/sh\n", { mode: 0o755 });

    await run(["-q", "logs"]);
    expect(runner.lines()).toEqual([join(jobsPath, "logs.sh"), `docker compose -f ${managed} --project-directory /srv/web logs -n 25`]);
  });

  it("adds a project from options", async () => {
    await run(["-q", "add", "api", "--repo", "acme/api", "--type", "service"]);

    expect(await store.load("api")).toEqual({
      id: "api",
      enabled: false,
      type: "service",
      repoUrl: "https://github.com/acme/api.git",
      auth: { mode: "none" },
      path: join(root, "api"),
    });
  });

  describe("update", () => {
    const git = (args: string): string => `git -C ${installDir} ${args}`;

    it("updates itself even without projects", async () => {
      runner.on(git("rev-parse --is-inside-work-tree"), { exitCode: 128 });

      const cli = await run(["update"]);
      expect(reporter.messages("header")).toEqual(["SELF-UPDATE"]);
      expect(reporter.messages("error")).toEqual([
        `${installDir} is not a git checkout, cannot self-update.`,
        "Failed to update deckhand.",
      ]);
      expect(cli.relaunchRequested).toBe(false);
      expect(process.exitCode).toBe(1);
    });

    it("requests a relaunch after pulling new code", async () => {
      await saveProjects();
      runner.on(git("rev-parse --is-inside-work-tree"), { stdout: "true\n" });
      runner.on(git("rev-parse --abbrev-ref --symbolic-full-name @{u}"), { stdout: "origin/main\n" });
      runner.on(git("rev-parse --short HEAD"), { stdout: "abc1234\n" }, { stdout: "def5678\n" });
      runner.on(git("rev-list --count"), { stdout: "1\n" });

      const cli = await run(["-q", "update"]);
      expect(cli.relaunchRequested).toBe(true);
      expect(reporter.messages("header")).toEqual(["SELF-UPDATE"]);
      expect(runner.lines().filter(l => !l.startsWith(`git -C ${installDir}`))).toEqual([]);
    });

    it("only reports the new version in the relaunched process", async () => {
      const cli = await run(["-q", "--internal-recursive", "update"]);

      expect(cli.relaunchRequested).toBe(false);
      expect(reporter.messages("header")).toEqual([]);
      expect(reporter.messages("success")).toEqual(["Successfully updated deckhand to unknown."]);
      expect(runner.calls).toEqual([]);
    });
  });

  describe("config", () => {
    it("sets and reads back a value", async () => {
      const log = vi.spyOn(console, "log").mockImplementation(() => {});

      await run(["config", "set", "logLines", "25"]);
      expect(log.mock.calls[0]).toEqual(["✅ Config updated: logLines"]);
      expect(log.mock.calls[1]).toEqual(["  logLines: undefined → 25"]);
      expect(await readFile(join(root, "deckhand.yaml"), "utf-8")).toBe("logLines: 25\n");

      log.mockClear();
      await run(["config", "get", "logLines"]);
      expect(log.mock.calls).toEqual([["25"]]);
    });

    it("rejects an invalid value", async () => {
      vi.spyOn(console, "log").mockImplementation(() => {});

      await run(["config", "set", "logLines", "0"]);
      expect(process.exitCode).toBe(1);
    });
  });
});
