import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { lstat, mkdir, mkdtemp, readFile, readlink, rm, symlink, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { ServiceBackend } from "../service.js";
import { generateServiceUnit } from "../service-unit.js";
import { createProjectContext, DEFAULT_RUN_OPTIONS, type ProjectContext } from "../../lifecycle/context.js";
import { NonInteractivePrompter, type Prompter } from "../../prompts/prompter.js";
import { FakeRunner } from "../../testing/fake-runner.js";
import { MemoryReporter } from "../../testing/memory-reporter.js";
import { ScriptedPrompter } from "../../testing/scripted-prompter.js";

describe("ServiceBackend", () => {
  let dir: string;
  let projectsDir: string;
  let systemdDir: string;
  let projectPath: string;
  let unitPath: string;
  let linkPath: string;
  let runner: FakeRunner;
  let reporter: MemoryReporter;
  let ctx: ProjectContext;

  const backend = (prompter: Prompter = new NonInteractivePrompter()): ServiceBackend =>
    new ServiceBackend({ runner, reporter, prompter, systemdDir, user: "deploy" });

  const installUnit = async (): Promise<void> => {
    await writeFile(unitPath, "[Service]\nExecStart=/bin/true\n");
    await symlink(unitPath, linkPath);
  };

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "deckhand-service-"));
    projectsDir = join(dir, "projects");
    systemdDir = join(dir, "systemd");
    projectPath = join(dir, "worker");
    await Promise.all([mkdir(projectsDir), mkdir(systemdDir), mkdir(projectPath)]);
    unitPath = join(projectsDir, "worker.service");
    linkPath = join(systemdDir, "worker.service");
    runner = new FakeRunner();
    reporter = new MemoryReporter();
    ctx = createProjectContext(
      { id: "worker", enabled: true, type: "service", repoUrl: "https://github.com/acme/worker.git", auth: { mode: "none" }, path: projectPath },
      projectsDir,
      DEFAULT_RUN_OPTIONS,
    );
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  describe("install", () => {
    it("links the project's unit into the systemd directory", async () => {
      await writeFile(join(projectPath, "worker.service"), "[Service]\nExecStart=/bin/true\n");

      expect(await backend().install(ctx)).toEqual({ kind: "success" });
      expect(await readlink(unitPath)).toBe(join(projectPath, "worker.service"));
      expect(await readlink(linkPath)).toBe(unitPath);
      expect(runner.lines()).toEqual(["systemctl daemon-reload"]);
      expect(reporter.messages("info")).toContain(`Linked service file ${linkPath} to ${unitPath}`);
    });

    it("leaves the artifact and link untouched when installed again", async () => {
      const unit = "[Service]\nExecStart=/bin/true\n";
      await writeFile(join(projectPath, "worker.service"), unit);
      await backend().install(ctx);
      const firstLink = await lstat(linkPath);

      expect(await backend().install(ctx)).toEqual({ kind: "success" });
      expect(await readlink(unitPath)).toBe(join(projectPath, "worker.service"));
      expect(await readlink(linkPath)).toBe(unitPath);
      expect((await lstat(linkPath)).ino).toBe(firstLink.ino);
      expect(await readFile(unitPath, "utf-8")).toBe(unit);
      expect(reporter.messages("info").slice(-3)).toEqual([
        `Linked service file: ${join(projectPath, "worker.service")}`,
        `Service file ${linkPath} already linked to ${unitPath}`,
        "Reloading systemd daemon ...",
      ]);
      expect(runner.lines()).toEqual(["systemctl daemon-reload", "systemctl daemon-reload"]);
    });

    it("falls back to the project's default service file", async () => {
      await writeFile(join(projectPath, "default.service"), "[Service]\n");
      await backend().install(ctx);
      expect(await readlink(unitPath)).toBe(join(projectPath, "default.service"));
    });

    it("keeps an existing correct link", async () => {
      await installUnit();

      expect(await backend().install(ctx)).toEqual({ kind: "success" });
      expect(reporter.messages("info")).toContain(`Service file ${linkPath} already linked to ${unitPath}`);
    });

    it("replaces a dangling link", async () => {
      await writeFile(unitPath, "[Service]\n");
      await symlink(join(dir, "gone.service"), linkPath);

      await backend().install(ctx);
      expect(await readlink(linkPath)).toBe(unitPath);
    });

    it("refuses to replace a foreign unit", async () => {
      await writeFile(unitPath, "[Service]\n");
      await writeFile(linkPath, "[Service]\nExecStart=/usr/bin/other\n");

      expect(await backend().install(ctx)).toEqual({
        kind: "recoverable",
        message: `A service file already exists at ${linkPath}, cannot install worker.`,
      });
      expect(await readFile(linkPath, "utf-8")).toBe("[Service]\nExecStart=/usr/bin/other\n");
      expect(runner.calls).toEqual([]);
    });

    it("fails with a hint when there is no unit and input is disabled", async () => {
      expect(await backend().install(ctx)).toEqual({
        kind: "recoverable",
        message: "No service file could be determined. To generate a service file, run this command without -q.",
      });
    });

    it("generates a unit interactively", async () => {
      const prompter = new ScriptedPrompter({ confirm: [true, false], input: ["/usr/bin/node main.js", "PORT=8080", ""] });

      expect(await backend(prompter).install(ctx)).toEqual({ kind: "success" });
      expect((await lstat(unitPath)).isFile()).toBe(true);
      expect(await readFile(unitPath, "utf-8")).toBe(
        generateServiceUnit({
          id: "worker",
          workingDirectory: projectPath,
          execStart: "/usr/bin/node main.js",
          user: "deploy",
          environment: ["PORT=8080"],
        }),
      );
      expect(await readlink(linkPath)).toBe(unitPath);
    });
  });

  describe("status", () => {
    it("is unknown while not installed", async () => {
      expect(await backend().status(ctx)).toBe("unknown");
      expect(runner.calls).toEqual([]);
    });

    it("asks systemd whether the unit is active", async () => {
      await installUnit();
      runner.on("systemctl is-active worker", { stdout: "active\n" }, { exitCode: 3, stdout: "inactive\n" });

      expect(await backend().status(ctx)).toBe("running");
      expect(await backend().status(ctx)).toBe("stopped");
    });
  });

  describe("triggers", () => {
    it("runs systemctl verbs by unit name", async () => {
      await installUnit();
      await backend().start(ctx);
      await backend().stop(ctx);
      await backend().restart(ctx);
      expect(runner.lines()).toEqual(["systemctl start worker", "systemctl stop worker", "systemctl restart worker"]);
    });

    it("includes systemd's complaint in a failure", async () => {
      await installUnit();
      runner.on("systemctl start", { exitCode: 1, stderr: "Job for worker.service failed.\n" });
      expect(await backend().start(ctx)).toEqual({
        kind: "recoverable",
        message: "systemctl start worker failed with exit code 1: Job for worker.service failed.",
      });
    });

    it("refuses while not installed", async () => {
      expect(await backend().restart(ctx)).toEqual({ kind: "recoverable", message: "No valid service file found, cannot restart." });
    });
  });

  describe("uninstall", () => {
    it("stops the unit and removes the link but keeps the unit file", async () => {
      await installUnit();

      expect(await backend().uninstall(ctx)).toEqual({ kind: "success" });
      expect(runner.lines()).toEqual(["systemctl stop worker", "systemctl daemon-reload"]);
      await expect(lstat(linkPath)).rejects.toThrow();
      expect((await lstat(unitPath)).isFile()).toBe(true);
    });

    it("warns about a same-named unit it does not manage", async () => {
      await backend().uninstall(ctx);
      expect(reporter.messages("warn")).toEqual([
        "No valid project service file found, but found systemd service worker! There might be another service with the same name!",
      ]);
    });

    it("warns when nothing is left to uninstall", async () => {
      runner.on("systemctl status worker", { exitCode: 4 });
      expect(await backend().uninstall(ctx)).toEqual({ kind: "success" });
      expect(reporter.messages("warn")).toEqual(["No valid service file and no systemd service found, possibly already uninstalled."]);
      expect(runner.lines()).toEqual(["systemctl status worker", "systemctl daemon-reload"]);
    });
  });

  it("shows journal lines for the unit", async () => {
    await installUnit();
    await backend().logs(ctx, 50);
    await backend().logs(ctx, "follow");
    expect(runner.lines()).toEqual(["journalctl -u worker -n 50", "journalctl -u worker -f"]);
  });

  it("describes the managed unit", async () => {
    expect(await backend().describe(ctx)).toEqual(["Service file: Not found"]);
    await installUnit();
    expect(await backend().describe(ctx)).toEqual([`Service file: ${unitPath}`]);
  });
});
