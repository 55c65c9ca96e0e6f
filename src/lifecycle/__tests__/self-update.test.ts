import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { selfUpdate, type SelfUpdateDeps } from "../self-update.js";
import { GitEngine } from "../../git/engine.js";
import { EventLogger, type LifecycleEvent } from "../../events/logger.js";
import { FakeRunner } from "../../testing/fake-runner.js";
import { MemoryReporter } from "../../testing/memory-reporter.js";

describe("selfUpdate", () => {
  let installDir: string;
  let runner: FakeRunner;
  let reporter: MemoryReporter;
  let events: LifecycleEvent[];
  let deps: SelfUpdateDeps;

  const git = (args: string): string => `git -C ${installDir} ${args}`;

  beforeEach(async () => {
    installDir = await mkdtemp(join(tmpdir(), "deckhand-self-update-"));
    runner = new FakeRunner();
    reporter = new MemoryReporter();
    events = [];
    deps = {
      git: new GitEngine(runner, { trustedHosts: ["github.com"] }),
      runner,
      reporter,
      events: new EventLogger(join(installDir, "events"), { onEvent: e => events.push(e) }),
      installDir,
      config: { postUpdateCommands: [["npm", "ci"], ["npm", "run", "build"]] },
      version: "0.1.0",
    };
    runner.on(git("rev-parse --is-inside-work-tree"), { stdout: "true\n" });
    runner.on(git("rev-parse --abbrev-ref --symbolic-full-name @{u}"), { stdout: "origin/main\n" });
  });

  afterEach(async () => {
    await rm(installDir, { recursive: true, force: true });
  });

  it("only reports inside the relaunched process", async () => {
    expect(await selfUpdate(deps, { internalRecursive: true })).toEqual({ kind: "skipped" });
    expect(reporter.messages("success")).toEqual(["Successfully updated deckhand to 0.1.0."]);
    expect(runner.calls).toEqual([]);
  });

  it("refuses outside a git checkout", async () => {
    runner.on(git("rev-parse --is-inside-work-tree"), { exitCode: 128 });

    expect(await selfUpdate(deps, { internalRecursive: false })).toEqual({
      kind: "failed",
      message: `${installDir} is not a git checkout, cannot self-update.`,
    });
    expect(reporter.messages("error")).toEqual([
      `${installDir} is not a git checkout, cannot self-update.`,
      "Failed to update deckhand.",
    ]);
  });

  it("does nothing further when already up to date", async () => {
    runner.on(git("rev-parse --short HEAD"), { stdout: "abc1234\n" });
    runner.on(git("rev-list --count"), { stdout: "0\n" });

    expect(await selfUpdate(deps, { internalRecursive: false })).toEqual({ kind: "up-to-date" });
    expect(reporter.messages("success")).toEqual(["deckhand is already up to date (0.1.0)!"]);
    expect(runner.linesStartingWith("npm")).toEqual([]);
    expect(events).toEqual([]);
  });

  describe("after new commits", () => {
    beforeEach(async () => {
      runner.on(git("rev-parse --short HEAD"), { stdout: "abc1234\n" }, { stdout: "def5678\n" });
      runner.on(git("rev-list --count"), { stdout: "2\n" });
      await writeFile(join(installDir, "package.json"), '{ "name": "deckhand" }');
    });

    it("rebuilds and asks for a relaunch", async () => {
      expect(await selfUpdate(deps, { internalRecursive: false })).toEqual({
        kind: "restart-requested",
        from: "abc1234",
        to: "def5678",
      });
      expect(runner.calls.filter(c => c.command === "npm").map(c => [c.line, c.options.cwd])).toEqual([
        ["npm ci", installDir],
        ["npm run build", installDir],
      ]);
      expect(reporter.messages("info")).toEqual([
        "Fetching updates ...",
        "Running `npm ci` ...",
        "Running `npm run build` ...",
        "Restarting deckhand ...",
      ]);
      expect(events[0]).toMatchObject({ type: "manager.self_updated", payload: { from: "abc1234", to: "def5678" } });
    });

    it("pulls from a configured remote", async () => {
      deps.config = { repoUrl: "https://github.com/acme/deckhand.git", postUpdateCommands: [] };
      await selfUpdate(deps, { internalRecursive: false });
      expect(runner.linesStartingWith(git("pull"))).toEqual([git("pull --quiet https://github.com/acme/deckhand.git main")]);
    });

    it("stops at a failing build step", async () => {
      runner.on("npm ci", { exitCode: 1 });

      expect(await selfUpdate(deps, { internalRecursive: false })).toEqual({
        kind: "failed",
        message: "`npm ci` failed with exit code 1",
      });
      expect(runner.linesStartingWith("npm")).toEqual(["npm ci"]);
      expect(events).toEqual([]);
    });
  });
});
