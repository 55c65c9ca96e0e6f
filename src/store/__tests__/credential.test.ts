import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { chmod, mkdtemp, readFile, rm, stat, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { GlobalCredentialStore } from "../credential.js";
import { NonInteractivePrompter } from "../../prompts/prompter.js";
import { ScriptedPrompter } from "../../testing/scripted-prompter.js";
import { ValidationError, type PermissionDriftWarning } from "../../errors.js";

describe("GlobalCredentialStore", () => {
  let dir: string;
  let filePath: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "deckhand-credential-"));
    filePath = join(dir, "global-credential.txt");
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("reads the trimmed token", async () => {
    await writeFile(filePath, "test-secret\n", { mode: 0o600 });
    const store = new GlobalCredentialStore({ filePath, prompter: new ScriptedPrompter() });
    expect(await store.read()).toBe("test-secret");
  });

  it("asks for a missing token and stores it at mode 0600", async () => {
    const prompter = new ScriptedPrompter({ secret: ["test-secret"] });
    const store = new GlobalCredentialStore({ filePath, prompter });

    expect(await store.read()).toBe("test-secret");
    expect(prompter.asked).toEqual(["Enter the global access token"]);
    expect(await readFile(filePath, "utf-8")).toBe("test-secret\n");
    expect((await stat(filePath)).mode & 0o777).toBe(0o600);
  });

  it("treats an empty file as missing", async () => {
    await writeFile(filePath, "  \n", { mode: 0o600 });
    const store = new GlobalCredentialStore({ filePath, prompter: new ScriptedPrompter({ secret: ["test-secret"] }) });
    expect(await store.read()).toBe("test-secret");
  });

  it("refuses an empty answer", async () => {
    const store = new GlobalCredentialStore({ filePath, prompter: new ScriptedPrompter({ secret: [""] }) });
    await expect(store.read()).rejects.toThrow("An empty access token is not allowed.");
  });

  it("fails without prompting when non-interactive", async () => {
    const store = new GlobalCredentialStore({ filePath, prompter: new NonInteractivePrompter() });
    await expect(store.read()).rejects.toThrow(ValidationError);
    await expect(store.read()).rejects.toThrow(`Global credential ${filePath} is missing. Run once without -q to enter it.`);
  });

  it("warns about loose permissions and fixes them on request", async () => {
    await writeFile(filePath, "test-secret\n");
    await chmod(filePath, 0o644);
    const warnings: PermissionDriftWarning[] = [];
    const prompter = new ScriptedPrompter({ confirm: [true] });
    const store = new GlobalCredentialStore({ filePath, prompter, onWarning: w => warnings.push(w) });

    expect(await store.read()).toBe("test-secret");
    expect(warnings.map(w => w.message)).toEqual([`${filePath} has incorrect permissions (644 instead of 600)`]);
    expect(prompter.asked).toEqual([`Fix permissions of ${filePath} (chmod 600)?`]);
    expect((await stat(filePath)).mode & 0o777).toBe(0o600);
  });

  it("only warns when non-interactive", async () => {
    await writeFile(filePath, "test-secret\n");
    await chmod(filePath, 0o640);
    const warnings: PermissionDriftWarning[] = [];
    const store = new GlobalCredentialStore({ filePath, prompter: new NonInteractivePrompter(), onWarning: w => warnings.push(w) });

    expect(await store.read()).toBe("test-secret");
    expect(warnings).toHaveLength(1);
    expect((await stat(filePath)).mode & 0o777).toBe(0o640);
  });
});
