import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { parse as parseYaml } from "yaml";
import { COMPOSE_GENERATED_MARKER, generateComposeContent, parseDockerfile } from "../compose-generator.js";
import { buildDockerfile, detectPackageManager, suggestedEntrypoint } from "../dockerfile.js";
import { SERVICE_GENERATED_MARKER, generateServiceUnit } from "../service-unit.js";

describe("parseDockerfile", () => {
  it("maps EXPOSE to host:container ports", () => {
    expect(parseDockerfile("FROM node:22\nEXPOSE 8080 9090/udp\nexpose 3000:80\n").ports).toEqual([
      "8080:8080",
      "9090:9090/udp",
      "3000:80",
    ]);
  });

  it("collects both ENV forms", () => {
    expect(parseDockerfile("ENV A=1 B=2\nENV GREETING hello world\n").environment).toEqual([
      "A=1",
      "B=2",
      "GREETING=hello world",
    ]);
  });

  it("ignores other instructions", () => {
    expect(parseDockerfile("FROM node\nRUN npm install\nCMD [\"node\"]\n")).toEqual({ ports: [], environment: [] });
  });
});

describe("generateComposeContent", () => {
  it("starts with the marker and builds the project path", () => {
    const content = generateComposeContent("web", "/srv/web", "FROM node\nEXPOSE 3000\nENV NODE_ENV=production\n");

    expect(content.split("\n")[0]).toBe(COMPOSE_GENERATED_MARKER);
    expect(parseYaml(content)).toEqual({
      services: {
        web: {
          build: "/srv/web",
          container_name: "web",
          ports: ["3000:3000"],
          environment: ["NODE_ENV=production"],
          restart: "always",
        },
      },
    });
  });

  it("omits empty port and environment lists", () => {
    const content = generateComposeContent("api", "/srv/api", "FROM node\n");
    expect(parseYaml(content)).toEqual({
      services: { api: { build: "/srv/api", container_name: "api", restart: "always" } },
    });
  });
});

describe("Dockerfile generation", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "deckhand-dockerfile-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("detects yarn from the lock file", async () => {
    await writeFile(join(dir, "yarn.lock"), "");
    expect(await detectPackageManager(dir)).toBe("yarn");
  });

  it("detects yarn from the packageManager field", async () => {
    await writeFile(join(dir, "package.json"), '{ "packageManager": "yarn@4.1.0" }');
    expect(await detectPackageManager(dir)).toBe("yarn");
  });

  it("falls back to npm for a plain package.json, none without one", async () => {
    expect(await detectPackageManager(dir)).toBe("none");
    await writeFile(join(dir, "package.json"), '{ "name": "web" }');
    expect(await detectPackageManager(dir)).toBe("npm");
  });

  it("suggests an entrypoint per package manager", () => {
    expect(suggestedEntrypoint("yarn")).toBe("yarn start");
    expect(suggestedEntrypoint("npm")).toBe("npm start");
    expect(suggestedEntrypoint("none")).toBe("node index.js");
  });

  it("writes an npm Dockerfile with port and environment", () => {
    expect(
      buildDockerfile({
        baseImage: "node:22-alpine",
        packageManager: "npm",
        entrypoint: "npm  start",
        port: "8700",
        environment: ["NODE_ENV=production"],
      }),
    ).toBe(
      [
        "FROM node:22-alpine",
        "WORKDIR /usr/src/app",
        "RUN corepack enable",
        "COPY . .",
        "RUN npm install",
        'ENTRYPOINT ["npm","start"]',
        "EXPOSE 8700",
        "ENV NODE_ENV=production",
        "",
      ].join("\n"),
    );
  });

  it("writes a yarn Dockerfile without port", () => {
    const lines = buildDockerfile({ baseImage: "node:22", packageManager: "yarn", entrypoint: "yarn start", environment: [] }).split("\n");
    expect(lines.slice(4, 7)).toEqual(["RUN yarn set version stable", "RUN yarn install", 'ENTRYPOINT ["yarn","start"]']);
    expect(lines.some(l => l.startsWith("EXPOSE"))).toBe(false);
  });
});

describe("generateServiceUnit", () => {
  it("renders a complete unit", () => {
    expect(
      generateServiceUnit({
        id: "worker",
        workingDirectory: "/srv/worker",
        execStart: "/usr/bin/node main.js",
        user: "deploy",
        environment: ["PORT=8080", 'GREETING=say "hi"'],
      }),
    ).toBe(
      [
        SERVICE_GENERATED_MARKER,
        "[Unit]",
        "Description=worker (managed by deckhand)",
        "After=network.target",
        "",
        "[Service]",
        "Type=simple",
        "User=deploy",
        "WorkingDirectory=/srv/worker",
        "ExecStart=/usr/bin/node main.js",
        "Restart=always",
        'Environment="PORT=8080"',
        'Environment="GREETING=say \\"hi\\""',
        "",
        "[Install]",
        "WantedBy=multi-user.target",
        "",
      ].join("\n"),
    );
  });

  it("leaves out User= when no user is given", () => {
    const unit = generateServiceUnit({ id: "worker", workingDirectory: "/srv/worker", execStart: "./run" });
    expect(unit.split("\n").filter(l => l.startsWith("User="))).toEqual([]);
  });
});
