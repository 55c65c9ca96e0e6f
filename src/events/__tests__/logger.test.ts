/**
 * Tests for the lifecycle event log.
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { EventLogger, type LifecycleEvent } from "../logger.js";
import { mkdtemp, readFile, readdir, rm } from "node:fs/promises";
import { join } from "node:path";
import { tmpdir } from "node:os";

describe("EventLogger", () => {
  let eventsDir: string;

  beforeEach(async () => {
    eventsDir = join(await mkdtemp(join(tmpdir(), "deckhand-events-")), "events");
  });

  afterEach(async () => {
    await rm(join(eventsDir, ".."), { recursive: true, force: true });
  });

  it("appends one JSON line per event to the day's file", async () => {
    const logger = new EventLogger(eventsDir, { now: () => new Date("2026-03-04T05:06:07.000Z") });
    await logger.log("project.enabled", "web", { reinstalled: false });

    const content = await readFile(join(eventsDir, "2026-03-04.jsonl"), "utf-8");
    const event = JSON.parse(content.trim());

    expect(event.type).toBe("project.enabled");
    expect(event.projectId).toBe("web");
    expect(event.actor).toBe("cli");
    expect(event.timestamp).toBe("2026-03-04T05:06:07.000Z");
    expect(event.payload).toEqual({ reinstalled: false });
  });

  it("omits projectId for manager events", async () => {
    const logger = new EventLogger(eventsDir, { actor: "cron" });
    const event = await logger.log("manager.self_updated", undefined, { from: "abc1234", to: "def5678" });

    expect(event.projectId).toBeUndefined();
    expect(event.actor).toBe("cron");
    expect("projectId" in event).toBe(false);
  });

  it("rolls over to a new file per UTC day", async () => {
    let now = new Date("2026-03-04T23:59:59.000Z");
    const logger = new EventLogger(eventsDir, { now: () => now });
    await logger.log("project.started", "web");
    now = new Date("2026-03-05T00:00:01.000Z");
    await logger.log("project.stopped", "web");

    expect((await readdir(eventsDir)).sort()).toEqual(["2026-03-04.jsonl", "2026-03-05.jsonl"]);
  });

  it("keeps eventIds strictly increasing under a frozen clock", async () => {
    const logger = new EventLogger(eventsDir, { now: () => new Date("2026-03-04T00:00:00.000Z") });
    const first = await logger.log("project.started", "a");
    const second = await logger.log("project.started", "b");

    expect(second.eventId).toBe(first.eventId + 1);

    const lines = (await readFile(join(eventsDir, "2026-03-04.jsonl"), "utf-8")).trim().split("\n");
    expect(lines).toHaveLength(2);
  });

  it("invokes the onEvent callback after writing", async () => {
    const seen: LifecycleEvent[] = [];
    const logger = new EventLogger(eventsDir, { onEvent: e => seen.push(e) });
    await logger.log("project.removed", "old");

    expect(seen.map(e => e.type)).toEqual(["project.removed"]);
  });
});
