/**
 * Event logger: append-only JSONL log of lifecycle transitions.
 *
 * One file per UTC day: `<eventsDir>/<YYYY-MM-DD>.jsonl`.
 */

import { appendFile, mkdir } from "node:fs/promises";
import { join } from "node:path";

export type LifecycleEventType =
  | "project.added"
  | "project.removed"
  | "project.enabled"
  | "project.enable_failed"
  | "project.disabled"
  | "project.started"
  | "project.stopped"
  | "project.restarted"
  | "project.updated"
  | "manager.self_updated";

export interface LifecycleEvent {
  eventId: number;
  type: LifecycleEventType;
  timestamp: string;
  actor: string;
  projectId?: string;
  payload: Record<string, unknown>;
}

export type EventCallback = (event: LifecycleEvent) => void;

export interface EventLoggerOptions {
  /** Recorded as `actor` on every event (default: "cli"). */
  actor?: string;
  /** Invoked after each event is written. */
  onEvent?: EventCallback;
  /** Clock override for tests. */
  now?: () => Date;
}

export class EventLogger {
  private readonly eventsDir: string;
  private readonly actor: string;
  private readonly onEvent?: EventCallback;
  private readonly now: () => Date;
  private lastEventId = 0;

  constructor(eventsDir: string, options: EventLoggerOptions = {}) {
    this.eventsDir = eventsDir;
    this.actor = options.actor ?? "cli";
    this.onEvent = options.onEvent;
    this.now = options.now ?? (() => new Date());
  }

  async log(
    type: LifecycleEventType,
    projectId: string | undefined,
    payload: Record<string, unknown> = {},
  ): Promise<LifecycleEvent> {
    const at = this.now();
    // Millisecond clock, bumped so ids stay strictly increasing within a run.
    const eventId = Math.max(at.getTime(), this.lastEventId + 1);
    this.lastEventId = eventId;

    const event: LifecycleEvent = {
      eventId,
      type,
      timestamp: at.toISOString(),
      actor: this.actor,
      ...(projectId !== undefined && { projectId }),
      payload,
    };

    await mkdir(this.eventsDir, { recursive: true });
    const filePath = join(this.eventsDir, `${event.timestamp.slice(0, 10)}.jsonl`);
    await appendFile(filePath, JSON.stringify(event) + "\n", "utf-8");

    this.onEvent?.(event);
    return event;
  }
}
