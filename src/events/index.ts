export { EventLogger } from "./logger.js";
export type { EventCallback, EventLoggerOptions, LifecycleEvent, LifecycleEventType } from "./logger.js";
export { ConsoleReporter } from "./reporter.js";
export type { Reporter } from "./reporter.js";
