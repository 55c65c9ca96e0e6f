/**
 * deckhand: single-host deployment manager.
 *
 * Projects are YAML records in the projects directory; each one is a git
 * working copy run as a compose stack, a systemd unit or a set of scripts.
 * Only `enabled` is persisted; running state is always observed.
 */

export * from "./errors.js";
export * from "./schemas/project.js";
export * from "./schemas/config.js";
export * from "./config/manager.js";
export * from "./store/project-store.js";
export * from "./store/selector.js";
export * from "./store/credential.js";
export * from "./git/remote-url.js";
export * from "./git/engine.js";
export * from "./exec/runner.js";
export * from "./prompts/prompter.js";
export * from "./events/index.js";
export * from "./backends/index.js";
export * from "./lifecycle/context.js";
export * from "./lifecycle/poller.js";
export * from "./lifecycle/orchestrator.js";
export * from "./lifecycle/batch.js";
export * from "./lifecycle/self-update.js";
export { createCli, type Cli, type CliHost } from "./cli/program.js";
