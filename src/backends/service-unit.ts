/**
 * systemd unit generation for `service` projects.
 */

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface ServiceUnitConfig {
  /** Project id, used in the description. */
  id: string;
  /** Working directory of the service (the project path). */
  workingDirectory: string;
  /** ExecStart command line, absolute or relative to the working directory. */
  execStart: string;
  /** Account the service runs as; omitted lines run it as root. */
  user?: string;
  /** `KEY=value` pairs. */
  environment?: string[];
}

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

export const SERVICE_GENERATED_MARKER = "# Auto-generated by deckhand";
export const SERVICE_FILE_EXTENSION = ".service";
export const DEFAULT_SERVICE_FILE = "default.service";

// ---------------------------------------------------------------------------
// Generators
// ---------------------------------------------------------------------------

/**
 * Generate a system unit file string, tagged with the generation marker.
 */
export function generateServiceUnit(config: ServiceUnitConfig): string {
  const envLines = (config.environment ?? []).map(kv => `Environment="${kv.replace(/"/g, '\\"')}"`);

  return [
    SERVICE_GENERATED_MARKER,
    "[Unit]",
    `Description=${config.id} (managed by deckhand)`,
    "After=network.target",
    "",
    "[Service]",
    "Type=simple",
    ...(config.user ? [`User=${config.user}`] : []),
    `WorkingDirectory=${config.workingDirectory}`,
    `ExecStart=${config.execStart}`,
    "Restart=always",
    ...envLines,
    "",
    "[Install]",
    "WantedBy=multi-user.target",
    "",
  ].join("\n");
}
