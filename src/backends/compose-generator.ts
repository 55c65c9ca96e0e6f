/**
 * Compose files synthesized from a project's Dockerfile.
 *
 * `EXPOSE` becomes a host:container port mapping, `ENV` becomes an
 * environment entry. The first line is the generation marker, which later
 * allows uninstall to remove the images built for it.
 */

import { stringify as stringifyYaml } from "yaml";

export const COMPOSE_GENERATED_MARKER = "# Auto-generated by deckhand, will remove images on uninstall";

export interface DockerfileHints {
  ports: string[];
  environment: string[];
}

export function parseDockerfile(content: string): DockerfileHints {
  const ports: string[] = [];
  const environment: string[] = [];

  for (const rawLine of content.split("\n")) {
    const line = rawLine.trim();

    const expose = /^EXPOSE\s+(.+)$/i.exec(line);
    if (expose?.[1]) {
      for (const port of expose[1].split(/\s+/)) {
        ports.push(port.includes(":") ? port : `${port.split("/")[0]}:${port}`);
      }
      continue;
    }

    const env = /^ENV\s+(.+)$/i.exec(line);
    if (env?.[1]) {
      const rest = env[1].trim();
      if (rest.includes("=")) {
        environment.push(...rest.split(/\s+/).filter(Boolean));
      } else {
        const [key, ...value] = rest.split(/\s+/);
        if (key) environment.push(`${key}=${value.join(" ")}`);
      }
    }
  }

  return { ports, environment };
}

export function generateComposeContent(id: string, projectPath: string, dockerfile: string): string {
  const { ports, environment } = parseDockerfile(dockerfile);

  const service: Record<string, unknown> = {
    build: projectPath,
    container_name: id,
  };
  if (ports.length > 0) service["ports"] = ports;
  if (environment.length > 0) service["environment"] = environment;
  service["restart"] = "always";

  return `${COMPOSE_GENERATED_MARKER}\n${stringifyYaml({ services: { [id]: service } })}`;
}
