import type { PortSpec, Target, TargetKind } from "@ingress-warden/shared";
import type { DeploymentConfig } from "./env";
import { ConfigurationMissingError, ValidationError } from "./errors";

export const GPU_DEFAULT_PORTS: readonly PortSpec[] = [
  { port: 22, description: "SSH" },
  { port: 50051, description: "Riva gRPC" },
  { port: 8000, description: "Riva HTTP/Health" },
];

export const BUILDBOX_DEFAULT_PORTS: readonly PortSpec[] = [
  { port: 22, description: "SSH" },
  { port: 8443, description: "WebSocket Bridge (WSS)" },
  { port: 8444, description: "HTTPS Demo Server" },
];

/** Browser clients have no fixed address, so the bridge and demo ports are open to all. */
export const BUILDBOX_DEFAULT_PUBLIC_PORTS: readonly number[] = [8443, 8444];

const DISPLAY_NAMES: Record<TargetKind["kind"], string> = {
  gpu: "GPU Instance",
  buildbox: "Buildbox",
  custom: "Security Group",
};

export interface PortOverrides {
  ports?: PortSpec[];
  publicPorts?: number[];
}

export function parsePort(token: string): number {
  const value = token.trim();
  const port = /^\d+$/.test(value) ? parseInt(value, 10) : NaN;
  if (!Number.isInteger(port) || port < 1 || port > 65535) {
    throw new ValidationError(token, `Invalid port "${token}": expected a number between 1 and 65535`);
  }
  return port;
}

/**
 * Parse a comma-separated port list and its parallel comma-separated labels.
 * A missing label becomes "Port <n>".
 */
export function parsePortList(ports: string, descriptions = ""): PortSpec[] {
  const labels = descriptions.split(",").map((d) => d.trim());
  return ports
    .split(",")
    .filter((token) => token.trim() !== "")
    .map((token, i) => {
      const port = parsePort(token);
      return { port, description: labels[i] || `Port ${port}` };
    });
}

/** Parse "22:SSH,443:HTTPS" style specs. */
export function parsePortSpecs(specs: string): PortSpec[] {
  return specs
    .split(",")
    .filter((spec) => spec.trim() !== "")
    .map((spec) => {
      const [portToken = "", ...rest] = spec.split(":");
      const port = parsePort(portToken);
      const description = rest.join(":").trim();
      return { port, description: description || `Port ${port}` };
    });
}

export function parsePublicPorts(value: string | undefined): number[] {
  if (!value) {
    return [];
  }
  return value
    .split(",")
    .filter((token) => token.trim() !== "")
    .map(parsePort);
}

function portSets(
  kind: TargetKind,
  overrides: PortOverrides
): { ports: readonly PortSpec[]; publicPorts: readonly number[] } {
  switch (kind.kind) {
    case "gpu":
      return { ports: overrides.ports ?? GPU_DEFAULT_PORTS, publicPorts: overrides.publicPorts ?? [] };
    case "buildbox":
      return {
        ports: overrides.ports ?? BUILDBOX_DEFAULT_PORTS,
        publicPorts: overrides.publicPorts ?? (overrides.ports ? [] : BUILDBOX_DEFAULT_PUBLIC_PORTS),
      };
    case "custom":
      return { ports: kind.ports, publicPorts: kind.publicPorts };
  }
}

/**
 * Build an immutable target. Port sets come from the variant's defaults unless
 * overridden; a custom variant carries its own.
 */
export function buildTarget(id: string, kind: TargetKind, overrides: PortOverrides = {}): Target {
  const { ports, publicPorts } = portSets(kind, overrides);

  if (ports.length === 0) {
    throw new ValidationError(id, `Target ${id} has no ports configured`);
  }

  const seen = new Set<number>();
  for (const { port } of ports) {
    if (seen.has(port)) {
      throw new ValidationError(String(port), `Port ${port} is listed twice for target ${id}`);
    }
    seen.add(port);
  }

  for (const port of publicPorts) {
    if (!seen.has(port)) {
      throw new ValidationError(
        String(port),
        `Public port ${port} is not one of the ports of target ${id}`
      );
    }
  }

  const displayName = kind.kind === "custom" ? `${DISPLAY_NAMES.custom} ${id}` : DISPLAY_NAMES[kind.kind];

  return {
    id,
    kind,
    displayName,
    ports: [...ports],
    publicPorts: new Set(publicPorts),
  };
}

export function gpuTargetFromConfig(config: DeploymentConfig): Target {
  if (!config.SECURITY_GROUP_ID) {
    throw new ConfigurationMissingError(
      "SECURITY_GROUP_ID",
      "GPU security group ID not found: SECURITY_GROUP_ID is not set"
    );
  }
  return buildTarget(config.SECURITY_GROUP_ID, { kind: "gpu" }, {
    ports: config.GPU_SG_PORTS
      ? parsePortList(config.GPU_SG_PORTS, config.GPU_SG_PORT_DESCRIPTIONS)
      : undefined,
  });
}

export function buildboxTargetFromConfig(config: DeploymentConfig): Target {
  if (!config.BUILDBOX_SECURITY_GROUP) {
    throw new ConfigurationMissingError(
      "BUILDBOX_SECURITY_GROUP",
      "Buildbox security group ID not found: BUILDBOX_SECURITY_GROUP is not set"
    );
  }
  const ports = config.BUILDBOX_SG_PORTS
    ? parsePortList(config.BUILDBOX_SG_PORTS, config.BUILDBOX_SG_PORT_DESCRIPTIONS)
    : undefined;
  return buildTarget(config.BUILDBOX_SECURITY_GROUP, { kind: "buildbox" }, {
    ports,
    publicPorts: ports ? parsePublicPorts(config.BUILDBOX_SG_PUBLIC_PORTS) : undefined,
  });
}

export interface TargetSelection {
  gpu?: boolean;
  buildbox?: boolean;
  custom?: { id: string; ports: string; publicPorts?: string };
}

/**
 * Resolve the targets of a run. With no explicit selection every target whose
 * security group is configured is used; finding none is fatal.
 */
export function resolveTargets(selection: TargetSelection, config: DeploymentConfig): Target[] {
  const targets: Target[] = [];
  const explicit = Boolean(selection.gpu || selection.buildbox || selection.custom);

  if (selection.gpu || (!explicit && config.SECURITY_GROUP_ID)) {
    targets.push(gpuTargetFromConfig(config));
  }
  if (selection.buildbox || (!explicit && config.BUILDBOX_SECURITY_GROUP)) {
    targets.push(buildboxTargetFromConfig(config));
  }
  if (selection.custom) {
    const { id, ports, publicPorts } = selection.custom;
    targets.push(
      buildTarget(id, {
        kind: "custom",
        ports: parsePortSpecs(ports),
        publicPorts: parsePublicPorts(publicPorts),
      })
    );
  }

  if (targets.length === 0) {
    throw new ConfigurationMissingError(
      "SECURITY_GROUP_ID",
      "No security groups found in configuration. Set SECURITY_GROUP_ID and/or BUILDBOX_SECURITY_GROUP"
    );
  }
  return targets;
}
