/**
 * A port a target requires, with the label shown to the operator.
 */
export interface PortSpec {
  /** Port number (1-65535). */
  port: number;

  /** Human-readable label (e.g., "Riva gRPC"). */
  description: string;
}

/**
 * Which kind of deployment host a target protects.
 * A custom target carries its own port sets.
 */
export type TargetKind =
  | { kind: "gpu" }
  | { kind: "buildbox" }
  | { kind: "custom"; ports: PortSpec[]; publicPorts: number[] };

/**
 * A named firewall scope whose ingress rules are managed as a unit.
 * Maps to one EC2 security group. Immutable for the duration of a run.
 */
export interface Target {
  /** Provider handle (e.g., "sg-0123456789abcdef0"). */
  id: string;

  /** Variant this target was built from. */
  kind: TargetKind;

  /** Name shown in output (e.g., "GPU Instance"). */
  displayName: string;

  /** Required ports in display order. */
  ports: readonly PortSpec[];

  /** Ports opened to any source. Always a subset of `ports`. */
  publicPorts: ReadonlySet<number>;
}

/**
 * One allow-rule intent: a single host (or the any-source sentinel) with a label.
 */
export interface AuthorizedEntry {
  /** Dotted-quad host address, or the any-source sentinel. No prefix suffix. */
  cidr: string;

  /** Free-text label. Never contains whitespace (persisted space-delimited). */
  description: string;

  /** Target ids this entry applies to. Absent means every target of the run. */
  appliesTo?: readonly string[];
}
