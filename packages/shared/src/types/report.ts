/**
 * Outcome of one mutation against one port.
 */
export interface PortOutcome {
  port: number;

  status: "added" | "already-exists" | "revoked" | "not-found" | "failed";

  /** Provider error text when `status` is "failed". */
  error?: string;
}

/**
 * Result of authorizing one CIDR on every port of a target.
 */
export interface ApplyResult {
  cidr: string;

  description: string;

  /** True when every port was either newly added or already present. */
  success: boolean;

  ports: PortOutcome[];
}

/**
 * Result of revoking one CIDR from every port of a target.
 */
export interface RemovalResult {
  cidr: string;

  /** True when every port was either revoked or already absent. */
  success: boolean;

  ports: PortOutcome[];
}

/**
 * Summary of one target's reconciliation, rendered for the operator.
 */
export interface Report {
  targetId: string;

  displayName: string;

  removals: RemovalResult[];

  additions: ApplyResult[];

  /** Desired CIDRs that already had a live rule on every required port. */
  skipped: string[];

  /** Outcomes of opening public ports to any source. Empty when the target has none. */
  publicPorts: PortOutcome[];

  /** CIDR (single hosts without "/32") to the configured ports it can reach. */
  accessByCidr: Record<string, number[]>;

  /** Configured port to the wire CIDRs allowed on it. */
  cidrsByPort: Record<number, string[]>;

  /** Number of port-level mutations that failed. */
  failures: number;

  /** Set when the final state could not be read; access maps are then empty. */
  queryError?: string;
}
