/**
 * Network protocol for ingress rules. Only TCP rules are managed.
 */
export type FirewallProtocol = "tcp";

/**
 * Wire form of the "any source" CIDR.
 */
export const ANY_SOURCE_CIDR = "0.0.0.0/0";

/**
 * An ingress rule as observed on the provider side.
 * Read-only snapshot; re-fetched whenever current state is needed.
 */
export interface LiveRule {
  /** Destination port of the rule. */
  port: number;

  /** Network protocol. */
  protocol: string;

  /** Source CIDR exactly as the provider reports it (e.g., "203.0.113.5/32"). */
  cidr: string;
}

/** Result of an authorize call. */
export type AuthorizeOutcome =
  | { status: "success" }
  | { status: "already-exists" }
  | { status: "error"; message: string };

/** Result of a revoke call. */
export type RevokeOutcome =
  | { status: "success" }
  | { status: "not-found" }
  | { status: "error"; message: string };

/**
 * Capability over one cloud provider's firewall control plane.
 * Targets are addressed by the provider's opaque id (a security group id on EC2).
 */
export interface CloudFirewallClient {
  listIngressRules(targetId: string): Promise<LiveRule[]>;

  authorizeIngress(
    targetId: string,
    protocol: FirewallProtocol,
    port: number,
    cidr: string
  ): Promise<AuthorizeOutcome>;

  revokeIngress(
    targetId: string,
    protocol: FirewallProtocol,
    port: number,
    cidr: string
  ): Promise<RevokeOutcome>;
}
