import {
  ANY_SOURCE_CIDR,
  type ApplyResult,
  type AuthorizedEntry,
  type CloudFirewallClient,
  type LiveRule,
  type PortOutcome,
  type RemovalResult,
  type Report,
  type Target,
} from "@ingress-warden/shared";
import { displayCidr, toWireCidr } from "../lib/cidr";
import { ProviderMutationError, ProviderQueryError, errorMessage } from "../lib/errors";
import type { Logger } from "../lib/logger";

const PROTOCOL = "tcp";

/**
 * Everything an engine operation needs, passed explicitly instead of living
 * in process-wide state.
 */
export interface ReconciliationContext {
  target: Target;

  /** Persisted CIDR descriptions, used for display only. */
  authorizations: ReadonlyMap<string, string>;

  client: CloudFirewallClient;

  log: Logger;
}

/** CIDR (display form) to the configured ports it currently reaches. */
export type CurrentState = Map<string, Set<number>>;

/**
 * Read the target's live ingress rules, keep TCP rules on configured ports
 * and group them by CIDR. Single-host CIDRs lose their "/32"; "/0" is kept.
 */
export async function listCurrentState(ctx: ReconciliationContext): Promise<CurrentState> {
  const { target, client } = ctx;

  let rules: LiveRule[];
  try {
    rules = await client.listIngressRules(target.id);
  } catch (error) {
    if (error instanceof ProviderQueryError) {
      throw error;
    }
    throw new ProviderQueryError(target.id, errorMessage(error));
  }

  const configured = new Set(target.ports.map((p) => p.port));
  const state: CurrentState = new Map();

  for (const rule of rules) {
    if (rule.protocol !== PROTOCOL || !configured.has(rule.port)) {
      continue;
    }
    const cidr = displayCidr(rule.cidr);
    const ports = state.get(cidr) ?? new Set<number>();
    ports.add(rule.port);
    state.set(cidr, ports);
  }

  return state;
}

function failedOutcome(
  ctx: ReconciliationContext,
  action: "authorize" | "revoke",
  port: number,
  cidr: string,
  detail: string
): PortOutcome {
  const failure = new ProviderMutationError(ctx.target.id, action, port, cidr, detail);
  ctx.log.error(failure.message);
  return { port, status: "failed", error: detail };
}

async function authorizePort(
  ctx: ReconciliationContext,
  port: number,
  wireCidr: string
): Promise<PortOutcome> {
  try {
    const outcome = await ctx.client.authorizeIngress(ctx.target.id, PROTOCOL, port, wireCidr);
    switch (outcome.status) {
      case "success":
        return { port, status: "added" };
      case "already-exists":
        return { port, status: "already-exists" };
      case "error":
        return failedOutcome(ctx, "authorize", port, wireCidr, outcome.message);
    }
  } catch (error) {
    return failedOutcome(ctx, "authorize", port, wireCidr, errorMessage(error));
  }
}

async function revokePort(
  ctx: ReconciliationContext,
  port: number,
  wireCidr: string
): Promise<PortOutcome> {
  try {
    const outcome = await ctx.client.revokeIngress(ctx.target.id, PROTOCOL, port, wireCidr);
    switch (outcome.status) {
      case "success":
        return { port, status: "revoked" };
      case "not-found":
        ctx.log.info(`  • ${wireCidr} had no rule on port ${port}`);
        return { port, status: "not-found" };
      case "error":
        return failedOutcome(ctx, "revoke", port, wireCidr, outcome.message);
    }
  } catch (error) {
    return failedOutcome(ctx, "revoke", port, wireCidr, errorMessage(error));
  }
}

function describePorts(outcomes: readonly PortOutcome[]): string {
  return outcomes.map((o) => `${o.port}:${o.status}`).join(" ");
}

/**
 * Authorize `cidr` on every port of the target. A rule that already exists
 * counts as success; a failed port is logged and the remaining ports are
 * still attempted.
 */
export async function addEntry(
  ctx: ReconciliationContext,
  cidr: string,
  description: string
): Promise<ApplyResult> {
  const wireCidr = toWireCidr(cidr);
  const ports: PortOutcome[] = [];

  for (const { port } of ctx.target.ports) {
    ports.push(await authorizePort(ctx, port, wireCidr));
  }

  const success = ports.every((p) => p.status !== "failed");
  const label = description ? ` (${description})` : "";
  const mark = success ? "✓" : "✗";
  ctx.log.info(`  ${mark} ${displayCidr(wireCidr)}${label} ${describePorts(ports)}`);

  return { cidr: displayCidr(wireCidr), description, success, ports };
}

/**
 * Revoke every CIDR in `cidrs` from every port of the target. Rules that are
 * already absent count as removed.
 */
export async function removeEntries(
  ctx: ReconciliationContext,
  cidrs: Iterable<string>
): Promise<RemovalResult[]> {
  const results: RemovalResult[] = [];

  for (const cidr of new Set(cidrs)) {
    const wireCidr = toWireCidr(cidr);
    const ports: PortOutcome[] = [];
    for (const { port } of ctx.target.ports) {
      ports.push(await revokePort(ctx, port, wireCidr));
    }

    const success = ports.every((p) => p.status !== "failed");
    ctx.log.info(`  ${success ? "✓" : "✗"} removed ${displayCidr(wireCidr)} ${describePorts(ports)}`);
    results.push({ cidr: displayCidr(wireCidr), success, ports });
  }

  return results;
}

/**
 * Open every public port of the target to any source. Safe to repeat.
 */
export async function configurePublicPorts(ctx: ReconciliationContext): Promise<PortOutcome[]> {
  const outcomes: PortOutcome[] = [];

  for (const { port, description } of ctx.target.ports) {
    if (!ctx.target.publicPorts.has(port)) {
      continue;
    }
    const outcome = await authorizePort(ctx, port, ANY_SOURCE_CIDR);
    const mark = outcome.status === "failed" ? "✗" : "✓";
    ctx.log.info(`  ${mark} port ${port} (${description}) open to ${ANY_SOURCE_CIDR}: ${outcome.status}`);
    outcomes.push(outcome);
  }

  return outcomes;
}

function appliesTo(entry: AuthorizedEntry, target: Target): boolean {
  return entry.appliesTo === undefined || entry.appliesTo.includes(target.id);
}

/** Collapse duplicate CIDRs, keeping the last description. */
function uniqueEntries(entries: readonly AuthorizedEntry[]): AuthorizedEntry[] {
  const byCidr = new Map<string, AuthorizedEntry>();
  for (const entry of entries) {
    byCidr.set(displayCidr(toWireCidr(entry.cidr)), entry);
  }
  return [...byCidr.values()];
}

function countFailures(outcomes: Iterable<PortOutcome>): number {
  let failures = 0;
  for (const outcome of outcomes) {
    if (outcome.status === "failed") failures++;
  }
  return failures;
}

/**
 * Bring the target in line with `desired`: apply removals, add every desired
 * entry not already present on all required ports, open public ports, then
 * read the final state back for the report.
 *
 * Throws ProviderQueryError only when the state needed to decide additions
 * cannot be read; a failure of the final read is recorded on the report.
 */
export async function reconcile(
  ctx: ReconciliationContext,
  desired: readonly AuthorizedEntry[],
  removals: Iterable<string> = []
): Promise<Report> {
  const { target, log } = ctx;
  const removalList = [...new Set(removals)];

  if (removalList.length > 0) {
    log.info(`Removing ${removalList.length} address(es) from ${target.displayName}...`);
  }
  const removalResults = removalList.length > 0 ? await removeEntries(ctx, removalList) : [];

  const state = await listCurrentState(ctx);
  const required = target.ports.map((p) => p.port);
  const additions: ApplyResult[] = [];
  const skipped: string[] = [];

  const entries = uniqueEntries(desired).filter((entry) => appliesTo(entry, target));
  if (entries.length > 0) {
    log.info(`Adding authorized addresses to ${target.displayName}...`);
  }

  for (const entry of entries) {
    const cidr = displayCidr(toWireCidr(entry.cidr));
    const live = state.get(cidr);
    if (live && required.every((port) => live.has(port))) {
      log.info(`  • ${cidr} already reaches every port`);
      skipped.push(cidr);
      continue;
    }
    additions.push(await addEntry(ctx, entry.cidr, entry.description));
  }

  let publicPorts: PortOutcome[] = [];
  if (target.publicPorts.size > 0) {
    log.info(`Opening public ports of ${target.displayName}...`);
    publicPorts = await configurePublicPorts(ctx);
  }

  const failures = countFailures([
    ...removalResults.flatMap((r) => r.ports),
    ...additions.flatMap((a) => a.ports),
    ...publicPorts,
  ]);

  const report: Report = {
    targetId: target.id,
    displayName: target.displayName,
    removals: removalResults,
    additions,
    skipped,
    publicPorts,
    accessByCidr: {},
    cidrsByPort: {},
    failures,
  };

  try {
    const finalState = await listCurrentState(ctx);
    report.accessByCidr = accessByCidr(finalState);
    report.cidrsByPort = cidrsByPort(target, finalState);
  } catch (error) {
    if (!(error instanceof ProviderQueryError)) {
      throw error;
    }
    log.error(error.message);
    report.queryError = error.detail;
  }

  return report;
}

export function accessByCidr(state: CurrentState): Record<string, number[]> {
  const access: Record<string, number[]> = {};
  for (const [cidr, ports] of state) {
    access[cidr] = [...ports].sort((a, b) => a - b);
  }
  return access;
}

export function cidrsByPort(target: Target, state: CurrentState): Record<number, string[]> {
  const byPort: Record<number, string[]> = {};
  for (const { port } of target.ports) {
    byPort[port] = [];
  }
  for (const [cidr, ports] of state) {
    for (const port of ports) {
      byPort[port]?.push(toWireCidr(cidr));
    }
  }
  for (const cidrs of Object.values(byPort)) {
    cidrs.sort();
  }
  return byPort;
}
