import type { AuthorizedEntry, CloudFirewallClient, Report, Target } from "@ingress-warden/shared";
import { parseAddress } from "../lib/cidr";
import { loadConfig, isEc2Deployment, requireRegion } from "../lib/env";
import { ProviderQueryError } from "../lib/errors";
import { createLogger, type Logger, type LogLevel } from "../lib/logger";
import { resolveTargets } from "../lib/targets";
import { AuthorizationStore, mergeAuthorizations } from "../services/authorization-store";
import { DEFAULT_READY_TIMEOUT_S, readinessUrl, waitForReady } from "../services/health-check";
import { listCurrentState, reconcile, type ReconciliationContext } from "../services/reconciler";
import { formatListing, formatPortInfo, formatReport } from "../services/report";
import { InteractiveSession, sanitizeDescription, type PromptPolicy } from "../services/session";

export interface ConfigureOptions {
  /** Path of the deployment configuration file. */
  envFile: string;
  gpu?: boolean;
  buildbox?: boolean;
  /** Custom target: security group id, "port:desc" list and public ports. */
  group?: string;
  ports?: string;
  publicPorts?: string;
  /** Take entries and removals from `ip` / `remove` instead of prompting. */
  nonInteractive?: boolean;
  ip?: string[];
  remove?: string[];
  /** Seconds to wait for the inference server after the GPU target is done. */
  waitReady?: number;
}

export interface ConfigureDeps {
  createClient(region: string, log: Logger): CloudFirewallClient;
  prompt: PromptPolicy;
  detectPublicIp(log: Logger): Promise<string | null>;
  createLogger?: (scope: string, level: LogLevel) => Logger;
  probeReady?: (url: string) => Promise<boolean>;
  sleep?: (ms: number) => Promise<void>;
}

export interface ConfigureResult {
  exitCode: number;
  reports: Report[];
  /** Targets whose rules could not be read. */
  failedTargets: string[];
  /** True when the configuration is not an EC2 deployment and nothing was done. */
  skipped: boolean;
}

/** Parse an `--ip` value: "203.0.113.5" or "203.0.113.5=Laptop". */
export function parseIpOption(value: string): AuthorizedEntry {
  const separator = value.indexOf("=");
  const address = separator >= 0 ? value.slice(0, separator) : value;
  const description = separator >= 0 ? value.slice(separator + 1) : "";
  return { cidr: parseAddress(address), description: sanitizeDescription(description, "Custom") };
}

function logLines(log: Logger, lines: readonly string[]): void {
  for (const line of lines) {
    log.info(line);
  }
}

async function configureTarget(
  ctx: ReconciliationContext,
  session: InteractiveSession,
  desired: readonly AuthorizedEntry[],
  options: ConfigureOptions
): Promise<Report> {
  const { target, log } = ctx;

  log.info("================================================================");
  log.info(`Configuring: ${target.displayName} (${target.id})`);
  logLines(log, formatPortInfo(target));

  const state = await listCurrentState(ctx);
  const listing = formatListing(state, ctx.authorizations);
  if (listing.cidrs.length === 0) {
    log.info("No rules configured yet");
  } else {
    log.info("Configured IP Addresses:");
    logLines(log, listing.lines);
  }

  const removals = options.nonInteractive
    ? (options.remove ?? []).map(parseAddress)
    : await session.selectRemovals(listing.cidrs);

  const report = await reconcile(ctx, desired, removals);
  logLines(log, formatReport(report));
  return report;
}

function logSummary(log: Logger, targets: readonly Target[], reports: readonly Report[], buildboxIp?: string): void {
  const added = new Set(reports.flatMap((r) => r.additions.filter((a) => a.success).map((a) => a.cidr)));

  log.info("================================================================");
  log.info("Summary:");
  log.info(`  • Configured ${targets.length} security group(s)`);
  if (added.size > 0) {
    log.info(`  • Added ${added.size} authorized IP(s) for SSH/admin access`);
  }
  for (const target of targets) {
    if (target.publicPorts.size > 0) {
      log.info(`  • ${target.displayName}: ports ${[...target.publicPorts].join(", ")} open to public (0.0.0.0/0)`);
    }
  }
  log.info("  • Security group changes may take 30-60 seconds to propagate");
  if (targets.some((t) => t.kind.kind === "buildbox")) {
    log.info(`  • Access demo: https://${buildboxIp ?? "<buildbox-ip>"}:8444/demo.html`);
  }
}

/**
 * Reconcile every selected security group with the authorized address list,
 * then persist the list. Per-target query failures do not stop the other
 * targets; the exit code is non-zero when any target or rule change failed.
 */
export async function runConfigure(options: ConfigureOptions, deps: ConfigureDeps): Promise<ConfigureResult> {
  const config = await loadConfig(options.envFile);
  const makeLogger = deps.createLogger ?? createLogger;
  const log = makeLogger("configure", config.LOG_LEVEL);

  if (!isEc2Deployment(config)) {
    log.warn(`Skipping security configuration (strategy ${config.DEPLOYMENT_STRATEGY}): only EC2 deployments have security groups`);
    return { exitCode: 0, reports: [], failedTargets: [], skipped: true };
  }

  const region = requireRegion(config);
  const targets = resolveTargets(
    {
      gpu: options.gpu,
      buildbox: options.buildbox,
      custom: options.group ? { id: options.group, ports: options.ports ?? "", publicPorts: options.publicPorts } : undefined,
    },
    config
  );

  log.info(`Security group(s) to configure in ${region}:`);
  for (const target of targets) {
    log.info(`  ✓ ${target.displayName} (${target.id}) - ports ${target.ports.map((p) => p.port).join(", ")}`);
  }

  const store = new AuthorizationStore(options.envFile);
  const authorizations = await store.load();
  const session = new InteractiveSession(deps.prompt, log);

  let desired: AuthorizedEntry[];
  if (options.nonInteractive) {
    desired = (options.ip ?? []).map(parseIpOption);
  } else {
    if (targets.some((t) => t.publicPorts.size > 0)) {
      log.info("Public ports are opened to everyone; add IPs here only for SSH/admin access, not for browser clients.");
    }
    desired = await session.collectDesiredEntries({
      currentIp: await deps.detectPublicIp(log),
      gpuInstanceIp: config.GPU_INSTANCE_IP,
    });
  }

  const client = deps.createClient(region, makeLogger("ec2", config.LOG_LEVEL));
  const reports: Report[] = [];
  const failedTargets: string[] = [];
  const removed = new Set<string>();

  for (const target of targets) {
    const ctx: ReconciliationContext = {
      target,
      authorizations,
      client,
      log: makeLogger(target.kind.kind, config.LOG_LEVEL),
    };
    try {
      const report = await configureTarget(ctx, session, desired, options);
      reports.push(report);
      for (const removal of report.removals) {
        if (removal.success) removed.add(removal.cidr);
      }
    } catch (error) {
      if (!(error instanceof ProviderQueryError)) throw error;
      ctx.log.error(`✗ ${target.displayName}: ${error.message}`);
      failedTargets.push(target.id);
    }
  }

  // A removed CIDR stays listed while it is still live on a target, or when a
  // target's rules could not be read at all.
  const stillLive = new Set(reports.flatMap((r) => Object.keys(r.accessByCidr)));
  const dropped = failedTargets.length > 0 ? [] : [...removed].filter((cidr) => !stillLive.has(cidr));

  if (desired.length > 0 || dropped.length > 0) {
    await store.save(mergeAuthorizations(authorizations, desired, dropped));
    log.info(`✓ Configuration saved to ${options.envFile}`);
  }

  let readyFailed = false;
  if (options.waitReady !== undefined) {
    const gpuReconciled = reports.some((r) => targets.some((t) => t.id === r.targetId && t.kind.kind === "gpu"));
    if (!config.GPU_INSTANCE_IP) {
      log.warn("GPU_INSTANCE_IP is not set; skipping readiness check");
    } else if (gpuReconciled) {
      const result = await waitForReady(readinessUrl(config.GPU_INSTANCE_IP, config.RIVA_HTTP_PORT), log, {
        timeoutSeconds: options.waitReady || DEFAULT_READY_TIMEOUT_S,
        probe: deps.probeReady,
        sleep: deps.sleep,
      });
      readyFailed = result.status === "timeout";
    }
  }

  logSummary(log, targets, reports, config.BUILDBOX_PUBLIC_IP);

  const mutationFailed = reports.some((r) => r.failures > 0 || r.queryError !== undefined);
  const exitCode = failedTargets.length > 0 || mutationFailed || readyFailed ? 1 : 0;
  return { exitCode, reports, failedTargets, skipped: false };
}
