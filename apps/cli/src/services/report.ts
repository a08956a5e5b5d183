import type { Report, Target } from "@ingress-warden/shared";
import type { CurrentState } from "./reconciler";

export function formatPortInfo(target: Target): string[] {
  return target.ports.map(({ port, description }) => {
    const visibility = target.publicPorts.has(port) ? " [public]" : "";
    return `  Port ${port} - ${description}${visibility}`;
  });
}

/**
 * Numbered listing of the live state, in the order deletion selections refer to.
 * `cidrs[i]` is entry number `i + 1`.
 */
export function formatListing(
  state: CurrentState,
  authorizations: ReadonlyMap<string, string>
): { lines: string[]; cidrs: string[] } {
  const cidrs = [...state.keys()];
  const lines = cidrs.map((cidr, i) => {
    const ports = [...(state.get(cidr) ?? [])].sort((a, b) => a - b).join(" ");
    const description = authorizations.get(cidr);
    const suffix = description ? ` (${description})` : "";
    return `  ${String(i + 1).padStart(2)}. ${cidr.padEnd(18)} Ports: ${ports.padEnd(30)}${suffix}`.trimEnd();
  });
  return { lines, cidrs };
}

export function formatReport(report: Report): string[] {
  const lines = [`${report.displayName} (${report.targetId}) final configuration`];

  if (report.queryError) {
    lines.push(`  Could not read final rules: ${report.queryError}`);
  } else {
    lines.push("Configured Security Rules:");
    for (const [port, cidrs] of Object.entries(report.cidrsByPort)) {
      lines.push(`  Port ${port}: ${cidrs.length > 0 ? cidrs.join(", ") : "(none)"}`);
    }
    lines.push("Summary by IP Address:");
    const access = Object.entries(report.accessByCidr);
    if (access.length === 0) {
      lines.push("  (no addresses)");
    }
    for (const [cidr, ports] of access) {
      lines.push(`  ${cidr}: ports ${ports.join(" ")}`);
    }
  }

  if (report.failures > 0) {
    lines.push(`  ✗ ${report.failures} rule change(s) failed; re-run to retry`);
  }
  return lines;
}
