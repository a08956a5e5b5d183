import type { AuthorizedEntry } from "@ingress-warden/shared";
import {
  findKeyLine,
  formatEnvLine,
  parseEnvText,
  readEnvFile,
  writeEnvFile,
} from "../lib/env-file";

export const AUTHORIZED_IPS_LIST = "AUTHORIZED_IPS_LIST";
export const AUTHORIZED_IPS_DESCRIPTIONS = "AUTHORIZED_IPS_DESCRIPTIONS";
export const SECURITY_CONFIGURED = "SECURITY_CONFIGURED";

/** CIDR to description. Insertion order is the persisted order. */
export type Authorizations = Map<string, string>;

/**
 * Persists the authorized CIDR list and its descriptions in the shared
 * deployment configuration file, as two space-delimited fields that
 * correspond index-for-index.
 *
 * The file is not owned by this store: every other line is left untouched.
 */
export class AuthorizationStore {
  constructor(public readonly path: string) {}

  /**
   * Read the persisted authorizations. A missing file or missing keys is
   * the first-run state and yields an empty map.
   */
  async load(): Promise<Authorizations> {
    const entries: Authorizations = new Map();
    const text = await readEnvFile(this.path);
    if (text === null) {
      return entries;
    }

    const values = parseEnvText(text);
    const cidrs = splitField(values[AUTHORIZED_IPS_LIST]);
    const descriptions = splitField(values[AUTHORIZED_IPS_DESCRIPTIONS]);

    cidrs.forEach((cidr, i) => {
      entries.set(cidr, descriptions[i] ?? "");
    });
    return entries;
  }

  /**
   * Write `entries`, replacing the existing key lines in place or appending
   * them (with the SECURITY_CONFIGURED marker) when the file predates them.
   */
  async save(entries: ReadonlyMap<string, string>): Promise<void> {
    const cidrs = [...entries.keys()].join(" ");
    const descriptions = [...entries.values()].map((d) => d || "-").join(" ");
    const listLine = formatEnvLine(AUTHORIZED_IPS_LIST, cidrs);
    const descriptionsLine = formatEnvLine(AUTHORIZED_IPS_DESCRIPTIONS, descriptions);

    const text = (await readEnvFile(this.path)) ?? "";
    const lines = text.split("\n");
    const listIndex = findKeyLine(lines, AUTHORIZED_IPS_LIST);

    if (listIndex >= 0) {
      lines[listIndex] = listLine;
      const descriptionsIndex = findKeyLine(lines, AUTHORIZED_IPS_DESCRIPTIONS);
      if (descriptionsIndex >= 0) {
        lines[descriptionsIndex] = descriptionsLine;
      } else {
        lines.splice(listIndex + 1, 0, descriptionsLine);
      }
      await writeEnvFile(this.path, lines.join("\n"));
      return;
    }

    const prefix = text === "" || text.endsWith("\n") ? text : `${text}\n`;
    const block = [
      "",
      "# Security configuration (managed by ingress-warden)",
      listLine,
      descriptionsLine,
      `${SECURITY_CONFIGURED}=true`,
    ].join("\n");
    await writeEnvFile(this.path, `${prefix}${block}\n`);
  }
}

function splitField(value: string | undefined): string[] {
  return (value ?? "").split(/\s+/).filter((token) => token !== "");
}

/**
 * The set to persist after a run: what was stored, plus this run's entries
 * (latest description wins), minus the removed CIDRs. A CIDR that is both
 * removed and added is kept, since additions are applied after removals.
 */
export function mergeAuthorizations(
  current: ReadonlyMap<string, string>,
  additions: readonly AuthorizedEntry[],
  removals: Iterable<string> = []
): Authorizations {
  const merged: Authorizations = new Map(current);
  for (const entry of additions) {
    merged.set(entry.cidr, entry.description);
  }
  const added = new Set(additions.map((entry) => entry.cidr));
  for (const cidr of removals) {
    if (!added.has(cidr)) {
      merged.delete(cidr);
    }
  }
  return merged;
}
