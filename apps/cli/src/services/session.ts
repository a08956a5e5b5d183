import { createInterface } from "node:readline/promises";
import type { AuthorizedEntry } from "@ingress-warden/shared";
import { isDottedQuad, parseAddress } from "../lib/cidr";
import { ValidationError } from "../lib/errors";
import type { Logger } from "../lib/logger";

/**
 * Ask one question and return the answer; an empty answer yields `defaultAnswer`.
 * Injected so the session can be driven by scripted input.
 */
export type PromptPolicy = (question: string, defaultAnswer: string) => Promise<string>;

/**
 * Prompt on the terminal. Call `close` once the run is over.
 */
export function createReadlinePrompt(): { prompt: PromptPolicy; close: () => void } {
  const rl = createInterface({ input: process.stdin, output: process.stdout });
  return {
    prompt: async (question, defaultAnswer) => {
      const answer = (await rl.question(`${question} `)).trim();
      return answer === "" ? defaultAnswer : answer;
    },
    close: () => rl.close(),
  };
}

/**
 * Descriptions are persisted space-delimited, so whitespace and quotes
 * become dashes.
 */
export function sanitizeDescription(value: string, fallback: string): string {
  const cleaned = value.trim().replace(/["\s]+/g, "-");
  return cleaned || fallback;
}

/**
 * Resolve a deletion selection against the displayed list: "all", or
 * comma-separated 1-based numbers. Any bad token rejects the whole selection.
 */
export function parseSelection(input: string, cidrs: readonly string[]): string[] {
  const value = input.trim();
  if (value.toLowerCase() === "all") {
    return [...cidrs];
  }

  const chosen: string[] = [];
  for (const raw of value.split(",")) {
    const token = raw.replace(/\s+/g, "");
    if (!/^\d+$/.test(token)) {
      throw new ValidationError(input, `"${raw.trim()}" is not a number from the list`);
    }
    const index = parseInt(token, 10);
    if (index < 1 || index > cidrs.length) {
      throw new ValidationError(input, `There is no IP number ${index} (choose 1-${cidrs.length})`);
    }
    const cidr = cidrs[index - 1];
    if (cidr !== undefined && !chosen.includes(cidr)) {
      chosen.push(cidr);
    }
  }
  return chosen;
}

export interface CollectOptions {
  /** Detected public address of this machine; null when detection failed. */
  currentIp: string | null;

  /** Address of the GPU instance from the configuration file. */
  gpuInstanceIp?: string;
}

/**
 * The operator-facing side of a run: gathers addresses to authorize and
 * confirms destructive actions. Holds no state besides its collaborators.
 */
export class InteractiveSession {
  constructor(
    private readonly prompt: PromptPolicy,
    private readonly log: Logger
  ) {}

  /** Ask a yes/no question until the answer is one. */
  async confirm(question: string, defaultYes: boolean): Promise<boolean> {
    const hint = defaultYes ? "(Y/n):" : "(y/N):";
    for (;;) {
      const answer = (await this.prompt(`${question} ${hint}`, defaultYes ? "y" : "n")).toLowerCase();
      if (answer === "y" || answer === "yes") return true;
      if (answer === "n" || answer === "no") return false;
      this.log.warn("Please answer y or n");
    }
  }

  async ask(question: string, defaultAnswer: string): Promise<string> {
    return this.prompt(question, defaultAnswer);
  }

  /**
   * Offer this machine's address, then the GPU instance's, then any number of
   * typed addresses. Invalid addresses are reported and asked for again.
   */
  async collectDesiredEntries({ currentIp, gpuInstanceIp }: CollectOptions): Promise<AuthorizedEntry[]> {
    const entries: AuthorizedEntry[] = [];

    this.log.info(`Your current public IP: ${currentIp ?? "unknown"}`);
    if (currentIp && (await this.confirm("Add this IP to security groups?", true))) {
      const description = await this.ask(
        "Enter a description for this IP (e.g., 'LLM-EC2', 'Home-MacBook'):",
        "Current-Machine"
      );
      entries.push({ cidr: currentIp, description: sanitizeDescription(description, "Current-Machine") });
    }

    if (gpuInstanceIp && gpuInstanceIp !== currentIp) {
      if (!isDottedQuad(gpuInstanceIp)) {
        this.log.warn(`Ignoring GPU_INSTANCE_IP "${gpuInstanceIp}": not an IPv4 address`);
      } else {
        this.log.info(`GPU instance IP: ${gpuInstanceIp}`);
        if (await this.confirm("Add GPU instance IP to security groups?", true)) {
          entries.push({ cidr: gpuInstanceIp, description: "GPU-Instance" });
        }
      }
    }

    if (await this.confirm("Do you want to add more IPs?", false)) {
      this.log.info("Enter IP addresses one at a time (press Enter with empty input when done)");
      for (;;) {
        const input = await this.ask("IP Address (or press Enter to finish):", "");
        if (input.trim() === "") {
          break;
        }

        let cidr: string;
        try {
          cidr = parseAddress(input);
        } catch (error) {
          if (!(error instanceof ValidationError)) throw error;
          this.log.warn(error.message);
          continue;
        }

        const description = await this.ask(`Description for ${cidr}:`, "Custom");
        entries.push({ cidr, description: sanitizeDescription(description, "Custom") });
      }
    }

    return entries;
  }

  /**
   * Let the operator pick entries of the displayed list to delete.
   * Returns the chosen CIDRs, or an empty list when nothing is to be deleted.
   */
  async selectRemovals(listing: readonly string[]): Promise<string[]> {
    if (listing.length === 0) {
      this.log.info("No IPs to delete");
      return [];
    }

    if (!(await this.confirm("Do you want to remove any existing IPs?", false))) {
      this.log.info("Keeping all existing IPs");
      return [];
    }

    const selected = await this.promptSelection(listing);
    if (selected.length === 0) {
      this.log.info("No valid selections made");
      return [];
    }

    this.log.info("Will delete the following IPs:");
    for (const cidr of selected) {
      this.log.info(`  • ${cidr}`);
    }
    if (!(await this.confirm("Confirm deletion?", false))) {
      this.log.info("Deletion cancelled");
      return [];
    }
    return selected;
  }

  private async promptSelection(listing: readonly string[]): Promise<string[]> {
    this.log.info("Enter the NUMBERS of IPs to delete (e.g. 1,3), or 'all' to remove every IP");
    for (;;) {
      const input = await this.ask("Enter number(s) or 'all':", "");
      if (input.trim() === "") {
        return [];
      }
      try {
        return parseSelection(input, listing);
      } catch (error) {
        if (!(error instanceof ValidationError)) throw error;
        this.log.warn(error.message);
      }
    }
  }
}
