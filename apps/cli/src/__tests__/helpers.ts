import { vi } from "vitest";
import type {
  AuthorizeOutcome,
  CloudFirewallClient,
  FirewallProtocol,
  LiveRule,
  RevokeOutcome,
  Target,
} from "@ingress-warden/shared";
import type { Logger } from "../lib/logger";
import { buildTarget } from "../lib/targets";
import type { ReconciliationContext } from "../services/reconciler";
import type { PromptPolicy } from "../services/session";

/**
 * In-memory security group with the provider's idempotency semantics:
 * duplicate authorizations report "already-exists", revoking an absent rule
 * reports "not-found".
 */
export class FakeFirewallClient implements CloudFirewallClient {
  readonly rules = new Map<string, LiveRule[]>();
  /** "port cidr" pairs whose mutations fail. */
  readonly failing = new Set<string>();
  queryFailure: Error | null = null;
  /** Listing failures for single targets. */
  readonly targetQueryFailures = new Map<string, Error>();

  readonly authorizeCalls: { targetId: string; port: number; cidr: string }[] = [];
  readonly revokeCalls: { targetId: string; port: number; cidr: string }[] = [];

  seed(targetId: string, port: number, cidr: string, protocol = "tcp"): this {
    const rules = this.rules.get(targetId) ?? [];
    rules.push({ port, protocol, cidr });
    this.rules.set(targetId, rules);
    return this;
  }

  async listIngressRules(targetId: string): Promise<LiveRule[]> {
    const failure = this.queryFailure ?? this.targetQueryFailures.get(targetId);
    if (failure) {
      throw failure;
    }
    return [...(this.rules.get(targetId) ?? [])];
  }

  async authorizeIngress(
    targetId: string,
    protocol: FirewallProtocol,
    port: number,
    cidr: string
  ): Promise<AuthorizeOutcome> {
    this.authorizeCalls.push({ targetId, port, cidr });
    if (this.failing.has(`${port} ${cidr}`)) {
      return { status: "error", message: "UnauthorizedOperation" };
    }
    const rules = this.rules.get(targetId) ?? [];
    if (rules.some((r) => r.port === port && r.cidr === cidr && r.protocol === protocol)) {
      return { status: "already-exists" };
    }
    rules.push({ port, protocol, cidr });
    this.rules.set(targetId, rules);
    return { status: "success" };
  }

  async revokeIngress(
    targetId: string,
    protocol: FirewallProtocol,
    port: number,
    cidr: string
  ): Promise<RevokeOutcome> {
    this.revokeCalls.push({ targetId, port, cidr });
    if (this.failing.has(`${port} ${cidr}`)) {
      return { status: "error", message: "UnauthorizedOperation" };
    }
    const rules = this.rules.get(targetId) ?? [];
    const index = rules.findIndex((r) => r.port === port && r.cidr === cidr && r.protocol === protocol);
    if (index < 0) {
      return { status: "not-found" };
    }
    rules.splice(index, 1);
    return { status: "success" };
  }
}

export interface RecordingLogger extends Logger {
  lines: { level: string; message: string }[];
  messages(level?: string): string[];
}

export function createRecordingLogger(): RecordingLogger {
  const lines: { level: string; message: string }[] = [];
  const logger: RecordingLogger = {
    lines,
    debug: vi.fn((message: string) => lines.push({ level: "debug", message })),
    info: vi.fn((message: string) => lines.push({ level: "info", message })),
    warn: vi.fn((message: string) => lines.push({ level: "warn", message })),
    error: vi.fn((message: string) => lines.push({ level: "error", message })),
    child: () => logger,
    messages: (level) => lines.filter((l) => level === undefined || l.level === level).map((l) => l.message),
  };
  return logger;
}

/**
 * Prompt that replays `answers` in order; an empty string takes the default.
 * Records every question asked and fails when it runs out of answers.
 */
export function createScriptedPrompt(answers: string[]): PromptPolicy & { questions: string[] } {
  const queue = [...answers];
  const questions: string[] = [];
  const prompt = async (question: string, defaultAnswer: string) => {
    questions.push(question);
    const answer = queue.shift();
    if (answer === undefined) {
      throw new Error(`No scripted answer for "${question}"`);
    }
    return answer === "" ? defaultAnswer : answer;
  };
  return Object.assign(prompt, { questions });
}

export function createGpuTarget(id = "sg-gpu"): Target {
  return buildTarget(id, { kind: "gpu" });
}

export function createBuildboxTarget(id = "sg-buildbox"): Target {
  return buildTarget(id, { kind: "buildbox" });
}

export function createContext(
  target: Target,
  client: CloudFirewallClient = new FakeFirewallClient(),
  authorizations: ReadonlyMap<string, string> = new Map()
): ReconciliationContext & { log: RecordingLogger } {
  return { target, client, authorizations, log: createRecordingLogger() };
}
