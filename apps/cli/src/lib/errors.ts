/**
 * Thrown when the configuration file, or a key a run needs, is absent or unusable.
 * Fatal: the run exits non-zero.
 */
export class ConfigurationMissingError extends Error {
  constructor(
    public readonly key: string,
    message: string
  ) {
    super(message);
    this.name = "ConfigurationMissingError";
  }
}

/**
 * Thrown for malformed operator input (addresses, selections, port lists).
 * Interactive loops catch it and re-prompt.
 */
export class ValidationError extends Error {
  constructor(
    public readonly input: string,
    message: string
  ) {
    super(message);
    this.name = "ValidationError";
  }
}

/**
 * Error thrown when listing a target's ingress rules fails or returns
 * something that cannot be read as a rule set.
 */
export class ProviderQueryError extends Error {
  constructor(
    public readonly targetId: string,
    public readonly detail: string
  ) {
    super(`Provider query failed (target=${targetId}): ${detail}`);
    this.name = "ProviderQueryError";
  }
}

/**
 * A single authorize or revoke call that failed for one port and CIDR.
 * Recorded and counted; never aborts the batch.
 */
export class ProviderMutationError extends Error {
  constructor(
    public readonly targetId: string,
    public readonly action: "authorize" | "revoke",
    public readonly port: number,
    public readonly cidr: string,
    public readonly detail: string
  ) {
    super(`Provider ${action} failed (target=${targetId}, port=${port}, cidr=${cidr}): ${detail}`);
    this.name = "ProviderMutationError";
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
