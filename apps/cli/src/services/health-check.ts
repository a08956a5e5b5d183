import { errorMessage } from "../lib/errors";
import type { Logger } from "../lib/logger";
import { poll, type PollResult } from "../lib/poll";

/** Interval between readiness checks of the inference server. */
export const READY_POLL_INTERVAL_MS = 3_000;

export const DEFAULT_READY_TIMEOUT_S = 180;

const REQUEST_TIMEOUT_MS = 5_000;

export function readinessUrl(host: string, httpPort: number): string {
  return `http://${host}:${httpPort}/v2/health/ready`;
}

/**
 * One readiness probe. Any 2xx answer is ready; network errors are not.
 */
export async function checkReady(url: string, log: Logger, fetchImpl: typeof fetch = fetch): Promise<boolean> {
  try {
    const response = await fetchImpl(url, { signal: AbortSignal.timeout(REQUEST_TIMEOUT_MS) });
    return response.ok;
  } catch (error) {
    log.debug(`${url}: ${errorMessage(error)}`);
    return false;
  }
}

export interface WaitReadyOptions {
  timeoutSeconds: number;
  intervalMs?: number;
  probe?: (url: string) => Promise<boolean>;
  sleep?: (ms: number) => Promise<void>;
}

/**
 * Poll the inference server's readiness endpoint until it answers or the
 * timeout is reached.
 */
export async function waitForReady(url: string, log: Logger, options: WaitReadyOptions): Promise<PollResult> {
  const probe = options.probe ?? ((u: string) => checkReady(u, log));
  const ceilingMs = options.timeoutSeconds * 1000;

  log.info(`Waiting for ${url} (timeout ${options.timeoutSeconds}s)`);
  const result = await poll(() => probe(url), {
    intervalMs: options.intervalMs ?? READY_POLL_INTERVAL_MS,
    ceilingMs,
    sleep: options.sleep,
    onPending: (elapsedMs) =>
      log.info(`⏳ Waiting for server ready... (${Math.round(elapsedMs / 1000)}s/${options.timeoutSeconds}s)`),
  });

  if (result.status === "success") {
    log.info(`✓ Server is ready (after ${Math.round(result.elapsedMs / 1000)}s)`);
  } else {
    log.error(`✗ Server did not become ready within ${options.timeoutSeconds}s`);
  }
  return result;
}
