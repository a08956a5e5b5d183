export interface PollOptions {
  /** Delay between checks. */
  intervalMs: number;

  /** Give up once the accumulated wait reaches this. */
  ceilingMs: number;

  /** Called after each failed check with the time waited so far. */
  onPending?: (elapsedMs: number) => void;

  /** Injectable for tests. */
  sleep?: (ms: number) => Promise<void>;
}

export interface PollResult {
  status: "success" | "timeout";
  elapsedMs: number;
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Check `predicate` every `intervalMs` until it holds or the ceiling is reached.
 * The predicate is checked at least once. Elapsed time is counted in whole
 * intervals, not wall-clock time.
 */
export async function poll(
  predicate: () => Promise<boolean>,
  options: PollOptions
): Promise<PollResult> {
  const wait = options.sleep ?? sleep;
  let elapsedMs = 0;

  do {
    if (await predicate()) {
      return { status: "success", elapsedMs };
    }
    options.onPending?.(elapsedMs);
    await wait(options.intervalMs);
    elapsedMs += options.intervalMs;
  } while (elapsedMs < options.ceilingMs);

  return { status: "timeout", elapsedMs };
}
