import { isDottedQuad } from "../lib/cidr";
import { errorMessage } from "../lib/errors";
import type { Logger } from "../lib/logger";

export const PUBLIC_IP_SERVICES = ["https://ifconfig.me/ip", "https://icanhazip.com"];

const REQUEST_TIMEOUT_MS = 5_000;

/**
 * Ask public echo services for this machine's address.
 * Returns the first answer that is a dotted quad, or null.
 */
export async function detectPublicIp(
  log: Logger,
  services: readonly string[] = PUBLIC_IP_SERVICES,
  fetchImpl: typeof fetch = fetch
): Promise<string | null> {
  for (const url of services) {
    try {
      const response = await fetchImpl(url, { signal: AbortSignal.timeout(REQUEST_TIMEOUT_MS) });
      if (!response.ok) {
        log.debug(`${url} answered ${response.status}`);
        continue;
      }
      const body = (await response.text()).trim();
      if (isDottedQuad(body)) {
        return body;
      }
      log.debug(`${url} returned an unexpected body`);
    } catch (error) {
      log.debug(`${url} failed: ${errorMessage(error)}`);
    }
  }
  return null;
}
