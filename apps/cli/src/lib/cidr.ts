import { ANY_SOURCE_CIDR } from "@ingress-warden/shared";
import { ValidationError } from "./errors";

/**
 * Four groups of one to three digits. Octet ranges are not checked,
 * so "999.999.999.999" is accepted.
 */
const DOTTED_QUAD = /^\d{1,3}\.\d{1,3}\.\d{1,3}\.\d{1,3}$/;

const ANY_SOURCE_ALIASES = new Set(["any", "0.0.0.0", ANY_SOURCE_CIDR]);

export function isAnySource(cidr: string): boolean {
  return ANY_SOURCE_ALIASES.has(cidr.trim().toLowerCase());
}

export function isDottedQuad(value: string): boolean {
  return DOTTED_QUAD.test(value);
}

/**
 * Validate operator input and return the form entries are stored and keyed by:
 * the bare host address, or "0.0.0.0/0" for the any-source sentinel.
 */
export function parseAddress(input: string): string {
  const value = input.trim();
  if (isAnySource(value)) {
    return ANY_SOURCE_CIDR;
  }
  if (!isDottedQuad(value)) {
    throw new ValidationError(input, `Invalid IP format "${input}". Please use XXX.XXX.XXX.XXX`);
  }
  return value;
}

/**
 * Render a stored or listed CIDR as the provider expects it.
 * The any-source check must come before any suffix handling.
 */
export function toWireCidr(cidr: string): string {
  if (isAnySource(cidr)) {
    return ANY_SOURCE_CIDR;
  }
  if (cidr.includes("/")) {
    return cidr;
  }
  return `${cidr}/32`;
}

/**
 * Inverse of `toWireCidr` for display and grouping: strips "/32",
 * leaves "/0" and every other prefix untouched.
 */
export function displayCidr(wireCidr: string): string {
  if (isAnySource(wireCidr)) {
    return ANY_SOURCE_CIDR;
  }
  return wireCidr.endsWith("/32") ? wireCidr.slice(0, -3) : wireCidr;
}
