import { readFile, writeFile } from "node:fs/promises";
import { parse } from "dotenv";

/**
 * Read a flat KEY=value file. Returns null when the file does not exist.
 */
export async function readEnvFile(path: string): Promise<string | null> {
  try {
    return await readFile(path, "utf8");
  } catch (error) {
    if (isNotFound(error)) {
      return null;
    }
    throw error;
  }
}

export async function writeEnvFile(path: string, text: string): Promise<void> {
  await writeFile(path, text, "utf8");
}

/** Parse file contents with dotenv's quoting and comment rules. */
export function parseEnvText(text: string): Record<string, string> {
  return parse(text);
}

/**
 * Index of the line assigning `key`, or -1. Matches the forms dotenv reads:
 * leading whitespace and an optional `export`.
 */
export function findKeyLine(lines: readonly string[], key: string): number {
  const assignment = new RegExp(`^\\s*(?:export\\s+)?${key}\\s*=`);
  return lines.findIndex((line) => assignment.test(line));
}

/** Render a double-quoted assignment, e.g. `AUTHORIZED_IPS_LIST="a b"`. */
export function formatEnvLine(key: string, value: string): string {
  return `${key}="${value}"`;
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}
