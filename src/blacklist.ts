import { escapeRegExp } from "./normalize.js";

/**
 * First name from `binaries` that appears as a whole word in the normalized
 * command, or undefined. Matching is case-insensitive; blank names are ignored.
 */
export function findForbiddenBinary(normalized: string, binaries: readonly string[]): string | undefined {
  for (const binary of binaries) {
    const name = binary.trim().toLowerCase();
    if (!name) continue;
    const pattern = new RegExp(`(?<!\\w)${escapeRegExp(name)}(?!\\w)`);
    if (pattern.test(normalized)) return name;
  }
  return undefined;
}

export function forbiddenBinaryFinding(binary: string): string {
  return `blacklisted binary detected: ${binary}`;
}
