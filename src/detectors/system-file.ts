import { DEFAULT_CATALOGUE } from "../catalogue.js";
import { matchRules } from "./match.js";
import type { CommandText, Detector, Finding, PatternRule } from "../types.js";

/**
 * Writes to critical system files (the write operator may appear on either
 * side of the path), permission changes under /etc, and all-zero chmod modes.
 */
export function createSystemFileDetector(rules: readonly PatternRule[] = DEFAULT_CATALOGUE.systemFiles): Detector {
  return {
    name: "system-file",

    detect({ normalized }: CommandText): Finding[] {
      return matchRules(rules, normalized);
    },
  };
}

export const systemFileDetector = createSystemFileDetector();
