import { DEFAULT_CATALOGUE, type ObfuscationRules } from "../catalogue.js";
import { matchRules } from "./match.js";
import type { CommandText, Detector, Finding } from "../types.js";

function countOf(text: string, chars: string): number {
  let count = 0;
  for (const ch of text) {
    if (chars.includes(ch)) count++;
  }
  return count;
}

/**
 * Works on the raw text: escapes and quoting are exactly what
 * normalization would blur.
 */
export function createObfuscationDetector(rules: ObfuscationRules = DEFAULT_CATALOGUE.obfuscation): Detector {
  return {
    name: "obfuscation",

    detect({ raw }: CommandText): Finding[] {
      const findings = matchRules(rules.rules, raw);

      const backslashes = countOf(raw, "\\");
      const quotes = countOf(raw, `"'`);
      if (backslashes > rules.maxBackslashes || quotes > rules.maxQuotes) {
        findings.push(rules.excessiveEscaping);
      }

      return findings;
    },
  };
}

export const obfuscationDetector = createObfuscationDetector();
