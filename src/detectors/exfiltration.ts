import { DEFAULT_CATALOGUE } from "../catalogue.js";
import { matchRules } from "./match.js";
import type { CommandText, Detector, Finding, PatternRule } from "../types.js";

export function createExfiltrationDetector(rules: readonly PatternRule[] = DEFAULT_CATALOGUE.exfiltration): Detector {
  return {
    name: "exfiltration",

    detect({ normalized }: CommandText): Finding[] {
      return matchRules(rules, normalized);
    },
  };
}

export const exfiltrationDetector = createExfiltrationDetector();
