import { DEFAULT_CATALOGUE } from "../catalogue.js";
import { matchRules } from "./match.js";
import type { CommandText, Detector, Finding, PatternRule } from "../types.js";

export function createNetworkDetector(rules: readonly PatternRule[] = DEFAULT_CATALOGUE.network): Detector {
  return {
    name: "network",

    detect({ normalized }: CommandText): Finding[] {
      return matchRules(rules, normalized);
    },
  };
}

export const networkDetector = createNetworkDetector();
