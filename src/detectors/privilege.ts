import { DEFAULT_CATALOGUE } from "../catalogue.js";
import { matchRules } from "./match.js";
import type { CommandText, Detector, Finding, PatternRule } from "../types.js";

export function createPrivilegeDetector(rules: readonly PatternRule[] = DEFAULT_CATALOGUE.privilege): Detector {
  return {
    name: "privilege-escalation",
    skipWhenElevationIntended: true,

    detect({ normalized }: CommandText): Finding[] {
      return matchRules(rules, normalized);
    },
  };
}

export const privilegeDetector = createPrivilegeDetector();
