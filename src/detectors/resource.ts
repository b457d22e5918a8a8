import { DEFAULT_CATALOGUE, type ResourceRules } from "../catalogue.js";
import { matchRules } from "./match.js";
import type { CommandText, Detector, Finding } from "../types.js";

/**
 * Fork bombs, unthrottled infinite loops and bulk dd writes.
 *
 * Reads the raw text: fork-bomb grammar depends on exact tokens, and dd
 * size suffixes keep their case.
 */
export function createResourceDetector(rules: ResourceRules = DEFAULT_CATALOGUE.resource): Detector {
  return {
    name: "resource-exhaustion",

    detect({ raw }: CommandText): Finding[] {
      const findings = matchRules(rules.rules, raw);

      if (rules.unboundedLoop.test(raw) && !rules.throttle.test(raw)) {
        findings.push(rules.unboundedLoopFinding);
      }

      return findings;
    },
  };
}

export const resourceDetector = createResourceDetector();
