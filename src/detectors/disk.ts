import { DEFAULT_CATALOGUE } from "../catalogue.js";
import { matchRules } from "./match.js";
import type { CommandText, Detector, Finding, PatternRule } from "../types.js";

// No safe-target exception: anything that writes a block device or a
// partition table is irreversible.
export function createDiskDetector(rules: readonly PatternRule[] = DEFAULT_CATALOGUE.disk): Detector {
  return {
    name: "disk",

    detect({ normalized }: CommandText): Finding[] {
      return matchRules(rules, normalized);
    },
  };
}

export const diskDetector = createDiskDetector();
