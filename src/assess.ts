import { DEFAULT_CATALOGUE, type Catalogue } from "./catalogue.js";
import { hasControlCharacters, toCommandText, trimWhitespace } from "./normalize.js";
import { classifyFindings, DEFAULT_SEVERITY_POLICY } from "./scorer.js";
import { findForbiddenBinary, forbiddenBinaryFinding } from "./blacklist.js";
import { createObfuscationDetector } from "./detectors/obfuscation.js";
import { createPrivilegeDetector } from "./detectors/privilege.js";
import { createDestructiveDetector } from "./detectors/destructive.js";
import { createDiskDetector } from "./detectors/disk.js";
import { createSystemFileDetector } from "./detectors/system-file.js";
import { createNetworkDetector } from "./detectors/network.js";
import { createResourceDetector } from "./detectors/resource.js";
import { createExfiltrationDetector } from "./detectors/exfiltration.js";
import type { Detector, Finding, RiskAssessment, SeverityPolicy } from "./types.js";

export const DEFAULT_MAX_COMMAND_LENGTH = 10_000;

export interface AssessOptions {
  /** The caller already obtained consent for elevated execution. */
  privilegeEscalationIntended?: boolean;
  forbiddenBinaries?: readonly string[];
  maxCommandLength?: number;
}

export interface Assessor {
  readonly detectors: readonly Detector[];
  assess(command: string, options?: AssessOptions): RiskAssessment;
}

/** Detectors in the order their findings are reported. */
export function createDetectors(catalogue: Catalogue = DEFAULT_CATALOGUE): Detector[] {
  return [
    createObfuscationDetector(catalogue.obfuscation),
    createPrivilegeDetector(catalogue.privilege),
    createDestructiveDetector(catalogue.destructive),
    createDiskDetector(catalogue.disk),
    createSystemFileDetector(catalogue.systemFiles),
    createNetworkDetector(catalogue.network),
    createResourceDetector(catalogue.resource),
    createExfiltrationDetector(catalogue.exfiltration),
  ];
}

export function createAssessor(
  catalogue: Catalogue = DEFAULT_CATALOGUE,
  severityPolicy: SeverityPolicy = DEFAULT_SEVERITY_POLICY,
): Assessor {
  const detectors = Object.freeze(createDetectors(catalogue));

  return {
    detectors,

    assess(command: string, options: AssessOptions = {}): RiskAssessment {
      const {
        privilegeEscalationIntended = false,
        forbiddenBinaries = [],
        maxCommandLength = DEFAULT_MAX_COMMAND_LENGTH,
      } = options;

      const trimmed = trimWhitespace(command);
      if (trimmed === "") {
        return { level: "None", reasons: ["empty command"] };
      }

      if (hasControlCharacters(trimmed)) {
        return { level: "High", reasons: ["contains invalid control characters"] };
      }

      // Pattern cost scales with input length.
      if (trimmed.length > maxCommandLength) {
        return { level: "High", reasons: [`command too long to analyze (${trimmed.length} characters)`] };
      }

      const text = toCommandText(trimmed);
      const seen = new Set<Finding>();
      const reasons: Finding[] = [];

      for (const detector of detectors) {
        if (privilegeEscalationIntended && detector.skipWhenElevationIntended) continue;
        for (const finding of detector.detect(text)) {
          if (!seen.has(finding)) {
            seen.add(finding);
            reasons.push(finding);
          }
        }
      }

      const forbidden = findForbiddenBinary(text.normalized, forbiddenBinaries);
      if (forbidden !== undefined) {
        reasons.push(forbiddenBinaryFinding(forbidden));
        return { level: "Critical", reasons, forbiddenBinary: forbidden };
      }

      return { level: classifyFindings(reasons, severityPolicy), reasons };
    },
  };
}

const defaultAssessor = createAssessor();

/**
 * Classify a shell command with the built-in catalogue.
 */
export function assessCommand(
  command: string,
  privilegeEscalationIntended = false,
  extraForbiddenBinaries: readonly string[] = [],
): RiskAssessment {
  return defaultAssessor.assess(command, {
    privilegeEscalationIntended,
    forbiddenBinaries: extraForbiddenBinaries,
  });
}
