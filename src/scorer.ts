import type { ActionPolicy, CommandReport, Finding, RiskAssessment, RiskLevel, SeverityPolicy } from "./types.js";

export const SEVERITY_ORDER: readonly RiskLevel[] = ["None", "Low", "Medium", "High", "Critical"];

export const DEFAULT_ACTION_POLICY: ActionPolicy = {
  None: "run",
  Low: "warn",
  Medium: "ask",
  High: "ask",
  Critical: "ask",
};

/**
 * Keyword tiers that map finding text to a level. Tiers are checked
 * Critical first; a Critical keyword anywhere ends classification.
 */
export const DEFAULT_SEVERITY_POLICY: SeverityPolicy = Object.freeze({
  critical: Object.freeze(["fork bomb", "disk", "partition", "/etc/passwd", "/etc/shadow", "crash system"]),
  high: Object.freeze(["destructive", "rm -rf", "overwrite", "erase", "unrecoverable"]),
  medium: Object.freeze(["sudo", "privilege", "critical"]),
});

export function severityIndex(level: RiskLevel): number {
  return SEVERITY_ORDER.indexOf(level);
}

export function maxRiskLevel(a: RiskLevel, b: RiskLevel): RiskLevel {
  return severityIndex(b) > severityIndex(a) ? b : a;
}

export function isRiskLevel(value: string): value is RiskLevel {
  return (SEVERITY_ORDER as readonly string[]).includes(value);
}

function containsAny(text: string, keywords: readonly string[]): boolean {
  return keywords.some(kw => text.includes(kw));
}

/**
 * Derive one level from a set of findings.
 */
export function classifyFindings(findings: readonly Finding[], policy: SeverityPolicy = DEFAULT_SEVERITY_POLICY): RiskLevel {
  if (findings.length === 0) return "None";

  let level: RiskLevel = "None";
  for (const finding of findings) {
    const text = finding.toLowerCase();
    if (containsAny(text, policy.critical)) return "Critical";
    if (containsAny(text, policy.high)) level = maxRiskLevel(level, "High");
    if (containsAny(text, policy.medium)) level = maxRiskLevel(level, "Medium");
  }

  return level === "None" ? "Low" : level;
}

/**
 * Turn an assessment into what a confirmation layer acts on.
 */
export function buildReport(assessment: RiskAssessment, actionPolicy: ActionPolicy = DEFAULT_ACTION_POLICY): CommandReport {
  const { level, reasons, forbiddenBinary } = assessment;

  return {
    risk_level: level,
    action: forbiddenBinary !== undefined ? "block" : actionPolicy[level],
    summary: generateSummary(reasons, level),
    reasons: [...reasons],
    recommendation: generateRecommendation(level, forbiddenBinary),
    ...(forbiddenBinary !== undefined && { forbidden_binary: forbiddenBinary }),
  };
}

function generateSummary(reasons: readonly Finding[], level: RiskLevel): string {
  const levelLabel: Record<RiskLevel, string> = {
    None: "No issues",
    Low: "Low risk",
    Medium: "Medium risk",
    High: "High risk",
    Critical: "Critical risk",
  };

  const prefix = `**${levelLabel[level]}**`;

  if (reasons.length === 0) {
    return `${prefix}: no security concerns detected.`;
  }
  if (reasons.length === 1) {
    return `${prefix}: ${reasons[0]}`;
  }

  const bullets = reasons.slice(0, 3).map(r => `- ${r}`).join("\n");
  const more = reasons.length > 3 ? `\n- …and ${reasons.length - 3} more` : "";
  return `${prefix} — ${reasons.length} issues found:\n${bullets}${more}`;
}

function generateRecommendation(level: RiskLevel, forbiddenBinary: string | undefined): string {
  if (forbiddenBinary !== undefined) {
    return `\`${forbiddenBinary}\` is blacklisted in the configuration. Do not run this command.`;
  }

  switch (level) {
    case "Critical":
      return "This command can cause irreversible damage. Do not proceed unless you understand every part of it.";
    case "High":
      return "This command performs destructive operations. Verify the targets carefully before proceeding.";
    case "Medium":
      return "This command needs elevated privileges or touches sensitive locations. Confirm it is intended.";
    case "Low":
      return "Minor concerns detected. Review the details and proceed if expected.";
    case "None":
      return "Command appears safe to execute.";
  }
}
