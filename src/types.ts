export type RiskLevel = "None" | "Low" | "Medium" | "High" | "Critical";

export type Action = "run" | "warn" | "ask" | "block";

export type ActionPolicy = Record<RiskLevel, Action>;

/** One human-readable description of a detected risky idiom. */
export type Finding = string;

export interface RiskAssessment {
  level: RiskLevel;
  reasons: Finding[];
  forbiddenBinary?: string;
}

export interface CommandText {
  /** Trimmed input with original casing and spacing. */
  raw: string;
  normalized: string;
}

export interface Detector {
  name: string;
  /** Drop this detector when the caller already obtained consent for elevation. */
  skipWhenElevationIntended?: boolean;
  detect(command: CommandText): Finding[];
}

/**
 * A rule matches when every `after` anchor is found in turn, each searched
 * from the end of the previous match, and then `pattern` and every
 * `alongside` pattern match the text that remains. Keep each pattern free of
 * unbounded wildcards; `after` expresses "X somewhere before Y" instead.
 */
export interface PatternRule {
  pattern: RegExp;
  description: string;
  after?: readonly RegExp[];
  alongside?: readonly RegExp[];
  /** Test each command between `|`, `;` and `&` on its own. */
  perCommand?: boolean;
}

export interface SeverityPolicy {
  critical: readonly string[];
  high: readonly string[];
  medium: readonly string[];
}

export interface CommandReport {
  risk_level: RiskLevel;
  action: Action;
  summary: string;
  reasons: Finding[];
  recommendation: string;
  forbidden_binary?: string;
}

export type LogBackend = "jsonl" | "sqlite";

export interface Config {
  actionPolicy: ActionPolicy;
  blacklistedBinaries: string[];
  maxCommandLength: number;
  logFile: string | false;
  logBackend: LogBackend;
}
