import { readFile, readdir } from "fs/promises";
import { extname, join } from "path";
import { extractShellCommands } from "./extractors/shell.js";
import { maxRiskLevel } from "./scorer.js";
import type { AssessOptions, Assessor } from "./assess.js";
import type { Finding, RiskLevel } from "./types.js";

export interface LineResult {
  line: number;
  command: string;
  risk_level: RiskLevel;
  reasons: Finding[];
  forbidden_binary?: string;
}

export interface ScriptAnalysisResult {
  file: string;
  commands_analyzed: number;
  risk_level: RiskLevel;
  /** Only lines that assessed above None. */
  results: LineResult[];
}

export interface DirectoryAnalysisResult {
  files_scanned: number;
  total_findings: number;
  risk_level: RiskLevel;
  results: ScriptAnalysisResult[];
}

export const DEFAULT_SCRIPT_EXTENSIONS = [".sh", ".bash", ".zsh"];

const SKIPPED_DIRECTORIES = new Set(["node_modules", ".git", "dist", "vendor"]);

/**
 * Assess every command line of a shell script.
 */
export async function analyzeScript(
  filePath: string,
  assessor: Assessor,
  options: AssessOptions = {},
): Promise<ScriptAnalysisResult> {
  const content = await readFile(filePath, "utf-8");
  const extracted = extractShellCommands(content);

  let level: RiskLevel = "None";
  const results: LineResult[] = [];

  for (const { command, line } of extracted) {
    const assessment = assessor.assess(command, options);
    if (assessment.level === "None") continue;

    level = maxRiskLevel(level, assessment.level);
    results.push({
      line,
      command,
      risk_level: assessment.level,
      reasons: assessment.reasons,
      ...(assessment.forbiddenBinary !== undefined && { forbidden_binary: assessment.forbiddenBinary }),
    });
  }

  return { file: filePath, commands_analyzed: extracted.length, risk_level: level, results };
}

/**
 * Recursively scan a directory for shell scripts and assess each one.
 */
export async function analyzeDirectory(
  dirPath: string,
  assessor: Assessor,
  options: AssessOptions = {},
  extensions: readonly string[] = DEFAULT_SCRIPT_EXTENSIONS,
): Promise<DirectoryAnalysisResult> {
  const wanted = new Set(extensions.map(e => (e.startsWith(".") ? e : `.${e}`).toLowerCase()));
  const files: string[] = [];
  await walkDir(dirPath, wanted, files);
  files.sort();

  let level: RiskLevel = "None";
  const results: ScriptAnalysisResult[] = [];
  for (const file of files) {
    const result = await analyzeScript(file, assessor, options);
    if (result.results.length > 0) {
      level = maxRiskLevel(level, result.risk_level);
      results.push(result);
    }
  }

  return {
    files_scanned: files.length,
    total_findings: results.reduce((sum, r) => sum + r.results.reduce((n, l) => n + l.reasons.length, 0), 0),
    risk_level: level,
    results,
  };
}

async function walkDir(currentDir: string, extensions: ReadonlySet<string>, out: string[]): Promise<void> {
  const entries = await readdir(currentDir, { withFileTypes: true });

  for (const entry of entries) {
    const fullPath = join(currentDir, entry.name);

    if (entry.isDirectory()) {
      if (!SKIPPED_DIRECTORIES.has(entry.name)) {
        await walkDir(fullPath, extensions, out);
      }
      continue;
    }

    if (entry.isFile() && extensions.has(extname(entry.name).toLowerCase())) {
      out.push(fullPath);
    }
  }
}
