import type { Finding, PatternRule } from "../types.js";

/** The commands of a pipeline or list, split at `|`, `;` and `&`. */
export function splitCommands(text: string): string[] {
  return text.split(/[|;&]/);
}

function ruleMatches(rule: PatternRule, text: string): boolean {
  let rest = text;
  for (const anchor of rule.after ?? []) {
    const match = anchor.exec(rest);
    if (!match) return false;
    rest = rest.slice(match.index + match[0].length);
  }
  return rule.pattern.test(rest) && (rule.alongside ?? []).every(p => p.test(rest));
}

/**
 * Run a rule table against one form of the command. Rules sharing a
 * description yield one finding.
 */
export function matchRules(rules: readonly PatternRule[], text: string): Finding[] {
  const findings: Finding[] = [];
  const commands = rules.some(rule => rule.perCommand) ? splitCommands(text) : [];

  for (const rule of rules) {
    if (findings.includes(rule.description)) continue;

    const matched = rule.perCommand
      ? commands.some(command => ruleMatches(rule, command))
      : ruleMatches(rule, text);
    if (matched) findings.push(rule.description);
  }
  return findings;
}
