import { DEFAULT_CATALOGUE, type DestructiveRules, type RmInvocationRule } from "../catalogue.js";
import { matchRules, splitCommands } from "./match.js";
import type { CommandText, Detector, Finding } from "../types.js";

function invocationIn(command: string, rule: RmInvocationRule): string | null {
  const match = rule.command.exec(command);
  if (!match) return null;

  const args = command
    .slice(match.index + match[0].length)
    .split(" ")
    .filter(arg => arg !== "");
  if (!rule.flags.every(flag => args.some(arg => flag.test(arg)))) return null;

  return command.slice(match.index);
}

/**
 * The first rm invocation whose arguments carry the flags its rule asks for,
 * from the command word up to the next pipe or command separator.
 */
function findRmInvocation(normalized: string, rules: readonly RmInvocationRule[]): string | null {
  for (const command of splitCommands(normalized)) {
    for (const rule of rules) {
      const invocation = invocationIn(command, rule);
      if (invocation !== null) return invocation;
    }
  }
  return null;
}

export function createDestructiveDetector(rules: DestructiveRules = DEFAULT_CATALOGUE.destructive): Detector {
  return {
    name: "destructive",

    detect({ normalized }: CommandText): Finding[] {
      const findings: Finding[] = [];

      const invocation = findRmInvocation(normalized, rules.rmInvocations);
      if (invocation !== null) {
        const targetsCriticalPath = rules.dangerousPaths.some(p => p.test(invocation));
        findings.push(targetsCriticalPath ? rules.criticalPathFinding : rules.unverifiedPathFinding);
      }

      findings.push(...matchRules(rules.rules, normalized));
      return findings;
    },
  };
}

export const destructiveDetector = createDestructiveDetector();
