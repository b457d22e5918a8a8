import type { CommandText } from "./types.js";

// Anything outside letters, marks, numbers, punctuation, symbols and Unicode
// White_Space (NUL, C0/C1 controls, format characters such as U+FEFF,
// unassigned code points). U+0085 counts as whitespace.
const NON_PRINTABLE = /[^\p{L}\p{M}\p{N}\p{P}\p{S}\p{White_Space}]/u;

// `\s` and String#trim differ from White_Space: they take U+FEFF and leave U+0085.
const WHITESPACE_RUN = /\p{White_Space}+/gu;
const WHITESPACE_CHAR = /^\p{White_Space}$/u;

// Called on uncapped input; a plain scan from both ends.
export function trimWhitespace(command: string): string {
  let start = 0;
  let end = command.length;
  while (start < end && WHITESPACE_CHAR.test(command[start])) start++;
  while (end > start && WHITESPACE_CHAR.test(command[end - 1])) end--;
  return command.slice(start, end);
}

/**
 * Collapse whitespace runs to a single space, trim, and lowercase.
 */
export function normalizeCommand(command: string): string {
  return trimWhitespace(command).replace(WHITESPACE_RUN, " ").toLowerCase();
}

export function hasControlCharacters(command: string): boolean {
  return NON_PRINTABLE.test(command);
}

export function toCommandText(trimmed: string): CommandText {
  return { raw: trimmed, normalized: normalizeCommand(trimmed) };
}

export function escapeRegExp(literal: string): string {
  return literal.replace(/[.*+?^${}()|[\]\\/]/g, "\\$&");
}
