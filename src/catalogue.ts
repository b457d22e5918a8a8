import { escapeRegExp } from "./normalize.js";
import type { PatternRule } from "./types.js";

/**
 * Pattern tables for every detector category.
 *
 * Rules are matched in table order and each rule yields at most one finding.
 * Patterns marked "raw" run against the trimmed input with its original
 * casing and spacing; all others run against the normalized (lowercased,
 * single-spaced) text. The finding text doubles as severity input (see
 * `SeverityPolicy` in scorer.ts), so rewording a description can change the
 * level a command is assigned.
 */
export interface ObfuscationRules {
  /** raw */
  rules: readonly PatternRule[];
  maxBackslashes: number;
  maxQuotes: number;
  excessiveEscaping: string;
}

export interface RmInvocationRule {
  /** Locates the rm command word inside one command. */
  command: RegExp;
  /** Each must match at least one whole argument after the command word. */
  flags: readonly RegExp[];
}

export interface DestructiveRules {
  rmInvocations: readonly RmInvocationRule[];
  /** Tested against the matched `rm` invocation up to the next `|`, `;` or `&`. */
  dangerousPaths: readonly RegExp[];
  criticalPathFinding: string;
  unverifiedPathFinding: string;
  rules: readonly PatternRule[];
}

export interface ResourceRules {
  /** raw */
  rules: readonly PatternRule[];
  /** raw */
  unboundedLoop: RegExp;
  /** raw; any match exempts an unbounded loop */
  throttle: RegExp;
  unboundedLoopFinding: string;
}

export interface Catalogue {
  obfuscation: ObfuscationRules;
  privilege: readonly PatternRule[];
  destructive: DestructiveRules;
  disk: readonly PatternRule[];
  systemFiles: readonly PatternRule[];
  network: readonly PatternRule[];
  resource: ResourceRules;
  exfiltration: readonly PatternRule[];
}

export const CRITICAL_SYSTEM_FILES = [
  "/etc/passwd",
  "/etc/shadow",
  "/etc/sudoers",
  "/etc/fstab",
  "/etc/hosts",
  "/boot/",
  "/etc/systemd",
  "/etc/init",
] as const;

// `>` also covers `>>`
const REDIRECT_OR_TEE = />|\btee\b/;

// A redirect or tee anywhere in the line, or an in-place sed within the
// same command as the path.
function systemFileRules(file: string): PatternRule[] {
  const path = new RegExp(escapeRegExp(file));
  const description = `modification to critical system file: ${file}`;
  return [
    { pattern: path, alongside: [REDIRECT_OR_TEE], description },
    { after: [/\bsed\b/], pattern: /\s-i/, alongside: [path], perCommand: true, description },
  ];
}

// Whole-argument flag matchers; the lookahead keeps the scan linear in the
// argument's length.
const RECURSIVE_FLAG = /^(?:-(?=[a-z]*r)[a-z]+|--recursive)$/;
const FORCE_FLAG = /^(?:-(?=[a-z]*f)[a-z]+|--force)$/;
const RECURSIVE_OR_FORCE_FLAG = /^--?(?=[a-z-]*[rf])[a-z-]+$/;

const DOWNLOAD = /\b(?:curl|wget)\b/;

function freezeRules(rules: PatternRule[]): readonly PatternRule[] {
  return Object.freeze(
    rules.map(rule => {
      if (rule.after) Object.freeze(rule.after);
      if (rule.alongside) Object.freeze(rule.alongside);
      return Object.freeze(rule);
    }),
  );
}

function buildCatalogue(): Catalogue {
  return {
    obfuscation: Object.freeze({
      rules: freezeRules([
        { pattern: /\\x[0-9a-f]{2}/i, description: "hex-encoded characters detected (possible obfuscation)" },
        { pattern: /base64|b64decode|\batob\b/i, description: "base64 encoding/decoding detected (possible obfuscation)" },
        { pattern: /\b(?:eval|exec)\b/i, description: "eval/exec detected (dynamic code execution)" },
        { pattern: /\brev\b/i, description: "reverse command detected (possible obfuscation)" },
      ]),
      maxBackslashes: 5,
      maxQuotes: 6,
      excessiveEscaping: "excessive escaping/quoting detected",
    }),

    privilege: freezeRules([
      { pattern: /\bsudo\s/, description: "sudo privilege escalation" },
      { pattern: /\bsu\s/, description: "su privilege escalation" },
      { pattern: /\bsu\s-/, description: "su - login shell privilege escalation" },
      { pattern: /\bdoas\b/, description: "doas privilege escalation" },
      { pattern: /\bpkexec\b/, description: "pkexec privilege escalation" },
    ]),

    destructive: Object.freeze({
      rmInvocations: Object.freeze([
        // -rf, -Rf, -r -f, --recursive --force ... in any order
        Object.freeze({ command: /(?<![\w-])rm(?=\s|$)/, flags: Object.freeze([RECURSIVE_FLAG, FORCE_FLAG]) }),
        Object.freeze({ command: /(?:\/usr)?\/bin\/rm(?=\s|$)/, flags: Object.freeze([RECURSIVE_OR_FORCE_FLAG]) }),
        Object.freeze({
          command: /(?:\$\(|`)\s*(?:which|command\s-v|type\s-p)\srm\s*(?:\)|`)/,
          flags: Object.freeze([]),
        }),
      ]),
      dangerousPaths: Object.freeze([
        /\s["']?\/(?=["']?(?:\s|$))/,
        /\s["']?\/\*/,
        /\s["']?\/home\b/,
        /\s["']?\/etc\b/,
        /\s["']?\/usr\b/,
        /\s["']?\/var\b/,
        /\s["']?\/boot\b/,
        /\s["']?~/,
        /\s["']?\$\{?home\b/,
        /\s["']?[a-z]:\\?\*/,
      ]),
      criticalPathFinding: "destructive rm command targeting critical path",
      unverifiedPathFinding: "destructive rm -rf detected (verify target path)",
      rules: freezeRules([
        {
          after: [/\bfind\b/],
          pattern: /\s-delete\b/,
          perCommand: true,
          description: "find -delete can remove many files (potentially destructive)",
        },
        { pattern: /\bshred\b/, description: "shred detected (secure file deletion, unrecoverable)" },
        {
          after: [/\btruncate\b/],
          pattern: /(?:-s\s?|--size[=\s])0(?=\s|$)/,
          perCommand: true,
          description: "truncate to zero detected (data loss)",
        },
      ]),
    }),

    disk: freezeRules([
      {
        after: [/\bdd\b/],
        pattern: /\bof\s?=\s?\/dev\//,
        perCommand: true,
        description: "dd writing to raw device (can overwrite entire disk)",
      },
      { pattern: />\s?\/dev\/(?:sd[a-z]|nvme|hd[a-z])/, description: "output redirection to block device (can overwrite entire disk)" },
      { pattern: /\bmkfs\b/, description: "filesystem creation (will erase partition)" },
      { pattern: /\bfdisk\b/, description: "disk partitioning tool" },
      { pattern: /\bparted\b/, description: "partition editor" },
      { pattern: /\bgdisk\b/, description: "GPT partition tool" },
      { pattern: /\bcfdisk\b/, description: "curses-based partition tool" },
      { pattern: /\bmkswap\b/, description: "swap creation (will erase partition)" },
      { pattern: /\bsgdisk\b/, description: "GPT partition manipulation" },
    ]),

    systemFiles: freezeRules([
      ...CRITICAL_SYSTEM_FILES.flatMap(systemFileRules),
      { after: [/\b(?:chmod|chown)\b/], pattern: /\s["']?\/etc\b/, description: "permission change on /etc directory" },
      { pattern: /\bchmod\s(?:-\S+\s)*0+(?=\s|$)/, description: "chmod removing all permissions (files will be inaccessible)" },
    ]),

    network: freezeRules([
      {
        after: [DOWNLOAD],
        pattern: /\|\s?(?:sudo\s(?:-\S+\s)*)?(?:\S*\/)?sh\b/,
        description: "piping download directly to shell (dangerous)",
      },
      { after: [DOWNLOAD], pattern: /\|\s?(?:sudo\s(?:-\S+\s)*)?(?:\S*\/)?bash\b/, description: "piping download to bash" },
      {
        after: [DOWNLOAD],
        pattern: /\|\s?(?:sudo\s(?:-\S+\s)*)?(?:\S*\/)?python[0-9.]*\b/,
        description: "piping download to python",
      },
      {
        after: [DOWNLOAD, /(?:>|-o|--output(?:-document)?[=\s]?)\s?\/tmp\/\S/, /&&|;/],
        pattern: /\b(?:sh|bash)\b/,
        description: "download to /tmp then execute",
      },
      {
        after: [/\bnc\b/],
        pattern: /\s-(?=[a-z]*l)[a-z]+(?=\s|$)/,
        alongside: [/\s-[a-z]*e(?=\s|$)/],
        perCommand: true,
        description: "netcat listener with command execution (remote shell)",
      },
      {
        after: [/\bncat\b/],
        pattern: /\s(?:--exec|--sh-exec|-e)(?=[\s=]|$)/,
        perCommand: true,
        description: "ncat with command execution (remote shell)",
      },
    ]),

    resource: Object.freeze({
      rules: freezeRules([
        { pattern: /:\s*\(\s*\)\s*\{\s*:\s*\|\s*:\s*&\s*\}\s*;?\s*:/, description: "fork bomb detected (will crash system)" },
        { pattern: /\b([A-Za-z_]\w*)\s*\(\s*\)\s*\{\s*\1\s*\|\s*\1\s*&\s*\}\s*;?\s*\1\b/, description: "fork bomb detected (will crash system)" },
        {
          after: [/\bdd\b/i],
          pattern: /\b(?:bs|count)=\d+[mgt]i?b?(?=\s|$)/i,
          alongside: [/\bbs=\d/i, /\bcount=\d/i],
          perCommand: true,
          description: "large file creation with dd",
        },
      ]),
      unboundedLoop: /\bwhile\s+(?:true\b|:(?=[\s;]|$))|\bwhile\s*\[\s*1\s*\]|\buntil\s+false\b|\bfor\s*\(\(\s*;\s*;\s*\)\)/,
      throttle: /\b(?:sleep|wait|read)\b/,
      unboundedLoopFinding: "infinite loop without delay (potential resource exhaustion)",
    }),

    exfiltration: freezeRules([
      { after: [/\btar\b/], pattern: /\|\s?(?:\S*\/)?(?:nc|ncat|netcat)\b/, description: "archiving and sending over network" },
      {
        // after lowercasing `-f` is also `--fail`; the `@` must open the value or follow `name=`
        after: [/\bcurl\b/],
        pattern: /\s(?:-d|--data(?:-binary|-raw|-urlencode)?|-f|--form)[\s=]["']?(?:[\w.-]+=)?@/,
        description: "uploading file via curl",
      },
      { after: [/\bwget\b/], pattern: /\s--post-file\b/, description: "uploading file via wget" },
      { after: [/\bscp\b/], pattern: /\s[^\s@]+@[^\s:@]+:/, description: "secure copy to remote host" },
      { after: [/\brsync\b/], pattern: /\s[^\s@]+@[^\s:@]+:/, description: "rsync to remote host" },
    ]),
  };
}

/** Built once per process and shared by every default detector. */
export const DEFAULT_CATALOGUE: Catalogue = Object.freeze(buildCatalogue());
