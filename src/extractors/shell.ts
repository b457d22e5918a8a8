export interface ExtractedCommand {
  command: string;
  line: number;
}

// Lines that are pure syntax and never a command on their own.
const SYNTAX_ONLY = /^(?:function\s+\w+(?:\s*\(\))?\s*\{?|\w+\s*\(\)\s*\{?|\{|\}|then|else|elif|fi|do|done|esac|;;)$/;

// `<<<` is a here-string and has no body.
const HEREDOC_START = /(?<!<)<<(?!<)-?\s*['"]?(\w+)['"]?/;

/**
 * Split shell script content into logical command lines.
 * Joins backslash continuations, skips the shebang, comments, blank lines
 * and heredoc bodies. Line numbers are 1-based and point at the first
 * physical line of a continued command.
 */
export function extractShellCommands(content: string): ExtractedCommand[] {
  const results: ExtractedCommand[] = [];
  const lines = content.split(/\r?\n/);

  let pending = "";
  let pendingLine = 0;
  let heredocDelim: string | null = null;

  for (let i = 0; i < lines.length; i++) {
    const raw = lines[i];

    if (i === 0 && raw.startsWith("#!")) continue;

    if (heredocDelim !== null) {
      if (raw.trim() === heredocDelim) heredocDelim = null;
      continue;
    }

    if (pending) {
      pending += " " + raw.trimStart();
    } else {
      pending = raw;
      pendingLine = i + 1;
    }

    if (pending.endsWith("\\")) {
      pending = pending.slice(0, -1);
      continue;
    }

    const command = pending.trim();
    pending = "";

    if (!command || command.startsWith("#") || SYNTAX_ONLY.test(command)) continue;

    const heredoc = HEREDOC_START.exec(command);
    if (heredoc) heredocDelim = heredoc[1];

    results.push({ command, line: pendingLine });
  }

  // a trailing continuation with no following line
  const leftover = pending.trim();
  if (leftover && !leftover.startsWith("#")) {
    results.push({ command: leftover, line: pendingLine });
  }

  return results;
}
