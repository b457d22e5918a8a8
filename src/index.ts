#!/usr/bin/env node
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { stat } from "fs/promises";
import { dirname, resolve } from "path";
import { fileURLToPath } from "url";
import { z } from "zod";
import { createAssessor, type AssessOptions } from "./assess.js";
import { createConfigStore } from "./config.js";
import { buildReport } from "./scorer.js";
import { initLogger, initLoggerWithWriter, writeLogEntry } from "./logger.js";
import { createJsonlStore, type LogStore } from "./log-store.js";
import { analyzeDirectory, analyzeScript } from "./script.js";

const __dirname = dirname(fileURLToPath(import.meta.url));
const configPath = process.env.CMDRISK_CONFIG ?? resolve(__dirname, "..", "config.json");

const configStore = createConfigStore(configPath);
const startupConfig = configStore.current();

// The log backend is fixed for the lifetime of the process; reload_config
// swaps policy, blacklist and length cap only.
let logStore: LogStore | null = null;
const logFile = startupConfig.logFile;
if (logFile === false) {
  initLogger(false);
} else if (startupConfig.logBackend === "sqlite") {
  try {
    const { createSqliteStore } = await import("./log-store-sqlite.js");
    const store = createSqliteStore(logFile.replace(/\.jsonl$/, ".db"));
    initLoggerWithWriter(store);
    logStore = store;
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    console.error(`cmdrisk: SQLite log backend unavailable (${message}), falling back to JSONL`);
    initLogger(logFile);
    logStore = createJsonlStore(logFile);
  }
} else {
  initLogger(logFile);
  logStore = createJsonlStore(logFile);
}

const assessor = createAssessor();

function assessOptions(elevationIntended = false): AssessOptions {
  const config = configStore.current();
  return {
    privilegeEscalationIntended: elevationIntended,
    forbiddenBinaries: config.blacklistedBinaries,
    maxCommandLength: config.maxCommandLength,
  };
}

function jsonContent(value: unknown) {
  return { content: [{ type: "text" as const, text: JSON.stringify(value, null, 2) }] };
}

function errorContent(error: unknown) {
  const message = error instanceof Error ? error.message : String(error);
  return { ...jsonContent({ error: message }), isError: true };
}

const server = new McpServer({
  name: "cmdrisk",
  version: "1.0.0",
});

server.tool(
  "assess_command",
  "Classify a shell command's risk (None/Low/Medium/High/Critical) before it is executed",
  {
    command: z.string().describe("The shell command to assess"),
    elevation_intended: z
      .boolean()
      .optional()
      .describe("True when the user explicitly asked for elevated execution; disables the privilege-escalation check"),
  },
  async ({ command, elevation_intended }) => {
    const startTime = Date.now();
    const elevationIntended = elevation_intended ?? false;
    try {
      const assessment = assessor.assess(command, assessOptions(elevationIntended));
      const report = buildReport(assessment, configStore.current().actionPolicy);
      writeLogEntry(command, elevationIntended, report, Date.now() - startTime);
      return jsonContent(report);
    } catch (error) {
      return errorContent(error);
    }
  }
);

server.tool(
  "analyze_script",
  "Assess every command line of a shell script without executing it",
  {
    path: z.string().describe("Absolute path to the script"),
  },
  async ({ path }) => {
    try {
      return jsonContent(await analyzeScript(path, assessor, assessOptions()));
    } catch (error) {
      return errorContent(error);
    }
  }
);

server.tool(
  "analyze_directory",
  "Recursively scan a directory for shell scripts and assess each command line",
  {
    path: z.string().describe("Absolute path to the directory to scan"),
    extensions: z.array(z.string()).optional().describe("File extensions to include (defaults to .sh, .bash, .zsh)"),
  },
  async ({ path, extensions }) => {
    try {
      const info = await stat(path);
      if (!info.isDirectory()) {
        return errorContent(new Error(`${path} is not a directory`));
      }
      return jsonContent(await analyzeDirectory(path, assessor, assessOptions(), extensions));
    } catch (error) {
      return errorContent(error);
    }
  }
);

server.tool(
  "query_log",
  "Search previously logged command assessments",
  {
    search: z.string().optional().describe("Text to find in the command or its reasons"),
    risk: z.enum(["None", "Low", "Medium", "High", "Critical"]).optional(),
    action: z.enum(["run", "warn", "ask", "block"]).optional(),
    from: z.string().optional().describe("ISO timestamp lower bound"),
    to: z.string().optional().describe("ISO timestamp upper bound"),
    order: z.enum(["asc", "desc"]).optional(),
    limit: z.number().int().positive().max(1000).optional(),
    offset: z.number().int().nonnegative().optional(),
  },
  async (query) => {
    if (!logStore) {
      return errorContent(new Error("Assessment logging is disabled (logFile is false)"));
    }
    try {
      return jsonContent(logStore.query(query));
    } catch (error) {
      return errorContent(error);
    }
  }
);

server.tool(
  "reload_config",
  "Re-read the configuration file; the previous configuration stays active if the file is invalid",
  async () => {
    try {
      const config = configStore.reload();
      return jsonContent({
        config: configPath,
        blacklistedBinaries: config.blacklistedBinaries,
        maxCommandLength: config.maxCommandLength,
        actionPolicy: config.actionPolicy,
      });
    } catch (error) {
      return errorContent(error);
    }
  }
);

async function main() {
  const transport = new StdioServerTransport();
  await server.connect(transport);
}

main().catch((error) => {
  console.error("cmdrisk server error:", error);
  process.exit(1);
});
