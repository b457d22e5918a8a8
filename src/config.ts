import { readFileSync } from "fs";
import { homedir } from "os";
import { resolve } from "path";
import { z } from "zod";
import { DEFAULT_MAX_COMMAND_LENGTH } from "./assess.js";
import { DEFAULT_ACTION_POLICY } from "./scorer.js";
import type { Config } from "./types.js";

export class ConfigError extends Error {
  constructor(message: string, readonly path: string) {
    super(message);
    this.name = "ConfigError";
  }
}

const ActionSchema = z.enum(["run", "warn", "ask", "block"]);

const ConfigSchema = z.object({
  actionPolicy: z
    .object({
      None: ActionSchema,
      Low: ActionSchema,
      Medium: ActionSchema,
      High: ActionSchema,
      Critical: ActionSchema,
    })
    .partial()
    .strict()
    .default({}),
  blacklistedBinaries: z.array(z.string()).default([]),
  maxCommandLength: z.number().int().positive().default(DEFAULT_MAX_COMMAND_LENGTH),
  logFile: z.union([z.string().min(1), z.literal(false)]).optional(),
  logBackend: z.enum(["jsonl", "sqlite"]).default("jsonl"),
});

export type ConfigInput = z.input<typeof ConfigSchema>;

export const DEFAULT_LOG_FILE = resolve(homedir(), ".cmdrisk", "logs", "assess.jsonl");

export function expandTilde(path: string): string {
  if (path === "~") return homedir();
  if (path.startsWith("~/")) return resolve(homedir(), path.slice(2));
  return path;
}

function freezeConfig(config: Config): Config {
  Object.freeze(config.actionPolicy);
  Object.freeze(config.blacklistedBinaries);
  return Object.freeze(config);
}

/**
 * Validate a raw config object and merge it over the defaults.
 */
export function parseConfig(raw: unknown, path = "<inline>"): Config {
  const result = ConfigSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues
      .map(issue => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(`Invalid config ${path}: ${issues}`, path);
  }

  const user = result.data;
  const logFile = user.logFile === undefined ? DEFAULT_LOG_FILE : user.logFile;

  return freezeConfig({
    actionPolicy: { ...DEFAULT_ACTION_POLICY, ...user.actionPolicy },
    blacklistedBinaries: [...user.blacklistedBinaries],
    maxCommandLength: user.maxCommandLength,
    logFile: typeof logFile === "string" ? expandTilde(logFile) : logFile,
    logBackend: user.logBackend,
  });
}

/**
 * Read the config file at `path`. A missing file yields the defaults;
 * unreadable JSON or a schema violation throws ConfigError.
 */
export function loadConfig(path: string): Config {
  let text: string;
  try {
    text = readFileSync(path, "utf-8");
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") {
      return parseConfig({}, path);
    }
    const message = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Cannot read config ${path}: ${message}`, path);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Config ${path} is not valid JSON: ${message}`, path);
  }

  return parseConfig(raw, path);
}

export interface ConfigStore {
  current(): Config;
  /** Re-read the file and swap it in; on error the previous config stays active. */
  reload(): Config;
}

export function createConfigStore(path: string): ConfigStore {
  let active = loadConfig(path);

  return {
    current(): Config {
      return active;
    },

    reload(): Config {
      const next = loadConfig(path);
      active = next;
      return next;
    },
  };
}
