import { readFileSync } from "node:fs";
import { resolve } from "node:path";
import type { SpanwiseConfig } from "./types.js";
import { getConfigPath } from "./paths.js";
import { spanwiseConfigSchema } from "./schema.js";
import { ConfigError, formatIssues } from "../errors.js";

const ENV_PATTERN = /\$\{env:([A-Z_][A-Z0-9_]*)\}/g;

export function substituteEnv(raw: string): string {
  return raw.replace(ENV_PATTERN, (match, varName: string) => {
    const value = process.env[varName];
    if (value === undefined) {
      throw new Error(`Missing environment variable: ${varName} (referenced as ${match})`);
    }
    return value;
  });
}

/** A missing file yields the defaults; anything unreadable or invalid raises ConfigError. */
export function loadConfig(path?: string): SpanwiseConfig {
  const configPath = resolve(path ?? getConfigPath());

  let content: string;
  try {
    content = readFileSync(configPath, "utf-8");
  } catch (err) {
    if (isErrnoException(err) && err.code === "ENOENT") {
      return spanwiseConfigSchema.parse({});
    }
    throw new ConfigError(`Cannot read config: ${errorMessage(err)}`, configPath);
  }

  return parseConfigText(content, configPath);
}

/** Env substitution, JSON parsing and schema validation of config file text. */
export function parseConfigText(content: string, configPath: string): SpanwiseConfig {
  let raw: unknown;
  try {
    raw = JSON.parse(substituteEnv(content));
  } catch (err) {
    throw new ConfigError(`Invalid config ${configPath}: ${errorMessage(err)}`, configPath);
  }

  const result = spanwiseConfigSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigError(`Invalid config ${configPath}: ${formatIssues(result.error)}`, configPath, result.error.issues);
  }
  return result.data;
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && "code" in err;
}
