import { existsSync } from "fs";
import { readFile } from "fs/promises";
import { resolve } from "path";
import { parse, YAMLParseError } from "yaml";
import { ConfigurationError, errorMessage } from "../utils/errors.js";
import type { LoadedConfig } from "./schema.js";

export const CONFIG_FILENAMES = [
  "autobdd.config.yaml",
  "autobdd.config.yml",
  "config/config.yaml",
];

export function resolveConfigPath(cwd: string, explicitPath?: string): string {
  if (explicitPath) {
    const candidate = resolve(cwd, explicitPath);
    if (!existsSync(candidate)) {
      throw new ConfigurationError(`Config file not found: ${candidate}`);
    }
    return candidate;
  }

  for (const filename of CONFIG_FILENAMES) {
    const candidate = resolve(cwd, filename);
    if (existsSync(candidate)) {
      return candidate;
    }
  }

  throw new ConfigurationError(
    `No autobdd config file found. Run \`autobdd init\` to create one.`
  );
}

export async function loadConfig(
  cwd: string,
  explicitPath?: string
): Promise<LoadedConfig> {
  const path = resolveConfigPath(cwd, explicitPath);

  let content: string;
  try {
    content = await readFile(path, "utf-8");
  } catch (error) {
    throw new ConfigurationError(
      `Could not read config file ${path}: ${errorMessage(error)}`,
      { cause: error }
    );
  }

  return parseConfig(content, path);
}

/**
 * Parse YAML text into a LoadedConfig. The document must be a mapping;
 * anything else (including an empty file) is a ConfigurationError.
 */
export function parseConfig(content: string, path: string): LoadedConfig {
  let parsed: unknown;
  try {
    parsed = parse(content);
  } catch (error) {
    const detail =
      error instanceof YAMLParseError ? error.message : errorMessage(error);
    throw new ConfigurationError(`Error parsing config file ${path}: ${detail}`, {
      cause: error,
    });
  }

  if (!isMapping(parsed)) {
    throw new ConfigurationError(
      `Config file ${path} must contain a mapping of sections`
    );
  }

  return Object.freeze({ path, raw: Object.freeze({ ...parsed }) });
}

function isMapping(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
