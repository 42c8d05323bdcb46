import * as fs from "node:fs";
import * as path from "node:path";

import TOML from "@iarna/toml";

import { CONFIG_FILE_NAME } from "../constants.js";
import { ConfigError } from "./errors.js";
import { type Config, configSchema } from "./schema.js";

export { ConfigError };

/**
 * Recursively strip Symbol properties from an object.
 * @iarna/toml adds Symbol properties to inline tables (e.g., Symbol('type')),
 * which zod record/enum validation does not expect.
 */
function stripSymbols(obj: unknown): unknown {
  if (obj === null || typeof obj !== "object") {
    return obj;
  }

  if (Array.isArray(obj)) {
    return obj.map(stripSymbols);
  }

  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(obj)) {
    result[key] = stripSymbols(value);
  }
  return result;
}

export interface LoadConfigResult {
  config: Config;
  /** Absolute path of the file read; null when no file was found */
  configPath: string | null;
}

/**
 * Find cachescope.toml by walking up the directory tree
 */
export function findConfigFile(startDir: string = process.cwd()): string | null {
  let currentDir = path.resolve(startDir);

  for (;;) {
    const configPath = path.join(currentDir, CONFIG_FILE_NAME);
    if (fs.existsSync(configPath)) {
      return configPath;
    }
    const parentDir = path.dirname(currentDir);
    if (parentDir === currentDir) {
      return null;
    }
    currentDir = parentDir;
  }
}

/**
 * Parse TOML file content
 */
function parseTomlFile(filePath: string): unknown {
  try {
    const content = fs.readFileSync(filePath, "utf-8");
    return stripSymbols(TOML.parse(content));
  } catch (error) {
    const message = error instanceof Error ? error.message : "Unknown error";
    throw new ConfigError(`Failed to parse ${CONFIG_FILE_NAME}: ${message}`);
  }
}

/**
 * Validate config against schema
 */
export function validateConfig(rawConfig: unknown): Config {
  const result = configSchema.safeParse(rawConfig);
  if (!result.success) {
    const errors = result.error.issues
      .map((e) => `  - ${e.path.join(".") || "(root)"}: ${e.message}`)
      .join("\n");
    throw new ConfigError(`Invalid ${CONFIG_FILE_NAME} configuration:\n${errors}`);
  }
  return result.data;
}

/**
 * Load cachescope.toml.
 * An explicit path must exist; otherwise the file is optional and an empty
 * config is returned when none is found.
 */
export function loadConfig(configPath?: string): LoadConfigResult {
  if (configPath) {
    const absolutePath = path.resolve(configPath);
    if (!fs.existsSync(absolutePath)) {
      throw new ConfigError(`Config file not found: ${configPath}`);
    }
    return { config: validateConfig(parseTomlFile(absolutePath)), configPath: absolutePath };
  }

  const found = findConfigFile();
  if (!found) {
    return { config: {}, configPath: null };
  }
  return { config: validateConfig(parseTomlFile(found)), configPath: found };
}
