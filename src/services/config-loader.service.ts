import * as fs from "fs/promises";
import * as path from "path";

import { SUBTREE_SUFFIXES } from "../constants";
import { ConfigError, ConfigValidationError } from "../errors";
import { getErrorMessage, toError } from "../utils/error-message";

import type { ConfigFile, EnvironmentRecord, RetryConfig, SubtreeFileEntry } from "../types";

const PREFIX_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;
const ENTRY_FIELDS = ["subtree", "dir", "repo", "branch"] as const;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export class ConfigLoaderService {
  async loadConfigFile(configPath: string): Promise<ConfigFile> {
    const absolutePath = path.resolve(configPath);

    let content: string;
    try {
      content = await fs.readFile(absolutePath, "utf8");
    } catch (error) {
      throw new ConfigError(`Config file not found: ${absolutePath}`, "FILE_NOT_FOUND", toError(error));
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch (error) {
      throw new ConfigError(
        `Failed to load config file: ${getErrorMessage(error)}`,
        "FILE_INVALID",
        toError(error),
      );
    }

    const config = this.validateConfigFile(parsed);
    return this.resolvePaths(config, path.dirname(absolutePath));
  }

  private validateConfigFile(config: unknown): ConfigFile {
    if (!isRecord(config)) {
      throw new ConfigValidationError("config", "must be a JSON object");
    }

    const { subtrees, retry } = config;

    if (!isRecord(subtrees)) {
      throw new ConfigValidationError("subtrees", "must be an object keyed by prefix");
    }

    const entries: Record<string, SubtreeFileEntry> = {};

    for (const [prefix, entry] of Object.entries(subtrees)) {
      if (!PREFIX_PATTERN.test(prefix)) {
        throw new ConfigValidationError(`subtrees.${prefix}`, "prefix must be a valid environment variable name");
      }

      if (!isRecord(entry)) {
        throw new ConfigValidationError(`subtrees.${prefix}`, "must be an object");
      }

      const validated: SubtreeFileEntry = {};
      for (const field of ENTRY_FIELDS) {
        const value = entry[field];
        if (value === undefined) {
          continue;
        }
        if (typeof value !== "string" || !value.trim()) {
          throw new ConfigValidationError(`subtrees.${prefix}.${field}`, "must be a non-empty string");
        }
        validated[field] = value;
      }

      entries[prefix] = validated;
    }

    const result: ConfigFile = { subtrees: entries };

    if (retry !== undefined) {
      result.retry = this.validateRetry(retry);
    }

    return result;
  }

  private validateRetry(retry: unknown): RetryConfig {
    if (!isRecord(retry)) {
      throw new ConfigValidationError("retry", "must be an object");
    }

    const result: RetryConfig = {};

    if (retry.maxAttempts !== undefined) {
      throw new ConfigValidationError(
        "retry.maxAttempts",
        "not supported; pass attempts on the command line (clone --attempts, commit <prefix> [attempts])",
      );
    }

    const numericFields = [
      ["initialDelayMs", 0],
      ["maxDelayMs", 0],
      ["jitterMs", 0],
      ["backoffMultiplier", 1],
    ] as const;

    for (const [field, minimum] of numericFields) {
      const value = retry[field];
      if (value === undefined) {
        continue;
      }
      if (typeof value !== "number" || value < minimum) {
        throw new ConfigValidationError(`retry.${field}`, `must be a number >= ${minimum}`);
      }
      result[field] = value;
    }

    return result;
  }

  private resolvePaths(config: ConfigFile, configDir: string): ConfigFile {
    const subtrees: Record<string, SubtreeFileEntry> = {};

    for (const [prefix, entry] of Object.entries(config.subtrees)) {
      subtrees[prefix] = entry.dir ? { ...entry, dir: this.resolvePath(entry.dir, configDir) } : entry;
    }

    return { ...config, subtrees };
  }

  private resolvePath(inputPath: string, baseDir?: string): string {
    if (path.isAbsolute(inputPath)) {
      return inputPath;
    }

    return path.resolve(baseDir || process.cwd(), inputPath);
  }

  /**
   * Flattens config file entries into `{PREFIX}_*` variables.
   */
  toEnvironment(config: ConfigFile): EnvironmentRecord {
    const env: EnvironmentRecord = {};

    for (const [prefix, entry] of Object.entries(config.subtrees)) {
      for (const field of ENTRY_FIELDS) {
        const value = entry[field];
        if (value !== undefined) {
          env[prefix + SUBTREE_SUFFIXES[field]] = value;
        }
      }
    }

    return env;
  }

  /**
   * Layers the process environment over the config file; non-empty environment values win.
   */
  mergeEnvironment(env: EnvironmentRecord, config?: ConfigFile): EnvironmentRecord {
    if (!config) {
      return { ...env };
    }

    const merged = this.toEnvironment(config);
    for (const [key, value] of Object.entries(env)) {
      if (value) {
        merged[key] = value;
      }
    }
    return merged;
  }
}
