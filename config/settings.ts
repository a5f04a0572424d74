import fs from "node:fs";
import { parse as parseYaml } from "yaml";
import { logger } from "./logger.js";
import { getConfigFilePath, getDatabasePath, getDefaultPluginDir } from "./paths.js";

export interface HostConfig {
  readonly pluginDir: string;
  readonly databasePath: string;
  /** 0 means no limit on parallel invocations across plugins. */
  readonly maxConcurrentInvocations: number;
  readonly debugLogLimit: number;
  /** 0 disables the per-invocation timeout. */
  readonly invocationTimeoutMs: number;
  readonly shell: string;
  readonly persistDebugEvents: boolean;
}

const DEFAULT_DEBUG_LOG_LIMIT = 50;
const DEFAULT_SHELL = "/bin/sh";

export function defaultHostConfig(env: NodeJS.ProcessEnv = process.env): HostConfig {
  return {
    pluginDir: getDefaultPluginDir(),
    databasePath: getDatabasePath(),
    maxConcurrentInvocations: 0,
    debugLogLimit: DEFAULT_DEBUG_LOG_LIMIT,
    invocationTimeoutMs: 0,
    shell: env.SHELL ?? DEFAULT_SHELL,
    persistDebugEvents: false,
  };
}

export function loadHostConfig(
  env: NodeJS.ProcessEnv = process.env,
  configPath: string = getConfigFilePath(),
): HostConfig {
  const fileConfig = readConfigFile(configPath);
  const merged: Record<string, unknown> = { ...fileConfig };

  if (env.CADENCE_PLUGIN_DIR !== undefined) merged["plugin_dir"] = env.CADENCE_PLUGIN_DIR;
  if (env.CADENCE_DATABASE_PATH !== undefined) merged["database_path"] = env.CADENCE_DATABASE_PATH;
  if (env.CADENCE_MAX_CONCURRENT !== undefined) merged["max_concurrent_invocations"] = env.CADENCE_MAX_CONCURRENT;
  if (env.CADENCE_DEBUG_LOG_LIMIT !== undefined) merged["debug_log_limit"] = env.CADENCE_DEBUG_LOG_LIMIT;
  if (env.CADENCE_INVOCATION_TIMEOUT_MS !== undefined) {
    merged["invocation_timeout_ms"] = env.CADENCE_INVOCATION_TIMEOUT_MS;
  }
  if (env.CADENCE_SHELL !== undefined) merged["shell"] = env.CADENCE_SHELL;
  if (env.CADENCE_PERSIST_DEBUG_EVENTS !== undefined) {
    merged["persist_debug_events"] = env.CADENCE_PERSIST_DEBUG_EVENTS;
  }

  return validateHostConfig(merged, env);
}

function readConfigFile(configPath: string): Record<string, unknown> {
  if (!fs.existsSync(configPath)) {
    return {};
  }

  const raw = fs.readFileSync(configPath, "utf-8");
  const parsed: unknown = parseYaml(raw);

  if (parsed === null || parsed === undefined) {
    return {};
  }
  if (!isRecord(parsed)) {
    throw new ConfigValidationError(`Config file ${configPath} must contain a mapping`);
  }

  logger.info({ configPath }, "Config file loaded");
  return parsed;
}

export function validateHostConfig(
  raw: Record<string, unknown>,
  env: NodeJS.ProcessEnv = process.env,
): HostConfig {
  const defaults = defaultHostConfig(env);

  return {
    pluginDir: validateOptionalString(raw["plugin_dir"] ?? raw["pluginDir"], "plugin_dir") ?? defaults.pluginDir,
    databasePath:
      validateOptionalString(raw["database_path"] ?? raw["databasePath"], "database_path") ?? defaults.databasePath,
    maxConcurrentInvocations:
      validateNonNegativeInteger(
        raw["max_concurrent_invocations"] ?? raw["maxConcurrentInvocations"],
        "max_concurrent_invocations",
      ) ?? defaults.maxConcurrentInvocations,
    debugLogLimit: validatePositiveInteger(raw["debug_log_limit"] ?? raw["debugLogLimit"], "debug_log_limit")
      ?? defaults.debugLogLimit,
    invocationTimeoutMs:
      validateNonNegativeInteger(raw["invocation_timeout_ms"] ?? raw["invocationTimeoutMs"], "invocation_timeout_ms")
      ?? defaults.invocationTimeoutMs,
    shell: validateOptionalString(raw["shell"], "shell") ?? defaults.shell,
    persistDebugEvents:
      validateOptionalBoolean(raw["persist_debug_events"] ?? raw["persistDebugEvents"], "persist_debug_events")
      ?? defaults.persistDebugEvents,
  };
}

function validateOptionalString(value: unknown, field: string): string | undefined {
  if (value === undefined || value === null) return undefined;
  if (typeof value !== "string" || value.trim().length === 0) {
    throw new ConfigValidationError(`${field} must be a non-empty string. Got: "${String(value)}"`);
  }
  return value.trim();
}

function toNumber(value: unknown): number | undefined {
  if (typeof value === "number") return value;
  if (typeof value === "string" && value.trim().length > 0) return Number(value);
  return undefined;
}

function validateNonNegativeInteger(value: unknown, field: string): number | undefined {
  if (value === undefined || value === null) return undefined;
  const num = toNumber(value);
  if (num === undefined || !Number.isInteger(num) || num < 0) {
    throw new ConfigValidationError(`${field} must be a non-negative integer. Got: "${String(value)}"`);
  }
  return num;
}

function validatePositiveInteger(value: unknown, field: string): number | undefined {
  const num = validateNonNegativeInteger(value, field);
  if (num === 0) {
    throw new ConfigValidationError(`${field} must be greater than zero`);
  }
  return num;
}

function validateOptionalBoolean(value: unknown, field: string): boolean | undefined {
  if (value === undefined || value === null) return undefined;
  if (typeof value === "boolean") return value;
  if (value === "true" || value === "1") return true;
  if (value === "false" || value === "0") return false;
  throw new ConfigValidationError(`${field} must be a boolean. Got: "${String(value)}"`);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export class ConfigValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigValidationError";
  }
}
