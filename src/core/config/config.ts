// src/core/config/config.ts
// Configuration system for dispatchkit registries

import * as fs from "fs";
import * as path from "path";
import { type LogLevel, isLogLevel } from "../log/logger";

// =========================================================================
// Configuration Types
// =========================================================================

export type ShadowPolicy = "warn" | "error";

export type DispatchConfig = {
  /** What happens when a generic replaces an incompatible one of another origin */
  shadowPolicy: ShadowPolicy;
  /** Install the built-in generics (show, length, sequence) into new registries */
  installBuiltins: boolean;
  /** Check method parameter counts against the generic's formal shape */
  checkArity: boolean;
};

export type LogConfig = {
  /** Minimum level forwarded to the log sink */
  level: LogLevel;
  /** Maximum number of events kept in a registry's ledger */
  eventLogLimit: number;
};

export type ModelConfig = {
  dispatch: DispatchConfig;
  log: LogConfig;
};

export type ConfigOverrides = {
  dispatch?: Partial<DispatchConfig>;
  log?: Partial<LogConfig>;
};

// =========================================================================
// Default Configuration
// =========================================================================

export const DEFAULT_DISPATCH_CONFIG: DispatchConfig = {
  shadowPolicy: "warn",
  installBuiltins: true,
  checkArity: true,
};

export const DEFAULT_LOG_CONFIG: LogConfig = {
  level: "warn",
  eventLogLimit: 1000,
};

export const DEFAULT_CONFIG: ModelConfig = {
  dispatch: DEFAULT_DISPATCH_CONFIG,
  log: DEFAULT_LOG_CONFIG,
};

export const DEFAULT_CONFIG_FILES = ["dispatchkit.config.json"];

// =========================================================================
// Value Parsing
// =========================================================================

function isShadowPolicy(value: unknown): value is ShadowPolicy {
  return value === "warn" || value === "error";
}

function parseBool(raw: string | undefined): boolean | undefined {
  if (raw === undefined) return undefined;
  const v = raw.trim().toLowerCase();
  if (v === "true" || v === "1" || v === "yes") return true;
  if (v === "false" || v === "0" || v === "no") return false;
  return undefined;
}

function parsePositiveInt(raw: string | undefined): number | undefined {
  const n = parseInt(raw ?? "", 10);
  return Number.isFinite(n) && n > 0 ? n : undefined;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** First key present with a value accepted by `guard` */
function pick<T>(data: Record<string, unknown>, keys: string[], guard: (v: unknown) => v is T): T | undefined {
  for (const key of keys) {
    const v = data[key];
    if (guard(v)) return v;
  }
  return undefined;
}

const isBoolean = (v: unknown): v is boolean => typeof v === "boolean";
const isPositiveNumber = (v: unknown): v is number => typeof v === "number" && Number.isInteger(v) && v > 0;

// =========================================================================
// Configuration Loading
// =========================================================================

/**
 * Load configuration from environment variables.
 */
export function configFromEnv(prefix = "DISPATCHKIT"): ModelConfig {
  const env = process.env;
  const policy = env[`${prefix}_SHADOW_POLICY`];
  const level = env[`${prefix}_LOG_LEVEL`];

  return {
    dispatch: {
      shadowPolicy: isShadowPolicy(policy) ? policy : DEFAULT_DISPATCH_CONFIG.shadowPolicy,
      installBuiltins: parseBool(env[`${prefix}_INSTALL_BUILTINS`]) ?? DEFAULT_DISPATCH_CONFIG.installBuiltins,
      checkArity: parseBool(env[`${prefix}_CHECK_ARITY`]) ?? DEFAULT_DISPATCH_CONFIG.checkArity,
    },
    log: {
      level: isLogLevel(level) ? level : DEFAULT_LOG_CONFIG.level,
      eventLogLimit: parsePositiveInt(env[`${prefix}_EVENT_LOG_LIMIT`]) ?? DEFAULT_LOG_CONFIG.eventLogLimit,
    },
  };
}

/**
 * Load configuration from a JSON file.
 */
export function configFromFile(filePath: string): ModelConfig {
  if (!fs.existsSync(filePath)) {
    throw new Error(`Config file not found: ${filePath}`);
  }

  const ext = path.extname(filePath).toLowerCase();
  if (ext !== ".json") {
    throw new Error(`Unsupported config file format: ${ext}`);
  }

  const data: unknown = JSON.parse(fs.readFileSync(filePath, "utf8"));
  if (!isRecord(data)) {
    throw new Error(`Config file must contain a JSON object: ${filePath}`);
  }
  return configFromObject(data);
}

/**
 * Create configuration from a plain object. Accepts camelCase and snake_case keys.
 */
export function configFromObject(data: Record<string, unknown>): ModelConfig {
  const dispatchData = isRecord(data.dispatch) ? data.dispatch : {};
  const logData = isRecord(data.log) ? data.log : {};

  return {
    dispatch: {
      shadowPolicy: pick(dispatchData, ["shadowPolicy", "shadow_policy"], isShadowPolicy) ?? DEFAULT_DISPATCH_CONFIG.shadowPolicy,
      installBuiltins: pick(dispatchData, ["installBuiltins", "install_builtins"], isBoolean) ?? DEFAULT_DISPATCH_CONFIG.installBuiltins,
      checkArity: pick(dispatchData, ["checkArity", "check_arity"], isBoolean) ?? DEFAULT_DISPATCH_CONFIG.checkArity,
    },
    log: {
      level: pick(logData, ["level"], isLogLevel) ?? DEFAULT_LOG_CONFIG.level,
      eventLogLimit: pick(logData, ["eventLogLimit", "event_log_limit"], isPositiveNumber) ?? DEFAULT_LOG_CONFIG.eventLogLimit,
    },
  };
}

/**
 * Merge configs with later ones overriding earlier ones.
 */
export function mergeConfigs(...configs: ConfigOverrides[]): ModelConfig {
  let result: ModelConfig = { dispatch: { ...DEFAULT_DISPATCH_CONFIG }, log: { ...DEFAULT_LOG_CONFIG } };

  for (const cfg of configs) {
    result = {
      dispatch: { ...result.dispatch, ...cfg.dispatch },
      log: { ...result.log, ...cfg.log },
    };
  }

  return result;
}

/**
 * Auto-detect and load configuration.
 * Priority: overrides > config file > environment > defaults
 */
export function loadConfig(options?: {
  configFile?: string;
  overrides?: ConfigOverrides;
  envPrefix?: string;
}): ModelConfig {
  let config = configFromEnv(options?.envPrefix);

  if (options?.configFile) {
    config = mergeConfigs(config, configFromFile(options.configFile));
  } else {
    for (const p of DEFAULT_CONFIG_FILES) {
      if (fs.existsSync(p)) {
        config = mergeConfigs(config, configFromFile(p));
        break;
      }
    }
  }

  if (options?.overrides) {
    config = mergeConfigs(config, options.overrides);
  }

  return config;
}

// =========================================================================
// Config Validation
// =========================================================================

export type ConfigValidation = {
  valid: boolean;
  errors: string[];
  warnings: string[];
};

export function validateConfig(config: ModelConfig): ConfigValidation {
  const errors: string[] = [];
  const warnings: string[] = [];

  if (!isShadowPolicy(config.dispatch.shadowPolicy)) {
    errors.push(`shadowPolicy must be "warn" or "error", got ${String(config.dispatch.shadowPolicy)}`);
  }
  if (!isLogLevel(config.log.level)) {
    errors.push(`log level is not recognised: ${String(config.log.level)}`);
  }
  if (!Number.isInteger(config.log.eventLogLimit) || config.log.eventLogLimit < 1) {
    errors.push("eventLogLimit must be a positive integer");
  }

  if (!config.dispatch.checkArity) {
    warnings.push("checkArity is off: extra dispatch arguments reach methods unchecked");
  }
  if (config.dispatch.shadowPolicy === "warn" && config.log.level === "silent") {
    warnings.push("shadowed generics will only be visible through getWarnings() with logging silenced");
  }

  return {
    valid: errors.length === 0,
    errors,
    warnings,
  };
}
