/**
 * Configuration
 *
 * Configuration is loaded once, on first read, from (in priority order):
 *
 * 1. Programmatic: config.set() calls (highest priority)
 * 2. Environment variables: PLEDGE_* (for CI overrides)
 * 3. Config files: .pledgerc, .pledgerc.json, .pledgerc.yaml, pledge.config.js, pledge.config.cjs
 * 4. package.json: "pledge" key
 * 5. Defaults (lowest priority)
 *
 * @example
 * ```typescript
 * import { config } from "@pledge/core";
 *
 * config.get("indent");        // → 2
 * config.set({ trace: true, log: "debug" });
 * ```
 *
 * @example .pledgerc.json
 * ```json
 * { "trace": true, "log": "debug", "indent": 4 }
 * ```
 */

import { cosmiconfigSync } from "cosmiconfig";

// ============================================================================
// Types
// ============================================================================

export const LOG_LEVELS = ["silent", "error", "warn", "info", "debug"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface PledgeConfig {
  /** Log failed choice alternatives and failed runs at debug level */
  trace: boolean;
  /** Indent width used when composing nested failure messages */
  indent: number;
  /** Most verbose level printed by the loggers */
  log: LogLevel;
}

const DEFAULTS: PledgeConfig = {
  trace: false,
  indent: 2,
  log: "warn",
};

// ============================================================================
// Global State
// ============================================================================

let fileConfig: Partial<PledgeConfig> | undefined;
let configFilePath: string | undefined;
let overrides: Partial<PledgeConfig> = {};
let resolved: PledgeConfig | undefined;

const MODULE_NAME = "pledge";

// ============================================================================
// Validation
// ============================================================================

function isLogLevel(value: unknown): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * Keep the recognised, well-typed keys of a raw config object. Anything else
 * is reported and dropped.
 */
function normalize(raw: unknown, source: string): Partial<PledgeConfig> {
  const out: Partial<PledgeConfig> = {};
  if (typeof raw !== "object" || raw === null) {
    if (raw !== undefined && raw !== null) {
      console.warn(`[pledge/config] WARN: ignoring ${source}: expected an object`);
    }
    return out;
  }

  for (const [key, value] of Object.entries(raw)) {
    if (key === "trace" && typeof value === "boolean") {
      out.trace = value;
    } else if (key === "indent" && typeof value === "number" && Number.isInteger(value) && value >= 0) {
      out.indent = value;
    } else if (key === "log" && isLogLevel(value)) {
      out.log = value;
    } else {
      console.warn(`[pledge/config] WARN: ignoring ${source} key "${key}": ${JSON.stringify(value)}`);
    }
  }

  return out;
}

// ============================================================================
// Config File Loading (cosmiconfig)
// ============================================================================

function loadConfigFromFiles(): Partial<PledgeConfig> {
  try {
    const explorer = cosmiconfigSync(MODULE_NAME, {
      searchPlaces: [
        "package.json",
        `.${MODULE_NAME}rc`,
        `.${MODULE_NAME}rc.json`,
        `.${MODULE_NAME}rc.yaml`,
        `.${MODULE_NAME}rc.yml`,
        `${MODULE_NAME}.config.js`,
        `${MODULE_NAME}.config.cjs`,
      ],
    });

    const result = explorer.search();
    if (result && !result.isEmpty) {
      configFilePath = result.filepath;
      return normalize(result.config, result.filepath);
    }
  } catch (error) {
    // A broken config file falls back to defaults
    console.warn(`[pledge/config] WARN: failed to load config file: ${String(error)}`);
  }

  return {};
}

// ============================================================================
// Environment Variable Loading
// ============================================================================

/**
 * Load configuration from environment variables.
 *
 * Examples:
 *   PLEDGE_TRACE=1      → { trace: true }
 *   PLEDGE_INDENT=4     → { indent: 4 }
 *   PLEDGE_LOG=debug    → { log: "debug" }
 */
function loadConfigFromEnv(): Partial<PledgeConfig> {
  const envConfig: Record<string, unknown> = {};
  const PREFIX = "PLEDGE_";

  for (const [key, value] of Object.entries(process.env)) {
    if (!key.startsWith(PREFIX) || value === undefined) continue;

    let parsedValue: unknown;
    if (value === "1" || value === "true") {
      parsedValue = true;
    } else if (value === "0" || value === "false" || value === "") {
      parsedValue = false;
    } else if (/^\d+$/.test(value)) {
      parsedValue = parseInt(value, 10);
    } else {
      parsedValue = value;
    }

    envConfig[key.slice(PREFIX.length).toLowerCase()] = parsedValue;
  }

  return normalize(envConfig, "environment");
}

// ============================================================================
// Public API
// ============================================================================

function current(): PledgeConfig {
  if (resolved === undefined) {
    fileConfig ??= loadConfigFromFiles();
    resolved = { ...DEFAULTS, ...fileConfig, ...loadConfigFromEnv(), ...overrides };
  }
  return resolved;
}

/**
 * Read one configuration value.
 */
function get<K extends keyof PledgeConfig>(key: K): PledgeConfig[K] {
  return current()[key];
}

/**
 * Set configuration values programmatically. Merges with earlier calls.
 */
function set(values: Partial<PledgeConfig>): void {
  overrides = { ...overrides, ...normalize(values, "config.set()") };
  resolved = undefined;
}

/**
 * Drop programmatic overrides and reload files and environment on next read.
 */
function reset(): void {
  overrides = {};
  fileConfig = undefined;
  configFilePath = undefined;
  resolved = undefined;
}

/**
 * Path of the config file in use, if one was found.
 */
function getConfigFilePath(): string | undefined {
  current();
  return configFilePath;
}

export const config = {
  get,
  set,
  reset,
  getConfigFilePath,
};
