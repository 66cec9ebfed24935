/**
 * Configuration
 *
 * Configuration is loaded from (in priority order):
 *
 * 1. Programmatic: config.set() calls (highest priority)
 * 2. Environment variables: OPTIKIT_*
 * 3. Config files: optikit.config.js, .optikitrc, .optikitrc.json, etc.
 * 4. package.json: "optikit" key
 * 5. Defaults (lowest priority)
 *
 * @example
 * ```typescript
 * import { config } from "@optikit/optics";
 *
 * config.get("laws.iterations");        // → 100
 * config.get("nexus.staleAccessors");   // → "reject"
 * config.set({ nexus: { staleAccessors: "warn" } });
 * ```
 *
 * @example Environment variables
 * ```bash
 * OPTIKIT_DEBUG=1
 * OPTIKIT_LAWS_ITERATIONS=500
 * OPTIKIT_NEXUS__STALEACCESSORS=warn
 * ```
 */

import { cosmiconfigSync } from "cosmiconfig";

// ============================================================================
// Types
// ============================================================================

/**
 * What happens when a dynamic-nexus Lens is applied to a value whose
 * collection size differs from the one it was derived from.
 */
export type StaleAccessorPolicy = "reject" | "warn";

export interface OptikitConfig {
  /** Enable debug logging */
  debug: boolean;
  laws: {
    /** Generated inputs per law in checkLaws */
    iterations: number;
  };
  nexus: {
    staleAccessors: StaleAccessorPolicy;
  };
}

/**
 * Partial configuration accepted from files, env and config.set().
 */
export interface OptikitConfigInput {
  debug?: boolean;
  laws?: Partial<OptikitConfig["laws"]>;
  nexus?: Partial<OptikitConfig["nexus"]>;
}

const DEFAULTS: OptikitConfig = {
  debug: false,
  laws: { iterations: 100 },
  nexus: { staleAccessors: "reject" },
};

// ============================================================================
// Global State
// ============================================================================

let fileAndEnv: OptikitConfig | undefined;
let overrides: OptikitConfigInput = {};
let configFilePath: string | undefined;

// ============================================================================
// Config File Loading (cosmiconfig)
// ============================================================================

const MODULE_NAME = "optikit";

function loadConfigFromFiles(searchFrom?: string): OptikitConfigInput {
  try {
    const explorer = cosmiconfigSync(MODULE_NAME, {
      searchPlaces: [
        "package.json",
        `.${MODULE_NAME}rc`,
        `.${MODULE_NAME}rc.json`,
        `.${MODULE_NAME}rc.yaml`,
        `.${MODULE_NAME}rc.yml`,
        `.${MODULE_NAME}rc.js`,
        `.${MODULE_NAME}rc.cjs`,
        `${MODULE_NAME}.config.js`,
        `${MODULE_NAME}.config.cjs`,
      ],
    });

    const result = explorer.search(searchFrom);
    if (result && !result.isEmpty) {
      configFilePath = result.filepath;
      return parseConfig(result.config);
    }
  } catch (error) {
    // A broken config file falls back to defaults
    console.warn(`[${MODULE_NAME}] Failed to load config file:`, error);
  }

  return {};
}

// ============================================================================
// Environment Variable Loading
// ============================================================================

/**
 * Variables prefixed with OPTIKIT_ are parsed into the config object.
 *
 *   OPTIKIT_DEBUG=1                        → { debug: true }
 *   OPTIKIT_LAWS_ITERATIONS=500            → { laws: { iterations: 500 } }
 *   OPTIKIT_NEXUS__STALEACCESSORS=warn     → { nexus: { staleAccessors: "warn" } }
 */
function loadConfigFromEnv(env: NodeJS.ProcessEnv): OptikitConfigInput {
  const raw: Record<string, unknown> = {};
  const PREFIX = "OPTIKIT_";

  for (const [key, value] of Object.entries(env)) {
    if (!key.startsWith(PREFIX) || value === undefined) continue;

    const configPath = key
      .slice(PREFIX.length)
      .toLowerCase()
      .replace(/__/g, ".")
      .replace(/_/g, ".");

    let parsedValue: unknown;
    if (/^\d+$/.test(value)) {
      parsedValue = parseInt(value, 10);
    } else if (value === "true") {
      parsedValue = true;
    } else if (value === "false" || value === "") {
      parsedValue = false;
    } else {
      parsedValue = value;
    }

    setNestedValue(raw, configPath, parsedValue);
  }

  return parseConfig(raw);
}

// ============================================================================
// Utility Functions
// ============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function setNestedValue(
  obj: Record<string, unknown>,
  path: string,
  value: unknown,
): void {
  const parts = path.split(".");
  let current = obj;

  for (const part of parts.slice(0, -1)) {
    const next = current[part];
    if (isRecord(next)) {
      current = next;
    } else {
      const created: Record<string, unknown> = {};
      current[part] = created;
      current = created;
    }
  }

  current[parts[parts.length - 1]] = value;
}

function getNestedValue(obj: unknown, path: string): unknown {
  let current = obj;
  for (const part of path.split(".")) {
    if (!isRecord(current)) return undefined;
    current = current[part];
  }
  return current;
}

/**
 * Keep only the known keys with values of the right type.
 * `debug` also takes 1 and 0, since env values are parsed before their key is known.
 * Env keys are lowercased, so nested keys are matched case-insensitively.
 */
function parseConfig(raw: unknown): OptikitConfigInput {
  if (!isRecord(raw)) return {};
  const input: OptikitConfigInput = {};

  if (typeof raw.debug === "boolean") {
    input.debug = raw.debug;
  } else if (raw.debug === 1 || raw.debug === 0) {
    input.debug = raw.debug === 1;
  }

  const laws = raw.laws;
  if (isRecord(laws) && typeof laws.iterations === "number") {
    input.laws = { iterations: laws.iterations };
  }

  const nexus = raw.nexus;
  if (isRecord(nexus)) {
    const policy = nexus.staleAccessors ?? nexus.staleaccessors;
    if (policy === "reject" || policy === "warn") {
      input.nexus = { staleAccessors: policy };
    }
  }

  return input;
}

function merge(base: OptikitConfig, input: OptikitConfigInput): OptikitConfig {
  return {
    debug: input.debug ?? base.debug,
    laws: { ...base.laws, ...input.laws },
    nexus: { ...base.nexus, ...input.nexus },
  };
}

// ============================================================================
// Config Initialization
// ============================================================================

/**
 * Load configuration from files and environment.
 * Called lazily on first read; call again to pick up changes.
 */
export function loadConfig(
  options: { searchFrom?: string; env?: NodeJS.ProcessEnv } = {},
): OptikitConfig {
  const fileConfig = loadConfigFromFiles(options.searchFrom);
  const envConfig = loadConfigFromEnv(options.env ?? process.env);
  fileAndEnv = merge(merge(DEFAULTS, fileConfig), envConfig);
  return resolve();
}

function resolve(): OptikitConfig {
  const base = fileAndEnv ?? loadConfig();
  return merge(base, overrides);
}

// ============================================================================
// Public API
// ============================================================================

/**
 * Get a configuration value by dot-notation path.
 *
 * @example
 * config.get("nexus.staleAccessors") // → "reject"
 */
function get(path: "debug"): boolean;
function get(path: "laws.iterations"): number;
function get(path: "nexus.staleAccessors"): StaleAccessorPolicy;
function get(path: string): unknown;
function get(path: string): unknown {
  return getNestedValue(resolve(), path);
}

/**
 * Set configuration values programmatically.
 * Merges with values set earlier.
 */
function set(values: OptikitConfigInput): void {
  overrides = {
    debug: values.debug ?? overrides.debug,
    laws: { ...overrides.laws, ...values.laws },
    nexus: { ...overrides.nexus, ...values.nexus },
  };
}

/**
 * Drop programmatic overrides and cached file/env values.
 */
function reset(): void {
  overrides = {};
  fileAndEnv = undefined;
  configFilePath = undefined;
}

/**
 * Path of the config file in use, if one was found.
 */
function getConfigFilePath(): string | undefined {
  resolve();
  return configFilePath;
}

export const config = {
  get,
  set,
  reset,
  load: loadConfig,
  getConfigFilePath,
};
