/**
 * Configuration
 *
 * Loaded from (in priority order):
 *
 * 1. Command-line flags (highest priority)
 * 2. Environment variables: CTC_LATTICE_*
 * 3. Config files: `ctc-lattice` key in package.json, .ctc-latticerc, ctc-lattice.config.js, ...
 * 4. Defaults (lowest priority)
 *
 * @example
 * ```bash
 * CTC_LATTICE_SKIP_INVALID=1 lattice-remove-ctc-blank 1 ark:in.txt ark,t:out.txt
 * ```
 */

import { cosmiconfigSync } from "cosmiconfig";

// ============================================================================
// Types
// ============================================================================

export interface CtcLatticeConfig {
  /** Log per-lattice details */
  readonly verbose: boolean;
  /** Skip lattices that are not acyclic acceptors instead of aborting the run */
  readonly skipInvalid: boolean;
}

export interface LoadedConfig {
  readonly config: CtcLatticeConfig;
  /** Path of the config file that was found, if any */
  readonly filepath: string | undefined;
}

export interface LoadConfigOptions {
  /** Directory to search for config files (default: process.cwd()) */
  readonly cwd?: string;
  /** Environment to read CTC_LATTICE_* variables from (default: process.env) */
  readonly env?: NodeJS.ProcessEnv;
  /** Values that win over every other source, e.g. command-line flags */
  readonly overrides?: Partial<CtcLatticeConfig>;
}

export const DEFAULT_CONFIG: CtcLatticeConfig = {
  verbose: false,
  skipInvalid: false,
};

/** Invalid value in a config file or environment variable. */
export class ConfigError extends Error {
  constructor(
    readonly source: string,
    readonly key: string,
    message: string
  ) {
    super(`${source}: ${key} ${message}`);
    this.name = "ConfigError";
  }
}

const MODULE_NAME = "ctc-lattice";
const ENV_PREFIX = "CTC_LATTICE_";

type ConfigKey = keyof CtcLatticeConfig;

// ============================================================================
// Normalization
// ============================================================================

type MutableConfig = { -readonly [K in ConfigKey]?: CtcLatticeConfig[K] };

function isConfigKey(key: string): key is ConfigKey {
  return Object.hasOwn(DEFAULT_CONFIG, key);
}

/**
 * Check a raw config object key by key. Unknown keys are ignored so that a
 * shared rc file can carry settings for other tools.
 */
function normalize(raw: Record<string, unknown>, source: string): Partial<CtcLatticeConfig> {
  const out: MutableConfig = {};
  for (const [key, value] of Object.entries(raw)) {
    if (!isConfigKey(key) || value === undefined) continue;
    if (typeof value !== "boolean") throw new ConfigError(source, key, "must be a boolean");
    out[key] = value;
  }
  return out;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

// ============================================================================
// Environment Variable Loading
// ============================================================================

/**
 * Load configuration from environment variables.
 *
 * Examples:
 *   CTC_LATTICE_VERBOSE=1               → { verbose: true }
 *   CTC_LATTICE_SKIP_INVALID=false      → { skipInvalid: false }
 */
export function loadConfigFromEnv(env: NodeJS.ProcessEnv = process.env): Partial<CtcLatticeConfig> {
  const raw: Record<string, unknown> = {};

  for (const [name, value] of Object.entries(env)) {
    if (!name.startsWith(ENV_PREFIX) || value === undefined) continue;

    // CTC_LATTICE_SKIP_INVALID -> skipInvalid
    const key = name
      .slice(ENV_PREFIX.length)
      .toLowerCase()
      .replace(/_([a-z])/g, (_, c: string) => c.toUpperCase());

    if (!isConfigKey(key)) continue;

    raw[key] =
      value === "1" || value === "true"
        ? true
        : value === "0" || value === "false" || value === ""
          ? false
          : value;
  }

  return normalize(raw, "environment");
}

// ============================================================================
// Config File Loading
// ============================================================================

/** Find and load the nearest config file starting at `cwd`. */
export function loadConfigFromFiles(cwd: string = process.cwd()): {
  config: Partial<CtcLatticeConfig>;
  filepath: string | undefined;
} {
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
  const result = explorer.search(cwd);
  if (!result || result.isEmpty) return { config: {}, filepath: undefined };

  const raw: unknown = result.config;
  if (!isRecord(raw)) {
    throw new ConfigError(result.filepath, "(root)", "must be an object");
  }
  return { config: normalize(raw, result.filepath), filepath: result.filepath };
}

// ============================================================================
// Public API
// ============================================================================

/** Merge defaults < config file < environment < overrides. */
export function loadConfig(options: LoadConfigOptions = {}): LoadedConfig {
  const file = loadConfigFromFiles(options.cwd);
  const env = loadConfigFromEnv(options.env);
  const overrides = normalize({ ...options.overrides }, "command line");
  return {
    config: { ...DEFAULT_CONFIG, ...file.config, ...env, ...overrides },
    filepath: file.filepath,
  };
}
