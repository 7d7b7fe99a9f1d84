/**
 * @ctc-lattice/cli: the `lattice-remove-ctc-blank` command.
 *
 * @packageDocumentation
 */

export type { CliOptions } from "./args.js";
export { parseArgs, UsageError, USAGE } from "./args.js";

export type { CtcLatticeConfig, LoadedConfig, LoadConfigOptions } from "./config.js";
export {
  loadConfig,
  loadConfigFromEnv,
  loadConfigFromFiles,
  ConfigError,
  DEFAULT_CONFIG,
} from "./config.js";

export type { Logger, LoggerOptions } from "./logger.js";
export { createLogger, PROGRAM_NAME } from "./logger.js";

export type { RunOptions, RunSummary } from "./run.js";
export { runRemoveCtcBlank } from "./run.js";

export type { MainOptions } from "./main.js";
export { main } from "./main.js";
