import type { Readable, Writable } from "node:stream";
import type { CliOptions } from "./args.js";
import { parseArgs, UsageError, USAGE } from "./args.js";
import type { CtcLatticeConfig } from "./config.js";
import { loadConfig } from "./config.js";
import { createLogger } from "./logger.js";
import { runRemoveCtcBlank } from "./run.js";

export interface MainOptions {
  readonly cwd?: string;
  readonly env?: NodeJS.ProcessEnv;
  readonly stdin?: Readable;
  readonly stdout?: Writable;
  /** Receives log lines (default: console.error) */
  readonly stderr?: (line: string) => void;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/** Run the command line and return the process exit code. */
export async function main(argv: string[], options: MainOptions = {}): Promise<number> {
  const stderr = options.stderr ?? ((line: string) => console.error(line));

  let cli: CliOptions;
  try {
    cli = parseArgs(argv);
  } catch (e) {
    if (!(e instanceof UsageError)) throw e;
    stderr(`${e.message}\n${USAGE}`);
    return 1;
  }
  if (cli.help) {
    console.log(USAGE);
    return 0;
  }

  const overrides: Partial<CtcLatticeConfig> = {
    ...(cli.verbose !== undefined ? { verbose: cli.verbose } : {}),
    ...(cli.skipInvalid !== undefined ? { skipInvalid: cli.skipInvalid } : {}),
  };

  let logger = createLogger({ verbose: false, sink: stderr });
  try {
    const { config, filepath } = loadConfig({ cwd: options.cwd, env: options.env, overrides });
    logger = createLogger({ verbose: config.verbose, sink: stderr });
    if (filepath) logger.debug(`Using config: ${filepath}`);

    await runRemoveCtcBlank({
      blankSymbol: cli.blankSymbol,
      rspecifier: cli.rspecifier,
      wspecifier: cli.wspecifier,
      config,
      logger,
      stdin: options.stdin,
      stdout: options.stdout,
    });
    return 0;
  } catch (e) {
    logger.error(errorMessage(e));
    return 1;
  }
}
