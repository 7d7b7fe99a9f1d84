import { PROGRAM_NAME } from "./logger.js";

export interface CliOptions {
  readonly help: boolean;
  readonly blankSymbol: string;
  readonly rspecifier: string;
  readonly wspecifier: string;
  /** Flags given on the command line; unset flags fall back to config */
  readonly verbose?: boolean;
  readonly skipInvalid?: boolean;
}

/** Bad command line; the caller prints usage and exits 1. */
export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

export const USAGE = `
Remove CTC blank symbols from the output labels of lattices.

USAGE:
  ${PROGRAM_NAME} [options] <blank-symbol> <lat-rspecifier> <lat-wspecifier>

OPTIONS:
  -v, --verbose            Log per-lattice details
  --skip-invalid           Skip lattices that are not acyclic acceptors
                           instead of aborting the run
  -h, --help               Show this help message

EXAMPLES:
  ${PROGRAM_NAME} 32 ark:input.ark ark,t:output.ark
  ${PROGRAM_NAME} 1 ark:- ark,t:-
`;

/** Parse `process.argv.slice(2)`. */
export function parseArgs(args: string[]): CliOptions {
  const positionals: string[] = [];
  let help = false;
  let verbose: boolean | undefined;
  let skipInvalid: boolean | undefined;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    if (arg === "--help" || arg === "-h") {
      help = true;
    } else if (arg === "--verbose" || arg === "-v") {
      verbose = true;
    } else if (arg === "--skip-invalid") {
      skipInvalid = true;
    } else if (arg === "--") {
      positionals.push(...args.slice(i + 1));
      break;
    } else if (arg.startsWith("-") && arg !== "-") {
      throw new UsageError(`Unknown option: ${arg}`);
    } else {
      positionals.push(arg);
    }
  }

  if (help) {
    return { help, blankSymbol: "", rspecifier: "", wspecifier: "" };
  }
  if (positionals.length !== 3) {
    throw new UsageError(`Expected 3 arguments, got ${positionals.length}`);
  }

  const [blankSymbol, rspecifier, wspecifier] = positionals;
  return { help, blankSymbol, rspecifier, wspecifier, verbose, skipInvalid };
}
