import type { Readable, Writable } from "node:stream";
import type { Fst, LatticeWeight } from "@ctc-lattice/fst";
import {
  CyclicLatticeError,
  NotAcceptorError,
  parseBlankSymbol,
  removeCtcBlank,
} from "@ctc-lattice/ctc";
import { LatticeArchiveWriter, readLatticeArchive, requireTable } from "@ctc-lattice/archive";
import type { CtcLatticeConfig } from "./config.js";
import type { Logger } from "./logger.js";

export interface RunOptions {
  readonly blankSymbol: string;
  readonly rspecifier: string;
  readonly wspecifier: string;
  readonly config: CtcLatticeConfig;
  readonly logger: Logger;
  readonly stdin?: Readable;
  readonly stdout?: Writable;
}

export interface RunSummary {
  /** Lattices transformed and written */
  readonly processed: number;
  /** Lattices dropped by --skip-invalid or a permissive archive */
  readonly skipped: number;
}

/**
 * Read every lattice of `rspecifier`, remove blanks, write the result under
 * the same key to `wspecifier`. Arguments and specifiers are checked before
 * anything is read. The first failing lattice aborts the run unless
 * `config.skipInvalid` is set; lattices written before it are kept.
 */
export async function runRemoveCtcBlank(options: RunOptions): Promise<RunSummary> {
  const { config, logger } = options;
  const blank = parseBlankSymbol(options.blankSymbol);
  requireTable(options.rspecifier, "input");
  requireTable(options.wspecifier, "output");

  let processed = 0;
  let skipped = 0;

  const writer = await LatticeArchiveWriter.open(options.wspecifier, { stdout: options.stdout });
  try {
    const entries = readLatticeArchive(options.rspecifier, {
      stdin: options.stdin,
      onSkip: (e) => {
        skipped++;
        logger.warn(`skipping malformed entry: ${e.message}`);
      },
    });

    for await (const { key, lattice } of entries) {
      let out: Fst<LatticeWeight>;
      try {
        out = removeCtcBlank(lattice, blank, { key });
      } catch (e) {
        if (config.skipInvalid && (e instanceof NotAcceptorError || e instanceof CyclicLatticeError)) {
          skipped++;
          logger.warn(`skipping: ${e.message}`);
          continue;
        }
        throw e;
      }
      await writer.write(key, out);
      processed++;
      logger.debug(`${key}: ${lattice.numStates()} states in, ${out.numStates()} states out`);
    }
  } finally {
    await writer.close();
  }

  logger.info(
    skipped > 0 ? `Done ${processed} lattices, skipped ${skipped}` : `Done ${processed} lattices`
  );
  return { processed, skipped };
}
