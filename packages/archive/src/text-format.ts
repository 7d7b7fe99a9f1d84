/**
 * Text archive format
 *
 * One entry per lattice, terminated by an empty line:
 *
 * ```
 * utt-1
 * 0	1	5	5	0.5,1.25
 * 1	2	3	3	0.25,1.5
 * 2	0,0.5
 *
 * ```
 *
 * Arc lines are `src dst ilabel olabel [weight]`, final lines are
 * `state [weight]`, separated by tabs or spaces. A missing weight is `one`.
 * The first state mentioned is the start state; a key followed directly by an
 * empty line is the empty lattice. Weights are `graph,acoustic` cost pairs
 * and are kept as pairs, so a lattice reads back exactly as it was written.
 */

import type { Fst, LatticeWeight, StateId } from "@ctc-lattice/fst";
import { NO_STATE, VectorFst, latticeSemiring } from "@ctc-lattice/fst";
import { ArchiveFormatError } from "./errors.js";

export interface LatticeEntry {
  readonly key: string;
  readonly lattice: VectorFst<LatticeWeight>;
}

export interface TextParseOptions {
  /** Skip malformed entries instead of throwing. */
  readonly permissive?: boolean;
  /** Called with the error for every entry skipped in permissive mode. */
  readonly onSkip?: (error: ArchiveFormatError) => void;
}

/** How far past the highest state seen so far a state id may jump. */
export const MAX_STATE_GAP = 4096;

const INTEGER = /^\d+$/;

/** Incremental parser: feed lines with `push`, then call `end`. */
export class LatticeTextParser {
  private lineNo = 0;
  private key: string | undefined;
  private fst: VectorFst<LatticeWeight> | undefined;
  private skipping = false;

  constructor(private readonly options: TextParseOptions = {}) {}

  /** Consume one line; returns the entry it completes, if any. */
  push(line: string): LatticeEntry | undefined {
    this.lineNo++;
    const text = line.trim();
    if (this.skipping) {
      if (text === "") this.skipping = false;
      return undefined;
    }
    try {
      return this.consume(text);
    } catch (e) {
      if (!(e instanceof ArchiveFormatError) || !this.options.permissive) throw e;
      this.options.onSkip?.(e);
      this.key = undefined;
      this.fst = undefined;
      this.skipping = text !== "";
      return undefined;
    }
  }

  /** Flush the entry still open at end of input, if any. */
  end(): LatticeEntry | undefined {
    if (this.skipping || this.key === undefined) return undefined;
    return this.finish();
  }

  private consume(text: string): LatticeEntry | undefined {
    if (this.key === undefined) {
      if (text === "") return undefined;
      const fields = text.split(/\s+/);
      if (fields.length !== 1) {
        throw this.error(`expected a lattice key on its own line, got "${text}"`);
      }
      this.key = fields[0];
      this.fst = VectorFst.lattice();
      return undefined;
    }
    if (text === "") return this.finish();

    const fst = this.current();
    const fields = text.split(/\s+/);
    switch (fields.length) {
      case 1:
      case 2: {
        const state = this.state(fst, fields[0]);
        fst.setFinal(state, fields.length === 2 ? this.weight(fields[1]) : latticeSemiring.one());
        return undefined;
      }
      case 4:
      case 5: {
        const src = this.state(fst, fields[0]);
        const nextstate = this.state(fst, fields[1]);
        fst.addArc(src, {
          ilabel: this.label(fields[2]),
          olabel: this.label(fields[3]),
          weight: fields.length === 5 ? this.weight(fields[4]) : latticeSemiring.one(),
          nextstate,
        });
        return undefined;
      }
      default:
        throw this.error(
          `expected "src dst ilabel olabel [weight]" or "state [weight]", got ${fields.length} fields`
        );
    }
  }

  private current(): VectorFst<LatticeWeight> {
    if (!this.fst) throw this.error("line outside of a lattice entry");
    return this.fst;
  }

  private finish(): LatticeEntry {
    const entry = { key: this.key ?? "", lattice: this.current() };
    this.key = undefined;
    this.fst = undefined;
    return entry;
  }

  private state(fst: VectorFst<LatticeWeight>, field: string): StateId {
    if (!INTEGER.test(field)) throw this.error(`invalid state "${field}"`);
    const id = Number(field);
    if (id >= fst.numStates() + MAX_STATE_GAP) {
      throw this.error(`state ${field} is too far beyond the highest state so far (${fst.numStates() - 1})`);
    }
    while (fst.numStates() <= id) fst.addState();
    if (fst.start() === NO_STATE) fst.setStart(id);
    return id;
  }

  private label(field: string): number {
    if (!INTEGER.test(field)) throw this.error(`invalid label "${field}"`);
    return Number(field);
  }

  private weight(field: string): LatticeWeight {
    const w = latticeSemiring.parse(field);
    if (w !== undefined) return w;
    if (field.split(",").length > 2) {
      throw this.error(`compact lattice weight "${field}" is not supported`);
    }
    throw this.error(`invalid weight "${field}" (expected "graph,acoustic")`);
  }

  private error(detail: string): ArchiveFormatError {
    return new ArchiveFormatError(this.lineNo, this.key, detail);
  }
}

/** Parse a whole text archive held in memory. */
export function parseLatticeArchive(text: string, options: TextParseOptions = {}): LatticeEntry[] {
  const parser = new LatticeTextParser(options);
  const entries: LatticeEntry[] = [];
  for (const line of text.split(/\r?\n/)) {
    const entry = parser.push(line);
    if (entry) entries.push(entry);
  }
  const last = parser.end();
  if (last) entries.push(last);
  return entries;
}

/**
 * Write one entry: the key, then each state's arcs followed by its final
 * line (start state first, the rest in ascending order), then an empty line.
 * Weights equal to `one` are omitted.
 */
export function formatLattice<W>(key: string, fst: Fst<W>): string {
  if (!/^\S+$/.test(key)) {
    throw new RangeError(`Invalid table key "${key}": keys must be non-empty and contain no whitespace`);
  }
  const { semiring } = fst;
  const one = semiring.one();
  const withWeight = (fields: Array<string | number>, w: W) =>
    (semiring.equals(w, one) ? fields : [...fields, semiring.format(w)]).join("\t");

  const lines = [key];
  const start = fst.start();
  const order = start === NO_STATE ? [] : [start, ...[...fst.states()].filter((s) => s !== start)];
  for (const s of order) {
    for (const a of fst.arcs(s)) {
      lines.push(withWeight([s, a.nextstate, a.ilabel, a.olabel], a.weight));
    }
    if (fst.isFinal(s)) lines.push(withWeight([s], fst.final(s)));
  }
  lines.push("");
  return lines.join("\n") + "\n";
}
