import { describe, it, expect } from "vitest";
import { VectorFst, arc, NO_STATE, enumeratePaths } from "@ctc-lattice/fst";
import { LatticeError } from "@ctc-lattice/ctc";
import {
  parseLatticeArchive,
  formatLattice,
  ArchiveFormatError,
  MAX_STATE_GAP,
} from "../index.js";

const ARCHIVE = [
  "utt-1",
  "0\t1\t5\t5\t0.5,0",
  "1\t2\t3\t3\t0.25,1.5",
  "2",
  "",
  "utt-2 ",
  "",
  "utt-3",
  "0 1 4 4",
  "1 0.75,0.25",
].join("\n");

// ---------------------------------------------------------------------------
// Parsing
// ---------------------------------------------------------------------------

describe("parseLatticeArchive", () => {
  it("reads keyed entries", () => {
    const entries = parseLatticeArchive(ARCHIVE);
    expect(entries.map((e) => e.key)).toEqual(["utt-1", "utt-2", "utt-3"]);

    const [first, second, third] = entries;
    expect(first.lattice.numStates()).toBe(3);
    expect(first.lattice.start()).toBe(0);
    expect(enumeratePaths(first.lattice)).toEqual([
      { ilabels: [5, 3], olabels: [5, 3], weight: [0.75, 1.5] },
    ]);

    expect(second.lattice.numStates()).toBe(0);
    expect(second.lattice.start()).toBe(NO_STATE);

    expect(third.lattice.arcs(0)).toEqual([{ ilabel: 4, olabel: 4, weight: [0, 0], nextstate: 1 }]);
    expect(third.lattice.final(1)).toEqual([0.75, 0.25]);
  });

  it("keeps graph and acoustic costs apart", () => {
    const text = "k\n0\t1\t3\t3\t1.5,2.25\n1\t0.5,0.25\n\n";
    const [entry] = parseLatticeArchive(text);
    expect(entry.lattice.arcs(0)[0].weight).toEqual([1.5, 2.25]);
    expect(entry.lattice.final(1)).toEqual([0.5, 0.25]);
    expect(formatLattice(entry.key, entry.lattice)).toBe(text);
  });

  it("starts at the first state mentioned", () => {
    const [entry] = parseLatticeArchive("k\n3 1 2 2\n1\n\n");
    expect(entry.lattice.numStates()).toBe(4);
    expect(entry.lattice.start()).toBe(3);
  });

  it("reports malformed lines with their position", () => {
    expect(() => parseLatticeArchive("k\n0 1 2\n")).toThrow(
      "Archive line 2 (lattice k): expected \"src dst ilabel olabel [weight]\" or \"state [weight]\", got 3 fields"
    );
    expect(() => parseLatticeArchive("k\n0 1 a 2\n")).toThrow('invalid label "a"');
    expect(() => parseLatticeArchive("k\n0 1 2 2 x\n")).toThrow('invalid weight "x"');
    expect(() => parseLatticeArchive("k\n0 1 2 2 0.5\n")).toThrow(
      'Archive line 2 (lattice k): invalid weight "0.5" (expected "graph,acoustic")'
    );
    expect(() => parseLatticeArchive("k\n0 1 2 2 1,2,3\n")).toThrow(/compact lattice weight/);
    expect(() => parseLatticeArchive("a b\n")).toThrow(
      'Archive line 1: expected a lattice key on its own line, got "a b"'
    );
    expect(() => parseLatticeArchive("k\n-1 2\n")).toThrow(ArchiveFormatError);
  });

  it("tags format errors with their own code", () => {
    const error = new ArchiveFormatError(3, "k", "bad");
    expect(error).toBeInstanceOf(LatticeError);
    expect(error.code).toBe("archive_format");
    expect(error.message).toBe("Archive line 3 (lattice k): bad");
  });

  it("rejects state ids far beyond the states seen so far", () => {
    expect(() => parseLatticeArchive("k\n0 99999999999 1 1\n")).toThrow(
      "Archive line 2 (lattice k): state 99999999999 is too far beyond the highest state so far (0)"
    );
    const [entry] = parseLatticeArchive(`k\n0 ${MAX_STATE_GAP} 1 1\n${MAX_STATE_GAP}\n\n`);
    expect(entry.lattice.numStates()).toBe(MAX_STATE_GAP + 1);
  });

  it("skips malformed entries in permissive mode", () => {
    const skipped: ArchiveFormatError[] = [];
    const entries = parseLatticeArchive("bad\n0 1 x 1\n0\n\ngood\n0 1 2 2\n1\n\n", {
      permissive: true,
      onSkip: (e) => skipped.push(e),
    });
    expect(entries.map((e) => e.key)).toEqual(["good"]);
    expect(skipped).toHaveLength(1);
    expect(skipped[0].line).toBe(2);
    expect(skipped[0].key).toBe("bad");
  });
});

// ---------------------------------------------------------------------------
// Formatting
// ---------------------------------------------------------------------------

describe("formatLattice", () => {
  it("writes arcs and finals, omitting unit weights", () => {
    const fst = VectorFst.tropical();
    fst.addStates(3);
    fst.setStart(0);
    fst.addArc(0, arc(5, 5, 0.5, 1));
    fst.addArc(1, arc(3, 0, 0, 2));
    fst.setFinal(2);
    expect(formatLattice("utt", fst)).toBe("utt\n0\t1\t5\t5\t0.5\n1\t2\t3\t0\n2\n\n");
  });

  it("writes the start state first", () => {
    const fst = VectorFst.tropical();
    fst.addStates(3);
    fst.setStart(2);
    fst.addArc(2, arc(1, 1, 0, 0));
    fst.addArc(0, arc(2, 2, 0, 1));
    fst.setFinal(1, 1.5);
    expect(formatLattice("k", fst)).toBe("k\n2\t0\t1\t1\n0\t1\t2\t2\n1\t1.5\n\n");
  });

  it("writes the empty lattice as a bare key", () => {
    expect(formatLattice("k", VectorFst.tropical())).toBe("k\n\n");
  });

  it("rejects keys with whitespace", () => {
    expect(() => formatLattice("a b", VectorFst.tropical())).toThrow(RangeError);
    expect(() => formatLattice("", VectorFst.tropical())).toThrow(RangeError);
  });

  it("reads back what it writes", () => {
    const [entry] = parseLatticeArchive(ARCHIVE);
    const [again] = parseLatticeArchive(formatLattice(entry.key, entry.lattice));
    expect(again.key).toBe("utt-1");
    expect(enumeratePaths(again.lattice)).toEqual(enumeratePaths(entry.lattice));
  });
});
