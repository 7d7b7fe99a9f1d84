import * as fs from "node:fs";
import { once } from "node:events";
import type { Writable } from "node:stream";
import { finished } from "node:stream/promises";
import type { Fst } from "@ctc-lattice/fst";
import { requireTable } from "./specifier.js";
import { formatLattice } from "./text-format.js";

export interface WriteArchiveOptions {
  /** Stream to write when the specifier's path is `-` (default: process.stdout). */
  readonly stdout?: Writable;
}

/**
 * Writes keyed lattices to a text archive, in call order. Entries written
 * before a failure stay in the archive once `close` has resolved.
 *
 * A stream error is recorded whenever it happens, including between writes,
 * and is thrown from the next `write` or from `close`.
 */
export class LatticeArchiveWriter {
  private closed = false;
  private count = 0;
  private failure: Error | undefined;
  private readonly onError = (error: Error): void => {
    this.failure ??= error;
  };

  private constructor(
    private readonly stream: Writable,
    private readonly owned: boolean
  ) {
    stream.on("error", this.onError);
  }

  static async open(
    specifier: string,
    options: WriteArchiveOptions = {}
  ): Promise<LatticeArchiveWriter> {
    const table = requireTable(specifier, "output");
    if (table.path === "-") {
      return new LatticeArchiveWriter(options.stdout ?? process.stdout, false);
    }
    const stream = fs.createWriteStream(table.path, { encoding: "utf8" });
    await once(stream, "open");
    return new LatticeArchiveWriter(stream, true);
  }

  /** Number of entries written so far. */
  get written(): number {
    return this.count;
  }

  async write<W>(key: string, lattice: Fst<W>): Promise<void> {
    if (this.closed) throw new Error(`Cannot write lattice ${key}: archive is closed`);
    this.throwIfFailed();
    const text = formatLattice(key, lattice);
    if (!this.stream.write(text)) await once(this.stream, "drain");
    this.throwIfFailed();
    this.count++;
  }

  /** Finish the archive. Standard output is left open. */
  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    try {
      this.throwIfFailed();
      if (this.owned) {
        this.stream.end();
        await finished(this.stream);
      }
    } finally {
      this.stream.off("error", this.onError);
    }
  }

  private throwIfFailed(): void {
    if (this.failure) throw this.failure;
    if (this.stream.destroyed) throw new Error("Archive stream was destroyed");
  }
}
