import { describe, it, expect } from "vitest";
import { createLogger } from "../logger.js";

function capture(verbose: boolean, prefix?: string) {
  const lines: string[] = [];
  const logger = createLogger({ verbose, prefix, sink: (line) => lines.push(line) });
  return { logger, lines };
}

describe("createLogger", () => {
  it("prefixes every line with the program name", () => {
    const { logger, lines } = capture(false);
    logger.info("Done 2 lattices");
    logger.warn("skipping: bad");
    logger.error("boom");
    expect(lines).toEqual([
      "[lattice-remove-ctc-blank] Done 2 lattices",
      "[lattice-remove-ctc-blank] warning: skipping: bad",
      "[lattice-remove-ctc-blank] error: boom",
    ]);
  });

  it("prints debug lines only when verbose", () => {
    const quiet = capture(false);
    quiet.logger.debug("hidden");
    expect(quiet.lines).toEqual([]);

    const loud = capture(true, "test");
    loud.logger.debug("shown");
    expect(loud.lines).toEqual(["[test] shown"]);
  });
});
