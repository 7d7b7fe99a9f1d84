import { fileURLToPath } from "node:url";

const WORKSPACE_PACKAGES = ["fst", "ctc", "archive", "cli"] as const;

/** Resolve `@ctc-lattice/*` imports to package sources so tests need no build. */
export const workspaceAliases: Record<string, string> = Object.fromEntries(
  WORKSPACE_PACKAGES.map((name) => [
    `@ctc-lattice/${name}`,
    fileURLToPath(new URL(`./packages/${name}/src/index.ts`, import.meta.url)),
  ])
);
