/**
 * Solve a heightmap file in both modes.
 *
 * Usage: npx tsx packages/pathfinding/scripts/solve.ts <grid-file> [--profile <name>] [--verbose]
 *
 * Options:
 *   --profile   Solver profile from configs/solver/profiles/
 *   --verbose   Log parse, build and search progress
 */

import { readFileSync } from "node:fs";
import { resolve } from "node:path";
import { loadSolverConfig, solveForward, solveReverse } from "../src/index.js";

const args = process.argv.slice(2);
const profileIdx = args.indexOf("--profile");
const profileName = profileIdx >= 0 ? args[profileIdx + 1] : undefined;
const positional = args.filter(
  (a, i) => !a.startsWith("--") && (profileIdx < 0 || i !== profileIdx + 1)
);

function main(): void {
  const inputPath = positional[0];
  if (!inputPath) {
    console.error("Usage: solve.ts <grid-file> [--profile <name>] [--verbose]");
    process.exit(2);
  }

  const config = loadSolverConfig(profileName);
  if (args.includes("--verbose")) config.verbose = true;

  const input = readFileSync(resolve(inputPath), "utf-8");

  console.log("Hill climbing");
  const forward = solveForward(input, config);
  console.log(` Start -> end:          ${forward.distance}`);
  const reverse = solveReverse(input, config);
  console.log(` Lowest point -> end:   ${reverse.distance}`);
}

try {
  main();
} catch (err) {
  console.error(`[error] ${err instanceof Error ? err.message : String(err)}`);
  process.exit(1);
}
