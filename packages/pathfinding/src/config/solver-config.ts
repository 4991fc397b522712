/**
 * Layered JSON config for the solver.
 *
 * `configs/solver/base.json` sits on top of the hardcoded defaults; named
 * profiles in `configs/solver/profiles/` are partial overrides merged on top
 * of the base.
 */

import { readFileSync, readdirSync, existsSync } from "node:fs";
import { resolve, dirname, join } from "node:path";
import { fileURLToPath } from "node:url";

import { MAX_ELEVATION, MIN_ELEVATION } from "@ridgeline/types";
import { InvalidConfigError } from "../errors.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface SolverConfig {
  /** Largest height gain allowed in one step */
  maxClimb: number;
  /** Elevation of the cells reverse mode searches for */
  lowestElevation: number;
  /** Log parse, build and search progress to the console */
  verbose: boolean;
}

export interface ProfileInfo {
  name: string;
  description: string;
}

export interface ProfileConfig extends ProfileInfo {
  overrides: Partial<SolverConfig>;
}

export const DEFAULT_SOLVER_CONFIG: Readonly<SolverConfig> = {
  maxClimb: 1,
  lowestElevation: MIN_ELEVATION,
  verbose: false,
};

// ---------------------------------------------------------------------------
// Validation
// ---------------------------------------------------------------------------

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Check a parsed JSON value and keep the recognised solver fields.
 * Unknown keys are ignored.
 */
export function parseSolverOverrides(raw: unknown, source: string): Partial<SolverConfig> {
  if (!isRecord(raw)) {
    throw new InvalidConfigError(source, "expected a JSON object");
  }
  const overrides: Partial<SolverConfig> = {};

  const { maxClimb, lowestElevation, verbose } = raw;
  if (maxClimb !== undefined) {
    if (typeof maxClimb !== "number" || !Number.isInteger(maxClimb) || maxClimb < 0) {
      throw new InvalidConfigError(source, "maxClimb must be a non-negative integer");
    }
    overrides.maxClimb = maxClimb;
  }
  if (lowestElevation !== undefined) {
    if (
      typeof lowestElevation !== "number" ||
      !Number.isInteger(lowestElevation) ||
      lowestElevation < MIN_ELEVATION ||
      lowestElevation > MAX_ELEVATION
    ) {
      throw new InvalidConfigError(
        source,
        `lowestElevation must be an integer from ${MIN_ELEVATION} to ${MAX_ELEVATION}`,
      );
    }
    overrides.lowestElevation = lowestElevation;
  }
  if (verbose !== undefined) {
    if (typeof verbose !== "boolean") {
      throw new InvalidConfigError(source, "verbose must be a boolean");
    }
    overrides.verbose = verbose;
  }
  return overrides;
}

function parseProfile(raw: unknown, source: string): ProfileConfig {
  if (!isRecord(raw)) {
    throw new InvalidConfigError(source, "expected a JSON object");
  }
  const { name, description, overrides } = raw;
  if (typeof name !== "string" || typeof description !== "string") {
    throw new InvalidConfigError(source, "profile needs a string name and description");
  }
  return {
    name,
    description,
    overrides: parseSolverOverrides(overrides ?? {}, source),
  };
}

function readJson(filePath: string): unknown {
  const raw = readFileSync(filePath, "utf-8");
  try {
    return JSON.parse(raw);
  } catch (err) {
    throw new InvalidConfigError(filePath, err instanceof Error ? err.message : String(err));
  }
}

// ---------------------------------------------------------------------------
// Config directory resolution
// ---------------------------------------------------------------------------

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

/** Location of the solver configs below a directory */
function solverConfigsIn(dir: string): string {
  return join(dir, "configs", "solver");
}

/**
 * Walk up from `fromDir` to the nearest directory holding `configs/solver/`.
 *
 * Works from both source (packages/pathfinding/src/) and compiled (dist/)
 * paths. When no ancestor has one, returns `configs/solver` under `fromDir`,
 * which the loaders treat as empty.
 */
export function findConfigsRoot(fromDir: string = __dirname): string {
  let dir = resolve(fromDir);
  for (;;) {
    const candidate = solverConfigsIn(dir);
    if (existsSync(candidate)) {
      return candidate;
    }
    const parent = dirname(dir);
    if (parent === dir) break;
    dir = parent;
  }
  return solverConfigsIn(resolve(fromDir));
}

// ---------------------------------------------------------------------------
// Load
// ---------------------------------------------------------------------------

/** Base config over the hardcoded defaults. A missing base file means defaults. */
export function loadBaseConfig(configsRoot: string = findConfigsRoot()): SolverConfig {
  const filePath = join(configsRoot, "base.json");
  if (!existsSync(filePath)) {
    return { ...DEFAULT_SOLVER_CONFIG };
  }
  return { ...DEFAULT_SOLVER_CONFIG, ...parseSolverOverrides(readJson(filePath), filePath) };
}

/**
 * Load the solver config, optionally with a named profile on top.
 *
 * @throws InvalidConfigError when a file has the wrong shape
 * @throws Error when the profile file does not exist
 */
export function loadSolverConfig(
  profileName?: string,
  configsRoot: string = findConfigsRoot(),
): SolverConfig {
  const base = loadBaseConfig(configsRoot);
  if (profileName === undefined) return base;

  const filePath = join(configsRoot, "profiles", `${profileName}.json`);
  if (!existsSync(filePath)) {
    throw new Error(`Unknown solver profile "${profileName}" (looked in ${filePath})`);
  }
  const profile = parseProfile(readJson(filePath), filePath);
  const merged = { ...base, ...profile.overrides };
  if (merged.verbose) {
    console.log(`[config] Loaded profile "${profile.name}": ${JSON.stringify(merged)}`);
  }
  return merged;
}

/** List all available profiles from the profiles directory. */
export function listProfiles(configsRoot: string = findConfigsRoot()): ProfileInfo[] {
  const profilesDir = join(configsRoot, "profiles");

  if (!existsSync(profilesDir)) return [];

  const files = readdirSync(profilesDir)
    .filter((f) => f.endsWith(".json"))
    .sort();
  return files.map((file) => {
    const filePath = join(profilesDir, file);
    const { name, description } = parseProfile(readJson(filePath), filePath);
    return { name, description };
  });
}
