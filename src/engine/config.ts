// Engine configuration: defaults, tolerant parsing of untrusted input, and
// validation against the shape catalog. Fixed for the whole session.

import { debugLog } from "../utils/debug";

import { MAX_EXTENT_HEIGHT, MAX_EXTENT_WIDTH } from "./core/pieces";
import { BUFFER_ROWS } from "./core/types";
import { EngineConfigError } from "./errors";

export type EngineConfig = Readonly<{
  height: number; // visible rows
  width: number;
  gravitySeconds: number; // seconds per automatic downward step
  ticksPerSecond: number; // driver cadence
  seed: string;
}>;

export const DEFAULT_ENGINE_CONFIG: EngineConfig = {
  gravitySeconds: 0.5,
  height: 20,
  seed: "default",
  ticksPerSecond: 100,
  width: 10,
};

const ENV_KEYS = {
  gravitySeconds: "BLOCKFALL_GRAVITY_SECONDS",
  height: "BLOCKFALL_HEIGHT",
  seed: "BLOCKFALL_SEED",
  ticksPerSecond: "BLOCKFALL_TICKS_PER_SECOND",
  width: "BLOCKFALL_WIDTH",
} as const satisfies Record<keyof EngineConfig, string>;

function isRecord(x: unknown): x is Record<string, unknown> {
  return typeof x === "object" && x !== null;
}

function isNumber(x: unknown): x is number {
  return typeof x === "number" && Number.isFinite(x);
}

function isString(x: unknown): x is string {
  return typeof x === "string";
}

function requirePositiveInteger(
  field: "height" | "width",
  value: number,
): void {
  if (!Number.isInteger(value) || value < 1) {
    throw new EngineConfigError(
      field,
      `must be a positive integer, got ${String(value)}`,
    );
  }
}

function requirePositiveFinite(
  field: "gravitySeconds" | "ticksPerSecond",
  value: number,
): void {
  if (!Number.isFinite(value) || value <= 0) {
    throw new EngineConfigError(
      field,
      `must be a positive finite number, got ${String(value)}`,
    );
  }
}

/**
 * Throws EngineConfigError unless the board can host every rotation state
 * of every kind.
 */
export function validateEngineConfig(cfg: EngineConfig): EngineConfig {
  requirePositiveInteger("height", cfg.height);
  requirePositiveInteger("width", cfg.width);
  requirePositiveFinite("gravitySeconds", cfg.gravitySeconds);
  requirePositiveFinite("ticksPerSecond", cfg.ticksPerSecond);
  if (typeof cfg.seed !== "string" || cfg.seed.length === 0) {
    throw new EngineConfigError("seed", "must be a non-empty string");
  }
  if (cfg.width < MAX_EXTENT_WIDTH) {
    throw new EngineConfigError(
      "width",
      `${String(cfg.width)} columns cannot fit a piece ${String(MAX_EXTENT_WIDTH)} cells wide`,
    );
  }
  if (cfg.height + BUFFER_ROWS < MAX_EXTENT_HEIGHT) {
    throw new EngineConfigError(
      "height",
      `${String(cfg.height)} visible rows cannot fit a piece ${String(MAX_EXTENT_HEIGHT)} cells tall`,
    );
  }
  return cfg;
}

export function createEngineConfig(
  overrides: Partial<EngineConfig> = {},
): EngineConfig {
  const cfg: EngineConfig = { ...DEFAULT_ENGINE_CONFIG, ...overrides };
  debugLog("config", "resolved engine config", cfg);
  return validateEngineConfig(cfg);
}

/**
 * Pick the known keys out of untrusted input (parsed JSON, a settings
 * file). Ill-typed values are dropped rather than rejected; range checks
 * happen in validateEngineConfig.
 */
export function parseEngineConfig(raw: unknown): Partial<EngineConfig> {
  if (!isRecord(raw)) return {};
  const out: {
    -readonly [K in keyof EngineConfig]?: EngineConfig[K];
  } = {};
  for (const k of [
    "height",
    "width",
    "gravitySeconds",
    "ticksPerSecond",
  ] as const) {
    const v = raw[k];
    if (isNumber(v)) out[k] = v;
  }
  const seed = raw["seed"];
  if (isString(seed)) out.seed = seed;
  else if (isNumber(seed)) out.seed = String(seed);
  return out;
}

/**
 * Read overrides from BLOCKFALL_* variables. Unset or unparsable values
 * fall back to the defaults.
 */
export function loadEngineConfigFromEnv(
  env: Readonly<Record<string, string | undefined>> = process.env,
): Partial<EngineConfig> {
  const raw: Record<string, unknown> = {};
  for (const [field, key] of Object.entries(ENV_KEYS)) {
    const v = env[key]?.trim();
    if (v === undefined || v.length === 0) continue;
    raw[field] = field === "seed" ? v : Number(v);
  }
  return parseEngineConfig(raw);
}

// Ticks between gravity steps; never less than one
export function gravityIntervalTicks(cfg: EngineConfig): number {
  return Math.max(1, Math.floor(cfg.ticksPerSecond * cfg.gravitySeconds));
}
