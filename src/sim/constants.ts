import type { GrowthStage, MapConfig, ToolKind, ToolLevel, WeatherMode } from "./types";

export const TILE_SIZE = 48;

export const DEFAULT_MAP: MapConfig = {
  width: 150,
  height: 150,
  waterBorder: 8,
  // sell area is the (2h+1)x(2h+1) block at the map center
  sellAreaHalfSize: 2,
};

export const STARTING_MONEY = 10;

// Failed commands keep their message on screen this long.
export const ADVISORY_SECONDS = 3;

export const PLAYER_TUNING = {
  speed: 160, // px per second
  sprintMult: 3,
};

// ============================================================================
// Terrain noise (thresholds on n in [-1, 1])
// ============================================================================

export const TERRAIN_TUNING = {
  freqX: 0.1,
  freqY: 0.1,
  freqDiagonal: 0.05,
  waterBelow: -0.3,
  soilBelow: 0.1,
  grassBelow: 0.5,
};

// ============================================================================
// Growth
// ============================================================================

// Progress thresholds (1 - remaining/growthSeconds), checked high to low.
export const GROWTH_STAGE_THRESHOLDS: ReadonlyArray<[Exclude<GrowthStage, "harvestable" | "seed">, number]> = [
  ["mature", 0.8],
  ["young", 0.5],
  ["sprout", 0.2],
];

export const GROWTH_STAGES: readonly GrowthStage[] = ["seed", "sprout", "young", "mature", "harvestable"];

export const SOIL_GROWTH_BONUS = 1.1;

// ============================================================================
// Weather + day/night
// ============================================================================

export const WEATHER_TUNING = {
  // Seconds of accumulated time between weather rolls.
  checkIntervalSeconds: 85,
  specialChance: 0.4,
  specialMinSeconds: 80,
  specialMaxSeconds: 180,
  normalModes: ["sunny", "cloudy"] as const satisfies readonly WeatherMode[],
  specialModes: ["rainy", "snowing"] as const satisfies readonly WeatherMode[],
};

export const WEATHER_GROWTH_MULT: Record<WeatherMode, number> = {
  sunny: 1.0,
  cloudy: 1.0,
  rainy: 2.0,
  snowing: 0.75,
};

export const DAY_TUNING = {
  dayLengthSeconds: 600,
  startTimeOfDay: 0.5,
  nightDarkness: 0.6,
  nightEnd: 0.2,
  dawnEnd: 0.3,
  duskStart: 0.7,
  nightStart: 0.8,
};

// ============================================================================
// Tools (index = level; 0 is the basic tool every player starts with)
// ============================================================================

export const MAX_TOOL_LEVEL: ToolLevel = 3;

export const TOOL_KINDS: readonly ToolKind[] = ["fertilizer", "hoe", "shovel"];

export const FERTILIZER_GROWTH_MULT: Record<ToolLevel, number> = { 0: 1, 1: 2, 2: 10, 3: 100 };
export const HOE_PLANTING_RANGE: Record<ToolLevel, number> = { 0: 2, 1: 8, 2: 20, 3: 100 };
export const SHOVEL_HARVEST_RANGE: Record<ToolLevel, number> = { 0: 1, 1: 4, 2: 8, 3: 15 };

export const TIER_LABELS = {
  common: "COMMON SEEDS",
  rare: "RARE SEEDS",
  mythic: "MYTHIC SEEDS",
  legendary: "LEGENDARY SEEDS",
  tool: "TOOLS",
} as const;
