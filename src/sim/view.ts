import { fertilizerMultiplier, harvestRange, nextToolLevel, plantingRange } from "./progression";
import { darkness01, isNight } from "./time";
import type { GameState, ToolKind, ToolLevel, WeatherMode } from "./types";
import { weatherGrowthMultiplier } from "./systems/weather";

// Read-only snapshots for the presentation layer. Nothing here mutates state.

export type ProgressionSnapshot = {
  money: number;
  seeds: Array<[string, number]>;
  items: Array<[string, number]>;
  tools: Record<ToolKind, ToolLevel>;
  nextTools: Record<ToolKind, ToolLevel | null>;
  fertilizerMult: number;
  plantingRange: number;
  harvestRange: number;
};

export type EnvironmentSnapshot = {
  weather: WeatherMode;
  weatherGrowthMult: number;
  timeOfDay: number;
  darkness01: number;
  night: boolean;
};

export function toolLevels(state: GameState): Record<ToolKind, ToolLevel> {
  return { ...state.progression.tools };
}

export function snapshotProgression(state: GameState): ProgressionSnapshot {
  const p = state.progression;
  return {
    money: p.money,
    seeds: [...p.seeds.entries()],
    items: [...p.items.entries()],
    tools: toolLevels(state),
    nextTools: {
      fertilizer: nextToolLevel(p, "fertilizer"),
      hoe: nextToolLevel(p, "hoe"),
      shovel: nextToolLevel(p, "shovel"),
    },
    fertilizerMult: fertilizerMultiplier(p),
    plantingRange: plantingRange(p),
    harvestRange: harvestRange(p),
  };
}

export function snapshotEnvironment(state: GameState): EnvironmentSnapshot {
  const env = state.environment;
  return {
    weather: env.weather,
    weatherGrowthMult: weatherGrowthMultiplier(env.weather),
    timeOfDay: env.timeOfDay,
    darkness01: darkness01(env.timeOfDay),
    night: isNight(env.timeOfDay),
  };
}
