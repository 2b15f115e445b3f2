import { randomBytes } from "node:crypto";

import { DAY_TUNING } from "./constants";
import { createFieldIndex } from "./field";
import { createTileGrid } from "./grid";
import { createPlayer } from "./player";
import { createProgression } from "./progression";
import { createRng } from "./rng";
import { advanceTimeOfDay } from "./time";
import type { GameState, SimConfig, StepReport } from "./types";
import { systemGrowth } from "./systems/growth";
import { createEnvironment, systemWeather } from "./systems/weather";

function defaultSeed32(): number {
  // Seedable RNG: defaults to an unpredictable seed, but can be overridden by caller.
  return randomBytes(4).readUInt32LE(0) >>> 0;
}

export function createInitialState(config: SimConfig, opts?: { seed?: number }): GameState {
  const seed = (opts?.seed ?? defaultSeed32()) >>> 0;
  return {
    config,
    clockSeconds: 0,
    grid: createTileGrid(config.map),
    field: createFieldIndex(),
    player: createPlayer(config.map),
    progression: createProgression(config.startingMoney),
    environment: createEnvironment(DAY_TUNING.startTimeOfDay),
    advisory: null,
    rngSeed: seed,
    rng: createRng(seed),
  };
}

/**
 * Advances the world by `dt` wall-clock seconds: weather, day/night, every
 * cultivar's growth and the advisory timer. Non-positive `dt` is a no-op.
 */
export function step(state: GameState, dt: number): StepReport {
  if (!(dt > 0)) {
    return {
      dt: 0,
      weather: state.environment.weather,
      weatherChanged: false,
      timeOfDay: state.environment.timeOfDay,
      ripened: [],
    };
  }

  state.clockSeconds += dt;

  if (state.advisory) {
    state.advisory.remainingSeconds -= dt;
    if (state.advisory.remainingSeconds <= 0) state.advisory = null;
  }

  const weatherChanged = systemWeather(state, dt);
  state.environment.timeOfDay = advanceTimeOfDay(state.environment.timeOfDay, dt);
  const ripened = systemGrowth(state, dt);

  return {
    dt,
    weather: state.environment.weather,
    weatherChanged,
    timeOfDay: state.environment.timeOfDay,
    ripened,
  };
}
