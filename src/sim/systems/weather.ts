import { WEATHER_GROWTH_MULT, WEATHER_TUNING } from "../constants";
import { rngChance, rngPick, rngRange } from "../rng";
import type { EnvironmentState, GameState, WeatherMode } from "../types";

export function isSpecialWeather(mode: WeatherMode): boolean {
  return mode === "rainy" || mode === "snowing";
}

export function weatherGrowthMultiplier(mode: WeatherMode): number {
  return WEATHER_GROWTH_MULT[mode];
}

export function createEnvironment(startTimeOfDay: number): EnvironmentState {
  return { weather: "sunny", weatherTimer: 0, specialRemaining: 0, timeOfDay: startTimeOfDay };
}

/**
 * Rolls the weather forward by `dt` seconds. Returns true if the mode changed.
 *
 * Special weather ends on its own countdown; the roll timer only decides when
 * normal weather may turn special (or flip between sunny and cloudy).
 */
export function systemWeather(state: GameState, dt: number): boolean {
  const env = state.environment;
  const before = env.weather;
  env.weatherTimer += dt;

  if (isSpecialWeather(env.weather)) {
    env.specialRemaining -= dt;
    if (env.specialRemaining <= 0) {
      env.weather = rngPick(state.rng, WEATHER_TUNING.normalModes);
      env.specialRemaining = 0;
      env.weatherTimer = 0;
      return env.weather !== before;
    }
  }

  if (env.weatherTimer >= WEATHER_TUNING.checkIntervalSeconds) {
    env.weatherTimer = 0;
    if (!isSpecialWeather(env.weather)) {
      if (rngChance(state.rng, WEATHER_TUNING.specialChance)) {
        env.weather = rngPick(state.rng, WEATHER_TUNING.specialModes);
        env.specialRemaining = rngRange(state.rng, WEATHER_TUNING.specialMinSeconds, WEATHER_TUNING.specialMaxSeconds);
      } else {
        env.weather = env.weather === "sunny" ? "cloudy" : "sunny";
      }
    }
  }

  return env.weather !== before;
}
