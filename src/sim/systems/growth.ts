import { FERTILIZER_GROWTH_MULT } from "../constants";
import { advanceCultivar } from "../cultivar";
import { tileKindAt } from "../grid";
import type { CultivarId, GameState } from "../types";
import { weatherGrowthMultiplier } from "./weather";

/**
 * Advances every live cultivar once. The soil bonus comes from each
 * cultivar's origin tile. Returns the ids that became harvestable.
 */
export function systemGrowth(state: GameState, dt: number): CultivarId[] {
  const weatherMult = weatherGrowthMultiplier(state.environment.weather);
  const fertilizerMult = FERTILIZER_GROWTH_MULT[state.progression.tools.fertilizer];
  const ripened: CultivarId[] = [];

  for (const cultivar of state.field.cultivars.values()) {
    const tileKind = tileKindAt(state.grid, cultivar.originX, cultivar.originY);
    if (advanceCultivar(cultivar, dt, weatherMult, fertilizerMult, tileKind)) {
      ripened.push(cultivar.id);
    }
  }

  return ripened;
}
