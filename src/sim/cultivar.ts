import { GROWTH_STAGE_THRESHOLDS, GROWTH_STAGES, SOIL_GROWTH_BONUS } from "./constants";
import { occupiedTiles } from "./footprint";
import type { Cultivar, CultivarId, GrowthStage, PlantType, TileKind, TilePos } from "./types";

export function createCultivar(id: CultivarId, type: PlantType, originX: number, originY: number, plantedAt: number): Cultivar {
  return {
    id,
    type,
    originX,
    originY,
    remainingSeconds: type.growthSeconds,
    stage: "seed",
    harvestable: false,
    plantedAt,
  };
}

export function occupiedTilesOf(cultivar: Cultivar): TilePos[] {
  return occupiedTiles(cultivar.type.footprint, cultivar.originX, cultivar.originY);
}

// 0 at planting, 1 when harvestable.
export function progressOf(cultivar: Cultivar): number {
  return 1 - cultivar.remainingSeconds / cultivar.type.growthSeconds;
}

export function stageFor(remainingSeconds: number, growthSeconds: number): GrowthStage {
  if (remainingSeconds <= 0) return "harvestable";
  const progress = 1 - remainingSeconds / growthSeconds;
  for (const [stage, threshold] of GROWTH_STAGE_THRESHOLDS) {
    if (progress >= threshold) return stage;
  }
  return "seed";
}

export function stageIndex(stage: GrowthStage): number {
  return GROWTH_STAGES.indexOf(stage);
}

export function soilMultiplier(tileKind: TileKind | null): number {
  return tileKind === "soil" ? SOIL_GROWTH_BONUS : 1.0;
}

/**
 * Advances growth by `dt` wall-clock seconds scaled by every active modifier.
 * Returns true when this call made the cultivar harvestable.
 */
export function advanceCultivar(
  cultivar: Cultivar,
  dt: number,
  weatherMult: number,
  fertilizerMult: number,
  tileKind: TileKind | null,
): boolean {
  if (cultivar.harvestable) return false;

  const rate = weatherMult * fertilizerMult * soilMultiplier(tileKind);
  const reduction = Math.max(0, dt) * rate;
  cultivar.remainingSeconds = Math.max(0, cultivar.remainingSeconds - reduction);

  cultivar.stage = stageFor(cultivar.remainingSeconds, cultivar.type.growthSeconds);
  cultivar.harvestable = cultivar.stage === "harvestable";
  return cultivar.harvestable;
}

export function timeRemaining(cultivar: Cultivar): number {
  return cultivar.harvestable ? 0 : Math.max(0, cultivar.remainingSeconds);
}
