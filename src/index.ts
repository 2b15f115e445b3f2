export { buy, harvestAtPlayer, plantAtPlayer, sell, sellAll } from "./sim/actions";
export { buildCatalog, categoryItems, CatalogError, getPlantType, getTool, loadDefaultCatalog, sellValueFor } from "./sim/catalog";
export { createSimConfig, type SimConfigOverrides } from "./sim/config";
export { occupiedTilesOf, progressOf, stageIndex, timeRemaining } from "./sim/cultivar";
export { cultivarAt, liveCultivars } from "./sim/field";
export { isSellArea, isTillable, isWalkable, tileKindAt } from "./sim/grid";
export { isPlayerInSellArea, movePlayer, playerTile, type MoveIntent } from "./sim/player";
export { createInitialState, step } from "./sim/tick";
export { snapshotEnvironment, snapshotProgression, toolLevels, type EnvironmentSnapshot, type ProgressionSnapshot } from "./sim/view";
export type * from "./sim/types";
