import { loadDefaultCatalog } from "./catalog";
import { DEFAULT_MAP, STARTING_MONEY } from "./constants";
import type { Catalog, MapConfig, SimConfig } from "./types";

export type SimConfigOverrides = {
  catalog?: Catalog;
  map?: Partial<MapConfig>;
  startingMoney?: number;
};

/**
 * Builds the immutable configuration a game is created from. Throws
 * `CatalogError` if the catalog data is inconsistent.
 */
export function createSimConfig(overrides: SimConfigOverrides = {}): SimConfig {
  const map: MapConfig = { ...DEFAULT_MAP, ...overrides.map };
  if (map.width <= 0 || map.height <= 0) {
    throw new RangeError(`map must have positive dimensions, got ${map.width}x${map.height}`);
  }
  return Object.freeze({
    catalog: overrides.catalog ?? loadDefaultCatalog(),
    map: Object.freeze(map),
    startingMoney: overrides.startingMoney ?? STARTING_MONEY,
  });
}
