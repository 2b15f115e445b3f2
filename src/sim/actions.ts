import { ADVISORY_SECONDS } from "./constants";
import { getPlantType } from "./catalog";
import { findPlantingSpot, harvestInRadius, plantCultivar } from "./field";
import { isPlayerInSellArea, playerTile } from "./player";
import {
  addCount,
  fail,
  firstAvailableSeed,
  harvestRange,
  plantingRange,
  purchaseSeeds,
  purchaseTool,
  sellAllItems,
  sellItems,
  takeCount,
} from "./progression";
import type { ActionFailure, ActionResult, Cultivar, GameState } from "./types";

// Failed commands leave a short-lived message for the host to show.
function reject(state: GameState, failure: ActionFailure): ActionFailure {
  state.advisory = { message: failure.reason, remainingSeconds: ADVISORY_SECONDS };
  return failure;
}

export function plantAtPlayer(state: GameState): ActionResult<{ cultivar: Cultivar }> {
  const seedName = firstAvailableSeed(state.progression);
  if (seedName === null) return reject(state, fail("noSeeds", "No seeds in inventory!"));

  const plant = getPlantType(state.config.catalog, seedName);
  if (!plant) return reject(state, fail("unknownItem", `Unknown seed "${seedName}"`));

  const at = playerTile(state);
  const spot = findPlantingSpot(
    state.grid,
    state.field,
    state.rng,
    at.x,
    at.y,
    plant.footprint,
    plantingRange(state.progression),
  );
  if (!spot) return reject(state, fail("noPlantingSpot", "Not enough space to place that seed here"));

  const cultivar = plantCultivar(state.grid, state.field, plant, spot.x, spot.y, state.clockSeconds);
  if (!cultivar) return reject(state, fail("noPlantingSpot", "Not enough space to place that seed here"));

  takeCount(state.progression.seeds, seedName, 1);
  return { ok: true, cultivar };
}

export function harvestAtPlayer(state: GameState): ActionResult<{ harvested: Cultivar[] }> {
  const at = playerTile(state);
  const harvested = harvestInRadius(state.grid, state.field, at.x, at.y, harvestRange(state.progression));
  if (harvested.length === 0) {
    return reject(state, fail("nothingHarvestable", "Nothing ready to harvest in range"));
  }
  for (const cultivar of harvested) {
    addCount(state.progression.items, cultivar.type.name, 1);
  }
  return { ok: true, harvested };
}

export function buy(state: GameState, itemName: string, quantity = 1): ActionResult<{ spent: number }> {
  const item = state.config.catalog.items.get(itemName);
  if (!item) return reject(state, fail("unknownItem", `Unknown item "${itemName}"`));

  // Tools are bought one tier at a time; quantity doesn't apply.
  const result = item.kind === "tool" ? purchaseTool(state.progression, item) : purchaseSeeds(state.progression, item, quantity);
  return result.ok ? result : reject(state, result);
}

export function sell(state: GameState, itemName: string, quantity = 1): ActionResult<{ earned: number }> {
  if (!isPlayerInSellArea(state)) return reject(state, fail("notInSellArea", "Go to the market to sell"));

  const plant = getPlantType(state.config.catalog, itemName);
  if (!plant) return reject(state, fail("unknownItem", `"${itemName}" can't be sold`));

  const result = sellItems(state.progression, plant, quantity);
  return result.ok ? result : reject(state, result);
}

export function sellAll(state: GameState): ActionResult<{ earned: number }> {
  if (!isPlayerInSellArea(state)) return reject(state, fail("notInSellArea", "Go to the market to sell"));
  return { ok: true, earned: sellAllItems(state.progression, state.config.catalog) };
}
