import { describe, expect, it } from "vitest";

import { buy, harvestAtPlayer, plantAtPlayer, sell, sellAll } from "../actions";
import { createSimConfig } from "../config";
import { setPlayerTile } from "../player";
import { nextToolLevel } from "../progression";
import { createInitialState, step } from "../tick";
import type { GameState } from "../types";

function farmState(startingMoney = 10): GameState {
  const config = createSimConfig({ map: { width: 20, height: 20, waterBorder: 0 }, startingMoney });
  const state = createInitialState(config, { seed: 1 });
  state.grid.tiles = state.grid.tiles.map((k) => (k === "sellArea" ? k : "soil"));
  return state;
}

describe("buy", () => {
  it("buys seeds when affordable", () => {
    const state = farmState();
    expect(buy(state, "Radish", 3)).toEqual({ ok: true, spent: 3 });
    expect(state.progression.money).toBe(7);
    expect([...state.progression.seeds]).toEqual([["Radish", 3]]);
  });

  it("refuses what the player can't afford and leaves an advisory", () => {
    const state = farmState();
    expect(buy(state, "Carrot")).toEqual({
      ok: false,
      code: "insufficientFunds",
      reason: "Not enough money! Need $15.00",
    });
    expect(state.progression.money).toBe(10);
    expect(state.progression.seeds.size).toBe(0);
    expect(state.advisory).toEqual({ message: "Not enough money! Need $15.00", remainingSeconds: 3 });
  });

  it("rejects unknown items and bad quantities", () => {
    const state = farmState();
    expect(buy(state, "Nope")).toEqual({ ok: false, code: "unknownItem", reason: 'Unknown item "Nope"' });
    expect(buy(state, "Radish", 0)).toMatchObject({ ok: false, code: "invalidQuantity" });
    expect(buy(state, "Radish", 1.5)).toMatchObject({ ok: false, code: "invalidQuantity" });
    expect(state.progression.money).toBe(10);
  });

  it("buys tools one tier at a time", () => {
    const state = farmState(1_000_000);
    expect(buy(state, "Gold Hoe")).toEqual({
      ok: false,
      code: "tierOutOfOrder",
      reason: "Buy the previous hoe tier before Gold Hoe",
    });
    expect(buy(state, "Iron Hoe")).toEqual({ ok: true, spent: 5000 });
    expect(buy(state, "Iron Hoe")).toEqual({
      ok: false,
      code: "tierOutOfOrder",
      reason: "You already own Iron Hoe or better",
    });
    expect(buy(state, "Gold Hoe")).toEqual({ ok: true, spent: 50000 });
    expect(buy(state, "Diamond Hoe")).toEqual({ ok: true, spent: 250000 });
    expect(state.progression.tools.hoe).toBe(3);
    expect(nextToolLevel(state.progression, "hoe")).toBeNull();
    expect(state.progression.money).toBe(695000);
  });

  it("ignores quantity for tools", () => {
    const state = farmState(1_000_000);
    expect(buy(state, "Iron Shovel", 5)).toEqual({ ok: true, spent: 20000 });
    expect(state.progression.tools.shovel).toBe(1);
  });

  it("formats large prices with grouping", () => {
    const state = farmState();
    expect(buy(state, "Iron Fertilizer")).toEqual({
      ok: false,
      code: "insufficientFunds",
      reason: "Not enough money! Need $10,000.00",
    });
  });
});

describe("planting and harvesting", () => {
  it("plants seeds in purchase order near the player", () => {
    const state = farmState();
    buy(state, "Radish");
    buy(state, "Lettuce");
    setPlayerTile(state, 3, 3);

    const first = plantAtPlayer(state);
    if (!first.ok) throw new Error(first.reason);
    expect(first.cultivar.type.name).toBe("Radish");
    expect([first.cultivar.originX, first.cultivar.originY]).toEqual([3, 3]);
    expect([...state.progression.seeds]).toEqual([["Lettuce", 1]]);

    const second = plantAtPlayer(state);
    if (!second.ok) throw new Error(second.reason);
    expect(second.cultivar.type.name).toBe("Lettuce");
    expect(Math.max(Math.abs(second.cultivar.originX - 3), Math.abs(second.cultivar.originY - 3))).toBe(1);

    expect(plantAtPlayer(state)).toEqual({ ok: false, code: "noSeeds", reason: "No seeds in inventory!" });
    expect(state.advisory?.message).toBe("No seeds in inventory!");
  });

  it("keeps the seed when there is no room in range", () => {
    const state = farmState();
    buy(state, "Radish");
    // Start tile is in the sell area, which can't be planted.
    expect(plantAtPlayer(state)).toEqual({
      ok: false,
      code: "noPlantingSpot",
      reason: "Not enough space to place that seed here",
    });
    expect(state.progression.seeds.get("Radish")).toBe(1);
  });

  it("harvests ripe cultivars into the item inventory", () => {
    const state = farmState();
    buy(state, "Radish");
    buy(state, "Lettuce");
    setPlayerTile(state, 3, 3);
    plantAtPlayer(state);
    plantAtPlayer(state);

    expect(harvestAtPlayer(state)).toEqual({
      ok: false,
      code: "nothingHarvestable",
      reason: "Nothing ready to harvest in range",
    });

    step(state, 10);
    state.progression.tools.shovel = 1;
    const result = harvestAtPlayer(state);
    if (!result.ok) throw new Error(result.reason);
    expect(result.harvested).toHaveLength(2);
    expect(state.progression.items.get("Radish")).toBe(1);
    expect(state.progression.items.get("Lettuce")).toBe(1);
    expect(state.field.cultivars.size).toBe(0);
    expect(state.field.tiles.size).toBe(0);
  });
});

describe("selling", () => {
  function stocked(): GameState {
    const state = farmState(0);
    state.progression.items.set("Radish", 2);
    state.progression.items.set("Lettuce", 1);
    return state;
  }

  it("only sells inside the sell area", () => {
    const state = stocked();
    setPlayerTile(state, 3, 3);
    expect(sell(state, "Radish")).toEqual({ ok: false, code: "notInSellArea", reason: "Go to the market to sell" });
    expect(sellAll(state)).toMatchObject({ ok: false, code: "notInSellArea" });
    expect(state.progression.items.get("Radish")).toBe(2);
  });

  it("sells held items at their table value", () => {
    const state = stocked();
    expect(sell(state, "Radish")).toEqual({ ok: true, earned: 1.01 });
    expect(state.progression.money).toBe(1.01);
    expect(state.progression.items.get("Radish")).toBe(1);

    expect(sell(state, "Radish", 2)).toEqual({ ok: false, code: "insufficientItems", reason: "Not enough Radish to sell" });
    expect(sell(state, "Radish", 0)).toEqual({ ok: false, code: "invalidQuantity", reason: "Cannot sell 0 of Radish" });
    expect(sell(state, "Iron Hoe")).toEqual({ ok: false, code: "unknownItem", reason: '"Iron Hoe" can\'t be sold' });
  });

  it("sells everything at once", () => {
    const state = stocked();
    const result = sellAll(state);
    if (!result.ok) throw new Error(result.reason);
    expect(result.earned).toBeCloseTo(2 * 1.01 + 2.06, 9);
    expect(state.progression.items.size).toBe(0);
    expect(sellAll(state)).toEqual({ ok: true, earned: 0 });
  });
});
