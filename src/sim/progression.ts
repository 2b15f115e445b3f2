import { FERTILIZER_GROWTH_MULT, HOE_PLANTING_RANGE, MAX_TOOL_LEVEL, SHOVEL_HARVEST_RANGE } from "./constants";
import type { ActionFailure, ActionResult, Catalog, PlantType, ProgressionState, ToolDef, ToolKind, ToolLevel } from "./types";

export function createProgression(startingMoney: number): ProgressionState {
  return {
    money: startingMoney,
    seeds: new Map(),
    items: new Map(),
    tools: { fertilizer: 0, hoe: 0, shovel: 0 },
  };
}

export function fail(code: ActionFailure["code"], reason: string): ActionFailure {
  return { ok: false, code, reason };
}

function formatMoney(amount: number): string {
  return `$${amount.toLocaleString("en-US", { minimumFractionDigits: 2, maximumFractionDigits: 2 })}`;
}

// ============================================================================
// Counted inventories (insertion-ordered; entries vanish at zero)
// ============================================================================

export function addCount(counts: Map<string, number>, name: string, quantity: number): void {
  counts.set(name, (counts.get(name) ?? 0) + quantity);
}

export function takeCount(counts: Map<string, number>, name: string, quantity: number): boolean {
  const have = counts.get(name) ?? 0;
  if (have < quantity) return false;
  if (have === quantity) counts.delete(name);
  else counts.set(name, have - quantity);
  return true;
}

// First seed in insertion order with a positive count.
export function firstAvailableSeed(progression: ProgressionState): string | null {
  for (const [name, qty] of progression.seeds) {
    if (qty > 0) return name;
  }
  return null;
}

// ============================================================================
// Tool tiers
// ============================================================================

export function fertilizerMultiplier(progression: ProgressionState): number {
  return FERTILIZER_GROWTH_MULT[progression.tools.fertilizer];
}

export function plantingRange(progression: ProgressionState): number {
  return HOE_PLANTING_RANGE[progression.tools.hoe];
}

export function harvestRange(progression: ProgressionState): number {
  return SHOVEL_HARVEST_RANGE[progression.tools.shovel];
}

export function nextToolLevel(progression: ProgressionState, kind: ToolKind): ToolLevel | null {
  const current = progression.tools[kind];
  if (current >= MAX_TOOL_LEVEL) return null;
  return current === 0 ? 1 : current === 1 ? 2 : 3;
}

// ============================================================================
// Transactions (no state changes on failure)
// ============================================================================

export function purchaseSeeds(
  progression: ProgressionState,
  plant: PlantType,
  quantity: number,
): ActionResult<{ spent: number }> {
  if (!Number.isInteger(quantity) || quantity <= 0) {
    return fail("invalidQuantity", `Cannot buy ${quantity} of ${plant.name}`);
  }
  const cost = plant.seedCost * quantity;
  if (progression.money < cost) {
    return fail("insufficientFunds", `Not enough money! Need ${formatMoney(cost)}`);
  }
  progression.money -= cost;
  addCount(progression.seeds, plant.name, quantity);
  return { ok: true, spent: cost };
}

export function purchaseTool(progression: ProgressionState, tool: ToolDef): ActionResult<{ spent: number }> {
  const current = progression.tools[tool.tool];
  if (current >= tool.level) {
    return fail("tierOutOfOrder", `You already own ${tool.name} or better`);
  }
  if (current !== tool.level - 1) {
    return fail("tierOutOfOrder", `Buy the previous ${tool.tool} tier before ${tool.name}`);
  }
  if (progression.money < tool.cost) {
    return fail("insufficientFunds", `Not enough money! Need ${formatMoney(tool.cost)}`);
  }
  progression.money -= tool.cost;
  progression.tools[tool.tool] = tool.level;
  return { ok: true, spent: tool.cost };
}

export function sellItems(
  progression: ProgressionState,
  plant: PlantType,
  quantity: number,
): ActionResult<{ earned: number }> {
  if (!Number.isInteger(quantity) || quantity <= 0) {
    return fail("invalidQuantity", `Cannot sell ${quantity} of ${plant.name}`);
  }
  if (!takeCount(progression.items, plant.name, quantity)) {
    return fail("insufficientItems", `Not enough ${plant.name} to sell`);
  }
  const earned = plant.sellValue * quantity;
  progression.money += earned;
  return { ok: true, earned };
}

/**
 * Sells every held item with a known sell value. Works from a snapshot of
 * the holdings, so the map can be mutated while selling.
 */
export function sellAllItems(progression: ProgressionState, catalog: Catalog): number {
  let earned = 0;
  const holdings = [...progression.items.entries()];
  for (const [name, qty] of holdings) {
    const item = catalog.items.get(name);
    if (item?.kind !== "seed") continue;
    const value = item.sellValue * qty;
    earned += value;
    progression.money += value;
    progression.items.delete(name);
  }
  return earned;
}
