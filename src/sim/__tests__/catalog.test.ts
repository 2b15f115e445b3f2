import { describe, expect, it } from "vitest";

import { buildCatalog, buildSellTable, CatalogError, categoryItems, getPlantType, getTool, loadDefaultCatalog, sellValueFor } from "../catalog";
import type { Footprint, SeedTier } from "../types";

const SMALL_TABLE = { costs: [1, 2, 10], values: [5, 10, 40] };

function toolEntries() {
  return (["fertilizer", "hoe", "shovel"] as const).flatMap((tool) =>
    ([1, 2, 3] as const).map((level) => ({ name: `${tool} ${level}`, tool, level, cost: 100 * level, color: [1, 2, 3] })),
  );
}

function catalogWith(seeds: object[], tools: object[] = toolEntries()) {
  return { seeds, tools };
}

describe("sell-value table", () => {
  it("resolves duplicated costs to the later value", () => {
    const table = buildSellTable({ costs: [1, 500, 500], values: [1.01, 1080, 1090] });
    expect(table.get(500)).toBe(1090);
    expect(table.size).toBe(2);
  });

  it("rejects tables whose columns differ in length", () => {
    expect(() => buildSellTable({ costs: [1, 2], values: [1] })).toThrow(CatalogError);
  });

  it("fails fast on costs it doesn't list", () => {
    const table = buildSellTable(SMALL_TABLE);
    expect(sellValueFor(table, 2)).toBe(10);
    expect(() => sellValueFor(table, 7)).toThrow(CatalogError);
  });
});

describe("loadDefaultCatalog", () => {
  const catalog = loadDefaultCatalog();

  it("groups items into shop categories", () => {
    expect(catalog.categories.map((c) => [c.tier, c.itemNames.length])).toEqual([
      ["common", 30],
      ["rare", 19],
      ["mythic", 20],
      ["legendary", 5],
      ["tool", 9],
    ]);
    expect(catalog.categories[0].label).toBe("COMMON SEEDS");
    expect(catalog.items.size).toBe(83);
    expect(categoryItems(catalog, "legendary").map((i) => i.name)).toEqual([
      "World Tree Sapling",
      "Universe Heart",
      "Infinity Garden",
      "Creation Essence",
      "Omnipotent Bloom",
    ]);
  });

  it("derives sell values from the table", () => {
    expect(getPlantType(catalog, "Radish")?.sellValue).toBe(1.01);
    expect(getPlantType(catalog, "Carrot")?.sellValue).toBe(26);
    expect(getPlantType(catalog, "Banana Tree")?.sellValue).toBe(1090);
    expect(getPlantType(catalog, "Dragon Fruit")?.sellValue).toBe(1090);
    expect(getPlantType(catalog, "Space Fruit")?.sellValue).toBe(14750);
    expect(getPlantType(catalog, "Eternal Fruit")?.sellValue).toBe(14750);
    expect(getPlantType(catalog, "Omnipotent Bloom")?.sellValue).toBe(12_000_000_000);
  });

  it("fills in defaults for common seeds", () => {
    const radish = getPlantType(catalog, "Radish");
    expect(radish?.footprint).toEqual({ width: 1, height: 1, shape: "rect" });
    expect(radish?.fruitColor).toEqual(radish?.color);
    expect(getPlantType(catalog, "Tomato")?.fruitColor).toEqual([255, 50, 50]);
  });

  it("keeps footprints within each tier's size pool", () => {
    const pools: Record<SeedTier, string[]> = {
      common: ["1x1"],
      rare: ["3x3", "2x1", "3x2", "3x1"],
      mythic: ["1x1", "2x1", "1x2", "2x2", "3x1", "1x3", "3x3", "4x3", "3x4"],
      legendary: ["4x4"],
    };
    for (const item of catalog.items.values()) {
      if (item.kind !== "seed") continue;
      const size = `${item.footprint.width}x${item.footprint.height}`;
      expect(pools[item.tier]).toContain(size);
      if (item.footprint.shape === "star") expect(size).toBe("3x3");
    }
  });

  it("indexes tools by kind and level", () => {
    expect(getTool(catalog, "hoe", 1)?.name).toBe("Iron Hoe");
    expect(getTool(catalog, "fertilizer", 3)?.cost).toBe(2_500_000);
    expect(getTool(catalog, "shovel", 2)?.cost).toBe(100_000);
    expect(getTool(catalog, "shovel", 0)).toBeNull();
    expect(getPlantType(catalog, "Iron Hoe")).toBeNull();
  });
});

describe("buildCatalog", () => {
  const seed = (name: string, seedCost: number, footprint?: Footprint) => ({
    name,
    tier: "rare",
    seedCost,
    growthSeconds: 60,
    color: [10, 20, 30],
    ...(footprint ? { footprint } : {}),
  });

  it("builds from well-formed data", () => {
    const catalog = buildCatalog(catalogWith([seed("A", 1), seed("B", 2)]), SMALL_TABLE);
    expect(getPlantType(catalog, "A")?.sellValue).toBe(5);
    expect(getPlantType(catalog, "B")?.sellValue).toBe(10);
  });

  it("refuses a seed cost missing from the sell table", () => {
    try {
      buildCatalog(catalogWith([seed("A", 1), seed("Odd", 7)]), SMALL_TABLE);
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(CatalogError);
      expect(err instanceof CatalogError ? err.itemName : null).toBe("Odd");
    }
  });

  it("refuses star footprints on anything but a 3x3 box", () => {
    expect(() => buildCatalog(catalogWith([seed("S", 1, { width: 3, height: 2, shape: "star" })]), SMALL_TABLE)).toThrow(
      /star footprint needs a 3x3 box/,
    );
    expect(() => buildCatalog(catalogWith([seed("S", 1, { width: 3, height: 3, shape: "star" })]), SMALL_TABLE)).not.toThrow();
  });

  it("refuses duplicate names", () => {
    expect(() => buildCatalog(catalogWith([seed("A", 1), seed("A", 2)]), SMALL_TABLE)).toThrow(/duplicate item name/);
  });

  it("reports schema violations as configuration errors", () => {
    expect(() => buildCatalog(catalogWith([seed("A", -1)]), SMALL_TABLE)).toThrow(CatalogError);
    expect(() => buildCatalog({ seeds: "nope", tools: [] }, SMALL_TABLE)).toThrow(/catalog\.json/);
  });

  it("requires every tool to have all three tiers", () => {
    const tools = toolEntries().filter((t) => !(t.tool === "hoe" && t.level === 2));
    expect(() => buildCatalog(catalogWith([seed("A", 1)], tools), SMALL_TABLE)).toThrow(/hoe needs levels 1, 2 and 3/);
  });
});
