import { z } from "zod";

import catalogFile from "./data/catalog.json";
import sellValuesFile from "./data/sell_values.json";
import { TIER_LABELS, TOOL_KINDS } from "./constants";
import type {
  Catalog,
  CatalogCategory,
  CatalogItem,
  CatalogTier,
  Footprint,
  PlantType,
  ToolDef,
  ToolKind,
  ToolLevel,
} from "./types";

export class CatalogError extends Error {
  readonly itemName: string | null;

  constructor(message: string, itemName: string | null = null) {
    super(message);
    this.name = "CatalogError";
    this.itemName = itemName;
  }
}

// ============================================================================
// File schemas
// ============================================================================

const ChannelSchema = z.number().int().min(0).max(255);
const RgbSchema = z.tuple([ChannelSchema, ChannelSchema, ChannelSchema]);

const FootprintSchema = z.object({
  width: z.number().int().positive(),
  height: z.number().int().positive(),
  shape: z.enum(["rect", "circle", "star", "curved"]),
});

const SeedEntrySchema = z.object({
  name: z.string().min(1),
  tier: z.enum(["common", "rare", "mythic", "legendary"]),
  seedCost: z.number().positive(),
  growthSeconds: z.number().positive(),
  color: RgbSchema,
  fruitColor: RgbSchema.optional(),
  footprint: FootprintSchema.optional(),
});

const ToolEntrySchema = z.object({
  name: z.string().min(1),
  tool: z.enum(["fertilizer", "hoe", "shovel"]),
  level: z.union([z.literal(1), z.literal(2), z.literal(3)]),
  cost: z.number().positive(),
  color: RgbSchema,
});

const CatalogFileSchema = z.object({
  seeds: z.array(SeedEntrySchema),
  tools: z.array(ToolEntrySchema),
});

const SellTableFileSchema = z
  .object({
    costs: z.array(z.number().positive()),
    values: z.array(z.number().nonnegative()),
  })
  .refine((t) => t.costs.length === t.values.length, { message: "costs and values must have the same length" });

function parseOrThrow<T>(schema: z.ZodType<T>, raw: unknown, source: string): T {
  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    const detail = parsed.error.issues.map((i) => `${i.path.join(".") || "<root>"}: ${i.message}`).join("; ");
    throw new CatalogError(`${source}: ${detail}`);
  }
  return parsed.data;
}

// ============================================================================
// Sell-value table
// ============================================================================

export function buildSellTable(raw: unknown): Map<number, number> {
  const file = parseOrThrow(SellTableFileSchema, raw, "sell_values.json");
  const table = new Map<number, number>();
  // A cost listed twice resolves to its later value.
  file.costs.forEach((cost, i) => table.set(cost, file.values[i]));
  return table;
}

export function sellValueFor(table: ReadonlyMap<number, number>, seedCost: number, itemName: string | null = null): number {
  const value = table.get(seedCost);
  if (value === undefined) {
    throw new CatalogError(`no sell value for seed cost ${seedCost}`, itemName);
  }
  return value;
}

// ============================================================================
// Catalog
// ============================================================================

const CATEGORY_ORDER: CatalogTier[] = ["common", "rare", "mythic", "legendary", "tool"];

export function buildCatalog(rawCatalog: unknown, rawSellTable: unknown): Catalog {
  const sellTable = buildSellTable(rawSellTable);
  const file = parseOrThrow(CatalogFileSchema, rawCatalog, "catalog.json");

  const items = new Map<string, CatalogItem>();
  const addItem = (item: CatalogItem): void => {
    if (items.has(item.name)) throw new CatalogError(`duplicate item name "${item.name}"`, item.name);
    items.set(item.name, item);
  };

  for (const entry of file.seeds) {
    const footprint: Footprint = entry.footprint ?? { width: 1, height: 1, shape: "rect" };
    if (footprint.shape === "star" && (footprint.width !== 3 || footprint.height !== 3)) {
      throw new CatalogError(
        `star footprint needs a 3x3 box, got ${footprint.width}x${footprint.height}`,
        entry.name,
      );
    }
    const plant: PlantType = {
      kind: "seed",
      name: entry.name,
      tier: entry.tier,
      seedCost: entry.seedCost,
      sellValue: sellValueFor(sellTable, entry.seedCost, entry.name),
      growthSeconds: entry.growthSeconds,
      color: entry.color,
      fruitColor: entry.fruitColor ?? entry.color,
      footprint,
    };
    addItem(plant);
  }

  const seenLevels: Record<ToolKind, Set<number>> = { fertilizer: new Set(), hoe: new Set(), shovel: new Set() };
  for (const entry of file.tools) {
    if (seenLevels[entry.tool].has(entry.level)) {
      throw new CatalogError(`${entry.tool} level ${entry.level} is defined twice`, entry.name);
    }
    seenLevels[entry.tool].add(entry.level);
    const tool: ToolDef = {
      kind: "tool",
      name: entry.name,
      tier: "tool",
      tool: entry.tool,
      level: entry.level,
      cost: entry.cost,
      color: entry.color,
    };
    addItem(tool);
  }
  for (const kind of TOOL_KINDS) {
    if (seenLevels[kind].size !== 3) {
      throw new CatalogError(`${kind} needs levels 1, 2 and 3 (found ${seenLevels[kind].size})`);
    }
  }

  const categories: CatalogCategory[] = CATEGORY_ORDER.map((tier) => ({
    tier,
    label: TIER_LABELS[tier],
    itemNames: [...items.values()].filter((item) => item.tier === tier).map((item) => item.name),
  }));

  return { items, categories, sellTable };
}

export function loadDefaultCatalog(): Catalog {
  return buildCatalog(catalogFile, sellValuesFile);
}

export function getPlantType(catalog: Catalog, name: string): PlantType | null {
  const item = catalog.items.get(name);
  return item?.kind === "seed" ? item : null;
}

export function getTool(catalog: Catalog, kind: ToolKind, level: ToolLevel): ToolDef | null {
  for (const item of catalog.items.values()) {
    if (item.kind === "tool" && item.tool === kind && item.level === level) return item;
  }
  return null;
}

export function categoryItems(catalog: Catalog, tier: CatalogTier): CatalogItem[] {
  const category = catalog.categories.find((c) => c.tier === tier);
  if (!category) return [];
  return category.itemNames.flatMap((name) => {
    const item = catalog.items.get(name);
    return item ? [item] : [];
  });
}
