import type { Rng } from "./rng";

export type TileKind = "water" | "soil" | "grass" | "stone" | "sellArea";

export type TileGrid = {
  width: number;
  height: number;
  tiles: TileKind[];
};

export type Rgb = [number, number, number];

export type FootprintShape = "rect" | "circle" | "star" | "curved";

export type Footprint = {
  width: number;
  height: number;
  shape: FootprintShape;
};

export type TilePos = { x: number; y: number };

export type SeedTier = "common" | "rare" | "mythic" | "legendary";
export type CatalogTier = SeedTier | "tool";

export type ToolKind = "fertilizer" | "hoe" | "shovel";
export type ToolLevel = 0 | 1 | 2 | 3;

export type PlantType = {
  kind: "seed";
  name: string;
  tier: SeedTier;
  seedCost: number;
  sellValue: number;
  growthSeconds: number;
  color: Rgb;
  fruitColor: Rgb;
  footprint: Footprint;
};

export type ToolDef = {
  kind: "tool";
  name: string;
  tier: "tool";
  tool: ToolKind;
  level: Exclude<ToolLevel, 0>;
  cost: number;
  color: Rgb;
};

export type CatalogItem = PlantType | ToolDef;

export type CatalogCategory = {
  tier: CatalogTier;
  label: string;
  itemNames: string[];
};

export type Catalog = {
  items: ReadonlyMap<string, CatalogItem>;
  categories: CatalogCategory[];
  // cost -> sell value, as loaded from the table
  sellTable: ReadonlyMap<number, number>;
};

export type MapConfig = {
  width: number;
  height: number;
  waterBorder: number;
  sellAreaHalfSize: number;
};

export type SimConfig = Readonly<{
  catalog: Catalog;
  map: Readonly<MapConfig>;
  startingMoney: number;
}>;

export type GrowthStage = "seed" | "sprout" | "young" | "mature" | "harvestable";

export type CultivarId = number;

export type Cultivar = {
  id: CultivarId;
  type: PlantType;
  originX: number;
  originY: number;
  remainingSeconds: number;
  stage: GrowthStage;
  harvestable: boolean;
  plantedAt: number; // sim clock seconds
};

export type FieldIndex = {
  nextId: CultivarId;
  cultivars: Map<CultivarId, Cultivar>;
  // tile index (y * width + x) -> owning cultivar
  tiles: Map<number, CultivarId>;
};

export type ProgressionState = {
  money: number;
  seeds: Map<string, number>;
  items: Map<string, number>;
  tools: Record<ToolKind, ToolLevel>;
};

export type WeatherMode = "sunny" | "cloudy" | "rainy" | "snowing";

export type EnvironmentState = {
  weather: WeatherMode;
  weatherTimer: number;
  specialRemaining: number;
  timeOfDay: number; // 0 = midnight, 0.5 = noon
};

export type PlayerState = {
  // pixels
  x: number;
  y: number;
};

export type Advisory = {
  message: string;
  remainingSeconds: number;
};

export type GameState = {
  config: SimConfig;
  clockSeconds: number;
  grid: TileGrid;
  field: FieldIndex;
  player: PlayerState;
  progression: ProgressionState;
  environment: EnvironmentState;
  advisory: Advisory | null;
  rngSeed: number;
  rng: Rng;
};

export type FailureCode =
  | "unknownItem"
  | "invalidQuantity"
  | "insufficientFunds"
  | "tierOutOfOrder"
  | "insufficientItems"
  | "notInSellArea"
  | "noSeeds"
  | "noPlantingSpot"
  | "nothingHarvestable";

export type ActionFailure = { ok: false; code: FailureCode; reason: string };

export type ActionResult<T extends object = object> = ({ ok: true } & T) | ActionFailure;

export type StepReport = {
  dt: number;
  weather: WeatherMode;
  weatherChanged: boolean;
  timeOfDay: number;
  // cultivars that reached harvestable during this step
  ripened: CultivarId[];
};
