import { TERRAIN_TUNING } from "./constants";
import type { MapConfig, TileGrid, TileKind } from "./types";

function terrainNoise(x: number, y: number): number {
  const t = TERRAIN_TUNING;
  return (Math.sin(x * t.freqX) + Math.cos(y * t.freqY) + Math.sin(x * t.freqDiagonal + y * t.freqDiagonal)) / 3;
}

function kindFromNoise(n: number): TileKind {
  if (n < TERRAIN_TUNING.waterBelow) return "water";
  if (n < TERRAIN_TUNING.soilBelow) return "soil";
  if (n < TERRAIN_TUNING.grassBelow) return "grass";
  return "stone";
}

export function generateTileKind(map: MapConfig, x: number, y: number): TileKind {
  const border = map.waterBorder;
  if (x < border || x >= map.width - border || y < border || y >= map.height - border) return "water";

  const cx = Math.floor(map.width / 2);
  const cy = Math.floor(map.height / 2);
  if (Math.abs(x - cx) <= map.sellAreaHalfSize && Math.abs(y - cy) <= map.sellAreaHalfSize) return "sellArea";

  return kindFromNoise(terrainNoise(x, y));
}

export function createTileGrid(map: MapConfig): TileGrid {
  const tiles: TileKind[] = new Array(map.width * map.height);
  for (let y = 0; y < map.height; y++) {
    for (let x = 0; x < map.width; x++) {
      tiles[tileIndex(map.width, x, y)] = generateTileKind(map, x, y);
    }
  }
  return { width: map.width, height: map.height, tiles };
}

export function tileIndex(width: number, x: number, y: number): number {
  return y * width + x;
}

export function inBounds(grid: TileGrid, x: number, y: number): boolean {
  return x >= 0 && y >= 0 && x < grid.width && y < grid.height;
}

export function tileKindAt(grid: TileGrid, x: number, y: number): TileKind | null {
  if (!inBounds(grid, x, y)) return null;
  return grid.tiles[tileIndex(grid.width, x, y)];
}

export function isWalkable(grid: TileGrid, x: number, y: number): boolean {
  const kind = tileKindAt(grid, x, y);
  return kind !== null && kind !== "water";
}

export function isTillable(grid: TileGrid, x: number, y: number): boolean {
  const kind = tileKindAt(grid, x, y);
  return kind === "soil" || kind === "grass";
}

export function isSellArea(grid: TileGrid, x: number, y: number): boolean {
  return tileKindAt(grid, x, y) === "sellArea";
}
