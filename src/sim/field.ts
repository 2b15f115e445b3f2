import { createCultivar, occupiedTilesOf } from "./cultivar";
import { occupiedTiles } from "./footprint";
import { inBounds, isTillable, tileIndex } from "./grid";
import { rngShuffle, type Rng } from "./rng";
import type { Cultivar, CultivarId, FieldIndex, Footprint, PlantType, TileGrid, TilePos } from "./types";

export function createFieldIndex(): FieldIndex {
  return { nextId: 1, cultivars: new Map(), tiles: new Map() };
}

export function liveCultivars(field: FieldIndex): Cultivar[] {
  return [...field.cultivars.values()];
}

export function cultivarAt(grid: TileGrid, field: FieldIndex, x: number, y: number): Cultivar | null {
  if (!inBounds(grid, x, y)) return null;
  const id = field.tiles.get(tileIndex(grid.width, x, y));
  if (id === undefined) return null;
  return field.cultivars.get(id) ?? null;
}

export function canPlaceFootprint(grid: TileGrid, field: FieldIndex, footprint: Footprint, ox: number, oy: number): boolean {
  for (const t of occupiedTiles(footprint, ox, oy)) {
    if (!isTillable(grid, t.x, t.y)) return false; // also false out of bounds
    if (field.tiles.has(tileIndex(grid.width, t.x, t.y))) return false;
  }
  return true;
}

// Cells at exactly Chebyshev distance `radius` from (x, y).
export function ringCandidates(x: number, y: number, radius: number): TilePos[] {
  if (radius <= 0) return [{ x, y }];
  const ring: TilePos[] = [];
  for (let dx = -radius; dx <= radius; dx++) {
    for (let dy = -radius; dy <= radius; dy++) {
      if (Math.abs(dx) === radius || Math.abs(dy) === radius) ring.push({ x: x + dx, y: y + dy });
    }
  }
  return ring;
}

/**
 * Nearest origin (by expanding square rings) where the footprint fits.
 * Each ring is shuffled so no direction is preferred.
 */
export function findPlantingSpot(
  grid: TileGrid,
  field: FieldIndex,
  rng: Rng,
  x: number,
  y: number,
  footprint: Footprint,
  maxRadius: number,
): TilePos | null {
  for (let radius = 0; radius <= maxRadius; radius++) {
    const ring = rngShuffle(rng, ringCandidates(x, y, radius));
    for (const pos of ring) {
      if (canPlaceFootprint(grid, field, footprint, pos.x, pos.y)) return pos;
    }
  }
  return null;
}

/**
 * Creates a cultivar and claims every tile of its footprint.
 * Returns null (and changes nothing) if any tile is unavailable.
 */
export function plantCultivar(
  grid: TileGrid,
  field: FieldIndex,
  type: PlantType,
  ox: number,
  oy: number,
  plantedAt: number,
): Cultivar | null {
  if (!canPlaceFootprint(grid, field, type.footprint, ox, oy)) return null;

  const cultivar = createCultivar(field.nextId, type, ox, oy, plantedAt);
  field.nextId += 1;
  field.cultivars.set(cultivar.id, cultivar);
  for (const t of occupiedTilesOf(cultivar)) {
    field.tiles.set(tileIndex(grid.width, t.x, t.y), cultivar.id);
  }
  return cultivar;
}

export function removeCultivar(grid: TileGrid, field: FieldIndex, id: CultivarId): Cultivar | null {
  const cultivar = field.cultivars.get(id);
  if (!cultivar) return null;

  for (const t of occupiedTilesOf(cultivar)) {
    const key = tileIndex(grid.width, t.x, t.y);
    const owner = field.tiles.get(key);
    if (owner === id) {
      field.tiles.delete(key);
    } else {
      // eslint-disable-next-line no-console
      console.warn("[field] footprint tile not owned by the cultivar being removed", { id, tile: t, owner });
    }
  }
  field.cultivars.delete(id);
  return cultivar;
}

/**
 * Harvests every harvestable cultivar with at least one tile inside the
 * circle of `radius` around (x, y). Whole footprints are removed; each
 * cultivar is returned once, in scan order.
 */
export function harvestInRadius(grid: TileGrid, field: FieldIndex, x: number, y: number, radius: number): Cultivar[] {
  const harvested: Cultivar[] = [];
  const r = Math.max(0, Math.floor(radius));

  for (let dy = -r; dy <= r; dy++) {
    for (let dx = -r; dx <= r; dx++) {
      if (dx * dx + dy * dy > radius * radius) continue;
      const cultivar = cultivarAt(grid, field, x + dx, y + dy);
      if (!cultivar || !cultivar.harvestable) continue;
      // Removal clears the other footprint tiles, so a later scan hit can't repeat it.
      removeCultivar(grid, field, cultivar.id);
      harvested.push(cultivar);
    }
  }

  return harvested;
}

// Index entries that disagree with the cultivars' footprints. Empty when consistent.
export function fieldIndexProblems(grid: TileGrid, field: FieldIndex): string[] {
  const problems: string[] = [];
  const expected = new Map<number, CultivarId>();

  for (const cultivar of field.cultivars.values()) {
    for (const t of occupiedTilesOf(cultivar)) {
      const key = tileIndex(grid.width, t.x, t.y);
      const other = expected.get(key);
      if (other !== undefined) problems.push(`tile ${t.x},${t.y} covered by ${other} and ${cultivar.id}`);
      expected.set(key, cultivar.id);
    }
  }

  for (const [key, id] of field.tiles) {
    if (expected.get(key) !== id) problems.push(`tile key ${key} -> ${id} has no matching footprint`);
  }
  for (const [key, id] of expected) {
    if (field.tiles.get(key) !== id) problems.push(`tile key ${key} missing for ${id}`);
  }

  return problems;
}
