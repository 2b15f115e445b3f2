import type { Footprint, TilePos } from "./types";

// Offsets inside a 3x3 box. The catalog rejects star footprints of any other size.
const STAR_OFFSETS: ReadonlyArray<[number, number]> = [
  [1, 0],
  [0, 1],
  [2, 1],
  [0, 2],
  [2, 2],
  [1, 1],
  [1, 2],
];

/**
 * Tiles covered by a footprint whose bounding box starts at (ox, oy).
 *
 * Circle footprints are centered on `(ox + floor(w/2), oy + floor(h/2))` with
 * radius `floor(min(w, h) / 2)`, so an even-sized circle reaches one tile past
 * its box on the right and bottom.
 */
export function occupiedTiles(footprint: Footprint, ox: number, oy: number): TilePos[] {
  const { width: w, height: h } = footprint;
  const tiles: TilePos[] = [];

  switch (footprint.shape) {
    case "rect":
      for (let dy = 0; dy < h; dy++) {
        for (let dx = 0; dx < w; dx++) tiles.push({ x: ox + dx, y: oy + dy });
      }
      break;
    case "circle": {
      const cx = ox + Math.floor(w / 2);
      const cy = oy + Math.floor(h / 2);
      const r = Math.floor(Math.min(w, h) / 2);
      for (let dy = -r; dy <= r; dy++) {
        for (let dx = -r; dx <= r; dx++) {
          if (dx * dx + dy * dy <= r * r) tiles.push({ x: cx + dx, y: cy + dy });
        }
      }
      break;
    }
    case "star":
      for (const [dx, dy] of STAR_OFFSETS) tiles.push({ x: ox + dx, y: oy + dy });
      break;
    case "curved":
      for (let dy = 0; dy < h; dy++) {
        for (let dx = 0; dx < w; dx++) {
          const cornerX = dx === 0 || dx === w - 1;
          const cornerY = dy === 0 || dy === h - 1;
          if (cornerX && cornerY) continue;
          tiles.push({ x: ox + dx, y: oy + dy });
        }
      }
      break;
  }

  return tiles;
}
