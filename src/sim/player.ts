import { PLAYER_TUNING, TILE_SIZE } from "./constants";
import { isSellArea, isWalkable } from "./grid";
import type { GameState, MapConfig, PlayerState, TilePos } from "./types";

export type MoveIntent = {
  dx: -1 | 0 | 1;
  dy: -1 | 0 | 1;
  sprint: boolean;
};

function clamp(v: number, lo: number, hi: number): number {
  return Math.max(lo, Math.min(hi, v));
}

export function createPlayer(map: MapConfig): PlayerState {
  // Map center, which is inside the sell area.
  return { x: Math.floor((TILE_SIZE * map.width) / 2), y: Math.floor((TILE_SIZE * map.height) / 2) };
}

export function playerTile(state: GameState): TilePos {
  return { x: Math.floor(state.player.x / TILE_SIZE), y: Math.floor(state.player.y / TILE_SIZE) };
}

export function isPlayerInSellArea(state: GameState): boolean {
  const { x, y } = playerTile(state);
  return isSellArea(state.grid, x, y);
}

/**
 * Moves the player for `dt` seconds. The whole move is rejected if it would
 * end on a tile that isn't walkable. Returns whether the player moved.
 */
export function movePlayer(state: GameState, intent: MoveIntent, dt: number): boolean {
  if (dt <= 0 || (intent.dx === 0 && intent.dy === 0)) return false;

  const speed = PLAYER_TUNING.speed * (intent.sprint ? PLAYER_TUNING.sprintMult : 1);
  const maxX = state.grid.width * TILE_SIZE - TILE_SIZE;
  const maxY = state.grid.height * TILE_SIZE - TILE_SIZE;
  const nextX = clamp(state.player.x + intent.dx * speed * dt, 0, maxX);
  const nextY = clamp(state.player.y + intent.dy * speed * dt, 0, maxY);

  if (!isWalkable(state.grid, Math.floor(nextX / TILE_SIZE), Math.floor(nextY / TILE_SIZE))) return false;
  if (nextX === state.player.x && nextY === state.player.y) return false;

  state.player.x = nextX;
  state.player.y = nextY;
  return true;
}

export function setPlayerTile(state: GameState, x: number, y: number): void {
  state.player.x = x * TILE_SIZE;
  state.player.y = y * TILE_SIZE;
}
