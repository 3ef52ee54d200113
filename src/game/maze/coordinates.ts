import { TILE_SIZE } from '../config';

/** A grid cell, indexed the way the level matrix is: `[row][col]`. */
export type CellPosition = { row: number; col: number };

/** Top-left corner of a tile, in pixels. */
export type PixelPosition = { x: number; y: number };

/** Ordered cells from the start (inclusive) to the goal (inclusive). */
export type Path = CellPosition[];

export function cellToPixel(cell: CellPosition, tileSize: number = TILE_SIZE): PixelPosition {
  return { x: cell.col * tileSize, y: cell.row * tileSize };
}

export function pixelToCell(pos: PixelPosition, tileSize: number = TILE_SIZE): CellPosition {
  return { row: Math.floor(pos.y / tileSize), col: Math.floor(pos.x / tileSize) };
}

export function sameCell(a: CellPosition, b: CellPosition): boolean {
  return a.row === b.row && a.col === b.col;
}

export function manhattan(a: CellPosition, b: CellPosition): number {
  return Math.abs(a.row - b.row) + Math.abs(a.col - b.col);
}

export function cellKey(cell: CellPosition): string {
  return cell.row + ',' + cell.col;
}

export function formatCell(cell: CellPosition): string {
  return `(${cell.row},${cell.col})`;
}
