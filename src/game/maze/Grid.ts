import { CellCode, TILE_SIZE } from '../config';
import { DIRS, DIRECTION_VECTORS } from '../entities/common/direction';
import type { CellPosition } from './coordinates';

/**
 * Read-only view over a level's cell-code matrix.
 *
 * The matrix must be rectangular; anything outside `[0,rows) x [0,cols)` is
 * out of bounds and never walkable.
 */
export class Grid {
  private readonly cells: readonly (readonly number[])[];
  readonly rows: number;
  readonly cols: number;

  constructor(cells: readonly (readonly number[])[], readonly tileSize: number = TILE_SIZE) {
    if (cells.length === 0) {
      throw new Error('Grid must have at least one row.');
    }
    const cols = cells[0].length;
    if (cols === 0) {
      throw new Error('Grid rows must not be empty.');
    }
    cells.forEach((row, i) => {
      if (row.length !== cols) {
        throw new Error(`Row ${i} has ${row.length} cells, expected ${cols}`);
      }
    });

    this.cells = cells.map((row) => [...row]);
    this.rows = cells.length;
    this.cols = cols;
  }

  get widthPx(): number { return this.cols * this.tileSize; }
  get heightPx(): number { return this.rows * this.tileSize; }

  inBounds(cell: CellPosition): boolean {
    return cell.row >= 0 && cell.row < this.rows && cell.col >= 0 && cell.col < this.cols;
  }

  /** Cell code, or undefined when out of bounds. */
  cellAt(cell: CellPosition): number | undefined {
    if (!this.inBounds(cell)) return undefined;
    return this.cells[cell.row][cell.col];
  }

  isWalkable(cell: CellPosition): boolean {
    const code = this.cellAt(cell);
    return code !== undefined && code !== CellCode.Wall;
  }

  /** Walkable 4-neighbours, in search order. */
  neighbors(cell: CellPosition): CellPosition[] {
    const out: CellPosition[] = [];
    for (const d of DIRS) {
      const v = DIRECTION_VECTORS[d];
      const next = { row: cell.row + v.y, col: cell.col + v.x };
      if (this.isWalkable(next)) out.push(next);
    }
    return out;
  }

  forEachCell(fn: (code: number, cell: CellPosition) => void): void {
    for (let row = 0; row < this.rows; row++) {
      for (let col = 0; col < this.cols; col++) {
        fn(this.cells[row][col], { row, col });
      }
    }
  }
}
