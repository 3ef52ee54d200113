import { CellCode } from '../config';
import type { CellPosition } from './coordinates';
import type { Grid } from './Grid';

/**
 * Row-major scan for the goal marker. With several markers the
 * lexicographically smallest (row, col) wins. Not cached.
 */
export function findGoal(grid: Grid): CellPosition | null {
  for (let row = 0; row < grid.rows; row++) {
    for (let col = 0; col < grid.cols; col++) {
      if (grid.cellAt({ row, col }) === CellCode.Goal) return { row, col };
    }
  }
  return null;
}
