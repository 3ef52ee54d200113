import { describe, it, expect } from 'vitest';
import { findGoal } from './findGoal';
import { Grid } from './Grid';

function openGrid(rows: number, cols: number): number[][] {
  return Array.from({ length: rows }, () => new Array<number>(cols).fill(0));
}

describe('findGoal', () => {
  it('finds the single goal marker', () => {
    const cells = openGrid(4, 7);
    cells[2][5] = 3;
    expect(findGoal(new Grid(cells))).toEqual({ row: 2, col: 5 });
  });

  it('returns null when there is no marker', () => {
    const cells = openGrid(3, 3);
    cells[1][1] = 1;
    expect(findGoal(new Grid(cells))).toBeNull();
  });

  it('prefers the first marker in row-major order', () => {
    const cells = openGrid(4, 5);
    cells[3][0] = 3;
    cells[1][4] = 3;
    expect(findGoal(new Grid(cells))).toEqual({ row: 1, col: 4 });
  });
});
