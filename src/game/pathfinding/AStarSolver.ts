import { manhattan, type CellPosition, type Path } from '../maze/coordinates';
import { findGoal } from '../maze/findGoal';
import type { Grid } from '../maze/Grid';
import { DijkstraSolver, type DijkstraOptions } from './DijkstraSolver';
import { SearchStrategy } from './Solver';

export type Heuristic = (cell: CellPosition, goal: CellPosition) => number;

// Both are admissible with unit-cost 4-directional moves.
export const HEURISTICS = {
  manhattan: manhattan,
  euclidean: (a: CellPosition, b: CellPosition) => Math.hypot(a.row - b.row, a.col - b.col),
} satisfies Record<string, Heuristic>;

export type HeuristicName = keyof typeof HEURISTICS;

export interface AStarOptions extends DijkstraOptions {
  heuristic?: HeuristicName;
}

/** Dijkstra ordered by `cost + heuristic(cell, goal)`. */
export class AStarSolver extends DijkstraSolver {
  readonly strategy: SearchStrategy = SearchStrategy.AStar;
  readonly heuristicName: HeuristicName;
  private readonly heuristic: Heuristic;

  constructor(opts: AStarOptions = {}) {
    super(opts);
    this.heuristicName = opts.heuristic ?? 'manhattan';
    this.heuristic = HEURISTICS[this.heuristicName];
  }

  /** Goal lookup, so callers can pair it with the heuristic in one place. */
  findGoal(grid: Grid): CellPosition | null {
    return findGoal(grid);
  }

  /** Looks the goal up first; null when the grid has none or it is unreachable. */
  solveToGoal(grid: Grid, start: CellPosition): Path | null {
    const goal = this.findGoal(grid);
    if (!goal) return null;
    return this.solve(grid, start, goal);
  }

  protected estimate(cell: CellPosition, goal: CellPosition): number {
    return this.heuristic(cell, goal);
  }
}
