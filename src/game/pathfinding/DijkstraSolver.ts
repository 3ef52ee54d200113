import { cellKey, sameCell, type CellPosition } from '../maze/coordinates';
import type { Grid } from '../maze/Grid';
import { MinHeap } from './MinHeap';
import { SearchStrategy, Solver, reconstructPath, type SearchResult } from './Solver';

/** Cost of stepping into `cell`. Must be positive. */
export type CellCostFn = (cell: CellPosition, grid: Grid) => number;

export const UNIT_COST: CellCostFn = () => 1;

type FrontierEntry = { cell: CellPosition; cost: number; priority: number };

export interface DijkstraOptions {
  costOf?: CellCostFn;
}

/**
 * Cheapest-first search keyed by accumulated cost. On the uniform grid it
 * finds the same step count as BFS; `costOf` is the hook for per-cell costs.
 */
export class DijkstraSolver extends Solver {
  readonly strategy: SearchStrategy = SearchStrategy.Dijkstra;
  protected readonly costOf: CellCostFn;

  constructor(opts: DijkstraOptions = {}) {
    super();
    this.costOf = opts.costOf ?? UNIT_COST;
  }

  /** Extra priority on top of the accumulated cost; zero for plain Dijkstra. */
  protected estimate(_cell: CellPosition, _goal: CellPosition): number {
    return 0;
  }

  protected search(grid: Grid, start: CellPosition, goal: CellPosition): SearchResult {
    const best = new Map<string, number>([[cellKey(start), 0]]);
    const parents = new Map<string, CellPosition>();
    const closed = new Set<string>();
    const frontier = new MinHeap<FrontierEntry>((a, b) => a.priority - b.priority || b.cost - a.cost);

    frontier.push({ cell: start, cost: 0, priority: this.estimate(start, goal) });

    for (let entry = frontier.pop(); entry; entry = frontier.pop()) {
      const key = cellKey(entry.cell);
      if (closed.has(key)) continue; // stale entry
      closed.add(key);

      if (sameCell(entry.cell, goal)) {
        return { path: reconstructPath(parents, entry.cell), visited: closed };
      }

      for (const next of grid.neighbors(entry.cell)) {
        const nextKey = cellKey(next);
        if (closed.has(nextKey)) continue;

        const cost = entry.cost + this.costOf(next, grid);
        const known = best.get(nextKey);
        if (known !== undefined && known <= cost) continue;

        best.set(nextKey, cost);
        parents.set(nextKey, entry.cell);
        frontier.push({ cell: next, cost, priority: cost + this.estimate(next, goal) });
      }
    }

    return { path: null, visited: closed };
  }
}
