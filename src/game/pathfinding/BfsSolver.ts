import { cellKey, sameCell, type CellPosition } from '../maze/coordinates';
import type { Grid } from '../maze/Grid';
import { SearchStrategy, Solver, reconstructPath, type SearchResult } from './Solver';

/** Breadth-first search; the returned path has the fewest possible steps. */
export class BfsSolver extends Solver {
  readonly strategy = SearchStrategy.BFS;

  protected search(grid: Grid, start: CellPosition, goal: CellPosition): SearchResult {
    const visited = new Set<string>([cellKey(start)]);
    const parents = new Map<string, CellPosition>();
    const queue: CellPosition[] = [start];

    for (let head = 0; head < queue.length; head++) {
      const current = queue[head];
      if (sameCell(current, goal)) {
        return { path: reconstructPath(parents, current), visited };
      }

      for (const next of grid.neighbors(current)) {
        const key = cellKey(next);
        if (visited.has(key)) continue;
        visited.add(key);
        parents.set(key, current);
        queue.push(next);
      }
    }

    return { path: null, visited };
  }
}
