import { cellKey, sameCell, type CellPosition } from '../maze/coordinates';
import type { Grid } from '../maze/Grid';
import { SearchStrategy, Solver, type SearchResult } from './Solver';

type Frame = { cell: CellPosition; next: CellPosition[] };

/**
 * Depth-first search with an explicit stack. The stack itself is the path:
 * dead ends are popped (backtracking) and the visited set stops cycles.
 * The result is some path to the goal, not necessarily the shortest.
 */
export class DfsSolver extends Solver {
  readonly strategy = SearchStrategy.DFS;

  protected search(grid: Grid, start: CellPosition, goal: CellPosition): SearchResult {
    const visited = new Set<string>([cellKey(start)]);
    const stack: Frame[] = [{ cell: start, next: grid.neighbors(start) }];

    while (stack.length) {
      const top = stack[stack.length - 1];
      const candidate = top.next.shift();

      if (!candidate) {
        stack.pop(); // dead end
        continue;
      }

      const key = cellKey(candidate);
      if (visited.has(key)) continue;
      visited.add(key);

      if (sameCell(candidate, goal)) {
        return { path: [...stack.map((f) => f.cell), candidate], visited };
      }
      stack.push({ cell: candidate, next: grid.neighbors(candidate) });
    }

    return { path: null, visited };
  }
}
