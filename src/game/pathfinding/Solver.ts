import { cellKey, sameCell, type CellPosition, type Path } from '../maze/coordinates';
import type { Grid } from '../maze/Grid';

export enum SearchStrategy {
  DFS = 'dfs',
  BFS = 'bfs',
  Dijkstra = 'dijkstra',
  AStar = 'astar',
}

export const STRATEGY_LABELS: Record<SearchStrategy, string> = {
  [SearchStrategy.DFS]: 'DFS',
  [SearchStrategy.BFS]: 'BFS',
  [SearchStrategy.Dijkstra]: 'Dijkstra',
  [SearchStrategy.AStar]: 'A*',
};

/** What a concrete search hands back to `Solver.solve`. */
export interface SearchResult {
  path: Path | null;
  visited: ReadonlySet<string>;
}

/**
 * A named search strategy. Subclasses implement `search`; `solve` handles the
 * cases every strategy treats the same way and caches the last result.
 *
 * "No path" is a normal outcome and comes back as `null`, never as a throw.
 */
export abstract class Solver {
  abstract readonly strategy: SearchStrategy;

  private _lastPath: Path = [];
  private _lastVisited: ReadonlySet<string> = new Set();

  get label(): string { return STRATEGY_LABELS[this.strategy]; }

  /** Path from the most recent successful `solve`, empty otherwise. */
  get lastPath(): Path { return this._lastPath; }

  /** Cell keys (`row,col`) expanded by the most recent `solve`. */
  get lastVisited(): ReadonlySet<string> { return this._lastVisited; }

  get lastVisitedCount(): number { return this._lastVisited.size; }

  solve(grid: Grid, start: CellPosition, goal: CellPosition): Path | null {
    if (!grid.isWalkable(start) || !grid.isWalkable(goal)) {
      return this.remember({ path: null, visited: new Set() });
    }
    if (sameCell(start, goal)) {
      return this.remember({ path: [{ ...start }], visited: new Set([cellKey(start)]) });
    }
    return this.remember(this.search(grid, start, goal));
  }

  /** Start and goal are walkable and distinct when this is called. */
  protected abstract search(grid: Grid, start: CellPosition, goal: CellPosition): SearchResult;

  private remember(result: SearchResult): Path | null {
    this._lastPath = result.path ?? [];
    this._lastVisited = result.visited;
    return result.path;
  }
}

/** Walks parent links back from `goal` and returns the path start-first. */
export function reconstructPath(parents: Map<string, CellPosition>, goal: CellPosition): Path {
  const path: Path = [goal];
  let current = parents.get(cellKey(goal));
  while (current) {
    path.push(current);
    current = parents.get(cellKey(current));
  }
  return path.reverse();
}
