// src/game/pathfinding/index.ts
import { AStarSolver } from './AStarSolver';
import { BfsSolver } from './BfsSolver';
import { DfsSolver } from './DfsSolver';
import { DijkstraSolver } from './DijkstraSolver';
import { SearchStrategy, type Solver } from './Solver';

export { SearchStrategy, Solver, STRATEGY_LABELS } from './Solver';
export type { SearchResult } from './Solver';
export { DfsSolver } from './DfsSolver';
export { BfsSolver } from './BfsSolver';
export { DijkstraSolver, UNIT_COST, type CellCostFn, type DijkstraOptions } from './DijkstraSolver';
export { AStarSolver, HEURISTICS, type Heuristic, type HeuristicName, type AStarOptions } from './AStarSolver';

/** One solver per strategy. */
export function createDefaultSolvers(): Record<SearchStrategy, Solver> {
  return {
    [SearchStrategy.DFS]: new DfsSolver(),
    [SearchStrategy.BFS]: new BfsSolver(),
    [SearchStrategy.Dijkstra]: new DijkstraSolver(),
    [SearchStrategy.AStar]: new AStarSolver(),
  };
}
