import { LOG_NAVIGATION, SPAWN_CELL } from '../config';
import { DIRECTION_VECTORS, Direction, dirName } from '../entities/common/direction';
import {
  cellToPixel, formatCell, pixelToCell,
  type CellPosition, type Path, type PixelPosition,
} from '../maze/coordinates';
import { findGoal } from '../maze/findGoal';
import type { Grid } from '../maze/Grid';
import { STRATEGY_LABELS, SearchStrategy, type Solver } from '../pathfinding';
import { PathReplayer, type AgentBody, type PathReplayerOptions } from './PathReplayer';
import type { RenderSurface } from './RenderSurface';

export type NavigationOutcome =
  | { status: 'solver-not-configured'; strategy: SearchStrategy }
  | { status: 'goal-not-found'; strategy: SearchStrategy }
  | { status: 'no-path'; strategy: SearchStrategy; start: CellPosition; goal: CellPosition }
  | { status: 'arrived'; strategy: SearchStrategy; path: Path; steps: number }
  | { status: 'stalled'; strategy: SearchStrategy; path: Path; steps: number; at: CellPosition; target: CellPosition }
  | { status: 'cancelled'; strategy: SearchStrategy; path: Path; steps: number };

export interface NavigationControllerOptions {
  surface: RenderSurface;
  /** Solvers available from the start; any strategy may be left out. */
  solvers?: Partial<Record<SearchStrategy, Solver>>;
  /** Default SPAWN_CELL. */
  spawn?: CellPosition;
  replay?: PathReplayerOptions;
  /** Console tracing. Default LOG_NAVIGATION. */
  log?: boolean;
}

export interface MoveToGoalOptions {
  /** Aborting it stops the replay before its next step. */
  signal?: AbortSignal;
}

/**
 * Owns the agent's position on one grid and moves it, either a tile at a time
 * from keyboard input or along a path found by one of the registered solvers.
 *
 * The pixel position is the only stored position; the agent's cell is always
 * derived from it.
 */
export class NavigationController {
  private readonly solvers = new Map<SearchStrategy, Solver>();
  private readonly replayer: PathReplayer;
  private readonly spawn: CellPosition;
  private readonly logEnabled: boolean;
  private activeReplay: AbortController | null = null;

  constructor(
    private readonly agent: AgentBody,
    readonly grid: Grid,
    opts: NavigationControllerOptions,
  ) {
    this.replayer = new PathReplayer(opts.surface, opts.replay);
    this.spawn = opts.spawn ?? SPAWN_CELL;
    this.logEnabled = opts.log ?? LOG_NAVIGATION;

    for (const strategy of Object.values(SearchStrategy)) {
      const solver = opts.solvers?.[strategy];
      if (solver) this.solvers.set(strategy, solver);
    }
  }

  get agentPosition(): PixelPosition { return { x: this.agent.x, y: this.agent.y }; }
  get agentCell(): CellPosition { return pixelToCell(this.agent, this.grid.tileSize); }
  get isReplaying(): boolean { return this.activeReplay !== null; }

  // --- solver registry
  setSolver(strategy: SearchStrategy, solver: Solver): void { this.solvers.set(strategy, solver); }
  clearSolver(strategy: SearchStrategy): void { this.solvers.delete(strategy); }
  getSolver(strategy: SearchStrategy): Solver | undefined { return this.solvers.get(strategy); }
  hasSolver(strategy: SearchStrategy): boolean { return this.solvers.has(strategy); }

  /**
   * One tile in `direction`. The move is committed only when the next cell is
   * walkable and the cell under the next pixel position is too. Interrupts a
   * running replay. Returns whether the agent moved.
   */
  moveByDirection(direction: Direction | null): boolean {
    if (direction === null) return false;
    this.cancelReplay();

    const v = DIRECTION_VECTORS[direction];
    const tileSize = this.grid.tileSize;
    const cell = this.agentCell;
    const nextCell = { row: cell.row + v.y, col: cell.col + v.x };
    const nextPixel = { x: this.agent.x + v.x * tileSize, y: this.agent.y + v.y * tileSize };

    if (!this.grid.isWalkable(nextCell)) return false;
    if (!this.grid.isWalkable(pixelToCell(nextPixel, tileSize))) return false;

    this.agent.x = nextPixel.x;
    this.agent.y = nextPixel.y;
    this.log(`move ${dirName(direction)} -> ${formatCell(nextCell)}`);
    return true;
  }

  async moveToGoal(strategy: SearchStrategy, opts: MoveToGoalOptions = {}): Promise<NavigationOutcome> {
    const label = STRATEGY_LABELS[strategy];
    const solver = this.solvers.get(strategy);
    if (!solver) {
      console.warn(`[nav] ${label} solver not configured; call setSolver first.`);
      return { status: 'solver-not-configured', strategy };
    }

    const goal = findGoal(this.grid);
    if (!goal) {
      this.log(`${label}: goal not found`);
      return { status: 'goal-not-found', strategy };
    }

    const start = this.agentCell;
    const path = solver.solve(this.grid, start, goal);
    if (!path) {
      this.log(`${label}: no path ${formatCell(start)} -> ${formatCell(goal)} (visited ${solver.lastVisitedCount})`);
      return { status: 'no-path', strategy, start, goal };
    }
    this.log(`${label}: ${path.length - 1} steps ${formatCell(start)} -> ${formatCell(goal)} (visited ${solver.lastVisitedCount})`);

    this.cancelReplay();
    const replay = new AbortController();
    this.activeReplay = replay;
    const onAbort = () => replay.abort();
    if (opts.signal?.aborted) replay.abort();
    opts.signal?.addEventListener('abort', onAbort, { once: true });

    try {
      const result = await this.replayer.replay(path, this.agent, this.grid, replay.signal);
      this.log(`${label}: replay ${result.status} after ${result.steps} steps`);
      switch (result.status) {
        case 'completed':
          return { status: 'arrived', strategy, path, steps: result.steps };
        case 'stalled':
          return { status: 'stalled', strategy, path, steps: result.steps, at: result.at, target: result.target };
        case 'cancelled':
          return { status: 'cancelled', strategy, path, steps: result.steps };
      }
    } finally {
      opts.signal?.removeEventListener('abort', onAbort);
      if (this.activeReplay === replay) this.activeReplay = null;
    }
  }

  /** Stops a running replay before its next step. */
  cancelReplay(): void {
    if (!this.activeReplay) return;
    this.activeReplay.abort();
    this.activeReplay = null;
  }

  resetPosition(): void {
    this.cancelReplay();
    const spawn = cellToPixel(this.spawn, this.grid.tileSize);
    this.agent.x = spawn.x;
    this.agent.y = spawn.y;
  }

  private log(msg: string) {
    if (!this.logEnabled) return;
    // eslint-disable-next-line no-console
    console.log(`[nav] ${msg}`);
  }
}

/** One-line summary for the HUD. */
export function describeOutcome(outcome: NavigationOutcome): string {
  const label = STRATEGY_LABELS[outcome.strategy];
  switch (outcome.status) {
    case 'solver-not-configured': return `${label}: solver not configured`;
    case 'goal-not-found': return `${label}: goal not found`;
    case 'no-path': return `${label}: no path from ${formatCell(outcome.start)} to ${formatCell(outcome.goal)}`;
    case 'arrived': return `${label}: reached goal in ${outcome.steps} steps`;
    case 'stalled': return `${label}: stuck at ${formatCell(outcome.at)} heading for ${formatCell(outcome.target)}`;
    case 'cancelled': return `${label}: cancelled after ${outcome.steps} steps`;
  }
}
