import { PATH_COLOR, REPLAY_STEP_DELAY_MS } from '../config';
import {
  cellToPixel, manhattan, pixelToCell,
  type CellPosition, type Path, type PixelPosition,
} from '../maze/coordinates';
import type { Grid } from '../maze/Grid';
import { timerDelay, type Delay, type RenderSurface } from './RenderSurface';

/** Anything with a mutable pixel position (a plain object, a Phaser sprite...). */
export type AgentBody = { x: number; y: number };

export type ReplayResult =
  | { status: 'completed'; steps: number }
  | { status: 'stalled'; steps: number; at: CellPosition; target: CellPosition }
  | { status: 'cancelled'; steps: number };

export type PathReplayerOptions = {
  /** Pause after each committed step. Default REPLAY_STEP_DELAY_MS. */
  stepDelayMs?: number;
  /** Default: a setTimeout-based delay. */
  delay?: Delay;
  /** Overlay color for the remaining path. Default PATH_COLOR. */
  pathColor?: number;
};

/**
 * Walks an agent along a cell path one tile at a time.
 *
 * Each step moves along x while x is misaligned with the target, then along y,
 * never diagonally. The destination cell is checked before every step; a
 * blocked step is skipped. Reaching a target takes at most its Manhattan
 * distance plus one iterations; past that the replay reports `stalled`.
 */
export class PathReplayer {
  private readonly stepDelayMs: number;
  private readonly delay: Delay;
  private readonly pathColor: number;

  constructor(private readonly surface: RenderSurface, opts: PathReplayerOptions = {}) {
    this.stepDelayMs = opts.stepDelayMs ?? REPLAY_STEP_DELAY_MS;
    this.delay = opts.delay ?? timerDelay;
    this.pathColor = opts.pathColor ?? PATH_COLOR;
  }

  async replay(path: Path, agent: AgentBody, grid: Grid, signal?: AbortSignal): Promise<ReplayResult> {
    const tileSize = grid.tileSize;
    let steps = 0;

    for (let i = 0; i < path.length; i++) {
      const targetCell = path[i];
      const target = cellToPixel(targetCell, tileSize);
      const budget = manhattan(pixelToCell(agent, tileSize), targetCell) + 1;
      let iterations = 0;

      while (agent.x !== target.x || agent.y !== target.y) {
        if (signal?.aborted) return { status: 'cancelled', steps };
        if (++iterations > budget) {
          return { status: 'stalled', steps, at: pixelToCell(agent, tileSize), target: targetCell };
        }

        const next = nextStep(agent, target, tileSize);
        if (!grid.isWalkable(pixelToCell(next, tileSize))) continue;

        agent.x = next.x;
        agent.y = next.y;
        steps++;

        this.surface.redrawLevel();
        this.drawPath(path.slice(i), tileSize);
        this.surface.present();
        await this.delay(this.stepDelayMs);
      }
    }

    return { status: 'completed', steps };
  }

  drawPath(path: Path, tileSize: number): void {
    for (const cell of path) {
      const { x, y } = cellToPixel(cell, tileSize);
      this.surface.drawRect(x, y, tileSize, tileSize, this.pathColor);
    }
  }
}

/** One tile toward `target`: x first while misaligned, else y. */
export function nextStep(from: PixelPosition, target: PixelPosition, tileSize: number): PixelPosition {
  if (from.x !== target.x) {
    return { x: from.x + Math.sign(target.x - from.x) * tileSize, y: from.y };
  }
  return { x: from.x, y: from.y + Math.sign(target.y - from.y) * tileSize };
}
