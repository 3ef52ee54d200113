/**
 * What path replay needs from the host. The navigation code never reaches
 * into a renderer directly; the scene hands one of these in.
 */
export interface RenderSurface {
  /** Fill a pixel-space rectangle. */
  drawRect(x: number, y: number, width: number, height: number, color: number): void;
  /** Repaint the level (walls, open cells, goal) into the pending frame. */
  redrawLevel(): void;
  /** Show the pending frame. */
  present(): void;
}

/** Resolves after roughly `ms` milliseconds. */
export type Delay = (ms: number) => Promise<void>;

export const timerDelay: Delay = (ms) => new Promise((resolve) => setTimeout(resolve, ms));
