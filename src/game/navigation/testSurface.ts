import type { RenderSurface } from './RenderSurface';

/** RenderSurface that records what was asked of it. */
export class RecordingSurface implements RenderSurface {
  readonly calls: string[] = [];
  readonly rects: [number, number, number, number, number][] = [];

  drawRect(x: number, y: number, width: number, height: number, color: number): void {
    this.calls.push('rect');
    this.rects.push([x, y, width, height, color]);
  }

  redrawLevel(): void {
    this.calls.push('redraw');
  }

  present(): void {
    this.calls.push('present');
  }

  get frames(): number {
    return this.calls.filter((c) => c === 'present').length;
  }
}
