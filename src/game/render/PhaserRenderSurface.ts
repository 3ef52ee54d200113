import Phaser from 'phaser';
import { CellCode, COLORS } from '../config';
import type { Grid } from '../maze/Grid';
import type { RenderSurface } from '../navigation/RenderSurface';

/**
 * Double-buffered RenderSurface over two Graphics objects: drawing goes to
 * the hidden back buffer, present() shows it and hides the other one.
 */
export class PhaserRenderSurface implements RenderSurface {
  private front: Phaser.GameObjects.Graphics;
  private back: Phaser.GameObjects.Graphics;

  constructor(scene: Phaser.Scene, private readonly grid: Grid, depth = 0) {
    this.front = scene.add.graphics().setDepth(depth);
    this.back = scene.add.graphics().setDepth(depth).setVisible(false);
  }

  drawRect(x: number, y: number, width: number, height: number, color: number): void {
    this.back.fillStyle(color, 1);
    this.back.fillRect(x, y, width, height);
  }

  redrawLevel(): void {
    const ts = this.grid.tileSize;
    this.back.clear();
    this.grid.forEachCell((code, cell) => {
      this.drawRect(cell.col * ts, cell.row * ts, ts, ts, colorFor(code));
    });
  }

  present(): void {
    const shown = this.back;
    this.back = this.front;
    this.front = shown;
    this.front.setVisible(true);
    this.back.setVisible(false);
  }
}

function colorFor(code: number): number {
  switch (code) {
    case CellCode.Wall: return COLORS.wall;
    case CellCode.Goal: return COLORS.goal;
    default: return COLORS.open;
  }
}
