import Phaser from 'phaser';
import { COLORS, LEVEL_CONFIG, SPAWN_CELL, TILE_SIZE } from '../game/config';
import { directionFromKeys, type KeyState } from '../game/entities/common/direction';
import { cellToPixel } from '../game/maze/coordinates';
import { parseLevel } from '../game/maze/level';
import { NavigationController, describeOutcome } from '../game/navigation/NavigationController';
import { createDefaultSolvers, SearchStrategy, STRATEGY_LABELS } from '../game/pathfinding';
import { PhaserRenderSurface } from '../game/render/PhaserRenderSurface';

const KEYBOARD_STRATEGIES: Record<string, SearchStrategy | undefined> = {
  Digit1: SearchStrategy.DFS,
  Digit2: SearchStrategy.BFS,
  Digit3: SearchStrategy.Dijkstra,
  Digit4: SearchStrategy.AStar,
  Numpad1: SearchStrategy.DFS,
  Numpad2: SearchStrategy.BFS,
  Numpad3: SearchStrategy.Dijkstra,
  Numpad4: SearchStrategy.AStar,
};

const HELP_TEXT = 'Arrows: move   1 DFS  2 BFS  3 Dijkstra  4 A*   R: reset   Esc: stop';

export class MazeScene extends Phaser.Scene {
  private surface!: PhaserRenderSurface;
  private controller!: NavigationController;
  private agent!: Phaser.GameObjects.Rectangle;
  private cursors?: Phaser.Types.Input.Keyboard.CursorKeys;
  private statusText!: Phaser.GameObjects.Text;
  private levelName = '';
  private runId = 0;

  constructor() {
    super('Maze');
  }

  create(): void {
    const raw: unknown = this.cache.json.get(LEVEL_CONFIG.key);
    if (raw === undefined) {
      throw new Error(`Failed to load level data: ${LEVEL_CONFIG.key}`);
    }
    const level = parseLevel(raw, TILE_SIZE);
    this.levelName = level.name;

    this.surface = new PhaserRenderSurface(this, level.grid);
    this.surface.redrawLevel();
    this.surface.present();

    const spawn = cellToPixel(SPAWN_CELL, TILE_SIZE);
    this.agent = this.add
      .rectangle(spawn.x, spawn.y, TILE_SIZE, TILE_SIZE, COLORS.agent)
      .setOrigin(0, 0)
      .setDepth(10);

    this.controller = new NavigationController(this.agent, level.grid, {
      surface: this.surface,
      solvers: createDefaultSolvers(),
      replay: { delay: (ms) => this.wait(ms) },
    });

    this.createHud(level.grid.widthPx, level.grid.heightPx);
    this.configureInput();
  }

  update(): void {
    if (!this.cursors) return;
    const JustDown = Phaser.Input.Keyboard.JustDown;
    const keys: KeyState = {
      up: JustDown(this.cursors.up),
      down: JustDown(this.cursors.down),
      left: JustDown(this.cursors.left),
      right: JustDown(this.cursors.right),
    };
    const direction = directionFromKeys(keys);
    if (direction && this.controller.isReplaying) this.stopReplay('Replay interrupted');
    this.controller.moveByDirection(direction);
  }

  private configureInput(): void {
    this.cursors = this.input.keyboard?.createCursorKeys();

    this.input.keyboard?.on('keydown', (event: KeyboardEvent) => {
      const strategy = KEYBOARD_STRATEGIES[event.code];
      if (strategy) {
        this.runStrategy(strategy);
        return;
      }
      if (event.code === 'KeyR') {
        this.runId++;
        this.controller.resetPosition();
        this.clearOverlay();
        this.setStatus('Back at spawn');
      } else if (event.code === 'Escape' && this.controller.isReplaying) {
        this.stopReplay('Replay stopped');
      }
    });
  }

  private runStrategy(strategy: SearchStrategy): void {
    // A newer run, reset or interrupt supersedes this one's status line.
    const run = ++this.runId;
    this.setStatus(`${STRATEGY_LABELS[strategy]}: searching…`);
    this.controller
      .moveToGoal(strategy)
      .then((outcome) => {
        if (run === this.runId) this.setStatus(describeOutcome(outcome));
      })
      .catch((err: unknown) => {
        console.error('[nav] replay failed', err);
        if (run === this.runId) this.setStatus(`${STRATEGY_LABELS[strategy]}: replay failed`);
      });
  }

  private stopReplay(status: string): void {
    this.runId++;
    this.controller.cancelReplay();
    this.clearOverlay();
    this.setStatus(status);
  }

  private createHud(width: number, top: number): void {
    this.add
      .text(8, top + 8, `${this.levelName} | ${HELP_TEXT}`, {
        fontFamily: 'monospace',
        fontSize: '14px',
        color: COLORS.hud,
        wordWrap: { width: Math.max(width - 16, 200) },
      })
      .setDepth(30);

    this.statusText = this.add
      .text(8, top + 48, '', {
        fontFamily: 'monospace',
        fontSize: '14px',
        color: COLORS.hud,
      })
      .setDepth(30);
  }

  private setStatus(text: string): void {
    this.statusText.setText(text);
  }

  private clearOverlay(): void {
    this.surface.redrawLevel();
    this.surface.present();
  }

  private wait(ms: number): Promise<void> {
    return new Promise((resolve) => {
      this.time.delayedCall(ms, () => resolve());
    });
  }
}
