import Phaser from 'phaser';
import { LEVEL_CONFIG } from '../game/config';

/** Loads the level data, then hands over to the maze. */
export class BootScene extends Phaser.Scene {
  constructor() {
    super('Boot');
  }

  preload(): void {
    this.load.json(LEVEL_CONFIG.key, LEVEL_CONFIG.url);
  }

  create(): void {
    this.scene.start('Maze');
  }
}
