import Phaser from 'phaser';
import { COLORS } from './game/config';
import { BootScene } from './scenes/BootScene';
import { MazeScene } from './scenes/MazeScene';

/** Boot loads the level, Maze runs it. */
new Phaser.Game({
  type: Phaser.AUTO,
  parent: 'app',
  width: 800,
  height: 600,
  backgroundColor: COLORS.background,
  pixelArt: true,
  scale: { mode: Phaser.Scale.RESIZE },
  scene: [BootScene, MazeScene],
});
