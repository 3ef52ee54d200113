export const TILE_SIZE = 32;

export const LEVEL_CONFIG = {
  key: 'maze-level-1',
  url: 'maps/level-1.json',
};

export enum CellCode {
  Open = 0,
  Wall = 1,
  Goal = 3,
}

/** Where the agent starts and where `resetPosition` puts it back. */
export const SPAWN_CELL = { row: 1, col: 1 } as const;

/** Pause between two replay steps, so the walk stays visible. */
export const REPLAY_STEP_DELAY_MS = 100;

export const COLORS = {
  background: 0x000000,
  open: 0x1b1b2f,
  wall: 0x3a5fcd,
  goal: 0xffcc00,
  path: 0x00ff00,
  agent: 0xff3355,
  hud: '#ffffff',
} as const;

export const PATH_COLOR = COLORS.path;

// ---- LOGGING toggles -------------------------------------------------------
export const LOG_NAVIGATION = false; // console tracing of strategy/replay
