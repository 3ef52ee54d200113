export enum Direction {
  Up = 'up',
  Down = 'down',
  Left = 'left',
  Right = 'right',
}

export type GridVector = { x: number; y: number };

export const DIRECTION_VECTORS: Record<Direction, GridVector> = {
  [Direction.Up]: { x: 0, y: -1 },
  [Direction.Down]: { x: 0, y: 1 },
  [Direction.Left]: { x: -1, y: 0 },
  [Direction.Right]: { x: 1, y: 0 },
};

// Neighbor order for every search: Up, Left, Down, Right.
export const DIRS: readonly Direction[] = [
  Direction.Up,
  Direction.Left,
  Direction.Down,
  Direction.Right,
];

/** Which arrow keys are currently held. */
export interface KeyState {
  up: boolean;
  down: boolean;
  left: boolean;
  right: boolean;
}

/** First pressed key wins, checked in the order up, down, left, right. */
export function directionFromKeys(keys: KeyState): Direction | null {
  if (keys.up) return Direction.Up;
  if (keys.down) return Direction.Down;
  if (keys.left) return Direction.Left;
  if (keys.right) return Direction.Right;
  return null;
}

export function dirName(dir: Direction | null): string {
  switch (dir) {
    case Direction.Up: return 'Up';
    case Direction.Down: return 'Down';
    case Direction.Left: return 'Left';
    case Direction.Right: return 'Right';
    default: return '—';
  }
}
