import { describe, it, expect } from 'vitest';
import { DIRECTION_VECTORS, Direction, dirName, directionFromKeys } from './direction';

const none = { up: false, down: false, left: false, right: false };

describe('directionFromKeys', () => {
  it('returns null with nothing pressed', () => {
    expect(directionFromKeys(none)).toBeNull();
  });

  it('maps each key to its direction', () => {
    expect(directionFromKeys({ ...none, up: true })).toBe(Direction.Up);
    expect(directionFromKeys({ ...none, down: true })).toBe(Direction.Down);
    expect(directionFromKeys({ ...none, left: true })).toBe(Direction.Left);
    expect(directionFromKeys({ ...none, right: true })).toBe(Direction.Right);
  });

  it('picks one direction when several keys are held', () => {
    expect(directionFromKeys({ up: true, down: true, left: true, right: true })).toBe(Direction.Up);
    expect(directionFromKeys({ ...none, down: true, right: true })).toBe(Direction.Down);
    expect(directionFromKeys({ ...none, left: true, right: true })).toBe(Direction.Left);
  });
});

describe('direction helpers', () => {
  it('uses screen axes (y grows downward)', () => {
    expect(DIRECTION_VECTORS[Direction.Up]).toEqual({ x: 0, y: -1 });
    expect(DIRECTION_VECTORS[Direction.Right]).toEqual({ x: 1, y: 0 });
  });

  it('names directions for logs', () => {
    expect(dirName(Direction.Left)).toBe('Left');
    expect(dirName(null)).toBe('—');
  });
});
