import { afterEach, describe, it, expect, vi } from 'vitest';
import { TILE_SIZE } from '../config';
import { Direction } from '../entities/common/direction';
import { Grid } from '../maze/Grid';
import {
  AStarSolver, BfsSolver, DfsSolver, DijkstraSolver, SearchStrategy, createDefaultSolvers,
} from '../pathfinding';
import { NavigationController, describeOutcome } from './NavigationController';
import type { Delay } from './RenderSurface';
import { RecordingSurface } from './testSurface';

const T = TILE_SIZE;
const noDelay: Delay = () => Promise.resolve();

// Spawn (1,1) is the top-left open cell; goal at (3,3).
const MAZE = [
  [1, 1, 1, 1, 1],
  [1, 0, 0, 0, 1],
  [1, 0, 1, 0, 1],
  [1, 0, 0, 3, 1],
  [1, 1, 1, 1, 1],
];

function setup(cells: number[][] = MAZE, delay: Delay = noDelay) {
  const surface = new RecordingSurface();
  const agent = { x: T, y: T };
  const nav = new NavigationController(agent, new Grid(cells), {
    surface,
    solvers: createDefaultSolvers(),
    replay: { delay },
  });
  return { agent, nav, surface };
}

afterEach(() => {
  vi.restoreAllMocks();
});

describe('NavigationController.moveByDirection', () => {
  it('ignores an empty input', () => {
    const { agent, nav } = setup();
    expect(nav.moveByDirection(null)).toBe(false);
    expect(agent).toEqual({ x: T, y: T });
  });

  it('moves one tile onto open cells', () => {
    const { agent, nav } = setup();
    expect(nav.moveByDirection(Direction.Right)).toBe(true);
    expect(agent).toEqual({ x: 2 * T, y: T });
    expect(nav.agentCell).toEqual({ row: 1, col: 2 });

    expect(nav.moveByDirection(Direction.Left)).toBe(true);
    expect(nav.moveByDirection(Direction.Down)).toBe(true);
    expect(nav.agentPosition).toEqual({ x: T, y: 2 * T });
  });

  it('refuses to walk into walls', () => {
    const { agent, nav } = setup();
    expect(nav.moveByDirection(Direction.Up)).toBe(false);
    expect(nav.moveByDirection(Direction.Left)).toBe(false);
    expect(nav.moveByDirection(Direction.Down)).toBe(true);
    expect(nav.moveByDirection(Direction.Right)).toBe(false); // (2,2) is a wall
    expect(agent).toEqual({ x: T, y: 2 * T });
  });

  it('refuses to leave the grid', () => {
    const surface = new RecordingSurface();
    const agent = { x: 0, y: 0 };
    const nav = new NavigationController(agent, new Grid([[0, 0], [0, 3]]), { surface });
    expect(nav.moveByDirection(Direction.Up)).toBe(false);
    expect(nav.moveByDirection(Direction.Left)).toBe(false);
    expect(agent).toEqual({ x: 0, y: 0 });
  });

  it('traces moves when logging is on', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    const nav = new NavigationController({ x: T, y: T }, new Grid(MAZE), {
      surface: new RecordingSurface(),
      log: true,
    });
    nav.moveByDirection(Direction.Right);
    expect(log).toHaveBeenCalledWith('[nav] move Right -> (1,2)');
  });
});

describe('NavigationController.moveToGoal', () => {
  it('walks the BFS path to the goal', async () => {
    const { agent, nav, surface } = setup();
    const outcome = await nav.moveToGoal(SearchStrategy.BFS);

    expect(outcome).toEqual({
      status: 'arrived',
      strategy: SearchStrategy.BFS,
      path: [
        { row: 1, col: 1 },
        { row: 2, col: 1 },
        { row: 3, col: 1 },
        { row: 3, col: 2 },
        { row: 3, col: 3 },
      ],
      steps: 4,
    });
    expect(agent).toEqual({ x: 3 * T, y: 3 * T });
    expect(surface.frames).toBe(4);
    expect(nav.isReplaying).toBe(false);
  });

  it.each([SearchStrategy.DFS, SearchStrategy.Dijkstra, SearchStrategy.AStar])('%s also arrives in 4 steps', async (strategy) => {
    const { agent, nav } = setup();
    const outcome = await nav.moveToGoal(strategy);
    expect(outcome.status).toBe('arrived');
    expect(outcome.status === 'arrived' ? outcome.steps : -1).toBe(4);
    expect(nav.agentCell).toEqual({ row: 3, col: 3 });
    expect(agent).toEqual({ x: 3 * T, y: 3 * T });
  });

  it('starts from the cell under the agent', async () => {
    const { nav } = setup();
    nav.moveByDirection(Direction.Right);
    nav.moveByDirection(Direction.Right);
    const outcome = await nav.moveToGoal(SearchStrategy.BFS);
    expect(outcome.status === 'arrived' ? outcome.path[0] : null).toEqual({ row: 1, col: 3 });
    expect(outcome.status === 'arrived' ? outcome.steps : -1).toBe(2);
  });

  it('reports a missing solver without moving', async () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const agent = { x: T, y: T };
    const nav = new NavigationController(agent, new Grid(MAZE), { surface: new RecordingSurface() });

    const outcome = await nav.moveToGoal(SearchStrategy.AStar);

    expect(outcome).toEqual({ status: 'solver-not-configured', strategy: SearchStrategy.AStar });
    expect(warn).toHaveBeenCalledWith('[nav] A* solver not configured; call setSolver first.');
    expect(agent).toEqual({ x: T, y: T });
  });

  it('reports a missing goal without moving', async () => {
    const cells = MAZE.map((row) => row.map((c) => (c === 3 ? 0 : c)));
    const { agent, nav, surface } = setup(cells);
    const outcome = await nav.moveToGoal(SearchStrategy.Dijkstra);
    expect(outcome).toEqual({ status: 'goal-not-found', strategy: SearchStrategy.Dijkstra });
    expect(agent).toEqual({ x: T, y: T });
    expect(surface.calls).toEqual([]);
  });

  it('reports an unreachable goal without moving', async () => {
    const { agent, nav } = setup([
      [1, 1, 1, 1, 1],
      [1, 0, 0, 1, 1],
      [1, 0, 0, 1, 1],
      [1, 1, 1, 1, 3],
      [1, 1, 1, 1, 1],
    ]);
    const outcome = await nav.moveToGoal(SearchStrategy.DFS);
    expect(outcome).toEqual({
      status: 'no-path',
      strategy: SearchStrategy.DFS,
      start: { row: 1, col: 1 },
      goal: { row: 3, col: 4 },
    });
    expect(agent).toEqual({ x: T, y: T });
  });

  it('stops when the caller aborts', async () => {
    const abort = new AbortController();
    const { agent, nav } = setup(MAZE, async () => { abort.abort(); });

    const outcome = await nav.moveToGoal(SearchStrategy.BFS, { signal: abort.signal });

    expect(outcome.status).toBe('cancelled');
    expect(outcome.status === 'cancelled' ? outcome.steps : -1).toBe(1);
    expect(agent).toEqual({ x: T, y: 2 * T });
    expect(nav.isReplaying).toBe(false);
  });

  it('is interrupted by keyboard input', async () => {
    let nav: NavigationController | undefined;
    let replayingDuringStep = false;
    const setupResult = setup(MAZE, async () => {
      replayingDuringStep = nav?.isReplaying ?? false;
      nav?.moveByDirection(Direction.Up);
    });
    nav = setupResult.nav;

    const outcome = await nav.moveToGoal(SearchStrategy.BFS);

    expect(replayingDuringStep).toBe(true);
    expect(outcome.status).toBe('cancelled');
    // one replay step down to (2,1), then the key press moved it back up
    expect(setupResult.agent).toEqual({ x: T, y: T });
    expect(nav.isReplaying).toBe(false);
  });
});

describe('NavigationController replay supersession', () => {
  // Real timers, so the running replay is parked on its step delay.
  function timedSetup() {
    const agent = { x: T, y: T };
    const nav = new NavigationController(agent, new Grid(MAZE), {
      surface: new RecordingSurface(),
      solvers: createDefaultSolvers(),
      replay: { stepDelayMs: 1 },
    });
    return { agent, nav };
  }

  it('cancels the running replay on reset', async () => {
    const { agent, nav } = timedSetup();

    const running = nav.moveToGoal(SearchStrategy.BFS);
    expect(agent).toEqual({ x: T, y: 2 * T });
    nav.resetPosition();
    const outcome = await running;

    expect(outcome.status).toBe('cancelled');
    expect(outcome.status === 'cancelled' ? outcome.steps : -1).toBe(1);
    expect(agent).toEqual({ x: T, y: T });
    expect(nav.isReplaying).toBe(false);
  });

  it('cancels the running replay when a new one starts', async () => {
    const { agent, nav } = timedSetup();

    const first = nav.moveToGoal(SearchStrategy.BFS);
    const second = nav.moveToGoal(SearchStrategy.AStar);
    const [a, b] = await Promise.all([first, second]);

    expect(a.status).toBe('cancelled');
    expect(b.status).toBe('arrived');
    // the second run starts from (2,1), where the first left the agent
    expect(b.status === 'arrived' ? b.steps : -1).toBe(3);
    expect(agent).toEqual({ x: 3 * T, y: 3 * T });
    expect(nav.isReplaying).toBe(false);
  });
});

describe('NavigationController.resetPosition', () => {
  it('returns to the spawn tile, idempotently', () => {
    const { agent, nav } = setup();
    nav.moveByDirection(Direction.Right);
    nav.resetPosition();
    expect(agent).toEqual({ x: T, y: T });
    nav.resetPosition();
    expect(agent).toEqual({ x: T, y: T });
  });

  it('honours a custom spawn cell', () => {
    const agent = { x: 0, y: 0 };
    const nav = new NavigationController(agent, new Grid(MAZE), {
      surface: new RecordingSurface(),
      spawn: { row: 3, col: 1 },
    });
    nav.resetPosition();
    expect(agent).toEqual({ x: T, y: 3 * T });
  });
});

describe('NavigationController solver registry', () => {
  it('starts with only the solvers it was given', () => {
    const nav = new NavigationController({ x: T, y: T }, new Grid(MAZE), {
      surface: new RecordingSurface(),
      solvers: { [SearchStrategy.BFS]: new BfsSolver() },
    });
    expect(nav.hasSolver(SearchStrategy.BFS)).toBe(true);
    expect(nav.hasSolver(SearchStrategy.DFS)).toBe(false);
  });

  it('swaps and clears solvers at runtime', async () => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    const { nav } = setup();
    const dfs = new DfsSolver();
    nav.setSolver(SearchStrategy.DFS, dfs);
    expect(nav.getSolver(SearchStrategy.DFS)).toBe(dfs);

    nav.clearSolver(SearchStrategy.Dijkstra);
    expect(nav.getSolver(SearchStrategy.Dijkstra)).toBeUndefined();
    expect((await nav.moveToGoal(SearchStrategy.Dijkstra)).status).toBe('solver-not-configured');

    nav.setSolver(SearchStrategy.Dijkstra, new DijkstraSolver());
    expect((await nav.moveToGoal(SearchStrategy.Dijkstra)).status).toBe('arrived');
  });

  it('keeps the solver cache of the last run', async () => {
    const astar = new AStarSolver();
    const nav = new NavigationController({ x: T, y: T }, new Grid(MAZE), {
      surface: new RecordingSurface(),
      solvers: { [SearchStrategy.AStar]: astar },
      replay: { delay: noDelay },
    });
    await nav.moveToGoal(SearchStrategy.AStar);
    expect(astar.lastPath).toHaveLength(5);
    expect(astar.lastVisitedCount).toBeGreaterThan(0);
  });
});

describe('describeOutcome', () => {
  it('summarises each outcome', () => {
    const s = SearchStrategy.BFS;
    expect(describeOutcome({ status: 'solver-not-configured', strategy: s })).toBe('BFS: solver not configured');
    expect(describeOutcome({ status: 'goal-not-found', strategy: s })).toBe('BFS: goal not found');
    expect(describeOutcome({
      status: 'no-path', strategy: s, start: { row: 1, col: 1 }, goal: { row: 3, col: 4 },
    })).toBe('BFS: no path from (1,1) to (3,4)');
    expect(describeOutcome({ status: 'arrived', strategy: s, path: [], steps: 4 })).toBe('BFS: reached goal in 4 steps');
    expect(describeOutcome({
      status: 'stalled', strategy: s, path: [], steps: 0, at: { row: 0, col: 0 }, target: { row: 0, col: 2 },
    })).toBe('BFS: stuck at (0,0) heading for (0,2)');
    expect(describeOutcome({ status: 'cancelled', strategy: SearchStrategy.AStar, path: [], steps: 1 }))
      .toBe('A*: cancelled after 1 steps');
  });
});
