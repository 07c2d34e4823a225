import { describe, test, expect, afterEach } from 'vitest';
import { vec2 } from '../../math/vec';
import { setDebugAssertions } from '../../core/debug';
import { SpatialHashGrid, syncSpatialGrid, cellKey, parseCellKey, toCell } from './spatial-hash';
import { PhysicsWorld } from './world';
import { createPosition } from './movement';
import { createRectCollider, sensorType, staticType } from './collider';

const unitBox = createRectCollider(vec2(1, 1), sensorType());

function expectInverse(grid: SpatialHashGrid): void {
  for (const eid of grid.entities()) {
    for (const cell of grid.cellsOf(eid)) {
      expect(grid.entitiesIn(cell.x, cell.y)).toContain(eid);
    }
  }
}

describe('cell keys', () => {
  test('round-trip negative coordinates', () => {
    expect(parseCellKey(cellKey(-3, 12))).toEqual({ x: -3, y: 12 });
  });
});

describe('toCell', () => {
  test('floors toward negative infinity', () => {
    expect(toCell(19.9, 20)).toBe(0);
    expect(toCell(-0.5, 20)).toBe(-1);
  });

  test('saturates to the 32-bit range', () => {
    expect(toCell(1e18, 20)).toBe(2 ** 31 - 1);
    expect(toCell(Infinity, 20)).toBe(2 ** 31 - 1);
    expect(toCell(-Infinity, 20)).toBe(-(2 ** 31));
  });

  test('maps NaN to cell 0', () => {
    expect(toCell(NaN, 20)).toBe(0);
  });
});

describe('SpatialHashGrid', () => {
  afterEach(() => {
    setDebugAssertions(true);
  });

  test('rejects a non-positive cell size', () => {
    expect(() => new SpatialHashGrid(0)).toThrow(/cell size/);
    expect(() => new SpatialHashGrid(NaN)).toThrow(/cell size/);
  });

  test('a zero cell size without assertions still terminates', () => {
    setDebugAssertions(false);
    const grid = new SpatialHashGrid(0);
    grid.insertOrUpdate(1, { x: 5, y: 5 }, unitBox);

    expect(grid.cellsOf(1)).toEqual([{ x: 2 ** 31 - 1, y: 2 ** 31 - 1 }]);
  });

  test('a NaN position is tracked in cell 0 and neighbors itself', () => {
    const grid = new SpatialHashGrid(20);
    grid.insertOrUpdate(1, { x: NaN, y: 0 }, unitBox);

    expect(grid.cellsOf(1)).toEqual([{ x: 0, y: -1 }, { x: 0, y: 0 }]);
    expect(grid.neighbors(1)?.has(1)).toBe(true);
  });

  test('an infinite position lands in the edge cell', () => {
    const grid = new SpatialHashGrid(20);
    grid.insertOrUpdate(1, { x: Infinity, y: 5 }, unitBox);
    grid.insertOrUpdate(2, { x: -Infinity, y: 5 }, unitBox);

    expect(grid.cellsOf(1)).toEqual([{ x: 2 ** 31 - 1, y: 0 }]);
    expect(grid.cellsOf(2)).toEqual([{ x: -(2 ** 31), y: 0 }]);
  });

  test('a very distant position covers a single clamped column', () => {
    const grid = new SpatialHashGrid(20);
    grid.insertOrUpdate(1, { x: 1e18, y: 5 }, unitBox);

    expect(grid.cellsOf(1)).toEqual([{ x: 2 ** 31 - 1, y: 0 }]);
    expect(grid.neighbors(1)).toEqual(new Set([1]));
  });

  test('records a small body in a single cell', () => {
    const grid = new SpatialHashGrid(20);
    grid.insertOrUpdate(1, { x: 5, y: 5 }, unitBox);

    expect(grid.cellsOf(1)).toEqual([{ x: 0, y: 0 }]);
  });

  test('records a body in every cell its bounds overlap', () => {
    const grid = new SpatialHashGrid(20);
    const wide = createRectCollider(vec2(30, 10), staticType());
    grid.insertOrUpdate(1, { x: 10, y: 5 }, wide);

    expect(grid.cellsOf(1)).toEqual([{ x: 0, y: 0 }, { x: 1, y: 0 }]);
  });

  test('floors negative bounds into negative cells', () => {
    const grid = new SpatialHashGrid(20);
    grid.insertOrUpdate(1, { x: -5, y: -5 }, unitBox);

    expect(grid.cellsOf(1)).toEqual([{ x: -1, y: -1 }]);
  });

  test('a body straddling the origin covers four cells', () => {
    const grid = new SpatialHashGrid(20);
    grid.insertOrUpdate(1, { x: 0, y: 0 }, unitBox);

    expect(grid.cellsOf(1)).toHaveLength(4);
    expect(grid.getStats().cellCount).toBe(4);
  });

  test('an unchanged update does not touch any bucket', () => {
    const grid = new SpatialHashGrid(20);
    grid.insertOrUpdate(1, { x: 5, y: 5 }, unitBox);
    const before = grid.getStats().mutations;

    grid.insertOrUpdate(1, { x: 5, y: 5 }, unitBox);
    grid.insertOrUpdate(1, { x: 6, y: 7 }, unitBox);

    expect(before).toBe(1);
    expect(grid.getStats().mutations).toBe(1);
  });

  test('moving to another cell relinks the body', () => {
    const grid = new SpatialHashGrid(20);
    grid.insertOrUpdate(1, { x: 5, y: 5 }, unitBox);
    grid.insertOrUpdate(1, { x: 25, y: 5 }, unitBox);

    expect(grid.cellsOf(1)).toEqual([{ x: 1, y: 0 }]);
    expect(grid.entitiesIn(0, 0)).toEqual([]);
    expect(grid.entitiesIn(1, 0)).toEqual([1]);
    expect(grid.getStats().mutations).toBe(3);
    expectInverse(grid);
  });

  test('neighbors include the body itself and everything sharing a cell', () => {
    const grid = new SpatialHashGrid(20);
    grid.insertOrUpdate(1, { x: 5, y: 5 }, unitBox);
    grid.insertOrUpdate(2, { x: 15, y: 15 }, unitBox);
    grid.insertOrUpdate(3, { x: 45, y: 5 }, unitBox);

    expect(grid.neighbors(1)).toEqual(new Set([1, 2]));
    expect(grid.neighbors(3)).toEqual(new Set([3]));
    expectInverse(grid);
  });

  test('neighbors of an untracked body is null', () => {
    const grid = new SpatialHashGrid(20);

    expect(grid.neighbors(7)).toBeNull();
  });

  test('remove forgets the body everywhere', () => {
    const grid = new SpatialHashGrid(20);
    grid.insertOrUpdate(1, { x: 0, y: 0 }, unitBox);
    grid.insertOrUpdate(2, { x: 5, y: 5 }, unitBox);

    expect(grid.remove(1)).toBe(true);

    expect(grid.neighbors(1)).toBeNull();
    expect(grid.has(1)).toBe(false);
    for (const [x, y] of [[-1, -1], [-1, 0], [0, -1], [0, 0]]) {
      expect(grid.entitiesIn(x, y)).not.toContain(1);
    }
    expect(grid.getStats().cellCount).toBe(1);
    expect(grid.remove(1)).toBe(false);
  });

  test('clear empties both indexes', () => {
    const grid = new SpatialHashGrid(20);
    grid.insertOrUpdate(1, { x: 0, y: 0 }, unitBox);
    grid.clear();

    expect(grid.entities()).toEqual([]);
    expect(grid.getStats().cellCount).toBe(0);
  });
});

describe('syncSpatialGrid', () => {
  test('tracks entities with Position and Collider only', () => {
    const world = new PhysicsWorld();
    const solid = world.spawn({ position: createPosition(5, 5), collider: unitBox });
    const ghost = world.spawn({ position: createPosition(5, 5) });
    const grid = new SpatialHashGrid(20);

    syncSpatialGrid(grid, world);

    expect(grid.has(solid)).toBe(true);
    expect(grid.has(ghost)).toBe(false);
  });

  test('drops entities that disappeared since the last sync', () => {
    const world = new PhysicsWorld();
    const a = world.spawn({ position: createPosition(5, 5), collider: unitBox });
    const b = world.spawn({ position: createPosition(6, 6), collider: unitBox });
    const grid = new SpatialHashGrid(20);
    syncSpatialGrid(grid, world);

    world.despawn(a);
    const removed = syncSpatialGrid(grid, world);

    expect(removed).toEqual([a]);
    expect(grid.neighbors(a)).toBeNull();
    expect(grid.neighbors(b)).toEqual(new Set([b]));
  });

  test('drops entities whose collider was removed', () => {
    const world = new PhysicsWorld();
    const a = world.spawn({ position: createPosition(5, 5), collider: unitBox });
    const grid = new SpatialHashGrid(20);
    syncSpatialGrid(grid, world);

    world.removeCollider(a);

    expect(syncSpatialGrid(grid, world)).toEqual([a]);
  });
});
