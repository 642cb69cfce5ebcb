import { describe, expect, it } from 'vitest';

import { createCube, cubeKey, toObstacleSet } from '../geometry/coordinates.js';
import { cubeDistance } from '../geometry/distance.js';
import { HexGridError } from '../geometry/errors.js';
import { cubeRing, cubeSpiral } from '../geometry/neighbors.js';
import type { OffsetHex } from '../geometry/types.js';
import { axialBfs, cubeBfs, offsetBfs, reachedHexes } from './reachability.js';

const origin = createCube(0, 0);

describe('cubeBfs', () => {
  it('records the distance to every goal and the start', () => {
    const distances = cubeBfs(origin, [createCube(1, -1, 0), createCube(0, 1, -1)], new Set<string>());

    expect(distances.get('0,0,0')).toBe(0);
    expect(distances.get('1,-1,0')).toBe(1);
    expect(distances.get('0,1,-1')).toBe(1);
  });

  it('stops as soon as the last goal is dequeued', () => {
    const distances = cubeBfs(origin, [createCube(1, 0, -1)]);
    expect(distances.size).toBe(7);
    expect(Math.max(...distances.values())).toBe(1);
  });

  it('floods up to maxDistance when there are no goals', () => {
    const distances = cubeBfs(origin, [], new Set<string>(), { maxDistance: 3 });
    expect(distances.size).toBe(cubeSpiral(origin, 3).length);
    for (const { hex, distance } of reachedHexes(distances)) {
      expect(distance).toBe(cubeDistance(origin, hex));
    }
  });

  it('never enters obstacles', () => {
    const obstacles = toObstacleSet([createCube(1, 0, -1)]);
    const distances = cubeBfs(origin, [createCube(2, 0, -2)], obstacles);

    expect(distances.has('1,0,-1')).toBe(false);
    expect(distances.get('2,0,-2')).toBe(3);
  });

  it('cannot leave an enclosed start', () => {
    const obstacles = toObstacleSet(cubeRing(origin, 1));
    const distances = cubeBfs(origin, [createCube(3, 0, -3)], obstacles);

    expect(Array.from(distances.keys())).toEqual([cubeKey(origin)]);
  });

  it('rejects a negative depth', () => {
    expect(() => cubeBfs(origin, [], new Set<string>(), { maxDistance: -1 })).toThrow(HexGridError);
  });
});

describe('axialBfs', () => {
  it('returns axial hexes with their distances', () => {
    const reached = axialBfs({ q: 0, r: 0 }, [{ q: 0, r: 1 }]);
    expect(reached[0]).toEqual({ hex: { q: 0, r: 0 }, distance: 0 });
    expect(reached.find(({ hex }) => hex.q === 0 && hex.r === 1)?.distance).toBe(1);
  });
});

describe('offsetBfs', () => {
  it('keeps the start scheme on every reached hex', () => {
    const reached = offsetBfs({ col: 0, row: 0, scheme: 'odd-r' }, [], [], { maxDistance: 1 });

    expect(reached).toHaveLength(7);
    expect(reached[0]).toEqual({ hex: { col: 0, row: 0, scheme: 'odd-r' }, distance: 0 });
    expect(reached[1]).toEqual({ hex: { col: 1, row: 0, scheme: 'odd-r' }, distance: 1 });
    expect(reached.every(({ hex }) => hex.scheme === 'odd-r')).toBe(true);
  });

  it('rejects goals and obstacles in another scheme', () => {
    const start: OffsetHex = { col: 0, row: 0, scheme: 'odd-r' };
    const other: OffsetHex = { col: 1, row: 0, scheme: 'even-r' };

    expect(() => offsetBfs(start, [other])).toThrow(HexGridError);
    expect(() => offsetBfs(start, [], [other])).toThrow('Mixed odd-r and even-r offset coordinates');
  });
});
