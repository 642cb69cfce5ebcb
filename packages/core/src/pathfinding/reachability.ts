import {
  assertCube,
  axialToCube,
  cubeKey,
  cubeToAxial,
  cubeToOffset,
  offsetToCube,
  parseCubeKey,
  toObstacleSet
} from '../geometry/coordinates.js';
import { cubeDistance } from '../geometry/distance.js';
import { assertNonNegativeInteger, assertSameScheme } from '../geometry/errors.js';
import { cubeNeighbors } from '../geometry/neighbors.js';
import type { AxialHex, CubeHex, HexKey, ObstacleSet, OffsetHex, OffsetScheme } from '../geometry/types.js';
import { resolveSearchRadius } from './search-bounds.js';
import type { ReachabilityOptions } from './types.js';

export interface ReachedHex<H = CubeHex> {
  hex: H;
  distance: number;
}

/**
 * Breadth-first distances from `start`, keyed by cube key. Stops as soon as
 * every goal has been dequeued; with no goals it floods the whole search
 * region (or `maxDistance`, whichever is smaller).
 */
export function cubeBfs(
  start: CubeHex,
  goals: Iterable<CubeHex> = [],
  obstacles: ObstacleSet = new Set<HexKey>(),
  options: ReachabilityOptions = {}
): Map<HexKey, number> {
  assertCube(start);
  const goalList = Array.from(goals);
  const goalKeys = new Set(
    goalList.map((goal) => {
      assertCube(goal);
      return cubeKey(goal);
    })
  );

  const maxDistance = options.maxDistance ?? Number.POSITIVE_INFINITY;
  if (options.maxDistance !== undefined) {
    assertNonNegativeInteger(options.maxDistance, 'Max distance');
  }
  const searchRadius =
    options.searchRadius === undefined && options.maxDistance !== undefined
      ? options.maxDistance
      : resolveSearchRadius(start, goalList, obstacles, options.searchRadius);

  const distances = new Map<HexKey, number>([[cubeKey(start), 0]]);
  const frontier: CubeHex[] = [start];
  const foundGoals = new Set<HexKey>();

  for (let head = 0; head < frontier.length; head++) {
    const current = frontier[head];
    const currentKey = cubeKey(current);
    const currentDistance = distances.get(currentKey) ?? 0;

    if (goalKeys.has(currentKey)) {
      foundGoals.add(currentKey);
      if (foundGoals.size === goalKeys.size) {
        break;
      }
    }

    if (currentDistance >= maxDistance) {
      continue;
    }

    for (const neighbor of cubeNeighbors(current)) {
      const neighborKey = cubeKey(neighbor);
      if (distances.has(neighborKey) || obstacles.has(neighborKey)) {
        continue;
      }
      if (cubeDistance(start, neighbor) > searchRadius) {
        continue;
      }
      distances.set(neighborKey, currentDistance + 1);
      frontier.push(neighbor);
    }
  }

  return distances;
}

export function reachedHexes(distances: Map<HexKey, number>): ReachedHex[] {
  return Array.from(distances, ([key, distance]) => ({ hex: parseCubeKey(key), distance }));
}

export function axialBfs(
  start: AxialHex,
  goals: Iterable<AxialHex> = [],
  obstacles: Iterable<AxialHex> = [],
  options: ReachabilityOptions = {}
): ReachedHex<AxialHex>[] {
  const distances = cubeBfs(
    axialToCube(start),
    Array.from(goals, axialToCube),
    toObstacleSet(Array.from(obstacles, axialToCube)),
    options
  );
  return reachedHexes(distances).map(({ hex, distance }) => ({ hex: cubeToAxial(hex), distance }));
}

export function offsetBfs<S extends OffsetScheme>(
  start: OffsetHex<S>,
  goals: Iterable<OffsetHex<S>> = [],
  obstacles: Iterable<OffsetHex<S>> = [],
  options: ReachabilityOptions = {}
): ReachedHex<OffsetHex<S>>[] {
  const toCube = (hex: OffsetHex<S>) => {
    assertSameScheme(start, hex);
    return offsetToCube(hex);
  };
  const distances = cubeBfs(
    offsetToCube(start),
    Array.from(goals, toCube),
    toObstacleSet(Array.from(obstacles, toCube)),
    options
  );
  return reachedHexes(distances).map(({ hex, distance }) => ({
    hex: cubeToOffset(hex, start.scheme),
    distance
  }));
}
