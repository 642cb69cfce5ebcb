import { assertCube, parseCubeKey } from '../geometry/coordinates.js';
import { cubeDistance } from '../geometry/distance.js';
import { assertNonNegativeInteger } from '../geometry/errors.js';
import type { CubeHex, ObstacleSet } from '../geometry/types.js';

/**
 * Radius around `start` that contains every target and obstacle plus one
 * obstacle-free ring, so any reachable target is reachable inside it.
 */
export function defaultSearchRadius(
  start: CubeHex,
  targets: Iterable<CubeHex>,
  obstacles: ObstacleSet
): number {
  let farthest = 0;
  for (const target of targets) {
    farthest = Math.max(farthest, cubeDistance(start, target));
  }
  for (const key of obstacles) {
    farthest = Math.max(farthest, cubeDistance(start, parseCubeKey(key)));
  }
  return farthest + 1;
}

export function resolveSearchRadius(
  start: CubeHex,
  targets: Iterable<CubeHex>,
  obstacles: ObstacleSet,
  searchRadius: number | undefined
): number {
  assertCube(start);
  if (searchRadius === undefined) {
    return defaultSearchRadius(start, targets, obstacles);
  }
  assertNonNegativeInteger(searchRadius, 'Search radius', 'invalid_radius');
  return searchRadius;
}
