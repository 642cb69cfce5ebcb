import {
  assertCube,
  axialToCube,
  cubeKey,
  cubeToAxial,
  cubeToOffset,
  offsetToCube,
  toObstacleSet
} from '../geometry/coordinates.js';
import { assertNonNegativeInteger, assertSameScheme } from '../geometry/errors.js';
import { cubeLine } from '../geometry/line.js';
import { cubeSpiral } from '../geometry/neighbors.js';
import type { AxialHex, CubeHex, HexKey, ObstacleSet, OffsetHex, OffsetScheme } from '../geometry/types.js';

// Only the hexes strictly between the endpoints can block; a wall is itself visible.
function lineIsClear(line: CubeHex[], obstacles: ObstacleSet): boolean {
  for (let i = 1; i < line.length - 1; i++) {
    if (obstacles.has(cubeKey(line[i]))) {
      return false;
    }
  }
  return true;
}

export function hasLineOfSight(from: CubeHex, to: CubeHex, obstacles: ObstacleSet = new Set<HexKey>()): boolean {
  return lineIsClear(cubeLine(from, to), obstacles);
}

/**
 * Hexes within `radius` of `center` whose sampled line back to the center
 * crosses no obstacle, in spiral order. Rays are sampled at hex centers, so
 * results near obstacle corners approximate true geometric sight.
 */
export function cubeVisible(
  center: CubeHex,
  radius: number,
  obstacles: ObstacleSet = new Set<HexKey>()
): CubeHex[] {
  assertCube(center);
  assertNonNegativeInteger(radius, 'Radius', 'invalid_radius');

  return cubeSpiral(center, radius).filter((candidate) =>
    lineIsClear(cubeLine(center, candidate), obstacles)
  );
}

export function axialVisible(center: AxialHex, radius: number, obstacles: Iterable<AxialHex> = []): AxialHex[] {
  const blocked = toObstacleSet(Array.from(obstacles, axialToCube));
  return cubeVisible(axialToCube(center), radius, blocked).map(cubeToAxial);
}

export function offsetVisible<S extends OffsetScheme>(
  center: OffsetHex<S>,
  radius: number,
  obstacles: Iterable<OffsetHex<S>> = []
): OffsetHex<S>[] {
  const blocked = toObstacleSet(
    Array.from(obstacles, (hex) => {
      assertSameScheme(center, hex);
      return offsetToCube(hex);
    })
  );
  return cubeVisible(offsetToCube(center), radius, blocked).map((hex) => cubeToOffset(hex, center.scheme));
}
