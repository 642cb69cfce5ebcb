import { cubeAdd, cubeScale } from './arithmetic.js';
import { assertCube, axialToCube, createCube, cubeToAxial, cubeToOffset, offsetToCube } from './coordinates.js';
import { HexGridError, assertNonNegativeInteger } from './errors.js';
import type { AxialHex, CubeHex, Direction, OffsetHex, OffsetScheme } from './types.js';

export const cubeDirections: ReadonlyArray<CubeHex> = [
  createCube(1, 0, -1),
  createCube(1, -1, 0),
  createCube(0, -1, 1),
  createCube(-1, 0, 1),
  createCube(-1, 1, 0),
  createCube(0, 1, -1)
];

const directions: ReadonlyArray<Direction> = [0, 1, 2, 3, 4, 5];

// Any integer is accepted and wrapped, so direction -1 is direction 5.
export function normalizeDirection(direction: number): Direction {
  if (!Number.isInteger(direction)) {
    throw new HexGridError('invalid_direction', `Direction must be an integer, got ${direction}`);
  }
  return directions[((direction % 6) + 6) % 6];
}

export function cubeDirection(direction: number): CubeHex {
  return cubeDirections[normalizeDirection(direction)];
}

export function oppositeDirection(direction: number): Direction {
  return normalizeDirection(direction + 3);
}

export function cubeNeighbor(hex: CubeHex, direction: number): CubeHex {
  return cubeAdd(hex, cubeDirection(direction));
}

export function cubeNeighbors(hex: CubeHex): CubeHex[] {
  assertCube(hex);
  return cubeDirections.map((direction) => cubeAdd(hex, direction));
}

/**
 * Hexes at exactly `radius` from `center`, starting from the corner in
 * direction 4 and walking directions 0..5 in turn.
 */
export function cubeRing(center: CubeHex, radius: number): CubeHex[] {
  assertCube(center);
  assertNonNegativeInteger(radius, 'Radius', 'invalid_radius');
  if (radius === 0) {
    return [center];
  }

  const results: CubeHex[] = [];
  let hex = cubeAdd(center, cubeScale(cubeDirections[4], radius));
  for (const direction of cubeDirections) {
    for (let step = 0; step < radius; step++) {
      results.push(hex);
      hex = cubeAdd(hex, direction);
    }
  }
  return results;
}

/** Rings 0..radius, innermost first: 3 * radius * (radius + 1) + 1 hexes. */
export function cubeSpiral(center: CubeHex, radius: number): CubeHex[] {
  assertCube(center);
  assertNonNegativeInteger(radius, 'Radius', 'invalid_radius');
  const results: CubeHex[] = [center];
  for (let ring = 1; ring <= radius; ring++) {
    results.push(...cubeRing(center, ring));
  }
  return results;
}

export function axialNeighbor(hex: AxialHex, direction: number): AxialHex {
  return cubeToAxial(cubeNeighbor(axialToCube(hex), direction));
}

export function axialNeighbors(hex: AxialHex): AxialHex[] {
  return cubeNeighbors(axialToCube(hex)).map(cubeToAxial);
}

export function axialRing(center: AxialHex, radius: number): AxialHex[] {
  return cubeRing(axialToCube(center), radius).map(cubeToAxial);
}

export function axialSpiral(center: AxialHex, radius: number): AxialHex[] {
  return cubeSpiral(axialToCube(center), radius).map(cubeToAxial);
}

export function offsetNeighbor<S extends OffsetScheme>(hex: OffsetHex<S>, direction: number): OffsetHex<S> {
  return cubeToOffset(cubeNeighbor(offsetToCube(hex), direction), hex.scheme);
}

export function offsetNeighbors<S extends OffsetScheme>(hex: OffsetHex<S>): OffsetHex<S>[] {
  return cubeNeighbors(offsetToCube(hex)).map((cube) => cubeToOffset(cube, hex.scheme));
}

export function offsetRing<S extends OffsetScheme>(center: OffsetHex<S>, radius: number): OffsetHex<S>[] {
  return cubeRing(offsetToCube(center), radius).map((cube) => cubeToOffset(cube, center.scheme));
}

export function offsetSpiral<S extends OffsetScheme>(center: OffsetHex<S>, radius: number): OffsetHex<S>[] {
  return cubeSpiral(offsetToCube(center), radius).map((cube) => cubeToOffset(cube, center.scheme));
}
