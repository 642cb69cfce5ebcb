import { createCube } from './coordinates.js';
import { assertNonNegativeInteger } from './errors.js';
import { cubeSpiral } from './neighbors.js';
import type { CubeHex, OffsetHex, OffsetScheme } from './types.js';

export function generateHexMap(radius: number, center: CubeHex = createCube(0, 0)): CubeHex[] {
  return cubeSpiral(center, radius);
}

/** Row-major rectangle of offset coordinates with its origin at (0, 0). */
export function generateRectangularMap<S extends OffsetScheme>(
  width: number,
  height: number,
  scheme: S
): OffsetHex<S>[] {
  assertNonNegativeInteger(width, 'Width');
  assertNonNegativeInteger(height, 'Height');
  const tiles: OffsetHex<S>[] = [];
  for (let row = 0; row < height; row++) {
    for (let col = 0; col < width; col++) {
      tiles.push({ col, row, scheme });
    }
  }
  return tiles;
}
