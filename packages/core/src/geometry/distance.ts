import { assertCube, axialToCube, offsetToCube } from './coordinates.js';
import { assertSameScheme } from './errors.js';
import type { AxialHex, CubeHex, OffsetHex } from './types.js';

export function cubeDistance(a: CubeHex, b: CubeHex): number {
  assertCube(a);
  assertCube(b);
  return (Math.abs(a.q - b.q) + Math.abs(a.r - b.r) + Math.abs(a.s - b.s)) / 2;
}

export function axialDistance(a: AxialHex, b: AxialHex): number {
  return cubeDistance(axialToCube(a), axialToCube(b));
}

export function offsetDistance(a: OffsetHex, b: OffsetHex): number {
  assertSameScheme(a, b);
  return cubeDistance(offsetToCube(a), offsetToCube(b));
}
