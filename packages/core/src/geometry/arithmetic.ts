import { assertCube, createCube } from './coordinates.js';
import { HexGridError } from './errors.js';
import type { CubeHex } from './types.js';

export function cubeAdd(a: CubeHex, b: CubeHex): CubeHex {
  assertCube(a);
  assertCube(b);
  return createCube(a.q + b.q, a.r + b.r, a.s + b.s);
}

export function cubeSubtract(a: CubeHex, b: CubeHex): CubeHex {
  assertCube(a);
  assertCube(b);
  return createCube(a.q - b.q, a.r - b.r, a.s - b.s);
}

export function cubeScale(hex: CubeHex, factor: number): CubeHex {
  assertCube(hex);
  if (!Number.isInteger(factor) || factor < 0) {
    throw new HexGridError('invalid_scale', `Scale factor must be a non-negative integer, got ${factor}`);
  }
  return createCube(hex.q * factor, hex.r * factor, hex.s * factor);
}

/**
 * Rotates 60° counter-clockwise about the origin (in a y-up plane), taking
 * direction d to direction (d + 5) % 6.
 */
export function cubeRotateLeft(hex: CubeHex): CubeHex {
  assertCube(hex);
  return createCube(-hex.r, -hex.s, -hex.q);
}

/** Inverse of {@link cubeRotateLeft}. */
export function cubeRotateRight(hex: CubeHex): CubeHex {
  assertCube(hex);
  return createCube(-hex.s, -hex.q, -hex.r);
}
