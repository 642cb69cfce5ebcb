import { assertCube, axialToCube, createCube, cubeToAxial, cubeToOffset, offsetToCube } from './coordinates.js';
import { cubeDistance } from './distance.js';
import { assertSameScheme } from './errors.js';
import type { AxialHex, CubeHex, FractionalCube, OffsetHex, OffsetScheme } from './types.js';

// Keeps interpolated points off the edges shared by two hexes. The three
// components differ pairwise so no two rounding errors can stay equal.
const LINE_NUDGE: FractionalCube = { q: 1e-6, r: 2e-6, s: -3e-6 };

export function cubeLerp(a: FractionalCube, b: FractionalCube, t: number): FractionalCube {
  return {
    q: a.q + (b.q - a.q) * t,
    r: a.r + (b.r - a.r) * t,
    s: a.s + (b.s - a.s) * t
  };
}

/**
 * Snaps a fractional cube coordinate to the nearest hex. The component with
 * the largest rounding error is recomputed from the other two.
 */
export function cubeRound(cube: FractionalCube): CubeHex {
  let q = Math.round(cube.q);
  let r = Math.round(cube.r);
  let s = Math.round(cube.s);

  const qDiff = Math.abs(q - cube.q);
  const rDiff = Math.abs(r - cube.r);
  const sDiff = Math.abs(s - cube.s);

  if (qDiff > rDiff && qDiff > sDiff) {
    q = -r - s;
  } else if (rDiff > sDiff) {
    r = -q - s;
  } else {
    s = -q - r;
  }

  return createCube(q, r, s);
}

const nudge = (hex: CubeHex): FractionalCube => ({
  q: hex.q + LINE_NUDGE.q,
  r: hex.r + LINE_NUDGE.r,
  s: hex.s + LINE_NUDGE.s
});

/** Every hex from `a` to `b` inclusive, cubeDistance(a, b) + 1 of them. */
export function cubeLine(a: CubeHex, b: CubeHex): CubeHex[] {
  assertCube(a);
  assertCube(b);
  const distance = cubeDistance(a, b);
  if (distance === 0) {
    return [a];
  }

  const start = nudge(a);
  const end = nudge(b);
  const results: CubeHex[] = [];
  for (let i = 0; i <= distance; i++) {
    results.push(cubeRound(cubeLerp(start, end, i / distance)));
  }
  return results;
}

export function axialLine(a: AxialHex, b: AxialHex): AxialHex[] {
  return cubeLine(axialToCube(a), axialToCube(b)).map(cubeToAxial);
}

export function offsetLine<S extends OffsetScheme>(a: OffsetHex<S>, b: OffsetHex<S>): OffsetHex<S>[] {
  assertSameScheme(a, b);
  return cubeLine(offsetToCube(a), offsetToCube(b)).map((cube) => cubeToOffset(cube, a.scheme));
}
