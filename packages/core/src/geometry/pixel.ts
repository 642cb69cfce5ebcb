import { assertCube } from './coordinates.js';
import { HexGridError, assertNever } from './errors.js';
import { cubeRound } from './line.js';
import type { CubeHex, Layout, PixelPoint } from './types.js';

export interface Orientation {
  f0: number;
  f1: number;
  f2: number;
  f3: number;
  b0: number;
  b1: number;
  b2: number;
  b3: number;
  /** Angle of corner 0, in multiples of 60°. */
  startAngle: number;
}

const SQRT3 = Math.sqrt(3);

export const pointyOrientation: Orientation = {
  f0: SQRT3,
  f1: SQRT3 / 2,
  f2: 0,
  f3: 3 / 2,
  b0: SQRT3 / 3,
  b1: -1 / 3,
  b2: 0,
  b3: 2 / 3,
  startAngle: 0.5
};

export const flatOrientation: Orientation = {
  f0: 3 / 2,
  f1: 0,
  f2: SQRT3 / 2,
  f3: SQRT3,
  b0: 2 / 3,
  b1: 0,
  b2: -1 / 3,
  b3: SQRT3 / 3,
  startAngle: 0
};

export function orientationFor(layout: Layout): Orientation {
  switch (layout) {
    case 'pointy':
      return pointyOrientation;
    case 'flat':
      return flatOrientation;
    default:
      return assertNever(layout);
  }
}

function assertSize(size: number): void {
  if (!Number.isFinite(size) || size <= 0) {
    throw new HexGridError('invalid_size', `Hex size must be a positive number, got ${size}`);
  }
}

/** Center of `hex` for hexes whose corners lie `size` away from their center. */
export function hexToPixel(hex: CubeHex, size: number, layout: Layout = 'pointy'): PixelPoint {
  assertCube(hex);
  assertSize(size);
  const m = orientationFor(layout);
  return {
    x: (m.f0 * hex.q + m.f1 * hex.r) * size,
    y: (m.f2 * hex.q + m.f3 * hex.r) * size
  };
}

export function pixelToHex(point: PixelPoint, size: number, layout: Layout = 'pointy'): CubeHex {
  assertSize(size);
  const m = orientationFor(layout);
  const x = point.x / size;
  const y = point.y / size;
  const q = m.b0 * x + m.b1 * y;
  const r = m.b2 * x + m.b3 * y;
  return cubeRound({ q, r, s: -q - r });
}

export function hexCornerOffset(corner: number, size: number, layout: Layout = 'pointy'): PixelPoint {
  assertSize(size);
  const angle = (2 * Math.PI * (orientationFor(layout).startAngle + corner)) / 6;
  return { x: size * Math.cos(angle), y: size * Math.sin(angle) };
}

export function polygonCorners(hex: CubeHex, size: number, layout: Layout = 'pointy'): PixelPoint[] {
  const center = hexToPixel(hex, size, layout);
  const corners: PixelPoint[] = [];
  for (let corner = 0; corner < 6; corner++) {
    const offset = hexCornerOffset(corner, size, layout);
    corners.push({ x: center.x + offset.x, y: center.y + offset.y });
  }
  return corners;
}
