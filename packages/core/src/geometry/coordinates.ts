import { HexGridError, assertNever } from './errors.js';
import type { AxialHex, CubeHex, HexKey, ObstacleSet, OffsetHex, OffsetScheme } from './types.js';

// Folds -0 into 0 so structurally equal hexes compare equal.
const zero = (value: number) => (value === 0 ? 0 : value);

export function isCube(value: CubeHex): boolean {
  return (
    Number.isInteger(value.q) &&
    Number.isInteger(value.r) &&
    Number.isInteger(value.s) &&
    value.q + value.r + value.s === 0
  );
}

export function assertCube(value: CubeHex): void {
  if (!isCube(value)) {
    throw new HexGridError(
      'invalid_coordinate',
      `Invalid cube coordinate ${JSON.stringify(value)}: components must be integers summing to zero`
    );
  }
}

/**
 * Builds a validated cube hex. `s` defaults to `-q - r`; an explicit `s`
 * that breaks the zero-sum invariant is rejected rather than corrected.
 */
export function createCube(q: number, r: number, s: number = -q - r): CubeHex {
  const cube = { q: zero(q), r: zero(r), s: zero(s) };
  assertCube(cube);
  return cube;
}

export const cubeKey = (hex: CubeHex): HexKey => `${hex.q},${hex.r},${hex.s}`;

export function parseCubeKey(key: HexKey): CubeHex {
  const parts = key.split(',');
  if (parts.length !== 3 || parts.some((part) => part.trim() === '')) {
    throw new HexGridError('invalid_coordinate', `Malformed cube key "${key}"`);
  }
  const [q, r, s] = parts.map(Number);
  return createCube(q, r, s);
}

export function toObstacleSet(hexes: Iterable<CubeHex>): ObstacleSet {
  const keys = new Set<HexKey>();
  for (const hex of hexes) {
    assertCube(hex);
    keys.add(cubeKey(hex));
  }
  return keys;
}

export function cubeEquals(a: CubeHex, b: CubeHex): boolean {
  return a.q === b.q && a.r === b.r && a.s === b.s;
}

export function axialToCube(hex: AxialHex): CubeHex {
  return createCube(hex.q, hex.r);
}

export function cubeToAxial(hex: CubeHex): AxialHex {
  assertCube(hex);
  return { q: zero(hex.q), r: zero(hex.r) };
}

function assertOffset(hex: OffsetHex): void {
  if (!Number.isInteger(hex.col) || !Number.isInteger(hex.row)) {
    throw new HexGridError(
      'invalid_coordinate',
      `Invalid offset coordinate ${JSON.stringify(hex)}: col and row must be integers`
    );
  }
}

export function cubeToOddR(hex: CubeHex): OffsetHex<'odd-r'> {
  assertCube(hex);
  return { col: zero(hex.q + (hex.r - (hex.r & 1)) / 2), row: zero(hex.r), scheme: 'odd-r' };
}

export function oddRToCube(hex: OffsetHex<'odd-r'>): CubeHex {
  assertOffset(hex);
  return createCube(hex.col - (hex.row - (hex.row & 1)) / 2, hex.row);
}

export function cubeToEvenR(hex: CubeHex): OffsetHex<'even-r'> {
  assertCube(hex);
  return { col: zero(hex.q + (hex.r + (hex.r & 1)) / 2), row: zero(hex.r), scheme: 'even-r' };
}

export function evenRToCube(hex: OffsetHex<'even-r'>): CubeHex {
  assertOffset(hex);
  return createCube(hex.col - (hex.row + (hex.row & 1)) / 2, hex.row);
}

export function cubeToOddQ(hex: CubeHex): OffsetHex<'odd-q'> {
  assertCube(hex);
  return { col: zero(hex.q), row: zero(hex.r + (hex.q - (hex.q & 1)) / 2), scheme: 'odd-q' };
}

export function oddQToCube(hex: OffsetHex<'odd-q'>): CubeHex {
  assertOffset(hex);
  return createCube(hex.col, hex.row - (hex.col - (hex.col & 1)) / 2);
}

export function cubeToEvenQ(hex: CubeHex): OffsetHex<'even-q'> {
  assertCube(hex);
  return { col: zero(hex.q), row: zero(hex.r + (hex.q + (hex.q & 1)) / 2), scheme: 'even-q' };
}

export function evenQToCube(hex: OffsetHex<'even-q'>): CubeHex {
  assertOffset(hex);
  return createCube(hex.col, hex.row - (hex.col + (hex.col & 1)) / 2);
}

export function cubeToOffset<S extends OffsetScheme>(hex: CubeHex, scheme: S): OffsetHex<S>;
export function cubeToOffset(hex: CubeHex, scheme: OffsetScheme): OffsetHex {
  switch (scheme) {
    case 'odd-r':
      return cubeToOddR(hex);
    case 'even-r':
      return cubeToEvenR(hex);
    case 'odd-q':
      return cubeToOddQ(hex);
    case 'even-q':
      return cubeToEvenQ(hex);
    default:
      return assertNever(scheme);
  }
}

/** Converts using the scheme carried by the value itself. */
export function offsetToCube(hex: OffsetHex): CubeHex {
  const { col, row } = hex;
  switch (hex.scheme) {
    case 'odd-r':
      return oddRToCube({ col, row, scheme: 'odd-r' });
    case 'even-r':
      return evenRToCube({ col, row, scheme: 'even-r' });
    case 'odd-q':
      return oddQToCube({ col, row, scheme: 'odd-q' });
    case 'even-q':
      return evenQToCube({ col, row, scheme: 'even-q' });
    default:
      return assertNever(hex.scheme);
  }
}
