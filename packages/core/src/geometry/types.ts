export interface CubeHex {
  q: number;
  r: number;
  s: number;
}

export interface AxialHex {
  q: number;
  r: number;
}

export type OffsetScheme = 'odd-r' | 'even-r' | 'odd-q' | 'even-q';

export interface OffsetHex<S extends OffsetScheme = OffsetScheme> {
  col: number;
  row: number;
  scheme: S;
}

// Indexes into cubeDirections; d and (d + 3) % 6 are opposite.
export type Direction = 0 | 1 | 2 | 3 | 4 | 5;

export interface FractionalCube {
  q: number;
  r: number;
  s: number;
}

export interface PixelPoint {
  x: number;
  y: number;
}

export type Layout = 'pointy' | 'flat';

// Cube keys ("q,r,s") so that value-equal hexes collide in sets and maps.
export type HexKey = string;
export type ObstacleSet = ReadonlySet<HexKey>;
