import { describe, expect, it } from 'vitest';

import { createCube } from './coordinates.js';
import { HexGridError } from './errors.js';
import { cubeSpiral } from './neighbors.js';
import { hexCornerOffset, hexToPixel, pixelToHex, polygonCorners } from './pixel.js';
import type { Layout } from './types.js';

const layouts: Layout[] = ['pointy', 'flat'];
const SQRT3 = Math.sqrt(3);

describe('hexToPixel', () => {
  it('places the origin at the origin', () => {
    expect(hexToPixel(createCube(0, 0), 10, 'pointy')).toEqual({ x: 0, y: 0 });
  });

  it('uses the layout basis', () => {
    const east = hexToPixel(createCube(1, 0, -1), 10, 'pointy');
    expect(east.x).toBeCloseTo(10 * SQRT3);
    expect(east.y).toBeCloseTo(0);

    const southEast = hexToPixel(createCube(0, 1, -1), 10, 'pointy');
    expect(southEast.x).toBeCloseTo(5 * SQRT3);
    expect(southEast.y).toBeCloseTo(15);

    const flat = hexToPixel(createCube(1, 0, -1), 10, 'flat');
    expect(flat.x).toBeCloseTo(15);
    expect(flat.y).toBeCloseTo(5 * SQRT3);
  });

  it('rejects non-positive sizes', () => {
    expect(() => hexToPixel(createCube(0, 0), 0)).toThrow(HexGridError);
    expect(() => pixelToHex({ x: 1, y: 1 }, -3)).toThrow(HexGridError);
  });
});

describe('pixelToHex', () => {
  it('picks the hex whose area contains the point', () => {
    expect(pixelToHex({ x: 9, y: 1 }, 10, 'pointy')).toEqual({ q: 1, r: 0, s: -1 });
    expect(pixelToHex({ x: 8, y: 1 }, 10, 'pointy')).toEqual({ q: 0, r: 0, s: 0 });
  });

  it('inverts hexToPixel for both layouts', () => {
    for (const layout of layouts) {
      for (const size of [10, 2.5]) {
        for (const hex of cubeSpiral(createCube(0, 0), 4)) {
          expect(pixelToHex(hexToPixel(hex, size, layout), size, layout)).toEqual(hex);
        }
      }
    }
  });
});

describe('polygonCorners', () => {
  it('starts pointy corners at 30 degrees', () => {
    const corners = polygonCorners(createCube(0, 0), 10, 'pointy');
    expect(corners).toHaveLength(6);
    expect(corners[0].x).toBeCloseTo(5 * SQRT3);
    expect(corners[0].y).toBeCloseTo(5);
    expect(corners[3].x).toBeCloseTo(-5 * SQRT3);
    expect(corners[3].y).toBeCloseTo(-5);
  });

  it('starts flat corners at 0 degrees', () => {
    expect(hexCornerOffset(0, 10, 'flat').x).toBeCloseTo(10);
    expect(hexCornerOffset(0, 10, 'flat').y).toBeCloseTo(0);
    expect(hexCornerOffset(1, 10, 'flat').x).toBeCloseTo(5);
    expect(hexCornerOffset(1, 10, 'flat').y).toBeCloseTo(5 * SQRT3);
  });

  it('surrounds the hex center at radius size', () => {
    const hex = createCube(2, -1, -1);
    for (const layout of layouts) {
      const center = hexToPixel(hex, 12, layout);
      for (const corner of polygonCorners(hex, 12, layout)) {
        expect(Math.hypot(corner.x - center.x, corner.y - center.y)).toBeCloseTo(12);
      }
    }
  });
});
