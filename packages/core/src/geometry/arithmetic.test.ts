import { describe, expect, it } from 'vitest';

import { cubeAdd, cubeRotateLeft, cubeRotateRight, cubeScale, cubeSubtract } from './arithmetic.js';
import { createCube } from './coordinates.js';
import { HexGridError } from './errors.js';
import { cubeDirections, cubeSpiral } from './neighbors.js';

const a = createCube(1, -2, 1);
const b = createCube(2, 0, -2);

describe('hex arithmetic', () => {
  it('adds and subtracts componentwise', () => {
    expect(cubeAdd(a, b)).toEqual({ q: 3, r: -2, s: -1 });
    expect(cubeSubtract(a, b)).toEqual({ q: -1, r: -2, s: 3 });
  });

  it('scales by non-negative integers only', () => {
    expect(cubeScale(a, 3)).toEqual({ q: 3, r: -6, s: 3 });
    expect(cubeScale(a, 0)).toEqual({ q: 0, r: 0, s: 0 });
    expect(() => cubeScale(a, -1)).toThrow(HexGridError);
    expect(() => cubeScale(a, 1.5)).toThrow(/non-negative integer/);
  });

  it('rejects invalid operands', () => {
    expect(() => cubeAdd({ q: 1, r: 1, s: 1 }, b)).toThrow(HexGridError);
  });

  it('rotates one direction step per call', () => {
    expect(cubeRotateLeft(createCube(1, 0, -1))).toEqual({ q: 0, r: 1, s: -1 });
    expect(cubeRotateRight(createCube(1, 0, -1))).toEqual({ q: 1, r: -1, s: 0 });
    cubeDirections.forEach((direction, index) => {
      expect(cubeRotateLeft(direction)).toEqual(cubeDirections[(index + 5) % 6]);
      expect(cubeRotateRight(direction)).toEqual(cubeDirections[(index + 1) % 6]);
    });
  });

  it('returns to the start after six left rotations or a left and a right', () => {
    for (const hex of cubeSpiral(createCube(0, 0), 3)) {
      let rotated = hex;
      for (let i = 0; i < 6; i++) {
        rotated = cubeRotateLeft(rotated);
      }
      expect(rotated).toEqual(hex);
      expect(cubeRotateRight(cubeRotateLeft(hex))).toEqual(hex);
      expect(cubeRotateLeft(cubeRotateRight(hex))).toEqual(hex);
    }
  });
});
