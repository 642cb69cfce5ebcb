import { describe, expect, it } from 'vitest';
import { ZodError } from 'zod';

import {
  cubeHexSchema,
  loadGridScenario,
  loadScenarioBundle,
  scenarioObstacles,
  shapeHexes,
  starterBundle,
  validatedStarterBundle
} from './index.js';

const baseScenario = {
  id: 'tiny',
  name: 'Tiny',
  brief: 'One ring around the origin.',
  shape: { kind: 'hexagon', radius: 1 },
  obstacles: [],
  start: { q: 0, r: 0, s: 0 },
  goal: { q: 1, r: 0, s: -1 },
  visionRadius: 1
};

describe('coordinate schemas', () => {
  it('enforces the zero-sum invariant on cube hexes', () => {
    expect(cubeHexSchema.safeParse({ q: 1, r: -1, s: 0 }).success).toBe(true);
    expect(cubeHexSchema.safeParse({ q: 1, r: 1, s: 1 }).success).toBe(false);
    expect(cubeHexSchema.safeParse({ q: 0.5, r: -0.5, s: 0 }).success).toBe(false);
  });
});

describe('scenario bundle', () => {
  it('validates the starter bundle', () => {
    const bundle = loadScenarioBundle(starterBundle);
    expect(bundle.scenarios.map((scenario) => scenario.id)).toEqual([
      'open-field',
      'ring-fort',
      'sealed-vault'
    ]);
  });

  it('exports a prevalidated bundle', () => {
    expect(validatedStarterBundle.scenarios[1].obstacles).toHaveLength(11);
  });

  it('rejects duplicate scenario ids', () => {
    expect(() => loadScenarioBundle({ scenarios: [baseScenario, baseScenario] })).toThrow(
      /Duplicate scenario id tiny/
    );
  });
});

describe('loadGridScenario', () => {
  it('accepts a well-formed scenario', () => {
    expect(loadGridScenario(baseScenario).goal).toEqual({ q: 1, r: 0, s: -1 });
  });

  it('rejects hexes outside the map', () => {
    expect(() => loadGridScenario({ ...baseScenario, goal: { q: 3, r: 0, s: -3 } })).toThrow(
      /goal 3,0,-3 lies outside the map/
    );
  });

  it('rejects a start that is also an obstacle', () => {
    expect(() => loadGridScenario({ ...baseScenario, obstacles: [{ q: 0, r: 0, s: 0 }] })).toThrow(
      /start cannot be an obstacle/
    );
  });

  it('reports malformed hexes as validation errors', () => {
    expect(() => loadGridScenario({ ...baseScenario, start: { q: 1, r: 1, s: 1 } })).toThrow(ZodError);
  });
});

describe('map shapes', () => {
  it('walls off the hexes just outside the map', () => {
    const scenario = loadGridScenario(baseScenario);
    expect(shapeHexes(scenario.shape)).toHaveLength(7);
    expect(scenarioObstacles(scenario)).toHaveLength(12);
  });

  it('covers every cell of a rectangle', () => {
    const rectangle = shapeHexes({ kind: 'rectangle', width: 4, height: 3, scheme: 'even-r' });
    expect(rectangle).toHaveLength(12);
    expect(rectangle[0]).toEqual({ q: 0, r: 0, s: 0 });
  });
});
