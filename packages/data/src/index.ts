import {
  createCube,
  cubeDistance,
  cubeKey,
  cubeNeighbors,
  cubeToOffset,
  generateHexMap,
  generateRectangularMap,
  isCube,
  offsetToCube,
  parseCubeKey
} from '@hexnav/core';
import type { CubeHex, OffsetScheme } from '@hexnav/core';
import { z } from 'zod';

export const cubeHexSchema = z
  .object({
    q: z.number().int(),
    r: z.number().int(),
    s: z.number().int()
  })
  .refine((hex) => hex.q + hex.r + hex.s === 0, {
    message: 'Cube coordinates must sum to zero'
  });

export const axialHexSchema = z.object({
  q: z.number().int(),
  r: z.number().int()
});

export const offsetSchemeSchema = z.enum(['odd-r', 'even-r', 'odd-q', 'even-q']);

export const offsetHexSchema = z.object({
  col: z.number().int(),
  row: z.number().int(),
  scheme: offsetSchemeSchema
});

export const layoutSchema = z.enum(['pointy', 'flat']);

export const pixelPointSchema = z.object({
  x: z.number().finite(),
  y: z.number().finite()
});

export const radiusSchema = z.number().int().nonnegative();

export interface HexagonShape {
  kind: 'hexagon';
  radius: number;
  center?: CubeHex;
}

export interface RectangleShape {
  kind: 'rectangle';
  width: number;
  height: number;
  scheme: OffsetScheme;
}

export type MapShape = HexagonShape | RectangleShape;

export interface GridScenario {
  id: string;
  name: string;
  brief: string;
  shape: MapShape;
  obstacles: CubeHex[];
  start: CubeHex;
  goal: CubeHex;
  visionRadius: number;
}

export interface ScenarioBundle {
  scenarios: GridScenario[];
}

const mapShapeSchema = z.discriminatedUnion('kind', [
  z.object({
    kind: z.literal('hexagon'),
    radius: radiusSchema,
    center: cubeHexSchema.optional()
  }),
  z.object({
    kind: z.literal('rectangle'),
    width: z.number().int().positive(),
    height: z.number().int().positive(),
    scheme: offsetSchemeSchema
  })
]);

export function isInsideShape(shape: MapShape, hex: CubeHex): boolean {
  if (shape.kind === 'hexagon') {
    return cubeDistance(shape.center ?? createCube(0, 0), hex) <= shape.radius;
  }
  const { col, row } = cubeToOffset(hex, shape.scheme);
  return col >= 0 && col < shape.width && row >= 0 && row < shape.height;
}

export function shapeHexes(shape: MapShape): CubeHex[] {
  if (shape.kind === 'hexagon') {
    return generateHexMap(shape.radius, shape.center);
  }
  return generateRectangularMap(shape.width, shape.height, shape.scheme).map(offsetToCube);
}

const gridScenarioSchema = z
  .object({
    id: z.string().min(1),
    name: z.string(),
    brief: z.string(),
    shape: mapShapeSchema,
    obstacles: z.array(cubeHexSchema),
    start: cubeHexSchema,
    goal: cubeHexSchema,
    visionRadius: radiusSchema
  })
  .superRefine((scenario, ctx) => {
    const points: Array<[string, CubeHex]> = [
      ['start', scenario.start],
      ['goal', scenario.goal],
      ...scenario.obstacles.map((hex, index): [string, CubeHex] => [`obstacles.${index}`, hex])
    ];
    const center = scenario.shape.kind === 'hexagon' ? scenario.shape.center : undefined;
    // Malformed hexes already carry their own issues.
    if (!points.every(([, hex]) => isCube(hex)) || (center && !isCube(center))) {
      return;
    }
    for (const [label, hex] of points) {
      if (!isInsideShape(scenario.shape, hex)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `${label} ${cubeKey(hex)} lies outside the map`
        });
      }
    }
    if (scenario.obstacles.some((hex) => cubeKey(hex) === cubeKey(scenario.start))) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'start cannot be an obstacle' });
    }
  });

const bundleSchema = z
  .object({
    scenarios: z.array(gridScenarioSchema)
  })
  .superRefine((bundle, ctx) => {
    const seen = new Set<string>();
    for (const scenario of bundle.scenarios) {
      if (seen.has(scenario.id)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Duplicate scenario id ${scenario.id}` });
      }
      seen.add(scenario.id);
    }
  });

export function loadGridScenario(raw: unknown): GridScenario {
  return gridScenarioSchema.parse(raw);
}

export function loadScenarioBundle(raw: unknown): ScenarioBundle {
  return bundleSchema.parse(raw);
}

/**
 * Obstacles plus the ring of hexes just outside the map, so searches over a
 * scenario never leave its shape.
 */
export function scenarioObstacles(scenario: GridScenario): CubeHex[] {
  const inside = new Set(shapeHexes(scenario.shape).map(cubeKey));
  const border = new Map<string, CubeHex>();
  for (const key of inside) {
    for (const neighbor of cubeNeighbors(parseCubeKey(key))) {
      const neighborKey = cubeKey(neighbor);
      if (!inside.has(neighborKey)) {
        border.set(neighborKey, neighbor);
      }
    }
  }
  return [...scenario.obstacles, ...border.values()];
}

const hex = (q: number, r: number): CubeHex => createCube(q, r);

export const starterScenarios: GridScenario[] = [
  {
    id: 'open-field',
    name: 'Open Field',
    brief: 'No cover anywhere. The straight line is the shortest route.',
    shape: { kind: 'hexagon', radius: 4 },
    obstacles: [],
    start: hex(0, 0),
    goal: hex(3, -1),
    visionRadius: 3
  },
  {
    id: 'ring-fort',
    name: 'Ring Fort',
    brief: 'A walled ring with a single breach on its eastern face.',
    shape: { kind: 'hexagon', radius: 5 },
    obstacles: [
      hex(-2, 2),
      hex(-1, 2),
      hex(0, 2),
      hex(1, 1),
      hex(2, 0),
      hex(2, -2),
      hex(1, -2),
      hex(0, -2),
      hex(-1, -1),
      hex(-2, 0),
      hex(-2, 1)
    ],
    start: hex(0, 0),
    goal: hex(4, -2),
    visionRadius: 4
  },
  {
    id: 'sealed-vault',
    name: 'Sealed Vault',
    brief: 'The start is boxed in on every side.',
    shape: { kind: 'rectangle', width: 8, height: 6, scheme: 'odd-r' },
    obstacles: [hex(4, 2), hex(4, 1), hex(3, 1), hex(2, 2), hex(2, 3), hex(3, 3)],
    start: hex(3, 2),
    goal: hex(5, 0),
    visionRadius: 2
  }
];

export const starterBundle: ScenarioBundle = {
  scenarios: starterScenarios
};

export const validatedStarterBundle = loadScenarioBundle(starterBundle);
