import { cubeDistance, isCube } from '@hexnav/core';
import type { CubeHex } from '@hexnav/core';
import { cubeHexSchema, layoutSchema, pixelPointSchema, radiusSchema } from '@hexnav/data';
import { z } from 'zod';

// Caps the work a single request can ask for.
export const MAX_REQUEST_RADIUS = 50;

const boundedRadiusSchema = radiusSchema.max(MAX_REQUEST_RADIUS);
const obstaclesSchema = z.array(cubeHexSchema).default([]);

type Located = [path: Array<string | number>, hex: CubeHex];

// Searches and lines grow with the distance to their farthest input.
function requireNearby(origin: CubeHex, hexes: Located[], ctx: z.RefinementCtx): void {
  if (!isCube(origin)) {
    return;
  }
  for (const [path, hex] of hexes) {
    if (isCube(hex) && cubeDistance(origin, hex) > MAX_REQUEST_RADIUS) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path,
        message: `${path.join('.')} lies more than ${MAX_REQUEST_RADIUS} hexes away`
      });
    }
  }
}

const labelled = (name: string, hexes: CubeHex[]): Located[] =>
  hexes.map((hex, index): Located => [[name, index], hex]);

export const distanceRequestSchema = z.object({
  from: cubeHexSchema,
  to: cubeHexSchema
});

export const lineRequestSchema = distanceRequestSchema.superRefine((request, ctx) =>
  requireNearby(request.from, [[['to'], request.to]], ctx)
);

export const pathRequestSchema = z
  .object({
    start: cubeHexSchema,
    goal: cubeHexSchema,
    obstacles: obstaclesSchema,
    maxCost: z.number().nonnegative().optional(),
    searchRadius: boundedRadiusSchema.optional()
  })
  .superRefine((request, ctx) =>
    requireNearby(request.start, [[['goal'], request.goal], ...labelled('obstacles', request.obstacles)], ctx)
  );

export const reachableRequestSchema = z
  .object({
    start: cubeHexSchema,
    goals: z.array(cubeHexSchema).default([]),
    obstacles: obstaclesSchema,
    maxDistance: boundedRadiusSchema.optional(),
    searchRadius: boundedRadiusSchema.optional()
  })
  .superRefine((request, ctx) =>
    requireNearby(
      request.start,
      [...labelled('goals', request.goals), ...labelled('obstacles', request.obstacles)],
      ctx
    )
  );

export const visibleRequestSchema = z.object({
  center: cubeHexSchema,
  radius: boundedRadiusSchema,
  obstacles: obstaclesSchema
});

export const cornersRequestSchema = z.object({
  hex: cubeHexSchema,
  size: z.number(),
  layout: layoutSchema.default('pointy')
});

export const hexAtRequestSchema = z.object({
  point: pixelPointSchema,
  size: z.number(),
  layout: layoutSchema.default('pointy')
});

export const scenarioParamsSchema = z.object({
  id: z.string().min(1)
});
