import {
  cubeBfs,
  cubeDistance,
  cubeLine,
  cubePath,
  cubeVisible,
  hexToPixel,
  isHexGridError,
  pixelToHex,
  polygonCorners,
  reachedHexes,
  toObstacleSet
} from '@hexnav/core';
import type { PathResult } from '@hexnav/core';
import { scenarioObstacles, validatedStarterBundle } from '@hexnav/data';
import type { GridScenario } from '@hexnav/data';
import Fastify from 'fastify';
import { nanoid } from 'nanoid';
import { ZodError } from 'zod';

import { loadConfig } from './config.js';
import type { ServiceConfig } from './config.js';
import {
  cornersRequestSchema,
  distanceRequestSchema,
  hexAtRequestSchema,
  lineRequestSchema,
  pathRequestSchema,
  reachableRequestSchema,
  scenarioParamsSchema,
  visibleRequestSchema
} from './requests.js';

export { loadConfig } from './config.js';
export type { LogLevel, ServiceConfig } from './config.js';

// JSON has no Infinity; failed searches report a null cost.
function pathResponse(result: PathResult) {
  if (result.success) {
    return { success: true, path: result.path, cost: result.cost };
  }
  return { success: false, path: [], cost: null, reason: result.reason };
}

export function createServer(config: Partial<ServiceConfig> = {}, scenarios: GridScenario[] = validatedStarterBundle.scenarios) {
  const app = Fastify({
    logger: {
      level: config.logLevel ?? 'info'
    },
    genReqId: () => nanoid(10)
  });

  const scenarioById = new Map(scenarios.map((scenario) => [scenario.id, scenario]));

  app.setErrorHandler((error, request, reply) => {
    if (error instanceof ZodError) {
      request.log.warn({ issues: error.issues }, 'rejected malformed request');
      return reply.status(400).send({
        error: 'invalid_request',
        message: 'Request body failed validation',
        issues: error.issues
      });
    }
    if (isHexGridError(error)) {
      request.log.warn({ code: error.code }, error.message);
      return reply.status(400).send({ error: error.code, message: error.message });
    }
    if (error.statusCode !== undefined && error.statusCode < 500) {
      return reply.status(error.statusCode).send({ error: 'bad_request', message: error.message });
    }
    request.log.error(error);
    return reply.status(500).send({ error: 'internal_error', message: 'Unexpected server error' });
  });

  app.get('/health', async () => ({ status: 'ok' }));

  app.post('/distance', async (request) => {
    const { from, to } = distanceRequestSchema.parse(request.body);
    return { distance: cubeDistance(from, to) };
  });

  app.post('/line', async (request) => {
    const { from, to } = lineRequestSchema.parse(request.body);
    return { line: cubeLine(from, to) };
  });

  app.post('/path', async (request) => {
    const { start, goal, obstacles, maxCost, searchRadius } = pathRequestSchema.parse(request.body);
    const result = cubePath(start, goal, toObstacleSet(obstacles), { maxCost, searchRadius });
    return pathResponse(result);
  });

  app.post('/reachable', async (request) => {
    const { start, goals, obstacles, maxDistance, searchRadius } = reachableRequestSchema.parse(request.body);
    const distances = cubeBfs(start, goals, toObstacleSet(obstacles), { maxDistance, searchRadius });
    return { distances: reachedHexes(distances) };
  });

  app.post('/visible', async (request) => {
    const { center, radius, obstacles } = visibleRequestSchema.parse(request.body);
    return { visible: cubeVisible(center, radius, toObstacleSet(obstacles)) };
  });

  app.post('/pixel/corners', async (request) => {
    const { hex, size, layout } = cornersRequestSchema.parse(request.body);
    return {
      center: hexToPixel(hex, size, layout),
      corners: polygonCorners(hex, size, layout)
    };
  });

  app.post('/pixel/hex', async (request) => {
    const { point, size, layout } = hexAtRequestSchema.parse(request.body);
    return { hex: pixelToHex(point, size, layout) };
  });

  app.get('/scenarios', async () => ({
    scenarios: scenarios.map(({ id, name, brief }) => ({ id, name, brief }))
  }));

  app.get('/scenarios/:id/path', async (request, reply) => {
    const { id } = scenarioParamsSchema.parse(request.params);
    const scenario = scenarioById.get(id);
    if (!scenario) {
      return reply.status(404).send({ error: 'not_found', message: `Unknown scenario ${id}` });
    }
    const result = cubePath(scenario.start, scenario.goal, toObstacleSet(scenarioObstacles(scenario)));
    request.log.info({ scenario: id, success: result.success }, 'planned scenario path');
    return pathResponse(result);
  });

  app.get('/scenarios/:id/visible', async (request, reply) => {
    const { id } = scenarioParamsSchema.parse(request.params);
    const scenario = scenarioById.get(id);
    if (!scenario) {
      return reply.status(404).send({ error: 'not_found', message: `Unknown scenario ${id}` });
    }
    const obstacles = toObstacleSet(scenarioObstacles(scenario));
    return { visible: cubeVisible(scenario.start, scenario.visionRadius, obstacles) };
  });

  return app;
}

export async function startServer(config: ServiceConfig = loadConfig()) {
  const app = createServer(config);
  try {
    await app.listen({ port: config.port, host: config.host });
    return app;
  } catch (error) {
    app.log.error(error);
    process.exit(1);
  }
}

if (import.meta.url === `file://${process.argv[1]}`) {
  void startServer();
}
