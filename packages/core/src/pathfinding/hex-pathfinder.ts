import {
  assertCube,
  axialToCube,
  cubeEquals,
  cubeKey,
  cubeToAxial,
  cubeToOffset,
  offsetToCube,
  toObstacleSet
} from '../geometry/coordinates.js';
import { cubeDistance } from '../geometry/distance.js';
import { HexGridError, assertSameScheme } from '../geometry/errors.js';
import { cubeNeighbors } from '../geometry/neighbors.js';
import type { AxialHex, CubeHex, HexKey, ObstacleSet, OffsetHex, OffsetScheme } from '../geometry/types.js';
import { resolveSearchRadius } from './search-bounds.js';
import type { PathfindingOptions, PathResult } from './types.js';

interface NodeRecord {
  coordinate: CubeHex;
  costFromStart: number;
  estimatedTotalCost: number;
  parent?: NodeRecord;
}

const STEP_COST = 1;

/**
 * A* over the six-neighbor hex graph with unit step cost. The frontier is
 * ordered by estimated total cost, then by lower cost so far, then by
 * insertion order, so equal inputs always give the same path.
 *
 * A successful result's path runs from start to goal inclusive; start === goal
 * succeeds with a one-hex path and zero cost.
 */
export function cubePath(
  start: CubeHex,
  goal: CubeHex,
  obstacles: ObstacleSet = new Set<HexKey>(),
  options: PathfindingOptions = {}
): PathResult {
  assertCube(start);
  assertCube(goal);

  const maxCost = options.maxCost ?? Number.POSITIVE_INFINITY;
  if (Number.isNaN(maxCost) || maxCost < 0) {
    throw new HexGridError('invalid_argument', `Max cost must be a non-negative number, got ${maxCost}`);
  }

  if (obstacles.has(cubeKey(goal))) {
    return { success: false, path: [], cost: Number.POSITIVE_INFINITY, reason: 'goal_blocked' };
  }
  if (cubeEquals(start, goal)) {
    return { success: true, path: [start], cost: 0 };
  }

  const searchRadius = resolveSearchRadius(start, [goal], obstacles, options.searchRadius);

  const openSet: NodeRecord[] = [
    {
      coordinate: start,
      costFromStart: 0,
      estimatedTotalCost: cubeDistance(start, goal)
    }
  ];
  const closedSet = new Set<HexKey>();
  const nodeLookup = new Map<HexKey, NodeRecord>();
  nodeLookup.set(cubeKey(start), openSet[0]);
  let prunedByCost = false;

  const popLowest = () => {
    let lowestIndex = 0;
    for (let i = 1; i < openSet.length; i++) {
      const candidate = openSet[i];
      const lowest = openSet[lowestIndex];
      if (
        candidate.estimatedTotalCost < lowest.estimatedTotalCost ||
        (candidate.estimatedTotalCost === lowest.estimatedTotalCost &&
          candidate.costFromStart < lowest.costFromStart)
      ) {
        lowestIndex = i;
      }
    }
    return openSet.splice(lowestIndex, 1)[0];
  };

  while (openSet.length > 0) {
    const current = popLowest();

    if (cubeEquals(current.coordinate, goal)) {
      const path: CubeHex[] = [];
      let cursor: NodeRecord | undefined = current;
      while (cursor) {
        path.unshift(cursor.coordinate);
        cursor = cursor.parent;
      }
      return { success: true, path, cost: current.costFromStart };
    }

    closedSet.add(cubeKey(current.coordinate));

    for (const neighbor of cubeNeighbors(current.coordinate)) {
      const neighborKey = cubeKey(neighbor);
      if (closedSet.has(neighborKey) || obstacles.has(neighborKey)) {
        continue;
      }
      if (cubeDistance(start, neighbor) > searchRadius) {
        continue;
      }

      const tentativeCost = current.costFromStart + STEP_COST;
      if (tentativeCost > maxCost) {
        prunedByCost = true;
        continue;
      }

      const estimatedTotalCost = tentativeCost + cubeDistance(neighbor, goal);
      const existing = nodeLookup.get(neighborKey);

      if (!existing) {
        const record: NodeRecord = {
          coordinate: neighbor,
          costFromStart: tentativeCost,
          estimatedTotalCost,
          parent: current
        };
        nodeLookup.set(neighborKey, record);
        openSet.push(record);
      } else if (tentativeCost < existing.costFromStart) {
        existing.costFromStart = tentativeCost;
        existing.estimatedTotalCost = estimatedTotalCost;
        existing.parent = current;
      }
    }
  }

  return {
    success: false,
    path: [],
    cost: Number.POSITIVE_INFINITY,
    reason: prunedByCost ? 'over_budget' : 'unreachable'
  };
}

function mapPath<H>(result: PathResult, convert: (hex: CubeHex) => H): PathResult<H> {
  if (result.success) {
    return { success: true, path: result.path.map(convert), cost: result.cost };
  }
  return { success: false, path: [], cost: result.cost, reason: result.reason };
}

export function axialPath(
  start: AxialHex,
  goal: AxialHex,
  obstacles: Iterable<AxialHex> = [],
  options: PathfindingOptions = {}
): PathResult<AxialHex> {
  const blocked = toObstacleSet(Array.from(obstacles, axialToCube));
  return mapPath(cubePath(axialToCube(start), axialToCube(goal), blocked, options), cubeToAxial);
}

export function offsetPath<S extends OffsetScheme>(
  start: OffsetHex<S>,
  goal: OffsetHex<S>,
  obstacles: Iterable<OffsetHex<S>> = [],
  options: PathfindingOptions = {}
): PathResult<OffsetHex<S>> {
  assertSameScheme(start, goal);
  const blocked = toObstacleSet(
    Array.from(obstacles, (hex) => {
      assertSameScheme(start, hex);
      return offsetToCube(hex);
    })
  );
  const result = cubePath(offsetToCube(start), offsetToCube(goal), blocked, options);
  return mapPath(result, (hex) => cubeToOffset(hex, start.scheme));
}
