import type { CubeHex } from '../geometry/types.js';

export interface SearchBoundsOptions {
  // Hexes farther than this from the start are never expanded. Defaults to one
  // ring beyond the farthest goal or obstacle.
  searchRadius?: number;
}

export interface PathfindingOptions extends SearchBoundsOptions {
  maxCost?: number;
}

export interface ReachabilityOptions extends SearchBoundsOptions {
  maxDistance?: number;
}

export type PathFailureReason = 'goal_blocked' | 'unreachable' | 'over_budget';

export type PathResult<H = CubeHex> =
  | { success: true; path: H[]; cost: number }
  | { success: false; path: H[]; cost: number; reason: PathFailureReason };
