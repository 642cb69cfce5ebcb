export * from './geometry/types.js';
export * from './geometry/errors.js';
export * from './geometry/coordinates.js';
export * from './geometry/arithmetic.js';
export * from './geometry/distance.js';
export * from './geometry/neighbors.js';
export * from './geometry/line.js';
export * from './geometry/pixel.js';
export * from './geometry/maps.js';
export * from './pathfinding/types.js';
export * from './pathfinding/hex-pathfinder.js';
export * from './pathfinding/reachability.js';
export { defaultSearchRadius } from './pathfinding/search-bounds.js';
export * from './visibility/vision.js';
