/**
 * Pathfinding module for hex maps.
 *
 * Provides:
 * - A* search with hex distance heuristic and optional limits
 * - Binary-heap frontier with FIFO tie-breaking
 * - Path cost evaluation and line-of-sight checks
 *
 * Usage:
 *   import { findPath } from '@/pathfinding';
 *   const result = findPath(map, start, goal, { maxExpansions: 500 });
 */

// Core A* algorithm
export {
    findPath,
    type PathFound,
    type PathNotFound,
    type PathResult,
    type PathSearchOptions,
} from './astar';

// Data structures
export { FrontierQueue } from './frontier-queue';

// Path utilities
export { pathCost } from './path';
export { hasLineOfSight } from './line-of-sight';
