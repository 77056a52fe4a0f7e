/**
 * A* Pathfinding over a HexMap.
 *
 * Movement costs and passability come from the map's CellRules; entering
 * a cell costs that cell's movementCost. Key features:
 *
 * - Hex distance heuristic, scaled by `heuristicScale`
 * - Binary-heap frontier with FIFO tie-breaking
 * - Optional expansion and cost limits for bounded searches
 *
 * The result is optimal when every movement cost is at least
 * `heuristicScale` (so the heuristic never overestimates). Negative costs
 * void that guarantee and are reported as a warning.
 *
 * Usage:
 *   const result = findPath(map, start, goal);
 *   if (result.found) walk(result.path);
 */

import { CubeCoord } from '../coords/cube-coord';
import { HexContractError } from '../errors';
import { distance } from '../geometry/hex-math';
import { hexSettings } from '../hex-settings';
import { HexMap } from '../map/hex-map';
import { LOG_SOURCE, LogHandler } from '../utilities/log-handler';
import { FrontierQueue } from './frontier-queue';

const log = new LogHandler(LOG_SOURCE.PATHFINDER);

// ═══════════════════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════════════════

export interface PathSearchOptions {
    /** Node expansions before giving up; defaults to hexSettings.maxSearchNodes */
    maxExpansions?: number;
    /** Paths costing more than this are not considered */
    maxCost?: number;
    /** Multiplier on hex distance; defaults to hexSettings.heuristicScale */
    heuristicScale?: number;
}

export interface PathFound {
    readonly found: true;
    /** Start to goal, both inclusive */
    readonly path: readonly CubeCoord[];
    readonly cost: number;
    readonly expanded: number;
}

export interface PathNotFound {
    readonly found: false;
    /** True when a limit cut the search short, so a path may still exist */
    readonly bounded: boolean;
    readonly expanded: number;
}

export type PathResult = PathFound | PathNotFound;

/** Bit flags for node state tracking */
const FLAG_OPEN = 1;
const FLAG_CLOSED = 2;

interface SearchNode {
    readonly coord: CubeCoord;
    g: number;
    parent: SearchNode | null;
    flags: number;
}

interface ResolvedOptions {
    maxExpansions: number;
    maxCost: number;
    heuristicScale: number;
}

// ═══════════════════════════════════════════════════════════════════════════
// HELPERS
// ═══════════════════════════════════════════════════════════════════════════

function resolveOptions(options: PathSearchOptions): ResolvedOptions {
    const defaults = hexSettings.state;
    const maxExpansions = options.maxExpansions ?? defaults.maxSearchNodes;
    const maxCost = options.maxCost ?? Number.POSITIVE_INFINITY;
    const heuristicScale = options.heuristicScale ?? defaults.heuristicScale;

    if (!(maxExpansions === Number.POSITIVE_INFINITY || (Number.isInteger(maxExpansions) && maxExpansions >= 0))) {
        throw new HexContractError('INVALID_SETTING', `maxExpansions must be a non-negative integer or Infinity, got ${maxExpansions}`);
    }
    if (Number.isNaN(maxCost) || maxCost < 0) {
        throw new HexContractError('INVALID_SETTING', `maxCost must be a non-negative number, got ${maxCost}`);
    }
    if (!Number.isFinite(heuristicScale) || heuristicScale < 0) {
        throw new HexContractError('INVALID_SETTING', `heuristicScale must be a finite non-negative number, got ${heuristicScale}`);
    }
    return { maxExpansions, maxCost, heuristicScale };
}

/**
 * Walk predecessors back from the goal.
 * Returns coordinates from start to goal, both inclusive.
 */
function reconstructPath(goal: SearchNode): CubeCoord[] {
    const path: CubeCoord[] = [];
    for (let node: SearchNode | null = goal; node !== null; node = node.parent) {
        path.push(node.coord);
    }
    path.reverse();
    return path;
}

function notFound(bounded: boolean, expanded: number): PathNotFound {
    return { found: false, bounded, expanded };
}

// ═══════════════════════════════════════════════════════════════════════════
// PUBLIC API
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Find a cheapest path from start to goal.
 *
 * The start cell must exist but need not be passable; the goal must be
 * present and passable. Start equal to goal yields `[start]` at cost 0.
 *
 * @throws HexContractError when an option is out of range
 */
export function findPath<T>(
    map: HexMap<T>,
    start: CubeCoord,
    goal: CubeCoord,
    options: PathSearchOptions = {},
): PathResult {
    const { maxExpansions, maxCost, heuristicScale } = resolveOptions(options);

    if (!map.has(start)) {
        return notFound(false, 0);
    }
    if (start.equals(goal)) {
        return { found: true, path: [start], cost: 0, expanded: 0 };
    }
    if (!map.isPassable(goal)) {
        return notFound(false, 0);
    }

    const nodes = new Map<string, SearchNode>();
    const open = new FrontierQueue<SearchNode>();

    const startNode: SearchNode = { coord: start, g: 0, parent: null, flags: FLAG_OPEN };
    nodes.set(start.key, startNode);
    open.insert(startNode, distance(start, goal) * heuristicScale);

    let expanded = 0;
    let limitReached = false;
    let costCut = false;
    let negativeCostSeen = false;

    while (!open.isEmpty) {
        const current = open.popMin();

        // Skip if already processed (can happen with duplicate insertions)
        if (current.flags & FLAG_CLOSED) continue;

        if (expanded >= maxExpansions) {
            limitReached = true;
            break;
        }
        current.flags = FLAG_CLOSED;
        expanded++;

        if (current.coord.equals(goal)) {
            return { found: true, path: reconstructPath(current), cost: current.g, expanded };
        }

        for (const next of map.neighbors(current.coord)) {
            if (!map.isPassable(next)) continue;

            const existing = nodes.get(next.key);
            if (existing && existing.flags & FLAG_CLOSED) continue;

            const stepCost = map.movementCost(next);
            if (stepCost === undefined) continue;
            if (stepCost < 0 && !negativeCostSeen) {
                negativeCostSeen = true;
                log.warn(`Negative movement cost ${stepCost} at ${next}; path may not be optimal`);
            }

            const tentativeG = current.g + stepCost;

            // Only update if this is a better path
            if (existing && tentativeG >= existing.g) continue;

            // Counts as a cut only when the limit drops an improvement
            if (tentativeG > maxCost) {
                costCut = true;
                continue;
            }

            const node: SearchNode = existing ?? { coord: next, g: tentativeG, parent: current, flags: FLAG_OPEN };
            node.g = tentativeG;
            node.parent = current;
            node.flags |= FLAG_OPEN;
            nodes.set(next.key, node);

            open.insert(node, tentativeG + distance(next, goal) * heuristicScale);
        }
    }

    const bounded = limitReached || costCut;
    if (bounded && log.isDebugEnabled()) {
        log.debug(`Search ${start} -> ${goal} bounded after ${expanded} expansions`
            + (limitReached ? ' (expansion limit)' : ' (cost limit)'));
    }
    return notFound(bounded, expanded);
}
