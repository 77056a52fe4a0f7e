import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { CubeCoord } from '@/coords';
import { distance, ring } from '@/geometry';
import { HexMap, openCell } from '@/map';
import { findPath, hasLineOfSight, pathCost, type PathFound, type PathResult } from '@/pathfinding';
import { hexSettings } from '@/hex-settings';
import { LOG_SOURCE, LogHandler } from '@/utilities/log-handler';
import { LogType, type ILogMessage } from '@/utilities/log-manager';
import { captureError } from './helpers/capture-error';
import { SeededRng } from './helpers/seeded-rng';
import { TERRAIN, bruteForceCost, createTerrainMap, terrainCell, type Terrain } from './helpers/test-map';

const c = CubeCoord.of;
const ORIGIN = CubeCoord.ZERO;

function expectFound(result: PathResult): PathFound {
    if (!result.found) {
        throw new Error(`expected a path, search ended after ${result.expanded} expansions`);
    }
    return result;
}

function expectContiguous(path: readonly CubeCoord[]): void {
    for (let i = 1; i < path.length; i++) {
        expect(distance(path[i - 1], path[i])).toBe(1);
    }
}

describe('Pathfinding (A*)', () => {
    afterEach(() => {
        hexSettings.resetToDefaults();
    });

    describe('basic searches', () => {
        it('should find a shortest path on open terrain', () => {
            const map = createTerrainMap(3);
            const result = expectFound(findPath(map, ORIGIN, c(2, -1, -1)));

            expect(result.path).toEqual([c(0, 0, 0), c(1, -1, 0), c(2, -1, -1)]);
            expect(result.cost).toBe(2);
            expect(result.expanded).toBe(4);
        });

        it('should find a path of distance + 1 cells on a 5x5 uniform map', () => {
            const map = HexMap.withCells();
            for (let q = -2; q <= 2; q++) {
                for (let r = -2; r <= 2; r++) {
                    map.set(CubeCoord.fromAxial(q, r), openCell());
                }
            }
            const goal = c(2, -1, -1);
            const result = expectFound(findPath(map, ORIGIN, goal));

            expect(map.size).toBe(25);
            expect(result.path).toHaveLength(distance(ORIGIN, goal) + 1);
            expect(result.cost).toBe(distance(ORIGIN, goal));
            expect(result.path).toEqual([c(0, 0, 0), c(1, -1, 0), c(2, -1, -1)]);
        });

        it('should return the start alone when start equals goal', () => {
            const map = createTerrainMap(2);
            expect(findPath(map, c(1, 0, -1), c(1, 0, -1))).toEqual({
                found: true,
                path: [c(1, 0, -1)],
                cost: 0,
                expanded: 0,
            });
        });

        it('should not need the start cell to be passable', () => {
            const map = createTerrainMap(2, [[ORIGIN, TERRAIN.WATER]]);
            const result = expectFound(findPath(map, ORIGIN, c(1, 0, -1)));
            expect(result.path).toEqual([ORIGIN, c(1, 0, -1)]);
            expect(result.cost).toBe(1);
        });

        it('should fail when the goal is absent', () => {
            const map = createTerrainMap(2);
            expect(findPath(map, ORIGIN, c(5, 0, -5))).toEqual({ found: false, bounded: false, expanded: 0 });
        });

        it('should fail when the goal is water', () => {
            const map = createTerrainMap(2, [[c(2, 0, -2), TERRAIN.WATER]]);
            expect(findPath(map, ORIGIN, c(2, 0, -2))).toEqual({ found: false, bounded: false, expanded: 0 });
        });

        it('should fail when the start is absent', () => {
            const map = createTerrainMap(2);
            expect(findPath(map, c(9, -9, 0), ORIGIN)).toEqual({ found: false, bounded: false, expanded: 0 });
        });

        it('should fail after exhausting every reachable cell when the goal is walled in', () => {
            const walls = ring(ORIGIN, 1).map(cell => [cell, TERRAIN.WATER] as const);
            const map = createTerrainMap(3, walls);

            // 37 cells, 6 walls, and the goal itself is never reached
            expect(findPath(map, c(3, -3, 0), ORIGIN)).toEqual({ found: false, bounded: false, expanded: 30 });
        });
    });

    describe('movement costs', () => {
        it('should walk around expensive terrain', () => {
            const map = createTerrainMap(3, [
                [c(1, 0, -1), TERRAIN.SWAMP],
                [c(2, 0, -2), TERRAIN.SWAMP],
            ]);
            const result = expectFound(findPath(map, ORIGIN, c(3, 0, -3)));

            expect(result.cost).toBe(4);
            expect(result.path).toHaveLength(5);
            expect(result.path).not.toContainEqual(c(1, 0, -1));
            expect(result.path).not.toContainEqual(c(2, 0, -2));
            expectContiguous(result.path);
        });

        it('should take a longer road instead of crossing swamp', () => {
            // straight east crosses two swamp cells (6.5); the road round the north costs 3
            const road = [c(0, -1, 1), c(1, -2, 1), c(2, -2, 0), c(3, -2, -1), c(3, -1, -2), c(3, 0, -3)];
            const map = createTerrainMap(3, [
                ...road.map(cell => [cell, TERRAIN.ROAD] as const),
                [c(1, 0, -1), TERRAIN.SWAMP],
                [c(2, 0, -2), TERRAIN.SWAMP],
            ]);

            const result = expectFound(findPath(map, ORIGIN, c(3, 0, -3), { heuristicScale: 0.5 }));
            expect(result.cost).toBe(3);
            expect(result.cost).toBe(bruteForceCost(map, ORIGIN, c(3, 0, -3)));
            expect(result.path).not.toContainEqual(c(1, 0, -1));
        });

        it('should match the cost reported by pathCost', () => {
            const map = createTerrainMap(3, [[c(0, 1, -1), TERRAIN.SWAMP], [c(-1, 1, 0), TERRAIN.ROAD]]);
            const result = expectFound(findPath(map, c(-3, 2, 1), c(2, 1, -3), { heuristicScale: 0.5 }));
            expect(pathCost(map, result.path)).toBe(result.cost);
        });
    });

    describe('optimality', () => {
        const TERRAIN_MIX: Terrain[] = [
            TERRAIN.GRASS, TERRAIN.GRASS, TERRAIN.GRASS, TERRAIN.ROAD, TERRAIN.SWAMP, TERRAIN.WATER,
        ];

        it.each([0, 0.5])('should match exhaustive search on random maps (heuristicScale %s)', heuristicScale => {
            const rng = new SeededRng(4242);

            for (let trial = 0; trial < 20; trial++) {
                const map = createTerrainMap(4);
                const cells = [...map.coords()];
                for (const cell of cells) {
                    map.set(cell, terrainCell(TERRAIN_MIX[rng.nextRange(0, TERRAIN_MIX.length)]));
                }

                for (let query = 0; query < 5; query++) {
                    const start = cells[rng.nextRange(0, cells.length)];
                    const goal = cells[rng.nextRange(0, cells.length)];
                    const expected = bruteForceCost(map, start, goal);
                    const result = findPath(map, start, goal, { heuristicScale });

                    expect(result.found).toBe(expected !== undefined);
                    if (result.found && expected !== undefined) {
                        expect(result.cost).toBeCloseTo(expected, 9);
                        expect(result.path[0]).toEqual(start);
                        expect(result.path[result.path.length - 1]).toEqual(goal);
                        expectContiguous(result.path);
                    }
                }
            }
        });
    });

    describe('search limits', () => {
        it('should stop after maxExpansions and report the search as bounded', () => {
            const map = createTerrainMap(5);
            expect(findPath(map, ORIGIN, c(5, 0, -5), { maxExpansions: 2 })).toEqual({
                found: false,
                bounded: true,
                expanded: 2,
            });
        });

        it('should allow zero expansions', () => {
            const map = createTerrainMap(1);
            expect(findPath(map, ORIGIN, c(1, 0, -1), { maxExpansions: 0 })).toEqual({
                found: false,
                bounded: true,
                expanded: 0,
            });
        });

        it('should fall back to the maxSearchNodes setting', () => {
            hexSettings.configure({ maxSearchNodes: 3, consoleLogging: false });
            const map = createTerrainMap(5);
            expect(findPath(map, ORIGIN, c(-5, 5, 0))).toEqual({ found: false, bounded: true, expanded: 3 });
        });

        it('should discard paths above maxCost', () => {
            const map = createTerrainMap(3);
            const bounded = findPath(map, ORIGIN, c(3, 0, -3), { maxCost: 2 });
            expect(bounded.found).toBe(false);
            expect(!bounded.found && bounded.bounded).toBe(true);

            const within = expectFound(findPath(map, ORIGIN, c(3, 0, -3), { maxCost: 3 }));
            expect(within.cost).toBe(3);
        });

        it('should not report a cost cut when the whole reachable area was searched', () => {
            const map = HexMap.withCells();
            map.set(ORIGIN, openCell());
            map.set(c(1, 0, -1), openCell());
            map.set(c(1, -1, 0), openCell(10));
            map.set(c(10, 0, -10), openCell());

            // (1, -1, 0) is reached at cost 10 from the start; the detour
            // through (1, 0, -1) would cost 11 and is no improvement.
            const unbounded = findPath(map, ORIGIN, c(10, 0, -10));
            const capped = findPath(map, ORIGIN, c(10, 0, -10), { maxCost: 10 });

            expect(unbounded).toEqual({ found: false, bounded: false, expanded: 3 });
            expect(capped).toEqual({ found: false, bounded: false, expanded: 3 });
        });

        it('should report a cost cut when the limit leaves a cell unvisited', () => {
            const map = HexMap.withCells();
            map.set(ORIGIN, openCell());
            map.set(c(1, 0, -1), openCell());
            map.set(c(1, -1, 0), openCell(10));
            map.set(c(10, 0, -10), openCell());

            expect(findPath(map, ORIGIN, c(10, 0, -10), { maxCost: 9 }))
                .toEqual({ found: false, bounded: true, expanded: 2 });
        });

        it('should reject invalid options', () => {
            const map = createTerrainMap(1);
            expect(captureError(() => findPath(map, ORIGIN, ORIGIN, { maxExpansions: -1 })))
                .toMatchObject({ code: 'INVALID_SETTING' });
            expect(captureError(() => findPath(map, ORIGIN, ORIGIN, { maxCost: -1 })))
                .toMatchObject({ code: 'INVALID_SETTING' });
            expect(captureError(() => findPath(map, ORIGIN, ORIGIN, { heuristicScale: Number.NaN })))
                .toMatchObject({ code: 'INVALID_SETTING' });
        });
    });

    describe('logging', () => {
        let messages: ILogMessage[];

        beforeEach(() => {
            hexSettings.configure({ consoleLogging: false, debugLogging: true });
            const manager = LogHandler.getLogManager();
            manager.clear();
            messages = [];
            manager.onLogMessage(msg => messages.push(msg));
        });

        afterEach(() => {
            LogHandler.getLogManager().onLogMessage(null);
            LogHandler.getLogManager().clear();
        });

        const fromPathfinder = () => messages.filter(m => m.source === LOG_SOURCE.PATHFINDER);

        it('should warn once about negative movement costs', () => {
            const map = createTerrainMap(1);
            map.set(c(1, 0, -1), openCell(-1));
            map.set(c(0, 1, -1), openCell(-1));

            const result = expectFound(findPath(map, ORIGIN, c(1, 0, -1)));
            expect(result.cost).toBe(-1);
            expect(fromPathfinder()).toMatchObject([
                { type: LogType.Warn, msg: 'Negative movement cost -1 at (1, 0, -1); path may not be optimal' },
            ]);
        });

        it('should log bounded searches at debug level', () => {
            findPath(createTerrainMap(5), ORIGIN, c(5, 0, -5), { maxExpansions: 2 });
            expect(fromPathfinder()).toMatchObject([
                { type: LogType.Debug, msg: 'Search (0, 0, 0) -> (5, 0, -5) bounded after 2 expansions (expansion limit)' },
            ]);
        });

        it('should not log successful searches', () => {
            findPath(createTerrainMap(2), ORIGIN, c(2, 0, -2));
            expect(fromPathfinder()).toEqual([]);
        });
    });
});

describe('hasLineOfSight', () => {
    const map = createTerrainMap(3, [[c(1, 0, -1), TERRAIN.WATER]]);

    it('is blocked by impassable cells on the line', () => {
        expect(hasLineOfSight(map, ORIGIN, c(3, 0, -3))).toBe(false);
    });

    it('is clear across open terrain', () => {
        expect(hasLineOfSight(map, ORIGIN, c(0, 3, -3))).toBe(true);
        expect(hasLineOfSight(map, c(-3, 1, 2), c(-3, 3, 0))).toBe(true);
    });

    it('ignores the starting cell', () => {
        expect(hasLineOfSight(map, c(1, 0, -1), c(3, 0, -3))).toBe(true);
    });

    it('is blocked by cells missing from the map', () => {
        expect(hasLineOfSight(map, ORIGIN, c(0, 4, -4))).toBe(false);
    });

    it('is trivially clear to the same cell', () => {
        expect(hasLineOfSight(map, c(2, 0, -2), c(2, 0, -2))).toBe(true);
    });
});

describe('pathCost', () => {
    const map = createTerrainMap(2, [[c(1, 0, -1), TERRAIN.SWAMP]]);

    it('sums the cost of every cell after the first', () => {
        expect(pathCost(map, [ORIGIN, c(1, 0, -1), c(2, 0, -2)])).toBe(4);
    });

    it('is zero for empty and single-cell paths', () => {
        expect(pathCost(map, [])).toBe(0);
        expect(pathCost(map, [c(1, 0, -1)])).toBe(0);
    });

    it('is undefined when a step leaves the map', () => {
        expect(pathCost(map, [ORIGIN, c(1, 0, -1), c(2, 0, -2), c(3, 0, -3)])).toBeUndefined();
    });
});
