/**
 * Sparse hex map: a set of cells keyed by coordinate, each carrying a
 * caller-defined payload.
 *
 * Passability and movement cost come from the map's CellRules, so the
 * pathfinder never needs to know the payload type.
 *
 * The map does no locking. Callers that share one between systems must
 * serialize writes themselves.
 */

import { CubeCoord } from '../coords/cube-coord';
import { OffsetLayout, offset, offsetToCube } from '../coords/offset-coord';
import { CUBE_DIRECTIONS } from '../geometry/hex-directions';
import { add } from '../geometry/hex-math';
import { range } from '../geometry/hex-shapes';
import { CellRules, HexCell, STANDARD_CELL_RULES } from './cell-rules';

interface MapEntry<T> {
    readonly coord: CubeCoord;
    payload: T;
}

export class HexMap<T> implements Iterable<[CubeCoord, T]> {
    private readonly cells = new Map<string, MapEntry<T>>();

    constructor(public readonly rules: CellRules<T>) {}

    /** Map over the standard HexCell payload. */
    public static withCells<Tag = undefined>(): HexMap<HexCell<Tag>> {
        return new HexMap<HexCell<Tag>>(STANDARD_CELL_RULES);
    }

    /**
     * Build a map from a rectangular sheet of payloads, `rows[row][col]`,
     * read through an offset layout. `undefined` entries leave holes.
     */
    public static fromOffsetRows<T>(
        rows: ReadonlyArray<ReadonlyArray<T | undefined>>,
        layout: OffsetLayout,
        rules: CellRules<T>,
    ): HexMap<T> {
        const map = new HexMap<T>(rules);
        rows.forEach((cols, row) => {
            cols.forEach((payload, col) => {
                if (payload !== undefined) {
                    map.set(offsetToCube(offset(col, row), layout), payload);
                }
            });
        });
        return map;
    }

    public get size(): number {
        return this.cells.size;
    }

    /** Insert or replace the payload at `coord`. */
    public set(coord: CubeCoord, payload: T): this {
        const entry = this.cells.get(coord.key);
        if (entry) {
            entry.payload = payload;
        } else {
            this.cells.set(coord.key, { coord, payload });
        }
        return this;
    }

    /** Remove a cell. Returns false when there was nothing to remove. */
    public delete(coord: CubeCoord): boolean {
        return this.cells.delete(coord.key);
    }

    public get(coord: CubeCoord): T | undefined {
        return this.cells.get(coord.key)?.payload;
    }

    public has(coord: CubeCoord): boolean {
        return this.cells.has(coord.key);
    }

    public clear(): void {
        this.cells.clear();
    }

    /** Set every cell within `radius` of `center` to the same payload. */
    public fillArea(center: CubeCoord, radius: number, payload: T): this {
        for (const coord of range(center, radius)) {
            this.set(coord, payload);
        }
        return this;
    }

    /** Set every cell within `radius` of `center` from a factory. */
    public fillAreaWith(center: CubeCoord, radius: number, factory: (coord: CubeCoord) => T): this {
        for (const coord of range(center, radius)) {
            this.set(coord, factory(coord));
        }
        return this;
    }

    /** Neighbors of `coord` that exist in the map, in direction order. */
    public neighbors(coord: CubeCoord): CubeCoord[] {
        const result: CubeCoord[] = [];
        for (const d of CUBE_DIRECTIONS) {
            const n = add(coord, d);
            if (this.cells.has(n.key)) {
                result.push(n);
            }
        }
        return result;
    }

    /** False for absent cells. */
    public isPassable(coord: CubeCoord): boolean {
        const entry = this.cells.get(coord.key);
        return entry !== undefined && this.rules.isPassable(entry.payload);
    }

    /** Cost of entering `coord`, or undefined when the cell is absent. */
    public movementCost(coord: CubeCoord): number | undefined {
        const entry = this.cells.get(coord.key);
        return entry === undefined ? undefined : this.rules.movementCost(entry.payload);
    }

    // ═══════════════════════════════════════════════════════════════════════
    // Iteration (insertion order)
    // ═══════════════════════════════════════════════════════════════════════

    public *coords(): IterableIterator<CubeCoord> {
        for (const entry of this.cells.values()) {
            yield entry.coord;
        }
    }

    public *values(): IterableIterator<T> {
        for (const entry of this.cells.values()) {
            yield entry.payload;
        }
    }

    public *entries(): IterableIterator<[CubeCoord, T]> {
        for (const entry of this.cells.values()) {
            yield [entry.coord, entry.payload];
        }
    }

    public forEach(callback: (payload: T, coord: CubeCoord, map: this) => void): void {
        for (const entry of this.cells.values()) {
            callback(entry.payload, entry.coord, this);
        }
    }

    public [Symbol.iterator](): IterableIterator<[CubeCoord, T]> {
        return this.entries();
    }
}

type CellSource<Tag> = HexCell<Tag> | ((coord: CubeCoord) => HexCell<Tag>);

function resolveCell<Tag>(source: CellSource<Tag>, coord: CubeCoord): HexCell<Tag> {
    return typeof source === 'function' ? source(coord) : source;
}

/** Hexagon-shaped map of the given radius around the origin. */
export function createHexagonalMap<Tag = undefined>(
    radius: number,
    cell: CellSource<Tag>,
): HexMap<HexCell<Tag>> {
    return HexMap.withCells<Tag>().fillAreaWith(CubeCoord.ZERO, radius, c => resolveCell(cell, c));
}

/**
 * Rectangular map of `width` columns by `height` rows laid out with the
 * given offset layout; offset (0, 0) is the origin.
 */
export function createRectangularMap<Tag = undefined>(
    width: number,
    height: number,
    layout: OffsetLayout,
    cell: CellSource<Tag>,
): HexMap<HexCell<Tag>> {
    const map = HexMap.withCells<Tag>();
    for (let row = 0; row < height; row++) {
        for (let col = 0; col < width; col++) {
            const coord = offsetToCube(offset(col, row), layout);
            map.set(coord, resolveCell(cell, coord));
        }
    }
    return map;
}
