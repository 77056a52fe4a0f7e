/**
 * How a map reads movement information out of its payload.
 *
 * The payload type is the caller's; a map only needs to know whether a
 * cell can be entered and what entering it costs.
 */
export interface CellRules<T> {
    isPassable(payload: T): boolean;
    /** Cost of stepping into a cell carrying this payload */
    movementCost(payload: T): number;
}

/** Ready-made payload for maps that need no custom cell type. */
export interface HexCell<Tag = undefined> {
    readonly cost: number;
    readonly passable: boolean;
    /** Free-form caller data, e.g. a terrain kind */
    readonly tag?: Tag;
}

/** Rules for HexCell payloads: read the fields as they are. */
export const STANDARD_CELL_RULES: CellRules<HexCell<unknown>> = Object.freeze({
    isPassable: (cell: HexCell<unknown>) => cell.passable,
    movementCost: (cell: HexCell<unknown>) => cell.cost,
});

/** Passable cell with the given cost (default 1). */
export function openCell<Tag = undefined>(cost = 1, tag?: Tag): HexCell<Tag> {
    return { cost, passable: true, tag };
}

/** Impassable cell; cost is irrelevant and set to Infinity. */
export function wallCell<Tag = undefined>(tag?: Tag): HexCell<Tag> {
    return { cost: Number.POSITIVE_INFINITY, passable: false, tag };
}
