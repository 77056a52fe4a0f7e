/**
 * Offset coordinates address hexes on a rectangular sheet, as tile atlases
 * and 2D arrays do. They are only meaningful together with an OffsetLayout:
 *
 *   PointyTop  rows are shoved   ("odd-r" / "even-r")
 *   FlatTop    columns are shoved ("odd-q" / "even-q")
 *
 * `parity` names which rows (or columns) sit half a hex further along.
 *
 * Converting out and back with the same layout is exact. Converting back
 * with a different layout yields a different, valid cell; that mismatch
 * cannot be detected here and is the caller's responsibility.
 */

import { HexContractError } from '../errors';
import { AxialCoord, axialToCube, cubeToAxial } from './axial-coord';
import { CubeCoord } from './cube-coord';
import { Orientation } from './orientation';

export interface OffsetCoord {
    readonly col: number;
    readonly row: number;
}

export type OffsetParity = 'odd' | 'even';

export interface OffsetLayout {
    readonly orientation: Orientation;
    readonly parity: OffsetParity;
}

/**
 * Create an offset coordinate.
 * @throws HexContractError when col or row is not an integer
 */
export function offset(col: number, row: number): OffsetCoord {
    if (!Number.isInteger(col) || !Number.isInteger(row)) {
        throw new HexContractError('MALFORMED_COORDINATE', `Offset components must be integers: (${col}, ${row})`);
    }
    return { col: col || 0, row: row || 0 };
}

/** Half-hex shift for a shoved row/column; `& 1` keeps negative values in step */
function shove(n: number, parity: OffsetParity): number {
    return parity === 'odd'
        ? (n - (n & 1)) / 2
        : (n + (n & 1)) / 2;
}

export function offsetToAxial(o: OffsetCoord, layout: OffsetLayout): AxialCoord {
    if (layout.orientation === Orientation.PointyTop) {
        return { q: (o.col - shove(o.row, layout.parity)) || 0, r: o.row || 0 };
    }
    return { q: o.col || 0, r: (o.row - shove(o.col, layout.parity)) || 0 };
}

export function axialToOffset(a: AxialCoord, layout: OffsetLayout): OffsetCoord {
    if (layout.orientation === Orientation.PointyTop) {
        return { col: (a.q + shove(a.r, layout.parity)) || 0, row: a.r || 0 };
    }
    return { col: a.q || 0, row: (a.r + shove(a.q, layout.parity)) || 0 };
}

export function offsetToCube(o: OffsetCoord, layout: OffsetLayout): CubeCoord {
    return axialToCube(offsetToAxial(o, layout));
}

export function cubeToOffset(c: CubeCoord, layout: OffsetLayout): OffsetCoord {
    return axialToOffset(cubeToAxial(c), layout);
}
