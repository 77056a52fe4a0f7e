import { CubeCoord } from '../coords/cube-coord';
import { line } from '../geometry/hex-line';
import { HexMap } from '../map/hex-map';

/**
 * Check if we can walk in a straight line from `from` to `to`.
 * Every cell on the hex line after `from` must exist and be passable.
 */
export function hasLineOfSight<T>(map: HexMap<T>, from: CubeCoord, to: CubeCoord): boolean {
    const cells = line(from, to);

    // skip start, include end
    for (let i = 1; i < cells.length; i++) {
        if (!map.isPassable(cells[i])) {
            return false;
        }
    }
    return true;
}
