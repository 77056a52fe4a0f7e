import { CubeCoord } from '../coords/cube-coord';
import { HexMap } from '../map/hex-map';

/**
 * Total cost of walking `path`: the movement cost of every cell after the
 * first. Returns undefined when one of those cells is not in the map.
 */
export function pathCost<T>(map: HexMap<T>, path: readonly CubeCoord[]): number | undefined {
    let total = 0;
    for (let i = 1; i < path.length; i++) {
        const cost = map.movementCost(path[i]);
        if (cost === undefined) {
            return undefined;
        }
        total += cost;
    }
    return total;
}
