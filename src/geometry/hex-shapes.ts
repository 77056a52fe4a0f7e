/**
 * Area queries: filled hexagons (range, spiral) and their outlines (ring).
 */

import { CubeCoord } from '../coords/cube-coord';
import { assertRadius } from '../errors';
import { CUBE_DIRECTIONS, EDirection, NUMBER_OF_DIRECTIONS, rotateDirection } from './hex-directions';
import { add, scale } from './hex-math';

/** Corner a ring walk starts from */
export const RING_START_DIRECTION = EDirection.WEST;

/**
 * Every hex within `radius` steps of `center`, center included.
 *
 * Holds exactly 1 + 3·radius·(radius + 1) cells, ordered by q then r.
 * @throws HexContractError when radius is negative or not an integer
 */
export function range(center: CubeCoord, radius: number): CubeCoord[] {
    assertRadius(radius);

    const results: CubeCoord[] = [];
    for (let q = -radius; q <= radius; q++) {
        const rMin = Math.max(-radius, -q - radius);
        const rMax = Math.min(radius, -q + radius);
        for (let r = rMin; r <= rMax; r++) {
            results.push(CubeCoord.of(center.q + q, center.r + r, center.s - q - r));
        }
    }
    return results;
}

/**
 * Hexes exactly `radius` steps from `center`.
 *
 * Radius 0 yields [center]. Otherwise the walk starts at the corner
 * center + WEST × radius and follows the six edges clockwise
 * (NORTH_EAST, EAST, SOUTH_EAST, SOUTH_WEST, WEST, NORTH_WEST), radius
 * steps each, giving exactly 6 × radius cells. This order is stable.
 * @throws HexContractError when radius is negative or not an integer
 */
export function ring(center: CubeCoord, radius: number): CubeCoord[] {
    assertRadius(radius);

    if (radius === 0) {
        return [center];
    }

    const results: CubeCoord[] = [];
    let hex = add(center, scale(CUBE_DIRECTIONS[RING_START_DIRECTION], radius));

    for (let side = 0; side < NUMBER_OF_DIRECTIONS; side++) {
        const step = CUBE_DIRECTIONS[rotateDirection(RING_START_DIRECTION, 2 + side)];
        for (let j = 0; j < radius; j++) {
            results.push(hex);
            hex = add(hex, step);
        }
    }

    return results;
}

/**
 * The same cells as `range`, ordered ring by ring outwards from the
 * center (rings 0, 1, ..., radius).
 * @throws HexContractError when radius is negative or not an integer
 */
export function spiral(center: CubeCoord, radius: number): CubeCoord[] {
    assertRadius(radius);

    const results: CubeCoord[] = [];
    for (let k = 0; k <= radius; k++) {
        results.push(...ring(center, k));
    }
    return results;
}
