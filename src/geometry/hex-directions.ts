import { CubeCoord } from '../coords/cube-coord';
import { HexContractError } from '../errors';

/**
 * Six-direction hex system.
 *
 * Directions are numbered clockwise as seen on a pointy-top grid drawn
 * with Y growing downwards. Cube deltas (q, r, s):
 *
 *   NORTH_EAST = ( 1, -1,  0)
 *   EAST       = ( 1,  0, -1)
 *   SOUTH_EAST = ( 0,  1, -1)
 *   SOUTH_WEST = (-1,  1,  0)
 *   WEST       = (-1,  0,  1)
 *   NORTH_WEST = ( 0, -1,  1)
 *
 * The same numbering drives neighbor lookups, rotation (one clockwise step
 * maps direction d to d + 1) and ring walking.
 */

export enum EDirection {
    NORTH_EAST = 0,
    EAST = 1,
    SOUTH_EAST = 2,
    SOUTH_WEST = 3,
    WEST = 4,
    NORTH_WEST = 5,
}

export const NUMBER_OF_DIRECTIONS = 6;

/** Unit cube vectors indexed by EDirection */
export const CUBE_DIRECTIONS: ReadonlyArray<CubeCoord> = Object.freeze([
    CubeCoord.of(1, -1, 0),   // NORTH_EAST
    CubeCoord.of(1, 0, -1),   // EAST
    CubeCoord.of(0, 1, -1),   // SOUTH_EAST
    CubeCoord.of(-1, 1, 0),   // SOUTH_WEST
    CubeCoord.of(-1, 0, 1),   // WEST
    CubeCoord.of(0, -1, 1),   // NORTH_WEST
]);

/**
 * Validate a direction index.
 * @throws HexContractError unless direction is an integer in [0, 5]
 */
export function assertDirection(direction: number): EDirection {
    switch (direction) {
    case EDirection.NORTH_EAST:
    case EDirection.EAST:
    case EDirection.SOUTH_EAST:
    case EDirection.SOUTH_WEST:
    case EDirection.WEST:
    case EDirection.NORTH_WEST:
        return direction;
    default:
        throw new HexContractError('INVALID_DIRECTION', `Direction must be an integer in [0, 5], got ${direction}`);
    }
}

/** Unit vector for a direction. */
export function directionVector(direction: EDirection): CubeCoord {
    return CUBE_DIRECTIONS[assertDirection(direction)];
}

/**
 * Rotate a direction by `offset` steps.
 * Positive offset = clockwise, negative = counter-clockwise.
 */
export function rotateDirection(direction: EDirection, offset: number): EDirection {
    const start = assertDirection(direction);
    return assertDirection(((start + offset) % NUMBER_OF_DIRECTIONS + NUMBER_OF_DIRECTIONS) % NUMBER_OF_DIRECTIONS);
}

export function oppositeDirection(direction: EDirection): EDirection {
    return rotateDirection(direction, 3);
}

/**
 * Get the next hex in the given direction.
 */
export function neighbor(hex: CubeCoord, direction: EDirection): CubeCoord {
    const d = directionVector(direction);
    return CubeCoord.of(hex.q + d.q, hex.r + d.r, hex.s + d.s);
}

/**
 * Get all 6 neighbors of a hex, in direction order.
 */
export function neighbors(hex: CubeCoord): CubeCoord[] {
    return CUBE_DIRECTIONS.map(d => CubeCoord.of(hex.q + d.q, hex.r + d.r, hex.s + d.s));
}

/**
 * Get the direction that best matches the displacement from one hex to
 * another, by the dominant cube axis. Zero displacement yields EAST.
 */
export function approxDirection(from: CubeCoord, to: CubeCoord): EDirection {
    const q = to.q - from.q;
    const r = to.r - from.r;
    const s = to.s - from.s;

    if (q === 0 && r === 0) {
        return EDirection.EAST;
    }

    const absQ = Math.abs(q);
    const absR = Math.abs(r);
    const absS = Math.abs(s);

    if (absQ >= absR && absQ >= absS) {
        // q dominant
        if (q > 0) return r < 0 ? EDirection.NORTH_EAST : EDirection.EAST;
        else return r > 0 ? EDirection.SOUTH_WEST : EDirection.WEST;
    } else if (absR >= absQ && absR >= absS) {
        // r dominant
        if (r > 0) return q >= 0 ? EDirection.SOUTH_EAST : EDirection.SOUTH_WEST;
        else return q > 0 ? EDirection.NORTH_EAST : EDirection.NORTH_WEST;
    } else {
        // s dominant
        if (s > 0) return q >= 0 ? EDirection.NORTH_WEST : EDirection.WEST;
        else return q > 0 ? EDirection.EAST : EDirection.SOUTH_EAST;
    }
}
