/**
 * Component-wise arithmetic and distance on cube coordinates.
 * All functions are pure; the zero-sum invariant holds by construction.
 */

import { CubeCoord } from '../coords/cube-coord';

export function add(a: CubeCoord, b: CubeCoord): CubeCoord {
    return CubeCoord.of(a.q + b.q, a.r + b.r, a.s + b.s);
}

export function subtract(a: CubeCoord, b: CubeCoord): CubeCoord {
    return CubeCoord.of(a.q - b.q, a.r - b.r, a.s - b.s);
}

/**
 * Multiply every component by an integer factor.
 * @throws HexContractError when factor is not an integer
 */
export function scale(a: CubeCoord, factor: number): CubeCoord {
    return CubeCoord.of(a.q * factor, a.r * factor, a.s * factor);
}

export function negate(a: CubeCoord): CubeCoord {
    return CubeCoord.of(-a.q, -a.r, -a.s);
}

/**
 * Hex grid distance: the number of single steps between two cells.
 * Always admissible as an A* heuristic when every step costs at least 1.
 */
export function distance(a: CubeCoord, b: CubeCoord): number {
    return (Math.abs(a.q - b.q) + Math.abs(a.r - b.r) + Math.abs(a.s - b.s)) / 2;
}

/** Distance from the origin. */
export function length(a: CubeCoord): number {
    return distance(a, CubeCoord.ZERO);
}
