/**
 * Rotation and reflection of cube coordinates around a pivot.
 */

import { CubeCoord } from '../coords/cube-coord';
import { HexContractError } from '../errors';
import { add, subtract } from './hex-math';
import { NUMBER_OF_DIRECTIONS } from './hex-directions';

export type CubeAxis = 'q' | 'r' | 's';

type Permutation = (v: CubeCoord) => CubeCoord;

/**
 * Clockwise rotation by k × 60°, indexed by k. Each entry is a cyclic
 * permutation of (q, r, s), sign-flipped on odd steps.
 */
const ROTATIONS: ReadonlyArray<Permutation> = Object.freeze([
    v => v,
    v => CubeCoord.of(-v.r, -v.s, -v.q),
    v => CubeCoord.of(v.s, v.q, v.r),
    v => CubeCoord.of(-v.q, -v.r, -v.s),
    v => CubeCoord.of(v.r, v.s, v.q),
    v => CubeCoord.of(-v.s, -v.q, -v.r),
]);

/** Mirror within the axis: keep that component, swap the other two */
const REFLECTIONS: Readonly<Record<CubeAxis, Permutation>> = Object.freeze({
    q: v => CubeCoord.of(v.q, v.s, v.r),
    r: v => CubeCoord.of(v.s, v.r, v.q),
    s: v => CubeCoord.of(v.r, v.q, v.s),
});

/**
 * Rotate `hex` around `pivot` by `steps` × 60°.
 * Positive steps turn clockwise, negative counter-clockwise; steps are
 * taken modulo 6.
 * @throws HexContractError when steps is not an integer
 */
export function rotate(hex: CubeCoord, pivot: CubeCoord, steps: number): CubeCoord {
    if (!Number.isInteger(steps)) {
        throw new HexContractError('INVALID_DIRECTION', `Rotation steps must be an integer, got ${steps}`);
    }
    const k = ((steps % NUMBER_OF_DIRECTIONS) + NUMBER_OF_DIRECTIONS) % NUMBER_OF_DIRECTIONS;
    return add(pivot, ROTATIONS[k](subtract(hex, pivot)));
}

/**
 * Mirror `hex` across the line through `pivot` that runs along `axis`:
 * the axis component is kept and the other two are swapped.
 */
export function reflect(hex: CubeCoord, axis: CubeAxis, pivot: CubeCoord = CubeCoord.ZERO): CubeCoord {
    return add(pivot, REFLECTIONS[axis](subtract(hex, pivot)));
}

/**
 * Mirror `hex` across the line through `pivot` perpendicular to `axis`:
 * the other two components are swapped and all three negated.
 */
export function reflectAcross(hex: CubeCoord, axis: CubeAxis, pivot: CubeCoord = CubeCoord.ZERO): CubeCoord {
    return rotate(reflect(hex, axis, pivot), pivot, 3);
}
