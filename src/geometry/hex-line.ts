/**
 * Hex grid line drawing.
 *
 * Lines are drawn by linear interpolation in cube space, rounding each
 * sample to the nearest hex. This is the hex equivalent of Bresenham's
 * line algorithm.
 */

import { CubeCoord } from '../coords/cube-coord';
import { FractionalCube, cubeRound } from '../coords/fractional-coord';
import { distance } from './hex-math';

/**
 * Fixed bias added to the start point before interpolating. Samples that
 * fall exactly on a shared edge would otherwise round either way; the
 * bias settles every such tie the same way. Sums to zero.
 *
 * The bias is absolute, so it only holds while it is above the float
 * resolution of the coordinates: past |q| of roughly 1e10 it is lost in
 * rounding and edge ties fall back to cubeRound's own choice.
 */
export const LINE_NUDGE: FractionalCube = Object.freeze({ q: 1e-6, r: 2e-6, s: -3e-6 });

/**
 * Interpolate between two cube coordinates. t = 0 gives `a`, t = 1 gives `b`.
 */
export function lerp(a: FractionalCube, b: FractionalCube, t: number): FractionalCube {
    return {
        q: a.q + (b.q - a.q) * t,
        r: a.r + (b.r - a.r) * t,
        s: a.s + (b.s - a.s) * t,
    };
}

/** Interpolate and round to the nearest hex. */
export function lerpRound(a: CubeCoord, b: CubeCoord, t: number): CubeCoord {
    return cubeRound(lerp(a, b, t));
}

/**
 * Generate all hexes along the line from `a` to `b`.
 *
 * The result starts at `a`, ends at `b`, has distance(a, b) + 1 entries
 * and every consecutive pair is adjacent.
 */
export function line(a: CubeCoord, b: CubeCoord): CubeCoord[] {
    const n = distance(a, b);

    if (n === 0) {
        return [a];
    }

    const start: FractionalCube = {
        q: a.q + LINE_NUDGE.q,
        r: a.r + LINE_NUDGE.r,
        s: a.s + LINE_NUDGE.s,
    };

    const results: CubeCoord[] = [];
    for (let i = 0; i <= n; i++) {
        results.push(cubeRound(lerp(start, b, i / n)));
    }

    return results;
}
