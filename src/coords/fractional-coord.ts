import { CubeCoord } from './cube-coord';

/**
 * Cube coordinate with floating-point components (q + r + s ≈ 0).
 * Produced by interpolation and world-to-hex mapping; round it before
 * using it in any discrete query.
 */
export interface FractionalCube {
    readonly q: number;
    readonly r: number;
    readonly s: number;
}

export function fractionalCube(q: number, r: number, s: number): FractionalCube {
    return { q, r, s };
}

/**
 * Round fractional cube coordinates (q, r, s) to the nearest hex.
 *
 * Each component is rounded independently, then the component with the
 * largest rounding error is recomputed from the other two so the result
 * sums to exactly zero.
 */
export function cubeRound(frac: FractionalCube): CubeCoord {
    let rq = Math.round(frac.q);
    let rr = Math.round(frac.r);
    let rs = Math.round(frac.s);

    const dq = Math.abs(rq - frac.q);
    const dr = Math.abs(rr - frac.r);
    const ds = Math.abs(rs - frac.s);

    if (dq > dr && dq > ds) {
        rq = -rr - rs;
    } else if (dr > ds) {
        rr = -rq - rs;
    } else {
        rs = -rq - rr;
    }

    return CubeCoord.of(rq, rr, rs);
}
