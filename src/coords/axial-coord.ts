import { HexContractError } from '../errors';
import { CubeCoord } from './cube-coord';

/**
 * Axial coordinate: the cube triple with s dropped (s = -q - r).
 * Compact form for storage and display.
 */
export interface AxialCoord {
    readonly q: number;
    readonly r: number;
}

/**
 * Create an axial coordinate.
 * @throws HexContractError when q or r is not an integer
 */
export function axial(q: number, r: number): AxialCoord {
    if (!Number.isInteger(q) || !Number.isInteger(r)) {
        throw new HexContractError('MALFORMED_COORDINATE', `Axial components must be integers: (${q}, ${r})`);
    }
    return { q: q || 0, r: r || 0 };
}

export function axialEquals(a: AxialCoord, b: AxialCoord): boolean {
    return a.q === b.q && a.r === b.r;
}

export function axialToCube(a: AxialCoord): CubeCoord {
    return CubeCoord.fromAxial(a.q, a.r);
}

export function cubeToAxial(c: CubeCoord): AxialCoord {
    return { q: c.q, r: c.r };
}
