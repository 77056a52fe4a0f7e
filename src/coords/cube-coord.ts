/**
 * Cube coordinates: the canonical hex address used by every algorithm in
 * this library.
 *
 * The three components always satisfy q + r + s = 0. The constructor is
 * private so that `CubeCoord.of` and `CubeCoord.fromAxial` are the only
 * ways to obtain one, and both reject malformed input.
 */

import { HexContractError } from '../errors';

/** Convert hex coordinates to a string key for Map lookups */
export function hexKey(q: number, r: number): string {
    return q + ',' + r;
}

export class CubeCoord {
    public static readonly ZERO = new CubeCoord(0, 0, 0);

    public readonly q: number;
    public readonly r: number;
    public readonly s: number;

    private constructor(q: number, r: number, s: number) {
        // normalize -0 so equal cells compare equal structurally
        this.q = q || 0;
        this.r = r || 0;
        this.s = s || 0;
        Object.freeze(this);
    }

    /**
     * Create a cube coordinate.
     * @throws HexContractError when a component is not an integer or the sum is not zero
     */
    public static of(q: number, r: number, s: number): CubeCoord {
        if (!Number.isInteger(q) || !Number.isInteger(r) || !Number.isInteger(s)) {
            throw new HexContractError('MALFORMED_COORDINATE', `Cube components must be integers: (${q}, ${r}, ${s})`);
        }
        if (q + r + s !== 0) {
            throw new HexContractError('MALFORMED_COORDINATE', `Sum of cube components must equal 0: ${q}+${r}+${s}!=0`);
        }
        return new CubeCoord(q, r, s);
    }

    /** Create a cube coordinate from its axial pair; s is derived. */
    public static fromAxial(q: number, r: number): CubeCoord {
        return CubeCoord.of(q, r, -q - r);
    }

    /** Map key shared with axial coordinates of the same cell */
    public get key(): string {
        return hexKey(this.q, this.r);
    }

    public equals(other: CubeCoord): boolean {
        return this.q === other.q && this.r === other.r && this.s === other.s;
    }

    public toString(): string {
        return `(${this.q}, ${this.r}, ${this.s})`;
    }
}
