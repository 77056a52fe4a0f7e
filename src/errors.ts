/** Contract violations reported at the library's call boundaries. */
export type HexContractCode =
    | 'MALFORMED_COORDINATE'
    | 'INVALID_RADIUS'
    | 'INVALID_DIRECTION'
    | 'INVALID_LAYOUT'
    | 'INVALID_SETTING';

/**
 * Thrown when a caller passes input that can never be valid, such as a cube
 * triple that does not sum to zero or a negative radius.
 *
 * Absent cells and unreachable goals are not errors and never throw.
 */
export class HexContractError extends Error {
    public readonly code: HexContractCode;

    constructor(code: HexContractCode, msg: string) {
        super(msg);
        this.name = 'HexContractError';
        this.code = code;

        Object.seal(this);
    }
}

/** Throw INVALID_RADIUS unless radius is a non-negative integer. */
export function assertRadius(radius: number): void {
    if (!Number.isInteger(radius) || radius < 0) {
        throw new HexContractError('INVALID_RADIUS', `Radius must be a non-negative integer, got ${radius}`);
    }
}
