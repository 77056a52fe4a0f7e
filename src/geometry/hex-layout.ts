/**
 * World-space layout: mapping between hexes and 2D points.
 *
 * Engines own their transforms; this module only answers "where is the
 * center of this hex" and "which hex contains this point" for a given
 * orientation, hex size and origin.
 *
 * ═══════════════════════════════════════════════════════════════════════════
 * FORMULAS (size = outer radius, origin added afterwards)
 * ═══════════════════════════════════════════════════════════════════════════
 *
 *   PointyTop:  x = (√3·q + √3/2·r) · size.x      y = (3/2·r) · size.y
 *   FlatTop:    x = (3/2·q) · size.x               y = (√3/2·q + √3·r) · size.y
 *
 * Reverse:
 *   PointyTop:  q = (√3/3·x − 1/3·y)               r = (2/3·y)
 *   FlatTop:    q = (2/3·x)                        r = (−1/3·x + √3/3·y)
 *
 * with x, y already divided by size and shifted by −origin.
 */

import { CubeCoord } from '../coords/cube-coord';
import { FractionalCube, cubeRound } from '../coords/fractional-coord';
import { Orientation, SQRT_3 } from '../coords/orientation';
import { HexContractError } from '../errors';

export interface WorldPoint {
    readonly x: number;
    readonly y: number;
}

export interface HexLayout {
    readonly orientation: Orientation;
    /** Outer radius along each axis; unequal values stretch the grid */
    readonly size: WorldPoint;
    /** World position of the center of hex (0, 0, 0) */
    readonly origin: WorldPoint;
}

export function createLayout(
    orientation: Orientation,
    size: number | WorldPoint = 1,
    origin: WorldPoint = { x: 0, y: 0 },
): HexLayout {
    const sizePoint = typeof size === 'number' ? { x: size, y: size } : size;
    if (!(sizePoint.x > 0) || !(sizePoint.y > 0)) {
        throw new HexContractError('INVALID_LAYOUT', `Layout size must be positive, got (${sizePoint.x}, ${sizePoint.y})`);
    }
    return { orientation, size: sizePoint, origin };
}

/**
 * Convert a hex to the world position of its center.
 */
export function hexToWorld(hex: FractionalCube, layout: HexLayout): WorldPoint {
    const { size, origin } = layout;

    if (layout.orientation === Orientation.PointyTop) {
        return {
            x: (SQRT_3 * hex.q + (SQRT_3 / 2) * hex.r) * size.x + origin.x,
            y: (1.5 * hex.r) * size.y + origin.y,
        };
    }
    return {
        x: (1.5 * hex.q) * size.x + origin.x,
        y: ((SQRT_3 / 2) * hex.q + SQRT_3 * hex.r) * size.y + origin.y,
    };
}

/**
 * Convert a world position to fractional cube coordinates without rounding.
 */
export function worldToFractional(point: WorldPoint, layout: HexLayout): FractionalCube {
    const x = (point.x - layout.origin.x) / layout.size.x;
    const y = (point.y - layout.origin.y) / layout.size.y;

    let q: number;
    let r: number;
    if (layout.orientation === Orientation.PointyTop) {
        q = (SQRT_3 / 3) * x - y / 3;
        r = (2 / 3) * y;
    } else {
        q = (2 / 3) * x;
        r = -x / 3 + (SQRT_3 / 3) * y;
    }
    return { q, r, s: -q - r };
}

/**
 * Find the hex containing a world position.
 */
export function worldToHex(point: WorldPoint, layout: HexLayout): CubeCoord {
    return cubeRound(worldToFractional(point, layout));
}

/**
 * Corner positions of a hex, clockwise in a Y-down world.
 *
 * Corner i sits at angle 60°·i from the center for FlatTop and
 * 60°·i − 30° for PointyTop, so corner 0 of a flat-top hex is its
 * right-hand point.
 */
export function hexCorners(hex: CubeCoord, layout: HexLayout): WorldPoint[] {
    const center = hexToWorld(hex, layout);
    const startAngle = layout.orientation === Orientation.PointyTop ? -30 : 0;

    const corners: WorldPoint[] = [];
    for (let i = 0; i < 6; i++) {
        const angle = (Math.PI / 180) * (60 * i + startAngle);
        corners.push({
            x: center.x + layout.size.x * Math.cos(angle),
            y: center.y + layout.size.y * Math.sin(angle),
        });
    }
    return corners;
}
