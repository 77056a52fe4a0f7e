/**
 * World layout tests: hex -> world -> hex round trips, tile metrics and
 * corner placement for both orientations.
 */

import { describe, it, expect } from 'vitest';
import { CubeCoord, Orientation, SQRT_3, TILE_METRICS } from '@/coords';
import {
    EDirection,
    createLayout,
    directionVector,
    hexCorners,
    hexToWorld,
    range,
    worldToFractional,
    worldToHex,
    type HexLayout,
} from '@/geometry';
import { captureError } from './helpers/capture-error';

// ═══════════════════════════════════════════════════════════════════════════
// Test Fixtures
// ═══════════════════════════════════════════════════════════════════════════

const POINTY = createLayout(Orientation.PointyTop);
const FLAT = createLayout(Orientation.FlatTop);
const STRETCHED = createLayout(Orientation.PointyTop, { x: 2, y: 3 }, { x: -7, y: 4 });

const LAYOUTS: Array<[string, HexLayout]> = [
    ['pointy', POINTY],
    ['flat', FLAT],
    ['stretched', STRETCHED],
];

// ═══════════════════════════════════════════════════════════════════════════
// Tests
// ═══════════════════════════════════════════════════════════════════════════

describe('createLayout', () => {
    it('expands a scalar size', () => {
        expect(createLayout(Orientation.FlatTop, 8)).toEqual({
            orientation: Orientation.FlatTop,
            size: { x: 8, y: 8 },
            origin: { x: 0, y: 0 },
        });
    });

    it('rejects non-positive sizes', () => {
        expect(captureError(() => createLayout(Orientation.PointyTop, 0))).toMatchObject({ code: 'INVALID_LAYOUT' });
        expect(captureError(() => createLayout(Orientation.PointyTop, { x: 1, y: -1 }))).toMatchObject({
            code: 'INVALID_LAYOUT',
        });
    });
});

describe('hexToWorld', () => {
    it('places pointy-top neighbors', () => {
        const east = hexToWorld(CubeCoord.of(1, 0, -1), POINTY);
        expect(east.x).toBeCloseTo(SQRT_3);
        expect(east.y).toBeCloseTo(0);

        const southEast = hexToWorld(CubeCoord.of(0, 1, -1), POINTY);
        expect(southEast.x).toBeCloseTo(SQRT_3 / 2);
        expect(southEast.y).toBeCloseTo(1.5);
    });

    it('places flat-top neighbors', () => {
        const p = hexToWorld(CubeCoord.of(1, 0, -1), FLAT);
        expect(p.x).toBeCloseTo(1.5);
        expect(p.y).toBeCloseTo(SQRT_3 / 2);

        const q = hexToWorld(CubeCoord.of(0, 1, -1), FLAT);
        expect(q.x).toBeCloseTo(0);
        expect(q.y).toBeCloseTo(SQRT_3);
    });

    it('applies size and origin', () => {
        const layout = createLayout(Orientation.PointyTop, 10, { x: 100, y: 50 });
        const p = hexToWorld(CubeCoord.of(0, 1, -1), layout);
        expect(p.x).toBeCloseTo(100 + 5 * SQRT_3);
        expect(p.y).toBeCloseTo(65);
    });

    it('spaces pointy-top centers by the tile metrics', () => {
        const metrics = TILE_METRICS[Orientation.PointyTop];
        expect(hexToWorld(directionVector(EDirection.EAST), POINTY).x).toBeCloseTo(metrics.spacingX);
        expect(hexToWorld(directionVector(EDirection.SOUTH_EAST), POINTY).y).toBeCloseTo(metrics.spacingY);
        expect(metrics.width).toBeCloseTo(SQRT_3);
        expect(metrics.height).toBe(2);
    });
});

describe('worldToHex', () => {
    it.each(LAYOUTS)('round-trips every hex center (%s)', (_name, layout) => {
        for (const hex of range(CubeCoord.ZERO, 5)) {
            expect(worldToHex(hexToWorld(hex, layout), layout)).toEqual(hex);
        }
    });

    it.each(LAYOUTS)('picks the containing hex for points off center (%s)', (_name, layout) => {
        for (const hex of range(CubeCoord.of(2, -1, -1), 3)) {
            const center = hexToWorld(hex, layout);
            const point = { x: center.x + 0.3 * layout.size.x, y: center.y - 0.2 * layout.size.y };
            expect(worldToHex(point, layout)).toEqual(hex);
        }
    });

    it('returns fractional coordinates that sum to zero', () => {
        const f = worldToFractional({ x: 0.4, y: 0.9 }, POINTY);
        expect(f.q + f.r + f.s).toBeCloseTo(0, 12);
        expect(f.r).toBeCloseTo(0.6);
    });
});

describe('hexCorners', () => {
    it('returns six corners one size away from the center', () => {
        const layout = createLayout(Orientation.FlatTop, 4, { x: 1, y: 1 });
        const hex = CubeCoord.of(-1, 2, -1);
        const center = hexToWorld(hex, layout);
        const corners = hexCorners(hex, layout);

        expect(corners).toHaveLength(6);
        for (const corner of corners) {
            expect(Math.hypot(corner.x - center.x, corner.y - center.y)).toBeCloseTo(4);
        }
    });

    it('starts flat-top corners at the right-hand point', () => {
        const [first] = hexCorners(CubeCoord.ZERO, FLAT);
        expect(first.x).toBeCloseTo(1);
        expect(first.y).toBeCloseTo(0);
    });

    it('starts pointy-top corners upper right', () => {
        const [first, second] = hexCorners(CubeCoord.ZERO, POINTY);
        expect(first.x).toBeCloseTo(SQRT_3 / 2);
        expect(first.y).toBeCloseTo(-0.5);
        expect(second.x).toBeCloseTo(SQRT_3 / 2);
        expect(second.y).toBeCloseTo(0.5);
    });
});
