/**
 * Hexagon orientation and unit-tile metrics.
 *
 * Metrics describe a hexagon whose outer radius (center to corner) is 1.
 * See https://www.redblobgames.com/grids/hexagons/#spacing
 */

export enum Orientation {
    /** Corners point up and down; rows are straight, columns zig-zag */
    PointyTop = 'pointy-top',
    /** Flat edges on top and bottom; columns are straight, rows zig-zag */
    FlatTop = 'flat-top',
}

export const SQRT_3 = Math.sqrt(3);

export interface TileMetrics {
    /** Extent along the X axis */
    readonly width: number;
    /** Extent along the Y axis */
    readonly height: number;
    /** Distance between neighboring centers along X */
    readonly spacingX: number;
    /** Distance between neighboring rows/columns along Y */
    readonly spacingY: number;
}

export const TILE_METRICS: Readonly<Record<Orientation, TileMetrics>> = Object.freeze({
    [Orientation.PointyTop]: Object.freeze({
        width: SQRT_3,
        height: 2,
        spacingX: SQRT_3,
        spacingY: 1.5,
    }),
    [Orientation.FlatTop]: Object.freeze({
        width: 2,
        height: SQRT_3,
        spacingX: 1.5,
        spacingY: SQRT_3,
    }),
});
