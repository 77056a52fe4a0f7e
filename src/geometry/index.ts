export {
    EDirection,
    NUMBER_OF_DIRECTIONS,
    CUBE_DIRECTIONS,
    assertDirection,
    directionVector,
    rotateDirection,
    oppositeDirection,
    neighbor,
    neighbors,
    approxDirection,
} from './hex-directions';
export { add, subtract, scale, negate, distance, length } from './hex-math';
export { rotate, reflect, reflectAcross, type CubeAxis } from './hex-transform';
export { LINE_NUDGE, lerp, lerpRound, line } from './hex-line';
export { RING_START_DIRECTION, range, ring, spiral } from './hex-shapes';
export {
    createLayout,
    hexToWorld,
    worldToFractional,
    worldToHex,
    hexCorners,
    type HexLayout,
    type WorldPoint,
} from './hex-layout';
