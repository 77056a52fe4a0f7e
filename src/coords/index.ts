export { CubeCoord, hexKey } from './cube-coord';
export { axial, axialEquals, axialToCube, cubeToAxial, type AxialCoord } from './axial-coord';
export {
    offset,
    offsetToAxial,
    axialToOffset,
    offsetToCube,
    cubeToOffset,
    type OffsetCoord,
    type OffsetLayout,
    type OffsetParity,
} from './offset-coord';
export { cubeRound, fractionalCube, type FractionalCube } from './fractional-coord';
export { Orientation, SQRT_3, TILE_METRICS, type TileMetrics } from './orientation';
