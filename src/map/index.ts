export {
    STANDARD_CELL_RULES,
    openCell,
    wallCell,
    type CellRules,
    type HexCell,
} from './cell-rules';
export { HexMap, createHexagonalMap, createRectangularMap } from './hex-map';
