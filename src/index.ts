/**
 * hexweave: hex-grid coordinates, geometry, maps and pathfinding.
 */

export * from './coords';
export * from './geometry';
export * from './map';
export * from './pathfinding';

export { HexContractError, type HexContractCode } from './errors';
export { hexSettings, type HexSettings } from './hex-settings';
export { LOG_SOURCE, LogHandler, type DebugPayload } from './utilities/log-handler';
export { LogManager, LogType, type ILogMessage, type LogMessageCallback } from './utilities/log-manager';
