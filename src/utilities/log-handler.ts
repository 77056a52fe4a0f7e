import { LogManager, LogType } from './log-manager';

/** Module names the library logs under. Host code may use its own. */
export const LOG_SOURCE = Object.freeze({
    PATHFINDER: 'Pathfinder',
    SETTINGS: 'HexSettings',
} as const);

/** A debug message, or a flat record that the console shows as {prop:value}. */
export type DebugPayload = string | Readonly<Record<string, string | number | boolean>>;

/** Per-module logger; every instance writes into one shared LogManager. */
export class LogHandler {
    private readonly _moduleName: string;
    private static manager = new LogManager();

    constructor(moduleName: string) {
        this._moduleName = moduleName;
    }

    public get moduleName(): string {
        return this._moduleName;
    }

    /** log an error */
    public error(msg: string, exception?: Error): void {
        this.push(LogType.Error, msg, exception);
    }

    /** log a warning */
    public warn(msg: string): void {
        this.push(LogType.Warn, msg);
    }

    /** log an info message */
    public info(msg: string): void {
        this.push(LogType.Info, msg);
    }

    /** Dropped by the manager unless debug output is on. */
    public debug(msg: DebugPayload): void {
        this.push(LogType.Debug, msg);
    }

    /** Lets hot paths skip building a debug message nobody will see. */
    public isDebugEnabled(): boolean {
        return LogHandler.manager.isDebugEnabled();
    }

    private push(type: LogType, msg: DebugPayload, exception?: Error): void {
        LogHandler.manager.push({ type, source: this._moduleName, msg, exception });
    }

    public static getLogManager(): LogManager {
        return this.manager;
    }
}
