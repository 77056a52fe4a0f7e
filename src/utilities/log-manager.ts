export enum LogType {
    Error,
    Debug,
    Warn,
    Info
}

export interface ILogMessage {
    type: LogType;
    source: string;
    msg: unknown;
    exception?: Error;
    index?: number;
}

export type LogMessageCallback = ((msg: ILogMessage) => void);

/** Minimum interval between identical log messages (in ms) */
const LOG_THROTTLE_MS = 1000;

/** Number of messages kept for late listeners */
const LOG_HISTORY_SIZE = 100;

/** Throttle entries kept before stale ones are dropped */
const LOG_THROTTLE_KEYS = 100;

/**
 * Stack frames where the host's scheduler takes over. Anything below them
 * belongs to the event loop, not to the caller.
 */
const ASYNC_BOUNDARY_PATTERNS = [
    /processTicksAndRejections/,
    /listOnTimeout/,
    /process\.processImmediate/,
    /requestAnimationFrame/,
    /Promise\.then/,
];

/**
 * Truncate a stack trace at the first async boundary, keeping that frame
 * for context.
 */
export function cleanStackTrace(stack: string): string {
    const lines = stack.split('\n');
    const result: string[] = [];

    for (const line of lines) {
        const trimmed = line.trim();

        if (ASYNC_BOUNDARY_PATTERNS.some(p => p.test(trimmed))) {
            result.push(line);
            result.push('    ... (async stack truncated)');
            break;
        }

        result.push(line);
    }

    return result.join('\n');
}

export class LogManager {
    public log: ILogMessage[] = [];
    private logMsgCount = 0;
    private listener: LogMessageCallback | null = null;
    private consoleOutput = true;
    private debugEnabled = false;

    /** Throttle state: source+type+msg -> { lastTime, suppressedCount } */
    private throttleState = new Map<string, { lastTime: number; suppressedCount: number }>();

    public onLogMessage(callback: LogMessageCallback | null): void {
        this.listener = callback;

        if (!callback) {
            return;
        }

        // send old messages
        for (const msg of this.log) {
            callback(msg);
        }
    }

    /** Engines that route logs through their own console can switch ours off. */
    public setConsoleOutput(enabled: boolean): void {
        this.consoleOutput = enabled;
    }

    /** Debug messages are dropped entirely unless enabled. */
    public setDebugEnabled(enabled: boolean): void {
        this.debugEnabled = enabled;
    }

    public isDebugEnabled(): boolean {
        return this.debugEnabled;
    }

    /** Distinct console lines currently tracked for throttling. */
    public get throttledKeyCount(): number {
        return this.throttleState.size;
    }

    public clear(): void {
        this.log = [];
        this.logMsgCount = 0;
        this.throttleState.clear();
    }

    public push(msg: ILogMessage): void {
        if (msg.type === LogType.Debug && !this.debugEnabled) {
            return;
        }

        msg.index = this.logMsgCount++;

        this.log.push(msg);
        if (this.log.length > LOG_HISTORY_SIZE) {
            this.log.shift();
        }

        if (this.listener) {
            this.listener(msg);
        }

        if (!this.consoleOutput) {
            return;
        }

        const msgStr = typeof msg.msg === 'string' ? msg.msg : JSON.stringify(msg.msg);
        const throttleKey = `${msg.source}:${msg.type}:${msgStr}`;
        const now = performance.now();
        const state = this.throttleState.get(throttleKey);

        if (state && now - state.lastTime < LOG_THROTTLE_MS) {
            state.suppressedCount++;
            return;
        }

        const suppressedNote = state && state.suppressedCount > 0
            ? ` (${state.suppressedCount} similar suppressed)`
            : '';

        this.throttleState.set(throttleKey, { lastTime: now, suppressedCount: 0 });
        if (this.throttleState.size > LOG_THROTTLE_KEYS) {
            this.pruneThrottleState(now);
        }

        if (typeof msg.msg !== 'string') {
            console.dir(msg.msg);
            return;
        }

        let formatted = msg.source + '\t' + msg.msg + suppressedNote;

        if (msg.exception) {
            formatted += '\n' + msg.exception.message;
            if (msg.exception.stack) {
                formatted += '\n' + cleanStackTrace(msg.exception.stack);
            }
        }

        switch (msg.type) {
        case LogType.Error:
            console.error(formatted);
            break;
        case LogType.Warn:
            console.warn(formatted);
            break;
        case LogType.Info:
            console.info(formatted);
            break;
        case LogType.Debug:
            console.log(formatted);
            break;
        }
    }

    /** Drop entries whose throttle window has passed. */
    private pruneThrottleState(now: number): void {
        for (const [key, state] of this.throttleState) {
            if (now - state.lastTime >= LOG_THROTTLE_MS) {
                this.throttleState.delete(key);
            }
        }
    }
}
