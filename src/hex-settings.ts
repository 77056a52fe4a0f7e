import { HexContractError } from './errors';
import { LOG_SOURCE, LogHandler } from './utilities/log-handler';

/**
 * Library-wide settings. Pathfinding options passed per call take
 * precedence; these only supply the fallbacks.
 */
export interface HexSettings {
    // Pathfinding
    /** Node expansions before a search gives up; Infinity means unbounded */
    maxSearchNodes: number;
    /** Multiplier on hex distance for the A* heuristic */
    heuristicScale: number;

    // Logging
    consoleLogging: boolean;
    debugLogging: boolean;
}

/** Default values for all settings */
const DEFAULT_SETTINGS: Readonly<HexSettings> = Object.freeze({
    // Pathfinding
    maxSearchNodes: Number.POSITIVE_INFINITY,
    heuristicScale: 1,

    // Logging
    consoleLogging: true,
    debugLogging: false,
});

function validate(settings: HexSettings): void {
    const { maxSearchNodes, heuristicScale } = settings;

    if (!(maxSearchNodes === Number.POSITIVE_INFINITY || (Number.isInteger(maxSearchNodes) && maxSearchNodes > 0))) {
        throw new HexContractError('INVALID_SETTING', `maxSearchNodes must be a positive integer or Infinity, got ${maxSearchNodes}`);
    }
    if (!Number.isFinite(heuristicScale) || heuristicScale < 0) {
        throw new HexContractError('INVALID_SETTING', `heuristicScale must be a finite non-negative number, got ${heuristicScale}`);
    }
}

/**
 * Centralized settings manager.
 * - Merges partial updates over the current values
 * - Rejects invalid values before anything is applied
 * - Pushes logging switches to the shared LogManager
 */
class HexSettingsManager {
    private static log = new LogHandler(LOG_SOURCE.SETTINGS);

    private current: HexSettings = { ...DEFAULT_SETTINGS };

    constructor() {
        this.applyLogging();
    }

    /** Read-only snapshot of the active settings */
    public get state(): Readonly<HexSettings> {
        return this.current;
    }

    /** Merge the given values over the active settings */
    public configure(update: Partial<HexSettings>): void {
        const next: HexSettings = { ...this.current, ...update };
        validate(next);

        this.current = next;
        this.applyLogging();
        HexSettingsManager.log.info('Settings updated: ' + Object.keys(update).join(', '));
    }

    /** Reset all settings to defaults */
    public resetToDefaults(): void {
        this.current = { ...DEFAULT_SETTINGS };
        this.applyLogging();
    }

    /** Get a copy of the default settings */
    public getDefaults(): HexSettings {
        return { ...DEFAULT_SETTINGS };
    }

    private applyLogging(): void {
        const manager = LogHandler.getLogManager();
        manager.setConsoleOutput(this.current.consoleLogging);
        manager.setDebugEnabled(this.current.debugLogging);
    }
}

// Singleton instance
export const hexSettings = new HexSettingsManager();
