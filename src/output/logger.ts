/**
 * Logger utility for quizforge
 *
 * Provides console output functions that can be silenced for machine-readable
 * output (json). Machine-readable runs print ONLY the structured result to stdout.
 */

const PREFIX = '[quizforge]';

let silentMode = false;
let verboseMode = false;

/**
 * Enable or disable silent mode.
 * When enabled, log(), warn() and debug() output nothing.
 * error() always outputs to stderr.
 */
export function setSilentMode(silent: boolean): void {
    silentMode = silent;
}

export function isSilentMode(): boolean {
    return silentMode;
}

/**
 * Enable or disable debug output.
 */
export function setVerboseMode(verbose: boolean): void {
    verboseMode = verbose;
}

export function isVerboseMode(): boolean {
    return verboseMode;
}

/**
 * Log to stdout. Silenced in silent mode.
 */
export function log(...args: unknown[]): void {
    if (!silentMode) {
        console.log(PREFIX, ...args);
    }
}

/**
 * Log warning to stderr. Silenced in silent mode.
 */
export function warn(...args: unknown[]): void {
    if (!silentMode) {
        console.warn(PREFIX, ...args);
    }
}

/**
 * Log to stderr, only in verbose mode and never in silent mode.
 */
export function debug(...args: unknown[]): void {
    if (verboseMode && !silentMode) {
        console.error(PREFIX, ...args);
    }
}

/**
 * Log error to stderr. ALWAYS outputs (never silenced).
 */
export function error(...args: unknown[]): void {
    console.error(PREFIX, ...args);
}
