/**
 * Event Classifier
 *
 * Classifies observer event names by log level based on naming patterns.
 *
 * Classification rules:
 * - 'error' or '*:error', '*:failed' -> error
 * - '*:warning', '*:blocked', '*:expired', '*:timeout' -> warn
 * - '*:start', '*:complete', '*:created', etc. -> info
 * - Everything else -> debug
 */
import type { Level } from './types.js';

/**
 * Patterns that classify an event as error level.
 */
const ERROR_PATTERNS = [/^error$/, /:error$/, /:failed$/];

/**
 * Patterns that classify an event as warn level.
 */
const WARN_PATTERNS = [/:warning$/, /:blocked$/, /:expired$/, /:timeout$/];

/**
 * Patterns that classify an event as info level.
 * Lifecycle events worth seeing at the default level.
 */
const INFO_PATTERNS = [
    /:start$/,
    /:started$/,
    /:stop$/,
    /:stopped$/,
    /:complete$/,
    /:created$/,
    /:deleted$/,
    /:updated$/,
    /:loaded$/,
    /:saved$/,
    /:open$/,
    /:close$/,
    /:connected$/,
    /:disconnected$/,
    /:ready$/,
];

/**
 * Classify an event name to determine its log level.
 *
 * @example
 * ```typescript
 * classifyEvent('error')            // 'error'
 * classifyEvent('connection:error') // 'error'
 * classifyEvent('job:start')        // 'info'
 * classifyEvent('cache:hit')        // 'debug'
 * ```
 */
export function classifyEvent(event: string): Level {

    if (ERROR_PATTERNS.some((pattern) => pattern.test(event))) {

        return 'error';

    }

    if (WARN_PATTERNS.some((pattern) => pattern.test(event))) {

        return 'warn';

    }

    if (INFO_PATTERNS.some((pattern) => pattern.test(event))) {

        return 'info';

    }

    return 'debug';

}
