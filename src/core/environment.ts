/**
 * Environment Detection
 *
 * Checks that turn the process environment into the booleans the
 * logger consumes: whether color is wanted, which level LOG_LEVEL
 * asks for, whether a local time offset is available.
 */

/**
 * Environment variable holding the default minimum level.
 */
export const LEVEL_ENV_VAR = 'LOG_LEVEL';

/**
 * Check whether an env var is set to something other than an
 * explicit "off" value.
 */
function isEnabledFlag(value: string | undefined): boolean {

    if (value === undefined) {

        return false;

    }

    return value !== '0' && value.toLowerCase() !== 'false';

}

/**
 * Detect if color output is forced.
 *
 * @returns true if FORCE_COLOR is set to anything but 0/false
 */
export function isColorForced(): boolean {

    return isEnabledFlag(process.env['FORCE_COLOR']);

}

/**
 * Detect if color output is disabled.
 *
 * Any value of NO_COLOR counts, per no-color.org.
 */
export function isColorDisabled(): boolean {

    return process.env['NO_COLOR'] !== undefined;

}

/**
 * Decide whether output should be colored.
 *
 * FORCE_COLOR wins over NO_COLOR, which wins over the terminal check.
 *
 * @example
 * ```typescript
 * resolveColor('auto', process.stdout.isTTY === true)
 * resolveColor(false, true) // false, explicit choice
 * ```
 */
export function resolveColor(choice: boolean | 'auto', isTTY: boolean): boolean {

    if (choice !== 'auto') {

        return choice;

    }

    if (isColorForced()) {

        return true;

    }

    if (isColorDisabled()) {

        return false;

    }

    return isTTY;

}

/**
 * Read the LOG_LEVEL override.
 *
 * @returns the raw, lowercased value or undefined when unset/blank
 */
export function getEnvLevel(): string | undefined {

    const raw = process.env[LEVEL_ENV_VAR]?.trim();

    if (!raw) {

        return undefined;

    }

    return raw.toLowerCase();

}

/**
 * Check if running in development mode.
 *
 * @returns true if NODE_ENV is 'development'
 */
export function isDev(): boolean {

    return process.env['NODE_ENV'] === 'development';

}

/**
 * Check if lifecycle event tracing is enabled.
 *
 * @returns true if SLIMLOG_DEBUG is set
 */
export function isDebug(): boolean {

    return isEnabledFlag(process.env['SLIMLOG_DEBUG']);

}

/**
 * Check if the local UTC offset can be determined.
 */
export function hasLocalOffset(): boolean {

    return Number.isFinite(new Date().getTimezoneOffset());

}
