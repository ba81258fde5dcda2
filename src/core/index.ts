/**
 * Core module exports.
 *
 * The logging pipeline, its lifecycle observer and environment checks.
 */

// Observer
export { observer } from './observer.js'
export type { LoggerEvents, LoggerEventNames, ObserverEngine } from './observer.js'

// Environment
export {
    LEVEL_ENV_VAR,
    isColorForced,
    isColorDisabled,
    resolveColor,
    getEnvLevel,
    hasLocalOffset,
} from './environment.js'

// Logger
export * from './logger/index.js'
