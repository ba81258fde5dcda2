/**
 * Lifecycle events for slimlog.
 *
 * The pipeline never throws at its callers, so failures and
 * configuration changes are published here instead.
 *
 * @example
 * ```typescript
 * const cleanup = observer.on('logger:error', ({ error }) => {
 *     failures.push(error)
 * })
 *
 * cleanup()
 * ```
 */
import {
    ObserverEngine,
    type Events
} from '@logosdx/observer'

import { isDebug } from './environment.js'
import type { LogError } from './logger/errors.js'
import type { LevelFilter } from './logger/types.js'


/**
 * All events emitted by the logger.
 *
 * - `logger:configured` - a Logger was created or its settings changed
 * - `logger:error` - a record was dropped
 * - `logger:degraded` - first failure without an onError hook
 */
export interface LoggerEvents {

    'logger:configured': { level: LevelFilter; color: boolean; timestamps: boolean }
    'logger:error': { error: LogError }
    'logger:degraded': { error: LogError }
}

export type LoggerEventNames = Events<LoggerEvents>;

/**
 * Global observer instance for logger lifecycle events.
 *
 * Enable tracing with `SLIMLOG_DEBUG=1` to see every event as it occurs.
 */
export const observer = new ObserverEngine<LoggerEvents>({
    name: 'slimlog',
    spy: isDebug()
        ? (action) => console.error(`[slimlog:${action.fn}] ${String(action.event)}`)
        : undefined
});

export type { ObserverEngine }
