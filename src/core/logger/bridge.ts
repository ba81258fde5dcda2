/**
 * Observer Bridge
 *
 * Facade adapter for @logosdx/observer engines: turns every event the
 * engine emits into a record. The event name picks the level (see
 * classifier.ts) and becomes the message; object payloads become
 * fields.
 *
 * @example
 * ```typescript
 * const engine = new ObserverEngine<AppEvents>()
 * const cleanup = bridgeObserver(engine, { target: 'app' })
 *
 * engine.emit('db:connected', { host: 'db-1' })
 * // INFO [app] db:connected host=db-1
 *
 * cleanup()
 * ```
 */
import { classifyEvent } from './classifier.js';
import { getLogger, type Logger } from './logger.js';
import type { Fields, Level } from './types.js';

/**
 * Payload shape passed to regex listeners.
 */
export interface EventPayload {

    event: PropertyKey;

    data: unknown;

}

export interface EventBridgeOptions {

    /** Target written on every record. Default `events` */
    target?: string;

    /** Level overrides by exact event name */
    levels?: Record<string, Level>;

    /** Pipeline to use; the process-wide logger when omitted */
    logger?: Logger;

}

/**
 * Anything that takes regex listeners the way ObserverEngine does.
 */
export interface RegexEventSource {

    on(pattern: RegExp, listener: (payload: EventPayload) => void): () => void;

}

export interface BridgeObserverOptions extends EventBridgeOptions {

    /** Events to log. Default: all of them */
    pattern?: RegExp;

}

/**
 * Turn an event payload into fields.
 */
function payloadFields(data: unknown): Fields | undefined {

    if (data === undefined) {

        return undefined;

    }

    if (data !== null && typeof data === 'object' && !Array.isArray(data) && !(data instanceof Date)) {

        const entries: Array<[string, unknown]> = Object.entries(data);

        return entries;

    }

    return [['data', data]];

}

/**
 * Create a regex listener that logs every event it receives.
 *
 * Events named `logger:*` are skipped so the logger's own lifecycle
 * events cannot feed back into it.
 */
export function createEventBridge(options: EventBridgeOptions = {}): (payload: EventPayload) => void {

    const target = options.target ?? 'events';
    const levels = options.levels ?? {};

    return ({ event, data }) => {

        const name = String(event);

        if (name.startsWith('logger:')) {

            return;

        }

        const pipeline = options.logger ?? getLogger();
        const level = levels[name] ?? classifyEvent(name);

        if (!pipeline.shouldEmit(level, target)) {

            return;

        }

        pipeline.emit({ level, target, message: name, fields: payloadFields(data) });

    };

}

/**
 * Log every event an observer engine emits.
 *
 * @returns cleanup that unsubscribes the bridge
 */
export function bridgeObserver(engine: RegexEventSource, options: BridgeObserverOptions = {}): () => void {

    const { pattern = /.*/, ...bridgeOptions } = options;

    return engine.on(pattern, createEventBridge(bridgeOptions));

}
