/**
 * Target Logger Facade
 *
 * Console-style front end over the pipeline: one method per level,
 * bound to a target, with optional fields attached to every record.
 */
import { isFieldList } from './formatter.js';
import { getLogger, type Logger } from './logger.js';
import type { Fields, Level, MessageFn } from './types.js';

/**
 * Per-level logging method.
 */
export type LevelMethod = (message: string | MessageFn, fields?: Fields) => void;

/**
 * Logger bound to one target.
 *
 * @example
 * ```typescript
 * const log = createLogger('http', { service: 'api' })
 *
 * log.info('listening', { port: 8080 })
 * // INFO [http] listening service=api port=8080
 *
 * log.child('router').debug('matched', { route: '/users' })
 * // DEBUG [http:router] matched service=api route=/users
 * ```
 */
export interface TargetLogger {

    readonly target: string;

    trace: LevelMethod;
    debug: LevelMethod;
    info: LevelMethod;
    warn: LevelMethod;
    error: LevelMethod;

    /** Whether a record at this level would be written */
    enabled(level: Level): boolean;

    /**
     * Logger for `target:suffix`, inheriting these bindings.
     */
    child(suffix: string, extra?: Record<string, unknown>): TargetLogger;

}

/**
 * Put bindings ahead of the call's own fields.
 */
function mergeFields(bindings: Record<string, unknown>, fields: Fields | undefined): Fields {

    if (!fields) {

        return bindings;

    }

    if (isFieldList(fields)) {

        return [...Object.entries(bindings), ...fields];

    }

    return { ...bindings, ...fields };

}

/**
 * Create a logger bound to a target.
 *
 * @param target - Target name written in brackets
 * @param bindings - Fields written before each record's own fields
 * @param logger - Pipeline to use; the process-wide logger when omitted,
 * looked up on every call so `init()` may run later
 */
export function createLogger(
    target: string,
    bindings: Record<string, unknown> = {},
    logger?: Logger,
): TargetLogger {

    const resolve = (): Logger => logger ?? getLogger();
    const hasBindings = Object.keys(bindings).length > 0;

    const method = (level: Level): LevelMethod => (message, fields) => {

        const pipeline = resolve();

        // Filter before merging so dropped records cost nothing
        if (!pipeline.shouldEmit(level, target)) {

            return;

        }

        pipeline.emit({
            level,
            target,
            message,
            fields: hasBindings ? mergeFields(bindings, fields) : fields,
        });

    };

    return {
        target,
        trace: method('trace'),
        debug: method('debug'),
        info: method('info'),
        warn: method('warn'),
        error: method('error'),
        enabled: (level) => resolve().shouldEmit(level, target),
        child: (suffix, extra = {}) => createLogger(
            target ? `${target}:${suffix}` : suffix,
            { ...bindings, ...extra },
            logger,
        ),
    };

}
