/**
 * Logger
 *
 * Synchronous pipeline: filter, format into the thread-local buffer,
 * then one write through the writer gate. Logging never throws at the
 * caller; dropped records are reported through `onError` and the
 * lifecycle observer.
 *
 * @example
 * ```typescript
 * import { init, log } from 'slimlog'
 *
 * init({ level: 'debug', timestamps: true })
 *
 * log('info', 'net', 'connected', { host: 'db-1', port: 5432 })
 * // INFO 10:30:00.123 [net] connected host=db-1 port=5432
 * ```
 */
import { attempt, attemptSync } from '@logosdx/utils';

import { observer } from '../observer.js';
import { withLocalBuffer } from './buffer.js';
import { ConfigCell, resolveConfig } from './config.js';
import { LogError } from './errors.js';
import { TargetLevels } from './filter.js';
import { formatRecord } from './formatter.js';
import { WriterGate } from './gate.js';
import { parseLoggerSettings } from './schema.js';
import { resolveSink, writeAllSync } from './sink.js';
import type {
    DisplayHooks,
    Fields,
    Level,
    LevelFilter,
    LoggerOptions,
    LogRecord,
    MessageFn,
    RecordMeta,
    ResolvedConfig,
} from './types.js';
import { LEVEL_PRIORITY } from './types.js';

/**
 * Printed once per process, the first time a record is dropped
 * without an onError hook.
 */
const DEGRADED_NOTICE = 'slimlog: a log record was dropped; further logging failures will not be reported';

let degradedNoticeWritten = false;

/**
 * Dimming when no `dim` hook is given: the chatty levels.
 */
function isDimmedByDefault(level: Level): boolean {

    return level === 'debug' || level === 'trace';

}

/**
 * Write the degraded-mode notice straight to fd 2, once.
 *
 * Goes through a synchronous fd write rather than process.stderr, whose
 * failures (EPIPE on a closed pipe) arrive later as unhandled 'error'
 * events.
 */
function writeDegradedNotice(error: LogError): void {

    if (degradedNoticeWritten) {

        return;

    }

    degradedNoticeWritten = true;

    // stderr may be the very stream that is failing; nothing left to tell
    attemptSync(() => writeAllSync(2, Buffer.from(`${DEGRADED_NOTICE} (${error.message})\n`)));

}

/**
 * A configured logging pipeline bound to one sink.
 */
export class Logger {

    #cell: ConfigCell;
    #targets: TargetLevels;
    #gate: WriterGate;
    #maxRecordBytes: number | undefined;
    #filter: LoggerOptions['filter'];
    #dim: LoggerOptions['dim'];
    #onError: LoggerOptions['onError'];
    #display: DisplayHooks | undefined;
    #errorCount = 0;
    #degraded = false;

    /**
     * @throws LoggerConfigError for invalid options or LOG_LEVEL
     */
    constructor(options: LoggerOptions = {}) {

        const settings = parseLoggerSettings(options);
        const sink = resolveSink(options.sink);

        this.#gate = new WriterGate(sink, (err) => this.#report(new LogError('io', err)));
        this.#targets = new TargetLevels(settings.targets);
        this.#maxRecordBytes = settings.maxRecordBytes;
        this.#filter = options.filter;
        this.#dim = options.dim;
        this.#onError = options.onError;

        if (options.displayLevel || options.displayTarget || options.displayContent) {

            this.#display = {
                level: options.displayLevel,
                target: options.displayTarget,
                content: options.displayContent,
            };

        }

        this.#cell = options.shared
            ? new ConfigCell(options.shared)
            : ConfigCell.from(resolveConfig(settings, sink.isTTY));

        this.#announce();

    }

    // ─────────────────────────────────────────────────────────────
    // Settings
    // ─────────────────────────────────────────────────────────────

    get level(): LevelFilter {

        return this.#cell.level;

    }

    get color(): boolean {

        return this.#cell.color;

    }

    get timestamps(): boolean {

        return this.#cell.timestamps;

    }

    /**
     * Snapshot of the current settings.
     */
    get config(): ResolvedConfig {

        return {
            level: this.#cell.level,
            targets: this.#targets.toRecord(),
            color: this.#cell.color,
            timestamps: this.#cell.timestamps,
            timeZone: this.#cell.timeZone,
        };

    }

    /**
     * Settings memory to pass as `shared` to a Logger in another thread.
     */
    get sharedConfig(): SharedArrayBuffer {

        return this.#cell.buffer;

    }

    setLevel(level: LevelFilter): void {

        this.#cell.level = level;
        this.#announce();

    }

    setColor(enabled: boolean): void {

        this.#cell.color = enabled;
        this.#announce();

    }

    setTimestamps(enabled: boolean): void {

        this.#cell.timestamps = enabled;
        this.#announce();

    }

    // ─────────────────────────────────────────────────────────────
    // Failure state
    // ─────────────────────────────────────────────────────────────

    /**
     * Records dropped so far.
     */
    get errorCount(): number {

        return this.#errorCount;

    }

    /**
     * True once a record was dropped with no onError hook installed.
     */
    get degraded(): boolean {

        return this.#degraded;

    }

    // ─────────────────────────────────────────────────────────────
    // Pipeline
    // ─────────────────────────────────────────────────────────────

    /**
     * Check whether a record at this level and target would be written.
     *
     * Call before building an expensive message.
     */
    shouldEmit(level: Level, target = ''): boolean {

        const minimum = this.#targets.size > 0
            ? this.#targets.lookup(target) ?? this.#cell.minPriority
            : this.#cell.minPriority;

        if (LEVEL_PRIORITY[level] < minimum) {

            return false;

        }

        return this.#filter ? this.#passesFilter({ level, target }) : true;

    }

    /**
     * Emit one record.
     *
     * @param level - Record severity
     * @param target - Module or subsystem name; empty for none
     * @param message - Text, or a callback writing the text
     * @param fields - Key/value pairs appended after the message
     */
    log(level: Level, target: string, message: string | MessageFn, fields?: Fields): void {

        if (!this.shouldEmit(level, target)) {

            return;

        }

        this.emit({ level, target, message, fields });

    }

    /**
     * Wait for the sink to hand off everything written so far.
     */
    async flush(): Promise<void> {

        const [, err] = await attempt(() => this.#gate.sink.flush());

        if (err) {

            this.#report(new LogError('io', err));

        }

    }

    /**
     * Format and write a record that already passed `shouldEmit`.
     *
     * For facade adapters, which filter before building their record.
     */
    emit(record: LogRecord): void {

        const dim = this.#dim ? this.#shouldDim(record) : isDimmedByDefault(record.level);

        const options = {
            color: this.#cell.color,
            timestamps: this.#cell.timestamps,
            timeZone: this.#cell.timeZone,
            dim,
            display: this.#display,
        };

        withLocalBuffer((buffer) => {

            const [, err] = attemptSync(() => formatRecord(buffer, record, options, this.#maxRecordBytes));

            if (err) {

                this.#report(new LogError('format', err));

                return;

            }

            const view = buffer.view();

            // Copy outside the gate for sinks that keep the chunk past write()
            const bytes = this.#gate.sink.retainsChunks ? Buffer.from(view) : view;

            this.#gate.emitBytes(bytes);

        });

    }

    #passesFilter(meta: RecordMeta): boolean {

        const [passes, err] = attemptSync(() => this.#filter?.(meta) ?? true);

        if (err) {

            this.#report(new LogError('format', err));

            return false;

        }

        return passes;

    }

    #shouldDim(meta: RecordMeta): boolean {

        const [dim, err] = attemptSync(() => this.#dim?.(meta) ?? false);

        return err ? false : dim;

    }

    #report(error: LogError): void {

        this.#errorCount++;

        // Observer listeners are not allowed to break the logger
        attemptSync(() => observer.emit('logger:error', { error }));

        if (this.#onError) {

            const hook = this.#onError;

            // A failing error hook has nowhere left to report to
            attemptSync(() => hook(error));

            return;

        }

        if (!this.#degraded) {

            this.#degraded = true;
            writeDegradedNotice(error);
            attemptSync(() => observer.emit('logger:degraded', { error }));

        }

    }

    #announce(): void {

        attemptSync(() => observer.emit('logger:configured', {
            level: this.#cell.level,
            color: this.#cell.color,
            timestamps: this.#cell.timestamps,
        }));

    }

}

// ─────────────────────────────────────────────────────────────
// Singleton / Factory
// ─────────────────────────────────────────────────────────────

let loggerInstance: Logger | null = null;

/**
 * Configure the process-wide logger.
 *
 * Replaces any logger set up earlier. Records logged before `init`
 * go through a default logger (stdout, `info` or LOG_LEVEL).
 *
 * @throws LoggerConfigError for invalid options or LOG_LEVEL
 */
export function init(options: LoggerOptions = {}): Logger {

    loggerInstance = new Logger(options);

    return loggerInstance;

}

/**
 * Get the process-wide logger, creating a default one if needed.
 */
export function getLogger(): Logger {

    loggerInstance ??= new Logger();

    return loggerInstance;

}

/**
 * Flush and drop the process-wide logger.
 *
 * Useful for testing to ensure clean state between tests.
 */
export async function resetLogger(): Promise<void> {

    if (loggerInstance) {

        await loggerInstance.flush();
        loggerInstance = null;

    }

    degradedNoticeWritten = false;

}

/**
 * Emit a record through the process-wide logger.
 *
 * @example
 * ```typescript
 * log('warn', 'cache', 'evicting', { entries: 120 })
 * log('debug', 'http', (out) => {
 *     out.write('headers: ')
 *     out.write(JSON.stringify(headers))
 * })
 * ```
 */
export function log(level: Level, target: string, message: string | MessageFn, fields?: Fields): void {

    getLogger().log(level, target, message, fields);

}

/**
 * Check the process-wide logger's filter.
 */
export function shouldEmit(level: Level, target = ''): boolean {

    return getLogger().shouldEmit(level, target);

}
