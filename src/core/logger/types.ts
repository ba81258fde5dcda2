/**
 * Logger Types
 *
 * Type definitions for the slimlog pipeline.
 * A record flows through filter, formatter and writer gate
 * within a single synchronous call.
 */
import type { Writable } from 'node:stream';

import type { LogError } from './errors.js';

/**
 * Record severity, least to most severe.
 */
export type Level = 'trace' | 'debug' | 'info' | 'warn' | 'error';

/**
 * Minimum level setting. `off` filters every record.
 */
export type LevelFilter = Level | 'off';

/**
 * Numeric priority for levels and filters.
 * Higher numbers = more severe.
 */
export const LEVEL_PRIORITY: Record<LevelFilter, number> = {
    trace: 0,
    debug: 1,
    info: 2,
    warn: 3,
    error: 4,
    off: 5,
};

/**
 * Ordered list of every record level.
 */
export const LEVELS: readonly Level[] = ['trace', 'debug', 'info', 'warn', 'error'];

/**
 * Ordered list of every filter value.
 */
export const LEVEL_FILTERS: readonly LevelFilter[] = [...LEVELS, 'off'];

/**
 * Sink for message text.
 *
 * Handed to a MessageFn so it can write straight into the
 * record buffer without building an intermediate string.
 */
export interface MessageWriter {

    write(text: string): void;

}

/**
 * Message renderer invoked during formatting.
 */
export type MessageFn = (out: MessageWriter) => void;

/**
 * Custom renderer for one segment of a line.
 *
 * Gets the record being formatted and writes its segment to `out`.
 */
export type DisplayFn = (record: LogRecord, out: MessageWriter) => void;

/**
 * Replacements for the default segment renderers.
 */
export interface DisplayHooks {

    /** Replaces the level tag. Colored like the tag when color is on */
    level?: DisplayFn | undefined;

    /** Replaces ` [target]`, leading space included */
    target?: DisplayFn | undefined;

    /** Replaces the message. Still indented and dimmed like the message */
    content?: DisplayFn | undefined;

}

/**
 * Key/value pairs appended after the message.
 */
export type Fields =
    | Readonly<Record<string, unknown>>
    | ReadonlyArray<readonly [string, unknown]>;

/**
 * One logging event. Lives for the duration of a single call.
 */
export interface LogRecord {

    level: Level;

    /** Module or subsystem name; empty string when absent */
    target: string;

    message: string | MessageFn;

    fields?: Fields | undefined;

}

/**
 * What filter predicates get to see. No message, so a
 * predicate can run before any formatting work.
 */
export interface RecordMeta {

    level: Level;

    target: string;

}

/**
 * Destination for finished lines.
 *
 * Only the writer gate calls `write`.
 */
export interface OutputSink {

    /**
     * Write one complete record.
     *
     * May throw; the gate reports the failure.
     */
    write(bytes: Uint8Array): void;

    /**
     * True when the sink keeps a reference to the chunk after
     * `write` returns. The logger copies before the gate for these.
     */
    readonly retainsChunks: boolean;

    /** True when the destination is an interactive terminal */
    readonly isTTY: boolean;

    /** Resolves once everything written so far has left the process */
    flush(): Promise<void>;

}

/**
 * Time zone used by the timestamp decorator.
 */
export type TimeZone = 'local' | 'utc';

/**
 * Color selection. `auto` asks the environment.
 */
export type ColorChoice = boolean | 'auto';

/**
 * Options accepted by `init()` and the Logger constructor.
 */
export interface LoggerOptions {

    /** Minimum level. When omitted, LOG_LEVEL may override the default. */
    level?: LevelFilter;

    /**
     * Per-target minimum levels, keyed by target prefix.
     *
     * @example
     * ```typescript
     * { targets: { 'db': 'warn', 'db:pool': 'trace' } }
     * ```
     */
    targets?: Record<string, LevelFilter>;

    color?: ColorChoice;

    timestamps?: boolean;

    timeZone?: TimeZone;

    /** Records that would grow past this many bytes are dropped */
    maxRecordBytes?: number;

    /**
     * Settings cell of another Logger, usually posted from another
     * thread. When given, level/color/timestamps/timeZone are read
     * from it and the matching options here are ignored.
     */
    shared?: SharedArrayBuffer;

    /** Extra gate after the level check passes */
    filter?: (meta: RecordMeta) => boolean;

    /**
     * Records for which the message is rendered dim (color only).
     * Defaults to debug and trace records.
     */
    dim?: (meta: RecordMeta) => boolean;

    /**
     * Custom level tag renderer.
     *
     * @example
     * ```typescript
     * { displayLevel: (record, out) => out.write(record.level) }
     * ```
     */
    displayLevel?: DisplayFn;

    /** Custom renderer for the target segment, leading space included */
    displayTarget?: DisplayFn;

    /** Custom message renderer */
    displayContent?: DisplayFn;

    /** Receives every formatting or write failure */
    onError?: (err: LogError) => void;

    sink?: 'stdout' | 'stderr' | Writable | OutputSink;

}

/**
 * Settings after defaults, environment and validation are applied.
 */
export interface ResolvedConfig {

    level: LevelFilter;

    targets: Record<string, LevelFilter>;

    color: boolean;

    timestamps: boolean;

    timeZone: TimeZone;

}

/**
 * Decoration switches read on every emit.
 */
export interface DecorationOptions {

    color: boolean;

    timestamps: boolean;

    timeZone: TimeZone;

    dim: boolean;

    display?: DisplayHooks | undefined;

}
