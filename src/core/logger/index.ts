/**
 * Logger Module
 *
 * Turns a level, target, message and fields into one line on the
 * output sink, synchronously.
 *
 * Features:
 * - Global and per-target minimum levels, readable without locking
 * - ANSI level colors and `HH:mm:ss.SSS` timestamps, both switchable at runtime
 * - Thread-local reusable buffer; one sink write per record
 * - Console-style and observer-event facades
 */

// Types
export type {
    Level,
    LevelFilter,
    MessageWriter,
    MessageFn,
    DisplayFn,
    DisplayHooks,
    Fields,
    LogRecord,
    RecordMeta,
    OutputSink,
    TimeZone,
    ColorChoice,
    LoggerOptions,
    ResolvedConfig,
    DecorationOptions,
} from './types.js';

export { LEVEL_PRIORITY, LEVELS, LEVEL_FILTERS } from './types.js';

// Errors
export { LogError, LoggerConfigError, type LogErrorKind } from './errors.js';

// Configuration
export { LevelFilterSchema, LoggerSettingsSchema, parseLoggerSettings, parseEnvLevel } from './schema.js';
export { ConfigCell, CONFIG_CELL_BYTES, resolveConfig, defaultLevel } from './config.js';

// Filtering
export { isLevelEnabled, matchesTarget, TargetLevels } from './filter.js';

// Formatting
export { LineBuffer, withLocalBuffer } from './buffer.js';
export { LEVEL_TAGS, LEVEL_COLORS, COLORED_LEVEL_TAGS, writeLevel } from './color.js';
export { TIMESTAMP_FORMAT, formatTimestamp, writeTimestamp } from './timestamp.js';
export { formatRecord, renderValue, renderName, writeTarget, writeFields, CONTINUATION_INDENT } from './formatter.js';

// Output
export { WriterGate } from './gate.js';
export { FdSink, StreamSink, resolveSink, writeAllSync } from './sink.js';

// Logger
export { Logger, init, getLogger, resetLogger, log, shouldEmit } from './logger.js';

// Facades
export { createLogger, type TargetLogger, type LevelMethod } from './facade.js';
export { classifyEvent } from './classifier.js';
export {
    bridgeObserver,
    createEventBridge,
    type BridgeObserverOptions,
    type EventBridgeOptions,
    type EventPayload,
    type RegexEventSource,
} from './bridge.js';
