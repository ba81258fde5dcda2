/**
 * Record Formatter
 *
 * Assembles one line into a LineBuffer:
 *
 *     LEVEL [timestamp] [target] message key=value key=value\n
 *
 * Touches no shared state. Anything that throws in here (a message
 * callback, the buffer hitting its size cap) aborts the record; the
 * logger drops it and reports the error.
 */
import { attemptSync } from '@logosdx/utils'

import type { LineBuffer } from './buffer.js'
import { DIM, LEVEL_COLORS, writeLevel } from './color.js'
import { writeTimestamp } from './timestamp.js'
import type { DecorationOptions, DisplayFn, Fields, LogRecord, MessageWriter } from './types.js'


/**
 * Prefix for the second and later lines of a multi-line message.
 */
export const CONTINUATION_INDENT = '    '

/**
 * Strings containing any of these are quoted in field values.
 */
const NEEDS_QUOTES = /[\s"=]/

/**
 * Field keys and targets containing any of these are quoted, so neither
 * can end the line early or pass for another segment.
 */
const NAME_NEEDS_QUOTES = /[\s"=[\]]/


/**
 * MessageWriter that indents continuation lines.
 *
 * Newlines are held back until more text arrives, so a message ending
 * in newlines does not produce blank or indented trailing lines.
 */
class IndentingWriter implements MessageWriter {

    #out: LineBuffer
    #pendingNewlines = 0

    constructor(out: LineBuffer) {

        this.#out = out
    }

    write(text: string): void {

        let start = 0

        while (start <= text.length) {

            const newline = text.indexOf('\n', start)
            const end = newline === -1 ? text.length : newline

            if (end > start) {

                if (this.#pendingNewlines > 0) {

                    this.#out.write('\n'.repeat(this.#pendingNewlines))
                    this.#out.write(CONTINUATION_INDENT)
                    this.#pendingNewlines = 0
                }

                this.#out.write(text.slice(start, end))
            }

            if (newline === -1) {

                break
            }

            this.#pendingNewlines++
            start = newline + 1
        }
    }
}


/**
 * Write the target in brackets, or nothing for an empty target.
 */
export function writeTarget(buffer: LineBuffer, target: string): void {

    if (!target) {

        return
    }

    buffer.write('[')
    buffer.write(renderName(target))
    buffer.write(']')
}


/**
 * Quote a field key or target that contains whitespace, quotes,
 * equals signs or brackets.
 */
export function renderName(name: string): string {

    return NAME_NEEDS_QUOTES.test(name) ? JSON.stringify(name) : name
}


/**
 * Render a string for a field value, quoting when it would
 * otherwise be ambiguous.
 */
function renderString(value: string): string {

    return value.length === 0 || NEEDS_QUOTES.test(value)
        ? JSON.stringify(value)
        : value
}


/**
 * Render a field value.
 *
 * @example
 * ```typescript
 * renderValue(42)              // '42'
 * renderValue('ok')            // 'ok'
 * renderValue('two words')     // '"two words"'
 * renderValue({ a: 1 })        // '{"a":1}'
 * renderValue(new Error('x'))  // 'x'
 * ```
 */
export function renderValue(value: unknown): string {

    if (typeof value === 'string') {

        return renderString(value)
    }

    if (
        value === null
        || value === undefined
        || typeof value === 'number'
        || typeof value === 'bigint'
        || typeof value === 'boolean'
        || typeof value === 'symbol'
    ) {

        return String(value)
    }

    if (typeof value === 'function') {

        return '[function]'
    }

    if (value instanceof Date) {

        return Number.isNaN(value.getTime()) ? 'Invalid Date' : value.toISOString()
    }

    if (value instanceof Error) {

        return renderString(value.message)
    }

    const [json, error] = attemptSync(() => JSON.stringify(value))

    // JSON.stringify returns undefined for values it cannot represent
    if (error || typeof json !== 'string') {

        return '[object]'
    }

    return json
}


/**
 * Narrow fields to the tuple-list form.
 */
export function isFieldList(fields: Fields): fields is ReadonlyArray<readonly [string, unknown]> {

    return Array.isArray(fields)
}


/**
 * Append ` key=value` for each field.
 */
export function writeFields(buffer: LineBuffer, fields: Fields): void {

    if (isFieldList(fields)) {

        for (const [key, value] of fields) {

            writeField(buffer, key, value)
        }

        return
    }

    for (const key of Object.keys(fields)) {

        writeField(buffer, key, fields[key])
    }
}


function writeField(buffer: LineBuffer, key: string, value: unknown): void {

    buffer.write(' ')
    buffer.write(key.length === 0 ? '""' : renderName(key))
    buffer.write('=')
    buffer.write(renderValue(value))
}


/**
 * Run a custom level renderer, in the level's color when color is on.
 */
function writeCustomLevel(buffer: LineBuffer, record: LogRecord, render: DisplayFn, color: boolean): void {

    const codes = LEVEL_COLORS[record.level]

    if (color) {

        buffer.write(codes.open)
    }

    render(record, new IndentingWriter(buffer))

    if (color) {

        buffer.write(codes.close)
    }
}


/**
 * Format a record into the buffer.
 *
 * Clears the buffer first. On return the buffer holds exactly one
 * line ending in a single newline.
 *
 * @param buffer - Buffer to fill (usually the thread-local one)
 * @param record - The record
 * @param options - Decoration switches for this record
 * @param limit - Byte cap for the finished line
 * @throws whatever the message callback or a display hook throws,
 * or RangeError past `limit`
 */
export function formatRecord(
    buffer: LineBuffer,
    record: LogRecord,
    options: DecorationOptions,
    limit?: number,
): void {

    buffer.clear(limit)

    const display = options.display

    if (display?.level) {

        writeCustomLevel(buffer, record, display.level, options.color)
    }
    else {

        writeLevel(buffer, record.level, options.color)
    }

    if (options.timestamps) {

        buffer.write(' ')
        writeTimestamp(buffer, options.timeZone, options.color)
    }

    if (display?.target) {

        display.target(record, new IndentingWriter(buffer))
    }
    else if (record.target) {

        buffer.write(' ')
        writeTarget(buffer, record.target)
    }

    buffer.write(' ')

    const dimmed = options.color && options.dim

    if (dimmed) {

        buffer.write(DIM.open)
    }

    const writer = new IndentingWriter(buffer)

    if (display?.content) {

        display.content(record, writer)
    }
    else if (typeof record.message === 'string') {

        writer.write(record.message)
    }
    else {

        record.message(writer)
    }

    if (dimmed) {

        buffer.write(DIM.close)
    }

    if (record.fields) {

        writeFields(buffer, record.fields)
    }

    buffer.write('\n')
}
