/**
 * Output Sinks
 *
 * Where finished lines go. The file-descriptor sink writes
 * synchronously and never keeps the chunk; the stream sink wraps any
 * Writable, which may hold on to chunks until they are flushed.
 */
import { once } from 'node:events';
import { writeSync } from 'node:fs';
import type { Writable } from 'node:stream';
import { isatty } from 'node:tty';

import type { OutputSink } from './types.js';

/**
 * Retries for a non-blocking fd reporting EAGAIN before any byte of a
 * line has gone out.
 */
const MAX_EAGAIN_RETRIES = 100;

/**
 * Upper bound on the pause between EAGAIN retries.
 */
const MAX_BACKOFF_MS = 4;

const pauseCell = new Int32Array(new SharedArrayBuffer(Int32Array.BYTES_PER_ELEMENT));

/**
 * Block the current thread for `ms` milliseconds.
 */
function pause(ms: number): void {

    Atomics.wait(pauseCell, 0, 0, ms);

}

/**
 * Check for a Node system error code.
 */
function hasCode(err: unknown, code: string): boolean {

    return err instanceof Error && 'code' in err && err.code === code;

}

/**
 * Write every byte to a file descriptor, looping over partial writes.
 *
 * stdout/stderr pipes are non-blocking, so a full pipe shows up as
 * EAGAIN. A line nothing has been written of yet is given up after
 * MAX_EAGAIN_RETRIES; a line already started is always finished, so the
 * fd never holds half a record.
 *
 * @throws the underlying system error (EPIPE, EBADF, ...)
 */
export function writeAllSync(fd: number, bytes: Uint8Array): void {

    let offset = 0;
    let retries = 0;

    while (offset < bytes.length) {

        try {

            offset += writeSync(fd, bytes, offset, bytes.length - offset);

        }
        catch (err) {

            if (!hasCode(err, 'EAGAIN') || (offset === 0 && retries >= MAX_EAGAIN_RETRIES)) {

                throw err;

            }

            retries++;
            pause(Math.min(retries, MAX_BACKOFF_MS));

        }

    }

}

/**
 * Synchronous writes to a file descriptor (stdout, stderr, a file).
 *
 * @example
 * ```typescript
 * const sink = new FdSink(2)
 * sink.write(Buffer.from('WARN low disk\n'))
 * ```
 */
export class FdSink implements OutputSink {

    readonly retainsChunks = false;
    readonly isTTY: boolean;

    constructor(readonly fd: number) {

        this.isTTY = isatty(fd);

    }

    /**
     * @throws the underlying system error (EPIPE, EBADF, ...)
     */
    write(bytes: Uint8Array): void {

        writeAllSync(this.fd, bytes);

    }

    async flush(): Promise<void> {

        // Writes are synchronous; nothing is pending.

    }

}

/**
 * Writes to a Writable stream.
 *
 * Stream errors arrive asynchronously; the first one is kept and
 * thrown from the next write so the writer gate can report it.
 */
export class StreamSink implements OutputSink {

    readonly retainsChunks = true;
    readonly isTTY: boolean;

    #stream: Writable;
    #failure: Error | null = null;

    constructor(stream: Writable) {

        this.#stream = stream;
        this.isTTY = 'isTTY' in stream && stream.isTTY === true;

        stream.on('error', (err: Error) => {

            this.#failure ??= err;

        });

    }

    get stream(): Writable {

        return this.#stream;

    }

    write(bytes: Uint8Array): void {

        if (this.#failure) {

            throw this.#failure;

        }

        if (this.#stream.destroyed || this.#stream.writableEnded) {

            throw new Error('Output stream is closed');

        }

        this.#stream.write(bytes);

    }

    /**
     * Wait until the stream has drained its internal buffer.
     */
    async flush(): Promise<void> {

        if (this.#failure) {

            throw this.#failure;

        }

        if (this.#stream.writableNeedDrain) {

            await once(this.#stream, 'drain');

        }

    }

}

/**
 * Check whether a sink option is already an OutputSink.
 */
export function isOutputSink(value: Writable | OutputSink): value is OutputSink {

    return 'retainsChunks' in value;

}

/**
 * Turn the `sink` option into an OutputSink.
 */
export function resolveSink(option: 'stdout' | 'stderr' | Writable | OutputSink = 'stdout'): OutputSink {

    if (option === 'stdout') {

        return new FdSink(1);

    }

    if (option === 'stderr') {

        return new FdSink(2);

    }

    if (isOutputSink(option)) {

        return option;

    }

    return new StreamSink(option);

}
