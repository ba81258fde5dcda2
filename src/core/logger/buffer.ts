/**
 * Line Buffer
 *
 * Growable byte buffer a record is formatted into. One instance per
 * thread is reused for every record: `clear()` resets the length and
 * keeps the memory.
 *
 * @example
 * ```typescript
 * withLocalBuffer((buffer) => {
 *     buffer.clear()
 *     buffer.write('INFO ready\n')
 *     sink.write(buffer.view())
 * })
 * ```
 */
import { constants } from 'node:buffer';

import type { MessageWriter } from './types.js';

const INITIAL_CAPACITY = 256;

/**
 * Largest buffer Node can allocate.
 */
export const MAX_BUFFER_BYTES = constants.MAX_LENGTH;

/**
 * Byte buffer that grows by doubling.
 */
export class LineBuffer implements MessageWriter {

    #bytes: Buffer;
    #length = 0;
    #limit = MAX_BUFFER_BYTES;

    constructor(capacity = INITIAL_CAPACITY) {

        this.#bytes = Buffer.allocUnsafe(capacity);

    }

    /**
     * Bytes written since the last clear.
     */
    get length(): number {

        return this.#length;

    }

    /**
     * Bytes allocated.
     */
    get capacity(): number {

        return this.#bytes.length;

    }

    /**
     * Forget the contents and set the size cap for the next record.
     */
    clear(limit = MAX_BUFFER_BYTES): void {

        this.#length = 0;
        this.#limit = limit;

    }

    /**
     * Append UTF-8 text.
     *
     * @throws RangeError when the record would pass its size cap
     * or the buffer cannot grow
     */
    write(text: string): void {

        if (text.length === 0) {

            return;

        }

        this.#reserve(Buffer.byteLength(text, 'utf8'));
        this.#length += this.#bytes.write(text, this.#length, 'utf8');

    }

    /**
     * The written bytes. Shares memory with the buffer, so it is only
     * valid until the next clear or write.
     */
    view(): Buffer {

        return this.#bytes.subarray(0, this.#length);

    }

    toString(): string {

        return this.#bytes.toString('utf8', 0, this.#length);

    }

    #reserve(additional: number): void {

        const needed = this.#length + additional;

        if (needed > this.#limit) {

            throw new RangeError(`Record exceeds ${this.#limit} bytes`);

        }

        if (needed <= this.#bytes.length) {

            return;

        }

        let capacity = this.#bytes.length * 2;

        while (capacity < needed) {

            capacity *= 2;

        }

        const next = Buffer.allocUnsafe(Math.min(capacity, MAX_BUFFER_BYTES));

        this.#bytes.copy(next, 0, 0, this.#length);
        this.#bytes = next;

    }

}

let localBuffer: LineBuffer | null = null;
let localInUse = false;

/**
 * Run `fn` with this thread's reusable buffer.
 *
 * Module state is per thread, so the buffer is never shared. A nested
 * call (a message callback that logs) gets a throwaway buffer instead
 * of clobbering the one in use.
 */
export function withLocalBuffer<R>(fn: (buffer: LineBuffer) => R): R {

    if (localInUse) {

        return fn(new LineBuffer());

    }

    localBuffer ??= new LineBuffer();
    localInUse = true;

    try {

        return fn(localBuffer);

    }
    finally {

        localInUse = false;

    }

}
