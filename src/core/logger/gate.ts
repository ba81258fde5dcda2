/**
 * Writer Gate
 *
 * The one critical section in the pipeline. Owns the sink, and hands it
 * exactly one finished line per record. Nothing is formatted, colored
 * or allocated while the gate is held.
 *
 * A write that re-enters the gate (a sink or error hook that logs)
 * is queued and written right after the current one, before the gate
 * is released, so lines never interleave.
 */
import { attemptSync } from '@logosdx/utils'

import type { OutputSink } from './types.js'


/**
 * Single-writer access to an OutputSink.
 *
 * @example
 * ```typescript
 * const gate = new WriterGate(new FdSink(1), (err) => report(err))
 * gate.emitBytes(buffer.view())
 * ```
 */
export class WriterGate {

    #sink: OutputSink
    #onWriteError: (err: Error) => void
    #held = false
    #reporting = false
    #pending: Uint8Array[] = []
    #writes = 0
    #dropped = 0

    constructor(sink: OutputSink, onWriteError: (err: Error) => void) {

        this.#sink = sink
        this.#onWriteError = onWriteError
    }


    get sink(): OutputSink {

        return this.#sink
    }


    /**
     * Whether a write is in progress.
     */
    get held(): boolean {

        return this.#held
    }


    /**
     * Successful sink writes so far.
     */
    get writes(): number {

        return this.#writes
    }


    /**
     * Queued lines discarded because the error callback threw.
     */
    get dropped(): number {

        return this.#dropped
    }


    /**
     * Write one complete line.
     *
     * Sink failures go to the error callback instead of the caller.
     */
    emitBytes(bytes: Uint8Array): void {

        if (this.#held) {

            // Records logged while reporting a write failure would fail the same way
            if (!this.#reporting) {

                this.#pending.push(bytes)
            }

            return
        }

        this.#held = true

        try {

            this.#writeOne(bytes)

            let next = this.#pending.shift()

            while (next) {

                this.#writeOne(next)
                next = this.#pending.shift()
            }
        }
        finally {

            // Only non-empty when the error callback threw mid-drain
            this.#dropped += this.#pending.length
            this.#pending.length = 0
            this.#held = false
        }
    }


    #writeOne(bytes: Uint8Array): void {

        const [, err] = attemptSync(() => this.#sink.write(bytes))

        if (!err) {

            this.#writes++
            return
        }

        this.#reporting = true

        try {

            this.#onWriteError(err)
        }
        finally {

            this.#reporting = false
        }
    }
}
