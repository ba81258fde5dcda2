/**
 * Test sinks and environment helpers.
 */
import { Writable } from 'node:stream';

import type { OutputSink } from '../../src/core/logger/types.js';

/**
 * In-memory sink recording one string per write call.
 */
export class MemorySink implements OutputSink {

    readonly retainsChunks = false;
    readonly chunks: string[] = [];

    /** Thrown from every write while set */
    failWith: Error | null = null;

    /** Called after each successful write */
    onWrite: ((text: string) => void) | null = null;

    constructor(readonly isTTY = false) {}

    get output(): string {

        return this.chunks.join('');

    }

    write(bytes: Uint8Array): void {

        if (this.failWith) {

            throw this.failWith;

        }

        const text = Buffer.from(bytes).toString('utf8');

        this.chunks.push(text);
        this.onWrite?.(text);

    }

    async flush(): Promise<void> {

        // Nothing buffered.

    }

}

/**
 * Create a mock writable stream that captures output.
 */
export function createMockStream(): { stream: Writable; output: string[] } {

    const output: string[] = [];
    const stream = new Writable({
        write(chunk: Buffer, _encoding, callback) {

            output.push(chunk.toString());
            callback();

        },
    });

    return { stream, output };

}

/**
 * Set or delete env vars, returning a function that restores them.
 */
export function setEnv(vars: Record<string, string | undefined>): () => void {

    const previous: Record<string, string | undefined> = {};

    for (const [key, value] of Object.entries(vars)) {

        previous[key] = process.env[key];

        if (value === undefined) {

            delete process.env[key];

        }
        else {

            process.env[key] = value;

        }

    }

    return () => {

        for (const [key, value] of Object.entries(previous)) {

            if (value === undefined) {

                delete process.env[key];

            }
            else {

                process.env[key] = value;

            }

        }

    };

}
