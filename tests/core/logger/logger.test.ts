import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';

import { observer } from '../../../src/core/observer.js';
import { LogError, LoggerConfigError } from '../../../src/core/logger/errors.js';
import {
    Logger,
    getLogger,
    init,
    log,
    resetLogger,
    shouldEmit,
} from '../../../src/core/logger/logger.js';
import type { LoggerOptions, OutputSink } from '../../../src/core/logger/types.js';
import { createMockStream, MemorySink, setEnv } from '../../helpers/sink.js';

function setup(options: LoggerOptions = {}): { logger: Logger; sink: MemorySink } {

    const sink = new MemorySink();
    const logger = new Logger({ level: 'trace', color: false, ...options, sink });

    return { logger, sink };

}

const tick = (): Promise<void> => new Promise((resolve) => setImmediate(resolve));

describe('logger: Logger', () => {

    let restoreEnv: () => void;

    beforeEach(() => {

        restoreEnv = setEnv({
            LOG_LEVEL: undefined,
            NODE_ENV: undefined,
            FORCE_COLOR: undefined,
            NO_COLOR: undefined,
        });

    });

    afterEach(async () => {

        restoreEnv();
        vi.useRealTimers();
        vi.restoreAllMocks();
        await resetLogger();

    });

    describe('output', () => {

        it('should write one plain line per record', () => {

            const { logger, sink } = setup({ level: 'info' });

            logger.log('info', 'net', 'connected');

            expect(sink.chunks).toEqual(['INFO [net] connected\n']);

        });

        it('should append fields after the message', () => {

            const { logger, sink } = setup();

            logger.log('warn', 'cache', 'evicting', { entries: 120, reason: 'memory pressure' });

            expect(sink.output).toBe('WARN [cache] evicting entries=120 reason="memory pressure"\n');

        });

        it('should hand the sink exactly one newline-terminated line per record', () => {

            const { logger, sink } = setup();

            logger.log('info', 'a', 'one');
            logger.log('error', 'b', 'two\nlines\n');
            logger.log('debug', '', (out) => {

                out.write('built ');
                out.write('in parts');

            });

            expect(sink.chunks).toEqual([
                'INFO [a] one\n',
                'ERROR [b] two\n    lines\n',
                'DEBUG built in parts\n',
            ]);

        });

        it('should color the level tag when color is on', () => {

            const { logger, sink } = setup({ color: true });

            logger.log('error', 'db', 'down');

            expect(sink.output).toBe('\x1b[31mERROR\x1b[39m [db] down\n');

        });

        it('should write identical lines apart from the timestamp', () => {

            vi.useFakeTimers({ toFake: ['Date'] });
            vi.setSystemTime(new Date('2024-01-15T10:30:00.123Z'));

            const plain = setup();
            const stamped = setup({ timestamps: true, timeZone: 'utc' });

            plain.logger.log('info', 'net', 'connected', { port: 5432 });
            stamped.logger.log('info', 'net', 'connected', { port: 5432 });

            expect(stamped.sink.output).toBe('INFO 10:30:00.123 [net] connected port=5432\n');
            expect(stamped.sink.output.replace(/^(\S+) \d{2}:\d{2}:\d{2}\.\d{3} /, '$1 ')).toBe(plain.sink.output);

        });

        it('should copy lines for sinks that keep their chunks', async () => {

            const { stream, output } = createMockStream();
            const logger = new Logger({ level: 'info', color: false, sink: stream });

            logger.log('info', '', 'first');
            logger.log('info', '', 'second');
            await logger.flush();

            expect(output).toEqual(['INFO first\n', 'INFO second\n']);

        });

    });

    describe('filtering', () => {

        it('should write nothing below the minimum level', () => {

            const { logger, sink } = setup({ level: 'error' });

            logger.log('warn', 'net', 'retrying');

            expect(logger.shouldEmit('warn')).toBe(false);
            expect(sink.chunks).toEqual([]);

        });

        it('should write nothing when the level is off', () => {

            const { logger, sink } = setup({ level: 'off' });

            logger.log('error', '', 'fatal');

            expect(sink.chunks).toEqual([]);

        });

        it('should not call a message callback for a filtered record', () => {

            const { logger } = setup({ level: 'info' });
            const message = vi.fn();

            logger.log('debug', '', message);

            expect(message).not.toHaveBeenCalled();

        });

        it('should apply per-target overrides by longest prefix', () => {

            const { logger } = setup({ level: 'info', targets: { db: 'warn', 'db:pool': 'trace' } });

            expect(logger.shouldEmit('info', 'db:query')).toBe(false);
            expect(logger.shouldEmit('warn', 'db')).toBe(true);
            expect(logger.shouldEmit('trace', 'db:pool:conn')).toBe(true);
            expect(logger.shouldEmit('debug', 'net')).toBe(false);
            expect(logger.shouldEmit('info', 'net')).toBe(true);

        });

        it('should apply the filter hook after the level check', () => {

            const filter = vi.fn((meta: { target: string }) => meta.target !== 'noisy');
            const { logger, sink } = setup({ level: 'info', filter });

            logger.log('debug', 'quiet', 'below minimum');
            logger.log('info', 'noisy', 'dropped');
            logger.log('info', 'quiet', 'kept');

            expect(filter).toHaveBeenCalledTimes(2);
            expect(sink.chunks).toEqual(['INFO [quiet] kept\n']);

        });

        it('should drop and report a record whose filter throws', () => {

            const onError = vi.fn<(err: LogError) => void>();
            const failure = new Error('bad predicate');
            const { logger, sink } = setup({
                onError,
                filter: () => {

                    throw failure;

                },
            });

            logger.log('info', '', 'lost');

            expect(sink.chunks).toEqual([]);
            expect(onError.mock.calls[0]?.[0]?.kind).toBe('format');
            expect(onError.mock.calls[0]?.[0]?.cause).toBe(failure);

        });

        it('should pick up LOG_LEVEL when no level is given', () => {

            setEnv({ LOG_LEVEL: 'warn' });

            const logger = new Logger({ color: false, sink: new MemorySink() });

            expect(logger.level).toBe('warn');

        });

    });

    describe('runtime settings', () => {

        it('should apply a new level to the next record', () => {

            const { logger, sink } = setup({ level: 'info' });

            logger.log('debug', '', 'hidden');
            logger.setLevel('debug');
            logger.log('debug', '', 'shown');

            expect(logger.level).toBe('debug');
            expect(sink.chunks).toEqual(['DEBUG shown\n']);

        });

        it('should toggle color and timestamps', () => {

            vi.useFakeTimers({ toFake: ['Date'] });
            vi.setSystemTime(new Date('2024-01-15T10:30:00.123Z'));

            const { logger, sink } = setup({ timeZone: 'utc' });

            logger.setColor(true);
            logger.log('info', '', 'colored');
            logger.setColor(false);
            logger.setTimestamps(true);
            logger.log('info', '', 'stamped');

            expect(logger.color).toBe(false);
            expect(logger.timestamps).toBe(true);
            expect(sink.chunks).toEqual([
                '\x1b[32mINFO\x1b[39m colored\n',
                'INFO 10:30:00.123 stamped\n',
            ]);

        });

        it('should report its settings', () => {

            const { logger } = setup({ level: 'warn', targets: { db: 'error' }, timeZone: 'utc' });

            expect(logger.config).toEqual({
                level: 'warn',
                targets: { db: 'error' },
                color: false,
                timestamps: false,
                timeZone: 'utc',
            });

        });

        it('should announce configuration changes', () => {

            const listener = vi.fn();
            const cleanup = observer.on('logger:configured', listener);
            const { logger } = setup({ level: 'info' });

            logger.setLevel('error');
            cleanup();

            expect(listener).toHaveBeenCalledTimes(2);
            expect(listener.mock.calls[1]?.[0]).toEqual({ level: 'error', color: false, timestamps: false });

        });

        it('should share settings with a logger built on its config buffer', () => {

            const { logger } = setup({ level: 'info' });
            const follower = new Logger({ shared: logger.sharedConfig, sink: new MemorySink() });

            logger.setLevel('error');
            logger.setColor(true);

            expect(follower.level).toBe('error');
            expect(follower.color).toBe(true);
            expect(follower.shouldEmit('warn')).toBe(false);

        });

    });

    describe('dim', () => {

        it('should dim the message of records the hook selects', () => {

            const { logger, sink } = setup({ color: true, dim: ({ level }) => level === 'trace' });

            logger.log('trace', '', 'detail');

            expect(sink.output).toBe('\x1b[90mTRACE\x1b[39m \x1b[2mdetail\x1b[22m\n');

        });

        it('should dim debug and trace records when no hook is given', () => {

            const { logger, sink } = setup({ color: true });

            logger.log('debug', '', 'chatty');
            logger.log('info', '', 'normal');

            expect(sink.chunks).toEqual([
                '\x1b[34mDEBUG\x1b[39m \x1b[2mchatty\x1b[22m\n',
                '\x1b[32mINFO\x1b[39m normal\n',
            ]);

        });

        it('should write the record undimmed when the hook throws', () => {

            const { logger, sink } = setup({
                color: true,
                dim: () => {

                    throw new Error('bad hook');

                },
            });

            logger.log('info', '', 'plain');

            expect(sink.output).toBe('\x1b[32mINFO\x1b[39m plain\n');

        });

    });

    describe('display hooks', () => {

        it('should render segments through the hooks', () => {

            const { logger, sink } = setup({
                displayLevel: (record, out) => out.write(record.level),
                displayTarget: (record, out) => out.write(` (${record.target})`),
                displayContent: (record, out) => {

                    out.write(typeof record.message === 'string' ? record.message.toUpperCase() : '');

                },
            });

            logger.log('warn', 'disk', 'almost full', { used: 97 });

            expect(sink.output).toBe('warn (disk) ALMOST FULL used=97\n');

        });

        it('should keep the level color around a custom level', () => {

            const { logger, sink } = setup({ color: true, displayLevel: (record, out) => out.write(record.level) });

            logger.log('error', '', 'down');

            expect(sink.output).toBe('\x1b[31merror\x1b[39m down\n');

        });

        it('should drop the record when a hook throws', () => {

            const onError = vi.fn<(err: LogError) => void>();
            const { logger, sink } = setup({
                onError,
                displayTarget: () => {

                    throw new Error('bad target');

                },
            });

            logger.log('info', 'net', 'lost');

            expect(sink.chunks).toEqual([]);
            expect(onError.mock.calls[0]?.[0]?.message).toBe('log format error: bad target');

        });

    });

    describe('failures', () => {

        it('should drop a record whose message callback throws', () => {

            const onError = vi.fn<(err: LogError) => void>();
            const failure = new Error('render failed');
            const { logger, sink } = setup({ onError });

            expect(() => logger.log('info', '', () => {

                throw failure;

            })).not.toThrow();

            logger.log('info', '', 'next');

            const error = onError.mock.calls[0]?.[0];

            expect(sink.chunks).toEqual(['INFO next\n']);
            expect(error).toBeInstanceOf(LogError);
            expect(error?.kind).toBe('format');
            expect(error?.message).toBe('log format error: render failed');
            expect(logger.errorCount).toBe(1);

        });

        it('should drop a record larger than maxRecordBytes', () => {

            const onError = vi.fn<(err: LogError) => void>();
            const { logger, sink } = setup({ onError, maxRecordBytes: 64 });

            logger.log('info', '', 'x'.repeat(100));
            logger.log('info', '', 'ok');

            expect(sink.chunks).toEqual(['INFO ok\n']);
            expect(onError.mock.calls[0]?.[0]?.message).toBe('log format error: Record exceeds 64 bytes');
            expect(onError.mock.calls[0]?.[0]?.cause).toBeInstanceOf(RangeError);

        });

        it('should report sink failures as io errors', () => {

            const onError = vi.fn<(err: LogError) => void>();
            const { logger, sink } = setup({ onError });

            sink.failWith = new Error('EPIPE');
            logger.log('info', '', 'lost');

            expect(onError).toHaveBeenCalledTimes(1);
            expect(onError.mock.calls[0]?.[0]?.kind).toBe('io');
            expect(onError.mock.calls[0]?.[0]?.message).toBe('log io error: EPIPE');
            expect(logger.degraded).toBe(false);

        });

        it('should survive an onError hook that throws', () => {

            const { logger, sink } = setup({
                onError: () => {

                    throw new Error('hook failed');

                },
            });

            sink.failWith = new Error('EPIPE');

            expect(() => logger.log('info', '', 'lost')).not.toThrow();
            expect(logger.errorCount).toBe(1);

        });

        it('should publish every dropped record', () => {

            const listener = vi.fn();
            const cleanup = observer.on('logger:error', listener);
            const { logger, sink } = setup({ onError: vi.fn() });

            sink.failWith = new Error('EPIPE');
            logger.log('info', '', 'first');
            logger.log('info', '', 'second');
            cleanup();

            expect(listener).toHaveBeenCalledTimes(2);

        });

        it('should report flush failures', async () => {

            const onError = vi.fn<(err: LogError) => void>();
            const sink: OutputSink = {
                retainsChunks: false,
                isTTY: false,
                write: () => undefined,
                flush: () => Promise.reject(new Error('flush failed')),
            };
            const logger = new Logger({ level: 'info', color: false, sink, onError });

            await logger.flush();

            expect(onError.mock.calls[0]?.[0]?.message).toBe('log io error: flush failed');

        });

        it('should reject invalid options at construction', () => {

            expect(() => new Logger({ maxRecordBytes: 1, sink: new MemorySink() })).toThrow(LoggerConfigError);

        });

        it('should reject an invalid LOG_LEVEL at construction', () => {

            setEnv({ LOG_LEVEL: 'loud' });

            expect(() => new Logger({ sink: new MemorySink() })).toThrow(LoggerConfigError);

        });

    });

    describe('re-entrancy', () => {

        it('should write a record logged from a message callback first, intact', () => {

            const { logger, sink } = setup();

            logger.log('info', 'outer', (out) => {

                out.write('before ');
                logger.log('info', 'inner', 'nested');
                out.write('after');

            });

            expect(sink.chunks).toEqual([
                'INFO [inner] nested\n',
                'INFO [outer] before after\n',
            ]);

        });

        it('should write a record logged from inside the sink after the current line', () => {

            const { logger, sink } = setup();

            sink.onWrite = (text) => {

                if (text === 'INFO [app] outer\n') {

                    logger.log('info', 'sink', 'nested');

                }

            };

            logger.log('info', 'app', 'outer');

            expect(sink.chunks).toEqual([
                'INFO [app] outer\n',
                'INFO [sink] nested\n',
            ]);

        });

    });

    describe('concurrency', () => {

        it('should keep lines whole and in order per producer', async () => {

            const { logger, sink } = setup({ level: 'info' });
            const producers = 8;
            const records = 50;

            await Promise.all(Array.from({ length: producers }, async (_, worker) => {

                for (let i = 0; i < records; i++) {

                    logger.log('info', `worker-${worker}`, `record ${i}`, { worker });

                    if (i % 3 === 0) {

                        await tick();

                    }
                    else {

                        await Promise.resolve();

                    }

                }

            }));

            expect(sink.chunks).toHaveLength(producers * records);

            const seen = new Map<number, number[]>();

            for (const chunk of sink.chunks) {

                const match = /^INFO \[worker-(\d+)\] record (\d+) worker=(\d+)\n$/.exec(chunk);

                expect(match).not.toBeNull();
                expect(match?.[1]).toBe(match?.[3]);

                const worker = Number(match?.[1]);
                const list = seen.get(worker) ?? [];

                list.push(Number(match?.[2]));
                seen.set(worker, list);

            }

            for (let worker = 0; worker < producers; worker++) {

                expect(seen.get(worker)).toEqual(Array.from({ length: records }, (_, i) => i));

            }

        });

    });

    describe('process-wide logger', () => {

        it('should route module functions through the logger set up by init', () => {

            const sink = new MemorySink();
            const logger = init({ level: 'debug', color: false, sink });

            log('debug', 'app', 'ready', { pid: 1 });

            expect(getLogger()).toBe(logger);
            expect(shouldEmit('trace', 'app')).toBe(false);
            expect(sink.chunks).toEqual(['DEBUG [app] ready pid=1\n']);

        });

        it('should replace the logger on a second init', () => {

            const first = new MemorySink();
            const second = new MemorySink();

            init({ level: 'info', color: false, sink: first });
            init({ level: 'info', color: false, sink: second });

            log('info', '', 'hello');

            expect(first.chunks).toEqual([]);
            expect(second.chunks).toEqual(['INFO hello\n']);

        });

        it('should create a fresh logger after reset', async () => {

            const logger = init({ level: 'info', color: false, sink: new MemorySink() });

            await resetLogger();

            expect(getLogger()).not.toBe(logger);

        });

    });

});
