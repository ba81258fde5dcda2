/**
 * Live logger settings.
 *
 * The scalar settings sit in an Int32Array over a SharedArrayBuffer and
 * are only touched through Atomics, so the emit path reads them without
 * locking and worker threads can share one cell.
 */
import { hasLocalOffset, isDev, resolveColor } from '../environment.js';
import { LoggerConfigError } from './errors.js';
import { parseEnvLevel, type LoggerSettings } from './schema.js';
import {
    LEVEL_FILTERS,
    LEVEL_PRIORITY,
    type LevelFilter,
    type ResolvedConfig,
    type TimeZone,
} from './types.js';

const SLOT_LEVEL = 0;
const SLOT_COLOR = 1;
const SLOT_TIMESTAMPS = 2;
const SLOT_TIME_ZONE = 3;
const SLOT_COUNT = 4;

/**
 * Bytes a shared settings buffer must hold.
 */
export const CONFIG_CELL_BYTES = SLOT_COUNT * Int32Array.BYTES_PER_ELEMENT;

/**
 * Atomically readable settings.
 *
 * @example
 * ```typescript
 * const cell = ConfigCell.from(config)
 * worker.postMessage({ logConfig: cell.buffer })
 *
 * // in the worker
 * const shared = new ConfigCell(workerData.logConfig)
 * ```
 */
export class ConfigCell {

    readonly #buffer: SharedArrayBuffer;
    readonly #slots: Int32Array;

    constructor(buffer: SharedArrayBuffer = new SharedArrayBuffer(CONFIG_CELL_BYTES)) {

        if (buffer.byteLength < CONFIG_CELL_BYTES) {

            throw new LoggerConfigError([
                `shared: buffer must hold at least ${CONFIG_CELL_BYTES} bytes`,
            ]);

        }

        this.#buffer = buffer;
        this.#slots = new Int32Array(buffer, 0, SLOT_COUNT);

    }

    /**
     * Create a fresh cell holding the given settings.
     */
    static from(config: Omit<ResolvedConfig, 'targets'>): ConfigCell {

        const cell = new ConfigCell();

        cell.level = config.level;
        cell.color = config.color;
        cell.timestamps = config.timestamps;
        cell.timeZone = config.timeZone;

        return cell;

    }

    /**
     * Backing memory, for handing to another thread.
     */
    get buffer(): SharedArrayBuffer {

        return this.#buffer;

    }

    /**
     * Minimum level as its priority. The hot-path read.
     */
    get minPriority(): number {

        return Atomics.load(this.#slots, SLOT_LEVEL);

    }

    get level(): LevelFilter {

        return LEVEL_FILTERS[this.minPriority] ?? 'off';

    }

    set level(level: LevelFilter) {

        Atomics.store(this.#slots, SLOT_LEVEL, LEVEL_PRIORITY[level]);

    }

    get color(): boolean {

        return Atomics.load(this.#slots, SLOT_COLOR) === 1;

    }

    set color(enabled: boolean) {

        Atomics.store(this.#slots, SLOT_COLOR, enabled ? 1 : 0);

    }

    get timestamps(): boolean {

        return Atomics.load(this.#slots, SLOT_TIMESTAMPS) === 1;

    }

    set timestamps(enabled: boolean) {

        Atomics.store(this.#slots, SLOT_TIMESTAMPS, enabled ? 1 : 0);

    }

    get timeZone(): TimeZone {

        return Atomics.load(this.#slots, SLOT_TIME_ZONE) === 1 ? 'utc' : 'local';

    }

    set timeZone(zone: TimeZone) {

        Atomics.store(this.#slots, SLOT_TIME_ZONE, zone === 'utc' ? 1 : 0);

    }

}

/**
 * Default minimum level when neither options nor LOG_LEVEL set one.
 */
export function defaultLevel(): LevelFilter {

    return isDev() ? 'debug' : 'info';

}

/**
 * Apply defaults, LOG_LEVEL and color/time zone probing.
 *
 * An explicit `level` option wins over LOG_LEVEL; LOG_LEVEL wins over
 * the default.
 *
 * @param settings - Validated options
 * @param isTTY - Whether the chosen sink is a terminal
 */
export function resolveConfig(settings: LoggerSettings, isTTY: boolean): ResolvedConfig {

    const level = settings.level ?? parseEnvLevel() ?? defaultLevel();
    const timeZone = settings.timeZone === 'utc' || !hasLocalOffset() ? 'utc' : 'local';

    return {
        level,
        targets: settings.targets ?? {},
        color: resolveColor(settings.color ?? 'auto', isTTY),
        timestamps: settings.timestamps ?? false,
        timeZone,
    };

}
