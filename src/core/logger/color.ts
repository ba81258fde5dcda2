/**
 * Level Decorator
 *
 * Renders the level tag, optionally wrapped in its ANSI color.
 * Colored tags are built once at load, so the emit path only copies
 * strings.
 *
 * Uses a private ansis instance pinned to 16 colors: whether to color
 * at all is decided by the logger configuration, not by ansis' own
 * terminal detection.
 */
import { Ansis } from 'ansis';

import type { LineBuffer } from './buffer.js';
import type { Level } from './types.js';

/**
 * Basic 16-color ANSI styling.
 */
export const ansi = new Ansis(1);

/**
 * Plain tag per level.
 */
export const LEVEL_TAGS: Record<Level, string> = {
    trace: 'TRACE',
    debug: 'DEBUG',
    info: 'INFO',
    warn: 'WARN',
    error: 'ERROR',
};

/**
 * Foreground style per level.
 */
const LEVEL_STYLE: Record<Level, (text: string) => string> = {
    trace: ansi.gray,
    debug: ansi.blue,
    info: ansi.green,
    warn: ansi.yellow,
    error: ansi.red,
};

/**
 * Raw escape pair per level, for wrapping custom level renderers.
 */
export const LEVEL_COLORS: Record<Level, { open: string; close: string }> = {
    trace: { open: ansi.gray.open, close: ansi.gray.close },
    debug: { open: ansi.blue.open, close: ansi.blue.close },
    info: { open: ansi.green.open, close: ansi.green.close },
    warn: { open: ansi.yellow.open, close: ansi.yellow.close },
    error: { open: ansi.red.open, close: ansi.red.close },
};

/**
 * Tag per level with color applied.
 */
export const COLORED_LEVEL_TAGS: Record<Level, string> = {
    trace: LEVEL_STYLE.trace(LEVEL_TAGS.trace),
    debug: LEVEL_STYLE.debug(LEVEL_TAGS.debug),
    info: LEVEL_STYLE.info(LEVEL_TAGS.info),
    warn: LEVEL_STYLE.warn(LEVEL_TAGS.warn),
    error: LEVEL_STYLE.error(LEVEL_TAGS.error),
};

/**
 * Open/close pair for dimmed segments (timestamp, dimmed messages).
 */
export const DIM = {
    open: ansi.dim.open,
    close: ansi.dim.close,
} as const;

/**
 * Write the level tag.
 */
export function writeLevel(buffer: LineBuffer, level: Level, color: boolean): void {

    buffer.write(color ? COLORED_LEVEL_TAGS[level] : LEVEL_TAGS[level]);

}
