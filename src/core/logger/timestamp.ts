/**
 * Timestamp Decorator
 *
 * Writes the wall-clock time as `HH:mm:ss.SSS`. Only called when
 * timestamps are enabled, so a disabled logger never reads the clock.
 */
import dayjs from 'dayjs';
import utc from 'dayjs/plugin/utc.js';

import { DIM } from './color.js';
import type { LineBuffer } from './buffer.js';
import type { TimeZone } from './types.js';

dayjs.extend(utc);

export const TIMESTAMP_FORMAT = 'HH:mm:ss.SSS';

/**
 * Format the current time.
 */
export function formatTimestamp(timeZone: TimeZone): string {

    const now = timeZone === 'utc' ? dayjs.utc() : dayjs();

    return now.format(TIMESTAMP_FORMAT);

}

/**
 * Write the current time, dimmed when color is on.
 */
export function writeTimestamp(buffer: LineBuffer, timeZone: TimeZone, color: boolean): void {

    const stamp = formatTimestamp(timeZone);

    if (!color) {

        buffer.write(stamp);

        return;

    }

    buffer.write(DIM.open);
    buffer.write(stamp);
    buffer.write(DIM.close);

}
