/**
 * touch - create empty file or update timestamp
 */

import * as fs from 'fs';
import { performance } from 'perf_hooks';
import { TouchError } from './errors';

/**
 * Current wall-clock time in fractional seconds.
 * Sub-millisecond digits come from the high-resolution clock; `new Date()`
 * would truncate to whole milliseconds.
 */
export function preciseNow(): number {
    return (performance.timeOrigin + performance.now()) / 1000;
}

/**
 * Create `filePath` as an empty file if nothing exists there, then set its
 * access and modification times to `now` (a Date, or seconds since the epoch).
 *
 * @throws TouchError wrapping the OS error from either step
 */
export function touchFile(filePath: string, now: Date | number = preciseNow()): void {
    try {
        if (!fs.existsSync(filePath)) {
            const fd = fs.openSync(filePath, 'w');
            fs.closeSync(fd);
        }
        fs.utimesSync(filePath, now, now);
    } catch (err) {
        throw TouchError.from(filePath, err);
    }
}
