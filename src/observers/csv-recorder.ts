import { appendFile } from 'fs/promises';
import { from, MonoTypeOperatorFunction } from 'rxjs';
import { concatMap, map } from 'rxjs/operators';
import { Reading } from '../communication/types';

export function toCsvLine(reading: Reading) {
    return `${reading.timestamp.toISOString()},${reading.value.toFixed(3)}\n`;
}

/** Appends one line per reading to `file`, in arrival order, then passes the reading on. */
export function recordCsv(file: string): MonoTypeOperatorFunction<Reading> {
    return (source) => source.pipe(
        concatMap(reading => from(appendFile(file, toCsvLine(reading), 'utf-8')).pipe(
            map(() => reading),
        )),
    );
}
