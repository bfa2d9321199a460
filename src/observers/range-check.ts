import { MonoTypeOperatorFunction } from 'rxjs';
import { tap } from 'rxjs/operators';
import { formatAddress, Reading } from '../communication/types';
import { Logger } from '../log';

export interface ValueRange {
    readonly min: number;
    readonly max: number;
}

export function isWithinRange(value: number, range: ValueRange) {
    return value >= range.min && value <= range.max;
}

export function checkRange(range: ValueRange, logger?: Logger): MonoTypeOperatorFunction<Reading> {
    return (source) => source.pipe(
        tap(reading => {
            if (!isWithinRange(reading.value, range)) {
                logger?.warn(`${formatAddress(reading.address)} out of range: ${reading.value} (expected ${range.min} ~ ${range.max})`);
            }
        }),
    );
}
