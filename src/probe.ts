import { from, Observable, of, throwError } from 'rxjs';
import { catchError, concatMap, map, toArray } from 'rxjs/operators';
import { REAL_SIZE } from './communication/decode';
import { isReadError, ReadError } from './communication/errors';
import type { PollingClient } from './communication/polling-client';
import { Reading } from './communication/types';
import { Logger } from './log';

export type ProbeResult =
    | { readonly offset: number; readonly ok: true; readonly reading: Reading }
    | { readonly offset: number; readonly ok: false; readonly error: ReadError };

const PROBE_ATTEMPT = { maxRetries: 1, delay: 0 };

/**
 * Reads a REAL at each offset of one data block, one after the other.
 * Failures are reported per offset and do not stop the probe.
 */
export function probeOffsets(
    client: Pick<PollingClient, 'readWithRetry'>,
    block: number,
    offsets: number[],
    logger?: Logger,
): Observable<ProbeResult[]> {
    return from(offsets).pipe(
        concatMap(offset =>
            client.readWithRetry({ block, offset, length: REAL_SIZE }, PROBE_ATTEMPT).pipe(
                map((reading): ProbeResult => ({ offset, ok: true, reading })),
                catchError((err: unknown) => {
                    if (!isReadError(err)) {
                        return throwError(() => err);
                    }
                    logger?.warn(`failed probing DB${block} offset ${offset}: ${err.message}`);
                    return of<ProbeResult>({ offset, ok: false, error: err });
                }),
            )
        ),
        toArray(),
    );
}

export function formatProbeResult(block: number, result: ProbeResult) {
    return result.ok
        ? `DB${block}.DBD${result.offset}: raw ${result.reading.raw.toString('hex')} -> ${result.reading.value}`
        : `DB${block}.DBD${result.offset}: ${result.error.kind} (${result.error.message})`;
}
