import { defer, EMPTY, Observable, of, OperatorFunction, throwError, timer } from 'rxjs';
import { catchError, concatMap, finalize, map, repeat, scan } from 'rxjs/operators';
import { Logger } from '../log';
import { isReadError } from './errors';
import type { PollingClient } from './polling-client';
import { PollResult, Reading, RegisterAddress, RetryOptions } from './types';

export const HISTORY_SIZE = 500;
export const CHANGE_THRESHOLD = 1;

const SINGLE_ATTEMPT: RetryOptions = { maxRetries: 1, delay: 0 };

export interface MonitorOptions {
    /** Sleep between the end of one read and the start of the next, in ms. */
    readonly interval: number;
    /** Stop after this many ms. Runs until stopped when omitted. */
    readonly duration?: number;
    /** Any emission requests a stop before the next read. */
    readonly stop$?: Observable<unknown>;
    readonly retry?: RetryOptions;
}

export interface MonitorStats {
    reads: number;
    successes: number;
    failures: number;
    /** Percentage, 0 when nothing was read yet. */
    successRate: number;
    min: number | null;
    max: number | null;
    average: number | null;
    /** Readings that moved at least the change threshold away from the previous reading. */
    changes: number;
}

type Reader = Pick<PollingClient, 'readWithRetry'>;

export function monitor(client: Reader, address: RegisterAddress, options: MonitorOptions, logger?: Logger): Observable<PollResult> {
    if (!(options.interval >= 0)) {
        return throwError(() => new RangeError(`interval must not be negative, got ${options.interval}`));
    }

    const retryOptions = options.retry ?? SINGLE_ATTEMPT;

    return defer(() => {
        const startedAt = Date.now();
        let stopRequested = false;
        const stopSubscription = options.stop$?.subscribe(() => {
            logger?.info('stop requested');
            stopRequested = true;
        });

        const shouldStop = () => stopRequested ||
            options.duration !== undefined && Date.now() - startedAt >= options.duration;

        const poll$ = defer(() => {
            if (shouldStop()) {
                return EMPTY;
            }

            return client.readWithRetry(address, retryOptions).pipe(
                map((reading): PollResult => ({ ok: true, reading })),
                catchError((err: unknown) => {
                    if (!isReadError(err)) {
                        return throwError(() => err);
                    }
                    logger?.warn('read failed', { kind: err.kind, message: err.message });
                    return of<PollResult>({ ok: false, error: err, timestamp: new Date() });
                }),
            );
        });

        logger?.info(`monitoring every ${options.interval}ms`, { duration: options.duration });
        return poll$.pipe(
            repeat({ delay: () => shouldStop() ? EMPTY : timer(options.interval) }),
            finalize(() => {
                stopSubscription?.unsubscribe();
                logger?.info('monitoring finished');
            }),
        );
    });
}

export function readings(): OperatorFunction<PollResult, Reading> {
    return (source) => source.pipe(
        concatMap(result => result.ok ? [result.reading] : []),
    );
}

/** Passes a reading only when it moved at least `threshold` away from the last one passed. */
export function onlyChanges(threshold: number): OperatorFunction<Reading, Reading> {
    return (source) => defer(() =>
        source.pipe(
            scan<Reading, ChangeState>(
                (ctx, current) => {
                    ctx.changed = !ctx.last || Math.abs(current.value - ctx.last.value) >= threshold
                        ? current
                        : null;
                    if (ctx.changed) {
                        ctx.last = current;
                    }
                    return ctx;
                },
                { last: null, changed: null },
            ),
            concatMap(ctx => ctx.changed ? [ctx.changed] : []),
        ));
}

export function collectStats(historySize = HISTORY_SIZE, threshold = CHANGE_THRESHOLD): OperatorFunction<PollResult, MonitorStats> {
    return (source) => defer(() =>
        source.pipe(
            scan<PollResult, StatsState>(
                (ctx, result) => {
                    ctx.reads++;
                    if (result.ok) {
                        const value = result.reading.value;
                        ctx.successes++;
                        if (ctx.last !== null && Math.abs(value - ctx.last) >= threshold) {
                            ctx.changes++;
                        }
                        ctx.last = value;
                        ctx.history.push(value);
                        if (ctx.history.length > historySize) {
                            ctx.history.shift();
                        }
                    }
                    return ctx;
                },
                { reads: 0, successes: 0, changes: 0, last: null, history: [] },
            ),
            map(({ reads, successes, changes, history }): MonitorStats => ({
                reads,
                successes,
                failures: reads - successes,
                successRate: reads > 0 ? successes / reads * 100 : 0,
                min: history.length ? Math.min(...history) : null,
                max: history.length ? Math.max(...history) : null,
                average: history.length ? history.reduce((sum, v) => sum + v, 0) / history.length : null,
                changes,
            })),
        ));
}

interface ChangeState {
    last: Reading | null;
    changed: Reading | null;
}

interface StatsState {
    reads: number;
    successes: number;
    changes: number;
    last: number | null;
    history: number[];
}
