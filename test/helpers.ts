import { expect } from 'vitest';
import { defer, EMPTY, isObservable, lastValueFrom, Observable, of, throwError } from 'rxjs';
import { S7Transport } from '../src/communication/transport';
import { Endpoint, Reading, RegisterAddress } from '../src/communication/types';
import { createLogger } from '../src/log';

export const ENDPOINT: Endpoint = { host: '127.0.0.1', port: 102, rack: 0, slot: 1 };
export const ADDRESS: RegisterAddress = { block: 5, offset: 124, length: 4 };

export const bytes = (...values: number[]) => Buffer.from(values);

export type ReadStep = Buffer | Error | Observable<Buffer>;

/** In-process stand-in for a PLC session. Reads are served from a queue, then from `fallback`. */
export class FakeTransport implements S7Transport {
    readonly connectCalls: Endpoint[] = [];
    readonly readCalls: RegisterAddress[] = [];
    disconnectCalls = 0;

    readonly connectFailures: Error[] = [];
    readonly reads: ReadStep[] = [];
    fallback: ReadStep = bytes(0x42, 0xc8, 0x00, 0x00);
    failDisconnect = false;

    connect(endpoint: Endpoint): Observable<void> {
        return defer(() => {
            this.connectCalls.push(endpoint);
            const failure = this.connectFailures.shift();
            return failure ? throwError(() => failure) : of(undefined);
        });
    }

    readBytes(address: RegisterAddress): Observable<Buffer> {
        return defer(() => {
            this.readCalls.push(address);
            const step = this.reads.shift() ?? this.fallback;
            if (step instanceof Error) {
                return throwError(() => step);
            }
            return isObservable(step) ? step : of(step);
        });
    }

    disconnect(): Observable<void> {
        return defer(() => {
            this.disconnectCalls++;
            return this.failDisconnect ? throwError(() => new Error('close failed')) : EMPTY;
        });
    }
}

export async function failure(source: Observable<unknown>): Promise<unknown> {
    try {
        await lastValueFrom(source);
    } catch (err) {
        return err;
    }
    throw new Error('expected the observable to error');
}

export function expectError<T>(err: unknown, type: new (...args: never[]) => T): T {
    expect(err).toBeInstanceOf(type);
    if (!(err instanceof type)) {
        throw new Error(`expected ${type.name}`);
    }
    return err;
}

export function done(source: Observable<unknown>) {
    return lastValueFrom(source, { defaultValue: undefined });
}

export function reading(value: number, timestamp = new Date('2024-05-01T08:00:00.000Z')): Reading {
    const raw = Buffer.alloc(4);
    raw.writeFloatBE(value, 0);
    return { value, timestamp, raw, address: ADDRESS };
}

/** Logger writing JSON lines into `lines` instead of stdout. */
export function memoryLogger(level: 'trace' | 'debug' | 'info' | 'warn' | 'error' = 'trace') {
    const lines: Record<string, unknown>[] = [];
    const logger = createLogger({ level }, {
        write(msg: string) {
            lines.push(JSON.parse(msg));
        },
    });
    return { logger, lines };
}
