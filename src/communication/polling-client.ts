import { BehaviorSubject, concat, defer, EMPTY, Observable, throwError, timer } from 'rxjs';
import { catchError, concatMap, first, ignoreElements, map, retry, tap } from 'rxjs/operators';
import { Logger } from '../log';
import { decodeReal, REAL_SIZE } from './decode';
import { ConnectionError, DecodeError, isReadError, NotConnectedError, ShortReadError, TransportError } from './errors';
import { monitor, MonitorOptions } from './monitor';
import { DEFAULT_TIMEOUT, Nodes7Transport } from './nodes7-transport';
import { S7Transport } from './transport';
import { ConnectionState, Endpoint, formatAddress, PollResult, Reading, RegisterAddress, RetryOptions } from './types';

/**
 * Owns one S7 session and performs discrete register reads on it.
 *
 * Every operation is cold: nothing happens until the returned Observable is
 * subscribed. Failures arrive on the error channel as one of the typed
 * errors from `./errors`.
 *
 * State only moves through {@link transition}:
 * - disconnected -> connected on a successful `connect`
 * - connected -> disconnected on `disconnect`
 * - connected -> disconnected when a read fails in the transport
 */
export class PollingClient {
    static create(timeoutMsec = DEFAULT_TIMEOUT, logger?: Logger) {
        const transport = new Nodes7Transport(timeoutMsec, logger?.scope('transport'));
        return new PollingClient(transport, logger?.scope('client'));
    }

    private readonly _state = new BehaviorSubject<ConnectionState>('disconnected');
    readonly state$ = this._state.asObservable();

    private endpoint: Endpoint | null = null;
    private session = 0;
    // set when a transport failure dropped the session, cleared by connect/disconnect
    private invalidated = false;

    constructor(
        private readonly transport: S7Transport,
        private readonly logger?: Logger,
        private readonly now: () => Date = () => new Date(),
    ) {}

    get state(): ConnectionState {
        return this._state.value;
    }

    connect(endpoint: Endpoint): Observable<void> {
        return defer(() => {
            this.endpoint = endpoint;
            const close$ = this.state === 'connected' ? this.disconnect() : EMPTY;

            return concat(
                close$,
                this.transport.connect(endpoint).pipe(
                    first(),
                    catchError(err => throwError(() => new ConnectionError(endpoint, err))),
                    tap(() => {
                        this.invalidated = false;
                        this.transition('connected', `connected to ${endpoint.host}`);
                    }),
                ),
            );
        });
    }

    disconnect(): Observable<void> {
        return defer(() => {
            this.invalidated = false;
            if (this.state === 'disconnected') {
                return EMPTY;
            }

            this.transition('disconnected', 'disconnect requested');
            return this.closeSession();
        });
    }

    readRegister(address: RegisterAddress): Observable<Reading> {
        return defer(() => {
            if (this.state !== 'connected') {
                return throwError(() => new NotConnectedError(address));
            }
            if (address.length !== REAL_SIZE) {
                return throwError(() => new DecodeError(REAL_SIZE, address.length));
            }

            const session = this.session;
            this.logger?.trace('reading', { address: formatAddress(address) });

            return this.transport.readBytes(address).pipe(
                first(),
                catchError(err => this.dropSession(address, err, session)),
                map(data => this.toReading(address, data, session)),
            );
        });
    }

    readWithRetry(address: RegisterAddress, { maxRetries, delay }: RetryOptions): Observable<Reading> {
        if (!Number.isInteger(maxRetries) || maxRetries < 1) {
            return throwError(() => new RangeError(`maxRetries must be a positive integer, got ${maxRetries}`));
        }
        if (!(delay >= 0)) {
            return throwError(() => new RangeError(`delay must not be negative, got ${delay}`));
        }

        return defer(() => this.attempt(address)).pipe(
            retry({
                count: maxRetries - 1,
                delay: (err: unknown, retryCount) => {
                    if (!isReadError(err)) {
                        return throwError(() => err);
                    }
                    this.logger?.debug(`attempt ${retryCount} failed (${err.kind}), retrying in ${delay}ms`);
                    return timer(delay);
                },
            }),
        );
    }

    monitor(address: RegisterAddress, options: MonitorOptions): Observable<PollResult> {
        return monitor(this, address, options, this.logger?.scope('monitor'));
    }

    private attempt(address: RegisterAddress): Observable<Reading> {
        const endpoint = this.endpoint;
        if (!this.invalidated || !endpoint || this.state === 'connected') {
            return this.readRegister(address);
        }

        this.logger?.info('reconnecting after transport failure', { host: endpoint.host });
        return this.connect(endpoint).pipe(
            concatMap(() => this.readRegister(address)),
        );
    }

    private toReading(address: RegisterAddress, data: Buffer, session: number): Reading {
        if (session !== this.session) {
            throw new NotConnectedError(address);
        }
        if (data.length < address.length) {
            throw new ShortReadError(address, data.length);
        }

        const value = decodeReal(data);
        this.logger?.debug('read', { address: formatAddress(address), raw: data.toString('hex'), value });
        return {
            value,
            timestamp: this.now(),
            raw: Buffer.from(data),
            address,
        };
    }

    private dropSession(address: RegisterAddress, cause: unknown, session: number): Observable<never> {
        if (session !== this.session) {
            // the session was already closed while this read was in flight
            return throwError(() => new NotConnectedError(address));
        }

        const error = new TransportError(address, cause);
        this.logger?.warn('transport failure, dropping session', { err: error });
        this.invalidated = true;
        this.transition('disconnected', 'transport failure');
        return concat(
            this.closeSession(),
            throwError(() => error),
        );
    }

    private closeSession(): Observable<never> {
        return this.transport.disconnect().pipe(
            ignoreElements(),
            catchError(err => {
                this.logger?.warn('error while closing session', { err });
                return EMPTY;
            }),
        );
    }

    private transition(next: ConnectionState, reason: string) {
        if (this.state === next) {
            return;
        }

        this.session++;
        this.logger?.info(`${this.state} -> ${next}: ${reason}`);
        this._state.next(next);
    }
}
