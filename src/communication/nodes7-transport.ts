import NodeS7 from 'nodes7';
import { defer, Observable } from 'rxjs';
import { timeout } from 'rxjs/operators';
import { Logger } from '../log';
import { S7Transport } from './transport';
import { Endpoint, RegisterAddress } from './types';

export const DEFAULT_TIMEOUT = 5000;

export type S7Connection = Pick<NodeS7, 'initiateConnection' | 'dropConnection' | 'addItems' | 'removeItems' | 'readAllItems'>;

export class Nodes7Transport implements S7Transport {
    private connection: S7Connection | null = null;
    // readAllItems reads every registered item, so only the current tag stays registered
    private tag: string | null = null;

    constructor(
        private readonly timeoutMsec = DEFAULT_TIMEOUT,
        private readonly logger?: Logger,
        private readonly createConnection: () => S7Connection = () => new NodeS7({ silent: true }),
    ) {}

    connect(endpoint: Endpoint): Observable<void> {
        return new Observable<void>((observer) => {
            const connection = this.createConnection();
            let settled = false;
            this.logger?.trace('connecting', { ...endpoint });

            connection.initiateConnection({
                host: endpoint.host,
                port: endpoint.port,
                rack: endpoint.rack,
                slot: endpoint.slot,
                timeout: this.timeoutMsec,
            }, (err) => {
                settled = true;
                if (err) {
                    this.logger?.trace('connect error', { err });
                    observer.error(err);
                    return;
                }
                this.logger?.trace('connected');
                this.connection = connection;
                this.tag = null;
                observer.next();
                observer.complete();
            });

            return () => {
                if (!settled) {
                    this.logger?.trace('connect abandoned');
                    connection.dropConnection();
                }
            };
        }).pipe(
            timeout(this.timeoutMsec),
        );
    }

    readBytes(address: RegisterAddress): Observable<Buffer> {
        return defer(() => {
            const connection = this.connection;
            if (!connection) {
                throw new Error('No open S7 session');
            }

            const tag = toTag(address);
            if (this.tag !== tag) {
                if (this.tag) {
                    connection.removeItems(this.tag);
                }
                connection.addItems(tag);
                this.tag = tag;
            }

            return new Observable<Buffer>((observer) => {
                this.logger?.trace('reading', { tag });
                connection.readAllItems((anythingBad, values) => {
                    if (anythingBad) {
                        observer.error(new Error(`Bad quality reading ${tag}: ${String(values[tag])}`));
                        return;
                    }
                    try {
                        observer.next(bytesFromValue(values[tag]));
                        observer.complete();
                    } catch (err) {
                        observer.error(err);
                    }
                });
            });
        }).pipe(
            timeout(this.timeoutMsec),
        );
    }

    disconnect(): Observable<void> {
        return new Observable<void>((observer) => {
            const connection = this.connection;
            this.connection = null;
            this.tag = null;
            if (!connection) {
                observer.complete();
                return;
            }

            this.logger?.trace('dropping connection');
            connection.dropConnection(() => {
                this.logger?.trace('connection dropped');
                observer.complete();
            });
        });
    }
}

export function toTag(address: RegisterAddress) {
    return address.length === 1
        ? `DB${address.block},BYTE${address.offset}`
        : `DB${address.block},BYTE${address.offset}.${address.length}`;
}

/** nodes7 hands back a single number for one byte and an array for several. */
export function bytesFromValue(value: unknown): Buffer {
    if (isByte(value)) {
        return Buffer.from([value]);
    }
    if (Array.isArray(value) && value.every(isByte)) {
        return Buffer.from(value);
    }
    throw new Error(`Unexpected value for byte read: ${JSON.stringify(value)}`);
}

function isByte(value: unknown): value is number {
    return typeof value === 'number' && Number.isInteger(value) && value >= 0 && value <= 0xff;
}
