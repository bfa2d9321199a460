import { Endpoint, RegisterAddress, formatAddress } from './types';

export abstract class S7ClientError extends Error {
    abstract readonly kind: string;

    constructor(message: string, cause?: unknown) {
        super(message, cause === undefined ? undefined : { cause });
        this.name = new.target.name;
    }
}

export class ConnectionError extends S7ClientError {
    readonly kind = 'connection';

    constructor(readonly endpoint: Endpoint, cause: unknown) {
        super(`Could not connect to ${endpoint.host}:${endpoint.port} (rack ${endpoint.rack}, slot ${endpoint.slot}): ${describe(cause)}`, cause);
    }
}

export class NotConnectedError extends S7ClientError {
    readonly kind = 'not-connected';

    constructor(readonly address: RegisterAddress) {
        super(`Not connected while reading ${formatAddress(address)}`);
    }
}

export class ShortReadError extends S7ClientError {
    readonly kind = 'short-read';

    constructor(readonly address: RegisterAddress, readonly actual: number) {
        super(`Short read of ${formatAddress(address)}: expected ${address.length} bytes, got ${actual}`);
    }

    get expected() {
        return this.address.length;
    }
}

export class DecodeError extends S7ClientError {
    readonly kind = 'decode';

    constructor(readonly expected: number, readonly actual: number) {
        super(`Cannot decode ${actual} bytes as a ${expected} byte value`);
    }
}

export class TransportError extends S7ClientError {
    readonly kind = 'transport';

    constructor(readonly address: RegisterAddress, cause: unknown) {
        super(`Transport failure while reading ${formatAddress(address)}: ${describe(cause)}`, cause);
    }
}

export type ReadError = ConnectionError | NotConnectedError | ShortReadError | DecodeError | TransportError;

export function isReadError(err: unknown): err is ReadError {
    return err instanceof ConnectionError ||
        err instanceof NotConnectedError ||
        err instanceof ShortReadError ||
        err instanceof DecodeError ||
        err instanceof TransportError;
}

function describe(cause: unknown) {
    return cause instanceof Error ? cause.message : String(cause);
}
