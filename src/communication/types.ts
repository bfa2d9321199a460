import type { ReadError } from './errors';

export interface Endpoint {
    readonly host: string;
    readonly port: number;
    readonly rack: number;
    readonly slot: number;
}

export interface RegisterAddress {
    readonly block: number;
    readonly offset: number;
    readonly length: number;
}

export interface Reading {
    readonly value: number;
    readonly timestamp: Date;
    readonly raw: Buffer;
    readonly address: RegisterAddress;
}

export type ConnectionState = 'disconnected' | 'connected';

export type PollResult =
    | { readonly ok: true; readonly reading: Reading }
    | { readonly ok: false; readonly error: ReadError; readonly timestamp: Date };

export interface RetryOptions {
    readonly maxRetries: number;
    readonly delay: number;
}

export function formatAddress(address: RegisterAddress) {
    return address.length === 4
        ? `DB${address.block}.DBD${address.offset}`
        : `DB${address.block}.DBB${address.offset}[${address.length}]`;
}
