// nodes7 ships without type declarations; this covers the calls the transport makes.
declare module 'nodes7' {
    interface NodeS7Options {
        silent?: boolean;
        debug?: boolean;
    }

    interface ConnectionParams {
        host: string;
        port?: number;
        rack?: number;
        slot?: number;
        timeout?: number;
        localTSAP?: number;
        remoteTSAP?: number;
        doNotOptimize?: boolean;
    }

    class NodeS7 {
        constructor(options?: NodeS7Options);
        initiateConnection(params: ConnectionParams, callback: (err?: Error) => void): void;
        dropConnection(callback?: () => void): void;
        addItems(items: string | string[]): void;
        removeItems(items?: string | string[]): void;
        readAllItems(callback: (anythingBad: boolean, values: Record<string, unknown>) => void): void;
    }

    export = NodeS7;
}
