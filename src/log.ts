import pino from 'pino';

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'silent';

export interface LogOptions {
    level: LogLevel;
    file?: string;
}

type LogContext = Record<string, unknown>;

export class Logger {
    constructor(private readonly base: pino.Logger) {}

    scope(name: string) {
        return new Logger(this.base.child({ scope: name }));
    }

    trace(message: string, context?: LogContext) {
        this.base.trace(context ?? {}, message);
    }

    debug(message: string, context?: LogContext) {
        this.base.debug(context ?? {}, message);
    }

    info(message: string, context?: LogContext) {
        this.base.info(context ?? {}, message);
    }

    warn(message: string, context?: LogContext) {
        this.base.warn(context ?? {}, message);
    }

    error(message: string, context?: LogContext) {
        this.base.error(context ?? {}, message);
    }
}

export function createLogger(options: LogOptions, stdout: pino.DestinationStream = pino.destination(1)) {
    const streams: pino.StreamEntry[] = [{ level: 'trace', stream: stdout }];
    if (options.file) {
        streams.push({
            level: 'trace',
            stream: pino.destination({ dest: options.file, mkdir: true, sync: false }),
        });
    }

    const base = pino(
        {
            level: options.level,
            timestamp: pino.stdTimeFunctions.isoTime,
        },
        pino.multistream(streams),
    );
    return new Logger(base);
}
