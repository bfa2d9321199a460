#!/usr/bin/env node
import { fromEvent, identity, lastValueFrom, merge, MonoTypeOperatorFunction } from 'rxjs';
import { ignoreElements, share, take, takeLast, tap } from 'rxjs/operators';
import { applyOverrides, CliOptions, Command, parseCliArgs, USAGE } from './args';
import { collectStats, HISTORY_SIZE, onlyChanges, readings } from './communication/monitor';
import { PollingClient } from './communication/polling-client';
import { Reading } from './communication/types';
import { AppConfig, addressOf, endpointOf, loadConfig } from './config';
import { createLogger, Logger } from './log';
import { recordCsv } from './observers/csv-recorder';
import { formatReading, formatResult, formatStats } from './observers/format';
import { checkRange } from './observers/range-check';
import { formatProbeResult, probeOffsets } from './probe';

async function main(args: string[]): Promise<number> {
    const options = parseCliArgs(args);
    if (options.help) {
        console.log(USAGE);
        return 0;
    }

    const config = applyOverrides(await loadConfig(options.configFile), options);
    const logger = createLogger({ level: config.log.level, file: config.log.file ?? undefined });
    const log = logger.scope('cli');
    const client = PollingClient.create(config.plc.timeout, logger);

    log.info(`PLC ${config.plc.host} (rack ${config.plc.rack}, slot ${config.plc.slot}), command ${options.command}`);

    try {
        await lastValueFrom(client.connect(endpointOf(config)));
        return await handlers[options.command](client, config, options, log);
    } catch (err) {
        log.error(err instanceof Error ? err.message : String(err), { err });
        return 1;
    } finally {
        await lastValueFrom(client.disconnect(), { defaultValue: undefined });
    }
}

type Handler = (client: PollingClient, config: AppConfig, options: CliOptions, log: Logger) => Promise<number>;

const read: Handler = async (client, config, _options, log) => {
    const reading = await lastValueFrom(
        client
            .readWithRetry(addressOf(config), { maxRetries: config.polling.retries, delay: config.polling.retryDelay })
            .pipe(checkRange(config.range, log)),
    );
    console.log(formatReading(reading));
    return 0;
};

const watch: Handler = async (client, config, options, log) => {
    const changes: MonoTypeOperatorFunction<Reading> = options.threshold === undefined ? identity : onlyChanges(options.threshold);
    const record: MonoTypeOperatorFunction<Reading> = options.csv === undefined ? identity : recordCsv(options.csv);

    const results$ = client
        .monitor(addressOf(config), {
            interval: config.polling.interval,
            duration: options.duration === undefined ? undefined : options.duration * 1000,
            stop$: fromEvent(process, 'SIGINT').pipe(take(1)),
            retry: { maxRetries: config.polling.retries, delay: config.polling.retryDelay },
        })
        .pipe(
            tap(result => {
                if (!result.ok) {
                    console.log(formatResult(result));
                }
            }),
            share(),
        );

    const readings$ = results$.pipe(
        readings(),
        checkRange(config.range, log),
        changes,
        record,
        tap(reading => console.log(formatReading(reading))),
    );
    const stats$ = results$.pipe(
        collectStats(HISTORY_SIZE, options.threshold),
        takeLast(1),
    );

    const stats = await lastValueFrom(merge(readings$.pipe(ignoreElements()), stats$), { defaultValue: null });
    if (stats) {
        log.info(`monitoring summary: ${formatStats(stats)}`);
        console.log(formatStats(stats));
    }
    return 0;
};

const probe: Handler = async (client, config, options, log) => {
    const block = config.register.block;
    const results = await lastValueFrom(probeOffsets(client, block, options.offsets, log));
    for (const result of results) {
        console.log(formatProbeResult(block, result));
    }
    return results.some(r => r.ok) ? 0 : 1;
};

const handlers: Record<Command, Handler> = {
    read,
    monitor: watch,
    probe,
};

main(process.argv.slice(2)).then(
    (code) => {
        process.exitCode = code;
    },
    (err: unknown) => {
        console.error(err instanceof Error ? err.message : err);
        process.exitCode = 1;
    },
);
