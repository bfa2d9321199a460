import { parseArgs } from 'util';
import { AppConfig, ConfigError, parseConfig } from './config';

export const COMMANDS = ['read', 'monitor', 'probe'] as const;
export type Command = typeof COMMANDS[number];

export const USAGE = `Usage: s7-encoder <read|monitor|probe> [options]

Commands:
  read      read the encoder position once, with retries
  monitor   poll continuously until --duration elapses or Ctrl+C
  probe     read a REAL at each of --offsets and print raw bytes and values

Options:
  -c, --config <file>     JSON configuration file (default: encoder-config.json)
      --host <address>    PLC address
      --rack <n>          rack number
      --slot <n>          slot number
      --block <n>         data block number
      --offset <n>        byte offset of the REAL inside the data block
      --interval <ms>     delay between monitor reads
      --duration <s>      stop monitoring after this many seconds
      --retries <n>       read attempts before giving up
      --retry-delay <ms>  delay between attempts
      --csv <file>        append every reading to a CSV file
      --threshold <n>     only print readings that moved at least this much
      --offsets <list>    comma separated offsets for probe (default: 16,20,24,28,32)
  -h, --help              show this help`;

export const DEFAULT_PROBE_OFFSETS = [16, 20, 24, 28, 32];

export interface CliOptions {
    command: Command;
    configFile?: string;
    help: boolean;
    host?: string;
    rack?: number;
    slot?: number;
    block?: number;
    offset?: number;
    interval?: number;
    /** Seconds. */
    duration?: number;
    retries?: number;
    retryDelay?: number;
    csv?: string;
    threshold?: number;
    offsets: number[];
}

export function parseCliArgs(args: string[]): CliOptions {
    const { values, positionals } = parseArgs({
        args,
        allowPositionals: true,
        options: {
            config: { type: 'string', short: 'c' },
            host: { type: 'string' },
            rack: { type: 'string' },
            slot: { type: 'string' },
            block: { type: 'string' },
            offset: { type: 'string' },
            interval: { type: 'string' },
            duration: { type: 'string' },
            retries: { type: 'string' },
            'retry-delay': { type: 'string' },
            csv: { type: 'string' },
            threshold: { type: 'string' },
            offsets: { type: 'string' },
            help: { type: 'boolean', short: 'h' },
        },
    });

    const command = positionals[0] ?? 'read';
    if (!isCommand(command)) {
        throw new ConfigError('command line', [`unknown command '${command}'`]);
    }

    return {
        command,
        configFile: values.config,
        help: values.help ?? false,
        host: values.host,
        rack: toNumber('rack', values.rack),
        slot: toNumber('slot', values.slot),
        block: toNumber('block', values.block),
        offset: toNumber('offset', values.offset),
        interval: toNumber('interval', values.interval),
        duration: toNumber('duration', values.duration),
        retries: toNumber('retries', values.retries),
        retryDelay: toNumber('retry-delay', values['retry-delay']),
        csv: values.csv,
        threshold: toNumber('threshold', values.threshold),
        offsets: values.offsets === undefined
            ? DEFAULT_PROBE_OFFSETS
            : values.offsets.split(',').map(parseOffset),
    };
}

/** Command line flags win over the file; the merged result is validated again. */
export function applyOverrides(config: AppConfig, options: CliOptions): AppConfig {
    return parseConfig({
        ...config,
        plc: {
            ...config.plc,
            host: options.host ?? config.plc.host,
            rack: options.rack ?? config.plc.rack,
            slot: options.slot ?? config.plc.slot,
        },
        register: {
            ...config.register,
            block: options.block ?? config.register.block,
            offset: options.offset ?? config.register.offset,
        },
        polling: {
            interval: options.interval ?? config.polling.interval,
            retries: options.retries ?? config.polling.retries,
            retryDelay: options.retryDelay ?? config.polling.retryDelay,
        },
    }, 'command line');
}

function isCommand(value: string): value is Command {
    return COMMANDS.some(c => c === value);
}

function toNumber(name: string, value: string | undefined) {
    return value === undefined ? undefined : parseNumber(name, value);
}

function parseOffset(value: string) {
    const offset = parseNumber('offsets', value.trim());
    if (!Number.isInteger(offset) || offset < 0) {
        throw new ConfigError('command line', [`--offsets: '${value}' is not a byte offset`]);
    }
    return offset;
}

function parseNumber(name: string, value: string) {
    const parsed = Number(value);
    if (value === '' || !Number.isFinite(parsed)) {
        throw new ConfigError('command line', [`--${name}: '${value}' is not a number`]);
    }
    return parsed;
}
