import { readFile } from 'fs/promises';
import { z } from 'zod';
import { Endpoint, RegisterAddress } from './communication/types';

export const DEFAULT_CONFIG_FILE = 'encoder-config.json';

const plcSchema = z.object({
    host: z.string().min(1).default('192.168.0.1'),
    port: z.number().int().min(1).max(65535).default(102),
    rack: z.number().int().min(0).default(0),
    slot: z.number().int().min(0).default(1),
    timeout: z.number().int().positive().default(5000),
});

const registerSchema = z.object({
    block: z.number().int().min(1).default(5),
    offset: z.number().int().min(0).default(124),
    length: z.literal(4).default(4),
});

const pollingSchema = z.object({
    interval: z.number().min(0).default(1000),
    retries: z.number().int().min(1).default(3),
    retryDelay: z.number().min(0).default(1000),
});

const rangeSchema = z.object({
    min: z.number().default(-1000),
    max: z.number().default(1000),
}).refine(r => r.min <= r.max, { message: 'min must not exceed max' });

const logSchema = z.object({
    level: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'silent']).default('info'),
    file: z.string().min(1).nullable().default('encoder_position.log'),
});

export const configSchema = z.object({
    plc: plcSchema.default({}),
    register: registerSchema.default({}),
    polling: pollingSchema.default({}),
    range: rangeSchema.default({}),
    log: logSchema.default({}),
});

export type AppConfig = z.infer<typeof configSchema>;

export class ConfigError extends Error {
    constructor(readonly file: string, readonly issues: string[]) {
        super(`Invalid configuration in ${file}:\n  ${issues.join('\n  ')}`);
        this.name = 'ConfigError';
    }
}

export function parseConfig(input: unknown, source = '<inline>'): AppConfig {
    const result = configSchema.safeParse(input);
    if (!result.success) {
        throw new ConfigError(source, result.error.issues.map(i => `${i.path.join('.') || '(root)'}: ${i.message}`));
    }
    return result.data;
}

/** Missing file means defaults; anything unreadable or invalid is a ConfigError. */
export async function loadConfig(file = DEFAULT_CONFIG_FILE): Promise<AppConfig> {
    let text: string;
    try {
        text = await readFile(file, 'utf-8');
    } catch (err) {
        if (isMissingFile(err)) {
            return parseConfig({}, file);
        }
        throw err;
    }

    let json: unknown;
    try {
        json = JSON.parse(text);
    } catch (err) {
        throw new ConfigError(file, [`not valid JSON: ${err instanceof Error ? err.message : String(err)}`]);
    }
    return parseConfig(json, file);
}

export function endpointOf(config: AppConfig): Endpoint {
    const { host, port, rack, slot } = config.plc;
    return { host, port, rack, slot };
}

export function addressOf(config: AppConfig): RegisterAddress {
    const { block, offset, length } = config.register;
    return { block, offset, length };
}

function isMissingFile(err: unknown) {
    return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}
