import { mkdtemp, readFile, rm } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { from, lastValueFrom } from 'rxjs';
import { toArray } from 'rxjs/operators';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { NotConnectedError } from '../src/communication/errors';
import { recordCsv, toCsvLine } from '../src/observers/csv-recorder';
import { formatReading, formatResult, formatStats } from '../src/observers/format';
import { checkRange, isWithinRange } from '../src/observers/range-check';
import { ADDRESS, memoryLogger, reading } from './helpers';

describe('recordCsv', () => {
    let dir: string;

    beforeEach(async () => {
        dir = await mkdtemp(join(tmpdir(), 's7-encoder-csv-'));
    });

    afterEach(async () => {
        await rm(dir, { recursive: true, force: true });
    });

    it('formats one line per reading', () => {
        expect(toCsvLine(reading(100))).toBe('2024-05-01T08:00:00.000Z,100.000\n');
        expect(toCsvLine(reading(-0.5, new Date('2024-05-01T08:00:01.250Z')))).toBe('2024-05-01T08:00:01.250Z,-0.500\n');
    });

    it('appends readings in order and passes them on', async () => {
        const file = join(dir, 'encoder_data.csv');
        const first = reading(100);
        const second = reading(12.5, new Date('2024-05-01T08:00:01.000Z'));

        const passed = await lastValueFrom(from([first, second]).pipe(recordCsv(file), toArray()));

        expect(passed).toEqual([first, second]);
        expect(await readFile(file, 'utf-8')).toBe(
            '2024-05-01T08:00:00.000Z,100.000\n' +
            '2024-05-01T08:00:01.000Z,12.500\n',
        );
    });
});

describe('checkRange', () => {
    it('includes both bounds', () => {
        expect(isWithinRange(-500, { min: -500, max: 500 })).toBe(true);
        expect(isWithinRange(500, { min: -500, max: 500 })).toBe(true);
        expect(isWithinRange(500.5, { min: -500, max: 500 })).toBe(false);
    });

    it('warns about out of range readings without dropping them', async () => {
        const { logger, lines } = memoryLogger('warn');

        const passed = await lastValueFrom(
            from([reading(10), reading(2000)]).pipe(checkRange({ min: -1000, max: 1000 }, logger), toArray()),
        );

        expect(passed.map(r => r.value)).toEqual([10, 2000]);
        expect(lines).toHaveLength(1);
        expect(lines[0].level).toBe(40);
        expect(lines[0].msg).toBe('DB5.DBD124 out of range: 2000 (expected -1000 ~ 1000)');
    });
});

describe('format', () => {
    it('renders a reading with its address and raw bytes', () => {
        expect(formatReading(reading(100))).toBe('DB5.DBD124 = 100.000 mm (42c80000)');
    });

    it('renders a failed poll', () => {
        const error = new NotConnectedError(ADDRESS);
        expect(formatResult({ ok: false, error, timestamp: new Date() }))
            .toBe('read failed (not-connected): Not connected while reading DB5.DBD124');
    });

    it('summarises monitor statistics', () => {
        expect(formatStats({ reads: 4, successes: 3, failures: 1, successRate: 75, min: 1, max: 5, average: 3, changes: 2 }))
            .toBe('reads: 4, successes: 3, success rate: 75.0%, changes: 2, min: 1.000, max: 5.000, avg: 3.000');
        expect(formatStats({ reads: 0, successes: 0, failures: 0, successRate: 0, min: null, max: null, average: null, changes: 0 }))
            .toBe('reads: 0, successes: 0, success rate: 0.0%, changes: 0');
    });
});
