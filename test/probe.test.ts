import { lastValueFrom } from 'rxjs';
import { describe, expect, it } from 'vitest';
import { TransportError } from '../src/communication/errors';
import { PollingClient } from '../src/communication/polling-client';
import { formatProbeResult, probeOffsets } from '../src/probe';
import { bytes, ENDPOINT, FakeTransport } from './helpers';

describe('probeOffsets', () => {
    it('reports every offset and recovers from a dropped session', async () => {
        const transport = new FakeTransport();
        transport.reads.push(bytes(0x43, 0x48, 0x00, 0x00), new Error('timeout'), bytes(0x42, 0xc8, 0x00, 0x00));
        const client = new PollingClient(transport);
        await lastValueFrom(client.connect(ENDPOINT));

        const results = await lastValueFrom(probeOffsets(client, 5, [16, 20, 24]));

        expect(results.map(r => r.offset)).toEqual([16, 20, 24]);
        expect(transport.readCalls.map(a => a.offset)).toEqual([16, 20, 24]);
        expect(transport.connectCalls).toHaveLength(2);

        const [first, second, third] = results;
        expect(formatProbeResult(5, first)).toBe('DB5.DBD16: raw 43480000 -> 200');
        expect(second.ok).toBe(false);
        if (!second.ok) {
            expect(second.error).toBeInstanceOf(TransportError);
            expect(formatProbeResult(5, second)).toBe('DB5.DBD20: transport (Transport failure while reading DB5.DBD20: timeout)');
        }
        expect(formatProbeResult(5, third)).toBe('DB5.DBD24: raw 42c80000 -> 100');
    });
});
