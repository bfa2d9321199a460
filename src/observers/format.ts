import { formatAddress, PollResult, Reading } from '../communication/types';
import { MonitorStats } from '../communication/monitor';

export function formatReading(reading: Reading, unit = 'mm') {
    return `${formatAddress(reading.address)} = ${reading.value.toFixed(3)} ${unit} (${reading.raw.toString('hex')})`;
}

export function formatResult(result: PollResult) {
    return result.ok
        ? formatReading(result.reading)
        : `read failed (${result.error.kind}): ${result.error.message}`;
}

export function formatStats(stats: MonitorStats) {
    const parts = [
        `reads: ${stats.reads}`,
        `successes: ${stats.successes}`,
        `success rate: ${stats.successRate.toFixed(1)}%`,
        `changes: ${stats.changes}`,
    ];
    if (stats.min !== null && stats.max !== null && stats.average !== null) {
        parts.push(`min: ${stats.min.toFixed(3)}`, `max: ${stats.max.toFixed(3)}`, `avg: ${stats.average.toFixed(3)}`);
    }
    return parts.join(', ');
}
