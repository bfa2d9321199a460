export * from './communication/types';
export * from './communication/errors';
export { decodeReal, REAL_SIZE } from './communication/decode';
export type { S7Transport } from './communication/transport';
export { Nodes7Transport, DEFAULT_TIMEOUT } from './communication/nodes7-transport';
export { PollingClient } from './communication/polling-client';
export { monitor, readings, onlyChanges, collectStats } from './communication/monitor';
export type { MonitorOptions, MonitorStats } from './communication/monitor';
export { probeOffsets } from './probe';
export type { ProbeResult } from './probe';
export { recordCsv } from './observers/csv-recorder';
export { checkRange, isWithinRange } from './observers/range-check';
export type { ValueRange } from './observers/range-check';
export { loadConfig, parseConfig, ConfigError, endpointOf, addressOf } from './config';
export type { AppConfig } from './config';
export { createLogger, Logger } from './log';
export type { LogOptions, LogLevel } from './log';
