/**
 * Barrel export for all shared types.
 */
export type { RawWork, Work } from './work.js';
export { RAW_ONLY_FIELDS } from './work.js';
export type {
    StopReason,
    HopReport,
    ExpansionOptions,
    ExpansionResult,
} from './expansion.js';
export { DEFAULT_CONFIG } from './config.js';
export type { HopGraphConfig, LogLevel, ExportFormat } from './config.js';
