/**
 * Barrel export for all shared types.
 */
export type {
    Query,
    RecordIdentifier,
    RawRecord,
    FetchFailure,
    FetchOutcome,
    Author,
    ParsedRecord,
    AffiliationVerdict,
    ClassifiedAuthor,
    ClassifiedRecord,
    OutputRow,
    RecordFailure,
} from './record.js';
export { ok, err } from './result.js';
export type { Result } from './result.js';
export { DEFAULT_CONFIG, DEFAULT_INDUSTRY_KEYWORDS } from './config.js';
export type { GetPapersConfig, LogLevel } from './config.js';
export type { LiteratureSource, LiteratureSourceOptions } from './literature-source.js';
