import { classifyRecord } from '../classifier/affiliation.js';
import { exportRows, toOutputRow, type ExportDestination } from '../exporters/export.js';
import { parseRecords } from '../parser/record-parser.js';
import {
    DEFAULT_CONFIG,
    type FetchOutcome,
    type LiteratureSource,
    type RecordFailure,
    type RecordIdentifier,
} from '../types/index.js';
import { getLogger } from '../utils/logger.js';
import { validateQuery } from '../utils/validation.js';

export interface PipelineOptions {
    query: string;
    destination: ExportDestination;
    maxResults?: number;
    keywords?: readonly string[];
    /** Export only records with at least one industry-affiliated author */
    industryOnly?: boolean;
}

export interface PipelineSummary {
    identifiers: number;
    parsed: number;
    industryRecords: number;
    failures: RecordFailure[];
    rowsWritten: number;
}

/**
 * Run one query end to end:
 *
 * 1. Resolve the query to identifiers
 * 2. Fetch raw records
 * 3. Parse each record (failures are logged and skipped)
 * 4. Classify author affiliations
 * 5. Export one CSV row per record
 *
 * Validation, retrieval and output failures propagate; a record that fails
 * to fetch or parse only shrinks the result set.
 */
export async function runPipeline(source: LiteratureSource, options: PipelineOptions): Promise<PipelineSummary> {
    const logger = getLogger();
    const query = validateQuery(options.query);
    const maxResults = options.maxResults ?? DEFAULT_CONFIG.maxResults;
    const keywords = options.keywords ?? DEFAULT_CONFIG.keywords;

    logger.info({ query, source: source.name, maxResults }, 'Searching');

    // ──────────────────────────────────────────────────
    // Step 1: Resolve identifiers
    // ──────────────────────────────────────────────────
    const ids = await source.searchIds(query, maxResults);
    logger.info({ found: ids.length }, 'Identifiers resolved');

    // ──────────────────────────────────────────────────
    // Step 2: Fetch
    // ──────────────────────────────────────────────────
    const outcomes: Map<RecordIdentifier, FetchOutcome> = ids.length > 0
        ? await source.fetchRecords(ids)
        : new Map();

    // ──────────────────────────────────────────────────
    // Step 3: Parse
    // ──────────────────────────────────────────────────
    const { records, failures } = parseRecords(outcomes);
    for (const failure of failures) {
        logger.warn(
            { identifier: failure.identifier, stage: failure.stage, reason: failure.reason },
            'Skipping record'
        );
    }

    // ──────────────────────────────────────────────────
    // Step 4: Classify
    // ──────────────────────────────────────────────────
    const classified = records.map((record) => classifyRecord(record, keywords));
    const withIndustry = classified.filter((record) => record.industryAuthors.length > 0);

    for (const record of classified) {
        logger.debug(
            {
                identifier: record.identifier,
                authors: record.authors.length,
                industryAuthors: record.industryAuthors,
                companies: record.companies,
            },
            'Record classified'
        );
    }

    // ──────────────────────────────────────────────────
    // Step 5: Export
    // ──────────────────────────────────────────────────
    const selected = options.industryOnly ? withIndustry : classified;
    const rowsWritten = await exportRows(selected.map(toOutputRow), options.destination);

    const summary: PipelineSummary = {
        identifiers: ids.length,
        parsed: records.length,
        industryRecords: withIndustry.length,
        failures,
        rowsWritten,
    };

    logger.info(
        {
            identifiers: summary.identifiers,
            parsed: summary.parsed,
            failed: failures.length,
            industryRecords: summary.industryRecords,
            rowsWritten,
        },
        'Pipeline complete'
    );

    return summary;
}
