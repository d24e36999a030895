import type { FetchOutcome, Query, RecordIdentifier } from './record.js';

/**
 * A literature database the pipeline can search and fetch records from.
 * PubMed is the only implementation; tests substitute in-memory fakes.
 */
export interface LiteratureSource {
    /** Human-readable source name */
    readonly name: string;

    /**
     * Resolve a query to record identifiers, in the order the service ranks them.
     * Never returns more than `limit` identifiers, and never a duplicate.
     */
    searchIds(query: Query, limit?: number): Promise<RecordIdentifier[]>;

    /**
     * Fetch raw payloads for the given identifiers.
     * The map holds one entry per requested identifier; a record that could not
     * be retrieved is a failure entry, not a missing key.
     */
    fetchRecords(ids: readonly RecordIdentifier[]): Promise<Map<RecordIdentifier, FetchOutcome>>;
}

/**
 * Options for literature source initialization.
 */
export interface LiteratureSourceOptions {
    /** NCBI API key (raises the service's request allowance) */
    apiKey?: string;

    /** Contact email sent with each request */
    email?: string;

    /** Tool name sent with each request */
    tool?: string;
}
