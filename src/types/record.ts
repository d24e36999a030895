import type { Result } from './result.js';

/**
 * Free-text search term, passed to the literature service as-is.
 */
export type Query = string;

/**
 * Opaque token naming one paper in the literature database (a PubMed PMID).
 */
export type RecordIdentifier = string;

/**
 * Unparsed payload for one identifier as returned by the record fetcher.
 * `payload` is the markup tree of a single article element; nothing about
 * its shape is guaranteed until the record parser has looked at it.
 */
export interface RawRecord {
    identifier: RecordIdentifier;
    payload: unknown;
}

/**
 * Per-identifier failure marker produced when a record could not be fetched.
 */
export interface FetchFailure {
    identifier: RecordIdentifier;
    reason: string;
}

export type FetchOutcome = Result<RawRecord, FetchFailure>;

/**
 * Author of a paper with the affiliation text supplied by the database.
 * Several affiliations are joined with "; ".
 */
export interface Author {
    name: string;
    affiliation: string | null;
}

export interface ParsedRecord {
    identifier: RecordIdentifier;
    title: string;
    /** Normalized to YYYY-MM-DD, YYYY-MM or YYYY where possible; '' when unknown */
    publicationDate: string;
    authors: Author[];
    correspondingEmail: string | null;
}

/**
 * `unclassifiable` is reported for authors without affiliation text.
 * It counts as not industry-affiliated.
 */
export type AffiliationVerdict = 'industry' | 'non-industry' | 'unclassifiable';

export interface ClassifiedAuthor extends Author {
    verdict: AffiliationVerdict;
    matchedKeyword: string | null;
}

export interface ClassifiedRecord extends ParsedRecord {
    authors: ClassifiedAuthor[];
    /** Names of industry-affiliated authors, in author-list order */
    industryAuthors: string[];
    /** Distinct affiliation strings of the industry-affiliated authors */
    companies: string[];
}

/**
 * Flattened CSV row. One per record, never one per author.
 */
export interface OutputRow {
    identifier: string;
    title: string;
    publicationDate: string;
    industryAffiliatedAuthors: string;
    correspondingEmail: string;
}

/**
 * A record that dropped out of the batch, with the stage it failed at.
 */
export interface RecordFailure {
    identifier: RecordIdentifier;
    stage: 'fetch' | 'parse';
    reason: string;
}
