import {
    DEFAULT_INDUSTRY_KEYWORDS,
    type AffiliationVerdict,
    type ClassifiedAuthor,
    type ClassifiedRecord,
    type ParsedRecord,
} from '../types/index.js';

export interface AffiliationClassification {
    verdict: AffiliationVerdict;
    /** The keyword as configured, when the verdict is `industry` */
    matchedKeyword: string | null;
}

/**
 * Classify an affiliation by case-insensitive substring match against the
 * keyword list. The first keyword (in list order) that matches is reported.
 * Blank keywords are ignored. There is no word-boundary check; see
 * `DEFAULT_INDUSTRY_KEYWORDS`.
 */
export function classifyAffiliation(
    affiliation: string | null | undefined,
    keywords: readonly string[] = DEFAULT_INDUSTRY_KEYWORDS
): AffiliationClassification {
    const text = affiliation?.trim().toLowerCase();
    if (!text) {
        return { verdict: 'unclassifiable', matchedKeyword: null };
    }

    for (const keyword of keywords) {
        const needle = keyword.trim().toLowerCase();
        if (needle && text.includes(needle)) {
            return { verdict: 'industry', matchedKeyword: keyword };
        }
    }

    return { verdict: 'non-industry', matchedKeyword: null };
}

/**
 * Boolean form of `classifyAffiliation`; unclassifiable counts as false.
 */
export function isIndustryAffiliated(
    affiliation: string | null | undefined,
    keywords: readonly string[] = DEFAULT_INDUSTRY_KEYWORDS
): boolean {
    return classifyAffiliation(affiliation, keywords).verdict === 'industry';
}

/**
 * Annotate every author of a record and collect the industry-affiliated ones.
 */
export function classifyRecord(
    record: ParsedRecord,
    keywords: readonly string[] = DEFAULT_INDUSTRY_KEYWORDS
): ClassifiedRecord {
    const authors: ClassifiedAuthor[] = record.authors.map((author) => ({
        ...author,
        ...classifyAffiliation(author.affiliation, keywords),
    }));

    const industry = authors.filter((author) => author.verdict === 'industry');
    const companies = [...new Set(industry.map((author) => author.affiliation ?? ''))].filter(Boolean);

    return {
        ...record,
        authors,
        industryAuthors: industry.map((author) => author.name),
        companies,
    };
}
