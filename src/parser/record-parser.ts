import {
    err,
    ok,
    type Author,
    type FetchOutcome,
    type ParsedRecord,
    type RawRecord,
    type RecordFailure,
    type RecordIdentifier,
    type Result,
} from '../types/index.js';
import { ParseError } from '../utils/errors.js';
import { asArray, isXmlNode, pick, stripMarkup, textOf, type XmlNode } from '../sources/utils.js';

const MONTHS: Record<string, string> = {
    jan: '01', feb: '02', mar: '03', apr: '04', may: '05', jun: '06',
    jul: '07', aug: '08', sep: '09', oct: '10', nov: '11', dec: '12',
};

const EMAIL_PATTERN = /[\w.+-]+@[\w-]+(?:\.[\w-]+)+/;

/**
 * Extract title, date, authors and corresponding email from one PubMed
 * article or book record.
 * Missing optional fields come back empty; only a payload that is neither
 * kind of PubMed record is a ParseError.
 */
export function parseRecord(raw: RawRecord): ParsedRecord {
    const { identifier, payload } = raw;

    if (!isXmlNode(payload)) {
        throw new ParseError(identifier, 'payload is not a structured record');
    }

    const book = payload['BookDocument'];
    if (isXmlNode(book)) {
        return parseBookDocument(identifier, book);
    }

    const citation = payload['MedlineCitation'];
    if (!isXmlNode(citation)) {
        throw new ParseError(identifier, 'missing MedlineCitation element');
    }

    if (!textOf(citation['PMID'])?.trim()) {
        throw new ParseError(identifier, 'missing PMID');
    }

    const article = citation['Article'];
    if (!isXmlNode(article)) {
        throw new ParseError(identifier, 'missing Article element');
    }

    const authors = parseAuthors(article);

    return {
        identifier,
        title: parseTitle(article),
        publicationDate: parsePublicationDate(article),
        authors,
        correspondingEmail: findCorrespondingEmail(authors),
    };
}

/**
 * Books and book chapters (StatPearls, GeneReviews) carry their fields on
 * BookDocument. A chapter without its own title takes the book title.
 */
function parseBookDocument(identifier: RecordIdentifier, book: XmlNode): ParsedRecord {
    if (!textOf(book['PMID'])?.trim()) {
        throw new ParseError(identifier, 'missing PMID');
    }

    const authors = parseAuthors(book);

    return {
        identifier,
        title: parseTitle(book) || stripMarkup(textOf(pick(book, 'Book', 'BookTitle')) ?? ''),
        publicationDate: formatDate(pick(book, 'Book', 'PubDate')),
        authors,
        correspondingEmail: findCorrespondingEmail(authors),
    };
}

/**
 * Result-returning variant of `parseRecord` for batch use.
 */
export function tryParseRecord(raw: RawRecord): Result<ParsedRecord, ParseError> {
    try {
        return ok(parseRecord(raw));
    } catch (error) {
        if (error instanceof ParseError) return err(error);
        throw error;
    }
}

/**
 * Parse every successfully fetched record, collecting fetch and parse
 * failures instead of stopping at the first one.
 * `records.length + failures.length` always equals `outcomes.size`.
 */
export function parseRecords(outcomes: ReadonlyMap<RecordIdentifier, FetchOutcome>): {
    records: ParsedRecord[];
    failures: RecordFailure[];
} {
    const records: ParsedRecord[] = [];
    const failures: RecordFailure[] = [];

    for (const [identifier, outcome] of outcomes) {
        if (!outcome.ok) {
            failures.push({ identifier, stage: 'fetch', reason: outcome.error.reason });
            continue;
        }

        const parsed = tryParseRecord(outcome.value);
        if (parsed.ok) {
            records.push(parsed.value);
        } else {
            failures.push({ identifier, stage: 'parse', reason: parsed.error.message });
        }
    }

    return { records, failures };
}

// ─── Field extraction ────────────────────────────────────

function parseTitle(article: XmlNode): string {
    const title = stripMarkup(textOf(article['ArticleTitle']) ?? '');
    if (title) return title;
    return stripMarkup(textOf(article['VernacularTitle']) ?? '');
}

function parsePublicationDate(article: XmlNode): string {
    const pubDate = formatDate(pick(article, 'Journal', 'JournalIssue', 'PubDate'));
    if (pubDate) return pubDate;
    return formatDate(asArray(article['ArticleDate'])[0]);
}

/**
 * Year + Month + Day → YYYY-MM-DD, Year + Month → YYYY-MM, Year → YYYY.
 * A free-form MedlineDate ("1998 Dec-1999 Jan") is kept as written.
 */
export function formatDate(node: unknown): string {
    if (!isXmlNode(node)) return '';

    const year = textOf(node['Year'])?.trim();
    if (year && /^\d{4}$/.test(year)) {
        const month = normalizeMonth(textOf(node['Month']));
        if (!month) return year;

        const day = textOf(node['Day'])?.trim();
        if (day && /^\d{1,2}$/.test(day) && Number(day) >= 1 && Number(day) <= 31) {
            return `${year}-${month}-${day.padStart(2, '0')}`;
        }
        return `${year}-${month}`;
    }

    return textOf(node['MedlineDate'])?.trim() ?? '';
}

function normalizeMonth(value: string | undefined): string | null {
    const month = value?.trim();
    if (!month) return null;

    if (/^\d{1,2}$/.test(month)) {
        const number = Number(month);
        return number >= 1 && number <= 12 ? month.padStart(2, '0') : null;
    }

    return MONTHS[month.slice(0, 3).toLowerCase()] ?? null;
}

function parseAuthors(article: XmlNode): Author[] {
    const authors: Author[] = [];

    for (const node of asArray(pick(article, 'AuthorList', 'Author'))) {
        if (!isXmlNode(node)) continue;

        const name = authorName(node);
        if (!name) continue;

        const affiliations = [
            ...asArray(node['AffiliationInfo']).map((info) => pick(info, 'Affiliation')),
            ...asArray(node['Affiliation']),
        ]
            .map((value) => stripMarkup(textOf(value) ?? ''))
            .filter((value) => value.length > 0);

        authors.push({
            name,
            affiliation: affiliations.length > 0 ? affiliations.join('; ') : null,
        });
    }

    return authors;
}

/**
 * "LastName, ForeName", falling back to initials, the last name alone,
 * or the name of a collective author.
 */
function authorName(node: XmlNode): string | null {
    const lastName = textOf(node['LastName'])?.trim();
    const foreName = (textOf(node['ForeName']) ?? textOf(node['Initials']))?.trim();

    if (lastName) {
        return foreName ? `${lastName}, ${foreName}` : lastName;
    }

    const collective = stripMarkup(textOf(node['CollectiveName']) ?? '');
    return collective || null;
}

/**
 * Email of the last author whose affiliation text contains one.
 */
function findCorrespondingEmail(authors: readonly Author[]): string | null {
    let email: string | null = null;

    for (const author of authors) {
        const found = author.affiliation?.match(EMAIL_PATTERN)?.[0];
        if (found) {
            email = found;
        }
    }

    return email;
}
