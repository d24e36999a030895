import { XMLParser, XMLValidator } from 'fast-xml-parser';
import { z } from 'zod';
import {
    DEFAULT_CONFIG,
    err,
    ok,
    type FetchOutcome,
    type LiteratureSource,
    type LiteratureSourceOptions,
    type RawRecord,
    type RecordIdentifier,
} from '../types/index.js';
import { RetrievalError } from '../utils/errors.js';
import { createHttpClient, HttpError, type HttpClient, type HttpResponse } from '../utils/http-client.js';
import { getLogger } from '../utils/logger.js';
import { validateLimit, validateQuery } from '../utils/validation.js';
import { asArray, isXmlNode, pick, textOf } from './utils.js';

const EUTILS_BASE = 'https://eutils.ncbi.nlm.nih.gov/entrez/eutils';

/**
 * Identifiers per efetch call. NCBI asks for POST above 200 UIDs; staying at
 * 200 keeps every call a short GET.
 */
export const FETCH_BATCH_SIZE = 200;

/**
 * E-utilities esearch response (subset of relevant fields).
 */
const ESearchResponseSchema = z.object({
    esearchresult: z.object({
        count: z.string().optional(),
        idlist: z.array(z.string()).optional(),
        ERROR: z.string().optional(),
    }),
});

/**
 * Elements that may repeat under their parent. Listing them keeps a single
 * occurrence from collapsing into a bare object.
 */
const ARRAY_TAGS = new Set(['PubmedArticle', 'PubmedBookArticle', 'Author', 'AffiliationInfo', 'ArticleDate']);

const xmlParser = new XMLParser({
    ignoreAttributes: false,
    attributeNamePrefix: '@_',
    textNodeName: '#text',
    parseTagValue: false,
    parseAttributeValue: false,
    trimValues: true,
    processEntities: true,
    htmlEntities: true,
    // Titles and affiliations may carry inline markup; keep them as raw text.
    stopNodes: ['*.ArticleTitle', '*.VernacularTitle', '*.BookTitle', '*.Affiliation'],
    isArray: (tagName: string) => ARRAY_TAGS.has(tagName),
});

/**
 * Split an efetch `PubmedArticleSet` document into one raw record per article,
 * keyed by PMID. Articles without a PMID cannot be matched to a request and
 * are left out.
 */
export function readArticleSet(xml: string): RawRecord[] {
    const validation = XMLValidator.validate(xml);
    if (validation !== true) {
        throw new RetrievalError(
            `Malformed fetch response: ${validation.err.msg} (line ${validation.err.line})`
        );
    }

    const document: unknown = xmlParser.parse(xml);
    if (!isXmlNode(document) || !('PubmedArticleSet' in document)) {
        throw new RetrievalError('Malformed fetch response: no PubmedArticleSet element');
    }

    const set = document['PubmedArticleSet'];
    const articles = [
        ...asArray(pick(set, 'PubmedArticle')),
        ...asArray(pick(set, 'PubmedBookArticle')),
    ];

    const records: RawRecord[] = [];
    for (const article of articles) {
        const pmid = textOf(pick(article, 'MedlineCitation', 'PMID'))
            ?? textOf(pick(article, 'BookDocument', 'PMID'));

        if (!pmid?.trim()) {
            getLogger().debug('Skipping article without PMID');
            continue;
        }

        records.push({ identifier: pmid.trim(), payload: article });
    }

    return records;
}

/**
 * PubMed source adapter over NCBI E-utilities.
 *
 * @see https://www.ncbi.nlm.nih.gov/books/NBK25499/
 */
export class PubMedClient implements LiteratureSource {
    readonly name = 'PubMed';
    private readonly httpClient: HttpClient;
    private apiKey?: string;
    private email?: string;
    private tool: string;

    constructor(options?: LiteratureSourceOptions & { httpClient?: HttpClient }) {
        this.apiKey = options?.apiKey;
        this.email = options?.email;
        this.tool = options?.tool ?? DEFAULT_CONFIG.tool;
        this.httpClient = options?.httpClient ?? createHttpClient({ email: options?.email });
    }

    async searchIds(query: string, limit = DEFAULT_CONFIG.maxResults): Promise<RecordIdentifier[]> {
        const term = validateQuery(query);
        const retmax = validateLimit(limit);

        const params = new URLSearchParams({
            db: 'pubmed',
            term,
            retmode: 'json',
            retmax: String(retmax),
        });

        this.addAuthParams(params);

        const url = `${EUTILS_BASE}/esearch.fcgi?${params.toString()}`;
        getLogger().debug({ url }, 'PubMed search');

        const response = await this.get(url, 'search');

        const parsed = ESearchResponseSchema.safeParse(response.data);
        if (!parsed.success) {
            throw new RetrievalError('Malformed search response: missing esearchresult');
        }

        const { idlist, count, ERROR } = parsed.data.esearchresult;
        if (!idlist) {
            throw new RetrievalError(
                ERROR ? `PubMed search failed: ${ERROR}` : 'Malformed search response: missing idlist'
            );
        }

        const ids = [...new Set(idlist.map((id) => id.trim()).filter(Boolean))].slice(0, retmax);
        getLogger().debug({ count, returned: ids.length }, 'PubMed search results');

        return ids;
    }

    /**
     * Fetch full records, at most `FETCH_BATCH_SIZE` ids per efetch call so
     * the request URL stays within server limits. Batches run one after another.
     */
    async fetchRecords(ids: readonly RecordIdentifier[]): Promise<Map<RecordIdentifier, FetchOutcome>> {
        const outcomes = new Map<RecordIdentifier, FetchOutcome>();
        if (ids.length === 0) return outcomes;

        const requested = [...new Set(ids)];
        const found = new Map<RecordIdentifier, RawRecord>();

        for (let start = 0; start < requested.length; start += FETCH_BATCH_SIZE) {
            const batch = requested.slice(start, start + FETCH_BATCH_SIZE);
            for (const record of await this.fetchBatch(batch)) {
                found.set(record.identifier, record);
            }
        }

        for (const id of requested) {
            const record = found.get(id);
            outcomes.set(
                id,
                record ? ok(record) : err({ identifier: id, reason: 'not present in fetch response' })
            );
        }

        return outcomes;
    }

    // ─── Private helpers ──────────────────────────────────────

    private async fetchBatch(batch: readonly RecordIdentifier[]): Promise<RawRecord[]> {
        const params = new URLSearchParams({
            db: 'pubmed',
            id: batch.join(','),
            retmode: 'xml',
        });

        this.addAuthParams(params);

        const url = `${EUTILS_BASE}/efetch.fcgi?${params.toString()}`;
        getLogger().debug({ url, ids: batch.length }, 'PubMed fetch');

        const response = await this.get(url, 'fetch');
        if (typeof response.data !== 'string') {
            throw new RetrievalError('Malformed fetch response: expected XML');
        }

        return readArticleSet(response.data);
    }

    private async get(url: string, stage: 'search' | 'fetch'): Promise<HttpResponse> {
        try {
            return await this.httpClient.request(url);
        } catch (error) {
            if (error instanceof HttpError) {
                throw new RetrievalError(`PubMed ${stage} failed: ${error.message}`, { cause: error });
            }
            throw error;
        }
    }

    private addAuthParams(params: URLSearchParams): void {
        params.set('tool', this.tool);
        if (this.apiKey) {
            params.set('api_key', this.apiKey);
        }
        if (this.email) {
            params.set('email', this.email);
        }
    }
}
