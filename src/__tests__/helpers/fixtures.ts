import { Writable } from 'node:stream';
import { readArticleSet } from '../../sources/pubmed.js';
import type { FetchOutcome, LiteratureSource, RawRecord, RecordIdentifier } from '../../types/index.js';

export interface AuthorFixture {
    last?: string;
    fore?: string;
    collective?: string;
    affiliations?: string[];
}

export interface ArticleFixture {
    pmid: string;
    title?: string;
    /** Inner markup of <PubDate> */
    pubDate?: string;
    /** Inner markup of <ArticleDate> */
    articleDate?: string;
    authors?: AuthorFixture[];
}

function authorXml(author: AuthorFixture): string {
    const parts: string[] = [];
    if (author.last) parts.push(`<LastName>${author.last}</LastName>`);
    if (author.fore) parts.push(`<ForeName>${author.fore}</ForeName>`);
    if (author.collective) parts.push(`<CollectiveName>${author.collective}</CollectiveName>`);
    for (const affiliation of author.affiliations ?? []) {
        parts.push(`<AffiliationInfo><Affiliation>${affiliation}</Affiliation></AffiliationInfo>`);
    }
    return `<Author ValidYN="Y">${parts.join('')}</Author>`;
}

/**
 * One <PubmedArticle> element in the shape efetch returns.
 */
export function articleXml(fixture: ArticleFixture): string {
    const authors = fixture.authors ?? [];
    return `
  <PubmedArticle>
    <MedlineCitation Status="MEDLINE" Owner="NLM">
      <PMID Version="1">${fixture.pmid}</PMID>
      <Article PubModel="Print">
        <Journal>
          <JournalIssue CitedMedium="Internet">
            <PubDate>${fixture.pubDate ?? ''}</PubDate>
          </JournalIssue>
          <Title>Journal of Test Studies</Title>
        </Journal>
        <ArticleTitle>${fixture.title ?? ''}</ArticleTitle>
        ${authors.length > 0 ? `<AuthorList CompleteYN="Y">${authors.map(authorXml).join('')}</AuthorList>` : ''}
        ${fixture.articleDate ? `<ArticleDate DateType="Electronic">${fixture.articleDate}</ArticleDate>` : ''}
      </Article>
    </MedlineCitation>
    <PubmedData>
      <ArticleIdList>
        <ArticleId IdType="pubmed">${fixture.pmid}</ArticleId>
      </ArticleIdList>
    </PubmedData>
  </PubmedArticle>`;
}

export interface BookFixture {
    pmid: string;
    bookTitle?: string;
    /** Chapter title; omitted for a whole book */
    title?: string;
    /** Inner markup of the book's <PubDate> */
    pubDate?: string;
    authors?: AuthorFixture[];
}

/**
 * One <PubmedBookArticle> element, as efetch returns for bookshelf records.
 */
export function bookArticleXml(fixture: BookFixture): string {
    const authors = fixture.authors ?? [];
    return `
  <PubmedBookArticle>
    <BookDocument>
      <PMID Version="1">${fixture.pmid}</PMID>
      <ArticleIdList>
        <ArticleId IdType="bookaccession">NBK000001</ArticleId>
      </ArticleIdList>
      <Book>
        <Publisher><PublisherName>Test Publishing</PublisherName></Publisher>
        <BookTitle book="testbook">${fixture.bookTitle ?? ''}</BookTitle>
        <PubDate>${fixture.pubDate ?? ''}</PubDate>
        <AuthorList Type="editors"><Author ValidYN="Y"><LastName>Editor</LastName><ForeName>Ed</ForeName></Author></AuthorList>
      </Book>
      ${fixture.title ? `<ArticleTitle book="testbook" part="ch1">${fixture.title}</ArticleTitle>` : ''}
      ${authors.length > 0 ? `<AuthorList Type="authors">${authors.map(authorXml).join('')}</AuthorList>` : ''}
    </BookDocument>
    <PubmedBookData>
      <ArticleIdList>
        <ArticleId IdType="pubmed">${fixture.pmid}</ArticleId>
      </ArticleIdList>
    </PubmedBookData>
  </PubmedBookArticle>`;
}

export function articleSetXml(articles: string[], options: { doctype?: boolean } = {}): string {
    const doctype = options.doctype
        ? '<!DOCTYPE PubmedArticleSet PUBLIC "-//NLM//DTD PubMedArticle, 1st January 2024//EN" "https://dtd.nlm.nih.gov/ncbi/pubmed/out/pubmed_240101.dtd">\n'
        : '';
    return `<?xml version="1.0" ?>\n${doctype}<PubmedArticleSet>${articles.join('')}\n</PubmedArticleSet>\n`;
}

/**
 * Raw record for a single fixture article, as the fetcher would hand it over.
 */
export function rawRecord(fixture: ArticleFixture): RawRecord {
    const [record] = readArticleSet(articleSetXml([articleXml(fixture)]));
    if (!record) {
        throw new Error(`Fixture ${fixture.pmid} produced no record`);
    }
    return record;
}

export function jsonResponse(body: unknown, status = 200): Response {
    return new Response(JSON.stringify(body), {
        status,
        headers: { 'content-type': 'application/json; charset=UTF-8' },
    });
}

export function xmlResponse(body: string, status = 200): Response {
    return new Response(body, {
        status,
        headers: { 'content-type': 'text/xml; charset=UTF-8' },
    });
}

/**
 * Writable that keeps everything written to it.
 */
export function captureStream(): { stream: Writable; text: () => string } {
    const chunks: string[] = [];
    const stream = new Writable({
        write(chunk, _encoding, callback) {
            chunks.push(String(chunk));
            callback();
        },
    });
    return { stream, text: () => chunks.join('') };
}

/**
 * In-memory literature source returning canned identifiers and outcomes.
 */
export class FakeSource implements LiteratureSource {
    readonly name = 'Fake';
    readonly searchCalls: Array<{ query: string; limit: number | undefined }> = [];
    readonly fetchCalls: RecordIdentifier[][] = [];

    constructor(
        private readonly ids: RecordIdentifier[],
        private readonly outcomes: Map<RecordIdentifier, FetchOutcome> = new Map()
    ) {}

    async searchIds(query: string, limit?: number): Promise<RecordIdentifier[]> {
        this.searchCalls.push({ query, limit });
        return [...this.ids];
    }

    async fetchRecords(ids: readonly RecordIdentifier[]): Promise<Map<RecordIdentifier, FetchOutcome>> {
        this.fetchCalls.push([...ids]);
        return new Map(this.outcomes);
    }
}
