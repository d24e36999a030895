import { describe, it, expect, vi, afterEach } from 'vitest';
import { runPipeline } from '../pipeline/pipeline.js';
import { err, ok, type FetchOutcome } from '../types/index.js';
import { RetrievalError, ValidationError } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';
import { readCsv } from './helpers/csv-reader.js';
import { captureStream, FakeSource, rawRecord } from './helpers/fixtures.js';

const HEADER = 'identifier,title,publicationDate,industryAffiliatedAuthors,correspondingEmail';

const industryRecord = rawRecord({
    pmid: '1',
    title: 'Industry study',
    pubDate: '<Year>2024</Year><Month>Jan</Month>',
    authors: [
        { last: 'Doe', fore: 'Jane', affiliations: ['Dept. of Oncology, Pharma Corp Ltd. jane@pharmacorp.example'] },
        { last: 'Roe', fore: 'Rick', affiliations: ['Department of Medicine, State University'] },
    ],
});

const academicRecord = rawRecord({
    pmid: '3',
    title: 'Academic study',
    pubDate: '<Year>2023</Year>',
    authors: [{ last: 'Poe', fore: 'Pat', affiliations: ['Department of Medicine, State University'] }],
});

describe('runPipeline', () => {
    afterEach(() => {
        vi.restoreAllMocks();
    });

    it('should skip a malformed record and export the rest', async () => {
        const warn = vi.spyOn(getLogger(), 'warn');
        const source = new FakeSource(['1', '2'], new Map<string, FetchOutcome>([
            ['1', ok(industryRecord)],
            ['2', ok({ identifier: '2', payload: { PubmedData: {} } })],
        ]));
        const output = captureStream();

        const summary = await runPipeline(source, {
            query: 'oncology',
            destination: { kind: 'stream', stream: output.stream },
        });

        expect(output.text()).toBe(
            `${HEADER}\n` +
            '1,Industry study,2024-01,"Doe, Jane",jane@pharmacorp.example\n'
        );
        expect(summary).toEqual({
            identifiers: 2,
            parsed: 1,
            industryRecords: 1,
            failures: [{ identifier: '2', stage: 'parse', reason: 'Record 2: missing MedlineCitation element' }],
            rowsWritten: 1,
        });
        expect(warn).toHaveBeenCalledWith(
            expect.objectContaining({ identifier: '2', stage: 'parse' }),
            'Skipping record'
        );
    });

    it('should log the companies behind each classified record', async () => {
        const debug = vi.spyOn(getLogger(), 'debug');
        const source = new FakeSource(['1'], new Map<string, FetchOutcome>([['1', ok(industryRecord)]]));

        await runPipeline(source, {
            query: 'oncology',
            destination: { kind: 'stream', stream: captureStream().stream },
        });

        expect(debug).toHaveBeenCalledWith(
            {
                identifier: '1',
                authors: 2,
                industryAuthors: ['Doe, Jane'],
                companies: ['Dept. of Oncology, Pharma Corp Ltd. jane@pharmacorp.example'],
            },
            'Record classified'
        );
    });

    it('should write a header-only document when nothing matches', async () => {
        const source = new FakeSource([]);
        const output = captureStream();

        const summary = await runPipeline(source, {
            query: 'nothing',
            destination: { kind: 'stream', stream: output.stream },
        });

        expect(output.text()).toBe(`${HEADER}\n`);
        expect(summary.rowsWritten).toBe(0);
        expect(source.fetchCalls).toEqual([]);
    });

    it('should export every record by default and only industry ones on request', async () => {
        const outcomes = new Map<string, FetchOutcome>([
            ['1', ok(industryRecord)],
            ['3', ok(academicRecord)],
        ]);

        const all = captureStream();
        await runPipeline(new FakeSource(['1', '3'], outcomes), {
            query: 'study',
            destination: { kind: 'stream', stream: all.stream },
        });

        const filtered = captureStream();
        const summary = await runPipeline(new FakeSource(['1', '3'], outcomes), {
            query: 'study',
            destination: { kind: 'stream', stream: filtered.stream },
            industryOnly: true,
        });

        expect(readCsv(all.text()).slice(1).map((row) => row[0])).toEqual(['1', '3']);
        expect(readCsv(all.text())[2]).toEqual(['3', 'Academic study', '2023', '', '']);
        expect(readCsv(filtered.text()).slice(1).map((row) => row[0])).toEqual(['1']);
        expect(summary.industryRecords).toBe(1);
    });

    it('should pass the query and limit to the source', async () => {
        const source = new FakeSource([]);

        await runPipeline(source, {
            query: '  cancer  ',
            maxResults: 5,
            destination: { kind: 'stream', stream: captureStream().stream },
        });

        expect(source.searchCalls).toEqual([{ query: 'cancer', limit: 5 }]);
    });

    it('should classify with custom keywords', async () => {
        const source = new FakeSource(['3'], new Map<string, FetchOutcome>([['3', ok(academicRecord)]]));
        const output = captureStream();

        await runPipeline(source, {
            query: 'study',
            keywords: ['State University'],
            destination: { kind: 'stream', stream: output.stream },
        });

        expect(readCsv(output.text())[1]?.[3]).toBe('Poe, Pat');
    });

    it('should record identifiers the fetcher could not deliver', async () => {
        const source = new FakeSource(['1', '9'], new Map<string, FetchOutcome>([
            ['1', ok(industryRecord)],
            ['9', err({ identifier: '9', reason: 'not present in fetch response' })],
        ]));

        const summary = await runPipeline(source, {
            query: 'study',
            destination: { kind: 'stream', stream: captureStream().stream },
        });

        expect(summary.failures).toEqual([{ identifier: '9', stage: 'fetch', reason: 'not present in fetch response' }]);
        expect(summary.rowsWritten).toBe(1);
    });

    it('should propagate retrieval failures without writing output', async () => {
        const source = new FakeSource([]);
        vi.spyOn(source, 'searchIds').mockRejectedValue(new RetrievalError('PubMed search failed: Network error: down'));
        const output = captureStream();

        await expect(runPipeline(source, {
            query: 'asthma',
            destination: { kind: 'stream', stream: output.stream },
        })).rejects.toBeInstanceOf(RetrievalError);
        expect(output.text()).toBe('');
    });

    it('should reject a blank query before searching', async () => {
        const source = new FakeSource(['1']);

        await expect(runPipeline(source, {
            query: ' \t ',
            destination: { kind: 'stream', stream: captureStream().stream },
        })).rejects.toBeInstanceOf(ValidationError);
        expect(source.searchCalls).toEqual([]);
    });
});
