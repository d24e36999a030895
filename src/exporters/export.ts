import { writeFileSync } from 'node:fs';
import type { ClassifiedRecord, OutputRow } from '../types/index.js';
import { describeError, OutputError } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';

// ─── Types ───────────────────────────────────────────────

/**
 * Where exported rows go: a file (created or truncated) or an open stream
 * such as stdout.
 */
export type ExportDestination =
    | { kind: 'file'; path: string }
    | { kind: 'stream'; stream: NodeJS.WritableStream; label?: string };

/**
 * Fixed column set, in output order.
 */
export const CSV_COLUMNS = [
    'identifier',
    'title',
    'publicationDate',
    'industryAffiliatedAuthors',
    'correspondingEmail',
] as const satisfies readonly (keyof OutputRow)[];

const AUTHOR_SEPARATOR = '; ';

// ─── Rows ────────────────────────────────────────────────

/**
 * Flatten a classified record into its CSV row.
 */
export function toOutputRow(record: ClassifiedRecord): OutputRow {
    return {
        identifier: record.identifier,
        title: record.title,
        publicationDate: record.publicationDate,
        industryAffiliatedAuthors: record.industryAuthors.join(AUTHOR_SEPARATOR),
        correspondingEmail: record.correspondingEmail ?? '',
    };
}

// ─── CSV encoding ────────────────────────────────────────

/**
 * Quote a field when it contains a comma, quote or line break,
 * doubling any quotes inside it.
 */
export function escapeCsvField(value: string): string {
    if (/[",\r\n]/.test(value)) {
        return `"${value.replace(/"/g, '""')}"`;
    }
    return value;
}

/**
 * Header line plus one line per row, each terminated by "\n".
 */
export function formatCsv(rows: readonly OutputRow[]): string {
    let csv = CSV_COLUMNS.join(',') + '\n';
    for (const row of rows) {
        csv += CSV_COLUMNS.map((column) => escapeCsvField(row[column])).join(',') + '\n';
    }
    return csv;
}

// ─── Main Export Function ────────────────────────────────

/**
 * Write rows as UTF-8 CSV to the destination. Resolves to the number of data
 * rows written, which always equals `rows.length`.
 */
export async function exportRows(rows: readonly OutputRow[], destination: ExportDestination): Promise<number> {
    const content = formatCsv(rows);

    if (destination.kind === 'file') {
        try {
            writeFileSync(destination.path, content, 'utf-8');
        } catch (error) {
            throw new OutputError(
                destination.path,
                `Cannot write output file ${destination.path}: ${describeError(error)}`,
                { cause: error }
            );
        }
    } else {
        await writeToStream(destination.stream, content, destination.label ?? 'stream');
    }

    getLogger().debug(
        { rows: rows.length, destination: destination.kind === 'file' ? destination.path : destination.label ?? 'stream' },
        'Rows exported'
    );

    return rows.length;
}

/**
 * Resolve once the stream has accepted the content. A closed reader on the
 * other end of a pipe (EPIPE) rejects with OutputError.
 */
function writeToStream(stream: NodeJS.WritableStream, content: string, label: string): Promise<void> {
    return new Promise((resolve, reject) => {
        const onError = (error: Error): void => {
            reject(new OutputError(label, `Cannot write output to ${label}: ${error.message}`, { cause: error }));
        };

        // Stays attached after a failed write: the stream emits 'error' after the callback.
        stream.once('error', onError);
        stream.write(content, 'utf-8', (error) => {
            if (error) {
                onError(error);
                return;
            }
            stream.removeListener('error', onError);
            resolve();
        });
    });
}
