import { Command, CommanderError, InvalidArgumentError } from 'commander';
import type { ExportDestination } from '../exporters/export.js';
import { runPipeline } from '../pipeline/pipeline.js';
import { PubMedClient } from '../sources/pubmed.js';
import type { GetPapersConfig, LiteratureSource, LogLevel } from '../types/index.js';
import { resolveConfig } from '../utils/config.js';
import {
    describeError,
    OutputError,
    PipelineError,
    RetrievalError,
    ValidationError,
} from '../utils/errors.js';
import { createHttpClient } from '../utils/http-client.js';
import { getLogger, initLogger } from '../utils/logger.js';

export const VERSION = '0.1.0';

/**
 * Seams for running the CLI in-process: tests swap in a fake source,
 * capture the output streams and keep logging quiet.
 */
export interface CliDependencies {
    createSource?: (config: GetPapersConfig) => LiteratureSource;
    stdout?: NodeJS.WritableStream;
    stderr?: NodeJS.WritableStream;
    configureLogging?: (options: { level: LogLevel; jsonLogs: boolean }) => void;
    /** Directory to look for a config file in (defaults to the working directory) */
    searchFrom?: string;
}

interface CliOptions {
    file?: string;
    debug: boolean;
    maxResults?: number;
    keywords?: string[];
    industryOnly: boolean;
    email?: string;
    jsonLogs: boolean;
}

export function parsePositiveInt(value: string): number {
    const parsed = Number(value);
    if (!/^\d+$/.test(value.trim()) || !Number.isInteger(parsed) || parsed <= 0) {
        throw new InvalidArgumentError('Must be a positive integer.');
    }
    return parsed;
}

export function parseKeywords(value: string): string[] {
    const keywords = value
        .split(',')
        .map((keyword) => keyword.trim())
        .filter((keyword) => keyword.length > 0);

    if (keywords.length === 0) {
        throw new InvalidArgumentError('At least one keyword is required.');
    }
    return keywords;
}

function createPubMedSource(config: GetPapersConfig): LiteratureSource {
    return new PubMedClient({
        apiKey: config.apiKey,
        email: config.email,
        tool: config.tool,
        httpClient: createHttpClient({
            timeout: config.timeoutMs,
            retries: config.retries,
            retryDelayMs: config.retryDelayMs,
            version: VERSION,
            email: config.email,
        }),
    });
}

function errorLabel(error: PipelineError): string {
    if (error instanceof ValidationError) return 'Input error';
    if (error instanceof RetrievalError) return 'Retrieval error';
    if (error instanceof OutputError) return 'Output error';
    return 'Error';
}

/**
 * Collect only the flags the user actually set, so they don't mask
 * config-file values with defaults.
 */
function toConfigFlags(opts: CliOptions): Partial<GetPapersConfig> {
    const flags: Partial<GetPapersConfig> = {};
    if (opts.debug) flags.logLevel = 'debug';
    if (opts.jsonLogs) flags.jsonLogs = true;
    if (opts.maxResults !== undefined) flags.maxResults = opts.maxResults;
    if (opts.keywords) flags.keywords = opts.keywords;
    if (opts.industryOnly) flags.industryOnly = true;
    if (opts.email) flags.email = opts.email;
    if (opts.file) flags.file = opts.file;
    return flags;
}

/**
 * Parse arguments, run the pipeline once and return the process exit code.
 */
export async function main(argv: readonly string[], deps: CliDependencies = {}): Promise<number> {
    const stdout = deps.stdout ?? process.stdout;
    const stderr = deps.stderr ?? process.stderr;
    const configureLogging = deps.configureLogging ?? initLogger;
    const createSource = deps.createSource ?? createPubMedSource;

    async function run(query: string, opts: CliOptions): Promise<number> {
        const flags = toConfigFlags(opts);
        const initialLogging = { level: flags.logLevel ?? 'info', jsonLogs: flags.jsonLogs ?? false };
        configureLogging(initialLogging);

        try {
            const config = await resolveConfig(flags, { searchFrom: deps.searchFrom });
            if (config.logLevel !== initialLogging.level || config.jsonLogs !== initialLogging.jsonLogs) {
                configureLogging({ level: config.logLevel, jsonLogs: config.jsonLogs });
            }

            const destination: ExportDestination = config.file
                ? { kind: 'file', path: config.file }
                : { kind: 'stream', stream: stdout, label: 'stdout' };

            const summary = await runPipeline(createSource(config), {
                query,
                destination,
                maxResults: config.maxResults,
                keywords: config.keywords,
                industryOnly: config.industryOnly,
            });

            if (config.file) {
                getLogger().info({ file: config.file, rows: summary.rowsWritten }, 'Results saved');
            }
            return 0;
        } catch (error) {
            getLogger().debug({ err: error }, 'Run failed');
            const message = error instanceof PipelineError
                ? `${errorLabel(error)}: ${error.message}`
                : `Unexpected error: ${describeError(error)}`;
            stderr.write(`${message}\n`);
            return 1;
        }
    }

    let exitCode = 0;

    const program = new Command();

    program
        .name('get-papers-list')
        .description('Fetch PubMed papers for a query and flag authors affiliated with pharmaceutical or biotech companies.')
        .version(VERSION)
        .argument('<query>', 'PubMed query (full PubMed search syntax)')
        .option('-f, --file <path>', 'Filename to save results as CSV (prints to stdout if omitted)')
        .option('-d, --debug', 'Enable debug logging', false)
        .option('-n, --max-results <n>', 'Maximum number of papers to retrieve', parsePositiveInt)
        .option('--keywords <list>', 'Comma-separated industry keywords, replacing the defaults', parseKeywords)
        .option('--industry-only', 'Only export papers with at least one industry-affiliated author', false)
        .option('--email <address>', 'Contact email sent with NCBI requests')
        .option('--json-logs', 'Output JSON logs', false)
        .exitOverride()
        .configureOutput({
            writeOut: (text) => stdout.write(text),
            writeErr: (text) => stderr.write(text),
        })
        .action(async (query: string, opts: CliOptions) => {
            exitCode = await run(query, opts);
        });

    try {
        await program.parseAsync([...argv]);
    } catch (error) {
        if (error instanceof CommanderError) return error.exitCode;
        throw error;
    }

    return exitCode;
}
