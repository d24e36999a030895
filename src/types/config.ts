/**
 * Log level options.
 */
export type LogLevel = 'error' | 'warn' | 'info' | 'debug' | 'silent';

/**
 * Affiliation keywords marking an author as industry-affiliated.
 * Matched case-insensitively as substrings, so short entries also hit inside
 * words: "Inc" in "Princeton", "Lab" in "Laboratory of Genetics". Replace the
 * list through config or `--keywords` when those false positives matter.
 */
export const DEFAULT_INDUSTRY_KEYWORDS: readonly string[] = [
    'Inc',
    'Ltd',
    'Corp',
    'Corporation',
    'Pharma',
    'Biotech',
    'Biopharma',
    'HealthTech',
    'Lab',
    'Research Institute',
    'Company',
    'Therapeutics',
    'Healthcare',
];

/**
 * Full configuration merged from CLI flags, env vars, and config file.
 */
export interface GetPapersConfig {
    // Search
    maxResults: number;

    // Classification
    keywords: string[];
    industryOnly: boolean;

    // Output (stdout when absent)
    file?: string;

    // Service
    email?: string;
    apiKey?: string;
    tool: string;
    timeoutMs: number;
    retries: number;
    retryDelayMs: number;

    // Logging
    logLevel: LogLevel;
    jsonLogs: boolean;
}

/**
 * Default configuration values.
 */
export const DEFAULT_CONFIG: GetPapersConfig = {
    maxResults: 100,
    keywords: [...DEFAULT_INDUSTRY_KEYWORDS],
    industryOnly: false,
    tool: 'get-papers-list',
    timeoutMs: 30000,
    retries: 2,
    retryDelayMs: 500,
    logLevel: 'info',
    jsonLogs: false,
};
