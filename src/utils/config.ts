import { cosmiconfig } from 'cosmiconfig';
import { z } from 'zod';
import { DEFAULT_CONFIG, type GetPapersConfig } from '../types/index.js';
import { ValidationError } from './errors.js';
import { getLogger } from './logger.js';
import { MAX_RESULT_LIMIT } from './validation.js';

const FileConfigSchema = z
    .object({
        maxResults: z.number().int().positive().max(MAX_RESULT_LIMIT),
        keywords: z.array(z.string().trim().min(1)).min(1),
        industryOnly: z.boolean(),
        email: z.string().min(1),
        apiKey: z.string().min(1),
        tool: z.string().min(1),
        timeoutMs: z.number().int().positive(),
        retries: z.number().int().min(0),
        retryDelayMs: z.number().int().min(0),
        logLevel: z.enum(['error', 'warn', 'info', 'debug', 'silent']),
        jsonLogs: z.boolean(),
    })
    .partial()
    .strict();

export type FileConfig = z.infer<typeof FileConfigSchema>;

/**
 * Load configuration from getpapers.config.json (or a "getpapers" key in
 * package.json) using cosmiconfig.
 * Returns null when no config file is found; defaults apply.
 * A file that is found but has the wrong shape is a ValidationError.
 */
async function loadConfigFile(searchFrom?: string): Promise<FileConfig | null> {
    const explorer = cosmiconfig('getpapers', {
        searchPlaces: ['getpapers.config.json', 'package.json'],
    });

    let result: Awaited<ReturnType<typeof explorer.search>>;
    try {
        result = await explorer.search(searchFrom);
    } catch (error) {
        getLogger().warn({ error }, 'Failed to load config file, using defaults');
        return null;
    }

    if (!result || result.isEmpty) {
        return null;
    }

    const parsed = FileConfigSchema.safeParse(result.config);
    if (!parsed.success) {
        const issues = parsed.error.issues
            .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
            .join('; ');
        throw new ValidationError(`Invalid config file ${result.filepath}: ${issues}`);
    }

    getLogger().debug({ path: result.filepath }, 'Loaded config file');
    return parsed.data;
}

/**
 * Read relevant environment variables.
 */
function loadEnvVars(): Partial<GetPapersConfig> {
    const env: Partial<GetPapersConfig> = {};

    const apiKey = process.env['NCBI_API_KEY'];
    if (apiKey) {
        env.apiKey = apiKey;
    }

    const email = process.env['NCBI_EMAIL'];
    if (email) {
        env.email = email;
    }

    return env;
}

/**
 * Merge configuration from multiple sources.
 * Precedence: CLI flags > environment variables > config file > defaults
 * Flags must leave unset options out rather than pass them as undefined.
 */
export async function resolveConfig(
    cliFlags: Partial<GetPapersConfig>,
    options: { searchFrom?: string } = {}
): Promise<GetPapersConfig> {
    const fileConfig = await loadConfigFile(options.searchFrom);
    const envConfig = loadEnvVars();

    const merged: GetPapersConfig = {
        ...DEFAULT_CONFIG,
        ...fileConfig,
        ...envConfig,
        ...cliFlags,
    };

    return {
        ...merged,
        keywords: [...merged.keywords],
    };
}
