import { cosmiconfig } from 'cosmiconfig';
import { z } from 'zod';
import { DEFAULT_CONFIG, type HopGraphConfig } from '../types/index.js';
import { ConfigError } from './errors.js';
import { getLogger } from './logger.js';

const nonNegativeInt = z.number().int().nonnegative();

const configSchema = z.object({
    search: z.string().trim().min(1).optional(),
    seedMinCitations: nonNegativeInt,
    seedMinYear: nonNegativeInt,
    hops: nonNegativeInt,
    minCitations: nonNegativeInt,
    minYear: nonNegativeInt,
    select: z.array(z.string().regex(/^[a-z_.]+$/, 'field names are lowercase identifiers')).min(1),
    chunkSize: z.number().int().min(1).max(100),
    perPage: z.number().int().min(1).max(200),
    delayBetweenHopsMs: z.number().nonnegative(),
    mailto: z.string().email().optional(),
    concurrency: z.number().int().min(1),
    maxAttempts: z.number().int().min(1),
    backoffBase: z.number().min(1),
    backoffFloor: z.number().nonnegative(),
    requestTimeoutMs: z.number().int().positive(),
    out: z.string().min(1),
    format: z.enum(['json', 'csv']),
    logLevel: z.enum(['error', 'warn', 'info', 'debug', 'silent']),
    jsonLogs: z.boolean(),
});

/**
 * Load configuration from hopgraph.config.json using cosmiconfig.
 * Returns null if no config file is found.
 */
async function loadConfigFile(searchFrom?: string): Promise<Partial<HopGraphConfig> | null> {
    const explorer = cosmiconfig('hopgraph', {
        searchPlaces: ['hopgraph.config.json', '.hopgraphrc.json', '.hopgraphrc'],
    });

    const result = await explorer.search(searchFrom);
    if (!result || result.isEmpty) return null;

    getLogger().debug({ path: result.filepath }, 'Loaded config file');
    const parsed = configSchema.partial().safeParse(result.config);
    if (!parsed.success) {
        throw new ConfigError(`Invalid config file ${result.filepath}: ${formatIssues(parsed.error)}`);
    }
    return parsed.data;
}

/**
 * Read relevant environment variables.
 */
export function loadEnvVars(env: NodeJS.ProcessEnv = process.env): Partial<HopGraphConfig> {
    const config: Partial<HopGraphConfig> = {};

    const mailto = env['OPENALEX_MAILTO'];
    if (mailto) config.mailto = mailto;

    const concurrency = env['HOPGRAPH_CONCURRENCY'];
    if (concurrency) config.concurrency = Number(concurrency);

    const logLevel = env['HOPGRAPH_LOG_LEVEL'];
    if (logLevel) {
        const level = configSchema.shape.logLevel.safeParse(logLevel);
        if (!level.success) throw new ConfigError(`Invalid HOPGRAPH_LOG_LEVEL: ${logLevel}`);
        config.logLevel = level.data;
    }

    return config;
}

/**
 * Merge configuration from multiple sources and validate the result.
 * Precedence: overrides (CLI flags) > environment variables > config file > defaults
 *
 * @throws ConfigError when the merged configuration is invalid
 */
export async function resolveConfig(
    overrides: Partial<HopGraphConfig>,
    options: { env?: NodeJS.ProcessEnv; searchFrom?: string } = {}
): Promise<HopGraphConfig> {
    const fileConfig = await loadConfigFile(options.searchFrom);
    const envConfig = loadEnvVars(options.env);

    return validateConfig({
        ...DEFAULT_CONFIG,
        ...fileConfig,
        ...envConfig,
        ...withoutUndefined(overrides),
    });
}

/**
 * Validate a complete configuration object.
 */
export function validateConfig(config: HopGraphConfig): HopGraphConfig {
    const parsed = configSchema.safeParse(config);
    if (!parsed.success) {
        throw new ConfigError(`Invalid configuration: ${formatIssues(parsed.error)}`);
    }
    return parsed.data;
}

function formatIssues(error: z.ZodError): string {
    return error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ');
}

/**
 * CLI flags left unset must not shadow lower-precedence sources.
 */
function withoutUndefined(values: Partial<HopGraphConfig>): Partial<HopGraphConfig> {
    const result: Partial<HopGraphConfig> = {};
    for (const [key, value] of Object.entries(values)) {
        if (value !== undefined) Object.assign(result, { [key]: value });
    }
    return result;
}
