#!/usr/bin/env node
import { Command } from 'commander';
import { resolveConfig } from '../utils/config.js';
import { initLogger, getLogger } from '../utils/logger.js';
import { createHttpClient } from '../utils/http-client.js';
import { ConfigError, ExpansionError } from '../utils/errors.js';
import { OpenAlexClient } from '../sources/openalex.js';
import { buildSeed } from '../builder/seed.js';
import { expandFrontier } from '../builder/frontier-expander.js';
import { exportResult } from '../exporters/export.js';
import type { HopGraphConfig } from '../types/index.js';

const VERSION = '0.1.0';

const program = new Command();

program
    .name('hopgraph')
    .description('Collect a multi-hop citation graph from OpenAlex.')
    .version(VERSION);

const toInt = (value: string | undefined): number | undefined =>
    value === undefined ? undefined : Number(value);

// ─── BUILD command ────────────────────────────────────────

program
    .command('build')
    .description('Build a seed set from a search and expand it by citing works')
    .requiredOption('-s, --search <terms>', 'Seed search terms')
    .option('--seed-min-citations <n>', 'Seed: cited_by_count strictly above')
    .option('--seed-min-year <year>', 'Seed: publication_year strictly above')
    .option('-H, --hops <n>', 'Number of hops to expand')
    .option('--min-citations <n>', 'Hops: cited_by_count strictly above')
    .option('--min-year <year>', 'Hops: publication_year strictly above')
    .option('--select <fields>', 'Comma-separated field projection')
    .option('--chunk-size <n>', 'Frontier IDs per request')
    .option('--delay <ms>', 'Pause between hops in milliseconds')
    .option('-c, --concurrency <n>', 'Maximum requests in flight')
    .option('--max-attempts <n>', 'Attempts per request before giving up')
    .option('--mailto <email>', 'Contact email for the OpenAlex polite pool')
    .option('-o, --out <path>', 'Output file path')
    .option('-f, --format <format>', 'Output format: json | csv')
    .option('--log-level <level>', 'Log level: debug | info | warn | error')
    .option('--json-logs', 'Output JSON logs')
    .action(async (opts) => {
        const overrides: Partial<HopGraphConfig> = {
            search: opts.search,
            seedMinCitations: toInt(opts.seedMinCitations),
            seedMinYear: toInt(opts.seedMinYear),
            hops: toInt(opts.hops),
            minCitations: toInt(opts.minCitations),
            minYear: toInt(opts.minYear),
            select: typeof opts.select === 'string' ? opts.select.split(',').map((f: string) => f.trim()) : undefined,
            chunkSize: toInt(opts.chunkSize),
            delayBetweenHopsMs: toInt(opts.delay),
            concurrency: toInt(opts.concurrency),
            maxAttempts: toInt(opts.maxAttempts),
            mailto: opts.mailto,
            out: opts.out,
            format: opts.format,
            logLevel: opts.logLevel,
            jsonLogs: opts.jsonLogs,
        };

        let config: HopGraphConfig;
        try {
            config = await resolveConfig(overrides);
        } catch (error) {
            getLogger().error({ error }, error instanceof ConfigError ? error.message : 'Failed to load configuration');
            process.exitCode = 2;
            return;
        }

        initLogger({ level: config.logLevel, jsonLogs: config.jsonLogs });
        const logger = getLogger();

        const httpClient = createHttpClient({
            mailto: config.mailto,
            concurrency: config.concurrency,
            maxAttempts: config.maxAttempts,
            backoffBase: config.backoffBase,
            backoffFloor: config.backoffFloor,
            timeout: config.requestTimeoutMs,
            version: VERSION,
        });
        const client = new OpenAlexClient(httpClient);

        const controller = new AbortController();
        process.once('SIGINT', () => {
            logger.warn('Interrupted, cancelling outstanding requests');
            controller.abort();
        });

        try {
            const seed = await buildSeed(client, {
                search: config.search ?? '',
                minCitations: config.seedMinCitations,
                minYear: config.seedMinYear,
                select: config.select,
                perPage: config.perPage,
                signal: controller.signal,
            });

            if (seed.length === 0) {
                logger.warn('No seed works found, nothing to expand');
            }

            const result = await expandFrontier(seed, client, {
                hops: config.hops,
                minCitations: config.minCitations,
                minYear: config.minYear,
                select: config.select,
                chunkSize: config.chunkSize,
                delayBetweenHopsMs: config.delayBetweenHopsMs,
                signal: controller.signal,
            });

            exportResult(result, config.out, config.format);
            logger.info(
                {
                    works: result.works.length,
                    layers: result.layers.map((l) => l.length),
                    stopReason: result.stopReason,
                    requests: httpClient.getRequestCount(),
                    out: config.out,
                },
                'Build complete!'
            );
        } catch (error) {
            if (error instanceof ExpansionError) {
                logger.error(
                    { hop: error.hop, collected: error.collected, completedLayers: error.layers.length, error: error.cause },
                    'Expansion failed'
                );
            } else {
                logger.error({ error }, 'Build failed');
            }
            process.exitCode = 1;
        }
    });

await program.parseAsync();
