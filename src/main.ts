#!/usr/bin/env node
/**
 * src/main.ts
 *
 * ENTRY POINT: job-watch
 *
 *   job-watch run         one run over every category, then exit
 *   job-watch serve       HTTP trigger (GET / runs once, GET /healthz)
 *   job-watch locations   preview which locations a seed samples
 *
 * This is the only place that reads .env / process.env. Everything below
 * receives the AppConfig built here.
 */

import 'dotenv/config';
import * as fs from 'fs';
import chalk from 'chalk';
import { Command } from 'commander';
import { log } from 'crawlee';
import { z } from 'zod';
import { ConfigError } from './config/env.js';
import { loadAppConfig } from './config/appConfig.js';
import { formatRunSummary, runOrchestrator } from './orchestrator.js';
import { close, createTriggerServer, listen } from './server.js';
import { createNotifier } from './services/notifier.js';
import { PageFetcher } from './sources/pageFetcher.js';
import { createTransport } from './sources/httpTransport.js';
import { createLedgerBackend } from './store/index.js';
import { configureLogging } from './utils/logging.js';
import { defaultRotationSeed, rotateLocations } from './utils/locationRotation.js';
import type { AppConfig } from './config/appConfig.js';
import type { OrchestratorDeps, RunSummary } from './orchestrator.js';
import type { LedgerBackend } from './store/index.js';

const pkg = z
    .object({ version: z.string() })
    .passthrough()
    .parse(JSON.parse(fs.readFileSync(new URL('../package.json', import.meta.url), 'utf-8')));

// ─── Wiring ───────────────────────────────────────────────────────────────────

interface Runtime {
    config: AppConfig;
    backend: LedgerBackend;
    runOnce: () => Promise<RunSummary>;
}

function createRuntime(): Runtime {
    const config = loadAppConfig();
    configureLogging(config.logLevel);

    const backend = createLedgerBackend(config.ledger);
    const deps: OrchestratorDeps = {
        openStore: backend.open,
        fetcher: new PageFetcher(createTransport(config.fetch.proxyUrls), {
            timeoutMs: config.fetch.timeoutMs,
            maxAttempts: config.fetch.maxAttempts,
            backoffBaseMs: config.fetch.backoffBaseMs,
            jitterMs: config.fetch.jitterMs,
        }),
        notifier: createNotifier(config.smtp),
    };

    for (const category of config.categories) {
        if (category.recipients.length === 0) {
            log.warning(`[Main] No EMAIL_RECEIVER_${category.key} set — "${category.name}" postings are stored but not sent.`);
        }
    }

    return { config, backend, runOnce: () => runOrchestrator(config, deps) };
}

// ─── Commands ─────────────────────────────────────────────────────────────────

async function runCommand(): Promise<void> {
    const runtime = createRuntime();
    try {
        const summary = await runtime.runOnce();
        const failed = summary.categories.filter((c) => c.error !== null);
        const line = formatRunSummary(summary);
        console.log(failed.length > 0 ? chalk.yellow(line) : chalk.green(line));
        if (failed.length > 0) process.exitCode = 1;
    } finally {
        await runtime.backend.close();
    }
}

async function serveCommand(): Promise<void> {
    const runtime = createRuntime();
    const server = createTriggerServer(runtime.runOnce);
    const address = await listen(server, runtime.config.server.port, runtime.config.server.host);
    log.info(`[Main] Trigger listening on http://${address.address}:${address.port} (GET / to run, /healthz for liveness)`);

    const shutdown = (signal: string): void => {
        log.info(`[Main] ${signal} received — shutting down.`);
        close(server)
            .then(() => runtime.backend.close())
            .catch((err: unknown) => {
                log.error(`[Main] Shutdown error: ${err instanceof Error ? err.message : String(err)}`);
                process.exitCode = 1;
            });
    };
    process.once('SIGINT', () => shutdown('SIGINT'));
    process.once('SIGTERM', () => shutdown('SIGTERM'));
}

function locationsCommand(options: { seed?: string }): void {
    const config = loadAppConfig();
    const seed = options.seed !== undefined
        ? Number(options.seed)
        : config.search.rotationSeed ?? defaultRotationSeed();
    if (!Number.isInteger(seed)) {
        throw new ConfigError(`--seed must be an integer, got "${options.seed ?? ''}"`);
    }

    const sample = rotateLocations(config.locations, config.search.locationsPerRun, seed);
    console.log(chalk.bold(`Seed ${seed}: ${sample.length} of ${config.locations.length} locations`));
    for (const location of sample) {
        console.log(`  ${chalk.cyan('•')} ${location}`);
    }
}

// ─── Main ─────────────────────────────────────────────────────────────────────

async function main(): Promise<void> {
    try {
        const program = new Command();

        program
            .name('job-watch')
            .description('Watch job-search results and e-mail new matching postings once')
            .version(pkg.version);

        program
            .command('run')
            .description('Run every category once and exit')
            .action(() => runCommand());

        program
            .command('serve')
            .description('Start the HTTP trigger')
            .action(() => serveCommand());

        program
            .command('locations')
            .description('Show the locations a rotation seed samples')
            .option('-s, --seed <n>', 'Rotation seed (defaults to ROTATION_SEED or the current UTC hour)')
            .action((options: { seed?: string }) => locationsCommand(options));

        await program.parseAsync(process.argv);
    } catch (error) {
        if (error instanceof ConfigError) {
            console.error(chalk.red(error.message));
        } else {
            const message = error instanceof Error ? error.message : 'Unknown error';
            console.error(chalk.red(`Error: ${message}`));
        }
        process.exitCode = 1;
    }
}

void main();
