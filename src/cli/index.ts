#!/usr/bin/env node
import { Command } from 'commander';
import { readFile } from 'node:fs/promises';
import { mergeTableFiles, runPipeline } from '../core/engine.js';
import { stderrLogger } from '../core/logger.js';
import { ConfigSchema, MiningInputSchema, NodepackConfig } from '../core/schema.js';
import { stableStringify } from '../core/utils/json.js';
import { ZoneRegistry } from '../core/zones.js';

type ConfigOverrides = {
  config?: string;
  out?: string;
  savedVariables?: string;
  partition?: string[];
  category?: string[];
  logLevel?: string;
};

async function loadConfig(opts: ConfigOverrides): Promise<NodepackConfig> {
  const raw: unknown = opts.config ? JSON.parse(await readFile(opts.config, 'utf-8')) : {};
  const base = typeof raw === 'object' && raw !== null ? raw : {};
  return ConfigSchema.parse({
    ...base,
    ...(opts.out !== undefined ? { outDir: opts.out } : {}),
    ...(opts.savedVariables !== undefined ? { savedVariablesPath: opts.savedVariables } : {}),
    ...(opts.partition !== undefined ? { partitions: opts.partition } : {}),
    ...(opts.category !== undefined ? { categories: opts.category } : {}),
    ...(opts.logLevel !== undefined ? { logLevel: opts.logLevel } : {})
  });
}

const program = new Command();

program
  .name('nodepack')
  .description('Pack mined node coordinates into GatherMate2 tables');

program
  .command('run')
  .requiredOption('--input <path>', 'observations JSON produced by the scraper')
  .option('--config <path>', 'config JSON')
  .option('--out <dir>', 'output dir for mined tables and caches')
  .option('--saved-variables <path>', 'GatherMate2.lua to merge into')
  .option('--partition <key...>', 'only these expansions')
  .option('--category <name...>', 'only these categories')
  .option('--log-level <level>', 'pino log level')
  .action(async (opts: ConfigOverrides & { input: string }) => {
    const config = await loadConfig(opts);
    const log = stderrLogger(config.logLevel);
    const input = MiningInputSchema.parse(JSON.parse(await readFile(opts.input, 'utf-8')));
    const registry = await ZoneRegistry.fromFile(config.zonesFile);
    const summary = await runPipeline(input, config, { log, registry });
    console.log(stableStringify(summary, 2));
    if (summary.merge.status === 'failed') process.exitCode = 1;
  });

program
  .command('merge')
  .requiredOption('--saved-variables <path>', 'GatherMate2.lua to merge into')
  .option('--tables <dir>', 'dir holding Mined_*.lua files')
  .option('--config <path>', 'config JSON')
  .option('--log-level <level>', 'pino log level')
  .action(async (opts: ConfigOverrides & { tables?: string }) => {
    const config = await loadConfig(opts);
    const log = stderrLogger(config.logLevel);
    const outcome = await mergeTableFiles(opts.tables ?? config.outDir, config, { log });
    console.log(stableStringify(outcome, 2));
    if (outcome.status === 'failed') process.exitCode = 1;
  });

program
  .command('serve')
  .option('--config <path>', 'config JSON')
  .option('--port <port>', 'port for the API', '3000')
  .option('--host <host>', 'host for the API', '127.0.0.1')
  .action(async (opts: ConfigOverrides & { port: string; host: string }) => {
    const config = await loadConfig(opts);
    const log = stderrLogger(config.logLevel);
    const registry = await ZoneRegistry.fromFile(config.zonesFile);
    const { buildServer } = await import('../api/server.js');
    const app = buildServer({ log, registry });
    const port = Number(process.env.PORT ?? opts.port);
    await app.listen({ port, host: opts.host });
    log.info({ port, host: opts.host }, 'API listening');
  });

program.parseAsync(process.argv).catch((error: unknown) => {
  console.error(error instanceof Error ? error.message : error);
  process.exit(1);
});
