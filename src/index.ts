#!/usr/bin/env node
import path from 'node:path';
import { promises as fs } from 'node:fs';
import { Command } from 'commander';
import dotenv from 'dotenv';
import { reportToCsvRows } from './aggregation/report.js';
import { loadConfig, parseCommaList, parsePositiveInteger, type AppConfig } from './config.js';
import { CsvStreamWriter } from './csv/writer.js';
import { describeError } from './errors.js';
import { createLogger } from './logging.js';
import { createApp } from './server/app.js';
import { startServer, stopServer } from './server/serve.js';
import { createServices, createVocabularyStore } from './services.js';
import { renderVocabularyModule } from './vocabulary/exporter.js';
import type { VocabularyStore } from './vocabulary/store.js';
import { documentKeyOf } from './vocabulary/tiers.js';

dotenv.config();

interface CommonOptions {
  keywords?: string;
}

interface AnalyzeCommandOptions extends CommonOptions {
  brand: string;
  input?: string;
  collectors?: string;
  format: string;
  output?: string;
}

interface ServeCommandOptions extends CommonOptions {
  port?: string;
  collectors?: string;
}

interface ExportCommandOptions extends CommonOptions {
  output?: string;
}

const program = new Command();
program
  .name('review-radar')
  .description('Classify brand reviews by keyword tier and aggregate them into a priority-sorted report.');

configureCommonOptions(
  program.command('analyze').description('Classify reviews for a brand and print or write the report.'),
)
  .requiredOption('-b, --brand <name>', 'Brand name to analyze.')
  .option('-i, --input <path>', 'File with one review per line; skips live collection.')
  .option('--collectors <names>', 'Comma-separated collectors to query (dcard, serpapi, sample).')
  .option('--format <format>', 'Report format: json or csv.', 'json')
  .option('-o, --output <path>', 'Write the report to this path instead of stdout.')
  .action(async (rawOptions: AnalyzeCommandOptions) => {
    await handleAnalyze(rawOptions);
  });

configureCommonOptions(program.command('serve').description('Serve the analysis and keyword administration API.'))
  .option('-p, --port <number>', 'Port to listen on (default REVIEW_RADAR_PORT or 8000).')
  .option('--collectors <names>', 'Comma-separated collectors used for live analysis.')
  .action(async (rawOptions: ServeCommandOptions) => {
    await handleServe(rawOptions);
  });

const keywords = program.command('keywords').description('Inspect and edit the keyword vocabulary.');

configureCommonOptions(keywords.command('list').description('Print the whole vocabulary document.')).action(
  async (options: CommonOptions) => {
    printJson(await storeFor(options).listAll());
  },
);

configureCommonOptions(keywords.command('show').argument('<tier>').description('Print one tier.')).action(
  async (tier: string, options: CommonOptions) => {
    printJson(await storeFor(options).getTier(tier));
  },
);

configureCommonOptions(
  keywords.command('search').argument('<query>').description('Find keywords containing a substring.'),
).action(async (query: string, options: CommonOptions) => {
  printJson(await storeFor(options).search(query));
});

configureCommonOptions(keywords.command('stats').description('Print keyword counts per tier.')).action(
  async (options: CommonOptions) => {
    printJson(await storeFor(options).stats());
  },
);

configureCommonOptions(
  keywords.command('add').argument('<tier>').argument('<term>').argument('[weight]').description('Add a keyword.'),
).action(async (tier: string, term: string, weight: string | undefined, options: CommonOptions) => {
  printJson(await storeFor(options).addTerm(tier, term, parseWeight(weight)));
});

configureCommonOptions(
  keywords
    .command('update')
    .argument('<tier>')
    .argument('<term>')
    .argument('<weight>')
    .description("Change a keyword's weight."),
).action(async (tier: string, term: string, weight: string, options: CommonOptions) => {
  printJson(await storeFor(options).updateTerm(tier, term, parseWeight(weight)));
});

configureCommonOptions(
  keywords.command('delete').argument('<tier>').argument('<term>').description('Delete a keyword.'),
).action(async (tier: string, term: string, options: CommonOptions) => {
  const removed = await storeFor(options).deleteTerm(tier, term);
  console.log(`Deleted "${removed}" from ${documentKeyOf(tier)}.`);
});

configureCommonOptions(
  keywords
    .command('move')
    .argument('<from>')
    .argument('<to>')
    .argument('<term>')
    .argument('[weight]')
    .description('Move a keyword to another tier.'),
).action(async (from: string, to: string, term: string, weight: string | undefined, options: CommonOptions) => {
  printJson(await storeFor(options).moveTerm(from, to, term, parseWeight(weight)));
});

configureCommonOptions(
  keywords.command('export').description('Render the vocabulary as a TypeScript module.'),
)
  .option('-o, --output <path>', 'Write the module here instead of stdout.')
  .action(async (options: ExportCommandOptions) => {
    const vocabulary = await storeFor(options).load();
    const source = renderVocabularyModule(vocabulary);
    if (!options.output) {
      process.stdout.write(source);
      return;
    }
    const outputPath = path.resolve(options.output);
    await fs.mkdir(path.dirname(outputPath), { recursive: true });
    await fs.writeFile(outputPath, source, 'utf8');
    console.log(`Wrote vocabulary module to ${outputPath}`);
  });

program.parseAsync().catch((error: unknown) => {
  console.error(describeError(error));
  process.exitCode = 1;
});

function configureCommonOptions(command: Command): Command {
  return command.option('-k, --keywords <path>', 'Vocabulary document (default KEYWORDS_PATH or data/keywords.json).');
}

function buildConfig(options: CommonOptions): AppConfig {
  const config = loadConfig();
  return options.keywords ? { ...config, keywordsPath: options.keywords } : config;
}

function storeFor(options: CommonOptions): VocabularyStore {
  return createVocabularyStore(buildConfig(options));
}

async function handleAnalyze(rawOptions: AnalyzeCommandOptions) {
  const format = rawOptions.format.trim().toLowerCase();
  if (format !== 'json' && format !== 'csv') {
    throw new Error('Option --format must be json or csv.');
  }

  const config = buildConfig(rawOptions);
  const { analyzer } = createServices(config, parseCommaList(rawOptions.collectors));
  const text = rawOptions.input ? await fs.readFile(path.resolve(rawOptions.input), 'utf8') : undefined;
  const { brandName, report, payload } = await analyzer.analyze({ brandName: rawOptions.brand, text });

  if (format === 'json') {
    const body = `${JSON.stringify(payload, null, 2)}\n`;
    if (!rawOptions.output) {
      process.stdout.write(body);
      return;
    }
    const outputPath = path.resolve(rawOptions.output);
    await fs.mkdir(path.dirname(outputPath), { recursive: true });
    await fs.writeFile(outputPath, body, 'utf8');
    console.error(`Wrote ${payload.total_reviews} reviews to ${outputPath}`);
    return;
  }

  const outputPath = rawOptions.output ?? defaultCsvPath(brandName);
  const writer = await CsvStreamWriter.create(outputPath);
  for (const row of reportToCsvRows(brandName, report)) {
    await writer.writeRow(row);
  }
  await writer.close();
  console.error(`Wrote ${payload.total_reviews} rows to ${writer.path}`);
}

async function handleServe(rawOptions: ServeCommandOptions) {
  const config = buildConfig(rawOptions);
  const port = parsePositiveInteger(rawOptions.port, config.port, 'port');
  const { store, analyzer } = createServices(config, parseCommaList(rawOptions.collectors));
  const vocabulary = await store.snapshot();
  const log = createLogger('http');
  log(`Loaded vocabulary (last updated ${vocabulary.metadata.lastUpdated || 'never'}).`);
  const server = await startServer(createApp({ store, analyzer, logger: log }), port, log);
  process.once('SIGINT', () => {
    stopServer(server)
      .then(() => log('Server stopped.'))
      .catch((error: unknown) => {
        log(`Failed to stop cleanly: ${describeError(error)}`);
        process.exitCode = 1;
      });
  });
}

function parseWeight(value: string | undefined): number {
  if (value === undefined) {
    return 1;
  }
  return Number(value);
}

function defaultCsvPath(brandName: string): string {
  const safeBrand = brandName.toLowerCase().replace(/[^\p{L}\p{N}_-]+/gu, '-');
  const isoStamp = new Date().toISOString().replace(/[:]/g, '-');
  return path.join('output', `${isoStamp}_${safeBrand}.csv`);
}

function printJson(value: unknown) {
  console.log(JSON.stringify(value, null, 2));
}
