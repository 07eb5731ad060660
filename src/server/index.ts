#!/usr/bin/env node
// ============================================================================
// MAIN ENTRY - Market intelligence command line
// ============================================================================

import 'dotenv/config';
import { parseArgs } from 'util';

import { listTargets, loadConfig, parseProviderName, withProvider } from './config/AppConfig.js';
import { MarketIntelligencePipeline } from './pipeline.js';
import { PipelineError, errorMessage } from './scraper/types/errors.js';

const DEFAULT_TARGET = 'books_toscrape';

const USAGE = `Usage: market-intel [options]

Options:
  --target <name>         Target to scrape (default: ${DEFAULT_TARGET})
  --max-products <n>      Maximum number of products to scrape (default: 50)
  --skip-scraping         Enrich the existing raw data file
  --skip-enrichment       Scrape only
  --provider <name>       openai | anthropic | gemini (overrides AI_PROVIDER)
  --list-targets          List configured targets
  -h, --help              Show this help`;

function rule(char = '='): string {
  return char.repeat(70);
}

function parseMaxProducts(value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new Error(`--max-products must be a positive integer, got "${value}"`);
  }
  return parsed;
}

async function main(argv: string[]): Promise<number> {
  const { values } = parseArgs({
    args: argv,
    options: {
      target: { type: 'string', default: DEFAULT_TARGET },
      'max-products': { type: 'string' },
      'skip-scraping': { type: 'boolean', default: false },
      'skip-enrichment': { type: 'boolean', default: false },
      provider: { type: 'string' },
      'list-targets': { type: 'boolean', default: false },
      help: { type: 'boolean', short: 'h', default: false },
    },
    strict: true,
  });

  if (values.help) {
    console.log(USAGE);
    return 0;
  }

  let config = loadConfig();
  if (values.provider !== undefined) {
    config = withProvider(config, parseProviderName(values.provider));
  }

  if (values['list-targets']) {
    console.log('\nAvailable Scraping Targets:\n');
    for (const target of listTargets(config)) {
      console.log(`  - ${target.name}`);
      console.log(`    URL: ${target.url}`);
      console.log(`    Type: ${target.kind}\n`);
    }
    return 0;
  }

  console.log(`\n${rule()}\nSTEALTH MARKET INTELLIGENCE ENGINE\n${rule()}\n`);

  const pipeline = new MarketIntelligencePipeline(config);
  const result = await pipeline.run({
    target: values.target ?? DEFAULT_TARGET,
    maxProducts: parseMaxProducts(values['max-products']),
    skipScraping: values['skip-scraping'],
    skipEnrichment: values['skip-enrichment'],
  });

  if (result.itemErrors.length > 0) {
    console.warn(`[Main] ${result.itemErrors.length} elements were skipped during extraction`);
  }

  if (result.report.length > 0) {
    console.log(`\nSUMMARY REPORT\n${rule('-')}`);
    for (const line of result.report) {
      console.log(line);
    }
  }

  console.log(`\n${rule()}\nPIPELINE COMPLETED SUCCESSFULLY\n${rule()}`);
  console.log(`Raw data: ${pipeline.outputStore.rawDataPath}`);
  console.log(`Enriched data: ${pipeline.outputStore.enrichedDataPath}`);
  return 0;
}

main(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    if (error instanceof PipelineError) {
      const { type, message } = error.toScrapeError();
      console.error(`[Main] ${error.name} (${type}): ${message}`);
    } else {
      console.error(`[Main] Error: ${errorMessage(error)}`);
    }
    process.exitCode = 1;
  });
