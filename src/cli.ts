#!/usr/bin/env node

import path from 'path';
import { OpenRouterConfig, parseConcurrency } from './config/openrouter.js';
import { QuotaProbe } from './core/QuotaProbe.js';
import { AnalysisRunner } from './core/AnalysisRunner.js';
import type { JobConfig } from './jobs/JobConfig.js';
import { logger } from './utils/logger.js';

/**
 * CLI for batch ad copy analysis
 *
 * Usage:
 *   npm run dev analyze <csv-file> [--job <id>] [--context <term>] [--concurrency <n>]
 *   npm run dev quota
 *   npm run dev test-connections
 */

const COMMANDS = ['analyze', 'quota', 'test-connections', 'help'];

const DEFAULT_JOB = 'analyze-ad-copy';

function isJobConfig(value: unknown): value is JobConfig {
  return (
    typeof value === 'object' &&
    value !== null &&
    'id' in value &&
    typeof value.id === 'string' &&
    'promptTemplate' in value &&
    typeof value.promptTemplate === 'function'
  );
}

/**
 * Load job configuration by job type
 */
async function loadJobConfig(jobType: string): Promise<JobConfig> {
  let jobModule: { default?: unknown };
  try {
    jobModule = await import(`./jobs/configs/${jobType}.js`);
  } catch (error) {
    logger.error(
      `Job configuration not found: ${jobType}. ` +
        `Please create a config file at src/jobs/configs/${jobType}.ts`
    );
    throw error;
  }

  if (!isJobConfig(jobModule.default)) {
    throw new Error(`src/jobs/configs/${jobType}.ts does not default-export a JobConfig`);
  }
  return jobModule.default;
}

/**
 * Read `--name value` from the argument list
 */
function readFlag(flags: string[], name: string): string | undefined {
  const idx = flags.indexOf(`--${name}`);
  if (idx === -1) return undefined;
  const value = flags[idx + 1];
  if (value === undefined || value.startsWith('--')) {
    throw new Error(`Flag --${name} requires a value`);
  }
  return value;
}

async function analyze(inputFile: string, flags: string[]): Promise<void> {
  OpenRouterConfig.resetClient();

  const config = await loadJobConfig(readFlag(flags, 'job') ?? DEFAULT_JOB);
  const concurrencyFlag = readFlag(flags, 'concurrency');
  const concurrency = concurrencyFlag
    ? parseConcurrency(concurrencyFlag, '--concurrency')
    : process.env.ANALYZER_CONCURRENCY
      ? OpenRouterConfig.getConfig().concurrency
      : undefined;

  const controller = new AbortController();
  process.once('SIGINT', () => {
    logger.warn('Interrupt received, stopping after the current record');
    controller.abort();
  });

  const runner = new AnalysisRunner(config, { concurrency, signal: controller.signal });
  const { summary } = await runner.run(path.resolve(inputFile), readFlag(flags, 'context'));

  console.log('\n✅ Analysis completed!\n');
  console.log(`Context: ${summary.context || '(none)'}`);
  console.log(`Quota: ${summary.quota.max_requests} requests / ${summary.quota.interval_seconds}s`);
  console.log(`Total records: ${summary.totalRecords}`);
  console.log(`Succeeded: ${summary.succeeded} (${summary.successRate})`);
  console.log(`Degraded: ${summary.degraded}`);
  console.log(`Failed: ${summary.failed}`);
  console.log('\nArtifacts:');
  console.log(`  - Results: ${path.join(summary.outputDirectory, 'analysis-results.csv')}`);
  console.log(`  - Failures: ${path.join(summary.outputDirectory, 'failures.json')}`);
  console.log(`  - Summary: ${path.join(summary.outputDirectory, 'summary.json')}`);
  console.log('');
}

async function showQuota(): Promise<void> {
  const { apiKey, baseUrl } = OpenRouterConfig.getConfig();
  const quota = await new QuotaProbe({ apiKey, baseUrl }).fetchQuota();
  console.log(`\nRate limit: ${quota.max_requests} requests every ${quota.interval_seconds}s\n`);
}

async function testConnections(): Promise<void> {
  console.log('\n🧪 Testing connections...\n');

  if (!OpenRouterConfig.validate()) {
    console.log('❌ OpenRouter configuration invalid. Please check your .env file.');
    process.exitCode = 1;
    return;
  }
  console.log('✅ OpenRouter configuration valid');

  await showQuota();
  console.log('✅ Quota endpoint reachable');
}

function printHelp(): void {
  console.log(`
Ad Copy Analyzer

Sends every ad in a CSV file to a text-generation service and collects the
structured feedback into one table.

USAGE:
  npm run dev <command> [options]

COMMANDS:
  analyze <csv-file>             Analyze every ad in the file
    --job <id>                   Job config from src/jobs/configs (default: ${DEFAULT_JOB})
    --context <term>             Product / search term (default: detected from titles)
    --concurrency <n>            Calls in flight inside one quota window (default: 1)
  quota                          Show the current rate allowance
  test-connections               Validate configuration and reach the quota endpoint
  help                           Show this help message

INPUT:
  CSV with a header row containing title, snippet, displayed_link
  (case-sensitive) and optionally extensions.

ENVIRONMENT:
  Configuration is loaded from .env file
  Required variables:
    - OPENROUTER_API_KEY
  Optional:
    - OPENROUTER_BASE_URL, OPENROUTER_MODEL, ANALYZER_CONCURRENCY, LOG_LEVEL
`);
}

/**
 * Main CLI entry point
 */
async function main() {
  const args = process.argv.slice(2);

  if (args.length === 0 || args[0] === 'help') {
    printHelp();
    return;
  }

  const command = args[0];

  try {
    switch (command) {
      case 'analyze': {
        const inputFile = args[1];
        if (!inputFile || inputFile.startsWith('--')) {
          console.error('Error: Input CSV file is required');
          console.error('Usage: npm run dev analyze <csv-file>');
          process.exitCode = 1;
          return;
        }
        await analyze(inputFile, args.slice(2));
        break;
      }

      case 'quota':
        await showQuota();
        break;

      case 'test-connections':
        await testConnections();
        break;

      default:
        console.error(`Unknown command: ${command}`);
        console.error(`Valid commands: ${COMMANDS.join(', ')}`);
        printHelp();
        process.exitCode = 1;
    }
  } catch (error) {
    logger.error('Command failed', { error: error instanceof Error ? error.message : String(error) });
    console.error('\n❌ Command failed:', error instanceof Error ? error.message : String(error));
    process.exitCode = 1;
  }
}

// Run CLI
void main();
