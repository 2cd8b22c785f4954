import type { JobConfig } from '../jobs/JobConfig.js';
import type { BatchResult, ProgressSink, RateLimitState } from './types.js';
import { BatchOrchestrator } from './BatchOrchestrator.js';
import { QuotaProbe } from './QuotaProbe.js';
import { ResultWriter, buildSummary, type RunSummary } from './ResultWriter.js';
import { OpenRouterConfig } from '../config/openrouter.js';
import { OpenRouterClient, type CompletionClient } from '../concurrent/OpenRouterClient.js';
import { ResilientCaller } from '../concurrent/ResilientCaller.js';
import { loadCsvRecords } from '../utils/csv.js';
import { validateAdRecords } from '../utils/validators.js';
import { detectContext } from '../utils/contextDetector.js';
import { LoggingProgressSink } from '../utils/progressSink.js';
import { JobLogger } from '../utils/logger.js';
import type { Sleep } from '../utils/sleep.js';

export interface RunnerOptions {
  concurrency?: number;
  signal?: AbortSignal;
}

/**
 * Collaborators, overridable for tests. Defaults come from OpenRouterConfig.
 */
export interface RunnerDependencies {
  client?: CompletionClient;
  quotaProbe?: { fetchQuota(): Promise<RateLimitState> };
  sink?: ProgressSink;
  writer?: ResultWriter;
  model?: string;
  sleep?: Sleep;
}

export interface RunOutput {
  result: BatchResult;
  quota: RateLimitState;
  context: string;
  summary: RunSummary;
}

/**
 * Analysis Runner
 *
 * End-to-end batch: load CSV → check preconditions → probe quota once →
 * orchestrate → write artifacts. Only precondition and quota failures
 * (or cancellation) abort; per-record problems end up in the output.
 */
export class AnalysisRunner {
  private config: JobConfig;
  private options: RunnerOptions;
  private deps: RunnerDependencies;
  private concurrency: number;
  private logger: JobLogger;

  constructor(config: JobConfig, options: RunnerOptions = {}, deps: RunnerDependencies = {}) {
    const concurrency = options.concurrency ?? config.concurrencyLimit ?? 1;
    if (!Number.isInteger(concurrency) || concurrency < 1) {
      throw new Error(`concurrency must be an integer >= 1, got ${concurrency}`);
    }

    this.config = config;
    this.options = options;
    this.deps = deps;
    this.concurrency = concurrency;
    this.logger = new JobLogger(`AnalysisRunner:${config.id}`);
  }

  async run(inputPath: string, suppliedContext?: string): Promise<RunOutput> {
    this.logger.started({ inputPath });

    try {
      // Step 1: Load and validate input
      const rawRows = await loadCsvRecords(inputPath);
      const records = validateAdRecords(rawRows);
      this.logger.info(`Loaded ${records.length} ad records`);

      const context = suppliedContext?.trim() || detectContext(records);
      if (!suppliedContext) {
        this.logger.info('Context detected from titles', { context: context || '(none)' });
      }

      // Step 2: Acquire pacing budget; no analysis without it
      const quota = await this.quotaProbe().fetchQuota();

      // Step 3: Analyze
      const model = this.deps.model ?? this.config.model ?? OpenRouterConfig.getModel();
      const caller = new ResilientCaller(
        this.deps.client ?? new OpenRouterClient(this.config.id),
        this.config,
        model,
        { sleep: this.deps.sleep }
      );
      const orchestrator = new BatchOrchestrator(caller, {
        concurrency: this.concurrency,
        sleep: this.deps.sleep,
        signal: this.options.signal,
        jobId: this.config.id,
      });
      const sink = this.deps.sink ?? new LoggingProgressSink(this.config.id);
      const result = await orchestrator.run(records, context, quota, sink);

      // Step 4: Persist
      const writer = this.deps.writer ?? new ResultWriter();
      const outputDirectory = writer.outputDirectoryFor(this.config.id);
      const summary = buildSummary(result, {
        jobType: this.config.id,
        model,
        context,
        quota,
        outputDirectory,
      });
      await writer.write(outputDirectory, result, summary);

      if (result.counters.succeeded === 0 && records.length > 0) {
        this.logger.warn('No record was analyzed successfully', { ...result.counters });
      }

      this.logger.completed({ ...result.counters, outputDirectory });
      return { result, quota, context, summary };
    } catch (error) {
      this.logger.failed(error);
      throw error;
    }
  }

  private quotaProbe(): { fetchQuota(): Promise<RateLimitState> } {
    if (this.deps.quotaProbe) {
      return this.deps.quotaProbe;
    }
    const { apiKey, baseUrl } = OpenRouterConfig.getConfig();
    return new QuotaProbe({ apiKey, baseUrl });
  }
}
