#!/usr/bin/env node
/**
 * skeleton-mapper CLI
 * Mapping generation and evaluation stages, each driven by one settings file.
 */

import { cac } from 'cac';
import { loadConfig } from './config.js';
import type { PipelineConfig } from './config.js';
import { ConfigError } from './types/errors.js';
import { FileDatasetStore } from './services/dataset.js';
import { LLMService } from './services/llm.js';
import { runGeneration } from './services/generation/run.js';
import {
  runExecutionStage,
  runSemanticStage,
  runStructuralStage,
  runSummaryStage,
} from './services/evaluation/run.js';
import type { StageOutcome } from './services/evaluation/run.js';
import * as logger from './cli/logger.js';

const cli = cac('skeleton-mapper');

cli.version('1.0.0');
cli.help();

interface CommandOptions {
  config: string;
}

const CONFIG_OPTION = ['-c, --config <path>', 'Settings file', { default: 'settings.json' }] as const;

function fail(error: unknown): never {
  if (error instanceof ConfigError) {
    logger.error('Invalid configuration', error.message);
  } else if (error instanceof Error) {
    logger.error(error.message);
  } else {
    logger.error(String(error));
  }
  process.exit(1);
}

function settings(options: CommandOptions): PipelineConfig {
  const config = loadConfig(options.config);
  logger.info(`Settings: ${options.config}`);
  return config;
}

function reportStage(title: string, outcome: StageOutcome): void {
  logger.section(title);
  logger.table(outcome.summary.full);
}

/**
 * skeleton-mapper generate
 */
cli
  .command('generate', 'Map source questions onto every configured target database')
  .option(...CONFIG_OPTION)
  .action(async (options: CommandOptions) => {
    logger.printBanner();
    try {
      const config = settings(options);
      const spin = logger.spinner(`Generating with ${config.model.provider}/${config.model.model_name}...`);
      const outcome = await runGeneration(config, {
        store: new FileDatasetStore(config.datasets_directory),
        capability: new LLMService(config.model),
      });

      if (outcome.stats.status === 'complete') {
        spin.succeed(`Generation complete: ${outcome.directory}`);
      } else {
        spin.warn(`Generation incomplete: ${outcome.stats.stop_reason ?? 'unknown reason'}`);
      }
      for (const run of outcome.pipelines) {
        if (run.error) logger.warn(`${run.pipeline.target_db_id}: ${run.error}`);
      }

      logger.section('Run statistics');
      logger.table({
        status: outcome.stats.status,
        attempted: outcome.stats.attempted,
        succeeded: outcome.stats.succeeded,
        corrected: outcome.stats.corrected,
        validation_failed: outcome.stats.validation_failed,
        unexpected_errors: outcome.stats.unexpected_errors,
        retried: outcome.stats.retried,
        exhausted: outcome.stats.exhausted,
        cancelled: outcome.stats.cancelled,
        records_emitted: outcome.stats.records_emitted,
        questions_unmapped: outcome.stats.questions_unmapped,
      });
      process.exit(outcome.stats.status === 'complete' ? 0 : 2);
    } catch (error) {
      fail(error);
    }
  });

/**
 * skeleton-mapper eval:structural
 */
cli
  .command('eval:structural', 'Compare source and mapped query templates')
  .option(...CONFIG_OPTION)
  .action(async (options: CommandOptions) => {
    try {
      const spin = logger.spinner('Comparing templates...');
      const outcome = await runStructuralStage(settings(options));
      spin.succeed(`Structural evaluation done (${outcome.groups.length} record sets)`);
      reportStage('Structural summary', outcome);
    } catch (error) {
      fail(error);
    }
  });

/**
 * skeleton-mapper eval:execution
 */
cli
  .command('eval:execution', 'Run mapped queries against the target databases')
  .option(...CONFIG_OPTION)
  .action(async (options: CommandOptions) => {
    try {
      const spin = logger.spinner('Executing mapped queries...');
      const outcome = await runExecutionStage(settings(options));
      spin.succeed(`Execution evaluation done (${outcome.groups.length} record sets)`);
      reportStage('Execution summary', outcome);
      // A timed-out statement can keep the driver thread alive after teardown
      process.exit(0);
    } catch (error) {
      fail(error);
    }
  });

/**
 * skeleton-mapper eval:semantic
 */
cli
  .command('eval:semantic', 'Grade mapped question/SQL pairs with the judge model')
  .option(...CONFIG_OPTION)
  .action(async (options: CommandOptions) => {
    try {
      const spin = logger.spinner('Grading mapped pairs...');
      const outcome = await runSemanticStage(settings(options));
      spin.succeed(`Semantic evaluation done (${outcome.groups.length} record sets)`);
      if (outcome.failures.length > 0) {
        logger.warn(`${outcome.failures.length} batch(es) could not be graded`);
      }
      reportStage('Semantic summary', outcome);
    } catch (error) {
      fail(error);
    }
  });

/**
 * skeleton-mapper summarize
 */
cli
  .command('summarize', 'Recompute every evaluation summary from the stored labels')
  .option(...CONFIG_OPTION)
  .action(async (options: CommandOptions) => {
    try {
      const summaries = await runSummaryStage(settings(options));
      for (const summary of summaries) {
        logger.section(`${summary.axis} summary`);
        logger.table(summary.full);
      }
      logger.newline();
      logger.success('Summaries written');
    } catch (error) {
      fail(error);
    }
  });

cli.parse();
