/**
 * Generation run driver: every configured pipeline, one shared failure budget.
 */

import { mkdir } from 'fs/promises';
import { join } from 'path';
import type { GenerationConfig, PipelineConfig, PipelineSettings } from '../../config.js';
import type { MappingRecord, MappingRequest, RunStats } from '../../types/models.js';
import { DatasetError, describeError } from '../../types/errors.js';
import { writeJson } from '../../utils/files.js';
import { logger } from '../../utils/logger.js';
import type { DatasetStore } from '../dataset.js';
import type { GenerationCapability } from '../llm.js';
import { buildMappingRequests, selectQuestions } from './batching.js';
import { MappingOrchestrator } from './orchestrator.js';
import type { GenerationOutcome, OrchestratorOptions } from './orchestrator.js';
import { GenerationWriter, distilledDirectory, pipelineDirectory, runDirectory } from './output.js';
import { loadMappingPrompts } from './prompt.js';
import type { MappingPrompts } from './prompt.js';
import { FailureBudget, emptyRunStats } from './stats.js';
import type { RunCounter } from './stats.js';

export interface GenerationDeps {
  store: DatasetStore;
  capability: GenerationCapability;
  /** Defaults to loading the configured prompt files */
  prompts?: MappingPrompts;
  clock?: () => Date;
}

export interface PipelineRun {
  pipeline: PipelineSettings;
  directory: string;
  outcome: GenerationOutcome | null;
  error: string | null;
}

export interface RunOutcome {
  directory: string;
  stats: RunStats;
  pipelines: PipelineRun[];
  records: MappingRecord[];
}

export function orchestratorOptions(generation: GenerationConfig): OrchestratorOptions {
  return {
    maxAttempts: generation.max_retry_per_prompt,
    retryDelayMs: generation.retry_delay_ms,
    concurrency: generation.concurrency,
    maxTokenReminder: generation.max_token_reminder,
    validation: {
      requiredFields: generation.fields_to_check,
      fieldsChecking: generation.validation.fields_checking,
      dbIdMatching: generation.validation.db_id_matching,
    },
  };
}

/**
 * Load everything one pipeline needs and batch it. A source database whose
 * files are unusable is skipped; a missing target schema fails the pipeline.
 */
export async function buildPipelineRequests(
  store: DatasetStore,
  pipeline: PipelineSettings,
  maxQuestionsPerPrompt: number
): Promise<MappingRequest[]> {
  const targetSchema = await store.getSchema(pipeline.target_dataset, pipeline.target_db_id);
  const targetSamples = await store.getSamples(pipeline.target_dataset, pipeline.target_db_id);
  if (!targetSamples) {
    logger.warn(`No target samples for ${pipeline.target_dataset}/${pipeline.target_db_id}`);
  }

  const sourceDbs =
    pipeline.source_db_ids.length > 0 ? pipeline.source_db_ids : await store.listSourceDbs(pipeline.source_dataset);

  const requests: MappingRequest[] = [];
  for (const sourceDbId of sourceDbs) {
    try {
      const questions = selectQuestions(await store.getQuestions(pipeline.source_dataset, sourceDbId), pipeline);
      if (questions.length === 0) {
        logger.info(`No questions selected from ${sourceDbId}. Skipping...`);
        continue;
      }
      const sourceSchema = await store.getSchema(pipeline.source_dataset, sourceDbId);
      requests.push(
        ...buildMappingRequests(
          questions,
          {
            sourceDataset: pipeline.source_dataset,
            sourceDbId,
            sourceSchema,
            targetDataset: pipeline.target_dataset,
            targetDbId: pipeline.target_db_id,
            targetSchema,
            targetSamples,
          },
          maxQuestionsPerPrompt
        )
      );
    } catch (error) {
      if (!(error instanceof DatasetError)) throw error;
      logger.warn(`Source db ${sourceDbId} skipped: ${error.message}`);
    }
  }
  return requests;
}

const COUNTERS: readonly RunCounter[] = [
  'attempted',
  'succeeded',
  'corrected',
  'validation_failed',
  'unexpected_errors',
  'retried',
  'exhausted',
  'cancelled',
  'questions_requested',
  'records_emitted',
  'questions_unmapped',
  'input_tokens',
  'output_tokens',
  'model_time_ms',
];

/**
 * Sum pipeline statistics into run statistics.
 */
export function combineRunStats(
  parts: readonly RunStats[],
  startedAt: Date,
  finishedAt: Date,
  stopReason: string | null
): RunStats {
  const total = emptyRunStats(startedAt);
  for (const part of parts) {
    for (const counter of COUNTERS) {
      total[counter] += part[counter];
    }
  }
  total.finished_at = finishedAt.toISOString();
  total.wall_time_ms = finishedAt.getTime() - startedAt.getTime();
  if (stopReason !== null) {
    total.status = 'incomplete';
    total.stop_reason = stopReason;
  }
  return total;
}

/**
 * Run every pipeline in `config.data`. Failures inside a pipeline stay
 * there; the run only throws when no pipeline could be built at all.
 */
export async function runGeneration(config: PipelineConfig, deps: GenerationDeps): Promise<RunOutcome> {
  const generation = config.generation;
  const clock = deps.clock ?? (() => new Date());
  const prompts =
    deps.prompts ??
    (await loadMappingPrompts(
      generation.prompt_directory,
      generation.base_prompt_file,
      generation.system_instruction_file
    ));

  const startedAt = clock();
  const directory = runDirectory(generation.output_directory, config.model.model_name, startedAt);
  await mkdir(directory, { recursive: true });
  if (generation.copy_settings_to_output) {
    await writeJson(join(directory, 'settings.json'), config);
  }
  logger.info(`Generation run started: ${directory}`);

  const budget = new FailureBudget(generation.max_fail_limit);
  const pipelines: PipelineRun[] = [];

  for (const pipeline of config.data) {
    const label = `${pipeline.source_dataset} -> ${pipeline.target_dataset}/${pipeline.target_db_id}`;
    const pipelineDir = pipelineDirectory(directory, pipeline.target_dataset, pipeline.target_db_id);

    let requests: MappingRequest[];
    try {
      requests = await buildPipelineRequests(deps.store, pipeline, generation.max_questions_per_prompt);
    } catch (error) {
      if (!(error instanceof DatasetError)) throw error;
      logger.error(`Pipeline ${label} skipped: ${error.message}`);
      pipelines.push({ pipeline, directory: pipelineDir, outcome: null, error: describeError(error) });
      continue;
    }

    const writer = new GenerationWriter(
      pipelineDir,
      generation.json_only_output_directory
        ? distilledDirectory(
            generation.json_only_output_directory,
            pipeline.target_dataset,
            config.model.model_name,
            pipeline.target_db_id
          )
        : null,
      config.model.model_name,
      clock
    );
    const orchestrator = new MappingOrchestrator(deps.capability, prompts, orchestratorOptions(generation), {
      budget,
      clock,
      onResult: (result, sourceStats) => writer.write(result, sourceStats),
    });

    logger.info(`Pipeline ${label} started: ${requests.length} request(s)`);
    const outcome = await orchestrator.generateAll(requests);
    await writer.writeReports(outcome);
    pipelines.push({ pipeline, directory: pipelineDir, outcome, error: null });
    logger.info(
      `Pipeline ${label} finished: ${outcome.stats.records_emitted} record(s), ${outcome.stats.questions_unmapped} unmapped`
    );
  }

  if (config.data.length > 0 && pipelines.every((run) => run.outcome === null)) {
    throw new DatasetError('No pipeline could be built from the configured datasets');
  }

  const stats = combineRunStats(
    pipelines.flatMap((run) => (run.outcome ? [run.outcome.stats] : [])),
    startedAt,
    clock(),
    budget.exhausted ? budget.toError().message : null
  );
  await writeJson(join(directory, 'stats.json'), stats);
  if (stats.status === 'incomplete') {
    logger.error(`Generation run incomplete: ${stats.stop_reason}`);
  } else {
    logger.info('Generation run finished');
  }

  return {
    directory,
    stats,
    pipelines,
    records: pipelines.flatMap((run) => run.outcome?.records ?? []),
  };
}
