/**
 * Evaluation stage drivers. Each stage loads the current record sets,
 * replaces its own label, saves the sets back and rewrites its summary.
 *
 * Summaries, per axis:
 *   <summary>/<dataset>/<model>/<axis>_summary/
 *     <target_db>.json                              per-source rows
 *     summary/<target_db>.json                      per-target row
 *     queries/<target_db>.json                      per-query rows
 *     full_summary/full_summary.json
 *     full_summary/not_generated_results.json
 */

import { existsSync } from 'fs';
import { join } from 'path';
import { requireEvaluation } from '../../config.js';
import type { EvaluationConfig, ModelConfig, PipelineConfig } from '../../config.js';
import type { SummaryAxis } from '../../types/models.js';
import { DatasetError, describeError } from '../../types/errors.js';
import { writeJson } from '../../utils/files.js';
import { logger } from '../../utils/logger.js';
import { runPool } from '../../utils/pool.js';
import { SqliteQueryRunner } from '../database.js';
import type { QueryRunner } from '../database.js';
import { FileDatasetStore } from '../dataset.js';
import type { DatasetStore } from '../dataset.js';
import { LLMService } from '../llm.js';
import type { GenerationCapability } from '../llm.js';
import { evaluateExecution, skipExecution } from './execution.js';
import { loadGroups, resultDirectory, saveGroup } from './records.js';
import type { RecordGroup } from './records.js';
import { SemanticEvaluator, loadJudgmentPrompts, skipSemantic } from './semantic.js';
import type { JudgmentPrompts, SemanticFailure } from './semantic.js';
import { evaluateStructural } from './structural.js';
import { SUMMARY_AXES, summarize } from './summary.js';
import type { AxisSummary } from './summary.js';

export interface StageOutcome {
  groups: RecordGroup[];
  summary: AxisSummary;
}

export function summaryDirectory(evaluation: EvaluationConfig, axis: SummaryAxis): string {
  return join(evaluation.summary_directory, evaluation.dataset_name, evaluation.model_dir, `${axis}_summary`);
}

export function databasePath(evaluation: EvaluationConfig, targetDbId: string): string {
  return join(evaluation.databases_directory, evaluation.dataset_name, targetDbId, `${targetDbId}.sqlite`);
}

/**
 * Write one axis summary. Stale per-target files from earlier runs are left alone.
 */
export async function writeAxisSummary(evaluation: EvaluationConfig, summary: AxisSummary): Promise<string> {
  const dir = summaryDirectory(evaluation, summary.axis);

  for (const row of summary.coarse) {
    const target = row.target_db_id;
    await writeJson(join(dir, 'summary', `${target}.json`), row);
    await writeJson(
      join(dir, 'queries', `${target}.json`),
      summary.queries.filter((query) => query.target_db_id === target)
    );
    if (evaluation.summary_by_source_db) {
      await writeJson(
        join(dir, `${target}.json`),
        summary.bySource.filter((source) => source.target_db_id === target)
      );
    }
  }
  await writeJson(join(dir, 'full_summary', 'full_summary.json'), summary.full);
  await writeJson(join(dir, 'full_summary', 'not_generated_results.json'), summary.unevaluated);
  return dir;
}

async function finishStage(
  evaluation: EvaluationConfig,
  axis: SummaryAxis,
  groups: RecordGroup[]
): Promise<StageOutcome> {
  for (const group of groups) {
    await saveGroup(evaluation, group);
  }
  const summary = summarize(groups, axis, { bySource: evaluation.summary_by_source_db });
  const dir = await writeAxisSummary(evaluation, summary);
  logger.info(`${axis} evaluation finished: ${groups.length} record set(s), summary in ${dir}`);
  return { groups, summary };
}

async function loadStageGroups(evaluation: EvaluationConfig, axis: SummaryAxis): Promise<RecordGroup[]> {
  const groups = await loadGroups(evaluation);
  if (groups.length === 0) {
    logger.warn(`No record sets found for ${axis} evaluation of ${evaluation.dataset_name}/${evaluation.model_dir}`);
  } else {
    logger.info(`${axis} evaluation started: ${groups.length} record set(s)`);
  }
  return groups;
}

// ============================================================================
// Stages
// ============================================================================

export async function runStructuralStage(config: PipelineConfig): Promise<StageOutcome> {
  const evaluation = requireEvaluation(config);
  const groups = (await loadStageGroups(evaluation, 'structural')).map((group) => ({
    ...group,
    records: group.records.map(evaluateStructural),
  }));
  return finishStage(evaluation, 'structural', groups);
}

export interface ExecutionDeps {
  openRunner?: (path: string) => QueryRunner;
}

/**
 * Execute every mapped query. Target databases run concurrently; queries
 * on one database run in order over one runner.
 */
export async function runExecutionStage(config: PipelineConfig, deps: ExecutionDeps = {}): Promise<StageOutcome> {
  const evaluation = requireEvaluation(config);
  const openRunner = deps.openRunner ?? ((path: string) => new SqliteQueryRunner(path));
  const groups = await loadStageGroups(evaluation, 'execution');
  const options = { timeoutMs: evaluation.execution_timeout_ms, maxRowsPreserved: evaluation.max_rows_preserved };

  const targets = [...new Set(groups.map((group) => group.targetDbId))];
  const outcomes = await runPool(
    targets,
    async (targetDbId): Promise<RecordGroup[]> => {
      const own = groups.filter((group) => group.targetDbId === targetDbId);
      const path = databasePath(evaluation, targetDbId);
      if (!existsSync(path)) {
        logger.error(`Database file not found: ${path}`);
        return own.map((group) => ({ ...group, records: skipExecution(group.records, `database not found: ${path}`) }));
      }

      const runner = openRunner(path);
      try {
        const evaluated: RecordGroup[] = [];
        for (const group of own) {
          logger.info(`Executing ${group.records.length} quer(ies) from ${group.sourceDbId} on ${targetDbId}`);
          evaluated.push({ ...group, records: await evaluateExecution(group.records, runner, options) });
        }
        return evaluated;
      } finally {
        await runner.close();
      }
    },
    { concurrency: evaluation.concurrency }
  );

  const evaluated: RecordGroup[] = [];
  for (const outcome of outcomes) {
    if (outcome.status === 'rejected') throw outcome.reason;
    if (outcome.status === 'fulfilled') evaluated.push(...outcome.value);
  }
  return finishStage(evaluation, 'execution', evaluated);
}

export interface SemanticDeps {
  judge?: GenerationCapability;
  store?: DatasetStore;
  prompts?: JudgmentPrompts;
}

export interface SemanticStageOutcome extends StageOutcome {
  failures: SemanticFailure[];
}

function judgeModel(config: PipelineConfig): ModelConfig {
  return config.judge_model ?? config.model;
}

/**
 * Grade every mapped pair. Raw ratings are archived beside the results in
 * `<llm_response_directory>/response_<source_db>_llm.json`.
 */
export async function runSemanticStage(config: PipelineConfig, deps: SemanticDeps = {}): Promise<SemanticStageOutcome> {
  const evaluation = requireEvaluation(config);
  const judge = deps.judge ?? new LLMService(judgeModel(config));
  const store = deps.store ?? new FileDatasetStore(config.datasets_directory);
  const prompts =
    deps.prompts ??
    (await loadJudgmentPrompts(
      evaluation.prompt_directory,
      evaluation.semantic_prompt_file,
      evaluation.semantic_examples_file
    ));
  const evaluator = new SemanticEvaluator(judge, prompts, {
    batchSize: evaluation.semantic_batch_size,
    maxAttempts: evaluation.max_retry_per_prompt,
    retryDelayMs: evaluation.retry_delay_ms,
  });

  const groups = await loadStageGroups(evaluation, 'semantic');
  const failures: SemanticFailure[] = [];

  const outcomes = await runPool(
    groups,
    async (group): Promise<RecordGroup> => {
      let schema: string;
      try {
        schema = await store.getSchema(evaluation.dataset_name, group.targetDbId);
      } catch (error) {
        if (!(error instanceof DatasetError)) throw error;
        logger.error(`Skipping ${group.targetDbId}/${group.sourceDbId}: ${error.message}`);
        const reason = `schema unavailable: ${describeError(error)}`;
        failures.push({
          target_db_id: group.targetDbId,
          source_db_id: group.sourceDbId,
          batch_index: -1,
          questions: group.records.length,
          error: reason,
        });
        return { ...group, records: skipSemantic(group.records, reason) };
      }

      const outcome = await evaluator.evaluate(group.records, schema, group);
      failures.push(...outcome.failures);
      await writeJson(
        join(
          resultDirectory(evaluation, group.targetDbId),
          evaluation.llm_response_directory,
          `response_${group.sourceDbId}_llm.json`
        ),
        outcome.ratings
      );
      return { ...group, records: outcome.records };
    },
    { concurrency: evaluation.concurrency }
  );

  const evaluated: RecordGroup[] = [];
  for (const outcome of outcomes) {
    if (outcome.status === 'rejected') throw outcome.reason;
    if (outcome.status === 'fulfilled') evaluated.push(outcome.value);
  }
  if (failures.length > 0) {
    logger.warn(`${failures.length} judgment batch(es) failed`);
  }
  return { ...(await finishStage(evaluation, 'semantic', evaluated)), failures };
}

/**
 * Recompute every axis summary from the current labels.
 */
export async function runSummaryStage(config: PipelineConfig): Promise<AxisSummary[]> {
  const evaluation = requireEvaluation(config);
  const groups = await loadGroups(evaluation);
  const summaries: AxisSummary[] = [];
  for (const axis of SUMMARY_AXES) {
    const summary = summarize(groups, axis, { bySource: evaluation.summary_by_source_db });
    await writeAxisSummary(evaluation, summary);
    summaries.push(summary);
  }
  logger.info(`Summaries written for ${groups.length} record set(s)`);
  return summaries;
}
