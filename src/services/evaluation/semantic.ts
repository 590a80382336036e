/**
 * Semantic evaluator: an LLM grader rates each mapped question/SQL pair.
 *
 * Records are judged in batches. A batch whose response is unusable or
 * has the wrong length is retried; once retries run out its records stay
 * `not_evaluated` with the last error as reason.
 */

import { readFile } from 'fs/promises';
import { existsSync } from 'fs';
import { join, resolve } from 'path';
import type { EvaluatedRecord, SemanticLabel } from '../../types/models.js';
import { ConfigError, ResponseFormatError, describeError } from '../../types/errors.js';
import { isJsonObject } from '../../types/utils.js';
import type { JsonObject, JsonValue } from '../../types/utils.js';
import { extractJsonArray } from '../../utils/json.js';
import { logger } from '../../utils/logger.js';
import { sleep } from '../../utils/time.js';
import { usableText } from '../llm.js';
import type { GenerationCapability } from '../llm.js';
import { partition } from '../generation/batching.js';
import { withLabel } from './records.js';
import { isNotGenerated } from './structural.js';

export interface SemanticOptions {
  batchSize: number;
  maxAttempts: number;
  retryDelayMs: number;
}

/**
 * Grading instructions plus worked examples; sent as the system instruction.
 */
export interface JudgmentPrompts {
  system: string;
}

export interface SemanticFailure {
  readonly target_db_id: string;
  readonly source_db_id: string;
  readonly batch_index: number;
  readonly questions: number;
  readonly error: string;
}

export interface SemanticOutcome {
  records: EvaluatedRecord[];
  /** Raw ratings of every judged batch, in record order */
  ratings: JsonValue[];
  failures: SemanticFailure[];
}

export const NOT_GENERATED = 'not_generated';

export async function loadJudgmentPrompts(
  directory: string,
  promptFile: string,
  examplesFile: string
): Promise<JudgmentPrompts> {
  const parts: string[] = [];
  for (const file of [promptFile, examplesFile]) {
    if (!file) continue;
    const path = join(resolve(directory), file);
    if (!existsSync(path)) {
      throw new ConfigError(`Semantic prompt not found: ${path}`);
    }
    parts.push(await readFile(path, 'utf-8'));
  }
  if (parts.length === 0) {
    throw new ConfigError('semantic_prompt_file must be set');
  }
  return { system: parts.join('') };
}

export function renderJudgmentPrompt(schema: string, records: readonly EvaluatedRecord[]): string {
  const pairs = records.map((record) => ({ nl_question: record.target_question, sql_query: record.target_query }));
  return [
    '\n\n## Rate the following questions and sql:\n\n',
    '# Source schema\n',
    `"${schema}"\n\n\n`,
    '# Input pairs\n',
    JSON.stringify(pairs, null, 4),
    '\n\n# Output:\n\n',
  ].join('');
}

function section(rating: JsonObject, key: string, prefix: string): JsonObject | null {
  const exact = rating[key];
  if (isJsonObject(exact)) return exact;
  for (const [name, value] of Object.entries(rating)) {
    if (name.startsWith(prefix) && isJsonObject(value)) return value;
  }
  return null;
}

function verdictScore(value: JsonValue | undefined): number | null {
  if (typeof value !== 'string') return null;
  const verdict = value.trim().toLowerCase();
  if (verdict === 'yes') return 1;
  if (verdict === 'no') return 0;
  return null;
}

function thought(value: JsonValue | undefined): string {
  return typeof value === 'string' ? value : '';
}

/**
 * Turn one grader entry into a label. Entries without a yes/no verdict on
 * both criteria stay unevaluated.
 */
export function ratingLabel(rating: unknown): SemanticLabel {
  if (!isJsonObject(rating)) {
    return { status: 'not_evaluated', reason: 'rating is not an object' };
  }
  const clarity = section(rating, 'clarity_and_alignment_of_NL', 'clarity');
  const correctness = section(rating, 'correctness_of_query', 'correctness');
  const questionScore = verdictScore(clarity?.['is_clear_and_meaningful']);
  const sqlScore = verdictScore(correctness?.['is_correct_mapping']);
  if (questionScore === null || sqlScore === null) {
    return { status: 'not_evaluated', reason: 'rating has no yes/no verdict' };
  }
  return {
    status: 'evaluated',
    question_score: questionScore,
    sql_score: sqlScore,
    reasoning: {
      question: thought(clarity?.['thought_process']),
      sql: thought(correctness?.['thought_process']),
    },
  };
}

/**
 * Label every record as not judged.
 */
export function skipSemantic(records: readonly EvaluatedRecord[], reason: string): EvaluatedRecord[] {
  return records.map((record) =>
    withLabel(record, 'semantic', { status: 'not_evaluated', reason: isNotGenerated(record) ? NOT_GENERATED : reason })
  );
}

type BatchResult = { ok: true; ratings: unknown[] } | { ok: false; error: string };

/**
 * Judge mapped question/SQL pairs against a grading capability.
 */
export class SemanticEvaluator {
  constructor(
    private readonly judge: GenerationCapability,
    private readonly prompts: JudgmentPrompts,
    private readonly options: SemanticOptions
  ) {}

  private async judgeBatch(schema: string, batch: readonly EvaluatedRecord[], label: string): Promise<BatchResult> {
    const prompt = renderJudgmentPrompt(schema, batch);
    let lastError = 'no attempt made';

    for (let attempt = 1; attempt <= this.options.maxAttempts; attempt++) {
      if (attempt > 1) {
        logger.warn(`[${label}] Retrying judgment... Attempt ${attempt}/${this.options.maxAttempts}`);
        await sleep(this.options.retryDelayMs);
      }
      try {
        const response = await this.judge.generate(prompt, this.prompts.system);
        const { value } = extractJsonArray(usableText(response));
        if (value.length === batch.length) {
          return { ok: true, ratings: value };
        }
        lastError = `expected ${batch.length} rating(s), got ${value.length}`;
      } catch (error) {
        lastError = error instanceof ResponseFormatError ? `${error.kind}: ${error.message}` : describeError(error);
      }
      logger.warn(`[${label}] Judgment attempt ${attempt}/${this.options.maxAttempts} failed: ${lastError}`);
    }
    return { ok: false, error: lastError };
  }

  /**
   * Judge one (target db, source db) record set. Records without a mapped
   * query or question are skipped.
   */
  async evaluate(
    records: readonly EvaluatedRecord[],
    schema: string,
    group: { targetDbId: string; sourceDbId: string }
  ): Promise<SemanticOutcome> {
    const labels = new Map<EvaluatedRecord, SemanticLabel>();
    const ratings: JsonValue[] = [];
    const failures: SemanticFailure[] = [];

    const judged = records.filter((record) => {
      if (!isNotGenerated(record)) return true;
      labels.set(record, { status: 'not_evaluated', reason: NOT_GENERATED });
      return false;
    });

    const batches = partition(judged, this.options.batchSize);
    for (const [index, batch] of batches.entries()) {
      const label = `${group.targetDbId}/${group.sourceDbId}#${index}`;
      const result = await this.judgeBatch(schema, batch, label);
      if (!result.ok) {
        logger.error(`[${label}] Max retries exceeded. Skipping ${batch.length} record(s)`);
        failures.push({
          target_db_id: group.targetDbId,
          source_db_id: group.sourceDbId,
          batch_index: index,
          questions: batch.length,
          error: result.error,
        });
        for (const record of batch) {
          labels.set(record, { status: 'not_evaluated', reason: `judgment failed: ${result.error}` });
        }
        continue;
      }
      batch.forEach((record, i) => {
        const rating = result.ratings[i];
        labels.set(record, ratingLabel(rating));
        ratings.push(isJsonObject(rating) ? rating : null);
      });
    }

    return {
      records: records.map((record) => withLabel(record, 'semantic', labels.get(record) ?? { status: 'not_evaluated' })),
      ratings,
      failures,
    };
  }
}
