/**
 * Batch Request Builder: selects a reproducible subsequence of a source
 * database's questions and partitions it into MappingRequests.
 */

import type { PipelineSettings } from '../../config.js';
import type { MappingRequest, Question, SampleTable } from '../../types/models.js';
import { seededRandom, shuffle } from '../../utils/random.js';
import { logger } from '../../utils/logger.js';

export type SelectionSettings = Pick<PipelineSettings, 'source_questions_shuffle_seed' | 'source_questions_limit'>;

/**
 * Shuffle then truncate.
 *
 * Seed `-1` keeps file order, `0` seeds from the clock, anything else is a
 * fixed seed. Limit `-1` keeps everything and `0` selects nothing.
 */
export function selectQuestions(
  questions: readonly Question[],
  settings: SelectionSettings,
  now: () => number = Date.now
): Question[] {
  const seed = settings.source_questions_shuffle_seed;
  let selected: Question[];
  if (seed === -1) {
    selected = [...questions];
  } else if (seed === 0) {
    const clockSeed = now();
    logger.warn(`Shuffling with clock seed ${clockSeed}; this selection is not reproducible`);
    selected = shuffle(questions, seededRandom(clockSeed));
  } else {
    selected = shuffle(questions, seededRandom(seed));
  }

  const limit = settings.source_questions_limit;
  return limit === -1 ? selected : selected.slice(0, limit);
}

/**
 * Split into consecutive batches of at most `size`.
 */
export function partition<T>(items: readonly T[], size: number): T[][] {
  const batches: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    batches.push(items.slice(i, i + size));
  }
  return batches;
}

export interface RequestContext {
  sourceDataset: string;
  sourceDbId: string;
  sourceSchema: string;
  targetDataset: string;
  targetDbId: string;
  targetSchema: string;
  targetSamples: SampleTable | null;
}

/**
 * One MappingRequest per batch. Request ids are stable:
 * `<source_db>-><target_db>#<batch>`.
 */
export function buildMappingRequests(
  questions: readonly Question[],
  context: RequestContext,
  maxQuestionsPerPrompt: number
): MappingRequest[] {
  return partition(questions, maxQuestionsPerPrompt).map((batch, batchIndex) => ({
    id: `${context.sourceDbId}->${context.targetDbId}#${batchIndex}`,
    batchIndex,
    sourceDataset: context.sourceDataset,
    sourceDbId: context.sourceDbId,
    targetDataset: context.targetDataset,
    targetDbId: context.targetDbId,
    questions: batch,
    sourceSchema: context.sourceSchema,
    targetSchema: context.targetSchema,
    targetSamples: context.targetSamples,
  }));
}
