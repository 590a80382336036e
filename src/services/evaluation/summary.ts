/**
 * Summary aggregator. Pure: counts are recomputed from labels on every call,
 * groups are sorted and keys are emitted in a fixed order, so an unchanged
 * record set always serializes to the same bytes.
 */

import type {
  AxisCounts,
  EvaluatedRecord,
  ExecutionCounts,
  QuerySummaryRow,
  SemanticCounts,
  StructuralCounts,
  SummaryAxis,
  SummaryRecord,
} from '../../types/models.js';
import type { RecordGroup } from './records.js';

export const SUMMARY_AXES: readonly SummaryAxis[] = ['structural', 'execution', 'semantic'];

/**
 * A record some axis could not judge, with the reason.
 */
export interface UnevaluatedRow {
  readonly dataset: string;
  readonly target_db_id: string;
  readonly source_db_id: string;
  readonly index: number;
  readonly source_question: string;
  readonly target_question: string;
  readonly target_query: string;
  readonly reason: string;
}

export interface AxisSummary<A extends SummaryAxis = SummaryAxis> {
  readonly axis: A;
  /** Whole dataset */
  readonly full: AxisCounts[A];
  /** One row per target database */
  readonly coarse: SummaryRecord<A>[];
  /** One row per (target, source) pair; empty unless requested */
  readonly bySource: SummaryRecord<A>[];
  /** One row per query */
  readonly queries: QuerySummaryRow[];
  readonly unevaluated: UnevaluatedRow[];
}

function rate(part: number, whole: number): number {
  return whole > 0 ? part / whole : 0;
}

export function structuralCounts(records: readonly EvaluatedRecord[]): StructuralCounts {
  let success = 0;
  let error = 0;
  let parseFailure = 0;
  let notGenerated = 0;
  let notEvaluated = 0;
  for (const { evaluation } of records) {
    const label = evaluation.structural;
    if (label.status === 'match') {
      success++;
    } else if (label.status === 'mismatch') {
      error++;
      if (label.reason === 'parse_failure') parseFailure++;
      if (label.reason === 'not_generated') notGenerated++;
    } else {
      notEvaluated++;
    }
  }
  return {
    total: records.length,
    success,
    error,
    parse_failure: parseFailure,
    not_generated_query: notGenerated,
    not_evaluated: notEvaluated,
    success_rate: rate(success, records.length),
  };
}

export function executionCounts(records: readonly EvaluatedRecord[]): ExecutionCounts {
  let success = 0;
  let empty = 0;
  let error = 0;
  let timeout = 0;
  let nullQuery = 0;
  let notEvaluated = 0;
  for (const { evaluation } of records) {
    const label = evaluation.execution;
    switch (label.status) {
      case 'success':
        success++;
        break;
      case 'empty':
        empty++;
        break;
      case 'error':
        error++;
        if (label.timeout) timeout++;
        break;
      case 'not_evaluated':
        if (label.reason === 'null_query') nullQuery++;
        else notEvaluated++;
        break;
    }
  }
  return {
    total: records.length,
    success,
    empty,
    error,
    timeout,
    null_query: nullQuery,
    not_evaluated: notEvaluated,
    success_run_rate: rate(success + empty, records.length),
    success_result_rate: rate(success, records.length),
  };
}

export function semanticCounts(records: readonly EvaluatedRecord[]): SemanticCounts {
  let evaluated = 0;
  let meaningful = 0;
  let correct = 0;
  let questionTotal = 0;
  let sqlTotal = 0;
  for (const { evaluation } of records) {
    const label = evaluation.semantic;
    if (label.status !== 'evaluated') continue;
    evaluated++;
    questionTotal += label.question_score;
    sqlTotal += label.sql_score;
    if (label.question_score >= 1) meaningful++;
    if (label.sql_score >= 1) correct++;
  }
  return {
    total: records.length,
    evaluated,
    not_evaluated: records.length - evaluated,
    meaningful_nl_question: meaningful,
    correct_sql_mapping: correct,
    mean_question_score: rate(questionTotal, evaluated),
    mean_sql_score: rate(sqlTotal, evaluated),
    meaningfulness_rate: rate(meaningful, evaluated),
    correct_sql_mapping_rate: rate(correct, evaluated),
  };
}

const COUNTERS: { [A in SummaryAxis]: (records: readonly EvaluatedRecord[]) => AxisCounts[A] } = {
  structural: structuralCounts,
  execution: executionCounts,
  semantic: semanticCounts,
};

export function countsFor<A extends SummaryAxis>(axis: A, records: readonly EvaluatedRecord[]): AxisCounts[A] {
  const count: (records: readonly EvaluatedRecord[]) => AxisCounts[A] = COUNTERS[axis];
  return count(records);
}

function unevaluatedReason(axis: SummaryAxis, record: EvaluatedRecord): string | null {
  if (axis === 'structural') {
    const label = record.evaluation.structural;
    return label.status === 'mismatch' && label.reason === 'not_generated' ? 'not_generated' : null;
  }
  const label = axis === 'execution' ? record.evaluation.execution : record.evaluation.semantic;
  return label.status === 'not_evaluated' && label.reason !== undefined ? label.reason : null;
}

function queryRow(group: RecordGroup, record: EvaluatedRecord, index: number): QuerySummaryRow {
  const semantic = record.evaluation.semantic;
  return {
    dataset: group.dataset,
    target_db_id: group.targetDbId,
    source_db_id: group.sourceDbId,
    index,
    target_question: record.target_question,
    target_query: record.target_query,
    structural: record.evaluation.structural.status,
    execution: record.evaluation.execution.status,
    semantic_question_score: semantic.status === 'evaluated' ? semantic.question_score : null,
    semantic_sql_score: semantic.status === 'evaluated' ? semantic.sql_score : null,
  };
}

function compareText(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Summarize one axis over every group.
 */
export function summarize<A extends SummaryAxis>(
  groups: readonly RecordGroup[],
  axis: A,
  options: { bySource: boolean }
): AxisSummary<A> {
  const sorted = [...groups].sort(
    (a, b) => compareText(a.targetDbId, b.targetDbId) || compareText(a.sourceDbId, b.sourceDbId)
  );

  const byTarget = new Map<string, { dataset: string; records: EvaluatedRecord[] }>();
  const bySource: SummaryRecord<A>[] = [];
  const queries: QuerySummaryRow[] = [];
  const unevaluated: UnevaluatedRow[] = [];

  for (const group of sorted) {
    const target = byTarget.get(group.targetDbId) ?? { dataset: group.dataset, records: [] };
    target.records.push(...group.records);
    byTarget.set(group.targetDbId, target);

    if (options.bySource) {
      bySource.push({
        dataset: group.dataset,
        target_db_id: group.targetDbId,
        source_db_id: group.sourceDbId,
        axis,
        counts: countsFor(axis, group.records),
      });
    }

    group.records.forEach((record, index) => {
      queries.push(queryRow(group, record, index));
      const reason = unevaluatedReason(axis, record);
      if (reason !== null) {
        unevaluated.push({
          dataset: group.dataset,
          target_db_id: group.targetDbId,
          source_db_id: group.sourceDbId,
          index,
          source_question: record.source_question,
          target_question: record.target_question,
          target_query: record.target_query,
          reason,
        });
      }
    });
  }

  const coarse: SummaryRecord<A>[] = [...byTarget.entries()].map(([targetDbId, { dataset, records }]) => ({
    dataset,
    target_db_id: targetDbId,
    source_db_id: null,
    axis,
    counts: countsFor(axis, records),
  }));

  return {
    axis,
    full: countsFor(
      axis,
      sorted.flatMap((group) => group.records)
    ),
    coarse,
    bySource,
    queries,
    unevaluated,
  };
}
