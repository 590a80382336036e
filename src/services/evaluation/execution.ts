/**
 * Execution evaluator: run each mapped query against its target database.
 *
 * Engine errors and timeouts are labels, not failures. Queries on one
 * database run one at a time over a single runner.
 */

import type { EvaluatedRecord, ExecutionLabel } from '../../types/models.js';
import { describeError } from '../../types/errors.js';
import { logger } from '../../utils/logger.js';
import type { QueryOutcome, QueryRunner } from '../database.js';
import { withLabel } from './records.js';

export interface ExecutionOptions {
  timeoutMs: number;
  maxRowsPreserved: number;
}

export const NULL_QUERY = 'null_query';

export function executionLabel(outcome: QueryOutcome, maxRowsPreserved: number): ExecutionLabel {
  if (outcome.kind === 'error') {
    return { status: 'error', reason: outcome.reason, timeout: outcome.timeout, elapsed_ms: outcome.elapsedMs };
  }
  if (outcome.rows.length === 0) {
    return { status: 'empty', elapsed_ms: outcome.elapsedMs };
  }
  return {
    status: 'success',
    row_count: outcome.rows.length,
    rows: outcome.rows.slice(0, maxRowsPreserved),
    truncated: outcome.rows.length > maxRowsPreserved,
    elapsed_ms: outcome.elapsedMs,
  };
}

/**
 * Execute one record's mapped query. Never throws for query failures.
 */
export async function executeRecord(
  record: EvaluatedRecord,
  runner: QueryRunner,
  options: ExecutionOptions
): Promise<EvaluatedRecord> {
  const sql = record.target_query.trim();
  if (sql === '') {
    return withLabel(record, 'execution', { status: 'not_evaluated', reason: NULL_QUERY });
  }

  let outcome: QueryOutcome;
  try {
    outcome = await runner.run(sql, options.timeoutMs);
  } catch (error) {
    // Next query starts on a fresh connection
    outcome = { kind: 'error', reason: describeError(error), timeout: false, elapsedMs: 0 };
    await runner.reset();
  }

  if (outcome.kind === 'error') {
    logger.debug(`Execution error on ${record.target_db_id}: ${outcome.reason}`);
  }
  return withLabel(record, 'execution', executionLabel(outcome, options.maxRowsPreserved));
}

/**
 * Execute a sequence of records in order over one runner.
 */
export async function evaluateExecution(
  records: readonly EvaluatedRecord[],
  runner: QueryRunner,
  options: ExecutionOptions
): Promise<EvaluatedRecord[]> {
  const evaluated: EvaluatedRecord[] = [];
  for (const record of records) {
    evaluated.push(await executeRecord(record, runner, options));
  }
  return evaluated;
}

/**
 * Label every record as not executed, e.g. when the database file is missing.
 */
export function skipExecution(records: readonly EvaluatedRecord[], reason: string): EvaluatedRecord[] {
  return records.map((record) =>
    withLabel(record, 'execution', {
      status: 'not_evaluated',
      reason: record.target_query.trim() === '' ? NULL_QUERY : reason,
    })
  );
}
