/**
 * Type definitions and Zod schemas for the records that flow between stages.
 */

import { z } from 'zod';
import { JsonObjectSchema, JsonValueSchema } from './utils.js';
import type { JsonObject, JsonValue } from './utils.js';

// ============================================================================
// INPUTS
// ============================================================================

/**
 * One source question with its gold SQL.
 */
export const QuestionSchema = z
  .object({
    dataset: z.string().optional(),
    db_id: z.string().min(1),
    question: z.string(),
    query: z.string(),
  })
  .passthrough();

export interface Question {
  readonly dataset?: string;
  readonly db_id: string;
  readonly question: string;
  readonly query: string;
}

/**
 * Database id -> full schema description text.
 */
export const SchemaMapSchema = z.record(z.string());
export type SchemaMap = Readonly<Record<string, string>>;

/**
 * Table name -> rows, each row aligned to the table's column order.
 */
export const SampleTableSchema = z.record(z.array(z.array(JsonValueSchema)));
export type SampleTable = Readonly<Record<string, readonly (readonly JsonValue[])[]>>;

/**
 * A batch of questions from one source database mapped onto one target.
 */
export interface MappingRequest {
  readonly id: string;
  readonly batchIndex: number;
  readonly sourceDataset: string;
  readonly sourceDbId: string;
  readonly targetDataset: string;
  readonly targetDbId: string;
  readonly questions: readonly Question[];
  readonly sourceSchema: string;
  readonly targetSchema: string;
  readonly targetSamples: SampleTable | null;
}

// ============================================================================
// GENERATION OUTPUT
// ============================================================================

export interface GenerationMetadata {
  readonly request_id: string;
  readonly batch_index: number;
  readonly attempt: number;
  readonly model: string;
  readonly corrected_response: boolean;
  readonly generated_at: string;
}

export const GenerationMetadataSchema = z.object({
  request_id: z.string(),
  batch_index: z.number(),
  attempt: z.number(),
  model: z.string(),
  corrected_response: z.boolean(),
  generated_at: z.string(),
});

/**
 * The unit of generation output. Fields are never rewritten once written.
 */
export interface MappingRecord {
  readonly source_dataset: string;
  readonly source_db_id: string;
  readonly source_query: string;
  readonly source_question: string;
  readonly target_db_id: string;
  readonly target_query: string;
  readonly target_question: string;
  readonly tables_columns_replacement: JsonObject;
  readonly thought: JsonValue;
  readonly generation_metadata?: GenerationMetadata;
}

// ============================================================================
// EVALUATION LABELS (discriminated unions)
// ============================================================================

export type StructuralLabel =
  | { readonly status: 'not_evaluated' }
  | { readonly status: 'match'; readonly source_template: string; readonly target_template: string }
  | {
      readonly status: 'mismatch';
      readonly reason: 'different_template' | 'parse_failure' | 'not_generated';
      readonly detail?: string;
      readonly source_template?: string;
      readonly target_template?: string;
    };

export type ExecutionLabel =
  | { readonly status: 'not_evaluated'; readonly reason?: string }
  | {
      readonly status: 'success';
      readonly row_count: number;
      readonly rows: readonly (readonly JsonValue[])[];
      readonly truncated: boolean;
      readonly elapsed_ms: number;
    }
  | { readonly status: 'empty'; readonly elapsed_ms: number }
  | { readonly status: 'error'; readonly reason: string; readonly timeout: boolean; readonly elapsed_ms: number };

export type SemanticLabel =
  | { readonly status: 'not_evaluated'; readonly reason?: string }
  | {
      readonly status: 'evaluated';
      readonly question_score: number;
      readonly sql_score: number;
      readonly reasoning: { readonly question: string; readonly sql: string };
    };

export interface EvaluationLabel {
  readonly structural: StructuralLabel;
  readonly execution: ExecutionLabel;
  readonly semantic: SemanticLabel;
}

/**
 * Default label: every axis explicitly not evaluated.
 */
export const NOT_EVALUATED: EvaluationLabel = Object.freeze({
  structural: Object.freeze({ status: 'not_evaluated' as const }),
  execution: Object.freeze({ status: 'not_evaluated' as const }),
  semantic: Object.freeze({ status: 'not_evaluated' as const }),
});

const StructuralLabelSchema = z.discriminatedUnion('status', [
  z.object({ status: z.literal('not_evaluated') }),
  z.object({ status: z.literal('match'), source_template: z.string(), target_template: z.string() }),
  z.object({
    status: z.literal('mismatch'),
    reason: z.enum(['different_template', 'parse_failure', 'not_generated']),
    detail: z.string().optional(),
    source_template: z.string().optional(),
    target_template: z.string().optional(),
  }),
]);

const ExecutionLabelSchema = z.discriminatedUnion('status', [
  z.object({ status: z.literal('not_evaluated'), reason: z.string().optional() }),
  z.object({
    status: z.literal('success'),
    row_count: z.number(),
    rows: z.array(z.array(JsonValueSchema)),
    truncated: z.boolean(),
    elapsed_ms: z.number(),
  }),
  z.object({ status: z.literal('empty'), elapsed_ms: z.number() }),
  z.object({ status: z.literal('error'), reason: z.string(), timeout: z.boolean(), elapsed_ms: z.number() }),
]);

const SemanticLabelSchema = z.discriminatedUnion('status', [
  z.object({ status: z.literal('not_evaluated'), reason: z.string().optional() }),
  z.object({
    status: z.literal('evaluated'),
    question_score: z.number(),
    sql_score: z.number(),
    reasoning: z.object({ question: z.string(), sql: z.string() }),
  }),
]);

export const EvaluationLabelSchema = z.object({
  structural: StructuralLabelSchema.default({ status: 'not_evaluated' }),
  execution: ExecutionLabelSchema.default({ status: 'not_evaluated' }),
  semantic: SemanticLabelSchema.default({ status: 'not_evaluated' }),
});

/**
 * A mapping record with its evaluation labels attached alongside.
 */
export interface EvaluatedRecord extends MappingRecord {
  readonly evaluation: EvaluationLabel;
}

/**
 * Schema for records read back from disk. Generation may have left
 * target fields empty, so they are optional here and defaulted to ''.
 */
export const StoredRecordSchema = z
  .object({
    source_dataset: z.string().default(''),
    source_db_id: z.string(),
    source_query: z.string().default(''),
    source_question: z.string().default(''),
    target_db_id: z.string(),
    target_query: z.string().nullable().optional().transform((v) => v ?? ''),
    target_question: z.string().nullable().optional().transform((v) => v ?? ''),
    tables_columns_replacement: JsonObjectSchema.default({}),
    thought: JsonValueSchema.default(''),
    generation_metadata: GenerationMetadataSchema.optional(),
    evaluation: EvaluationLabelSchema.default({}),
  });

// ============================================================================
// RUN STATISTICS
// ============================================================================

export type RunStatus = 'complete' | 'incomplete';

export interface RunStats {
  status: RunStatus;
  stop_reason: string | null;
  started_at: string;
  finished_at: string | null;
  /** Requests sent to the generation capability, retries included. */
  attempted: number;
  /** Responses whose every entry validated without repair. */
  succeeded: number;
  /** Responses that validated after a missing-comma repair. */
  corrected: number;
  /** Responses rejected (format, fields, db id, or missing entries). */
  validation_failed: number;
  /** Capability failures (transport, provider, timeout). */
  unexpected_errors: number;
  /** Attempts that were retries of an earlier failed attempt. */
  retried: number;
  /** Requests that ran out of retries with questions still unmapped. */
  exhausted: number;
  /** Requests never started because the failure budget ran out. */
  cancelled: number;
  questions_requested: number;
  records_emitted: number;
  questions_unmapped: number;
  input_tokens: number;
  output_tokens: number;
  model_time_ms: number;
  wall_time_ms: number;
}

// ============================================================================
// SUMMARIES
// ============================================================================

export type SummaryAxis = 'structural' | 'execution' | 'semantic';

export interface StructuralCounts {
  total: number;
  success: number;
  error: number;
  parse_failure: number;
  not_generated_query: number;
  not_evaluated: number;
  success_rate: number;
}

export interface ExecutionCounts {
  total: number;
  success: number;
  empty: number;
  error: number;
  timeout: number;
  null_query: number;
  not_evaluated: number;
  success_run_rate: number;
  success_result_rate: number;
}

export interface SemanticCounts {
  total: number;
  evaluated: number;
  not_evaluated: number;
  meaningful_nl_question: number;
  correct_sql_mapping: number;
  mean_question_score: number;
  mean_sql_score: number;
  meaningfulness_rate: number;
  correct_sql_mapping_rate: number;
}

export interface AxisCounts {
  structural: StructuralCounts;
  execution: ExecutionCounts;
  semantic: SemanticCounts;
}

/**
 * Counts for one group: a dataset/target pair, optionally narrowed to one source db.
 */
export interface SummaryRecord<A extends SummaryAxis = SummaryAxis> {
  readonly dataset: string;
  readonly target_db_id: string;
  readonly source_db_id: string | null;
  readonly axis: A;
  readonly counts: AxisCounts[A];
}

/**
 * One row per query in the fine-grained summary.
 */
export interface QuerySummaryRow {
  readonly dataset: string;
  readonly target_db_id: string;
  readonly source_db_id: string;
  readonly index: number;
  readonly target_question: string;
  readonly target_query: string;
  readonly structural: StructuralLabel['status'];
  readonly execution: ExecutionLabel['status'];
  readonly semantic_question_score: number | null;
  readonly semantic_sql_score: number | null;
}
