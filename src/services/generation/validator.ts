/**
 * Response Validator.
 *
 * Classifies each entry of a generation response as a well-formed mapping or
 * a named failure. Nothing downstream probes raw response objects; they only
 * see the tagged results produced here.
 */

import { z } from 'zod';
import { JsonObjectSchema, JsonValueSchema, isJsonObject } from '../../types/utils.js';
import type { Question } from '../../types/models.js';

const text = z
  .string()
  .nullable()
  .optional()
  .transform((value) => value ?? '');

/**
 * Shape of one entry in the model's JSON array. Extra keys are ignored.
 */
export const ResponseEntrySchema = z.object({
  source_db_id: text,
  source_query: text,
  source_question: text,
  target_db_id: text,
  target_query: text,
  target_question: text,
  tables_columns_replacement: JsonObjectSchema.optional().transform((value) => value ?? {}),
  thought: JsonValueSchema.optional().transform((value) => value ?? ''),
});

export type MappingEntry = z.output<typeof ResponseEntrySchema>;

export interface ValidationOptions {
  /** Fields every entry must carry when `fieldsChecking` is on. */
  requiredFields: readonly string[];
  fieldsChecking: boolean;
  /** Also require `source_db_id` to match the requested source. */
  dbIdMatching: boolean;
}

export interface Expectation {
  sourceDbId: string;
  targetDbId: string;
}

export type EntryValidation =
  | { status: 'valid'; entry: MappingEntry }
  | { status: 'missing_fields'; fields: string[] }
  | { status: 'invalid_fields'; fields: string[] }
  | { status: 'target_mismatch'; expected: string; actual: string }
  | { status: 'source_mismatch'; expected: string; actual: string }
  | { status: 'malformed'; reason: string };

/**
 * Validate one response entry. The target database check always applies;
 * no entry naming another target can come out `valid`.
 */
export function validateEntry(
  raw: unknown,
  expected: Expectation,
  options: ValidationOptions
): EntryValidation {
  if (!isJsonObject(raw)) {
    return { status: 'malformed', reason: `expected an object, got ${Array.isArray(raw) ? 'array' : typeof raw}` };
  }

  if (options.fieldsChecking) {
    const missing = options.requiredFields.filter((field) => !(field in raw));
    if (missing.length > 0) {
      return { status: 'missing_fields', fields: missing };
    }
  }

  const parsed = ResponseEntrySchema.safeParse(raw);
  if (!parsed.success) {
    const fields = [...new Set(parsed.error.issues.map((issue) => String(issue.path[0] ?? '(entry)')))];
    return { status: 'invalid_fields', fields };
  }
  const entry = parsed.data;

  if (entry.target_db_id !== expected.targetDbId) {
    return { status: 'target_mismatch', expected: expected.targetDbId, actual: entry.target_db_id };
  }
  if (options.dbIdMatching && entry.source_db_id !== expected.sourceDbId) {
    return { status: 'source_mismatch', expected: expected.sourceDbId, actual: entry.source_db_id };
  }

  return { status: 'valid', entry };
}

/**
 * One-line reason for a failed entry.
 */
export function describeValidation(result: EntryValidation): string {
  switch (result.status) {
    case 'valid':
      return 'valid';
    case 'missing_fields':
      return `missing fields: ${result.fields.join(', ')}`;
    case 'invalid_fields':
      return `invalid fields: ${result.fields.join(', ')}`;
    case 'target_mismatch':
      return `target_db_id "${result.actual}" does not match "${result.expected}"`;
    case 'source_mismatch':
      return `source_db_id "${result.actual}" does not match "${result.expected}"`;
    case 'malformed':
      return `malformed entry: ${result.reason}`;
  }
}

// ============================================================================
// Pairing entries with the questions that were asked
// ============================================================================

function normalizeQuery(sql: string): string {
  return sql.replace(/\s+/g, ' ').trim().replace(/;$/, '').trim().toLowerCase();
}

function normalizeQuestion(question: string): string {
  return question.replace(/\s+/g, ' ').trim().toLowerCase();
}

export interface Pairing {
  matched: { question: Question; entry: MappingEntry }[];
  /** Questions with no valid entry; these are retried. */
  unmatched: Question[];
  /** Reasons for every entry that failed validation. */
  issues: string[];
  /** Valid entries that answered no asked question. */
  surplus: number;
}

/**
 * Match validated entries to questions by their echoed source query or
 * question text. When the response has exactly one entry per question,
 * entries left over are paired by position.
 */
export function pairEntries(questions: readonly Question[], results: readonly EntryValidation[]): Pairing {
  const issues: string[] = [];
  const valid: { entry: MappingEntry; index: number }[] = [];
  results.forEach((result, index) => {
    if (result.status === 'valid') {
      valid.push({ entry: result.entry, index });
    } else {
      issues.push(`entry ${index}: ${describeValidation(result)}`);
    }
  });

  const answers: (MappingEntry | null)[] = questions.map(() => null);
  const used = new Set<number>();

  questions.forEach((question, q) => {
    const query = normalizeQuery(question.query);
    const text = normalizeQuestion(question.question);
    const hit = valid.find(
      ({ entry, index }) =>
        !used.has(index) &&
        (normalizeQuery(entry.source_query) === query || normalizeQuestion(entry.source_question) === text)
    );
    if (hit) {
      answers[q] = hit.entry;
      used.add(hit.index);
    }
  });

  if (results.length === questions.length) {
    questions.forEach((_, q) => {
      const result = results[q];
      if (answers[q] === null && result.status === 'valid' && !used.has(q)) {
        answers[q] = result.entry;
        used.add(q);
      }
    });
  }

  const matched: Pairing['matched'] = [];
  const unmatched: Question[] = [];
  questions.forEach((question, q) => {
    const entry = answers[q];
    if (entry) {
      matched.push({ question, entry });
    } else {
      unmatched.push(question);
    }
  });

  return { matched, unmatched, issues, surplus: valid.length - used.size };
}
