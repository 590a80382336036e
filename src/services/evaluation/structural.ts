/**
 * Structural evaluator: does the mapped query keep the source query's skeleton?
 */

import type { EvaluatedRecord, MappingRecord, StructuralLabel } from '../../types/models.js';
import { ParseError } from '../../types/errors.js';
import { abstractQuery, templatesEqual } from '../sql/template.js';
import type { SqlTemplate } from '../sql/template.js';
import { withLabel } from './records.js';

/**
 * True when generation left the mapped query or question empty.
 */
export function isNotGenerated(record: Pick<MappingRecord, 'target_query' | 'target_question'>): boolean {
  return record.target_query.trim() === '' || record.target_question.trim() === '';
}

type Abstracted = { ok: true; template: SqlTemplate } | { ok: false; reason: string };

function tryAbstract(sql: string): Abstracted {
  try {
    return { ok: true, template: abstractQuery(sql) };
  } catch (error) {
    if (error instanceof ParseError) {
      return { ok: false, reason: error.message };
    }
    throw error;
  }
}

/**
 * Label one record. Parse failures become a mismatch with the reason kept.
 */
export function structuralLabel(record: MappingRecord): StructuralLabel {
  if (isNotGenerated(record)) {
    return { status: 'mismatch', reason: 'not_generated' };
  }

  const source = tryAbstract(record.source_query);
  const target = tryAbstract(record.target_query);
  if (!source.ok || !target.ok) {
    const details: string[] = [];
    if (!source.ok) details.push(`source: ${source.reason}`);
    if (!target.ok) details.push(`target: ${target.reason}`);
    return {
      status: 'mismatch',
      reason: 'parse_failure',
      detail: details.join('; '),
      ...(source.ok ? { source_template: source.template.text } : {}),
      ...(target.ok ? { target_template: target.template.text } : {}),
    };
  }

  if (templatesEqual(source.template, target.template)) {
    return { status: 'match', source_template: source.template.text, target_template: target.template.text };
  }
  return {
    status: 'mismatch',
    reason: 'different_template',
    source_template: source.template.text,
    target_template: target.template.text,
  };
}

export function evaluateStructural(record: EvaluatedRecord): EvaluatedRecord {
  return withLabel(record, 'structural', structuralLabel(record));
}
