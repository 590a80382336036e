import { describe, it, expect } from 'vitest';
import { describeValidation, pairEntries, validateEntry } from './validator.js';
import type { EntryValidation, ValidationOptions } from './validator.js';
import { DEFAULT_REQUIRED_FIELDS } from '../../config.js';
import type { Question } from '../../types/models.js';

const expected = { sourceDbId: 'library', targetDbId: 'permits' };

const strict: ValidationOptions = {
  requiredFields: DEFAULT_REQUIRED_FIELDS,
  fieldsChecking: true,
  dbIdMatching: true,
};

function entry(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    source_db_id: 'library',
    source_query: 'SELECT COUNT(*) FROM books',
    source_question: 'How many books are there?',
    target_db_id: 'permits',
    target_query: 'SELECT COUNT(*) FROM permits',
    target_question: 'How many permits are there?',
    tables_columns_replacement: { books: 'permits' },
    thought: 'books map to permits',
    ...overrides,
  };
}

function question(query: string, text: string): Question {
  return { dataset: 'library_qa', db_id: 'library', question: text, query };
}

describe('validateEntry', () => {
  it('should accept a complete entry', () => {
    const result = validateEntry(entry(), expected, strict);
    expect(result.status).toBe('valid');
  });

  it('should name every missing field', () => {
    const raw = entry();
    delete raw['thought'];
    delete raw['target_question'];
    expect(validateEntry(raw, expected, strict)).toEqual({
      status: 'missing_fields',
      fields: ['target_question', 'thought'],
    });
  });

  it('should skip the field check when disabled', () => {
    const raw = entry();
    delete raw['thought'];
    const result = validateEntry(raw, expected, { ...strict, fieldsChecking: false });
    expect(result.status === 'valid' && result.entry.thought).toBe('');
  });

  it('should report fields with the wrong type', () => {
    expect(validateEntry(entry({ tables_columns_replacement: 'books -> permits' }), expected, strict)).toEqual({
      status: 'invalid_fields',
      fields: ['tables_columns_replacement'],
    });
  });

  it('should report a target mismatch', () => {
    expect(validateEntry(entry({ target_db_id: 'schools' }), expected, strict)).toEqual({
      status: 'target_mismatch',
      expected: 'permits',
      actual: 'schools',
    });
  });

  it('should check the target even when db id matching is off', () => {
    const result = validateEntry(entry({ target_db_id: 'schools' }), expected, { ...strict, dbIdMatching: false });
    expect(result.status).toBe('target_mismatch');
  });

  it('should check the source only when db id matching is on', () => {
    const raw = entry({ source_db_id: 'archive' });
    expect(validateEntry(raw, expected, strict).status).toBe('source_mismatch');
    expect(validateEntry(raw, expected, { ...strict, dbIdMatching: false }).status).toBe('valid');
  });

  it('should reject entries that are not objects', () => {
    expect(validateEntry(['a'], expected, strict)).toEqual({ status: 'malformed', reason: 'expected an object, got array' });
    expect(validateEntry('text', expected, strict)).toEqual({ status: 'malformed', reason: 'expected an object, got string' });
  });

  it('should not mutate the entry', () => {
    const raw = entry({ target_question: null });
    const before = JSON.stringify(raw);
    validateEntry(raw, expected, strict);
    expect(JSON.stringify(raw)).toBe(before);
  });
});

describe('describeValidation', () => {
  it('should describe each failure in one line', () => {
    expect(describeValidation({ status: 'missing_fields', fields: ['thought'] })).toBe('missing fields: thought');
    expect(describeValidation({ status: 'target_mismatch', expected: 'permits', actual: 'schools' })).toBe(
      'target_db_id "schools" does not match "permits"'
    );
  });
});

describe('pairEntries', () => {
  const q1 = question('SELECT COUNT(*) FROM books', 'How many books are there?');
  const q2 = question('SELECT title FROM books WHERE year = 1999', 'Which books came out in 1999?');
  const q3 = question('SELECT MAX(pages) FROM books', 'What is the longest book?');

  function valid(overrides: Record<string, unknown>): EntryValidation {
    return validateEntry(entry(overrides), expected, strict);
  }

  it('should match entries by echoed query regardless of order and spacing', () => {
    const pairing = pairEntries(
      [q1, q2],
      [
        valid({ source_query: 'select title  FROM books WHERE year = 1999;', source_question: 'x' }),
        valid({ source_query: 'SELECT COUNT(*) FROM books' }),
      ]
    );
    expect(pairing.matched.map((m) => m.question)).toEqual([q1, q2]);
    expect(pairing.matched[1].entry.source_question).toBe('x');
    expect(pairing.unmatched).toEqual([]);
  });

  it('should match by question text when the query was not echoed', () => {
    const pairing = pairEntries([q3], [valid({ source_query: '', source_question: 'what is the LONGEST book?' })]);
    expect(pairing.matched).toHaveLength(1);
  });

  it('should leave questions without a valid entry unmatched', () => {
    const pairing = pairEntries(
      [q1, q2, q3],
      [valid({ source_query: q1.query }), valid({ source_query: q3.query, source_question: q3.question })]
    );
    expect(pairing.unmatched).toEqual([q2]);
    expect(pairing.issues).toEqual([]);
  });

  it('should record the reason of every failed entry', () => {
    const pairing = pairEntries(
      [q1, q2],
      [valid({ source_query: q1.query }), valid({ source_query: q2.query, source_question: q2.question, target_db_id: 'x' })]
    );
    expect(pairing.unmatched).toEqual([q2]);
    expect(pairing.issues).toEqual(['entry 1: target_db_id "x" does not match "permits"']);
  });

  it('should fall back to position when every question got one entry', () => {
    const pairing = pairEntries(
      [q1, q2],
      [valid({ source_query: q1.query }), valid({ source_query: 'SELECT 1', source_question: 'rephrased' })]
    );
    expect(pairing.matched.map((m) => m.question)).toEqual([q1, q2]);
    expect(pairing.surplus).toBe(0);
  });

  it('should count valid entries that answer nothing as surplus', () => {
    const pairing = pairEntries(
      [q1],
      [valid({ source_query: q1.query }), valid({ source_query: 'SELECT 1', source_question: 'unrelated' })]
    );
    expect(pairing.matched).toHaveLength(1);
    expect(pairing.surplus).toBe(1);
  });
});
