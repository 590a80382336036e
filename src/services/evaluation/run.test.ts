import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdir, mkdtemp, readFile, rm } from 'fs/promises';
import { existsSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import knex from 'knex';
import { parseSettings } from '../../config.js';
import type { PipelineConfig } from '../../config.js';
import { DatasetError } from '../../types/errors.js';
import type { SampleTable } from '../../types/models.js';
import { writeJson } from '../../utils/files.js';
import type { DatasetStore } from '../dataset.js';
import type { GenerationCapability } from '../llm.js';
import { runExecutionStage, runSemanticStage, runStructuralStage, runSummaryStage } from './run.js';

const judge: GenerationCapability = {
  modelName: 'test-judge',
  generate: async () => ({
    text: JSON.stringify([
      {
        clarity_and_alignment_of_NL: { thought_process: 'clear', is_clear_and_meaningful: 'yes' },
        correctness_of_query: { thought_process: 'right table', is_correct_mapping: 'yes' },
      },
    ]),
    finishReason: 'stop',
    inputTokens: 1,
    outputTokens: 1,
    elapsedMs: 1,
  }),
};

const store: DatasetStore = {
  listSourceDbs: async () => [],
  getQuestions: async () => [],
  getSchema: async (dataset, dbId) => {
    if (dataset === 'civic_qa' && dbId === 'permits') return 'permits(id, kind)';
    throw new DatasetError(`No schema for ${dataset}/${dbId}`);
  },
  getSamples: async (): Promise<SampleTable | null> => null,
};

function record(targetDbId: string, targetQuery: string): Record<string, unknown> {
  return {
    source_dataset: 'library_qa',
    source_db_id: 'library',
    source_query: 'SELECT title FROM books',
    source_question: 'List all book titles.',
    target_db_id: targetDbId,
    target_query: targetQuery,
    target_question: targetQuery === '' ? '' : 'List all permit kinds.',
    tables_columns_replacement: { books: 'permits' },
    thought: '',
  };
}

async function readJsonFile(path: string): Promise<unknown> {
  return JSON.parse(await readFile(path, 'utf-8'));
}

describe('evaluation stages', () => {
  let root: string;
  let config: PipelineConfig;

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), 'evaluation-test-'));
    config = parseSettings({
      model: { model_name: 'test-model' },
      evaluation: {
        dataset_name: 'civic_qa',
        model_dir: 'test-model',
        databases_directory: join(root, 'databases'),
        generated_queries_directory: join(root, 'generated_queries'),
        result_directory: join(root, 'results'),
        summary_directory: join(root, 'summary'),
        retry_delay_ms: 0,
      },
    });

    const generated = join(root, 'generated_queries', 'civic_qa', 'test-model');
    await writeJson(join(generated, 'permits', 'response_library.json'), [
      record('permits', 'SELECT kind FROM permits'),
      record('permits', ''),
    ]);

    const filename = join(root, 'databases', 'civic_qa', 'permits', 'permits.sqlite');
    await mkdir(join(root, 'databases', 'civic_qa', 'permits'), { recursive: true });
    const db = knex({ client: 'sqlite3', connection: { filename }, useNullAsDefault: true });
    await db.schema.createTable('permits', (table) => {
      table.integer('id').primary();
      table.string('kind');
    });
    await db('permits').insert({ id: 1, kind: 'fence' });
    await db.destroy();
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it('should label and summarize structure', async () => {
    const outcome = await runStructuralStage(config);

    expect(outcome.summary.full).toEqual({
      total: 2,
      success: 1,
      error: 1,
      parse_failure: 0,
      not_generated_query: 1,
      not_evaluated: 0,
      success_rate: 0.5,
    });

    const dir = join(root, 'summary', 'civic_qa', 'test-model', 'structural_summary');
    expect(await readJsonFile(join(dir, 'full_summary', 'full_summary.json'))).toEqual(outcome.summary.full);
    expect(existsSync(join(dir, 'summary', 'permits.json'))).toBe(true);
    expect(existsSync(join(dir, 'queries', 'permits.json'))).toBe(true);
    expect(existsSync(join(dir, 'permits.json'))).toBe(true);
    expect(await readJsonFile(join(dir, 'full_summary', 'not_generated_results.json'))).toEqual([
      {
        dataset: 'civic_qa',
        target_db_id: 'permits',
        source_db_id: 'library',
        index: 1,
        source_question: 'List all book titles.',
        target_question: '',
        target_query: '',
        reason: 'not_generated',
      },
    ]);
  });

  it('should keep earlier labels when a later stage runs', async () => {
    await runStructuralStage(config);
    const outcome = await runExecutionStage(config);

    const [first, second] = outcome.groups[0].records;
    expect(first.evaluation.structural.status).toBe('match');
    expect(first.evaluation.execution).toMatchObject({ status: 'success', row_count: 1, rows: [['fence']] });
    expect(second.evaluation.execution).toEqual({ status: 'not_evaluated', reason: 'null_query' });
    expect(outcome.summary.full).toMatchObject({ success: 1, null_query: 1, success_result_rate: 0.5 });
  });

  it('should evaluate the latest generated records on a re-run', async () => {
    await runStructuralStage(config);
    await writeJson(join(root, 'generated_queries', 'civic_qa', 'test-model', 'permits', 'response_library.json'), [
      record('permits', 'SELECT id, kind FROM permits'),
    ]);

    const outcome = await runStructuralStage(config);
    const records = outcome.groups[0].records;
    expect(records.map((r) => r.target_query)).toEqual(['SELECT id, kind FROM permits']);
    expect(records[0].evaluation.structural).toEqual({
      status: 'mismatch',
      reason: 'different_template',
      source_template: 'SELECT <COL> FROM <TABLE>',
      target_template: 'SELECT <COL>, <COL> FROM <TABLE>',
    });
  });

  it('should skip execution for a target without a database file', async () => {
    await writeJson(join(root, 'generated_queries', 'civic_qa', 'test-model', 'zoning', 'response_library.json'), [
      record('zoning', 'SELECT kind FROM zones'),
    ]);
    const outcome = await runExecutionStage(config);

    const zoning = outcome.groups.find((group) => group.targetDbId === 'zoning');
    const path = join(root, 'databases', 'civic_qa', 'zoning', 'zoning.sqlite');
    expect(zoning?.records[0].evaluation.execution).toEqual({ status: 'not_evaluated', reason: `database not found: ${path}` });
  });

  it('should grade pairs and archive the ratings', async () => {
    const outcome = await runSemanticStage(config, { judge, store, prompts: { system: 'Rate each pair.' } });

    expect(outcome.failures).toEqual([]);
    expect(outcome.summary.full).toMatchObject({ total: 2, evaluated: 1, not_evaluated: 1, correct_sql_mapping: 1 });
    const archived = join(root, 'results', 'civic_qa', 'test-model', 'permits', 'llm', 'response_library_llm.json');
    expect(await readJsonFile(archived)).toHaveLength(1);
  });

  it('should skip grading when the schema is unavailable', async () => {
    await writeJson(join(root, 'generated_queries', 'civic_qa', 'test-model', 'zoning', 'response_library.json'), [
      record('zoning', 'SELECT kind FROM zones'),
    ]);
    const outcome = await runSemanticStage(config, { judge, store, prompts: { system: 'Rate each pair.' } });

    expect(outcome.failures).toEqual([
      {
        target_db_id: 'zoning',
        source_db_id: 'library',
        batch_index: -1,
        questions: 1,
        error: 'schema unavailable: DatasetError: No schema for civic_qa/zoning',
      },
    ]);
  });

  it('should rewrite every axis summary', async () => {
    await runStructuralStage(config);
    await runExecutionStage(config);
    const summaries = await runSummaryStage(config);

    expect(summaries.map((summary) => summary.axis)).toEqual(['structural', 'execution', 'semantic']);
    expect(summaries.map((summary) => summary.full.total)).toEqual([2, 2, 2]);
    const semanticDir = join(root, 'summary', 'civic_qa', 'test-model', 'semantic_summary');
    expect(await readJsonFile(join(semanticDir, 'full_summary', 'full_summary.json'))).toMatchObject({ evaluated: 0 });
  });
});
