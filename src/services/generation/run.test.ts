import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, rm } from 'fs/promises';
import { existsSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { z } from 'zod';
import { parseSettings } from '../../config.js';
import type { PipelineConfig } from '../../config.js';
import { DatasetError } from '../../types/errors.js';
import { QuestionSchema } from '../../types/models.js';
import type { Question, SampleTable } from '../../types/models.js';
import type { DatasetStore } from '../dataset.js';
import type { GenerationCapability, GenerationResponse } from '../llm.js';
import { buildPipelineRequests, combineRunStats, runGeneration } from './run.js';
import { emptyRunStats } from './stats.js';

const QUESTIONS: Record<string, Question[]> = {
  library: [
    { dataset: 'library_qa', db_id: 'library', question: 'How many books are there?', query: 'SELECT COUNT(*) FROM books' },
    { dataset: 'library_qa', db_id: 'library', question: 'List all titles.', query: 'SELECT title FROM books' },
  ],
  garden: [{ dataset: 'library_qa', db_id: 'garden', question: 'How many plants?', query: 'SELECT COUNT(*) FROM plants' }],
};

const SCHEMAS: Record<string, string> = {
  'library_qa/library': 'books(id, title)',
  'library_qa/garden': 'plants(id, name)',
  'civic_qa/permits': 'permits(id, kind)',
};

class MemoryStore implements DatasetStore {
  async listSourceDbs(dataset: string): Promise<string[]> {
    if (dataset !== 'library_qa') throw new DatasetError(`Unknown dataset ${dataset}`);
    return Object.keys(QUESTIONS).sort();
  }

  async getQuestions(_dataset: string, dbId: string): Promise<Question[]> {
    const questions = QUESTIONS[dbId];
    if (!questions) throw new DatasetError(`No questions for ${dbId}`);
    return questions;
  }

  async getSchema(dataset: string, dbId: string): Promise<string> {
    const schema = SCHEMAS[`${dataset}/${dbId}`];
    if (schema === undefined) throw new DatasetError(`No schema for ${dataset}/${dbId}`);
    return schema;
  }

  async getSamples(): Promise<SampleTable | null> {
    return { permits: [[1, 'fence']] };
  }
}

/**
 * Maps every asked question by echoing it onto the permits table.
 */
const echoCapability: GenerationCapability = {
  modelName: 'echo-model',
  async generate(prompt: string): Promise<GenerationResponse> {
    const start = prompt.indexOf('# Source query:\n') + '# Source query:\n'.length;
    const end = prompt.indexOf('\n\n#Output:');
    const asked = z.array(QuestionSchema).parse(JSON.parse(prompt.slice(start, end)));
    const entries = asked.map((item) => ({
      source_db_id: item.db_id,
      source_query: item.query,
      source_question: item.question,
      target_db_id: 'permits',
      target_query: item.query.replace(/books|plants/, 'permits'),
      target_question: item.question.replace(/books|plants/, 'permits'),
      tables_columns_replacement: {},
      thought: 'renamed the table',
    }));
    return { text: JSON.stringify(entries), finishReason: 'stop', inputTokens: 3, outputTokens: 4, elapsedMs: 2 };
  },
};

describe('buildPipelineRequests', () => {
  const pipeline = {
    source_dataset: 'library_qa',
    source_db_ids: [],
    target_dataset: 'civic_qa',
    target_db_id: 'permits',
    source_questions_shuffle_seed: -1,
    source_questions_limit: -1,
  };

  it('should batch every source database', async () => {
    const requests = await buildPipelineRequests(new MemoryStore(), pipeline, 1);
    expect(requests.map((r) => r.id)).toEqual(['garden->permits#0', 'library->permits#0', 'library->permits#1']);
    expect(requests[0].targetSamples).toEqual({ permits: [[1, 'fence']] });
  });

  it('should skip source databases that cannot be read', async () => {
    const requests = await buildPipelineRequests(new MemoryStore(), { ...pipeline, source_db_ids: ['attic', 'garden'] }, 5);
    expect(requests.map((r) => r.sourceDbId)).toEqual(['garden']);
  });

  it('should fail when the target schema is missing', async () => {
    await expect(buildPipelineRequests(new MemoryStore(), { ...pipeline, target_db_id: 'zoning' }, 5)).rejects.toThrow(
      'No schema for civic_qa/zoning'
    );
  });
});

describe('combineRunStats', () => {
  it('should add up counters and keep the stop reason', () => {
    const a = { ...emptyRunStats(), attempted: 2, records_emitted: 5 };
    const b = { ...emptyRunStats(), attempted: 1, records_emitted: 1 };
    const started = new Date('2026-01-01T00:00:00.000Z');
    const finished = new Date('2026-01-01T00:00:02.000Z');
    const total = combineRunStats([a, b], started, finished, 'Failure budget of 1 exhausted');
    expect(total).toMatchObject({
      attempted: 3,
      records_emitted: 6,
      wall_time_ms: 2000,
      status: 'incomplete',
      stop_reason: 'Failure budget of 1 exhausted',
    });
  });
});

describe('runGeneration', () => {
  let root: string;

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), 'generation-test-'));
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  function settings(data: unknown[]): PipelineConfig {
    return parseSettings({
      model: { model_name: 'echo-model' },
      generation: {
        output_directory: join(root, 'generation'),
        json_only_output_directory: join(root, 'generated_queries'),
        max_questions_per_prompt: 1,
        retry_delay_ms: 0,
      },
      data,
    });
  }

  const prompts = { base: 'Map each query.', system: 'You map SQL.' };
  const clock = () => new Date(2026, 0, 2, 3, 4, 5);

  it('should write distilled records for every source database', async () => {
    const config = settings([{ source_dataset: 'library_qa', target_dataset: 'civic_qa', target_db_id: 'permits' }]);

    const outcome = await runGeneration(config, { store: new MemoryStore(), capability: echoCapability, prompts, clock });

    expect(outcome.directory).toBe(join(root, 'generation', 'echo-model', '2026-01-02_03-04-05'));
    expect(outcome.stats.status).toBe('complete');
    expect(outcome.stats.records_emitted).toBe(3);
    expect(outcome.records.map((r) => r.target_query)).toEqual([
      'SELECT COUNT(*) FROM permits',
      'SELECT COUNT(*) FROM permits',
      'SELECT title FROM permits',
    ]);

    const distilled: unknown = JSON.parse(
      await readFile(join(root, 'generated_queries', 'civic_qa', 'echo-model', 'permits', 'response_library.json'), 'utf-8')
    );
    expect(distilled).toEqual([
      {
        source_dataset: 'library_qa',
        source_db_id: 'library',
        source_query: 'SELECT COUNT(*) FROM books',
        source_question: 'How many books are there?',
        target_db_id: 'permits',
        target_query: 'SELECT COUNT(*) FROM permits',
        target_question: 'How many permits are there?',
        tables_columns_replacement: {},
        thought: 'renamed the table',
      },
      {
        source_dataset: 'library_qa',
        source_db_id: 'library',
        source_query: 'SELECT title FROM books',
        source_question: 'List all titles.',
        target_db_id: 'permits',
        target_query: 'SELECT title FROM permits',
        target_question: 'List all titles.',
        tables_columns_replacement: {},
        thought: 'renamed the table',
      },
    ]);

    expect(existsSync(join(outcome.directory, 'settings.json'))).toBe(true);
    expect(existsSync(join(outcome.directory, 'stats.json'))).toBe(true);
    expect(existsSync(join(outcome.directory, 'civic_qa_permits', 'full', 'library.txt'))).toBe(true);
    expect(existsSync(join(outcome.directory, 'civic_qa_permits', 'report', 'stats_per_db.json'))).toBe(true);
  });

  it('should keep going when one pipeline cannot be built', async () => {
    const config = settings([
      { source_dataset: 'library_qa', target_dataset: 'civic_qa', target_db_id: 'zoning' },
      { source_dataset: 'library_qa', source_db_ids: ['garden'], target_dataset: 'civic_qa', target_db_id: 'permits' },
    ]);

    const outcome = await runGeneration(config, { store: new MemoryStore(), capability: echoCapability, prompts, clock });

    expect(outcome.pipelines.map((run) => run.error)).toEqual(['DatasetError: No schema for civic_qa/zoning', null]);
    expect(outcome.records).toHaveLength(1);
  });

  it('should fail when no pipeline can be built', async () => {
    const config = settings([{ source_dataset: 'library_qa', target_dataset: 'civic_qa', target_db_id: 'zoning' }]);
    await expect(
      runGeneration(config, { store: new MemoryStore(), capability: echoCapability, prompts, clock })
    ).rejects.toThrow('No pipeline could be built from the configured datasets');
  });
});
