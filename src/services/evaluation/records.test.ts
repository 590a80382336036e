import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { parseSettings, requireEvaluation } from '../../config.js';
import type { EvaluationConfig } from '../../config.js';
import { NOT_EVALUATED } from '../../types/models.js';
import { writeJson } from '../../utils/files.js';
import { carryLabels, listSourceDbs, listTargetDbs, loadGroup, loadGroups, saveGroup, sourceDbFromFile, withLabel } from './records.js';
import type { EvaluatedRecord } from '../../types/models.js';

const stored = {
  source_db_id: 'library',
  source_query: 'SELECT title FROM books',
  source_question: 'List all book titles.',
  target_db_id: 'permits',
  target_query: 'SELECT kind FROM permits',
  target_question: 'List all permit kinds.',
};

describe('sourceDbFromFile', () => {
  it('should read the source database from a record file name', () => {
    expect(sourceDbFromFile('response_library.json')).toBe('library');
    expect(sourceDbFromFile('response_library_llm.json')).toBeNull();
    expect(sourceDbFromFile('library.json')).toBeNull();
    expect(sourceDbFromFile('response_.json')).toBeNull();
  });
});

describe('carryLabels', () => {
  const fresh: EvaluatedRecord = { ...stored, source_dataset: 'library_qa', tables_columns_replacement: {}, thought: '', evaluation: NOT_EVALUATED };

  it('should match labels by source and target query in file order', () => {
    const first = withLabel(fresh, 'execution', { status: 'empty', elapsed_ms: 1 });
    const second = withLabel(fresh, 'execution', { status: 'empty', elapsed_ms: 2 });
    const changed = { ...fresh, target_query: 'SELECT fee FROM permits' };

    const carried = carryLabels([fresh, changed, fresh, fresh], [first, second]);
    expect(carried.map((r) => r.evaluation.execution)).toEqual([
      { status: 'empty', elapsed_ms: 1 },
      { status: 'not_evaluated' },
      { status: 'empty', elapsed_ms: 2 },
      { status: 'not_evaluated' },
    ]);
  });
});

describe('record sets', () => {
  let root: string;
  let evaluation: EvaluationConfig;

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), 'records-test-'));
    evaluation = requireEvaluation(
      parseSettings({
        model: { model_name: 'test-model' },
        evaluation: {
          dataset_name: 'civic_qa',
          model_dir: 'test-model',
          generated_queries_directory: join(root, 'generated'),
          result_directory: join(root, 'results'),
        },
      })
    );
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it('should default every label to not evaluated', async () => {
    await writeJson(join(root, 'generated', 'civic_qa', 'test-model', 'permits', 'response_library.json'), [stored]);
    const group = await loadGroup(evaluation, 'permits', 'library');
    expect(group?.records[0].evaluation).toEqual(NOT_EVALUATED);
    expect(group?.records[0].source_dataset).toBe('');
  });

  it('should carry labels over for unchanged records', async () => {
    await writeJson(join(root, 'generated', 'civic_qa', 'test-model', 'permits', 'response_library.json'), [stored]);
    const group = await loadGroup(evaluation, 'permits', 'library');
    if (!group) throw new Error('group not loaded');
    const labelled = group.records.map((r) => withLabel(r, 'execution', { status: 'empty', elapsed_ms: 3 }));
    await saveGroup(evaluation, { ...group, records: labelled });

    const reloaded = await loadGroup(evaluation, 'permits', 'library');
    expect(reloaded?.records[0].evaluation.execution).toEqual({ status: 'empty', elapsed_ms: 3 });
  });

  it('should replace stale evaluated records after a new generation run', async () => {
    const generatedPath = join(root, 'generated', 'civic_qa', 'test-model', 'permits', 'response_library.json');
    await writeJson(generatedPath, [stored]);
    const group = await loadGroup(evaluation, 'permits', 'library');
    if (!group) throw new Error('group not loaded');
    await saveGroup(evaluation, {
      ...group,
      records: group.records.map((r) => withLabel(r, 'execution', { status: 'empty', elapsed_ms: 3 })),
    });

    await writeJson(generatedPath, [{ ...stored, target_query: 'SELECT fee FROM permits' }]);
    const reloaded = await loadGroup(evaluation, 'permits', 'library');
    expect(reloaded?.records.map((r) => r.target_query)).toEqual(['SELECT fee FROM permits']);
    expect(reloaded?.records[0].evaluation).toEqual(NOT_EVALUATED);
  });

  it('should fall back to evaluated records when the distilled file is gone', async () => {
    const group = {
      dataset: 'civic_qa',
      targetDbId: 'permits',
      sourceDbId: 'library',
      records: [{ ...stored, source_dataset: 'library_qa', tables_columns_replacement: {}, thought: '', evaluation: NOT_EVALUATED }],
    };
    await saveGroup(evaluation, group);
    const reloaded = await loadGroup(evaluation, 'permits', 'library');
    expect(reloaded?.records.map((r) => r.source_dataset)).toEqual(['library_qa']);
  });

  it('should treat a null mapped query as empty', async () => {
    await writeJson(join(root, 'generated', 'civic_qa', 'test-model', 'permits', 'response_library.json'), [
      { ...stored, target_query: null },
    ]);
    const group = await loadGroup(evaluation, 'permits', 'library');
    expect(group?.records[0].target_query).toBe('');
  });

  it('should skip a file that is not a record list', async () => {
    const path = join(root, 'generated', 'civic_qa', 'test-model', 'permits', 'response_library.json');
    await writeJson(path, { records: [] });
    expect(await loadGroup(evaluation, 'permits', 'library')).toBeNull();
    await writeFile(path, '[', 'utf-8');
    expect(await loadGroup(evaluation, 'permits', 'library')).toBeNull();
  });

  it('should list databases from both directories and apply the filters', async () => {
    await writeJson(join(root, 'generated', 'civic_qa', 'test-model', 'permits', 'response_library.json'), [stored]);
    await writeJson(join(root, 'generated', 'civic_qa', 'test-model', 'permits', 'response_garden.json'), [stored]);
    await writeJson(join(root, 'results', 'civic_qa', 'test-model', 'zoning', 'response_library.json'), [stored]);
    await writeJson(join(root, 'results', 'civic_qa', 'test-model', 'permits', 'llm', 'response_library_llm.json'), []);

    expect(await listTargetDbs(evaluation)).toEqual(['permits', 'zoning']);
    expect(await listSourceDbs(evaluation, 'permits')).toEqual(['garden', 'library']);
    expect(await listSourceDbs({ ...evaluation, source_databases: ['library'] }, 'permits')).toEqual(['library']);
    expect(await listTargetDbs({ ...evaluation, target_databases: ['zoning'] })).toEqual(['zoning']);

    const groups = await loadGroups(evaluation);
    expect(groups.map((g) => `${g.targetDbId}/${g.sourceDbId}`)).toEqual(['permits/garden', 'permits/library', 'zoning/library']);
  });
});
