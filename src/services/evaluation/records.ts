/**
 * Record-set IO for the evaluation stages.
 *
 *   <generated_queries>/<dataset>/<model>/<target_db>/response_<source_db>.json   distilled generation output
 *   <results>/<dataset>/<model>/<target_db>/response_<source_db>.json             evaluated records
 *
 * Every stage rebuilds its records from the distilled file and carries over
 * the labels of records whose (source_query, target_query) pair is unchanged
 * in the evaluated file. Stages can run in any order and be re-run
 * individually, and a new generation run replaces stale records.
 */

import { readFile, readdir } from 'fs/promises';
import { existsSync } from 'fs';
import { join } from 'path';
import { z } from 'zod';
import type { EvaluationConfig } from '../../config.js';
import { StoredRecordSchema } from '../../types/models.js';
import type { EvaluatedRecord, EvaluationLabel } from '../../types/models.js';
import { describeError } from '../../types/errors.js';
import { writeJson } from '../../utils/files.js';
import { logger } from '../../utils/logger.js';

const FILE_PREFIX = 'response_';
const FILE_SUFFIX = '.json';
const LLM_SUFFIX = '_llm.json';

/**
 * The records of one (target db, source db) file.
 */
export interface RecordGroup {
  readonly dataset: string;
  readonly targetDbId: string;
  readonly sourceDbId: string;
  readonly records: readonly EvaluatedRecord[];
}

export function generatedDirectory(evaluation: EvaluationConfig, targetDbId?: string): string {
  const root = join(evaluation.generated_queries_directory, evaluation.dataset_name, evaluation.model_dir);
  return targetDbId === undefined ? root : join(root, targetDbId);
}

export function resultDirectory(evaluation: EvaluationConfig, targetDbId?: string): string {
  const root = join(evaluation.result_directory, evaluation.dataset_name, evaluation.model_dir);
  return targetDbId === undefined ? root : join(root, targetDbId);
}

export function recordFileName(sourceDbId: string): string {
  return `${FILE_PREFIX}${sourceDbId}${FILE_SUFFIX}`;
}

/**
 * `response_<db>.json` -> `<db>`; null for anything else, including archived
 * judgment files.
 */
export function sourceDbFromFile(file: string): string | null {
  if (!file.startsWith(FILE_PREFIX) || !file.endsWith(FILE_SUFFIX) || file.endsWith(LLM_SUFFIX)) {
    return null;
  }
  const id = file.slice(FILE_PREFIX.length, -FILE_SUFFIX.length);
  return id.length > 0 ? id : null;
}

async function entries(folder: string, directories: boolean): Promise<string[]> {
  if (!existsSync(folder)) return [];
  const dirents = await readdir(folder, { withFileTypes: true });
  return dirents
    .filter((d) => (directories ? d.isDirectory() : d.isFile()) && !d.name.startsWith('.'))
    .map((d) => d.name);
}

function union(...lists: string[][]): string[] {
  return [...new Set(lists.flat())].sort();
}

/**
 * Target databases with generated or evaluated records, after the
 * `target_databases` filter.
 */
export async function listTargetDbs(evaluation: EvaluationConfig): Promise<string[]> {
  const found = union(
    await entries(generatedDirectory(evaluation), true),
    await entries(resultDirectory(evaluation), true)
  );
  const filter = evaluation.target_databases;
  return filter.length > 0 ? found.filter((db) => filter.includes(db)) : found;
}

/**
 * Source databases with records for one target, after the
 * `source_databases` filter.
 */
export async function listSourceDbs(evaluation: EvaluationConfig, targetDbId: string): Promise<string[]> {
  const files = union(
    await entries(generatedDirectory(evaluation, targetDbId), false),
    await entries(resultDirectory(evaluation, targetDbId), false)
  );
  const found = files.flatMap((file) => {
    const id = sourceDbFromFile(file);
    return id === null ? [] : [id];
  });
  const filter = evaluation.source_databases;
  return filter.length > 0 ? found.filter((db) => filter.includes(db)) : found;
}

async function readRecords(path: string): Promise<EvaluatedRecord[]> {
  const raw: unknown = JSON.parse(await readFile(path, 'utf-8'));
  return z.array(StoredRecordSchema).parse(raw);
}

function recordKey(record: EvaluatedRecord): string {
  return JSON.stringify([record.source_query, record.target_query]);
}

/**
 * Copy labels from earlier evaluated records onto freshly generated ones.
 * Duplicate pairs are matched in file order.
 */
export function carryLabels(
  fresh: readonly EvaluatedRecord[],
  previous: readonly EvaluatedRecord[]
): EvaluatedRecord[] {
  const labels = new Map<string, EvaluationLabel[]>();
  for (const record of previous) {
    const key = recordKey(record);
    const queue = labels.get(key);
    if (queue) queue.push(record.evaluation);
    else labels.set(key, [record.evaluation]);
  }
  return fresh.map((record) => {
    const label = labels.get(recordKey(record))?.shift();
    return label ? { ...record, evaluation: label } : record;
  });
}

async function tryReadRecords(path: string): Promise<EvaluatedRecord[] | null> {
  if (!existsSync(path)) return null;
  try {
    return await readRecords(path);
  } catch (error) {
    logger.warn(`Invalid record file ${path}: ${describeError(error)}`);
    return null;
  }
}

/**
 * Load one group. Records come from the distilled file when it exists, with
 * labels carried over from the evaluated file; the evaluated file alone is
 * used otherwise. Returns null when neither file can be read.
 */
export async function loadGroup(
  evaluation: EvaluationConfig,
  targetDbId: string,
  sourceDbId: string
): Promise<RecordGroup | null> {
  const file = recordFileName(sourceDbId);
  const generatedPath = join(generatedDirectory(evaluation, targetDbId), file);
  const resultPath = join(resultDirectory(evaluation, targetDbId), file);

  const generated = await tryReadRecords(generatedPath);
  const evaluated = await tryReadRecords(resultPath);

  let records: EvaluatedRecord[];
  if (generated) {
    records = evaluated ? carryLabels(generated, evaluated) : generated;
  } else if (evaluated && !existsSync(generatedPath)) {
    records = evaluated;
  } else {
    return null;
  }
  return { dataset: evaluation.dataset_name, targetDbId, sourceDbId, records };
}

/**
 * Every loadable group, sorted by target then source database.
 */
export async function loadGroups(evaluation: EvaluationConfig): Promise<RecordGroup[]> {
  const groups: RecordGroup[] = [];
  for (const targetDbId of await listTargetDbs(evaluation)) {
    for (const sourceDbId of await listSourceDbs(evaluation, targetDbId)) {
      const group = await loadGroup(evaluation, targetDbId, sourceDbId);
      if (group) groups.push(group);
    }
  }
  return groups;
}

export async function saveGroup(evaluation: EvaluationConfig, group: RecordGroup): Promise<string> {
  const path = join(resultDirectory(evaluation, group.targetDbId), recordFileName(group.sourceDbId));
  await writeJson(path, group.records);
  return path;
}

/**
 * Replace one evaluation axis on a record, leaving the others untouched.
 */
export function withLabel<K extends keyof EvaluationLabel>(
  record: EvaluatedRecord,
  axis: K,
  label: EvaluationLabel[K]
): EvaluatedRecord {
  return { ...record, evaluation: { ...record.evaluation, [axis]: label } };
}
