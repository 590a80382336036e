/**
 * Dataset store: read-only lookup of questions, schema text and target samples.
 *
 * On-disk layout under the datasets directory:
 *
 *   <dataset>/questions/<db_id>.json      array of { db_id, question, query }
 *   <dataset>/schemas.json                { <db_id>: "<schema text>" }
 *   <dataset>/target_samples/<db_id>.json { <table>: [[...row], ...] }
 */

import { readFile, readdir } from 'fs/promises';
import { existsSync } from 'fs';
import { join, resolve } from 'path';
import { z } from 'zod';
import { DatasetError } from '../types/errors.js';
import { QuestionSchema, SampleTableSchema, SchemaMapSchema } from '../types/models.js';
import type { Question, SampleTable, SchemaMap } from '../types/models.js';

export interface DatasetStore {
  listSourceDbs(dataset: string): Promise<string[]>;
  getQuestions(dataset: string, dbId: string): Promise<Question[]>;
  getSchema(dataset: string, dbId: string): Promise<string>;
  getSamples(dataset: string, dbId: string): Promise<SampleTable | null>;
}

async function readJson(path: string): Promise<unknown> {
  let text: string;
  try {
    text = await readFile(path, 'utf-8');
  } catch (error) {
    throw new DatasetError(`Cannot read ${path}: ${error instanceof Error ? error.message : String(error)}`);
  }
  try {
    return JSON.parse(text);
  } catch {
    throw new DatasetError(`${path} is not valid JSON`);
  }
}

function parseWith<S extends z.ZodTypeAny>(schema: S, value: unknown, path: string): z.infer<S> {
  const result = schema.safeParse(value);
  if (!result.success) {
    const first = result.error.issues[0];
    throw new DatasetError(`${path} has unexpected shape at ${first.path.join('.') || '(root)'}: ${first.message}`);
  }
  return result.data;
}

/**
 * Dataset store over JSON files. Schema maps are cached per dataset.
 */
export class FileDatasetStore implements DatasetStore {
  private readonly root: string;
  private readonly schemas = new Map<string, Promise<SchemaMap>>();

  constructor(root: string) {
    this.root = resolve(root);
  }

  async listSourceDbs(dataset: string): Promise<string[]> {
    const folder = join(this.root, dataset, 'questions');
    if (!existsSync(folder)) {
      throw new DatasetError(`Question folder ${folder} does not exist`);
    }
    const files = await readdir(folder);
    return files
      .filter((file) => file.endsWith('.json'))
      .map((file) => file.slice(0, -'.json'.length))
      .sort();
  }

  async getQuestions(dataset: string, dbId: string): Promise<Question[]> {
    const path = join(this.root, dataset, 'questions', `${dbId}.json`);
    const questions = parseWith(z.array(QuestionSchema), await readJson(path), path);
    return questions.map((q) => ({ dataset: q.dataset ?? dataset, db_id: q.db_id, question: q.question, query: q.query }));
  }

  async getSchema(dataset: string, dbId: string): Promise<string> {
    let cached = this.schemas.get(dataset);
    if (!cached) {
      const path = join(this.root, dataset, 'schemas.json');
      cached = readJson(path).then((raw) => parseWith(SchemaMapSchema, raw, path));
      this.schemas.set(dataset, cached);
    }
    const schemas = await cached;
    const schema = schemas[dbId];
    if (schema === undefined) {
      throw new DatasetError(`No schema for ${dataset}/${dbId}`);
    }
    return schema;
  }

  async getSamples(dataset: string, dbId: string): Promise<SampleTable | null> {
    const path = join(this.root, dataset, 'target_samples', `${dbId}.json`);
    if (!existsSync(path)) return null;
    return parseWith(SampleTableSchema, await readJson(path), path);
  }
}
