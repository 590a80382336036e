/**
 * Writers for generation output.
 *
 * Full analysis, per run:
 *   <output>/<model>/<YYYY-MM-DD_HH-MM-SS>/
 *     settings.json, stats.json
 *     <target_dataset>_<target_db>/
 *       <source_db>.json            records + attempt history + stats
 *       full/<source_db>.txt        prompt/response transcript
 *       report/stats.json, report/stats_per_db.json, report/errors.json
 *
 * Distilled, per target and source database:
 *   <json_only>/<target_dataset>/<model>/<target_db>/response_<source_db>.json
 */

import { appendFile, mkdir } from 'fs/promises';
import { basename, join } from 'path';
import type { MappingRecord, RunStats } from '../../types/models.js';
import { writeJson } from '../../utils/files.js';
import { displayTimestamp, divider, runTimestamp } from '../../utils/time.js';
import type { GenerationOutcome, RequestResult } from './orchestrator.js';

export function runDirectory(outputDirectory: string, modelName: string, startedAt: Date): string {
  return join(outputDirectory, modelName, runTimestamp(startedAt));
}

export function pipelineDirectory(runDir: string, targetDataset: string, targetDbId: string): string {
  return join(runDir, `${basename(targetDataset)}_${targetDbId}`);
}

export function distilledDirectory(
  jsonOnlyDirectory: string,
  targetDataset: string,
  modelName: string,
  targetDbId: string
): string {
  return join(jsonOnlyDirectory, basename(targetDataset), modelName, targetDbId);
}

/**
 * The fields downstream evaluators read.
 */
export function distill(record: MappingRecord): MappingRecord {
  return {
    source_dataset: record.source_dataset,
    source_db_id: record.source_db_id,
    source_query: record.source_query,
    source_question: record.source_question,
    target_db_id: record.target_db_id,
    target_query: record.target_query,
    target_question: record.target_question,
    tables_columns_replacement: record.tables_columns_replacement,
    thought: record.thought,
  };
}

function transcript(result: RequestResult, clock: () => Date): string {
  const lines: string[] = [divider(displayTimestamp(clock())), divider(result.request.id, 100, '-')];
  for (const attempt of result.attempts) {
    lines.push(
      divider(`Attempt ${attempt.attempt}`, 100, '-'),
      divider('System Instruction', 100, '-'),
      attempt.system ?? '',
      divider('Prompt', 100, '-'),
      attempt.prompt,
      divider('Response', 100, '-'),
      attempt.raw_response ?? `<no response: ${attempt.error ?? 'unknown error'}>`
    );
  }
  lines.push(divider(), '', '');
  return lines.join('\n');
}

function requestSummary(result: RequestResult) {
  return {
    id: result.request.id,
    batch_index: result.request.batchIndex,
    state: result.state,
    questions: result.request.questions,
    unmapped: result.unmapped,
    attempts: result.attempts.map(({ prompt: _prompt, system: _system, ...attempt }) => attempt),
  };
}

/**
 * Writes one pipeline's output as requests settle. Files for a source
 * database are rewritten in batch order on every update; writes are
 * serialized so a slower earlier write never lands last.
 */
export class GenerationWriter {
  private readonly bySource = new Map<string, RequestResult[]>();
  private queue: Promise<void> = Promise.resolve();

  constructor(
    private readonly pipelineDir: string,
    private readonly distilledDir: string | null,
    private readonly modelName: string,
    private readonly clock: () => Date = () => new Date()
  ) {}

  private enqueue(task: () => Promise<void>): Promise<void> {
    const next = this.queue.then(task);
    this.queue = next.catch(() => undefined);
    return next;
  }

  write(result: RequestResult, sourceStats: RunStats): Promise<void> {
    const db = result.request.sourceDbId;
    const results = [...(this.bySource.get(db) ?? []), result].sort(
      (a, b) => a.request.batchIndex - b.request.batchIndex
    );
    this.bySource.set(db, results);

    const records = results.flatMap((r) => r.records);
    const first = results[0].request;
    const full = {
      source_dataset: first.sourceDataset,
      source_db_id: db,
      target_dataset: first.targetDataset,
      target_db_id: first.targetDbId,
      model: this.modelName,
      records,
      requests: results.map(requestSummary),
      stats: sourceStats,
    };
    const text = transcript(result, this.clock);

    return this.enqueue(async () => {
      await writeJson(join(this.pipelineDir, `${db}.json`), full);
      await mkdir(join(this.pipelineDir, 'full'), { recursive: true });
      await appendFile(join(this.pipelineDir, 'full', `${db}.txt`), text, 'utf-8');
      if (this.distilledDir) {
        await writeJson(join(this.distilledDir, `response_${db}.json`), records.map(distill));
      }
    });
  }

  /**
   * Pipeline-level reports, written once the pipeline's requests are done.
   */
  writeReports(outcome: GenerationOutcome): Promise<void> {
    const errors = outcome.results
      .filter((result) => result.state !== 'succeeded')
      .map((result) => {
        const last = result.attempts.length > 0 ? result.attempts[result.attempts.length - 1] : null;
        return {
          request_id: result.request.id,
          db_id: result.request.sourceDbId,
          state: result.state,
          questions: result.unmapped,
          errors: last ? [last.error, ...last.issues].filter((e): e is string => e !== null) : [],
          system_prompt: last?.system ?? null,
          prompt: last?.prompt ?? null,
        };
      });

    return this.enqueue(async () => {
      const report = join(this.pipelineDir, 'report');
      await writeJson(join(report, 'stats.json'), outcome.stats);
      await writeJson(join(report, 'stats_per_db.json'), outcome.perSource);
      if (errors.length > 0) {
        await writeJson(join(report, 'errors.json'), errors);
      }
    });
  }
}
