/**
 * Mapping Generation Orchestrator.
 *
 * Drives each MappingRequest through
 *
 *   pending -> attempting -> succeeded
 *                        \-> retry_scheduled -> attempting ...
 *                        \-> exhausted
 *   pending -> cancelled           (failure budget spent before it started)
 *
 * Every failed attempt is charged to a FailureBudget shared by the whole run.
 * Once the budget is spent no new request starts; requests already running
 * finish their current attempt and keep whatever they produced.
 */

import type { GenerationCapability, GenerationResponse } from '../llm.js';
import { usableText } from '../llm.js';
import type { MappingRecord, MappingRequest, Question, RunStats } from '../../types/models.js';
import { ResponseFormatError, describeError } from '../../types/errors.js';
import { extractJsonArray } from '../../utils/json.js';
import type { SalvagedJson } from '../../utils/json.js';
import { runPool } from '../../utils/pool.js';
import { sleep } from '../../utils/time.js';
import { logger } from '../../utils/logger.js';
import { renderMappingPrompt } from './prompt.js';
import type { MappingPrompts } from './prompt.js';
import { pairEntries, validateEntry } from './validator.js';
import type { MappingEntry, ValidationOptions } from './validator.js';
import { FailureBudget, RunStatsCollector } from './stats.js';

// ============================================================================
// Request state machine
// ============================================================================

export type RequestState = 'pending' | 'attempting' | 'retry_scheduled' | 'succeeded' | 'exhausted' | 'cancelled';

const TRANSITIONS: Readonly<Record<RequestState, readonly RequestState[]>> = {
  pending: ['attempting', 'cancelled'],
  attempting: ['succeeded', 'retry_scheduled', 'exhausted'],
  retry_scheduled: ['attempting', 'exhausted'],
  succeeded: [],
  exhausted: [],
  cancelled: [],
};

class RequestTracker {
  private current: RequestState = 'pending';

  constructor(private readonly requestId: string) {}

  get state(): RequestState {
    return this.current;
  }

  to(next: RequestState): void {
    if (!TRANSITIONS[this.current].includes(next)) {
      throw new Error(`Illegal transition ${this.current} -> ${next} for ${this.requestId}`);
    }
    this.current = next;
  }
}

// ============================================================================
// Types
// ============================================================================

export interface AttemptRecord {
  attempt: number;
  started_at: string;
  elapsed_ms: number;
  questions: number;
  outcome: 'succeeded' | 'partial' | 'failed';
  error: string | null;
  issues: string[];
  corrected: boolean;
  records: number;
  finish_reason: string | null;
  input_tokens: number;
  output_tokens: number;
  prompt: string;
  system: string | null;
  raw_response: string | null;
}

export interface RequestResult {
  request: MappingRequest;
  state: 'succeeded' | 'exhausted' | 'cancelled';
  /** In the order of the request's questions */
  records: MappingRecord[];
  unmapped: Question[];
  attempts: AttemptRecord[];
}

export interface GenerationOutcome {
  /** Aligned with the input requests */
  results: RequestResult[];
  records: MappingRecord[];
  stats: RunStats;
  perSource: Record<string, RunStats>;
}

export interface OrchestratorOptions {
  /** Attempts per request, first try included */
  maxAttempts: number;
  retryDelayMs: number;
  concurrency: number;
  /** Warn after this many max-token failures */
  maxTokenReminder: number;
  validation: ValidationOptions;
}

export interface OrchestratorHooks {
  budget?: FailureBudget;
  /** Called as each request settles, before the run finishes */
  onResult?: (result: RequestResult, sourceStats: RunStats) => Promise<void>;
  clock?: () => Date;
}

interface AttemptOutcome {
  record: AttemptRecord;
  mapped: { question: Question; record: MappingRecord }[];
  unmatched: Question[];
}

// ============================================================================
// Orchestrator
// ============================================================================

export class MappingOrchestrator {
  readonly budget: FailureBudget;
  readonly stats: RunStatsCollector;
  private readonly clock: () => Date;
  private readonly onResult: OrchestratorHooks['onResult'];
  private maxTokenFailures = 0;

  constructor(
    private readonly capability: GenerationCapability,
    private readonly prompts: MappingPrompts,
    private readonly options: OrchestratorOptions,
    hooks: OrchestratorHooks = {}
  ) {
    this.clock = hooks.clock ?? (() => new Date());
    this.budget = hooks.budget ?? new FailureBudget(Number.POSITIVE_INFINITY);
    this.stats = new RunStatsCollector(this.clock);
    this.onResult = hooks.onResult;
  }

  /**
   * Run every request and close the statistics. A spent budget yields the
   * partial results with `stats.status === 'incomplete'`.
   */
  async generateAll(requests: readonly MappingRequest[]): Promise<GenerationOutcome> {
    const outcomes = await runPool(requests, (request) => this.process(request), {
      concurrency: this.options.concurrency,
      shouldStart: () => !this.budget.exhausted,
    });

    const results: RequestResult[] = [];
    let failure: unknown = null;
    outcomes.forEach((outcome, index) => {
      if (outcome.status === 'fulfilled') {
        results.push(outcome.value);
      } else if (outcome.status === 'cancelled') {
        results.push(this.cancel(requests[index]));
      } else if (failure === null) {
        failure = outcome.reason;
      }
    });
    if (failure !== null) {
      throw failure;
    }

    const cancelled = results.filter((result) => result.state === 'cancelled').length;
    if (cancelled > 0) {
      logger.error(`${cancelled} request(s) cancelled: ${this.budget.toError().message}`);
    }

    const stats = this.stats.finish(this.budget.exhausted ? this.budget.toError().message : null);
    const perSource: Record<string, RunStats> = {};
    for (const sourceDbId of this.stats.sourceDbIds()) {
      perSource[sourceDbId] = this.stats.sourceSnapshot(sourceDbId);
    }

    return {
      results,
      records: results.flatMap((result) => result.records),
      stats,
      perSource,
    };
  }

  private cancel(request: MappingRequest): RequestResult {
    const tracker = new RequestTracker(request.id);
    tracker.to('cancelled');
    this.stats.increment(request.sourceDbId, 'cancelled');
    this.stats.increment(request.sourceDbId, 'questions_requested', request.questions.length);
    this.stats.increment(request.sourceDbId, 'questions_unmapped', request.questions.length);
    return { request, state: 'cancelled', records: [], unmapped: [...request.questions], attempts: [] };
  }

  private async process(request: MappingRequest): Promise<RequestResult> {
    const db = request.sourceDbId;
    const tracker = new RequestTracker(request.id);
    const attempts: AttemptRecord[] = [];
    const mapped = new Map<Question, MappingRecord>();
    let pending: Question[] = [...request.questions];

    this.stats.increment(db, 'questions_requested', pending.length);

    for (let attempt = 1; ; attempt++) {
      tracker.to('attempting');
      if (attempt > 1) {
        this.stats.increment(db, 'retried');
      }

      const outcome = await this.attempt(request, pending, attempt);
      attempts.push(outcome.record);
      for (const { question, record } of outcome.mapped) {
        mapped.set(question, record);
      }
      pending = outcome.unmatched;

      if (pending.length === 0) {
        tracker.to('succeeded');
        break;
      }
      if (attempt >= this.options.maxAttempts || this.budget.exhausted) {
        tracker.to('exhausted');
        break;
      }

      tracker.to('retry_scheduled');
      logger.warn(
        `[${request.id}] ${pending.length} question(s) unmapped. Retrying... Attempt ${attempt + 1}/${this.options.maxAttempts}`
      );
      await sleep(this.options.retryDelayMs);
      if (this.budget.exhausted) {
        tracker.to('exhausted');
        break;
      }
    }

    const records = request.questions.flatMap((question) => {
      const record = mapped.get(question);
      return record ? [record] : [];
    });
    this.stats.increment(db, 'records_emitted', records.length);

    const state = tracker.state === 'succeeded' ? 'succeeded' : 'exhausted';
    if (state === 'exhausted') {
      this.stats.increment(db, 'exhausted');
      this.stats.increment(db, 'questions_unmapped', pending.length);
      logger.warn(`[${request.id}] Skipping ${pending.length} question(s) after ${attempts.length} attempt(s)`);
    }

    const result: RequestResult = { request, state, records, unmapped: pending, attempts };
    if (this.onResult) {
      await this.onResult(result, this.stats.sourceSnapshot(db));
    }
    return result;
  }

  private async attempt(request: MappingRequest, questions: Question[], attempt: number): Promise<AttemptOutcome> {
    const db = request.sourceDbId;
    const prompt = renderMappingPrompt(this.prompts, request, questions);
    const startedAt = this.clock();
    const base: AttemptRecord = {
      attempt,
      started_at: startedAt.toISOString(),
      elapsed_ms: 0,
      questions: questions.length,
      outcome: 'failed',
      error: null,
      issues: [],
      corrected: false,
      records: 0,
      finish_reason: null,
      input_tokens: 0,
      output_tokens: 0,
      prompt,
      system: this.prompts.system,
      raw_response: null,
    };

    this.stats.increment(db, 'attempted');

    let response: GenerationResponse;
    try {
      response = await this.capability.generate(prompt, this.prompts.system);
    } catch (error) {
      this.stats.increment(db, 'unexpected_errors');
      return this.fail(request, { ...base, elapsed_ms: this.clock().getTime() - startedAt.getTime() }, questions, describeError(error));
    }

    this.stats.increment(db, 'input_tokens', response.inputTokens);
    this.stats.increment(db, 'output_tokens', response.outputTokens);
    this.stats.increment(db, 'model_time_ms', response.elapsedMs);

    const answered: AttemptRecord = {
      ...base,
      elapsed_ms: response.elapsedMs,
      finish_reason: response.finishReason,
      input_tokens: response.inputTokens,
      output_tokens: response.outputTokens,
      raw_response: response.text,
    };

    let parsed: SalvagedJson;
    try {
      parsed = extractJsonArray(usableText(response));
    } catch (error) {
      if (!(error instanceof ResponseFormatError)) throw error;
      this.stats.increment(db, 'validation_failed');
      if (error.kind === 'max_token') {
        this.noteMaxTokenFailure();
      }
      return this.fail(request, answered, questions, `${error.kind}: ${error.message}`);
    }

    const expected = { sourceDbId: request.sourceDbId, targetDbId: request.targetDbId };
    const pairing = pairEntries(
      questions,
      parsed.value.map((entry) => validateEntry(entry, expected, this.options.validation))
    );

    const mapped = pairing.matched
      .map(({ question, entry }) => ({
        question,
        record: this.toRecord(request, question, entry, attempt, parsed.corrected, startedAt),
      }))
      .filter(({ record }) => {
        if (record.target_db_id === request.targetDbId) return true;
        logger.error(`[${request.id}] Dropping record for target ${record.target_db_id}`);
        return false;
      });

    const unmatched = questions.filter((question) => !mapped.some((m) => m.question === question));
    const issues = pairing.surplus > 0 ? [...pairing.issues, `${pairing.surplus} entr(ies) matched no question`] : pairing.issues;
    const record: AttemptRecord = { ...answered, issues, corrected: parsed.corrected, records: mapped.length };

    if (unmatched.length === 0) {
      this.stats.increment(db, parsed.corrected ? 'corrected' : 'succeeded');
      return { record: { ...record, outcome: 'succeeded' }, mapped, unmatched };
    }

    this.stats.increment(db, 'validation_failed');
    const failed = this.fail(
      request,
      { ...record, outcome: mapped.length > 0 ? 'partial' : 'failed' },
      unmatched,
      `${unmatched.length} of ${questions.length} question(s) without a valid mapping`
    );
    return { ...failed, mapped };
  }

  /**
   * Charge the budget for a failed attempt.
   */
  private fail(request: MappingRequest, record: AttemptRecord, unmatched: Question[], error: string): AttemptOutcome {
    const hadBudget = !this.budget.exhausted;
    const remaining = this.budget.consume(`${request.id}: ${error}`);
    logger.warn(`[${request.id}] Attempt ${record.attempt}/${this.options.maxAttempts} failed: ${error}`);
    if (hadBudget && !remaining) {
      logger.error(`${this.budget.toError().message}. No new requests will start.`);
    }
    return { record: { ...record, error }, mapped: [], unmatched: [...unmatched] };
  }

  private noteMaxTokenFailure(): void {
    this.maxTokenFailures += 1;
    if (this.maxTokenFailures >= this.options.maxTokenReminder) {
      logger.warn(
        `Max token limit reached ${this.maxTokenFailures} times. Consider decreasing max_questions_per_prompt.`
      );
      this.maxTokenFailures = 0;
    }
  }

  private toRecord(
    request: MappingRequest,
    question: Question,
    entry: MappingEntry,
    attempt: number,
    corrected: boolean,
    startedAt: Date
  ): MappingRecord {
    return {
      source_dataset: request.sourceDataset,
      source_db_id: request.sourceDbId,
      source_query: question.query,
      source_question: question.question,
      target_db_id: entry.target_db_id,
      target_query: entry.target_query,
      target_question: entry.target_question,
      tables_columns_replacement: entry.tables_columns_replacement,
      thought: entry.thought,
      generation_metadata: {
        request_id: request.id,
        batch_index: request.batchIndex,
        attempt,
        model: this.capability.modelName,
        corrected_response: corrected,
        generated_at: startedAt.toISOString(),
      },
    };
  }
}
