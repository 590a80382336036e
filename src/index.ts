/**
 * sql-skeleton-mapper - library entry point
 */

export { loadConfig, parseSettings, requireEvaluation, DEFAULT_REQUIRED_FIELDS } from './config.js';
export type { PipelineConfig, ModelConfig, GenerationConfig, EvaluationConfig, PipelineSettings } from './config.js';

export {
  LLMError,
  ResponseFormatError,
  ParseError,
  BudgetExhaustedError,
  DatasetError,
  ConfigError,
  describeError,
} from './types/errors.js';
export * from './types/models.js';
export type { JsonValue, JsonObject, JsonArray, JsonPrimitive } from './types/utils.js';

export { FileDatasetStore } from './services/dataset.js';
export type { DatasetStore } from './services/dataset.js';
export { LLMService, usableText } from './services/llm.js';
export type { GenerationCapability, GenerationResponse } from './services/llm.js';
export { SqliteQueryRunner } from './services/database.js';
export type { QueryRunner, QueryOutcome } from './services/database.js';

export { abstractQuery, templatesEqual, renderTemplate } from './services/sql/template.js';
export type { SqlTemplate, TemplateToken, Placeholder } from './services/sql/template.js';

export { selectQuestions, partition, buildMappingRequests } from './services/generation/batching.js';
export { validateEntry, pairEntries, describeValidation } from './services/generation/validator.js';
export type { EntryValidation, ValidationOptions } from './services/generation/validator.js';
export { loadMappingPrompts, renderMappingPrompt } from './services/generation/prompt.js';
export { MappingOrchestrator } from './services/generation/orchestrator.js';
export type { GenerationOutcome, RequestResult, OrchestratorOptions } from './services/generation/orchestrator.js';
export { FailureBudget, RunStatsCollector } from './services/generation/stats.js';
export { runGeneration, combineRunStats } from './services/generation/run.js';
export type { RunOutcome, GenerationDeps } from './services/generation/run.js';
export { extractJsonArray, fixMissingComma } from './utils/json.js';

export { evaluateStructural, structuralLabel } from './services/evaluation/structural.js';
export { evaluateExecution, executeRecord, executionLabel } from './services/evaluation/execution.js';
export { SemanticEvaluator, ratingLabel, renderJudgmentPrompt } from './services/evaluation/semantic.js';
export { summarize, structuralCounts, executionCounts, semanticCounts } from './services/evaluation/summary.js';
export type { AxisSummary } from './services/evaluation/summary.js';
export {
  runStructuralStage,
  runExecutionStage,
  runSemanticStage,
  runSummaryStage,
} from './services/evaluation/run.js';
