/**
 * Mapping prompt templates and rendering.
 */

import { readFile } from 'fs/promises';
import { existsSync } from 'fs';
import { join, resolve } from 'path';
import { ConfigError } from '../../types/errors.js';
import type { MappingRequest, Question } from '../../types/models.js';

export interface MappingPrompts {
  base: string;
  system: string | null;
}

/**
 * Load the base prompt and, when configured, the system instruction.
 * An empty `systemFile` means no system instruction.
 */
export async function loadMappingPrompts(
  directory: string,
  baseFile: string,
  systemFile: string
): Promise<MappingPrompts> {
  const folder = resolve(directory);
  const basePath = join(folder, baseFile);
  if (!existsSync(basePath)) {
    throw new ConfigError(`Base prompt not found: ${basePath}`);
  }
  const base = await readFile(basePath, 'utf-8');

  if (!systemFile) {
    return { base, system: null };
  }
  const systemPath = join(folder, systemFile);
  if (!existsSync(systemPath)) {
    throw new ConfigError(
      `System instruction not found: ${systemPath}. Set system_instruction_file to "" if not used.`
    );
  }
  return { base, system: await readFile(systemPath, 'utf-8') };
}

const QUESTIONS_HEADER = '# Source query:\n';
const OUTPUT_HEADER = '\n\n#Output:\n\n';

/**
 * Render the user prompt for some or all of a request's questions.
 */
export function renderMappingPrompt(
  prompts: MappingPrompts,
  request: MappingRequest,
  questions: readonly Question[]
): string {
  const asked = questions.map((q) => ({ db_id: q.db_id, question: q.question, query: q.query }));
  return [
    prompts.base,
    '\n\n## Generate the query for the following query:\n\n',
    '# Source schema\n',
    JSON.stringify({ db_id: request.sourceDbId, schema: request.sourceSchema }, null, 4),
    '\n\n# Target schema\n',
    JSON.stringify({ db_id: request.targetDbId, schema: request.targetSchema }, null, 4),
    '\n\n# Target sample data\n',
    JSON.stringify(request.targetSamples ?? {}, null, 4),
    '\n\n',
    QUESTIONS_HEADER,
    JSON.stringify(asked, null, 4),
    OUTPUT_HEADER,
  ].join('');
}
