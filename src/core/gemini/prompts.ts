import { readFile } from 'fs/promises';
import { join } from 'path';
import { fileURLToPath } from 'url';

export type PromptName = 'cues' | 'summary';

const PROMPT_FILES: Record<PromptName, string> = {
  cues: 'cues_prompt.md',
  summary: 'message_summary_prompt.md',
};

export const PLACEHOLDERS = {
  transcript: '{{TRANSCRIPT}}',
  schema: '{{JSON_SCHEMA}}',
  languages: '{{LANGUAGES}}',
} as const;

// prompts/ sits at the package root, three levels above this module in both
// src/ and dist/
const DEFAULT_PROMPTS_DIR = fileURLToPath(new URL('../../../prompts/', import.meta.url));

export function promptPath(name: PromptName, promptsDir: string = DEFAULT_PROMPTS_DIR): string {
  return join(promptsDir, PROMPT_FILES[name]);
}

export async function loadPromptTemplate(
  name: PromptName,
  promptsDir: string = DEFAULT_PROMPTS_DIR
): Promise<string> {
  const path = promptPath(name, promptsDir);
  try {
    return await readFile(path, 'utf-8');
  } catch (error) {
    throw new Error(`Prompt template not found: ${path}`, { cause: error });
  }
}

export interface PromptValues {
  transcript: string;
  jsonSchema: Record<string, unknown>;
  languages?: string[];
}

/**
 * Fill a template's placeholders. The transcript goes in last so text inside
 * it that looks like a placeholder is left alone.
 */
export function renderPrompt(template: string, values: PromptValues): string {
  if (!template.includes(PLACEHOLDERS.transcript)) {
    throw new Error(`Prompt template is missing the ${PLACEHOLDERS.transcript} placeholder`);
  }

  return template
    .split(PLACEHOLDERS.schema)
    .join(JSON.stringify(values.jsonSchema, null, 2))
    .split(PLACEHOLDERS.languages)
    .join((values.languages ?? []).join(', '))
    .split(PLACEHOLDERS.transcript)
    .join(values.transcript);
}
