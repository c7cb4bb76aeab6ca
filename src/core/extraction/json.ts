import { SchemaError } from '../errors.js';

/**
 * Parse a model response as JSON. Structured output should already be bare
 * JSON, but a surrounding Markdown code fence is tolerated.
 */
export function parseJsonResponse(raw: string): unknown {
  let cleanText = raw.trim();
  if (cleanText.startsWith('```json')) {
    cleanText = cleanText.slice(7);
  } else if (cleanText.startsWith('```')) {
    cleanText = cleanText.slice(3);
  }
  if (cleanText.endsWith('```')) {
    cleanText = cleanText.slice(0, -3);
  }
  cleanText = cleanText.trim();

  if (!cleanText) {
    throw new SchemaError('Empty response from model', raw);
  }

  try {
    return JSON.parse(cleanText);
  } catch (error) {
    const detail = error instanceof Error ? error.message : String(error);
    throw new SchemaError('Response is not valid JSON', raw, [detail]);
  }
}
