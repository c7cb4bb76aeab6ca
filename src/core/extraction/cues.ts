import { FormatError, SchemaError } from '../errors.js';
import { renderPrompt } from '../gemini/prompts.js';
import { formatTimestamp, toSeconds } from '../transcript/time.js';
import { CUES_RESPONSE_SCHEMA, type CuesPayload } from './schemas.js';
import type { InvokeResult, RetryPolicy } from './retry-policy.js';
import type { Cue } from '../../types/index.js';

export interface CueExtractorOptions {
  template: string;
  tokenBudget?: number;
  maxAttempts?: number;
}

export interface CueExtraction extends Omit<InvokeResult<CuesPayload>, 'payload'> {
  cues: Cue[];
}

function timestampToSeconds(timestamp: string | number, rawResponse: string): number {
  if (typeof timestamp === 'number') return timestamp;
  try {
    return toSeconds(timestamp);
  } catch (error) {
    const detail = error instanceof Error ? error.message : String(error);
    throw new SchemaError('Cue timestamp could not be converted', rawResponse, [detail]);
  }
}

/**
 * Convert model cue entries to whole seconds, sort them, and keep only the
 * first entry for each second so the cues survive a round trip through
 * `HH:MM:SS Title` lines. An empty result is rejected.
 */
export function normalizeCues(entries: CuesPayload['cues'], rawResponse: string): Cue[] {
  const converted = entries
    .map((entry) => ({
      timestampSeconds: Math.floor(timestampToSeconds(entry.timestamp, rawResponse)),
      title: entry.title.trim(),
    }))
    .sort((a, b) => a.timestampSeconds - b.timestampSeconds);

  const cues: Cue[] = [];
  for (const cue of converted) {
    const previous = cues[cues.length - 1];
    if (previous && previous.timestampSeconds === cue.timestampSeconds) continue;
    cues.push(cue);
  }

  if (cues.length === 0) {
    throw new SchemaError('Model returned an empty cue list', rawResponse);
  }
  return cues;
}

export class CueExtractor {
  constructor(
    private readonly policy: RetryPolicy,
    private readonly options: CueExtractorOptions
  ) {}

  async extract(transcriptText: string, languageHints: string[] = []): Promise<Cue[]> {
    const { cues } = await this.extractWithDetails(transcriptText, languageHints);
    return cues;
  }

  async extractWithDetails(transcriptText: string, languageHints: string[] = []): Promise<CueExtraction> {
    const prompt = renderPrompt(this.options.template, {
      transcript: transcriptText,
      jsonSchema: CUES_RESPONSE_SCHEMA.jsonSchema,
      languages: languageHints,
    });

    const { payload, ...invocation } = await this.policy.invoke(
      prompt,
      CUES_RESPONSE_SCHEMA,
      this.options.tokenBudget ?? 3000,
      this.options.maxAttempts
    );

    return { ...invocation, cues: normalizeCues(payload.cues, invocation.raw) };
  }
}

const CUE_LINE_PATTERN = /^(\d+:\d{2}:\d{2}(?:\.\d{1,3})?)\s+(.+?)\s*$/;

export function formatCueLines(cues: Cue[]): string {
  return cues.map((cue) => `${formatTimestamp(cue.timestampSeconds)} ${cue.title}`).join('\n');
}

// Reads files written by formatCueLines ("HH:MM:SS Title" per line)
export function parseCueLines(text: string): Cue[] {
  const cues: Cue[] = [];

  text.split(/\r?\n/).forEach((line, index) => {
    const trimmed = line.trim();
    if (!trimmed) return;

    const match = CUE_LINE_PATTERN.exec(trimmed);
    if (!match) {
      throw new FormatError('Expected "HH:MM:SS Title"', line, index + 1);
    }

    try {
      cues.push({ timestampSeconds: toSeconds(match[1]), title: match[2] });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new FormatError(message, line, index + 1);
    }
  });

  return cues;
}
