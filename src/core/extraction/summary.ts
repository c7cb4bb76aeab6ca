import { SchemaError } from '../errors.js';
import { renderPrompt } from '../gemini/prompts.js';
import { SUMMARY_RESPONSE_SCHEMA, type SummaryPayload } from './schemas.js';
import type { InvokeResult, RetryPolicy } from './retry-policy.js';
import type { SummaryPoint } from '../../types/index.js';

export interface SummaryExtractorOptions {
  template: string;
  tokenBudget?: number;
  maxAttempts?: number;
  // When set, fewer points than this is a SchemaError. Unset, the prompt's
  // "at least N points" is only a request.
  minPoints?: number;
}

export interface SummaryExtraction extends Omit<InvokeResult<SummaryPayload>, 'payload'> {
  points: SummaryPoint[];
}

const EMOJI_PREFIX =
  /^(?:[#*0-9]\u{FE0F}?\u{20E3}|\p{Extended_Pictographic}|\p{Emoji_Modifier}|\p{Regional_Indicator}|\u{200D}|\u{FE0F})+/u;
const TRAILING_REFERENCE = /\(([^()]+)\)\s*$/;

export function parseSummaryPoint(point: string, rawResponse: string = point): SummaryPoint {
  const trimmed = point.trim();
  const emojiMatch = EMOJI_PREFIX.exec(trimmed);
  if (!emojiMatch) {
    throw new SchemaError('Summary point does not start with an emoji', rawResponse, [trimmed]);
  }

  const emoji = emojiMatch[0];
  const rest = trimmed.slice(emoji.length).trim();

  const referenceMatch = TRAILING_REFERENCE.exec(rest);
  if (referenceMatch) {
    const text = rest.slice(0, referenceMatch.index).trim();
    // A point that is only a parenthetical keeps it as its text
    if (text) {
      return { emoji, text, reference: referenceMatch[1].trim() };
    }
  }

  if (!rest) {
    throw new SchemaError('Summary point has no text after the emoji', rawResponse, [trimmed]);
  }
  return { emoji, text: rest };
}

export function formatSummaryLines(points: SummaryPoint[]): string {
  return points
    .map((point) => `${point.emoji} ${point.text}${point.reference ? ` (${point.reference})` : ''}`)
    .join('\n');
}

export class SummaryExtractor {
  constructor(
    private readonly policy: RetryPolicy,
    private readonly options: SummaryExtractorOptions
  ) {}

  async extract(rangeText: string): Promise<SummaryPoint[]> {
    const { points } = await this.extractWithDetails(rangeText);
    return points;
  }

  async extractWithDetails(rangeText: string): Promise<SummaryExtraction> {
    const prompt = renderPrompt(this.options.template, {
      transcript: rangeText,
      jsonSchema: SUMMARY_RESPONSE_SCHEMA.jsonSchema,
    });

    const { payload, ...invocation } = await this.policy.invoke(
      prompt,
      SUMMARY_RESPONSE_SCHEMA,
      this.options.tokenBudget ?? 6000,
      this.options.maxAttempts
    );

    const points = payload.summary_points.map((point) => parseSummaryPoint(point, invocation.raw));

    if (points.length === 0) {
      throw new SchemaError('Model returned no summary points', invocation.raw);
    }
    const { minPoints } = this.options;
    if (minPoints !== undefined && points.length < minPoints) {
      throw new SchemaError(
        `Expected at least ${minPoints} summary points, got ${points.length}`,
        invocation.raw
      );
    }

    return { ...invocation, points };
  }
}
