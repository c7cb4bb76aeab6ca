import { FormatError } from '../errors.js';
import { toSeconds } from './time.js';
import type { TranscriptSegment } from '../../types/index.js';

export interface GrammarMatch {
  start: string;
  end?: string;
  text: string;
}

export interface TranscriptGrammar {
  name: string;
  match(line: string): GrammarMatch | null;
}

const TIME = String.raw`\d+:\d{2}:\d{2}(?:\.\d{1,3})?`;

function regexGrammar(
  name: string,
  pattern: RegExp,
  toMatch: (groups: RegExpExecArray) => GrammarMatch
): TranscriptGrammar {
  return {
    name,
    match(line) {
      const result = pattern.exec(line);
      return result ? toMatch(result) : null;
    },
  };
}

export const bracketedGrammar = regexGrammar(
  'bracketed',
  new RegExp(String.raw`^\[(${TIME})\s*-->\s*(${TIME})\]\s*(.*)$`),
  (m) => ({ start: m[1], end: m[2], text: m[3] })
);

export const compactGrammar = regexGrammar(
  'compact',
  new RegExp(String.raw`^(${TIME})\|(${TIME})\|(.*)$`),
  (m) => ({ start: m[1], end: m[2], text: m[3] })
);

export const initialGrammar = regexGrammar(
  'initial',
  new RegExp(String.raw`^(${TIME})\|(.*)$`),
  (m) => ({ start: m[1], text: m[2] })
);

// Order matters: compact must be tried before initial, which would otherwise
// swallow the end time into the text.
export const TRANSCRIPT_GRAMMARS: readonly TranscriptGrammar[] = [
  bracketedGrammar,
  compactGrammar,
  initialGrammar,
];

function convert(value: string, line: string, lineNumber: number): number {
  try {
    return toSeconds(value);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new FormatError(message, line, lineNumber);
  }
}

export function parseTranscript(
  rawText: string,
  grammars: readonly TranscriptGrammar[] = TRANSCRIPT_GRAMMARS
): TranscriptSegment[] {
  const segments: TranscriptSegment[] = [];
  const lines = rawText.split(/\r?\n/);

  lines.forEach((line, index) => {
    const lineNumber = index + 1;
    const trimmed = line.trim();
    if (!trimmed) return;

    let matched: GrammarMatch | null = null;
    for (const grammar of grammars) {
      matched = grammar.match(trimmed);
      if (matched) break;
    }

    if (!matched) {
      throw new FormatError('Unrecognized transcript line', line, lineNumber);
    }

    const startSeconds = convert(matched.start, line, lineNumber);
    const endSeconds = matched.end !== undefined ? convert(matched.end, line, lineNumber) : undefined;
    const text = matched.text.trim();
    if (!text) return;

    segments.push(endSeconds !== undefined ? { startSeconds, endSeconds, text } : { startSeconds, text });
  });

  // Array.prototype.sort is stable, so equal starts keep input order
  return segments.sort((a, b) => a.startSeconds - b.startSeconds);
}
