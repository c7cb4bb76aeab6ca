import { BoundaryNotFoundError } from '../errors.js';
import { formatTimestamp } from '../transcript/time.js';
import {
  END_OF_TRANSCRIPT,
  type Cue,
  type SectionLabels,
  type SectionRange,
  type TranscriptSegment,
} from '../../types/index.js';

export const DEFAULT_SECTION_LABELS: SectionLabels = Object.freeze({
  startLabel: 'mensaje',
  endLabel: 'ministración',
  fallbackLabels: Object.freeze([
    'ministración',
    'oración',
    'cumpleaños',
    'despedida',
    'cierre',
    'bendición',
  ]),
});

// Lowercase and drop diacritics so "Ministración" matches "ministracion"
export function normalizeLabel(text: string): string {
  return text
    .normalize('NFD')
    .replace(/\p{Diacritic}/gu, '')
    .trim()
    .toLowerCase();
}

export function titleMatches(title: string, label: string): boolean {
  const key = normalizeLabel(label);
  return key.length > 0 && normalizeLabel(title).includes(key);
}

/**
 * Locate the message section among the cues. The end is the first later cue
 * titled with the end label, else the first later cue matching any fallback
 * label, else the end of the transcript. Only a missing start cue fails.
 */
export function resolveSection(
  cues: readonly Cue[],
  labels: SectionLabels = DEFAULT_SECTION_LABELS
): SectionRange {
  const ordered = [...cues].sort((a, b) => a.timestampSeconds - b.timestampSeconds);

  const startIndex = ordered.findIndex((cue) => titleMatches(cue.title, labels.startLabel));
  if (startIndex === -1) {
    throw new BoundaryNotFoundError(
      `No cue titled "${labels.startLabel}" among ${ordered.length} cues`,
      labels,
      ordered
    );
  }

  const startSeconds = ordered[startIndex].timestampSeconds;
  const later = ordered.slice(startIndex + 1).filter((cue) => cue.timestampSeconds > startSeconds);

  const endCue = later.find((cue) => titleMatches(cue.title, labels.endLabel));
  if (endCue) {
    return { startSeconds, endSeconds: endCue.timestampSeconds, source: 'end_label' };
  }

  const fallbackCue = later.find((cue) =>
    labels.fallbackLabels.some((label) => titleMatches(cue.title, label))
  );
  if (fallbackCue) {
    return { startSeconds, endSeconds: fallbackCue.timestampSeconds, source: 'fallback_label' };
  }

  return { startSeconds, endSeconds: END_OF_TRANSCRIPT, source: 'end_of_transcript' };
}

export function isInRange(seconds: number, range: SectionRange): boolean {
  if (seconds < range.startSeconds) return false;
  return range.endSeconds === END_OF_TRANSCRIPT || seconds < range.endSeconds;
}

export function selectSegments(segments: readonly TranscriptSegment[], range: SectionRange): TranscriptSegment[] {
  return segments.filter((segment) => isInRange(segment.startSeconds, range));
}

/**
 * Text of every segment starting inside the range, one segment per line. An
 * empty selection means the cues point outside the transcript.
 */
export function extractRangeText(
  segments: readonly TranscriptSegment[],
  range: SectionRange,
  labels: SectionLabels = DEFAULT_SECTION_LABELS
): string {
  const selected = selectSegments(segments, range);
  if (selected.length === 0) {
    throw new BoundaryNotFoundError(
      `No transcript segments between ${describeRange(range)}`,
      labels,
      []
    );
  }
  return selected.map((segment) => segment.text).join('\n');
}

export function describeRange(range: SectionRange): string {
  const end =
    range.endSeconds === END_OF_TRANSCRIPT ? 'FIN TRANSCRIPT' : formatTimestamp(range.endSeconds);
  return `${formatTimestamp(range.startSeconds)} -> ${end}`;
}
