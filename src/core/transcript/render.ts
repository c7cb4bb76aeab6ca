import { formatTimestamp } from './time.js';
import type { Caption, TranscriptFormat, TranscriptSegment } from '../../types/index.js';

export function captionsToSegments(captions: Caption[]): TranscriptSegment[] {
  return captions
    .map((caption) => ({
      startSeconds: caption.startSeconds,
      endSeconds: caption.startSeconds + caption.durationSeconds,
      text: caption.text.replace(/\s*\n\s*/g, ' ').trim(),
    }))
    .filter((segment) => segment.text.length > 0);
}

function renderLine(segment: TranscriptSegment, format: TranscriptFormat): string {
  const text = segment.text.replace(/\s*\n\s*/g, ' ').trim();
  const end = segment.endSeconds ?? segment.startSeconds;

  switch (format) {
    case 'plain':
      return text;
    case 'timestamps':
      return `[${formatTimestamp(segment.startSeconds, { milliseconds: true })} --> ${formatTimestamp(end, { milliseconds: true })}] ${text}`;
    case 'compact':
      return `${formatTimestamp(segment.startSeconds, { milliseconds: true })}|${formatTimestamp(end, { milliseconds: true })}|${text}`;
    case 'initial':
      return `${formatTimestamp(segment.startSeconds)}|${text}`;
  }
}

/**
 * Serialize segments into one of the textual grammars. Every format except
 * `plain` reads back through parseTranscript.
 */
export function renderTranscript(segments: TranscriptSegment[], format: TranscriptFormat): string {
  return segments.map((segment) => renderLine(segment, format)).join('\n');
}
