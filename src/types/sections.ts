export interface Cue {
  timestampSeconds: number;
  title: string;
}

export const END_OF_TRANSCRIPT = 'end-of-transcript';

export type RangeSource = 'end_label' | 'fallback_label' | 'end_of_transcript';

export interface SectionRange {
  startSeconds: number;
  endSeconds: number | typeof END_OF_TRANSCRIPT;
  source: RangeSource;
}

export interface SectionLabels {
  startLabel: string;
  endLabel: string;
  fallbackLabels: readonly string[];
}

export interface SummaryPoint {
  emoji: string;
  text: string;
  reference?: string;
}
