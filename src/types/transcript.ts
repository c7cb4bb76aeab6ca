export interface TranscriptSegment {
  readonly startSeconds: number;
  readonly endSeconds?: number;
  readonly text: string;
}

// Caption as delivered by the caption source, before rendering to text
export interface Caption {
  startSeconds: number;
  durationSeconds: number;
  text: string;
}

export type TranscriptFormat = 'plain' | 'timestamps' | 'compact' | 'initial';
