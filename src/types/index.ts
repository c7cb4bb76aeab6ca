import type { SectionLabels } from './sections.js';

export * from './transcript.js';
export * from './youtube.js';
export * from './gemini.js';
export * from './sections.js';

export interface SummarizerConfig {
  languages: string[];
  labels: SectionLabels;
  cueTokenBudget: number;
  summaryTokenBudget: number;
  maxAttempts: number;
  minPoints?: number;
}
