import { InvalidArgumentError } from 'commander';
import { readFile } from 'fs/promises';
import {
  DEFAULT_SECTION_LABELS,
  GeminiClient,
  Summarizer,
  YouTubeClient,
  loadPromptTemplate,
  parseLanguages,
  type SummarizerCallbacks,
} from '../../core/index.js';
import { requireGeminiConfig, requireYouTubeApiKey } from './env.js';
import type { SectionLabels, SummarizerConfig, TranscriptFormat } from '../../types/index.js';

export const TRANSCRIPT_FORMATS: readonly TranscriptFormat[] = ['plain', 'timestamps', 'compact', 'initial'];

export function parseFormat(value: string): TranscriptFormat {
  const format = TRANSCRIPT_FORMATS.find((candidate) => candidate === value);
  if (!format) {
    throw new InvalidArgumentError(`Formato no soportado. Usa: ${TRANSCRIPT_FORMATS.join(', ')}`);
  }
  return format;
}

export function parsePositiveInt(value: string): number {
  const parsed = Number.parseInt(value, 10);
  if (!Number.isInteger(parsed) || parsed < 1 || String(parsed) !== value.trim()) {
    throw new InvalidArgumentError('Debe ser un entero positivo.');
  }
  return parsed;
}

export function parseList(value: string): string[] {
  return value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

export interface PipelineOptions {
  languages: string;
  model?: string;
  cueOutputTokens: number;
  maxOutputTokens?: number;
  maxAttempts: number;
  minPoints?: number;
  startLabel?: string;
  endLabel?: string;
  fallbackLabels?: string[];
  video?: string;
  verbose?: boolean;
}

export function buildLabels(options: PipelineOptions): SectionLabels {
  return {
    startLabel: options.startLabel ?? DEFAULT_SECTION_LABELS.startLabel,
    endLabel: options.endLabel ?? DEFAULT_SECTION_LABELS.endLabel,
    fallbackLabels:
      options.fallbackLabels && options.fallbackLabels.length > 0
        ? options.fallbackLabels
        : DEFAULT_SECTION_LABELS.fallbackLabels,
  };
}

export function buildConfig(options: PipelineOptions): SummarizerConfig {
  return {
    languages: parseLanguages(options.languages),
    labels: buildLabels(options),
    cueTokenBudget: options.cueOutputTokens,
    summaryTokenBudget: options.maxOutputTokens ?? 6000,
    maxAttempts: options.maxAttempts,
    minPoints: options.minPoints,
  };
}

export async function createSummarizer(options: PipelineOptions): Promise<Summarizer> {
  const geminiConfig = requireGeminiConfig(options.model);
  const youtube = options.video ? new YouTubeClient(requireYouTubeApiKey()) : undefined;
  const config = buildConfig(options);

  if (options.verbose) {
    console.error(`🤖 Modelo Gemini: ${geminiConfig.model}`);
  }

  return new Summarizer(
    {
      generator: new GeminiClient(geminiConfig),
      templates: {
        cues: await loadPromptTemplate('cues'),
        summary: await loadPromptTemplate('summary'),
      },
      youtube,
    },
    config
  );
}

// Progress and debug go to stderr so stdout carries only the result
export function createCallbacks(verbose = false): SummarizerCallbacks {
  return {
    onProgress: (message: string) => console.error(`ℹ️  ${message}`),
    onDebug: verbose ? (message: string) => console.error(`🔍 ${message}`) : undefined,
  };
}

export async function readTranscriptSource(
  summarizer: Summarizer,
  transcriptFile: string | undefined,
  video: string | undefined,
  callbacks: SummarizerCallbacks
): Promise<string> {
  if (video) {
    return (await summarizer.fetchTranscript(video, 'initial', callbacks)).text;
  }
  if (transcriptFile) {
    return readFile(transcriptFile, 'utf-8');
  }
  throw new Error('Se necesita un archivo de transcripción o la opción --video.');
}
