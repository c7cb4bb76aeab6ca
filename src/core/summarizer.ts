import { CueExtractor, RetryPolicy, SummaryExtractor } from './extraction/index.js';
import type { CueExtraction, SummaryExtraction } from './extraction/index.js';
import { describeRange, extractRangeText, resolveSection } from './sections/index.js';
import { captionsToSegments, parseTranscript, renderTranscript } from './transcript/index.js';
import type { YouTubeClient } from './youtube/index.js';
import type {
  Caption,
  Cue,
  SectionRange,
  StructuredGenerator,
  SummarizerConfig,
  TranscriptFormat,
  TranscriptSegment,
} from '../types/index.js';

export type Stage = 'cues' | 'summary';

export interface SummarizerCallbacks {
  onProgress?: (message: string) => void;
  onDebug?: (message: string) => void;
  onRetry?: (stage: Stage, attempt: number, maxAttempts: number, nextBudget: number) => void;
}

export interface PromptTemplates {
  cues: string;
  summary: string;
}

export interface SummarizerDeps {
  generator: StructuredGenerator;
  templates: PromptTemplates;
  youtube?: YouTubeClient;
}

export interface TranscriptResult {
  videoId: string;
  captions: Caption[];
  text: string;
}

export interface CueRun extends CueExtraction {
  segments: TranscriptSegment[];
}

export interface SummaryRun extends SummaryExtraction {
  range: SectionRange;
  rangeText: string;
}

export interface VideoSummaryResult {
  videoId: string;
  transcriptText: string;
  cueRun: CueRun;
  summaryRun: SummaryRun;
}

export class Summarizer {
  private generator: StructuredGenerator;
  private templates: PromptTemplates;
  private youtube?: YouTubeClient;

  constructor(
    deps: SummarizerDeps,
    private readonly config: SummarizerConfig
  ) {
    this.generator = deps.generator;
    this.templates = deps.templates;
    this.youtube = deps.youtube;
  }

  private createPolicy(stage: Stage, callbacks: SummarizerCallbacks): RetryPolicy {
    return new RetryPolicy(this.generator, {
      maxAttempts: this.config.maxAttempts,
      onRetry: (attempt, maxAttempts, nextBudget) => {
        callbacks.onProgress?.(
          `Respuesta truncada (${stage}), reintentando ${attempt + 1}/${maxAttempts} con max_output_tokens ${nextBudget}`
        );
        callbacks.onRetry?.(stage, attempt, maxAttempts, nextBudget);
      },
    });
  }

  private requireYouTube(): YouTubeClient {
    if (!this.youtube) {
      throw new Error('YouTube client is not configured (YOUTUBE_API_KEY)');
    }
    return this.youtube;
  }

  async fetchTranscript(
    video: string,
    format: TranscriptFormat = 'initial',
    callbacks: SummarizerCallbacks = {}
  ): Promise<TranscriptResult> {
    const youtube = this.requireYouTube();
    const videoId = youtube.parseVideoId(video);
    callbacks.onProgress?.(`Video ID: ${videoId}`);

    const captions = await youtube.getCaptions(videoId, this.config.languages);
    callbacks.onProgress?.(`Subtítulos descargados: ${captions.length} segmentos`);

    return {
      videoId,
      captions,
      text: renderTranscript(captionsToSegments(captions), format),
    };
  }

  /**
   * Parse the transcript and ask the model for section cues. The prompt gets
   * the transcript re-rendered as `HH:MM:SS|text` whatever grammar it came in.
   */
  async generateCues(transcriptText: string, callbacks: SummarizerCallbacks = {}): Promise<CueRun> {
    const segments = parseTranscript(transcriptText);
    callbacks.onDebug?.(`Transcript: ${segments.length} segmentos`);

    const extractor = new CueExtractor(this.createPolicy('cues', callbacks), {
      template: this.templates.cues,
      tokenBudget: this.config.cueTokenBudget,
    });

    callbacks.onProgress?.('Generando CUEs con Gemini...');
    const extraction = await extractor.extractWithDetails(
      renderTranscript(segments, 'initial'),
      this.config.languages
    );
    callbacks.onDebug?.(
      `CUEs finish_reason: ${extraction.completionReason} (max_output_tokens usado: ${extraction.tokenBudget}, intentos: ${extraction.attempts})`
    );

    return { ...extraction, segments };
  }

  async summarizeMessage(
    transcript: string | TranscriptSegment[],
    cues: Cue[],
    callbacks: SummarizerCallbacks = {}
  ): Promise<SummaryRun> {
    const segments = typeof transcript === 'string' ? parseTranscript(transcript) : transcript;
    const { labels } = this.config;

    const range = resolveSection(cues, labels);
    callbacks.onProgress?.(`Rango usado: ${describeRange(range)}`);
    if (range.source === 'fallback_label') {
      callbacks.onProgress?.(
        `No se encontró '${labels.endLabel}' después de '${labels.startLabel}'. Se usó una sección posterior detectada por nombre.`
      );
    } else if (range.source === 'end_of_transcript') {
      callbacks.onProgress?.(
        `No se encontró '${labels.endLabel}' ni una sección posterior después de '${labels.startLabel}'. Se usó fin de transcript.`
      );
    }

    const rangeText = extractRangeText(segments, range, labels);

    const extractor = new SummaryExtractor(this.createPolicy('summary', callbacks), {
      template: this.templates.summary,
      tokenBudget: this.config.summaryTokenBudget,
      minPoints: this.config.minPoints,
    });

    callbacks.onProgress?.('Generando resumen del mensaje con Gemini...');
    const extraction = await extractor.extractWithDetails(rangeText);
    callbacks.onDebug?.(
      `Resumen finish_reason: ${extraction.completionReason} (max_output_tokens usado: ${extraction.tokenBudget}, intentos: ${extraction.attempts})`
    );

    return { ...extraction, range, rangeText };
  }

  async summarizeVideo(video: string, callbacks: SummarizerCallbacks = {}): Promise<VideoSummaryResult> {
    const transcript = await this.fetchTranscript(video, 'initial', callbacks);
    const cueRun = await this.generateCues(transcript.text, callbacks);
    callbacks.onProgress?.(`CUEs generados: ${cueRun.cues.length}`);

    const summaryRun = await this.summarizeMessage(cueRun.segments, cueRun.cues, callbacks);
    callbacks.onProgress?.(`Resumen generado: ${summaryRun.points.length} puntos`);

    return {
      videoId: transcript.videoId,
      transcriptText: transcript.text,
      cueRun,
      summaryRun,
    };
  }
}
