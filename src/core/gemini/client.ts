import { FinishReason, GoogleGenAI } from '@google/genai';
import type {
  CompletionReason,
  GenerationRequest,
  GenerationResult,
  StructuredGenerator,
} from '../../types/index.js';

export interface GeminiClientConfig {
  projectId?: string;
  location?: string;
  apiKey?: string;
  model?: string;
  temperature?: number;
  maxRetries?: number;
  retryDelayMs?: number;
}

export class GeminiClient implements StructuredGenerator {
  private client: GoogleGenAI;
  private modelName: string;
  private temperature: number;
  private maxRetries: number;
  private retryDelayMs: number;

  constructor(config: GeminiClientConfig) {
    this.client = config.apiKey
      ? new GoogleGenAI({ apiKey: config.apiKey })
      : new GoogleGenAI({
          vertexai: true,
          project: config.projectId,
          location: config.location,
        });
    this.modelName = config.model || 'gemini-2.5-flash';
    this.temperature = config.temperature ?? 0.2;
    this.maxRetries = config.maxRetries ?? 3;
    this.retryDelayMs = config.retryDelayMs ?? 5000;
  }

  get model(): string {
    return this.modelName;
  }

  private async sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
  }

  private isRetryableError(error: unknown): boolean {
    if (!(error instanceof Error)) return false;

    const message = error.message.toLowerCase();
    return (
      message.includes('fetch failed') ||
      message.includes('network') ||
      message.includes('timeout') ||
      message.includes('econnreset') ||
      message.includes('econnrefused') ||
      message.includes('socket hang up') ||
      message.includes('503') ||
      message.includes('502') ||
      message.includes('429') ||
      message.includes('rate limit')
    );
  }

  private getErrorDetail(error: Error): string {
    const parts: string[] = [error.message];

    if (error.cause instanceof Error) {
      parts.push(`[cause: ${error.cause.message}]`);
    } else if (error.cause) {
      parts.push(`[cause: ${String(error.cause)}]`);
    }

    return parts.join(' ');
  }

  toCompletionReason(finishReason: FinishReason | undefined): CompletionReason {
    switch (finishReason) {
      case FinishReason.STOP:
        return 'stop';
      case FinishReason.MAX_TOKENS:
        return 'length';
      default:
        return 'other';
    }
  }

  /**
   * One structured-output call. Transport failures (network, 429, 5xx) are
   * retried here with exponential backoff; truncation is reported through
   * `completionReason` and left to the caller.
   */
  async generate(request: GenerationRequest): Promise<GenerationResult> {
    let lastError: Error | null = null;

    for (let attempt = 0; attempt <= this.maxRetries; attempt++) {
      try {
        const response = await this.client.models.generateContent({
          model: this.modelName,
          contents: request.prompt,
          config: {
            temperature: this.temperature,
            maxOutputTokens: request.maxOutputTokens,
            responseMimeType: 'application/json',
            responseJsonSchema: request.jsonSchema,
          },
        });

        const blockReason = response.promptFeedback?.blockReason;
        if (blockReason) {
          throw new Error(`Content blocked by Gemini: ${blockReason}`);
        }

        return {
          content: response.text ?? '',
          completionReason: this.toCompletionReason(response.candidates?.[0]?.finishReason),
        };
      } catch (error) {
        lastError = error instanceof Error ? error : new Error(String(error));

        if (lastError.message.startsWith('Content blocked')) {
          throw lastError;
        }

        if (attempt < this.maxRetries && this.isRetryableError(lastError)) {
          const delayMs = this.retryDelayMs * Math.pow(2, attempt);
          console.warn(
            `⚠️ Gemini API request failed (attempt ${attempt + 1}/${this.maxRetries + 1}): ${this.getErrorDetail(lastError)}. Retrying in ${delayMs / 1000}s...`
          );
          await this.sleep(delayMs);
          continue;
        }

        throw new Error(`Gemini API error: ${lastError.message}`, { cause: lastError });
      }
    }

    throw new Error(`Gemini API error: ${lastError?.message || 'Unknown error'}`, { cause: lastError });
  }
}
