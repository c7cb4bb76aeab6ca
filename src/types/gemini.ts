export type CompletionReason = 'stop' | 'length' | 'other';

export interface GenerationRequest {
  prompt: string;
  jsonSchema: Record<string, unknown>;
  maxOutputTokens: number;
}

export interface GenerationResult {
  content: string;
  completionReason: CompletionReason;
}

/**
 * Anything that can answer a prompt with JSON constrained to a schema.
 * GeminiClient is the production implementation; tests script their own.
 */
export interface StructuredGenerator {
  generate(request: GenerationRequest): Promise<GenerationResult>;
}
