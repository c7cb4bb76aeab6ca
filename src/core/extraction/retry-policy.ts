import { SchemaError } from '../errors.js';
import { parseJsonResponse } from './json.js';
import { formatIssues, type ResponseSchema } from './schemas.js';
import type { CompletionReason, StructuredGenerator } from '../../types/index.js';

export interface RetryPolicyOptions {
  maxAttempts?: number;
  increaseBudget?: (previousBudget: number) => number;
  onRetry?: (attempt: number, maxAttempts: number, nextBudget: number) => void;
}

export interface InvokeResult<T> {
  payload: T;
  completionReason: CompletionReason;
  attempts: number;
  tokenBudget: number;
  raw: string;
}

export class RetryPolicy {
  private maxAttempts: number;
  private increaseBudget: (previousBudget: number) => number;
  private onRetry?: RetryPolicyOptions['onRetry'];

  constructor(
    private readonly generator: StructuredGenerator,
    options: RetryPolicyOptions = {}
  ) {
    this.maxAttempts = options.maxAttempts ?? 3;
    this.increaseBudget = options.increaseBudget ?? ((budget) => budget * 2);
    this.onRetry = options.onRetry;
  }

  /**
   * Call the generator until it stops on its own or attempts run out. Only a
   * `length` completion is retried, each time with a larger token budget. A
   * finished response that fails to parse or validate is not retried.
   */
  async invoke<T>(
    prompt: string,
    schema: ResponseSchema<T>,
    initialTokenBudget: number,
    maxAttempts: number = this.maxAttempts
  ): Promise<InvokeResult<T>> {
    if (!Number.isInteger(maxAttempts) || maxAttempts < 1) {
      throw new RangeError(`maxAttempts must be a positive integer, got ${maxAttempts}`);
    }

    let budget = initialTokenBudget;
    let raw = '';

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      const result = await this.generator.generate({
        prompt,
        jsonSchema: schema.jsonSchema,
        maxOutputTokens: budget,
      });
      raw = result.content;

      if (result.completionReason === 'length') {
        if (attempt === maxAttempts) break;

        const nextBudget = Math.max(Math.floor(this.increaseBudget(budget)), budget + 1);
        this.onRetry?.(attempt, maxAttempts, nextBudget);
        budget = nextBudget;
        continue;
      }

      return {
        payload: this.validate(schema, raw),
        completionReason: result.completionReason,
        attempts: attempt,
        tokenBudget: budget,
        raw,
      };
    }

    throw new SchemaError(
      `${schema.name} v${schema.version}: response truncated after ${maxAttempts} attempts (max_output_tokens ${budget})`,
      raw
    );
  }

  private validate<T>(schema: ResponseSchema<T>, raw: string): T {
    const parsed = schema.validator.safeParse(parseJsonResponse(raw));
    if (!parsed.success) {
      throw new SchemaError(
        `${schema.name} v${schema.version}: response does not match schema`,
        raw,
        formatIssues(parsed.error)
      );
    }
    return parsed.data;
  }
}
