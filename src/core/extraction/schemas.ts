import { z } from 'zod';

/**
 * A versioned response contract: the JSON schema sent to the model and the zod
 * validator the reply must pass. Both describe the same shape.
 */
export interface ResponseSchema<T> {
  name: string;
  version: number;
  jsonSchema: Record<string, unknown>;
  validator: z.ZodType<T, z.ZodTypeDef, unknown>;
}

const cuesPayloadSchema = z
  .object({
    cues: z.array(
      z
        .object({
          timestamp: z.union([z.string(), z.number().finite().nonnegative()]),
          title: z.string().trim().min(1),
        })
        .strict()
    ),
  })
  .strict();

export type CuesPayload = z.infer<typeof cuesPayloadSchema>;

export const CUES_RESPONSE_SCHEMA: ResponseSchema<CuesPayload> = {
  name: 'cues_response',
  version: 1,
  jsonSchema: {
    type: 'object',
    additionalProperties: false,
    properties: {
      cues: {
        type: 'array',
        items: {
          type: 'object',
          additionalProperties: false,
          properties: {
            timestamp: {
              anyOf: [{ type: 'string' }, { type: 'number' }],
              description: 'HH:MM:SS start of the section',
            },
            title: { type: 'string' },
          },
          required: ['timestamp', 'title'],
        },
      },
    },
    required: ['cues'],
  },
  validator: cuesPayloadSchema,
};

const summaryPayloadSchema = z
  .object({
    summary_points: z.array(z.string()),
  })
  .strict();

export type SummaryPayload = z.infer<typeof summaryPayloadSchema>;

export const SUMMARY_RESPONSE_SCHEMA: ResponseSchema<SummaryPayload> = {
  name: 'message_summary_response',
  version: 1,
  jsonSchema: {
    type: 'object',
    additionalProperties: false,
    properties: {
      summary_points: {
        type: 'array',
        items: { type: 'string' },
      },
    },
    required: ['summary_points'],
  },
  validator: summaryPayloadSchema,
};

export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
    return `${path}: ${issue.message}`;
  });
}
