export { RetryPolicy, type RetryPolicyOptions, type InvokeResult } from './retry-policy.js';
export {
  CUES_RESPONSE_SCHEMA,
  SUMMARY_RESPONSE_SCHEMA,
  type ResponseSchema,
  type CuesPayload,
  type SummaryPayload,
} from './schemas.js';
export { parseJsonResponse } from './json.js';
export {
  CueExtractor,
  normalizeCues,
  formatCueLines,
  parseCueLines,
  type CueExtractorOptions,
  type CueExtraction,
} from './cues.js';
export {
  SummaryExtractor,
  parseSummaryPoint,
  formatSummaryLines,
  type SummaryExtractorOptions,
  type SummaryExtraction,
} from './summary.js';
