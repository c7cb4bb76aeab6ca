export {
  parseTranscript,
  TRANSCRIPT_GRAMMARS,
  bracketedGrammar,
  compactGrammar,
  initialGrammar,
  type TranscriptGrammar,
  type GrammarMatch,
} from './parser.js';
export { toSeconds, isTimestamp, formatTimestamp, type FormatTimestampOptions } from './time.js';
export { renderTranscript, captionsToSegments } from './render.js';
