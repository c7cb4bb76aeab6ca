export {
  Summarizer,
  type SummarizerCallbacks,
  type SummarizerDeps,
  type PromptTemplates,
  type TranscriptResult,
  type CueRun,
  type SummaryRun,
  type VideoSummaryResult,
  type Stage,
} from './summarizer.js';
export * from './errors.js';
export * from './transcript/index.js';
export * from './extraction/index.js';
export * from './sections/index.js';
export { YouTubeClient, DEFAULT_LANGUAGES, parseLanguages } from './youtube/index.js';
export { GeminiClient, loadPromptTemplate, renderPrompt } from './gemini/index.js';
export { ArtifactWriter, defaultArtifactPaths, defaultTranscriptPath } from './output/index.js';
