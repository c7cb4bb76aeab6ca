export {
  ArtifactWriter,
  defaultArtifactPaths,
  defaultTranscriptPath,
  type ArtifactPaths,
} from './artifacts.js';
