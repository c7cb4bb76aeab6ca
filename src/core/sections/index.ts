export {
  resolveSection,
  extractRangeText,
  selectSegments,
  isInRange,
  describeRange,
  normalizeLabel,
  titleMatches,
  DEFAULT_SECTION_LABELS,
} from './resolver.js';
