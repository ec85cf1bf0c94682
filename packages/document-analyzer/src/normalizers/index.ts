export {
  FALLBACK_SCORE,
  QUALITY_KEYWORDS,
  extractList,
  extractScore,
  mapQualityToStars,
  normalizeLabel,
  parseScore,
} from './response-normalizer';
export type { ListDelimiter, ScoreRange } from './response-normalizer';
