/**
 * Closed set of qualitative bands produced from free-text quality remarks
 * (e.g. "the directing was excellent").
 */
export enum QualityBand {
  EXCELLENT = 'excellent',
  GOOD = 'good',
  AVERAGE = 'average',
  POOR = 'poor',
}

/**
 * Star symbol for each band, five-star scale
 */
export const QUALITY_BAND_STARS: Readonly<Record<QualityBand, string>> = {
  [QualityBand.EXCELLENT]: '★★★★★',
  [QualityBand.GOOD]: '★★★★☆',
  [QualityBand.AVERAGE]: '★★★☆☆',
  [QualityBand.POOR]: '★★☆☆☆',
};

export function toStarRating(band: QualityBand): string {
  return QUALITY_BAND_STARS[band];
}
