import { RankedOrigin, Scores } from '../types';
import { OUTPUT_SETTINGS } from '../constants';

/**
 * Ascending by score; equal scores keep their insertion order
 */
export function rankScores(scores: Scores): RankedOrigin[] {
  return Array.from(scores, ([address, score]) => ({ address, score }))
    .sort((a, b) => a.score - b.score);
}

export function formatRankingLine(entry: RankedOrigin): string {
  const score = entry.score.toFixed(OUTPUT_SETTINGS.SCORE_DECIMALS);
  return `${score}${entry.address.padStart(OUTPUT_SETTINGS.ADDRESS_COLUMN_WIDTH)}`;
}
