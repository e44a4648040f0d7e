import { Address, DurationMatrix, Scores } from '../types';
import { SECONDS_PER_HOUR } from '../constants';
import { DataFormatError, InvalidWeightsError } from '../utils/errors';

/**
 * Check one weight per destination, each finite and nonnegative, with a positive sum. Returns the sum.
 */
export function validateWeights(weights: number[], destinationCount: number): number {
  if (weights.length !== destinationCount) {
    throw new InvalidWeightsError(`Expected ${destinationCount} weights, got ${weights.length}`);
  }

  const invalid = weights.findIndex(weight => !Number.isFinite(weight) || weight < 0);
  if (invalid !== -1) {
    throw new InvalidWeightsError(`Weight at index ${invalid} must be a nonnegative number, got ${weights[invalid]}`);
  }

  const total = weights.reduce((sum, weight) => sum + weight, 0);
  if (total === 0) {
    throw new InvalidWeightsError('Weights sum to zero');
  }
  return total;
}

/**
 * Weighted mean travel time per origin, in hours:
 * score(i) = Σ_j durations[i][j] * weights[j] / 3600 / Σ_j weights[j]
 */
export function computeScores(origins: Address[], durations: DurationMatrix, weights: number[]): Scores {
  if (durations.length !== origins.length) {
    throw new DataFormatError(`Duration matrix has ${durations.length} rows for ${origins.length} origins`);
  }

  const destinationCount = durations.length > 0 ? durations[0].length : weights.length;
  const ragged = durations.findIndex(row => row.length !== destinationCount);
  if (ragged !== -1) {
    throw new DataFormatError(`Duration matrix row ${ragged} has ${durations[ragged].length} entries, expected ${destinationCount}`);
  }

  const totalWeight = validateWeights(weights, destinationCount);

  const scores: Scores = new Map();
  origins.forEach((origin, i) => {
    const weighted = durations[i].reduce((sum, seconds, j) => sum + seconds * weights[j], 0);
    scores.set(origin, weighted / SECONDS_PER_HOUR / totalWeight);
  });
  return scores;
}
