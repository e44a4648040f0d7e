import { Address, KeyPoint, RankedOrigin, TravelMode } from '../types';
import { DistanceProvider } from './DistanceProvider';
import { computeScores, validateWeights } from './ScoreCalculator';
import { rankScores } from '../utils/ranking';

/**
 * Fetches the duration matrix for the candidates and ranks them by weighted commute time
 */
export class CommuteRankService {
  constructor(private readonly provider: DistanceProvider) {}

  async rank(origins: Address[], keypoints: KeyPoint[], mode: TravelMode): Promise<RankedOrigin[]> {
    const destinations = keypoints.map(keypoint => keypoint.address);
    const weights = keypoints.map(keypoint => keypoint.weight);

    // Bad weights fail before any request is made
    validateWeights(weights, destinations.length);

    const durations = await this.provider.getDurationMatrix(origins, destinations, mode);
    return rankScores(computeScores(origins, durations, weights));
  }
}
