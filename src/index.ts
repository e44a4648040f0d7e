/**
 * commute-rank - rank candidate addresses by weighted commute time to key points
 */

// Core exports
export {
  GoogleMapsDistanceProvider,
  parseDirectionsResponse,
  parseDistanceMatrixResponse
} from './services/DistanceProvider';
export type { DistanceProvider, HttpClient, GoogleMapsDistanceProviderOptions } from './services/DistanceProvider';
export { computeScores, validateWeights } from './services/ScoreCalculator';
export { CommuteRankService } from './services/CommuteRankService';

// Input files
export {
  parseKeypointList,
  parseOptionList,
  readKeypointFile,
  readOptionFile
} from './loaders/input-file-loader';

// Utilities
export { withRetry, backoffDelay, DEFAULT_RETRY_POLICY } from './utils/retry';
export type { RetryOptions } from './utils/retry';
export { Logger, createLogger } from './utils/logger';
export { rankScores, formatRankingLine } from './utils/ranking';
export { loadConfig, resolveConfig } from './utils/config-loader';
export * from './utils/errors';

// Types
export * from './types';

// CLI
export { runRank, createRankProgram } from './cli/rank';

// Constants
export * from './constants';
