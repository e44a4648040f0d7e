#!/usr/bin/env node
/**
 * commute-rank CLI
 *
 * Ranks candidate addresses by their weighted average commute time to a set of key points.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { CommuteRankConfig, RankedOrigin } from '../types';
import { CLI_LOGGER_NAME, COMMUTE_RANK_VERSION, REQUEST_LOGGER_NAME, SUPPORTED_MODES } from '../constants';
import { DistanceProvider, GoogleMapsDistanceProvider } from '../services/DistanceProvider';
import { CommuteRankService } from '../services/CommuteRankService';
import { readKeypointFile, readOptionFile } from '../loaders/input-file-loader';
import { ConfigOverrides, loadConfig } from '../utils/config-loader';
import { loadEnvironment } from '../utils/env';
import { DataFormatError } from '../utils/errors';
import { Logger, createLogger } from '../utils/logger';
import { formatRankingLine } from '../utils/ranking';

export interface RankCliOptions {
  options: string;
  keypoints: string;
  mode?: string;
  verbose?: boolean;
  config?: string;
  apiKey?: string;
  maxAttempts?: string;
  backoffBase?: string;
  timeout?: string;
  departureTime?: string;
}

export interface RankCliDependencies {
  createProvider?: (config: CommuteRankConfig, logger: Logger) => DistanceProvider;
  output?: (line: string) => void;
  errorOutput?: (line: string) => void;
  setExitCode?: (code: number) => void;
  env?: NodeJS.ProcessEnv;
}

function defaultProvider(config: CommuteRankConfig, logger: Logger): DistanceProvider {
  return new GoogleMapsDistanceProvider({ config: config.googleMaps, retry: config.retry, logger });
}

export function toConfigOverrides(options: RankCliOptions): ConfigOverrides {
  return {
    apiKey: options.apiKey,
    mode: options.mode,
    verbose: options.verbose,
    maxAttempts: options.maxAttempts,
    baseDelayMs: options.backoffBase,
    timeoutMs: options.timeout,
    departureTime: options.departureTime,
  };
}

/**
 * Print the failure, plus the offending payload when the provider response was malformed
 */
export function reportFailure(error: unknown, errorOutput: (line: string) => void): void {
  const message = error instanceof Error ? `${error.name}: ${error.message}` : String(error);
  errorOutput(chalk.red(`❌ Ranking failed: ${message}`));

  if (error instanceof DataFormatError && error.response !== undefined) {
    errorOutput(chalk.gray('Last provider response:'));
    errorOutput(JSON.stringify(error.response, null, 2));
  }
}

export async function executeRank(options: RankCliOptions, deps: RankCliDependencies = {}): Promise<RankedOrigin[]> {
  const config = loadConfig(options.config, toConfigOverrides(options), deps.env ?? process.env);
  const loggerOptions = { verbose: config.verbose, sink: deps.errorOutput };
  const logger = createLogger(CLI_LOGGER_NAME, loggerOptions);

  const origins = readOptionFile(options.options);
  const keypoints = readKeypointFile(options.keypoints);
  logger.info(`Ranking ${origins.length} options against ${keypoints.length} key points (${config.mode})`);

  const provider = (deps.createProvider ?? defaultProvider)(config, createLogger(REQUEST_LOGGER_NAME, loggerOptions));
  return new CommuteRankService(provider).rank(origins, keypoints, config.mode);
}

export function createRankProgram(deps: RankCliDependencies = {}): Command {
  const output = deps.output ?? ((line: string) => console.log(line));
  const errorOutput = deps.errorOutput ?? ((line: string) => console.error(line));
  const setExitCode = deps.setExitCode ?? ((code: number) => {
    process.exitCode = code;
  });

  const program = new Command();

  program
    .name('commute-rank')
    .description('Give weighted distances of options to important locations.')
    .version(COMMUTE_RANK_VERSION)
    .requiredOption('-o, --options <file>', 'File with one possible location per line')
    .requiredOption('-k, --keypoints <file>', 'File with the priority in first column and the key point in the rest')
    .option('-m, --mode <mode>', `Mode of transportation (${SUPPORTED_MODES.join(', ')})`)
    .option('-v, --verbose', 'Log every outbound request')
    .option('-c, --config <file>', 'YAML configuration file')
    .option('--api-key <key>', 'Google Maps API key (defaults to GOOGLE_MAPS_API_KEY)')
    .option('--max-attempts <count>', 'Attempts per request before giving up')
    .option('--backoff-base <ms>', 'Base delay for exponential backoff, in milliseconds')
    .option('--timeout <ms>', 'Request timeout, in milliseconds')
    .option('--departure-time <time>', 'Transit departure time: "now" or epoch seconds')
    .action(async (options: RankCliOptions) => {
      try {
        const ranking = await executeRank(options, { ...deps, errorOutput });
        ranking.forEach(entry => output(formatRankingLine(entry)));
      } catch (error) {
        reportFailure(error, errorOutput);
        setExitCode(1);
      }
    });

  return program;
}

// Export for programmatic use
export async function runRank(args: string[] = process.argv, deps: RankCliDependencies = {}): Promise<void> {
  loadEnvironment();
  await createRankProgram(deps).parseAsync(args);
}

// Run if called directly
if (require.main === module) {
  runRank().catch(error => {
    console.error(chalk.red('❌ commute-rank failed:'), error);
    process.exit(1);
  });
}
