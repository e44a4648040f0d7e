import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { Address, KeyPoint } from '../types';
import { ParseError } from '../utils/errors';

const DECIMAL_PATTERN = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/;

export function expandHome(filePath: string): string {
  if (filePath === '~') {
    return os.homedir();
  }
  if (filePath.startsWith('~/')) {
    return path.join(os.homedir(), filePath.slice(2));
  }
  return filePath;
}

function readText(filePath: string): string {
  const resolved = expandHome(filePath);
  if (!fs.existsSync(resolved)) {
    throw new ParseError('File not found', filePath);
  }
  return fs.readFileSync(resolved, 'utf8');
}

/**
 * One address per line; lines are trimmed and blank lines skipped
 */
export function parseOptionList(text: string, source?: string): Address[] {
  const addresses = text
    .split(/\r?\n/)
    .map(line => line.trim())
    .filter(line => line.length > 0);

  if (addresses.length === 0) {
    throw new ParseError('No addresses found', source);
  }
  return addresses;
}

/**
 * `<weight> <address>` per line. The address is everything after the first
 * space, internal spaces kept.
 */
export function parseKeypointList(text: string, source?: string): KeyPoint[] {
  const keypoints: KeyPoint[] = [];

  text.split(/\r?\n/).forEach((rawLine, index) => {
    const line = rawLine.trim();
    if (line.length === 0) {
      return;
    }

    const lineNumber = index + 1;
    const separator = line.indexOf(' ');
    const weightToken = separator === -1 ? line : line.slice(0, separator);
    const address = separator === -1 ? '' : line.slice(separator + 1);

    if (!DECIMAL_PATTERN.test(weightToken)) {
      throw new ParseError(`Invalid weight "${weightToken}"`, source, lineNumber);
    }
    const weight = Number(weightToken);
    if (!Number.isFinite(weight) || weight < 0) {
      throw new ParseError(`Weight must be a nonnegative number, got "${weightToken}"`, source, lineNumber);
    }
    if (address.trim().length === 0) {
      throw new ParseError('Missing address after weight', source, lineNumber);
    }

    keypoints.push({ weight, address });
  });

  if (keypoints.length === 0) {
    throw new ParseError('No key points found', source);
  }
  return keypoints;
}

export function readOptionFile(filePath: string): Address[] {
  return parseOptionList(readText(filePath), filePath);
}

export function readKeypointFile(filePath: string): KeyPoint[] {
  return parseKeypointList(readText(filePath), filePath);
}
