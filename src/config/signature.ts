/**
 * Configuration for signature detection
 */

import { config } from './index';
import { InvalidArgumentError } from '../errors';

export interface SignatureConfig {
  /** Minimum tagger confidence before an ambiguous short line is dropped */
  threshold: number;
  /** POS tagger model name */
  model: string;
  shortLineMaxWords: number;
  longLineMinWords: number;
  /** Appended to the input file stem when writing the cleaned copy */
  outputSuffix: string;
}

const DEFAULT_SIGNATURE_CONFIG: SignatureConfig = {
  threshold: 0.9,
  model: 'compromise',
  shortLineMaxWords: 6,
  longLineMinWords: 8,
  outputSuffix: '_clean',
};

const orDefault = (value: number, fallback: number): number =>
  Number.isFinite(value) ? value : fallback;

/**
 * Get signature configuration from environment or defaults
 */
export function getSignatureConfig(override?: Partial<SignatureConfig>): SignatureConfig {
  const resolved: SignatureConfig = {
    threshold: orDefault(config.signature.threshold, DEFAULT_SIGNATURE_CONFIG.threshold),
    model: config.tagger.model || DEFAULT_SIGNATURE_CONFIG.model,
    shortLineMaxWords: orDefault(
      config.signature.shortLineMaxWords,
      DEFAULT_SIGNATURE_CONFIG.shortLineMaxWords
    ),
    longLineMinWords: orDefault(
      config.signature.longLineMinWords,
      DEFAULT_SIGNATURE_CONFIG.longLineMinWords
    ),
    outputSuffix: config.output.suffix,
  };

  // Apply overrides
  if (override) {
    return { ...resolved, ...override };
  }

  return resolved;
}

/**
 * Reject thresholds outside [0, 1].
 */
export function validateThreshold(threshold: number): void {
  if (!Number.isFinite(threshold) || threshold < 0 || threshold > 1) {
    throw InvalidArgumentError.outOfRange('threshold', threshold, 0, 1);
  }
}

/**
 * Short lines need at least one word; long lines must be longer than short ones.
 */
export function validateLineBounds(shortLineMaxWords: number, longLineMinWords: number): void {
  if (!Number.isInteger(shortLineMaxWords) || shortLineMaxWords < 1) {
    throw InvalidArgumentError.outOfRange(
      'shortLineMaxWords',
      shortLineMaxWords,
      1,
      Number.MAX_SAFE_INTEGER
    );
  }

  if (!Number.isInteger(longLineMinWords) || longLineMinWords <= shortLineMaxWords) {
    throw new InvalidArgumentError(
      `longLineMinWords must be greater than shortLineMaxWords (${shortLineMaxWords})`,
      'longLineMinWords',
      { value: longLineMinWords }
    );
  }
}

/**
 * Validate signature configuration
 */
export function validateSignatureConfig(signatureConfig: SignatureConfig): boolean {
  validateThreshold(signatureConfig.threshold);
  validateLineBounds(signatureConfig.shortLineMaxWords, signatureConfig.longLineMinWords);

  if (!signatureConfig.outputSuffix) {
    throw new InvalidArgumentError('outputSuffix must not be empty', 'outputSuffix');
  }

  return true;
}

export { DEFAULT_SIGNATURE_CONFIG };
