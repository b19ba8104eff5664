/**
 * Clean Emails Script
 *
 * Writes a `<name>_clean<ext>` copy of each email file with its signature
 * block removed.
 *
 * Usage:
 *   npm run clean-emails -- mail/one.eml mail/two.txt
 *   npm run clean-emails -- --threshold=0.75 mail/one.eml
 *   npm run clean-emails -- --model=none mail/one.eml
 *   npm run clean-emails -- --suffix=.nosig mail/one.eml
 */

import emailCleanerService from '../services/emailCleanerService';
import { getSignatureConfig, validateThreshold } from '../config/signature';
import { InvalidArgumentError, isDomainError, wrapError } from '../errors';
import logger from '../utils/logger';

export interface CleanEmailsArgs {
  files: string[];
  threshold: number;
  model: string;
  suffix: string;
}

function optionValue(arg: string, name: string): string {
  const value = arg.slice(`--${name}=`.length).trim();
  if (!value) {
    throw new InvalidArgumentError(`--${name} needs a value`, name);
  }
  return value;
}

/**
 * Parse command line arguments
 */
export function parseArgs(argv: readonly string[]): CleanEmailsArgs {
  const defaults = getSignatureConfig();
  const args: CleanEmailsArgs = {
    files: [],
    threshold: defaults.threshold,
    model: defaults.model,
    suffix: defaults.outputSuffix,
  };

  for (const arg of argv) {
    if (arg.startsWith('--threshold=')) {
      args.threshold = Number(optionValue(arg, 'threshold'));
      validateThreshold(args.threshold);
    } else if (arg.startsWith('--model=')) {
      args.model = optionValue(arg, 'model');
    } else if (arg.startsWith('--suffix=')) {
      args.suffix = optionValue(arg, 'suffix');
    } else if (arg.startsWith('--')) {
      throw new InvalidArgumentError(`Unknown option: ${arg}`, 'argv');
    } else {
      args.files.push(arg);
    }
  }

  if (args.files.length === 0) {
    throw new InvalidArgumentError('No email files given', 'files');
  }

  return args;
}

/**
 * Clean every file; resolves to the number of failures
 */
export async function run(args: CleanEmailsArgs): Promise<number> {
  let failed = 0;

  for (const file of args.files) {
    try {
      const summary = await emailCleanerService.cleanEmailFile(
        file,
        args.threshold,
        args.model,
        { suffix: args.suffix }
      );
      logger.info(`${file} -> ${summary.outputPath}`, {
        lines_kept: summary.linesKept,
        lines_dropped: summary.linesDropped,
      });
    } catch (error) {
      failed++;
      logger.error(`Failed to clean ${file}: ${wrapError(error).toUserMessage()}`);
    }
  }

  return failed;
}

async function main(): Promise<void> {
  let args: CleanEmailsArgs;
  try {
    args = parseArgs(process.argv.slice(2));
  } catch (error) {
    if (isDomainError(error)) {
      logger.error(error.toUserMessage());
      process.exitCode = error.exitCode;
      return;
    }
    throw error;
  }

  const failed = await run(args);
  if (failed > 0) {
    logger.warn(`${failed} of ${args.files.length} file(s) failed`);
    process.exitCode = 1;
  }
}

if (require.main === module) {
  main().catch((error) => {
    const failure = wrapError(error);
    logger.error('Fatal error:', failure.toJSON());
    process.exit(failure.exitCode);
  });
}
