/**
 * Email Cleaner Service
 *
 * Writes a copy of an email file with its trailing signature block removed:
 * - Extracts the plain-text body (MIME, HTML or raw text)
 * - Classifies each line with the SignatureDetector
 * - Writes the kept lines to `<stem>_clean<ext>` beside the input
 */

import os from 'os';
import path from 'path';
import { mkdir, stat, writeFile } from 'fs/promises';
import logger from '../utils/logger';
import { runWithDocument } from '../utils/documentContext';
import { getSignatureConfig, validateSignatureConfig } from '../config/signature';
import {
  FileNotFoundError,
  FileSystemError,
  isPermissionError,
} from '../errors';
import { splitLines, joinLines } from '../cleaning/LineSplitter';
import { SignatureDetector, filterKept } from '../cleaning/SignatureDetector';
import { EmailBodyExtractor } from '../parsing/EmailBodyExtractor';
import { createPosTagger } from '../tagging';

// ============================================================================
// Types & Interfaces
// ============================================================================

export interface ConvertOptions {
  /** Appended to the file stem; defaults to CLEAN_OUTPUT_SUFFIX */
  suffix?: string;
  extractor?: EmailBodyExtractor;
}

export interface ConvertSummary {
  inputPath: string;
  outputPath: string;
  linesKept: number;
  linesDropped: number;
}

// ============================================================================
// Path Helpers
// ============================================================================

export function expandHome(filePath: string): string {
  if (filePath === '~') {
    return os.homedir();
  }
  if (filePath.startsWith('~/')) {
    return path.join(os.homedir(), filePath.slice(2));
  }
  return filePath;
}

/**
 * `/mail/note.txt` -> `/mail/note_clean.txt`
 */
export function deriveOutputPath(inputPath: string, suffix = '_clean'): string {
  const { dir, name, ext } = path.parse(inputPath);
  return path.join(dir, `${name}${suffix}${ext}`);
}

async function isFile(filePath: string): Promise<boolean> {
  try {
    return (await stat(filePath)).isFile();
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return false;
    }
    if (isPermissionError(error)) {
      throw FileSystemError.permissionDenied(filePath);
    }
    throw error;
  }
}

// ============================================================================
// Main Conversion
// ============================================================================

/**
 * Clean one email file and report what was written.
 */
export async function cleanEmailFile(
  fname: string,
  threshold?: number,
  model?: string,
  options: ConvertOptions = {}
): Promise<ConvertSummary> {
  const settings = getSignatureConfig({
    ...(threshold !== undefined && { threshold }),
    ...(model !== undefined && { model }),
    ...(options.suffix !== undefined && { outputSuffix: options.suffix }),
  });
  validateSignatureConfig(settings);
  const tagger = createPosTagger(settings.model);

  const inputPath = path.resolve(expandHome(fname));
  if (!(await isFile(inputPath))) {
    throw new FileNotFoundError(inputPath);
  }

  const outputPath = deriveOutputPath(inputPath, settings.outputSuffix);

  return runWithDocument({ file: inputPath }, async () => {
    const extractor = options.extractor ?? new EmailBodyExtractor();

    const body = await extractor.extractFromFile(inputPath);
    const lines = splitLines(body);
    const detector = new SignatureDetector(tagger, {
      shortLineMaxWords: settings.shortLineMaxWords,
      longLineMinWords: settings.longLineMinWords,
    });
    const kept = filterKept(lines, detector.classify(lines, settings.threshold));

    await mkdir(path.dirname(outputPath), { recursive: true });
    await writeFile(outputPath, joinLines(kept), 'utf-8');

    logger.info('Wrote cleaned email', {
      output: outputPath,
      lines_kept: kept.length,
      lines_dropped: lines.length - kept.length,
    });

    return {
      inputPath,
      outputPath,
      linesKept: kept.length,
      linesDropped: lines.length - kept.length,
    };
  });
}

/**
 * Clean *fname* and write a `*_clean` copy without the signature block.
 * Resolves to the path of the written file.
 */
export async function convert(fname: string, threshold?: number, model?: string): Promise<string> {
  const summary = await cleanEmailFile(fname, threshold, model);
  return summary.outputPath;
}

export default {
  convert,
  cleanEmailFile,
  deriveOutputPath,
};
