#!/usr/bin/env node
/**
 * tag-audio: tag audio files with artist/title parsed from their filenames.
 *
 * Examples:
 *   tag-audio "Pink Floyd - Comfortably Numb.mp3"
 *   tag-audio ./music --pattern "{title} by {artist}" --dry-run
 *   tag-audio ./music --recursive --discogs
 */

import * as path from 'path';
import { parseArgs } from 'util';
import type { FileStatus, TagFileResult } from '../../shared/types';
import { BatchProcessor } from '../services/batchProcessor';
import { errorMessage } from '../services/errors';
import type { ReleaseResolver } from '../services/releaseResolver';
import { resolveDiscogsToken } from '../services/settingsManager';
import { collectAudioFiles } from '../utils/fileScanner';
import { type CliDeps, consoleIO, createCliContext, runMain } from './common';

export const TAG_AUDIO_USAGE = `Usage: tag-audio <path> [options]

Tag audio files with artist/title from filename

Options:
  -p, --pattern <pattern>  Filename pattern (default: "{artist} - {title}")
  -n, --dry-run            Show what would be done without making changes
  -r, --recursive          Process directories recursively
  -d, --discogs            Add year, genre and label from the earliest Discogs release
      --discogs-token <t>  Discogs API token (or set DISCOGS_TOKEN env var)
  -h, --help               Show this help`;

export const DRY_RUN_BANNER = '=== DRY RUN (no changes will be made) ===';

const STATUS_MARKERS: Record<FileStatus, string> = {
  tagged: '✓',
  skipped: '⊘',
  failed: '✗',
};

/**
 * Formats the console line for one processed file.
 */
export function formatFileLine(result: TagFileResult): string {
  return `${STATUS_MARKERS[result.status]} ${path.basename(result.filePath)}: ${result.message}`;
}

function parseTagAudioArgs(argv: string[]) {
  return parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      pattern: { type: 'string', short: 'p' },
      'dry-run': { type: 'boolean', short: 'n', default: false },
      recursive: { type: 'boolean', short: 'r', default: false },
      discogs: { type: 'boolean', short: 'd', default: false },
      'discogs-token': { type: 'string' },
      help: { type: 'boolean', short: 'h', default: false },
    },
  });
}

/**
 * Runs tag-audio.
 *
 * @param argv - Arguments after the program name
 * @returns The process exit code: 0 when no file failed, 1 otherwise
 */
export async function runTagAudio(argv: string[], deps: CliDeps = {}): Promise<number> {
  const earlyIO = deps.io ?? consoleIO;

  let parsed: ReturnType<typeof parseTagAudioArgs>;
  try {
    parsed = parseTagAudioArgs(argv);
  } catch (error: unknown) {
    earlyIO.err(`Error: ${errorMessage(error)}`);
    earlyIO.err(TAG_AUDIO_USAGE);
    return 1;
  }

  const { values, positionals } = parsed;
  if (values.help) {
    earlyIO.out(TAG_AUDIO_USAGE);
    return 0;
  }
  if (positionals.length !== 1) {
    earlyIO.err(TAG_AUDIO_USAGE);
    return 1;
  }

  const ctx = await createCliContext(deps);
  const { io, settings, logger } = ctx;
  const target = positionals[0];
  const dryRun = values['dry-run'];

  let files: string[] | null;
  try {
    files = collectAudioFiles(target, {
      recursive: values.recursive,
      onUnreadableDirectory: (dirPath, reason) =>
        logger.warn(`Directory skipped: ${reason}`, { filePath: dirPath, step: 'scanning' }),
    });
  } catch (error: unknown) {
    logger.logError(error, { filePath: target, step: 'scanning' });
    io.err(`Error: ${errorMessage(error)}`);
    return 1;
  }
  if (files === null) {
    io.out(`Error: Path not found: ${target}`);
    return 1;
  }

  let resolver: ReleaseResolver | null = null;
  if (values.discogs) {
    if (!settings.useDiscogs) {
      io.err('Error: Discogs enrichment is disabled in settings (useDiscogs: false)');
      return 1;
    }
    const token = resolveDiscogsToken(values['discogs-token'], ctx.env, settings);
    resolver = ctx.resolverFactory(settings, token, logger);
  }

  let processor: BatchProcessor;
  try {
    processor = new BatchProcessor({
      pattern: values.pattern ?? settings.defaultPattern,
      dryRun,
      resolver,
      logger,
      onFileComplete: (result) => io.out(formatFileLine(result)),
    });
  } catch (error: unknown) {
    io.err(`Error: ${errorMessage(error)}`);
    return 1;
  }

  if (dryRun) {
    io.out(DRY_RUN_BANNER);
    io.out('');
  }

  const summary = await processor.process(files);

  io.out('');
  io.out(`Summary: ${summary.success} tagged, ${summary.failed} failed, ${summary.skipped} skipped`);

  const logSummary = logger.getSummary();
  if (logSummary.counts.ERROR > 0 && logSummary.logFilePath !== null) {
    io.err(`${logSummary.counts.ERROR} error(s) logged to ${logSummary.logFilePath}`);
  }

  return summary.failed === 0 ? 0 : 1;
}

if (require.main === module) {
  runMain((argv) => runTagAudio(argv));
}
