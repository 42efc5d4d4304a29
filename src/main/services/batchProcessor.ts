/**
 * Batch Tagging Service
 *
 * Tags a list of audio files from their filenames, optionally enriching each
 * one with the earliest Discogs release of the track.
 *
 * Key design decisions:
 * - Files are processed strictly one after another (Discogs courtesy delay
 *   lives in the resolver and must not overlap)
 * - Per-file error isolation (one failure doesn't stop the batch)
 * - Enrichment is an optional capability: with no resolver, only artist and
 *   title are written
 * - Dry-run mode still resolves releases but never touches the files
 */

import * as path from 'path';
import type {
  BatchSummary,
  ParsedName,
  ReleaseResult,
  TagFileResult,
} from '../../shared/types';
import { compileFilenamePattern, matchFilename } from './filenameParser';
import { combineGenres, type ReleaseResolver } from './releaseResolver';
import { getFormatFromPath, writeTags, type WriteTagsInput } from './tagWriter';
import type { Logger } from './logger';
import { errorMessage, wrapError } from './errors';

// ─── Interfaces ──────────────────────────────────────────────────────────────

/** Options for the batch processor */
export interface BatchProcessorOptions {
  /** Filename pattern with {artist} and {title} placeholders */
  pattern: string;
  /** Report what would be written without modifying any file */
  dryRun?: boolean;
  /** Release resolver used for enrichment (null = tag artist/title only) */
  resolver?: ReleaseResolver | null;
  /** Logger instance for structured logging */
  logger?: Logger;
  /** Callback for individual file completion */
  onFileComplete?: (result: TagFileResult) => void;
}

// ─── Message Helpers ─────────────────────────────────────────────────────────

/**
 * Describes the fields written (or to be written) to a file, e.g.
 * `artist='Pink Floyd', title='Money', year=1973, genre='Rock'`.
 */
export function describeTags(input: WriteTagsInput): string {
  const parts = [`artist='${input.artist ?? ''}'`, `title='${input.title ?? ''}'`];
  if (input.year !== undefined) parts.push(`year=${input.year}`);
  if (input.genre !== undefined) parts.push(`genre='${input.genre}'`);
  if (input.label !== undefined) parts.push(`label='${input.label}'`);
  return parts.join(', ');
}

/**
 * Builds the tag input from the parsed filename and an optional release.
 * Release fields that are missing are left out, so existing tags survive.
 */
export function buildTagInput(parsed: ParsedName, release: ReleaseResult | null): WriteTagsInput {
  const input: WriteTagsInput = { artist: parsed.artist, title: parsed.title };
  if (!release) return input;

  if (release.year !== null) input.year = release.year;
  const genre = combineGenres(release.genres, release.styles);
  if (genre !== null) input.genre = genre;
  if (release.label !== null) input.label = release.label;
  return input;
}

// ─── BatchProcessor Class ────────────────────────────────────────────────────

/**
 * Tags audio files from their names.
 *
 * Usage:
 * ```typescript
 * const processor = new BatchProcessor({ pattern: '{artist} - {title}' });
 * const summary = await processor.process(files);
 * ```
 */
export class BatchProcessor {
  private readonly pattern: string;
  private readonly regex: RegExp;
  private readonly dryRun: boolean;
  private readonly resolver: ReleaseResolver | null;
  private readonly logger: Logger | null;
  private readonly onFileComplete: ((result: TagFileResult) => void) | null;

  /**
   * @throws InputError if the pattern is invalid
   */
  constructor(options: BatchProcessorOptions) {
    this.pattern = options.pattern;
    this.regex = compileFilenamePattern(options.pattern);
    this.dryRun = options.dryRun ?? false;
    this.resolver = options.resolver ?? null;
    this.logger = options.logger ?? null;
    this.onFileComplete = options.onFileComplete ?? null;
  }

  /**
   * Processes all files in order.
   *
   * @param filePaths - Files to tag
   * @returns Per-file results and aggregate counts
   */
  async process(filePaths: readonly string[]): Promise<BatchSummary> {
    const summary: BatchSummary = { success: 0, failed: 0, skipped: 0, results: [] };

    this.logger?.info(
      `Starting batch: ${filePaths.length} file(s)${this.dryRun ? ' (dry run)' : ''}` +
        `${this.resolver ? ' with Discogs enrichment' : ''}`,
      { step: 'batch' },
    );

    for (const filePath of filePaths) {
      const result = await this.processFile(filePath);

      if (result.status === 'tagged') summary.success++;
      else if (result.status === 'failed') summary.failed++;
      else summary.skipped++;

      summary.results.push(result);
      this.onFileComplete?.(result);
    }

    this.logger?.info(
      `Batch complete: ${summary.success} tagged, ${summary.failed} failed, ${summary.skipped} skipped`,
      { step: 'batch' },
    );

    return summary;
  }

  /**
   * Processes a single file: parse the name, optionally resolve the release,
   * then write tags. Never throws.
   */
  async processFile(filePath: string): Promise<TagFileResult> {
    const format = getFormatFromPath(filePath);
    if (format === null) {
      const message = `Unsupported format: ${path.extname(filePath).toLowerCase()}`;
      return this.skip(filePath, message, null);
    }

    const parsed = matchFilename(filePath, this.regex);
    if (!parsed) {
      return this.skip(filePath, `Filename doesn't match pattern '${this.pattern}'`, null);
    }
    // A whitespace-only capture trims to nothing
    if (parsed.artist === '' || parsed.title === '') {
      return this.skip(filePath, `Filename doesn't match pattern '${this.pattern}'`, parsed);
    }

    let release: ReleaseResult | null = null;
    if (this.resolver) {
      try {
        release = await this.resolver.findEarliestRelease(parsed.artist, parsed.title);
      } catch (error: unknown) {
        const wrapped = wrapError(error, 'APIError', { filePath, step: 'lookup' });
        this.logger?.logPipelineError(wrapped);
        const message = `Discogs lookup failed: ${wrapped.message}`;
        return this.fail(filePath, message, parsed, null);
      }

      if (!release) {
        this.logger?.info(`No Discogs release found for "${parsed.artist} - ${parsed.title}"`, {
          filePath,
          step: 'lookup',
        });
      }
    }

    const input = buildTagInput(parsed, release);

    if (this.dryRun) {
      return this.done(filePath, `Would tag: ${describeTags(input)}`, parsed, release);
    }

    try {
      const result = writeTags(filePath, input);
      if (!result.success) {
        const wrapped = wrapError(new Error(result.error ?? 'Unknown write error'), 'WriteError', {
          filePath,
          step: 'writing',
        });
        this.logger?.logPipelineError(wrapped);
        return this.fail(filePath, `Error: ${wrapped.message}`, parsed, release);
      }
    } catch (error: unknown) {
      this.logger?.logError(wrapError(error, 'WriteError', { filePath, step: 'writing' }));
      return this.fail(filePath, `Error: ${errorMessage(error)}`, parsed, release);
    }

    return this.done(filePath, `Tagged: ${describeTags(input)}`, parsed, release);
  }

  // ─── Result Builders ───────────────────────────────────────────────────

  private done(
    filePath: string,
    message: string,
    parsed: ParsedName,
    release: ReleaseResult | null,
  ): TagFileResult {
    return { filePath, status: 'tagged', message, parsed, release };
  }

  private skip(filePath: string, message: string, parsed: ParsedName | null): TagFileResult {
    this.logger?.logSkippedFile(filePath, message);
    return { filePath, status: 'skipped', message, parsed, release: null };
  }

  private fail(
    filePath: string,
    message: string,
    parsed: ParsedName,
    release: ReleaseResult | null,
  ): TagFileResult {
    return { filePath, status: 'failed', message, parsed, release };
  }
}
