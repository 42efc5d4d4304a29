#!/usr/bin/env node
/**
 * discogs-lookup: look up a track on Discogs and print its earliest release.
 *
 * Examples:
 *   discogs-lookup "Pink Floyd" "Money"
 *   discogs-lookup "Pink Floyd" "Money" --json --no-verify
 */

import { parseArgs } from 'util';
import type { ReleaseResult } from '../../shared/types';
import { errorMessage } from '../services/errors';
import { resolveDiscogsToken } from '../services/settingsManager';
import { type CliDeps, consoleIO, createCliContext, runMain } from './common';

export const DISCOGS_LOOKUP_USAGE = `Usage: discogs-lookup <artist> <title> [options]

Lookup track metadata from Discogs (finds earliest release)

Options:
      --json         Output as JSON
      --no-verify    Skip tracklist verification (faster but less accurate)
      --token <t>    Discogs API token (or set DISCOGS_TOKEN env var)
  -h, --help         Show this help`;

/** JSON shape printed by --json */
export interface ReleaseJson {
  artist: string;
  title: string;
  year: number | null;
  genres: readonly string[];
  styles: readonly string[];
  label: string | null;
  format: string | null;
  country: string | null;
  release_id: number;
  release_url: string;
  verified: boolean;
}

export function toReleaseJson(result: ReleaseResult): ReleaseJson {
  return {
    artist: result.artist,
    title: result.title,
    year: result.year,
    genres: result.genres,
    styles: result.styles,
    label: result.label,
    format: result.format,
    country: result.country,
    release_id: result.releaseId,
    release_url: result.releaseUrl,
    verified: result.verified,
  };
}

/**
 * Formats a release as the aligned text block, with N/A for empty fields.
 */
export function formatReleaseText(result: ReleaseResult): string[] {
  const orNA = (value: string | number | null): string =>
    value === null || value === '' ? 'N/A' : String(value);
  const list = (values: readonly string[]): string => (values.length > 0 ? values.join(', ') : 'N/A');

  return [
    `Artist:  ${result.artist}`,
    `Title:   ${result.title}`,
    `Year:    ${orNA(result.year)}`,
    `Genre:   ${list(result.genres)}`,
    `Style:   ${list(result.styles)}`,
    `Label:   ${orNA(result.label)}`,
    `Format:  ${orNA(result.format)}`,
    `Country: ${orNA(result.country)}`,
    `Discogs: ${result.releaseUrl}`,
  ];
}

function parseLookupArgs(argv: string[]) {
  return parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      json: { type: 'boolean', default: false },
      'no-verify': { type: 'boolean', default: false },
      token: { type: 'string' },
      help: { type: 'boolean', short: 'h', default: false },
    },
  });
}

/**
 * Runs discogs-lookup.
 *
 * @param argv - Arguments after the program name
 * @returns The process exit code: 0 when a release was found
 */
export async function runDiscogsLookup(argv: string[], deps: CliDeps = {}): Promise<number> {
  const earlyIO = deps.io ?? consoleIO;

  let parsed: ReturnType<typeof parseLookupArgs>;
  try {
    parsed = parseLookupArgs(argv);
  } catch (error: unknown) {
    earlyIO.err(`Error: ${errorMessage(error)}`);
    earlyIO.err(DISCOGS_LOOKUP_USAGE);
    return 1;
  }

  const { values, positionals } = parsed;
  if (values.help) {
    earlyIO.out(DISCOGS_LOOKUP_USAGE);
    return 0;
  }
  if (positionals.length !== 2) {
    earlyIO.err(DISCOGS_LOOKUP_USAGE);
    return 1;
  }

  const [artist, title] = positionals;
  const ctx = await createCliContext(deps);
  const { io, settings, logger } = ctx;
  const token = resolveDiscogsToken(values.token, ctx.env, settings);
  const resolver = ctx.resolverFactory(settings, token, logger);

  let result: ReleaseResult | null;
  try {
    result = await resolver.findEarliestRelease(artist, title, !values['no-verify']);
  } catch (error: unknown) {
    logger.logError(error, { step: 'lookup' });
    io.err(`Error: ${errorMessage(error)}`);
    return 1;
  }

  if (!result) {
    io.err(`No results found for '${artist} - ${title}'`);
    return 1;
  }

  if (values.json) {
    io.out(JSON.stringify(toReleaseJson(result), null, 2));
  } else {
    for (const line of formatReleaseText(result)) {
      io.out(line);
    }
  }

  return 0;
}

if (require.main === module) {
  runMain((argv) => runDiscogsLookup(argv));
}
