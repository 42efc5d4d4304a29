/**
 * Release Resolver
 *
 * Finds the earliest release of a track on Discogs. Candidates from a catalog
 * search are filtered to plausible years, sorted oldest first, and (optionally)
 * verified by checking each release's tracklist for the title. The first
 * verified candidate wins; if none verifies, the oldest candidate is returned
 * unverified.
 *
 * Requests run strictly one after another, with a fixed pause after each
 * release-detail fetch.
 */

import type { CandidateRelease, LookupQuery, ReleaseResult } from '../../shared/types';
import {
  DiscogsClient,
  type DiscogsClientOptions,
  type DiscogsReleaseDetails,
  type ReleaseCatalog,
} from './discogsClient';
import { errorMessage, InputError } from './errors';
import type { Logger } from './logger';

// ─── Types ────────────────────────────────────────────────────────────────────

/** Options for the release resolver */
export interface ReleaseResolverOptions {
  /** Pause after every release-detail fetch, in ms (default: 500) */
  requestDelayMs?: number;
  /** Sleep implementation (for testing) */
  sleep?: (ms: number) => Promise<void>;
  /**
   * When every candidate fails verification, return the oldest candidate
   * unverified instead of null (default: true)
   */
  fallbackToUnverified?: boolean;
  /** Logger for skipped candidates */
  logger?: Logger;
}

/** Result of fetching one candidate's details */
export type FetchOutcome =
  | { ok: true; details: DiscogsReleaseDetails }
  | { ok: false; error: string };

// ─── Constants ───────────────────────────────────────────────────────────────

/** Courtesy pause between release-detail requests */
export const RELEASE_REQUEST_DELAY_MS = 500;

/** Years at or below this are placeholders, not real release dates */
export const MIN_VALID_YEAR = 1900;

/** Maximum number of genre/style entries combined into the genre tag */
export const MAX_GENRE_ENTRIES = 3;

const defaultSleep = (ms: number): Promise<void> =>
  new Promise<void>((resolve) => setTimeout(resolve, ms));

// ─── Pure Helpers ─────────────────────────────────────────────────────────────

/**
 * Drops candidates without a year after 1900 and sorts the rest by year,
 * oldest first. Equal years keep their search order.
 */
export function filterAndSortCandidates(
  candidates: readonly CandidateRelease[],
): CandidateRelease[] {
  return candidates
    .filter((candidate) => candidate.year !== null && candidate.year > MIN_VALID_YEAR)
    .sort((a, b) => (a.year ?? 0) - (b.year ?? 0));
}

/**
 * Checks whether a release's tracklist contains the title. Matching is
 * case-insensitive and succeeds when either title contains the other, so a
 * short title such as "Love" also matches "Lovesong".
 */
export function trackOnRelease(details: DiscogsReleaseDetails, title: string): boolean {
  const needle = title.toLowerCase();
  return details.tracklist.some((track) => {
    const trackTitle = track.title.toLowerCase();
    return trackTitle.includes(needle) || needle.includes(trackTitle);
  });
}

/**
 * Combines genres and styles into a single genre tag value: the first three
 * entries of genres followed by styles, joined with ", ".
 *
 * @returns The combined string, or null when there is nothing to write
 */
export function combineGenres(
  genres: readonly string[],
  styles: readonly string[],
  limit: number = MAX_GENRE_ENTRIES,
): string | null {
  const combined = [...genres, ...styles].slice(0, limit);
  return combined.length > 0 ? combined.join(', ') : null;
}

/**
 * Validates and trims a lookup query.
 *
 * @throws InputError if artist or title is blank
 */
export function createLookupQuery(artist: string, title: string): LookupQuery {
  const query = { artist: artist.trim(), title: title.trim() };
  if (query.artist.length === 0 || query.title.length === 0) {
    throw new InputError('Both artist and title are required for a release lookup', {
      step: 'lookup',
    });
  }
  return query;
}

// ─── Resolver ────────────────────────────────────────────────────────────────

/**
 * Selects the earliest release of a track from a release catalog.
 *
 * Usage:
 * ```typescript
 * const resolver = new ReleaseResolver(new DiscogsClient({ token }));
 * const release = await resolver.findEarliestRelease('Pink Floyd', 'Money');
 * ```
 */
export class ReleaseResolver {
  private readonly catalog: ReleaseCatalog;
  private readonly requestDelayMs: number;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly fallbackToUnverified: boolean;
  private readonly logger: Logger | null;

  constructor(catalog: ReleaseCatalog, options: ReleaseResolverOptions = {}) {
    this.catalog = catalog;
    this.requestDelayMs = options.requestDelayMs ?? RELEASE_REQUEST_DELAY_MS;
    this.sleep = options.sleep ?? defaultSleep;
    this.fallbackToUnverified = options.fallbackToUnverified ?? true;
    this.logger = options.logger ?? null;
  }

  /**
   * Finds the earliest release containing the track.
   *
   * @param artist - Artist name
   * @param title - Track title
   * @param verifyTracklist - Confirm each candidate's tracklist contains the
   *   title (slower, one extra request per candidate)
   * @returns The chosen release, or null when no candidate has a valid year
   * @throws InputError if artist or title is blank
   * @throws APIError if the search request fails
   */
  async findEarliestRelease(
    artist: string,
    title: string,
    verifyTracklist: boolean = true,
  ): Promise<ReleaseResult | null> {
    const query = createLookupQuery(artist, title);
    const results = await this.catalog.searchReleases(`${query.artist} ${query.title}`);
    const candidates = filterAndSortCandidates(results);

    if (candidates.length === 0) {
      return null;
    }

    if (!verifyTracklist) {
      return this.fromSearchResult(query, candidates[0]);
    }

    for (const candidate of candidates) {
      const outcome = await this.fetchDetails(candidate.id);

      if (!outcome.ok) {
        this.logger?.warn(`Skipping release ${candidate.id}: ${outcome.error}`, {
          category: 'APIError',
          step: 'verifying',
        });
        continue;
      }

      if (trackOnRelease(outcome.details, query.title)) {
        return this.fromVerifiedRelease(query, candidate, outcome.details);
      }
    }

    if (!this.fallbackToUnverified) {
      return null;
    }

    this.logger?.info(
      `No release verified for "${query.artist} - ${query.title}"; using earliest candidate ${candidates[0].id}`,
      { step: 'verifying' },
    );
    return this.fromSearchResult(query, candidates[0]);
  }

  /**
   * Fetches a candidate's details, then waits out the request delay.
   * Failures are returned, not thrown.
   */
  private async fetchDetails(releaseId: number): Promise<FetchOutcome> {
    let outcome: FetchOutcome;
    try {
      outcome = { ok: true, details: await this.catalog.getRelease(releaseId) };
    } catch (error: unknown) {
      outcome = { ok: false, error: errorMessage(error) };
    }
    await this.sleep(this.requestDelayMs);
    return outcome;
  }

  /**
   * Builds a result from the search row alone (no verification).
   */
  private fromSearchResult(query: LookupQuery, candidate: CandidateRelease): ReleaseResult {
    return {
      artist: query.artist,
      title: query.title,
      year: candidate.year,
      genres: candidate.genres,
      styles: candidate.styles,
      label: candidate.label,
      releaseId: candidate.id,
      releaseUrl: this.catalog.releaseUrl(candidate.id),
      format: candidate.format,
      country: candidate.country,
      verified: false,
    };
  }

  /**
   * Builds a result for a verified candidate. Genres, styles and label come
   * from the release details; year, format and country from the search row.
   */
  private fromVerifiedRelease(
    query: LookupQuery,
    candidate: CandidateRelease,
    details: DiscogsReleaseDetails,
  ): ReleaseResult {
    return {
      artist: query.artist,
      title: query.title,
      year: candidate.year,
      genres: details.genres,
      styles: details.styles,
      label: details.labels[0]?.name ?? null,
      releaseId: candidate.id,
      releaseUrl: this.catalog.releaseUrl(candidate.id),
      format: candidate.format,
      country: candidate.country,
      verified: true,
    };
  }
}

// ─── Convenience ─────────────────────────────────────────────────────────────

/** Options for the one-shot lookup helper */
export interface FindEarliestReleaseOptions extends DiscogsClientOptions {
  /** Verify tracklists (default: true) */
  verifyTracklist?: boolean;
}

/**
 * One-shot lookup against the public Discogs API.
 *
 * @throws APIError if the search request fails
 */
export async function findEarliestRelease(
  artist: string,
  title: string,
  options: FindEarliestReleaseOptions = {},
): Promise<ReleaseResult | null> {
  const { verifyTracklist = true, ...clientOptions } = options;
  const resolver = new ReleaseResolver(new DiscogsClient(clientOptions));
  return resolver.findEarliestRelease(artist, title, verifyTracklist);
}
