/**
 * Discogs Database API Client
 *
 * Searches the Discogs catalog for releases and fetches release details
 * (genres, styles, labels, tracklist). Raw JSON payloads are decoded once,
 * here, into typed structures with explicit null/empty defaults so the
 * release resolver never deals with missing keys.
 *
 * Requests are not retried; any failure surfaces as an APIError.
 */

import axios from 'axios';
import type { CandidateRelease } from '../../shared/types';
import { APIError } from './errors';

// ─── Types ────────────────────────────────────────────────────────────────────

/** A label credited on a release */
export interface DiscogsLabel {
  name: string;
}

/** A tracklist entry */
export interface DiscogsTrack {
  title: string;
}

/** Decoded payload of GET /releases/{id} */
export interface DiscogsReleaseDetails {
  id: number;
  genres: string[];
  styles: string[];
  labels: DiscogsLabel[];
  tracklist: DiscogsTrack[];
}

/** Source of releases the resolver searches and verifies against */
export interface ReleaseCatalog {
  /** Searches releases matching a free-text query */
  searchReleases(query: string): Promise<CandidateRelease[]>;
  /** Fetches full details of one release */
  getRelease(releaseId: number): Promise<DiscogsReleaseDetails>;
  /** Public web page for a release */
  releaseUrl(releaseId: number): string;
}

/** Options for the Discogs client */
export interface DiscogsClientOptions {
  /** Discogs API base URL (for testing) */
  apiBaseUrl?: string;
  /** Discogs website base URL used to build release links */
  siteUrl?: string;
  /** User-Agent string (Discogs rejects requests without one) */
  userAgent?: string;
  /** Personal access token; raises the rate limit when present */
  token?: string;
  /** HTTP timeout in milliseconds */
  timeoutMs?: number;
}

// ─── Constants ───────────────────────────────────────────────────────────────

export const DISCOGS_API_URL = 'https://api.discogs.com';
export const DISCOGS_SITE_URL = 'https://www.discogs.com';
export const DEFAULT_USER_AGENT = 'Tagsmith/1.0';
const DEFAULT_TIMEOUT_MS = 10_000;

/** Number of search hits requested; enough to find early pressings */
export const SEARCH_PAGE_SIZE = 50;

const SERVICE_NAME = 'Discogs';

// ─── Decoding ────────────────────────────────────────────────────────────────

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function asString(value: unknown): string | null {
  return typeof value === 'string' && value.length > 0 ? value : null;
}

function asStringArray(value: unknown): string[] {
  if (!Array.isArray(value)) return [];
  return value.filter((item): item is string => typeof item === 'string' && item.length > 0);
}

function asInteger(value: unknown): number | null {
  return typeof value === 'number' && Number.isInteger(value) ? value : null;
}

/**
 * Decodes a release year. The search endpoint returns years as strings
 * ("1973"), the release endpoint as numbers; both are accepted.
 *
 * @returns The year, or null if missing or not a whole number
 */
export function decodeYear(value: unknown): number | null {
  if (typeof value === 'number') {
    return Number.isInteger(value) ? value : null;
  }
  if (typeof value === 'string' && /^\d+$/.test(value.trim())) {
    return parseInt(value.trim(), 10);
  }
  return null;
}

/**
 * Decodes one row of a search response. Rows without an integer ID are
 * unusable and yield null.
 */
export function decodeSearchResult(row: unknown): CandidateRelease | null {
  if (!isRecord(row)) return null;

  const id = asInteger(row.id);
  if (id === null) return null;

  return {
    id,
    year: decodeYear(row.year),
    genres: asStringArray(row.genre),
    styles: asStringArray(row.style),
    label: asStringArray(row.label)[0] ?? null,
    format: asStringArray(row.format)[0] ?? null,
    country: asString(row.country),
  };
}

/**
 * Decodes the body of GET /database/search into candidate releases.
 *
 * @throws APIError if the body is not an object with a `results` array
 */
export function decodeSearchResponse(body: unknown): CandidateRelease[] {
  if (!isRecord(body) || !Array.isArray(body.results)) {
    throw new APIError('Malformed Discogs search response: missing results array', {
      service: SERVICE_NAME,
      step: 'searching',
    });
  }

  const candidates: CandidateRelease[] = [];
  for (const row of body.results) {
    const candidate = decodeSearchResult(row);
    if (candidate) candidates.push(candidate);
  }
  return candidates;
}

/**
 * Decodes the body of GET /releases/{id}.
 *
 * @throws APIError if the body is not an object
 */
export function decodeReleaseDetails(body: unknown, releaseId: number): DiscogsReleaseDetails {
  if (!isRecord(body)) {
    throw new APIError(`Malformed Discogs release response for release ${releaseId}`, {
      service: SERVICE_NAME,
      step: 'fetching_release',
    });
  }

  const labels: DiscogsLabel[] = [];
  if (Array.isArray(body.labels)) {
    for (const label of body.labels) {
      if (!isRecord(label)) continue;
      const name = asString(label.name);
      if (name) labels.push({ name });
    }
  }

  const tracklist: DiscogsTrack[] = [];
  if (Array.isArray(body.tracklist)) {
    for (const track of body.tracklist) {
      if (!isRecord(track) || typeof track.title !== 'string') continue;
      tracklist.push({ title: track.title });
    }
  }

  return {
    id: asInteger(body.id) ?? releaseId,
    genres: asStringArray(body.genres),
    styles: asStringArray(body.styles),
    labels,
    tracklist,
  };
}

// ─── Axios Error Detection ──────────────────────────────────────────────────

/** Type guard for axios-like errors (works with both real and mocked axios) */
interface AxiosLikeError extends Error {
  isAxiosError: boolean;
  response?: {
    status: number;
    data?: unknown;
  };
}

function isAxiosLikeError(error: unknown): error is AxiosLikeError {
  return (
    error instanceof Error &&
    'isAxiosError' in error &&
    error.isAxiosError === true
  );
}

/**
 * Converts a failed request into an APIError carrying the HTTP status.
 */
function toApiError(error: unknown, what: string, step: string): APIError {
  if (error instanceof APIError) return error;

  if (isAxiosLikeError(error)) {
    const status = error.response?.status;
    const detail = status !== undefined ? `HTTP ${status}` : error.message;
    return new APIError(`Discogs ${what} failed: ${detail}`, {
      service: SERVICE_NAME,
      statusCode: status,
      step,
      cause: error,
    });
  }

  const cause = error instanceof Error ? error : new Error(String(error));
  return new APIError(`Discogs ${what} failed: ${cause.message}`, {
    service: SERVICE_NAME,
    step,
    cause,
  });
}

// ─── Client ──────────────────────────────────────────────────────────────────

/**
 * HTTP client for the Discogs database API.
 *
 * Usage:
 * ```typescript
 * const client = new DiscogsClient({ token: process.env.DISCOGS_TOKEN });
 * const candidates = await client.searchReleases('Pink Floyd Money');
 * const details = await client.getRelease(candidates[0].id);
 * ```
 */
export class DiscogsClient implements ReleaseCatalog {
  private readonly apiBaseUrl: string;
  private readonly siteUrl: string;
  private readonly userAgent: string;
  private readonly token: string | null;
  private readonly timeoutMs: number;

  constructor(options: DiscogsClientOptions = {}) {
    this.apiBaseUrl = (options.apiBaseUrl || DISCOGS_API_URL).replace(/\/+$/, '');
    this.siteUrl = (options.siteUrl || DISCOGS_SITE_URL).replace(/\/+$/, '');
    this.userAgent = options.userAgent || DEFAULT_USER_AGENT;
    this.token = options.token || null;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  }

  /**
   * Builds the request headers shared by every call.
   */
  buildHeaders(): Record<string, string> {
    const headers: Record<string, string> = {
      'User-Agent': this.userAgent,
      Accept: 'application/json',
    };
    if (this.token) {
      headers.Authorization = `Discogs token=${this.token}`;
    }
    return headers;
  }

  /**
   * Searches for releases matching a query, requesting up to 50 hits.
   *
   * @see https://www.discogs.com/developers#page:database,header:database-search
   * @throws APIError on network, HTTP or decoding failure
   */
  async searchReleases(query: string): Promise<CandidateRelease[]> {
    try {
      const response = await axios.get<unknown>(`${this.apiBaseUrl}/database/search`, {
        params: {
          q: query,
          type: 'release',
          per_page: SEARCH_PAGE_SIZE,
        },
        headers: this.buildHeaders(),
        timeout: this.timeoutMs,
      });
      return decodeSearchResponse(response.data);
    } catch (error: unknown) {
      throw toApiError(error, 'search', 'searching');
    }
  }

  /**
   * Fetches full release details including the tracklist.
   *
   * @see https://www.discogs.com/developers#page:database,header:database-release
   * @throws APIError on network, HTTP or decoding failure
   */
  async getRelease(releaseId: number): Promise<DiscogsReleaseDetails> {
    try {
      const response = await axios.get<unknown>(`${this.apiBaseUrl}/releases/${releaseId}`, {
        headers: this.buildHeaders(),
        timeout: this.timeoutMs,
      });
      return decodeReleaseDetails(response.data, releaseId);
    } catch (error: unknown) {
      throw toApiError(error, `release ${releaseId} lookup`, 'fetching_release');
    }
  }

  releaseUrl(releaseId: number): string {
    return `${this.siteUrl}/release/${releaseId}`;
  }
}
