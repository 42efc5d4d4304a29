/**
 * Tests for the Discogs API client
 *
 * axios is mocked; no request leaves the process.
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import {
  DiscogsClient,
  decodeReleaseDetails,
  decodeSearchResponse,
  decodeSearchResult,
  decodeYear,
  SEARCH_PAGE_SIZE,
} from '../../../src/main/services/discogsClient';
import { APIError } from '../../../src/main/services/errors';

const mockAxiosGet = vi.hoisted(() => vi.fn());

vi.mock('axios', () => ({ default: { get: mockAxiosGet } }));

/** Builds an error shaped like the ones axios rejects with */
function httpError(status: number): Error {
  return Object.assign(new Error(`Request failed with status code ${status}`), {
    isAxiosError: true,
    response: { status },
  });
}

const TEST_OPTIONS = {
  apiBaseUrl: 'https://discogs.test',
  siteUrl: 'https://www.discogs.test',
  userAgent: 'TestAgent/1.0',
};

describe('Discogs Client', () => {
  beforeEach(() => {
    mockAxiosGet.mockReset();
  });

  describe('decodeYear', () => {
    it('should accept integers', () => {
      expect(decodeYear(1973)).toBe(1973);
    });

    it('should accept digit strings', () => {
      expect(decodeYear('1973')).toBe(1973);
      expect(decodeYear(' 1980 ')).toBe(1980);
    });

    it('should reject everything else', () => {
      expect(decodeYear(undefined)).toBeNull();
      expect(decodeYear('')).toBeNull();
      expect(decodeYear('197x')).toBeNull();
      expect(decodeYear(1973.5)).toBeNull();
      expect(decodeYear(null)).toBeNull();
    });
  });

  describe('decodeSearchResult', () => {
    it('should decode a full search row', () => {
      const row = {
        id: 1873013,
        year: '1973',
        genre: ['Rock'],
        style: ['Prog Rock', 'Psychedelic Rock'],
        label: ['Harvest', 'EMI'],
        format: ['Vinyl', 'LP', 'Album'],
        country: 'UK',
        title: 'Pink Floyd - The Dark Side Of The Moon',
      };

      expect(decodeSearchResult(row)).toEqual({
        id: 1873013,
        year: 1973,
        genres: ['Rock'],
        styles: ['Prog Rock', 'Psychedelic Rock'],
        label: 'Harvest',
        format: 'Vinyl',
        country: 'UK',
      });
    });

    it('should default missing fields', () => {
      expect(decodeSearchResult({ id: 7 })).toEqual({
        id: 7,
        year: null,
        genres: [],
        styles: [],
        label: null,
        format: null,
        country: null,
      });
    });

    it('should drop rows without an integer id', () => {
      expect(decodeSearchResult({ year: '1973' })).toBeNull();
      expect(decodeSearchResult({ id: '42' })).toBeNull();
      expect(decodeSearchResult('not a row')).toBeNull();
    });
  });

  describe('decodeSearchResponse', () => {
    it('should keep decodable rows in order', () => {
      const body = { results: [{ id: 2, year: '1980' }, { title: 'no id' }, { id: 1, year: 1975 }] };
      expect(decodeSearchResponse(body).map((c) => c.id)).toEqual([2, 1]);
    });

    it('should throw APIError without a results array', () => {
      expect(() => decodeSearchResponse({ pagination: {} })).toThrow(
        'Malformed Discogs search response: missing results array',
      );
    });
  });

  describe('decodeReleaseDetails', () => {
    it('should decode labels and tracklist', () => {
      const details = decodeReleaseDetails(
        {
          id: 10,
          title: 'The Dark Side Of The Moon',
          genres: ['Rock'],
          styles: ['Prog Rock'],
          labels: [{ name: 'Harvest', catno: 'SHVL 804' }, { catno: 'X' }],
          tracklist: [
            { position: 'A1', title: 'Speak To Me' },
            { position: 'B1', title: 'Money' },
            { position: '', title: '' },
            { position: 'C1' },
          ],
        },
        10,
      );

      expect(details).toEqual({
        id: 10,
        genres: ['Rock'],
        styles: ['Prog Rock'],
        labels: [{ name: 'Harvest' }],
        tracklist: [{ title: 'Speak To Me' }, { title: 'Money' }, { title: '' }],
      });
    });

    it('should fall back to the requested id', () => {
      expect(decodeReleaseDetails({}, 99).id).toBe(99);
    });

    it('should throw APIError for a non-object body', () => {
      expect(() => decodeReleaseDetails('oops', 5)).toThrow(APIError);
    });
  });

  describe('DiscogsClient', () => {
    it('should send User-Agent and Accept headers without a token', () => {
      const client = new DiscogsClient(TEST_OPTIONS);
      expect(client.buildHeaders()).toEqual({
        'User-Agent': 'TestAgent/1.0',
        Accept: 'application/json',
      });
    });

    it('should add the token as an Authorization header', () => {
      const client = new DiscogsClient({ ...TEST_OPTIONS, token: 'test-secret' });
      expect(client.buildHeaders().Authorization).toBe('Discogs token=test-secret');
    });

    it('should search releases with the query parameters', async () => {
      mockAxiosGet.mockResolvedValueOnce({
        data: { results: [{ id: 1, year: '1973', genre: ['Rock'] }] },
      });
      const client = new DiscogsClient({ ...TEST_OPTIONS, timeoutMs: 500 });

      const results = await client.searchReleases('Pink Floyd Money');

      expect(results).toHaveLength(1);
      expect(results[0].year).toBe(1973);
      expect(mockAxiosGet).toHaveBeenCalledWith('https://discogs.test/database/search', {
        params: { q: 'Pink Floyd Money', type: 'release', per_page: SEARCH_PAGE_SIZE },
        headers: { 'User-Agent': 'TestAgent/1.0', Accept: 'application/json' },
        timeout: 500,
      });
    });

    it('should strip trailing slashes from the base URL', async () => {
      mockAxiosGet.mockResolvedValueOnce({ data: { id: 3, tracklist: [] } });
      const client = new DiscogsClient({ ...TEST_OPTIONS, apiBaseUrl: 'https://discogs.test/' });

      await client.getRelease(3);

      expect(mockAxiosGet.mock.calls[0][0]).toBe('https://discogs.test/releases/3');
    });

    it('should turn HTTP failures into APIError with the status code', async () => {
      mockAxiosGet.mockRejectedValueOnce(httpError(401));
      const client = new DiscogsClient(TEST_OPTIONS);

      const error = await client.searchReleases('x').catch((e: unknown) => e);

      expect(error).toBeInstanceOf(APIError);
      if (!(error instanceof APIError)) return;
      expect(error.message).toBe('Discogs search failed: HTTP 401');
      expect(error.statusCode).toBe(401);
      expect(error.service).toBe('Discogs');
    });

    it('should turn network failures into APIError', async () => {
      mockAxiosGet.mockRejectedValueOnce(new Error('socket hang up'));
      const client = new DiscogsClient(TEST_OPTIONS);

      await expect(client.getRelease(8)).rejects.toThrow(
        'Discogs release 8 lookup failed: socket hang up',
      );
    });

    it('should reject malformed search bodies', async () => {
      mockAxiosGet.mockResolvedValueOnce({ data: '<html>' });
      const client = new DiscogsClient(TEST_OPTIONS);

      await expect(client.searchReleases('x')).rejects.toThrow(
        'Malformed Discogs search response: missing results array',
      );
    });

    it('should build public release URLs', () => {
      const client = new DiscogsClient(TEST_OPTIONS);
      expect(client.releaseUrl(1873013)).toBe('https://www.discogs.test/release/1873013');
      expect(new DiscogsClient().releaseUrl(5)).toBe('https://www.discogs.com/release/5');
    });
  });
});
