/**
 * Shared type definitions for Tagsmith.
 * These interfaces are used by the services and both command-line tools.
 */

/** Supported audio file formats */
export type AudioFormat = 'mp3' | 'flac' | 'ogg' | 'm4a' | 'mp4' | 'wma' | 'wav';

/** Supported audio file extensions (with dot prefix) */
export const SUPPORTED_EXTENSIONS: readonly string[] = [
  '.mp3',
  '.flac',
  '.ogg',
  '.m4a',
  '.mp4',
  '.wma',
  '.wav',
] as const;

/** Artist and title extracted from a filename */
export interface ParsedName {
  artist: string;
  title: string;
}

/** Input to a release lookup. Both fields must be non-empty after trimming. */
export interface LookupQuery {
  readonly artist: string;
  readonly title: string;
}

/** One release row from a catalog search, decoded and ready for selection */
export interface CandidateRelease {
  /** Discogs release ID */
  id: number;
  /** Release year (null when missing or not a number) */
  year: number | null;
  genres: string[];
  styles: string[];
  /** First label listed on the search row */
  label: string | null;
  /** First format listed on the search row (e.g. "Vinyl") */
  format: string | null;
  country: string | null;
}

/** The release chosen for an artist/title pair */
export interface ReleaseResult {
  /** Artist, echoed from the query */
  readonly artist: string;
  /** Title, echoed from the query */
  readonly title: string;
  readonly year: number | null;
  readonly genres: readonly string[];
  readonly styles: readonly string[];
  readonly label: string | null;
  readonly releaseId: number;
  /** Public web page of the release */
  readonly releaseUrl: string;
  readonly format: string | null;
  readonly country: string | null;
  /** Whether the release's tracklist was confirmed to contain the title */
  readonly verified: boolean;
}

/** Outcome of tagging a single file */
export type FileStatus = 'tagged' | 'skipped' | 'failed';

/** Result of processing a single file */
export interface TagFileResult {
  /** Path of the processed file */
  filePath: string;
  status: FileStatus;
  /** Human-readable status message */
  message: string;
  /** Artist/title parsed from the filename (null when skipped before parsing) */
  parsed: ParsedName | null;
  /** Release used for enrichment, if any */
  release: ReleaseResult | null;
}

/** Aggregate counts for a batch run */
export interface BatchSummary {
  success: number;
  failed: number;
  skipped: number;
  results: TagFileResult[];
}

/** Application settings */
export interface AppSettings {
  /** Filename pattern used when --pattern is not given */
  defaultPattern: string;
  /** Whether Discogs enrichment may be used at all */
  useDiscogs: boolean;
  /** Discogs personal access token (lower precedence than flag and DISCOGS_TOKEN) */
  discogsToken: string;
  /** Discogs API base URL */
  discogsApiUrl: string;
  /** User-Agent sent with every Discogs request */
  userAgent: string;
  /** Whether to write a daily log file */
  writeLogFile: boolean;
  /** Log directory (null = <settingsDir>/logs) */
  logDir: string | null;
}

/** Default application settings */
export const DEFAULT_SETTINGS: AppSettings = {
  defaultPattern: '{artist} - {title}',
  useDiscogs: true,
  discogsToken: '',
  discogsApiUrl: 'https://api.discogs.com',
  userAgent: 'Tagsmith/1.0',
  writeLogFile: true,
  logDir: null,
};
