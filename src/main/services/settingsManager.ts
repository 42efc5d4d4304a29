/**
 * Settings Manager Service for Tagsmith
 *
 * Loads user settings from a JSON file stored at
 * %APPDATA%/tagsmith/settings.json (Windows) or
 * ~/.config/tagsmith/settings.json (other platforms).
 *
 * Every field is validated on its own; invalid or missing fields fall back
 * to DEFAULT_SETTINGS, and a missing or corrupt file yields the defaults.
 */

import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';
import { type AppSettings, DEFAULT_SETTINGS } from '../../shared/types';
import { errorMessage } from './errors';

// ─── Interfaces ──────────────────────────────────────────────────────────────

/** Options for configuring the SettingsManager */
export interface SettingsManagerOptions {
  /** Custom directory to read the settings file from. Defaults to platform-specific appdata */
  settingsDir?: string;
  /** Custom filename for the settings file. Defaults to 'settings.json' */
  fileName?: string;
}

// ─── Constants ───────────────────────────────────────────────────────────────

const APP_DIR_NAME = 'tagsmith';
const DEFAULT_SETTINGS_FILENAME = 'settings.json';

/** Environment variable holding a Discogs personal access token */
export const DISCOGS_TOKEN_ENV = 'DISCOGS_TOKEN';

// ─── Helper Functions ────────────────────────────────────────────────────────

/**
 * Returns the default settings directory path based on the platform.
 * On Windows: %APPDATA%/tagsmith/
 * On other platforms: ~/.config/tagsmith/
 */
export function getDefaultSettingsDir(): string {
  const appData = process.env.APPDATA || path.join(os.homedir(), '.config');
  return path.join(appData, APP_DIR_NAME);
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Validates a filename pattern: it must contain both {artist} and {title}.
 */
export function validatePattern(pattern: unknown): pattern is string {
  if (typeof pattern !== 'string' || pattern.trim().length === 0) {
    return false;
  }
  return pattern.includes('{artist}') && pattern.includes('{title}');
}

/**
 * Validates an http(s) URL string.
 */
export function validateUrl(value: unknown): value is string {
  if (typeof value !== 'string') return false;
  try {
    const url = new URL(value.trim());
    return url.protocol === 'http:' || url.protocol === 'https:';
  } catch {
    return false;
  }
}

/**
 * Validates and sanitizes a partial settings object, merging with defaults.
 *
 * @param partial - A partial or potentially invalid settings object
 * @returns A complete, valid AppSettings object
 */
export function validateSettings(partial: unknown): AppSettings {
  const validated: AppSettings = { ...DEFAULT_SETTINGS };

  if (partial === null || typeof partial !== 'object' || Array.isArray(partial)) {
    return validated;
  }

  const raw: Record<string, unknown> = { ...partial };

  // defaultPattern: string containing {artist} and {title}
  if (validatePattern(raw.defaultPattern)) {
    validated.defaultPattern = raw.defaultPattern;
  }

  // useDiscogs: boolean
  if (typeof raw.useDiscogs === 'boolean') {
    validated.useDiscogs = raw.useDiscogs;
  }

  // discogsToken: string (trimmed, defaults to '')
  if (typeof raw.discogsToken === 'string') {
    validated.discogsToken = raw.discogsToken.trim();
  }

  // discogsApiUrl: http(s) URL
  if (validateUrl(raw.discogsApiUrl)) {
    validated.discogsApiUrl = raw.discogsApiUrl.trim();
  }

  // userAgent: non-empty string
  if (typeof raw.userAgent === 'string' && raw.userAgent.trim().length > 0) {
    validated.userAgent = raw.userAgent.trim();
  }

  // writeLogFile: boolean
  if (typeof raw.writeLogFile === 'boolean') {
    validated.writeLogFile = raw.writeLogFile;
  }

  // logDir: string | null
  if (typeof raw.logDir === 'string' && raw.logDir.trim().length > 0) {
    validated.logDir = raw.logDir.trim();
  }

  return validated;
}

/**
 * Parses settings JSON. Returns null if the JSON is invalid or not an object.
 */
export function deserializeSettings(json: string): Record<string, unknown> | null {
  try {
    const parsed: unknown = JSON.parse(json);
    if (parsed !== null && typeof parsed === 'object' && !Array.isArray(parsed)) {
      return { ...parsed };
    }
    return null;
  } catch {
    return null;
  }
}

/**
 * Picks the Discogs token: the command-line flag wins, then the
 * DISCOGS_TOKEN environment variable, then the settings file.
 *
 * @returns The token, or undefined when none is configured
 */
export function resolveDiscogsToken(
  flagValue: string | undefined,
  env: NodeJS.ProcessEnv,
  settings: AppSettings,
): string | undefined {
  const candidates = [flagValue, env[DISCOGS_TOKEN_ENV], settings.discogsToken];
  for (const candidate of candidates) {
    const token = candidate?.trim();
    if (token) return token;
  }
  return undefined;
}

// ─── SettingsManager Class ───────────────────────────────────────────────────

/**
 * Read-only access to Tagsmith settings.
 *
 * Usage:
 * ```typescript
 * const manager = new SettingsManager();
 * await manager.initialize(); // Load settings from file (or use defaults)
 * const { defaultPattern } = manager.get();
 * ```
 */
export class SettingsManager {
  private settings: AppSettings;
  private readonly settingsDir: string;
  private readonly fileName: string;
  private loadWarning: string | null = null;

  constructor(options?: SettingsManagerOptions) {
    this.settingsDir = options?.settingsDir ?? getDefaultSettingsDir();
    this.fileName = options?.fileName ?? DEFAULT_SETTINGS_FILENAME;
    this.settings = { ...DEFAULT_SETTINGS };
  }

  /**
   * Loads settings from file. A missing file means defaults; an unreadable
   * or corrupt one also keeps the defaults and sets the load warning.
   */
  async initialize(): Promise<void> {
    let content: string;
    try {
      content = await fs.promises.readFile(this.getFilePath(), 'utf-8');
    } catch (error: unknown) {
      if (!isMissingFile(error)) {
        this.loadWarning = `Cannot read ${this.getFilePath()}: ${errorMessage(error)}; using defaults`;
      }
      return;
    }

    const parsed = deserializeSettings(content);
    if (parsed) {
      this.settings = validateSettings(parsed);
    } else {
      this.loadWarning = `${this.getFilePath()} is not a JSON object; using defaults`;
    }
  }

  /**
   * Why the settings file was ignored, if it exists but could not be used.
   */
  getLoadWarning(): string | null {
    return this.loadWarning;
  }

  /**
   * Gets the current settings (copy to prevent mutation).
   */
  get(): AppSettings {
    return { ...this.settings };
  }

  /**
   * Returns the full path to the settings file.
   */
  getFilePath(): string {
    return path.join(this.settingsDir, this.fileName);
  }

  /**
   * Returns the log directory: the configured one, or <settingsDir>/logs.
   */
  getLogDir(): string {
    return this.settings.logDir ?? path.join(this.settingsDir, 'logs');
  }
}
