/**
 * File Scanner Utility
 *
 * Collects supported audio files from a file or directory path.
 */

import * as fs from 'fs';
import * as path from 'path';
import { SUPPORTED_EXTENSIONS } from '../../shared/types';
import { errorMessage } from '../services/errors';

/** Options for directory scanning */
export interface ScanOptions {
  /** Descend into subdirectories (default: false) */
  recursive?: boolean;
  /** Called for each subdirectory that cannot be listed; the scan goes on without it */
  onUnreadableDirectory?: (dirPath: string, reason: string) => void;
}

/**
 * Checks if a file has a supported audio extension.
 * @param filePath - Path to the file
 * @returns true if the file extension is supported
 */
export function isSupportedAudioFile(filePath: string): boolean {
  const ext = path.extname(filePath).toLowerCase();
  return SUPPORTED_EXTENSIONS.includes(ext);
}

/**
 * Scans a directory for audio files with supported extensions.
 * Unreadable subdirectories are reported through onUnreadableDirectory and
 * skipped; an unreadable top-level directory throws.
 *
 * @param dirPath - Path to the directory to scan
 * @param options - Scan options
 * @returns Sorted array of paths to audio files found
 */
export function scanDirectoryForAudioFiles(dirPath: string, options: ScanOptions = {}): string[] {
  const audioFiles: string[] = [];
  const recursive = options.recursive ?? false;

  function scan(currentPath: string): void {
    let entries: fs.Dirent[];
    try {
      entries = fs.readdirSync(currentPath, { withFileTypes: true });
    } catch (error: unknown) {
      if (currentPath === dirPath) throw error;
      options.onUnreadableDirectory?.(currentPath, errorMessage(error));
      return;
    }

    for (const entry of entries) {
      const fullPath = path.join(currentPath, entry.name);

      if (entry.isDirectory()) {
        if (recursive) scan(fullPath);
      } else if (entry.isFile() && isSupportedAudioFile(entry.name)) {
        audioFiles.push(fullPath);
      }
    }
  }

  scan(dirPath);
  return audioFiles.sort();
}

/**
 * Resolves a target path into the list of files to process.
 *
 * A file path is returned as-is, whatever its extension, so that the caller
 * can report it as unsupported. A directory is scanned for audio files.
 *
 * @returns The files to process, or null if the path does not exist
 */
export function collectAudioFiles(targetPath: string, options: ScanOptions = {}): string[] | null {
  const stats = fs.statSync(targetPath, { throwIfNoEntry: false });
  if (stats === undefined) {
    return null;
  }

  if (stats.isDirectory()) {
    return scanDirectoryForAudioFiles(targetPath, options);
  }
  return [targetPath];
}
