/**
 * Tagsmith library entry point.
 *
 * Re-exports the services used by the tag-audio and discogs-lookup commands
 * so they can be driven programmatically.
 */

export * from '../shared/types';
export {
  compileFilenamePattern,
  filenameStem,
  matchFilename,
  parseFilename,
} from './services/filenameParser';
export {
  DiscogsClient,
  type DiscogsClientOptions,
  type DiscogsReleaseDetails,
  type ReleaseCatalog,
} from './services/discogsClient';
export {
  ReleaseResolver,
  findEarliestRelease,
  combineGenres,
  type ReleaseResolverOptions,
  type FindEarliestReleaseOptions,
} from './services/releaseResolver';
export { writeTags, getFormatFromPath, type WriteTagsInput, type WriteTagsResult } from './services/tagWriter';
export { BatchProcessor, type BatchProcessorOptions } from './services/batchProcessor';
export { Logger, type LoggerOptions } from './services/logger';
export { SettingsManager, resolveDiscogsToken } from './services/settingsManager';
export {
  PipelineError,
  InputError,
  APIError,
  WriteError,
  isPipelineError,
} from './services/errors';
export { collectAudioFiles, scanDirectoryForAudioFiles } from './utils/fileScanner';
