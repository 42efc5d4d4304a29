/**
 * Shared wiring for the command-line tools: output streams, settings,
 * logger and resolver construction.
 */

import type { AppSettings } from '../../shared/types';
import { DiscogsClient } from '../services/discogsClient';
import { Logger } from '../services/logger';
import { ReleaseResolver } from '../services/releaseResolver';
import { SettingsManager } from '../services/settingsManager';

// ─── Interfaces ──────────────────────────────────────────────────────────────

/** Line-oriented output used by the CLIs */
export interface CliIO {
  out(line: string): void;
  err(line: string): void;
}

/** Builds the release resolver a CLI run should use */
export type ResolverFactory = (
  settings: AppSettings,
  token: string | undefined,
  logger: Logger,
) => ReleaseResolver;

/** Dependencies a CLI run can be given (for testing) */
export interface CliDeps {
  io?: CliIO;
  env?: NodeJS.ProcessEnv;
  /** Directory holding settings.json (defaults to the platform appdata dir) */
  settingsDir?: string;
  resolverFactory?: ResolverFactory;
}

/** Everything a CLI run needs once settings are loaded */
export interface CliContext {
  io: CliIO;
  env: NodeJS.ProcessEnv;
  settings: AppSettings;
  logger: Logger;
  resolverFactory: ResolverFactory;
}

// ─── Defaults ────────────────────────────────────────────────────────────────

export const consoleIO: CliIO = {
  out: (line) => console.log(line),
  err: (line) => console.error(line),
};

/**
 * Creates a Discogs-backed resolver from settings.
 */
export const createDiscogsResolver: ResolverFactory = (settings, token, logger) =>
  new ReleaseResolver(
    new DiscogsClient({
      apiBaseUrl: settings.discogsApiUrl,
      userAgent: settings.userAgent,
      token,
    }),
    { logger },
  );

/**
 * Loads settings and prepares the logger for a CLI run.
 */
export async function createCliContext(deps: CliDeps): Promise<CliContext> {
  const settingsManager = new SettingsManager({ settingsDir: deps.settingsDir });
  await settingsManager.initialize();
  const settings = settingsManager.get();

  const logger = new Logger({ logDir: settings.writeLogFile ? settingsManager.getLogDir() : null });
  await logger.initialize();

  const loadWarning = settingsManager.getLoadWarning();
  if (loadWarning !== null) {
    logger.warn(loadWarning, { step: 'settings' });
  }

  return {
    io: deps.io ?? consoleIO,
    env: deps.env ?? process.env,
    settings,
    logger,
    resolverFactory: deps.resolverFactory ?? createDiscogsResolver,
  };
}

/**
 * Runs a CLI entry point and sets the process exit code from its result.
 */
export function runMain(main: (argv: string[]) => Promise<number>): void {
  void main(process.argv.slice(2)).then(
    (code) => {
      process.exitCode = code;
    },
    (error: unknown) => {
      console.error(error instanceof Error ? `Error: ${error.message}` : error);
      process.exitCode = 1;
    },
  );
}
