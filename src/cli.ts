import type { AxiosInstance } from 'axios';
import type { CredentialSource, LineWriter, PlaysConfig } from './types/plays';
import { PageFetcher } from './services/PageFetcher';
import { PlayAggregator } from './services/PlayAggregator';
import { readSetList } from './services/SetListParser';
import { SetSorter } from './services/SetSorter';
import { createPlayCountProviders } from './services/providers';
import { SetListReadError } from './utils/errors';
import { formatSummary } from './utils/format';
import { createHttpClient } from './utils/http';
import { type AppLogger, createLogger } from './utils/logger';

export type CliMode = 'aggregate' | 'sort';

export interface CliContext {
  config: PlaysConfig;
  credentials: CredentialSource;
  stdout: LineWriter;
  stderr: LineWriter;
  logger?: AppLogger;
  http?: AxiosInstance;
}

export const USAGE = 'Usage: set-plays [sort]';

export function parseMode(argv: readonly string[]): CliMode | null {
  if (argv.length === 0) return 'aggregate';
  if (argv.length === 1 && argv[0] === 'sort') return 'sort';
  return null;
}

/** Runs one invocation and returns the process exit code. */
export async function runCli(argv: readonly string[], ctx: CliContext): Promise<number> {
  const mode = parseMode(argv);
  if (!mode) {
    ctx.stderr(USAGE);
    return 2;
  }

  const logger = ctx.logger ?? createLogger(ctx.config.logging);
  const path = ctx.config.setsFile;

  try {
    if (mode === 'sort') {
      await new SetSorter(logger).printSorted(path, ctx.stdout);
      return 0;
    }

    const entries = await readSetList(path, logger);
    const http = ctx.http ?? createHttpClient(ctx.config.userAgent);
    const aggregator = new PlayAggregator(
      new PageFetcher(http, logger),
      createPlayCountProviders(http, logger, ctx.credentials),
      logger
    );
    const summary = await aggregator.aggregate(entries, ctx.stdout);
    formatSummary(summary).forEach((line) => ctx.stdout(line));
    return 0;
  } catch (error) {
    if (error instanceof SetListReadError) {
      ctx.stderr(`Error: ${error.message}`);
      logger.error('set_list_unreadable', error, { path });
      return 1;
    }
    throw error;
  }
}
