import type { AggregationSummary, LineWriter, ProviderId, SetEntry } from '../types/plays';
import { formatSetLine } from '../utils/format';
import type { AppLogger } from '../utils/logger';
import { findProviderLinks } from '../utils/providers';
import { PageFetcher } from './PageFetcher';
import type { PlayCountProviders } from './providers/types';

const PROVIDER_ORDER: readonly ProviderId[] = ['mixcloud', 'soundcloud', 'youtube'];

export class PlayAggregator {
  constructor(
    private readonly fetcher: PageFetcher,
    private readonly providers: PlayCountProviders,
    private readonly logger: AppLogger
  ) {}

  /**
   * Resolves each entry in order and writes one line per entry.
   * Entries are processed one at a time; nothing runs in parallel.
   */
  async aggregate(entries: readonly SetEntry[], emit: LineWriter): Promise<AggregationSummary> {
    const summary: AggregationSummary = { totalPlays: 0, totalSets: 0 };
    this.logger.event('aggregation_started', { sets: entries.length });

    for (const entry of entries) {
      summary.totalSets += 1;

      if (!entry.link) {
        emit(entry.rawLine);
        continue;
      }

      const plays = await this.playsFor(entry.link);
      summary.totalPlays += plays;
      emit(formatSetLine(entry, plays));
    }

    this.logger.event('aggregation_completed', { ...summary });
    return summary;
  }

  async playsFor(link: string): Promise<number> {
    let page: string;
    try {
      page = await this.fetcher.fetchPage(link);
    } catch (error) {
      this.logger.warning('set_page_unavailable', {
        link,
        error: error instanceof Error ? error.message : String(error),
      });
      return 0;
    }

    const links = findProviderLinks(page);
    this.logger.debug('provider_links_found', { link, ...links });

    let plays = 0;
    for (const id of PROVIDER_ORDER) {
      const providerUrl = links[id];
      if (!providerUrl) continue;
      plays += await this.providers[id].getPlays(providerUrl);
    }
    return plays;
  }
}
