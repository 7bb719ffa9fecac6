import type { AxiosInstance } from 'axios';
import type { CredentialSource } from '../../types/plays';
import type { AppLogger } from '../../utils/logger';
import { BasePlaysProvider } from './BasePlaysProvider';
import { type SoundCloudStrategy, type StrategyResult, createSoundCloudStrategies } from './SoundCloudStrategies';

/**
 * Walks the SoundCloud lookup strategies in priority order
 * (token, client credentials, legacy client id, page scrape) and returns the
 * first successful count. Strategies whose credentials are missing are skipped.
 */
export class SoundCloudPlaysProvider extends BasePlaysProvider {
  private readonly strategies: readonly SoundCloudStrategy[];

  constructor(
    http: AxiosInstance,
    logger: AppLogger,
    private readonly credentials: CredentialSource,
    strategies?: readonly SoundCloudStrategy[]
  ) {
    super('soundcloud', http, logger);
    this.strategies = strategies ?? createSoundCloudStrategies(http, logger);
  }

  protected async resolvePlays(url: string): Promise<number> {
    const credentials = this.credentials().soundcloud;

    for (const strategy of this.strategies) {
      if (!strategy.isAvailable(credentials)) {
        this.logger.debug('soundcloud_strategy_skipped', { strategy: strategy.kind });
        continue;
      }

      let result: StrategyResult;
      try {
        result = await strategy.resolve(url, credentials);
      } catch (error) {
        this.logger.error('soundcloud_strategy_error', error, { strategy: strategy.kind, url });
        continue;
      }

      if (result.succeeded) {
        this.logger.debug('soundcloud_strategy_succeeded', { strategy: strategy.kind, plays: result.count });
        return result.count;
      }
      this.logger.debug('soundcloud_strategy_failed', { strategy: strategy.kind });
    }

    this.logger.warning('soundcloud_plays_undetermined', { url });
    return 0;
  }
}
