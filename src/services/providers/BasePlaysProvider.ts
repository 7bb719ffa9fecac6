import type { AxiosInstance } from 'axios';
import type { ProviderId } from '../../types/plays';
import type { AppLogger } from '../../utils/logger';
import type { PlayCountProvider } from './types';

export abstract class BasePlaysProvider implements PlayCountProvider {
  constructor(
    readonly id: ProviderId,
    protected readonly http: AxiosInstance,
    protected readonly logger: AppLogger
  ) {}

  protected abstract resolvePlays(url: string): Promise<number>;

  async getPlays(url: string): Promise<number> {
    this.logger.debug(`${this.id}_plays_requested`, { url });
    try {
      const plays = await this.resolvePlays(url);
      this.logger.debug(`${this.id}_plays_resolved`, { url, plays });
      return plays;
    } catch (error) {
      this.logger.error(`${this.id}_plays_failed`, error, { url });
      return 0;
    }
  }
}
