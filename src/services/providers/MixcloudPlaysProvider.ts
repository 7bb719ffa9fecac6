import type { AxiosInstance } from 'axios';
import { z } from 'zod';
import type { AppLogger } from '../../utils/logger';
import { parseMixcloudShow } from '../../utils/providers';
import { BasePlaysProvider } from './BasePlaysProvider';

const MixcloudShowSchema = z.object({
  play_count: z.number().int().nonnegative().nullish(),
});

export class MixcloudPlaysProvider extends BasePlaysProvider {
  private readonly apiBaseUrl = 'https://api.mixcloud.com';

  constructor(http: AxiosInstance, logger: AppLogger) {
    super('mixcloud', http, logger);
  }

  protected async resolvePlays(url: string): Promise<number> {
    const show = parseMixcloudShow(url);
    if (!show) {
      this.logger.debug('mixcloud_url_unparsed', { url });
      return 0;
    }

    const apiUrl = `${this.apiBaseUrl}/${encodeURIComponent(show.username)}/${encodeURIComponent(show.slug)}/`;
    const response = await this.http.get(apiUrl, { validateStatus: () => true });
    if (response.status !== 200) {
      this.logger.debug('mixcloud_api_status', { apiUrl, status: response.status });
      return 0;
    }

    const parsed = MixcloudShowSchema.safeParse(response.data);
    if (!parsed.success) {
      this.logger.debug('mixcloud_decode_failed', { apiUrl, issues: parsed.error.issues.length });
      return 0;
    }
    return parsed.data.play_count ?? 0;
  }
}
