import type { AxiosInstance } from 'axios';
import { PageFetchError } from '../utils/errors';
import type { AppLogger } from '../utils/logger';

export class PageFetcher {
  constructor(
    private readonly http: AxiosInstance,
    private readonly logger: AppLogger
  ) {}

  /** Single GET, body returned as text whatever the status. Only transport errors reject. */
  async fetchPage(url: string): Promise<string> {
    this.logger.debug('page_fetch_started', { url });
    try {
      const response = await this.http.get<string>(url, {
        responseType: 'text',
        transformResponse: (data: unknown) => data,
        validateStatus: () => true,
      });
      const body = typeof response.data === 'string' ? response.data : '';
      this.logger.debug('page_fetch_completed', { url, status: response.status, bytes: body.length });
      return body;
    } catch (error) {
      this.logger.debug('page_fetch_failed', { url });
      throw new PageFetchError(url, error);
    }
  }
}
