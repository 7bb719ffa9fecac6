import type { AxiosInstance } from 'axios';
import { z } from 'zod';
import type { CredentialSource } from '../../types/plays';
import type { AppLogger } from '../../utils/logger';
import { extractYouTubeVideoId } from '../../utils/providers';
import { BasePlaysProvider } from './BasePlaysProvider';

const VideosResponseSchema = z.object({
  items: z
    .array(
      z.object({
        statistics: z.object({ viewCount: z.string().optional() }).optional(),
      })
    )
    .optional(),
});

export class YouTubePlaysProvider extends BasePlaysProvider {
  private readonly apiUrl = 'https://www.googleapis.com/youtube/v3/videos';

  constructor(http: AxiosInstance, logger: AppLogger, private readonly credentials: CredentialSource) {
    super('youtube', http, logger);
  }

  protected async resolvePlays(url: string): Promise<number> {
    const apiKey = this.credentials().youtube.apiKey;
    if (!apiKey) {
      this.logger.debug('youtube_api_key_missing');
      return 0;
    }

    const videoId = extractYouTubeVideoId(url);
    if (!videoId) {
      this.logger.debug('youtube_video_id_unparsed', { url });
      return 0;
    }

    const response = await this.http.get(this.apiUrl, {
      params: { part: 'statistics', id: videoId, key: apiKey },
      validateStatus: () => true,
    });
    if (response.status !== 200) {
      this.logger.debug('youtube_api_status', { videoId, status: response.status });
      return 0;
    }

    const parsed = VideosResponseSchema.safeParse(response.data);
    if (!parsed.success) {
      this.logger.debug('youtube_decode_failed', { videoId });
      return 0;
    }
    const first = parsed.data.items?.[0];
    if (!first) {
      this.logger.debug('youtube_video_not_found', { videoId });
      return 0;
    }
    return parseViewCount(first.statistics?.viewCount);
  }
}

// Leading decimal digits only, anything else counts as 0
export function parseViewCount(raw: string | undefined): number {
  if (!raw) return 0;
  const m = /^\s*([0-9]+)/.exec(raw);
  return m && m[1] ? Number(m[1]) : 0;
}
